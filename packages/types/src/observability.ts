/** Log levels, ordered from most to least verbose. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
