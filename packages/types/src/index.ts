export type * from "./foundational.js";
export type * from "./message.js";
export type * from "./run.js";
export type * from "./tool.js";
export type * from "./agent.js";
export type * from "./resources.js";
export type * from "./agent-service.js";
export type * from "./error.js";
export type * from "./observability.js";
export type * from "./conversation-store.js";
