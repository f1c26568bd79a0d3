export {
  AgentDeckError,
  AgentServiceError,
  TurnFailedError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export { createLogger, createSilentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export {
  loadConfig,
  parseConfig,
  requireEndpoint,
  AgentDeckConfigSchema,
  DEFAULT_CONFIG_PATH,
} from "./config.js";
export type { AgentDeckConfig } from "./config.js";
