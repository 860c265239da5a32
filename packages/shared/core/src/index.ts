/**
 * termfolio-core — configuration, logging and error helpers.
 */

// Configuration
export {
  type ConfigLayer,
  envLayer,
  mergeLayers,
  readYamlLayer,
  resolveConfig,
} from "./config.js";

// Logging
export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  createLogger,
  formatLogLine,
  silentLogger,
} from "./logger.js";

// Errors
export { ConfigError, errorMessage } from "./errors.js";
