// Errors
export * from "./errors.js";

// Logging
export {
  type Logger,
  type LogMethod,
  type LoggerFactory,
  resolveLogger,
  createNodeJSLogger,
} from "./logger.js";

// Utilities
export * from "./utils.js";
