/**
 * Logger contract for dispatcher components, plus a JSON-line logger for the daemon.
 * Structured context + message; messages are prefixed `<service>:<method> - `.
 */

export type LogMethod = (ctx: object, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Either a Logger or an object with get(name) returning a Logger. */
export type LoggerFactory = Logger | { get(name: string): Logger };

function hasGet(factory: LoggerFactory): factory is { get(name: string): Logger } {
  return "get" in factory && typeof factory.get === "function";
}

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return console;
  return hasGet(factory) ? factory.get(serviceName) : factory;
}

type Level = "debug" | "info" | "warn" | "error";

function write(level: Level, ctx: object, msg: string): void {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  const line = JSON.stringify({ level, time: new Date().toISOString(), ...payload });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger instance; debug lines are written only when verbose.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { verbose?: boolean } = {}
): { get: (prefix: string) => Logger } {
  const verbose = options.verbose ?? false;
  return {
    get(prefix: string): Logger {
      const base = { service: serviceName, prefix };
      return {
        debug: (ctx, msg) => {
          if (verbose) write("debug", { ...base, ...ctx }, msg);
        },
        info: (ctx, msg) => write("info", { ...base, ...ctx }, msg),
        warn: (ctx, msg) => write("warn", { ...base, ...ctx }, msg),
        error: (ctx, msg) => write("error", { ...base, ...ctx }, msg),
      };
    },
  };
}
