// Structured logging with pino
// Supports: child loggers, log levels, pretty printing, file output

import pino, { type Logger as PinoLogger } from "pino";
import type { LoggingConfig } from "./config.js";

/** Log context data */
export interface LogContext {
  [key: string]: unknown;
}

/** Logger interface that our code uses */
export interface Logger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
  level: string;
  flush(): void;
}

/** Wrap pino logger to match our interface */
function wrapPinoLogger(pinoLogger: PinoLogger): Logger {
  return {
    trace: (msg, ctx) => (ctx ? pinoLogger.trace(ctx, msg) : pinoLogger.trace(msg)),
    debug: (msg, ctx) => (ctx ? pinoLogger.debug(ctx, msg) : pinoLogger.debug(msg)),
    info: (msg, ctx) => (ctx ? pinoLogger.info(ctx, msg) : pinoLogger.info(msg)),
    warn: (msg, ctx) => (ctx ? pinoLogger.warn(ctx, msg) : pinoLogger.warn(msg)),
    error: (msg, ctx) => (ctx ? pinoLogger.error(ctx, msg) : pinoLogger.error(msg)),
    fatal: (msg, ctx) => (ctx ? pinoLogger.fatal(ctx, msg) : pinoLogger.fatal(msg)),
    child: (bindings) => wrapPinoLogger(pinoLogger.child(bindings)),
    get level() {
      return pinoLogger.level;
    },
    set level(value: string) {
      pinoLogger.level = value;
    },
    flush: () => pinoLogger.flush(),
  };
}

/** Logger options for creating new loggers */
export interface CreateLoggerOptions {
  /** Logger name (appears in logs) */
  name: string;
  /** Log level */
  level?: LoggingConfig["level"];
  /** Additional bindings for all log entries */
  bindings?: LogContext;
}

/** Global root logger instance */
let rootLogger: PinoLogger | null = null;

function defaultRootLogger(level?: string): PinoLogger {
  return pino({
    name: "keyrelay",
    level: process.env.LOG_LEVEL ?? level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    // Keep secrets out of structured context even if a caller passes them
    redact: ["credential.value", "token", "apiKey", "authorization"],
  });
}

/** Initialize the root logger with configuration */
export function initLogger(config: LoggingConfig): Logger {
  const transports: pino.TransportTargetOptions[] = [];

  if (config.pretty) {
    transports.push({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:HH:MM:ss.l",
        ignore: "pid,hostname",
        messageFormat: "{component} | {msg}",
        destination: 2, // stderr, so streamed output on stdout stays clean
      },
    });
  } else {
    transports.push({
      target: "pino/file",
      options: { destination: 2 },
    });
  }

  if (config.file) {
    transports.push({
      target: "pino/file",
      options: { destination: config.file },
    });
  }

  rootLogger = pino({
    name: "keyrelay",
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ["credential.value", "token", "apiKey", "authorization"],
    base: {
      env: process.env.NODE_ENV ?? "development",
    },
    transport: {
      targets: transports,
    },
  });

  return wrapPinoLogger(rootLogger);
}

/** Create a child logger from the root logger */
export function createLogger(options: CreateLoggerOptions): Logger {
  if (!rootLogger) {
    rootLogger = defaultRootLogger(options.level);
  }

  const childLogger = rootLogger.child({
    component: options.name,
    ...options.bindings,
  });

  if (options.level && process.env.LOG_LEVEL === undefined) {
    childLogger.level = options.level;
  }

  return wrapPinoLogger(childLogger);
}

/** Shutdown logging (flush and close) */
export async function shutdownLogger(): Promise<void> {
  if (rootLogger) {
    rootLogger.flush();
    // Give time for async transports to flush
    await new Promise((resolve) => setTimeout(resolve, 100));
  }
}
