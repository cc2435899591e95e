import pino, { type DestinationStream, type Logger, type LoggerOptions as PinoLoggerOptions, type TransportSingleOptions } from "pino";

import { SearchCoreError } from "./core/errors.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type LogFormat = "json" | "pretty";

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
  bindings?: Record<string, unknown>;
  /** write here instead of stdout; ignored for the pretty format */
  destination?: DestinationStream;
}

function serializeError(err: unknown): unknown {
  if (err instanceof SearchCoreError) return { ...err.toLogContext(), stack: err.stack };
  if (err instanceof Error) return pino.stdSerializers.err(err);
  return err;
}

function createPrettyTransport(): TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = "info", name, format = "json", bindings = {}, destination } = options;

  const config: PinoLoggerOptions = {
    level,
    name,
    serializers: {
      err: serializeError,
      error: serializeError,
    },
  };

  let logger =
    format === "pretty"
      ? pino({ ...config, transport: createPrettyTransport() })
      : destination
        ? pino(config, destination)
        : pino(config);

  if (Object.keys(bindings).length > 0) {
    logger = logger.child(bindings);
  }
  return logger;
}

