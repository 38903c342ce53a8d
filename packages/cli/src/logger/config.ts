// pattern: Functional Core

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

import { createRenderer } from "./renderer.js";

import type { LogFormat, LogLevel } from "./types.js";

export interface CreateLoggerOptions {
  format: LogFormat;
  nonInteractive: boolean;
  level?: LogLevel;
  /** Defaults to stderr; stdout carries results */
  destination?: NodeJS.WritableStream;
}

function serializeError(
  format: LogFormat,
  nonInteractive: boolean
): (err: unknown) => unknown {
  return (err: unknown) => {
    if (!(err instanceof Error)) return err;

    // The nice renderer prints a trimmed stack under the message
    if (format === "nice" && !nonInteractive) {
      return {
        message: err.message,
        stack: err.stack ? err.stack.split("\n").slice(1, 9) : undefined,
      };
    }

    return pino.stdSerializers.err(err);
  };
}

// Create pino logger with stream configuration
export function createLogger(options: CreateLoggerOptions): Logger {
  const { format, nonInteractive } = options;
  const baseConfig: LoggerOptions = {
    name: "appctl",
    level: options.level ?? "info",
    serializers: {
      err: serializeError(format, nonInteractive),
    },
  };

  const target = options.destination ?? process.stderr;

  let stream: DestinationStream;
  if (format === "nice") {
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(target);
    stream = renderer;
  } else if (target === process.stderr) {
    stream = pino.destination(2);
  } else {
    stream = target;
  }

  return pino(baseConfig, stream);
}
