/**
 * Structured Pino loggers: pretty-printed in development, JSON elsewhere,
 * with credential material redacted.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./pii-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "info", or "debug" when NODE_ENV is "development". */
  level?: string;
  /** Component name attached to every line. */
  service?: string;
  /** Overrides the NODE_ENV check that selects pino-pretty. */
  pretty?: boolean;
  /** Write to this stream instead of stdout; disables the pretty transport. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(pretty: boolean): pino.TransportSingleOptions | undefined {
  if (!pretty) {
    return undefined;
  }
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "credforge";

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }

  const transport = buildTransport(options?.pretty ?? isDevelopment());
  return pino(transport ? { ...pinoOptions, transport } : pinoOptions);
}
