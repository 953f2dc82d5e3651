/**
 * logger.ts - Structured logging for rag-datacore
 *
 * Every sentinel-returning path in the collection service and credential
 * store logs its cause here before returning false / null / -1, so the
 * log is where failures are diagnosed. Entries are JSON lines from pino.
 *
 * API keys pass through the credential store, so the common secret field
 * names are redacted before anything is written.
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from "pino";
import type { LogLevel } from "../config";

export type Logger = PinoLogger;

export interface LoggerSettings {
  level?: LogLevel;
  /** Where JSON lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

const REDACTED_PATHS = [
  "apiKey",
  "api_key",
  "apiKeys",
  "encryptionKey",
  "token",
  "*.apiKey",
  "*.api_key",
  "*.apiKeys",
  "*.encryptionKey",
  "*.token",
];

function createPinoOptions(settings: LoggerSettings): LoggerOptions {
  return {
    name: "rag-datacore",
    level: settings.level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: REDACTED_PATHS,
      censor: "[REDACTED]",
    },
  };
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  const options = createPinoOptions(settings);
  return settings.destination ? pino(options, settings.destination) : pino(options);
}

/**
 * A logger that discards everything. Components fall back to it when no
 * logger is injected.
 */
export function createNoopLogger(): Logger {
  return pino({ enabled: false });
}
