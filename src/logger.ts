// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import pino from "pino";
import type { Logger, DestinationStream } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type { Logger };

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Configuration options for creating a pino logger instance.
 *
 * @property level - Log severity threshold. Messages below this level are suppressed.
 * @property name - Logger name included in every log entry.
 * @property pretty - Enable pino-pretty for human-readable output. Off in production and under test.
 */
export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

const REDACT = {
  paths: [
    "*.password",
    "*.token",
    "*.secret",
    "*.apiKey",
    "*.authorization",
    "*.headers.Authorization",
  ],
  censor: "[REDACTED]",
};

let logDestination: DestinationStream | undefined;

/**
 * Redirect all logger output to a file. Used by the long-running `serve`
 * command so the terminal only shows the progress lines.
 */
export function redirectLogToFile(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  logDestination = pino.destination({ dest: filePath, sync: false });
  const newLogger = pino(
    {
      name: logger.bindings().name ?? "escalation-engine",
      level: logger.level,
      redact: REDACT,
    },
    logDestination,
  );
  Object.assign(logger, newLogger);
}

/**
 * Create a new pino logger with the given options.
 *
 * Sensitive fields (password, token, secret, apiKey, authorization) are
 * redacted. If {@link redirectLogToFile} was called, the logger writes to
 * the file destination instead of stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const env = process.env["NODE_ENV"];
  const {
    level = parseLevel(process.env["LOG_LEVEL"]) ?? "info",
    name = "escalation-engine",
    pretty = env !== "production" && env !== "test",
  } = options;

  const transport = !logDestination && pretty
    ? { target: "pino-pretty", options: { colorize: true } }
    : undefined;

  const pinoOptions = {
    name,
    level,
    transport,
    redact: REDACT,
  };

  return logDestination ? pino(pinoOptions, logDestination) : pino(pinoOptions);
}

function parseLevel(raw: string | undefined): LogLevel | undefined {
  switch (raw) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return raw;
    default:
      return undefined;
  }
}

/** Default logger instance for convenience. */
export const logger = createLogger();
