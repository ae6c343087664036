// backend/services/shared/src/utils/logger.ts
/**
 * Shared logger (pino, stdout only)
 *
 * Each service calls `initLogger(SERVICE_NAME)` once at bootstrap, before any
 * request logger (pino-http) is created, so every line carries `{ service }`.
 *
 * Usage:
 *   import { initLogger, logger } from "../../shared/src/utils/logger";
 *   initLogger("gateway");
 *   logger.info({ port }, "listening");
 */

import pino, { type Logger, type LoggerOptions, type LevelWithSilent } from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(v);
}

function levelFromEnv(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

// Credentials never reach the log stream, even when a caller logs a raw request.
const REDACT_PATHS = [
  "req.headers.authorization",
  "req.headers.cookie",
  "req.headers['x-api-key']",
  "res.headers['set-cookie']",
  "headers.authorization",
  "headers.cookie",
];

export function buildLoggerOptions(
  service?: string,
  level: LevelWithSilent = levelFromEnv()
): LoggerOptions {
  return {
    level,
    base: service ? { service } : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, remove: true },
  };
}

let serviceName = (process.env.SERVICE_NAME || "").trim();

export let logger: Logger = pino(buildLoggerOptions(serviceName || undefined));

/** Rebind the root logger to a service identity. */
export function initLogger(service: string): void {
  serviceName = service;
  const level = isLogLevel(logger.level) ? logger.level : levelFromEnv();
  logger = pino(buildLoggerOptions(service, level));
}

export function currentServiceName(): string {
  return serviceName;
}

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}

/** A logger that drops everything; used by tests and tooling. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
