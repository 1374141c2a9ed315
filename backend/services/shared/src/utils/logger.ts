// backend/services/shared/src/utils/logger.ts

/**
 * Shared Logger (authoritative)
 *
 * Each service calls `initLogger({ service, level })` once at bootstrap,
 * BEFORE building request loggers (pino-http) or the Express app.
 *
 * Usage:
 *   import { initLogger, logger } from "@admit/shared/utils/logger";
 *   initLogger({ service: SERVICE_NAME, level: config.logLevel });
 *
 * Notes:
 * - No "service" binding until initLogger() runs; avoids stamping "unknown".
 * - `logger` is a live binding: modules importing it see the re-initialised
 *   instance once bootstrap has run.
 */

import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

export type { LevelWithSilent };

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

const pinoOptions: LoggerOptions = {
  level: "info",
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      'req.headers["x-api-key"]',
    ],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(opts: {
  service: string;
  level?: LevelWithSilent;
}): Logger {
  const service = String(opts.service || "").trim();
  if (!service) throw new Error("initLogger requires a service name");
  logger = pino({
    ...pinoOptions,
    level: opts.level ?? pinoOptions.level,
    base: { service },
  });
  return logger;
}
