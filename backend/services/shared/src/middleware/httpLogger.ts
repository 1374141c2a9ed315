// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Why:
 * - Consistent, structured access logs across services so ops can aggregate by
 *   `service` and correlate by `reqId` end-to-end.
 * - Telemetry only; never blocks a request.
 *
 * Order:
 * - Mount first. genReqId assigns `req.id` and echoes `x-request-id`, which
 *   every later middleware, problem body and proxy hop reuses.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes are not logged.
 * - Request serialized as { id, method, url }; headers (and so credentials)
 *   are never logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage } from "node:http";
import type { Logger } from "pino";

export const REQUEST_ID_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

const QUIET_PATHS = new Set([
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

export function incomingRequestId(req: IncomingMessage): string | undefined {
  for (const name of REQUEST_ID_HEADERS) {
    const hdr = req.headers[name];
    const v = Array.isArray(hdr) ? hdr[0] : hdr;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

export function makeHttpLogger(opts: { logger: Logger; serviceName: string }) {
  const logger = opts.logger.child({ service: opts.serviceName });

  return pinoHttp({
    logger,

    // Reuse a caller-supplied correlation id; mint only when missing.
    genReqId: (req, res) => {
      const id = incomingRequestId(req) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (_req, res, err) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req) => QUIET_PATHS.has((req.url || "").split("?")[0]),
    },

    serializers: {
      req(req: { id: unknown; method: string; url: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
