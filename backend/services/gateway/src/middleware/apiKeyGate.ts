// backend/services/gateway/src/middleware/apiKeyGate.ts
/**
 * API-key admission control.
 *
 * Strategy:
 * - No key configured: open mode, every request passes. The entrypoint logs
 *   this at startup; it is never a silent default.
 * - OPTIONS passes (CORS preflight carries no credentials).
 * - Public paths (health + PUBLIC_PATHS) pass.
 * - Everything else must present the key in `x-api-key` (or API_KEY_HEADER).
 *
 * Compare:
 * - Both sides are hashed to fixed-length SHA-256 digests and compared with
 *   timingSafeEqual, so neither content nor length leaks through timing.
 * - The presented value is never logged.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { RequestHandler } from "express";
import type { Logger } from "pino";
import { UnauthorizedError } from "@admit/shared/errors";
import { requestIdOf } from "@admit/shared/middleware/problemJson";
import type { PathMatcher } from "../publicPaths";

function digest(v: string): Buffer {
  return createHash("sha256").update(v, "utf8").digest();
}

export function apiKeysMatch(
  presented: string | undefined,
  expected: string
): boolean {
  if (presented === undefined || presented === "") return false;
  return timingSafeEqual(digest(presented), digest(expected));
}

export function apiKeyGate(opts: {
  apiKey: string | undefined;
  headerName: string;
  isPublic: PathMatcher;
  log: Logger;
}): RequestHandler {
  const { apiKey, headerName, isPublic, log } = opts;
  const challenge = { "WWW-Authenticate": `ApiKey header="${headerName}"` };

  return (req, _res, next) => {
    if (apiKey === undefined) return next();
    if (req.method === "OPTIONS") return next();
    if (isPublic(req.path)) return next();

    const presented = req.get(headerName);
    if (apiKeysMatch(presented, apiKey)) return next();

    log.warn(
      {
        reqId: requestIdOf(req),
        method: req.method,
        path: req.path,
        reason: presented ? "mismatch" : "missing",
      },
      "api key rejected"
    );
    next(
      new UnauthorizedError(
        `Unauthorized: missing or invalid ${headerName}`,
        challenge
      )
    );
  };
}
