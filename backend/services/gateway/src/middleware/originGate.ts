// backend/services/gateway/src/middleware/originGate.ts

/**
 * Server-side view of the CORS decision.
 *
 * - advisory (default): a disallowed Origin is logged and the request goes on;
 *   the browser blocks the cross-origin read because CORS headers are absent.
 * - enforce: a disallowed Origin is rejected with 403 and never forwarded.
 *
 * Requests without an Origin header (same-origin navigations, server-to-server)
 * always pass. Mount after `cors()`, which has already answered preflights.
 */

import type { RequestHandler } from "express";
import type { Logger } from "pino";
import { ForbiddenOriginError } from "@admit/shared/errors";
import { requestIdOf } from "@admit/shared/middleware/problemJson";
import type { CorsMode, OriginPolicy } from "../config";
import { isOriginAllowed } from "../cors";

export function originGate(opts: {
  policy: OriginPolicy;
  mode: CorsMode;
  log: Logger;
}): RequestHandler {
  const { policy, mode, log } = opts;

  return (req, _res, next) => {
    const origin = req.headers.origin;
    if (!origin || isOriginAllowed(origin, policy)) return next();

    log.warn(
      { reqId: requestIdOf(req), origin, mode, path: req.path },
      "ForbiddenOrigin"
    );

    if (mode === "enforce") return next(new ForbiddenOriginError(origin));
    next();
  };
}
