// backend/services/gateway/src/middleware/pathGuard.ts

/**
 * Rejects request targets carrying "." or ".." segments (raw or %2e / %2f
 * encoded) with 400 before any gate looks at the path.
 *
 * The public-path check and the proxy both work on the raw path, which an
 * upstream may resolve differently ("/docs/../admin" -> "/admin").
 */

import type { RequestHandler } from "express";
import type { Logger } from "pino";
import { BadRequestError } from "@admit/shared/errors";
import { requestIdOf } from "@admit/shared/middleware/problemJson";
import { hasDotSegment } from "../publicPaths";

export function pathGuard(opts: { log: Logger }): RequestHandler {
  const { log } = opts;

  return (req, _res, next) => {
    const [rawPath = ""] = req.originalUrl.split("?", 1);
    if (!hasDotSegment(rawPath)) return next();

    log.warn(
      { reqId: requestIdOf(req), method: req.method, path: rawPath },
      "dot segment rejected"
    );
    next(new BadRequestError("Path must not contain dot segments"));
  };
}
