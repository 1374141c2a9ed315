// backend/services/shared/src/health.ts

/**
 * Why:
 * - Liveness and readiness must be predictable across services and **public**.
 *   Platforms probe stable URLs and expect a compact, machine-friendly shape.
 * - Liveness answers "is the process up?" (cheap, no dependencies).
 * - Readiness answers "can this instance take traffic?" (fast, bounded checks).
 *
 * Notes:
 * - Mount BEFORE any admission gate; probes carry no credentials.
 * - Readiness accepts an optional check; a throw maps to 503.
 */

import express from "express";
import { requestIdOf } from "./middleware/problemJson";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

/**
 * Exposes:
 *   GET /healthz -> liveness
 *   GET /readyz  -> readiness
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env,
    version: opts.version,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ status: "ok", ...base, requestId: requestIdOf(req) });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({
        status: "ok",
        ...base,
        requestId: requestIdOf(req),
        ...details,
      });
    } catch (err) {
      res.status(503).json({
        status: "unavailable",
        ...base,
        requestId: requestIdOf(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/healthz", liveness);
  router.get("/readyz", (req, res) => {
    void readiness(req, res);
  });

  return router;
}
