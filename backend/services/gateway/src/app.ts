// backend/services/gateway/src/app.ts
/**
 * Purpose:
 * - Assemble the Entrypoint Gateway: every inbound request is gated before it
 *   reaches downstream handling logic.
 *
 * Pipeline (order is load-bearing):
 *   1) http logger        -> req.id + x-request-id on every response
 *   2) cors               -> answers preflight (never forwarded)
 *   3) originGate         -> advisory log or 403 (CORS_MODE)
 *   4) pathGuard          -> 400 for "." / ".." path segments
 *   5) health             -> /healthz, /readyz (public)
 *   6) apiKeyGate         -> 401 unless key matches (or open mode)
 *   7) downstream         -> Forward; response relayed unchanged
 *   8) 404 + error funnel -> application/problem+json
 *
 * Invariants:
 * - Config is passed in; nothing here reads process.env.
 * - No body parsers: the downstream proxy streams raw bodies.
 */

import express, { type Express, type RequestHandler } from "express";
import cors from "cors";
import type { Logger } from "pino";
import { makeHttpLogger } from "@admit/shared/middleware/httpLogger";
import {
  errorHandler,
  notFoundHandler,
} from "@admit/shared/middleware/problemJson";
import { createHealthRouter } from "@admit/shared/health";
import { SERVICE_NAME, type GatewayConfig } from "./config";
import { buildCorsOptions } from "./cors";
import { compilePublicPaths } from "./publicPaths";
import { originGate } from "./middleware/originGate";
import { pathGuard } from "./middleware/pathGuard";
import { apiKeyGate } from "./middleware/apiKeyGate";
import { upstreamProxy } from "./middleware/upstreamProxy";

export const SERVICE_VERSION = "1.0.0";

export type CreateGatewayAppOptions = {
  config: GatewayConfig;
  log: Logger;
  /** Downstream handling logic. Omitted: admitted requests end at the 404 tail. */
  downstream?: RequestHandler;
};

/** The proxy to UPSTREAM_URL, or undefined when none is configured. */
export function createDownstream(
  config: GatewayConfig,
  log: Logger
): RequestHandler | undefined {
  if (!config.upstreamUrl) return undefined;
  return upstreamProxy({
    target: config.upstreamUrl,
    timeoutMs: config.upstreamTimeoutMs,
    stripHeaders: [config.apiKeyHeader],
    log,
  });
}

export function createGatewayApp(opts: CreateGatewayAppOptions): Express {
  const { config, log, downstream } = opts;

  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", config.trustProxy);

  app.use(makeHttpLogger({ logger: log, serviceName: SERVICE_NAME }));
  app.use(cors(buildCorsOptions(config.cors)));
  app.use(originGate({ policy: config.cors, mode: config.corsMode, log }));
  app.use(pathGuard({ log }));

  app.use(
    createHealthRouter({
      service: SERVICE_NAME,
      env: config.appEnv,
      version: SERVICE_VERSION,
      readiness: () => ({
        admission: config.apiKey === undefined ? "open" : "api-key",
        upstream: config.upstreamUrl ? "configured" : "none",
      }),
    })
  );

  app.use(
    apiKeyGate({
      apiKey: config.apiKey,
      headerName: config.apiKeyHeader,
      isPublic: compilePublicPaths(config.publicPaths),
      log,
    })
  );

  if (downstream) app.use(downstream);

  app.use(notFoundHandler());
  app.use(errorHandler({ log }));

  return app;
}
