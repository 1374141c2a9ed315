// backend/services/gateway/src/cors.ts

/**
 * Purpose:
 * - Translate the configured OriginPolicy into `cors` middleware options.
 *
 * Policy:
 * - "*" in ALLOWED_ORIGINS: every origin is reflected back (credentials allowed,
 *   so a literal "*" header is never sent).
 * - Otherwise exact string match against the normalized allow-list; no
 *   wildcards or suffix matching.
 * - Empty allow-list: nothing is allowed.
 * - Preflight is always answered here (204); disallowed origins simply get no
 *   Access-Control-Allow-Origin header.
 */

import type { CorsOptions } from "cors";
import type { OriginPolicy } from "./config";

export const PREFLIGHT_MAX_AGE_S = 600;

export function isOriginAllowed(origin: string, policy: OriginPolicy): boolean {
  return policy.allowAll || policy.origins.includes(origin);
}

export function buildCorsOptions(policy: OriginPolicy): CorsOptions {
  return {
    origin: policy.allowAll ? true : [...policy.origins],
    credentials: true,
    exposedHeaders: ["x-request-id"],
    maxAge: PREFLIGHT_MAX_AGE_S,
    optionsSuccessStatus: 204,
  };
}
