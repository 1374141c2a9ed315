// backend/services/gateway/src/config.ts

/**
 * Purpose:
 * - Parse the process environment ONCE into an immutable GatewayConfig.
 * - Everything downstream receives the config explicitly; nothing re-reads
 *   process.env per request.
 *
 * Invariants:
 * - The returned object and its lists are frozen.
 * - All validation issues are reported together in one ConfigError.
 * - `apiKey === undefined` means open mode (admission control disabled).
 */

import { z } from "zod";
import { ConfigError } from "@admit/shared/errors";
import { LOG_LEVELS, type LevelWithSilent } from "@admit/shared/utils/logger";

export const SERVICE_NAME = "gateway" as const;

export const DEFAULT_PORT = 8000;
export const DEFAULT_API_KEY_HEADER = "x-api-key";
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;
export const ALLOW_ALL_ORIGINS = "*";
/** Serialized opaque origin (sandboxed iframes, file:// pages). */
export const NULL_ORIGIN = "null";

export type CorsMode = "advisory" | "enforce";

export type OriginPolicy = {
  readonly allowAll: boolean;
  readonly origins: readonly string[];
};

export type GatewayConfig = {
  readonly port: number;
  readonly host: string;
  readonly appEnv: string;
  readonly logLevel: LevelWithSilent;
  readonly cors: OriginPolicy;
  readonly corsMode: CorsMode;
  readonly apiKey: string | undefined;
  readonly apiKeyHeader: string;
  readonly publicPaths: readonly string[];
  readonly upstreamUrl: string | undefined;
  readonly upstreamTimeoutMs: number;
  readonly trustProxy: boolean;
};

function toList(v?: string): string[] {
  return String(v ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const optionalTrimmed = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const port = optionalTrimmed.transform((v, ctx) => {
  if (v === undefined) return DEFAULT_PORT;
  if (!/^\d+$/.test(v)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be an integer, got "${v}"`,
    });
    return z.NEVER;
  }
  const n = Number(v);
  if (n < 1 || n > 65_535) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be between 1 and 65535, got ${n}`,
    });
    return z.NEVER;
  }
  return n;
});

/** "https://a.example" | "http://localhost:3000"; no path, query or credentials. */
function normalizeOrigin(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  if (url.username || url.password || url.search || url.hash) return null;
  if (url.pathname !== "/") return null;
  return url.origin;
}

// Unset keeps the permissive default; an explicitly empty value denies all.
const allowedOrigins = z
  .string()
  .optional()
  .transform((v, ctx): OriginPolicy => {
    if (v === undefined) {
      return Object.freeze({ allowAll: true, origins: Object.freeze([]) });
    }

    const origins: string[] = [];
    let allowAll = false;
    for (const entry of toList(v)) {
      if (entry === ALLOW_ALL_ORIGINS) {
        allowAll = true;
        continue;
      }
      const origin =
        entry === NULL_ORIGIN ? NULL_ORIGIN : normalizeOrigin(entry);
      if (!origin) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid origin "${entry}" (expected scheme://host[:port], "null" or "*")`,
        });
        continue;
      }
      if (!origins.includes(origin)) origins.push(origin);
    }
    return Object.freeze({ allowAll, origins: Object.freeze(origins) });
  });

const corsMode = optionalTrimmed.pipe(
  z.enum(["advisory", "enforce"]).default("advisory")
);

const logLevel = optionalTrimmed.pipe(z.enum(LOG_LEVELS).default("info"));

const apiKeyHeader = optionalTrimmed.transform((v, ctx) => {
  if (v === undefined) return DEFAULT_API_KEY_HEADER;
  if (!/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(v)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid header name "${v}"`,
    });
    return z.NEVER;
  }
  return v.toLowerCase();
});

const publicPaths = z
  .string()
  .optional()
  .transform((v, ctx) => {
    const paths = toList(v);
    for (const p of paths) {
      if (!p.startsWith("/")) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `path "${p}" must start with "/"`,
        });
      }
    }
    return Object.freeze(paths);
  });

const upstreamUrl = optionalTrimmed.transform((v, ctx) => {
  if (v === undefined) return undefined;
  let url: URL;
  try {
    url = new URL(v);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be an absolute URL, got "${v}"`,
    });
    return z.NEVER;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must use http or https, got "${url.protocol}"`,
    });
    return z.NEVER;
  }
  return v.replace(/\/+$/, "");
});

const positiveInt = (fallback: number) =>
  optionalTrimmed.transform((v, ctx) => {
    if (v === undefined) return fallback;
    if (!/^\d+$/.test(v) || Number(v) < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be a positive integer, got "${v}"`,
      });
      return z.NEVER;
    }
    return Number(v);
  });

const bool = (fallback: boolean) =>
  optionalTrimmed.transform((v, ctx) => {
    if (v === undefined) return fallback;
    const s = v.toLowerCase();
    if (["1", "true", "yes"].includes(s)) return true;
    if (["0", "false", "no"].includes(s)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be true or false, got "${v}"`,
    });
    return z.NEVER;
  });

const envSchema = z.object({
  PORT: port,
  HOST: optionalTrimmed.transform((v) => v ?? "0.0.0.0"),
  APP_ENV: optionalTrimmed.transform((v) => v ?? "dev"),
  LOG_LEVEL: logLevel,
  ALLOWED_ORIGINS: allowedOrigins,
  CORS_MODE: corsMode,
  API_KEY: optionalTrimmed,
  API_KEY_HEADER: apiKeyHeader,
  PUBLIC_PATHS: publicPaths,
  UPSTREAM_URL: upstreamUrl,
  UPSTREAM_TIMEOUT_MS: positiveInt(DEFAULT_UPSTREAM_TIMEOUT_MS),
  TRUST_PROXY: bool(true),
});

export function loadGatewayConfig(
  env: Record<string, string | undefined> = process.env
): GatewayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    host: e.HOST,
    appEnv: e.APP_ENV,
    logLevel: e.LOG_LEVEL,
    cors: e.ALLOWED_ORIGINS,
    corsMode: e.CORS_MODE,
    apiKey: e.API_KEY,
    apiKeyHeader: e.API_KEY_HEADER,
    publicPaths: e.PUBLIC_PATHS,
    upstreamUrl: e.UPSTREAM_URL,
    upstreamTimeoutMs: e.UPSTREAM_TIMEOUT_MS,
    trustProxy: e.TRUST_PROXY,
  });
}
