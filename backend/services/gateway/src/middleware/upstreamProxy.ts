// backend/services/gateway/src/middleware/upstreamProxy.ts

/**
 * Reverse proxy that forwards admitted requests to UPSTREAM_URL + originalUrl.
 * - Streams request/response (no buffering, no body parsing).
 * - Preserves method, path, querystring and end-to-end headers.
 * - Sets x-forwarded-* and x-request-id.
 * - Strips hop-by-hop headers and the caller's API key on the way in.
 * - Relays upstream status/headers/body unchanged, except hop-by-hop and
 *   access-control-* headers (CORS stays owned by the gateway policy).
 * - Refused/reset/unreachable -> 502, no response within timeoutMs -> 504.
 */

import http from "node:http";
import https from "node:https";
import { pipeline } from "node:stream";
import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";
import type { RequestHandler } from "express";
import type { Logger } from "pino";
import { BadGatewayError, GatewayTimeoutError } from "@admit/shared/errors";
import { requestIdOf } from "@admit/shared/middleware/problemJson";

// RFC 7230 hop-by-hop headers that must not be forwarded.
const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

const CONNECT_ERRORS = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

export type UpstreamProxyOptions = {
  /** Absolute base URL, no trailing slash. */
  target: string;
  timeoutMs: number;
  /** Lower-case request header names never sent upstream. */
  stripHeaders?: readonly string[];
  log: Logger;
};

function mergeForwardedFor(
  existing: string | string[] | undefined,
  addr: string | undefined
): string {
  const xs = Array.isArray(existing) ? existing.join(", ") : existing || "";
  if (!addr) return xs;
  return xs ? `${xs}, ${addr}` : addr;
}

function outboundHeaders(
  headers: IncomingHttpHeaders,
  drop: ReadonlySet<string>
): OutgoingHttpHeaders {
  const out: OutgoingHttpHeaders = {};
  for (const [k, v] of Object.entries(headers)) {
    const key = k.toLowerCase();
    if (v === undefined || HOP_BY_HOP.has(key) || drop.has(key)) continue;
    out[key] = v;
  }
  return out;
}

function relayedHeaders(headers: IncomingHttpHeaders): OutgoingHttpHeaders {
  const out: OutgoingHttpHeaders = {};
  for (const [k, v] of Object.entries(headers)) {
    const key = k.toLowerCase();
    if (v === undefined || HOP_BY_HOP.has(key)) continue;
    if (key.startsWith("access-control-")) continue;
    out[key] = v;
  }
  return out;
}

export function upstreamProxy(opts: UpstreamProxyOptions): RequestHandler {
  const base = new URL(opts.target);
  const basePath = base.pathname.replace(/\/+$/, "");
  const agent = base.protocol === "https:" ? https : http;
  const drop = new Set<string>(["host", ...(opts.stripHeaders ?? [])]);
  const { log, timeoutMs } = opts;

  return (req, res, next) => {
    const reqId = requestIdOf(req);
    const path = basePath + req.originalUrl;

    const headers = outboundHeaders(req.headers, drop);
    headers["x-forwarded-for"] = mergeForwardedFor(
      req.headers["x-forwarded-for"],
      req.socket.remoteAddress
    );
    headers["x-forwarded-host"] =
      req.get("x-forwarded-host") || req.get("host") || "";
    headers["x-forwarded-proto"] = req.protocol || "http";
    if (reqId) headers["x-request-id"] = reqId;

    let failed = false;
    const fail = (err: Error) => {
      // Mid-stream: the status line is gone, only the socket can signal failure.
      if (res.headersSent) {
        res.destroy(err);
        return;
      }
      if (failed) return;
      failed = true;
      next(err);
    };

    const upstreamReq = agent.request(
      {
        protocol: base.protocol,
        hostname: base.hostname,
        port: base.port || undefined,
        method: req.method,
        path,
        headers,
      },
      (upstreamRes) => {
        upstreamReq.setTimeout(0);
        res.writeHead(
          upstreamRes.statusCode || 502,
          upstreamRes.statusMessage,
          relayedHeaders(upstreamRes.headers)
        );
        // An upstream abort mid-body destroys `res` (client sees a reset).
        pipeline(upstreamRes, res, (err) => {
          if (err) {
            log.warn(
              { reqId, target: base.origin, path, code: err.code, err },
              "[gateway] proxy response aborted"
            );
            return;
          }
          log.debug(
            { reqId, target: base.origin, path, status: upstreamRes.statusCode },
            "[gateway] proxy exit"
          );
        });
      }
    );

    upstreamReq.setTimeout(timeoutMs, () => {
      upstreamReq.destroy(
        new GatewayTimeoutError(`Upstream did not respond within ${timeoutMs}ms`)
      );
    });

    upstreamReq.on("error", (err: NodeJS.ErrnoException) => {
      log.error(
        { reqId, target: base.origin, path, code: err.code, err },
        "[gateway] proxy error"
      );
      if (err instanceof GatewayTimeoutError) return fail(err);
      if (err.code && CONNECT_ERRORS.has(err.code)) {
        return fail(new BadGatewayError(`Upstream unavailable (${err.code})`));
      }
      fail(new BadGatewayError("Upstream error"));
    });

    // Caller went away before the upstream answered.
    res.on("close", () => {
      if (!res.writableFinished) upstreamReq.destroy();
    });

    req.pipe(upstreamReq);
    log.debug(
      { reqId, target: base.origin, path, method: req.method },
      "[gateway] proxy enter"
    );
  };
}
