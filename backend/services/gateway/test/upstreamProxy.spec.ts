// backend/services/gateway/test/upstreamProxy.spec.ts
/**
 * Purpose:
 * - Forward through the gateway to an in-process upstream.
 * - Relay is unchanged (status, headers, body) apart from hop-by-hop and
 *   access-control-* headers; the API key never reaches the upstream.
 * - Upstream failures map to 502 / 504 problem+json; an upstream that dies
 *   mid-body resets the client connection.
 */

import http from "node:http";
import type { IncomingHttpHeaders } from "node:http";
import pino from "pino";
import request from "supertest";
import { afterAll, beforeAll, beforeEach, describe, it, expect } from "vitest";
import { loadGatewayConfig } from "../src/config";
import { createDownstream, createGatewayApp } from "../src/app";
import { listen as listenApp, rawRequest } from "./helpers/rawHttp";

const log = pino({ level: "silent" });

type Seen = {
  method: string | undefined;
  url: string | undefined;
  headers: IncomingHttpHeaders;
  body: string;
};

const seen: Seen[] = [];
let upstream: http.Server;
let upstreamPort = 0;

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      resolve(addr && typeof addr === "object" ? addr.port : 0);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.closeAllConnections();
    server.close(() => resolve());
  });
}

beforeAll(async () => {
  upstream = http.createServer((req, res) => {
    let body = "";
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => {
      body += chunk;
    });
    req.on("end", () => {
      seen.push({ method: req.method, url: req.url, headers: req.headers, body });
      if (req.url?.startsWith("/slow")) return; // never answers
      if (req.url?.startsWith("/partial")) {
        res.writeHead(200, { "content-type": "text/plain" });
        res.write("part");
        setTimeout(() => req.socket.destroy(), 50);
        return;
      }
      res.writeHead(201, {
        "content-type": "application/json",
        "x-upstream": "yes",
        "access-control-allow-origin": "*",
      });
      res.end(JSON.stringify({ echo: body }));
    });
  });
  upstreamPort = await listen(upstream);
});

afterAll(async () => {
  await close(upstream);
});

beforeEach(() => {
  seen.length = 0;
});

function gateway(env: Record<string, string>) {
  const config = loadGatewayConfig({
    API_KEY: "secret123",
    ALLOWED_ORIGINS: "https://a.example",
    UPSTREAM_TIMEOUT_MS: "200",
    ...env,
  });
  return createGatewayApp({
    config,
    log,
    downstream: createDownstream(config, log),
  });
}

describe("upstreamProxy", () => {
  it("is not created without UPSTREAM_URL", () => {
    expect(createDownstream(loadGatewayConfig({}), log)).toBeUndefined();
  });

  it("streams an admitted request upstream and relays the response", async () => {
    const app = gateway({ UPSTREAM_URL: `http://127.0.0.1:${upstreamPort}` });

    const res = await request(app)
      .post("/api/items?x=1")
      .set("Origin", "https://a.example")
      .set("x-api-key", "secret123")
      .set("x-request-id", "req-proxy")
      .set("content-type", "application/json")
      .send('{"name":"n"}');

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ echo: '{"name":"n"}' });
    expect(res.headers["x-upstream"]).toBe("yes");
    expect(res.headers["x-request-id"]).toBe("req-proxy");
    expect(res.headers["access-control-allow-origin"]).toBe("https://a.example");

    expect(seen).toHaveLength(1);
    const [hit] = seen;
    expect(hit.method).toBe("POST");
    expect(hit.url).toBe("/api/items?x=1");
    expect(hit.body).toBe('{"name":"n"}');
    expect(hit.headers["x-api-key"]).toBeUndefined();
    expect(hit.headers["x-request-id"]).toBe("req-proxy");
    expect(hit.headers["content-type"]).toBe("application/json");
    expect(hit.headers["x-forwarded-for"]).toContain("127.0.0.1");
    expect(hit.headers["x-forwarded-proto"]).toBe("http");
  });

  it("prefixes the upstream base path", async () => {
    const app = gateway({
      UPSTREAM_URL: `http://127.0.0.1:${upstreamPort}/v1/`,
    });

    const res = await request(app)
      .get("/things/7")
      .set("x-api-key", "secret123");

    expect(res.status).toBe(201);
    expect(seen.map((s) => s.url)).toEqual(["/v1/things/7"]);
  });

  it("never contacts the upstream for a rejected request", async () => {
    const app = gateway({ UPSTREAM_URL: `http://127.0.0.1:${upstreamPort}` });

    const res = await request(app).get("/api/items");

    expect(res.status).toBe(401);
    expect(seen).toHaveLength(0);
  });

  it("maps a silent upstream to 504", async () => {
    const app = gateway({ UPSTREAM_URL: `http://127.0.0.1:${upstreamPort}` });

    const res = await request(app)
      .get("/slow")
      .set("x-api-key", "secret123");

    expect(res.status).toBe(504);
    expect(res.body).toMatchObject({
      title: "Gateway Timeout",
      status: 504,
      detail: "Upstream did not respond within 200ms",
    });
  });

  it("maps a refused connection to 502", async () => {
    const gone = http.createServer();
    const port = await listen(gone);
    await close(gone);

    const app = gateway({ UPSTREAM_URL: `http://127.0.0.1:${port}` });
    const res = await request(app)
      .get("/api/items")
      .set("x-api-key", "secret123");

    expect(res.status).toBe(502);
    expect(res.body).toMatchObject({
      title: "Bad Gateway",
      status: 502,
      detail: "Upstream unavailable (ECONNREFUSED)",
    });
  });

  it("resets the client when the upstream dies mid-body", async () => {
    const app = gateway({ UPSTREAM_URL: `http://127.0.0.1:${upstreamPort}` });
    const server = await listenApp(app);
    try {
      const res = await rawRequest(server.port, "/partial", {
        headers: { "x-api-key": "secret123" },
      });

      expect(res.status).toBe(200);
      expect(res.body).toBe("part");
      expect(res.complete).toBe(false);
    } finally {
      await server.close();
    }
  });
});
