// backend/services/gateway/test/publicPaths.spec.ts
import { describe, it, expect } from "vitest";
import { compilePublicPaths, hasDotSegment } from "../src/publicPaths";

describe("compilePublicPaths", () => {
  const isPublic = compilePublicPaths([
    "/docs/*",
    "/api/users/by-qr/{qrId}",
    "/openapi.json",
  ]);

  it("always exposes health endpoints", () => {
    const none = compilePublicPaths([]);
    expect(none("/healthz")).toBe(true);
    expect(none("/readyz")).toBe(true);
    expect(none("/api/users")).toBe(false);
  });

  it.each([
    ["/docs", true],
    ["/docs/", true],
    ["/docs/index.html", true],
    ["/docs/assets/app.js", true],
    ["/docsx", false],
  ])("prefix pattern: %s -> %s", (path, expected) => {
    expect(isPublic(path)).toBe(expected);
  });

  it.each([
    ["/api/users/by-qr/abc123", true],
    ["/api/users/by-qr/", false],
    ["/api/users/by-qr/abc/extra", false],
    ["/api/users/by-qr", false],
    ["/api/users/by-qr/..", false],
    ["/api/users/by-qr/.", false],
    ["/api/users/by-qr/..abc", true],
  ])("template pattern: %s -> %s", (path, expected) => {
    expect(isPublic(path)).toBe(expected);
  });

  it("matches exact paths case-sensitively", () => {
    expect(isPublic("/openapi.json")).toBe(true);
    expect(isPublic("/OpenAPI.json")).toBe(false);
    expect(isPublic("/openapi.json/")).toBe(false);
  });

  it("escapes regex characters in templates", () => {
    const m = compilePublicPaths(["/files/{name}.json"]);
    expect(m("/files/report.json")).toBe(true);
    expect(m("/files/reportxjson")).toBe(false);
  });

  it.each([
    "/docs/../admin/secrets",
    "/docs/./index.html",
    "/docs/%2e%2e/admin",
    "/docs/%2E./admin",
    "/docs/..%2fadmin",
    "/docs/..%5Cadmin",
    "/api/users/by-qr/%2e%2e",
  ])("never treats %s as public", (path) => {
    expect(isPublic(path)).toBe(false);
  });
});

describe("hasDotSegment", () => {
  it.each([
    ["/docs/..", true],
    ["/./x", true],
    ["/a\\..\\b", true],
    ["/files/report.v2.json", false],
    ["/.well-known/openid-configuration", false],
    ["/x/.../y", false],
    ["/a%2fb", false],
  ])("%s -> %s", (path, expected) => {
    expect(hasDotSegment(path)).toBe(expected);
  });
});
