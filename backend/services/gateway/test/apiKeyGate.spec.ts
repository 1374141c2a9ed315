// backend/services/gateway/test/apiKeyGate.spec.ts
import { describe, it, expect } from "vitest";
import { apiKeysMatch } from "../src/middleware/apiKeyGate";

describe("apiKeysMatch", () => {
  it("accepts the exact key", () => {
    expect(apiKeysMatch("secret123", "secret123")).toBe(true);
  });

  it.each([
    ["secret124", "same length, different content"],
    ["secret1234", "longer"],
    ["secret", "prefix"],
    ["SECRET123", "different case"],
    [" secret123", "leading space"],
  ])("rejects %j (%s)", (presented) => {
    expect(apiKeysMatch(presented, "secret123")).toBe(false);
  });

  it("rejects a missing or empty credential", () => {
    expect(apiKeysMatch(undefined, "secret123")).toBe(false);
    expect(apiKeysMatch("", "secret123")).toBe(false);
  });
});
