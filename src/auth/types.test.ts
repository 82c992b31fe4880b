import { describe, it, expect } from "vitest";
import { credentialFromExpiry, EXPIRY_MARGIN_MS, isExpired, isOAuthBackend, TokenResponseSchema } from "./types";

const NOW = 1_700_000_000_000;

describe("credentialFromExpiry", () => {
  it("subtracts the refresh margin from the issuer's expiry", () => {
    const credential = credentialFromExpiry({
      accessToken: "access",
      refreshToken: "refresh",
      rawExpiresAt: NOW + 3_600_000,
    });

    expect(credential.expiresAt).toBe(NOW + 3_600_000 - EXPIRY_MARGIN_MS);
  });

  it("treats a token within the margin as already expired", () => {
    const credential = credentialFromExpiry({
      accessToken: "access",
      refreshToken: "refresh",
      rawExpiresAt: NOW + 60_000,
    });

    expect(isExpired(credential, NOW)).toBe(true);
  });

  it("keeps a token with more than the margin left", () => {
    const credential = credentialFromExpiry({
      accessToken: "access",
      refreshToken: "refresh",
      rawExpiresAt: NOW + 600_000,
    });

    expect(isExpired(credential, NOW)).toBe(false);
    expect(isExpired(credential, NOW + 300_000)).toBe(true);
  });
});

describe("TokenResponseSchema", () => {
  it("defaults expires_in to an hour", () => {
    expect(TokenResponseSchema.parse({ access_token: "a" })).toEqual({ access_token: "a", expires_in: 3600 });
  });

  it("rejects a response without an access token", () => {
    expect(TokenResponseSchema.safeParse({ refresh_token: "r", expires_in: 10 }).success).toBe(false);
  });
});

describe("isOAuthBackend", () => {
  it("covers the subscription backends only", () => {
    expect(isOAuthBackend("anthropic")).toBe(true);
    expect(isOAuthBackend("codex")).toBe(true);
    expect(isOAuthBackend("openrouter")).toBe(false);
  });
});
