import { describe, it, expect } from "vitest";
import { decodeJwtPayload, extractCodexAccountId, jwtExpiry } from "./jwt";

function fakeJwt(payload: Record<string, unknown>): string {
  const encode = (value: unknown) => Buffer.from(JSON.stringify(value)).toString("base64url");
  return `${encode({ alg: "none" })}.${encode(payload)}.signature`;
}

describe("decodeJwtPayload", () => {
  it("returns the payload claims", () => {
    expect(decodeJwtPayload(fakeJwt({ sub: "user-1" }))).toEqual({ sub: "user-1" });
  });

  it("returns undefined for anything that is not a three-part token", () => {
    expect(decodeJwtPayload("not-a-jwt")).toBeUndefined();
    expect(decodeJwtPayload("a.!!!.c")).toBeUndefined();
  });
});

describe("extractCodexAccountId", () => {
  it("reads the namespaced auth claim", () => {
    const token = fakeJwt({ "https://api.openai.com/auth": { chatgpt_account_id: "acct-ns" } });
    expect(extractCodexAccountId(token)).toBe("acct-ns");
  });

  it("falls back to the top-level claim and then the first organization", () => {
    expect(extractCodexAccountId(fakeJwt({ chatgpt_account_id: "acct-top" }))).toBe("acct-top");
    expect(extractCodexAccountId(fakeJwt({ organizations: [{ id: "org-1" }, { id: "org-2" }] }))).toBe("org-1");
  });

  it("tries each token in turn", () => {
    const idToken = fakeJwt({ email: "someone@example.com" });
    const accessToken = fakeJwt({ chatgpt_account_id: "acct-access" });
    expect(extractCodexAccountId(undefined, idToken, accessToken)).toBe("acct-access");
  });

  it("returns undefined when no token names an account", () => {
    expect(extractCodexAccountId(fakeJwt({}), "opaque-token")).toBeUndefined();
  });
});

describe("jwtExpiry", () => {
  it("converts the exp claim to milliseconds", () => {
    expect(jwtExpiry(fakeJwt({ exp: 1_700_000_000 }))).toBe(1_700_000_000_000);
  });

  it("is undefined without a numeric exp", () => {
    expect(jwtExpiry(fakeJwt({ exp: "soon" }))).toBeUndefined();
  });
});
