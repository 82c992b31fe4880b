/**
 * Minimal JWT payload decoding (no signature verification)
 *
 * Only used to read claims the issuer put in our own tokens: account ids and
 * expiry.
 */

import { isRecord } from "../providers/types";

const OPENAI_AUTH_CLAIM = "https://api.openai.com/auth";

/**
 * Decode the payload segment of a JWT
 */
export function decodeJwtPayload(token: string): Record<string, unknown> | undefined {
  const parts = token.split(".");
  if (parts.length !== 3 || !parts[1]) return undefined;
  try {
    const payload: unknown = JSON.parse(Buffer.from(parts[1], "base64url").toString("utf-8"));
    return isRecord(payload) ? payload : undefined;
  } catch {
    return undefined;
  }
}

/**
 * ChatGPT account id from an OpenAI-issued token
 */
export function extractCodexAccountId(...tokens: Array<string | undefined>): string | undefined {
  for (const token of tokens) {
    if (!token) continue;
    const claims = decodeJwtPayload(token);
    if (!claims) continue;

    const auth = claims[OPENAI_AUTH_CLAIM];
    if (isRecord(auth) && typeof auth.chatgpt_account_id === "string") {
      return auth.chatgpt_account_id;
    }
    if (typeof claims.chatgpt_account_id === "string") {
      return claims.chatgpt_account_id;
    }
    const orgs = claims.organizations;
    if (Array.isArray(orgs)) {
      const first: unknown = orgs[0];
      if (isRecord(first) && typeof first.id === "string") return first.id;
    }
  }
  return undefined;
}

/**
 * `exp` claim as epoch milliseconds
 */
export function jwtExpiry(token: string): number | undefined {
  const exp = decodeJwtPayload(token)?.exp;
  return typeof exp === "number" ? exp * 1000 : undefined;
}
