/**
 * Auth credential types for llm-gateway
 *
 * A credential is replaced wholesale on refresh, never mutated in place.
 * `expiresAt` is epoch milliseconds with the refresh margin already
 * subtracted, so expiry is a plain comparison against the clock.
 */

import { z } from "zod";
import { BACKEND_IDS, type BackendId } from "../providers/types";

/** Refresh this long before the issuer's stated expiry */
export const EXPIRY_MARGIN_MS = 300_000;

export const CredentialSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string(),
  expiresAt: z.number(),
  accountId: z.string().optional(),
});

export type Credential = z.infer<typeof CredentialSchema>;

const BackendIdSchema = z.enum(BACKEND_IDS);

// --- Auth store (persisted to auth.json) ---

export const AuthStoreSchema = z.object({
  version: z.literal(1).default(1),
  credentials: z.record(BackendIdSchema, CredentialSchema).default({}),
});

export type AuthStore = z.infer<typeof AuthStoreSchema>;

// --- Token endpoint response ---

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  // Refresh responses may omit it; the previous refresh token then stays valid
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().default(3600),
  id_token: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/**
 * Build a credential from the issuer's raw expiry (epoch ms), applying the margin.
 */
export function credentialFromExpiry(params: {
  accessToken: string;
  refreshToken: string;
  rawExpiresAt: number;
  accountId?: string;
}): Credential {
  return {
    accessToken: params.accessToken,
    refreshToken: params.refreshToken,
    expiresAt: params.rawExpiresAt - EXPIRY_MARGIN_MS,
    accountId: params.accountId,
  };
}

export function isExpired(credential: Credential, now: number = Date.now()): boolean {
  return now >= credential.expiresAt;
}

export type OAuthBackendId = Extract<BackendId, "anthropic" | "codex">;

export const OAUTH_BACKENDS: readonly OAuthBackendId[] = ["anthropic", "codex"];

export function isOAuthBackend(backend: BackendId): backend is OAuthBackendId {
  return OAUTH_BACKENDS.some((id) => id === backend);
}

/**
 * A place a credential can be read from and written back to.
 * `load` resolves to null when the source has nothing usable.
 */
export interface CredentialSource {
  /** Short label for logs and status output */
  readonly name: string;
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
}

export interface LoadedCredential {
  credential: Credential;
  source: CredentialSource;
}
