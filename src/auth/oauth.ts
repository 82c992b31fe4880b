/**
 * Generic OAuth 2.0 authorization-code + PKCE machinery
 *
 * Backend specifics (endpoints, client id, body encoding, account id
 * extraction) live in an OAuthProfile; see ./anthropic and ./codex.
 */

import { spawn } from "node:child_process";
import { platform } from "node:os";
import { TokenRefreshError } from "../errors";
import { generatePKCE, generateState, startCallbackListener } from "./server";
import {
  credentialFromExpiry,
  TokenResponseSchema,
  type Credential,
  type OAuthBackendId,
  type TokenResponse,
} from "./types";

export interface OAuthProfile {
  backend: OAuthBackendId;
  clientId: string;
  authorizeUrl: string;
  tokenUrl: string;
  scope: string;
  callbackPort: number;
  callbackPath: string;
  /** How the token endpoint wants its body encoded */
  tokenBody: "json" | "form";
  /** Issuer-specific authorize parameters */
  extraAuthorizeParams?: Record<string, string>;
  /** Echo `state` in the code exchange body */
  sendStateOnExchange?: boolean;
  accountIdFrom?(tokens: TokenResponse): string | undefined;
}

export function buildAuthorizationUrl(
  profile: OAuthProfile,
  params: { challenge: string; state: string; redirectUri: string }
): string {
  const query = new URLSearchParams({
    ...profile.extraAuthorizeParams,
    response_type: "code",
    client_id: profile.clientId,
    redirect_uri: params.redirectUri,
    scope: profile.scope,
    code_challenge: params.challenge,
    code_challenge_method: "S256",
    state: params.state,
  });
  return `${profile.authorizeUrl}?${query.toString()}`;
}

/**
 * POST to the token endpoint. Network failures are retryable; a non-200 or a
 * malformed body is not.
 */
async function requestTokens(
  profile: OAuthProfile,
  grant: "authorization_code" | "refresh_token",
  params: Record<string, string>
): Promise<TokenResponse> {
  const fields = { grant_type: grant, client_id: profile.clientId, ...params };
  const label = grant === "refresh_token" ? "token refresh" : "token exchange";

  let response: Response;
  try {
    response = await fetch(profile.tokenUrl, {
      method: "POST",
      headers: {
        "Content-Type": profile.tokenBody === "json" ? "application/json" : "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: profile.tokenBody === "json" ? JSON.stringify(fields) : new URLSearchParams(fields).toString(),
    });
  } catch (error) {
    throw new TokenRefreshError({
      backend: profile.backend,
      message: `${profile.backend} ${label} request failed: ${error instanceof Error ? error.message : String(error)}`,
      retryable: true,
      cause: error,
    });
  }

  const text = await response.text();
  if (response.status !== 200) {
    throw new TokenRefreshError({
      backend: profile.backend,
      message: `${profile.backend} ${label} failed (${response.status}): ${text}`,
      retryable: false,
      status: response.status,
      body: text,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    json = undefined;
  }
  const parsed = TokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new TokenRefreshError({
      backend: profile.backend,
      message: `${profile.backend} ${label} returned an invalid token response`,
      retryable: false,
      status: response.status,
      body: text,
    });
  }
  return parsed.data;
}

function toCredential(profile: OAuthProfile, tokens: TokenResponse, previous?: Credential): Credential {
  return credentialFromExpiry({
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? previous?.refreshToken ?? "",
    rawExpiresAt: Date.now() + tokens.expires_in * 1000,
    accountId: profile.accountIdFrom?.(tokens) ?? previous?.accountId,
  });
}

export async function exchangeCode(
  profile: OAuthProfile,
  params: { code: string; verifier: string; redirectUri: string; state: string }
): Promise<Credential> {
  const tokens = await requestTokens(profile, "authorization_code", {
    code: params.code,
    code_verifier: params.verifier,
    redirect_uri: params.redirectUri,
    ...(profile.sendStateOnExchange ? { state: params.state } : {}),
  });
  if (!tokens.refresh_token) {
    throw new TokenRefreshError({
      backend: profile.backend,
      message: `${profile.backend} token exchange returned no refresh token`,
      retryable: false,
    });
  }
  return toCredential(profile, tokens);
}

export async function refreshCredential(profile: OAuthProfile, credential: Credential): Promise<Credential> {
  const tokens = await requestTokens(profile, "refresh_token", {
    refresh_token: credential.refreshToken,
  });
  return toCredential(profile, tokens, credential);
}

/**
 * Best-effort browser launch; the URL is always surfaced as well.
 */
export function openBrowser(url: string): void {
  const os = platform();
  const [command, args] =
    os === "darwin"
      ? ["open", [url]]
      : os === "win32"
        ? ["cmd", ["/c", "start", "", url]]
        : ["xdg-open", [url]];
  try {
    const child = spawn(command, args, { stdio: "ignore", detached: true });
    child.on("error", (error) => {
      console.error(`[oauth] Could not open browser: ${error.message}`);
    });
    child.unref();
  } catch (error) {
    console.error("[oauth] Could not open browser:", error);
  }
}

export interface LoginOptions {
  /** Receives the authorization URL; defaults to printing it */
  onAuthUrl?: (url: string) => void;
  openBrowser?: boolean;
  /** Bound on the wait for the browser callback */
  timeoutMs?: number;
  /** Override the profile's callback port (0 for ephemeral) */
  port?: number;
}

/**
 * One-shot PKCE login. The listener is torn down on every exit path.
 */
export class OAuthFlow {
  constructor(readonly profile: OAuthProfile) {}

  async login(options: LoginOptions = {}): Promise<Credential> {
    const pkce = generatePKCE();
    const state = generateState();

    const listener = await startCallbackListener({
      port: options.port ?? this.profile.callbackPort,
      path: this.profile.callbackPath,
      expectedState: state,
      timeoutMs: options.timeoutMs,
    });

    try {
      const url = buildAuthorizationUrl(this.profile, {
        challenge: pkce.challenge,
        state,
        redirectUri: listener.redirectUri,
      });

      if (options.onAuthUrl) {
        options.onAuthUrl(url);
      } else {
        console.log(`\nOpen this URL in your browser:\n${url}\n`);
      }
      if (options.openBrowser ?? !options.onAuthUrl) {
        openBrowser(url);
      }

      const code = await listener.waitForCode();
      return await exchangeCode(this.profile, {
        code,
        verifier: pkce.verifier,
        redirectUri: listener.redirectUri,
        state,
      });
    } finally {
      await listener.close();
    }
  }
}
