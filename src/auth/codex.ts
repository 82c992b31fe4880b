/**
 * OpenAI Codex OAuth
 *
 * Two ways in:
 * 1. Browser (PKCE): loopback callback on port 1455
 * 2. Headless (device code): for SSH/remote, prints a code to enter elsewhere
 *
 * Grants access to the ChatGPT subscription's Codex models.
 */

import { z } from "zod";
import { TimeoutError, TokenRefreshError } from "../errors";
import { extractCodexAccountId } from "./jwt";
import { exchangeCode, type OAuthProfile } from "./oauth";
import type { Credential } from "./types";

export const CODEX_CLIENT_ID = "app_EMoamEEZ73f0CkXaXp7hrann";
export const CODEX_ISSUER = "https://auth.openai.com";
export const CODEX_ORIGINATOR = "llm-gateway";

const POLLING_SAFETY_MARGIN_MS = 3000;
const DEFAULT_DEVICE_TIMEOUT_MS = 15 * 60 * 1000;

export const codexProfile: OAuthProfile = {
  backend: "codex",
  clientId: CODEX_CLIENT_ID,
  authorizeUrl: `${CODEX_ISSUER}/oauth/authorize`,
  tokenUrl: `${CODEX_ISSUER}/oauth/token`,
  scope: "openid profile email offline_access",
  callbackPort: 1455,
  callbackPath: "/auth/callback",
  tokenBody: "form",
  extraAuthorizeParams: {
    id_token_add_organizations: "true",
    codex_cli_simplified_flow: "true",
    originator: CODEX_ORIGINATOR,
  },
  accountIdFrom: (tokens) => extractCodexAccountId(tokens.id_token, tokens.access_token),
};

const DeviceCodeSchema = z.object({
  device_auth_id: z.string(),
  user_code: z.string(),
  interval: z.union([z.string(), z.number()]).optional(),
});

const DeviceTokenSchema = z.object({
  authorization_code: z.string(),
  code_verifier: z.string(),
});

export interface HeadlessLoginOptions {
  /** Receives the verification URL and the code to enter; defaults to printing them */
  onUserCode?: (info: { verificationUrl: string; userCode: string }) => void;
  /** Overrides the issuer's polling interval */
  pollIntervalMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function deviceError(message: string, retryable: boolean, status?: number): TokenRefreshError {
  return new TokenRefreshError({ backend: "codex", message, retryable, status });
}

/**
 * Login via headless device code flow
 */
export async function loginCodexHeadless(options: HeadlessLoginOptions = {}): Promise<Credential> {
  const sleep = options.sleep ?? defaultSleep;
  const deadline = Date.now() + (options.timeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS);
  const headers = { "Content-Type": "application/json", "User-Agent": CODEX_ORIGINATOR };

  const deviceResponse = await fetch(`${CODEX_ISSUER}/api/accounts/deviceauth/usercode`, {
    method: "POST",
    headers,
    body: JSON.stringify({ client_id: CODEX_CLIENT_ID }),
  });
  if (!deviceResponse.ok) {
    throw deviceError(
      `Failed to initiate device authorization: ${deviceResponse.status}`,
      false,
      deviceResponse.status
    );
  }

  const deviceBody = DeviceCodeSchema.safeParse(await deviceResponse.json().catch(() => undefined));
  if (!deviceBody.success) {
    throw deviceError("Device authorization returned an invalid response", false, deviceResponse.status);
  }
  const device = deviceBody.data;
  const interval =
    options.pollIntervalMs ?? Math.max(Number(device.interval) || 5, 1) * 1000 + POLLING_SAFETY_MARGIN_MS;

  const info = { verificationUrl: `${CODEX_ISSUER}/codex/device`, userCode: device.user_code };
  if (options.onUserCode) {
    options.onUserCode(info);
  } else {
    console.log(`\nGo to: ${info.verificationUrl}`);
    console.log(`Enter code: ${info.userCode}\n`);
    console.log("Waiting for authorization...");
  }

  while (Date.now() < deadline) {
    const response = await fetch(`${CODEX_ISSUER}/api/accounts/deviceauth/token`, {
      method: "POST",
      headers,
      body: JSON.stringify({ device_auth_id: device.device_auth_id, user_code: device.user_code }),
    });

    if (response.ok) {
      const parsed = DeviceTokenSchema.safeParse(await response.json().catch(() => undefined));
      if (!parsed.success) {
        throw deviceError("Device authorization returned an invalid token grant", false, response.status);
      }
      const grant = parsed.data;
      return exchangeCode(codexProfile, {
        code: grant.authorization_code,
        verifier: grant.code_verifier,
        redirectUri: `${CODEX_ISSUER}/deviceauth/callback`,
        state: "",
      });
    }

    // 403/404: user has not approved yet
    if (response.status !== 403 && response.status !== 404) {
      throw deviceError(`Device authorization failed: ${response.status}`, false, response.status);
    }

    await sleep(interval);
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_DEVICE_TIMEOUT_MS;
  throw new TimeoutError(`Device authorization not completed within ${timeoutMs}ms`, timeoutMs);
}
