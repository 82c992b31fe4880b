/**
 * Anthropic (Claude subscription) OAuth
 *
 * Two ways in:
 * 1. Browser (PKCE): loopback callback on port 54545
 * 2. Paste code: for SSH/remote, the issuer's page shows `code#state` to paste back
 *
 * The token endpoint takes a JSON body and wants the `state` echoed back on
 * the code exchange.
 */

import { createInterface } from "node:readline";
import { AuthenticationError } from "../errors";
import { buildAuthorizationUrl, exchangeCode, openBrowser, type LoginOptions, type OAuthProfile } from "./oauth";
import { generatePKCE, generateState } from "./server";
import type { Credential } from "./types";

export const ANTHROPIC_CLIENT_ID = "9d1c250a-e61b-44d9-88ed-5944d1962f5e";
export const ANTHROPIC_CODE_CALLBACK_URL = "https://console.anthropic.com/oauth/code/callback";

export const anthropicProfile: OAuthProfile = {
  backend: "anthropic",
  clientId: ANTHROPIC_CLIENT_ID,
  authorizeUrl: "https://claude.ai/oauth/authorize",
  tokenUrl: "https://console.anthropic.com/v1/oauth/token",
  scope: "org:create_api_key user:profile user:inference",
  callbackPort: 54545,
  callbackPath: "/callback",
  tokenBody: "json",
  sendStateOnExchange: true,
};

/** Same client, but the issuer displays the code instead of redirecting to us */
export const anthropicPasteCodeProfile: OAuthProfile = {
  ...anthropicProfile,
  extraAuthorizeParams: { code: "true" },
};

export interface PasteCodeLoginOptions extends Pick<LoginOptions, "onAuthUrl" | "openBrowser"> {
  /** Returns what the issuer's page displayed; defaults to reading a line from stdin */
  onPromptCode?: () => Promise<string>;
}

function readCodeFromStdin(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question("Paste the code shown after authorizing (code#state): ", (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Split a pasted `code#state` and check the state against the one we sent.
 */
export function parsePastedCode(pasted: string, expectedState: string): { code: string; state: string } {
  const value = pasted.trim();
  const separator = value.indexOf("#");
  if (separator <= 0) {
    throw new AuthenticationError("Invalid authorization code format, expected code#state");
  }
  const code = value.slice(0, separator);
  const state = value.slice(separator + 1);
  if (state !== expectedState) {
    throw new AuthenticationError("OAuth state mismatch");
  }
  return { code, state };
}

/**
 * Login via the paste-code flow. No local listener is involved.
 */
export async function loginAnthropicPasteCode(options: PasteCodeLoginOptions = {}): Promise<Credential> {
  const pkce = generatePKCE();
  const expectedState = generateState();
  const url = buildAuthorizationUrl(anthropicPasteCodeProfile, {
    challenge: pkce.challenge,
    state: expectedState,
    redirectUri: ANTHROPIC_CODE_CALLBACK_URL,
  });

  if (options.onAuthUrl) {
    options.onAuthUrl(url);
  } else {
    console.log(`\nOpen this URL in a browser:\n${url}\n`);
  }
  if (options.openBrowser) {
    openBrowser(url);
  }

  const pasted = await (options.onPromptCode ?? readCodeFromStdin)();
  const { code, state } = parsePastedCode(pasted, expectedState);

  return exchangeCode(anthropicPasteCodeProfile, {
    code,
    verifier: pkce.verifier,
    redirectUri: ANTHROPIC_CODE_CALLBACK_URL,
    state,
  });
}
