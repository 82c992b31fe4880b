import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { buildAuthorizationUrl, exchangeCode, OAuthFlow, refreshCredential, type OAuthProfile } from "./oauth";
import { ANTHROPIC_CODE_CALLBACK_URL, anthropicPasteCodeProfile, anthropicProfile } from "./anthropic";
import { codexProfile } from "./codex";
import { AuthenticationError, TokenRefreshError } from "../errors";
import { EXPIRY_MARGIN_MS } from "./types";

const realFetch = globalThis.fetch;

const testProfile: OAuthProfile = {
  backend: "anthropic",
  clientId: "test-client",
  authorizeUrl: "https://auth.example.test/authorize",
  tokenUrl: "https://auth.example.test/token",
  scope: "read write",
  callbackPort: 0,
  callbackPath: "/callback",
  tokenBody: "json",
  sendStateOnExchange: true,
};

function tokenResponse(body: Record<string, unknown>, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function sentRequest(mock: Mock<typeof fetch>, index = 0) {
  const call = mock.mock.calls[index];
  if (!call) throw new Error(`no request #${index}`);
  const [input, init] = call;
  return {
    url: String(input),
    headers: new Headers(init?.headers),
    body: typeof init?.body === "string" ? init.body : "",
  };
}

describe("buildAuthorizationUrl", () => {
  it("includes PKCE, state and the issuer's extra parameters", () => {
    const url = new URL(
      buildAuthorizationUrl(codexProfile, {
        challenge: "challenge-1",
        state: "state-1",
        redirectUri: "http://localhost:1455/auth/callback",
      })
    );

    expect(url.origin + url.pathname).toBe("https://auth.openai.com/oauth/authorize");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      id_token_add_organizations: "true",
      codex_cli_simplified_flow: "true",
      originator: "llm-gateway",
      response_type: "code",
      client_id: codexProfile.clientId,
      redirect_uri: "http://localhost:1455/auth/callback",
      scope: "openid profile email offline_access",
      code_challenge: "challenge-1",
      code_challenge_method: "S256",
      state: "state-1",
    });
  });

  it("asks the anthropic issuer to show the code only for the paste-code variant", () => {
    const loopback = new URL(
      buildAuthorizationUrl(anthropicProfile, { challenge: "c", state: "s", redirectUri: "http://localhost:54545/callback" })
    );
    const pasted = new URL(
      buildAuthorizationUrl(anthropicPasteCodeProfile, {
        challenge: "c",
        state: "s",
        redirectUri: ANTHROPIC_CODE_CALLBACK_URL,
      })
    );

    expect(loopback.searchParams.has("code")).toBe(false);
    expect(pasted.searchParams.get("code")).toBe("true");
    expect(pasted.searchParams.get("redirect_uri")).toBe("https://console.anthropic.com/oauth/code/callback");
  });
});

describe("token endpoint", () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it("exchanges a code with a JSON body that echoes the state", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(1_700_000_000_000);
    fetchMock.mockResolvedValueOnce(tokenResponse({ access_token: "at", refresh_token: "rt", expires_in: 7200 }));

    const credential = await exchangeCode(anthropicProfile, {
      code: "code-1",
      verifier: "verifier-1",
      redirectUri: "http://localhost:54545/callback",
      state: "state-1",
    });

    expect(credential).toEqual({
      accessToken: "at",
      refreshToken: "rt",
      expiresAt: 1_700_000_000_000 + 7_200_000 - EXPIRY_MARGIN_MS,
      accountId: undefined,
    });
    const request = sentRequest(fetchMock);
    expect(request.url).toBe("https://console.anthropic.com/v1/oauth/token");
    expect(request.headers.get("content-type")).toBe("application/json");
    expect(JSON.parse(request.body)).toEqual({
      grant_type: "authorization_code",
      client_id: anthropicProfile.clientId,
      code: "code-1",
      code_verifier: "verifier-1",
      redirect_uri: "http://localhost:54545/callback",
      state: "state-1",
    });
  });

  it("form-encodes the codex exchange and extracts the account id", async () => {
    const idToken = [
      Buffer.from("{}").toString("base64url"),
      Buffer.from(JSON.stringify({ chatgpt_account_id: "acct-7" })).toString("base64url"),
      "sig",
    ].join(".");
    fetchMock.mockResolvedValueOnce(tokenResponse({ access_token: "at", refresh_token: "rt", id_token: idToken }));

    const credential = await exchangeCode(codexProfile, {
      code: "code-2",
      verifier: "verifier-2",
      redirectUri: "http://localhost:1455/auth/callback",
      state: "ignored",
    });

    expect(credential.accountId).toBe("acct-7");
    const request = sentRequest(fetchMock);
    expect(request.headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    const form = new URLSearchParams(request.body);
    expect(form.get("grant_type")).toBe("authorization_code");
    expect(form.get("code")).toBe("code-2");
    expect(form.has("state")).toBe(false);
  });

  it("requires a refresh token from the code exchange", async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse({ access_token: "at" }));

    await expect(
      exchangeCode(testProfile, { code: "c", verifier: "v", redirectUri: "http://localhost/callback", state: "s" })
    ).rejects.toThrow("anthropic token exchange returned no refresh token");
  });

  it("keeps the previous refresh token and account when a refresh omits them", async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse({ access_token: "at-2", expires_in: 3600 }));

    const refreshed = await refreshCredential(testProfile, {
      accessToken: "at-1",
      refreshToken: "rt-1",
      expiresAt: 0,
      accountId: "acct-1",
    });

    expect(refreshed.accessToken).toBe("at-2");
    expect(refreshed.refreshToken).toBe("rt-1");
    expect(refreshed.accountId).toBe("acct-1");
    expect(JSON.parse(sentRequest(fetchMock).body)).toEqual({
      grant_type: "refresh_token",
      client_id: "test-client",
      refresh_token: "rt-1",
    });
  });

  it("marks a rejected refresh as not retryable", async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"invalid_grant"}', { status: 400 }));

    const error = await refreshCredential(testProfile, { accessToken: "a", refreshToken: "r", expiresAt: 0 }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(TokenRefreshError);
    expect(error).toMatchObject({ retryable: false, status: 400, body: '{"error":"invalid_grant"}' });
  });

  it("marks an unreachable token endpoint as retryable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(
      refreshCredential(testProfile, { accessToken: "a", refreshToken: "r", expiresAt: 0 })
    ).rejects.toMatchObject({ name: "TokenRefreshError", retryable: true });
  });

  it("rejects a malformed token response", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

    await expect(
      refreshCredential(testProfile, { accessToken: "a", refreshToken: "r", expiresAt: 0 })
    ).rejects.toThrow("anthropic token refresh returned an invalid token response");
  });
});

describe("OAuthFlow", () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  /** Simulates the browser redirect back to the loopback listener */
  function redirectBrowser(authUrl: string, params: { code: string; state?: string }): Promise<Response> {
    const url = new URL(authUrl);
    const redirect = new URL(url.searchParams.get("redirect_uri") ?? "");
    redirect.hostname = "127.0.0.1";
    redirect.searchParams.set("code", params.code);
    redirect.searchParams.set("state", params.state ?? url.searchParams.get("state") ?? "");
    return realFetch(redirect.toString());
  }

  it("logs in through the loopback callback and exchanges the code", async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse({ access_token: "at", refresh_token: "rt" }));
    let browser: Promise<Response> | undefined;
    let authUrl = "";

    const credential = await new OAuthFlow(testProfile).login({
      port: 0,
      onAuthUrl: (url) => {
        authUrl = url;
        browser = redirectBrowser(url, { code: "browser-code" });
      },
    });

    expect(credential.accessToken).toBe("at");
    expect((await browser)?.status).toBe(200);

    const sent: unknown = JSON.parse(sentRequest(fetchMock).body);
    const authorize = new URL(authUrl).searchParams;
    expect(sent).toMatchObject({
      grant_type: "authorization_code",
      code: "browser-code",
      code_verifier: expect.any(String),
      redirect_uri: authorize.get("redirect_uri"),
      state: authorize.get("state"),
    });
  });

  it("never exchanges a code whose state does not match", async () => {
    let browser: Promise<Response> | undefined;

    await expect(
      new OAuthFlow(testProfile).login({
        port: 0,
        onAuthUrl: (url) => {
          browser = redirectBrowser(url, { code: "stolen", state: "forged" });
        },
      })
    ).rejects.toBeInstanceOf(AuthenticationError);

    expect((await browser)?.status).toBe(400);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
