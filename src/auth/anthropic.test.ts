import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { ANTHROPIC_CLIENT_ID, loginAnthropicPasteCode, parsePastedCode } from "./anthropic";
import { AuthenticationError } from "../errors";

function json(body: Record<string, unknown>, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function stateOf(url: string): string {
  return new URL(url).searchParams.get("state") ?? "";
}

describe("parsePastedCode", () => {
  it("splits code and state on the first #", () => {
    expect(parsePastedCode("  abc#state-1\n", "state-1")).toEqual({ code: "abc", state: "state-1" });
  });

  it("rejects input without a state", () => {
    expect(() => parsePastedCode("abc", "state-1")).toThrow(AuthenticationError);
    expect(() => parsePastedCode("#state-1", "state-1")).toThrow(AuthenticationError);
  });

  it("rejects a state that does not match", () => {
    expect(() => parsePastedCode("abc#other", "state-1")).toThrow("OAuth state mismatch");
  });
});

describe("loginAnthropicPasteCode", () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("exchanges the pasted code together with the pasted state", async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: "at", refresh_token: "rt", expires_in: 3600 }));
    let authUrl = "";

    const credential = await loginAnthropicPasteCode({
      onAuthUrl: (url) => {
        authUrl = url;
      },
      onPromptCode: async () => `pasted-code#${stateOf(authUrl)}`,
    });

    expect(credential.accessToken).toBe("at");
    expect(credential.refreshToken).toBe("rt");

    const url = new URL(authUrl);
    expect(url.searchParams.get("code")).toBe("true");
    expect(url.searchParams.get("redirect_uri")).toBe("https://console.anthropic.com/oauth/code/callback");

    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(input)).toBe("https://console.anthropic.com/v1/oauth/token");
    const sent = init?.body;
    const body: unknown = typeof sent === "string" ? JSON.parse(sent) : undefined;
    expect(body).toEqual({
      grant_type: "authorization_code",
      client_id: ANTHROPIC_CLIENT_ID,
      code: "pasted-code",
      code_verifier: expect.any(String),
      redirect_uri: "https://console.anthropic.com/oauth/code/callback",
      state: stateOf(authUrl),
    });
  });

  it("never exchanges a code whose state does not match", async () => {
    const login = loginAnthropicPasteCode({
      onAuthUrl: () => undefined,
      onPromptCode: async () => "pasted-code#forged-state",
    });

    await expect(login).rejects.toBeInstanceOf(AuthenticationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
