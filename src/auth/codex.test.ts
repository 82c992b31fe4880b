import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { CODEX_CLIENT_ID, loginCodexHeadless } from "./codex";
import { TimeoutError, TokenRefreshError } from "../errors";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("loginCodexHeadless", () => {
  let fetchMock: Mock<typeof fetch>;
  const sleep = vi.fn(async (_ms: number) => undefined);

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
    sleep.mockClear();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("polls until the user approves, then exchanges the device grant", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ device_auth_id: "device-1", user_code: "ABCD-1234", interval: "5" }))
      .mockResolvedValueOnce(new Response("pending", { status: 403 }))
      .mockResolvedValueOnce(json({ authorization_code: "device-code", code_verifier: "device-verifier" }))
      .mockResolvedValueOnce(json({ access_token: "at", refresh_token: "rt", expires_in: 3600 }));
    const onUserCode = vi.fn();

    const credential = await loginCodexHeadless({ onUserCode, sleep });

    expect(credential.accessToken).toBe("at");
    expect(credential.refreshToken).toBe("rt");
    expect(onUserCode).toHaveBeenCalledWith({
      verificationUrl: "https://auth.openai.com/codex/device",
      userCode: "ABCD-1234",
    });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(8000);

    const urls = fetchMock.mock.calls.map(([input]) => String(input));
    expect(urls).toEqual([
      "https://auth.openai.com/api/accounts/deviceauth/usercode",
      "https://auth.openai.com/api/accounts/deviceauth/token",
      "https://auth.openai.com/api/accounts/deviceauth/token",
      "https://auth.openai.com/oauth/token",
    ]);

    const exchange = fetchMock.mock.calls[3]?.[1]?.body;
    const form = new URLSearchParams(typeof exchange === "string" ? exchange : "");
    expect(Object.fromEntries(form)).toEqual({
      grant_type: "authorization_code",
      client_id: CODEX_CLIENT_ID,
      code: "device-code",
      code_verifier: "device-verifier",
      redirect_uri: "https://auth.openai.com/deviceauth/callback",
    });
  });

  it("honours an explicit polling interval", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ device_auth_id: "device-1", user_code: "ABCD-1234" }))
      .mockResolvedValueOnce(new Response("", { status: 404 }))
      .mockResolvedValueOnce(new Response("", { status: 404 }))
      .mockResolvedValueOnce(json({ authorization_code: "c", code_verifier: "v" }))
      .mockResolvedValueOnce(json({ access_token: "at", refresh_token: "rt" }));

    await loginCodexHeadless({ onUserCode: () => undefined, pollIntervalMs: 10, sleep });

    expect(sleep.mock.calls).toEqual([[10], [10]]);
  });

  it("fails when the device code cannot be issued", async () => {
    fetchMock.mockResolvedValueOnce(new Response("unavailable", { status: 503 }));

    await expect(loginCodexHeadless({ onUserCode: () => undefined, sleep })).rejects.toMatchObject({
      name: "TokenRefreshError",
      status: 503,
    });
  });

  it("fails on an unexpected polling status", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ device_auth_id: "device-1", user_code: "ABCD-1234" }))
      .mockResolvedValueOnce(new Response("denied", { status: 400 }));

    const error = await loginCodexHeadless({ onUserCode: () => undefined, sleep }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TokenRefreshError);
    expect(error).toMatchObject({ message: "Device authorization failed: 400" });
  });

  it("times out when the user never approves", async () => {
    fetchMock.mockResolvedValueOnce(json({ device_auth_id: "device-1", user_code: "ABCD-1234" }));

    await expect(loginCodexHeadless({ onUserCode: () => undefined, timeoutMs: 0, sleep })).rejects.toBeInstanceOf(
      TimeoutError
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
