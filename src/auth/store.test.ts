import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, readFileSync, statSync } from "node:fs";
import { tmpdir, platform } from "node:os";
import { join } from "node:path";
import { AuthFile, CredentialStore } from "./store";
import type { Credential, CredentialSource } from "./types";

const credential: Credential = {
  accessToken: "access-1",
  refreshToken: "refresh-1",
  expiresAt: 1_700_000_000_000,
  accountId: "acct-1",
};

function memorySource(name: string, stored: Credential | null): CredentialSource {
  return {
    name,
    load: async () => stored,
    save: async () => undefined,
  };
}

describe("AuthFile", () => {
  let dir: string;
  let file: AuthFile;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "llm-gateway-store-"));
    file = new AuthFile(join(dir, "nested", "auth.json"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("reads an empty store when the file does not exist", () => {
    expect(file.read()).toEqual({ version: 1, credentials: {} });
    expect(file.get("codex")).toBeNull();
  });

  it("persists credentials per backend", () => {
    file.set("codex", credential);
    file.set("anthropic", { ...credential, accessToken: "access-2", accountId: undefined });

    const reopened = new AuthFile(file.path);
    expect(reopened.get("codex")).toEqual(credential);
    expect(reopened.list().map((entry) => entry.backend)).toEqual(["anthropic", "codex"]);

    const raw: unknown = JSON.parse(readFileSync(file.path, "utf-8"));
    expect(raw).toMatchObject({ version: 1, credentials: { codex: { accessToken: "access-1" } } });
  });

  it("restricts the file to its owner", () => {
    file.set("codex", credential);

    const stats = statSync(file.path);
    if (platform() === "win32") {
      // No POSIX permission bits to check
      expect(stats.isFile()).toBe(true);
      return;
    }
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it("removes a backend and reports whether anything was there", () => {
    file.set("codex", credential);

    expect(file.remove("codex")).toBe(true);
    expect(file.remove("codex")).toBe(false);
    expect(file.get("codex")).toBeNull();
  });

  it("ignores an unreadable file", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    file.set("codex", credential);
    writeFileSync(file.path, "{ not json", "utf-8");

    expect(file.get("codex")).toBeNull();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("exposes one backend's slot as a credential source", async () => {
    const source = file.sourceFor("anthropic");

    expect(await source.load()).toBeNull();
    await source.save(credential);
    expect(await source.load()).toEqual(credential);
    expect(file.get("codex")).toBeNull();
    expect(source.name).toBe(`gateway-file:${file.path}`);
  });
});

describe("CredentialStore", () => {
  it("returns the first source that has a credential", async () => {
    const keychain = memorySource("keychain", null);
    const cliFile = memorySource("cli-file", credential);
    const gatewayFile = memorySource("gateway-file", { ...credential, accessToken: "older" });
    const store = new CredentialStore({ codex: [keychain, cliFile, gatewayFile] });

    const loaded = await store.load("codex");

    expect(loaded?.credential.accessToken).toBe("access-1");
    expect(loaded?.source).toBe(cliFile);
  });

  it("returns null when no source has one", async () => {
    const store = new CredentialStore({ anthropic: [memorySource("empty", null)] });

    expect(await store.load("anthropic")).toBeNull();
    expect(await store.load("codex")).toBeNull();
  });
});
