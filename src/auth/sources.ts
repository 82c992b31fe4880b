/**
 * External credential sources
 *
 * Reads (and writes back) the OAuth credentials other CLIs already keep:
 * - macOS: Keychain via the `security` command
 * - Any OS: the CLI's well-known JSON file
 *
 * Each source pairs a location with a codec for that CLI's JSON layout.
 * Anything missing or unparseable loads as null.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync, statSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir, platform, userInfo } from "node:os";
import { createHash } from "node:crypto";
import { spawnSync } from "node:child_process";
import { credentialFromExpiry, EXPIRY_MARGIN_MS, type Credential, type CredentialSource } from "./types";
import { AuthFile, CredentialStore } from "./store";
import { extractCodexAccountId, jwtExpiry } from "./jwt";
import { isRecord } from "../providers/types";

const ONE_HOUR_MS = 60 * 60 * 1000;

export const CLAUDE_CREDENTIALS_PATH = join(homedir(), ".claude", ".credentials.json");
export const CLAUDE_KEYCHAIN_SERVICE = "Claude Code-credentials";
export const CODEX_HOME = join(homedir(), ".codex");
export const CODEX_AUTH_PATH = join(CODEX_HOME, "auth.json");
export const CODEX_KEYCHAIN_SERVICE = "Codex Auth";

// --- Codecs ---

/**
 * Translates between a CLI's stored JSON document and a Credential.
 * `encode` receives the previous document so unrelated fields survive.
 */
export interface CredentialCodec {
  decode(document: unknown, storedAt?: number): Credential | null;
  encode(credential: Credential, previous: unknown): unknown;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * `{ claudeAiOauth: { accessToken, refreshToken, expiresAt (ms) } }`
 */
export const claudeCodec: CredentialCodec = {
  decode(document) {
    if (!isRecord(document) || !isRecord(document.claudeAiOauth)) return null;
    const oauth = document.claudeAiOauth;
    const accessToken = str(oauth.accessToken);
    const refreshToken = str(oauth.refreshToken);
    if (!accessToken || !refreshToken || typeof oauth.expiresAt !== "number") return null;
    return credentialFromExpiry({ accessToken, refreshToken, rawExpiresAt: oauth.expiresAt });
  },

  encode(credential, previous) {
    const doc = isRecord(previous) ? previous : {};
    const oauth = isRecord(doc.claudeAiOauth) ? doc.claudeAiOauth : {};
    return {
      ...doc,
      claudeAiOauth: {
        ...oauth,
        accessToken: credential.accessToken,
        refreshToken: credential.refreshToken,
        expiresAt: credential.expiresAt + EXPIRY_MARGIN_MS,
      },
    };
  },
};

/**
 * `{ tokens: { access_token, refresh_token, account_id? }, last_refresh? }`
 *
 * The file carries no expiry: use the token's `exp` claim, else an hour after
 * `last_refresh`, else an hour after the file was written.
 */
export const codexCodec: CredentialCodec = {
  decode(document, storedAt) {
    if (!isRecord(document) || !isRecord(document.tokens)) return null;
    const tokens = document.tokens;
    const accessToken = str(tokens.access_token);
    if (!accessToken) return null;

    let rawExpiresAt = jwtExpiry(accessToken);
    if (rawExpiresAt === undefined) {
      const lastRefresh = str(document.last_refresh);
      const refreshedAt = lastRefresh ? Date.parse(lastRefresh) : NaN;
      const base = Number.isNaN(refreshedAt) ? storedAt ?? Date.now() : refreshedAt;
      rawExpiresAt = base + ONE_HOUR_MS;
    }

    return credentialFromExpiry({
      accessToken,
      refreshToken: str(tokens.refresh_token) ?? "",
      rawExpiresAt,
      accountId: str(tokens.account_id) ?? extractCodexAccountId(str(tokens.id_token), accessToken),
    });
  },

  encode(credential, previous) {
    const doc = isRecord(previous) ? previous : {};
    const tokens = isRecord(doc.tokens) ? doc.tokens : {};
    return {
      ...doc,
      tokens: {
        ...tokens,
        access_token: credential.accessToken,
        refresh_token: credential.refreshToken,
        account_id: credential.accountId ?? null,
      },
      last_refresh: new Date().toISOString(),
    };
  },
};

// --- File source ---

export class JsonFileSource implements CredentialSource {
  readonly name: string;

  constructor(
    private readonly path: string,
    private readonly codec: CredentialCodec
  ) {
    this.name = `file:${path}`;
  }

  private readDocument(): { document: unknown; mtimeMs: number } | null {
    if (!existsSync(this.path)) return null;
    try {
      const document: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      return { document, mtimeMs: statSync(this.path).mtimeMs };
    } catch {
      return null;
    }
  }

  async load(): Promise<Credential | null> {
    const read = this.readDocument();
    return read ? this.codec.decode(read.document, read.mtimeMs) : null;
  }

  async save(credential: Credential): Promise<void> {
    const previous = this.readDocument()?.document;
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(this.codec.encode(credential, previous), null, 2), "utf-8");
  }
}

// --- Keychain source ---

export interface SecurityResult {
  status: number | null;
  stdout: string;
}

/** Runs the macOS `security` tool */
export type SecurityRunner = (args: string[]) => SecurityResult;

const runSecurity: SecurityRunner = (args) => {
  const result = spawnSync("security", args, {
    encoding: "utf-8",
    timeout: 5000,
    stdio: ["ignore", "pipe", "pipe"],
  });
  return { status: result.status, stdout: result.stdout ?? "" };
};

export class KeychainSource implements CredentialSource {
  readonly name: string;
  private readonly run: SecurityRunner;

  constructor(
    private readonly service: string,
    private readonly account: string,
    private readonly codec: CredentialCodec,
    run?: SecurityRunner
  ) {
    this.name = `keychain:${service}`;
    this.run = run ?? runSecurity;
  }

  private readDocument(): unknown {
    const result = this.run(["find-generic-password", "-s", this.service, "-a", this.account, "-w"]);
    if (result.status !== 0 || !result.stdout.trim()) return undefined;
    try {
      return JSON.parse(result.stdout.trim());
    } catch {
      return undefined;
    }
  }

  async load(): Promise<Credential | null> {
    const document = this.readDocument();
    return document === undefined ? null : this.codec.decode(document);
  }

  async save(credential: Credential): Promise<void> {
    const payload = JSON.stringify(this.codec.encode(credential, this.readDocument()));
    const result = this.run([
      "add-generic-password",
      "-U",
      "-s",
      this.service,
      "-a",
      this.account,
      "-w",
      payload,
    ]);
    if (result.status !== 0) {
      throw new Error(`Keychain write failed for "${this.service}" (exit ${result.status ?? "signal"})`);
    }
  }
}

/**
 * Keychain account name the Codex CLI derives from its home directory
 */
export function codexKeychainAccount(codexHome: string = CODEX_HOME): string {
  return `cli|${createHash("sha256").update(codexHome).digest("hex").slice(0, 16)}`;
}

function keychainUser(): string {
  return process.env.USER || userInfo().username || "user";
}

// --- Default store ---

export interface DefaultStoreOptions {
  authFile?: AuthFile;
  /** Skip the keychain (it is only consulted on macOS anyway) */
  useKeychain?: boolean;
  claudeCredentialsPath?: string;
  codexAuthPath?: string;
}

/**
 * Priority per OAuth backend: OS keychain → the CLI's file → the gateway's auth file.
 */
export function createDefaultCredentialStore(options: DefaultStoreOptions = {}): CredentialStore {
  const authFile = options.authFile ?? new AuthFile();
  const useKeychain = (options.useKeychain ?? true) && platform() === "darwin";

  const anthropic: CredentialSource[] = [];
  const codex: CredentialSource[] = [];

  if (useKeychain) {
    anthropic.push(new KeychainSource(CLAUDE_KEYCHAIN_SERVICE, keychainUser(), claudeCodec));
    codex.push(new KeychainSource(CODEX_KEYCHAIN_SERVICE, codexKeychainAccount(), codexCodec));
  }

  anthropic.push(new JsonFileSource(options.claudeCredentialsPath ?? CLAUDE_CREDENTIALS_PATH, claudeCodec));
  codex.push(new JsonFileSource(options.codexAuthPath ?? CODEX_AUTH_PATH, codexCodec));

  anthropic.push(authFile.sourceFor("anthropic"));
  codex.push(authFile.sourceFor("codex"));

  return new CredentialStore({ anthropic, codex });
}
