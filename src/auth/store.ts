/**
 * Credential storage
 *
 * The gateway's own auth file (~/.llm-gateway/auth.json) plus the
 * CredentialStore that looks a backend's credential up across every source
 * in fixed priority order.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync, chmodSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir, platform } from "node:os";
import {
  AuthStoreSchema,
  CredentialSchema,
  type AuthStore,
  type Credential,
  type CredentialSource,
  type LoadedCredential,
} from "./types";
import { BACKEND_IDS, type BackendId } from "../providers/types";

export const GATEWAY_HOME = join(homedir(), ".llm-gateway");
export const DEFAULT_AUTH_PATH = join(GATEWAY_HOME, "auth.json");

/**
 * Set restrictive file permissions (0600) - skip on Windows
 */
function setFilePermissions(path: string): void {
  if (platform() === "win32") return;
  try {
    chmodSync(path, 0o600);
  } catch (error) {
    console.error(`[auth-store] Could not restrict permissions on ${path}:`, error);
  }
}

/**
 * Versioned JSON file holding one credential per backend.
 * Every update rewrites the whole file.
 */
export class AuthFile {
  constructor(readonly path: string = DEFAULT_AUTH_PATH) {}

  read(): AuthStore {
    if (!existsSync(this.path)) {
      return { version: 1, credentials: {} };
    }
    try {
      const parsed: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      return AuthStoreSchema.parse(parsed);
    } catch (error) {
      console.error(`[auth-store] Ignoring unreadable auth file ${this.path}:`, error);
      return { version: 1, credentials: {} };
    }
  }

  write(store: AuthStore): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(store, null, 2), "utf-8");
    setFilePermissions(this.path);
  }

  get(backend: BackendId): Credential | null {
    return this.read().credentials[backend] ?? null;
  }

  set(backend: BackendId, credential: Credential): void {
    const store = this.read();
    store.credentials[backend] = CredentialSchema.parse(credential);
    this.write(store);
  }

  remove(backend: BackendId): boolean {
    const store = this.read();
    if (!store.credentials[backend]) {
      return false;
    }
    delete store.credentials[backend];
    this.write(store);
    return true;
  }

  list(): Array<{ backend: BackendId; credential: Credential }> {
    const { credentials } = this.read();
    const entries: Array<{ backend: BackendId; credential: Credential }> = [];
    for (const backend of BACKEND_IDS) {
      const credential = credentials[backend];
      if (credential) entries.push({ backend, credential });
    }
    return entries;
  }

  /**
   * One backend's slot in this file, as a credential source
   */
  sourceFor(backend: BackendId): CredentialSource {
    return {
      name: `gateway-file:${this.path}`,
      load: async () => this.get(backend),
      save: async (credential) => this.set(backend, credential),
    };
  }
}

/**
 * Read-only lookup of a backend's credential across its sources.
 */
export class CredentialStore {
  private readonly sources: Partial<Record<BackendId, CredentialSource[]>>;

  constructor(sources: Partial<Record<BackendId, CredentialSource[]>>) {
    this.sources = sources;
  }

  sourcesFor(backend: BackendId): CredentialSource[] {
    return [...(this.sources[backend] ?? [])];
  }

  /**
   * First usable credential in priority order, or null when none has one.
   */
  async load(backend: BackendId): Promise<LoadedCredential | null> {
    for (const source of this.sourcesFor(backend)) {
      const credential = await source.load();
      if (credential) {
        return { credential, source };
      }
    }
    return null;
  }
}
