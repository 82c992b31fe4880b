/**
 * Token lifecycle manager
 *
 * Vends a valid access token for one OAuth backend, refreshing it when the
 * credential has expired. Refresh is check-lock-check: the fast path reads
 * the current credential without waiting; only an expired credential takes
 * the mutex, and the expiry is checked again once it is held, so concurrent
 * callers trigger at most one refresh.
 */

import { NoCredentialsError } from "../errors";
import { refreshCredential, type OAuthProfile } from "./oauth";
import type { CredentialStore } from "./store";
import { isExpired, type Credential, type CredentialSource, type OAuthBackendId } from "./types";

export type RefreshListener = (credential: Credential) => void;

export interface TokenManagerOptions {
  credential?: Credential;
  /** Every refreshed credential is written to each of these */
  sinks?: CredentialSource[];
  /** Defaults to the profile's refresh_token grant */
  refresh?: (credential: Credential) => Promise<Credential>;
  now?: () => number;
}

/**
 * FIFO async mutex
 */
class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export class TokenManager {
  readonly backend: OAuthBackendId;
  private current: Credential | null;
  private sinks: CredentialSource[];
  private readonly doRefresh: (credential: Credential) => Promise<Credential>;
  private readonly now: () => number;
  private readonly mutex = new Mutex();
  private readonly listeners = new Set<RefreshListener>();

  constructor(profile: OAuthProfile, options: TokenManagerOptions = {}) {
    this.backend = profile.backend;
    this.current = options.credential ?? null;
    this.sinks = dedupeSinks(options.sinks ?? []);
    this.doRefresh = options.refresh ?? ((credential) => refreshCredential(profile, credential));
    this.now = options.now ?? Date.now;
  }

  /**
   * Manager seeded from the store's highest-priority credential. Refreshes are
   * written back to the source it came from and to `extraSinks`.
   */
  static async fromStore(
    profile: OAuthProfile,
    store: CredentialStore,
    options: Omit<TokenManagerOptions, "credential" | "sinks"> & { extraSinks?: CredentialSource[] } = {}
  ): Promise<TokenManager> {
    const loaded = await store.load(profile.backend);
    const sinks = [...(loaded ? [loaded.source] : []), ...(options.extraSinks ?? [])];
    return new TokenManager(profile, {
      credential: loaded?.credential,
      sinks,
      refresh: options.refresh,
      now: options.now,
    });
  }

  get credential(): Credential | null {
    return this.current;
  }

  get hasCredential(): boolean {
    return this.current !== null;
  }

  /**
   * A token that is not expired at the time of the call.
   *
   * @throws NoCredentialsError when nothing was ever loaded
   * @throws TokenRefreshError when the refresh fails; the old credential is kept
   */
  async getToken(): Promise<string> {
    const credential = this.require();
    if (!isExpired(credential, this.now())) {
      return credential.accessToken;
    }

    return this.mutex.run(async () => {
      const latest = this.require();
      if (!isExpired(latest, this.now())) {
        return latest.accessToken;
      }
      return (await this.refreshLocked(latest)).accessToken;
    });
  }

  /**
   * Refresh regardless of expiry, after the backend rejected `rejectedToken`.
   * When another caller already replaced that token while this one waited for
   * the mutex, the current credential is returned without a second refresh.
   */
  async forceRefresh(rejectedToken: string): Promise<Credential> {
    return this.mutex.run(async () => {
      const latest = this.require();
      if (latest.accessToken !== rejectedToken) {
        return latest;
      }
      return this.refreshLocked(latest);
    });
  }

  /**
   * Install a credential obtained elsewhere (login) and persist it. When
   * `sinks` is given it replaces the manager's sinks for later refreshes too.
   */
  async setCredential(credential: Credential, sinks?: CredentialSource[]): Promise<void> {
    await this.mutex.run(async () => {
      if (sinks) this.sinks = dedupeSinks(sinks);
      this.current = credential;
      await this.persist(credential);
    });
  }

  get sinkNames(): string[] {
    return this.sinks.map((sink) => sink.name);
  }

  clear(): void {
    this.current = null;
  }

  /**
   * Observe successful refreshes. Returns an unsubscribe function.
   */
  onRefresh(listener: RefreshListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private require(): Credential {
    if (!this.current) {
      throw new NoCredentialsError(this.backend);
    }
    return this.current;
  }

  private async refreshLocked(credential: Credential): Promise<Credential> {
    const next = await this.doRefresh(credential);
    this.current = next;
    await this.persist(next);
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        console.error(`[token-manager] ${this.backend} refresh listener failed:`, error);
      }
    }
    return next;
  }

  // Write failures are logged only; the in-memory credential stays current
  private async persist(credential: Credential): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.save(credential);
      } catch (error) {
        console.error(`[token-manager] Could not persist ${this.backend} credential to ${sink.name}:`, error);
      }
    }
  }
}

function dedupeSinks(sinks: CredentialSource[]): CredentialSource[] {
  const seen = new Set<string>();
  return sinks.filter((sink) => {
    if (seen.has(sink.name)) return false;
    seen.add(sink.name);
    return true;
  });
}
