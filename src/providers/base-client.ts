/**
 * Base client shared by every backend dialect
 *
 * Owns what the dialects have in common: the request deadline and caller
 * cancellation, HTTP status classification, SSE payload decoding, and a
 * `complete` that drains the dialect's own stream.
 */

import {
  BackendHttpError,
  BackendProtocolError,
  RateLimitedError,
  TimeoutError,
} from "../errors";
import type { Credential } from "../auth/types";
import { isRecord } from "./types";
import type {
  BackendAdapter,
  BackendId,
  CompletionRequest,
  TurnCompleted,
  UnifiedStreamEvent,
} from "./types";

/**
 * Anything that can vend a bearer token; TokenManager satisfies it.
 */
export interface TokenSource {
  getToken(): Promise<string>;
  /** Refresh unless the rejected token has already been replaced */
  forceRefresh(rejectedToken: string): Promise<Credential>;
  readonly credential: Credential | null;
}

export interface SendInit {
  method?: "GET" | "POST";
  headers: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface BaseClientOptions {
  baseUrl: string;
  /** Deadline applied when the request carries none */
  timeoutMs?: number;
}

/**
 * One request's abort controller: linked to the caller's signal and armed
 * with the deadline. Disposing it aborts whatever is still in flight.
 */
class RequestScope {
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | undefined;
  private timedOut = false;
  private readonly onCallerAbort = (): void => {
    this.controller.abort();
  };

  constructor(
    private readonly backend: BackendId,
    private readonly callerSignal: AbortSignal | undefined,
    private readonly timeoutMs: number | undefined
  ) {
    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener("abort", this.onCallerAbort, { once: true });
    }
    if (timeoutMs !== undefined && timeoutMs > 0) {
      this.timer = setTimeout(() => {
        this.timedOut = true;
        this.controller.abort();
      }, timeoutMs);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Replace the abort error caused by our own deadline with a TimeoutError */
  translate(error: unknown): unknown {
    if (this.timedOut && this.timeoutMs !== undefined) {
      return new TimeoutError(`${this.backend} request timed out after ${this.timeoutMs}ms`, this.timeoutMs);
    }
    return error;
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.callerSignal?.removeEventListener("abort", this.onCallerAbort);
    this.controller.abort();
  }
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds);
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - Date.now()) / 1000));
}

function bearerToken(headers: Record<string, string>): string {
  const value = headers.Authorization ?? "";
  return value.startsWith("Bearer ") ? value.slice("Bearer ".length) : value;
}

export abstract class BaseBackendClient implements BackendAdapter {
  abstract readonly backend: BackendId;
  protected readonly baseUrl: string;
  protected readonly timeoutMs?: number;

  constructor(options: BaseClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, ""); // Remove trailing slash
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Dialect-specific stream of one turn. Must end with exactly one
   * `turn_completed` or throw.
   */
  protected abstract streamTurn(
    request: CompletionRequest,
    signal: AbortSignal
  ): AsyncGenerator<UnifiedStreamEvent, void, undefined>;

  async *stream(request: CompletionRequest): AsyncGenerator<UnifiedStreamEvent, void, undefined> {
    const scope = new RequestScope(this.backend, request.signal, request.timeoutMs ?? this.timeoutMs);
    try {
      yield* this.streamTurn(request, scope.signal);
    } catch (error) {
      throw scope.translate(error);
    } finally {
      scope.dispose();
    }
  }

  /**
   * Drives the stream to its end. Dialects with a unary endpoint override this.
   */
  async complete(request: CompletionRequest): Promise<TurnCompleted> {
    let turn: TurnCompleted | undefined;
    for await (const event of this.stream(request)) {
      if (event.type === "turn_completed") turn = event;
    }
    if (!turn) {
      throw new BackendProtocolError(this.backend, "stream ended without a completed turn");
    }
    return turn;
  }

  /**
   * Run a non-streaming call under the same deadline and cancellation rules.
   */
  protected async withDeadline<T>(
    request: Pick<CompletionRequest, "signal" | "timeoutMs">,
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const scope = new RequestScope(this.backend, request.signal, request.timeoutMs ?? this.timeoutMs);
    try {
      return await fn(scope.signal);
    } catch (error) {
      throw scope.translate(error);
    } finally {
      scope.dispose();
    }
  }

  /**
   * Issue a request; anything but 2xx becomes a typed error.
   */
  protected async send(url: string, init: SendInit): Promise<Response> {
    const response = await fetch(url, {
      method: init.method ?? "POST",
      headers: init.body === undefined ? init.headers : { "Content-Type": "application/json", ...init.headers },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: init.signal,
    });

    if (response.status === 429) {
      const text = await response.text();
      throw new RateLimitedError(
        this.backend,
        `${this.backend} rate limited: ${text || response.statusText}`,
        parseRetryAfter(response.headers.get("retry-after"))
      );
    }
    if (!response.ok) {
      throw new BackendHttpError(this.backend, response.status, await response.text());
    }
    return response;
  }

  /**
   * `send` with bearer auth from a token source. A 401 means the backend
   * revoked the token early: refresh once and retry.
   */
  protected async sendAuthorized(
    url: string,
    init: Omit<SendInit, "headers">,
    headers: () => Promise<Record<string, string>>,
    tokens: TokenSource | undefined
  ): Promise<Response> {
    const sent = await headers();
    try {
      return await this.send(url, { ...init, headers: sent });
    } catch (error) {
      if (!tokens || !(error instanceof BackendHttpError) || error.status !== 401) {
        throw error;
      }
      console.error(`[${this.backend}] Token rejected (401), refreshing and retrying once`);
      await tokens.forceRefresh(bearerToken(sent));
      return this.send(url, { ...init, headers: await headers() });
    }
  }

  protected async readJson(response: Response): Promise<Record<string, unknown>> {
    return this.parseObject(await response.text());
  }

  protected requireBody(response: Response): ReadableStream<Uint8Array> {
    if (!response.body) {
      throw new BackendProtocolError(this.backend, "response has no body");
    }
    return response.body;
  }

  /**
   * Decode one JSON object (an SSE `data:` payload or a unary body).
   */
  protected parseObject(data: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      throw new BackendProtocolError(this.backend, `invalid JSON payload: ${data.slice(0, 200)}`);
    }
    if (!isRecord(parsed)) {
      throw new BackendProtocolError(this.backend, `expected a JSON object, got: ${data.slice(0, 200)}`);
    }
    return parsed;
  }

  protected streamEndedEarly(): BackendProtocolError {
    return new BackendProtocolError(this.backend, "stream ended before the turn completed");
  }
}

// --- Small readers for untyped wire objects ---

export function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function obj(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
