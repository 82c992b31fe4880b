/**
 * Typed error taxonomy for llm-gateway
 *
 * Every failure a caller can observe is one of these classes. Errors that
 * originate at a backend carry the backend id so callers can attribute them.
 */

import type { BackendId } from "./providers/types";

export type GatewayErrorCode =
  | "AUTHENTICATION_FAILED"
  | "TIMEOUT"
  | "TOKEN_REFRESH_FAILED"
  | "NO_CREDENTIALS"
  | "RATE_LIMITED"
  | "NO_PROVIDER_CONFIGURED"
  | "UNKNOWN_MODEL"
  | "BACKEND_PROTOCOL"
  | "BACKEND_STREAM"
  | "BACKEND_HTTP";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "GatewayError";
    this.code = code;
  }
}

/**
 * OAuth callback rejected (state mismatch or provider-reported error).
 */
export class AuthenticationError extends GatewayError {
  constructor(message: string) {
    super("AUTHENTICATION_FAILED", message);
    this.name = "AuthenticationError";
  }
}

export class TimeoutError extends GatewayError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super("TIMEOUT", message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Refresh endpoint unreachable (retryable) or refresh rejected (fatal, re-login).
 */
export class TokenRefreshError extends GatewayError {
  readonly backend: BackendId;
  readonly retryable: boolean;
  readonly status?: number;
  readonly body?: string;

  constructor(params: {
    backend: BackendId;
    message: string;
    retryable: boolean;
    status?: number;
    body?: string;
    cause?: unknown;
  }) {
    super("TOKEN_REFRESH_FAILED", params.message, params.cause);
    this.name = "TokenRefreshError";
    this.backend = params.backend;
    this.retryable = params.retryable;
    this.status = params.status;
    this.body = params.body;
  }
}

export class NoCredentialsError extends GatewayError {
  readonly backend: BackendId;

  constructor(backend: BackendId) {
    super(
      "NO_CREDENTIALS",
      `No credentials loaded for ${backend}. Run 'llm-gateway auth login ${backend}'.`
    );
    this.name = "NoCredentialsError";
    this.backend = backend;
  }
}

export class RateLimitedError extends GatewayError {
  readonly backend: BackendId;
  readonly retryAfterSeconds?: number;

  constructor(backend: BackendId, message: string, retryAfterSeconds?: number) {
    super("RATE_LIMITED", message);
    this.name = "RateLimitedError";
    this.backend = backend;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class NoProviderConfiguredError extends GatewayError {
  /** Backend the model id routed to, or null when nothing matched and no default exists */
  readonly backend: BackendId | null;

  constructor(backend: BackendId | null, model: string) {
    super(
      "NO_PROVIDER_CONFIGURED",
      backend
        ? `Model "${model}" routes to ${backend}, but no ${backend} backend is configured`
        : `Model "${model}" matches no backend and no default backend is configured`
    );
    this.name = "NoProviderConfiguredError";
    this.backend = backend;
  }
}

export class UnknownModelError extends GatewayError {
  readonly model: string;

  constructor(model: string) {
    super("UNKNOWN_MODEL", `Unknown model id: "${model}"`);
    this.name = "UnknownModelError";
    this.model = model;
  }
}

/**
 * Backend sent something the dialect parser cannot interpret.
 */
export class BackendProtocolError extends GatewayError {
  readonly backend: BackendId;

  constructor(backend: BackendId, message: string) {
    super("BACKEND_PROTOCOL", `${backend}: ${message}`);
    this.name = "BackendProtocolError";
    this.backend = backend;
  }
}

/**
 * Backend reported an error event mid-stream.
 */
export class BackendStreamError extends GatewayError {
  readonly backend: BackendId;
  readonly errorType?: string;

  constructor(backend: BackendId, message: string, errorType?: string) {
    super("BACKEND_STREAM", `${backend} stream error: ${message}`);
    this.name = "BackendStreamError";
    this.backend = backend;
    this.errorType = errorType;
  }
}

export class BackendHttpError extends GatewayError {
  readonly backend: BackendId;
  readonly status: number;
  readonly body: string;

  constructor(backend: BackendId, status: number, body: string) {
    super("BACKEND_HTTP", `${backend} API error (${status}): ${body}`);
    this.name = "BackendHttpError";
    this.backend = backend;
    this.status = status;
    this.body = body;
  }
}
