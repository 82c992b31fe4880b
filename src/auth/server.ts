/**
 * Local OAuth callback listener for PKCE flows
 *
 * Binds 127.0.0.1 only, serves exactly one callback on a fixed path and shuts
 * down after it (or on timeout, or when the caller closes it).
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { createHash, randomBytes } from "node:crypto";
import { AuthenticationError, TimeoutError } from "../errors";

export const LOOPBACK_HOST = "127.0.0.1";
export const DEFAULT_CALLBACK_TIMEOUT_MS = 120_000;

/**
 * PKCE code verifier + challenge pair
 */
export interface PkcePair {
  verifier: string;
  challenge: string;
}

/**
 * Generate PKCE code verifier (32 random bytes, base64url) and its S256 challenge
 */
export function generatePKCE(): PkcePair {
  const verifier = randomBytes(32).toString("base64url");
  const challenge = createHash("sha256").update(verifier).digest("base64url");
  return { verifier, challenge };
}

/**
 * Generate a random state parameter for CSRF protection
 */
export function generateState(): string {
  return randomBytes(32).toString("base64url");
}

const HTML_SUCCESS = `<!doctype html>
<html>
  <head><title>llm-gateway - Authorization Successful</title>
  <style>
    body { font-family: system-ui, sans-serif; display: flex; justify-content: center;
      align-items: center; height: 100vh; margin: 0; }
    .container { text-align: center; padding: 2rem; }
  </style></head>
  <body>
    <div class="container">
      <h1>Authorization Successful</h1>
      <p>You can close this window and return to your terminal.</p>
    </div>
  </body>
</html>`;

export interface CallbackListenerOptions {
  /** Port to bind on 127.0.0.1 (0 for ephemeral) */
  port: number;
  /** Callback path, e.g. "/auth/callback" */
  path: string;
  expectedState: string;
  timeoutMs?: number;
}

export interface CallbackListener {
  /** Port actually bound */
  readonly port: number;
  readonly redirectUri: string;
  /**
   * Resolves with the authorization code from the first valid callback.
   * Rejects with AuthenticationError (state mismatch, provider error),
   * Error (missing code) or TimeoutError.
   */
  waitForCode(): Promise<string>;
  /** Idempotent; called on every exit path */
  close(): Promise<void>;
}

/**
 * Start the loopback listener. Resolves once it is accepting connections.
 */
export async function startCallbackListener(options: CallbackListenerOptions): Promise<CallbackListener> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;

  let settle: { resolve: (code: string) => void; reject: (error: Error) => void } | undefined;
  let outcome: { code: string } | { error: Error } | undefined;
  let timer: NodeJS.Timeout | undefined;
  let closed = false;

  const finish = (result: { code: string } | { error: Error }): void => {
    if (outcome) return;
    outcome = result;
    if (timer) clearTimeout(timer);
    if (settle) {
      if ("code" in result) settle.resolve(result.code);
      else settle.reject(result.error);
    }
    void close();
  };

  const reply = (res: ServerResponse, status: number, contentType: string, body: string): void => {
    res.writeHead(status, { "Content-Type": contentType, Connection: "close" });
    res.end(body);
  };

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${LOOPBACK_HOST}`);

    if (req.method !== "GET" || url.pathname !== options.path || outcome) {
      reply(res, 404, "text/plain; charset=utf-8", "Not found");
      return;
    }

    const code = url.searchParams.get("code");
    const state = url.searchParams.get("state");
    const error = url.searchParams.get("error");

    if (state !== options.expectedState) {
      reply(res, 400, "text/plain; charset=utf-8", "State mismatch");
      finish({ error: new AuthenticationError("OAuth callback state mismatch") });
      return;
    }

    if (error) {
      const description = url.searchParams.get("error_description");
      reply(res, 400, "text/plain; charset=utf-8", `Authorization failed: ${error}`);
      finish({ error: new AuthenticationError(`Authorization failed: ${description ?? error}`) });
      return;
    }

    if (!code) {
      reply(res, 400, "text/plain; charset=utf-8", "Missing authorization code");
      finish({ error: new Error("OAuth callback missing authorization code") });
      return;
    }

    reply(res, 200, "text/html; charset=utf-8", HTML_SUCCESS);
    finish({ code });
  });

  const close = (): Promise<void> => {
    if (closed) return Promise.resolve();
    closed = true;
    if (timer) clearTimeout(timer);
    return new Promise<void>((resolve) => {
      server.close(() => resolve());
      // The answering socket ends on its own ("Connection: close")
      server.closeIdleConnections();
    });
  };

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, LOOPBACK_HOST, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;

  timer = setTimeout(() => {
    finish({
      error: new TimeoutError(`OAuth callback not received within ${timeoutMs}ms`, timeoutMs),
    });
  }, timeoutMs);

  return {
    port,
    redirectUri: getCallbackUrl(port, options.path),
    waitForCode: () => {
      if (outcome) {
        return "code" in outcome ? Promise.resolve(outcome.code) : Promise.reject(outcome.error);
      }
      return new Promise<string>((resolve, reject) => {
        settle = { resolve, reject };
      });
    },
    close,
  };
}

/**
 * Redirect URI registered with the OAuth issuers (they expect "localhost")
 */
export function getCallbackUrl(port: number, path: string): string {
  return `http://localhost:${port}${path}`;
}
