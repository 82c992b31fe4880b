/**
 * Gateway context
 *
 * Built once by the top-level caller and passed down: owns the credential
 * store, one TokenManager per OAuth backend, the backend adapters and the
 * router over them. Nothing here is process-global.
 */

import { loadConfig, resolveApiKey, type GatewayConfig } from "./config";
import {
  AuthFile,
  DEFAULT_AUTH_PATH,
  OAuthFlow,
  TokenManager,
  anthropicProfile,
  codexProfile,
  createDefaultCredentialStore,
  isExpired,
  loginAnthropicPasteCode,
  loginCodexHeadless,
  type Credential,
  type CredentialStore,
  type HeadlessLoginOptions,
  type LoginOptions,
  type OAuthBackendId,
  type OAuthProfile,
  type PasteCodeLoginOptions,
} from "./auth";
import {
  AnthropicClient,
  BACKEND_IDS,
  CodexClient,
  OpenRouterClient,
  Router,
  type BackendAdapter,
  type BackendId,
  type CompletionRequest,
  type Route,
  type TurnCompleted,
  type UnifiedStreamEvent,
} from "./providers";
import { ToolHooks } from "./hooks";

export const OAUTH_PROFILES: Record<OAuthBackendId, OAuthProfile> = {
  anthropic: anthropicProfile,
  codex: codexProfile,
};

export type BackendAuthKind = "api_key" | "oauth" | "none";

export interface BackendStatus {
  backend: BackendId;
  /** An adapter exists and requests can be routed to it */
  configured: boolean;
  auth: BackendAuthKind;
  /** Where the OAuth credential was loaded from / is written to */
  sinks?: string[];
  expiresAt?: number;
  expired?: boolean;
  accountId?: string;
}

export interface GatewayOptions {
  config?: GatewayConfig;
  store?: CredentialStore;
  authFile?: AuthFile;
  env?: NodeJS.ProcessEnv;
  /** Injected into every TokenManager */
  now?: () => number;
}

export interface GatewayLoginOptions extends LoginOptions, HeadlessLoginOptions, PasteCodeLoginOptions {
  /** No local browser callback: device code for codex, pasted code for anthropic */
  headless?: boolean;
}

export class Gateway {
  readonly config: GatewayConfig;
  readonly authFile: AuthFile;
  readonly hooks = new ToolHooks();
  private readonly env: NodeJS.ProcessEnv;
  private readonly now: () => number;
  private readonly managers: Record<OAuthBackendId, TokenManager>;
  private readonly authKinds = new Map<BackendId, BackendAuthKind>();
  private currentRouter: Router;

  private constructor(
    config: GatewayConfig,
    authFile: AuthFile,
    env: NodeJS.ProcessEnv,
    managers: Record<OAuthBackendId, TokenManager>,
    now: () => number
  ) {
    this.config = config;
    this.authFile = authFile;
    this.env = env;
    this.now = now;
    this.managers = managers;
    this.currentRouter = this.buildRouter();
  }

  /**
   * Load config (unless given), discover credentials and build the adapters.
   */
  static async create(options: GatewayOptions = {}): Promise<Gateway> {
    const config = options.config ?? loadConfig();
    const authFile = options.authFile ?? new AuthFile(config.auth_store_path ?? DEFAULT_AUTH_PATH);
    const store = options.store ?? createDefaultCredentialStore({ authFile, useKeychain: config.use_keychain });

    const managerFor = (backend: OAuthBackendId): Promise<TokenManager> =>
      TokenManager.fromStore(OAUTH_PROFILES[backend], store, {
        extraSinks: [authFile.sourceFor(backend)],
        now: options.now,
      });
    const [anthropic, codex] = await Promise.all([managerFor("anthropic"), managerFor("codex")]);

    return new Gateway(config, authFile, options.env ?? process.env, { anthropic, codex }, options.now ?? Date.now);
  }

  get router(): Router {
    return this.currentRouter;
  }

  tokenManager(backend: OAuthBackendId): TokenManager {
    return this.managers[backend];
  }

  /**
   * Where `model` would be sent, whether or not that backend is configured.
   * `complete` and `stream` raise NoProviderConfiguredError for the latter.
   */
  resolve(model: string): Route {
    return this.currentRouter.resolve(model);
  }

  complete(request: CompletionRequest): Promise<TurnCompleted> {
    return this.currentRouter.complete(request);
  }

  stream(request: CompletionRequest): AsyncGenerator<UnifiedStreamEvent, void, undefined> {
    return this.currentRouter.stream(request);
  }

  /**
   * Browser login, or a headless one (device code for codex, pasted code for
   * anthropic). The credential is saved to the gateway auth file, which then
   * receives later refreshes.
   */
  async login(backend: OAuthBackendId, options: GatewayLoginOptions = {}): Promise<Credential> {
    let credential: Credential;
    if (options.headless) {
      credential = backend === "codex" ? await loginCodexHeadless(options) : await loginAnthropicPasteCode(options);
    } else {
      const flow = new OAuthFlow(OAUTH_PROFILES[backend]);
      credential = await flow.login({ timeoutMs: this.config.oauth.callback_timeout_ms, ...options });
    }

    await this.managers[backend].setCredential(credential, [this.authFile.sourceFor(backend)]);
    this.currentRouter = this.buildRouter();
    return credential;
  }

  /**
   * Forget the backend's credential. Returns whether the auth file had one.
   */
  logout(backend: OAuthBackendId): boolean {
    const removed = this.authFile.remove(backend);
    this.managers[backend].clear();
    this.currentRouter = this.buildRouter();
    return removed;
  }

  status(): BackendStatus[] {
    return BACKEND_IDS.map((backend) => {
      const auth = this.authKinds.get(backend) ?? "none";
      const status: BackendStatus = { backend, configured: this.currentRouter.has(backend), auth };
      if (backend === "anthropic" || backend === "codex") {
        const manager = this.managers[backend];
        const credential = manager.credential;
        if (credential) {
          status.sinks = manager.sinkNames;
          status.expiresAt = credential.expiresAt;
          status.expired = isExpired(credential, this.now());
          status.accountId = credential.accountId;
        }
      }
      return status;
    });
  }

  private buildRouter(): Router {
    const adapters: Partial<Record<BackendId, BackendAdapter>> = {};
    const timeoutMs = this.config.request_timeout_ms;
    const { anthropic, codex, openrouter } = this.config.backends;
    this.authKinds.clear();

    if (anthropic.enabled) {
      const apiKey = resolveApiKey(anthropic.api_key_env, this.env);
      const manager = this.managers.anthropic;
      if (apiKey && anthropic.auth !== "oauth") {
        adapters.anthropic = new AnthropicClient({
          baseUrl: anthropic.base_url,
          timeoutMs,
          auth: { type: "api_key", apiKey },
        });
        this.authKinds.set("anthropic", "api_key");
      } else if (manager.hasCredential && anthropic.auth !== "api_key") {
        adapters.anthropic = new AnthropicClient({
          baseUrl: anthropic.base_url,
          timeoutMs,
          auth: { type: "oauth", tokens: manager },
        });
        this.authKinds.set("anthropic", "oauth");
      }
    }

    if (codex.enabled && this.managers.codex.hasCredential) {
      adapters.codex = new CodexClient({ baseUrl: codex.base_url, timeoutMs, tokens: this.managers.codex });
      this.authKinds.set("codex", "oauth");
    }

    if (openrouter.enabled) {
      const apiKey = resolveApiKey(openrouter.api_key_env, this.env);
      if (apiKey) {
        adapters.openrouter = new OpenRouterClient({
          baseUrl: openrouter.base_url,
          timeoutMs,
          apiKey,
          siteUrl: openrouter.site_url,
          appName: openrouter.app_name,
        });
        this.authKinds.set("openrouter", "api_key");
      }
    }

    return new Router(adapters, { defaultBackend: this.config.default_backend ?? undefined });
  }
}
