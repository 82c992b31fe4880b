/**
 * Model router
 *
 * Maps a model id to a backend and the backend-local model id with a
 * first-match-wins prefix table. Routing itself is pure: no network, no
 * state beyond the adapters handed to the constructor.
 */

import { NoProviderConfiguredError, UnknownModelError } from "../errors";
import { BACKEND_IDS } from "./types";
import type {
  BackendAdapter,
  BackendId,
  CompletionRequest,
  TurnCompleted,
  UnifiedStreamEvent,
} from "./types";

export interface Route {
  backend: BackendId;
  /** Model id as the backend knows it */
  model: string;
}

/** Model families routed without a namespace prefix, checked in order */
export const MODEL_FAMILY_PREFIXES: ReadonlyArray<{ prefix: string; backend: BackendId }> = [
  { prefix: "claude-", backend: "anthropic" },
  { prefix: "gpt-5", backend: "codex" },
  { prefix: "codex-", backend: "codex" },
  { prefix: "o3", backend: "codex" },
  { prefix: "o4-mini", backend: "codex" },
];

/**
 * Resolve a model id.
 *
 * 1. `<backend>/<model>` namespaces, prefix stripped
 * 2. known model families, id unchanged
 * 3. the default backend, id unchanged
 */
export function resolveRoute(modelId: string, defaultBackend?: BackendId): Route {
  const id = modelId.trim();
  if (!id) {
    throw new UnknownModelError(modelId);
  }
  const lower = id.toLowerCase();

  for (const backend of BACKEND_IDS) {
    const namespace = `${backend}/`;
    if (lower.startsWith(namespace)) {
      const model = id.slice(namespace.length);
      if (!model) throw new UnknownModelError(modelId);
      return { backend, model };
    }
  }

  const family = MODEL_FAMILY_PREFIXES.find((entry) => lower.startsWith(entry.prefix));
  if (family) {
    return { backend: family.backend, model: id };
  }

  if (defaultBackend) {
    return { backend: defaultBackend, model: id };
  }
  throw new NoProviderConfiguredError(null, modelId);
}

export interface RouterOptions {
  /** Backend for ids no prefix matches; without one they are rejected */
  defaultBackend?: BackendId;
}

export class Router {
  private readonly adapters: Partial<Record<BackendId, BackendAdapter>>;
  readonly defaultBackend?: BackendId;

  constructor(adapters: Partial<Record<BackendId, BackendAdapter>>, options: RouterOptions = {}) {
    this.adapters = { ...adapters };
    this.defaultBackend = options.defaultBackend;
  }

  /** Backends that have an adapter */
  get backends(): BackendId[] {
    return BACKEND_IDS.filter((backend) => this.adapters[backend] !== undefined);
  }

  has(backend: BackendId): boolean {
    return this.adapters[backend] !== undefined;
  }

  adapter(backend: BackendId): BackendAdapter | undefined {
    return this.adapters[backend];
  }

  resolve(modelId: string): Route {
    return resolveRoute(modelId, this.defaultBackend);
  }

  /**
   * Resolve and look up the adapter.
   *
   * @throws NoProviderConfiguredError naming the backend when it has no adapter
   */
  route(modelId: string): Route & { adapter: BackendAdapter } {
    const route = this.resolve(modelId);
    const adapter = this.adapters[route.backend];
    if (!adapter) {
      throw new NoProviderConfiguredError(route.backend, modelId);
    }
    return { ...route, adapter };
  }

  async complete(request: CompletionRequest): Promise<TurnCompleted> {
    const { adapter, model } = this.route(request.model);
    return adapter.complete({ ...request, model });
  }

  async *stream(request: CompletionRequest): AsyncGenerator<UnifiedStreamEvent, void, undefined> {
    const { adapter, model } = this.route(request.model);
    yield* adapter.stream({ ...request, model });
  }
}
