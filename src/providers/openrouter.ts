/**
 * OpenRouter API client (OpenAI Chat Completions dialect)
 *
 * Provides access to models from many vendors behind one API key.
 * Streamed tool calls are keyed by their numeric `index` (by id when an
 * upstream omits it); the call id may only arrive with a later fragment.
 */

import { BackendStreamError, RateLimitedError } from "../errors";
import { readSSE, SSE_DONE } from "./sse";
import { TurnAssembler, parseToolArguments, type ToolKey } from "./turn-assembler";
import { BaseBackendClient, num, obj, str, type BaseClientOptions } from "./base-client";
import {
  contentToText,
  createUsage,
  DEFAULT_MAX_TOKENS,
  isRecord,
  type CompletionRequest,
  type Message,
  type StopReason,
  type ToolCallIntent,
  type TurnCompleted,
  type UnifiedStreamEvent,
  type Usage,
} from "./types";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export interface OpenRouterClientOptions extends Partial<BaseClientOptions> {
  apiKey: string;
  /** Sent as HTTP-Referer for OpenRouter's app attribution */
  siteUrl?: string;
  /** Sent as X-Title */
  appName?: string;
}

export interface OpenRouterModel {
  id: string;
  name?: string;
  contextLength?: number;
}

// Chat Completions wire types
type ChatContentPart = { type: "text"; text: string } | { type: "image_url"; image_url: { url: string } };

type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string | ChatContentPart[] }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{ id: string; type: "function"; function: { name: string; arguments: string } }>;
    }
  | { role: "tool"; tool_call_id: string; content: string };

export function convertToChatMessages(messages: Message[], system?: string): ChatMessage[] {
  const result: ChatMessage[] = system ? [{ role: "system", content: system }] : [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        result.push({ role: "system", content: contentToText(msg.content) });
        break;
      case "user":
        result.push({
          role: "user",
          content:
            typeof msg.content === "string" || msg.content === null
              ? msg.content ?? ""
              : msg.content.map((block): ChatContentPart =>
                  block.type === "text"
                    ? { type: "text", text: block.text }
                    : { type: "image_url", image_url: { url: `data:${block.mediaType};base64,${block.data}` } }
                ),
        });
        break;
      case "assistant": {
        const text = contentToText(msg.content);
        const calls = msg.toolCalls ?? [];
        result.push({
          role: "assistant",
          content: text || null,
          ...(calls.length > 0
            ? {
                tool_calls: calls.map((call) => ({
                  id: call.id,
                  type: "function" as const,
                  function: { name: call.name, arguments: JSON.stringify(call.arguments) },
                })),
              }
            : {}),
        });
        break;
      }
      case "tool_result":
        result.push({ role: "tool", tool_call_id: msg.toolCallId ?? "", content: contentToText(msg.content) });
        break;
    }
  }
  return result;
}

export function mapFinishReason(reason: string | undefined, hasToolCalls: boolean): StopReason {
  switch (reason) {
    case "stop":
      return "end_turn";
    case "tool_calls":
    case "function_call":
      return "tool_use";
    case "length":
      return "max_tokens";
    case "content_filter":
      return "refusal";
    case undefined:
      return hasToolCalls ? "tool_use" : "end_turn";
    default:
      return "other";
  }
}

function usageFrom(value: unknown): Usage | undefined {
  if (!isRecord(value)) return undefined;
  return createUsage(num(value.prompt_tokens), num(value.completion_tokens), num(value.total_tokens));
}

export class OpenRouterClient extends BaseBackendClient {
  readonly backend = "openrouter" as const;
  private readonly apiKey: string;
  private readonly siteUrl?: string;
  private readonly appName?: string;

  constructor(options: OpenRouterClientOptions) {
    super({ baseUrl: options.baseUrl ?? OPENROUTER_BASE_URL, timeoutMs: options.timeoutMs });
    this.apiKey = options.apiKey;
    this.siteUrl = options.siteUrl;
    this.appName = options.appName ?? "llm-gateway";
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
    };
    // OpenRouter-specific headers
    if (this.siteUrl) {
      headers["HTTP-Referer"] = this.siteUrl;
    }
    if (this.appName) {
      headers["X-Title"] = this.appName;
    }
    return headers;
  }

  buildRequest(request: CompletionRequest, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: convertToChatMessages(request.messages, request.system),
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      stream,
    };
    if (stream) {
      body.stream_options = { include_usage: true };
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map((tool) => ({
        type: "function",
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters ?? { type: "object", properties: {} },
        },
      }));
    }
    return body;
  }

  override async complete(request: CompletionRequest): Promise<TurnCompleted> {
    return this.withDeadline(request, async (signal) => {
      const response = await this.send(`${this.baseUrl}/chat/completions`, {
        headers: this.headers(),
        body: this.buildRequest(request, false),
        signal,
      });
      const data = await this.readJson(response);
      this.throwIfError(data);

      const choices = Array.isArray(data.choices) ? data.choices : [];
      const choice = obj(choices[0]);
      const message = obj(choice.message);
      const toolCalls: ToolCallIntent[] = [];
      for (const raw of Array.isArray(message.tool_calls) ? message.tool_calls : []) {
        const call = obj(raw);
        const fn = obj(call.function);
        const name = str(fn.name) ?? "";
        const parsed = parseToolArguments(str(fn.arguments) ?? "");
        if (parsed.malformed) {
          console.error(`[${this.backend}] Malformed arguments for tool "${name}"; using {}`);
        }
        toolCalls.push({ id: str(call.id) ?? "", name, arguments: parsed.arguments });
      }

      return {
        type: "turn_completed",
        content: str(message.content) ?? "",
        toolCalls,
        stopReason: mapFinishReason(str(choice.finish_reason), toolCalls.length > 0),
        usage: usageFrom(data.usage) ?? createUsage(),
        model: str(data.model) ?? request.model,
        backend: this.backend,
      };
    });
  }

  protected async *streamTurn(
    request: CompletionRequest,
    signal: AbortSignal
  ): AsyncGenerator<UnifiedStreamEvent, void, undefined> {
    const response = await this.send(`${this.baseUrl}/chat/completions`, {
      headers: { ...this.headers(), Accept: "text/event-stream" },
      body: this.buildRequest(request, true),
      signal,
    });

    const assembler = new TurnAssembler(this.backend, request.model);
    let finishReason: string | undefined;
    let usage: Usage = createUsage();
    let lastToolKey: ToolKey = 0;

    for await (const frame of readSSE(this.requireBody(response))) {
      if (frame.data === SSE_DONE) {
        yield* assembler.finishAllTools();
        yield assembler.complete(mapFinishReason(finishReason, assembler.hasToolCalls), usage);
        return;
      }

      const chunk = this.parseObject(frame.data);
      this.throwIfError(chunk);

      const model = str(chunk.model);
      if (model) assembler.model = model;
      usage = usageFrom(chunk.usage) ?? usage;

      const choices = Array.isArray(chunk.choices) ? chunk.choices : [];
      const choice = obj(choices[0]);
      const delta = obj(choice.delta);

      const content = str(delta.content);
      if (content) {
        yield* assembler.text(content);
      }

      for (const raw of Array.isArray(delta.tool_calls) ? delta.tool_calls : []) {
        const call = obj(raw);
        // Some upstreams omit `index`: key by id, and an id-less fragment continues the last call
        const key: ToolKey = num(call.index) ?? str(call.id) ?? lastToolKey;
        lastToolKey = key;
        const fn = obj(call.function);
        yield* assembler.openTool(key, { id: str(call.id), name: str(fn.name) });
        yield* assembler.appendArguments(key, str(fn.arguments) ?? "");
      }

      const reason = str(choice.finish_reason);
      if (reason) {
        finishReason = reason;
        // No more fragments follow a finish_reason
        yield* assembler.finishAllTools();
      }
    }

    throw this.streamEndedEarly();
  }

  /**
   * OpenRouter reports upstream failures as an `error` object, in unary
   * bodies and mid-stream alike.
   */
  private throwIfError(data: Record<string, unknown>): void {
    const error = data.error;
    if (!isRecord(error)) return;
    const message = str(error.message) ?? "Unknown error";
    const code = error.code;
    if (code === 429 || code === "429") {
      throw new RateLimitedError(this.backend, `${this.backend} rate limited: ${message}`);
    }
    throw new BackendStreamError(this.backend, message, code === undefined ? undefined : String(code));
  }

  /**
   * Models currently offered by OpenRouter
   */
  async listModels(options: { signal?: AbortSignal; timeoutMs?: number } = {}): Promise<OpenRouterModel[]> {
    return this.withDeadline(options, async (signal) => {
      const response = await this.send(`${this.baseUrl}/models`, {
        method: "GET",
        headers: this.headers(),
        signal,
      });
      const data = await this.readJson(response);
      const models: OpenRouterModel[] = [];
      for (const raw of Array.isArray(data.data) ? data.data : []) {
        const model = obj(raw);
        const id = str(model.id);
        if (!id) continue;
        models.push({ id, name: str(model.name), contextLength: num(model.context_length) });
      }
      return models;
    });
  }
}
