/**
 * Anthropic Messages API client
 *
 * Reached either with a plain API key or with the bearer token of a Claude
 * subscription (OAuth). The OAuth endpoint only serves requests whose
 * system prompt opens with its CLI identity block.
 */

import { BackendStreamError, RateLimitedError } from "../errors";
import { readSSE } from "./sse";
import { TurnAssembler } from "./turn-assembler";
import { BaseBackendClient, num, obj, str, type BaseClientOptions, type TokenSource } from "./base-client";
import {
  contentToText,
  createUsage,
  DEFAULT_MAX_TOKENS,
  isRecord,
  type CompletionRequest,
  type ContentBlock,
  type Message,
  type StopReason,
  type ToolCallIntent,
  type TurnCompleted,
  type UnifiedStreamEvent,
  type Usage,
} from "./types";

export const ANTHROPIC_BASE_URL = "https://api.anthropic.com";
export const ANTHROPIC_VERSION = "2023-06-01";
export const ANTHROPIC_OAUTH_BETA = "oauth-2025-04-20,fine-grained-tool-streaming-2025-05-14";
export const ANTHROPIC_OAUTH_IDENTITY = "You are Claude Code, Anthropic's official CLI for Claude.";

export type AnthropicAuth =
  | { type: "api_key"; apiKey: string }
  | { type: "oauth"; tokens: TokenSource };

export interface AnthropicClientOptions extends Partial<BaseClientOptions> {
  auth: AnthropicAuth;
}

// Anthropic wire types
type AnthropicContent =
  | { type: "text"; text: string }
  | { type: "image"; source: { type: "base64"; media_type: string; data: string } }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicContent[];
}

interface AnthropicRequest {
  model: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  system?: string | Array<{ type: "text"; text: string }>;
  temperature?: number;
  tools?: Array<{ name: string; description?: string; input_schema: Record<string, unknown> }>;
  stream: boolean;
}

const PASSTHROUGH_STOP_REASONS: readonly StopReason[] = [
  "end_turn",
  "tool_use",
  "max_tokens",
  "stop_sequence",
  "refusal",
];

export function mapAnthropicStopReason(reason: string | undefined, hasToolCalls: boolean): StopReason {
  if (!reason) return hasToolCalls ? "tool_use" : "end_turn";
  return PASSTHROUGH_STOP_REASONS.find((known) => known === reason) ?? "other";
}

function contentBlocks(content: Message["content"]): AnthropicContent[] {
  if (content === null) return [];
  if (typeof content === "string") {
    return content ? [{ type: "text", text: content }] : [];
  }
  return content.map((block: ContentBlock): AnthropicContent =>
    block.type === "text"
      ? { type: "text", text: block.text }
      : { type: "image", source: { type: "base64", media_type: block.mediaType, data: block.data } }
  );
}

/**
 * Convert unified messages to Anthropic format.
 *
 * System messages move to the `system` parameter; tool results become
 * `tool_result` blocks in a user message, consecutive results sharing one.
 */
export function convertMessages(messages: Message[]): { system?: string; messages: AnthropicMessage[] } {
  const systemParts: string[] = [];
  const converted: AnthropicMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system": {
        const text = contentToText(msg.content);
        if (text) systemParts.push(text);
        break;
      }
      case "tool_result": {
        const block: AnthropicContent = {
          type: "tool_result",
          tool_use_id: msg.toolCallId ?? "",
          content: contentToText(msg.content),
          ...(msg.isError ? { is_error: true } : {}),
        };
        const last = converted[converted.length - 1];
        if (last && last.role === "user" && last.content.every((b) => b.type === "tool_result")) {
          last.content.push(block);
        } else {
          converted.push({ role: "user", content: [block] });
        }
        break;
      }
      case "assistant": {
        const content = contentBlocks(msg.content);
        for (const call of msg.toolCalls ?? []) {
          content.push({ type: "tool_use", id: call.id, name: call.name, input: call.arguments });
        }
        converted.push({ role: "assistant", content });
        break;
      }
      case "user":
        converted.push({ role: "user", content: contentBlocks(msg.content) });
        break;
    }
  }

  return { system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined, messages: converted };
}

export class AnthropicClient extends BaseBackendClient {
  readonly backend = "anthropic" as const;
  private readonly auth: AnthropicAuth;

  constructor(options: AnthropicClientOptions) {
    super({ baseUrl: options.baseUrl ?? ANTHROPIC_BASE_URL, timeoutMs: options.timeoutMs });
    this.auth = options.auth;
  }

  get authType(): AnthropicAuth["type"] {
    return this.auth.type;
  }

  private get tokens(): TokenSource | undefined {
    return this.auth.type === "oauth" ? this.auth.tokens : undefined;
  }

  private async headers(): Promise<Record<string, string>> {
    if (this.auth.type === "api_key") {
      return {
        "x-api-key": this.auth.apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      };
    }
    return {
      Authorization: `Bearer ${await this.auth.tokens.getToken()}`,
      "anthropic-version": ANTHROPIC_VERSION,
      "anthropic-beta": ANTHROPIC_OAUTH_BETA,
    };
  }

  buildRequest(request: CompletionRequest, stream: boolean): AnthropicRequest {
    const converted = convertMessages(request.messages);
    const system = [request.system, converted.system].filter((part): part is string => !!part).join("\n\n");

    const body: AnthropicRequest = {
      model: request.model,
      messages: converted.messages,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      stream,
    };

    if (this.auth.type === "oauth") {
      const blocks: Array<{ type: "text"; text: string }> = [{ type: "text", text: ANTHROPIC_OAUTH_IDENTITY }];
      if (system) blocks.push({ type: "text", text: system });
      body.system = blocks;
    } else if (system) {
      body.system = system;
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters ?? { type: "object", properties: {} },
      }));
    }
    return body;
  }

  override async complete(request: CompletionRequest): Promise<TurnCompleted> {
    return this.withDeadline(request, async (signal) => {
      const response = await this.sendAuthorized(
        `${this.baseUrl}/v1/messages`,
        { body: this.buildRequest(request, false), signal },
        () => this.headers(),
        this.tokens
      );
      return this.convertResponse(await this.readJson(response), request.model);
    });
  }

  /**
   * Convert a unary Messages response
   */
  private convertResponse(data: Record<string, unknown>, requestedModel: string): TurnCompleted {
    let content = "";
    const toolCalls: ToolCallIntent[] = [];
    const blocks = Array.isArray(data.content) ? data.content : [];

    for (const block of blocks) {
      if (!isRecord(block)) continue;
      if (block.type === "text") {
        content += str(block.text) ?? "";
      } else if (block.type === "tool_use") {
        toolCalls.push({
          id: str(block.id) ?? "",
          name: str(block.name) ?? "",
          arguments: isRecord(block.input) ? block.input : {},
        });
      }
    }

    const usage = obj(data.usage);
    return {
      type: "turn_completed",
      content,
      toolCalls,
      stopReason: mapAnthropicStopReason(str(data.stop_reason), toolCalls.length > 0),
      usage: createUsage(num(usage.input_tokens), num(usage.output_tokens)),
      model: str(data.model) ?? requestedModel,
      backend: this.backend,
    };
  }

  protected async *streamTurn(
    request: CompletionRequest,
    signal: AbortSignal
  ): AsyncGenerator<UnifiedStreamEvent, void, undefined> {
    const response = await this.sendAuthorized(
      `${this.baseUrl}/v1/messages`,
      { body: this.buildRequest(request, true), signal },
      async () => ({ ...(await this.headers()), Accept: "text/event-stream" }),
      this.tokens
    );

    const assembler = new TurnAssembler(this.backend, request.model);
    let inputTokens = 0;
    let outputTokens = 0;
    let stopReason: string | undefined;

    for await (const frame of readSSE(this.requireBody(response))) {
      const event = this.parseObject(frame.data);

      switch (event.type) {
        case "message_start": {
          const message = obj(event.message);
          const usage = obj(message.usage);
          inputTokens = num(usage.input_tokens) ?? inputTokens;
          outputTokens = num(usage.output_tokens) ?? outputTokens;
          const reported = str(message.model);
          if (reported) assembler.model = reported;
          break;
        }

        case "content_block_start": {
          const index = num(event.index) ?? 0;
          const block = obj(event.content_block);
          if (block.type === "tool_use") {
            yield* assembler.openTool(index, { id: str(block.id), name: str(block.name) });
            // Some proxies put the whole input on the start block
            if (isRecord(block.input) && Object.keys(block.input).length > 0) {
              yield* assembler.appendArguments(index, JSON.stringify(block.input));
            }
          } else if (block.type === "text") {
            yield* assembler.text(str(block.text) ?? "");
          }
          break;
        }

        case "content_block_delta": {
          const index = num(event.index) ?? 0;
          const delta = obj(event.delta);
          if (delta.type === "text_delta") {
            yield* assembler.text(str(delta.text) ?? "");
          } else if (delta.type === "input_json_delta") {
            yield* assembler.appendArguments(index, str(delta.partial_json) ?? "");
          }
          break;
        }

        case "content_block_stop":
          yield* assembler.finishTool(num(event.index) ?? 0);
          break;

        case "message_delta": {
          const delta = obj(event.delta);
          stopReason = str(delta.stop_reason) ?? stopReason;
          const usage = obj(event.usage);
          outputTokens = num(usage.output_tokens) ?? outputTokens;
          inputTokens = num(usage.input_tokens) ?? inputTokens;
          break;
        }

        case "message_stop": {
          yield* assembler.finishAllTools();
          const usage: Usage = createUsage(inputTokens, outputTokens);
          yield assembler.complete(mapAnthropicStopReason(stopReason, assembler.hasToolCalls), usage);
          return;
        }

        case "error": {
          const error = obj(event.error);
          const message = str(error.message) ?? "unknown error";
          const errorType = str(error.type);
          if (errorType === "rate_limit_error") {
            throw new RateLimitedError(this.backend, `${this.backend} rate limited: ${message}`);
          }
          throw new BackendStreamError(this.backend, message, errorType);
        }

        // ping and anything newer: ignored
      }
    }

    throw this.streamEndedEarly();
  }
}
