/**
 * OpenAI Codex client (Responses API via the ChatGPT backend)
 *
 * Streaming only: the endpoint rejects `stream: false`, so `complete`
 * drains the stream. Tool calls are discovered across two events:
 * `response.output_item.added` carries call id and name,
 * `response.output_item.done` the final arguments.
 */

import { BackendStreamError, RateLimitedError } from "../errors";
import { CODEX_ORIGINATOR } from "../auth/codex";
import { readSSE, SSE_DONE } from "./sse";
import { TurnAssembler } from "./turn-assembler";
import { BaseBackendClient, num, obj, str, type BaseClientOptions, type TokenSource } from "./base-client";
import {
  contentToText,
  createUsage,
  type CompletionRequest,
  type Message,
  type StopReason,
  type UnifiedStreamEvent,
  type Usage,
} from "./types";

export const CODEX_BASE_URL = "https://chatgpt.com/backend-api/codex";
export const CODEX_DEFAULT_INSTRUCTIONS = "You are a helpful assistant.";

const RATE_LIMIT_CODES = new Set(["rate_limit_exceeded", "usage_limit_reached", "usage_not_included"]);

export interface CodexClientOptions extends Partial<BaseClientOptions> {
  tokens: TokenSource;
  /** Where `/wham/usage` lives; defaults to the base URL's parent */
  usageBaseUrl?: string;
}

// Responses API input items
type ResponsesContentPart =
  | { type: "input_text"; text: string }
  | { type: "input_image"; image_url: string }
  | { type: "output_text"; text: string };

type ResponsesInputItem =
  | { type: "message"; role: "user" | "assistant"; content: ResponsesContentPart[] }
  | { type: "function_call"; call_id: string; name: string; arguments: string }
  | { type: "function_call_output"; call_id: string; output: string };

/**
 * Convert unified messages to Responses API input items. System messages are
 * returned separately; they join the request's `instructions`.
 */
export function convertToResponsesInput(messages: Message[]): { instructions: string[]; input: ResponsesInputItem[] } {
  const instructions: string[] = [];
  const input: ResponsesInputItem[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system": {
        const text = contentToText(msg.content);
        if (text) instructions.push(text);
        break;
      }

      case "tool_result":
        input.push({
          type: "function_call_output",
          call_id: msg.toolCallId ?? "",
          output: contentToText(msg.content),
        });
        break;

      case "assistant": {
        const text = contentToText(msg.content);
        if (text) {
          input.push({ type: "message", role: "assistant", content: [{ type: "output_text", text }] });
        }
        for (const call of msg.toolCalls ?? []) {
          input.push({
            type: "function_call",
            call_id: call.id,
            name: call.name,
            arguments: JSON.stringify(call.arguments),
          });
        }
        break;
      }

      case "user": {
        const content: ResponsesContentPart[] =
          typeof msg.content === "string" || msg.content === null
            ? [{ type: "input_text", text: msg.content ?? "" }]
            : msg.content.map((block): ResponsesContentPart =>
                block.type === "text"
                  ? { type: "input_text", text: block.text }
                  : { type: "input_image", image_url: `data:${block.mediaType};base64,${block.data}` }
              );
        input.push({ type: "message", role: "user", content });
        break;
      }
    }
  }

  return { instructions, input };
}

function mapCodexStopReason(status: string | undefined, incompleteReason: string | undefined, hasToolCalls: boolean): StopReason {
  if (status === "incomplete") {
    return incompleteReason === "content_filter" ? "refusal" : "max_tokens";
  }
  return hasToolCalls ? "tool_use" : "end_turn";
}

export class CodexClient extends BaseBackendClient {
  readonly backend = "codex" as const;
  private readonly tokens: TokenSource;
  private readonly usageBaseUrl: string;

  constructor(options: CodexClientOptions) {
    super({ baseUrl: options.baseUrl ?? CODEX_BASE_URL, timeoutMs: options.timeoutMs });
    this.tokens = options.tokens;
    this.usageBaseUrl = (options.usageBaseUrl ?? this.baseUrl.replace(/\/codex$/, "")).replace(/\/$/, "");
  }

  private async headers(): Promise<Record<string, string>> {
    const token = await this.tokens.getToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      "OpenAI-Beta": "responses=experimental",
      originator: CODEX_ORIGINATOR,
    };
    const accountId = this.tokens.credential?.accountId;
    if (accountId) {
      headers["chatgpt-account-id"] = accountId;
    }
    return headers;
  }

  buildRequest(request: CompletionRequest): Record<string, unknown> {
    const converted = convertToResponsesInput(request.messages);
    const instructions = [request.system, ...converted.instructions].filter((part): part is string => !!part);

    // Temperature and max tokens are not accepted by this endpoint
    const body: Record<string, unknown> = {
      model: request.model,
      store: false,
      stream: true,
      instructions: instructions.length > 0 ? instructions.join("\n\n") : CODEX_DEFAULT_INSTRUCTIONS,
      input: converted.input,
      text: { verbosity: "medium" },
      include: ["reasoning.encrypted_content"],
    };

    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map((tool) => ({
        type: "function",
        name: tool.name,
        description: tool.description ?? "",
        parameters: tool.parameters ?? { type: "object", properties: {} },
      }));
      body.tool_choice = "auto";
      body.parallel_tool_calls = true;
    }
    return body;
  }

  protected async *streamTurn(
    request: CompletionRequest,
    signal: AbortSignal
  ): AsyncGenerator<UnifiedStreamEvent, void, undefined> {
    const response = await this.sendAuthorized(
      `${this.baseUrl}/responses`,
      { body: this.buildRequest(request), signal },
      async () => ({ ...(await this.headers()), Accept: "text/event-stream" }),
      this.tokens
    );

    const assembler = new TurnAssembler(this.backend, request.model);
    let usage: Usage = createUsage();
    let status: string | undefined;
    let incompleteReason: string | undefined;

    const finish = (): UnifiedStreamEvent[] => {
      const events = assembler.finishAllTools();
      events.push(assembler.complete(mapCodexStopReason(status, incompleteReason, assembler.hasToolCalls), usage));
      return events;
    };

    for await (const frame of readSSE(this.requireBody(response))) {
      if (frame.data === SSE_DONE) {
        yield* finish();
        return;
      }
      const event = this.parseObject(frame.data);

      switch (event.type) {
        case "response.created": {
          const model = str(obj(event.response).model);
          if (model) assembler.model = model;
          break;
        }

        case "response.output_text.delta":
          yield* assembler.text(str(event.delta) ?? "");
          break;

        case "response.output_item.added": {
          const item = obj(event.item);
          if (item.type === "function_call") {
            const key = str(item.id) ?? str(item.call_id) ?? String(num(event.output_index) ?? 0);
            yield* assembler.openTool(key, { id: str(item.call_id) ?? str(item.id), name: str(item.name) });
          }
          break;
        }

        case "response.function_call_arguments.delta": {
          const key = str(event.item_id) ?? String(num(event.output_index) ?? 0);
          yield* assembler.appendArguments(key, str(event.delta) ?? "");
          break;
        }

        case "response.output_item.done": {
          const item = obj(event.item);
          if (item.type === "function_call") {
            const key = str(item.id) ?? str(item.call_id) ?? String(num(event.output_index) ?? 0);
            // Calls first seen here were never added: open them now
            yield* assembler.openTool(key, { id: str(item.call_id) ?? str(item.id), name: str(item.name) });
            yield* assembler.finishTool(key, str(item.arguments));
          }
          break;
        }

        case "response.completed":
        case "response.done":
        case "response.incomplete": {
          const result = obj(event.response);
          const raw = obj(result.usage);
          usage = createUsage(num(raw.input_tokens), num(raw.output_tokens), num(raw.total_tokens));
          status = str(result.status) ?? (event.type === "response.incomplete" ? "incomplete" : "completed");
          incompleteReason = str(obj(result.incomplete_details).reason);
          yield* finish();
          return;
        }

        case "response.failed": {
          const error = obj(obj(event.response).error);
          throw this.streamError(str(error.message) ?? "Request failed", str(error.code));
        }

        case "error": {
          const nested = obj(event.error);
          const message = str(event.message) ?? str(nested.message) ?? "Unknown error";
          throw this.streamError(message, str(event.code) ?? str(nested.code) ?? str(nested.type));
        }
      }
    }

    throw this.streamEndedEarly();
  }

  private streamError(message: string, code: string | undefined): Error {
    if (code && RATE_LIMIT_CODES.has(code)) {
      return new RateLimitedError(this.backend, `${this.backend} usage limit reached: ${message}`);
    }
    return new BackendStreamError(this.backend, message, code);
  }

  /**
   * Subscription rate-limit windows as reported by the ChatGPT backend.
   */
  async getUsage(options: { signal?: AbortSignal; timeoutMs?: number } = {}): Promise<Record<string, unknown>> {
    return this.withDeadline(options, async (signal) => {
      const response = await this.sendAuthorized(
        `${this.usageBaseUrl}/wham/usage`,
        { method: "GET", signal },
        () => this.headers(),
        this.tokens
      );
      return this.readJson(response);
    });
  }
}
