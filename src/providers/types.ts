/**
 * Unified provider types for llm-gateway
 *
 * One request/response/stream vocabulary shared by every backend dialect.
 */

export const BACKEND_IDS = ["anthropic", "codex", "openrouter"] as const;

export type BackendId = (typeof BACKEND_IDS)[number];

export function isBackendId(value: string): value is BackendId {
  return BACKEND_IDS.some((id) => id === value);
}

// --- Messages ---

export type MessageRole = "user" | "assistant" | "system" | "tool_result";

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ImageBlock {
  type: "image";
  mediaType: string;
  /** Base64-encoded image data */
  data: string;
}

export type ContentBlock = TextBlock | ImageBlock;

export type ToolArguments = Record<string, unknown>;

export interface ToolCallIntent {
  id: string;
  name: string;
  arguments: ToolArguments;
}

export interface Message {
  role: MessageRole;
  content: string | ContentBlock[] | null;
  /** Tool calls requested by an assistant turn, after its text */
  toolCalls?: ToolCallIntent[];
  /** For tool_result messages: the id of the call being answered */
  toolCallId?: string;
  /** For tool_result messages: the tool name */
  name?: string;
  isError?: boolean;
}

export interface ToolDefinition {
  name: string;
  description?: string;
  /** JSON schema of the arguments object */
  parameters?: Record<string, unknown>;
}

// --- Turn results ---

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export type StopReason =
  | "end_turn"
  | "tool_use"
  | "max_tokens"
  | "stop_sequence"
  | "refusal"
  | "other";

export interface TurnCompleted {
  type: "turn_completed";
  content: string;
  toolCalls: ToolCallIntent[];
  stopReason: StopReason;
  usage: Usage;
  model: string;
  backend: BackendId;
}

// --- Stream events ---

export interface TextFragment {
  type: "text";
  text: string;
}

export interface ToolCallStarted {
  type: "tool_call_started";
  id: string;
  name: string;
}

export interface ToolCallArgumentFragment {
  type: "tool_call_argument_fragment";
  id: string;
  fragment: string;
}

export interface ToolCallCompleted {
  type: "tool_call_completed";
  id: string;
  name: string;
  arguments: ToolArguments;
}

export type UnifiedStreamEvent =
  | TextFragment
  | ToolCallStarted
  | ToolCallArgumentFragment
  | ToolCallCompleted
  | TurnCompleted;

// --- Adapter contract ---

export interface CompletionRequest {
  /** Backend-local model id (already stripped of any namespace prefix) */
  model: string;
  messages: Message[];
  system?: string;
  tools?: ToolDefinition[];
  maxTokens?: number;
  temperature?: number;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
  /** Deadline for the whole call, in ms */
  timeoutMs?: number;
}

export const DEFAULT_MAX_TOKENS = 8192;

export interface BackendAdapter {
  readonly backend: BackendId;

  /** Run one turn to completion */
  complete(request: CompletionRequest): Promise<TurnCompleted>;

  /**
   * Stream one turn. Forward-only and not restartable; exactly one
   * `turn_completed` event, always last. Returning early closes the connection.
   */
  stream(request: CompletionRequest): AsyncGenerator<UnifiedStreamEvent, void, undefined>;
}

export function createUsage(
  inputTokens: number = 0,
  outputTokens: number = 0,
  totalTokens?: number
): Usage {
  return {
    inputTokens,
    outputTokens,
    totalTokens: totalTokens && totalTokens > 0 ? totalTokens : inputTokens + outputTokens,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flatten message content to plain text (images dropped)
 */
export function contentToText(content: Message["content"]): string {
  if (content === null) return "";
  if (typeof content === "string") return content;
  return content
    .filter((block): block is TextBlock => block.type === "text")
    .map((block) => block.text)
    .join("");
}
