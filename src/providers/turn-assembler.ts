/**
 * Shared turn state machine for every dialect parser
 *
 * Idle → InBlock(text | tool_use) → Idle → … → Done
 *
 * Dialect parsers translate wire events into calls on this class and yield
 * whatever events it returns. Tool calls are keyed by whatever the dialect
 * uses to correlate fragments (block index, item id, numeric index); the
 * stable id may arrive after the first fragment.
 */

import { BackendProtocolError } from "../errors";
import { isRecord } from "./types";
import type {
  BackendId,
  StopReason,
  ToolArguments,
  ToolCallIntent,
  TurnCompleted,
  UnifiedStreamEvent,
  Usage,
} from "./types";

export type ToolKey = string | number;

interface PendingToolCall {
  seq: number;
  id?: string;
  name?: string;
  argumentsJson: string;
  started: boolean;
  /** Fragments received before the call could be announced */
  buffered: string[];
}

/**
 * Parse concatenated argument fragments. Anything that is not a JSON object
 * becomes `{}` so a malformed tool call never aborts the stream.
 */
export function parseToolArguments(json: string): { arguments: ToolArguments; malformed: boolean } {
  if (json.trim() === "") {
    return { arguments: {}, malformed: false };
  }
  try {
    const parsed: unknown = JSON.parse(json);
    if (isRecord(parsed)) {
      return { arguments: parsed, malformed: false };
    }
  } catch {
    // fall through
  }
  return { arguments: {}, malformed: true };
}

export class TurnAssembler {
  private content = "";
  private readonly pending = new Map<ToolKey, PendingToolCall>();
  private readonly finished: Array<{ seq: number; call: ToolCallIntent }> = [];
  private nextSeq = 0;
  private done = false;

  /**
   * @param model reported on the completed turn; dialects overwrite it when
   * the backend names the model that actually served the request
   */
  constructor(
    private readonly backend: BackendId,
    public model: string
  ) {}

  get isDone(): boolean {
    return this.done;
  }

  get hasToolCalls(): boolean {
    return this.finished.length > 0 || this.pending.size > 0;
  }

  text(fragment: string): UnifiedStreamEvent[] {
    this.assertOpen();
    if (!fragment) return [];
    this.content += fragment;
    return [{ type: "text", text: fragment }];
  }

  /**
   * Register (or update) a tool call. Announces it as soon as both id and
   * name are known.
   */
  openTool(key: ToolKey, info: { id?: string; name?: string }): UnifiedStreamEvent[] {
    this.assertOpen();
    const tool = this.getOrCreate(key);
    if (info.id && !tool.id) tool.id = info.id;
    if (info.name && !tool.name) tool.name = info.name;

    if (!tool.started && tool.id && tool.name) {
      return this.announce(tool);
    }
    return [];
  }

  appendArguments(key: ToolKey, fragment: string): UnifiedStreamEvent[] {
    this.assertOpen();
    if (!fragment) return [];
    const tool = this.getOrCreate(key);
    tool.argumentsJson += fragment;

    if (!tool.started || !tool.id) {
      tool.buffered.push(fragment);
      return [];
    }
    return [{ type: "tool_call_argument_fragment", id: tool.id, fragment }];
  }

  /**
   * Close a tool call and parse its arguments. `finalArguments`, when the
   * dialect delivers the complete string, takes precedence over the fragments.
   */
  finishTool(key: ToolKey, finalArguments?: string): UnifiedStreamEvent[] {
    this.assertOpen();
    const tool = this.pending.get(key);
    if (!tool) return [];
    this.pending.delete(key);

    const events: UnifiedStreamEvent[] = [];
    if (!tool.started) {
      tool.id ??= `call_${String(key)}`;
      tool.name ??= "";
      events.push(...this.announce(tool));
    }

    const id = tool.id ?? `call_${String(key)}`;
    const name = tool.name ?? "";
    const json = finalArguments ?? tool.argumentsJson;
    const parsed = parseToolArguments(json);
    if (parsed.malformed) {
      console.error(`[${this.backend}] Malformed arguments for tool "${name}" (${id}); using {}`);
    }

    const call: ToolCallIntent = { id, name, arguments: parsed.arguments };
    this.finished.push({ seq: tool.seq, call });
    events.push({ type: "tool_call_completed", id, name, arguments: parsed.arguments });
    return events;
  }

  /**
   * Close every tool call still open, in the order they were opened.
   */
  finishAllTools(): UnifiedStreamEvent[] {
    const keys = [...this.pending.entries()]
      .sort(([, a], [, b]) => a.seq - b.seq)
      .map(([key]) => key);
    return keys.flatMap((key) => this.finishTool(key));
  }

  complete(stopReason: StopReason, usage: Usage): TurnCompleted {
    this.assertOpen();
    if (this.pending.size > 0) {
      throw new BackendProtocolError(this.backend, "turn completed with unfinished tool calls");
    }
    this.done = true;
    return {
      type: "turn_completed",
      content: this.content,
      toolCalls: [...this.finished].sort((a, b) => a.seq - b.seq).map((entry) => entry.call),
      stopReason,
      usage,
      model: this.model,
      backend: this.backend,
    };
  }

  private getOrCreate(key: ToolKey): PendingToolCall {
    let tool = this.pending.get(key);
    if (!tool) {
      tool = { seq: this.nextSeq++, argumentsJson: "", started: false, buffered: [] };
      this.pending.set(key, tool);
    }
    return tool;
  }

  private announce(tool: PendingToolCall): UnifiedStreamEvent[] {
    const id = tool.id ?? "";
    tool.started = true;
    const events: UnifiedStreamEvent[] = [
      { type: "tool_call_started", id, name: tool.name ?? "" },
    ];
    for (const fragment of tool.buffered) {
      events.push({ type: "tool_call_argument_fragment", id, fragment });
    }
    tool.buffered = [];
    return events;
  }

  private assertOpen(): void {
    if (this.done) {
      throw new BackendProtocolError(this.backend, "event received after turn completed");
    }
  }
}
