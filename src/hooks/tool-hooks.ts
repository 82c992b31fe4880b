/**
 * Tool-call hooks
 *
 * Lifecycle around executing a tool call the model asked for:
 * before hooks (may block) → execute → after hooks (may replace the result).
 *
 * A block is a returned decision, never a thrown signal, so "denied" and
 * "the tool failed" stay distinct outcomes.
 */

import type { ToolCallIntent } from "../providers/types";

export type HookDecision = { decision: "allow" } | { decision: "deny"; reason: string };

/** Returning nothing allows the call */
export type BeforeHook = (call: ToolCallIntent) => HookDecision | void | Promise<HookDecision | void>;

/** Returning a string replaces the result */
export type AfterHook = (call: ToolCallIntent, result: string) => string | void | Promise<string | void>;

export type ToolExecutor = (call: ToolCallIntent) => string | Promise<string>;

export type ToolRunResult =
  | { kind: "ok"; result: string }
  | { kind: "denied"; reason: string }
  | { kind: "error"; error: Error };

export const allow = (): HookDecision => ({ decision: "allow" });
export const deny = (reason: string): HookDecision => ({ decision: "deny", reason });

export class ToolHooks {
  private readonly beforeHooks: BeforeHook[] = [];
  private readonly afterHooks: AfterHook[] = [];

  /**
   * Register a before hook. Returns an unregister function.
   */
  before(hook: BeforeHook): () => void {
    this.beforeHooks.push(hook);
    return () => remove(this.beforeHooks, hook);
  }

  after(hook: AfterHook): () => void {
    this.afterHooks.push(hook);
    return () => remove(this.afterHooks, hook);
  }

  /**
   * Evaluate before hooks in registration order; the first deny wins.
   */
  async check(call: ToolCallIntent): Promise<HookDecision> {
    for (const hook of this.beforeHooks) {
      const decision: unknown = await hook(call);
      if (isDenial(decision)) {
        return decision;
      }
    }
    return allow();
  }

  /**
   * before → execute → after. Never throws: a hook or executor failure is the
   * `error` variant.
   */
  async run(call: ToolCallIntent, execute: ToolExecutor): Promise<ToolRunResult> {
    try {
      const decision = await this.check(call);
      if (decision.decision === "deny") {
        return { kind: "denied", reason: decision.reason };
      }

      let result = await execute(call);
      for (const hook of this.afterHooks) {
        const replaced = await hook(call, result);
        if (typeof replaced === "string") {
          result = replaced;
        }
      }
      return { kind: "ok", result };
    } catch (error) {
      return { kind: "error", error: error instanceof Error ? error : new Error(String(error)) };
    }
  }
}

function isDenial(value: unknown): value is { decision: "deny"; reason: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "decision" in value &&
    value.decision === "deny" &&
    "reason" in value &&
    typeof value.reason === "string"
  );
}

function remove<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index !== -1) list.splice(index, 1);
}
