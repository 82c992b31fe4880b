/**
 * Backend clients for llm-gateway
 *
 * - anthropic: Anthropic Messages API (API key or Claude subscription OAuth)
 * - codex: OpenAI Responses API via the ChatGPT backend (OAuth)
 * - openrouter: OpenAI Chat Completions (API key)
 */

export * from "./types";
export * from "./sse";
export * from "./turn-assembler";
export * from "./base-client";
export * from "./anthropic-client";
export * from "./codex";
export * from "./openrouter";
export * from "./router";
