/**
 * llm-gateway
 *
 * One request/stream vocabulary over several LLM backends:
 * - Anthropic Messages (API key or Claude subscription OAuth)
 * - OpenAI Codex Responses (ChatGPT subscription OAuth)
 * - OpenRouter Chat Completions (API key)
 *
 * Credentials are discovered from the vendors' own CLIs, refreshed on demand
 * and written back where they came from.
 */

export * from "./errors";
export * from "./auth";
export * from "./providers";
export * from "./config";
export * from "./hooks";
export * from "./gateway";
