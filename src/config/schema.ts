import { z } from "zod";
import { BACKEND_IDS } from "../providers/types";

// Backend configuration schemas
export const AnthropicConfigSchema = z.object({
  enabled: z.boolean().default(true),
  base_url: z.string().url().optional(),
  api_key_env: z.string().default("ANTHROPIC_API_KEY"),
  /** "auto": API key when the env variable is set, else subscription OAuth */
  auth: z.enum(["auto", "api_key", "oauth"]).default("auto"),
});

export const CodexConfigSchema = z.object({
  enabled: z.boolean().default(true),
  base_url: z.string().url().optional(),
});

export const OpenRouterConfigSchema = z.object({
  enabled: z.boolean().default(true),
  base_url: z.string().url().optional(),
  api_key_env: z.string().default("OPENROUTER_API_KEY"),
  /** Sent as HTTP-Referer */
  site_url: z.string().url().optional(),
  /** Sent as X-Title */
  app_name: z.string().default("llm-gateway"),
});

export const OAuthConfigSchema = z.object({
  /** How long login waits for the browser callback */
  callback_timeout_ms: z.number().int().positive().default(120_000),
});

// Main configuration schema
export const GatewayConfigSchema = z.object({
  $schema: z.string().optional(),

  /** Backend for model ids no prefix matches; null rejects them */
  default_backend: z.enum(BACKEND_IDS).nullable().default("anthropic"),

  /** Deadline for a whole request, stream included */
  request_timeout_ms: z.number().int().positive().default(600_000),

  /** Overrides ~/.llm-gateway/auth.json */
  auth_store_path: z.string().optional(),

  /** Consult the macOS Keychain for CLI credentials */
  use_keychain: z.boolean().default(true),

  oauth: OAuthConfigSchema.default({}),

  backends: z
    .object({
      anthropic: AnthropicConfigSchema.default({}),
      codex: CodexConfigSchema.default({}),
      openrouter: OpenRouterConfigSchema.default({}),
    })
    .default({}),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type AnthropicConfig = z.infer<typeof AnthropicConfigSchema>;
export type CodexConfig = z.infer<typeof CodexConfigSchema>;
export type OpenRouterConfig = z.infer<typeof OpenRouterConfigSchema>;

export const DEFAULT_CONFIG: GatewayConfig = GatewayConfigSchema.parse({});
