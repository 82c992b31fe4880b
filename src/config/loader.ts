import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { GatewayConfigSchema, type GatewayConfig, DEFAULT_CONFIG } from "./schema";

const CONFIG_FILENAME = "config.json";

/**
 * Get all possible config file paths in priority order
 */
export function getConfigPaths(cwd: string = process.cwd(), home: string = homedir()): string[] {
  return [
    // Project-level config (highest priority)
    join(cwd, ".llm-gateway", CONFIG_FILENAME),
    // User-level config
    join(home, ".llm-gateway", CONFIG_FILENAME),
    // Alternative user config location
    join(home, ".config", "llm-gateway", CONFIG_FILENAME),
  ];
}

/**
 * Load configuration from the first file that parses; defaults when none does
 */
export function loadConfig(configPaths: string[] = getConfigPaths()): GatewayConfig {
  for (const configPath of configPaths) {
    if (existsSync(configPath)) {
      try {
        const content = readFileSync(configPath, "utf-8");
        const parsed: unknown = JSON.parse(content);
        return GatewayConfigSchema.parse(parsed);
      } catch (error) {
        console.warn(`Warning: Failed to parse config at ${configPath}:`, error);
      }
    }
  }

  // Return default config if no file found
  return DEFAULT_CONFIG;
}

/**
 * API key from the environment variable the config names, if set
 */
export function resolveApiKey(envName: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[envName]?.trim();
  return value ? value : undefined;
}
