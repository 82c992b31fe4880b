#!/usr/bin/env node
/**
 * llm-gateway CLI
 *
 * Usage:
 *   llm-gateway auth                      # Credential status per backend
 *   llm-gateway auth login <backend>      # OAuth login (anthropic, codex)
 *   llm-gateway auth logout <backend>     # Forget a stored credential
 *   llm-gateway route <model>             # Show which backend serves a model id
 *   llm-gateway chat <model> <prompt...>  # Stream one completion
 *   llm-gateway models                    # OpenRouter model list
 *   llm-gateway usage                     # Codex subscription usage
 */

import { program } from "commander";
import { registerAuthCommand } from "./cli/commands/auth";
import { registerRouteCommand } from "./cli/commands/route";
import { registerChatCommand } from "./cli/commands/chat";
import { registerModelsCommand, registerUsageCommand } from "./cli/commands/models";

program
  .name("llm-gateway")
  .description("Provider-agnostic LLM chat gateway with subscription OAuth")
  .version("0.1.0");

registerAuthCommand(program);
registerRouteCommand(program);
registerChatCommand(program);
registerModelsCommand(program);
registerUsageCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
