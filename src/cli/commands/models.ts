/**
 * models and usage commands: backend-specific listings
 */

import type { Command } from "commander";
import { createFormatters, errorMessage } from "../utils/colors";
import { Gateway } from "../../gateway";
import { CodexClient, OpenRouterClient } from "../../providers";

export function registerModelsCommand(program: Command) {
  program
    .command("models")
    .description("List the models OpenRouter currently offers")
    .option("--filter <text>", "Only ids containing this text")
    .action(async (options: { filter?: string }) => {
      const { fail, dimText } = createFormatters();

      try {
        const gateway = await Gateway.create();
        const adapter = gateway.router.adapter("openrouter");
        if (!(adapter instanceof OpenRouterClient)) {
          console.log(fail(`OpenRouter is not configured (set ${gateway.config.backends.openrouter.api_key_env})`));
          process.exit(1);
        }

        const filter = options.filter?.toLowerCase();
        const models = (await adapter.listModels()).filter((model) => !filter || model.id.toLowerCase().includes(filter));
        for (const model of models) {
          const context = model.contextLength ? dimText(` ${model.contextLength} ctx`) : "";
          console.log(`openrouter/${model.id}${context}`);
        }
      } catch (error) {
        console.log(fail(`Failed to list models: ${errorMessage(error)}`));
        process.exit(1);
      }
    });
}

export function registerUsageCommand(program: Command) {
  program
    .command("usage")
    .description("Show the ChatGPT subscription's Codex rate-limit windows")
    .action(async () => {
      const { fail } = createFormatters();

      try {
        const gateway = await Gateway.create();
        const adapter = gateway.router.adapter("codex");
        if (!(adapter instanceof CodexClient)) {
          console.log(fail("codex is not configured. Run 'llm-gateway auth login codex'."));
          process.exit(1);
        }
        console.log(JSON.stringify(await adapter.getUsage(), null, 2));
      } catch (error) {
        console.log(fail(`Failed to fetch usage: ${errorMessage(error)}`));
        process.exit(1);
      }
    });
}
