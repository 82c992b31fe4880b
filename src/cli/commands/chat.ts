/**
 * chat command: send one prompt and stream the reply to stdout
 */

import type { Command } from "commander";
import { createFormatters, errorMessage } from "../utils/colors";
import { Gateway } from "../../gateway";

interface ChatOptions {
  system?: string;
  maxTokens?: string;
  temperature?: string;
}

function parseNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

export function registerChatCommand(program: Command) {
  program
    .command("chat <model> <prompt...>")
    .description("Send a single prompt and stream the response")
    .option("-s, --system <text>", "System prompt")
    .option("--max-tokens <n>", "Maximum output tokens")
    .option("--temperature <t>", "Sampling temperature")
    .action(async (model: string, promptWords: string[], options: ChatOptions) => {
      const { dimText, fail } = createFormatters(process.stderr.isTTY === true);

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once("SIGINT", onInterrupt);

      try {
        const gateway = await Gateway.create();
        const events = gateway.stream({
          model,
          messages: [{ role: "user", content: promptWords.join(" ") }],
          system: options.system,
          maxTokens: parseNumber(options.maxTokens, "--max-tokens"),
          temperature: parseNumber(options.temperature, "--temperature"),
          signal: controller.signal,
        });

        for await (const event of events) {
          switch (event.type) {
            case "text":
              process.stdout.write(event.text);
              break;
            case "tool_call_completed":
              process.stderr.write(dimText(`\n[tool] ${event.name} ${JSON.stringify(event.arguments)}\n`));
              break;
            case "turn_completed": {
              const { usage } = event;
              process.stdout.write("\n");
              process.stderr.write(
                dimText(
                  `[${event.backend}/${event.model}] ${event.stopReason}, ` +
                    `${usage.inputTokens} in / ${usage.outputTokens} out\n`
                )
              );
              break;
            }
          }
        }
      } catch (error) {
        console.error(fail(errorMessage(error)));
        process.exit(1);
      } finally {
        process.off("SIGINT", onInterrupt);
      }
    });
}
