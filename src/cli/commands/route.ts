/**
 * route command: show where a model id would be sent
 */

import type { Command } from "commander";
import { createFormatters, errorMessage } from "../utils/colors";
import { Gateway } from "../../gateway";

export function registerRouteCommand(program: Command) {
  program
    .command("route <model>")
    .description("Resolve a model id to its backend without sending anything")
    .action(async (model: string) => {
      const { c, ok, warn, fail } = createFormatters();

      try {
        const gateway = await Gateway.create();
        const route = gateway.resolve(model);
        const line = `${model} → ${c.cyan}${route.backend}${c.reset} (${route.model})`;
        console.log(gateway.router.has(route.backend) ? ok(line) : warn(`${line}, backend not configured`));
      } catch (error) {
        console.log(fail(errorMessage(error)));
        process.exit(1);
      }
    });
}
