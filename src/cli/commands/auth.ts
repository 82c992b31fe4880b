/**
 * auth command: manage subscription credentials for the OAuth backends
 */

import type { Command } from "commander";
import { createFormatters, errorMessage } from "../utils/colors";
import { isOAuthBackend, type OAuthBackendId } from "../../auth/types";
import { isBackendId } from "../../providers/types";
import { Gateway, type BackendStatus } from "../../gateway";

function parseOAuthBackend(value: string): OAuthBackendId | null {
  const normalized = value.trim().toLowerCase();
  return isBackendId(normalized) && isOAuthBackend(normalized) ? normalized : null;
}

function describeExpiry(status: BackendStatus): string {
  if (status.expiresAt === undefined) return "";
  const when = new Date(status.expiresAt).toLocaleString();
  return status.expired ? `expired ${when}, refreshes on next use` : `valid until ${when}`;
}

export function registerAuthCommand(program: Command) {
  const authCmd = program
    .command("auth")
    .description("Show credential status for every backend")
    .action(async () => {
      const { c, ok, warn, dimText, header, fail } = createFormatters();

      try {
        const gateway = await Gateway.create();
        console.log(header("Backends"));

        for (const status of gateway.status()) {
          const name = `${c.cyan}${status.backend}${c.reset}`;
          if (!status.configured) {
            console.log(warn(`${name} — not configured`));
            continue;
          }
          const details = [status.auth, status.accountId, describeExpiry(status)].filter(Boolean).join(", ");
          console.log(ok(`${name} — ${details}`));
          for (const sink of status.sinks ?? []) {
            console.log(dimText(`    ${sink}`));
          }
        }

        console.log(header("Usage"));
        console.log(`  llm-gateway auth login <backend>     ${dimText("# anthropic | codex")}`);
        console.log(`  llm-gateway auth logout <backend>`);
        console.log();
      } catch (error) {
        console.log(fail(`Failed to check credentials: ${errorMessage(error)}`));
        process.exit(1);
      }
    });

  authCmd
    .command("login <backend>")
    .description("Authenticate with a subscription backend (browser PKCE flow)")
    .option("--headless", "No local callback: device code for codex, paste the shown code for anthropic")
    .option("--no-browser", "Print the authorization URL without opening a browser")
    .action(async (value: string, options: { headless?: boolean; browser: boolean }) => {
      const { ok, fail, c, dimText } = createFormatters();

      const backend = parseOAuthBackend(value);
      if (!backend) {
        console.log(fail(`Unknown backend: "${value}"`));
        console.log(dimText("OAuth backends: anthropic, codex"));
        process.exit(1);
      }
      console.log(`\n${c.bold}Authenticating with ${backend}...${c.reset}\n`);

      try {
        const gateway = await Gateway.create();
        const credential = await gateway.login(backend, {
          headless: options.headless,
          openBrowser: options.browser && !options.headless,
        });
        console.log(ok(`${backend} authenticated${credential.accountId ? `: ${c.cyan}${credential.accountId}${c.reset}` : ""}`));
        console.log(dimText(`  Saved to ${gateway.authFile.path}`));
      } catch (error) {
        console.log(fail(`Authentication failed: ${errorMessage(error)}`));
        process.exit(1);
      }
    });

  authCmd
    .command("logout <backend>")
    .description("Remove the gateway's stored credential for a backend")
    .action(async (value: string) => {
      const { ok, fail, dimText } = createFormatters();

      const backend = parseOAuthBackend(value);
      if (!backend) {
        console.log(fail(`Unknown backend: "${value}"`));
        process.exit(1);
      }

      try {
        const gateway = await Gateway.create();
        if (gateway.logout(backend)) {
          console.log(ok(`Removed ${backend} credential`));
        } else {
          console.log(dimText(`No ${backend} credential stored in ${gateway.authFile.path}`));
        }
      } catch (error) {
        console.log(fail(`Logout failed: ${errorMessage(error)}`));
        process.exit(1);
      }
    });
}
