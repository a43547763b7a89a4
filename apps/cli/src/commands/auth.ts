import type { Command } from "commander";
import chalk from "chalk";
import { resolveTokenProvider } from "@dagent/workspace-api";
import { loadCliContext } from "../context.js";
import { guard, succeed } from "../output.js";

export const registerAuthCommand = (program: Command) => {
  program
    .command("auth")
    .description("Check that an access token can be acquired")
    .action(
      guard(async () => {
        const { config } = await loadCliContext();
        const provider = resolveTokenProvider(config.auth, {
          scope: config.api.scope,
        });
        console.log(
          `${chalk.dim("Method")}: ${chalk.white(config.auth.method)} ${chalk.dim("↦")} ${provider.source}`
        );
        console.log(`${chalk.dim("Scope")}: ${chalk.white(config.api.scope)}`);
        const token = await provider.getToken();
        succeed(`Token acquired (${token.length} characters)`);
      })
    );
};
