import type { Command } from "commander";
import chalk from "chalk";
import { createManager } from "../context.js";
import { guard, succeed } from "../output.js";

interface InitCommandOptions {
  force?: boolean;
  projectDir?: string;
}

export const registerInitCommand = (program: Command) => {
  program
    .command("init")
    .description("Scaffold a new data agent folder")
    .argument("<name>", "display name of the agent")
    .option("-f, --force", "overwrite an existing agent folder")
    .option("-p, --project-dir <dir>", "directory holding agent folders")
    .action(
      guard(async (name: string, options: InitCommandOptions) => {
        const manager = await createManager({ projectDir: options.projectDir });
        const identity = await manager.scaffold(name, { force: options.force });
        const { agentDir } = manager.pathsFor(identity.folderName);
        succeed(
          `Created agent ${chalk.bold(identity.displayName)} in ${chalk.cyan(agentDir)}`
        );
        console.log(chalk.dim("Next:"), `dagent compile "${identity.displayName}"`);
      })
    );
};
