import type { Command } from "commander";
import chalk from "chalk";
import { createManager } from "../context.js";
import { fail, guard } from "../output.js";

interface ListCommandOptions {
  projectDir?: string;
  remote?: boolean;
  workspace?: string;
}

export const registerListCommand = (program: Command) => {
  program
    .command("list")
    .description("List agents and their status")
    .option("-p, --project-dir <dir>", "directory holding agent folders")
    .option("-r, --remote", "list the notebooks in the workspace instead")
    .option("-w, --workspace <id>", "workspace id for --remote")
    .action(
      guard(async (options: ListCommandOptions) => {
        const manager = await createManager({
          projectDir: options.projectDir,
          remote: options.remote,
        });

        if (options.remote) {
          const notebooks = await manager.listRemoteNotebooks(options.workspace);
          if (notebooks.length === 0) {
            console.log(chalk.yellow("!"), "No notebooks in the workspace");
            return;
          }
          for (const notebook of notebooks) {
            console.log(
              `${chalk.bold(notebook.displayName)} ${chalk.dim(notebook.id)}`
            );
          }
          return;
        }

        const agents = await manager.list();
        if (agents.length === 0) {
          console.log(chalk.yellow("!"), "No agents found in", chalk.cyan(manager.baseDir));
          return;
        }
        for (const agent of agents) {
          if (agent.record === undefined) {
            fail(`${agent.folderName}: ${agent.error.message}`);
            continue;
          }
          const { folderName, record } = agent;
          const remote = record.notebookId
            ? chalk.dim(` notebook ${record.notebookId}`)
            : "";
          console.log(
            `${chalk.bold(record.agentName || folderName)} ${chalk.dim(`(${folderName})`)} ${chalk.cyan(record.status)}${remote}`
          );
        }
      })
    );
};
