import type { Command } from "commander";
import chalk from "chalk";
import {
  formatRuntime,
  runAll,
  type JobStatusUpdate,
  type RunResult,
} from "@dagent/agent-lifecycle";
import { createManager } from "../context.js";
import { fail, guard, printBatchSummary, succeed } from "../output.js";

interface RunCommandOptions {
  all?: boolean;
  workspace?: string;
  projectDir?: string;
}

const printStatus = (update: JobStatusUpdate) => {
  console.log(
    chalk.dim(`[${formatRuntime(update.elapsedMs)}]`),
    `${update.jobId} ${chalk.cyan(update.status)}`
  );
};

const printRunResult = (result: RunResult) => {
  const line = `${chalk.dim("Job")} ${result.jobId} ${result.status} in ${result.runtime}`;
  if (result.success) {
    succeed(line);
  } else {
    fail(line);
  }
  switch (result.discovery.state) {
    case "found":
      console.log(
        `${chalk.dim("Agent")}: ${chalk.bold(result.discovery.resource.displayName)} ${chalk.dim(`(${result.discovery.resource.id})`)}`
      );
      console.log(`${chalk.dim("Endpoint")}: ${chalk.cyan(result.discovery.resource.url)}`);
      break;
    case "not_found":
      console.log(chalk.yellow("!"), "Published agent not found in the workspace");
      break;
    case "error":
      console.log(chalk.yellow("!"), `Agent lookup failed: ${result.discovery.message}`);
      break;
    case "skipped":
      break;
  }
};

export const registerRunCommand = (program: Command) => {
  program
    .command("run")
    .description("Run uploaded agent notebooks and wait for completion")
    .argument("[name]", "agent name")
    .option("-a, --all", "run every agent")
    .option("-w, --workspace <id>", "workspace id")
    .option("-p, --project-dir <dir>", "directory holding agent folders")
    .action(
      guard(async (name: string | undefined, options: RunCommandOptions) => {
        const manager = await createManager({
          projectDir: options.projectDir,
          remote: true,
        });

        if (options.all) {
          const summary = await runAll(manager, {
            workspaceId: options.workspace,
            onStatus: printStatus,
          });
          printBatchSummary(
            "Run",
            summary,
            (agent, result) => `${agent}: ${result.status} in ${result.runtime}`,
            (result) => result.success
          );
          return;
        }

        if (!name) {
          fail("Specify an agent name or --all");
          return;
        }
        printRunResult(
          await manager.run(name, {
            workspaceId: options.workspace,
            onStatus: printStatus,
          })
        );
      })
    );
};
