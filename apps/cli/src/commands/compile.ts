import path from "node:path";
import type { Command } from "commander";
import chalk from "chalk";
import { compileAll, createAgentIdentity } from "@dagent/agent-lifecycle";
import { createManager } from "../context.js";
import { fail, guard, printBatchSummary, succeed } from "../output.js";

export interface CompileCommandOptions {
  all?: boolean;
  output?: string;
  outputDir?: string;
  outputName?: string;
  projectDir?: string;
}

const withPyExtension = (name: string) =>
  name.endsWith(".py") ? name : `${name}.py`;

/**
 * Output path for a single agent: `--output` wins, then a file built from
 * `--output-dir` and `--output-name`, else the path the record remembers.
 */
export const resolveCompileOutput = (
  options: CompileCommandOptions,
  folderName: string,
  agentDir: string
): string | undefined => {
  if (options.output) {
    return options.output;
  }
  if (!options.outputDir && !options.outputName) {
    return undefined;
  }
  return path.join(
    options.outputDir ?? agentDir,
    withPyExtension(options.outputName ?? `${folderName}_fabric`)
  );
};

export const registerCompileCommand = (program: Command) => {
  program
    .command("compile")
    .description("Convert agent notebooks to Fabric notebook source")
    .argument("[name]", "agent name")
    .option("-a, --all", "compile every agent")
    .option("-o, --output <path>", "output file for a single agent")
    .option("-d, --output-dir <dir>", "directory for compiled files")
    .option("-n, --output-name <name>", "file name for a single agent")
    .option("-p, --project-dir <dir>", "directory holding agent folders")
    .action(
      guard(async (name: string | undefined, options: CompileCommandOptions) => {
        const manager = await createManager({ projectDir: options.projectDir });

        if (options.all) {
          if (options.output || options.outputName) {
            fail("--output and --output-name apply to a single agent");
            return;
          }
          const summary = await compileAll(manager, {
            outputDir: options.outputDir,
          });
          printBatchSummary("Compile", summary, (agent, result) =>
            `${agent} ${chalk.dim("→")} ${chalk.cyan(result.path)}`
          );
          return;
        }

        if (!name) {
          fail("Specify an agent name or --all");
          return;
        }
        const { folderName } = createAgentIdentity(name);
        const outputPath = resolveCompileOutput(
          options,
          folderName,
          manager.pathsFor(folderName).agentDir
        );
        const result = await manager.compile(name, { outputPath });
        succeed(`Compiled ${chalk.bold(name)} to ${chalk.cyan(result.path)}`);
        console.log(`${chalk.dim("Status")}: ${chalk.white(result.status)}`);
      })
    );
};
