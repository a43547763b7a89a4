import type { Command } from "commander";
import chalk from "chalk";
import { uploadAll, type UploadResult } from "@dagent/agent-lifecycle";
import { createManager } from "../context.js";
import { fail, guard, printBatchSummary, succeed } from "../output.js";

interface UploadCommandOptions {
  all?: boolean;
  workspace?: string;
  name?: string;
  update?: boolean;
  useIpynb?: boolean;
  projectDir?: string;
}

const describeUpload = (result: UploadResult) =>
  `${result.updated ? "Updated" : "Created"} notebook ${chalk.bold(result.displayName)} ${chalk.dim(`(${result.remoteId})`)} in workspace ${chalk.cyan(result.workspaceId)}`;

export const registerUploadCommand = (program: Command) => {
  program
    .command("upload")
    .description("Create or update agent notebooks in the workspace")
    .argument("[name]", "agent name")
    .option("-a, --all", "upload every agent")
    .option("-w, --workspace <id>", "target workspace id")
    .option("-n, --name <displayName>", "notebook display name")
    .option("-u, --update", "update an existing notebook without asking")
    .option("--use-ipynb", "upload the .ipynb notebook instead of Fabric source")
    .option("-p, --project-dir <dir>", "directory holding agent folders")
    .action(
      guard(async (name: string | undefined, options: UploadCommandOptions) => {
        const manager = await createManager({
          projectDir: options.projectDir,
          remote: true,
        });

        if (options.all) {
          if (options.name) {
            fail("--name applies to a single agent");
            return;
          }
          const summary = await uploadAll(manager, {
            workspaceId: options.workspace,
            forceUpdate: options.update,
            useNativeFormat: options.useIpynb,
          });
          printBatchSummary("Upload", summary, (agent, result) =>
            `${agent}: ${describeUpload(result)}`
          );
          return;
        }

        if (!name) {
          fail("Specify an agent name or --all");
          return;
        }
        const result = await manager.upload(name, {
          workspaceId: options.workspace,
          displayName: options.name,
          forceUpdate: options.update,
          askBeforeUpdate: !options.update,
          useNativeFormat: options.useIpynb,
        });
        succeed(describeUpload(result));
        console.log(chalk.dim("Next:"), `dagent run "${name}"`);
      })
    );
};
