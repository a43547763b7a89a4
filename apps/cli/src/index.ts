#!/usr/bin/env node
import { Command } from "commander";
import { createRequire } from "node:module";
import { registerAuthCommand } from "./commands/auth.js";
import { registerCompileCommand } from "./commands/compile.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerInitCommand } from "./commands/init.js";
import { registerListCommand } from "./commands/list.js";
import { registerRunCommand } from "./commands/run.js";
import { registerUploadCommand } from "./commands/upload.js";

const require = createRequire(import.meta.url);
const pkg: { version?: string } = require("../package.json");

const program = new Command();

program
  .name("dagent")
  .description("Build and deploy data agent notebooks")
  .version(pkg.version ?? "0.0.0");

registerInitCommand(program);
registerListCommand(program);
registerCompileCommand(program);
registerUploadCommand(program);
registerRunCommand(program);
registerConfigCommand(program);
registerAuthCommand(program);

program.parseAsync(process.argv).catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
