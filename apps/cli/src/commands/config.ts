import type { Command } from "commander";
import { input, select } from "@inquirer/prompts";
import chalk from "chalk";
import {
  AuthMethodEnum,
  CliConfigSchema,
  LogLevelEnum,
  createDefaultCliConfig,
  getCliConfigFilePath,
  loadCliConfig,
  saveCliConfig,
} from "@dagent/config/cli";
import { isWorkspaceId } from "@dagent/agent-lifecycle";
import { guard, succeed } from "../output.js";

const optional = (value: string) => {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const validateUrl = (value: string) => {
  try {
    new URL(value.trim());
    return true;
  } catch {
    return "Enter a valid URL";
  }
};

const validateSeconds =
  (allowEmpty: boolean, max = Number.POSITIVE_INFINITY) =>
  (value: string): true | string => {
    if (allowEmpty && value.trim().length === 0) {
      return true;
    }
    const seconds = Number(value);
    return Number.isInteger(seconds) && seconds > 0 && seconds <= max
      ? true
      : Number.isFinite(max)
        ? `Enter a whole number of seconds up to ${max}`
        : "Enter a whole number of seconds";
  };

export const registerConfigCommand = (program: Command) => {
  program
    .command("config")
    .description("Set up dagent configuration")
    .action(
      guard(async () => {
        const existing = await loadCliConfig();
        const baseConfig = existing ?? createDefaultCliConfig();

        const defaultWorkspaceId = await input({
          message: "Default workspace id (leave blank for none)",
          default: baseConfig.workspace.defaultWorkspaceId ?? "",
          validate: (value) =>
            value.trim().length === 0 || isWorkspaceId(value.trim())
              ? true
              : "Workspace id must be a GUID",
        });

        const baseUrl = await input({
          message: "Workspace API base URL",
          default: baseConfig.api.baseUrl,
          validate: validateUrl,
        });

        const method = await select({
          message: "Authentication method",
          choices: [
            { name: "Automatic (token, then service principal, then Azure CLI)", value: "auto" },
            { name: "Access token from FABRIC_TOKEN", value: "token" },
            { name: "Service principal (client credentials)", value: "client_credentials" },
            { name: "Azure CLI", value: "azure_cli" },
          ],
          default: baseConfig.auth.method,
        });

        let tenantId = baseConfig.auth.tenantId;
        let clientId = baseConfig.auth.clientId;
        if (method === "client_credentials" || method === "auto") {
          tenantId = optional(
            await input({
              message: "Tenant id (leave blank to read from the environment)",
              default: tenantId ?? "",
            })
          );
          clientId = optional(
            await input({
              message: "Client id (leave blank to read from the environment)",
              default: clientId ?? "",
            })
          );
        }

        const intervalSeconds = await input({
          message: "Job polling interval in seconds",
          default: String(baseConfig.polling.intervalMs / 1000),
          validate: validateSeconds(false, 600),
        });
        const timeoutSeconds = await input({
          message: "Job timeout in seconds (leave blank to wait indefinitely)",
          default:
            baseConfig.polling.timeoutMs === undefined
              ? ""
              : String(baseConfig.polling.timeoutMs / 1000),
          validate: validateSeconds(true),
        });

        const logLevel = await select({
          message: "Log level",
          choices: LogLevelEnum.options.map((level) => ({
            name: level,
            value: level,
          })),
          default: baseConfig.logLevel,
        });

        const timeout = optional(timeoutSeconds);
        const parsed = CliConfigSchema.parse({
          workspace: { defaultWorkspaceId: optional(defaultWorkspaceId) },
          api: { baseUrl, scope: baseConfig.api.scope },
          auth: { method: AuthMethodEnum.parse(method), tenantId, clientId },
          polling: {
            intervalMs: Number(intervalSeconds) * 1000,
            timeoutMs: timeout === undefined ? undefined : Number(timeout) * 1000,
          },
          logLevel,
        });

        const savedConfig = await saveCliConfig(parsed);

        succeed(`Configuration saved to ${chalk.cyan(getCliConfigFilePath())}`);
        console.log(
          `${chalk.dim("Workspace")}: ${chalk.white(savedConfig.workspace.defaultWorkspaceId ?? "none")}`
        );
        console.log(`${chalk.dim("API")}: ${chalk.white(savedConfig.api.baseUrl)}`);
        console.log(`${chalk.dim("Auth")}: ${chalk.white(savedConfig.auth.method)}`);
        if (savedConfig.auth.method !== "azure_cli") {
          console.log(
            chalk.dim("Secrets are read from FABRIC_CLIENT_SECRET or FABRIC_TOKEN, never from this file.")
          );
        }
      })
    );
};
