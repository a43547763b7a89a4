import path from "node:path";
import { confirm } from "@inquirer/prompts";
import { loadToolkitConfig, type ToolkitConfig } from "@dagent/config";
import { loadCliConfig } from "@dagent/config/cli";
import {
  AgentLifecycleManager,
  createLogger,
  type Logger,
} from "@dagent/agent-lifecycle";
import {
  FabricWorkspaceClient,
  resolveTokenProvider,
} from "@dagent/workspace-api";

export interface CliContext {
  config: ToolkitConfig;
  logger: Logger;
}

export interface ManagerOptions {
  projectDir?: string;
  remote?: boolean;
}

export const loadCliContext = async (): Promise<CliContext> => {
  const file = await loadCliConfig();
  const config = loadToolkitConfig(process.env, file);
  return { config, logger: createLogger({ level: config.logLevel }) };
};

export const createWorkspaceClient = ({ config, logger }: CliContext) =>
  new FabricWorkspaceClient({
    tokenProvider: resolveTokenProvider(config.auth, {
      scope: config.api.scope,
    }),
    baseUrl: config.api.baseUrl,
    logger,
  });

export const createManager = async ({
  projectDir,
  remote = false,
}: ManagerOptions = {}) => {
  const context = await loadCliContext();
  const { config, logger } = context;
  return new AgentLifecycleManager({
    baseDir: path.resolve(projectDir ?? process.cwd()),
    logger,
    api: remote ? createWorkspaceClient(context) : undefined,
    confirm: (message) => confirm({ message, default: false }),
    defaultWorkspaceId: config.defaultWorkspaceId,
    publishedResourceBaseUrl: config.api.baseUrl,
    polling: config.polling,
  });
};
