import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import * as TOML from "@iarna/toml";
import { z } from "zod";

export const DEFAULT_API_BASE_URL = "https://api.fabric.microsoft.com/v1";
export const DEFAULT_API_SCOPE = "https://api.fabric.microsoft.com/.default";
export const DEFAULT_POLL_INTERVAL_MS = 10_000;

export const AuthMethodEnum = z.enum([
  "auto",
  "token",
  "client_credentials",
  "azure_cli",
]);

export const LogLevelEnum = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const WorkspaceSchema = z
  .object({
    defaultWorkspaceId: z.string().min(1).optional(),
  })
  .strict();

const ApiSchema = z
  .object({
    baseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
    scope: z.string().min(1).default(DEFAULT_API_SCOPE),
  })
  .strict();

// Secrets never live in the file; they come from the environment.
const AuthSchema = z
  .object({
    method: AuthMethodEnum.default("auto"),
    tenantId: z.string().min(1).optional(),
    clientId: z.string().min(1).optional(),
  })
  .strict();

const PollingSchema = z
  .object({
    intervalMs: z
      .number()
      .int()
      .min(1_000)
      .max(600_000)
      .default(DEFAULT_POLL_INTERVAL_MS),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

const CliConfigSchemaInternal = z
  .object({
    workspace: WorkspaceSchema.default({}),
    api: ApiSchema.default({}),
    auth: AuthSchema.default({}),
    polling: PollingSchema.default({}),
    logLevel: LogLevelEnum.default("warn"),
  })
  .passthrough();

export const CliConfigSchema = CliConfigSchemaInternal;
export type CliConfig = z.infer<typeof CliConfigSchemaInternal>;

export const getCliConfigDir = (): string => {
  if (process.platform === "win32") {
    const appData = process.env.APPDATA;
    if (appData && appData.length > 0) {
      return path.join(appData, "dagent");
    }
    return path.join(os.homedir(), "AppData", "Roaming", "dagent");
  }
  const xdg = process.env.XDG_CONFIG_HOME;
  const baseDir =
    xdg && xdg.length > 0
      ? path.resolve(xdg)
      : path.join(os.homedir(), ".config");
  return path.join(baseDir, "dagent");
};

export const getCliConfigFilePath = (): string => {
  return path.join(getCliConfigDir(), "dagent.toml");
};

const trimmed = (value: string | undefined): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const result = value.trim();
  return result.length > 0 ? result : undefined;
};

export const normalizeCliConfig = (config: CliConfig): CliConfig => {
  const workspace: CliConfig["workspace"] = {};
  const defaultWorkspaceId = trimmed(config.workspace.defaultWorkspaceId);
  if (defaultWorkspaceId) {
    workspace.defaultWorkspaceId = defaultWorkspaceId;
  }

  const auth: CliConfig["auth"] = { method: config.auth.method };
  const tenantId = trimmed(config.auth.tenantId);
  const clientId = trimmed(config.auth.clientId);
  if (tenantId) {
    auth.tenantId = tenantId;
  }
  if (clientId) {
    auth.clientId = clientId;
  }

  const polling: CliConfig["polling"] = {
    intervalMs: config.polling.intervalMs,
  };
  if (config.polling.timeoutMs !== undefined) {
    polling.timeoutMs = config.polling.timeoutMs;
  }

  return {
    workspace,
    api: {
      baseUrl: config.api.baseUrl.trim().replace(/\/+$/, ""),
      scope: config.api.scope.trim(),
    },
    auth,
    polling,
    logLevel: config.logLevel,
  };
};

export const createDefaultCliConfig = (): CliConfig => {
  return normalizeCliConfig(CliConfigSchema.parse({}));
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const loadCliConfig = async (
  file: string = getCliConfigFilePath()
): Promise<CliConfig | null> => {
  try {
    const raw = await fs.readFile(file, "utf8");
    return normalizeCliConfig(CliConfigSchema.parse(TOML.parse(raw)));
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
};

const serializeCliConfig = (config: CliConfig): TOML.JsonMap => {
  const payload: TOML.JsonMap = {
    logLevel: config.logLevel,
    api: { baseUrl: config.api.baseUrl, scope: config.api.scope },
  };
  if (config.workspace.defaultWorkspaceId) {
    payload.workspace = {
      defaultWorkspaceId: config.workspace.defaultWorkspaceId,
    };
  }
  const auth: TOML.JsonMap = { method: config.auth.method };
  if (config.auth.tenantId) {
    auth.tenantId = config.auth.tenantId;
  }
  if (config.auth.clientId) {
    auth.clientId = config.auth.clientId;
  }
  payload.auth = auth;
  const polling: TOML.JsonMap = { intervalMs: config.polling.intervalMs };
  if (config.polling.timeoutMs !== undefined) {
    polling.timeoutMs = config.polling.timeoutMs;
  }
  payload.polling = polling;
  return payload;
};

export const saveCliConfig = async (
  config: CliConfig,
  file: string = getCliConfigFilePath()
): Promise<CliConfig> => {
  const normalized = normalizeCliConfig(CliConfigSchema.parse(config));
  await fs.mkdir(path.dirname(file), { recursive: true });
  const serialized = TOML.stringify(serializeCliConfig(normalized));
  await fs.writeFile(file, `${serialized}\n`, {
    encoding: "utf8",
    mode: 0o600,
  });
  return normalized;
};
