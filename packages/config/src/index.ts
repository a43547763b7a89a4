import {
  AuthMethodEnum,
  DEFAULT_API_BASE_URL,
  DEFAULT_API_SCOPE,
  DEFAULT_POLL_INTERVAL_MS,
  LogLevelEnum,
  type CliConfig,
} from "./cli.js";
import type {
  ApiConfig,
  AuthConfig,
  AuthMethod,
  LogLevel,
  PollingConfig,
  ToolkitConfig,
} from "./types.js";

const num = (v: string | undefined): number | undefined => {
  if (v == null) return undefined;
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
};

const sanitizeString = (value: unknown): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const sanitizeInterval = (value: number | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  return Math.min(Math.max(Math.trunc(value), 1_000), 600_000);
};

const sanitizeTimeout = (value: number | undefined): number | undefined => {
  if (value === undefined || value <= 0) {
    return undefined;
  }
  return Math.trunc(value);
};

const parseAuthMethod = (value: string | undefined): AuthMethod | undefined => {
  const result = AuthMethodEnum.safeParse(sanitizeString(value)?.toLowerCase());
  return result.success ? result.data : undefined;
};

const parseLogLevel = (value: string | undefined): LogLevel | undefined => {
  const result = LogLevelEnum.safeParse(sanitizeString(value)?.toLowerCase());
  return result.success ? result.data : undefined;
};

/**
 * Resolves the toolkit configuration. Environment variables win over the
 * config file, which wins over built-in defaults. Secrets are only ever read
 * from the environment.
 */
export function loadToolkitConfig(
  env: NodeJS.ProcessEnv | undefined = process.env,
  file?: CliConfig | null
): ToolkitConfig {
  const resolvedEnv = env ?? process.env;

  const api: ApiConfig = {
    baseUrl: (
      sanitizeString(resolvedEnv.DAGENT_API_BASE_URL) ??
      file?.api.baseUrl ??
      DEFAULT_API_BASE_URL
    ).replace(/\/+$/, ""),
    scope:
      sanitizeString(resolvedEnv.DAGENT_API_SCOPE) ??
      file?.api.scope ??
      DEFAULT_API_SCOPE,
  };

  const auth: AuthConfig = {
    method:
      parseAuthMethod(resolvedEnv.DAGENT_AUTH_METHOD) ??
      file?.auth.method ??
      "auto",
    tenantId:
      sanitizeString(resolvedEnv.FABRIC_TENANT_ID) ??
      sanitizeString(resolvedEnv.AZURE_TENANT_ID) ??
      file?.auth.tenantId,
    clientId:
      sanitizeString(resolvedEnv.FABRIC_CLIENT_ID) ??
      sanitizeString(resolvedEnv.AZURE_CLIENT_ID) ??
      file?.auth.clientId,
    clientSecret:
      sanitizeString(resolvedEnv.FABRIC_CLIENT_SECRET) ??
      sanitizeString(resolvedEnv.AZURE_CLIENT_SECRET),
    token: sanitizeString(resolvedEnv.FABRIC_TOKEN),
  };

  const polling: PollingConfig = {
    intervalMs:
      sanitizeInterval(num(resolvedEnv.DAGENT_POLL_INTERVAL_MS)) ??
      file?.polling.intervalMs ??
      DEFAULT_POLL_INTERVAL_MS,
    timeoutMs:
      sanitizeTimeout(num(resolvedEnv.DAGENT_POLL_TIMEOUT_MS)) ??
      file?.polling.timeoutMs,
  };

  return {
    defaultWorkspaceId:
      sanitizeString(resolvedEnv.DAGENT_WORKSPACE_ID) ??
      file?.workspace.defaultWorkspaceId,
    api,
    auth,
    polling,
    logLevel:
      parseLogLevel(resolvedEnv.DAGENT_LOG_LEVEL) ?? file?.logLevel ?? "warn",
  } satisfies ToolkitConfig;
}

export type {
  ApiConfig,
  AuthConfig,
  AuthMethod,
  LogLevel,
  PollingConfig,
  ToolkitConfig,
};
