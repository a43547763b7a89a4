export type AuthMethod = "auto" | "token" | "client_credentials" | "azure_cli";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface ApiConfig {
  baseUrl: string;
  scope: string;
}

export interface AuthConfig {
  method: AuthMethod;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  token?: string;
}

export interface PollingConfig {
  intervalMs: number;
  timeoutMs?: number;
}

export interface ToolkitConfig {
  defaultWorkspaceId?: string;
  api: ApiConfig;
  auth: AuthConfig;
  polling: PollingConfig;
  logLevel: LogLevel;
}
