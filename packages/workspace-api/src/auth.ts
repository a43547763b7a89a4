import spawn from "cross-spawn";
import { z } from "zod";
import type { AuthConfig } from "@dagent/config";
import { AuthenticationError } from "./errors.js";

export type FetchLike = (
  input: string | URL,
  init?: RequestInit
) => Promise<Response>;

export type TokenSource = "token" | "client_credentials" | "azure_cli";

export interface TokenProvider {
  readonly source: TokenSource;
  getToken(): Promise<string>;
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: readonly string[]
) => Promise<CommandResult>;

// Refresh a cached token this long before it expires.
const EXPIRY_SKEW_MS = 60_000;

export const DEFAULT_AUTHORITY_HOST = "https://login.microsoftonline.com";

export class StaticTokenProvider implements TokenProvider {
  readonly source = "token";

  constructor(private readonly token: string) {}

  async getToken(): Promise<string> {
    return this.token;
  }
}

const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.coerce.number().int().positive(),
    token_type: z.string().optional(),
  })
  .passthrough();

const TokenErrorSchema = z
  .object({
    error: z.string(),
    error_description: z.string().optional(),
  })
  .passthrough();

export interface ClientCredentialsOptions {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  scope: string;
  authorityHost?: string;
  fetch?: FetchLike;
  now?: () => number;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

/** OAuth2 client-credentials grant for a service principal. */
export class ClientCredentialsTokenProvider implements TokenProvider {
  readonly source = "client_credentials";
  private cached: CachedToken | null = null;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(private readonly options: ClientCredentialsOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt - EXPIRY_SKEW_MS > this.now()) {
      return this.cached.value;
    }
    const host = (this.options.authorityHost ?? DEFAULT_AUTHORITY_HOST).replace(
      /\/+$/,
      ""
    );
    const url = `${host}/${encodeURIComponent(this.options.tenantId)}/oauth2/v2.0/token`;
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      scope: this.options.scope,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: body.toString(),
      });
    } catch (error) {
      throw new AuthenticationError("Token request failed", { cause: error });
    }

    const payload: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const parsedError = TokenErrorSchema.safeParse(payload);
      const detail = parsedError.success
        ? (parsedError.data.error_description ?? parsedError.data.error)
        : `HTTP ${response.status}`;
      throw new AuthenticationError(`Token request rejected: ${detail}`);
    }
    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthenticationError("Token response is missing access_token");
    }
    this.cached = {
      value: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
    };
    return this.cached.value;
  }
}

const AzureCliTokenSchema = z
  .object({
    accessToken: z.string().min(1),
    expiresOn: z.string().optional(),
    expires_on: z.number().optional(),
  })
  .passthrough();

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: ["ignore", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", reject);
    child.on("close", (code: number | null) => {
      resolve({ code, stdout, stderr });
    });
  });

export interface AzureCliOptions {
  scope: string;
  run?: CommandRunner;
  now?: () => number;
}

/** Borrows the signed-in Azure CLI session (`az login`). */
export class AzureCliTokenProvider implements TokenProvider {
  readonly source = "azure_cli";
  private cached: CachedToken | null = null;
  private readonly run: CommandRunner;
  private readonly now: () => number;

  constructor(private readonly options: AzureCliOptions) {
    this.run = options.run ?? runCommand;
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt - EXPIRY_SKEW_MS > this.now()) {
      return this.cached.value;
    }
    let result: CommandResult;
    try {
      result = await this.run("az", [
        "account",
        "get-access-token",
        "--scope",
        this.options.scope,
        "--output",
        "json",
      ]);
    } catch (error) {
      throw new AuthenticationError(
        "Azure CLI is not available; install it or use another auth method",
        { cause: error }
      );
    }
    if (result.code !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.code}`;
      throw new AuthenticationError(`Azure CLI token request failed: ${detail}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(result.stdout);
    } catch (error) {
      throw new AuthenticationError("Azure CLI returned invalid JSON", {
        cause: error,
      });
    }
    const parsed = AzureCliTokenSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthenticationError("Azure CLI output has no accessToken");
    }
    this.cached = {
      value: parsed.data.accessToken,
      expiresAt: this.resolveExpiry(parsed.data),
    };
    return this.cached.value;
  }

  private resolveExpiry(data: z.infer<typeof AzureCliTokenSchema>): number {
    if (data.expires_on !== undefined) {
      return data.expires_on * 1000;
    }
    const parsed = data.expiresOn ? Date.parse(data.expiresOn) : Number.NaN;
    // Unknown expiry: keep the token for one skew window only.
    return Number.isFinite(parsed) ? parsed : this.now() + EXPIRY_SKEW_MS * 2;
  }
}

export interface ResolveTokenProviderOptions {
  scope: string;
  fetch?: FetchLike;
  run?: CommandRunner;
  now?: () => number;
}

/**
 * Picks a token provider for the configured auth method. `auto` prefers an
 * explicit token, then service principal credentials, then the Azure CLI.
 */
export const resolveTokenProvider = (
  auth: AuthConfig,
  options: ResolveTokenProviderOptions
): TokenProvider => {
  const { tenantId, clientId, clientSecret, token } = auth;
  const clientCredentials = () => {
    if (!tenantId || !clientId || !clientSecret) {
      throw new AuthenticationError(
        "Client credentials need FABRIC_TENANT_ID, FABRIC_CLIENT_ID and FABRIC_CLIENT_SECRET"
      );
    }
    return new ClientCredentialsTokenProvider({
      tenantId,
      clientId,
      clientSecret,
      scope: options.scope,
      fetch: options.fetch,
      now: options.now,
    });
  };
  const azureCli = () =>
    new AzureCliTokenProvider({
      scope: options.scope,
      run: options.run,
      now: options.now,
    });

  switch (auth.method) {
    case "token":
      if (!token) {
        throw new AuthenticationError("FABRIC_TOKEN is not set");
      }
      return new StaticTokenProvider(token);
    case "client_credentials":
      return clientCredentials();
    case "azure_cli":
      return azureCli();
    case "auto":
      if (token) {
        return new StaticTokenProvider(token);
      }
      if (tenantId && clientId && clientSecret) {
        return clientCredentials();
      }
      return azureCli();
  }
};
