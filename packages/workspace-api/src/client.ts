import type { Logger } from "pino";
import { z } from "zod";
import type { FetchLike, TokenProvider } from "./auth.js";
import {
  MalformedResponseError,
  OperationFailedError,
  WorkspaceApiError,
} from "./errors.js";
import {
  NOTEBOOK_ITEM_TYPE,
  type CreateNotebookInput,
  type JobInstance,
  type ListItemsOptions,
  type NotebookDefinitionInput,
  type StartedJob,
  type WorkspaceApi,
  type WorkspaceItem,
} from "./types.js";

export const DEFAULT_BASE_URL = "https://api.fabric.microsoft.com/v1";
export const RUN_NOTEBOOK_JOB_TYPE = "RunNotebook" as const;

const DEFAULT_OPERATION_POLL_MS = 2_000;
const DEFAULT_MAX_OPERATION_POLLS = 150;

const ItemSchema = z
  .object({
    id: z.string().min(1),
    displayName: z.string(),
    type: z.string(),
    workspaceId: z.string().optional(),
    description: z.string().nullable().optional(),
  })
  .passthrough();

const ItemPageSchema = z
  .object({
    value: z.array(ItemSchema).default([]),
    continuationToken: z.string().nullable().optional(),
  })
  .passthrough();

const JobInstanceSchema = z
  .object({
    id: z.string().min(1),
    status: z.string().min(1),
    itemId: z.string().optional(),
    jobType: z.string().optional(),
    invokeType: z.string().optional(),
    startTimeUtc: z.string().nullable().optional(),
    endTimeUtc: z.string().nullable().optional(),
    failureReason: z
      .object({
        errorCode: z.string().optional(),
        message: z.string().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const ApiErrorBodySchema = z
  .object({
    errorCode: z.string().optional(),
    message: z.string().optional(),
    requestId: z.string().optional(),
  })
  .passthrough();

const OperationStateSchema = z
  .object({
    status: z.string(),
    error: z
      .object({
        errorCode: z.string().optional(),
        message: z.string().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

type ItemPayload = z.infer<typeof ItemSchema>;

const toWorkspaceItem = (
  payload: ItemPayload,
  workspaceId: string
): WorkspaceItem => {
  const item: WorkspaceItem = {
    id: payload.id,
    displayName: payload.displayName,
    type: payload.type,
    workspaceId: payload.workspaceId ?? workspaceId,
  };
  if (payload.description) {
    item.description = payload.description;
  }
  return item;
};

const encodePayload = (content: string) =>
  Buffer.from(content, "utf8").toString("base64");

export const buildNotebookDefinition = (definition: NotebookDefinitionInput) => {
  const payload = encodePayload(definition.content);
  if (definition.format === "ipynb") {
    return {
      format: "ipynb",
      parts: [
        {
          path: "notebook-content.ipynb",
          payload,
          payloadType: "InlineBase64",
        },
      ],
    };
  }
  return {
    parts: [
      {
        path: "notebook-content.py",
        payload,
        payloadType: "InlineBase64",
      },
    ],
  };
};

const retryAfterMs = (response: Response, fallback: number): number => {
  const header = response.headers.get("retry-after");
  if (!header) {
    return fallback;
  }
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : fallback;
};

const lastPathSegment = (location: string): string | undefined => {
  const pathname = new URL(location, "http://localhost").pathname;
  const segments = pathname.split("/").filter((segment) => segment.length > 0);
  return segments.at(-1);
};

const segment = (value: string) => encodeURIComponent(value);

export interface FabricWorkspaceClientOptions {
  tokenProvider: TokenProvider;
  baseUrl?: string;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  operationPollIntervalMs?: number;
  maxOperationPolls?: number;
}

interface RequestOptions {
  body?: unknown;
}

/** REST implementation of {@link WorkspaceApi} over `fetch`. */
export class FabricWorkspaceClient implements WorkspaceApi {
  private readonly baseUrl: string;
  private readonly tokenProvider: TokenProvider;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;
  private readonly operationPollIntervalMs: number;
  private readonly maxOperationPolls: number;

  constructor(options: FabricWorkspaceClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.tokenProvider = options.tokenProvider;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep =
      options.sleep ??
      ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.logger = options.logger;
    this.operationPollIntervalMs =
      options.operationPollIntervalMs ?? DEFAULT_OPERATION_POLL_MS;
    this.maxOperationPolls =
      options.maxOperationPolls ?? DEFAULT_MAX_OPERATION_POLLS;
  }

  async getItem(
    workspaceId: string,
    itemId: string
  ): Promise<WorkspaceItem | null> {
    const url = this.url(
      `/workspaces/${segment(workspaceId)}/items/${segment(itemId)}`
    );
    try {
      const response = await this.request("GET", url);
      const payload = await this.parse(response, ItemSchema, url);
      return toWorkspaceItem(payload, workspaceId);
    } catch (error) {
      if (error instanceof WorkspaceApiError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  async listItems(
    workspaceId: string,
    options: ListItemsOptions = {}
  ): Promise<WorkspaceItem[]> {
    const items: WorkspaceItem[] = [];
    let continuationToken: string | undefined;
    do {
      const params = new URLSearchParams();
      if (options.type) {
        params.set("type", options.type);
      }
      if (continuationToken) {
        params.set("continuationToken", continuationToken);
      }
      const query = params.toString();
      const url = this.url(
        `/workspaces/${segment(workspaceId)}/items${query ? `?${query}` : ""}`
      );
      const response = await this.request("GET", url);
      const page = await this.parse(response, ItemPageSchema, url);
      for (const payload of page.value) {
        items.push(toWorkspaceItem(payload, workspaceId));
      }
      continuationToken = page.continuationToken ?? undefined;
    } while (continuationToken);
    return items;
  }

  async findNotebookByName(
    workspaceId: string,
    displayName: string
  ): Promise<WorkspaceItem | null> {
    const notebooks = await this.listItems(workspaceId, {
      type: NOTEBOOK_ITEM_TYPE,
    });
    return (
      notebooks.find(
        (item) =>
          item.type === NOTEBOOK_ITEM_TYPE && item.displayName === displayName
      ) ?? null
    );
  }

  async createNotebook(
    workspaceId: string,
    input: CreateNotebookInput
  ): Promise<WorkspaceItem> {
    const url = this.url(`/workspaces/${segment(workspaceId)}/notebooks`);
    const body: Record<string, unknown> = {
      displayName: input.displayName,
      definition: buildNotebookDefinition(input.definition),
    };
    if (input.description) {
      body.description = input.description;
    }
    const response = await this.request("POST", url, { body });
    if (response.status === 202) {
      const operationUrl = await this.waitForOperation(response, url);
      const resultUrl = `${operationUrl.replace(/\/+$/, "")}/result`;
      const result = await this.request("GET", resultUrl);
      return toWorkspaceItem(
        await this.parse(result, ItemSchema, resultUrl),
        workspaceId
      );
    }
    return toWorkspaceItem(
      await this.parse(response, ItemSchema, url),
      workspaceId
    );
  }

  async updateNotebookDefinition(
    workspaceId: string,
    notebookId: string,
    definition: NotebookDefinitionInput
  ): Promise<void> {
    const url = this.url(
      `/workspaces/${segment(workspaceId)}/items/${segment(notebookId)}/updateDefinition`
    );
    const response = await this.request("POST", url, {
      body: { definition: buildNotebookDefinition(definition) },
    });
    if (response.status === 202) {
      await this.waitForOperation(response, url);
    }
  }

  async startNotebookRun(
    workspaceId: string,
    notebookId: string
  ): Promise<StartedJob> {
    const url = this.url(
      `/workspaces/${segment(workspaceId)}/items/${segment(notebookId)}/jobs/instances?jobType=${RUN_NOTEBOOK_JOB_TYPE}`
    );
    // Lets %pip cells install packages inside the run.
    const response = await this.request("POST", url, {
      body: { executionData: { _inlineInstallationEnabled: true } },
    });
    const location = response.headers.get("location");
    const jobId = location ? lastPathSegment(location) : undefined;
    if (!jobId) {
      throw new MalformedResponseError(
        "Job submission response has no Location header",
        url
      );
    }
    this.logger?.debug({ workspaceId, notebookId, jobId }, "job submitted");
    return { jobId };
  }

  async getJobInstance(
    workspaceId: string,
    notebookId: string,
    jobId: string
  ): Promise<JobInstance> {
    const url = this.url(
      `/workspaces/${segment(workspaceId)}/items/${segment(notebookId)}/jobs/instances/${segment(jobId)}`
    );
    const response = await this.request("GET", url);
    const payload = await this.parse(response, JobInstanceSchema, url);
    const job: JobInstance = { id: payload.id, status: payload.status };
    if (payload.itemId) job.itemId = payload.itemId;
    if (payload.jobType) job.jobType = payload.jobType;
    if (payload.invokeType) job.invokeType = payload.invokeType;
    if (payload.startTimeUtc !== undefined) {
      job.startTimeUtc = payload.startTimeUtc;
    }
    if (payload.endTimeUtc !== undefined) {
      job.endTimeUtc = payload.endTimeUtc;
    }
    if (payload.failureReason !== undefined) {
      job.failureReason = payload.failureReason;
    }
    return job;
  }

  private url(pathname: string): string {
    return `${this.baseUrl}${pathname}`;
  }

  private async request(
    method: "GET" | "POST",
    url: string,
    options: RequestOptions = {}
  ): Promise<Response> {
    const token = await this.tokenProvider.getToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }
    this.logger?.debug({ method, url }, "workspace api request");
    const response = await this.fetchImpl(url, init);
    if (!response.ok) {
      throw await this.toApiError(response, method, url);
    }
    return response;
  }

  private async toApiError(
    response: Response,
    method: string,
    url: string
  ): Promise<WorkspaceApiError> {
    const payload: unknown = await response.json().catch(() => null);
    const parsed = ApiErrorBodySchema.safeParse(payload);
    const body: z.infer<typeof ApiErrorBodySchema> = parsed.success
      ? parsed.data
      : {};
    const message =
      body.message ??
      `${method} ${url} failed with status ${response.status}`;
    const requestId =
      body.requestId ?? response.headers.get("requestid") ?? undefined;
    this.logger?.debug(
      { status: response.status, errorCode: body.errorCode, requestId },
      "workspace api error"
    );
    return new WorkspaceApiError(
      message,
      response.status,
      body.errorCode,
      requestId
    );
  }

  private async parse<T extends z.ZodTypeAny>(
    response: Response,
    schema: T,
    url: string
  ): Promise<z.infer<T>> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new MalformedResponseError("Response body is not JSON", url);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where =
        issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new MalformedResponseError(
        `Unexpected response shape${where}: ${issue?.message ?? "invalid"}`,
        url
      );
    }
    return parsed.data;
  }

  /** Follows a 202 long-running operation until it succeeds or fails. */
  private async waitForOperation(
    accepted: Response,
    requestUrl: string
  ): Promise<string> {
    const operationUrl = accepted.headers.get("location");
    if (!operationUrl) {
      throw new MalformedResponseError(
        "Accepted response has no Location header",
        requestUrl
      );
    }
    let delay = retryAfterMs(accepted, this.operationPollIntervalMs);
    for (let attempt = 0; attempt < this.maxOperationPolls; attempt += 1) {
      await this.sleep(delay);
      const response = await this.request("GET", operationUrl);
      const state = await this.parse(
        response,
        OperationStateSchema,
        operationUrl
      );
      this.logger?.debug({ operationUrl, status: state.status }, "operation");
      if (state.status === "Succeeded") {
        return operationUrl;
      }
      if (state.status === "Failed" || state.status === "Cancelled") {
        throw new OperationFailedError(
          state.error?.message ?? `Operation ${state.status.toLowerCase()}`,
          operationUrl,
          state.error?.errorCode
        );
      }
      delay = retryAfterMs(response, this.operationPollIntervalMs);
    }
    throw new OperationFailedError(
      `Operation did not finish after ${this.maxOperationPolls} checks`,
      operationUrl
    );
  }
}
