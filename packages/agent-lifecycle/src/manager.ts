import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { convertNotebook, writeConvertedNotebook } from "@dagent/converter";
import { readNotebookDocument } from "@dagent/notebook-schema";
import {
  NOTEBOOK_ITEM_TYPE,
  type NotebookDefinitionInput,
  type WorkspaceApi,
  type WorkspaceItem,
} from "@dagent/workspace-api";
import {
  DEFAULT_PUBLISHED_RESOURCE_BASE_URL,
  discoverPublishedResource,
} from "./discovery.js";
import {
  AlreadyExistsError,
  InvalidRecordError,
  InvalidWorkspaceIdError,
  MissingNotebookReferenceError,
  MissingWorkspaceError,
  NotFoundError,
  UnsupportedOperationError,
  UpdateDeclinedError,
} from "./errors.js";
import {
  createAgentIdentity,
  toFolderName,
  type AgentIdentity,
} from "./identity.js";
import {
  DEFAULT_POLL_INTERVAL_MS,
  JobPoller,
  formatRuntime,
  type JobStatusUpdate,
} from "./poller.js";
import {
  AgentRecordStore,
  RECORD_FILE_NAME,
  createDefaultRecord,
  type AgentRecord,
  type AgentStatus,
  type Discovery,
} from "./record.js";
import {
  renderAgentNotebook,
  renderReadme,
  renderTestingNotebook,
} from "./templates.js";

const WORKSPACE_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const isWorkspaceId = (value: string): boolean =>
  WORKSPACE_ID_PATTERN.test(value);

export interface PollingSettings {
  intervalMs: number;
  timeoutMs?: number;
}

export interface AgentLifecycleManagerOptions {
  baseDir: string;
  logger: Logger;
  api?: WorkspaceApi;
  confirm?: (message: string) => Promise<boolean>;
  defaultWorkspaceId?: string;
  publishedResourceBaseUrl?: string;
  polling?: PollingSettings;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface AgentPaths {
  agentDir: string;
  record: string;
  notebook: string;
  testingNotebook: string;
  readme: string;
  defaultCompiled: string;
}

export interface ScaffoldOptions {
  force?: boolean;
}

export interface CompileOptions {
  outputPath?: string;
}

export interface CompileResult {
  path: string;
  content: string;
  status: AgentStatus;
}

export interface UploadOptions {
  workspaceId?: string;
  displayName?: string;
  forceUpdate?: boolean;
  askBeforeUpdate?: boolean;
  useNativeFormat?: boolean;
}

export interface UploadResult {
  remoteId: string;
  displayName: string;
  workspaceId: string;
  updated: boolean;
}

export interface RunOptions {
  workspaceId?: string;
  onStatus?: (update: JobStatusUpdate) => void;
}

export interface RunResult {
  jobId: string;
  notebookId: string;
  workspaceId: string;
  status: string;
  success: boolean;
  durationMs: number;
  runtime: string;
  discovery: Discovery;
}

/** One agent folder; `error` is set instead of `record` when the record is unreadable. */
export type AgentSummary =
  | { folderName: string; record: AgentRecord; error?: undefined }
  | { folderName: string; record?: undefined; error: InvalidRecordError };

const pathExists = async (target: string) => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const pad = (value: number) => String(value).padStart(2, "0");

const formatCreatedDate = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Drives an agent folder through scaffold, compile, upload and run. The
 * agent record in the folder is the only state; every operation reads it
 * first and writes it back when the agent's status changes.
 */
export class AgentLifecycleManager {
  readonly baseDir: string;
  private readonly logger: Logger;
  private readonly api?: WorkspaceApi;
  private readonly confirm?: (message: string) => Promise<boolean>;
  private readonly defaultWorkspaceId?: string;
  private readonly publishedResourceBaseUrl: string;
  private readonly polling: PollingSettings;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: AgentLifecycleManagerOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.logger = options.logger;
    this.api = options.api;
    this.confirm = options.confirm;
    this.defaultWorkspaceId = options.defaultWorkspaceId?.trim() || undefined;
    this.publishedResourceBaseUrl =
      options.publishedResourceBaseUrl ?? DEFAULT_PUBLISHED_RESOURCE_BASE_URL;
    this.polling = options.polling ?? { intervalMs: DEFAULT_POLL_INTERVAL_MS };
    this.sleep = options.sleep;
    this.now = options.now ?? Date.now;
  }

  pathsFor(folderName: string): AgentPaths {
    const agentDir = path.join(this.baseDir, folderName);
    return {
      agentDir,
      record: path.join(agentDir, RECORD_FILE_NAME),
      notebook: path.join(agentDir, `${folderName}.ipynb`),
      testingNotebook: path.join(agentDir, `${folderName}_testing.ipynb`),
      readme: path.join(agentDir, "README.md"),
      defaultCompiled: path.join(agentDir, `${folderName}_fabric.py`),
    };
  }

  async scaffold(
    name: string,
    options: ScaffoldOptions = {}
  ): Promise<AgentIdentity> {
    const identity = createAgentIdentity(name);
    const paths = this.pathsFor(identity.folderName);
    if ((await pathExists(paths.agentDir)) && !options.force) {
      throw new AlreadyExistsError(identity.folderName);
    }

    await fs.mkdir(paths.agentDir, { recursive: true });
    const createdAt = new Date(this.now());
    const store = new AgentRecordStore(paths.agentDir);
    await store.save(createDefaultRecord(identity, createdAt.toISOString()));
    await fs.writeFile(
      paths.notebook,
      await renderAgentNotebook(identity.displayName),
      "utf8"
    );
    await fs.writeFile(
      paths.readme,
      await renderReadme(identity, formatCreatedDate(createdAt)),
      "utf8"
    );
    await fs.writeFile(
      paths.testingNotebook,
      await renderTestingNotebook(),
      "utf8"
    );

    this.logger.info(
      { agent: identity.folderName, status: "scaffolded", force: !!options.force },
      "agent scaffolded"
    );
    return identity;
  }

  /** Folders under `baseDir` holding an agent record, sorted; records are not parsed. */
  async listFolders(): Promise<string[]> {
    const entries = await fs
      .readdir(this.baseDir, { withFileTypes: true })
      .catch((error: unknown) => {
        if (isMissingFile(error)) {
          return [];
        }
        throw error;
      });

    const folders = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
    const withRecords: string[] = [];
    for (const folderName of folders) {
      const store = new AgentRecordStore(this.pathsFor(folderName).agentDir);
      if (await store.exists()) {
        withRecords.push(folderName);
      }
    }
    return withRecords;
  }

  async list(): Promise<AgentSummary[]> {
    const summaries: AgentSummary[] = [];
    for (const folderName of await this.listFolders()) {
      const store = new AgentRecordStore(this.pathsFor(folderName).agentDir);
      try {
        summaries.push({ folderName, record: await store.load() });
      } catch (error) {
        if (!(error instanceof InvalidRecordError)) {
          throw error;
        }
        this.logger.warn(
          { agent: folderName, error: error.message },
          "unreadable agent record"
        );
        summaries.push({ folderName, error });
      }
    }
    return summaries;
  }

  async get(name: string): Promise<AgentRecord> {
    const { store } = await this.open(name);
    return store.load();
  }

  async compile(
    name: string,
    options: CompileOptions = {}
  ): Promise<CompileResult> {
    const { folderName, paths, store } = await this.open(name);
    const record = await store.load();
    if (!(await pathExists(paths.notebook))) {
      throw new NotFoundError(`Notebook not found: ${paths.notebook}`);
    }

    const document = await readNotebookDocument(paths.notebook);
    const content = convertNotebook(document, {
      storage: {
        workspaceId: record.workspaceId,
        storageId: record.lakehouseId,
        storageName: record.lakehouseName,
      },
    });

    const explicit = options.outputPath
      ? path.resolve(options.outputPath)
      : undefined;
    const target = explicit ?? (record.compiledPath || paths.defaultCompiled);
    await writeConvertedNotebook(target, content);

    const status: AgentStatus =
      record.status === "scaffolded" ? "compiled" : record.status;
    await store.save({
      ...record,
      status,
      compiledPath: explicit ?? record.compiledPath,
    });

    this.logger.info(
      { agent: folderName, path: target, status },
      "agent compiled"
    );
    return { path: target, content, status };
  }

  async upload(
    name: string,
    options: UploadOptions = {}
  ): Promise<UploadResult> {
    const api = this.requireApi("upload");
    const { folderName, paths, store } = await this.open(name);
    const record = await store.load();
    const workspaceId = this.resolveWorkspaceId(options.workspaceId, record);
    const displayName =
      options.displayName?.trim() || record.agentName || folderName;

    const existing = await this.findNotebook(
      api,
      workspaceId,
      record.notebookId,
      displayName
    );

    let remote: { id: string };
    let updated: boolean;
    if (existing) {
      if (options.useNativeFormat) {
        throw new UnsupportedOperationError(
          "Updating an existing notebook from .ipynb is not supported; upload Fabric source instead"
        );
      }
      if (!options.forceUpdate && options.askBeforeUpdate) {
        const approved = this.confirm
          ? await this.confirm(
              `Notebook '${displayName}' exists. Update existing notebook?`
            )
          : false;
        if (!approved) {
          throw new UpdateDeclinedError(displayName);
        }
      }
      const definition = await this.compiledDefinition(name, record, paths);
      await api.updateNotebookDefinition(workspaceId, existing.id, definition);
      remote = existing;
      updated = true;
    } else {
      const definition: NotebookDefinitionInput = options.useNativeFormat
        ? await this.nativeDefinition(paths)
        : await this.compiledDefinition(name, record, paths);
      remote = await api.createNotebook(workspaceId, {
        displayName,
        definition,
      });
      updated = false;
    }

    // Reload: an auto-compile may have rewritten the record meanwhile.
    const latest = await store.load();
    await store.save({
      ...latest,
      status: "uploaded",
      notebookId: remote.id,
      notebookName: displayName,
      workspaceId,
      lastUpload: new Date(this.now()).toISOString(),
    });

    this.logger.info(
      {
        agent: folderName,
        workspaceId,
        notebookId: remote.id,
        updated,
        status: "uploaded",
      },
      updated ? "notebook updated" : "notebook created"
    );
    return { remoteId: remote.id, displayName, workspaceId, updated };
  }

  async run(name: string, options: RunOptions = {}): Promise<RunResult> {
    const api = this.requireApi("run");
    const { folderName, store } = await this.open(name);
    const record = await store.load();
    const workspaceId = this.resolveWorkspaceId(options.workspaceId, record);
    if (!record.notebookId && !record.notebookName) {
      throw new MissingNotebookReferenceError(record.agentName || folderName);
    }

    const notebook = await this.findNotebook(
      api,
      workspaceId,
      record.notebookId,
      record.notebookName
    );
    if (!notebook) {
      throw new NotFoundError(
        `Notebook '${record.notebookName || record.notebookId}' not found in workspace ${workspaceId}`
      );
    }

    const { jobId } = await api.startNotebookRun(workspaceId, notebook.id);
    this.logger.info(
      { agent: folderName, workspaceId, notebookId: notebook.id, jobId },
      "notebook job submitted"
    );

    const poller = new JobPoller({
      intervalMs: this.polling.intervalMs,
      timeoutMs: this.polling.timeoutMs,
      sleep: this.sleep,
      now: this.now,
      onStatus: options.onStatus,
      logger: this.logger,
    });
    const outcome = await poller.waitFor(jobId, () =>
      api.getJobInstance(workspaceId, notebook.id, jobId)
    );

    const discovery: Discovery = outcome.success
      ? await discoverPublishedResource(
          api,
          workspaceId,
          record.agentName || folderName,
          this.publishedResourceBaseUrl
        )
      : { state: "skipped" };
    if (discovery.state === "error") {
      this.logger.warn(
        { agent: folderName, error: discovery.message },
        "published agent lookup failed"
      );
    }

    const result: RunResult = {
      jobId,
      notebookId: notebook.id,
      workspaceId,
      status: outcome.job.status,
      success: outcome.success,
      durationMs: outcome.durationMs,
      runtime: formatRuntime(outcome.durationMs),
      discovery,
    };

    const status: AgentStatus = outcome.success
      ? "executed_successfully"
      : "execution_failed";
    const latest = await store.load();
    await store.save({
      ...latest,
      status,
      workspaceId,
      notebookId: notebook.id,
      ...(discovery.state === "found"
        ? { agentId: discovery.resource.id, agentUrl: discovery.resource.url }
        : {}),
      lastExecution: {
        jobId,
        status: result.status,
        success: result.success,
        durationMs: result.durationMs,
        runtime: result.runtime,
        timestamp: new Date(this.now()).toISOString(),
        discovery,
      },
    });

    this.logger.info(
      { agent: folderName, jobId, status, discovery: discovery.state },
      "notebook job finished"
    );
    return result;
  }

  /** Notebooks in the given (or configured default) workspace. */
  async listRemoteNotebooks(workspaceId?: string): Promise<WorkspaceItem[]> {
    const api = this.requireApi("list remote notebooks");
    const resolved = this.resolveWorkspaceId(workspaceId);
    return api.listItems(resolved, { type: NOTEBOOK_ITEM_TYPE });
  }

  private async open(name: string) {
    const identity = createAgentIdentity(name);
    const folderName = toFolderName(identity.displayName);
    const paths = this.pathsFor(folderName);
    const store = new AgentRecordStore(paths.agentDir);
    if (!(await store.exists())) {
      throw new NotFoundError(`Agent '${folderName}' not found in ${this.baseDir}`);
    }
    return { folderName, paths, store };
  }

  private requireApi(operation: string): WorkspaceApi {
    if (!this.api) {
      throw new UnsupportedOperationError(
        `Cannot ${operation} without a workspace API client`
      );
    }
    return this.api;
  }

  private resolveWorkspaceId(
    explicit: string | undefined,
    record?: AgentRecord
  ): string {
    const workspaceId =
      explicit?.trim() || record?.workspaceId || this.defaultWorkspaceId;
    if (!workspaceId) {
      throw new MissingWorkspaceError();
    }
    if (!isWorkspaceId(workspaceId)) {
      throw new InvalidWorkspaceIdError(workspaceId);
    }
    return workspaceId;
  }

  /** Recorded id first; the display name is only searched when that misses. */
  private async findNotebook(
    api: WorkspaceApi,
    workspaceId: string,
    notebookId: string,
    displayName: string
  ): Promise<WorkspaceItem | null> {
    if (notebookId) {
      const byId = await api.getItem(workspaceId, notebookId);
      if (byId && byId.type === NOTEBOOK_ITEM_TYPE) {
        return byId;
      }
    }
    if (!displayName) {
      return null;
    }
    return api.findNotebookByName(workspaceId, displayName);
  }

  private async compiledDefinition(
    name: string,
    record: AgentRecord,
    paths: AgentPaths
  ): Promise<NotebookDefinitionInput> {
    let compiledPath = record.compiledPath || paths.defaultCompiled;
    if (!(await pathExists(compiledPath))) {
      this.logger.info({ path: compiledPath }, "no compiled notebook; compiling");
      compiledPath = (await this.compile(name)).path;
    }
    return {
      content: await fs.readFile(compiledPath, "utf8"),
      format: "fabric-source",
    };
  }

  private async nativeDefinition(
    paths: AgentPaths
  ): Promise<NotebookDefinitionInput> {
    if (!(await pathExists(paths.notebook))) {
      throw new NotFoundError(`Notebook not found: ${paths.notebook}`);
    }
    return {
      content: await fs.readFile(paths.notebook, "utf8"),
      format: "ipynb",
    };
  }
}
