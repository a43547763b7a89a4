import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { readNotebookDocument } from "@dagent/notebook-schema";
import { WorkspaceApiError } from "@dagent/workspace-api";
import {
  AgentLifecycleManager,
  AgentRecordStore,
  AlreadyExistsError,
  InvalidAgentNameError,
  InvalidRecordError,
  InvalidWorkspaceIdError,
  JobTimeoutError,
  MissingNotebookReferenceError,
  MissingWorkspaceError,
  NotFoundError,
  UnsupportedOperationError,
  UpdateDeclinedError,
  createSilentLogger,
  type AgentLifecycleManagerOptions,
  type AgentRecord,
} from "../src/index.js";
import { FakeWorkspaceApi } from "./fake-workspace-api.js";

const WS = "11111111-2222-3333-4444-555555555555";
const START = Date.parse("2026-03-01T10:00:00.000Z");

const tempDirs: string[] = [];

afterEach(async () => {
  for (const dir of tempDirs.splice(0)) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

const setup = async (
  overrides: Partial<AgentLifecycleManagerOptions> = {}
) => {
  const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "dagent-agents-"));
  tempDirs.push(baseDir);
  const api = new FakeWorkspaceApi();
  let clock = START;
  const sleep = vi.fn(async (ms: number) => {
    clock += ms;
  });
  const manager = new AgentLifecycleManager({
    baseDir,
    api,
    logger: createSilentLogger(),
    polling: { intervalMs: 10_000 },
    sleep,
    now: () => clock,
    ...overrides,
  });
  return { baseDir, api, sleep, manager };
};

const patchRecord = async (
  manager: AgentLifecycleManager,
  folderName: string,
  patch: Partial<AgentRecord>
) => {
  const store = new AgentRecordStore(manager.pathsFor(folderName).agentDir);
  await store.update((record) => ({ ...record, ...patch }));
};

const readRecord = (manager: AgentLifecycleManager, folderName: string) =>
  new AgentRecordStore(manager.pathsFor(folderName).agentDir).load();

describe("scaffold", () => {
  it("creates the agent folder from the templates", async () => {
    const { manager } = await setup();

    const identity = await manager.scaffold("Sales Agent");

    expect(identity).toEqual({
      displayName: "Sales Agent",
      folderName: "sales_agent",
    });
    const paths = manager.pathsFor("sales_agent");
    const record = await readRecord(manager, "sales_agent");
    expect(record).toMatchObject({
      schemaVersion: 1,
      agentName: "Sales Agent",
      folderName: "sales_agent",
      createdDate: "2026-03-01T10:00:00.000Z",
      status: "scaffolded",
      workspaceId: "",
      notebookId: "",
      notebookName: "",
      agentId: "",
      agentUrl: "",
    });

    const notebook = await readNotebookDocument(paths.notebook);
    expect(notebook.cells[0].source[0]).toBe("# Data agent: Sales Agent\n");
    expect(notebook.cells[2].source[0]).toBe('agent_name = "Sales Agent"\n');

    const readme = await fs.readFile(paths.readme, "utf8");
    expect(readme.startsWith("# Data agent: Sales Agent\n")).toBe(true);
    expect(readme).toContain("Folder: sales_agent\n");
    expect(readme).not.toContain("{created_date}");

    await expect(fs.access(paths.testingNotebook)).resolves.toBeUndefined();
  });

  it("keeps the notebook valid JSON for names with quotes", async () => {
    const { manager } = await setup();
    await manager.scaffold('Sales "Prod"');
    const notebook = await readNotebookDocument(
      manager.pathsFor('sales_"prod"').notebook
    );
    expect(notebook.cells[0].source[0]).toBe('# Data agent: Sales "Prod"\n');
  });

  it("refuses to overwrite an existing agent without force", async () => {
    const { manager } = await setup();
    await manager.scaffold("Sales Agent");
    const paths = manager.pathsFor("sales_agent");
    await fs.writeFile(paths.notebook, "edited", "utf8");
    await patchRecord(manager, "sales_agent", { notebookId: "nb-1" });

    await expect(manager.scaffold("sales-agent")).rejects.toBeInstanceOf(
      AlreadyExistsError
    );
    expect(await fs.readFile(paths.notebook, "utf8")).toBe("edited");
    expect((await readRecord(manager, "sales_agent")).notebookId).toBe("nb-1");

    await manager.scaffold("Sales Agent", { force: true });
    expect(await fs.readFile(paths.notebook, "utf8")).not.toBe("edited");
    expect((await readRecord(manager, "sales_agent")).notebookId).toBe("");
  });

  it.each(["", "   ", "../escape", "a/b", "a\\b"])(
    "rejects the agent name %j",
    async (name) => {
      const { manager } = await setup();
      await expect(manager.scaffold(name)).rejects.toBeInstanceOf(
        InvalidAgentNameError
      );
    }
  );
});

describe("list and get", () => {
  it("lists agent folders that carry a record", async () => {
    const { manager, baseDir } = await setup();
    await manager.scaffold("Zeta");
    await manager.scaffold("Alpha Beta");
    await fs.mkdir(path.join(baseDir, "not_an_agent"));

    const agents = await manager.list();
    expect(agents.map((agent) => agent.folderName)).toEqual([
      "alpha_beta",
      "zeta",
    ]);
    expect(agents[0].record?.agentName).toBe("Alpha Beta");
    expect((await manager.get("Alpha Beta")).folderName).toBe("alpha_beta");
    await expect(manager.get("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports an unreadable record without dropping the other agents", async () => {
    const { manager } = await setup();
    await manager.scaffold("First");
    await manager.scaffold("Second");
    await fs.writeFile(manager.pathsFor("first").record, "{ broken", "utf8");

    const agents = await manager.list();

    expect(agents.map((agent) => agent.folderName)).toEqual([
      "first",
      "second",
    ]);
    expect(agents[0].record).toBeUndefined();
    expect(agents[0].error).toBeInstanceOf(InvalidRecordError);
    expect(agents[1].record?.agentName).toBe("Second");
    expect(await manager.listFolders()).toEqual(["first", "second"]);
  });

  it("returns nothing for a missing base directory", async () => {
    const { manager, baseDir } = await setup();
    await fs.rm(baseDir, { recursive: true });
    expect(await manager.list()).toEqual([]);
  });
});

describe("compile", () => {
  it("writes to the default path and advances the status", async () => {
    const { manager } = await setup();
    await manager.scaffold("Sales Agent");
    const paths = manager.pathsFor("sales_agent");

    const result = await manager.compile("Sales Agent");

    expect(result.path).toBe(paths.defaultCompiled);
    expect(result.status).toBe("compiled");
    expect(result.content.startsWith("# Fabric notebook source\n")).toBe(true);
    expect(await fs.readFile(paths.defaultCompiled, "utf8")).toBe(
      result.content
    );
    const record = await readRecord(manager, "sales_agent");
    expect(record.status).toBe("compiled");
    expect(record.compiledPath).toBe("");
  });

  it("remembers an explicit output path for later compiles", async () => {
    const { manager, baseDir } = await setup();
    await manager.scaffold("Sales Agent");
    const custom = path.join(baseDir, "build", "sales.py");

    await manager.compile("Sales Agent", { outputPath: custom });
    await fs.rm(custom);
    const second = await manager.compile("sales_agent");

    expect(second.path).toBe(custom);
    expect(await fs.readFile(custom, "utf8")).toBe(second.content);
    expect((await readRecord(manager, "sales_agent")).compiledPath).toBe(
      custom
    );
    await expect(
      fs.access(manager.pathsFor("sales_agent").defaultCompiled)
    ).rejects.toThrow();
  });

  it("passes storage metadata from the record to the converter", async () => {
    const { manager } = await setup();
    await manager.scaffold("Sales Agent");
    await patchRecord(manager, "sales_agent", {
      workspaceId: WS,
      lakehouseId: "lh-1",
      lakehouseName: "SalesLake",
    });

    const { content } = await manager.compile("Sales Agent");

    expect(content).toContain('# META       "default_lakehouse": "lh-1",\n');
    expect(content).toContain(
      `# META       "default_lakehouse_workspace_id": "${WS}"\n`
    );
  });

  it("leaves later statuses alone", async () => {
    const { manager } = await setup();
    await manager.scaffold("Sales Agent");
    await patchRecord(manager, "sales_agent", { status: "uploaded" });
    const result = await manager.compile("Sales Agent");
    expect(result.status).toBe("uploaded");
    expect((await readRecord(manager, "sales_agent")).status).toBe("uploaded");
  });

  it("fails when the agent or its notebook is missing", async () => {
    const { manager } = await setup();
    await expect(manager.compile("Ghost")).rejects.toBeInstanceOf(
      NotFoundError
    );
    await manager.scaffold("Sales Agent");
    await fs.rm(manager.pathsFor("sales_agent").notebook);
    await expect(manager.compile("Sales Agent")).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});

describe("upload", () => {
  it("creates a notebook, compiling first when needed", async () => {
    const { manager, api } = await setup();
    await manager.scaffold("Sales Agent");
    const paths = manager.pathsFor("sales_agent");

    const result = await manager.upload("Sales Agent", { workspaceId: WS });

    expect(result).toEqual({
      remoteId: "nb-created-1",
      displayName: "Sales Agent",
      workspaceId: WS,
      updated: false,
    });
    const compiled = await fs.readFile(paths.defaultCompiled, "utf8");
    expect(api.created).toEqual([
      {
        workspaceId: WS,
        input: {
          displayName: "Sales Agent",
          definition: { content: compiled, format: "fabric-source" },
        },
      },
    ]);
    const record = await readRecord(manager, "sales_agent");
    expect(record).toMatchObject({
      status: "uploaded",
      notebookId: "nb-created-1",
      notebookName: "Sales Agent",
      workspaceId: WS,
      lastUpload: "2026-03-01T10:00:00.000Z",
    });
  });

  it("uploads the raw notebook when creating in native format", async () => {
    const { manager, api } = await setup();
    await manager.scaffold("Sales Agent");
    const paths = manager.pathsFor("sales_agent");

    await manager.upload("Sales Agent", {
      workspaceId: WS,
      displayName: "Sales (ipynb)",
      useNativeFormat: true,
    });

    expect(api.created[0].input).toEqual({
      displayName: "Sales (ipynb)",
      definition: {
        content: await fs.readFile(paths.notebook, "utf8"),
        format: "ipynb",
      },
    });
    await expect(fs.access(paths.defaultCompiled)).rejects.toThrow();
  });

  it("resolves the workspace from argument, record, then default", async () => {
    const other = "99999999-8888-7777-6666-555555555555";
    const { manager, api } = await setup({ defaultWorkspaceId: other });
    await manager.scaffold("Sales Agent");

    await manager.upload("Sales Agent");
    expect(api.created[0].workspaceId).toBe(other);

    await patchRecord(manager, "sales_agent", {
      workspaceId: WS,
      notebookId: "",
    });
    await manager.upload("Sales Agent");
    expect(api.created[1].workspaceId).toBe(WS);
  });

  it("requires a well-formed workspace id", async () => {
    const { manager } = await setup();
    await manager.scaffold("Sales Agent");
    await expect(manager.upload("Sales Agent")).rejects.toBeInstanceOf(
      MissingWorkspaceError
    );
    await expect(
      manager.upload("Sales Agent", { workspaceId: "workspace-1" })
    ).rejects.toBeInstanceOf(InvalidWorkspaceIdError);
  });

  it("looks the notebook up by its recorded id before its name", async () => {
    const { manager, api } = await setup();
    await manager.scaffold("Sales Agent");
    await patchRecord(manager, "sales_agent", {
      workspaceId: WS,
      notebookId: "nb-1",
    });
    api.items.push(
      { id: "nb-1", displayName: "Renamed", type: "Notebook", workspaceId: WS },
      {
        id: "nb-2",
        displayName: "Sales Agent",
        type: "Notebook",
        workspaceId: WS,
      }
    );
    const byName = vi.spyOn(api, "findNotebookByName");

    const result = await manager.upload("Sales Agent", { forceUpdate: true });

    expect(result.remoteId).toBe("nb-1");
    expect(result.updated).toBe(true);
    expect(api.updates.map((update) => update.notebookId)).toEqual(["nb-1"]);
    expect(byName).not.toHaveBeenCalled();
  });

  it("falls back to the display name when the recorded id is gone", async () => {
    const { manager, api } = await setup();
    await manager.scaffold("Sales Agent");
    await patchRecord(manager, "sales_agent", {
      workspaceId: WS,
      notebookId: "nb-deleted",
    });
    api.items.push({
      id: "nb-2",
      displayName: "Sales Agent",
      type: "Notebook",
      workspaceId: WS,
    });

    const result = await manager.upload("Sales Agent");

    expect(result).toMatchObject({ remoteId: "nb-2", updated: true });
    expect((await readRecord(manager, "sales_agent")).notebookId).toBe("nb-2");
  });

  it("asks before updating and stops when declined", async () => {
    const confirm = vi.fn(async (_message: string) => false);
    const { manager, api } = await setup({ confirm });
    await manager.scaffold("Sales Agent");
    api.items.push({
      id: "nb-2",
      displayName: "Sales Agent",
      type: "Notebook",
      workspaceId: WS,
    });

    await expect(
      manager.upload("Sales Agent", { workspaceId: WS, askBeforeUpdate: true })
    ).rejects.toBeInstanceOf(UpdateDeclinedError);
    expect(confirm).toHaveBeenCalledWith(
      "Notebook 'Sales Agent' exists. Update existing notebook?"
    );
    expect(api.updates).toEqual([]);
    expect((await readRecord(manager, "sales_agent")).status).toBe(
      "scaffolded"
    );

    confirm.mockResolvedValueOnce(true);
    await manager.upload("Sales Agent", {
      workspaceId: WS,
      askBeforeUpdate: true,
    });
    expect(api.updates).toHaveLength(1);
  });

  it("treats a missing confirmation prompt as a decline", async () => {
    const { manager, api } = await setup();
    await manager.scaffold("Sales Agent");
    api.items.push({
      id: "nb-2",
      displayName: "Sales Agent",
      type: "Notebook",
      workspaceId: WS,
    });
    await expect(
      manager.upload("Sales Agent", { workspaceId: WS, askBeforeUpdate: true })
    ).rejects.toBeInstanceOf(UpdateDeclinedError);
  });

  it("refuses to update from the native format", async () => {
    const { manager, api } = await setup();
    await manager.scaffold("Sales Agent");
    api.items.push({
      id: "nb-2",
      displayName: "Sales Agent",
      type: "Notebook",
      workspaceId: WS,
    });
    await expect(
      manager.upload("Sales Agent", {
        workspaceId: WS,
        forceUpdate: true,
        useNativeFormat: true,
      })
    ).rejects.toBeInstanceOf(UnsupportedOperationError);
    expect(api.updates).toEqual([]);
  });

  it("rejects a native-format update before asking for confirmation", async () => {
    const confirm = vi.fn(async (_message: string) => true);
    const { manager, api } = await setup({ confirm });
    await manager.scaffold("Sales Agent");
    api.items.push({
      id: "nb-2",
      displayName: "Sales Agent",
      type: "Notebook",
      workspaceId: WS,
    });

    await expect(
      manager.upload("Sales Agent", {
        workspaceId: WS,
        askBeforeUpdate: true,
        useNativeFormat: true,
      })
    ).rejects.toBeInstanceOf(UnsupportedOperationError);
    expect(confirm).not.toHaveBeenCalled();
    expect(api.updates).toEqual([]);
  });

  it("lists the notebooks of the given or default workspace", async () => {
    const other = "99999999-8888-7777-6666-555555555555";
    const { manager, api } = await setup({ defaultWorkspaceId: WS });
    api.items.push(
      { id: "nb-1", displayName: "Sales", type: "Notebook", workspaceId: WS },
      { id: "lh-1", displayName: "Lake", type: "Lakehouse", workspaceId: WS },
      { id: "nb-9", displayName: "Other", type: "Notebook", workspaceId: other }
    );

    expect(
      (await manager.listRemoteNotebooks()).map((item) => item.id)
    ).toEqual(["nb-1"]);
    expect(
      (await manager.listRemoteNotebooks(other)).map((item) => item.id)
    ).toEqual(["nb-9"]);
    await expect(
      manager.listRemoteNotebooks("not-a-guid")
    ).rejects.toBeInstanceOf(InvalidWorkspaceIdError);
  });

  it("needs a workspace client", async () => {
    const { manager } = await setup({ api: undefined });
    await manager.scaffold("Sales Agent");
    await expect(
      manager.upload("Sales Agent", { workspaceId: WS })
    ).rejects.toBeInstanceOf(UnsupportedOperationError);
  });
});

describe("run", () => {
  const uploaded = async (
    overrides: Partial<AgentLifecycleManagerOptions> = {}
  ) => {
    const context = await setup(overrides);
    await context.manager.scaffold("Sales Agent");
    await patchRecord(context.manager, "sales_agent", {
      status: "uploaded",
      workspaceId: WS,
      notebookId: "nb-1",
      notebookName: "Sales Agent",
    });
    context.api.items.push({
      id: "nb-1",
      displayName: "Sales Agent",
      type: "Notebook",
      workspaceId: WS,
    });
    return context;
  };

  it("polls the job and records the published agent", async () => {
    const { manager, api, sleep } = await uploaded();
    api.items.push(
      { id: "lh-1", displayName: "sales_agent", type: "Lakehouse", workspaceId: WS },
      { id: "agent-7", displayName: "Sales-Agent v2", type: "DataAgent", workspaceId: WS }
    );
    api.jobStatuses.push("NotStarted", "InProgress", "Completed");
    const onStatus = vi.fn();

    const result = await manager.run("Sales Agent", { onStatus });

    const url = `https://api.fabric.microsoft.com/v1/workspaces/${WS}/aiskills/agent-7/aiassistant/openai`;
    expect(result).toEqual({
      jobId: "job-1",
      notebookId: "nb-1",
      workspaceId: WS,
      status: "Completed",
      success: true,
      durationMs: 20_000,
      runtime: "00:00:20",
      discovery: {
        state: "found",
        resource: {
          id: "agent-7",
          displayName: "Sales-Agent v2",
          type: "DataAgent",
          url,
        },
      },
    });
    expect(sleep.mock.calls).toEqual([[10_000], [10_000]]);
    expect(onStatus).toHaveBeenCalledTimes(3);

    const record = await readRecord(manager, "sales_agent");
    expect(record.status).toBe("executed_successfully");
    expect(record.agentId).toBe("agent-7");
    expect(record.agentUrl).toBe(url);
    expect(record.lastExecution).toMatchObject({
      jobId: "job-1",
      status: "Completed",
      success: true,
      runtime: "00:00:20",
      timestamp: "2026-03-01T10:00:20.000Z",
    });
  });

  it("records a failed job without looking for the agent", async () => {
    const { manager, api } = await uploaded();
    api.jobStatuses.push("Failed");
    const list = vi.spyOn(api, "listItems");

    const result = await manager.run("Sales Agent");

    expect(result.success).toBe(false);
    expect(result.discovery).toEqual({ state: "skipped" });
    expect(list).not.toHaveBeenCalled();
    const record = await readRecord(manager, "sales_agent");
    expect(record.status).toBe("execution_failed");
    expect(record.agentId).toBe("");
  });

  it("does not fail the run when discovery finds nothing or errors", async () => {
    const { manager, api } = await uploaded();
    api.jobStatuses.push("Completed");
    const first = await manager.run("Sales Agent");
    expect(first.discovery).toEqual({ state: "not_found" });

    api.jobStatuses.push("Completed");
    api.listError = new Error("listing unavailable");
    const second = await manager.run("Sales Agent");
    expect(second.success).toBe(true);
    expect(second.discovery).toEqual({
      state: "error",
      message: "listing unavailable",
    });
    const record = await readRecord(manager, "sales_agent");
    expect(record.status).toBe("executed_successfully");
    expect(record.lastExecution?.discovery).toEqual(second.discovery);
  });

  it("requires a notebook reference from a previous upload", async () => {
    const { manager } = await setup();
    await manager.scaffold("Sales Agent");
    await expect(
      manager.run("Sales Agent", { workspaceId: WS })
    ).rejects.toBeInstanceOf(MissingNotebookReferenceError);
  });

  it("fails when the notebook is gone remotely", async () => {
    const { manager, api } = await uploaded();
    api.items = [];
    await expect(manager.run("Sales Agent")).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("gives up after the configured timeout", async () => {
    const { manager, api } = await uploaded({
      polling: { intervalMs: 10_000, timeoutMs: 15_000 },
    });
    api.jobStatuses.push("InProgress", "InProgress", "InProgress");

    await expect(manager.run("Sales Agent")).rejects.toBeInstanceOf(
      JobTimeoutError
    );
    expect((await readRecord(manager, "sales_agent")).status).toBe("uploaded");
  });

  it("propagates a failed status read", async () => {
    const { manager, api } = await uploaded();
    const failure = new WorkspaceApiError("Service unavailable", 503);
    api.jobStatuses.push("InProgress", failure);

    await expect(manager.run("Sales Agent")).rejects.toBe(failure);
    expect((await readRecord(manager, "sales_agent")).status).toBe("uploaded");
  });
});
