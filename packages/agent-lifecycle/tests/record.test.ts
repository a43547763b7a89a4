import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  AgentRecordStore,
  InvalidRecordError,
  NotFoundError,
  createDefaultRecord,
} from "../src/index.js";

let agentDir: string;

beforeEach(async () => {
  agentDir = await fs.mkdtemp(path.join(os.tmpdir(), "dagent-record-"));
});

afterEach(async () => {
  await fs.rm(agentDir, { recursive: true, force: true });
});

const writeRaw = (value: string) =>
  fs.writeFile(path.join(agentDir, "config.json"), value, "utf8");

describe("AgentRecordStore", () => {
  it("fills missing keys and keeps unknown ones", async () => {
    await writeRaw(
      JSON.stringify({
        agentName: "Sales Agent",
        status: "compiled",
        owner: "analytics",
      })
    );
    const store = new AgentRecordStore(agentDir);

    const record = await store.load();
    expect(record).toMatchObject({
      schemaVersion: 1,
      agentName: "Sales Agent",
      status: "compiled",
      workspaceId: "",
      notebookId: "",
      owner: "analytics",
    });

    await store.save(record);
    const saved: unknown = JSON.parse(await fs.readFile(store.filePath, "utf8"));
    expect(saved).toMatchObject({ owner: "analytics", notebookId: "" });
  });

  it("writes two-space indented JSON with a trailing newline", async () => {
    const store = new AgentRecordStore(agentDir);
    const record = createDefaultRecord(
      { displayName: "Sales", folderName: "sales" },
      "2026-03-01T10:00:00.000Z"
    );
    await store.save(record);
    const raw = await fs.readFile(store.filePath, "utf8");
    expect(raw).toBe(`${JSON.stringify(record, null, 2)}\n`);
    expect(raw.startsWith('{\n  "schemaVersion": 1,\n')).toBe(true);
  });

  it("reports missing and malformed records", async () => {
    const store = new AgentRecordStore(agentDir);
    expect(await store.exists()).toBe(false);
    await expect(store.load()).rejects.toBeInstanceOf(NotFoundError);

    await writeRaw("{ not json");
    expect(await store.exists()).toBe(true);
    await expect(store.load()).rejects.toBeInstanceOf(InvalidRecordError);

    await writeRaw(JSON.stringify({ status: "deployed" }));
    await expect(store.load()).rejects.toThrow(/status/);
  });

  it("keeps only the last of two racing writers", async () => {
    const store = new AgentRecordStore(agentDir);
    await store.save(
      createDefaultRecord({ displayName: "Sales", folderName: "sales" }, "")
    );

    const first = await store.load();
    const second = await store.load();
    await store.save({ ...first, notebookId: "nb-1", status: "uploaded" });
    await store.save({ ...second, agentId: "agent-1" });

    const record = await store.load();
    expect(record.agentId).toBe("agent-1");
    expect(record.notebookId).toBe("");
    expect(record.status).toBe("scaffolded");
  });

  it("applies updates on top of the stored record", async () => {
    const store = new AgentRecordStore(agentDir);
    await store.save(
      createDefaultRecord({ displayName: "Sales", folderName: "sales" }, "")
    );
    const next = await store.update((record) => ({
      ...record,
      lakehouseName: "SalesLake",
    }));
    expect(next.lakehouseName).toBe("SalesLake");
    expect((await store.load()).lakehouseName).toBe("SalesLake");
  });
});
