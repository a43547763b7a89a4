import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { InvalidRecordError, NotFoundError } from "./errors.js";
import type { AgentIdentity } from "./identity.js";

export const RECORD_FILE_NAME = "config.json";
export const RECORD_SCHEMA_VERSION = 1;

export const AGENT_STATUSES = [
  "scaffolded",
  "compiled",
  "uploaded",
  "executed_successfully",
  "execution_failed",
] as const;

export const AgentStatusSchema = z.enum(AGENT_STATUSES);
export type AgentStatus = z.infer<typeof AgentStatusSchema>;

export const PublishedResourceSchema = z
  .object({
    id: z.string(),
    displayName: z.string(),
    type: z.string(),
    url: z.string(),
  })
  .passthrough();

export const DiscoverySchema = z.discriminatedUnion("state", [
  z.object({ state: z.literal("found"), resource: PublishedResourceSchema }),
  z.object({ state: z.literal("not_found") }),
  z.object({ state: z.literal("error"), message: z.string() }),
  z.object({ state: z.literal("skipped") }),
]);

export type PublishedResource = z.infer<typeof PublishedResourceSchema>;
export type Discovery = z.infer<typeof DiscoverySchema>;

export const LastExecutionSchema = z
  .object({
    jobId: z.string(),
    status: z.string(),
    success: z.boolean(),
    durationMs: z.number().nonnegative().default(0),
    runtime: z.string().default("00:00:00"),
    timestamp: z.string(),
    discovery: DiscoverySchema.default({ state: "skipped" }),
  })
  .passthrough();

export type LastExecution = z.infer<typeof LastExecutionSchema>;

export const AgentRecordSchema = z
  .object({
    schemaVersion: z.number().int().positive().default(RECORD_SCHEMA_VERSION),
    agentName: z.string().default(""),
    folderName: z.string().default(""),
    createdDate: z.string().default(""),
    status: AgentStatusSchema.default("scaffolded"),
    workspaceId: z.string().default(""),
    notebookId: z.string().default(""),
    notebookName: z.string().default(""),
    agentId: z.string().default(""),
    agentUrl: z.string().default(""),
    lakehouseId: z.string().default(""),
    lakehouseName: z.string().default(""),
    compiledPath: z.string().default(""),
    lastUpload: z.string().optional(),
    lastExecution: LastExecutionSchema.optional(),
  })
  .passthrough();

export type AgentRecord = z.infer<typeof AgentRecordSchema>;

export const createDefaultRecord = (
  identity: AgentIdentity,
  createdDate: string
): AgentRecord =>
  AgentRecordSchema.parse({
    agentName: identity.displayName,
    folderName: identity.folderName,
    createdDate,
  });

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Reads and writes one agent's `config.json`. Writes replace the whole file,
 * so two writers racing on the same record keep only the last write.
 */
export class AgentRecordStore {
  readonly filePath: string;

  constructor(readonly agentDir: string) {
    this.filePath = path.join(agentDir, RECORD_FILE_NAME);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  async load(): Promise<AgentRecord> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Agent record not found: ${this.filePath}`);
      }
      throw error;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new InvalidRecordError(this.filePath, detail);
    }

    const parsed = AgentRecordSchema.safeParse(payload);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
        .join("; ");
      throw new InvalidRecordError(this.filePath, detail);
    }
    return parsed.data;
  }

  async save(record: AgentRecord): Promise<void> {
    await fs.mkdir(this.agentDir, { recursive: true });
    await fs.writeFile(
      this.filePath,
      `${JSON.stringify(record, null, 2)}\n`,
      "utf8"
    );
  }

  async update(
    patch: (record: AgentRecord) => AgentRecord
  ): Promise<AgentRecord> {
    const next = patch(await this.load());
    await this.save(next);
    return next;
  }
}
