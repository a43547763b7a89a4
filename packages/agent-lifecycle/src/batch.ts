import path from "node:path";
import type {
  AgentLifecycleManager,
  CompileResult,
  RunOptions,
  RunResult,
  UploadOptions,
  UploadResult,
} from "./manager.js";

export type BatchItemResult<T> =
  | { agent: string; ok: true; value: T }
  | { agent: string; ok: false; error: Error };

export interface BatchSummary<T> {
  results: BatchItemResult<T>[];
  succeeded: Array<{ agent: string; value: T }>;
  failed: Array<{ agent: string; error: Error }>;
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/** Runs `task` for every agent in order; one failure never stops the rest. */
export const runSequentially = async <T>(
  agents: readonly string[],
  task: (agent: string) => Promise<T>
): Promise<BatchSummary<T>> => {
  const summary: BatchSummary<T> = { results: [], succeeded: [], failed: [] };
  for (const agent of agents) {
    try {
      const value = await task(agent);
      summary.results.push({ agent, ok: true, value });
      summary.succeeded.push({ agent, value });
    } catch (error) {
      const failure = toError(error);
      summary.results.push({ agent, ok: false, error: failure });
      summary.failed.push({ agent, error: failure });
    }
  }
  return summary;
};

// Records are read per agent inside the task, so a broken one fails only itself.
const agentNames = (manager: AgentLifecycleManager) => manager.listFolders();

export interface CompileAllOptions {
  /** Directory for every compiled file instead of each agent's folder. */
  outputDir?: string;
  /** File name suffix after the folder name; `_fabric` by default. */
  outputSuffix?: string;
}

export const compileAll = async (
  manager: AgentLifecycleManager,
  options: CompileAllOptions = {}
): Promise<BatchSummary<CompileResult>> => {
  const custom =
    options.outputDir !== undefined || options.outputSuffix !== undefined;
  return runSequentially(await agentNames(manager), (agent) => {
    if (!custom) {
      return manager.compile(agent);
    }
    const dir = options.outputDir ?? manager.pathsFor(agent).agentDir;
    const fileName = `${agent}${options.outputSuffix ?? "_fabric"}.py`;
    return manager.compile(agent, { outputPath: path.join(dir, fileName) });
  });
};

export const uploadAll = async (
  manager: AgentLifecycleManager,
  options: Omit<UploadOptions, "askBeforeUpdate" | "displayName"> = {}
): Promise<BatchSummary<UploadResult>> =>
  runSequentially(await agentNames(manager), (agent) =>
    manager.upload(agent, { ...options, askBeforeUpdate: false })
  );

export const runAll = async (
  manager: AgentLifecycleManager,
  options: RunOptions = {}
): Promise<BatchSummary<RunResult>> =>
  runSequentially(await agentNames(manager), (agent) =>
    manager.run(agent, options)
  );
