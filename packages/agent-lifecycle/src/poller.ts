import type { Logger } from "pino";
import type { JobInstance } from "@dagent/workspace-api";
import { JobTimeoutError } from "./errors.js";

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const SUCCESS_JOB_STATUS = "Completed";
export const IN_FLIGHT_JOB_STATUSES: ReadonlySet<string> = new Set([
  "NotStarted",
  "InProgress",
]);

export type JobPollerState = "submitted" | "polling" | "terminal" | "timed_out";

export interface JobStatusUpdate {
  jobId: string;
  status: string;
  elapsedMs: number;
  attempt: number;
}

export interface JobPollerOptions {
  intervalMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  onStatus?: (update: JobStatusUpdate) => void;
  logger?: Logger;
}

export interface JobOutcome {
  job: JobInstance;
  success: boolean;
  durationMs: number;
  polls: number;
}

export const isTerminalJobStatus = (status: string): boolean =>
  !IN_FLIGHT_JOB_STATUSES.has(status);

export const formatRuntime = (durationMs: number): string => {
  const totalSeconds = Math.max(0, Math.floor(durationMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds]
    .map((part) => String(part).padStart(2, "0"))
    .join(":");
};

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Waits for a submitted job to reach a terminal status.
 *
 * `submitted -> polling -> terminal`, or `timed_out` once the optional
 * timeout passes. A failed status read leaves the poller in `polling` and
 * rethrows; the remote job is never cancelled.
 */
export class JobPoller {
  private currentState: JobPollerState = "submitted";
  private readonly intervalMs: number;
  private readonly timeoutMs?: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly onStatus?: (update: JobStatusUpdate) => void;
  private readonly logger?: Logger;

  constructor(options: JobPollerOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.onStatus = options.onStatus;
    this.logger = options.logger;
  }

  get state(): JobPollerState {
    return this.currentState;
  }

  async waitFor(
    jobId: string,
    readStatus: () => Promise<JobInstance>
  ): Promise<JobOutcome> {
    const startedAt = this.now();
    this.currentState = "polling";
    let polls = 0;

    for (;;) {
      const job = await readStatus();
      polls += 1;
      const elapsedMs = this.now() - startedAt;
      this.logger?.debug(
        { jobId, status: job.status, elapsedMs, attempt: polls },
        "job status"
      );
      this.onStatus?.({ jobId, status: job.status, elapsedMs, attempt: polls });

      if (isTerminalJobStatus(job.status)) {
        this.currentState = "terminal";
        return {
          job,
          success: job.status === SUCCESS_JOB_STATUS,
          durationMs: elapsedMs,
          polls,
        };
      }

      if (this.timeoutMs !== undefined && elapsedMs >= this.timeoutMs) {
        this.currentState = "timed_out";
        throw new JobTimeoutError(jobId, job.status, elapsedMs);
      }

      await this.sleep(this.intervalMs);
    }
  }
}
