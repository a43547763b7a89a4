import chalk from "chalk";
import type { BatchSummary } from "@dagent/agent-lifecycle";

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const fail = (message: string) => {
  console.error(chalk.red("✖"), message);
  process.exitCode = 1;
};

export const succeed = (message: string) => {
  console.log(chalk.green("✔"), message);
};

/** Wraps a command action so failures print `✖ <message>` and exit non-zero. */
export const guard =
  <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
  async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      fail(errorMessage(error));
    }
  };

export interface BatchTally {
  succeeded: number;
  failed: number;
}

/**
 * Prints one line per agent and a closing tally. `isSuccess` lets a finished
 * item still count as a failure, such as a run whose job failed.
 */
export const printBatchSummary = <T>(
  label: string,
  summary: BatchSummary<T>,
  describe: (agent: string, value: T) => string,
  isSuccess: (value: T) => boolean = () => true
): BatchTally => {
  const tally: BatchTally = { succeeded: 0, failed: 0 };
  if (summary.results.length === 0) {
    console.log(chalk.yellow("!"), "No agents found");
    return tally;
  }
  for (const result of summary.results) {
    if (!result.ok) {
      fail(`${result.agent}: ${result.error.message}`);
      tally.failed += 1;
    } else if (isSuccess(result.value)) {
      succeed(describe(result.agent, result.value));
      tally.succeeded += 1;
    } else {
      fail(describe(result.agent, result.value));
      tally.failed += 1;
    }
  }
  console.log(
    `${chalk.dim(label)}: ${chalk.green(`${tally.succeeded} succeeded`)}` +
      (tally.failed > 0 ? `, ${chalk.red(`${tally.failed} failed`)}` : "")
  );
  return tally;
};
