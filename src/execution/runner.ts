import type { Command } from "../types/command.js";
import { describeCommand } from "../types/command.js";
import type { DurationCategory } from "../types/risk.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";
import type { Executor, ExecResult } from "./executor.js";
import { RetryPolicy } from "./retry.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface RunOptions {
  /** Retry through the shared RetryPolicy until success or attempts run out. */
  readonly backoff?: boolean;
  /** Return the failing result instead of throwing EXTERNAL_COMMAND_FAILED. */
  readonly allowFailure?: boolean;
  /** Exit codes that count as success. Defaults to [0]. */
  readonly successExitCodes?: readonly number[];
  readonly duration?: DurationCategory;
}

export interface RunResult {
  readonly stdout: string;
  readonly stderr: string;
  /** stdout and stderr joined, for messages and parsing of tools that mix them. */
  readonly output: string;
  readonly exitCode: number;
  readonly attempts: number;
  readonly succeeded: boolean;
}

/**
 * Executes one native command with the installer's failure policy.
 * Retries apply only to the single external invocation, never to the
 * caller's logical operation.
 */
export class CommandRunner {
  constructor(
    private readonly executor: Executor,
    private readonly retry: RetryPolicy,
  ) {}

  async execute(command: Command, options: RunOptions = {}): Promise<RunResult> {
    const successCodes = options.successExitCodes ?? [0];
    const timeout = DURATION_TIMEOUTS[options.duration ?? "normal"];
    const isSuccess = (r: ExecResult): boolean => successCodes.includes(r.exitCode);
    const label = describeCommand(command);

    let last: ExecResult;
    let attempts: number;
    if (options.backoff) {
      const outcome = await this.retry.run(async (n) => {
        const r = await this.executor.execute(command, timeout);
        if (!isSuccess(r)) {
          logger.debug({ command: label, attempt: n, exitCode: r.exitCode }, "Command attempt failed");
        }
        return r;
      }, isSuccess);
      last = outcome.value;
      attempts = outcome.attempts;
    } else {
      last = await this.executor.execute(command, timeout);
      attempts = 1;
    }

    const result: RunResult = {
      stdout: last.stdout,
      stderr: last.stderr,
      output: [last.stdout.trim(), last.stderr.trim()].filter(Boolean).join("\n"),
      exitCode: last.exitCode,
      attempts,
      succeeded: isSuccess(last),
    };

    if (!result.succeeded && !options.allowFailure) {
      throw new InstallerError(
        InstallerErrorCode.EXTERNAL_COMMAND_FAILED,
        `Command exited with ${result.exitCode}: ${label}`,
        { command: label, exitCode: result.exitCode, output: result.output, attempts },
      );
    }
    return result;
  }
}
