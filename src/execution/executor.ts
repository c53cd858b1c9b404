// Command execution layer: every native command passes through this module.
// LocalExecutor.execute() is the boundary between lifecycle code and the OS;
// it never throws for a non-zero exit, it reports the exit code instead.
import execa from "execa";
import type { Command } from "../types/command.js";
import { describeCommand } from "../types/command.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface. Tests substitute an in-process fake. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Local executor backed by execa. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (!cmd) {
      throw new InstallerError(InstallerErrorCode.VALIDATION_ERROR, "Cannot execute an empty command");
    }

    const result = await execa(cmd, args, {
      timeout: timeoutMs,
      // 10MB ceiling: event log queries and dism package tables stay far below this.
      maxBuffer: 10 * 1024 * 1024,
      env: command.env,
      input: command.stdin,
      windowsHide: true,
      reject: false,
    });

    const durationMs = Math.round(performance.now() - start);
    // execa leaves exitCode undefined when the process never spawned (ENOENT).
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : 1;
    if (result.failed && typeof result.exitCode !== "number") {
      logger.debug({ command: describeCommand(command) }, "Command failed to spawn");
    }
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode,
      durationMs,
    };
  }
}
