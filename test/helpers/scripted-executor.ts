import type { Command } from '../../src/types/command.js';
import type { Executor, ExecResult } from '../../src/execution/executor.js';

/** Returns queued exit codes in order; the last one repeats. */
export class ScriptedExecutor implements Executor {
  readonly calls: Command[] = [];
  readonly timeouts: number[] = [];

  constructor(private readonly script: Array<Partial<ExecResult>>) {}

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    this.calls.push(command);
    this.timeouts.push(timeoutMs);
    const step = this.script[Math.min(this.calls.length - 1, this.script.length - 1)] ?? {};
    return { stdout: '', stderr: '', exitCode: 0, durationMs: 1, ...step };
  }
}
