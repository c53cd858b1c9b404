import type { LifecycleContext } from "./context.js";
import { logger } from "../logger.js";

/** Once required, a restart stays required for the rest of the transition. */
export class RestartRequirement {
  private readonly reasons: string[] = [];

  require(reason: string): void {
    if (this.reasons.includes(reason)) return;
    this.reasons.push(reason);
    logger.info({ reason }, "Host restart required");
  }

  get required(): boolean {
    return this.reasons.length > 0;
  }

  list(): string[] {
    return [...this.reasons];
  }
}

export interface RestartOutcome {
  readonly restartRequired: boolean;
  readonly restartReasons: string[];
  /** A host restart was issued at the end of the transition. */
  readonly restarting: boolean;
}

/** Report a pending restart, and issue it when the caller allowed that. */
export async function concludeRestart(ctx: LifecycleContext, restart: RestartRequirement, restartIfNeeded = false): Promise<RestartOutcome> {
  let restarting = false;
  if (restart.required && restartIfNeeded) {
    logger.warn({ reasons: restart.list() }, "Restarting host");
    await ctx.runner.execute(ctx.commands.restartHost(), { duration: "instant" });
    restarting = true;
  } else if (restart.required) {
    logger.warn({ reasons: restart.list() }, "Host restart pending; restart before using the runtime");
  }
  return { restartRequired: restart.required, restartReasons: restart.list(), restarting };
}
