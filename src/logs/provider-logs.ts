// Runtime log retrieval from the Windows application event log.
import { z } from "zod";
import type { CommandRunner } from "../execution/runner.js";
import type { HostCommands } from "../host/commands/interface.js";
import type { InstallerSettings } from "../types/config.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";

export interface ProviderLogEntry {
  readonly timeCreated: Date;
  readonly message: string;
}

const eventSchema = z.object({
  TimeCreated: z.string().datetime({ offset: true }),
  Message: z.string().nullable().default(""),
});

/** ConvertTo-Json emits a bare object for one event and an array for several. */
const eventsSchema = z.union([z.array(eventSchema), eventSchema.transform((e) => [e])]);

export function parseProviderEvents(output: string): ProviderLogEntry[] {
  const trimmed = output.trim();
  if (!trimmed) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (err) {
    throw new InstallerError(
      InstallerErrorCode.EXTERNAL_COMMAND_FAILED,
      "Event log query returned output that is not JSON",
      { cause: err instanceof Error ? err.message : String(err) },
    );
  }
  const parsed = eventsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InstallerError(InstallerErrorCode.EXTERNAL_COMMAND_FAILED, "Event log query returned unexpected records", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data
    .map((e) => ({ timeCreated: new Date(e.TimeCreated), message: (e.Message ?? "").trim() }))
    .sort((a, b) => a.timeCreated.getTime() - b.timeCreated.getTime());
}

export interface ProviderLogDeps {
  readonly runner: CommandRunner;
  readonly commands: Pick<HostCommands, "providerEvents">;
  readonly settings: Pick<InstallerSettings, "logs">;
}

/** Runtime events since `since` (default: the configured window before `now`), oldest first. */
export async function getProviderLogs(deps: ProviderLogDeps, since?: Date, now: Date = new Date()): Promise<ProviderLogEntry[]> {
  const from = since ?? new Date(now.getTime() - deps.settings.logs.default_window_minutes * 60_000);
  const r = await deps.runner.execute(deps.commands.providerEvents(deps.settings.logs.provider_name, from), { duration: "normal" });
  return parseProviderEvents(r.stdout);
}
