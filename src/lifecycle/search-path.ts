// Machine and process search-path maintenance. Entries are compared
// case-insensitively with trailing separators ignored, as Windows does.
import type { LifecycleContext } from "./context.js";
import { parseRegistryValue } from "../host/commands/parse.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const SEPARATOR = ";";
const MACHINE_PATH_VARIABLE = "Path";

function normalize(entry: string): string {
  return entry.trim().replace(/[\\/]+$/, "").toLowerCase();
}

export function splitSearchPath(value: string): string[] {
  return value.split(SEPARATOR).map((e) => e.trim()).filter(Boolean);
}

/** Append `dirs` that are not present yet. */
export function withEntries(value: string, dirs: readonly string[]): string {
  const entries = splitSearchPath(value);
  const seen = new Set(entries.map(normalize));
  for (const dir of dirs) {
    if (!seen.has(normalize(dir))) {
      entries.push(dir);
      seen.add(normalize(dir));
    }
  }
  return entries.join(SEPARATOR);
}

export function withoutEntries(value: string, dirs: readonly string[]): string {
  const drop = new Set(dirs.map(normalize));
  return splitSearchPath(value).filter((e) => !drop.has(normalize(e))).join(SEPARATOR);
}

/** Key under which this process's environment stores the search path ("Path" on Windows). */
function processPathKey(env: NodeJS.ProcessEnv): string {
  return Object.keys(env).find((k) => k.toUpperCase() === "PATH") ?? "PATH";
}

/** The persisted machine search path. A failed or unparsable read throws; it is never taken as empty. */
async function readMachinePath(ctx: LifecycleContext): Promise<string> {
  const r = await ctx.runner.execute(ctx.commands.machineEnvironmentQuery(MACHINE_PATH_VARIABLE), { duration: "instant" });
  const value = parseRegistryValue(r.stdout, MACHINE_PATH_VARIABLE);
  if (value === null) {
    throw new InstallerError(
      InstallerErrorCode.EXTERNAL_COMMAND_FAILED,
      "Could not read the machine search path; it was left unchanged",
      { output: r.output },
    );
  }
  return value;
}

async function rewriteSearchPath(ctx: LifecycleContext, update: (value: string) => string): Promise<void> {
  const machine = await readMachinePath(ctx);
  const next = update(machine);
  if (next !== machine) {
    await ctx.runner.execute(ctx.commands.machineEnvironmentSet(MACHINE_PATH_VARIABLE, next), { duration: "instant" });
  }
  const key = processPathKey(ctx.env);
  ctx.env[key] = update(ctx.env[key] ?? "");
}

export async function addToSearchPath(ctx: LifecycleContext, dirs: readonly string[]): Promise<void> {
  await rewriteSearchPath(ctx, (v) => withEntries(v, dirs));
  logger.info({ dirs }, "Search path entries added");
}

export async function removeFromSearchPath(ctx: LifecycleContext, dirs: readonly string[]): Promise<void> {
  await rewriteSearchPath(ctx, (v) => withoutEntries(v, dirs));
  logger.info({ dirs }, "Search path entries removed");
}
