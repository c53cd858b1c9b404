// Uninstall: any state -> Absent. Every step runs even when earlier ones
// fail; the report says which did. Container and firewall failures are
// warnings, a directory that cannot be deleted fails the uninstall.
import fs from "node:fs/promises";
import path from "node:path";
import type { LifecycleContext } from "./context.js";
import type { UninstallRequest } from "../types/request.js";
import type { ContainerOs } from "../types/host.js";
import type { EngineEndpoint } from "../host/commands/interface.js";
import type { CleanupStep } from "./cleanup.js";
import type { RestartOutcome } from "./restart.js";
import { CleanupReport } from "./cleanup.js";
import { concludeRestart, RestartRequirement } from "./restart.js";
import { removeFromSearchPath } from "./search-path.js";
import { loadDocument, saveDocument } from "../document/store.js";
import {
  activeGeneration,
  allInstallDirs,
  AGENT_CONTAINER_NAME,
  CONTAINER_OWNER_LABEL,
  ENGINE_CLI,
  ENGINE_SERVICE,
  ENGINE_URIS,
  FIREWALL_RULE_NAME,
  HOST_ENV_VARIABLE,
  RUNTIME_SERVICE,
} from "../host/layout.js";
import {
  EXIT_REBOOT_REQUIRED,
  parseIdList,
  SC_SERVICE_DOES_NOT_EXIST,
  SC_SERVICE_NOT_ACTIVE,
} from "../host/commands/parse.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface UninstallResult extends RestartOutcome {
  readonly success: boolean;
  readonly steps: CleanupStep[];
  /** Where the preserved config document now lives, if one was kept. */
  readonly preservedConfig: string | null;
  readonly guidance: string[];
}

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function samePath(a: string, b: string): boolean {
  return path.resolve(a).toLowerCase() === path.resolve(b).toLowerCase();
}

async function stopRuntimeService(ctx: LifecycleContext, report: CleanupReport): Promise<void> {
  const disabled = await ctx.runner.execute(ctx.commands.serviceDisable(RUNTIME_SERVICE), { allowFailure: true, duration: "quick" });
  if (disabled.exitCode === SC_SERVICE_DOES_NOT_EXIST) {
    report.skip("disable runtime service", "not registered");
    report.skip("stop runtime service", "not registered");
    return;
  }
  if (disabled.succeeded) report.ok("disable runtime service");
  else report.warn("disable runtime service", `exit ${disabled.exitCode}: ${disabled.output}`);

  const stopped = await ctx.runner.execute(ctx.commands.serviceControl(RUNTIME_SERVICE, "stop"), {
    allowFailure: true,
    duration: "quick",
    successExitCodes: [0, SC_SERVICE_NOT_ACTIVE],
  });
  if (stopped.succeeded) report.ok("stop runtime service");
  else report.warn("stop runtime service", `exit ${stopped.exitCode}: ${stopped.output}`);
}

async function removeContainers(
  ctx: LifecycleContext,
  report: CleanupReport,
  engine: EngineEndpoint,
  options: { all: boolean },
): Promise<void> {
  const agent = await ctx.runner.execute(ctx.commands.containerRemove(engine, [AGENT_CONTAINER_NAME]), { allowFailure: true, duration: "normal" });
  if (agent.succeeded) report.ok("remove agent container");
  else report.warn("remove agent container", `exit ${agent.exitCode}: ${agent.output}`);

  const step = options.all ? "remove all containers" : "remove runtime-owned containers";
  const listed = await ctx.runner.execute(
    ctx.commands.containerList(engine, options.all ? undefined : { label: CONTAINER_OWNER_LABEL }),
    { allowFailure: true, duration: "quick" },
  );
  if (!listed.succeeded) {
    report.warn(step, `could not list containers (exit ${listed.exitCode}): ${listed.output}`);
    return;
  }
  const ids = parseIdList(listed.stdout);
  if (ids.length === 0) {
    report.skip(step, "no containers");
    return;
  }
  const removed = await ctx.runner.execute(ctx.commands.containerRemove(engine, ids), { allowFailure: true, duration: "slow" });
  if (removed.succeeded) report.ok(step, `${ids.length} removed`);
  else report.warn(step, `exit ${removed.exitCode}: ${removed.output}`);
}

async function removeEngineService(ctx: LifecycleContext, report: CleanupReport): Promise<void> {
  const stopped = await ctx.runner.execute(ctx.commands.serviceControl(ENGINE_SERVICE, "stop"), {
    allowFailure: true,
    duration: "quick",
    successExitCodes: [0, SC_SERVICE_NOT_ACTIVE],
  });
  if (stopped.exitCode === SC_SERVICE_DOES_NOT_EXIST) {
    report.skip("stop and delete engine service", "not registered");
    return;
  }
  if (!stopped.succeeded) report.warn("stop engine service", `exit ${stopped.exitCode}: ${stopped.output}`);

  const deleted = await ctx.runner.execute(ctx.commands.serviceDelete(ENGINE_SERVICE), { allowFailure: true, duration: "quick" });
  if (deleted.succeeded) report.ok("stop and delete engine service");
  else report.warn("delete engine service", `exit ${deleted.exitCode}: ${deleted.output}`);
}

async function removePackages(ctx: LifecycleContext, report: CleanupReport, restart: RestartRequirement): Promise<void> {
  const packages = await ctx.inspector.runtimePackages();
  if (packages.length === 0) {
    report.skip("remove runtime package", "no package record");
    return;
  }
  for (const name of packages) {
    const r = await ctx.runner.execute(ctx.commands.packageRemove(name), {
      allowFailure: true,
      duration: "long_running",
      successExitCodes: [0, EXIT_REBOOT_REQUIRED],
    });
    if (!r.succeeded) {
      report.fail("remove runtime package", `${name}: exit ${r.exitCode}: ${r.output}`);
      continue;
    }
    report.ok("remove runtime package", name);
    if (r.exitCode === EXIT_REBOOT_REQUIRED) restart.require("Runtime package removal");
    if (ctx.commands.packageChangeRequiresRestart) restart.require("Package changes on this edition apply after restart");
  }
}

/** Registrations the package removal left behind. */
async function deleteLeftoverServices(ctx: LifecycleContext, report: CleanupReport): Promise<void> {
  for (const service of [RUNTIME_SERVICE, ENGINE_SERVICE]) {
    if (!(await ctx.inspector.isServiceRegistered(service))) continue;
    const r = await ctx.runner.execute(ctx.commands.serviceDelete(service), { allowFailure: true, duration: "quick" });
    if (r.succeeded) report.ok("delete leftover service", service);
    else report.warn("delete leftover service", `${service}: exit ${r.exitCode}: ${r.output}`);
  }
}

/** Directories to delete: install and data dirs of both generations, engine data roots on request. */
function directoriesToRemove(ctx: LifecycleContext, deleteEngineDataRoot: boolean): string[] {
  const { current, legacy } = ctx.layout;
  const dataRoots = [current.engineDataRoot, ...legacy.engineDataRoots];
  const candidates = [
    current.installDir,
    current.engineInstallDir,
    current.dataDir,
    legacy.installDir,
    legacy.engineInstallDir,
    ...(deleteEngineDataRoot ? dataRoots : []),
  ];
  const unique: string[] = [];
  for (const dir of candidates) {
    if (unique.some((d) => samePath(d, dir))) continue;
    // The legacy engine install dir is the current engine data root; keep it unless asked.
    if (!deleteEngineDataRoot && dataRoots.some((root) => samePath(root, dir))) continue;
    unique.push(dir);
  }
  return unique;
}

async function removeDirectories(ctx: LifecycleContext, report: CleanupReport, dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    try {
      await fs.access(dir);
    } catch {
      continue;
    }
    try {
      await fs.rm(dir, { recursive: true, force: true, maxRetries: 3, retryDelay: 500 });
      report.ok("delete directory", dir);
    } catch (err) {
      report.fail("delete directory", `${dir}: ${describeFailure(err)}`);
    }
  }
}

async function removeHostVariable(ctx: LifecycleContext, report: CleanupReport): Promise<void> {
  delete ctx.env[HOST_ENV_VARIABLE];
  const present = await ctx.runner.execute(ctx.commands.machineEnvironmentQuery(HOST_ENV_VARIABLE), { allowFailure: true, duration: "instant" });
  if (!present.succeeded) {
    report.skip("remove host variable", "not set");
    return;
  }
  const r = await ctx.runner.execute(ctx.commands.machineEnvironmentDelete(HOST_ENV_VARIABLE), { allowFailure: true, duration: "instant" });
  if (r.succeeded) report.ok("remove host variable");
  else report.warn("remove host variable", `exit ${r.exitCode}: ${r.output}`);
}

async function removeFirewallRule(ctx: LifecycleContext, report: CleanupReport): Promise<void> {
  const r = await ctx.runner.execute(ctx.commands.firewallRemoveRule(FIREWALL_RULE_NAME), { allowFailure: true, duration: "quick" });
  if (r.succeeded) report.ok("remove firewall rule");
  else if (/no rules match/i.test(r.output)) report.skip("remove firewall rule", "not present");
  else report.warn("remove firewall rule", `exit ${r.exitCode}: ${r.output}`);
}

export async function uninstall(ctx: LifecycleContext, request: UninstallRequest): Promise<UninstallResult> {
  const state = await ctx.inspector.inspect();
  if (!request.force && !state.runtimeInstalled && !state.engineInstalled) {
    throw new InstallerError(
      InstallerErrorCode.PRECONDITION_VIOLATION,
      "Nothing is installed. Pass force to clean up leftovers anyway.",
      { layout: state.layout },
    );
  }

  const report = new CleanupReport();
  const restart = new RestartRequirement();
  const generation = activeGeneration(ctx.layout, state.layout);
  const containerOs: ContainerOs = ctx.inspector.readContainerOsFromConfig();
  const configPath = ctx.inspector.configDocumentPath();
  const preserved = configPath && !request.deleteConfig ? await loadDocument(configPath) : null;

  logger.info({ layout: state.layout, containerOs, force: request.force ?? false }, "Uninstalling edge runtime");

  await stopRuntimeService(ctx, report);

  if (containerOs === "linux" || state.engineInstalled) {
    const engine: EngineEndpoint = {
      cli: containerOs === "windows" ? generation.engineCli : ENGINE_CLI,
      uri: ENGINE_URIS[containerOs],
    };
    await removeContainers(ctx, report, engine, { all: Boolean(request.deleteEngineDataRoot) && containerOs === "windows" });
  } else {
    report.skip("remove containers", "engine not installed");
  }

  await removeEngineService(ctx, report);
  await removePackages(ctx, report, restart);
  await deleteLeftoverServices(ctx, report);
  await removeDirectories(ctx, report, directoriesToRemove(ctx, Boolean(request.deleteEngineDataRoot)));

  let preservedConfig: string | null = null;
  if (preserved !== null) {
    try {
      await saveDocument(ctx.layout.current.configPath, preserved);
      preservedConfig = ctx.layout.current.configPath;
      report.ok("preserve config document", preservedConfig);
    } catch (err) {
      report.fail("preserve config document", describeFailure(err));
    }
  }

  try {
    await removeFromSearchPath(ctx, allInstallDirs(ctx.layout));
    report.ok("remove search path entries");
  } catch (err) {
    report.warn("remove search path entries", describeFailure(err));
  }

  await removeHostVariable(ctx, report);
  await removeFirewallRule(ctx, report);

  const guidance: string[] = [];
  if (!report.success) {
    guidance.push("Some files could not be removed. Restart the host, then run Uninstall again with force.");
  }
  if (preservedConfig) {
    guidance.push(`The configuration was kept at ${preservedConfig}; Initialize with existing provisioning reuses it.`);
  }

  const outcome = await concludeRestart(ctx, restart, request.restartIfNeeded);
  logger.info({ success: report.success, failed: report.byOutcome("failed").length, warnings: report.byOutcome("warning").length }, "Uninstall finished");
  return { ...outcome, success: report.success, steps: report.entries(), preservedConfig, guidance };
}
