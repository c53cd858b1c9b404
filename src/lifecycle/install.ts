// Install: Absent -> Installed(NoConfig).
import fs from "node:fs/promises";
import path from "node:path";
import type { LifecycleContext } from "./context.js";
import type { DeployRequest } from "../types/request.js";
import type { ContainerOs } from "../types/host.js";
import type { RestartOutcome } from "./restart.js";
import { concludeRestart, RestartRequirement } from "./restart.js";
import { deployRuntimePackage } from "./deploy.js";
import { checkOsCompatibility } from "../host/inspector.js";
import { EXIT_REBOOT_REQUIRED, parseFeatureEnabled } from "../host/commands/parse.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const CONTAINERS_FEATURE = "Containers";

export interface InstallResult extends RestartOutcome {
  readonly containerOs: ContainerOs;
  readonly packageSource: "offline" | "download";
  readonly endpointDirs: string[];
}

export function assertCompatible(ctx: LifecycleContext, containerOs: ContainerOs): void {
  if (!checkOsCompatibility(containerOs, ctx.platform.build)) {
    throw new InstallerError(
      InstallerErrorCode.UNSUPPORTED_HOST,
      `OS build ${ctx.platform.build} cannot run ${containerOs} containers with this runtime`,
      { containerOs, build: ctx.platform.build },
    );
  }
}

/** Enable the Containers optional feature when it is off. Failures are logged, not raised. */
async function ensureContainersFeature(ctx: LifecycleContext, restart: RestartRequirement): Promise<void> {
  const status = await ctx.runner.execute(ctx.commands.featureStatus(CONTAINERS_FEATURE), { allowFailure: true, duration: "quick" });
  if (status.succeeded && parseFeatureEnabled(status.stdout)) return;

  logger.info({ feature: CONTAINERS_FEATURE }, "Enabling optional feature");
  const r = await ctx.runner.execute(ctx.commands.featureEnable(CONTAINERS_FEATURE), {
    allowFailure: true,
    duration: "slow",
    successExitCodes: [0, EXIT_REBOOT_REQUIRED],
  });
  if (!r.succeeded) {
    logger.warn({ feature: CONTAINERS_FEATURE, exitCode: r.exitCode, output: r.output }, "Could not enable optional feature; Windows containers may not start");
    return;
  }
  restart.require(`${CONTAINERS_FEATURE} feature enabled`);
}

/** Socket directories for the management and workload endpoints, writable by modules. */
async function createEndpointDirs(ctx: LifecycleContext): Promise<string[]> {
  const dirs = ["mgmt", "workload"].map((d) => path.join(ctx.layout.current.dataDir, d));
  for (const dir of dirs) {
    await fs.mkdir(dir, { recursive: true });
    await ctx.runner.execute(ctx.commands.grantModify(dir), { duration: "quick" });
  }
  return dirs;
}

export async function install(ctx: LifecycleContext, request: DeployRequest): Promise<InstallResult> {
  const state = await ctx.inspector.inspect();
  if (state.runtimeInstalled || state.engineInstalled) {
    throw new InstallerError(
      InstallerErrorCode.PRECONDITION_VIOLATION,
      state.layout === "legacy"
        ? "An older installation is present. Run Uninstall before installing."
        : "The runtime is already installed. Use Update to move to a newer version, or Initialize to configure it.",
      { runtimeInstalled: state.runtimeInstalled, engineInstalled: state.engineInstalled, layout: state.layout },
    );
  }
  assertCompatible(ctx, request.containerOs);

  const restart = new RestartRequirement();
  if (ctx.commands.supportsOptionalFeatures && request.containerOs === "windows") {
    await ensureContainersFeature(ctx, restart);
  }

  logger.info({ containerOs: request.containerOs, offline: request.offlineInstallationPath ?? null }, "Installing edge runtime");
  const deployed = await deployRuntimePackage(ctx, request, restart);
  const endpointDirs = await createEndpointDirs(ctx);
  const outcome = await concludeRestart(ctx, restart, request.restartIfNeeded);

  logger.info({ restartRequired: outcome.restartRequired }, "Edge runtime installed");
  return { ...outcome, containerOs: request.containerOs, packageSource: deployed.packageSource, endpointDirs };
}
