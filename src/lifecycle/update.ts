// Update: Installed | Ready -> same state on a newer package.
import type { LifecycleContext } from "./context.js";
import type { UpdateRequest } from "../types/request.js";
import type { ContainerOs } from "../types/host.js";
import type { RestartOutcome } from "./restart.js";
import { concludeRestart, RestartRequirement } from "./restart.js";
import { deployRuntimePackage } from "./deploy.js";
import { assertCompatible } from "./install.js";
import { RUNTIME_SERVICE } from "../host/layout.js";
import { SC_SERVICE_ALREADY_RUNNING } from "../host/commands/parse.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface UpdateResult extends RestartOutcome {
  readonly containerOs: ContainerOs;
  readonly packageSource: "offline" | "download";
  readonly serviceStarted: boolean;
}

export async function update(ctx: LifecycleContext, request: UpdateRequest): Promise<UpdateResult> {
  const state = await ctx.inspector.inspect();
  if (!state.runtimeInstalled || !state.engineInstalled) {
    throw new InstallerError(
      InstallerErrorCode.PRECONDITION_VIOLATION,
      "The runtime is not fully installed. Use Install instead of Update.",
      { runtimeInstalled: state.runtimeInstalled, engineInstalled: state.engineInstalled },
    );
  }
  if (state.layout !== "current" || ctx.inspector.needsRelocation()) {
    throw new InstallerError(
      InstallerErrorCode.PRECONDITION_VIOLATION,
      "This installation was made by an older installer and cannot be updated in place. Run Uninstall, then Install and Initialize.",
      { layout: state.layout },
    );
  }

  const containerOs = request.containerOs ?? ctx.inspector.readContainerOsFromConfig();
  assertCompatible(ctx, containerOs);

  const restart = new RestartRequirement();
  logger.info({ containerOs }, "Updating edge runtime");
  const deployed = await deployRuntimePackage(ctx, { ...request, containerOs }, restart);

  let serviceStarted = false;
  if (!restart.required) {
    await ctx.runner.execute(ctx.commands.serviceControl(RUNTIME_SERVICE, "start"), {
      backoff: true,
      duration: "quick",
      successExitCodes: [0, SC_SERVICE_ALREADY_RUNNING],
    });
    serviceStarted = true;
  }
  const outcome = await concludeRestart(ctx, restart, request.restartIfNeeded);

  logger.info({ restartRequired: outcome.restartRequired, serviceStarted }, "Edge runtime updated");
  return { ...outcome, containerOs, packageSource: deployed.packageSource, serviceStarted };
}
