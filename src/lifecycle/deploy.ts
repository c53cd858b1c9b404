// Package path shared by Install and Update: prerequisites, artifact
// acquisition, service quiescing and the package install itself.
import type { LifecycleContext } from "./context.js";
import type { RestartRequirement } from "./restart.js";
import type { DeployRequest } from "../types/request.js";
import type { AcquiredArtifact, ArtifactRequest } from "../resources/acquire.js";
import { ENGINE_SERVICE, PACKAGE_NAME_PREFIX, RUNTIME_SERVICE } from "../host/layout.js";
import { EXIT_NEWER_VERSION_INSTALLED, EXIT_REBOOT_REQUIRED } from "../host/commands/parse.js";
import { logger } from "../logger.js";

export function runtimePackageArtifact(ctx: LifecycleContext): ArtifactRequest {
  return {
    description: "edge runtime package",
    remoteUrl: ctx.settings.downloads.runtime_package_url,
    localFileName: `${PACKAGE_NAME_PREFIX}.cab`,
    cacheGlob: `${PACKAGE_NAME_PREFIX}*.cab`,
  };
}

export function vcRuntimeArtifact(ctx: LifecycleContext): ArtifactRequest {
  return {
    description: "VC++ runtime",
    remoteUrl: ctx.settings.downloads.vc_runtime_url,
    localFileName: "vc_redist.x64.exe",
    cacheGlob: "vc_redist*.exe",
  };
}

export interface DeployOutcome {
  /** Where the runtime package came from. */
  readonly packageSource: "offline" | "download";
  readonly vcRuntimeInstalled: boolean;
}

async function installVcRuntime(ctx: LifecycleContext, request: DeployRequest, restart: RestartRequirement): Promise<void> {
  const artifact = await ctx.acquirer.acquire(vcRuntimeArtifact(ctx), {
    offlineDirectory: request.offlineInstallationPath,
    proxy: request.proxy,
  });
  try {
    const r = await ctx.runner.execute(ctx.commands.vcRuntimeInstall(artifact.path), {
      duration: "slow",
      successExitCodes: [0, EXIT_NEWER_VERSION_INSTALLED, EXIT_REBOOT_REQUIRED],
    });
    if (r.exitCode === EXIT_NEWER_VERSION_INSTALLED) logger.info("A newer VC++ runtime is already installed");
    if (r.exitCode === EXIT_REBOOT_REQUIRED) restart.require("VC++ runtime installation");
  } finally {
    await ctx.acquirer.release(artifact);
  }
}

/** Stop both services if present and let them release their files. */
async function quiesceServices(ctx: LifecycleContext): Promise<void> {
  for (const service of [RUNTIME_SERVICE, ENGINE_SERVICE]) {
    const r = await ctx.runner.execute(ctx.commands.serviceControl(service, "stop"), { allowFailure: true, duration: "quick" });
    logger.debug({ service, exitCode: r.exitCode }, "Stop requested before package install");
  }
  await ctx.sleep(ctx.settings.services.stop_grace_ms);
}

export async function deployRuntimePackage(ctx: LifecycleContext, request: DeployRequest, restart: RestartRequirement): Promise<DeployOutcome> {
  let vcRuntimeInstalled = false;
  if (ctx.commands.requiresVcRuntime) {
    await installVcRuntime(ctx, request, restart);
    vcRuntimeInstalled = true;
  }

  let artifact: AcquiredArtifact | undefined;
  try {
    artifact = await ctx.acquirer.acquire(runtimePackageArtifact(ctx), {
      offlineDirectory: request.offlineInstallationPath,
      proxy: request.proxy,
    });
    await quiesceServices(ctx);

    logger.info({ artifact: artifact.path }, "Installing runtime package");
    const r = await ctx.runner.execute(ctx.commands.packageInstall(artifact.path), {
      backoff: true,
      duration: "long_running",
      successExitCodes: [0, EXIT_REBOOT_REQUIRED],
    });
    if (r.exitCode === EXIT_REBOOT_REQUIRED) restart.require("Runtime package installation");
    if (ctx.commands.packageChangeRequiresRestart) restart.require("Package changes on this edition apply after restart");

    return { packageSource: artifact.isTemporary ? "download" : "offline", vcRuntimeInstalled };
  } finally {
    if (artifact) await ctx.acquirer.release(artifact);
  }
}
