import type { LifecycleContext } from "./context.js";
import type { ContainerOs, HostPlatform, HostState } from "../types/host.js";
import { RUNTIME_SERVICE } from "../host/layout.js";

export interface HostStatus {
  readonly platform: HostPlatform;
  readonly state: HostState;
  readonly needsRelocation: boolean;
  readonly configPath: string | null;
  /** Container mode recorded in the config document; null when there is none. */
  readonly containerOs: ContainerOs | null;
  readonly runtimeServiceState: string | null;
}

export async function hostStatus(ctx: LifecycleContext): Promise<HostStatus> {
  const state = await ctx.inspector.inspect();
  const configPath = ctx.inspector.configDocumentPath();
  return {
    platform: ctx.platform,
    state,
    needsRelocation: ctx.inspector.needsRelocation(),
    configPath,
    containerOs: configPath ? ctx.inspector.readContainerOsFromConfig() : null,
    runtimeServiceState: state.runtimeInstalled ? await ctx.inspector.serviceState(RUNTIME_SERVICE) : null,
  };
}
