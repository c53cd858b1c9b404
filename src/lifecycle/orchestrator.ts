// Lifecycle Orchestrator: the single entry point for state transitions.
// Each operation inspects the host afresh, so a transition interrupted by a
// reboot can simply be run again.
import type { LifecycleContext } from "./context.js";
import type { DeployRequest, InitializeRequest, UninstallRequest, UpdateRequest } from "../types/request.js";
import type { InstallResult } from "./install.js";
import type { UpdateResult } from "./update.js";
import type { InitializeResult } from "./initialize.js";
import type { UninstallResult } from "./uninstall.js";
import type { HostStatus } from "./status.js";
import type { ProviderLogEntry } from "../logs/provider-logs.js";
import { install } from "./install.js";
import { update } from "./update.js";
import { initialize } from "./initialize.js";
import { uninstall } from "./uninstall.js";
import { hostStatus } from "./status.js";
import { getProviderLogs } from "../logs/provider-logs.js";

export class LifecycleOrchestrator {
  constructor(readonly ctx: LifecycleContext) {}

  install(request: DeployRequest): Promise<InstallResult> {
    return install(this.ctx, request);
  }

  update(request: UpdateRequest = {}): Promise<UpdateResult> {
    return update(this.ctx, request);
  }

  initialize(request: InitializeRequest): Promise<InitializeResult> {
    return initialize(this.ctx, request);
  }

  uninstall(request: UninstallRequest = {}): Promise<UninstallResult> {
    return uninstall(this.ctx, request);
  }

  status(): Promise<HostStatus> {
    return hostStatus(this.ctx);
  }

  logs(since?: Date): Promise<ProviderLogEntry[]> {
    return getProviderLogs(this.ctx, since);
  }
}
