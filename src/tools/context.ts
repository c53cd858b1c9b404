import type { InstallerSettings } from "../types/config.js";
import type { LifecycleOrchestrator } from "../lifecycle/orchestrator.js";
import type { SafetyGate } from "../safety/gate.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared server context, created once at startup and passed to all tool
 * modules.
 */
export interface ServerContext {
  readonly settings: InstallerSettings;
  readonly orchestrator: LifecycleOrchestrator;
  readonly safetyGate: SafetyGate;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
  readonly configPath: string;
  readonly firstRun: boolean;
}
