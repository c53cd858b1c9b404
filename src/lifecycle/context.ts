import type { InstallerSettings } from "../types/config.js";
import type { HostPlatform } from "../types/host.js";
import type { HostCommands } from "../host/commands/interface.js";
import type { InstallationLayout } from "../host/layout.js";
import type { HostInspector } from "../host/inspector.js";
import type { CommandRunner } from "../execution/runner.js";
import type { Sleep } from "../execution/retry.js";
import type { ResourceAcquirer } from "../resources/acquire.js";

/**
 * Everything a lifecycle transition needs, resolved once at startup.
 * Tests build one over a fake executor and a temp-dir layout.
 */
export interface LifecycleContext {
  readonly settings: InstallerSettings;
  readonly platform: HostPlatform;
  readonly layout: InstallationLayout;
  readonly commands: HostCommands;
  readonly runner: CommandRunner;
  readonly inspector: HostInspector;
  readonly acquirer: ResourceAcquirer;
  /** Environment of this process; search-path and host-variable changes are mirrored here. */
  readonly env: NodeJS.ProcessEnv;
  readonly sleep: Sleep;
  /** Machine name, the default device hostname. */
  readonly machineName: string;
  /** Overrides the bundled config template. */
  readonly templatePath?: string;
}
