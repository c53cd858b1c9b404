import type { Command } from "../../types/command.js";
import type { HostEdition } from "../../types/host.js";

/** Inbound firewall rule for a program and port range. */
export interface FirewallRule {
  readonly name: string;
  readonly program: string;
  readonly localPorts: string;
  readonly protocol: "TCP" | "UDP";
}

/** Addressing for the container engine CLI. */
export interface EngineEndpoint {
  readonly cli: string;
  readonly uri: string;
}

/**
 * Per-edition capability set. Lifecycle code calls these methods to express
 * intent; implementations translate to the native tools of the edition.
 * Selected once at startup by createHostCommands().
 */
export interface HostCommands {
  readonly edition: HostEdition;
  /** Package servicing on this edition only takes effect after a reboot. */
  readonly packageChangeRequiresRestart: boolean;
  /** Optional OS features (Containers) can be queried and toggled. */
  readonly supportsOptionalFeatures: boolean;
  /** The VC++ runtime must be installed alongside the runtime package. */
  readonly requiresVcRuntime: boolean;

  // Platform
  registryQuery(key: string, value: string): Command;
  restartHost(): Command;
  gatewayAddressQuery(): Command;

  // Package management
  packageInstall(artifactPath: string): Command;
  packageList(): Command;
  packageRemove(packageName: string): Command;
  vcRuntimeInstall(installerPath: string): Command;

  // Optional features
  featureStatus(feature: string): Command;
  featureEnable(feature: string): Command;

  // Service management
  serviceQuery(service: string): Command;
  serviceControl(service: string, action: "start" | "stop"): Command;
  serviceDisable(service: string): Command;
  serviceDelete(service: string): Command;

  // Filesystem permissions
  grantModify(path: string): Command;

  // Machine environment
  machineEnvironmentQuery(name: string): Command;
  machineEnvironmentSet(name: string, value: string): Command;
  machineEnvironmentDelete(name: string): Command;

  // Firewall
  firewallAddRule(rule: FirewallRule): Command;
  firewallRemoveRule(name: string): Command;

  // Container engine
  containerList(engine: EngineEndpoint, filter?: { label?: string }): Command;
  containerRemove(engine: EngineEndpoint, ids: string[]): Command;

  // Event log
  providerEvents(provider: string, since: Date): Command;
}
