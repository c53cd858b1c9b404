// Host State Inspector: a read-only projection over services, package records
// and filesystem paths. Nothing here mutates the host or caches results;
// every call re-reads the OS.
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { ContainerOs, HostPlatform, HostState, LayoutGeneration } from "../types/host.js";
import { MIN_BUILD_FOR_LINUX_CONTAINERS, SUPPORTED_BUILDS_FOR_WINDOWS_CONTAINERS } from "../types/host.js";
import type { CommandRunner } from "../execution/runner.js";
import type { HostCommands } from "./commands/interface.js";
import { parsePackageNames, parseServiceState, SC_SERVICE_DOES_NOT_EXIST } from "./commands/parse.js";
import type { ServiceState } from "./commands/parse.js";
import type { InstallationLayout } from "./layout.js";
import { ENGINE_SERVICE, ENGINE_URIS, PACKAGE_NAME_PREFIX, RUNTIME_SERVICE } from "./layout.js";
import { logger } from "../logger.js";

/** Linux containers need a minimum build; Windows containers need an exact supported build. */
export function checkOsCompatibility(containerOs: ContainerOs, currentBuild: number): boolean {
  return containerOs === "linux"
    ? currentBuild >= MIN_BUILD_FOR_LINUX_CONTAINERS
    : SUPPORTED_BUILDS_FOR_WINDOWS_CONTAINERS.includes(currentBuild);
}

export interface InspectorDeps {
  readonly runner: CommandRunner;
  readonly commands: HostCommands;
  readonly layout: InstallationLayout;
  readonly platform: HostPlatform;
}

export class HostInspector {
  constructor(private readonly deps: InspectorDeps) {}

  async isServiceRegistered(service: string): Promise<boolean> {
    const r = await this.deps.runner.execute(this.deps.commands.serviceQuery(service), { allowFailure: true, duration: "instant" });
    if (r.exitCode === SC_SERVICE_DOES_NOT_EXIST) return false;
    if (!r.succeeded) {
      logger.warn({ service, exitCode: r.exitCode }, "Service query failed, treating service as unregistered");
    }
    return r.succeeded;
  }

  async serviceState(service: string): Promise<ServiceState | null> {
    const r = await this.deps.runner.execute(this.deps.commands.serviceQuery(service), { allowFailure: true, duration: "instant" });
    return r.succeeded ? parseServiceState(r.stdout) : null;
  }

  /** Identities of installed runtime package records; empty when none or when the query fails. */
  async runtimePackages(): Promise<string[]> {
    const r = await this.deps.runner.execute(this.deps.commands.packageList(), { allowFailure: true, duration: "slow" });
    if (!r.succeeded) {
      logger.warn({ exitCode: r.exitCode }, "Package query failed, assuming no package record");
      return [];
    }
    return parsePackageNames(r.stdout, PACKAGE_NAME_PREFIX);
  }

  async isRuntimeInstalled(): Promise<boolean> {
    if (await this.isServiceRegistered(RUNTIME_SERVICE)) return true;
    return this.runtimeFilesPresent();
  }

  async isEngineInstalled(): Promise<boolean> {
    if (await this.isServiceRegistered(ENGINE_SERVICE)) return true;
    const { current, legacy } = this.deps.layout;
    // The legacy engine dir doubles as the current data root, which outlives the engine.
    return existsSync(current.engineInstallDir) || existsSync(legacy.engineCli);
  }

  runtimeFilesPresent(): boolean {
    const { current, legacy } = this.deps.layout;
    return existsSync(current.runtimeBinary) || existsSync(legacy.runtimeBinary);
  }

  /**
   * Legacy indicators take precedence: leftover legacy artifacts must be
   * cleaned up before current-layout operations are trusted.
   */
  async detectLayout(): Promise<LayoutGeneration> {
    const { legacy } = this.deps.layout;
    const legacyDataRoot = legacy.engineDataRoots.some((p) => existsSync(p));
    if (legacyDataRoot) return "legacy";

    const packageRecorded = (await this.runtimePackages()).length > 0;
    if (!packageRecorded && this.runtimeFilesPresent()) return "legacy";
    return packageRecorded ? "current" : "none";
  }

  /** A move is needed when the old static data root is not where ProgramData now points. */
  needsRelocation(): boolean {
    const { staticEngineDataRoot, dynamicEngineDataRoot } = this.deps.layout.legacy;
    return path.resolve(staticEngineDataRoot).toLowerCase() !== path.resolve(dynamicEngineDataRoot).toLowerCase()
      && existsSync(staticEngineDataRoot);
  }

  /** Path of the persisted config document, preferring the current generation. */
  configDocumentPath(): string | null {
    const { current, legacy } = this.deps.layout;
    if (existsSync(current.configPath)) return current.configPath;
    if (existsSync(legacy.configPath)) return legacy.configPath;
    return null;
  }

  /**
   * Best-effort inference of the configured container mode from the engine
   * URI in the config document. Never throws; defaults to windows.
   */
  readContainerOsFromConfig(): ContainerOs {
    const configPath = this.configDocumentPath();
    if (!configPath) return "windows";
    try {
      const doc: unknown = parseYaml(readFileSync(configPath, "utf-8"));
      const uri = readEngineUri(doc);
      return uri !== null && uri.toLowerCase() === ENGINE_URIS.linux ? "linux" : "windows";
    } catch (err) {
      logger.debug({ configPath, error: err instanceof Error ? err.message : String(err) }, "Config document unreadable, assuming windows containers");
      return "windows";
    }
  }

  async inspect(): Promise<HostState> {
    const runtimeInstalled = await this.isRuntimeInstalled();
    const engineInstalled = await this.isEngineInstalled();
    const layout = await this.detectLayout();
    const state: HostState = {
      runtimeInstalled,
      engineInstalled,
      layout,
      osBuild: this.deps.platform.build,
      isConstrainedOs: this.deps.platform.edition === "constrained",
    };
    logger.debug({ state }, "Host state inspected");
    return state;
  }
}

function readEngineUri(doc: unknown): string | null {
  if (typeof doc !== "object" || doc === null) return null;
  const runtime: unknown = Reflect.get(doc, "moby_runtime");
  if (typeof runtime !== "object" || runtime === null) return null;
  const uri: unknown = Reflect.get(runtime, "uri");
  return typeof uri === "string" ? uri : null;
}
