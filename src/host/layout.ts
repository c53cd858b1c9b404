// Installation layout: the two generations of paths produced by successive
// installer versions. Everything here is pure path arithmetic over the host
// roots, so tests can point the whole layout at a temp directory.
import path from "node:path";
import type { LayoutGeneration } from "../types/host.js";

export const RUNTIME_SERVICE = "iotedge";
export const ENGINE_SERVICE = "iotedge-moby";
export const RUNTIME_BINARY = "iotedged.exe";
export const ENGINE_CLI = "docker.exe";
export const CONFIG_FILE = "config.yaml";
export const PACKAGE_NAME_PREFIX = "Microsoft-Azure-IoTEdge";
export const HOST_ENV_VARIABLE = "IOTEDGE_HOST";
export const FIREWALL_RULE_NAME = "iotedged allow inbound 15580,15581";
export const FIREWALL_PORT_RANGE = "15580-15581";
export const AGENT_CONTAINER_NAME = "edgeAgent";
/** Label the agent puts on every module container it creates. */
export const CONTAINER_OWNER_LABEL = "net.azure-devices.edge.owner=Microsoft.Azure.Devices.Edge.Agent";

export interface HostRoots {
  readonly programFiles: string;
  readonly programData: string;
  readonly systemDrive: string;
}

/** Paths owned by one layout generation. */
export interface GenerationPaths {
  readonly installDir: string;
  readonly engineInstallDir: string;
  /** Engine client shipped in the engine install dir. */
  readonly engineCli: string;
  readonly runtimeBinary: string;
  readonly configPath: string;
  /** Every engine data root this generation may have written. */
  readonly engineDataRoots: readonly string[];
}

export interface CurrentGeneration extends GenerationPaths {
  readonly dataDir: string;
  readonly engineDataRoot: string;
}

export interface LegacyGeneration extends GenerationPaths {
  /** Data root under the ProgramData the installer saw at run time. */
  readonly dynamicEngineDataRoot: string;
  /** Data root hard-coded to the system drive by the oldest installers. */
  readonly staticEngineDataRoot: string;
}

export interface InstallationLayout {
  readonly roots: HostRoots;
  readonly current: CurrentGeneration;
  readonly legacy: LegacyGeneration;
}

function driveRoot(systemDrive: string): string {
  // "C:" alone is drive-relative on Windows; anchor it.
  return /^[A-Za-z]:$/.test(systemDrive) ? systemDrive + path.sep : systemDrive;
}

export function resolveLayout(roots: HostRoots): InstallationLayout {
  const dataDir = path.join(roots.programData, "iotedge");
  const currentInstall = path.join(roots.programFiles, "iotedge");
  const currentEngineInstall = path.join(roots.programFiles, "iotedge-moby");
  const engineDataRoot = path.join(roots.programData, "iotedge-moby");
  const legacyInstall = path.join(roots.programData, "iotedge");
  // Same directory as the current engine data root.
  const legacyEngineInstall = path.join(roots.programData, "iotedge-moby");
  const dynamicEngineDataRoot = path.join(roots.programData, "iotedge-moby-data");
  const staticEngineDataRoot = path.join(driveRoot(roots.systemDrive), "ProgramData", "iotedge-moby-data");

  return {
    roots,
    current: {
      installDir: currentInstall,
      engineInstallDir: currentEngineInstall,
      engineCli: path.join(currentEngineInstall, ENGINE_CLI),
      runtimeBinary: path.join(currentInstall, RUNTIME_BINARY),
      dataDir,
      configPath: path.join(dataDir, CONFIG_FILE),
      engineDataRoot,
      engineDataRoots: [engineDataRoot],
    },
    legacy: {
      installDir: legacyInstall,
      engineInstallDir: legacyEngineInstall,
      engineCli: path.join(legacyEngineInstall, ENGINE_CLI),
      runtimeBinary: path.join(legacyInstall, RUNTIME_BINARY),
      configPath: path.join(legacyInstall, CONFIG_FILE),
      dynamicEngineDataRoot,
      staticEngineDataRoot,
      engineDataRoots: [...new Set([dynamicEngineDataRoot, staticEngineDataRoot])],
    },
  };
}

/** Paths the lifecycle code should use for a detected generation. */
export function activeGeneration(layout: InstallationLayout, generation: LayoutGeneration): GenerationPaths {
  return generation === "legacy" ? layout.legacy : layout.current;
}

/** Install directories of every generation, for search-path cleanup. */
export function allInstallDirs(layout: InstallationLayout): string[] {
  return [...new Set([
    layout.current.installDir,
    layout.current.engineInstallDir,
    layout.legacy.installDir,
    layout.legacy.engineInstallDir,
  ])];
}

/** Engine endpoint per container mode: the bundled engine, or the external Linux-container engine. */
export const ENGINE_URIS = {
  windows: "npipe://./pipe/iotedge_moby_engine",
  linux: "npipe://./pipe/docker_engine",
} as const;

export const ENGINE_NETWORKS = {
  windows: "nat",
  linux: "azure-iot-edge",
} as const;
