// Typed model of the runtime config document. Lifecycle code fills an
// EdgeRuntimeSettings value; only renderPatches() knows the YAML text shape.
import path from "node:path";
import type { ContainerOs } from "../types/host.js";
import type { AgentImageSpec, ProvisioningSpec } from "../types/request.js";
import { AGENT_CONTAINER_NAME, ENGINE_NETWORKS, ENGINE_URIS } from "../host/layout.js";
import type { FieldPatch } from "./fields.js";

export const DPS_GLOBAL_ENDPOINT = "https://global.azure-devices-provisioning.net";
export const MANAGEMENT_PORT = 15580;
export const WORKLOAD_PORT = 15581;

export interface EndpointPair {
  readonly managementUri: string;
  readonly workloadUri: string;
}

export type ProvisioningSettings =
  | { readonly source: "manual"; readonly deviceConnectionString: string }
  | { readonly source: "dps"; readonly globalEndpoint: string; readonly scopeId: string; readonly registrationId: string };

export interface EdgeRuntimeSettings {
  readonly provisioning: ProvisioningSettings;
  /** Absent keeps the agent section of the template. */
  readonly agent?: AgentImageSpec;
  readonly hostname: string;
  readonly connect: EndpointPair;
  readonly listen: EndpointPair;
  readonly homedir: string;
  readonly engine: { readonly uri: string; readonly network: string };
}

export interface SettingsInput {
  readonly containerOs: ContainerOs;
  readonly provisioning: Exclude<ProvisioningSpec, { kind: "existing" }>;
  readonly agent?: AgentImageSpec;
  readonly hostname: string;
  readonly dataDir: string;
  /** Host address reachable from Linux containers; required for that mode. */
  readonly gatewayAddress?: string;
}

/** unix:// URI for a Windows path, e.g. C:\ProgramData\iotedge\mgmt\sock -> unix:///C:/ProgramData/iotedge/mgmt/sock */
export function toUnixUri(filePath: string): string {
  return "unix:///" + filePath.replace(/\\/g, "/").replace(/^\/+/, "");
}

export function buildRuntimeSettings(input: SettingsInput): EdgeRuntimeSettings {
  const provisioning: ProvisioningSettings = input.provisioning.kind === "manual"
    ? { source: "manual", deviceConnectionString: input.provisioning.deviceConnectionString }
    : {
      source: "dps",
      globalEndpoint: DPS_GLOBAL_ENDPOINT,
      scopeId: input.provisioning.scopeId,
      registrationId: input.provisioning.registrationId,
    };

  let connect: EndpointPair;
  let listen: EndpointPair;
  if (input.containerOs === "windows") {
    // Windows containers reach the runtime through sockets bind-mounted from the data dir.
    const sockets: EndpointPair = {
      managementUri: toUnixUri(path.join(input.dataDir, "mgmt", "sock")),
      workloadUri: toUnixUri(path.join(input.dataDir, "workload", "sock")),
    };
    connect = sockets;
    listen = sockets;
  } else {
    const gateway = input.gatewayAddress ?? "127.0.0.1";
    connect = {
      managementUri: `http://${gateway}:${MANAGEMENT_PORT}`,
      workloadUri: `http://${gateway}:${WORKLOAD_PORT}`,
    };
    listen = {
      managementUri: `http://0.0.0.0:${MANAGEMENT_PORT}`,
      workloadUri: `http://0.0.0.0:${WORKLOAD_PORT}`,
    };
  }

  return {
    provisioning,
    agent: input.agent,
    hostname: input.hostname,
    connect,
    listen,
    homedir: input.dataDir,
    engine: { uri: ENGINE_URIS[input.containerOs], network: ENGINE_NETWORKS[input.containerOs] },
  };
}

const q = (value: string): string => JSON.stringify(value);

function renderProvisioning(p: ProvisioningSettings): string[] {
  if (p.source === "manual") {
    return [
      "provisioning:",
      `  source: ${q("manual")}`,
      `  device_connection_string: ${q(p.deviceConnectionString)}`,
    ];
  }
  return [
    "provisioning:",
    `  source: ${q("dps")}`,
    `  global_endpoint: ${q(p.globalEndpoint)}`,
    `  scope_id: ${q(p.scopeId)}`,
    `  registration_id: ${q(p.registrationId)}`,
  ];
}

function renderAgent(agent: AgentImageSpec): string[] {
  const lines = [
    "agent:",
    `  name: ${q(AGENT_CONTAINER_NAME)}`,
    `  type: ${q("docker")}`,
    "  env: {}",
    "  config:",
    `    image: ${q(agent.image)}`,
  ];
  if (agent.credential) {
    lines.push(
      "    auth:",
      `      serveraddress: ${q(agent.credential.registryHost)}`,
      `      username: ${q(agent.credential.username)}`,
      `      password: ${q(agent.credential.password)}`,
    );
  } else {
    lines.push("    auth: {}");
  }
  return lines;
}

function renderEndpoints(section: "connect" | "listen", pair: EndpointPair): string[] {
  return [
    `${section}:`,
    `  management_uri: ${q(pair.managementUri)}`,
    `  workload_uri: ${q(pair.workloadUri)}`,
  ];
}

/** Field patches for a settings value, in document order. */
export function renderPatches(settings: EdgeRuntimeSettings): FieldPatch[] {
  const patches: FieldPatch[] = [
    { field: "provisioning", lines: renderProvisioning(settings.provisioning) },
  ];
  if (settings.agent) patches.push({ field: "agent", lines: renderAgent(settings.agent) });
  patches.push(
    { field: "hostname", lines: [`hostname: ${q(settings.hostname)}`] },
    { field: "connect", lines: renderEndpoints("connect", settings.connect) },
    { field: "listen", lines: renderEndpoints("listen", settings.listen) },
    { field: "homedir", lines: [`homedir: ${q(settings.homedir)}`] },
    { field: "engine_uri", lines: [`  uri: ${q(settings.engine.uri)}`] },
    { field: "engine_network", lines: [`  network: ${q(settings.engine.network)}`] },
  );
  return patches;
}
