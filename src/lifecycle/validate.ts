// Initialize request validation. Runs before any host mutation; every
// rejection is a VALIDATION_ERROR naming the offending input.
import { z } from "zod";
import type { AgentImageSpec, InitializeRequest, ProvisioningSpec, RegistryCredential } from "../types/request.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";

const nonEmpty = z.string().trim().min(1);
/** Credentials are kept byte for byte; only an all-blank value is rejected. */
const credentialPart = z.string().min(1).refine((v) => v.trim().length > 0, "must not be blank");

/** Flat operator input for Initialize, as accepted by the edge_initialize tool. */
export const initializeArgsSchema = z.object({
  container_os: z.enum(["windows", "linux"]).default("windows").describe("Container mode the runtime manages"),
  provisioning: z.enum(["manual", "dps", "existing"]).describe("manual: connection string; dps: device provisioning service; existing: reuse the config document on disk"),
  device_connection_string: nonEmpty.optional().describe("Device connection string (manual provisioning)"),
  scope_id: nonEmpty.optional().describe("DPS ID scope (dps provisioning)"),
  registration_id: nonEmpty.optional().describe("DPS registration id (dps provisioning)"),
  agent_image: nonEmpty.optional().describe("Agent image to run instead of the template's"),
  registry_host: nonEmpty.optional().describe("Registry for the credentials; defaults to the agent image's registry prefix"),
  username: credentialPart.optional().describe("Registry username (requires password and agent_image)"),
  password: credentialPart.optional().describe("Registry password (requires username and agent_image)"),
  hostname: nonEmpty.optional().describe("Device hostname; defaults to the lower-cased machine name"),
});

export type InitializeArgs = z.output<typeof initializeArgsSchema>;

function invalid(message: string, field: string): InstallerError {
  return new InstallerError(InstallerErrorCode.VALIDATION_ERROR, message, { field });
}

/** Registry part of an image reference: the text before the first "/" when it names a host. */
export function registryHostOf(image: string): string | null {
  const slash = image.indexOf("/");
  if (slash <= 0) return null;
  const head = image.slice(0, slash);
  return head.includes(".") || head.includes(":") || head === "localhost" ? head : null;
}

function buildProvisioning(args: InitializeArgs): ProvisioningSpec {
  const given = (names: (keyof InitializeArgs)[]): string[] => names.filter((n) => args[n] !== undefined);

  switch (args.provisioning) {
    case "manual": {
      const foreign = given(["scope_id", "registration_id"]);
      if (foreign.length) throw invalid(`Manual provisioning does not take ${foreign.join(", ")}`, foreign.join(","));
      if (!args.device_connection_string) throw invalid("Manual provisioning requires device_connection_string", "device_connection_string");
      return { kind: "manual", deviceConnectionString: args.device_connection_string };
    }
    case "dps": {
      const foreign = given(["device_connection_string"]);
      if (foreign.length) throw invalid("DPS provisioning does not take device_connection_string", "device_connection_string");
      if (!args.scope_id) throw invalid("DPS provisioning requires scope_id", "scope_id");
      if (!args.registration_id) throw invalid("DPS provisioning requires registration_id", "registration_id");
      return { kind: "dps", scopeId: args.scope_id, registrationId: args.registration_id };
    }
    case "existing": {
      const foreign = given(["device_connection_string", "scope_id", "registration_id", "agent_image", "registry_host", "username", "password", "hostname"]);
      if (foreign.length) {
        throw invalid(`Reusing the existing configuration does not take ${foreign.join(", ")}`, foreign.join(","));
      }
      return { kind: "existing" };
    }
  }
}

function buildAgent(args: InitializeArgs): AgentImageSpec | undefined {
  const hasUser = args.username !== undefined;
  const hasPassword = args.password !== undefined;
  if (hasUser !== hasPassword) {
    throw invalid("username and password must be given together", hasUser ? "password" : "username");
  }
  if (!args.agent_image) {
    if (hasUser) throw invalid("Registry credentials require agent_image", "agent_image");
    if (args.registry_host) throw invalid("registry_host requires agent_image and credentials", "registry_host");
    return undefined;
  }
  if (!hasUser) {
    if (args.registry_host) throw invalid("registry_host requires username and password", "registry_host");
    return { image: args.agent_image };
  }

  const registryHost = args.registry_host ?? registryHostOf(args.agent_image);
  if (!registryHost) {
    throw invalid(`Cannot derive a registry from image '${args.agent_image}'; pass registry_host`, "registry_host");
  }
  const credential: RegistryCredential = { registryHost, username: args.username ?? "", password: args.password ?? "" };
  return { image: args.agent_image, credential };
}

/** Turn flat operator input into a typed InitializeRequest. */
export function parseInitializeArgs(input: unknown): InitializeRequest {
  const parsed = initializeArgsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InstallerError(
      InstallerErrorCode.VALIDATION_ERROR,
      issue ? `${issue.path.join(".") || "input"}: ${issue.message}` : "Invalid Initialize input",
      { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
    );
  }
  const args = parsed.data;
  const provisioning = buildProvisioning(args);
  return {
    containerOs: args.container_os,
    provisioning,
    agent: buildAgent(args),
    hostname: args.hostname,
  };
}

/** Checks for requests built in code rather than through parseInitializeArgs. */
export function assertInitializeRequest(request: InitializeRequest): void {
  const blank = (v: string): boolean => v.trim().length === 0;
  const p = request.provisioning;
  if (p.kind === "manual" && blank(p.deviceConnectionString)) {
    throw invalid("Manual provisioning requires a device connection string", "device_connection_string");
  }
  if (p.kind === "dps" && (blank(p.scopeId) || blank(p.registrationId))) {
    throw invalid("DPS provisioning requires scope id and registration id", blank(p.scopeId) ? "scope_id" : "registration_id");
  }
  if (p.kind === "existing" && (request.agent || request.hostname !== undefined)) {
    throw invalid("Reusing the existing configuration takes no agent or hostname settings", request.agent ? "agent_image" : "hostname");
  }
  if (request.hostname !== undefined && blank(request.hostname)) {
    throw invalid("hostname must not be empty", "hostname");
  }
  const credential = request.agent?.credential;
  if (request.agent && blank(request.agent.image)) throw invalid("agent image must not be empty", "agent_image");
  if (credential && (blank(credential.username) || blank(credential.password) || blank(credential.registryHost))) {
    throw invalid("Registry credentials need registry host, username and password", "username");
  }
}
