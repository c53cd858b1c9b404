// Initialize: Installed(NoConfig) -> Ready. Materialises the config
// document, wires the search path and host variable, starts the runtime.
import { parse as parseYaml } from "yaml";
import type { LifecycleContext } from "./context.js";
import type { InitializeRequest } from "../types/request.js";
import type { ContainerOs } from "../types/host.js";
import type { FieldId } from "../document/fields.js";
import { assertInitializeRequest } from "./validate.js";
import { assertCompatible } from "./install.js";
import { addToSearchPath } from "./search-path.js";
import { buildRuntimeSettings, renderPatches } from "../document/model.js";
import { applyAndSave, loadDocument, readTemplate } from "../document/store.js";
import {
  activeGeneration,
  FIREWALL_PORT_RANGE,
  FIREWALL_RULE_NAME,
  HOST_ENV_VARIABLE,
  RUNTIME_SERVICE,
} from "../host/layout.js";
import { parseIpv4, SC_SERVICE_ALREADY_RUNNING } from "../host/commands/parse.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface InitializeResult {
  readonly configPath: string;
  readonly containerOs: ContainerOs;
  readonly provisioning: InitializeRequest["provisioning"]["kind"];
  readonly fieldsApplied: FieldId[];
  /** Value written to the host variable, when one could be determined. */
  readonly hostEndpoint: string | null;
  readonly firewallRule: string | null;
}

/** connect.management_uri of a persisted document, or null. */
export function managementUriOf(text: string): string | null {
  try {
    const doc: unknown = parseYaml(text);
    if (typeof doc !== "object" || doc === null) return null;
    const connect: unknown = Reflect.get(doc, "connect");
    if (typeof connect !== "object" || connect === null) return null;
    const uri: unknown = Reflect.get(connect, "management_uri");
    return typeof uri === "string" && !uri.startsWith("<") ? uri : null;
  } catch {
    return null;
  }
}

async function resolveGatewayAddress(ctx: LifecycleContext): Promise<string> {
  const r = await ctx.runner.execute(ctx.commands.gatewayAddressQuery(), { allowFailure: true, duration: "quick" });
  const address = r.succeeded ? parseIpv4(r.stdout) : null;
  if (!address) {
    throw new InstallerError(
      InstallerErrorCode.PRECONDITION_VIOLATION,
      "No address found for the Linux container engine network. Install and start the Linux container engine first.",
      { exitCode: r.exitCode, output: r.output },
    );
  }
  return address;
}

export async function initialize(ctx: LifecycleContext, request: InitializeRequest): Promise<InitializeResult> {
  assertInitializeRequest(request);

  const state = await ctx.inspector.inspect();
  if (!state.runtimeInstalled || !state.engineInstalled) {
    throw new InstallerError(
      InstallerErrorCode.PRECONDITION_VIOLATION,
      "The runtime is not installed. Run Install before Initialize.",
      { runtimeInstalled: state.runtimeInstalled, engineInstalled: state.engineInstalled },
    );
  }

  const existingPath = ctx.inspector.configDocumentPath();
  const reuse = request.provisioning.kind === "existing";
  if (reuse && !existingPath) {
    throw new InstallerError(InstallerErrorCode.PRECONDITION_VIOLATION, "There is no existing configuration to reuse. Choose manual or dps provisioning.");
  }
  if (!reuse && existingPath) {
    throw new InstallerError(
      InstallerErrorCode.PRECONDITION_VIOLATION,
      "The runtime is already configured. Reuse the configuration with existing provisioning, or Uninstall with delete_config first.",
      { configPath: existingPath },
    );
  }

  const containerOs = reuse ? ctx.inspector.readContainerOsFromConfig() : request.containerOs;
  if (reuse && containerOs !== request.containerOs) {
    logger.warn({ requested: request.containerOs, configured: containerOs }, "Using the container mode recorded in the existing configuration");
  }
  assertCompatible(ctx, containerOs);

  const generation = activeGeneration(ctx.layout, state.layout);
  const configPath = existingPath ?? ctx.layout.current.configPath;
  let fieldsApplied: FieldId[] = [];
  let hostEndpoint: string | null;

  if (request.provisioning.kind === "existing") {
    logger.info({ configPath }, "Reusing existing configuration");
    hostEndpoint = managementUriOf((await loadDocument(configPath)).text);
  } else {
    const gatewayAddress = containerOs === "linux" ? await resolveGatewayAddress(ctx) : undefined;
    const settings = buildRuntimeSettings({
      containerOs,
      provisioning: request.provisioning,
      agent: request.agent,
      hostname: request.hostname ?? ctx.machineName.toLowerCase(),
      dataDir: ctx.layout.current.dataDir,
      gatewayAddress,
    });
    const template = await readTemplate(ctx.templatePath);
    const saved = await applyAndSave(configPath, template, renderPatches(settings));
    fieldsApplied = [...saved.fields];
    hostEndpoint = settings.connect.managementUri;
    logger.info({ configPath, provisioning: request.provisioning.kind, containerOs }, "Configuration written");
  }

  await addToSearchPath(ctx, [generation.installDir, generation.engineInstallDir]);

  if (hostEndpoint) {
    await ctx.runner.execute(ctx.commands.machineEnvironmentSet(HOST_ENV_VARIABLE, hostEndpoint), { duration: "instant" });
    ctx.env[HOST_ENV_VARIABLE] = hostEndpoint;
  } else {
    logger.warn({ configPath }, "No management endpoint in configuration; host variable not set");
  }

  await ctx.runner.execute(ctx.commands.serviceControl(RUNTIME_SERVICE, "start"), {
    backoff: true,
    duration: "quick",
    successExitCodes: [0, SC_SERVICE_ALREADY_RUNNING],
  });
  logger.info({ service: RUNTIME_SERVICE }, "Runtime service started");

  let firewallRule: string | null = null;
  if (containerOs === "linux") {
    // netsh adds duplicates rather than replacing; drop any earlier copy first.
    await ctx.runner.execute(ctx.commands.firewallRemoveRule(FIREWALL_RULE_NAME), { allowFailure: true, duration: "quick" });
    await ctx.runner.execute(ctx.commands.firewallAddRule({
      name: FIREWALL_RULE_NAME,
      program: generation.runtimeBinary,
      localPorts: FIREWALL_PORT_RANGE,
      protocol: "TCP",
    }), { duration: "quick" });
    firewallRule = FIREWALL_RULE_NAME;
  }

  return { configPath, containerOs, provisioning: request.provisioning.kind, fieldsApplied, hostEndpoint, firewallRule };
}
