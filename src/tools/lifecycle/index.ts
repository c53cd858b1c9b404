import { z } from "zod";
import type { ServerContext } from "../context.js";
import type { Escalation } from "../../safety/gate.js";
import { registerTool, success, error } from "../helpers.js";
import { initializeArgsSchema, parseInitializeArgs } from "../../lifecycle/validate.js";
import { InstallerErrorCode } from "../../shared/errors.js";

const containerOs = z.enum(["windows", "linux"]);
const confirmed = z.boolean().optional().default(false).describe("Pass true to confirm execution after reviewing a confirmation_required response.");
const restartIfNeeded = z.boolean().optional().default(false).describe("Restart the host at the end when the change requires it");

const deployShape = {
  proxy: z.string().url().optional().describe("HTTP proxy for downloads, e.g. http://proxy:3128"),
  offline_installation_path: z.string().min(1).optional().describe("Folder holding pre-downloaded packages; checked before downloading"),
  restart_if_needed: restartIfNeeded,
  confirmed,
};

const REBOOT_ESCALATION: Escalation = { riskLevel: "high", reason: "The host will restart if the change requires it" };

export function registerLifecycleTools(ctx: ServerContext): void {
  // ── edge_install ────────────────────────────────────────────────
  registerTool(ctx, {
    name: "edge_install", description: "Install the edge runtime and its container engine on a host where neither is present. Does not configure the runtime; call edge_initialize next.",
    module: "lifecycle", riskLevel: "moderate", duration: "long_running",
    inputSchema: z.object({ container_os: containerOs.default("windows").describe("Container mode to check host compatibility for"), ...deployShape }),
    annotations: { destructiveHint: false, openWorldHint: true },
  }, async (args, execCtx) => {
    const gate = ctx.safetyGate.check({
      toolName: "edge_install", toolRiskLevel: "moderate", targetHost: execCtx.targetHost,
      description: `Install the edge runtime for ${args.container_os} containers`,
      confirmed: args.confirmed, escalations: args.restart_if_needed ? [REBOOT_ESCALATION] : [],
    });
    if (gate) return gate;
    const start = Date.now();
    const result = await ctx.orchestrator.install({
      containerOs: args.container_os, proxy: args.proxy,
      offlineInstallationPath: args.offline_installation_path, restartIfNeeded: args.restart_if_needed,
    });
    return success("edge_install", execCtx.targetHost, Date.now() - start, {
      container_os: result.containerOs, package_source: result.packageSource, endpoint_dirs: result.endpointDirs,
      restarting: result.restarting, next_step: "edge_initialize",
    }, { restart_required: result.restartRequired, warnings: result.restartReasons });
  });

  // ── edge_update ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "edge_update", description: "Update an installed edge runtime to the latest (or offline-supplied) package. Configuration is kept.",
    module: "lifecycle", riskLevel: "moderate", duration: "long_running",
    inputSchema: z.object({ container_os: containerOs.optional().describe("Defaults to the mode in the config document"), ...deployShape }),
    annotations: { destructiveHint: false, idempotentHint: true, openWorldHint: true },
  }, async (args, execCtx) => {
    const gate = ctx.safetyGate.check({
      toolName: "edge_update", toolRiskLevel: "moderate", targetHost: execCtx.targetHost,
      description: "Update the edge runtime package",
      confirmed: args.confirmed, escalations: args.restart_if_needed ? [REBOOT_ESCALATION] : [],
    });
    if (gate) return gate;
    const start = Date.now();
    const result = await ctx.orchestrator.update({
      containerOs: args.container_os, proxy: args.proxy,
      offlineInstallationPath: args.offline_installation_path, restartIfNeeded: args.restart_if_needed,
    });
    return success("edge_update", execCtx.targetHost, Date.now() - start, {
      container_os: result.containerOs, package_source: result.packageSource,
      service_started: result.serviceStarted, restarting: result.restarting,
    }, { restart_required: result.restartRequired, warnings: result.restartReasons });
  });

  // ── edge_initialize ─────────────────────────────────────────────
  registerTool(ctx, {
    name: "edge_initialize", description: "Write the runtime configuration (manual or DPS provisioning, or reuse the existing document) and start the runtime.",
    module: "lifecycle", riskLevel: "moderate", duration: "normal",
    inputSchema: initializeArgsSchema.extend({ confirmed }),
  }, async (args, execCtx) => {
    const request = parseInitializeArgs(args);
    const gate = ctx.safetyGate.check({
      toolName: "edge_initialize", toolRiskLevel: "moderate", targetHost: execCtx.targetHost,
      description: `Configure the runtime with ${request.provisioning.kind} provisioning`,
      confirmed: args.confirmed,
    });
    if (gate) return gate;
    const start = Date.now();
    const result = await ctx.orchestrator.initialize(request);
    return success("edge_initialize", execCtx.targetHost, Date.now() - start, {
      config_path: result.configPath, container_os: result.containerOs, provisioning: result.provisioning,
      fields_applied: result.fieldsApplied, host_endpoint: result.hostEndpoint, firewall_rule: result.firewallRule,
    });
  });

  // ── edge_uninstall ──────────────────────────────────────────────
  registerTool(ctx, {
    name: "edge_uninstall", description: "Remove the edge runtime, its container engine and their files. The config document is kept unless delete_config is set. High risk.",
    module: "lifecycle", riskLevel: "high", duration: "long_running",
    inputSchema: z.object({
      force: z.boolean().optional().default(false).describe("Clean up even when nothing appears installed"),
      delete_config: z.boolean().optional().default(false).describe("Also delete the config document"),
      delete_engine_data_root: z.boolean().optional().default(false).describe("Also delete container images and volumes, and every container in Windows mode"),
      restart_if_needed: restartIfNeeded,
      confirmed,
    }),
    annotations: { destructiveHint: true },
  }, async (args, execCtx) => {
    const escalations: Escalation[] = [];
    if (args.delete_engine_data_root) escalations.push({ riskLevel: "critical", reason: "All container images, volumes and containers will be deleted" });
    if (args.delete_config) escalations.push({ riskLevel: "high", reason: "The device configuration, including its credentials, will be deleted" });
    if (args.restart_if_needed) escalations.push(REBOOT_ESCALATION);
    const gate = ctx.safetyGate.check({
      toolName: "edge_uninstall", toolRiskLevel: "high", targetHost: execCtx.targetHost,
      description: "Uninstall the edge runtime and container engine",
      confirmed: args.confirmed, escalations,
    });
    if (gate) return gate;
    const start = Date.now();
    const result = await ctx.orchestrator.uninstall({
      force: args.force, deleteConfig: args.delete_config,
      deleteEngineDataRoot: args.delete_engine_data_root, restartIfNeeded: args.restart_if_needed,
    });
    const duration = Date.now() - start;
    if (!result.success) {
      return error("edge_uninstall", execCtx.targetHost, duration, {
        code: InstallerErrorCode.PARTIAL_CLEANUP_FAILURE, category: "resource",
        message: "Uninstall finished with steps that failed",
        remediation: result.guidance,
        details: { steps: result.steps, restart_required: result.restartRequired },
      });
    }
    const warnings = result.steps.filter((s) => s.outcome === "warning").map((s) => `${s.step}: ${s.detail ?? ""}`);
    return success("edge_uninstall", execCtx.targetHost, duration, {
      steps: result.steps, preserved_config: result.preservedConfig, guidance: result.guidance, restarting: result.restarting,
    }, { restart_required: result.restartRequired, warnings });
  });
}
