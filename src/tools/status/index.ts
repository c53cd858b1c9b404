import { z } from "zod";
import type { ServerContext } from "../context.js";
import { registerTool, success } from "../helpers.js";

export function registerStatusTools(ctx: ServerContext): void {
  // ── edge_status ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "edge_status", description: "Report what is installed, which layout generation is active, and the configured container mode.",
    module: "status", riskLevel: "read-only", duration: "quick",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true },
  }, async (_args, execCtx) => {
    const start = Date.now();
    const status = await ctx.orchestrator.status();
    return success("edge_status", execCtx.targetHost, Date.now() - start, {
      runtime_installed: status.state.runtimeInstalled,
      engine_installed: status.state.engineInstalled,
      layout: status.state.layout,
      needs_relocation: status.needsRelocation,
      os_build: status.state.osBuild,
      edition: status.platform.edition,
      config_path: status.configPath,
      container_os: status.containerOs,
      runtime_service: status.runtimeServiceState,
      settings_path: ctx.configPath,
    });
  });

  // ── edge_logs ───────────────────────────────────────────────────
  registerTool(ctx, {
    name: "edge_logs", description: "Read the runtime's entries from the application event log, oldest first.",
    module: "status", riskLevel: "read-only", duration: "normal",
    inputSchema: z.object({
      since: z.string().datetime({ offset: true }).optional().describe("ISO 8601 start time; defaults to the configured window"),
      limit: z.number().int().min(1).max(5000).optional().default(500).describe("Most recent entries to return"),
    }),
    annotations: { readOnlyHint: true },
  }, async (args, execCtx) => {
    const start = Date.now();
    const entries = await ctx.orchestrator.logs(args.since ? new Date(args.since) : undefined);
    const shown = entries.slice(-args.limit);
    return success("edge_logs", execCtx.targetHost, Date.now() - start, {
      entries: shown.map((e) => ({ time_created: e.timeCreated.toISOString(), message: e.message })),
    }, { total: entries.length, returned: shown.length, truncated: entries.length > shown.length });
  });
}
