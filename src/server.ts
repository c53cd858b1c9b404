#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { hostname } from "node:os";

import { logger } from "./logger.js";
import { loadSettings, resolveHostRoots } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { defaultSleep, RetryPolicy } from "./execution/retry.js";
import { CommandRunner } from "./execution/runner.js";
import { detectHostPlatform } from "./host/detector.js";
import { createHostCommands } from "./host/commands/factory.js";
import { FullOsCommands } from "./host/commands/full-os.js";
import { resolveLayout } from "./host/layout.js";
import { HostInspector } from "./host/inspector.js";
import { HttpDownloader } from "./resources/downloader.js";
import { ResourceAcquirer } from "./resources/acquire.js";
import { LifecycleOrchestrator } from "./lifecycle/orchestrator.js";
import { SafetyGate } from "./safety/gate.js";
import { ToolRegistry } from "./tools/registry.js";
import type { ServerContext } from "./tools/context.js";
import type { ToolResponse } from "./types/response.js";

// Tool module registrations
import { registerLifecycleTools } from "./tools/lifecycle/index.js";
import { registerStatusTools } from "./tools/status/index.js";

async function main(): Promise<void> {
  logger.info("Starting edge-runtime-installer server");

  // ── Phase 1: Load settings ────────────────────────────────────
  const { settings, configPath, firstRun } = loadSettings(process.env.EDGE_INSTALLER_CONFIG);
  logger.info({ configPath, firstRun }, "Settings loaded");

  // ── Phase 2: Create executor and runner ───────────────────────
  const retry = new RetryPolicy({
    maxAttempts: settings.retry.max_attempts,
    baseDelayMs: settings.retry.base_delay_ms,
    sleep: defaultSleep,
  });
  const runner = new CommandRunner(new LocalExecutor(), retry);

  // ── Phase 3: Detect host platform ─────────────────────────────
  // Registry queries are identical on every edition.
  const platform = await detectHostPlatform(runner, new FullOsCommands(), settings.host);

  // ── Phase 4: Create command dispatch and layout ───────────────
  const commands = createHostCommands(platform);
  const layout = resolveLayout(resolveHostRoots(settings));
  logger.info({ installDir: layout.current.installDir, dataDir: layout.current.dataDir }, "Installation layout resolved");

  // ── Phase 5: Create lifecycle orchestrator ────────────────────
  const inspector = new HostInspector({ runner, commands, layout, platform });
  const acquirer = new ResourceAcquirer(new HttpDownloader(), { timeoutMs: settings.downloads.timeout_ms });
  const orchestrator = new LifecycleOrchestrator({
    settings, platform, layout, commands, runner, inspector, acquirer,
    env: process.env, sleep: defaultSleep, machineName: hostname(),
  });

  // ── Phase 6: Create safety gate, registry and server context ──
  const registry = new ToolRegistry();
  const ctx: ServerContext = {
    settings, orchestrator, registry,
    safetyGate: new SafetyGate(settings.safety),
    targetHost: hostname(), configPath, firstRun,
  };

  // ── Phase 7: Register all tool modules ────────────────────────
  registerLifecycleTools(ctx);
  registerStatusTools(ctx);
  logger.info({ toolCount: registry.size }, "All tool modules registered");

  // ── Phase 8: Create MCP server and register tools ─────────────
  const server = new McpServer({
    name: "edge-runtime-installer",
    version: "0.1.0",
  });

  for (const tool of registry.list()) {
    const meta = tool.metadata;
    const name = meta.name;
    const inputShape = meta.inputSchema instanceof z.ZodObject ? meta.inputSchema.shape : {};

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: inputShape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? meta.riskLevel === "read-only",
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        const response: ToolResponse = await tool.execute(args, { targetHost: ctx.targetHost });
        return {
          content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
        };
      },
    );
  }

  // ── Phase 9: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, host: hostname() }, "edge-runtime-installer server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
