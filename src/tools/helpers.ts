import type { z } from "zod";
import type { ServerContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata, ExecutionContext } from "../types/tool.js";
import { InstallerErrorCode, isInstallerError } from "../shared/errors.js";
import { logger } from "../logger.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; transient?: boolean; remediation?: string[]; details?: Record<string, unknown> }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    transient: opts.transient ?? false,
    remediation: opts.remediation ?? [],
    details: opts.details,
  };
}

// ── Error Categorization ───────────────────────────────────────────

interface Categorized {
  category: ErrorCategory;
  transient: boolean;
  remediation: string[];
}

interface OutputPattern extends Categorized {
  test: (output: string) => boolean;
}

/** Native tool output patterns, checked against the lower-cased output of a failed command. */
const OUTPUT_PATTERNS: OutputPattern[] = [
  { test: (s) => s.includes("access is denied") || s.includes("elevated permissions") || s.includes("error: 740"),
    category: "privilege", transient: false,
    remediation: ["Run the installer from an elevated (administrator) session"] },
  { test: (s) => s.includes("timed out") || s.includes("timeout"),
    category: "timeout", transient: true,
    remediation: ["The command did not finish in time; run the operation again"] },
  { test: (s) => s.includes("there is not enough space") || s.includes("0x80070070"),
    category: "resource", transient: false,
    remediation: ["Free disk space on the system drive and retry"] },
  { test: (s) => s.includes("pending") && s.includes("restart"),
    category: "state", transient: false,
    remediation: ["A restart is pending from an earlier change; restart the host and retry"] },
];

const CODE_CATEGORIES: Record<InstallerErrorCode, Categorized> = {
  [InstallerErrorCode.PRECONDITION_VIOLATION]: { category: "state", transient: false,
    remediation: ["Run edge_status to see what is installed and configured"] },
  [InstallerErrorCode.VALIDATION_ERROR]: { category: "validation", transient: false,
    remediation: ["Correct the named input and call the tool again"] },
  [InstallerErrorCode.EXTERNAL_COMMAND_FAILED]: { category: "state", transient: false,
    remediation: ["Review the command output in details", "Run edge_logs to read the runtime's own log"] },
  [InstallerErrorCode.PATCH_NOT_APPLIED]: { category: "state", transient: false,
    remediation: ["The config document no longer has the expected sections; fix it by hand or Uninstall with delete_config"] },
  [InstallerErrorCode.CONFIG_MALFORMED]: { category: "validation", transient: false,
    remediation: ["Check the supplied values for characters that break YAML"] },
  [InstallerErrorCode.RESOURCE_UNAVAILABLE]: { category: "network", transient: true,
    remediation: ["Check connectivity or the proxy setting", "Or place the artifacts in a folder and pass offline_installation_path"] },
  [InstallerErrorCode.PARTIAL_CLEANUP_FAILURE]: { category: "resource", transient: false,
    remediation: ["Restart the host, then run edge_uninstall again with force"] },
  [InstallerErrorCode.UNSUPPORTED_HOST]: { category: "not_found", transient: false,
    remediation: ["Use a supported OS build, or the other container mode"] },
};

export function categorizeOutput(output: string): Categorized | null {
  const lower = output.toLowerCase();
  for (const p of OUTPUT_PATTERNS) {
    if (p.test(lower)) return { category: p.category, transient: p.transient, remediation: p.remediation };
  }
  return null;
}

/** Map a thrown error to an ErrorResponse. Unknown errors become INTERNAL_ERROR. */
export function fromError(tool: string, targetHost: string, durationMs: number, err: unknown): ErrorResponse {
  if (!isInstallerError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return error(tool, targetHost, durationMs, {
      code: "INTERNAL_ERROR", category: "state", message,
      remediation: ["Check server logs for details"],
    });
  }
  let cat = CODE_CATEGORIES[err.code];
  if (err.code === InstallerErrorCode.EXTERNAL_COMMAND_FAILED) {
    const output = err.context?.output;
    cat = (typeof output === "string" ? categorizeOutput(output) : null) ?? cat;
  }
  return error(tool, targetHost, durationMs, { code: err.code, message: err.message, ...cat, details: err.context });
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool whose handler receives arguments already parsed by its
 * input schema. Handler exceptions become error responses.
 */
export function registerTool<S extends z.ZodTypeAny>(
  ctx: ServerContext,
  metadata: ToolMetadata<S>,
  handler: (args: z.output<S>, execCtx: ExecutionContext) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (rawArgs, execCtx) => {
      const start = Date.now();
      const parsed = metadata.inputSchema.safeParse(rawArgs);
      if (!parsed.success) {
        return error(metadata.name, execCtx.targetHost, Date.now() - start, {
          code: InstallerErrorCode.VALIDATION_ERROR, category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "),
          remediation: ["Correct the named input and call the tool again"],
        });
      }
      try {
        return await handler(parsed.data, execCtx);
      } catch (err) {
        logger.error({ tool: metadata.name, error: err instanceof Error ? err.message : String(err) }, "Tool failed");
        return fromError(metadata.name, execCtx.targetHost, Date.now() - start, err);
      }
    },
  });
}
