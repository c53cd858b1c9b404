import type { RegisteredTool } from "../types/tool.js";
import { logger } from "../logger.js";

/**
 * The installer's tool table. Tool modules add to it during startup; the
 * server then exposes every entry over MCP in registration order.
 */
export class ToolRegistry {
  private readonly byName = new Map<string, RegisteredTool>();

  /** Names are unique; registering one twice is a wiring mistake. */
  register(tool: RegisteredTool): void {
    const { name, module, riskLevel } = tool.metadata;
    if (this.byName.has(name)) {
      throw new Error(`Tool '${name}' is already registered`);
    }
    this.byName.set(name, tool);
    logger.debug({ tool: name, module, riskLevel }, "Tool registered");
  }

  get(name: string): RegisteredTool | undefined {
    return this.byName.get(name);
  }

  list(): RegisteredTool[] {
    return [...this.byName.values()];
  }

  get size(): number {
    return this.byName.size;
  }
}
