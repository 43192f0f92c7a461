/**
 * Tool Registry.
 *
 * Holds tool instances by name, in first-registration order. Populated at
 * startup and read-only while requests are served.
 */
import type { DangerLevel, ToolCategory, ToolMetadata } from "@local-assistant/shared";
import { DANGEROUS_TOOLS } from "../config/constants.js";
import { gatewayLogs } from "../logs/index.js";
import type { ParsePolicy, PositionalParameter } from "../parsing/ResponseParser.js";
import type { Tool } from "./types.js";

export const TOOL_CATEGORIES: readonly ToolCategory[] = ["file_system", "web", "system", "utility"];

export interface ToolStats {
  totalTools: number;
  toolsByCategory: Partial<Record<ToolCategory, number>>;
  toolsByDangerLevel: Partial<Record<DangerLevel, number>>;
  enabledTools: number;
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();

  /**
   * Register a tool. An existing name is overwritten with a warning.
   */
  register(tool: Tool): void {
    const name = tool.metadata.name;
    if (this.tools.has(name)) {
      gatewayLogs.warn("ToolRegistry", `Tool ${name} already registered, overwriting`);
    }
    this.tools.set(name, tool);
    gatewayLogs.info("ToolRegistry", `Registered tool: ${name}`);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolMetadata[] {
    return [...this.tools.values()].map((t) => t.metadata);
  }

  byCategory(category: ToolCategory): ToolMetadata[] {
    return this.list().filter((m) => m.category === category);
  }

  stats(isEnabled: (metadata: ToolMetadata) => boolean): ToolStats {
    const stats: ToolStats = {
      totalTools: this.tools.size,
      toolsByCategory: {},
      toolsByDangerLevel: {},
      enabledTools: 0,
    };

    for (const metadata of this.list()) {
      stats.toolsByCategory[metadata.category] = (stats.toolsByCategory[metadata.category] ?? 0) + 1;
      stats.toolsByDangerLevel[metadata.dangerLevel] = (stats.toolsByDangerLevel[metadata.dangerLevel] ?? 0) + 1;
      if (isEnabled(metadata)) {
        stats.enabledTools += 1;
      }
    }

    return stats;
  }

  /**
   * Tool catalogue for the model, appended to the system primer.
   */
  describeForPrompt(): string {
    let description = "Available tools:\n\n";

    for (const category of TOOL_CATEGORIES) {
      const tools = this.byCategory(category);
      if (tools.length === 0) continue;

      description += `${category.toUpperCase()} TOOLS:\n`;
      for (const tool of tools) {
        const params = tool.parameters.map((p) => `${p.name}: ${p.type}`).join(", ");
        description += `- ${tool.name}(${params}): ${tool.description}\n`;
        if (tool.examples.length > 0) {
          description += `  Example: ${tool.examples[0]}\n`;
        }
      }
      description += "\n";
    }

    description +=
      "To use a tool, respond with:\n" +
      "[TOOL: tool_name(parameter1, parameter2)]\n\n" +
      "For example:\n" +
      '[TOOL: web_search("TypeScript tutorials")]\n' +
      '[TOOL: read_file("notes.txt")]\n';

    return description;
  }

  /**
   * Confirmation and positional-order facts for the response parser.
   * The built-in danger list always applies on top of tool declarations.
   */
  parsePolicy(): ParsePolicy {
    const dangerousTools = new Set(DANGEROUS_TOOLS);
    const parameterOrder = new Map<string, readonly PositionalParameter[]>();

    for (const metadata of this.list()) {
      if (metadata.requiresConfirmation) {
        dangerousTools.add(metadata.name);
      }
      parameterOrder.set(
        metadata.name,
        metadata.parameters.map((p) => ({ name: p.name, type: p.type })),
      );
    }

    return { dangerousTools, parameterOrder };
  }
}
