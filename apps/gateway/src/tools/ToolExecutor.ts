/**
 * Tool Executor.
 *
 * The failure boundary between tool code and the orchestrator: every outcome,
 * refusals and tool crashes included, comes back as a ToolResult.
 */
import type { ToolCall, ToolMetadata, ToolResult } from "@local-assistant/shared";
import { gatewayLogs } from "../logs/index.js";
import { errorCode, errorMessage, type ErrorKind } from "../monitoring/ErrorRegistry.js";
import type { ToolRegistry } from "./ToolRegistry.js";

export interface ToolExecutorOptions {
  /** Global switch for system_command */
  systemCommandsEnabled: boolean;
  /** Tools refused regardless of confirmation */
  disabledTools?: readonly string[];
}

export class ToolExecutor {
  private disabled: Set<string>;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly options: ToolExecutorOptions,
  ) {
    this.disabled = new Set(options.disabledTools ?? []);
  }

  /**
   * @returns Error text, or null when the call fits the tool's schema
   */
  validate(toolCall: ToolCall): string | null {
    const tool = this.registry.get(toolCall.toolName);
    if (!tool) {
      return `Unknown tool: ${toolCall.toolName}`;
    }
    return tool.validate(toolCall.parameters);
  }

  isToolEnabled(metadata: ToolMetadata): boolean {
    if (this.disabled.has(metadata.name)) return false;
    if (metadata.category === "system" && metadata.name === "system_command") {
      return this.options.systemCommandsEnabled;
    }
    return true;
  }

  async execute(
    sessionId: string,
    toolCall: ToolCall,
    confirmed = false,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    const { toolName } = toolCall;
    const tool = this.registry.get(toolName);

    if (!tool) {
      return this.refuse(sessionId, toolName, "ToolNotFound", `Tool not found: ${toolName}`);
    }

    if (tool.metadata.requiresConfirmation && !confirmed) {
      return this.refuse(sessionId, toolName, "ToolConfirmationRequired", "Tool requires user confirmation", {
        requiresConfirmation: true,
      });
    }

    if (!this.isToolEnabled(tool.metadata)) {
      return this.refuse(sessionId, toolName, "ToolDisabled", `${toolName} is disabled`);
    }

    gatewayLogs.audit(sessionId, "tool_execute", `tool:${toolName}`, `Executing ${toolName} (confirmed=${confirmed})`);

    let result: ToolResult;
    try {
      result = await tool.execute({ sessionId, signal }, toolCall.parameters);
    } catch (err) {
      result = {
        success: false,
        output: null,
        error: errorMessage(err),
        executionTimeMs: 0,
        metadata: { errorCode: errorCode("ToolExecutionFailed") },
      };
    }

    if (result.success) {
      gatewayLogs.info("ToolExecutor", `Tool ${toolName} completed in ${result.executionTimeMs}ms`, { sessionId });
    } else {
      gatewayLogs.warn("ToolExecutor", `Tool ${toolName} failed: ${result.error ?? "unknown error"}`, { sessionId });
    }
    return result;
  }

  private refuse(
    sessionId: string,
    toolName: string,
    kind: ErrorKind,
    error: string,
    metadata: Record<string, unknown> = {},
  ): ToolResult {
    gatewayLogs.audit(sessionId, "tool_refused", `tool:${toolName}`, error);
    return {
      success: false,
      output: null,
      error,
      executionTimeMs: 0,
      metadata: { ...metadata, errorCode: errorCode(kind), refused: true },
    };
  }
}

/**
 * Whether the executor handed the call to the tool, as opposed to refusing it.
 */
export function toolRan(result: ToolResult): boolean {
  return result.metadata.refused !== true;
}
