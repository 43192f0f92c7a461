import type { ToolMetadata, ToolResult } from "@local-assistant/shared";
import type { ToolsConfig } from "../config/schema.js";

export type { ToolCall, ToolMetadata, ToolParameter, ToolResult } from "@local-assistant/shared";

/**
 * Per-invocation context. Tools never mutate the session.
 */
export interface ToolContext {
  sessionId: string;
  signal?: AbortSignal;
}

/**
 * Capability every tool exposes to the registry and executor.
 */
export interface Tool {
  readonly metadata: ToolMetadata;
  /** Error text when the parameters do not fit the declared schema */
  validate(parameters: Record<string, unknown>): string | null;
  execute(context: ToolContext, parameters: Record<string, unknown>): Promise<ToolResult>;
  getUsageHelp(): string;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * What built-in tools are constructed with.
 */
export interface ToolEnvironment {
  /** Absolute sandbox root; every file path must stay inside it */
  sandboxRoot: string;
  config: ToolsConfig;
  fetch?: FetchLike;
}
