export type SessionId = string;

export type MessageRole = "system" | "user" | "assistant" | "tool";

export type ToolCategory = "file_system" | "web" | "system" | "utility";

export type DangerLevel = "safe" | "low" | "medium" | "high";

export type ParameterType = "string" | "integer" | "number" | "boolean" | "object" | "array";

export interface ToolParameter {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  default?: unknown;
}

export interface ToolMetadata {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: ToolParameter[];
  dangerLevel: DangerLevel;
  requiresConfirmation: boolean;
  examples: string[];
}

/**
 * A tool invocation extracted from model output.
 */
export interface ToolCall {
  toolName: string;
  parameters: Record<string, unknown>;
  requiresConfirmation: boolean;
}

export interface ToolResult {
  success: boolean;
  output: unknown;
  error: string | null;
  executionTimeMs: number;
  metadata: Record<string, unknown>;
}

export interface ChatMessage {
  id: string;
  role: MessageRole;
  content: string;
  timestamp: string;
  metadata: Record<string, unknown>;
}

export interface SessionSummary {
  sessionId: SessionId;
  conversationId: string;
  createdAt: string;
  lastActivityAt: string;
  messageCount: number;
  active: boolean;
}

export type TurnOutcome = "done" | "tools_pending";

/**
 * Events delivered to streaming clients, over SSE or WebSocket.
 * `session` comes first and `done` exactly once, last.
 */
export type StreamEvent =
  | { type: "session"; sessionId: SessionId }
  | { type: "content"; content: string }
  | { type: "tool_calls"; toolCalls: ToolCall[] }
  | { type: "error"; error: string; code?: string }
  | { type: "done"; state: TurnOutcome | "failed" | "cancelled"; requiresConfirmation: boolean };
