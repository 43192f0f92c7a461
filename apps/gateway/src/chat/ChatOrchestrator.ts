/**
 * Chat Orchestrator.
 *
 * Drives one conversational turn: resolve the session, append the user
 * message, call inference over the bounded context, parse tool calls out of
 * the reply and append it. A turn ends Done, or ToolsPending when any parsed
 * call needs the caller's confirmation before it may run.
 */

import { performance } from "node:perf_hooks";
import type { StreamEvent, ToolCall, ToolResult, TurnOutcome } from "@local-assistant/shared";
import { SYSTEM_PRIMER, DEFAULT_CONTEXT_MESSAGES } from "../config/constants.js";
import type { ChatOptions, InferenceClient, InferenceMessage } from "../inference/InferenceClient.js";
import { gatewayLogs } from "../logs/index.js";
import {
  ErrorRegistry,
  GatewayError,
  errorCode,
  toGatewayError,
  type ErrorKind,
} from "../monitoring/ErrorRegistry.js";
import type { UsageTracker } from "../monitoring/UsageTracker.js";
import { needsConfirmation, parseToolCalls } from "../parsing/ResponseParser.js";
import type { SessionManager } from "../session/SessionManager.js";
import type { UploadedFile } from "../tools/builtin/fileUpload.js";
import { toolRan, type ToolExecutor } from "../tools/ToolExecutor.js";
import type { ToolRegistry } from "../tools/ToolRegistry.js";

// =============================================================================
// Types
// =============================================================================

export type TurnPhase =
  | "Idle"
  | "SessionResolved"
  | "UserAppended"
  | "ContextFetched"
  | "InferenceCalled"
  | "ResponseParsed"
  | "AssistantAppended"
  | "ToolsPending"
  | "Done";

export interface TurnOptions {
  /** Aborting cancels inference; nothing further is appended */
  signal?: AbortSignal;
  onPhase?: (phase: TurnPhase, sessionId: string | null) => void;
}

export interface TurnResult {
  sessionId: string;
  message: string;
  toolCalls: ToolCall[];
  requiresConfirmation: boolean;
  state: TurnOutcome;
  /** Present when safe calls were executed as part of the turn */
  toolResults?: ToolResult[];
}

export interface ChatOrchestratorDeps {
  sessions: SessionManager;
  registry: ToolRegistry;
  executor: ToolExecutor;
  inference: InferenceClient;
  usage?: UsageTracker;
}

export interface ChatOrchestratorOptions {
  contextMessages?: number;
  /** Run parsed calls right away when none needs confirmation */
  autoExecuteSafe?: boolean;
  maxFileSizeMb?: number;
  systemPrimer?: string;
  temperature?: number;
  maxTokens?: number;
}

type ResolvedOptions = Required<ChatOrchestratorOptions>;

const DEFAULT_OPTIONS: ResolvedOptions = {
  contextMessages: DEFAULT_CONTEXT_MESSAGES,
  autoExecuteSafe: false,
  maxFileSizeMb: 10,
  systemPrimer: SYSTEM_PRIMER,
  temperature: 0.7,
  maxTokens: 2048,
};

const errorRegistry = new ErrorRegistry();

// =============================================================================
// Orchestrator
// =============================================================================

export class ChatOrchestrator {
  private readonly sessions: SessionManager;
  private readonly registry: ToolRegistry;
  private readonly executor: ToolExecutor;
  private readonly inference: InferenceClient;
  private readonly usage?: UsageTracker;
  private readonly options: ResolvedOptions;

  constructor(deps: ChatOrchestratorDeps, options: ChatOrchestratorOptions = {}) {
    this.sessions = deps.sessions;
    this.registry = deps.registry;
    this.executor = deps.executor;
    this.inference = deps.inference;
    this.usage = deps.usage;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Run a blocking turn.
   * @throws GatewayError InferenceUnavailable, or SessionNotFound when the
   *   session expired between resolution and an append
   */
  async handleTurn(message: string, sessionId?: string, options: TurnOptions = {}): Promise<TurnResult> {
    const { signal, onPhase } = options;
    onPhase?.("Idle", null);

    const session = this.sessions.createSession(sessionId);
    onPhase?.("SessionResolved", session.id);

    await this.sessions.addMessage(session.id, "user", message);
    onPhase?.("UserAppended", session.id);

    const prompt = this.buildPrompt(session.id);
    onPhase?.("ContextFetched", session.id);

    const reply = await this.callInference(session.id, prompt, signal);
    onPhase?.("InferenceCalled", session.id);

    const toolCalls = parseToolCalls(reply, this.registry.parsePolicy());
    onPhase?.("ResponseParsed", session.id);

    signal?.throwIfAborted();
    await this.sessions.addMessage(session.id, "assistant", reply, { toolCalls });
    onPhase?.("AssistantAppended", session.id);

    const requiresConfirmation = needsConfirmation(toolCalls);
    const result: TurnResult = {
      sessionId: session.id,
      message: reply,
      toolCalls,
      requiresConfirmation,
      state: requiresConfirmation ? "tools_pending" : "done",
    };

    if (!requiresConfirmation && this.options.autoExecuteSafe && toolCalls.length > 0) {
      const toolResults: ToolResult[] = [];
      for (const call of toolCalls) {
        toolResults.push(await this.runTool(session.id, call, false, signal));
      }
      result.toolResults = toolResults;
    }

    onPhase?.(requiresConfirmation ? "ToolsPending" : "Done", session.id);
    return result;
  }

  /**
   * Run a turn as a stream of events: `session` first, `content` per
   * fragment, `tool_calls` when the reply has any, `done` exactly once.
   * Failures arrive as an `error` event before `done`; they are never thrown.
   * A cancelled turn persists no assistant message.
   */
  async *streamTurn(message: string, sessionId?: string, options: TurnOptions = {}): AsyncGenerator<StreamEvent> {
    const { signal, onPhase } = options;
    onPhase?.("Idle", null);

    const session = this.sessions.createSession(sessionId);
    onPhase?.("SessionResolved", session.id);
    yield { type: "session", sessionId: session.id };

    let reply = "";
    try {
      await this.sessions.addMessage(session.id, "user", message);
      onPhase?.("UserAppended", session.id);

      const prompt = this.buildPrompt(session.id);
      onPhase?.("ContextFetched", session.id);

      const started = performance.now();
      try {
        for await (const fragment of this.inference.chatStream(prompt, this.chatOptions(signal))) {
          reply += fragment;
          yield { type: "content", content: fragment };
        }
      } catch (err) {
        this.trackUsage(session.id, prompt, reply, started, true, err);
        throw err;
      }
      this.trackUsage(session.id, prompt, reply, started, true);
      onPhase?.("InferenceCalled", session.id);

      signal?.throwIfAborted();
    } catch (err) {
      if (signal?.aborted) {
        gatewayLogs.info("ChatOrchestrator", `Stream cancelled for session ${session.id}`);
        yield { type: "done", state: "cancelled", requiresConfirmation: false };
        return;
      }
      yield* this.failStream(session.id, err);
      return;
    }

    const toolCalls = parseToolCalls(reply, this.registry.parsePolicy());
    onPhase?.("ResponseParsed", session.id);
    if (toolCalls.length > 0) {
      yield { type: "tool_calls", toolCalls };
    }

    if (signal?.aborted) {
      yield { type: "done", state: "cancelled", requiresConfirmation: false };
      return;
    }
    try {
      await this.sessions.addMessage(session.id, "assistant", reply, { toolCalls });
    } catch (err) {
      yield* this.failStream(session.id, err);
      return;
    }
    onPhase?.("AssistantAppended", session.id);

    const requiresConfirmation = needsConfirmation(toolCalls);
    onPhase?.(requiresConfirmation ? "ToolsPending" : "Done", session.id);
    yield { type: "done", state: requiresConfirmation ? "tools_pending" : "done", requiresConfirmation };
  }

  /**
   * Follow-up execution of a parsed call, typically after user confirmation.
   * A call the executor refuses is returned as-is with nothing appended.
   * @throws GatewayError SessionNotFound, ToolNotFound or ToolValidationFailed
   */
  async executeTool(sessionId: string, toolCall: ToolCall, confirm = false, signal?: AbortSignal): Promise<ToolResult> {
    if (!this.sessions.getSession(sessionId)) {
      throw new GatewayError("SessionNotFound", `Session not found: ${sessionId}`, { sessionId });
    }
    if (!this.registry.has(toolCall.toolName)) {
      throw new GatewayError("ToolNotFound", `Tool not found: ${toolCall.toolName}`, { toolName: toolCall.toolName });
    }

    const invalid = this.executor.validate(toolCall);
    if (invalid) {
      throw new GatewayError("ToolValidationFailed", invalid, { toolName: toolCall.toolName });
    }

    return this.runTool(sessionId, toolCall, confirm, signal);
  }

  /**
   * Save an uploaded file into the sandbox and note it in the conversation.
   * @throws GatewayError PayloadTooLarge over `maxFileSizeMb`
   */
  async uploadFile(sessionId: string, filename: string, contentBase64: string): Promise<UploadedFile> {
    if (!this.sessions.getSession(sessionId)) {
      throw new GatewayError("SessionNotFound", `Session not found: ${sessionId}`, { sessionId });
    }

    const size = Buffer.byteLength(contentBase64, "base64");
    const maxBytes = this.options.maxFileSizeMb * 1024 * 1024;
    if (size > maxBytes) {
      throw new GatewayError(
        "PayloadTooLarge",
        `File too large: ${(size / (1024 * 1024)).toFixed(1)}MB (max: ${this.options.maxFileSizeMb}MB)`,
        { size, maxBytes },
      );
    }

    if (!this.registry.has("file_upload")) {
      throw new GatewayError("Internal", "File upload tool not available");
    }

    const result = await this.executor.execute(
      sessionId,
      { toolName: "file_upload", parameters: { filename, content: contentBase64, size }, requiresConfirmation: false },
      false,
    );
    if (!result.success || !isUploadedFile(result.output)) {
      throw errorFromResult(result);
    }

    const file = result.output;
    await this.sessions.addMessage(sessionId, "system", `File uploaded: ${file.filename} -> ${file.savedAs}`, {
      fileUpload: file,
    });
    return file;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Bounded context with the tool catalogue attached to the system message.
   * When the primer has scrolled out of the window it is sent again.
   */
  private buildPrompt(sessionId: string): InferenceMessage[] {
    const context = this.sessions.getContext(sessionId, this.options.contextMessages);
    const catalogue = this.registry.describeForPrompt();

    if (context[0]?.role === "system") {
      const [first, ...rest] = context;
      return [{ role: "system", content: `${first.content}\n\n${catalogue}` }, ...rest];
    }
    return [{ role: "system", content: `${this.options.systemPrimer}\n\n${catalogue}` }, ...context];
  }

  private chatOptions(signal?: AbortSignal): ChatOptions {
    return { temperature: this.options.temperature, maxTokens: this.options.maxTokens, signal };
  }

  private async callInference(sessionId: string, prompt: InferenceMessage[], signal?: AbortSignal): Promise<string> {
    const started = performance.now();
    try {
      const reply = await this.inference.chat(prompt, this.chatOptions(signal));
      this.trackUsage(sessionId, prompt, reply, started, false);
      return reply;
    } catch (err) {
      this.trackUsage(sessionId, prompt, "", started, false, err);
      throw err;
    }
  }

  private trackUsage(
    sessionId: string,
    prompt: InferenceMessage[],
    reply: string,
    started: number,
    streamed: boolean,
    err?: unknown,
  ): void {
    this.usage?.trackCall({
      model: this.inference.model,
      sessionId,
      streamed,
      promptMessages: prompt.length,
      outputChars: reply.length,
      latencyMs: Math.round(performance.now() - started),
      success: err === undefined,
      errorCode: err === undefined ? undefined : toGatewayError(err).code,
    });
  }

  /**
   * Validate and execute without throwing; a call the tool actually ran is
   * appended to the conversation as a `tool` message.
   */
  private async runTool(sessionId: string, call: ToolCall, confirm: boolean, signal?: AbortSignal): Promise<ToolResult> {
    const invalid = this.executor.validate(call);
    if (invalid) {
      const kind: ErrorKind = this.registry.has(call.toolName) ? "ToolValidationFailed" : "ToolNotFound";
      return {
        success: false,
        output: null,
        error: invalid,
        executionTimeMs: 0,
        metadata: { errorCode: errorCode(kind), refused: true },
      };
    }

    const result = await this.executor.execute(sessionId, call, confirm, signal);
    if (toolRan(result)) {
      await this.sessions.addMessage(
        sessionId,
        "tool",
        `Tool: ${call.toolName}\nResult: ${formatToolOutput(result)}`,
        { toolResult: result },
      );
    }
    return result;
  }

  private async *failStream(sessionId: string, err: unknown): AsyncGenerator<StreamEvent> {
    const error = toGatewayError(err);
    gatewayLogs.error("ChatOrchestrator", `Error in streaming turn: ${error.message}`, { sessionId, code: error.code });
    // Unclassified failures stay in the log
    const shown = error.kind === "Internal" ? errorRegistry.getDefinition("Internal").message : error.message;
    yield { type: "error", error: shown, code: error.code };
    yield { type: "done", state: "failed", requiresConfirmation: false };
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function formatToolOutput(result: ToolResult): string {
  if (!result.success) return result.error ?? "unknown error";
  return typeof result.output === "string" ? result.output : JSON.stringify(result.output);
}

/**
 * GatewayError for a failed ToolResult, classified by its error code.
 */
export function errorFromResult(result: ToolResult): GatewayError {
  const code = result.metadata.errorCode;
  const definition = typeof code === "string" ? errorRegistry.getByCode(code) : undefined;
  return new GatewayError(definition?.kind ?? "ToolExecutionFailed", result.error ?? undefined);
}

function isUploadedFile(value: unknown): value is UploadedFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "filename" in value &&
    typeof value.filename === "string" &&
    "savedAs" in value &&
    typeof value.savedAs === "string"
  );
}
