import type { MessageRole } from "@local-assistant/shared";

export interface InferenceMessage {
  role: MessageRole;
  content: string;
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Aborting cancels the backend request */
  signal?: AbortSignal;
}

export interface InferenceHealth {
  status: "healthy" | "unhealthy";
  reachable: boolean;
  host: string;
  model: string;
  models: string[];
  error?: string;
}

/**
 * Chat-completion backend. Failures surface as GatewayError
 * `InferenceUnavailable`; a caller abort rejects with the abort reason.
 */
export interface InferenceClient {
  /** Model used when a call names none */
  readonly model: string;
  /** Probe the backend and settle the default model. Never throws. */
  initialize(): Promise<void>;
  chat(messages: InferenceMessage[], options?: ChatOptions): Promise<string>;
  chatStream(messages: InferenceMessage[], options?: ChatOptions): AsyncIterable<string>;
  healthCheck(): Promise<InferenceHealth>;
  listModels(): Promise<string[]>;
  /** Reachability as of the last request */
  isReachable(): boolean;
}
