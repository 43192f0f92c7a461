/**
 * InferenceClient for a local Ollama server.
 *
 * Talks to `/api/tags` for models and health and `/api/chat` for
 * completions; streamed completions arrive as newline-delimited JSON.
 */
import { z } from "zod";
import type { InferenceConfig } from "../config/schema.js";
import { INFERENCE_PROBE_TIMEOUT_MS } from "../config/constants.js";
import { gatewayLogs } from "../logs/index.js";
import { GatewayError, errorMessage } from "../monitoring/ErrorRegistry.js";
import type { FetchLike } from "../tools/types.js";
import { withTimeout } from "../utils/abort.js";
import type { ChatOptions, InferenceClient, InferenceHealth, InferenceMessage } from "./InferenceClient.js";

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const ChatChunkSchema = z.object({
  message: z.object({ content: z.string().default("") }).optional(),
  done: z.boolean().default(false),
  error: z.string().optional(),
});

export class OllamaClient implements InferenceClient {
  private readonly baseUrl: string;
  private currentModel: string;
  private reachable = false;

  constructor(
    private readonly config: InferenceConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.baseUrl = config.host.replace(/\/+$/, "");
    this.currentModel = config.model;
  }

  get model(): string {
    return this.currentModel;
  }

  isReachable(): boolean {
    return this.reachable;
  }

  async initialize(): Promise<void> {
    let models: string[];
    try {
      models = await this.listModels();
    } catch (err) {
      gatewayLogs.error("Inference", `Failed to connect to Ollama at ${this.baseUrl}: ${errorMessage(err)}`);
      gatewayLogs.warn("Inference", "Continuing without inference; chat requests will fail until it is reachable");
      return;
    }

    gatewayLogs.info("Inference", "Connected to Ollama", { models });

    if (!models.includes(this.currentModel)) {
      const fallback = this.currentModel.split(":")[0];
      if (models.includes(fallback)) {
        gatewayLogs.warn("Inference", `Default model not found, falling back to '${fallback}'`);
        this.currentModel = fallback;
      } else if (models.length > 0) {
        gatewayLogs.warn("Inference", `Default model not found, using '${models[0]}' instead`);
        this.currentModel = models[0];
      } else {
        gatewayLogs.warn("Inference", "No models available in Ollama");
      }
    }

    gatewayLogs.info("Inference", `Using model: ${this.currentModel}`);
  }

  async listModels(): Promise<string[]> {
    const response = await this.request("/api/tags", { method: "GET" }, withTimeout(undefined, INFERENCE_PROBE_TIMEOUT_MS));
    const body = TagsResponseSchema.parse(await response.json());
    return body.models.map((m) => m.name);
  }

  async healthCheck(): Promise<InferenceHealth> {
    try {
      const models = await this.listModels();
      return { status: "healthy", reachable: true, host: this.baseUrl, model: this.currentModel, models };
    } catch (err) {
      return {
        status: "unhealthy",
        reachable: false,
        host: this.baseUrl,
        model: this.currentModel,
        models: [],
        error: errorMessage(err),
      };
    }
  }

  async chat(messages: InferenceMessage[], options: ChatOptions = {}): Promise<string> {
    const response = await this.postChat(messages, options, false);
    let chunk: z.infer<typeof ChatChunkSchema>;
    try {
      chunk = ChatChunkSchema.parse(await response.json());
    } catch (err) {
      throw this.classify(err, options.signal);
    }
    if (chunk.error) {
      throw new GatewayError("InferenceUnavailable", `Ollama error: ${chunk.error}`);
    }
    return chunk.message?.content ?? "";
  }

  async *chatStream(messages: InferenceMessage[], options: ChatOptions = {}): AsyncGenerator<string> {
    const response = await this.postChat(messages, options, true);
    if (!response.body) {
      throw new GatewayError("InferenceUnavailable", "Ollama returned an empty stream");
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    let finished = false;

    try {
      while (!finished) {
        const { done, value } = await reader.read();
        if (done) {
          buffer += decoder.decode();
          finished = true;
        } else {
          buffer += decoder.decode(value, { stream: true });
        }

        let newline = buffer.indexOf("\n");
        while (newline >= 0 || (finished && buffer.trim() !== "")) {
          const end = newline >= 0 ? newline : buffer.length;
          const line = buffer.slice(0, end).trim();
          buffer = buffer.slice(end + 1);
          newline = buffer.indexOf("\n");
          if (!line) continue;

          const chunk = parseChunk(line);
          if (chunk.error) {
            throw new GatewayError("InferenceUnavailable", `Ollama error: ${chunk.error}`);
          }
          if (chunk.message?.content) {
            yield chunk.message.content;
          }
          if (chunk.done) {
            finished = true;
            break;
          }
        }
      }
    } catch (err) {
      throw this.classify(err, options.signal);
    } finally {
      // Stops the download when the consumer stops early
      await reader.cancel().catch((err: unknown) => {
        gatewayLogs.debug("Inference", `Stream cancel failed: ${errorMessage(err)}`);
      });
    }
  }

  private postChat(messages: InferenceMessage[], options: ChatOptions, stream: boolean): Promise<Response> {
    const body = {
      model: options.model ?? this.currentModel,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      stream,
      options: {
        temperature: options.temperature ?? this.config.temperature,
        num_predict: options.maxTokens ?? this.config.maxTokens,
      },
    };

    return this.request(
      "/api/chat",
      { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) },
      withTimeout(options.signal, this.config.requestTimeoutMs),
      options.signal,
    );
  }

  private async request(
    path: string,
    init: RequestInit,
    signal: AbortSignal,
    callerSignal?: AbortSignal,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, signal });
    } catch (err) {
      throw this.classify(err, callerSignal);
    }

    this.reachable = true;
    if (!response.ok) {
      const detail = await response.text().catch((err: unknown) => {
        gatewayLogs.debug("Inference", `Could not read error body: ${errorMessage(err)}`);
        return "";
      });
      throw new GatewayError(
        "InferenceUnavailable",
        `Ollama returned status ${response.status}${detail ? `: ${detail}` : ""}`,
        { status: response.status },
      );
    }
    return response;
  }

  /**
   * Caller aborts pass through untouched; everything else means the backend is unavailable.
   */
  private classify(err: unknown, callerSignal?: AbortSignal): unknown {
    if (callerSignal?.aborted || err instanceof GatewayError) {
      return err;
    }
    this.reachable = false;
    return new GatewayError("InferenceUnavailable", `Inference backend unreachable: ${errorMessage(err)}`);
  }
}

function parseChunk(line: string): z.infer<typeof ChatChunkSchema> {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    throw new GatewayError("InferenceUnavailable", `Malformed stream line from Ollama: ${line.slice(0, 80)}`);
  }
  return ChatChunkSchema.parse(json);
}
