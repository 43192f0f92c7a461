/**
 * Shared test utilities for Gateway tests.
 *
 * Provides the in-process inference fake, config and sandbox factories,
 * and a scriptable tool.
 */
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import express, { type Express, type Router } from 'express';
import { vi } from 'vitest';
import { z } from 'zod';
import { ConfigSchema, type Config } from '../src/config/schema.js';
import type {
  ChatOptions,
  InferenceClient,
  InferenceHealth,
  InferenceMessage,
} from '../src/inference/InferenceClient.js';
import { createErrorHandler } from '../src/middleware/errorHandler.js';
import { BaseTool, type ToolDefinition } from '../src/tools/BaseTool.js';
import type { FetchLike, ToolContext, ToolEnvironment } from '../src/tools/types.js';

// ============================================================================
// Config
// ============================================================================

export function createTestConfig(input: z.input<typeof ConfigSchema> = {}): Config {
  return ConfigSchema.parse(input);
}

// ============================================================================
// Sandbox
// ============================================================================

export interface TestSandbox {
  root: string;
  cleanup(): Promise<void>;
}

export async function createSandbox(): Promise<TestSandbox> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'assistant-sandbox-'));
  return {
    root,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export function createToolEnvironment(
  sandboxRoot: string,
  tools: z.input<typeof ConfigSchema>['tools'] = {},
  fetchImpl?: FetchLike,
): ToolEnvironment {
  return { sandboxRoot, config: createTestConfig({ tools }).tools, fetch: fetchImpl };
}

// ============================================================================
// Fake Inference Client
// ============================================================================

/**
 * Scripted InferenceClient. Each call takes the next reply; the last one repeats.
 * A reply given as an array is streamed one fragment at a time.
 */
export class FakeInferenceClient implements InferenceClient {
  model = 'fake-model';
  reachable = true;
  private replies: Array<string | string[] | Error> = [];
  private replyIndex = 0;
  private sent: InferenceMessage[][] = [];

  /** Resolves once a stream has yielded its first fragment */
  private firstFragment: (() => void) | null = null;

  initialize = vi.fn(async () => {});

  chat = vi.fn(async (messages: InferenceMessage[], _options?: ChatOptions) => {
    this.sent.push(messages);
    const reply = this.nextReply();
    if (reply instanceof Error) throw reply;
    return Array.isArray(reply) ? reply.join('') : reply;
  });

  chatStream = vi.fn((messages: InferenceMessage[], options?: ChatOptions) => {
    this.sent.push(messages);
    return this.stream(options);
  });

  healthCheck = vi.fn(async (): Promise<InferenceHealth> => ({
    status: this.reachable ? 'healthy' : 'unhealthy',
    reachable: this.reachable,
    host: 'http://fake-inference',
    model: this.model,
    models: [this.model],
  }));

  listModels = vi.fn(async () => [this.model]);

  isReachable(): boolean {
    return this.reachable;
  }

  setReply(reply: string | string[] | Error): this {
    this.replies = [reply];
    this.replyIndex = 0;
    return this;
  }

  setReplies(replies: Array<string | string[] | Error>): this {
    this.replies = replies;
    this.replyIndex = 0;
    return this;
  }

  /**
   * Messages sent on the most recent chat or chatStream call.
   */
  lastMessages(): InferenceMessage[] {
    return this.sent.at(-1) ?? [];
  }

  /**
   * Resolves when the next stream yields its first fragment.
   */
  waitForFirstFragment(): Promise<void> {
    return new Promise((resolve) => {
      this.firstFragment = resolve;
    });
  }

  private nextReply(): string | string[] | Error {
    if (this.replies.length === 0) return 'Mock response';
    const reply = this.replies[this.replyIndex];
    if (this.replyIndex < this.replies.length - 1) {
      this.replyIndex++;
    }
    return reply;
  }

  private async *stream(options?: ChatOptions): AsyncGenerator<string> {
    const reply = this.nextReply();
    if (reply instanceof Error) throw reply;

    const fragments = Array.isArray(reply) ? reply : [reply];
    for (const fragment of fragments) {
      if (options?.signal?.aborted) {
        throw options.signal.reason;
      }
      yield fragment;
      this.firstFragment?.();
      this.firstFragment = null;
      // Let the consumer run between fragments
      await new Promise((resolve) => setImmediate(resolve));
    }
  }
}

// ============================================================================
// Scriptable Tool
// ============================================================================

const EchoSchema = z.object({
  text: z.string().describe('Text to echo'),
});

/**
 * Tool whose body is a vi.fn, for executor and orchestrator tests.
 */
export class EchoTool extends BaseTool<typeof EchoSchema> {
  body = vi.fn(async (params: z.infer<typeof EchoSchema>, _context: ToolContext): Promise<unknown> => params.text);

  constructor(overrides: Partial<ToolDefinition> = {}) {
    super(
      {
        name: 'echo',
        description: 'Echo text back',
        category: 'utility',
        dangerLevel: 'safe',
        requiresConfirmation: false,
        examples: ['[TOOL: echo("hi")]'],
        ...overrides,
      },
      EchoSchema,
    );
  }

  protected run(params: z.infer<typeof EchoSchema>, context: ToolContext): Promise<unknown> {
    return this.body(params, context);
  }
}

// ============================================================================
// Fetch
// ============================================================================

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Response whose body streams the given lines as NDJSON chunks.
 */
export function ndjsonResponse(chunks: string[]): Response {
  const encoder = new TextEncoder();
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
  return new Response(stream, { status: 200, headers: { 'Content-Type': 'application/x-ndjson' } });
}

// ============================================================================
// Express
// ============================================================================

/**
 * Minimal app around one router, with the gateway's JSON parser and error handler.
 */
export function createRouteApp(mountPath: string, router: Router): Express {
  const app = express();
  app.use(express.json({ limit: '10mb' }));
  app.use(mountPath, router);
  app.use(createErrorHandler());
  return app;
}
