/**
 * Gateway composition root.
 *
 * Builds every service once (sessions, tools, inference, orchestrator),
 * wires them into the express app and the chat WebSocket, and owns their
 * lifecycle through start() and stop().
 */
import express, { type Express } from "express";
import http from "node:http";
import path from "node:path";
import fs from "node:fs/promises";
import { WebSocketServer } from "ws";
import type { Config } from "../config/schema.js";
import { ChatOrchestrator } from "../chat/ChatOrchestrator.js";
import type { InferenceClient } from "../inference/InferenceClient.js";
import { OllamaClient } from "../inference/OllamaClient.js";
import { gatewayLogs, type LogLevel } from "../logs/index.js";
import {
  createCorsMiddleware,
  createErrorHandler,
  createHelmetMiddleware,
  createInputSanitizer,
  createNotFoundHandler,
  createRateLimitMiddleware,
  createRequestIdMiddleware,
  createRequestLogger,
} from "../middleware/index.js";
import { ErrorRegistry, UsageTracker } from "../monitoring/index.js";
import { createChatRoutes } from "../routes/chat.js";
import { createHealthRoutes } from "../routes/health.js";
import { createSessionRoutes } from "../routes/sessions.js";
import { createToolRoutes } from "../routes/tools.js";
import { createUploadRoutes } from "../routes/upload.js";
import { SessionLifecycleManager } from "../session/SessionLifecycleManager.js";
import { SessionManager } from "../session/SessionManager.js";
import { discoverTools, type ToolDescriptor } from "../tools/discovery.js";
import { ToolExecutor } from "../tools/ToolExecutor.js";
import { ToolRegistry } from "../tools/ToolRegistry.js";
import type { FetchLike } from "../tools/types.js";
import { sendSuccess } from "../utils/apiResponse.js";
import { attachChatSocket } from "./wsChat.js";

export interface Gateway {
  app: Express;
  server: http.Server;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

/**
 * Collaborators replaced in tests.
 */
export interface GatewayOverrides {
  inference?: InferenceClient;
  /** fetch used by tools that reach the network */
  fetch?: FetchLike;
  tools?: readonly ToolDescriptor[];
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export async function createGateway(config: Config, overrides: GatewayOverrides = {}): Promise<Gateway> {
  gatewayLogs.configure({ level: config.logging.level, bufferSize: config.logging.bufferSize });

  const base = config.server.httpPath;
  const sandboxRoot = path.resolve(config.tools.sandboxPath);
  await fs.mkdir(sandboxRoot, { recursive: true });

  // ─────────────────────────────────────────────────────────────────
  // Services
  // ─────────────────────────────────────────────────────────────────

  const sessionManager = new SessionManager();
  const lifecycle = new SessionLifecycleManager(sessionManager, {
    sessionTimeout: config.sessions.timeoutMinutes * 60 * 1000,
    sweepInterval: config.sessions.sweepIntervalMs,
  });
  lifecycle.on("sessionsExpired", ({ count }) => {
    gatewayLogs.info("SessionLifecycle", `Expired ${count} idle sessions`);
  });

  const registry = new ToolRegistry();
  discoverTools(registry, { sandboxRoot, config: config.tools, fetch: overrides.fetch }, overrides.tools);

  const executor = new ToolExecutor(registry, {
    systemCommandsEnabled: config.tools.systemCommands.enabled,
    disabledTools: config.tools.disabled,
  });

  const inference = overrides.inference ?? new OllamaClient(config.inference);
  const usageTracker = new UsageTracker();

  const orchestrator = new ChatOrchestrator(
    { sessions: sessionManager, registry, executor, inference, usage: usageTracker },
    {
      contextMessages: config.sessions.contextMessages,
      autoExecuteSafe: config.tools.autoExecuteSafe,
      maxFileSizeMb: config.tools.maxFileSizeMb,
      temperature: config.inference.temperature,
      maxTokens: config.inference.maxTokens,
    },
  );

  // ─────────────────────────────────────────────────────────────────
  // HTTP
  // ─────────────────────────────────────────────────────────────────

  const app = express();
  app.disable("x-powered-by");

  // Base64 inflates uploads by a third; leave room for the JSON envelope
  const bodyLimit = Math.ceil((config.tools.maxFileSizeMb * 1024 * 1024 * 4) / 3) + 64 * 1024;

  const rateLimiter = createRateLimitMiddleware({
    maxRequests: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowSeconds * 1000,
    pathPrefix: base,
  });

  app.use(createRequestIdMiddleware());
  app.use(createHelmetMiddleware());
  app.use(createCorsMiddleware(config.server.corsOrigins));
  app.use(createRequestLogger({ skipPaths: [`${base}/health/live`] }));
  app.use(rateLimiter);
  app.use(express.json({ limit: bodyLimit }));
  app.use(createInputSanitizer());

  app.use(`${base}/health`, createHealthRoutes({ inference, sessions: sessionManager, registry, sandboxRoot }));
  app.use(`${base}/chat`, createChatRoutes({ orchestrator }));
  app.use(`${base}/sessions`, createSessionRoutes({ sessions: sessionManager }));
  app.use(`${base}/tools`, createToolRoutes({ registry, executor, orchestrator }));
  app.use(`${base}/upload`, createUploadRoutes({ orchestrator }));

  // GET /api/stats - Session and inference statistics
  app.get(`${base}/stats`, (_req, res) => {
    sendSuccess(res, {
      ...sessionManager.getStats(),
      usage: usageTracker.getUsageStats(),
    });
  });

  // ==================== LOGS API ====================

  // Get recent logs
  app.get(`${base}/logs/recent`, (req, res) => {
    const count = Number.parseInt(String(req.query.count ?? ""), 10) || 100;
    const level = LOG_LEVELS.find((l) => l === req.query.level);
    sendSuccess(res, { logs: gatewayLogs.getRecent(count, level) });
  });

  // Clear logs
  app.post(`${base}/logs/clear`, (_req, res) => {
    gatewayLogs.clear();
    sendSuccess(res);
  });

  // Error code reference
  app.get(`${base}/errors`, (_req, res) => {
    sendSuccess(res, { errors: new ErrorRegistry().getAllDefinitions() });
  });

  app.use(base, createNotFoundHandler());
  app.use(createErrorHandler({ debug: config.server.debug }));

  // ─────────────────────────────────────────────────────────────────
  // WebSocket
  // ─────────────────────────────────────────────────────────────────

  const server = http.createServer(app);
  const wss = new WebSocketServer({ noServer: true, perMessageDeflate: false });
  attachChatSocket(wss, orchestrator);

  const chatPath = config.server.wsPath;
  server.on("upgrade", (request, socket, head) => {
    const pathname = request.url?.split("?")[0];
    if (pathname !== chatPath) {
      gatewayLogs.warn("Gateway", `Unknown WebSocket path: ${pathname ?? ""}, destroying socket`);
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  return {
    app,
    server,
    start: async () => {
      await inference.initialize();
      lifecycle.start();

      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.server.port, config.server.host, () => {
          server.off("error", reject);
          gatewayLogs.info("Gateway", `Listening on http://${config.server.host}:${config.server.port}`);
          resolve();
        });
      });
    },
    stop: async () => {
      lifecycle.stop();
      rateLimiter.limiter.stop();

      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });

      if (server.listening) {
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        });
      }
      gatewayLogs.info("Gateway", "Gateway stopped");
    },
  };
}
