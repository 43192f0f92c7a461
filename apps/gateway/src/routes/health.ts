/**
 * Health endpoints for the assistant gateway.
 *
 * Liveness and readiness probes plus a detailed check of the inference
 * backend and the tool sandbox.
 */
import fs from 'node:fs/promises';
import { Router, type Request, type Response } from 'express';
import type { InferenceClient } from '../inference/InferenceClient.js';
import { errorMessage } from '../monitoring/ErrorRegistry.js';
import type { SessionManager } from '../session/SessionManager.js';
import type { ToolRegistry } from '../tools/ToolRegistry.js';
import { asyncHandler } from '../utils/apiResponse.js';

const startedAt = Date.now();

export interface DependencyCheck {
  name: string;
  status: 'healthy' | 'degraded' | 'unhealthy';
  latencyMs?: number;
  message?: string;
}

export interface HealthDeps {
  inference: InferenceClient;
  sessions: SessionManager;
  registry: ToolRegistry;
  sandboxRoot: string;
  version?: string;
}

/**
 * Create health check routes.
 */
export function createHealthRoutes(deps: HealthDeps): Router {
  const { inference, sessions, registry, sandboxRoot } = deps;
  const router = Router();

  // ─────────────────────────────────────────────────────────────
  // GET /api/health: Full health check with dependency status
  // ─────────────────────────────────────────────────────────────
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const checks = [await checkInference(inference), await checkSandbox(sandboxRoot)];

      // Chat needs inference; tools without a sandbox only degrade the service
      const overall = checks[0].status === 'unhealthy'
        ? 'unhealthy'
        : checks.every((c) => c.status === 'healthy')
          ? 'healthy'
          : 'degraded';

      res.status(overall === 'unhealthy' ? 503 : 200).json({
        ok: overall !== 'unhealthy',
        status: overall,
        name: 'local-assistant-gateway',
        version: deps.version ?? '0.1.0',
        uptime: Math.floor((Date.now() - startedAt) / 1000),
        timestamp: new Date().toISOString(),
        model: inference.model,
        dependencies: checks,
        sessions: sessions.getStats(),
        tools: registry.names().length,
      });
    }),
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/health/live: Liveness probe
  // ─────────────────────────────────────────────────────────────
  router.get('/live', (_req: Request, res: Response) => {
    res.json({
      ok: true,
      status: 'alive',
      uptime: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/health/ready: Readiness probe
  // Not ready while the inference backend is unreachable
  // ─────────────────────────────────────────────────────────────
  router.get(
    '/ready',
    asyncHandler(async (_req: Request, res: Response) => {
      const check = await checkInference(inference);

      if (check.status === 'unhealthy') {
        res.status(503).json({
          ok: false,
          status: 'not_ready',
          reason: 'Inference backend is not available',
          inference: check,
        });
        return;
      }

      res.json({ ok: true, status: 'ready', inference: check });
    }),
  );

  return router;
}

// ─────────────────────────────────────────────────────────────────
// Dependency Checks
// ─────────────────────────────────────────────────────────────────

async function checkInference(inference: InferenceClient): Promise<DependencyCheck> {
  const start = Date.now();
  const health = await inference.healthCheck();
  const latencyMs = Date.now() - start;

  if (!health.reachable) {
    return { name: 'inference', status: 'unhealthy', latencyMs, message: health.error ?? `Cannot reach ${health.host}` };
  }
  if (!health.models.includes(health.model)) {
    return { name: 'inference', status: 'degraded', latencyMs, message: `Model ${health.model} is not installed` };
  }
  return { name: 'inference', status: 'healthy', latencyMs, message: `${health.models.length} models available` };
}

async function checkSandbox(sandboxRoot: string): Promise<DependencyCheck> {
  try {
    const stat = await fs.stat(sandboxRoot);
    return stat.isDirectory()
      ? { name: 'sandbox', status: 'healthy', message: sandboxRoot }
      : { name: 'sandbox', status: 'degraded', message: `${sandboxRoot} is not a directory` };
  } catch (err) {
    return { name: 'sandbox', status: 'degraded', message: errorMessage(err) };
  }
}
