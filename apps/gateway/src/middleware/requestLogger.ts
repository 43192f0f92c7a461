/**
 * HTTP request logging middleware for the assistant gateway.
 *
 * Logs every completed request with method, path, status code, latency and
 * request id.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { gatewayLogs, type LogLevel } from '../logs/index.js';
import { getClientIp } from './rateLimiter.js';
import { getRequestId } from './security.js';

export interface RequestLogEntry {
  requestId: string;
  method: string;
  path: string;
  statusCode: number;
  latencyMs: number;
  ip: string;
  userAgent: string;
  contentLength: number;
}

/**
 * Create request logging middleware.
 */
export function createRequestLogger(options?: {
  /** Paths to skip logging (e.g., liveness probes) */
  skipPaths?: string[];
  /** Minimum latency (ms) to log at warn level */
  slowThresholdMs?: number;
}): RequestHandler {
  const skipPaths = options?.skipPaths ?? ['/api/health/live'];
  const slowThresholdMs = options?.slowThresholdMs ?? 5000;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.some((p) => req.path === p)) {
      next();
      return;
    }

    const startTime = Date.now();

    res.on('finish', () => {
      const latencyMs = Date.now() - startTime;
      const path = req.originalUrl || req.path;

      const entry: RequestLogEntry = {
        requestId: getRequestId(res),
        method: req.method,
        path,
        statusCode: res.statusCode,
        latencyMs,
        ip: getClientIp(req),
        userAgent: (req.get('user-agent') ?? '').slice(0, 100),
        contentLength: Number.parseInt(req.get('content-length') ?? '', 10) || 0,
      };

      gatewayLogs.log(
        levelFor(res.statusCode, latencyMs, slowThresholdMs),
        'HTTP',
        `${req.method} ${path} ${res.statusCode} (${latencyMs}ms)`,
        { ...entry },
      );
    });

    next();
  };
}

function levelFor(statusCode: number, latencyMs: number, slowThresholdMs: number): LogLevel {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400 || latencyMs >= slowThresholdMs) return 'warn';
  return 'info';
}
