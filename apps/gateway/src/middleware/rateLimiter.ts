/**
 * HTTP rate limiting middleware for the assistant gateway.
 *
 * Per-IP fixed-window counters. No external dependencies required.
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { errorCode } from '../monitoring/ErrorRegistry.js';

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export interface RateLimitConfig {
  /** Maximum requests per window */
  maxRequests: number;
  /** Window duration in milliseconds */
  windowMs: number;
  /** Custom key extractor (default: IP address) */
  keyExtractor?: (req: Request) => string;
  /** Message returned when rate limited */
  message?: string;
  /** Only paths under this prefix are limited */
  pathPrefix?: string;
  /** Skip rate limiting for paths starting with these */
  skipPaths?: string[];
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetAt: number;
}

interface WindowEntry {
  count: number;
  resetAt: number;
}

// ─────────────────────────────────────────────────────────────────
// Rate Limiter
// ─────────────────────────────────────────────────────────────────

export class HttpRateLimiter {
  private windows: Map<string, WindowEntry> = new Map();
  private cleanupInterval: ReturnType<typeof setInterval>;

  constructor(
    private readonly config: Pick<RateLimitConfig, 'maxRequests' | 'windowMs'>,
    private readonly now: () => number = Date.now,
  ) {
    // Periodically drop expired windows
    this.cleanupInterval = setInterval(() => this.prune(), Math.max(config.windowMs, 60_000));
    this.cleanupInterval.unref();
  }

  /**
   * Count a request against `key`.
   */
  check(key: string): RateLimitDecision {
    const now = this.now();
    let entry = this.windows.get(key);

    // Reset window if expired
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + this.config.windowMs };
      this.windows.set(key, entry);
    }

    entry.count++;

    return {
      allowed: entry.count <= this.config.maxRequests,
      remaining: Math.max(0, this.config.maxRequests - entry.count),
      resetAt: entry.resetAt,
    };
  }

  prune(): void {
    const now = this.now();
    for (const [key, entry] of this.windows) {
      if (entry.resetAt <= now) {
        this.windows.delete(key);
      }
    }
  }

  size(): number {
    return this.windows.size;
  }

  /**
   * Stop the cleanup interval.
   */
  stop(): void {
    clearInterval(this.cleanupInterval);
  }
}

// ─────────────────────────────────────────────────────────────────
// Middleware Factory
// ─────────────────────────────────────────────────────────────────

export type RateLimitMiddleware = RequestHandler & { limiter: HttpRateLimiter };

/**
 * Create rate limiting middleware for API endpoints.
 * Default: 100 requests per hour per IP under /api, health probes exempt.
 */
export function createRateLimitMiddleware(config: Partial<RateLimitConfig> = {}): RateLimitMiddleware {
  const pathPrefix = config.pathPrefix ?? '/api';
  const fullConfig: RateLimitConfig = {
    maxRequests: config.maxRequests ?? 100,
    windowMs: config.windowMs ?? 60 * 60 * 1000,
    keyExtractor: config.keyExtractor,
    message: config.message ?? 'Too many requests. Please try again later.',
    pathPrefix,
    skipPaths: config.skipPaths ?? [`${pathPrefix}/health`],
  };

  const limiter = new HttpRateLimiter(fullConfig);

  const middleware = (req: Request, res: Response, next: NextFunction): void => {
    if (!req.path.startsWith(`${pathPrefix}/`)) {
      next();
      return;
    }
    if (fullConfig.skipPaths?.some((p) => req.path === p || req.path.startsWith(`${p}/`))) {
      next();
      return;
    }

    const key = fullConfig.keyExtractor ? fullConfig.keyExtractor(req) : getClientIp(req);
    const result = limiter.check(key);

    res.setHeader('X-RateLimit-Limit', fullConfig.maxRequests);
    res.setHeader('X-RateLimit-Remaining', result.remaining);
    res.setHeader('X-RateLimit-Reset', Math.ceil(result.resetAt / 1000));

    if (!result.allowed) {
      res.status(429).json({
        ok: false,
        error: fullConfig.message,
        code: errorCode('RateLimited'),
        retryAfter: Math.ceil((result.resetAt - Date.now()) / 1000),
      });
      return;
    }

    next();
  };

  return Object.assign(middleware, { limiter });
}

// ─────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────

export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    return forwarded.split(',')[0].trim();
  }
  return req.socket.remoteAddress || 'unknown';
}
