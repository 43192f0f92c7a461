/**
 * Security middleware for the assistant gateway.
 *
 * HTTP security headers (helmet), CORS, request ids and input sanitization.
 * There is no authentication; the gateway is meant to listen on loopback.
 */
import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import helmet from 'helmet';
import cors from 'cors';

// ─────────────────────────────────────────────────────────────────
// Helmet: HTTP security headers
// ─────────────────────────────────────────────────────────────────

/**
 * Create helmet middleware configured for a JSON and SSE API.
 */
export function createHelmetMiddleware(): RequestHandler {
  return helmet({
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
}

// ─────────────────────────────────────────────────────────────────
// CORS
// ─────────────────────────────────────────────────────────────────

/**
 * Create CORS middleware. An empty origin list allows any origin.
 */
export function createCorsMiddleware(allowedOrigins: readonly string[]): RequestHandler {
  return cors({
    origin: allowedOrigins.length > 0 ? [...allowedOrigins] : true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'Content-Disposition'],
    credentials: true,
    maxAge: 86400,
  });
}

// ─────────────────────────────────────────────────────────────────
// Input Sanitization
// ─────────────────────────────────────────────────────────────────

const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Strip prototype-pollution keys from JSON bodies.
 */
export function createInputSanitizer(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (isRecord(req.body)) {
      sanitizeObject(req.body);
    }
    next();
  };
}

export function sanitizeObject(obj: Record<string, unknown>, depth = 0): void {
  if (depth > 10) return;

  for (const key of Object.keys(obj)) {
    if (FORBIDDEN_KEYS.has(key)) {
      delete obj[key];
      continue;
    }

    const value = obj[key];
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isRecord(item)) sanitizeObject(item, depth + 1);
      }
    } else if (isRecord(value)) {
      sanitizeObject(value, depth + 1);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

// ─────────────────────────────────────────────────────────────────
// Request ID
// ─────────────────────────────────────────────────────────────────

/**
 * Assign a request id for tracing, reusing the caller's X-Request-ID.
 * Stored on `res.locals.requestId`.
 */
export function createRequestIdMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = req.get('x-request-id') || `gw-${randomUUID()}`;
    res.locals.requestId = requestId;
    res.setHeader('X-Request-ID', requestId);
    next();
  };
}

export function getRequestId(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : 'unknown';
}
