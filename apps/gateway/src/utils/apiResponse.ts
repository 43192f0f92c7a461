/**
 * Standardised API response helpers.
 *
 * Ensures consistent JSON envelope across all gateway endpoints.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { z } from "zod";
import { GatewayError } from "../monitoring/ErrorRegistry.js";
import { formatIssues } from "../tools/BaseTool.js";

/**
 * Send a success JSON response.
 */
export function sendSuccess(
  res: Response,
  data: Record<string, unknown> = {},
  status = 200,
): void {
  res.status(status).json({ ok: true, ...data });
}

/**
 * Send an error JSON response.
 */
export function sendError(
  res: Response,
  message: string,
  status = 500,
  code?: string,
  extra: Record<string, unknown> = {},
): void {
  const body: Record<string, unknown> = { ok: false, error: message, ...extra };
  if (code) body.code = code;
  res.status(status).json(body);
}

/**
 * Forward rejections from an async handler to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Validate a request body or query.
 * @throws GatewayError InvalidRequest listing the failed fields
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new GatewayError("InvalidRequest", formatIssues(parsed.error));
  }
  return parsed.data;
}
