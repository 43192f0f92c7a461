/**
 * Outermost error boundary for the HTTP surface.
 *
 * Classified failures keep their message and status; anything else is
 * logged in full and answered with a generic 500.
 */
import type { ErrorRequestHandler, Request, Response, NextFunction, RequestHandler } from 'express';
import { gatewayLogs } from '../logs/index.js';
import { GatewayError, isGatewayError } from '../monitoring/ErrorRegistry.js';
import { sendError } from '../utils/apiResponse.js';
import { getRequestId } from './security.js';

export interface ErrorHandlerOptions {
  /** Include internal messages in 500 responses */
  debug?: boolean;
}

export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const error = classify(err);
    const requestId = getRequestId(res);

    if (error) {
      gatewayLogs.warn('HTTP', `${req.method} ${req.originalUrl} failed: ${error.message}`, {
        requestId,
        code: error.code,
      });
      sendError(res, error.message, error.httpStatus, error.code);
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    gatewayLogs.error('HTTP', `Unhandled error in ${req.method} ${req.originalUrl}: ${message}`, {
      requestId,
      stack: err instanceof Error ? err.stack : undefined,
    });

    const internal = new GatewayError('Internal');
    sendError(res, options.debug ? message : internal.message, internal.httpStatus, internal.code);
  };
}

/**
 * 404 for unmatched API paths.
 */
export function createNotFoundHandler(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new GatewayError('RouteNotFound', `Endpoint not found: ${req.method} ${req.baseUrl}${req.path}`));
  };
}

/**
 * GatewayErrors, plus the body-parser failures that map onto the taxonomy.
 */
function classify(err: unknown): GatewayError | null {
  if (isGatewayError(err)) return err;
  if (typeof err !== 'object' || err === null || !('type' in err)) return null;

  switch (err.type) {
    case 'entity.too.large':
      return new GatewayError('PayloadTooLarge', 'Request body too large');
    case 'entity.parse.failed':
      return new GatewayError('InvalidRequest', 'Malformed JSON body');
    default:
      return null;
  }
}
