/**
 * Chat API routes.
 *
 *   POST /api/chat/message         blocking turn
 *   POST /api/chat/message/stream  Server-Sent Events: session, content,
 *                                  tool_calls, error, done
 *
 * A client that disconnects mid-stream aborts the turn; the partial reply
 * is not saved.
 */
import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { StreamEvent } from '@local-assistant/shared';
import type { ChatOrchestrator } from '../chat/ChatOrchestrator.js';
import { SSE_KEEPALIVE_MS } from '../config/constants.js';
import { gatewayLogs } from '../logs/index.js';
import { toGatewayError } from '../monitoring/ErrorRegistry.js';
import { asyncHandler, parseInput, sendSuccess } from '../utils/apiResponse.js';

export const SendMessageSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  sessionId: z.string().min(1).optional(),
});

export function createChatRoutes(deps: { orchestrator: ChatOrchestrator; keepaliveMs?: number }): Router {
  const { orchestrator } = deps;
  const keepaliveMs = deps.keepaliveMs ?? SSE_KEEPALIVE_MS;
  const router = Router();

  // POST /api/chat/message
  router.post(
    '/message',
    asyncHandler(async (req: Request, res: Response) => {
      const { message, sessionId } = parseInput(SendMessageSchema, req.body);

      const controller = abortOnClose(res);
      const result = await orchestrator.handleTurn(message, sessionId, { signal: controller.signal });

      sendSuccess(res, { ...result });
    }),
  );

  // POST /api/chat/message/stream
  router.post(
    '/message/stream',
    asyncHandler(async (req: Request, res: Response) => {
      const { message, sessionId } = parseInput(SendMessageSchema, req.body);

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
      res.flushHeaders();

      const controller = abortOnClose(res);
      const keepalive = setInterval(() => {
        if (!res.destroyed) res.write(': keepalive\n\n');
      }, keepaliveMs);

      try {
        for await (const event of orchestrator.streamTurn(message, sessionId, { signal: controller.signal })) {
          writeEvent(res, event);
        }
      } catch (err) {
        const error = toGatewayError(err);
        gatewayLogs.error('Chat', `Stream failed: ${error.message}`, { code: error.code });
        writeEvent(res, { type: 'error', error: 'Internal server error', code: error.code });
        writeEvent(res, { type: 'done', state: 'failed', requiresConfirmation: false });
      } finally {
        clearInterval(keepalive);
        res.end();
      }
    }),
  );

  return router;
}

/**
 * Format one event as an SSE frame.
 */
export function formatSseEvent(event: StreamEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

function writeEvent(res: Response, event: StreamEvent): void {
  if (res.destroyed) return;
  res.write(formatSseEvent(event));
}

/**
 * Abort when the client goes away before the response is complete.
 */
function abortOnClose(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller;
}
