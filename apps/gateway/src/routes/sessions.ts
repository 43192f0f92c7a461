/**
 * Session management API routes.
 *
 * Listing sessions, session details with recent messages, ending a session
 * and exporting its conversation.
 */
import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { GatewayError } from '../monitoring/ErrorRegistry.js';
import type { SessionManager } from '../session/SessionManager.js';
import {
  exportConversationJson,
  exportConversationMarkdown,
  toChatMessage,
  toSessionSummary,
  transcriptFilename,
} from '../session/transcript.js';
import { asyncHandler, parseInput, sendSuccess } from '../utils/apiResponse.js';

/** Messages returned with GET /sessions/:id */
const RECENT_MESSAGES = 5;

const ListSessionsQuery = z.object({
  limit: z.coerce.number().int().positive().max(100).default(20),
});

const ExportQuery = z.object({
  format: z.enum(['json', 'markdown'], { errorMap: () => ({ message: 'Unsupported format' }) }).default('json'),
});

/**
 * Create session routes with dependency injection.
 */
export function createSessionRoutes(deps: { sessions: SessionManager }): Router {
  const { sessions } = deps;
  const router = Router();

  // GET /api/sessions - List live sessions
  router.get('/', (req: Request, res: Response) => {
    const { limit } = parseInput(ListSessionsQuery, req.query);
    const list = sessions.listSessions().slice(0, limit);

    sendSuccess(res, { sessions: list.map(toSessionSummary) });
  });

  // GET /api/sessions/:id - Session details
  router.get('/:id', (req: Request, res: Response) => {
    const sessionId = req.params.id;
    const session = sessions.getSession(sessionId);
    if (!session) {
      throw new GatewayError('SessionNotFound', `Session not found: ${sessionId}`);
    }

    const messages = sessions.getConversation(sessionId)?.messages ?? [];
    sendSuccess(res, {
      session: toSessionSummary(session),
      messageCount: messages.length,
      lastMessages: messages.slice(-RECENT_MESSAGES).map(toChatMessage),
    });
  });

  // DELETE /api/sessions/:id - End a session
  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const sessionId = req.params.id;
      const ended = await sessions.endSession(sessionId);
      if (!ended) {
        throw new GatewayError('SessionNotFound', `Session not found: ${sessionId}`);
      }

      sendSuccess(res, { message: 'Session ended successfully' });
    }),
  );

  // GET /api/sessions/:id/export?format=json|markdown
  router.get('/:id/export', (req: Request, res: Response) => {
    const sessionId = req.params.id;
    const { format } = parseInput(ExportQuery, req.query);

    const session = sessions.getSession(sessionId);
    if (!session) {
      throw new GatewayError('SessionNotFound', `Session not found: ${sessionId}`);
    }
    const conversation = sessions.getConversation(sessionId);
    if (!conversation) {
      throw new GatewayError('ConversationNotFound', `Conversation not found: ${session.conversationId}`);
    }

    if (format === 'json') {
      res.json(exportConversationJson(sessionId, conversation));
      return;
    }

    res.setHeader('Content-Type', 'text/markdown; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename=${transcriptFilename(sessionId)}`);
    res.send(exportConversationMarkdown(sessionId, conversation));
  });

  return router;
}
