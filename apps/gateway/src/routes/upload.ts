/**
 * File upload route.
 *
 *   POST /api/upload { sessionId, filename, content }   content is base64
 *
 * The file lands in the sandbox uploads folder and the conversation gets a
 * system note about it.
 */
import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ChatOrchestrator } from '../chat/ChatOrchestrator.js';
import { asyncHandler, parseInput, sendSuccess } from '../utils/apiResponse.js';

export const UploadSchema = z.object({
  sessionId: z.string().min(1),
  filename: z.string().trim().min(1, 'No filename provided'),
  content: z.string().base64('content must be base64'),
});

export function createUploadRoutes(deps: { orchestrator: ChatOrchestrator }): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId, filename, content } = parseInput(UploadSchema, req.body);

      const file = await deps.orchestrator.uploadFile(sessionId, filename, content);

      sendSuccess(res, { file });
    }),
  );

  return router;
}
