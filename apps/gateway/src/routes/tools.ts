/**
 * Tool API routes.
 *
 *   GET  /api/tools          metadata of every tool plus registry stats
 *   GET  /api/tools/:name    metadata and usage help
 *   POST /api/tools/execute  run a parsed call, usually after confirmation
 *
 * A call the tool ran answers 200 whether or not it succeeded; a call the
 * executor refused answers with the refusal's status and code.
 */
import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ChatOrchestrator } from '../chat/ChatOrchestrator.js';
import { ErrorRegistry, GatewayError } from '../monitoring/ErrorRegistry.js';
import type { ToolExecutor } from '../tools/ToolExecutor.js';
import { toolRan } from '../tools/ToolExecutor.js';
import type { ToolRegistry } from '../tools/ToolRegistry.js';
import { asyncHandler, parseInput, sendError, sendSuccess } from '../utils/apiResponse.js';

export const ExecuteToolSchema = z.object({
  sessionId: z.string().min(1),
  toolCall: z.object({
    toolName: z.string().min(1),
    parameters: z.record(z.unknown()).default({}),
    requiresConfirmation: z.boolean().default(false),
  }),
  confirm: z.boolean().default(false),
});

const errorRegistry = new ErrorRegistry();

export function createToolRoutes(deps: {
  registry: ToolRegistry;
  executor: ToolExecutor;
  orchestrator: ChatOrchestrator;
}): Router {
  const { registry, executor, orchestrator } = deps;
  const router = Router();

  // GET /api/tools
  router.get('/', (_req: Request, res: Response) => {
    sendSuccess(res, {
      tools: registry.list(),
      stats: registry.stats((metadata) => executor.isToolEnabled(metadata)),
    });
  });

  // POST /api/tools/execute
  router.post(
    '/execute',
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId, toolCall, confirm } = parseInput(ExecuteToolSchema, req.body);

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) controller.abort();
      });

      const result = await orchestrator.executeTool(sessionId, toolCall, confirm, controller.signal);

      if (toolRan(result)) {
        sendSuccess(res, { result });
        return;
      }

      const code = typeof result.metadata.errorCode === 'string' ? result.metadata.errorCode : undefined;
      const status = (code && errorRegistry.getByCode(code)?.httpStatus) || 500;
      sendError(res, result.error ?? 'Tool refused', status, code, { result });
    }),
  );

  // GET /api/tools/:name
  router.get('/:name', (req: Request, res: Response) => {
    const tool = registry.get(req.params.name);
    if (!tool) {
      throw new GatewayError('ToolNotFound', `Tool not found: ${req.params.name}`);
    }

    sendSuccess(res, {
      metadata: tool.metadata,
      enabled: executor.isToolEnabled(tool.metadata),
      usageHelp: tool.getUsageHelp(),
    });
  });

  return router;
}
