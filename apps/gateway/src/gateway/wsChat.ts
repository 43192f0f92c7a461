/**
 * WebSocket chat endpoint.
 *
 * Clients send `{ type: "message", text, sessionId? }` and receive the same
 * typed events as the SSE stream, one JSON frame each. Turns on one socket
 * run one after another; closing the socket aborts the turn in flight.
 */
import { z } from 'zod';
import { WebSocket, type RawData, type WebSocketServer } from 'ws';
import type { StreamEvent } from '@local-assistant/shared';
import type { ChatOrchestrator } from '../chat/ChatOrchestrator.js';
import { gatewayLogs } from '../logs/index.js';
import { errorCode, errorMessage } from '../monitoring/ErrorRegistry.js';
import { formatIssues } from '../tools/BaseTool.js';

export const ClientMessageSchema = z.object({
  type: z.literal('message'),
  text: z.string().trim().min(1),
  sessionId: z.string().min(1).optional(),
});

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export function attachChatSocket(wss: WebSocketServer, orchestrator: ChatOrchestrator): void {
  wss.on('error', (err) => {
    gatewayLogs.error('WebSocket', `WebSocketServer error: ${err.message}`);
  });

  wss.on('connection', (ws) => {
    gatewayLogs.info('WebSocket', 'Chat WebSocket connected');

    const controller = new AbortController();
    let queue: Promise<void> = Promise.resolve();

    ws.on('error', (err) => {
      gatewayLogs.warn('WebSocket', `Chat WebSocket error: ${err.message}`);
    });

    ws.on('close', () => {
      controller.abort();
      gatewayLogs.info('WebSocket', 'Chat WebSocket closed');
    });

    ws.on('message', (data: RawData) => {
      const message = parseClientMessage(data);
      if (typeof message === 'string') {
        send(ws, { type: 'error', error: message, code: errorCode('InvalidRequest') });
        return;
      }

      queue = queue
        .then(() => runTurn(ws, orchestrator, message, controller.signal))
        .catch((err: unknown) => {
          gatewayLogs.error('WebSocket', `Turn failed: ${errorMessage(err)}`);
        });
    });
  });
}

async function runTurn(
  ws: WebSocket,
  orchestrator: ChatOrchestrator,
  message: ClientMessage,
  signal: AbortSignal,
): Promise<void> {
  if (signal.aborted) return;
  for await (const event of orchestrator.streamTurn(message.text, message.sessionId, { signal })) {
    send(ws, event);
  }
}

/**
 * @returns The message, or an error description
 */
export function parseClientMessage(data: RawData): ClientMessage | string {
  let json: unknown;
  try {
    json = JSON.parse(rawToString(data));
  } catch {
    return 'Malformed JSON message';
  }
  const parsed = ClientMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : formatIssues(parsed.error);
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

function send(ws: WebSocket, event: StreamEvent): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(event));
  }
}
