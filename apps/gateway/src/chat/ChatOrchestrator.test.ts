import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { StreamEvent } from '@local-assistant/shared';
import { ChatOrchestrator, type ChatOrchestratorOptions, type TurnPhase } from './ChatOrchestrator.js';
import { SYSTEM_PRIMER } from '../config/constants.js';
import { GatewayError } from '../monitoring/ErrorRegistry.js';
import { UsageTracker } from '../monitoring/UsageTracker.js';
import { SessionManager } from '../session/SessionManager.js';
import { FileUploadTool } from '../tools/builtin/fileUpload.js';
import { ToolExecutor } from '../tools/ToolExecutor.js';
import { ToolRegistry } from '../tools/ToolRegistry.js';
import {
  createSandbox,
  createToolEnvironment,
  EchoTool,
  FakeInferenceClient,
  type TestSandbox,
} from '../../test/utils.js';

async function collect(stream: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

const TURN_PHASES: TurnPhase[] = [
  'Idle',
  'SessionResolved',
  'UserAppended',
  'ContextFetched',
  'InferenceCalled',
  'ResponseParsed',
  'AssistantAppended',
];

describe('ChatOrchestrator', () => {
  let sessions: SessionManager;
  let registry: ToolRegistry;
  let inference: FakeInferenceClient;
  let usage: UsageTracker;
  let echo: EchoTool;
  let guarded: EchoTool;

  function createOrchestrator(options: ChatOrchestratorOptions = {}): ChatOrchestrator {
    const executor = new ToolExecutor(registry, { systemCommandsEnabled: false });
    return new ChatOrchestrator({ sessions, registry, executor, inference, usage }, options);
  }

  function roles(sessionId: string): string[] {
    return sessions.getConversation(sessionId)?.messages.map((m) => m.role) ?? [];
  }

  beforeEach(() => {
    sessions = new SessionManager();
    registry = new ToolRegistry();
    inference = new FakeInferenceClient();
    usage = new UsageTracker();
    echo = new EchoTool();
    guarded = new EchoTool({ name: 'guarded', dangerLevel: 'high', requiresConfirmation: true });
    registry.register(echo);
    registry.register(guarded);
  });

  describe('handleTurn', () => {
    it('should complete a plain turn', async () => {
      inference.setReply('Hello there');

      const result = await createOrchestrator().handleTurn('Hi');

      expect(result).toEqual({
        sessionId: expect.any(String),
        message: 'Hello there',
        toolCalls: [],
        requiresConfirmation: false,
        state: 'done',
      });
      expect(roles(result.sessionId)).toEqual(['system', 'user', 'assistant']);
      expect(sessions.getConversation(result.sessionId)?.messages[2].metadata).toEqual({ toolCalls: [] });
    });

    it('should report every phase in order', async () => {
      const phases: TurnPhase[] = [];

      await createOrchestrator().handleTurn('Hi', undefined, { onPhase: (phase) => phases.push(phase) });

      expect(phases).toEqual([...TURN_PHASES, 'Done']);
    });

    it('should create a session under the supplied id', async () => {
      const result = await createOrchestrator().handleTurn('Hi', 'client-chosen');

      expect(result.sessionId).toBe('client-chosen');
      expect(sessions.peekSession('client-chosen')?.messageCount).toBe(2);
    });

    it('should continue an existing session', async () => {
      const orchestrator = createOrchestrator();
      const first = await orchestrator.handleTurn('One');

      const second = await orchestrator.handleTurn('Two', first.sessionId);

      expect(second.sessionId).toBe(first.sessionId);
      expect(roles(first.sessionId)).toEqual(['system', 'user', 'assistant', 'user', 'assistant']);
    });

    it('should send the primer with the tool catalogue', async () => {
      await createOrchestrator().handleTurn('Hi');

      expect(inference.lastMessages()).toEqual([
        { role: 'system', content: `${SYSTEM_PRIMER}\n\n${registry.describeForPrompt()}` },
        { role: 'user', content: 'Hi' },
      ]);
    });

    it('should resend the primer once it leaves the context window', async () => {
      const orchestrator = createOrchestrator({ contextMessages: 2 });
      inference.setReplies(['First', 'Later']);
      const { sessionId } = await orchestrator.handleTurn('Start');

      await orchestrator.handleTurn('Second', sessionId);

      expect(inference.lastMessages()).toEqual([
        { role: 'system', content: `${SYSTEM_PRIMER}\n\n${registry.describeForPrompt()}` },
        { role: 'assistant', content: 'First' },
        { role: 'user', content: 'Second' },
      ]);
    });

    it('should stop in ToolsPending for calls needing confirmation', async () => {
      inference.setReply('Sure. [TOOL: guarded("x")]');
      const phases: TurnPhase[] = [];

      const result = await createOrchestrator({ autoExecuteSafe: true }).handleTurn('Do it', undefined, {
        onPhase: (phase) => phases.push(phase),
      });

      expect(result.state).toBe('tools_pending');
      expect(result.requiresConfirmation).toBe(true);
      expect(result.toolCalls).toEqual([
        { toolName: 'guarded', parameters: { text: 'x' }, requiresConfirmation: true },
      ]);
      expect(result.toolResults).toBeUndefined();
      expect(phases.at(-1)).toBe('ToolsPending');
      expect(guarded.body).not.toHaveBeenCalled();
    });

    it('should flag built-in dangerous names without a registered tool', async () => {
      inference.setReply('[TOOL: write_file("notes.txt")]');

      const result = await createOrchestrator().handleTurn('Save it');

      expect(result.toolCalls).toEqual([
        { toolName: 'write_file', parameters: {}, requiresConfirmation: true },
      ]);
      expect(result.state).toBe('tools_pending');
    });

    it('should leave safe calls for the caller by default', async () => {
      inference.setReply('[TOOL: echo("hi")]');

      const result = await createOrchestrator().handleTurn('Echo');

      expect(result.state).toBe('done');
      expect(result.toolResults).toBeUndefined();
      expect(echo.body).not.toHaveBeenCalled();
    });

    it('should execute safe calls when auto-execution is on', async () => {
      inference.setReply('[TOOL: echo("hi")]');

      const result = await createOrchestrator({ autoExecuteSafe: true }).handleTurn('Echo');

      expect(result.toolResults).toHaveLength(1);
      expect(result.toolResults?.[0]).toMatchObject({ success: true, output: 'hi' });
      expect(roles(result.sessionId)).toEqual(['system', 'user', 'assistant', 'tool']);
      expect(sessions.getConversation(result.sessionId)?.messages[3].content).toBe('Tool: echo\nResult: hi');
    });

    it('should return refusals for unknown tools without appending', async () => {
      inference.setReply('[TOOL: nope("x")]');

      const result = await createOrchestrator({ autoExecuteSafe: true }).handleTurn('Try');

      expect(result.toolResults).toEqual([
        {
          success: false,
          output: null,
          error: 'Unknown tool: nope',
          executionTimeMs: 0,
          metadata: { errorCode: 'AG-TOOL-002', refused: true },
        },
      ]);
      expect(roles(result.sessionId)).toEqual(['system', 'user', 'assistant']);
    });

    it('should propagate inference failures and keep only the user message', async () => {
      inference.setReply(new GatewayError('InferenceUnavailable', 'Inference backend unreachable: down'));
      const orchestrator = createOrchestrator();

      const error = await orchestrator.handleTurn('Hi', 's-1').catch((err: unknown) => err);

      expect(error).toMatchObject({ kind: 'InferenceUnavailable' });
      expect(roles('s-1')).toEqual(['system', 'user']);
      expect(usage.getRecords()[0]).toMatchObject({ success: false, errorCode: 'GW-API-001', streamed: false });
    });

    it('should record inference usage', async () => {
      inference.setReply('Hello');

      const { sessionId } = await createOrchestrator().handleTurn('Hi');

      expect(usage.getRecords()).toHaveLength(1);
      expect(usage.getRecords()[0]).toMatchObject({
        model: 'fake-model',
        sessionId,
        streamed: false,
        promptMessages: 2,
        outputChars: 5,
        success: true,
      });
    });
  });

  describe('streamTurn', () => {
    it('should emit session, content, tool_calls and done in order', async () => {
      inference.setReply(['Hel', 'lo ', '[TOOL: guarded("x")]']);

      const events = await collect(createOrchestrator().streamTurn('Hi', 's-1'));

      expect(events).toEqual([
        { type: 'session', sessionId: 's-1' },
        { type: 'content', content: 'Hel' },
        { type: 'content', content: 'lo ' },
        { type: 'content', content: '[TOOL: guarded("x")]' },
        {
          type: 'tool_calls',
          toolCalls: [{ toolName: 'guarded', parameters: { text: 'x' }, requiresConfirmation: true }],
        },
        { type: 'done', state: 'tools_pending', requiresConfirmation: true },
      ]);
      expect(sessions.getConversation('s-1')?.messages.at(-1)?.content).toBe('Hello [TOOL: guarded("x")]');
    });

    it('should omit tool_calls when the reply has none', async () => {
      inference.setReply(['Just ', 'text']);
      const phases: TurnPhase[] = [];

      const events = await collect(
        createOrchestrator().streamTurn('Hi', undefined, { onPhase: (phase) => phases.push(phase) }),
      );

      expect(events.map((e) => e.type)).toEqual(['session', 'content', 'content', 'done']);
      expect(events.at(-1)).toEqual({ type: 'done', state: 'done', requiresConfirmation: false });
      expect(phases).toEqual([...TURN_PHASES, 'Done']);
      expect(usage.getRecords()[0]).toMatchObject({ streamed: true, outputChars: 9, success: true });
    });

    it('should report classified failures as an error event', async () => {
      inference.setReply(new GatewayError('InferenceUnavailable', 'Inference backend unreachable: down'));

      const events = await collect(createOrchestrator().streamTurn('Hi', 's-1'));

      expect(events).toEqual([
        { type: 'session', sessionId: 's-1' },
        { type: 'error', error: 'Inference backend unreachable: down', code: 'GW-API-001' },
        { type: 'done', state: 'failed', requiresConfirmation: false },
      ]);
      expect(roles('s-1')).toEqual(['system', 'user']);
    });

    it('should hide the detail of unclassified failures', async () => {
      inference.setReply(new Error('secret internals'));

      const events = await collect(createOrchestrator().streamTurn('Hi', 's-1'));

      expect(events[1]).toEqual({ type: 'error', error: 'Internal server error', code: 'GW-INT-001' });
    });

    it('should persist nothing for a cancelled stream', async () => {
      inference.setReply(['a', 'b', 'c']);
      const controller = new AbortController();
      const events: StreamEvent[] = [];

      for await (const event of createOrchestrator().streamTurn('Hi', 's-1', { signal: controller.signal })) {
        events.push(event);
        if (event.type === 'content') {
          controller.abort();
        }
      }

      expect(events).toEqual([
        { type: 'session', sessionId: 's-1' },
        { type: 'content', content: 'a' },
        { type: 'done', state: 'cancelled', requiresConfirmation: false },
      ]);
      expect(roles('s-1')).toEqual(['system', 'user']);
    });
  });

  describe('executeTool', () => {
    let sessionId: string;

    beforeEach(() => {
      sessionId = sessions.createSession().id;
    });

    it('should reject unknown sessions', async () => {
      const call = { toolName: 'echo', parameters: { text: 'hi' }, requiresConfirmation: false };

      await expect(createOrchestrator().executeTool('missing', call)).rejects.toMatchObject({ kind: 'SessionNotFound' });
    });

    it('should reject unknown tools', async () => {
      const call = { toolName: 'nope', parameters: {}, requiresConfirmation: false };

      await expect(createOrchestrator().executeTool(sessionId, call)).rejects.toMatchObject({ kind: 'ToolNotFound' });
    });

    it('should reject invalid parameters', async () => {
      const call = { toolName: 'echo', parameters: {}, requiresConfirmation: false };

      await expect(createOrchestrator().executeTool(sessionId, call)).rejects.toMatchObject({
        kind: 'ToolValidationFailed',
        message: 'text: Required',
      });
    });

    it('should refuse an unconfirmed dangerous call and append nothing', async () => {
      const call = { toolName: 'guarded', parameters: { text: 'x' }, requiresConfirmation: true };

      const result = await createOrchestrator().executeTool(sessionId, call, false);

      expect(result.success).toBe(false);
      expect(result.error).toBe('Tool requires user confirmation');
      expect(result.metadata.requiresConfirmation).toBe(true);
      expect(guarded.body).not.toHaveBeenCalled();
      expect(roles(sessionId)).toEqual(['system']);
    });

    it('should run a confirmed call and append its result', async () => {
      const call = { toolName: 'guarded', parameters: { text: 'x' }, requiresConfirmation: true };

      const result = await createOrchestrator().executeTool(sessionId, call, true);

      expect(result).toMatchObject({ success: true, output: 'x' });
      const message = sessions.getConversation(sessionId)?.messages[1];
      expect(message?.role).toBe('tool');
      expect(message?.content).toBe('Tool: guarded\nResult: x');
      expect(message?.metadata).toEqual({ toolResult: result });
    });

    it('should append failures of a tool that ran', async () => {
      echo.body.mockRejectedValueOnce(new Error('kaput'));
      const call = { toolName: 'echo', parameters: { text: 'hi' }, requiresConfirmation: false };

      const result = await createOrchestrator().executeTool(sessionId, call);

      expect(result).toMatchObject({ success: false, error: 'kaput' });
      expect(sessions.getConversation(sessionId)?.messages[1].content).toBe('Tool: echo\nResult: kaput');
    });

    it('should serialize structured output as JSON', async () => {
      echo.body.mockResolvedValueOnce({ lines: 2 });
      const call = { toolName: 'echo', parameters: { text: 'hi' }, requiresConfirmation: false };

      await createOrchestrator().executeTool(sessionId, call);

      expect(sessions.getConversation(sessionId)?.messages[1].content).toBe('Tool: echo\nResult: {"lines":2}');
    });
  });

  describe('uploadFile', () => {
    let sandbox: TestSandbox;
    let sessionId: string;

    beforeEach(async () => {
      sandbox = await createSandbox();
      registry.register(
        new FileUploadTool(createToolEnvironment(sandbox.root), () => new Date('2026-03-01T12:00:00Z')),
      );
      sessionId = sessions.createSession().id;
    });

    afterEach(async () => {
      await sandbox.cleanup();
    });

    it('should save the file and note it in the conversation', async () => {
      const file = await createOrchestrator().uploadFile(sessionId, 'notes.txt', Buffer.from('hello').toString('base64'));

      expect(file).toEqual({
        filename: 'notes.txt',
        savedAs: '20260301_120000_notes.txt',
        path: 'uploads/20260301_120000_notes.txt',
        size: 5,
      });
      await expect(fs.readFile(path.join(sandbox.root, file.path), 'utf8')).resolves.toBe('hello');

      const message = sessions.getConversation(sessionId)?.messages[1];
      expect(message?.role).toBe('system');
      expect(message?.content).toBe('File uploaded: notes.txt -> 20260301_120000_notes.txt');
    });

    it('should reject files over the size limit', async () => {
      const content = Buffer.alloc(2 * 1024 * 1024).toString('base64');

      const error = await createOrchestrator({ maxFileSizeMb: 1 })
        .uploadFile(sessionId, 'big.txt', content)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(GatewayError);
      expect(error).toMatchObject({ kind: 'PayloadTooLarge', message: 'File too large: 2.0MB (max: 1MB)' });
      expect(roles(sessionId)).toEqual(['system']);
    });

    it('should surface tool refusals with their kind', async () => {
      const error = await createOrchestrator()
        .uploadFile(sessionId, 'run.exe', Buffer.from('x').toString('base64'))
        .catch((err: unknown) => err);

      expect(error).toMatchObject({ kind: 'ToolValidationFailed' });
      expect(roles(sessionId)).toEqual(['system']);
    });

    it('should reject unknown sessions', async () => {
      await expect(createOrchestrator().uploadFile('missing', 'a.txt', '')).rejects.toMatchObject({
        kind: 'SessionNotFound',
      });
    });
  });
});
