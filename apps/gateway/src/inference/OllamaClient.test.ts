import { describe, it, expect, vi, afterEach } from 'vitest';
import { OllamaClient } from './OllamaClient.js';
import { GatewayError } from '../monitoring/ErrorRegistry.js';
import { createTestConfig, jsonResponse, ndjsonResponse } from '../../test/utils.js';

const inference = createTestConfig({ inference: { host: 'http://ollama.test/', model: 'mistral:latest' } }).inference;

function tags(...names: string[]): Response {
  return jsonResponse({ models: names.map((name) => ({ name })) });
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of stream) {
    fragments.push(fragment);
  }
  return fragments;
}

describe('OllamaClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('initialize', () => {
    it('should keep the configured model when installed', async () => {
      const client = new OllamaClient(inference, vi.fn(async () => tags('llama3', 'mistral:latest')));

      await client.initialize();

      expect(client.model).toBe('mistral:latest');
      expect(client.isReachable()).toBe(true);
    });

    it('should fall back to the untagged name', async () => {
      const client = new OllamaClient(inference, vi.fn(async () => tags('llama3', 'mistral')));

      await client.initialize();

      expect(client.model).toBe('mistral');
    });

    it('should fall back to the first installed model', async () => {
      const client = new OllamaClient(inference, vi.fn(async () => tags('llama3:8b', 'phi3')));

      await client.initialize();

      expect(client.model).toBe('llama3:8b');
    });

    it('should continue degraded when the backend is unreachable', async () => {
      const client = new OllamaClient(
        inference,
        vi.fn(async () => {
          throw new TypeError('fetch failed');
        }),
      );

      await expect(client.initialize()).resolves.toBeUndefined();
      expect(client.isReachable()).toBe(false);
      expect(client.model).toBe('mistral:latest');
    });

    it('should use the global fetch by default', async () => {
      const fetchMock = vi.fn(async () => tags('mistral:latest'));
      vi.stubGlobal('fetch', fetchMock);

      await new OllamaClient(inference).initialize();

      expect(fetchMock).toHaveBeenCalledWith('http://ollama.test/api/tags', expect.objectContaining({ method: 'GET' }));
    });
  });

  describe('healthCheck', () => {
    it('should report installed models when reachable', async () => {
      const client = new OllamaClient(inference, vi.fn(async () => tags('mistral:latest')));

      await expect(client.healthCheck()).resolves.toEqual({
        status: 'healthy',
        reachable: true,
        host: 'http://ollama.test',
        model: 'mistral:latest',
        models: ['mistral:latest'],
      });
    });

    it('should report unhealthy on an error status', async () => {
      const client = new OllamaClient(inference, vi.fn(async () => new Response('down', { status: 500 })));

      const health = await client.healthCheck();

      expect(health.status).toBe('unhealthy');
      expect(health.error).toBe('Ollama returned status 500: down');
    });
  });

  describe('chat', () => {
    it('should post the conversation and sampling options', async () => {
      const fetchMock = vi.fn(async (_url: string | URL, _init?: RequestInit) =>
        jsonResponse({ message: { role: 'assistant', content: 'Hi!' }, done: true }),
      );
      const client = new OllamaClient(inference, fetchMock);

      const reply = await client.chat([{ role: 'user', content: 'Hello' }], { temperature: 0.2 });

      expect(reply).toBe('Hi!');
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://ollama.test/api/chat');
      expect(JSON.parse(String(init?.body))).toEqual({
        model: 'mistral:latest',
        messages: [{ role: 'user', content: 'Hello' }],
        stream: false,
        options: { temperature: 0.2, num_predict: 2048 },
      });
    });

    it('should raise InferenceUnavailable when unreachable', async () => {
      const client = new OllamaClient(
        inference,
        vi.fn(async () => {
          throw new TypeError('fetch failed');
        }),
      );

      const error = await client.chat([{ role: 'user', content: 'Hello' }]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(GatewayError);
      expect(error).toMatchObject({
        kind: 'InferenceUnavailable',
        message: 'Inference backend unreachable: fetch failed',
      });
    });

    it.each([
      ['a non-JSON body', () => new Response('<html>bad gateway</html>', { status: 200 })],
      ['a body of the wrong shape', () => jsonResponse({ message: 42 })],
    ])('should raise InferenceUnavailable for %s', async (_label, reply) => {
      const client = new OllamaClient(inference, vi.fn(async () => reply()));

      const error = await client.chat([{ role: 'user', content: 'Hello' }]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(GatewayError);
      expect(error).toMatchObject({ kind: 'InferenceUnavailable' });
      expect(client.isReachable()).toBe(false);
    });
  });

  describe('chatStream', () => {
    it('should yield content fragments across chunk boundaries', async () => {
      const client = new OllamaClient(
        inference,
        vi.fn(async () =>
          ndjsonResponse([
            '{"message":{"content":"Hel"},"done":false}\n{"message":{"con',
            'tent":"lo"},"done":false}\n',
            '{"message":{"content":""},"done":true}\n',
          ]),
        ),
      );

      await expect(collect(client.chatStream([{ role: 'user', content: 'Hi' }]))).resolves.toEqual(['Hel', 'lo']);
    });

    it('should parse a final line without a trailing newline', async () => {
      const client = new OllamaClient(
        inference,
        vi.fn(async () => ndjsonResponse(['{"message":{"content":"a"}}\n{"message":{"content":"b"},"done":true}'])),
      );

      await expect(collect(client.chatStream([]))).resolves.toEqual(['a', 'b']);
    });

    it('should surface backend errors inside the stream', async () => {
      const client = new OllamaClient(
        inference,
        vi.fn(async () => ndjsonResponse(['{"message":{"content":"a"}}\n{"error":"model crashed"}\n'])),
      );

      await expect(collect(client.chatStream([]))).rejects.toMatchObject({
        kind: 'InferenceUnavailable',
        message: 'Ollama error: model crashed',
      });
    });

    it('should pass a caller abort through untouched', async () => {
      const controller = new AbortController();
      controller.abort();
      const client = new OllamaClient(
        inference,
        vi.fn(async (_url: string | URL, init?: RequestInit) => {
          init?.signal?.throwIfAborted();
          return ndjsonResponse([]);
        }),
      );

      const error = await collect(client.chatStream([], { signal: controller.signal })).catch((err: unknown) => err);

      expect(error).not.toBeInstanceOf(GatewayError);
      expect(error).toMatchObject({ name: 'AbortError' });
    });
  });
});
