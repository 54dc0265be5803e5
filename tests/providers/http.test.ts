import { afterEach, describe, expect, it, vi } from 'vitest';

import { MalformedResponseError, TransportError } from '../../src/errors.js';
import { postJson, redactUrl } from '../../src/providers/http.js';
import { AdapterRegistry, createDefaultAdapters } from '../../src/providers/registry.js';

const request = {
  url: 'https://api.example.test/v1/chat?key=test-secret',
  headers: { Authorization: 'Bearer test-secret' },
  body: { hello: 'world' },
};

describe('postJson', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts JSON and returns the decoded body', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await postJson(request, 1000);

    expect(result).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledWith(
      request.url,
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-secret',
        },
        body: '{"hello":"world"}',
      })
    );
  });

  it('raises TransportError with status for non-2xx replies', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('rate limited', { status: 429 }))
    );

    const error = await postJson(request, 1000).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      status: 429,
      message: 'HTTP 429 from https://api.example.test/v1/chat: rate limited',
    });
  });

  it('raises TransportError when the request fails', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('connection refused')));

    await expect(postJson(request, 1000)).rejects.toThrow(
      'Request to https://api.example.test/v1/chat failed: connection refused'
    );
  });

  it('reports timeouts', async () => {
    const timeout = new Error('aborted');
    timeout.name = 'TimeoutError';
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(timeout));

    await expect(postJson(request, 250)).rejects.toThrow(
      'Request to https://api.example.test/v1/chat timed out after 250ms'
    );
  });

  it('raises MalformedResponseError for a non-JSON body', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>', { status: 200 })));

    await expect(postJson(request, 1000)).rejects.toThrow(MalformedResponseError);
  });
});

describe('redactUrl', () => {
  it('drops the query string', () => {
    expect(redactUrl('https://x.test/a?key=test-secret')).toBe('https://x.test/a');
    expect(redactUrl('https://x.test/a')).toBe('https://x.test/a');
  });
});

describe('AdapterRegistry', () => {
  it('holds every built-in vendor', () => {
    expect(createDefaultAdapters().providers()).toEqual([
      'anthropic',
      'deepseek',
      'google',
      'groq',
      'mistral',
      'openai',
      'xai',
    ]);
  });

  it('throws for an unknown provider', () => {
    expect(() => new AdapterRegistry().get('nowhere')).toThrow(
      'No adapter registered for provider nowhere'
    );
  });
});
