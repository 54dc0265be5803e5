import { describe, expect, it } from 'vitest';

import { callPart, resultPart, textPart } from '../../src/conversation/parts.js';
import { MalformedResponseError } from '../../src/errors.js';
import { anthropicAdapter } from '../../src/providers/anthropic.js';
import type { Message } from '../../src/types/conversation.js';
import {
  createMixedConversation,
  createModel,
  createTool,
  wireField,
} from '../helpers/mocks.js';

const identity = (text: string): string => text;
const model = createModel({ provider: 'anthropic', modelId: 'claude-test' });

describe('anthropicAdapter.toWire', () => {
  it('lifts a leading system message out of the list', () => {
    const messages: Message[] = [
      { role: 'system', content: [textPart('Be brief')] },
      { role: 'user', content: [textPart('Hi')] },
    ];

    const wire = anthropicAdapter.toWire(messages, identity);

    expect(wire.system).toBe('Be brief');
    expect(wire.messages).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'Hi' }] },
    ]);
  });

  it('does not mutate its input and yields the same result twice', () => {
    const messages: Message[] = [
      { role: 'system', content: [textPart('S')] },
      { role: 'user', content: [textPart('U')] },
    ];
    const before = structuredClone(messages);

    const first = anthropicAdapter.toWire(messages, identity);
    const second = anthropicAdapter.toWire(messages, identity);

    expect(messages).toEqual(before);
    expect(second).toEqual(first);
  });

  it('sends tool results as user tool_result blocks', () => {
    const messages: Message[] = [
      { role: 'user', content: [textPart('Weather?')] },
      { role: 'assistant', content: [callPart('weather', { city: 'Oslo' }, 'tu_1')] },
      { role: 'tool', content: [resultPart('weather', 'tu_1', 'rain')] },
    ];

    const wire = anthropicAdapter.toWire(messages, identity);

    expect(wire.messages).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'Weather?' }] },
      {
        role: 'assistant',
        content: [{ type: 'tool_use', id: 'tu_1', name: 'weather', input: { city: 'Oslo' } }],
      },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'tu_1', content: 'rain' }],
      },
    ]);
  });

  it('merges a tool message with a following user message', () => {
    const messages: Message[] = [
      { role: 'tool', content: [resultPart('f', 'id', 'ok')] },
      { role: 'user', content: [textPart('next')] },
    ];

    const wire = anthropicAdapter.toWire(messages, identity);

    expect(wire.messages).toHaveLength(1);
    expect(wire.messages[0]).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', tool_use_id: 'id', content: 'ok' },
        { type: 'text', text: 'next' },
      ],
    });
  });

  it('renders text parts through the callback', () => {
    const messages: Message[] = [{ role: 'user', content: [textPart('Hi <[name]>')] }];

    const wire = anthropicAdapter.toWire(messages, (t) => t.replace('<[name]>', 'Ada'));

    expect(wire.messages).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'Hi Ada' }] },
    ]);
  });

  it('encodes images as base64 sources', () => {
    const messages: Message[] = [
      {
        role: 'user',
        content: [{ type: 'image', filename: 'a.png', mediaType: 'image/png', data: 'AQID' }],
      },
    ];

    const wire = anthropicAdapter.toWire(messages, identity);

    expect(wire.messages[0]).toEqual({
      role: 'user',
      content: [
        { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'AQID' } },
      ],
    });
  });
});

describe('anthropicAdapter.buildRequest', () => {
  it('builds url, headers and body', () => {
    const messages: Message[] = [
      { role: 'system', content: [textPart('S')] },
      { role: 'user', content: [textPart('U')] },
    ];

    const request = anthropicAdapter.buildRequest(messages, model, {
      apiKey: 'test-key',
      tools: [createTool('lookup')],
      render: identity,
    });

    expect(request.url).toBe('https://api.anthropic.com/v1/messages');
    expect(request.headers).toEqual({
      'x-api-key': 'test-key',
      'anthropic-version': '2023-06-01',
    });
    expect(request.body).toEqual({
      model: 'claude-test',
      max_tokens: 4096,
      system: 'S',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'U' }] }],
      tools: [
        {
          name: 'lookup',
          description: 'lookup tool',
          input_schema: {
            type: 'object',
            properties: { value: { type: 'string' } },
            required: ['value'],
          },
        },
      ],
    });
  });

  it('omits system and tools when absent and honours maxTokens', () => {
    const request = anthropicAdapter.buildRequest(
      [{ role: 'user', content: [textPart('U')] }],
      model,
      { apiKey: 'test-key', tools: [], render: identity, maxTokens: 100 }
    );

    expect(request.body).toEqual({
      model: 'claude-test',
      max_tokens: 100,
      messages: [{ role: 'user', content: [{ type: 'text', text: 'U' }] }],
    });
  });
});

describe('anthropicAdapter.fromWire', () => {
  it('parses text and tool calls in order with usage', () => {
    const parsed = anthropicAdapter.fromWire({
      content: [
        { type: 'text', text: 'Let me check' },
        { type: 'tool_use', id: 'tu_1', name: 'weather', input: { city: 'Oslo' } },
        { type: 'tool_use', id: 'tu_2', name: 'time', input: {} },
      ],
      usage: { input_tokens: 12, output_tokens: 7 },
    });

    expect(parsed.message).toEqual({
      role: 'assistant',
      content: [
        textPart('Let me check'),
        callPart('weather', { city: 'Oslo' }, 'tu_1'),
        callPart('time', {}, 'tu_2'),
      ],
    });
    expect(parsed.usage).toEqual({ tokensIn: 12, tokensOut: 7 });
  });

  it('defaults usage to zero', () => {
    const parsed = anthropicAdapter.fromWire({ content: [{ type: 'text', text: 'ok' }] });

    expect(parsed.usage).toEqual({ tokensIn: 0, tokensOut: 0 });
  });

  it('rejects unknown content kinds', () => {
    expect(() =>
      anthropicAdapter.fromWire({ content: [{ type: 'thinking', thinking: '...' }] })
    ).toThrow(MalformedResponseError);
  });

  it('rejects a body without content', () => {
    expect(() => anthropicAdapter.fromWire({ error: 'nope' })).toThrow(
      'Unexpected anthropic response at content'
    );
  });
});

describe('anthropic wire round trip', () => {
  it('reads back the assistant turn it wrote', () => {
    const messages = createMixedConversation();
    const wire = anthropicAdapter.toWire(messages, identity);

    expect(wire.messages).toHaveLength(3);
    const response = {
      content: wireField(wire.messages[1], 'content'),
      usage: { input_tokens: 1, output_tokens: 1 },
    };
    const parsed = anthropicAdapter.fromWire(response);

    expect(parsed.message).toEqual(messages[1]);
    expect(parsed.message.content.some((p) => p.type === 'result')).toBe(false);
  });
});
