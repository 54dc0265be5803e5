import { describe, expect, it } from 'vitest';

import { callPart, resultPart, textPart } from '../../src/conversation/parts.js';
import { MalformedResponseError } from '../../src/errors.js';
import { googleAdapter, withoutAdditionalProperties } from '../../src/providers/google.js';
import type { Message } from '../../src/types/conversation.js';
import { createMixedConversation, createModel, wireField } from '../helpers/mocks.js';

const identity = (text: string): string => text;
const model = createModel({ provider: 'google', modelId: 'gemini-test' });

describe('googleAdapter.toWire', () => {
  it('maps roles to user and model and lifts the system text', () => {
    const messages: Message[] = [
      { role: 'system', content: [textPart('Be brief')] },
      { role: 'user', content: [textPart('Hi')] },
      { role: 'assistant', content: [textPart('Hello')] },
    ];

    const wire = googleAdapter.toWire(messages, identity);

    expect(wire.system).toBe('Be brief');
    expect(wire.messages).toEqual([
      { role: 'user', parts: [{ text: 'Hi' }] },
      { role: 'model', parts: [{ text: 'Hello' }] },
    ]);
  });

  it('treats a system message after the first position as a user turn', () => {
    const messages: Message[] = [
      { role: 'user', content: [textPart('Hi')] },
      { role: 'system', content: [textPart('Late rule')] },
    ];

    const wire = googleAdapter.toWire(messages, identity);

    expect(wire.system).toBeUndefined();
    expect(wire.messages).toEqual([
      { role: 'user', parts: [{ text: 'Hi' }, { text: 'Late rule' }] },
    ]);
  });

  it('encodes calls and results', () => {
    const messages: Message[] = [
      { role: 'assistant', content: [callPart('weather', { city: 'Oslo' }, 'weather_0')] },
      { role: 'tool', content: [resultPart('weather', 'weather_0', 'rain')] },
    ];

    const wire = googleAdapter.toWire(messages, identity);

    expect(wire.messages).toEqual([
      {
        role: 'model',
        parts: [{ functionCall: { name: 'weather', args: { city: 'Oslo' }, id: 'weather_0' } }],
      },
      {
        role: 'user',
        parts: [
          {
            functionResponse: {
              name: 'weather',
              id: 'weather_0',
              response: { result: 'rain' },
            },
          },
        ],
      },
    ]);
  });
});

describe('withoutAdditionalProperties', () => {
  it('removes the key at every depth', () => {
    const schema = {
      type: 'object',
      additionalProperties: false,
      properties: {
        inner: { type: 'object', additionalProperties: false, properties: {} },
        list: { type: 'array', items: [{ additionalProperties: true }] },
      },
    };

    expect(withoutAdditionalProperties(schema)).toEqual({
      type: 'object',
      properties: {
        inner: { type: 'object', properties: {} },
        list: { type: 'array', items: [{}] },
      },
    });
  });
});

describe('googleAdapter.buildRequest', () => {
  it('puts model and key in the url', () => {
    const request = googleAdapter.buildRequest(
      [{ role: 'user', content: [textPart('Hi')] }],
      model,
      { apiKey: 'test key', tools: [], render: identity }
    );

    expect(request.url).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent?key=test%20key'
    );
    expect(request.headers).toEqual({});
    expect(request.body).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'Hi' }] }],
    });
  });

  it('adds system instruction, tools and output budget', () => {
    const request = googleAdapter.buildRequest(
      [
        { role: 'system', content: [textPart('S')] },
        { role: 'user', content: [textPart('U')] },
      ],
      model,
      {
        apiKey: 'test-key',
        tools: [
          {
            name: 'lookup',
            description: 'Find things',
            parameters: { type: 'object', properties: {}, additionalProperties: false },
          },
        ],
        render: identity,
        maxTokens: 256,
      }
    );

    expect(request.body).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'U' }] }],
      system_instruction: { parts: [{ text: 'S' }] },
      tools: [
        {
          functionDeclarations: [
            {
              name: 'lookup',
              description: 'Find things',
              parameters: { type: 'object', properties: {} },
            },
          ],
        },
      ],
      generationConfig: { maxOutputTokens: 256 },
    });
  });
});

describe('googleAdapter.fromWire', () => {
  it('synthesizes ids for calls without one', () => {
    const parsed = googleAdapter.fromWire({
      candidates: [
        {
          content: {
            parts: [
              { text: 'Checking' },
              { functionCall: { name: 'weather', args: { city: 'Oslo' } } },
              { functionCall: { name: 'weather', args: { city: 'Rome' } } },
              { functionCall: { name: 'time', args: {}, id: 'given' } },
            ],
          },
        },
      ],
      usageMetadata: { promptTokenCount: 20, candidatesTokenCount: 8 },
    });

    expect(parsed.message.content).toEqual([
      textPart('Checking'),
      callPart('weather', { city: 'Oslo' }, 'weather_0'),
      callPart('weather', { city: 'Rome' }, 'weather_1'),
      callPart('time', {}, 'given'),
    ]);
    expect(parsed.usage).toEqual({ tokensIn: 20, tokensOut: 8 });
  });

  it('rejects a response without candidates', () => {
    expect(() => googleAdapter.fromWire({ candidates: [] })).toThrow(MalformedResponseError);
  });

  it('rejects unknown part kinds', () => {
    expect(() =>
      googleAdapter.fromWire({
        candidates: [{ content: { parts: [{ executableCode: { code: '1' } }] } }],
      })
    ).toThrow(MalformedResponseError);
  });
});

describe('google wire round trip', () => {
  it('reads back the model turn it wrote', () => {
    const messages = createMixedConversation();
    const wire = googleAdapter.toWire(messages, identity);

    expect(wire.messages).toHaveLength(3);
    const response = {
      candidates: [{ content: { parts: wireField(wire.messages[1], 'parts') } }],
    };
    const parsed = googleAdapter.fromWire(response);

    expect(parsed.message).toEqual(messages[1]);
    expect(parsed.message.content.some((p) => p.type === 'result')).toBe(false);
  });
});
