/**
 * Unit tests for chat-completions conversions
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { toOpenAIMessages, toOpenAITools, zodToJsonSchema } from '../../src/clients/utils.js';
import type { Tool } from '../../src/core/models.js';
import { BUILTIN_TOOLS } from '../../src/tools/index.js';

describe('toOpenAIMessages', () => {
  it('should convert plain messages', () => {
    expect(
      toOpenAIMessages([
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
      ])
    ).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ]);
  });

  it('should convert tool calls and results', () => {
    expect(
      toOpenAIMessages([
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ name: 'calculate', arguments: '{"expression":"1+1"}', toolCallId: 'call_1' }],
        },
        { role: 'tool', content: '2', toolCallId: 'call_1', name: 'calculate', argsWasValid: true, isError: false },
      ])
    ).toEqual([
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'call_1', type: 'function', function: { name: 'calculate', arguments: '{"expression":"1+1"}' } },
        ],
      },
      { role: 'tool', content: '2', tool_call_id: 'call_1' },
    ]);
  });

  it('should invent an id for tool calls without one', () => {
    const [converted] = toOpenAIMessages([
      { role: 'assistant', content: 'checking', toolCalls: [{ name: 'get_current_time', arguments: '{}' }] },
    ]);

    expect(converted).toMatchObject({
      role: 'assistant',
      content: 'checking',
      tool_calls: [{ id: expect.stringMatching(/^call_[a-z0-9]+$/), type: 'function' }],
    });
  });
});

describe('toOpenAITools', () => {
  it('should describe the built-in tools', () => {
    const tools = new Map<string, Tool>(BUILTIN_TOOLS.map((tool) => [tool.name, tool]));

    expect(toOpenAITools(tools)).toEqual([
      {
        type: 'function',
        function: {
          name: 'calculate',
          description: 'Calculate the result of a mathematical expression.',
          parameters: {
            type: 'object',
            properties: {
              expression: {
                type: 'string',
                description:
                  'Arithmetic expression to evaluate, e.g. "2 + 3 * 4", "sum([1, 2, 3])" or "divmod(7, 2)"',
              },
            },
            required: ['expression'],
          },
        },
      },
      {
        type: 'function',
        function: {
          name: 'get_current_time',
          description: 'Get the current time and date.',
          parameters: { type: 'object', properties: {} },
        },
      },
    ]);
  });

  it('should give parameterless tools an empty object schema', () => {
    const tools = new Map<string, Tool>([
      ['ping', { name: 'ping', description: 'Ping', parameters: null, executor: () => ({ content: 'pong' }) }],
    ]);

    expect(toOpenAITools(tools)[0]?.function.parameters).toEqual({ type: 'object', properties: {} });
  });
});

describe('zodToJsonSchema', () => {
  it.each([
    [z.number().int(), { type: 'integer' }],
    [z.number(), { type: 'number' }],
    [z.boolean(), { type: 'boolean' }],
    [z.enum(['km', 'mi']), { type: 'string', enum: ['km', 'mi'] }],
    [z.array(z.number()), { type: 'array', items: { type: 'number' } }],
    [z.string().nullable(), { type: 'string', nullable: true }],
    [z.string().optional().describe('unit'), { type: 'string', description: 'unit' }],
    [z.literal(3), { type: 'number', const: 3 }],
    [z.record(z.string()), { type: 'object', additionalProperties: { type: 'string' } }],
    [z.unknown(), {}],
  ])('should convert schema %#', (schema, expected) => {
    expect(zodToJsonSchema(schema)).toEqual(expected);
  });

  it('should mark only required object keys', () => {
    expect(zodToJsonSchema(z.object({ a: z.string(), b: z.number().optional(), c: z.boolean().default(false) }))).toEqual({
      type: 'object',
      properties: { a: { type: 'string' }, b: { type: 'number' }, c: { type: 'boolean' } },
      required: ['a'],
    });
  });
});
