/**
 * Conversions between Ponder messages/tools and the OpenAI chat-completions format
 */

import type OpenAI from 'openai';
import { z } from 'zod';
import type { ChatMessage, Tool } from '../core/models.js';

export type JsonSchema = Record<string, unknown>;

// ============================================================================
// Message Conversion
// ============================================================================

/**
 * Convert Ponder messages to OpenAI messages format
 * @param messages Array of chat messages
 * @returns OpenAI-compatible messages
 */
export function toOpenAIMessages(messages: ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };

      case 'user':
        return { role: 'user', content: message.content };

      case 'assistant': {
        if (!message.toolCalls?.length) {
          return { role: 'assistant', content: message.content };
        }
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.toolCalls.map((tc) => ({
            id: tc.toolCallId ?? `call_${Math.random().toString(36).slice(2, 11)}`,
            type: 'function',
            function: {
              name: tc.name,
              arguments: tc.arguments,
            },
          })),
        };
      }

      case 'tool':
        return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };

      default:
        // Type guard - should never reach here
        throw new Error(`Unknown message role: ${JSON.stringify(message satisfies never)}`);
    }
  });
}

// ============================================================================
// Tool Conversion
// ============================================================================

/**
 * Convert Ponder tools to OpenAI tools format
 * @param tools Map of tool name to Tool object
 * @returns OpenAI-compatible tools array
 */
export function toOpenAITools(tools: Map<string, Tool>): OpenAI.ChatCompletionTool[] {
  const openaiTools: OpenAI.ChatCompletionTool[] = [];

  for (const [name, tool] of tools) {
    openaiTools.push({
      type: 'function',
      function: {
        name,
        description: tool.description,
        parameters: toParametersSchema(tool.parameters),
      },
    });
  }

  return openaiTools;
}

/**
 * Top-level function parameters: always an object schema
 */
function toParametersSchema(parameters: z.ZodTypeAny | null): JsonSchema {
  const schema = parameters ? unwrapEffects(parameters) : null;
  if (!(schema instanceof z.ZodObject)) {
    return { type: 'object', properties: {} };
  }

  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];
  for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    properties[key] = zodToJsonSchema(value);
    if (!value.isOptional()) required.push(key);
  }

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

/** Strip .refine/.transform wrappers (ZodEffects) */
function unwrapEffects(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema;
  while (current instanceof z.ZodEffects) {
    current = current.innerType();
  }
  return current;
}

/**
 * Convert a Zod schema to JSON Schema
 * Covers the schema kinds tool parameters use; anything else is described as a string
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const withDescription = (result: JsonSchema): JsonSchema =>
    schema.description && result.description === undefined ? { description: schema.description, ...result } : result;

  if (schema instanceof z.ZodEffects) {
    return withDescription(zodToJsonSchema(schema.innerType()));
  }
  if (schema instanceof z.ZodOptional) {
    return withDescription(zodToJsonSchema(schema.unwrap()));
  }
  if (schema instanceof z.ZodDefault) {
    // Represent as the underlying schema
    return withDescription(zodToJsonSchema(schema.removeDefault()));
  }
  if (schema instanceof z.ZodNullable) {
    return withDescription({ ...zodToJsonSchema(schema.unwrap()), nullable: true });
  }

  const result: JsonSchema = {};
  if (schema.description) {
    result.description = schema.description;
  }

  if (schema instanceof z.ZodString) {
    result.type = 'string';
  } else if (schema instanceof z.ZodNumber) {
    result.type = schema.isInt ? 'integer' : 'number';
  } else if (schema instanceof z.ZodBoolean) {
    result.type = 'boolean';
  } else if (schema instanceof z.ZodArray) {
    result.type = 'array';
    result.items = zodToJsonSchema(schema.element);
  } else if (schema instanceof z.ZodObject) {
    Object.assign(result, toParametersSchema(schema));
  } else if (schema instanceof z.ZodEnum) {
    result.type = 'string';
    result.enum = schema.options;
  } else if (schema instanceof z.ZodLiteral) {
    result.type = typeof schema.value;
    result.const = schema.value;
  } else if (schema instanceof z.ZodUnion) {
    result.anyOf = schema.options.map((option: z.ZodTypeAny) => zodToJsonSchema(option));
  } else if (schema instanceof z.ZodRecord) {
    result.type = 'object';
    result.additionalProperties = zodToJsonSchema(schema.valueSchema);
  } else if (schema instanceof z.ZodAny || schema instanceof z.ZodUnknown) {
    // no constraint
  } else {
    result.type = 'string';
  }

  return result;
}
