/**
 * JSON Schema (as advertised by MCP servers) to Zod conversion
 * Simplified implementation - handles the common cases
 */

import { z } from 'zod';

const JsonSchemaNodeSchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
    items: z.unknown().optional(),
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
    $ref: z.string().optional(),
  })
  .passthrough();

type JsonSchemaNode = z.infer<typeof JsonSchemaNodeSchema>;

/**
 * Convert a JSON Schema node to a Zod schema
 * Unknown or unsupported constructs accept any value
 */
export function jsonSchemaToZod(schema: unknown): z.ZodTypeAny {
  const parsed = JsonSchemaNodeSchema.safeParse(schema);
  if (!parsed.success) {
    return z.unknown();
  }
  const node = parsed.data;
  const converted = convertNode(node);
  return node.description ? converted.describe(node.description) : converted;
}

function convertNode(node: JsonSchemaNode): z.ZodTypeAny {
  // $ref is not resolved
  if (node.$ref) {
    return z.unknown();
  }

  // ["string", "null"] style nullable types
  if (Array.isArray(node.type)) {
    const types = node.type.filter((t) => t !== 'null');
    const [single] = types;
    const inner = types.length === 1 && single !== undefined ? convertNode({ ...node, type: single }) : z.unknown();
    return node.type.includes('null') ? inner.nullable() : inner;
  }

  switch (node.type) {
    case 'string': {
      const [first, ...rest] = (node.enum ?? []).filter((v): v is string => typeof v === 'string');
      return first !== undefined ? z.enum([first, ...rest]) : z.string();
    }

    case 'integer':
      return z.number().int();

    case 'number':
      return z.number();

    case 'boolean':
      return z.boolean();

    case 'array':
      return z.array(node.items === undefined ? z.unknown() : jsonSchemaToZod(node.items));

    case 'object':
      return objectSchemaToZod(node);

    default:
      return z.unknown();
  }
}

/**
 * Convert an object schema; properties not listed as required become optional
 * and unknown properties are passed through to the server
 */
export function objectSchemaToZod(schema: unknown): z.ZodType<Record<string, unknown>> {
  const parsed = JsonSchemaNodeSchema.safeParse(schema);
  const node: JsonSchemaNode = parsed.success ? parsed.data : {};
  const required = new Set(node.required ?? []);

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, propSchema] of Object.entries(node.properties ?? {})) {
    const propZod = jsonSchemaToZod(propSchema);
    shape[key] = required.has(key) ? propZod : propZod.optional();
  }

  return z.object(shape).passthrough();
}
