/**
 * Custom Tool Example
 *
 * Adds a unit conversion tool next to the built-in calculator and clock, and
 * connects the MCP server from .env when one is configured.
 *
 * To run this example:
 *   1. Create a .env file (see .env.example)
 *   2. Run: npx tsx examples/custom-tool.ts
 */

import { z } from 'zod';
import {
  Agent,
  BUILTIN_TOOLS,
  createMcpProvider,
  ToolUseCountMetadata,
  type Tool,
  type ToolProvider,
  type ToolResult,
} from '../src/index.js';
import { loadExampleConfig } from './_helpers.js';

// Define parameter schema for your tool
const ConvertParamsSchema = z.object({
  value: z.number().describe('Quantity to convert'),
  from: z.enum(['km', 'mi']).describe('Unit of the value'),
});

type ConvertParams = z.infer<typeof ConvertParamsSchema>;

const KM_PER_MILE = 1.609344;

// Create a custom tool
const convertTool: Tool<typeof ConvertParamsSchema, ToolUseCountMetadata> = {
  name: 'convert_distance',
  description: 'Convert a distance between kilometres and miles',
  parameters: ConvertParamsSchema,
  executor: async (params: ConvertParams): Promise<ToolResult<ToolUseCountMetadata>> => {
    const converted = params.from === 'km' ? params.value / KM_PER_MILE : params.value * KM_PER_MILE;
    const unit = params.from === 'km' ? 'mi' : 'km';
    return {
      content: `${converted.toFixed(3)} ${unit}`,
      metadata: new ToolUseCountMetadata(1),
    };
  },
};

async function main() {
  const { config, client } = loadExampleConfig();

  const tools: Array<Tool | ToolProvider> = [...BUILTIN_TOOLS, convertTool];
  if (config.mcp.enabled) {
    // Skipped with a warning when the server is not running
    tools.push(createMcpProvider(config.mcp));
  }

  const agent = new Agent({
    client,
    name: 'distance-assistant',
    maxTurns: 5,
    tools,
    systemPrompt: 'Convert units with convert_distance and do any further arithmetic with calculate.',
  });

  await using session = agent.session();

  const result = await session.run('A marathon is 42.195 km. How many miles is that, and how many laps of a 400 m track?');
  console.log(result.finalMessage);
}

main().catch(console.error);
