/**
 * Tool exports and BUILTIN_TOOLS
 */

import type { Tool } from '../core/models.js';
import { CALCULATE_TOOL } from './calculator/index.js';
import { CURRENT_TIME_TOOL } from './clock.js';

export {
  CALCULATE_TOOL,
  CalculateParamsSchema,
  type CalculateParams,
  calculate,
  evaluate,
  type EvaluationResult,
  type EvaluationErrorKind,
} from './calculator/index.js';
export { CURRENT_TIME_TOOL, CurrentTimeParamsSchema, formatLocalTimestamp } from './clock.js';
export { MCPToolProvider, type McpServerStatus, type McpToolDescription } from './mcp/index.js';

/**
 * Tools every Ponder agent carries; they need no network or credentials
 */
export const BUILTIN_TOOLS: Tool[] = [CALCULATE_TOOL, CURRENT_TIME_TOOL];
