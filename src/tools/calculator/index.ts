/**
 * Calculator tool: safe evaluation of arithmetic expressions
 *
 * Expressions are tokenized and parsed into a closed grammar of numbers,
 * arithmetic operators, tuples, lists and an allow-list of functions. Nothing
 * outside that grammar is ever executed.
 */

import { z } from 'zod';
import type { Tool, ToolResult } from '../../core/models.js';
import { ToolUseCountMetadata } from '../../core/models.js';
import { CalculatorError, ExpressionArithmeticError, ExpressionLimitError, ExpressionSyntaxError } from './errors.js';
import { evaluateNode } from './evaluator.js';
import { formatValue } from './format.js';
import type { CalculatorLimits } from './limits.js';
import { parseExpression } from './parser.js';
import type { Value } from './values.js';

export { ALLOWED_FUNCTIONS, type ExpressionNode, type FunctionName } from './ast.js';
export { CalculatorError, ExpressionArithmeticError, ExpressionLimitError, ExpressionSyntaxError } from './errors.js';
export { evaluateNode } from './evaluator.js';
export { formatFloat, formatValue } from './format.js';
export { tokenize, type Token } from './lexer.js';
export { DEFAULT_LIMITS, type CalculatorLimits } from './limits.js';
export { parseExpression } from './parser.js';
export type { Value } from './values.js';

/** Category of a failed evaluation */
export type EvaluationErrorKind = 'syntax' | 'arithmetic' | 'limit' | 'internal';

export type EvaluationResult =
  | { ok: true; value: Value; text: string }
  | { ok: false; error: string; kind: EvaluationErrorKind };

/** Longest echo of the input in an error message */
const ECHO_LENGTH = 80;

/**
 * Parse, evaluate and render an expression. Never throws.
 */
export function evaluate(expression: string, limits: Partial<CalculatorLimits> = {}): EvaluationResult {
  try {
    const value = evaluateNode(parseExpression(expression, limits), limits);
    return { ok: true, value, text: formatValue(value) };
  } catch (error) {
    return { ok: false, ...describeFailure(error) };
  }
}

function describeFailure(error: unknown): { error: string; kind: EvaluationErrorKind } {
  if (error instanceof ExpressionSyntaxError) {
    return { error: error.message, kind: 'syntax' };
  }
  if (error instanceof ExpressionLimitError) {
    return { error: error.message, kind: 'limit' };
  }
  if (error instanceof ExpressionArithmeticError || error instanceof CalculatorError) {
    return { error: error.message, kind: 'arithmetic' };
  }
  // Engine limits: call stack exhaustion or BigInt size
  if (error instanceof RangeError) {
    return { error: `expression is too large to evaluate (${error.message})`, kind: 'limit' };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { error: `unexpected error: ${message}`, kind: 'internal' };
}

/**
 * Tool body: the rendered result, or an error line naming the expression
 */
export function calculate(expression: string): string {
  return renderResult(expression, evaluate(expression));
}

/** Result text, or `Error calculating <expression>: <reason>` */
export function renderResult(expression: string, result: EvaluationResult): string {
  return result.ok ? result.text : `Error calculating ${shorten(expression)}: ${result.error}`;
}

function shorten(expression: string): string {
  return expression.length > ECHO_LENGTH ? `${expression.slice(0, ECHO_LENGTH - 3)}...` : expression;
}

// ============================================================================
// Tool descriptor
// ============================================================================

export const CalculateParamsSchema = z.object({
  expression: z
    .string()
    .describe('Arithmetic expression to evaluate, e.g. "2 + 3 * 4", "sum([1, 2, 3])" or "divmod(7, 2)"'),
});

export type CalculateParams = z.infer<typeof CalculateParamsSchema>;

export const CALCULATE_TOOL: Tool<typeof CalculateParamsSchema, ToolUseCountMetadata> = {
  name: 'calculate',
  description: 'Calculate the result of a mathematical expression.',
  parameters: CalculateParamsSchema,
  executor: async (params): Promise<ToolResult<ToolUseCountMetadata>> => {
    const result = evaluate(params.expression);
    return {
      content: renderResult(params.expression, result),
      isError: !result.ok,
      metadata: new ToolUseCountMetadata(1),
    };
  },
};
