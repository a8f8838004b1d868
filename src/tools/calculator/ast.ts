/**
 * Expression tree produced by the calculator parser
 */

import type { NumericLiteral, Operator } from './lexer.js';

/** The only names an expression may mention */
export const ALLOWED_FUNCTIONS = ['abs', 'round', 'min', 'max', 'sum', 'pow', 'divmod'] as const;

export type FunctionName = (typeof ALLOWED_FUNCTIONS)[number];

export type UnaryOperator = '-' | '+';
export type BinaryOperator = Operator;

const ALLOWED_NAMES: readonly string[] = ALLOWED_FUNCTIONS;

export function isAllowedFunction(name: string): name is FunctionName {
  return ALLOWED_NAMES.includes(name);
}

export interface LiteralNode {
  type: 'Literal';
  value: NumericLiteral;
  offset: number;
}

export interface UnaryOpNode {
  type: 'UnaryOp';
  operator: UnaryOperator;
  operand: ExpressionNode;
  offset: number;
}

export interface BinaryOpNode {
  type: 'BinaryOp';
  operator: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
  offset: number;
}

export interface CallNode {
  type: 'Call';
  callee: FunctionName;
  args: ExpressionNode[];
  offset: number;
}

/** Tuple `(a, b)` or list `[a, b]` literal */
export interface SequenceNode {
  type: 'Sequence';
  kind: 'tuple' | 'list';
  items: ExpressionNode[];
  offset: number;
}

export type ExpressionNode = LiteralNode | UnaryOpNode | BinaryOpNode | CallNode | SequenceNode;
