import { MAX_EXPRESSION_LENGTH, MAX_INTEGER_BITS, MAX_NESTING_DEPTH } from '../../constants.js';

/** Bounds on the cost of a single evaluation */
export interface CalculatorLimits {
  /** Longest accepted expression, in characters */
  maxLength: number;
  /** Deepest accepted nesting of parentheses, calls and unary operators */
  maxDepth: number;
  /** Largest integer value, in bits */
  maxIntegerBits: number;
}

export const DEFAULT_LIMITS: CalculatorLimits = {
  maxLength: MAX_EXPRESSION_LENGTH,
  maxDepth: MAX_NESTING_DEPTH,
  maxIntegerBits: MAX_INTEGER_BITS,
};

export function resolveLimits(limits: Partial<CalculatorLimits> = {}): CalculatorLimits {
  return { ...DEFAULT_LIMITS, ...limits };
}
