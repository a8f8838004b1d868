/**
 * Tree-walking interpreter for parsed calculator expressions
 */

import type { CallNode, ExpressionNode, FunctionName } from './ast.js';
import { ExpressionArithmeticError } from './errors.js';
import { resolveLimits, type CalculatorLimits } from './limits.js';
import {
  Arithmetic,
  float,
  floorDiv,
  int,
  isNumeric,
  typeName,
  type NumericValue,
  type Value,
} from './values.js';

type Builtin = (args: Value[], arithmetic: Arithmetic) => Value;

/** Evaluate a parsed expression; throws a CalculatorError on failure */
export function evaluateNode(node: ExpressionNode, limits: Partial<CalculatorLimits> = {}): Value {
  const arithmetic = new Arithmetic(resolveLimits(limits).maxIntegerBits);
  return visit(node, arithmetic);
}

function visit(node: ExpressionNode, arithmetic: Arithmetic): Value {
  switch (node.type) {
    case 'Literal':
      return node.value.kind === 'int'
        ? arithmetic.checkInt(node.value.value)
        : arithmetic.checkFloat(node.value.value);
    case 'UnaryOp': {
      const operand = visit(node.operand, arithmetic);
      return node.operator === '-' ? arithmetic.negate(operand) : arithmetic.plus(operand);
    }
    case 'BinaryOp':
      return arithmetic.binary(node.operator, visit(node.left, arithmetic), visit(node.right, arithmetic));
    case 'Call':
      return call(node, arithmetic);
    case 'Sequence':
      return {
        kind: 'sequence',
        sequenceKind: node.kind,
        items: node.items.map((item) => visit(item, arithmetic)),
      };
  }
}

function call(node: CallNode, arithmetic: Arithmetic): Value {
  const args = node.args.map((arg) => visit(arg, arithmetic));
  return BUILTINS[node.callee](args, arithmetic);
}

// ============================================================================
// Builtins
// ============================================================================

const BUILTINS: Record<FunctionName, Builtin> = {
  abs: (args) => {
    const [x] = args;
    if (x === undefined || args.length > 1) {
      throw new ExpressionArithmeticError(`abs() takes exactly one argument (${args.length} given)`);
    }
    if (!isNumeric(x)) {
      throw new ExpressionArithmeticError(`bad operand type for abs(): '${typeName(x)}'`);
    }
    return x.kind === 'int' ? int(x.value < 0n ? -x.value : x.value) : float(Math.abs(x.value));
  },

  round: (args, arithmetic) => {
    const [x, ndigits] = args;
    if (x === undefined) {
      throw new ExpressionArithmeticError("round() missing required argument 'number'");
    }
    if (args.length > 2) {
      throw new ExpressionArithmeticError(`round() takes at most 2 arguments (${args.length} given)`);
    }
    if (!isNumeric(x)) {
      throw new ExpressionArithmeticError(`type ${typeName(x)} doesn't define __round__ method`);
    }
    if (ndigits === undefined) {
      return x.kind === 'int' ? x : arithmetic.checkInt(BigInt(roundHalfEven(x.value)));
    }
    if (ndigits.kind !== 'int') {
      throw new ExpressionArithmeticError(`'${typeName(ndigits)}' object cannot be interpreted as an integer`);
    }
    return x.kind === 'int'
      ? int(roundInt(x.value, ndigits.value))
      : arithmetic.checkFloat(roundFloat(x.value, ndigits.value));
  },

  min: (args, arithmetic) => extreme('min', args, arithmetic, -1),

  max: (args, arithmetic) => extreme('max', args, arithmetic, 1),

  sum: (args, arithmetic) => {
    const [first, start] = args;
    if (first === undefined) {
      throw new ExpressionArithmeticError('sum() takes at least 1 argument (0 given)');
    }

    // sum(iterable[, start]) or sum(a, b, c, ...)
    let items: Value[];
    let total: Value = int(0n);
    if (first.kind === 'sequence') {
      if (args.length > 2) {
        throw new ExpressionArithmeticError(
          `sum() takes at most 2 arguments when the first is a sequence (${args.length} given)`
        );
      }
      items = first.items;
      total = start ?? total;
    } else if (args.length === 1) {
      throw new ExpressionArithmeticError(`'${typeName(first)}' object is not iterable`);
    } else {
      items = args;
    }

    for (const item of items) {
      total = arithmetic.binary('+', total, item);
    }
    return total;
  },

  pow: (args, arithmetic) => {
    const [base, exponent, modulus] = args;
    if (base === undefined || exponent === undefined || args.length > 3) {
      throw new ExpressionArithmeticError(`pow() takes 2 or 3 arguments (${args.length} given)`);
    }
    if (modulus !== undefined) {
      return arithmetic.modularPower(base, exponent, modulus);
    }
    return arithmetic.binary('**', base, exponent);
  },

  divmod: (args, arithmetic) => {
    const [left, right] = args;
    if (left === undefined || right === undefined || args.length > 2) {
      throw new ExpressionArithmeticError(`divmod expected 2 arguments, got ${args.length}`);
    }
    return arithmetic.divmod(left, right);
  },
};

/** min/max: one sequence argument, or several scalars; the first extreme wins */
function extreme(name: 'min' | 'max', args: Value[], arithmetic: Arithmetic, direction: 1 | -1): Value {
  const [first] = args;
  if (first === undefined) {
    throw new ExpressionArithmeticError(`${name} expected at least 1 argument, got 0`);
  }

  let candidates: Value[];
  if (args.length === 1) {
    if (first.kind !== 'sequence') {
      throw new ExpressionArithmeticError(`'${typeName(first)}' object is not iterable`);
    }
    candidates = first.items;
  } else {
    candidates = args;
  }

  let best: NumericValue | undefined;
  for (const candidate of candidates) {
    if (!isNumeric(candidate)) {
      throw new ExpressionArithmeticError(`${name}() arguments must be numbers, not '${typeName(candidate)}'`);
    }
    if (best === undefined || arithmetic.compare(candidate, best) * direction > 0) {
      best = candidate;
    }
  }

  if (best === undefined) {
    throw new ExpressionArithmeticError(`${name}() arg is an empty sequence`);
  }
  return best;
}

// ============================================================================
// Rounding
// ============================================================================

function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) {
    return floor;
  }
  if (diff > 0.5) {
    return floor + 1;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function roundFloat(value: number, ndigits: bigint): number {
  // Beyond these bounds every double is already exact, or rounds to zero
  if (ndigits > 400n) {
    return value;
  }
  if (ndigits < -308n) {
    return 0 * value;
  }

  const digits = Number(ndigits);
  if (digits >= 0) {
    const factor = 10 ** digits;
    const scaled = value * factor;
    return Number.isFinite(scaled) ? roundHalfEven(scaled) / factor : value;
  }
  const factor = 10 ** -digits;
  return roundHalfEven(value / factor) * factor;
}

function roundInt(value: bigint, ndigits: bigint): bigint {
  if (ndigits >= 0n) {
    return value;
  }
  const magnitude = value < 0n ? -value : value;
  if (-ndigits > BigInt(magnitude.toString().length)) {
    return 0n;
  }
  const unit = 10n ** -ndigits;

  let quotient = floorDiv(value, unit);
  const twice = (value - quotient * unit) * 2n;
  if (twice > unit || (twice === unit && quotient % 2n !== 0n)) {
    quotient += 1n;
  }
  return quotient * unit;
}
