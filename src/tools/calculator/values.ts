/**
 * Runtime values and numeric semantics for the calculator
 *
 * Integers are arbitrary precision and stay integers under + - * // % and
 * non-negative integer powers. True division always yields a float. Floats
 * are always finite: any operation that would produce Infinity or NaN fails.
 */

import type { BinaryOperator } from './ast.js';
import { ExpressionArithmeticError, ExpressionLimitError } from './errors.js';
import type { NumericLiteral } from './lexer.js';

export type NumericValue = NumericLiteral;

export interface SequenceValue {
  kind: 'sequence';
  sequenceKind: 'tuple' | 'list';
  items: Value[];
}

export type Value = NumericValue | SequenceValue;

export const int = (value: bigint): NumericValue => ({ kind: 'int', value });
export const float = (value: number): NumericValue => ({ kind: 'float', value });
export const tuple = (...items: Value[]): SequenceValue => ({ kind: 'sequence', sequenceKind: 'tuple', items });

export function typeName(value: Value): string {
  return value.kind === 'sequence' ? value.sequenceKind : value.kind;
}

export function isNumeric(value: Value): value is NumericValue {
  return value.kind !== 'sequence';
}

export function bitLength(value: bigint): number {
  return (value < 0n ? -value : value).toString(2).length;
}

/** Numeric context: carries the integer size bound */
export class Arithmetic {
  constructor(private maxIntegerBits: number) {}

  checkInt(value: bigint): NumericValue {
    if (bitLength(value) > this.maxIntegerBits) {
      throw new ExpressionLimitError(`integer result is too large (limit ${this.maxIntegerBits} bits)`);
    }
    return int(value);
  }

  checkFloat(value: number): NumericValue {
    if (!Number.isFinite(value)) {
      throw new ExpressionArithmeticError('numerical result out of range');
    }
    return float(value);
  }

  toFloat(value: NumericValue): number {
    if (value.kind === 'float') {
      return value.value;
    }
    const converted = Number(value.value);
    if (!Number.isFinite(converted)) {
      throw new ExpressionArithmeticError('int too large to convert to float');
    }
    return converted;
  }

  negate(value: Value): NumericValue {
    if (!isNumeric(value)) {
      throw new ExpressionArithmeticError(`bad operand type for unary -: '${typeName(value)}'`);
    }
    return value.kind === 'int' ? int(-value.value) : float(-value.value);
  }

  plus(value: Value): NumericValue {
    if (!isNumeric(value)) {
      throw new ExpressionArithmeticError(`bad operand type for unary +: '${typeName(value)}'`);
    }
    return value;
  }

  binary(operator: BinaryOperator, left: Value, right: Value): NumericValue {
    if (!isNumeric(left) || !isNumeric(right)) {
      throw new ExpressionArithmeticError(
        `unsupported operand type(s) for ${operator}: '${typeName(left)}' and '${typeName(right)}'`
      );
    }

    switch (operator) {
      case '+':
        return left.kind === 'int' && right.kind === 'int'
          ? this.checkInt(left.value + right.value)
          : this.checkFloat(this.toFloat(left) + this.toFloat(right));
      case '-':
        return left.kind === 'int' && right.kind === 'int'
          ? this.checkInt(left.value - right.value)
          : this.checkFloat(this.toFloat(left) - this.toFloat(right));
      case '*':
        return left.kind === 'int' && right.kind === 'int'
          ? this.checkInt(left.value * right.value)
          : this.checkFloat(this.toFloat(left) * this.toFloat(right));
      case '/':
        return this.divide(left, right);
      case '//':
        return this.floorDivide(left, right);
      case '%':
        return this.modulo(left, right);
      case '**':
        return this.power(left, right);
    }
  }

  divide(left: NumericValue, right: NumericValue): NumericValue {
    const divisor = this.toFloat(right);
    if (divisor === 0) {
      throw new ExpressionArithmeticError(
        left.kind === 'int' && right.kind === 'int' ? 'division by zero' : 'float division by zero'
      );
    }
    return this.checkFloat(this.toFloat(left) / divisor);
  }

  floorDivide(left: NumericValue, right: NumericValue): NumericValue {
    if (left.kind === 'int' && right.kind === 'int') {
      if (right.value === 0n) {
        throw new ExpressionArithmeticError('integer division or modulo by zero');
      }
      return int(floorDiv(left.value, right.value));
    }
    const divisor = this.toFloat(right);
    if (divisor === 0) {
      throw new ExpressionArithmeticError('float floor division by zero');
    }
    return this.checkFloat(floatDivmod(this.toFloat(left), divisor).quotient);
  }

  modulo(left: NumericValue, right: NumericValue): NumericValue {
    if (left.kind === 'int' && right.kind === 'int') {
      if (right.value === 0n) {
        throw new ExpressionArithmeticError('integer modulo by zero');
      }
      return int(floorMod(left.value, right.value));
    }
    const divisor = this.toFloat(right);
    if (divisor === 0) {
      throw new ExpressionArithmeticError('float modulo by zero');
    }
    return this.checkFloat(floatDivmod(this.toFloat(left), divisor).remainder);
  }

  divmod(left: Value, right: Value): SequenceValue {
    if (!isNumeric(left) || !isNumeric(right)) {
      throw new ExpressionArithmeticError(
        `unsupported operand type(s) for divmod(): '${typeName(left)}' and '${typeName(right)}'`
      );
    }
    return tuple(this.floorDivide(left, right), this.modulo(left, right));
  }

  power(base: NumericValue, exponent: NumericValue): NumericValue {
    if (base.kind === 'int' && exponent.kind === 'int') {
      const b = base.value;
      const e = exponent.value;

      if (e < 0n) {
        if (b === 0n) {
          throw new ExpressionArithmeticError('0.0 cannot be raised to a negative power');
        }
        return this.checkFloat(Math.pow(this.toFloat(base), Number(e)));
      }
      if (b === 0n || b === 1n) {
        return int(e === 0n ? 1n : b);
      }
      if (b === -1n) {
        return int(e % 2n === 0n ? 1n : -1n);
      }
      // |b| >= 2, so the result has at least (bits(b) - 1) * e + 1 bits
      if (BigInt(bitLength(b) - 1) * e >= BigInt(this.maxIntegerBits)) {
        throw new ExpressionLimitError(`integer result is too large (limit ${this.maxIntegerBits} bits)`);
      }
      return this.checkInt(b ** e);
    }

    const x = this.toFloat(base);
    const y = this.toFloat(exponent);
    if (x === 0 && y < 0) {
      throw new ExpressionArithmeticError('0.0 cannot be raised to a negative power');
    }
    if (x < 0 && !Number.isInteger(y)) {
      throw new ExpressionArithmeticError('complex results are not supported');
    }
    return this.checkFloat(Math.pow(x, y));
  }

  /** Three-argument pow: modular exponentiation on integers */
  modularPower(base: Value, exponent: Value, modulus: Value): NumericValue {
    if (base.kind !== 'int' || exponent.kind !== 'int' || modulus.kind !== 'int') {
      throw new ExpressionArithmeticError('pow() 3rd argument not allowed unless all arguments are integers');
    }
    const m = modulus.value;
    if (m === 0n) {
      throw new ExpressionArithmeticError('pow() 3rd argument cannot be 0');
    }
    let e = exponent.value;
    if (e < 0n) {
      throw new ExpressionArithmeticError('pow() negative exponent with a modulus is not supported');
    }

    let b = floorMod(base.value, m);
    let result = 1n;
    while (e > 0n) {
      if ((e & 1n) === 1n) {
        result = floorMod(result * b, m);
      }
      b = floorMod(b * b, m);
      e >>= 1n;
    }
    return int(floorMod(result, m));
  }

  compare(left: NumericValue, right: NumericValue): number {
    if (left.kind === 'int') {
      if (right.kind === 'int') {
        return left.value === right.value ? 0 : left.value < right.value ? -1 : 1;
      }
      return compareIntFloat(left.value, right.value);
    }
    if (right.kind === 'int') {
      return -compareIntFloat(right.value, left.value);
    }
    return Math.sign(left.value - right.value);
  }
}

/** Integer division rounding towards negative infinity */
export function floorDiv(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? quotient - 1n : quotient;
}

/** Remainder carrying the sign of the divisor */
export function floorMod(a: bigint, b: bigint): bigint {
  const remainder = a % b;
  return remainder !== 0n && remainder < 0n !== b < 0n ? remainder + b : remainder;
}

/**
 * Float floor division and remainder, derived from one `fmod` so that
 * `quotient * y + remainder` reproduces `x`. A zero remainder takes the sign of `y`.
 */
export function floatDivmod(x: number, y: number): { quotient: number; remainder: number } {
  let remainder = x % y;
  let div = (x - remainder) / y;
  if (remainder !== 0) {
    if (remainder < 0 !== y < 0) {
      remainder += y;
      div -= 1;
    }
  } else {
    remainder = Math.sign(y) * 0;
  }

  let quotient: number;
  if (div !== 0) {
    quotient = Math.floor(div);
    if (div - quotient > 0.5) {
      quotient += 1;
    }
  } else {
    quotient = Math.sign(x / y) * 0;
  }
  return { quotient, remainder };
}

/** Exact comparison of an integer with a finite float */
function compareIntFloat(i: bigint, f: number): number {
  if (Number.isInteger(f)) {
    const g = BigInt(f);
    return i === g ? 0 : i < g ? -1 : 1;
  }
  return i <= BigInt(Math.floor(f)) ? -1 : 1;
}
