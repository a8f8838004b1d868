/**
 * Calculator error taxonomy
 */

/** Base class for every failure the calculator reports as text */
export class CalculatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalculatorError';
  }
}

/** Input uses a construct outside the accepted grammar */
export class ExpressionSyntaxError extends CalculatorError {
  public offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = 'ExpressionSyntaxError';
    this.offset = offset;
  }
}

/** Division by zero, overflow, bad operand types or bad arity */
export class ExpressionArithmeticError extends CalculatorError {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionArithmeticError';
  }
}

/** Length, nesting or result-size bound exceeded */
export class ExpressionLimitError extends CalculatorError {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionLimitError';
  }
}
