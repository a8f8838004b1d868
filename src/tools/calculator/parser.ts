/**
 * Recursive-descent parser for the calculator grammar
 *
 *   expression := additive
 *   additive   := term (('+' | '-') term)*
 *   term       := unary (('*' | '/' | '//' | '%') unary)*
 *   unary      := ('-' | '+') unary | power
 *   power      := primary ('**' unary)?
 *   primary    := NUMBER | call | '(' expression ')' | tuple | list
 *   call       := FUNCTION '(' arguments ')'
 *
 * A top-level `a, b` is read as a tuple.
 */

import { isAllowedFunction, type ExpressionNode, type SequenceNode } from './ast.js';
import { ExpressionLimitError, ExpressionSyntaxError } from './errors.js';
import { tokenize, type Token } from './lexer.js';
import { resolveLimits, type CalculatorLimits } from './limits.js';

/**
 * Parse an expression into a tree.
 * Rejects, in this order: empty input, over-long input, names outside the
 * function allow-list, tokens outside the grammar, then grammar violations.
 */
export function parseExpression(source: string, limits: Partial<CalculatorLimits> = {}): ExpressionNode {
  const resolved = resolveLimits(limits);

  if (source.trim() === '') {
    throw new ExpressionSyntaxError('expression is empty', 0);
  }
  if (source.length > resolved.maxLength) {
    throw new ExpressionLimitError(
      `expression is too long (${source.length} characters, limit ${resolved.maxLength})`
    );
  }

  const tokens = tokenize(source);

  for (const token of tokens) {
    if (token.kind === 'name' && !isAllowedFunction(token.text)) {
      throw new ExpressionSyntaxError(`Use of '${token.text}' is not allowed`, token.offset);
    }
  }

  for (const token of tokens) {
    if (token.kind === 'invalid') {
      throw new ExpressionSyntaxError(token.reason, token.offset);
    }
    if (token.kind === 'string') {
      throw new ExpressionSyntaxError('string literals are not allowed', token.offset);
    }
  }

  return new Parser(tokens, resolved.maxDepth).parse();
}

class Parser {
  private pos = 0;
  private depth = 0;

  constructor(
    private tokens: Token[],
    private maxDepth: number
  ) {}

  parse(): ExpressionNode {
    const first = this.parseExpression();
    let node = first;

    if (this.isPunctuation(',')) {
      node = this.parseItems('tuple', first.offset, [first], 'end');
    }

    const next = this.peek();
    if (next.kind !== 'end') {
      throw this.unexpected(next);
    }
    return node;
  }

  private parseExpression(): ExpressionNode {
    let left = this.parseTerm();

    for (;;) {
      const token = this.peek();
      if (token.kind !== 'operator' || (token.text !== '+' && token.text !== '-')) {
        return left;
      }
      this.pos++;
      const right = this.parseTerm();
      left = { type: 'BinaryOp', operator: token.text, left, right, offset: token.offset };
    }
  }

  private parseTerm(): ExpressionNode {
    let left = this.parseUnary();

    for (;;) {
      const token = this.peek();
      if (
        token.kind !== 'operator' ||
        (token.text !== '*' && token.text !== '/' && token.text !== '//' && token.text !== '%')
      ) {
        return left;
      }
      this.pos++;
      const right = this.parseUnary();
      left = { type: 'BinaryOp', operator: token.text, left, right, offset: token.offset };
    }
  }

  private parseUnary(): ExpressionNode {
    const token = this.peek();
    if (token.kind === 'operator' && (token.text === '-' || token.text === '+')) {
      this.pos++;
      const operand = this.nested(() => this.parseUnary());
      return { type: 'UnaryOp', operator: token.text, operand, offset: token.offset };
    }
    return this.parsePower();
  }

  private parsePower(): ExpressionNode {
    const base = this.parsePrimary();
    const token = this.peek();
    if (token.kind === 'operator' && token.text === '**') {
      this.pos++;
      const exponent = this.nested(() => this.parseUnary());
      return { type: 'BinaryOp', operator: '**', left: base, right: exponent, offset: token.offset };
    }
    return base;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();
    let node: ExpressionNode;

    if (token.kind === 'number') {
      node = { type: 'Literal', value: token.literal, offset: token.offset };
    } else if (token.kind === 'name' && isAllowedFunction(token.text)) {
      if (!this.isPunctuation('(')) {
        throw new ExpressionSyntaxError(`'${token.text}' must be called with parentheses`, token.offset);
      }
      this.pos++;
      const args = this.nested(() => this.parseList(')'));
      node = { type: 'Call', callee: token.text, args, offset: token.offset };
    } else if (token.kind === 'punctuation' && token.text === '(') {
      node = this.nested(() => this.parseParenthesized(token.offset));
    } else if (token.kind === 'punctuation' && token.text === '[') {
      const items = this.nested(() => this.parseList(']'));
      node = { type: 'Sequence', kind: 'list', items, offset: token.offset };
    } else {
      throw this.unexpected(token);
    }

    const after = this.peek();
    if (after.kind === 'punctuation' && after.text === '[') {
      throw new ExpressionSyntaxError('subscripting is not allowed', after.offset);
    }
    if (after.kind === 'punctuation' && after.text === '(') {
      throw new ExpressionSyntaxError('only allowed functions can be called', after.offset);
    }
    return node;
  }

  /** After '(': a grouped expression, or a tuple when a comma follows */
  private parseParenthesized(offset: number): ExpressionNode {
    if (this.isPunctuation(')')) {
      this.pos++;
      return { type: 'Sequence', kind: 'tuple', items: [], offset };
    }

    const first = this.parseExpression();
    if (this.isPunctuation(',')) {
      return this.parseItems('tuple', offset, [first], ')');
    }
    this.expect(')');
    return first;
  }

  /** Continue a sequence whose first item is already parsed; the cursor sits on ',' */
  private parseItems(
    kind: SequenceNode['kind'],
    offset: number,
    items: ExpressionNode[],
    close: ')' | 'end'
  ): SequenceNode {
    while (this.isPunctuation(',')) {
      this.pos++;
      if (close === ')' ? this.isPunctuation(')') : this.peek().kind === 'end') {
        break;
      }
      items.push(this.parseExpression());
    }
    if (close === ')') {
      this.expect(')');
    }
    return { type: 'Sequence', kind, items, offset };
  }

  /** Comma-separated expressions up to `close`, trailing comma allowed */
  private parseList(close: ')' | ']'): ExpressionNode[] {
    const items: ExpressionNode[] = [];
    while (!this.isPunctuation(close)) {
      items.push(this.parseExpression());
      if (!this.isPunctuation(',')) {
        break;
      }
      this.pos++;
    }
    this.expect(close);
    return items;
  }

  private nested<T>(parse: () => T): T {
    this.depth++;
    if (this.depth > this.maxDepth) {
      throw new ExpressionLimitError(`expression is nested too deeply (limit ${this.maxDepth})`);
    }
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private peek(): Token {
    return this.tokens[this.pos] ?? { kind: 'end', offset: 0 };
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'end') {
      this.pos++;
    }
    return token;
  }

  private isPunctuation(text: string): boolean {
    const token = this.peek();
    return token.kind === 'punctuation' && token.text === text;
  }

  private expect(text: ')' | ']'): void {
    const token = this.next();
    if (token.kind !== 'punctuation' || token.text !== text) {
      throw token.kind === 'end'
        ? new ExpressionSyntaxError(`expected '${text}' before end of expression`, token.offset)
        : new ExpressionSyntaxError(`expected '${text}' but found ${describe(token)}`, token.offset);
    }
  }

  private unexpected(token: Token): ExpressionSyntaxError {
    if (token.kind === 'end') {
      return new ExpressionSyntaxError('unexpected end of expression', token.offset);
    }
    return new ExpressionSyntaxError(`unexpected ${describe(token)}`, token.offset);
  }
}

function describe(token: Token): string {
  switch (token.kind) {
    case 'number':
      return `number '${token.text}'`;
    case 'name':
      return `name '${token.text}'`;
    case 'operator':
    case 'punctuation':
    case 'string':
    case 'invalid':
      return `'${token.text}'`;
    case 'end':
      return 'end of expression';
  }
}
