/**
 * Tokenizer for calculator expressions
 *
 * The tokenizer never throws. Anything it refuses becomes an `invalid` token
 * carrying the reason, so that the parser can report disallowed names first
 * and everything else in source order.
 */

export type Operator = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type Punctuation = '(' | ')' | '[' | ']' | ',';

/** Numeric literal as written: integers keep full precision */
export type NumericLiteral = { kind: 'int'; value: bigint } | { kind: 'float'; value: number };

export type Token =
  | { kind: 'number'; literal: NumericLiteral; text: string; offset: number }
  | { kind: 'name'; text: string; offset: number }
  | { kind: 'string'; text: string; offset: number }
  | { kind: 'operator'; text: Operator; offset: number }
  | { kind: 'punctuation'; text: Punctuation; offset: number }
  | { kind: 'invalid'; text: string; reason: string; offset: number }
  | { kind: 'end'; offset: number };

const OPERATORS: readonly string[] = ['+', '-', '*', '/', '//', '%', '**'];
const PUNCTUATION: readonly string[] = ['(', ')', '[', ']', ','];

function isOperator(text: string): text is Operator {
  return OPERATORS.includes(text);
}

function isPunctuation(text: string): text is Punctuation {
  return PUNCTUATION.includes(text);
}

const DECIMAL_LITERAL = /(\d(?:_?\d)*)?(\.(\d(?:_?\d)*)?)?([eE][+-]?\d(?:_?\d)*)?/y;
const PREFIXED_LITERAL = /0(?:[xX](?:_?[0-9a-fA-F])+|[oO](?:_?[0-7])+|[bB](?:_?[01])+)/y;
const NAME = /[A-Za-z_][A-Za-z0-9_]*/y;
const IDENTIFIER_TAIL = /[A-Za-z0-9_]*/y;
const TWO_CHAR_REJECTED = /^(?:==|<=|>=|!=|<<|>>|:=)$/;

/** Characters that start a construct we refuse, with the reason */
const REJECTED: Record<string, string> = {
  '.': 'attribute access is not allowed',
  '=': 'assignment is not allowed',
  ';': 'statements are not allowed',
  ':': "':' is not allowed",
  '{': "'{' is not allowed",
  '}': "'}' is not allowed",
  '#': 'comments are not allowed',
  '\\': 'line continuations are not allowed',
  '<': "operator '<' is not allowed",
  '>': "operator '>' is not allowed",
  '!': "'!' is not allowed",
  '@': "operator '@' is not allowed",
  '&': "operator '&' is not allowed",
  '|': "operator '|' is not allowed",
  '^': "operator '^' is not allowed (use ** for powers)",
  '~': "operator '~' is not allowed",
};

/** Split an expression into tokens, always ending with an `end` token */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source.charAt(pos);

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (/\d/.test(ch) || (ch === '.' && /\d/.test(source.charAt(pos + 1)))) {
      const token = readNumber(source, pos);
      tokens.push(token);
      pos += token.text.length;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      NAME.lastIndex = pos;
      const text = NAME.exec(source)?.[0] ?? ch;
      tokens.push({ kind: 'name', text, offset: pos });
      pos += text.length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const close = source.indexOf(ch, pos + 1);
      const end = close === -1 ? source.length : close + 1;
      tokens.push({ kind: 'string', text: source.slice(pos, end), offset: pos });
      pos = end;
      continue;
    }

    const two = source.slice(pos, pos + 2);
    if (isOperator(two)) {
      tokens.push({ kind: 'operator', text: two, offset: pos });
      pos += 2;
      continue;
    }
    if (isOperator(ch)) {
      tokens.push({ kind: 'operator', text: ch, offset: pos });
      pos++;
      continue;
    }
    if (isPunctuation(ch)) {
      tokens.push({ kind: 'punctuation', text: ch, offset: pos });
      pos++;
      continue;
    }

    if (TWO_CHAR_REJECTED.test(two)) {
      const reason = two === '==' || two === '<=' || two === '>=' || two === '!=' ? 'comparison' : 'operator';
      tokens.push({ kind: 'invalid', text: two, reason: `${reason} '${two}' is not allowed`, offset: pos });
      pos += 2;
      continue;
    }

    tokens.push({
      kind: 'invalid',
      text: ch,
      reason: REJECTED[ch] ?? `unexpected character '${ch}'`,
      offset: pos,
    });
    pos++;
  }

  tokens.push({ kind: 'end', offset: source.length });
  return tokens;
}

function readNumber(source: string, start: number): Extract<Token, { kind: 'number' | 'invalid' }> {
  PREFIXED_LITERAL.lastIndex = start;
  const prefixed = PREFIXED_LITERAL.exec(source);
  if (prefixed) {
    const text = prefixed[0];
    return (
      runOn(source, start, text) ?? {
        kind: 'number',
        literal: { kind: 'int', value: BigInt(text.replace(/_/g, '')) },
        text,
        offset: start,
      }
    );
  }

  DECIMAL_LITERAL.lastIndex = start;
  const match = DECIMAL_LITERAL.exec(source);
  const text = match?.[0] ?? source.charAt(start);
  const invalid = runOn(source, start, text);
  if (invalid) {
    return invalid;
  }

  const digits = text.replace(/_/g, '');
  const isFloat = match?.[2] !== undefined || match?.[4] !== undefined;

  if (!isFloat) {
    if (digits.length > 1 && digits.startsWith('0') && /[1-9]/.test(digits)) {
      return {
        kind: 'invalid',
        text,
        reason: 'leading zeros in decimal integer literals are not permitted',
        offset: start,
      };
    }
    return { kind: 'number', literal: { kind: 'int', value: BigInt(digits) }, text, offset: start };
  }

  // May be Infinity for literals like 1e999; the evaluator rejects it
  return { kind: 'number', literal: { kind: 'float', value: Number(digits) }, text, offset: start };
}

/** A literal must not run straight into a name, e.g. `2x`, `0x` or `1e` */
function runOn(source: string, start: number, text: string): Extract<Token, { kind: 'invalid' }> | undefined {
  IDENTIFIER_TAIL.lastIndex = start + text.length;
  const tail = IDENTIFIER_TAIL.exec(source)?.[0] ?? '';
  if (tail === '') {
    return undefined;
  }
  return { kind: 'invalid', text: text + tail, reason: 'invalid numeric literal', offset: start };
}
