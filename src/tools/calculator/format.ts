import type { Value } from './values.js';

/**
 * Render a value in REPL notation:
 * `14`, `2.5`, `5.0`, `1e+16`, `1e-05`, `(3, 1)`, `(2,)`, `[1, 2]`
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'int':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'sequence': {
      const items = value.items.map(formatValue);
      if (value.sequenceKind === 'list') {
        return `[${items.join(', ')}]`;
      }
      return items.length === 1 ? `(${items[0]},)` : `(${items.join(', ')})`;
    }
  }
}

/** Shortest round-tripping digits; positional for exponents in [-4, 16) */
export function formatFloat(value: number): string {
  if (value === 0) {
    return Object.is(value, -0) ? '-0.0' : '0.0';
  }

  const sign = value < 0 ? '-' : '';
  const [mantissa = '', exponentText = '0'] = Math.abs(value).toExponential().split('e');
  const exponent = Number(exponentText);
  const digits = mantissa.replace('.', '');

  if (exponent < -4 || exponent >= 16) {
    const fraction = digits.length > 1 ? `.${digits.slice(1)}` : '';
    const magnitude = String(Math.abs(exponent)).padStart(2, '0');
    return `${sign}${digits.charAt(0)}${fraction}e${exponent < 0 ? '-' : '+'}${magnitude}`;
  }

  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }

  const whole = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0');
  const fraction = digits.slice(exponent + 1) || '0';
  return `${sign}${whole}.${fraction}`;
}
