/**
 * Format specifiers for the `format` transform.
 *
 *   [[fill]align][sign][#][0][width][grouping][.precision][type]
 *
 * Supported types: s d f F e E g G % x X o b
 *
 * @example
 * formatWithSpec(1234.5, ',.2f'); // → '1,234.50'
 * formatWithSpec(0.256, '.1%');   // → '25.6%'
 * formatWithSpec(42, '05d');      // → '00042'
 * formatWithSpec('ab', '*^6');    // → '**ab**'
 */

import { SpecError, TypeMismatchError } from '../errors';
import { kindOf, toText } from '../values';

type Align = '<' | '>' | '^' | '=';

interface FormatSpec {
  fill: string;
  align?: Align;
  sign: '+' | '-' | ' ';
  alternate: boolean;
  zeroPad: boolean;
  width: number;
  grouping?: ',' | '_';
  precision?: number;
  type?: string;
}

const SPEC_PATTERN = /^(?:(.)?([<>=^]))?([+\- ])?(#)?(0)?(\d+)?([,_])?(?:\.(\d+))?([sdfFeEgG%xXob])?$/s;

const NUMERIC_TYPES = new Set(['d', 'f', 'F', 'e', 'E', 'g', 'G', '%', 'x', 'X', 'o', 'b']);
const INTEGER_TYPES = new Set(['d', 'x', 'X', 'o', 'b']);

function isAlign(value: string | undefined): value is Align {
  return value === '<' || value === '>' || value === '^' || value === '=';
}

function parseSpec(spec: string): FormatSpec {
  const match = SPEC_PATTERN.exec(spec);
  if (!match) {
    throw new SpecError(`Invalid format specifier '${spec}'`, { transform: 'format' });
  }
  const [, fill, align, sign, alternate, zero, width, grouping, precision, type] = match;

  return {
    fill: fill ?? (zero && !align ? '0' : ' '),
    align: isAlign(align) ? align : zero ? '=' : undefined,
    sign: sign === '+' || sign === ' ' ? sign : '-',
    alternate: alternate === '#',
    zeroPad: zero === '0',
    width: width ? Number(width) : 0,
    grouping: grouping === ',' || grouping === '_' ? grouping : undefined,
    precision: precision !== undefined ? Number(precision) : undefined,
    type,
  };
}

// ============================================================================
// Numbers
// ============================================================================

function groupDigits(digits: string, separator: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
}

/** JS writes `1.5e+3`; the specifier language wants at least two exponent digits */
function padExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, 'e$10$2');
}

function stripTrailingZeros(text: string): string {
  if (!text.includes('.') || text.includes('e')) return text;
  return text.replace(/\.?0+$/, '');
}

function formatMagnitude(value: number, spec: FormatSpec): string {
  const { type, precision } = spec;

  if (!Number.isFinite(value)) {
    const text = Number.isNaN(value) ? 'nan' : 'inf';
    return type && type === type.toUpperCase() && type !== '%' ? text.toUpperCase() : text;
  }

  switch (type) {
    case 'd':
      // toFixed switches to exponent notation from 1e21
      return BigInt(value).toString();
    case 'f':
    case 'F':
      return value.toFixed(precision ?? 6);
    case 'e':
    case 'E': {
      const text = padExponent(value.toExponential(precision ?? 6));
      return type === 'E' ? text.toUpperCase() : text;
    }
    case 'g':
    case 'G': {
      const text = padExponent(stripTrailingZeros(value.toPrecision(Math.max(precision ?? 6, 1))));
      return type === 'G' ? text.toUpperCase() : text;
    }
    case '%':
      return `${(value * 100).toFixed(precision ?? 6)}%`;
    case 'x':
    case 'X': {
      const text = value.toString(16);
      return type === 'X' ? text.toUpperCase() : text;
    }
    case 'o':
      return value.toString(8);
    case 'b':
      return value.toString(2);
    default:
      return padExponent(
        precision !== undefined ? stripTrailingZeros(value.toPrecision(Math.max(precision, 1))) : String(value)
      );
  }
}

function radixPrefix(spec: FormatSpec): string {
  if (!spec.alternate) return '';
  switch (spec.type) {
    case 'x':
      return '0x';
    case 'X':
      return '0X';
    case 'o':
      return '0o';
    case 'b':
      return '0b';
    default:
      return '';
  }
}

function applyGrouping(body: string, spec: FormatSpec): string {
  if (!spec.grouping) return body;
  const match = /^(\d+)(.*)$/s.exec(body);
  if (!match) return body;
  return groupDigits(match[1], spec.grouping) + match[2];
}

function formatNumber(value: number, spec: FormatSpec): string {
  if (spec.type && INTEGER_TYPES.has(spec.type) && !Number.isInteger(value)) {
    throw new TypeMismatchError('format', 'integer', 'non-integer number', { transform: 'format' },
      `format code '${spec.type}' requires an integer, got ${value}`);
  }

  const negative = value < 0 || Object.is(value, -0);
  const body = applyGrouping(formatMagnitude(Math.abs(value), spec), spec);
  const sign = negative ? '-' : spec.sign === '-' ? '' : spec.sign;

  return pad(sign + radixPrefix(spec), body, spec, '>');
}

// ============================================================================
// Padding
// ============================================================================

function pad(prefix: string, body: string, spec: FormatSpec, defaultAlign: Align): string {
  const text = prefix + body;
  const missing = spec.width - text.length;
  if (missing <= 0) return text;

  const fill = spec.fill.repeat(missing);
  switch (spec.align ?? defaultAlign) {
    case '<':
      return text + fill;
    case '>':
      return fill + text;
    case '=':
      return prefix + fill + body;
    case '^': {
      const left = Math.floor(missing / 2);
      return spec.fill.repeat(left) + text + spec.fill.repeat(missing - left);
    }
  }
}

// ============================================================================
// Entry Point
// ============================================================================

export function formatWithSpec(value: unknown, formatSpec: string): string {
  if (formatSpec === '') return toText(value);

  const spec = parseSpec(formatSpec);
  const numericType = spec.type !== undefined && NUMERIC_TYPES.has(spec.type);

  if (typeof value === 'number') {
    if (spec.type === 's') {
      throw new TypeMismatchError('format', 'string', 'number', { transform: 'format' },
        `format code 's' requires a string, got number`);
    }
    return formatNumber(value, spec);
  }

  if (numericType) {
    throw new TypeMismatchError('format', 'number', kindOf(value), { transform: 'format' },
      `format code '${spec.type}' requires a number, got ${kindOf(value)}`);
  }
  if (spec.align === '=') {
    throw new SpecError(`'=' alignment is not allowed for ${kindOf(value)} values`, { transform: 'format' });
  }

  let text = toText(value);
  if (spec.precision !== undefined) {
    text = text.slice(0, spec.precision);
  }
  return pad('', text, spec, '<');
}
