/**
 * Transformation Engine
 *
 * Built-in value transformations with strict input checks, plus custom
 * functions that bypass checking entirely.
 *
 * Serialized forms:
 *   'upper'                                      // bare name
 *   { name: 'truncate', max_length: 20 }         // name + parameters
 *   (value) => ...                               // custom function
 */

import { z } from 'zod';

import { ExtractionError, SpecError, TypeMismatchError } from '../errors';
import type { BuiltinTransform, TextTransformName, TransformName, TransformSpec } from '../types';
import { isNullish, isPlainMapping, kindOf, toText } from '../values';
import { formatWithSpec } from './format-spec';

// ============================================================================
// Registry
// ============================================================================

export const TRANSFORM_NAMES: readonly TransformName[] = [
  'upper',
  'lower',
  'capitalize',
  'strip',
  'truncate',
  'abs',
  'round',
  'format',
  'length',
  'join',
  'first',
  'last',
  'flatten',
  'str',
  'int',
  'float',
];

function isTransformName(name: string): name is TransformName {
  return TRANSFORM_NAMES.some(known => known === name);
}

const bare = <N extends string>(name: N) => z.object({ name: z.literal(name) }).strict();

const serializedTransformSchema = z.discriminatedUnion('name', [
  bare('upper'),
  bare('lower'),
  bare('capitalize'),
  bare('strip'),
  z.object({
    name: z.literal('truncate'),
    max_length: z.number().int().optional(),
    suffix: z.string().optional(),
  }).strict(),
  bare('abs'),
  z.object({ name: z.literal('round'), digits: z.number().int().optional() }).strict(),
  z.object({ name: z.literal('format'), format_spec: z.string().optional() }).strict(),
  bare('length'),
  z.object({ name: z.literal('join'), separator: z.string().optional() }).strict(),
  bare('first'),
  bare('last'),
  z.object({ name: z.literal('flatten'), depth: z.number().int().optional() }).strict(),
  bare('str'),
  bare('int'),
  bare('float'),
]);

type SerializedBuiltin = z.infer<typeof serializedTransformSchema>;

export type SerializedTransform = TransformName | SerializedBuiltin | ((value: unknown) => unknown);

function unknownTransform(name: string): SpecError {
  return new SpecError(
    `Unknown transformation '${name}'. Available: ${TRANSFORM_NAMES.join(', ')}`,
    { transform: name }
  );
}

function fromSerialized(parsed: SerializedBuiltin): BuiltinTransform {
  switch (parsed.name) {
    case 'truncate':
      return {
        name: 'truncate',
        ...(parsed.max_length !== undefined && { maxLength: parsed.max_length }),
        ...(parsed.suffix !== undefined && { suffix: parsed.suffix }),
      };
    case 'round':
      return { name: 'round', ...(parsed.digits !== undefined && { digits: parsed.digits }) };
    case 'format':
      return { name: 'format', ...(parsed.format_spec !== undefined && { formatSpec: parsed.format_spec }) };
    case 'join':
      return { name: 'join', ...(parsed.separator !== undefined && { separator: parsed.separator }) };
    case 'flatten':
      return { name: 'flatten', ...(parsed.depth !== undefined && { depth: parsed.depth }) };
    default:
      return { name: parsed.name };
  }
}

/**
 * Compile a serialized transformation into a {@link TransformSpec}.
 *
 * @throws SpecError for unknown names or malformed parameters
 */
export function compileTransform(raw: unknown): TransformSpec {
  if (typeof raw === 'function') {
    return { kind: 'custom', fn: (value: unknown): unknown => raw(value) };
  }

  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    candidate = { name: raw };
  }

  if (!isPlainMapping(candidate)) {
    throw new SpecError(`Invalid transformation specification of kind ${kindOf(raw)}`);
  }
  const name = candidate.name;
  if (typeof name !== 'string' || name === '') {
    throw new SpecError("Transformation mapping must include a 'name' field");
  }
  if (!isTransformName(name)) {
    throw unknownTransform(name);
  }

  const result = serializedTransformSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`)
      .join('; ');
    throw new SpecError(`Invalid parameters for transformation '${name}': ${issues}`, { transform: name });
  }
  return { kind: 'builtin', transform: fromSerialized(result.data) };
}

/**
 * Serialized form of a compiled transformation.
 *
 * @throws SpecError for custom functions, which have no serialized form
 */
export function serializeTransform(spec: TransformSpec): TransformName | SerializedBuiltin {
  if (spec.kind === 'custom') {
    throw new SpecError('Custom transformation functions cannot be serialized');
  }
  const t = spec.transform;
  switch (t.name) {
    case 'truncate':
      if (t.maxLength === undefined && t.suffix === undefined) return t.name;
      return {
        name: 'truncate',
        ...(t.maxLength !== undefined && { max_length: t.maxLength }),
        ...(t.suffix !== undefined && { suffix: t.suffix }),
      };
    case 'round':
      return t.digits === undefined ? t.name : { name: 'round', digits: t.digits };
    case 'format':
      return t.formatSpec === undefined ? t.name : { name: 'format', format_spec: t.formatSpec };
    case 'join':
      return t.separator === undefined ? t.name : { name: 'join', separator: t.separator };
    case 'flatten':
      return t.depth === undefined ? t.name : { name: 'flatten', depth: t.depth };
    default:
      return t.name;
  }
}

// ============================================================================
// Text
// ============================================================================

const TEXT_OPERATIONS: Record<TextTransformName, (text: string) => string> = {
  upper: text => text.toUpperCase(),
  lower: text => text.toLowerCase(),
  capitalize: text => text.charAt(0).toUpperCase() + text.slice(1).toLowerCase(),
  strip: text => text.trim(),
};

function applyText(value: unknown, name: TextTransformName): unknown {
  // Sequences of strings are transformed element-wise
  if (Array.isArray(value)) {
    return value.map(item => (isNullish(item) ? null : applyText(item, name)));
  }
  if (typeof value !== 'string') {
    throw new TypeMismatchError(name, 'string', kindOf(value), { transform: name });
  }
  return TEXT_OPERATIONS[name](value);
}

/**
 * Shorten text to at most `maxLength` characters, ending with `suffix` when
 * anything was cut. A suffix that does not fit is itself cut.
 *
 * @example
 * truncateText('LONG TITLE HERE', 10);       // → 'LONG TITL…'
 * truncateText('abcdef', 4, '...');          // → 'a...'
 * truncateText('abcdef', 2, '...');          // → '..'
 */
export function truncateText(value: unknown, maxLength = 50, suffix = '…'): string {
  // Measured in code points so surrogate pairs are never split
  const chars = Array.from(toText(value));
  if (chars.length <= maxLength) return chars.join('');
  if (maxLength <= 0) return '';

  const suffixChars = Array.from(suffix);
  const available = maxLength - suffixChars.length;
  if (available <= 0) return suffixChars.slice(0, maxLength).join('');
  return chars.slice(0, available).join('') + suffix;
}

// ============================================================================
// Numeric
// ============================================================================

function requireNumber(value: unknown, name: TransformName): number {
  // typeof excludes booleans, even though they behave like 0/1 elsewhere
  if (typeof value !== 'number') {
    throw new TypeMismatchError(name, 'number', kindOf(value), { transform: name });
  }
  return value;
}

/** Beyond this magnitude every double is an integer */
const INTEGRAL_MAGNITUDE = 2 ** 52;

/** `toFixed` limit; expansions of doubles above 2^-47 fit within it */
const EXACT_PLACES = 100;

/** Round to a multiple of 10^places; the quotient of an integer by a power of ten is exact at ties */
function roundToTens(value: number, places: number): number {
  const divisor = 10 ** places;
  if (!Number.isFinite(divisor)) return value * 0;

  const scaled = value / divisor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  const rounded = diff === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return rounded * divisor;
}

/**
 * Round half to even at `digits` decimal places (negative digits round to
 * tens, hundreds, ...).
 *
 * The decision is made on the exact decimal expansion of the double, so
 * `2.675` (stored as 2.67499...) rounds to `2.67` and only true ties go to
 * the even neighbour. Digits finer than a double can hold leave the value
 * unchanged.
 *
 * @example
 * roundHalfEven(2.5);       // → 2
 * roundHalfEven(2.675, 2);  // → 2.67
 * roundHalfEven(1250, -2);  // → 1200
 */
export function roundHalfEven(value: number, digits = 0): number {
  if (!Number.isFinite(value) || value === 0) return value;
  if (digits < 0) return roundToTens(value, -digits);
  if (digits > EXACT_PLACES) return value;

  const factor = 10 ** digits;
  if (Math.abs(value) * factor >= INTEGRAL_MAGNITUDE) return value;

  const [whole, fraction = ''] = Math.abs(value).toFixed(EXACT_PLACES).split('.');
  let units = Number(whole + fraction.slice(0, digits));
  const rest = fraction.slice(digits);
  const lead = rest.charAt(0);

  const aboveHalf = lead > '5' || (lead === '5' && /[1-9]/.test(rest.slice(1)));
  const exactHalf = lead === '5' && !aboveHalf;
  if (aboveHalf || (exactHalf && units % 2 === 1)) {
    units += 1;
  }

  const magnitude = units / factor;
  return value < 0 ? -magnitude : magnitude;
}

// ============================================================================
// Collections
// ============================================================================

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

function collectionLength(value: unknown): number {
  if (typeof value === 'string') return Array.from(value).length;
  if (Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  if (isPlainMapping(value)) return Object.keys(value).length;
  throw new TypeMismatchError('length', 'sized collection', kindOf(value), { transform: 'length' });
}

function joinItems(value: unknown, separator: string): string {
  if (typeof value === 'string' || !isIterable(value)) {
    throw new TypeMismatchError('join', 'non-string iterable', kindOf(value), { transform: 'join' });
  }
  return Array.from(value, item => toText(item)).join(separator);
}

/** Order is unspecified for unordered collections such as Sets of mixed origin */
function firstItem(value: unknown): unknown {
  if (typeof value === 'string') return Array.from(value)[0] ?? null;
  if (Array.isArray(value)) {
    return value.length > 0 ? value[0] : null;
  }
  if (!isIterable(value)) {
    throw new TypeMismatchError('first', 'indexable or iterable', kindOf(value), { transform: 'first' });
  }
  for (const item of value) return item ?? null;
  return null;
}

function lastItem(value: unknown): unknown {
  if (typeof value === 'string') return Array.from(value).pop() ?? null;
  if (Array.isArray(value)) {
    return value.length > 0 ? value[value.length - 1] : null;
  }
  if (!isIterable(value)) {
    throw new TypeMismatchError('last', 'indexable or iterable', kindOf(value), { transform: 'last' });
  }
  let last: unknown = null;
  for (const item of value) last = item;
  return last ?? null;
}

function flattenArray(items: readonly unknown[], depth: number): unknown[] {
  if (depth === 0) return [...items];
  return items.flatMap((item): unknown[] => (Array.isArray(item) ? flattenArray(item, depth - 1) : [item]));
}

/**
 * Splice nested arrays into one array, `depth` levels deep (negative means
 * all the way down). Strings and mappings inside are kept whole.
 *
 * @example
 * flattenItems([[1, [2]], 3], 1);  // → [1, [2], 3]
 * flattenItems([[1, [2]], 3], -1); // → [1, 2, 3]
 */
export function flattenItems(value: unknown, depth = 1): unknown[] {
  if (typeof value === 'string' || !isIterable(value)) {
    throw new TypeMismatchError('flatten', 'non-string iterable', kindOf(value), { transform: 'flatten' });
  }
  return flattenArray(Array.from(value), depth);
}

// ============================================================================
// Conversion
// ============================================================================

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;
const FLOAT_TEXT = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
const SPECIAL_FLOATS: Record<string, number> = {
  inf: Infinity,
  '+inf': Infinity,
  '-inf': -Infinity,
  infinity: Infinity,
  '+infinity': Infinity,
  '-infinity': -Infinity,
  nan: NaN,
};

function conversionError(name: 'int' | 'float', value: unknown): TypeMismatchError {
  const expected = name === 'int' ? 'integer-like' : 'number-like';
  return new TypeMismatchError(name, expected, kindOf(value), { transform: name },
    `${name} conversion failed for value '${toText(value)}' of kind ${kindOf(value)}`);
}

function toInteger(value: unknown): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && INTEGER_TEXT.test(value)) return Number.parseInt(value, 10);
  throw conversionError('int', value);
}

function toFloat(value: unknown): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    if (FLOAT_TEXT.test(value)) return Number(value.trim());
    const special = SPECIAL_FLOATS[value.trim().toLowerCase()];
    if (special !== undefined) return special;
  }
  throw conversionError('float', value);
}

// ============================================================================
// Dispatch
// ============================================================================

function applyBuiltin(value: unknown, t: BuiltinTransform): unknown {
  switch (t.name) {
    case 'upper':
    case 'lower':
    case 'capitalize':
    case 'strip':
      return applyText(value, t.name);
    case 'truncate':
      return truncateText(value, t.maxLength, t.suffix);
    case 'abs':
      return Math.abs(requireNumber(value, 'abs'));
    case 'round':
      return roundHalfEven(requireNumber(value, 'round'), t.digits ?? 0);
    case 'format':
      if (typeof value === 'boolean') {
        throw new TypeMismatchError('format', 'number or string', 'boolean', { transform: 'format' });
      }
      return formatWithSpec(value, t.formatSpec ?? '');
    case 'length':
      return collectionLength(value);
    case 'join':
      return joinItems(value, t.separator ?? '');
    case 'first':
      return firstItem(value);
    case 'last':
      return lastItem(value);
    case 'flatten':
      return flattenItems(value, t.depth ?? 1);
    case 'str':
      return toText(value);
    case 'int':
      return toInteger(value);
    case 'float':
      return toFloat(value);
  }
}

/**
 * Apply one transformation. `null` input short-circuits to `null` without
 * invoking anything.
 *
 * @example
 * applyTransform('hello', compileTransform('upper'));                               // → 'HELLO'
 * applyTransform(3.14159, compileTransform({ name: 'round', digits: 2 }));          // → 3.14
 * applyTransform(['a', 'b'], compileTransform({ name: 'join', separator: ', ' }));  // → 'a, b'
 */
export function applyTransform(value: unknown, spec: TransformSpec): unknown {
  if (isNullish(value)) return null;

  if (spec.kind === 'custom') {
    return spec.fn(value);
  }

  try {
    return applyBuiltin(value, spec.transform);
  } catch (err) {
    if (err instanceof ExtractionError) {
      throw err.withContext({ transform: spec.transform.name });
    }
    throw err;
  }
}
