/**
 * Helpers over generic source values.
 *
 * Sources are whatever an upstream parser produced: JSON-like data, `Map`s or
 * class instances. These helpers give the engine one vocabulary for them.
 */

export type Scalar = null | boolean | number | string;

export type PlainMapping = Record<string, unknown>;

export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

export function isScalar(value: unknown): value is Scalar | undefined {
  return (
    value === null ||
    value === undefined ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'string'
  );
}

/** True for object literals and `Object.create(null)` objects */
export function isPlainMapping(value: unknown): value is PlainMapping {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Any non-null object other than an array: mappings, Maps and class instances */
export function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Discriminant name of a value.
 *
 * Used by the `type` filter operator and in error messages.
 */
export function kindOf(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'map';
  if (isPlainMapping(value)) return 'object';
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}

/**
 * Render a value as text. `null` becomes the empty string; structures are
 * rendered as JSON.
 */
export function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Map) return JSON.stringify(Object.fromEntries(value));
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value) ?? String(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/**
 * Structural equality without cross-kind coercion: `1` never equals `'1'`
 * or `true`.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (isNullish(a) || isNullish(b)) return isNullish(a) && isNullish(b);
  if (Object.is(a, b)) return true;
  if (typeof a === 'number' && typeof b === 'number') return a === b;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false;
    for (const [key, item] of a) {
      if (!b.has(key) || !valuesEqual(item, b.get(key))) return false;
    }
    return true;
  }

  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();

  if (isPlainMapping(a) && isPlainMapping(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every(key => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key]));
  }

  return false;
}
