/**
 * Field access over heterogeneous source values.
 *
 * One place decides how a mapping, a Map, an array, a string or a class
 * instance answers "give me field X / item N / key K". Absent things are
 * `null`; only structurally impossible keyed access throws.
 */

import { MissingCapabilityError } from '../errors';
import type { FieldSource } from '../types';
import { isNullish, isPlainMapping, kindOf } from '../values';

function isFieldSource(value: object): value is FieldSource {
  return 'getField' in value && typeof value.getField === 'function';
}

function orNull(value: unknown): unknown {
  return value === undefined ? null : value;
}

function readProperty(value: object, name: string): unknown {
  if (!(name in value)) return null;
  const property: unknown = Reflect.get(value, name);
  // Methods are never data
  return typeof property === 'function' ? null : orNull(property);
}

/**
 * Named field access (the `.name` step).
 *
 * Order: the `getField` capability, then keyed access (`Map`, plain mapping),
 * then named-attribute access on other objects. Invocable results are
 * skipped. Scalars have no fields.
 */
export function getField(value: unknown, name: string): unknown {
  if (isNullish(value)) return null;
  if (typeof value !== 'object' && typeof value !== 'function') return null;

  if (isFieldSource(value)) {
    const field = value.getField(name);
    return typeof field === 'function' ? null : orNull(field);
  }

  if (value instanceof Map) {
    const entry: unknown = value.get(name);
    return typeof entry === 'function' ? null : orNull(entry);
  }

  if (isPlainMapping(value)) {
    if (!Object.prototype.hasOwnProperty.call(value, name)) return null;
    const entry = value[name];
    return typeof entry === 'function' ? null : orNull(entry);
  }

  return readProperty(value, name);
}

/**
 * Positional access (the `[n]` step). Negative indices count from the end;
 * anything out of range, or a value that is not indexable, yields `null`.
 */
export function getIndex(value: unknown, index: number): unknown {
  if (typeof value === 'string' || Array.isArray(value)) {
    const position = index < 0 ? value.length + index : index;
    if (position < 0 || position >= value.length) return null;
    return orNull(value[position]);
  }
  if (value instanceof Map) {
    return orNull(value.get(index));
  }
  return null;
}

/**
 * Keyed access (the `["k"]` step).
 *
 * @throws MissingCapabilityError when the value supports no keyed access at
 *   all (numbers, booleans, ...). An absent key is `null`.
 */
export function getKey(value: unknown, key: string): unknown {
  if (isNullish(value)) return null;

  if (typeof value === 'string' || Array.isArray(value)) {
    // Indexable, but has no string keys
    return null;
  }
  if (value instanceof Map) {
    return orNull(value.get(key));
  }
  if (typeof value === 'object') {
    if (isFieldSource(value)) return orNull(value.getField(key));
    return readProperty(value, key);
  }

  throw new MissingCapabilityError(`Cannot access key '${key}' on ${kindOf(value)} value`);
}

/**
 * Every readable field of a value, in insertion order. Used when children are
 * discovered by scanning a node's attributes.
 */
export function listFields(value: unknown): Array<[string, unknown]> {
  if (value instanceof Map) {
    return Array.from(value.entries())
      .filter((entry): entry is [string, unknown] => typeof entry[0] === 'string');
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return [];
  }
  // Leading underscores mark private state on class instances
  const names = isPlainMapping(value)
    ? Object.keys(value)
    : Object.keys(value).filter(name => !name.startsWith('_'));
  return names.map((name): [string, unknown] => [name, getField(value, name)]);
}
