/**
 * Extraction Pipeline
 *
 * One declared field → one value. Structured specs run strictly in order:
 *
 *   path → fallback → default → transform → filter → map
 *
 * so a filter sees transformed values, and a map sees the filtered list.
 *
 * @example
 * extract({ title: null, name: 'doc' }, { path: 'title', fallback: 'name', transform: 'upper' });
 * // → 'DOC'
 */

import { PathSyntaxError, SpecError } from '../errors';
import type { ExtractionSpec, PathStep, StructuredSpec } from '../types';
import { isNullish, isPlainMapping, kindOf } from '../values';
import { compilePredicate, filterCollection, serializePredicate } from './filters';
import { applyCollectionMapping, compileMapSpec, serializeMapSpec } from './mapping';
import { evaluatePath, extractByPath } from './path-evaluator';
import { parsePathCached } from './path-parser';
import { applyTransform, compileTransform, serializeTransform } from './transforms';

export const STRUCTURED_KEYS = ['path', 'fallback', 'default', 'transform', 'filter', 'map'] as const;

type StructuredKey = (typeof STRUCTURED_KEYS)[number];

function isStructuredKey(key: string): key is StructuredKey {
  return STRUCTURED_KEYS.some(known => known === key);
}

/** A mapping is a structured spec as soon as it uses one of the pipeline keys */
export function isStructuredMapping(value: unknown): value is Record<string, unknown> {
  return isPlainMapping(value) && Object.keys(value).some(isStructuredKey);
}

// ============================================================================
// Compilation
// ============================================================================

function compilePathField(raw: unknown, key: 'path' | 'fallback'): string | undefined {
  if (isNullish(raw)) return undefined;
  if (typeof raw !== 'string') {
    throw new SpecError(`'${key}' must be a path string, got ${kindOf(raw)}`);
  }
  parsePathCached(raw);
  return raw;
}

function compileStructured(raw: Record<string, unknown>): StructuredSpec {
  const unknownKeys = Object.keys(raw).filter(key => !isStructuredKey(key));
  if (unknownKeys.length > 0) {
    throw new SpecError(
      `Unknown extraction keys: ${unknownKeys.join(', ')}. Allowed: ${STRUCTURED_KEYS.join(', ')}`
    );
  }

  const path = compilePathField(raw.path, 'path');
  const fallback = compilePathField(raw.fallback, 'fallback');

  return {
    kind: 'structured',
    ...(path !== undefined && { path }),
    ...(fallback !== undefined && { fallback }),
    ...(raw.default !== undefined && { default: raw.default }),
    ...(!isNullish(raw.transform) && { transform: compileTransform(raw.transform) }),
    ...(!isNullish(raw.filter) && { filter: compilePredicate(raw.filter) }),
    ...(!isNullish(raw.map) && { map: compileMapSpec(raw.map) }),
  };
}

/**
 * Compile a serialized extraction spec.
 *
 *   'a.b[0]'                       → path
 *   (source) => ...                → callable
 *   { path, fallback, ... }        → structured
 *   anything else                  → literal
 *
 * @throws SpecError for malformed structured specs
 * @throws PathSyntaxError for invalid `path` / `fallback` in a structured spec
 */
export function compileExtractionSpec(raw: unknown): ExtractionSpec {
  if (typeof raw === 'string') {
    return { kind: 'path', path: raw };
  }
  if (typeof raw === 'function') {
    return { kind: 'callable', fn: (source: unknown): unknown => raw(source) };
  }
  if (isStructuredMapping(raw)) {
    return compileStructured(raw);
  }
  return { kind: 'literal', value: raw === undefined ? null : raw };
}

/**
 * Serialized form of a compiled spec.
 *
 * @throws SpecError for callables, custom transforms, literal strings and
 *   literal mappings that would read back as structured specs
 */
export function serializeExtractionSpec(spec: ExtractionSpec): unknown {
  switch (spec.kind) {
    case 'path':
      return spec.path;
    case 'callable':
      throw new SpecError('Callable extraction specs cannot be serialized');
    case 'literal':
      if (typeof spec.value === 'string') {
        throw new SpecError(`Literal text '${spec.value}' would read back as a path`);
      }
      if (isStructuredMapping(spec.value)) {
        throw new SpecError('Literal mapping with extraction keys would read back as a structured spec');
      }
      return spec.value;
    case 'structured':
      return {
        ...(spec.path !== undefined && { path: spec.path }),
        ...(spec.fallback !== undefined && { fallback: spec.fallback }),
        ...(spec.default !== undefined && { default: spec.default }),
        ...(spec.transform && { transform: serializeTransform(spec.transform) }),
        ...(spec.filter && { filter: serializePredicate(spec.filter) }),
        ...(spec.map && { map: serializeMapSpec(spec.map) }),
      };
  }
}

// ============================================================================
// Evaluation
// ============================================================================

function warnSkipped(stage: 'filter' | 'map', value: unknown): void {
  console.warn(`[extract] ${stage} skipped: expected an array, got ${kindOf(value)}`);
}

function runStructured(source: unknown, spec: StructuredSpec): unknown {
  // 1. primary path
  let value: unknown = spec.path !== undefined ? extractByPath(source, spec.path) : null;

  // 2. fallback path
  if (isNullish(value) && spec.fallback !== undefined) {
    value = extractByPath(source, spec.fallback);
  }

  // 3. default literal
  if (isNullish(value) && spec.default !== undefined) {
    value = spec.default;
  }

  // 4. transform
  if (!isNullish(value) && spec.transform) {
    value = applyTransform(value, spec.transform);
  }

  // 5. filter
  if (spec.filter && !isNullish(value)) {
    if (Array.isArray(value)) {
      value = filterCollection(value, spec.filter);
    } else {
      warnSkipped('filter', value);
    }
  }

  // 6. map
  if (spec.map && !isNullish(value)) {
    if (Array.isArray(value)) {
      value = applyCollectionMapping(value, spec.map);
    } else {
      warnSkipped('map', value);
    }
  }

  return value ?? null;
}

/**
 * Run a compiled spec against a source value. Never returns `undefined`.
 *
 * A bare path that does not parse is taken as literal text.
 */
export function extractValue(source: unknown, spec: ExtractionSpec): unknown {
  switch (spec.kind) {
    case 'callable':
      return spec.fn(source) ?? null;
    case 'literal':
      return spec.value;
    case 'path': {
      let steps: readonly PathStep[];
      try {
        steps = parsePathCached(spec.path);
      } catch (err) {
        if (err instanceof PathSyntaxError) return spec.path;
        throw err;
      }
      return evaluatePath(source, steps, spec.path);
    }
    case 'structured':
      return runStructured(source, spec);
  }
}

/** Compile a serialized spec and run it */
export function extract(source: unknown, raw: unknown): unknown {
  return extractValue(source, compileExtractionSpec(raw));
}
