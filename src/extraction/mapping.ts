/**
 * Collection Mapping
 *
 * Rewrites each item of a sequence into a copy of a template, substituting
 * `${expr}` placeholders. `expr` is a path expression evaluated against the
 * binding `{ [variable]: item }`.
 *
 *   '${item.name}'          → the typed value (number stays a number)
 *   'Name: ${item.name}'    → text, with null rendered as ''
 */

import { SpecError, StructuralError } from '../errors';
import type { MapSpec } from '../types';
import { isPlainMapping, kindOf, toText } from '../values';
import { extractByPath } from './path-evaluator';

const DEFAULT_VARIABLE = 'item';
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const EXACT_PLACEHOLDER = /^\$\{([^}]*)\}$/;

// ============================================================================
// Placeholders
// ============================================================================

/** Value of one placeholder expression; an empty expression is '' */
export function resolvePlaceholder(expr: string, binding: Record<string, unknown>): unknown {
  const trimmed = expr.trim();
  if (trimmed === '') return '';
  return extractByPath(binding, trimmed);
}

function substituteString(text: string, binding: Record<string, unknown>): unknown {
  const exact = EXACT_PLACEHOLDER.exec(text);
  if (exact) {
    return resolvePlaceholder(exact[1], binding);
  }

  let result = '';
  let pos = 0;
  while (pos < text.length) {
    const open = text.indexOf('${', pos);
    if (open === -1) break;
    const close = text.indexOf('}', open + 2);
    // Unterminated: the rest stays as written
    if (close === -1) break;

    result += text.slice(pos, open) + toText(resolvePlaceholder(text.slice(open + 2, close), binding));
    pos = close + 1;
  }
  return result + text.slice(pos);
}

/**
 * Instantiate a template against a binding. Arrays and mappings are rebuilt
 * structurally (mapping keys are not substituted); strings are scanned.
 *
 * @example
 * substituteTemplate({ label: '${item.name}!' }, { item: { name: 'x' } }); // → { label: 'x!' }
 */
export function substituteTemplate(template: unknown, binding: Record<string, unknown>): unknown {
  if (typeof template === 'string') {
    return substituteString(template, binding);
  }
  if (Array.isArray(template)) {
    return template.map(entry => substituteTemplate(entry, binding));
  }
  if (isPlainMapping(template)) {
    return Object.fromEntries(
      Object.entries(template).map(([key, entry]) => [key, substituteTemplate(entry, binding)])
    );
  }
  return template;
}

// ============================================================================
// Specs
// ============================================================================

/**
 * Compile a serialized `{ template, variable? }` mapping.
 *
 * @throws SpecError when `template` is missing, `variable` is not an
 *   identifier, or other keys are present
 */
export function compileMapSpec(raw: unknown): MapSpec {
  if (!isPlainMapping(raw)) {
    throw new SpecError(`Map specification must be a mapping, got ${kindOf(raw)}`);
  }
  const unknownKeys = Object.keys(raw).filter(key => key !== 'template' && key !== 'variable');
  if (unknownKeys.length > 0) {
    throw new SpecError(`Unknown map specification keys: ${unknownKeys.join(', ')}`);
  }
  if (!('template' in raw) || raw.template === undefined) {
    throw new SpecError("Map specification requires a 'template'");
  }

  const { template, variable } = raw;
  if (variable === undefined) {
    return { template };
  }
  if (typeof variable !== 'string' || !IDENTIFIER.test(variable)) {
    throw new SpecError(`Map variable must be an identifier, got '${toText(variable)}'`);
  }
  return { template, variable };
}

export function serializeMapSpec(spec: MapSpec): Record<string, unknown> {
  return spec.variable === undefined
    ? { template: spec.template }
    : { template: spec.template, variable: spec.variable };
}

// ============================================================================
// Mapping
// ============================================================================

/**
 * Map every item through `spec.template`. Returns a new array.
 *
 * @example
 * applyCollectionMapping(['a', 'b'], { template: { t: 'Item', c: '${item}' } });
 * // → [{ t: 'Item', c: 'a' }, { t: 'Item', c: 'b' }]
 *
 * @throws StructuralError when `items` is not an array
 */
export function applyCollectionMapping(items: unknown, spec: MapSpec): unknown[] {
  if (!Array.isArray(items)) {
    throw new StructuralError(`Cannot map over ${kindOf(items)} value; expected an array`);
  }
  if (spec.template === undefined) {
    throw new SpecError("Map specification requires a 'template'");
  }

  const variable = spec.variable ?? DEFAULT_VARIABLE;
  return items.map(item => substituteTemplate(spec.template, { [variable]: item }));
}
