/**
 * Path Evaluator
 *
 * Walks parsed steps against a value. Missing data degrades to `null` at
 * every step so that fallback chains can take over; the only failures are
 * syntax errors and keyed access on values that have no keys at all.
 */

import { ExtractionError, SpecError } from '../errors';
import type { PathStep } from '../types';
import { isNullish } from '../values';
import { getField, getIndex, getKey } from './field-access';
import { formatPath, parsePathCached } from './path-parser';

function stepValue(step: PathStep): string | number {
  switch (step.kind) {
    case 'attribute':
      return step.name;
    case 'index':
      return step.index;
    case 'key':
      return step.key;
  }
}

function describePath(steps: readonly PathStep[]): string {
  try {
    return formatPath(steps);
  } catch (err) {
    // Hand-built keys with both quote characters have no path text
    if (err instanceof SpecError) return JSON.stringify(steps.map(stepValue));
    throw err;
  }
}

function evaluateStep(current: unknown, step: PathStep): unknown {
  switch (step.kind) {
    case 'attribute':
      return getField(current, step.name);
    case 'index':
      return getIndex(current, step.index);
    case 'key':
      return getKey(current, step.key);
  }
}

/**
 * Evaluate already-parsed steps against `value`.
 *
 * @param path - Original text, used only for error context (rendered from `steps` when absent)
 */
export function evaluatePath(
  value: unknown,
  steps: readonly PathStep[],
  path?: string
): unknown {
  let current: unknown = value;

  for (let i = 0; i < steps.length; i++) {
    if (isNullish(current)) return null;
    try {
      current = evaluateStep(current, steps[i]);
    } catch (err) {
      if (err instanceof ExtractionError) {
        throw err.withContext({ path: path ?? describePath(steps), stepIndex: i });
      }
      throw err;
    }
  }

  return current === undefined ? null : current;
}

/**
 * Parse (cached) and evaluate a path expression.
 *
 * @example
 * extractByPath({ items: [{ name: 'a' }, { name: 'b' }] }, 'items[-1].name'); // → 'b'
 * extractByPath({ items: [] }, 'items[3].name');                            // → null
 */
export function extractByPath(value: unknown, path: string): unknown {
  return evaluatePath(value, parsePathCached(path), path);
}
