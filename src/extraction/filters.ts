/**
 * Filter Engine
 *
 * Boolean predicates over the items of a collection.
 *
 * Serialized predicates:
 *   { type: 'func' }                                   // equality
 *   { line_count: { gt: 5, lt: 15 } }                  // every operator must hold
 *   { and: [p1, p2] } / { or: [p1, p2] } / { not: p }  // logic
 *   { type: 'func', name: { startswith: 'get_' } }     // keys AND-ed in order
 *
 * When an item is a scalar, a top-level key that names an operator applies
 * that operator to the item itself: `{ startswith: 'H' }` keeps 'HELLO'.
 */

import { ExtractionError, SpecError, TypeMismatchError } from '../errors';
import type { FieldCondition, FilterOperator, OperatorTest, Predicate } from '../types';
import { isNullish, isPlainMapping, isScalar, kindOf, toText, valuesEqual } from '../values';
import { extractByPath } from './path-evaluator';
import { parsePathCached } from './path-parser';

// ============================================================================
// Operators
// ============================================================================

export const FILTER_OPERATORS: readonly FilterOperator[] = [
  'in',
  'not_in',
  'startswith',
  'endswith',
  'contains',
  'matches',
  'eq',
  'ne',
  'gt',
  'gte',
  'lt',
  'lte',
  'is_none',
  'is_not_none',
  'type',
];

export function isFilterOperator(name: string): name is FilterOperator {
  return FILTER_OPERATORS.some(known => known === name);
}

const regexCache = new Map<string, RegExp>();

function compileRegex(pattern: string): RegExp {
  let regex = regexCache.get(pattern);
  if (!regex) {
    regex = new RegExp(pattern);
    regexCache.set(pattern, regex);
  }
  return regex;
}

function membership(value: unknown, operand: unknown, operator: 'in' | 'not_in'): boolean {
  if (Array.isArray(operand)) {
    return operand.some(candidate => valuesEqual(value, candidate));
  }
  if (typeof operand === 'string') {
    if (typeof value !== 'string') {
      throw new TypeMismatchError(operator, 'string', kindOf(value), { operator },
        `${operator} against a string requires a string value, got ${kindOf(value)}`);
    }
    return operand.includes(value);
  }
  throw new TypeMismatchError(operator, 'array or string operand', kindOf(operand), { operator });
}

type ComparisonOperator = 'gt' | 'gte' | 'lt' | 'lte';

type Comparable = number | string | boolean;

function isComparable(value: unknown): value is Comparable {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

/** Ordering only between values of the same kind: number, string or boolean */
function compare(value: unknown, operand: unknown, operator: ComparisonOperator): boolean {
  if (!isComparable(value) || !isComparable(operand) || typeof value !== typeof operand) {
    throw new TypeMismatchError(operator, kindOf(operand), kindOf(value), { operator },
      `${operator} cannot compare ${kindOf(value)} with ${kindOf(operand)}`);
  }

  const order = ordering(value, operand);
  switch (operator) {
    case 'gt':
      return order > 0;
    case 'gte':
      return order >= 0;
    case 'lt':
      return order < 0;
    case 'lte':
      return order <= 0;
  }
}

/** Sign of `a - b`; NaN when either side is NaN */
function ordering(a: Comparable, b: Comparable): number {
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  return Number(a) - Number(b);
}

function requireStringOperand(operand: unknown, operator: FilterOperator): string {
  if (typeof operand !== 'string') {
    throw new TypeMismatchError(operator, 'string operand', kindOf(operand), { operator });
  }
  return operand;
}

/**
 * Evaluate one operator against a field value.
 *
 * @example
 * evaluateOperator(12, { operator: 'gt', operand: 10 });                 // → true
 * evaluateOperator('get_name', { operator: 'startswith', operand: 'get_' }); // → true
 * evaluateOperator(null, { operator: 'is_none', operand: false });       // → false
 */
export function evaluateOperator(value: unknown, test: OperatorTest): boolean {
  const { operator, operand } = test;

  switch (operator) {
    case 'in':
      return membership(value, operand, operator);
    case 'not_in':
      return !membership(value, operand, operator);
    case 'startswith':
      return toText(value).startsWith(requireStringOperand(operand, operator));
    case 'endswith':
      return toText(value).endsWith(requireStringOperand(operand, operator));
    case 'contains':
      return toText(value).includes(requireStringOperand(operand, operator));
    case 'matches':
      return compileRegex(requireStringOperand(operand, operator)).test(toText(value));
    case 'eq':
      return valuesEqual(value, operand);
    case 'ne':
      return !valuesEqual(value, operand);
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return compare(value, operand, operator);
    case 'is_none':
      return isNullish(value) === (operand !== false);
    case 'is_not_none':
      return !isNullish(value) === (operand !== false);
    case 'type':
      return kindOf(value) === operand;
  }
}

// ============================================================================
// Compilation
// ============================================================================

function validateOperand(operator: FilterOperator, operand: unknown): void {
  switch (operator) {
    case 'in':
    case 'not_in':
      if (!Array.isArray(operand) && typeof operand !== 'string') {
        throw new SpecError(`Operator '${operator}' requires an array or string operand, got ${kindOf(operand)}`, { operator });
      }
      return;
    case 'startswith':
    case 'endswith':
    case 'contains':
    case 'type':
      if (typeof operand !== 'string') {
        throw new SpecError(`Operator '${operator}' requires a string operand, got ${kindOf(operand)}`, { operator });
      }
      return;
    case 'matches':
      if (typeof operand !== 'string') {
        throw new SpecError(`Operator 'matches' requires a pattern string, got ${kindOf(operand)}`, { operator });
      }
      try {
        compileRegex(operand);
      } catch (err) {
        throw new SpecError(`Invalid pattern '${operand}' for operator 'matches'`, { operator }, { cause: err });
      }
      return;
    default:
      return;
  }
}

function acceptsOperand(operator: FilterOperator, operand: unknown): boolean {
  try {
    validateOperand(operator, operand);
    return true;
  } catch (err) {
    if (err instanceof SpecError) return false;
    throw err;
  }
}

function compileCondition(raw: unknown): FieldCondition {
  if (!isPlainMapping(raw)) {
    return { kind: 'equals', value: raw };
  }

  const tests: OperatorTest[] = Object.entries(raw).map(([operator, operand]) => {
    if (!isFilterOperator(operator)) {
      throw new SpecError(
        `Unknown filter operator '${operator}'. Available: ${FILTER_OPERATORS.join(', ')}`,
        { operator }
      );
    }
    validateOperand(operator, operand);
    return { operator, operand };
  });
  return { kind: 'operators', tests };
}

function compileClauses(raw: unknown, key: 'and' | 'or'): Predicate[] {
  if (!Array.isArray(raw)) {
    throw new SpecError(`'${key}' requires an array of predicates, got ${kindOf(raw)}`);
  }
  return raw.map(compilePredicate);
}

/**
 * Compile a serialized predicate mapping.
 *
 * @throws SpecError for unknown operators, malformed logic or operands
 * @throws PathSyntaxError for field names that are not valid paths
 */
export function compilePredicate(raw: unknown): Predicate {
  if (!isPlainMapping(raw)) {
    throw new SpecError(`Filter predicate must be a mapping, got ${kindOf(raw)}`);
  }

  const clauses: Predicate[] = Object.entries(raw).map(([key, value]): Predicate => {
    switch (key) {
      case 'and':
        return { kind: 'and', clauses: compileClauses(value, key) };
      case 'or':
        return { kind: 'or', clauses: compileClauses(value, key) };
      case 'not':
        return { kind: 'not', clause: compilePredicate(value) };
      default: {
        parsePathCached(key);
        const condition = compileCondition(value);
        if (isFilterOperator(key) && condition.kind === 'equals' && acceptsOperand(key, condition.value)) {
          return { kind: 'field', field: key, condition, selfOperator: key };
        }
        return { kind: 'field', field: key, condition };
      }
    }
  });

  return clauses.length === 1 ? clauses[0] : { kind: 'and', clauses };
}

/** Serialized form of a compiled predicate */
export function serializePredicate(predicate: Predicate): Record<string, unknown> {
  switch (predicate.kind) {
    case 'and':
    case 'or':
      return { [predicate.kind]: predicate.clauses.map(serializePredicate) };
    case 'not':
      return { not: serializePredicate(predicate.clause) };
    case 'field': {
      const { condition } = predicate;
      if (condition.kind === 'equals') {
        return { [predicate.field]: condition.value };
      }
      return {
        [predicate.field]: Object.fromEntries(condition.tests.map(test => [test.operator, test.operand])),
      };
    }
  }
}

// ============================================================================
// Evaluation
// ============================================================================

function evaluateField(item: unknown, predicate: Extract<Predicate, { kind: 'field' }>): boolean {
  const { condition, selfOperator } = predicate;

  if (selfOperator && condition.kind === 'equals' && isScalar(item)) {
    return evaluateOperator(item, { operator: selfOperator, operand: condition.value });
  }

  const value = extractByPath(item, predicate.field);
  if (condition.kind === 'equals') {
    return valuesEqual(value, condition.value);
  }
  return condition.tests.every(test => {
    try {
      return evaluateOperator(value, test);
    } catch (err) {
      if (err instanceof ExtractionError) {
        throw err.withContext({ operator: test.operator, path: predicate.field });
      }
      throw err;
    }
  });
}

/** Whether `item` satisfies `predicate`. Logic short-circuits. */
export function evaluatePredicate(item: unknown, predicate: Predicate): boolean {
  switch (predicate.kind) {
    case 'and':
      return predicate.clauses.every(clause => evaluatePredicate(item, clause));
    case 'or':
      return predicate.clauses.some(clause => evaluatePredicate(item, clause));
    case 'not':
      return !evaluatePredicate(item, predicate.clause);
    case 'field':
      return evaluateField(item, predicate);
  }
}

/**
 * Keep the items that satisfy `predicate`, in order. The input is not touched.
 *
 * @example
 * const active = compilePredicate({ active: true });
 * filterCollection([{ active: true }, { active: false }], active); // → [{ active: true }]
 */
export function filterCollection<T>(items: readonly T[], predicate: Predicate): T[] {
  return items.filter(item => evaluatePredicate(item, predicate));
}
