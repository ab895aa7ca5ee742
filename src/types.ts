/**
 * treelens Types
 *
 * Declarative extraction model:
 *   source value → Definition (extraction specs) → Node tree
 *
 * Every spec kind is a closed tagged union, so the engine matches on `kind`
 * instead of probing whether something is a string, a function or a mapping.
 */

// ============================================================================
// Path Expressions
// ============================================================================

/**
 * One access step of a parsed path expression.
 *
 *   `a.b[0]["k"]` → attribute a, attribute b, index 0, key k
 */
export type PathStep =
  | { readonly kind: 'attribute'; readonly name: string }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'key'; readonly key: string };

/**
 * Optional capability a host object can implement to control how the
 * engine reads its named fields. Return `undefined` or `null` when absent.
 */
export interface FieldSource {
  getField(name: string): unknown;
}

// ============================================================================
// Transformations
// ============================================================================

export type TextTransformName = 'upper' | 'lower' | 'capitalize' | 'strip';

export type BuiltinTransform =
  | { readonly name: TextTransformName }
  | { readonly name: 'truncate'; readonly maxLength?: number; readonly suffix?: string }
  | { readonly name: 'abs' }
  | { readonly name: 'round'; readonly digits?: number }
  | { readonly name: 'format'; readonly formatSpec?: string }
  | { readonly name: 'length' }
  | { readonly name: 'join'; readonly separator?: string }
  | { readonly name: 'first' }
  | { readonly name: 'last' }
  | { readonly name: 'flatten'; readonly depth?: number }
  | { readonly name: 'str' }
  | { readonly name: 'int' }
  | { readonly name: 'float' };

export type TransformName = BuiltinTransform['name'];

export type TransformFn = (value: unknown) => unknown;

export type TransformSpec =
  | { readonly kind: 'builtin'; readonly transform: BuiltinTransform }
  | { readonly kind: 'custom'; readonly fn: TransformFn };

// ============================================================================
// Filter Predicates
// ============================================================================

export type FilterOperator =
  // membership
  | 'in'
  | 'not_in'
  // string / regex
  | 'startswith'
  | 'endswith'
  | 'contains'
  | 'matches'
  // comparison
  | 'eq'
  | 'ne'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  // presence / kind
  | 'is_none'
  | 'is_not_none'
  | 'type';

export interface OperatorTest {
  readonly operator: FilterOperator;
  readonly operand: unknown;
}

export type FieldCondition =
  | { readonly kind: 'equals'; readonly value: unknown }
  | { readonly kind: 'operators'; readonly tests: readonly OperatorTest[] };

export type Predicate =
  | {
      readonly kind: 'field';
      readonly field: string;
      readonly condition: FieldCondition;
      /** Set when the field name is an operator name; applies to scalar items directly */
      readonly selfOperator?: FilterOperator;
    }
  | { readonly kind: 'and'; readonly clauses: readonly Predicate[] }
  | { readonly kind: 'or'; readonly clauses: readonly Predicate[] }
  | { readonly kind: 'not'; readonly clause: Predicate };

// ============================================================================
// Collection Mapping
// ============================================================================

export interface MapSpec {
  /** Structure to instantiate per item; `${expr}` placeholders are substituted */
  readonly template: unknown;
  /** Name the current item is bound to (default `item`) */
  readonly variable?: string;
}

// ============================================================================
// Extraction Specs
// ============================================================================

export type ExtractionFn = (source: unknown) => unknown;

export interface StructuredSpec {
  readonly kind: 'structured';
  readonly path?: string;
  readonly fallback?: string;
  readonly default?: unknown;
  readonly transform?: TransformSpec;
  readonly filter?: Predicate;
  readonly map?: MapSpec;
}

export type ExtractionSpec =
  | { readonly kind: 'literal'; readonly value: unknown }
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'callable'; readonly fn: ExtractionFn }
  | StructuredSpec;

// ============================================================================
// Children Selection
// ============================================================================

export type ChildrenSelector =
  | { readonly kind: 'path'; readonly spec: ExtractionSpec }
  | {
      readonly kind: 'types';
      /** Glob patterns a candidate's type must match (default `['*']`) */
      readonly include: readonly string[];
      /** Glob patterns that reject a candidate (default `[]`) */
      readonly exclude: readonly string[];
    };

// ============================================================================
// Definitions
// ============================================================================

/** The per-node fields a Definition knows how to extract */
export interface DefinitionFields {
  readonly label: ExtractionSpec;
  readonly type: ExtractionSpec;
  readonly children: ChildrenSelector;
  readonly icon: ExtractionSpec;
  readonly contentLines: ExtractionSpec;
  readonly sourceLocation: ExtractionSpec;
  readonly extra: ExtractionSpec;
}

export type FieldName = keyof DefinitionFields;

export type FieldOverrides = Partial<DefinitionFields>;

// ============================================================================
// Icons
// ============================================================================

export interface IconEntry {
  readonly icon: string;
  readonly aliases: readonly string[];
}

export interface IconPack {
  readonly name: string;
  readonly icons: Readonly<Record<string, IconEntry>>;
}

// ============================================================================
// Output Tree
// ============================================================================

/**
 * Normalized output node. Built bottom-up, frozen after construction,
 * exclusively owns its children.
 */
export interface Node {
  readonly label: string;
  readonly type: string | null;
  readonly icon: string | null;
  /** Number of source lines this node represents (>= 0, default 1) */
  readonly contentLines: number;
  readonly sourceLocation: unknown;
  readonly extra: Readonly<Record<string, unknown>>;
  readonly children: readonly Node[];
}
