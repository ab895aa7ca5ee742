/**
 * Declarative Tree Adaptation
 *
 * Turns any nested tree (parser output, JSON, class instances) into a
 * uniform Node tree, driven by a Definition instead of per-format code.
 *
 * Structure: source tree → Definition (extraction specs) → Node tree
 *
 * @example
 * const tree = adaptTree(source, {
 *   label: { path: 'title', fallback: 'name', transform: { name: 'truncate', max_length: 40 } },
 *   type: 'kind',
 *   children: { path: 'items', filter: { hidden: { ne: true } } },
 *   ignore_types: ['comment'],
 * });
 *
 * extract(source, 'items[-1].name');
 * extract(source, { path: 'items', filter: { active: true }, map: { template: '${item.name}' } });
 */

// Types
export type {
  PathStep,
  FieldSource,
  TextTransformName,
  BuiltinTransform,
  TransformName,
  TransformFn,
  TransformSpec,
  FilterOperator,
  OperatorTest,
  FieldCondition,
  Predicate,
  MapSpec,
  ExtractionFn,
  StructuredSpec,
  ExtractionSpec,
  ChildrenSelector,
  DefinitionFields,
  FieldName,
  FieldOverrides,
  IconEntry,
  IconPack,
  Node,
} from './types';

// Errors
export {
  ExtractionError,
  PathSyntaxError,
  MissingCapabilityError,
  TypeMismatchError,
  SpecError,
  StructuralError,
  withErrorContext,
} from './errors';
export type { ErrorContext } from './errors';

// Values
export { kindOf, toText, valuesEqual, isPlainMapping } from './values';
export type { Scalar, PlainMapping } from './values';

// Path expressions
export { parsePath, parsePathCached, clearPathCache, formatPath } from './extraction/path-parser';
export { getField, getIndex, getKey, listFields } from './extraction/field-access';
export { evaluatePath, extractByPath } from './extraction/path-evaluator';

// Pipeline stages
export {
  TRANSFORM_NAMES,
  compileTransform,
  serializeTransform,
  applyTransform,
  truncateText,
  roundHalfEven,
} from './extraction/transforms';
export type { SerializedTransform } from './extraction/transforms';
export { formatWithSpec } from './extraction/format-spec';
export {
  FILTER_OPERATORS,
  compilePredicate,
  serializePredicate,
  evaluateOperator,
  evaluatePredicate,
  filterCollection,
} from './extraction/filters';
export {
  applyCollectionMapping,
  compileMapSpec,
  substituteTemplate,
  resolvePlaceholder,
} from './extraction/mapping';
export {
  compileExtractionSpec,
  serializeExtractionSpec,
  extractValue,
  extract,
} from './extraction/engine';

// Definitions
export {
  Definition,
  compileChildrenSelector,
  selectorMatches,
  toDefinition,
} from './definitions/model';
export { DefinitionLibrary, getDefaultLibrary, DEFAULT_DEFINITION_NAME } from './definitions/lib';
export { matchesGlob } from './definitions/glob';
export type { SerializedDefinition, SerializedFieldOverrides, SerializedIconPack } from './definitions/schema';

// Icons
export { ICONS, BASE_ICON_PACK, createIconPack, findIconInPack, resolveIcon } from './icons';

// Adapter
export { adaptNode, adaptTree, coerceContentLines } from './tree-adapter';
export type { AdaptOptions } from './tree-adapter';

// Fixtures
export { fixtures, listFixtures, getFixture, loadFixture } from './fixtures';
export type { FixtureData, FixtureName } from './fixtures';
