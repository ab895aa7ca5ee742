/**
 * Tree Adapter
 *
 * Converts an arbitrary source tree into a {@link Node} tree by running a
 * Definition's extraction specs at every node.
 *
 * @example
 * import { adaptTree } from 'treelens';
 *
 * const tree = adaptTree(mdastRoot, 'mdast');
 * tree.children.map(n => `${n.icon} ${n.label}`);
 */

import { DefinitionLibrary, getDefaultLibrary } from './definitions/lib';
import { Definition, selectorMatches, toDefinition } from './definitions/model';
import { StructuralError, withErrorContext } from './errors';
import { listFields } from './extraction/field-access';
import { extractValue } from './extraction/engine';
import { resolveIcon } from './icons';
import type { ChildrenSelector, DefinitionFields, ExtractionSpec, FieldName, Node } from './types';
import { isNullish, isObjectLike, isPlainMapping, kindOf, toText } from './values';

export interface AdaptOptions {
  /** Library used to resolve definition names (default: the built-in library) */
  library?: DefinitionLibrary;
}

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;

// ============================================================================
// Field Coercion
// ============================================================================

function toNodeType(value: unknown): string | null {
  if (isNullish(value)) return null;
  const text = toText(value);
  return text === '' ? null : text;
}

/**
 * Line counts: finite numbers truncate, integer text parses, negatives
 * clamp to 0, anything else counts as one line.
 */
export function coerceContentLines(value: unknown): number {
  let lines: number;
  if (typeof value === 'number' && Number.isFinite(value)) {
    lines = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_TEXT.test(value)) {
    lines = Number.parseInt(value, 10);
  } else {
    return 1;
  }
  return Math.max(0, lines);
}

function coerceExtra(value: unknown): Record<string, unknown> {
  if (isNullish(value)) return {};
  if (isPlainMapping(value)) return { ...value };
  if (value instanceof Map) {
    return Object.fromEntries(Array.from(value.entries(), ([key, entry]): [string, unknown] => [String(key), entry]));
  }
  throw new StructuralError(`extra must resolve to a mapping, got ${kindOf(value)}`);
}

// ============================================================================
// Conversion
// ============================================================================

interface NodeContext {
  definition: Definition;
  nodeType: string | null;
}

function extractField(source: unknown, field: FieldName, spec: ExtractionSpec, ctx: NodeContext): unknown {
  return withErrorContext({ field, nodeType: ctx.nodeType ?? undefined }, () => extractValue(source, spec));
}

/** Child candidates found by scanning every field of the source */
function selectChildrenByType(
  source: unknown,
  selector: Extract<ChildrenSelector, { kind: 'types' }>,
  definition: Definition
): unknown[] {
  const candidates: unknown[] = [];

  const consider = (candidate: unknown) => {
    if (!isObjectLike(candidate)) return;
    const childType = toNodeType(extractValue(candidate, definition.fields.type));
    if (childType !== null && selectorMatches(selector, childType)) {
      candidates.push(candidate);
    }
  };

  for (const [, value] of listFields(source)) {
    if (Array.isArray(value)) {
      value.forEach(consider);
    } else {
      consider(value);
    }
  }
  return candidates;
}

function childSources(source: unknown, fields: DefinitionFields, ctx: NodeContext): unknown[] {
  const selector = fields.children;
  if (selector.kind === 'types') {
    return withErrorContext({ field: 'children', nodeType: ctx.nodeType ?? undefined }, () =>
      selectChildrenByType(source, selector, ctx.definition)
    );
  }

  const value = extractField(source, 'children', selector.spec, ctx);
  if (isNullish(value)) return [];
  if (!Array.isArray(value)) {
    throw new StructuralError(`children must resolve to an array, got ${kindOf(value)}`, {
      field: 'children',
      nodeType: ctx.nodeType ?? undefined,
    });
  }
  return value;
}

function convert(source: unknown, definition: Definition): Node | null {
  const baseType = toNodeType(
    withErrorContext({ field: 'type' }, () => extractValue(source, definition.fields.type))
  );
  if (definition.isIgnored(baseType)) {
    return null;
  }

  const ctx: NodeContext = { definition, nodeType: baseType };
  const fields = definition.effectiveFields(baseType);

  // An override may re-type the node; a bare name that finds nothing is the new type itself
  let nodeType = baseType;
  const override = definition.overrideFor(baseType);
  if (override?.type) {
    const spec = override.type;
    nodeType =
      toNodeType(extractField(source, 'type', spec, ctx)) ??
      (spec.kind === 'path' ? toNodeType(spec.path) : null) ??
      baseType;
  }

  const rawLabel = extractField(source, 'label', fields.label, ctx);
  const label = isNullish(rawLabel) ? nodeType ?? 'Unknown' : toText(rawLabel);

  const rawIcon = extractField(source, 'icon', fields.icon, ctx);
  const icon = isNullish(rawIcon) || rawIcon === ''
    ? resolveIcon(nodeType, definition.icons, definition.iconPacks)
    : toText(rawIcon);

  const contentLines = coerceContentLines(extractField(source, 'contentLines', fields.contentLines, ctx));
  const sourceLocation = extractField(source, 'sourceLocation', fields.sourceLocation, ctx) ?? null;
  const extra = withErrorContext({ field: 'extra', nodeType: baseType ?? undefined }, () =>
    coerceExtra(extractValue(source, fields.extra))
  );

  const children: Node[] = [];
  for (const child of childSources(source, fields, ctx)) {
    const node = convert(child, definition);
    if (node !== null) children.push(node);
  }

  return Object.freeze({
    label,
    type: nodeType,
    icon,
    contentLines,
    sourceLocation,
    extra: Object.freeze(extra),
    children: Object.freeze(children),
  });
}

// ============================================================================
// Public API
// ============================================================================

function resolveDefinition(definition: unknown, options: AdaptOptions): Definition {
  if (typeof definition === 'string') {
    return (options.library ?? getDefaultLibrary()).get(definition);
  }
  return toDefinition(definition);
}

/**
 * Convert one source node (and its subtree). Returns `null` when the node's
 * type is ignored; ignored children are dropped from their parent.
 *
 * @param definition - A Definition or its serialized form
 */
export function adaptNode(source: unknown, definition: Definition | object): Node | null {
  return convert(source, toDefinition(definition));
}

/**
 * Convert a whole tree. The definition may be a Definition, its serialized
 * form, or the name of a library definition.
 *
 * @throws StructuralError when the root itself is ignored
 */
export function adaptTree(
  source: unknown,
  definition: Definition | object | string = Definition.default(),
  options: AdaptOptions = {}
): Node {
  const node = convert(source, resolveDefinition(definition, options));
  if (node === null) {
    throw new StructuralError('Root node was ignored; its type is listed in ignore_types');
  }
  return node;
}
