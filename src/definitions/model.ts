/**
 * Definition model
 *
 * A Definition says how to read each Node field out of a source node. It is
 * frozen on construction: merging and per-type overrides always produce
 * fresh objects, so one Definition can be shared by any number of
 * conversions.
 *
 * @example
 * const def = Definition.fromSerialized({
 *   label: 'name',
 *   type: 'node_type',
 *   type_overrides: { special: { label: { path: 'title', transform: 'upper' } } },
 *   ignore_types: ['comment'],
 * });
 */

import { SpecError, withErrorContext } from '../errors';
import { compileExtractionSpec, serializeExtractionSpec } from '../extraction/engine';
import { createIconPack, ICONS } from '../icons';
import type {
  ChildrenSelector,
  DefinitionFields,
  ExtractionSpec,
  FieldName,
  FieldOverrides,
  IconPack,
} from '../types';
import { matchesGlob } from './glob';
import {
  FIELD_KEYS,
  parseSerializedDefinition,
  parseTypeSelector,
  type SerializedDefinition,
  type SerializedFieldKey,
  type SerializedFieldOverrides,
  type SerializedIconPack,
} from './schema';

const FIELD_NAMES: Record<SerializedFieldKey, FieldName> = {
  label: 'label',
  type: 'type',
  children: 'children',
  icon: 'icon',
  content_lines: 'contentLines',
  source_location: 'sourceLocation',
  extra: 'extra',
};

type MutableFieldOverrides = { -readonly [K in FieldName]?: DefinitionFields[K] };

// ============================================================================
// Children Selection
// ============================================================================

/**
 * Compile a `children` spec: `{ include, exclude }` selects child nodes by
 * type, anything else is an extraction spec yielding the child list.
 */
export function compileChildrenSelector(raw: unknown): ChildrenSelector {
  const selector = parseTypeSelector(raw);
  if (selector) {
    return {
      kind: 'types',
      include: Object.freeze([...selector.include]),
      exclude: Object.freeze([...selector.exclude]),
    };
  }
  return { kind: 'path', spec: compileExtractionSpec(raw) };
}

export function serializeChildrenSelector(selector: ChildrenSelector): unknown {
  if (selector.kind === 'types') {
    return { include: [...selector.include], exclude: [...selector.exclude] };
  }
  return serializeExtractionSpec(selector.spec);
}

/** Whether a candidate type passes an include/exclude selector */
export function selectorMatches(
  selector: Extract<ChildrenSelector, { kind: 'types' }>,
  nodeType: string
): boolean {
  if (!nodeType) return false;
  if (!selector.include.some(pattern => matchesGlob(nodeType, pattern))) return false;
  return !selector.exclude.some(pattern => matchesGlob(nodeType, pattern));
}

// ============================================================================
// Field Sets
// ============================================================================

function compileFieldSet(raw: SerializedFieldOverrides, nodeType?: string): FieldOverrides {
  const fields: MutableFieldOverrides = {};

  for (const key of FIELD_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;

    const field = FIELD_NAMES[key];
    withErrorContext({ field, ...(nodeType !== undefined && { nodeType }) }, () => {
      if (field === 'children') {
        fields.children = compileChildrenSelector(value);
      } else {
        fields[field] = compileExtractionSpec(value);
      }
    });
  }

  return Object.freeze(fields);
}

function serializeFieldSet(fields: FieldOverrides, nodeType?: string): SerializedFieldOverrides {
  const out: Record<string, unknown> = {};

  for (const key of FIELD_KEYS) {
    const field = FIELD_NAMES[key];
    withErrorContext({ field, ...(nodeType !== undefined && { nodeType }) }, () => {
      if (field === 'children') {
        if (fields.children) out[key] = serializeChildrenSelector(fields.children);
        return;
      }
      const spec: ExtractionSpec | undefined = fields[field];
      if (spec) out[key] = serializeExtractionSpec(spec);
    });
  }

  return out;
}

function serializeIconPack(pack: IconPack): SerializedIconPack {
  return {
    name: pack.name,
    icons: Object.fromEntries(
      Object.entries(pack.icons).map(([name, entry]) => [name, { icon: entry.icon, aliases: [...entry.aliases] }])
    ),
  };
}

// ============================================================================
// Definition
// ============================================================================

export interface DefinitionInit {
  readonly fields: DefinitionFields;
  readonly icons: Readonly<Record<string, string>>;
  readonly iconPacks: readonly IconPack[];
  readonly typeOverrides: ReadonlyMap<string, FieldOverrides>;
  readonly ignoreTypes: ReadonlySet<string>;
}

export class Definition {
  readonly fields: DefinitionFields;
  readonly icons: Readonly<Record<string, string>>;
  readonly iconPacks: readonly IconPack[];
  readonly typeOverrides: ReadonlyMap<string, FieldOverrides>;
  readonly ignoreTypes: ReadonlySet<string>;

  private constructor(init: DefinitionInit) {
    this.fields = Object.freeze({ ...init.fields });
    this.icons = Object.freeze({ ...init.icons });
    this.iconPacks = Object.freeze([...init.iconPacks]);
    this.typeOverrides = new Map(init.typeOverrides);
    this.ignoreTypes = new Set(init.ignoreTypes);
    Object.freeze(this);
  }

  /**
   * Reads `label`, `type` and `children` by those names, one content line,
   * no icon, location or extra, and the baseline icon table.
   */
  static default(): Definition {
    return new Definition({
      fields: {
        label: { kind: 'path', path: 'label' },
        type: { kind: 'path', path: 'type' },
        children: { kind: 'path', spec: { kind: 'path', path: 'children' } },
        icon: { kind: 'literal', value: null },
        contentLines: { kind: 'literal', value: 1 },
        sourceLocation: { kind: 'literal', value: null },
        extra: { kind: 'literal', value: Object.freeze({}) },
      },
      icons: ICONS,
      iconPacks: [],
      typeOverrides: new Map(),
      ignoreTypes: new Set(),
    });
  }

  /**
   * Build a Definition from its serialized form, over the defaults. `icons`
   * entries are merged over the baseline table; every other key replaces.
   *
   * @throws SpecError for unknown keys or malformed entries
   */
  static fromSerialized(raw: unknown): Definition {
    return Definition.default().merge(raw);
  }

  /** New Definition with `raw` (serialized, possibly partial) applied on top */
  merge(raw: unknown): Definition {
    const parsed = parseSerializedDefinition(raw);

    const fields: DefinitionFields = { ...this.fields, ...compileFieldSet(parsed) };

    const typeOverrides = new Map(this.typeOverrides);
    for (const [nodeType, override] of Object.entries(parsed.type_overrides ?? {})) {
      typeOverrides.set(nodeType, compileFieldSet(override, nodeType));
    }

    return new Definition({
      fields,
      icons: { ...this.icons, ...parsed.icons },
      iconPacks: parsed.icon_packs ? parsed.icon_packs.map(createIconPack) : this.iconPacks,
      typeOverrides,
      ignoreTypes: parsed.ignore_types ? new Set(parsed.ignore_types) : this.ignoreTypes,
    });
  }

  /**
   * Serialized form. Reads back into an equivalent Definition.
   *
   * @throws SpecError when a field holds a callable or custom transform
   */
  toSerialized(): SerializedDefinition {
    return {
      ...serializeFieldSet(this.fields),
      icons: { ...this.icons },
      icon_packs: this.iconPacks.map(serializeIconPack),
      type_overrides: Object.fromEntries(
        Array.from(this.typeOverrides, ([nodeType, override]) => [nodeType, serializeFieldSet(override, nodeType)])
      ),
      ignore_types: Array.from(this.ignoreTypes),
    };
  }

  isIgnored(nodeType: string | null): boolean {
    return nodeType !== null && this.ignoreTypes.has(nodeType);
  }

  overrideFor(nodeType: string | null): FieldOverrides | undefined {
    return nodeType === null ? undefined : this.typeOverrides.get(nodeType);
  }

  /**
   * Base fields overlaid field-by-field with the override for `nodeType`.
   * Always a fresh object; the Definition itself is never touched.
   */
  effectiveFields(nodeType: string | null): DefinitionFields {
    return { ...this.fields, ...this.overrideFor(nodeType) };
  }
}

/** Accept an existing Definition or its serialized form */
export function toDefinition(raw: unknown): Definition {
  if (raw instanceof Definition) return raw;
  if (raw === undefined || raw === null) {
    throw new SpecError('A definition is required');
  }
  return Definition.fromSerialized(raw);
}
