/**
 * Serialized Definition shape, validated with zod.
 *
 * Field specs stay `unknown` here: they are compiled (and their own errors
 * reported) by the extraction engine. This layer only checks the envelope.
 */

import { z } from 'zod';

import { SpecError } from '../errors';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const FIELD_KEYS = [
  'label',
  'type',
  'children',
  'icon',
  'content_lines',
  'source_location',
  'extra',
] as const;

export type SerializedFieldKey = (typeof FIELD_KEYS)[number];

// ============================================================================
// Schemas
// ============================================================================

export const iconEntrySchema = z
  .object({
    icon: z.string().min(1),
    aliases: z.array(z.string()).default([]),
  })
  .strict();

export const iconPackSchema = z
  .object({
    name: z.string().regex(IDENTIFIER, 'Icon pack name must be an identifier'),
    icons: z.record(z.string().regex(IDENTIFIER, 'Icon name must be an identifier'), iconEntrySchema),
  })
  .strict();

export const typeSelectorSchema = z
  .object({
    include: z.array(z.string()).default(['*']),
    exclude: z.array(z.string()).default([]),
  })
  .strict();

const fieldShape = {
  label: z.unknown().optional(),
  type: z.unknown().optional(),
  children: z.unknown().optional(),
  icon: z.unknown().optional(),
  content_lines: z.unknown().optional(),
  source_location: z.unknown().optional(),
  extra: z.unknown().optional(),
};

export const fieldOverridesSchema = z.object(fieldShape).strict();

export const serializedDefinitionSchema = z
  .object({
    ...fieldShape,
    icons: z.record(z.string()).optional(),
    icon_packs: z.array(iconPackSchema).optional(),
    type_overrides: z.record(fieldOverridesSchema).optional(),
    ignore_types: z.array(z.string()).optional(),
  })
  .strict();

export type SerializedIconPack = z.input<typeof iconPackSchema>;
export type SerializedFieldOverrides = z.input<typeof fieldOverridesSchema>;
export type SerializedDefinition = z.input<typeof serializedDefinitionSchema>;
export type ParsedDefinition = z.output<typeof serializedDefinitionSchema>;

// ============================================================================
// Parsing
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'definition';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate the serialized envelope.
 *
 * @throws SpecError listing every zod issue with its path
 */
export function parseSerializedDefinition(raw: unknown): ParsedDefinition {
  const result = serializedDefinitionSchema.safeParse(raw);
  if (!result.success) {
    throw new SpecError(`Invalid definition: ${describeIssues(result.error)}`, {}, { cause: result.error });
  }
  return result.data;
}

/** `{ include, exclude }` selector, or `null` when `raw` is some other spec */
export function parseTypeSelector(raw: unknown): z.output<typeof typeSelectorSchema> | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  if (!('include' in raw) && !('exclude' in raw)) return null;

  const result = typeSelectorSchema.safeParse(raw);
  if (!result.success) {
    throw new SpecError(`Invalid children selector: ${describeIssues(result.error)}`, { field: 'children' });
  }
  return result.data;
}
