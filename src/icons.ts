/**
 * Icon table and icon packs.
 *
 * An icons table maps node types to either a symbol (`'¶'`) or a pack
 * reference (`'base.paragraph'`). The `''` or `'*'` entry names a default
 * pack searched by icon name and aliases.
 */

import basePackData from './base-icons.json';
import { SpecError } from './errors';
import { iconPackSchema } from './definitions/schema';
import type { IconPack } from './types';

function freezePack(pack: IconPack): IconPack {
  const icons = Object.fromEntries(
    Object.entries(pack.icons).map(([name, entry]) => [
      name,
      Object.freeze({ icon: entry.icon, aliases: Object.freeze([...entry.aliases]) }),
    ])
  );
  return Object.freeze({ name: pack.name, icons: Object.freeze(icons) });
}

/**
 * Validate and freeze a serialized icon pack.
 *
 * @example
 * createIconPack({ name: 'arrows', icons: { right: { icon: '→', aliases: ['next'] } } });
 */
export function createIconPack(raw: unknown): IconPack {
  const result = iconPackSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new SpecError(`Invalid icon pack: ${issues}`);
  }
  return freezePack(result.data);
}

export const BASE_ICON_PACK: IconPack = createIconPack(basePackData);

/** Baseline type → symbol table every Definition starts from */
export const ICONS: Readonly<Record<string, string>> = Object.freeze(
  Object.fromEntries(Object.entries(BASE_ICON_PACK.icons).map(([name, entry]) => [name, entry.icon]))
);

const UNKNOWN_ICON = ICONS.unknown ?? '?';

// ============================================================================
// Resolution
// ============================================================================

/** Icon for `nodeType` in `pack`, matched by icon name, then by alias */
export function findIconInPack(nodeType: string, pack: IconPack): string | null {
  const direct = pack.icons[nodeType];
  if (direct) return direct.icon;

  for (const entry of Object.values(pack.icons)) {
    if (entry.aliases.includes(nodeType)) return entry.icon;
  }
  return null;
}

function findPack(name: string, packs: readonly IconPack[]): IconPack | undefined {
  if (name === BASE_ICON_PACK.name) return BASE_ICON_PACK;
  return packs.find(pack => pack.name === name);
}

function defaultPack(icons: Readonly<Record<string, string>>, packs: readonly IconPack[]): IconPack | undefined {
  const name = icons[''] || icons['*'];
  return name ? findPack(name, packs) : undefined;
}

function resolveReference(
  reference: string,
  icons: Readonly<Record<string, string>>,
  packs: readonly IconPack[]
): string | null {
  const dot = reference.indexOf('.');
  const packName = reference.slice(0, dot);
  const iconName = reference.slice(dot + 1);

  const candidates = [findPack(packName, packs), defaultPack(icons, packs), BASE_ICON_PACK];
  for (const pack of candidates) {
    const entry = pack?.icons[iconName];
    if (entry) return entry.icon;
  }
  return null;
}

/**
 * Symbol for a node type.
 *
 * Order: the icons table (direct symbol or `pack.icon` reference), the
 * default pack, the base pack, then the baseline table, ending at the
 * `unknown` symbol.
 *
 * @example
 * resolveIcon('paragraph', ICONS);                       // → '¶'
 * resolveIcon('li', ICONS);                              // → '•' (base alias)
 * resolveIcon('x', { x: 'arrows.right' }, [arrows]);     // → '→'
 */
export function resolveIcon(
  nodeType: string | null,
  icons: Readonly<Record<string, string>>,
  packs: readonly IconPack[] = []
): string {
  if (!nodeType) return icons.unknown || UNKNOWN_ICON;

  const reference = icons[nodeType];
  if (reference) {
    if (!reference.includes('.')) return reference;
    const resolved = resolveReference(reference, icons, packs);
    if (resolved) return resolved;
  }

  const fromDefault = defaultPack(icons, packs);
  if (fromDefault) {
    const icon = findIconInPack(nodeType, fromDefault);
    if (icon) return icon;
  }

  return findIconInPack(nodeType, BASE_ICON_PACK) ?? ICONS[nodeType] ?? UNKNOWN_ICON;
}
