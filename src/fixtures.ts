/**
 * Sample Fixtures
 *
 * Sample documents paired with the definition that adapts them. Use these
 * to try treelens without writing a parser or a definition first.
 *
 * @example
 * import { loadFixture } from 'treelens';
 *
 * const tree = loadFixture('markdown-readme');
 * tree.children.map(n => n.label); // ['treelens', 'paragraph', 'List', 'const tree = ...']
 */

import type { SerializedDefinition } from './definitions/schema';
import markdownReadme from './samples/markdown-readme.json';
import serviceConfig from './samples/service-config.json';
import { adaptTree } from './tree-adapter';
import type { Node } from './types';

// ============================================================================
// Fixture Types
// ============================================================================

export interface FixtureData {
  /** Library definition name, or a serialized definition */
  definition: string | SerializedDefinition;
  document: unknown;
}

export type FixtureName = 'markdown-readme' | 'service-config';

// ============================================================================
// Exports
// ============================================================================

/**
 * Raw fixture data by name
 */
export const fixtures: Record<FixtureName, FixtureData> = {
  'markdown-readme': { definition: 'mdast', document: markdownReadme },
  'service-config': serviceConfig,
};

/**
 * List available fixture names
 */
export function listFixtures(): FixtureName[] {
  return ['markdown-readme', 'service-config'];
}

/**
 * Get raw fixture data
 */
export function getFixture(name: FixtureName): FixtureData {
  const fixture = fixtures[name];
  if (!fixture) {
    throw new Error(`Unknown fixture: ${name}. Available: ${listFixtures().join(', ')}`);
  }
  return fixture;
}

/**
 * Adapt a fixture document with its definition
 *
 * @example
 * const tree = loadFixture('service-config');
 * tree.label;                          // 'gateway'
 * tree.children.map(n => n.label);     // ['auth', 'billing']
 */
export function loadFixture(name: FixtureName): Node {
  const { document, definition } = getFixture(name);
  return adaptTree(document, definition);
}
