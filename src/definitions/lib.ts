/**
 * Definition library
 *
 * Named Definitions, so callers can say `adaptTree(doc, 'mdast')`. Every
 * registered definition is merged over the defaults. `default` is always
 * available and cannot be replaced.
 */

import { SpecError } from '../errors';
import mdast from './builtins/mdast.json';
import unist from './builtins/unist.json';
import { Definition } from './model';

export const DEFAULT_DEFINITION_NAME = 'default';

const BUILTINS: Readonly<Record<string, unknown>> = {
  mdast,
  unist,
};

export class DefinitionLibrary {
  private readonly registry = new Map<string, Definition>();

  /** Library preloaded with the built-in definitions */
  static withBuiltins(): DefinitionLibrary {
    const library = new DefinitionLibrary();
    for (const [name, raw] of Object.entries(BUILTINS)) {
      library.register(name, raw);
    }
    return library;
  }

  /**
   * Add (or replace) a named definition.
   *
   * @throws SpecError when the definition is invalid or the name is reserved
   */
  register(name: string, definition: unknown): Definition {
    if (name === '' || name === DEFAULT_DEFINITION_NAME) {
      throw new SpecError(`Definition name '${name}' is reserved`);
    }
    const resolved = definition instanceof Definition ? definition : Definition.fromSerialized(definition);
    this.registry.set(name, resolved);
    return resolved;
  }

  has(name: string): boolean {
    return name === DEFAULT_DEFINITION_NAME || this.registry.has(name);
  }

  /**
   * @throws SpecError listing the available names
   */
  get(name: string): Definition {
    if (name === DEFAULT_DEFINITION_NAME) return Definition.default();

    const definition = this.registry.get(name);
    if (!definition) {
      throw new SpecError(`Unknown definition '${name}'. Available: ${this.list().join(', ')}`);
    }
    return definition;
  }

  /** Registered names plus `default`, sorted */
  list(): string[] {
    return [DEFAULT_DEFINITION_NAME, ...this.registry.keys()].sort();
  }
}

let sharedLibrary: DefinitionLibrary | undefined;

/** Process-wide library holding the built-ins, created on first use */
export function getDefaultLibrary(): DefinitionLibrary {
  sharedLibrary ??= DefinitionLibrary.withBuiltins();
  return sharedLibrary;
}
