import { describe, it, expect } from 'vitest';
import { adaptNode, adaptTree, coerceContentLines } from '../tree-adapter';
import { Definition } from '../definitions/model';
import { DefinitionLibrary } from '../definitions/lib';
import { SpecError, StructuralError } from '../errors';
import { loadFixture } from '../fixtures';
import type { Node } from '../types';

const labels = (node: Node): string[] => node.children.map(child => child.label);

describe('adaptTree', () => {
  it('selects filtered children', () => {
    const source = { name: 'root', items: [{ active: true }, { active: false }, { active: true }] };
    const tree = adaptTree(source, { label: 'name', children: { path: 'items', filter: { active: true } } });

    expect(tree.label).toBe('root');
    expect(tree.children).toHaveLength(2);
    expect(labels(tree)).toEqual(['Unknown', 'Unknown']);
    expect(tree.children[0].icon).toBe('?');
  });

  it('applies per-type overrides', () => {
    const source = { node_type: 'special', title: 'LONG TITLE HERE', name: 'fallback' };
    const tree = adaptTree(source, {
      label: 'name',
      type: 'node_type',
      type_overrides: { special: { label: { path: 'title', transform: { name: 'truncate', max_length: 10 } } } },
    });

    expect(tree.type).toBe('special');
    expect(tree.label).toBe('LONG TITL…');
  });

  it('uses the default definition', () => {
    const tree = adaptTree({ label: 'r', type: 'paragraph', children: [{ label: 'c', type: 'li' }] });

    expect(tree).toEqual({
      label: 'r',
      type: 'paragraph',
      icon: '¶',
      contentLines: 1,
      sourceLocation: null,
      extra: {},
      children: [
        { label: 'c', type: 'li', icon: '•', contentLines: 1, sourceLocation: null, extra: {}, children: [] },
      ],
    });
  });

  it('labels nodes by type, then Unknown', () => {
    expect(adaptTree({ type: 'widget' }).label).toBe('widget');
    expect(adaptTree({ label: 42 }).label).toBe('42');
    expect(adaptTree({}).label).toBe('Unknown');
  });

  it('treats an empty type as no type', () => {
    const tree = adaptTree({ type: '', label: 'x' });
    expect(tree.type).toBeNull();
    expect(tree.icon).toBe('?');
  });

  it('reads icons from the source before resolving by type', () => {
    const def = { icon: 'sym', icons: { widget: 'W' } };
    expect(adaptTree({ type: 'widget', sym: '★' }, def).icon).toBe('★');
    expect(adaptTree({ type: 'widget', sym: '' }, def).icon).toBe('W');
    expect(adaptTree({ type: 'widget' }, def).icon).toBe('W');
  });

  it('lets an override re-type the node', () => {
    const tree = adaptTree(
      { kind: 'a' },
      { type: 'kind', icons: { b: 'B' }, type_overrides: { a: { type: { default: 'b' } } } }
    );
    expect(tree.type).toBe('b');
    expect(tree.label).toBe('b');
    expect(tree.icon).toBe('B');
  });

  it('takes an override type name that matches no field as the new type', () => {
    const tree = adaptTree(
      { nodeType: 'OldType', label: 'x' },
      { type: 'nodeType', type_overrides: { OldType: { type: 'NewType', label: 'Converted Node' } } }
    );
    expect(tree.type).toBe('NewType');
    expect(tree.label).toBe('Converted Node');
  });

  it('keeps fields the override does not name', () => {
    const tree = adaptTree(
      { t: 'TestType', label: 'Original Label', icon: '🔥', children: [] },
      { type: 't', label: 'label', icon: 'icon', type_overrides: { TestType: { type: 'OverriddenType' } } }
    );
    expect(tree).toMatchObject({ type: 'OverriddenType', label: 'Original Label', icon: '🔥' });
  });

  it('prefers the value an override type path finds', () => {
    const tree = adaptTree({ kind: 'a', real: 'b' }, { type: 'kind', type_overrides: { a: { type: 'real' } } });
    expect(tree.type).toBe('b');
  });

  it('reads class instances', () => {
    class Token {
      constructor(
        readonly type: string,
        readonly label: string
      ) {}
    }
    const tree = adaptTree(new Token('text', 'hi'));
    expect(tree.label).toBe('hi');
    expect(tree.children).toEqual([]);
  });

  it('produces frozen nodes and leaves the source alone', () => {
    const source = { label: 'r', children: [{ label: 'c' }] };
    const tree = adaptTree(source);
    expect(Object.isFrozen(tree)).toBe(true);
    expect(Object.isFrozen(tree.children)).toBe(true);
    expect(Object.isFrozen(tree.extra)).toBe(true);
    expect(source).toEqual({ label: 'r', children: [{ label: 'c' }] });
  });

  it('resolves definition names through a library', () => {
    const library = new DefinitionLibrary();
    library.register('custom', { label: 'title' });
    expect(adaptTree({ title: 'T' }, 'custom', { library }).label).toBe('T');
    expect(() => adaptTree({}, 'missing', { library })).toThrow(SpecError);
  });

  it('accepts a compiled Definition', () => {
    const def = Definition.fromSerialized({ label: 'name' });
    expect(adaptTree({ name: 'n' }, def).label).toBe('n');
  });
});

describe('ignored types', () => {
  const def = { ignore_types: ['comment'] };

  it('prunes ignored children with their subtrees', () => {
    const tree = adaptTree(
      {
        type: 'doc',
        children: [
          { type: 'comment', children: [{ type: 'text', label: 'hidden' }] },
          { type: 'text', label: 'kept' },
        ],
      },
      def
    );
    expect(labels(tree)).toEqual(['kept']);
  });

  it('returns null for an ignored node', () => {
    expect(adaptNode({ type: 'comment' }, def)).toBeNull();
  });

  it('rejects an ignored root', () => {
    expect(() => adaptTree({ type: 'comment' }, def)).toThrow(
      'Root node was ignored; its type is listed in ignore_types'
    );
  });
});

describe('children by type', () => {
  it('scans every field for matching nodes', () => {
    const source = {
      type: 'app',
      head: { type: 'section', label: 'h' },
      body: [{ type: 'section', label: 'b1' }, { type: 'note', label: 'n' }, 'text', { type: 'sectionDraft', label: 'd' }],
      tail: 5,
    };
    const tree = adaptTree(source, { children: { include: ['section*'], exclude: ['*Draft'] } });
    expect(labels(tree)).toEqual(['h', 'b1']);
  });
});

describe('field coercion', () => {
  it('coerces content lines', () => {
    expect(coerceContentLines(3.9)).toBe(3);
    expect(coerceContentLines('7')).toBe(7);
    expect(coerceContentLines(' 8 ')).toBe(8);
    expect(coerceContentLines(-4)).toBe(0);
    expect(coerceContentLines('-2')).toBe(0);
    expect(coerceContentLines('abc')).toBe(1);
    expect(coerceContentLines(true)).toBe(1);
    expect(coerceContentLines(null)).toBe(1);
    expect(coerceContentLines(Number.NaN)).toBe(1);
    expect(coerceContentLines(Number.POSITIVE_INFINITY)).toBe(1);
  });

  it('copies extra from mappings and Maps', () => {
    expect(adaptTree({ m: { a: 1 } }, { extra: 'm' }).extra).toEqual({ a: 1 });
    expect(adaptTree({ m: new Map([['k', 1]]) }, { extra: 'm' }).extra).toEqual({ k: 1 });
  });

  it('rejects a non-mapping extra', () => {
    expect(() => adaptTree({ type: 'a', m: 5 }, { extra: 'm' })).toThrow(
      'extra must resolve to a mapping, got number [field=extra, nodeType=a]'
    );
  });

  it('rejects non-array children', () => {
    expect(() => adaptTree({ children: 'x' })).toThrow(StructuralError);
    expect(() => adaptTree({ children: 'x' })).toThrow('children must resolve to an array, got string [field=children]');
  });

  it('annotates extraction errors with the field and node type', () => {
    expect(() => adaptTree({ type: 'x', v: 's' }, { label: { path: 'v', transform: 'abs' } })).toThrow(
      'abs requires number input, got string [field=label, nodeType=x, transform=abs]'
    );
  });
});

describe('fixtures', () => {
  it('adapts markdown with the mdast definition', () => {
    const tree = loadFixture('markdown-readme');

    expect(tree.label).toBe('Document');
    expect(tree.icon).toBe('⧉');
    expect(labels(tree)).toEqual(['treelens', 'paragraph', 'List', "const tree = adaptTree(doc, 'mdast');"]);

    const [heading, paragraph, list, code] = tree.children;
    expect(heading.icon).toBe('⊤');
    expect(heading.sourceLocation).toEqual({ start: { line: 1, column: 1 }, end: { line: 1, column: 11 } });
    expect(labels(paragraph)).toEqual(['Adapts ', 'strong', ' nested tree.']);
    expect(labels(list)).toEqual(['listItem', 'listItem']);
    expect(list.children[0].icon).toBe('•');
    expect(code.icon).toBe('𝒱');
    expect(code.extra).toEqual({ meta: 'example' });
  });

  it('adapts the service config with a type selector', () => {
    const tree = loadFixture('service-config');

    expect(tree.label).toBe('gateway');
    expect(tree.icon).toBe('◈');
    expect(labels(tree)).toEqual(['auth', 'billing']);

    const [auth, billing] = tree.children;
    expect(auth.contentLines).toBe(40);
    expect(auth.icon).toBe('⚙');
    expect(auth.children).toHaveLength(1);
    expect(auth.children[0]).toMatchObject({ label: '/LOGIN', type: 'route', icon: '→', contentLines: 3 });
    expect(billing.contentLines).toBe(12);
    expect(billing.extra).toEqual({ owner: 'payments' });
  });
});
