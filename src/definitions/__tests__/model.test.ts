import { describe, it, expect } from 'vitest';
import { Definition, compileChildrenSelector, selectorMatches, toDefinition } from '../model';
import { ExtractionError, SpecError } from '../../errors';
import { ICONS } from '../../icons';
import { fixtures } from '../../fixtures';

describe('Definition.default', () => {
  it('reads label, type and children by name', () => {
    const def = Definition.default();
    expect(def.fields.label).toEqual({ kind: 'path', path: 'label' });
    expect(def.fields.type).toEqual({ kind: 'path', path: 'type' });
    expect(def.fields.children).toEqual({ kind: 'path', spec: { kind: 'path', path: 'children' } });
    expect(def.fields.contentLines).toEqual({ kind: 'literal', value: 1 });
    expect(def.icons).toEqual(ICONS);
    expect(def.ignoreTypes.size).toBe(0);
  });

  it('is frozen', () => {
    const def = Definition.default();
    expect(Object.isFrozen(def)).toBe(true);
    expect(Object.isFrozen(def.fields)).toBe(true);
    expect(Object.isFrozen(def.icons)).toBe(true);
  });
});

describe('Definition.fromSerialized', () => {
  it('overlays given fields on the defaults', () => {
    const def = Definition.fromSerialized({ label: 'name', content_lines: 'lines' });
    expect(def.fields.label).toEqual({ kind: 'path', path: 'name' });
    expect(def.fields.contentLines).toEqual({ kind: 'path', path: 'lines' });
    expect(def.fields.type).toEqual({ kind: 'path', path: 'type' });
  });

  it('merges icons over the baseline table', () => {
    const def = Definition.fromSerialized({ icons: { widget: 'W', paragraph: 'P' } });
    expect(def.icons.widget).toBe('W');
    expect(def.icons.paragraph).toBe('P');
    expect(def.icons.heading).toBe(ICONS.heading);
  });

  it('compiles a type selector for children', () => {
    const def = Definition.fromSerialized({ children: { include: ['route*'] } });
    expect(def.fields.children).toEqual({ kind: 'types', include: ['route*'], exclude: [] });
  });

  it('rejects unknown keys', () => {
    expect(() => Definition.fromSerialized({ colour: 'red' })).toThrow(SpecError);
    expect(() => Definition.fromSerialized({ colour: 'red' })).toThrow(/^Invalid definition: /);
    expect(() => Definition.fromSerialized({ type_overrides: { x: { title: 'a' } } })).toThrow(SpecError);
  });

  it('rejects malformed selectors and packs', () => {
    expect(() => Definition.fromSerialized({ children: { include: 'a' } })).toThrow(SpecError);
    expect(() => Definition.fromSerialized({ icon_packs: [{ name: 'bad name', icons: {} }] })).toThrow(SpecError);
  });

  it('annotates field errors with the field and node type', () => {
    let caught: unknown;
    try {
      Definition.fromSerialized({ type_overrides: { heading: { label: { path: 'a', transform: 'nope' } } } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SpecError);
    if (caught instanceof ExtractionError) {
      expect(caught.context).toMatchObject({ field: 'label', nodeType: 'heading' });
    }
  });
});

describe('Definition.merge', () => {
  const base = Definition.fromSerialized({
    label: 'name',
    ignore_types: ['comment'],
    type_overrides: { route: { label: 'path' } },
  });

  it('returns a new Definition and leaves the original alone', () => {
    const merged = base.merge({ label: 'title' });
    expect(merged).not.toBe(base);
    expect(merged.fields.label).toEqual({ kind: 'path', path: 'title' });
    expect(base.fields.label).toEqual({ kind: 'path', path: 'name' });
  });

  it('replaces ignore_types only when given', () => {
    expect(base.merge({}).isIgnored('comment')).toBe(true);
    const merged = base.merge({ ignore_types: ['note'] });
    expect(merged.isIgnored('comment')).toBe(false);
    expect(merged.isIgnored('note')).toBe(true);
  });

  it('merges type overrides per type', () => {
    const merged = base.merge({ type_overrides: { service: { label: 'id' } } });
    expect(merged.overrideFor('route')).toEqual({ label: { kind: 'path', path: 'path' } });
    expect(merged.overrideFor('service')).toEqual({ label: { kind: 'path', path: 'id' } });

    const replaced = base.merge({ type_overrides: { route: { icon: 'R' } } });
    expect(replaced.overrideFor('route')).toEqual({ icon: { kind: 'path', path: 'R' } });
  });
});

describe('Definition lookups', () => {
  const def = Definition.fromSerialized({
    label: 'name',
    ignore_types: ['comment'],
    type_overrides: { route: { label: 'path' } },
  });

  it('checks ignored types', () => {
    expect(def.isIgnored('comment')).toBe(true);
    expect(def.isIgnored('route')).toBe(false);
    expect(def.isIgnored(null)).toBe(false);
  });

  it('overlays overrides field by field', () => {
    const fields = def.effectiveFields('route');
    expect(fields.label).toEqual({ kind: 'path', path: 'path' });
    expect(fields.type).toEqual({ kind: 'path', path: 'type' });
    expect(def.effectiveFields('other').label).toEqual({ kind: 'path', path: 'name' });
    expect(def.effectiveFields(null)).toEqual(def.fields);
    expect(def.effectiveFields('route')).not.toBe(def.fields);
  });
});

describe('Definition.toSerialized', () => {
  it('reads back into an equal Definition', () => {
    const raw = fixtures['service-config'].definition;
    const def = Definition.fromSerialized(raw);
    expect(Definition.fromSerialized(def.toSerialized())).toEqual(def);
  });

  it('writes snake_case keys', () => {
    const serialized = Definition.fromSerialized({ content_lines: 'lines', ignore_types: ['x'] }).toSerialized();
    expect(serialized.content_lines).toBe('lines');
    expect(serialized.ignore_types).toEqual(['x']);
    expect(serialized.type_overrides).toEqual({});
  });

  it('refuses callables', () => {
    const def = Definition.fromSerialized({ label: () => 'x' });
    expect(() => def.toSerialized()).toThrow('Callable extraction specs cannot be serialized [field=label]');
  });
});

describe('children selectors', () => {
  it('compiles extraction specs as path selectors', () => {
    expect(compileChildrenSelector('body')).toEqual({ kind: 'path', spec: { kind: 'path', path: 'body' } });
  });

  it('applies include then exclude', () => {
    const selector = compileChildrenSelector({ include: ['service', 'route*'], exclude: ['routeInternal'] });
    if (selector.kind !== 'types') throw new Error('expected a type selector');
    expect(selectorMatches(selector, 'service')).toBe(true);
    expect(selectorMatches(selector, 'routePublic')).toBe(true);
    expect(selectorMatches(selector, 'routeInternal')).toBe(false);
    expect(selectorMatches(selector, 'comment')).toBe(false);
    expect(selectorMatches(selector, '')).toBe(false);
  });

  it('defaults include to everything', () => {
    const selector = compileChildrenSelector({ exclude: ['comment'] });
    if (selector.kind !== 'types') throw new Error('expected a type selector');
    expect(selector.include).toEqual(['*']);
    expect(selectorMatches(selector, 'anything')).toBe(true);
  });
});

describe('toDefinition', () => {
  it('passes Definitions through and compiles the rest', () => {
    const def = Definition.default();
    expect(toDefinition(def)).toBe(def);
    expect(toDefinition({ label: 'name' }).fields.label).toEqual({ kind: 'path', path: 'name' });
    expect(() => toDefinition(null)).toThrow('A definition is required');
  });
});
