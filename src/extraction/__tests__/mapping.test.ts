import { describe, it, expect } from 'vitest';
import { applyCollectionMapping, compileMapSpec, substituteTemplate } from '../mapping';
import { PathSyntaxError, SpecError, StructuralError } from '../../errors';

describe('applyCollectionMapping', () => {
  it('instantiates the template per item', () => {
    expect(applyCollectionMapping(['a', 'b'], { template: { t: 'Item', c: '${item}' } })).toEqual([
      { t: 'Item', c: 'a' },
      { t: 'Item', c: 'b' },
    ]);
  });

  it('keeps the type of a lone placeholder', () => {
    const items = [{ n: 1, tags: ['x'] }];
    expect(applyCollectionMapping(items, { template: { count: '${item.n}', tags: '${item.tags}' } })).toEqual([
      { count: 1, tags: ['x'] },
    ]);
  });

  it('stringifies embedded placeholders, with null as empty text', () => {
    const items = [{ name: 'auth', port: 8080 }, { name: 'web' }];
    expect(applyCollectionMapping(items, { template: '${item.name}:${item.port}' })).toEqual(['auth:8080', 'web:']);
  });

  it('recurses into arrays and nested mappings', () => {
    expect(
      applyCollectionMapping([{ id: 7 }], { template: [{ ref: { id: '${item.id}' } }, 'id-${item.id}', 3, null] })
    ).toEqual([[{ ref: { id: 7 } }, 'id-7', 3, null]]);
  });

  it('binds a custom variable name', () => {
    expect(applyCollectionMapping([{ v: 1 }], { template: '${row.v}', variable: 'row' })).toEqual([1]);
    expect(applyCollectionMapping([{ v: 1 }], { template: '${item.v}', variable: 'row' })).toEqual([null]);
  });

  it('leaves malformed placeholders as written', () => {
    expect(applyCollectionMapping(['x'], { template: 'pre ${item' })).toEqual(['pre ${item']);
    expect(applyCollectionMapping(['x'], { template: '${}' })).toEqual(['']);
    expect(applyCollectionMapping(['x'], { template: 'a${ }b' })).toEqual(['ab']);
  });

  it('does not substitute keys', () => {
    expect(applyCollectionMapping(['x'], { template: { '${item}': '${item}' } })).toEqual([{ '${item}': 'x' }]);
  });

  it('returns a new array without touching the input', () => {
    const input = [{ a: 1 }];
    const result = applyCollectionMapping(input, { template: '${item.a}' });
    expect(result).not.toBe(input);
    expect(input).toEqual([{ a: 1 }]);
  });

  it('requires an array', () => {
    expect(() => applyCollectionMapping('abc', { template: 'x' })).toThrow(
      'Cannot map over string value; expected an array'
    );
    expect(() => applyCollectionMapping({ a: 1 }, { template: 'x' })).toThrow(StructuralError);
  });

  it('propagates placeholder syntax errors', () => {
    expect(() => applyCollectionMapping([1], { template: '${item[}' })).toThrow(PathSyntaxError);
  });
});

describe('substituteTemplate', () => {
  it('passes non-string leaves through', () => {
    expect(substituteTemplate(42, { item: 1 })).toBe(42);
    expect(substituteTemplate(true, { item: 1 })).toBe(true);
  });
});

describe('compileMapSpec', () => {
  it('requires a template', () => {
    expect(() => compileMapSpec({ variable: 'x' })).toThrow("Map specification requires a 'template'");
  });

  it('rejects unknown keys and bad variables', () => {
    expect(() => compileMapSpec({ template: 'x', as: 'y' })).toThrow('Unknown map specification keys: as');
    expect(() => compileMapSpec({ template: 'x', variable: '1x' })).toThrow(SpecError);
    expect(() => compileMapSpec(['x'])).toThrow(SpecError);
  });

  it('accepts a falsy template', () => {
    expect(compileMapSpec({ template: null })).toEqual({ template: null });
    expect(compileMapSpec({ template: '', variable: 'row' })).toEqual({ template: '', variable: 'row' });
  });
});
