import { describe, it, expect } from 'vitest';
import { BASE_ICON_PACK, ICONS, createIconPack, findIconInPack, resolveIcon } from '../icons';
import { SpecError } from '../errors';

const arrows = createIconPack({
  name: 'arrows',
  icons: { right: { icon: '→', aliases: ['next'] }, left: { icon: '←' } },
});

describe('ICONS', () => {
  it('is derived from the base pack', () => {
    expect(ICONS.document).toBe('⧉');
    expect(ICONS.paragraph).toBe('¶');
    expect(ICONS.NoneType).toBe('∅');
    expect(Object.isFrozen(ICONS)).toBe(true);
  });
});

describe('createIconPack', () => {
  it('defaults aliases and freezes the pack', () => {
    expect(arrows.icons.left).toEqual({ icon: '←', aliases: [] });
    expect(Object.isFrozen(arrows)).toBe(true);
    expect(Object.isFrozen(arrows.icons.right.aliases)).toBe(true);
  });

  it('validates names and symbols', () => {
    expect(() => createIconPack({ name: 'bad name', icons: {} })).toThrow(SpecError);
    expect(() => createIconPack({ name: 'p', icons: { a: { icon: '' } } })).toThrow(/^Invalid icon pack: icons\.a\.icon: /);
    expect(() => createIconPack({ name: 'p', icons: { a: { icon: 'A', colour: 'red' } } })).toThrow(SpecError);
  });
});

describe('findIconInPack', () => {
  it('matches by name, then alias', () => {
    expect(findIconInPack('document', BASE_ICON_PACK)).toBe('⧉');
    expect(findIconInPack('doc', BASE_ICON_PACK)).toBe('⧉');
    expect(findIconInPack('next', arrows)).toBe('→');
    expect(findIconInPack('up', arrows)).toBeNull();
  });
});

describe('resolveIcon', () => {
  it('uses the icons table first', () => {
    expect(resolveIcon('paragraph', ICONS)).toBe('¶');
    expect(resolveIcon('paragraph', { paragraph: 'P' })).toBe('P');
  });

  it('falls back to base pack aliases', () => {
    expect(resolveIcon('li', ICONS)).toBe('•');
    expect(resolveIcon('pre', {})).toBe('𝒱');
  });

  it('ends at the unknown symbol', () => {
    expect(resolveIcon('zzz', {})).toBe('?');
    expect(resolveIcon(null, ICONS)).toBe('?');
    expect(resolveIcon(null, { unknown: 'U' })).toBe('U');
  });

  it('follows pack references', () => {
    expect(resolveIcon('x', { x: 'arrows.right' }, [arrows])).toBe('→');
    expect(resolveIcon('x', { x: 'base.paragraph' })).toBe('¶');
    expect(resolveIcon('x', { x: 'missing.paragraph' })).toBe('¶');
    expect(resolveIcon('x', { x: 'arrows.up' }, [arrows])).toBe('?');
  });

  it('searches the default pack by name and alias', () => {
    expect(resolveIcon('next', { '*': 'arrows' }, [arrows])).toBe('→');
    expect(resolveIcon('left', { '': 'arrows' }, [arrows])).toBe('←');
    expect(resolveIcon('paragraph', { '*': 'arrows' }, [arrows])).toBe('¶');
    expect(resolveIcon('x', { x: 'other.left', '*': 'arrows' }, [arrows])).toBe('←');
  });

  it('prefers direct entries over the default pack', () => {
    expect(resolveIcon('right', { right: 'R', '*': 'arrows' }, [arrows])).toBe('R');
  });
});
