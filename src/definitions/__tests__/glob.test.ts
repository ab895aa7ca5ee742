import { describe, it, expect } from 'vitest';
import { globToRegExp, matchesGlob } from '../glob';

describe('matchesGlob', () => {
  it('matches wildcards', () => {
    expect(matchesGlob('listItem', 'list*')).toBe(true);
    expect(matchesGlob('list', 'list*')).toBe(true);
    expect(matchesGlob('ab', 'a?')).toBe(true);
    expect(matchesGlob('a', 'a?')).toBe(false);
    expect(matchesGlob('anything', '*')).toBe(true);
  });

  it('matches the whole type, case-sensitively', () => {
    expect(matchesGlob('Text', 'text')).toBe(false);
    expect(matchesGlob('subroute', 'route*')).toBe(false);
  });

  it('supports sets, ranges and negation', () => {
    expect(matchesGlob('h2', 'h[1-3]')).toBe(true);
    expect(matchesGlob('h4', 'h[1-3]')).toBe(false);
    expect(matchesGlob('b1', '[!a]1')).toBe(true);
    expect(matchesGlob('a1', '[!a]1')).toBe(false);
    expect(matchesGlob(']', '[]]')).toBe(true);
    expect(matchesGlob('^', '[^a]')).toBe(true);
    expect(matchesGlob('b', '[^a]')).toBe(false);
  });

  it('treats regex characters and an unclosed bracket literally', () => {
    expect(matchesGlob('a.b', 'a.b')).toBe(true);
    expect(matchesGlob('axb', 'a.b')).toBe(false);
    expect(matchesGlob('a[', 'a[')).toBe(true);
    expect(matchesGlob('a+', 'a+')).toBe(true);
  });

  it('lets * span newlines', () => {
    expect(matchesGlob('a\nb', 'a*')).toBe(true);
  });
});

describe('globToRegExp', () => {
  it('caches compiled patterns', () => {
    expect(globToRegExp('x*')).toBe(globToRegExp('x*'));
  });
});
