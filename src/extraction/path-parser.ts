/**
 * Path Expression Parser
 *
 * Hand-written recursive descent with one character of lookahead.
 *
 * Grammar:
 *   path     := accessor ('.' part)* | part ('.' part)*
 *   part     := identifier accessor*
 *   accessor := '[' ws* (number | quoted | bare) ws* ']'
 *   identifier := [A-Za-z_][A-Za-z0-9_]*
 *   number   := '-'? [0-9]+
 *   quoted   := '"' [^"]* '"' | "'" [^']* "'"
 *   bare     := [^\]\s]+
 *
 * @example
 * parsePath('items[0].name');
 * // → [{ kind: 'attribute', name: 'items' }, { kind: 'index', index: 0 },
 * //    { kind: 'attribute', name: 'name' }]
 */

import { PathSyntaxError, SpecError } from '../errors';
import type { PathStep } from '../types';

const WHITESPACE = new Set([' ', '\t', '\n']);

function isIdentifierStart(char: string): boolean {
  return /^[A-Za-z_]$/.test(char);
}

function isIdentifierChar(char: string): boolean {
  return /^[A-Za-z0-9_]$/.test(char);
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9' && char.length === 1;
}

// ============================================================================
// Parser
// ============================================================================

class PathParser {
  private pos = 0;

  constructor(private readonly path: string) {}

  parse(): PathStep[] {
    const steps: PathStep[] = [];

    // "[0].name" indexes straight into the root value
    if (this.current() === '[') {
      steps.push(this.parseAccessor());
    } else {
      steps.push(...this.parsePart());
    }

    while (this.current() === '.') {
      this.pos++;
      steps.push(...this.parsePart());
    }

    if (this.pos < this.path.length) {
      this.fail(`Unexpected character '${this.current()}' at position ${this.pos}`);
    }

    return steps;
  }

  private parsePart(): PathStep[] {
    const steps: PathStep[] = [{ kind: 'attribute', name: this.parseIdentifier() }];
    while (this.current() === '[') {
      steps.push(this.parseAccessor());
    }
    return steps;
  }

  private parseIdentifier(): string {
    if (!isIdentifierStart(this.current())) {
      const found = this.current() === '' ? 'end of input' : `'${this.current()}'`;
      this.fail(`Expected identifier at position ${this.pos}, got ${found}`);
    }
    const start = this.pos;
    while (this.pos < this.path.length && isIdentifierChar(this.current())) {
      this.pos++;
    }
    return this.path.slice(start, this.pos);
  }

  private parseAccessor(): PathStep {
    const open = this.pos;
    this.pos++; // '['
    this.skipWhitespace();

    if (this.pos >= this.path.length) {
      this.fail(`Unclosed bracket opened at position ${open}`, open);
    }

    const char = this.current();
    let step: PathStep;

    if (char === '-' || isDigit(char)) {
      step = { kind: 'index', index: this.parseNumber() };
    } else if (char === '"' || char === "'") {
      step = { kind: 'key', key: this.parseQuoted() };
    } else {
      step = { kind: 'key', key: this.parseBare() };
    }

    this.skipWhitespace();
    this.consumeClose(open);
    return step;
  }

  private parseNumber(): number {
    const start = this.pos;
    if (this.current() === '-') this.pos++;

    if (!isDigit(this.current())) {
      this.fail(`Expected digit at position ${this.pos}`);
    }
    while (isDigit(this.current())) {
      this.pos++;
    }

    const index = Number(this.path.slice(start, this.pos));
    if (!Number.isSafeInteger(index)) {
      this.fail(`Invalid index '${this.path.slice(start, this.pos)}' at position ${start}`, start);
    }
    return index;
  }

  private parseQuoted(): string {
    const quote = this.current();
    const open = this.pos;
    this.pos++;
    const start = this.pos;

    while (this.pos < this.path.length && this.current() !== quote) {
      this.pos++;
    }
    if (this.pos >= this.path.length) {
      this.fail(`Unclosed string starting at position ${open}`, open);
    }

    const value = this.path.slice(start, this.pos);
    this.pos++; // closing quote
    return value;
  }

  private parseBare(): string {
    const start = this.pos;
    while (
      this.pos < this.path.length &&
      this.current() !== ']' &&
      !WHITESPACE.has(this.current())
    ) {
      this.pos++;
    }
    if (start === this.pos) {
      this.fail(`Empty key in bracket at position ${this.pos}`);
    }
    return this.path.slice(start, this.pos);
  }

  private consumeClose(open: number): void {
    if (this.current() === ']') {
      this.pos++;
      return;
    }
    if (this.pos >= this.path.length) {
      this.fail(`Unclosed bracket opened at position ${open}`, open);
    }
    this.fail(`Expected ']' at position ${this.pos}, got '${this.current()}'`);
  }

  private skipWhitespace(): void {
    while (this.pos < this.path.length && WHITESPACE.has(this.current())) {
      this.pos++;
    }
  }

  /** Current character, or '' past the end */
  private current(): string {
    return this.pos < this.path.length ? this.path[this.pos] : '';
  }

  private fail(message: string, position = this.pos): never {
    throw new PathSyntaxError(`${message} in path '${this.path}'`, this.path, position);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse a path expression into access steps.
 *
 * @throws PathSyntaxError on empty input, unterminated brackets or strings,
 *   empty brackets, a missing identifier, or trailing input
 */
export function parsePath(path: string): PathStep[] {
  if (path.trim() === '') {
    throw new PathSyntaxError('Path expression cannot be empty', path, 0);
  }
  return new PathParser(path).parse();
}

const pathCache = new Map<string, readonly PathStep[]>();

/**
 * Memoized {@link parsePath}. Parsing is pure, so successful results are
 * kept for the life of the process and shared (frozen) between callers.
 */
export function parsePathCached(path: string): readonly PathStep[] {
  const cached = pathCache.get(path);
  if (cached) return cached;

  const steps = Object.freeze(parsePath(path).map(step => Object.freeze(step)));
  pathCache.set(path, steps);
  return steps;
}

export function clearPathCache(): void {
  pathCache.clear();
}

/** Text that reads back as a bare bracket key */
function isBareKey(key: string): boolean {
  if (key === '' || isDigit(key[0]) || key[0] === '-' || key[0] === '"' || key[0] === "'") return false;
  return !Array.from(key).some(char => char === ']' || WHITESPACE.has(char));
}

function formatKey(key: string): string {
  if (!key.includes('"')) return `["${key}"]`;
  if (!key.includes("'")) return `['${key}']`;
  if (isBareKey(key)) return `[${key}]`;
  throw new SpecError(`Key ${JSON.stringify(key)} contains both quote characters and cannot be written as a path`);
}

/**
 * Render steps back to canonical path text. Keys are double-quoted, single
 * quoted when they contain '"', and bare when they contain both quotes.
 *
 * @example
 * formatPath(parsePath("a[ 'k' ][-1]")); // → 'a["k"][-1]'
 *
 * @throws SpecError for a key with both quote characters that is not
 *   valid bare text (no parsed path produces one)
 */
export function formatPath(steps: readonly PathStep[]): string {
  return steps
    .map((step, i) => {
      switch (step.kind) {
        case 'attribute':
          return i === 0 ? step.name : `.${step.name}`;
        case 'index':
          return `[${step.index}]`;
        case 'key':
          return formatKey(step.key);
      }
    })
    .join('');
}
