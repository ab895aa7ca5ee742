/**
 * Error taxonomy for extraction and adaptation.
 *
 * Missing fields are never errors: lookups degrade to `null` so fallback
 * chains work. Everything below is a hard failure that aborts the current
 * `extract` / `adaptNode` call.
 */

// ============================================================================
// Context
// ============================================================================

export interface ErrorContext {
  /** Definition field being extracted (label, type, children, ...) */
  field?: string;
  /** Type of the source node being converted */
  nodeType?: string;
  /** Filter operator involved */
  operator?: string;
  /** Transformation involved */
  transform?: string;
  /** Path expression text */
  path?: string;
  /** Index of the offending step within the parsed path */
  stepIndex?: number;
}

const CONTEXT_ORDER: (keyof ErrorContext)[] = [
  'field',
  'nodeType',
  'transform',
  'operator',
  'path',
  'stepIndex',
];

function describeContext(context: ErrorContext): string {
  const parts = CONTEXT_ORDER
    .filter(key => context[key] !== undefined)
    .map(key => `${key}=${String(context[key])}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

// ============================================================================
// Base class
// ============================================================================

export class ExtractionError extends Error {
  override readonly name: string = 'ExtractionError';
  readonly detail: string;
  context: ErrorContext;

  constructor(detail: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(detail + describeContext(context), options);
    this.detail = detail;
    this.context = { ...context };
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Fill in context the error does not carry yet. Inner context wins, so an
   * error raised deep inside a path keeps its own step index.
   */
  withContext(context: ErrorContext): this {
    const merged: ErrorContext = { ...context, ...this.context };
    this.context = merged;
    this.message = this.detail + describeContext(merged);
    return this;
  }
}

// ============================================================================
// Categories
// ============================================================================

/** Malformed path expression, reported at parse time */
export class PathSyntaxError extends ExtractionError {
  override readonly name = 'PathSyntaxError';

  constructor(
    message: string,
    readonly path: string,
    readonly position: number,
  ) {
    super(message, { path });
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The value structurally cannot support the requested kind of access */
export class MissingCapabilityError extends ExtractionError {
  override readonly name = 'MissingCapabilityError';

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A transform or filter operator received a value of the wrong kind */
export class TypeMismatchError extends ExtractionError {
  override readonly name = 'TypeMismatchError';

  constructor(
    readonly operation: string,
    readonly expected: string,
    readonly actual: string,
    context: ErrorContext = {},
    message?: string,
  ) {
    super(message ?? `${operation} requires ${expected} input, got ${actual}`, context);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed structured spec: missing sub-field, unknown operator or transform */
export class SpecError extends ExtractionError {
  override readonly name = 'SpecError';

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, context, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A value that had to be a sequence (or mapping) was not */
export class StructuralError extends ExtractionError {
  override readonly name = 'StructuralError';

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Run `fn`, filling in `context` on any ExtractionError it throws. Other
 * errors, including those from user callables, pass through untouched.
 */
export function withErrorContext<T>(context: ErrorContext, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ExtractionError) {
      throw err.withContext(context);
    }
    throw err;
  }
}
