export class EmptyResultError extends Error {
  override readonly name = 'EmptyResultError';
  readonly count = 0;

  constructor(message?: string) {
    super(message ?? 'No result found: expected exactly one row, got 0');
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AmbiguousResultError extends Error {
  override readonly name = 'AmbiguousResultError';

  constructor(
    readonly count: number,
    readonly expected: 'exactly one' | 'at most one',
    message?: string,
  ) {
    super(message ?? `Expected ${expected} result, got ${count}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface SchemaIssue {
  path: string;
  message: string;
  code: string;
}

export class SchemaValidationError extends Error {
  override readonly name = 'SchemaValidationError';

  constructor(
    message: string,
    readonly issues: readonly SchemaIssue[],
    readonly rowIndex?: number,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ResultKindError extends Error {
  override readonly name = 'ResultKindError';

  constructor(
    readonly kind: string,
    readonly operation: string,
  ) {
    super(`${operation}() is not available on a result of kind "${kind}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
