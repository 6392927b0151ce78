export class LazyQueryError extends Error {
  override readonly name: string = 'LazyQueryError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnresolvedColumnError extends LazyQueryError {
  override readonly name = 'UnresolvedColumnError';

  constructor(
    readonly column: string,
    readonly available: readonly string[],
    message?: string,
  ) {
    super(
      message ??
        `Column "${column}" is not visible here; available columns: ${
          available.length > 0 ? available.join(', ') : '(none)'
        }`,
    );
  }
}

export class UnsupportedExpressionError extends LazyQueryError {
  override readonly name = 'UnsupportedExpressionError';

  constructor(
    readonly expression: string,
    readonly dialect: string,
    message?: string,
  ) {
    super(message ?? `"${expression}" has no translation for dialect "${dialect}"`);
  }
}

export class AmbiguousColumnError extends LazyQueryError {
  override readonly name = 'AmbiguousColumnError';

  constructor(
    readonly column: string,
    readonly tables: readonly string[],
    message?: string,
  ) {
    super(
      message ??
        `Column "${column}" is ambiguous between ${tables.join(', ')}; qualify it with a table name`,
    );
  }
}

export class DialectCapabilityError extends LazyQueryError {
  override readonly name = 'DialectCapabilityError';

  constructor(
    readonly capability: string,
    readonly dialect: string,
    message?: string,
  ) {
    super(message ?? `Dialect "${dialect}" does not support ${capability}`);
  }
}

export class DialectError extends LazyQueryError {
  override readonly name = 'DialectError';
}

export class ExecutionError extends LazyQueryError {
  override readonly name = 'ExecutionError';

  constructor(
    message: string,
    readonly sql: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}
