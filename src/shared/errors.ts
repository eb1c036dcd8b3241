/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "SOURCE_EMPTY")
 * - `isOperational` true = expected/recoverable, false = programmer or configuration error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

export class SourceError extends AppError {
  public readonly source: string;

  constructor(message: string, code: string, source: string) {
    super(message, code);
    this.source = source;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      source: this.source,
    };
  }
}

export class ScoringError extends AppError {
  public readonly check: string;

  constructor(message: string, code: string, check: string) {
    super(message, code);
    this.check = check;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      check: this.check,
    };
  }
}

export class PersistenceError extends AppError {
  public readonly operation: string;

  constructor(message: string, operation: string, code = 'PERSISTENCE_FAILED') {
    super(message, code);
    this.operation = operation;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
    };
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

/** Broken configuration. Never recovered from silently. */
export class ConfigError extends AppError {
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message, 'CONFIG_INVALID', false);
    this.field = field;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs). Used by top-level error handlers to
 * decide whether to stop the process.
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
