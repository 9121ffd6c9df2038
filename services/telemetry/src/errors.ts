import { ZodError } from 'zod';

export type TelemetryErrorKind = 'validation' | 'conflict' | 'not_found' | 'transient' | 'internal';

export class TelemetryError extends Error {
  constructor(
    public readonly kind: TelemetryErrorKind,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TelemetryError';
  }
}

export class ValidationError extends TelemetryError {
  constructor(message: string, code = 'validation_failed', details?: Record<string, unknown>) {
    super('validation', code, message, details);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends TelemetryError {
  constructor(message: string, code = 'conflict', details?: Record<string, unknown>) {
    super('conflict', code, message, details);
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends TelemetryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('not_found', 'not_found', message, details);
    this.name = 'NotFoundError';
  }
}

export class TransientError extends TelemetryError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super('transient', 'transient', message, details);
    this.name = 'TransientError';
    if (cause !== undefined) {
      Object.defineProperty(this, 'cause', { value: cause, enumerable: false });
    }
  }
}

export function fromZodError(error: ZodError, context: string): ValidationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
  return new ValidationError(`${context}: ${summary}`, 'validation_failed', { issues });
}

function readPgCode(err: unknown): string | null {
  if (!err || typeof err !== 'object' || !('code' in err)) {
    return null;
  }
  return typeof err.code === 'string' ? err.code : null;
}

/**
 * Normalises unknown failures into the telemetry error taxonomy. Postgres unique violations
 * become conflicts and lock or serialization failures become transient errors.
 */
export function toTelemetryError(err: unknown): TelemetryError {
  if (err instanceof TelemetryError) {
    return err;
  }
  if (err instanceof ZodError) {
    return fromZodError(err, 'invalid input');
  }
  const message = err instanceof Error ? err.message : String(err);
  switch (readPgCode(err)) {
    case '23505':
      return new ConflictError(message, 'duplicate');
    case '23503':
    case '23514':
      return new ValidationError(message);
    case '40001':
    case '40P01':
    case '55P03':
      return new TransientError(message, err);
    default:
      return new TelemetryError('internal', 'internal_error', message);
  }
}

export function isTelemetryError(err: unknown, kind?: TelemetryErrorKind): err is TelemetryError {
  return err instanceof TelemetryError && (kind === undefined || err.kind === kind);
}
