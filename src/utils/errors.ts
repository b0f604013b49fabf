export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'INSUFFICIENT_BALANCE'
  | 'DRAWING_NOT_OPEN'
  | 'CONTENTION'
  | 'INVALID_DRAWING_STATE'
  | 'IMMUTABLE_RESULT'
  | 'INVALID_FULFILLMENT_STATE'
  | 'DEPENDENCY_UNAVAILABLE';

export class CoreError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    status: number,
    message: string,
    options: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.retryable = options.retryable ?? false;
    if (options.details) {
      this.details = options.details;
    }
  }
}

export class ValidationError extends CoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', 400, message, { details });
  }
}

export class NotFoundError extends CoreError {
  constructor(entity: string, id: number | string) {
    super('NOT_FOUND', 404, `${entity} ${id} not found`);
  }
}

export class AuthError extends CoreError {
  constructor(status: 401 | 403, message: string) {
    super(status === 401 ? 'UNAUTHORIZED' : 'FORBIDDEN', status, message);
  }
}

export class InsufficientBalanceError extends CoreError {
  constructor(userId: number, required: number, available: number) {
    super(
      'INSUFFICIENT_BALANCE',
      409,
      `Insufficient points: need ${required}, have ${available}`,
      { details: { user_id: userId, required, available } }
    );
  }
}

export class DrawingNotOpenError extends CoreError {
  constructor(drawingId: number, message: string) {
    super('DRAWING_NOT_OPEN', 409, message, { details: { drawing_id: drawingId } });
  }
}

export class ContentionError extends CoreError {
  constructor(message: string, cause?: unknown) {
    super('CONTENTION', 409, message, { retryable: true, cause });
  }
}

export class InvalidDrawingStateError extends CoreError {
  constructor(drawingId: number, message: string) {
    super('INVALID_DRAWING_STATE', 409, message, { details: { drawing_id: drawingId } });
  }
}

export class ImmutableResultError extends CoreError {
  constructor(drawingId: number, message = 'Drawing results are final and cannot be changed') {
    super('IMMUTABLE_RESULT', 409, message, { details: { drawing_id: drawingId } });
  }
}

export class InvalidFulfillmentStateError extends CoreError {
  constructor(fulfillmentId: number, message: string) {
    super('INVALID_FULFILLMENT_STATE', 409, message, {
      details: { fulfillment_id: fulfillmentId },
    });
  }
}

export class DependencyUnavailableError extends CoreError {
  constructor(message: string, cause?: unknown) {
    super('DEPENDENCY_UNAVAILABLE', 503, message, { retryable: true, cause });
  }
}

// Raised by a store when a write hits a uniqueness constraint; never leaves the core.
export class DuplicateRecordError extends Error {
  readonly table: string;

  constructor(table: string, cause?: unknown) {
    super(`Duplicate record in ${table}`, cause === undefined ? undefined : { cause });
    this.name = 'DuplicateRecordError';
    this.table = table;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
