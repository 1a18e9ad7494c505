export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.context = context;
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.context && { context: this.context }),
      },
    };
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} with id '${id}' not found` : `${resource} not found`,
      404,
      'NOT_FOUND',
      { resource, id },
    );
  }
}

/** The caller's session is missing or its directory is gone; a new one must be established. */
export class SessionNotFoundError extends NotFoundError {
  constructor(sessionId?: string) {
    super('Session', sessionId);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', context);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 422, 'VALIDATION_ERROR', context);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', context);
  }
}

/** Admission queue is full. */
export class CapacityError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 429, 'CAPACITY_EXCEEDED', context);
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 408, 'TIMEOUT', context);
  }
}

export class SubprocessTimeoutError extends TimeoutError {}

export class SubprocessLaunchError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 502, 'SUBPROCESS_LAUNCH_FAILED', context);
  }
}

/** Analyzer exited without leaving any usable artifact. */
export class SubprocessFailureError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 502, 'SUBPROCESS_FAILED', context);
  }
}

/** Type guard for AppError instances */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
