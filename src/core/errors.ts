export interface StandardError {
  code: string;
  message: string;
  status: number;
  details?: unknown;
  causeId?: string;
}

export class InvalidArgumentError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Raised by store implementations for connection failures, command errors and timeouts.
 * The message is internal; it never reaches a response body.
 */
export class StoreUnavailableError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class SessionDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionDecodeError';
  }
}

export function isStoreUnavailable(error: unknown): error is StoreUnavailableError {
  return error instanceof StoreUnavailableError;
}

/**
 * Maps anything thrown inside a request to the public error shape.
 * Store and unexpected failures share one fixed message.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error instanceof InvalidArgumentError) {
    return {
      code: 'invalid_argument',
      message: error.message,
      status: 400,
      details: error.field ? { field: error.field } : undefined,
      causeId: ctx,
    };
  }

  if (error instanceof StoreUnavailableError) {
    return {
      code: 'store_unavailable',
      message: 'Session store unavailable',
      status: 500,
      causeId: ctx,
    };
  }

  return {
    code: 'internal_error',
    message: 'Internal server error',
    status: 500,
    causeId: ctx,
  };
}
