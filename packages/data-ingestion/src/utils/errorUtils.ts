// Error handling utilities for data-ingestion package

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

export function createError(message: string, cause?: unknown): Error {
  const error = new Error(message);
  if (cause) {
    error.cause = cause;
  }
  return error;
}

/**
 * Coerce anything thrown into an Error, keeping the original as `cause`
 */
export function toError(error: unknown): Error {
  return isError(error) ? error : createError(getErrorMessage(error), error);
}
