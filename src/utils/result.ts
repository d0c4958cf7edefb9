/**
 * Result type for calendar calls.
 * Either the data or an AppError, never a thrown exception.
 */
export type Result<T> =
  | { ok: true; data: T }
  | { ok: false; error: AppError };

export type AppError = {
  code: string;
  message: string;
  details?: unknown;
};

export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

export function err(
  code: string,
  message: string,
  details?: unknown
): Result<never> {
  return {
    ok: false,
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Converts an unknown thrown value to an AppError.
 */
export function toAppError(error: unknown, fallbackCode: string = 'UNKNOWN_ERROR'): AppError {
  if (error instanceof Error) {
    return {
      code: fallbackCode,
      message: error.message || 'An unknown error occurred',
      details: error.name,
    };
  }

  if (typeof error === 'string') {
    return {
      code: fallbackCode,
      message: error,
    };
  }

  return {
    code: fallbackCode,
    message: 'An unknown error occurred',
    details: error,
  };
}
