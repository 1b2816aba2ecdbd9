// ============================================================================
// ERROR HANDLING UTILITIES - Using neverthrow for explicit error results
// ============================================================================

import { Result, Ok, Err, ResultAsync } from 'neverthrow';
import { AxiosError } from 'axios';

// ============================================================================
// ERROR TYPES
// ============================================================================

export type ErrorType =
  | 'TRANSPORT_ERROR'
  | 'EMPTY_RESULT_ERROR'
  | 'PARSE_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'CONFIG_ERROR'
  | 'UNKNOWN_ERROR';

export interface AppError {
  message: string;
  type: ErrorType;
  status?: number;
  code?: string;
  isRetryable?: boolean;
  cause?: unknown;
}

// ============================================================================
// ERROR CONSTRUCTORS
// ============================================================================

export function transportError(message: string, extra: Partial<AppError> = {}): AppError {
  return { isRetryable: true, ...extra, message, type: 'TRANSPORT_ERROR' };
}

export function emptyResultError(message: string): AppError {
  return { message, type: 'EMPTY_RESULT_ERROR', isRetryable: true };
}

export function parseFailure(message: string): AppError {
  return { message, type: 'PARSE_ERROR', isRetryable: false };
}

export function persistenceError(message: string, cause?: unknown): AppError {
  return { message, type: 'PERSISTENCE_ERROR', isRetryable: true, cause };
}

// ============================================================================
// ERROR PARSING UTILITIES
// ============================================================================

/**
 * Parse any thrown value into a structured AppError
 */
export function parseError(error: unknown): AppError {
  if (isAxiosError(error)) {
    return parseAxiosError(error);
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      type: isNetworkMessage(error.message) ? 'TRANSPORT_ERROR' : 'UNKNOWN_ERROR',
      isRetryable: isNetworkMessage(error.message),
      cause: error,
    };
  }

  if (typeof error === 'string') {
    return { message: error, type: 'UNKNOWN_ERROR', isRetryable: false };
  }

  return { message: 'An unknown error occurred', type: 'UNKNOWN_ERROR', isRetryable: false };
}

function isAxiosError(error: unknown): error is AxiosError {
  return error !== null && typeof error === 'object' && 'isAxiosError' in error && error.isAxiosError === true;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isNetworkMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return ['timeout', 'econnreset', 'econnrefused', 'etimedout', 'socket hang up', 'network', 'enotfound'].some(
    fragment => lower.includes(fragment)
  );
}

/**
 * Every axios failure is a transport failure; the status only decides retryability.
 */
function parseAxiosError(error: AxiosError): AppError {
  const status = error.response?.status;
  const data = error.response?.data;

  let message = error.message || 'Network request failed';
  let code = error.code;

  if (isRecord(data)) {
    if (typeof data.msg === 'string') {
      message = data.msg;
    }
    if (typeof data.code === 'string' || typeof data.code === 'number') {
      code = String(data.code);
    }
  }

  return transportError(status ? `HTTP ${status}: ${message}` : message, {
    status,
    code,
    isRetryable: status === undefined || status === 429 || status >= 500,
    cause: error,
  });
}

/**
 * Render an AppError as an Error for the structured logger
 */
export function toError(appError: AppError): Error {
  const error = new Error(appError.message);
  error.name = appError.type;
  return error;
}

// ============================================================================
// NEVERTHROW UTILITIES
// ============================================================================

/**
 * Wrap a function that might throw into a Result
 */
export function safeCall<T>(fn: () => T): Result<T, AppError> {
  try {
    return new Ok(fn());
  } catch (error) {
    return new Err(parseError(error));
  }
}

/**
 * Wrap an async function that might throw into a ResultAsync
 */
export function safeCallAsync<T>(fn: () => Promise<T>): ResultAsync<T, AppError> {
  return ResultAsync.fromPromise(fn(), error => parseError(error));
}

// ============================================================================
// RE-EXPORT NEVERTHROW TYPES AND UTILITIES
// ============================================================================

export { Result, Ok, Err, ResultAsync, ok, err, errAsync, okAsync } from 'neverthrow';
export type { Result as ResultType } from 'neverthrow';
