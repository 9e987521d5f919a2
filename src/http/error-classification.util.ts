import axios, { AxiosError } from 'axios';
import { ApiError, ApiErrorType } from './api-error';

const DEFAULT_MESSAGES: Record<ApiErrorType, string> = {
  [ApiErrorType.Timeout]: 'Connection timeout',
  [ApiErrorType.NoConnection]: 'Unable to reach the server',
  [ApiErrorType.BadRequest]: 'The request was rejected',
  [ApiErrorType.Unauthorized]: 'Authentication failed',
  [ApiErrorType.Forbidden]: 'Access denied',
  [ApiErrorType.NotFound]: 'Requested resource not found',
  [ApiErrorType.ValidationError]: 'The request failed validation',
  [ApiErrorType.ServerError]: 'Server error',
  [ApiErrorType.Cancelled]: 'Request was cancelled',
  [ApiErrorType.SessionInvalid]: 'Session is no longer valid',
  [ApiErrorType.Unknown]: 'An unexpected error occurred',
};

/** Error codes axios (or the Node socket underneath it) reports when no response arrived. */
const NO_CONNECTION_CODES = new Set([
  AxiosError.ERR_NETWORK,
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
]);

const MESSAGE_FIELDS = ['error', 'message', 'detail', 'error_description'];

export function isAuthorizationFailure(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response?.status === 401;
}

export function errorTypeForStatus(status: number): ApiErrorType {
  switch (status) {
    case 400:
      return ApiErrorType.BadRequest;
    case 401:
      return ApiErrorType.Unauthorized;
    case 403:
      return ApiErrorType.Forbidden;
    case 404:
      return ApiErrorType.NotFound;
    case 422:
      return ApiErrorType.ValidationError;
  }
  if (status >= 500) return ApiErrorType.ServerError;
  if (status >= 400) return ApiErrorType.BadRequest;
  return ApiErrorType.Unknown;
}

/**
 * Pull a human-readable message out of an error response body. Accepts plain
 * strings and objects carrying one of the usual message fields.
 */
export function extractErrorMessage(data: unknown): string | undefined {
  if (typeof data === 'string') return data.length > 0 ? data : undefined;
  if (!data || typeof data !== 'object') return undefined;
  const body = data as Record<string, unknown>;
  for (const field of MESSAGE_FIELDS) {
    const value = body[field];
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

/** Map any failure thrown by the HTTP transport onto the {@link ApiError} taxonomy. */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) return err;

  if (!axios.isAxiosError(err)) {
    const detail = err instanceof Error ? err.message : String(err);
    return new ApiError(`${DEFAULT_MESSAGES[ApiErrorType.Unknown]}: ${detail}`, ApiErrorType.Unknown);
  }

  if (err.code === AxiosError.ERR_CANCELED) {
    return new ApiError(DEFAULT_MESSAGES[ApiErrorType.Cancelled], ApiErrorType.Cancelled);
  }

  if (err.code === AxiosError.ECONNABORTED || err.code === AxiosError.ETIMEDOUT) {
    return new ApiError(DEFAULT_MESSAGES[ApiErrorType.Timeout], ApiErrorType.Timeout);
  }

  if (err.response) {
    const status = err.response.status;
    const type = errorTypeForStatus(status);
    const message = extractErrorMessage(err.response.data) ?? DEFAULT_MESSAGES[type];
    return new ApiError(message, type, status);
  }

  if ((err.code && NO_CONNECTION_CODES.has(err.code)) || err.request) {
    return new ApiError(DEFAULT_MESSAGES[ApiErrorType.NoConnection], ApiErrorType.NoConnection);
  }

  return new ApiError(`${DEFAULT_MESSAGES[ApiErrorType.Unknown]}: ${err.message}`, ApiErrorType.Unknown);
}
