export enum ApiErrorType {
  Timeout = 'timeout',
  NoConnection = 'no_connection',
  BadRequest = 'bad_request',
  Unauthorized = 'unauthorized',
  Forbidden = 'forbidden',
  NotFound = 'not_found',
  ValidationError = 'validation_error',
  ServerError = 'server_error',
  Cancelled = 'cancelled',
  SessionInvalid = 'session_invalid',
  Unknown = 'unknown',
}

/** Failure surfaced by {@link RequestPipelineService}; `statusCode` is set when the server answered. */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly type: ApiErrorType,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/** The access token could not be refreshed; stored credentials have been cleared. */
export class SessionInvalidError extends ApiError {
  constructor(reason: string) {
    super(`Session is no longer valid: ${reason}`, ApiErrorType.SessionInvalid, 401);
    this.name = 'SessionInvalidError';
  }
}
