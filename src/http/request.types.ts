import { AxiosInstance } from 'axios';

/** Injection token for the axios instance every HTTP call goes through. */
export const HTTP_CLIENT = Symbol('HTTP_CLIENT');

export type HttpClient = AxiosInstance;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestOptions {
  query?: Record<string, unknown>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/** A logical call as issued by calling code. */
export interface ApiRequest extends RequestOptions {
  method: HttpMethod;
  /** Path relative to the configured base URL. */
  path: string;
  body?: unknown;
}

/** An {@link ApiRequest} on its way through the pipeline. */
export interface PendingRequest extends ApiRequest {
  /** Access token the request was (or will be) sent with. */
  accessToken: string | null;
  /** Set once the request has been replayed after a token refresh. */
  retried: boolean;
}

/** Body returned by the refresh endpoint. */
export interface RefreshResponse {
  access_token: string;
  refresh_token?: string;
}
