import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosResponse } from 'axios';
import { CREDENTIAL_STORE, CredentialStore } from '../credentials/credential-store.types';
import { isAuthorizationFailure, toApiError } from './error-classification.util';
import {
  ApiRequest,
  HTTP_CLIENT,
  HttpClient,
  PendingRequest,
  RequestOptions,
} from './request.types';
import { TokenRefreshService } from './token-refresh.service';

/**
 * Authenticated request/response calls against the configured API.
 *
 * Every call carries the stored access token. A 401 answer hands over to
 * {@link TokenRefreshService} and the call is replayed exactly once with the
 * refreshed token; every other failure is classified into an
 * {@link ApiError} and surfaced without retry.
 */
@Injectable()
export class RequestPipelineService {
  private readonly logger = new Logger(RequestPipelineService.name);

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: HttpClient,
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    private readonly tokenRefresh: TokenRefreshService,
  ) {}

  /**
   * Send a request, recovering once from an expired access token.
   *
   * @throws {ApiError} classified transport or server failure.
   * @throws {SessionInvalidError} when the token could not be refreshed.
   */
  async execute<T = unknown>(request: ApiRequest): Promise<AxiosResponse<T>> {
    const pending: PendingRequest = {
      ...request,
      accessToken: await this.credentials.getAccessToken(),
      retried: false,
    };

    try {
      return await this.send<T>(pending);
    } catch (err) {
      if (!isAuthorizationFailure(err)) {
        throw this.fail(pending, err);
      }
      this.logger.warn(`${pending.method} ${pending.path} rejected with 401, refreshing access token`);
    }

    pending.accessToken = await this.tokenRefresh.obtainFreshToken(pending.accessToken);
    pending.retried = true;

    try {
      return await this.send<T>(pending);
    } catch (err) {
      throw this.fail(pending, err);
    }
  }

  get<T = unknown>(path: string, options: RequestOptions = {}): Promise<AxiosResponse<T>> {
    return this.execute<T>({ ...options, method: 'GET', path });
  }

  post<T = unknown>(path: string, body?: unknown, options: RequestOptions = {}): Promise<AxiosResponse<T>> {
    return this.execute<T>({ ...options, method: 'POST', path, body });
  }

  put<T = unknown>(path: string, body?: unknown, options: RequestOptions = {}): Promise<AxiosResponse<T>> {
    return this.execute<T>({ ...options, method: 'PUT', path, body });
  }

  patch<T = unknown>(path: string, body?: unknown, options: RequestOptions = {}): Promise<AxiosResponse<T>> {
    return this.execute<T>({ ...options, method: 'PATCH', path, body });
  }

  delete<T = unknown>(path: string, options: RequestOptions = {}): Promise<AxiosResponse<T>> {
    return this.execute<T>({ ...options, method: 'DELETE', path });
  }

  private send<T>(pending: PendingRequest): Promise<AxiosResponse<T>> {
    const headers: Record<string, string> = { ...pending.headers };
    if (pending.accessToken) {
      headers.Authorization = `Bearer ${pending.accessToken}`;
    }

    this.logger.debug(`${pending.method} ${pending.path}${pending.retried ? ' (retry)' : ''}`);
    return this.http.request<T>({
      method: pending.method,
      url: pending.path,
      params: pending.query,
      data: pending.body,
      headers,
      signal: pending.signal,
    });
  }

  private fail(pending: PendingRequest, err: unknown) {
    const apiError = toApiError(err);
    this.logger.warn(
      `${pending.method} ${pending.path} failed: ${apiError.type}` +
        (apiError.statusCode ? ` (${apiError.statusCode})` : ''),
    );
    return apiError;
  }
}
