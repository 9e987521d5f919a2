import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CREDENTIAL_STORE, CredentialStore } from '../credentials/credential-store.types';
import { SessionInvalidError } from './api-error';
import { extractErrorMessage, toApiError } from './error-classification.util';
import { HTTP_CLIENT, HttpClient, RefreshResponse } from './request.types';

/**
 * Single-flight access token refresh.
 *
 * The first caller that needs a fresh token starts the refresh call; every
 * caller arriving while it is in flight awaits the same promise. The slot is
 * emptied once the refresh settles, so a later 401 can start a new one.
 */
@Injectable()
export class TokenRefreshService {
  private readonly logger = new Logger(TokenRefreshService.name);
  private readonly refreshPath: string;
  private inFlight: Promise<string> | null = null;

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: HttpClient,
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    config: ConfigService,
  ) {
    this.refreshPath = config.get<string>('AUTH_REFRESH_PATH', '/auth/refresh');
  }

  get isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Return an access token that is newer than `rejectedToken`.
   *
   * Joins the in-flight refresh if there is one. If the store already holds a
   * different token (a refresh completed after the rejected request was sent),
   * that token is returned without another refresh call.
   *
   * @throws {SessionInvalidError} when the refresh fails, or already failed
   *         for the session `rejectedToken` belonged to; credentials are
   *         cleared once, by whichever call ran the refresh.
   */
  async obtainFreshToken(rejectedToken: string | null): Promise<string> {
    if (this.inFlight) return this.inFlight;

    const current = await this.credentials.getAccessToken();
    if (this.inFlight) return this.inFlight;
    if (current && current !== rejectedToken) return current;
    // a failed refresh already cleared the store after this request was sent
    if (!current && rejectedToken) {
      throw new SessionInvalidError('session already invalidated');
    }

    this.inFlight = this.refresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async refresh(): Promise<string> {
    const refreshToken = await this.credentials.getRefreshToken();
    if (!refreshToken) {
      return this.invalidate('no refresh token stored');
    }

    this.logger.log('Refreshing access token…');
    let body: unknown;
    try {
      const res = await this.http.post<unknown>(
        this.refreshPath,
        { refresh_token: refreshToken },
      );
      body = res.data;
    } catch (err) {
      const apiError = toApiError(err);
      return this.invalidate(`refresh call failed (${apiError.type}): ${apiError.message}`);
    }

    const tokens = parseRefreshResponse(body);
    if (!tokens) {
      return this.invalidate(
        `refresh response carried no access token${describeBody(body)}`,
      );
    }

    await this.credentials.setAccessToken(tokens.access_token);
    if (tokens.refresh_token) {
      await this.credentials.setRefreshToken(tokens.refresh_token);
    }
    this.logger.log('Access token refreshed');
    return tokens.access_token;
  }

  private async invalidate(reason: string): Promise<never> {
    this.logger.warn(`Token refresh failed: ${reason}`);
    await this.credentials.clear();
    throw new SessionInvalidError(reason);
  }
}

function parseRefreshResponse(body: unknown): RefreshResponse | null {
  if (!body || typeof body !== 'object') return null;
  const msg = body as Record<string, unknown>;
  if (typeof msg.access_token !== 'string' || msg.access_token.length === 0) return null;
  return {
    access_token: msg.access_token,
    refresh_token:
      typeof msg.refresh_token === 'string' && msg.refresh_token.length > 0
        ? msg.refresh_token
        : undefined,
  };
}

function describeBody(body: unknown): string {
  const message = extractErrorMessage(body);
  return message ? ` (${message})` : '';
}
