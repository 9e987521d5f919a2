import { Injectable, Logger } from '@nestjs/common';
import { CredentialStore } from './credential-store.types';

/**
 * Process-local {@link CredentialStore}. Used by the runner in `main.ts` and
 * in tests; real hosts bind their own persistent store to `CREDENTIAL_STORE`.
 */
@Injectable()
export class InMemoryCredentialStore implements CredentialStore {
  private readonly logger = new Logger(InMemoryCredentialStore.name);
  private accessToken: string | null = null;
  private refreshToken: string | null = null;

  /** Seed both tokens, e.g. after an out-of-band login. Empty strings are treated as absent. */
  seed(accessToken: string | null, refreshToken: string | null) {
    this.accessToken = accessToken || null;
    this.refreshToken = refreshToken || null;
  }

  async getAccessToken(): Promise<string | null> {
    return this.accessToken;
  }

  async getRefreshToken(): Promise<string | null> {
    return this.refreshToken;
  }

  async setAccessToken(token: string): Promise<void> {
    this.accessToken = token;
  }

  async setRefreshToken(token: string): Promise<void> {
    this.refreshToken = token;
  }

  async clear(): Promise<void> {
    this.accessToken = null;
    this.refreshToken = null;
    this.logger.log('Stored credentials cleared');
  }
}
