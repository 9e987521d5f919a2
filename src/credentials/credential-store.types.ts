/** Injection token for the {@link CredentialStore} implementation. */
export const CREDENTIAL_STORE = Symbol('CREDENTIAL_STORE');

/**
 * Narrow view of on-device credential storage.
 *
 * Both the request pipeline and the real-time channel read from it; only the
 * token refresh path writes to it.
 */
export interface CredentialStore {
  getAccessToken(): Promise<string | null>;
  getRefreshToken(): Promise<string | null>;
  setAccessToken(token: string): Promise<void>;
  /** Called when the refresh endpoint rotates the refresh token. */
  setRefreshToken(token: string): Promise<void>;
  /** Drop every stored credential (session is no longer valid). */
  clear(): Promise<void>;
}
