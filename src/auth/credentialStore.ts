import type { Credential } from '../backup/types.js';

// Refresh a little early so a token does not expire mid-request
const EXPIRY_SKEW_MS = 60 * 1000;

/**
 * Holds the OAuth tokens of one session.
 */
export class CredentialStore {
  private credential: Credential;

  constructor(initial: Credential) {
    this.credential = { ...initial };
  }

  get(): Credential {
    return { ...this.credential };
  }

  /**
   * Merge refreshed tokens. Providers usually omit the refresh token on
   * refresh, in which case the one we hold is kept.
   */
  update(update: Partial<Credential>): void {
    const next: Credential = { ...this.credential };
    if (update.accessToken) next.accessToken = update.accessToken;
    if (update.refreshToken) next.refreshToken = update.refreshToken;
    if (update.expiryDate !== undefined) next.expiryDate = update.expiryDate;
    if (update.scope) next.scope = update.scope;
    if (update.tokenType) next.tokenType = update.tokenType;
    this.credential = next;
  }

  isExpired(now: number = Date.now()): boolean {
    const { expiryDate } = this.credential;
    if (expiryDate === undefined) return false;
    return expiryDate - EXPIRY_SKEW_MS <= now;
  }

  canRefresh(): boolean {
    return Boolean(this.credential.refreshToken);
  }
}
