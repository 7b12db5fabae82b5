/**
 * @fileoverview Credential store interface for OAuth tokens.
 *
 * A single Gmail account is served per process, so the store holds at most
 * one token. Implementations decide where it lives; callers work with plain
 * credentials.
 */

/**
 * OAuth credential persisted between runs.
 */
export interface StoredCredential {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // Unix timestamp in milliseconds
  /** Scopes the user actually granted */
  scopes: string[];
}

/**
 * Interface for token storage backends.
 */
export interface CredentialStore {
  /**
   * Load the stored token.
   * @returns Credentials or null if none are stored or the stored value is unusable.
   */
  get(): Promise<StoredCredential | null>;

  /**
   * Store the token, overwriting any existing one.
   */
  set(credential: StoredCredential): Promise<void>;
}
