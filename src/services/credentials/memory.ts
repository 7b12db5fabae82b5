/**
 * @fileoverview In-memory credential store for testing.
 *
 * Data is lost on process restart. Use only for tests.
 */

import type { CredentialStore, StoredCredential } from './types.js';

/**
 * In-memory credential store for testing.
 */
export class MemoryCredentialStore implements CredentialStore {
  private credential: StoredCredential | null = null;

  constructor(initial?: StoredCredential) {
    if (initial) this.credential = { ...initial, scopes: [...initial.scopes] };
  }

  async get(): Promise<StoredCredential | null> {
    return this.credential ? { ...this.credential, scopes: [...this.credential.scopes] } : null;
  }

  async set(credential: StoredCredential): Promise<void> {
    this.credential = { ...credential, scopes: [...credential.scopes] };
  }
}
