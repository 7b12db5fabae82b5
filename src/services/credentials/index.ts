/**
 * @fileoverview Credential store factory.
 *
 * Returns the credential store selected by CREDENTIAL_STORE_PROVIDER:
 * - 'file': JSON token file at the configured path (default)
 * - 'memory': In-memory store (for tests only)
 */

import type { CredentialStore } from './types.js';
import { FileCredentialStore } from './file.js';
import { MemoryCredentialStore } from './memory.js';

export type { CredentialStore, StoredCredential } from './types.js';
export { FileCredentialStore } from './file.js';
export { MemoryCredentialStore } from './memory.js';

/**
 * Create the credential store for a provider name.
 * @throws Error for unknown provider names
 */
export function createCredentialStore(provider: string, tokenFilename: string): CredentialStore {
  switch (provider) {
    case 'file':
      return new FileCredentialStore(tokenFilename);
    case 'memory':
      return new MemoryCredentialStore();
    default:
      throw new Error(
        `Invalid CREDENTIAL_STORE_PROVIDER: ${provider}. Expected 'file' or 'memory'.`
      );
  }
}
