/**
 * @fileoverview JSON token file credential store.
 *
 * The token file is written with owner-only permissions. A file that cannot
 * be parsed or lacks required fields is reported as "no token" so the caller
 * falls back to interactive authorization.
 */

import fs from 'fs/promises';
import path from 'path';
import type { CredentialStore, StoredCredential } from './types.js';

function isStoredCredential(value: unknown): value is StoredCredential {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.accessToken === 'string' &&
    typeof record.refreshToken === 'string' &&
    typeof record.expiresAt === 'number' &&
    Array.isArray(record.scopes) &&
    record.scopes.every((scope) => typeof scope === 'string')
  );
}

/**
 * Credential store backed by a single JSON file.
 */
export class FileCredentialStore implements CredentialStore {
  /**
   * @param filePath Path of the token file
   */
  constructor(private readonly filePath: string) {}

  async get(): Promise<StoredCredential | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return isStoredCredential(parsed) ? parsed : null;
    } catch {
      // Corrupted token file
      return null;
    }
  }

  async set(credential: StoredCredential): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(credential, null, 2)}\n`, {
      encoding: 'utf-8',
      mode: 0o600,
    });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
