/**
 * @fileoverview Gmail credential manager.
 *
 * Decides between reusing the stored token, refreshing it, and running the
 * interactive authorizer, then hands back a Gmail client bound to the token.
 *
 * State per run:
 *   no_token        -> interactive authorization
 *   scope_mismatch  -> interactive authorization
 *   expired         -> refresh, falling back to interactive on failure
 *   valid           -> used as is
 */

import type { OAuth2Client } from 'google-auth-library';
import type { AuthSettings } from '../../config.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type { CredentialStore, StoredCredential } from '../credentials/index.js';
import type { MailClient } from '../poller/types.js';
import type { Authorizer } from './authorizer.js';
import { fileExists, readClientSecrets, type ClientSecrets } from './client-secrets.js';
import { GmailClient } from './gmail.js';
import {
  REFRESH_THRESHOLD_MS,
  createAuthorizedClient,
  refreshAccessToken,
} from './oauth.js';

export type TokenState = 'no_token' | 'valid' | 'expired' | 'scope_mismatch';

export interface GmailAuthDeps {
  store: CredentialStore;
  authorizer: Authorizer;
  logger?: AppLogger;
  now?: () => number;
  refreshToken?: (secrets: ClientSecrets, credential: StoredCredential) => Promise<StoredCredential>;
  createMailClient?: (auth: OAuth2Client, logger: AppLogger) => MailClient;
}

export interface GmailAuthentication {
  client: MailClient;
  /** Scopes the token was granted */
  scopes: string[];
  /** How the token was obtained on this run */
  source: 'stored' | 'refreshed' | 'authorized';
}

/**
 * Classify a stored token against the configured scopes.
 */
export function classifyToken(
  credential: StoredCredential | null,
  requiredScopes: readonly string[],
  now: number
): TokenState {
  if (!credential) return 'no_token';
  const granted = new Set(credential.scopes);
  if (!requiredScopes.every((scope) => granted.has(scope))) return 'scope_mismatch';
  if (credential.expiresAt < now + REFRESH_THRESHOLD_MS) return 'expired';
  return 'valid';
}

async function loadSecretsIfPresent(filePath: string): Promise<ClientSecrets | undefined> {
  if (!(await fileExists(filePath))) return undefined;
  return readClientSecrets(filePath);
}

/**
 * Produce an authenticated Gmail client for the configured account.
 *
 * A new or refreshed token is persisted before the client is built.
 * @throws AuthenticationError when interactive authorization is needed and
 *   the client-secret file is missing, or when the authorizer fails
 */
export async function initializeGmailAuthentication(
  auth: AuthSettings,
  deps: GmailAuthDeps
): Promise<GmailAuthentication> {
  const logger = deps.logger ?? createLogger({ domain: 'auth' });
  const now = deps.now ?? Date.now;
  const refresh = deps.refreshToken ?? refreshAccessToken;
  const createMailClient =
    deps.createMailClient ?? ((client: OAuth2Client, log: AppLogger) => new GmailClient(client, log));

  const stored = await deps.store.get();
  const state = classifyToken(stored, auth.scopes, now());
  logger.info('token_loaded', { state, tokenFile: auth.tokenFilename });

  let credential: StoredCredential | null = state === 'valid' ? stored : null;
  let source: GmailAuthentication['source'] = 'stored';

  if (state === 'expired' && stored) {
    try {
      const secrets = await readClientSecrets(auth.credentialsFilename);
      credential = await refresh(secrets, stored);
      source = 'refreshed';
      logger.info('token_refreshed', { expiresAt: new Date(credential.expiresAt).toISOString() });
    } catch (error) {
      logger.warn('token_refresh_failed', {
        error: errorMessage(error),
        hint: 'Falling back to interactive authorization.',
      });
    }
  }

  if (!credential) {
    if (state === 'scope_mismatch') {
      logger.warn('token_scope_mismatch', {
        granted: stored?.scopes ?? [],
        required: [...auth.scopes],
      });
    }
    const secrets = await readClientSecrets(auth.credentialsFilename);
    credential = await deps.authorizer.authorize(secrets, auth.scopes);
    source = 'authorized';
  }

  if (source !== 'stored') {
    await deps.store.set(credential);
    logger.info('token_saved', { tokenFile: auth.tokenFilename, source });
  }

  const secrets = await loadSecretsIfPresent(auth.credentialsFilename);
  const client = createMailClient(createAuthorizedClient(credential, secrets), logger);

  return { client, scopes: [...credential.scopes], source };
}
