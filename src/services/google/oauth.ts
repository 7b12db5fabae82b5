/**
 * @fileoverview Shared Google OAuth utilities.
 *
 * OAuth2 client creation and token refresh for the installed-app client.
 */

import { OAuth2Client } from 'google-auth-library';
import { AuthenticationError } from '../../utils/errors.js';
import type { StoredCredential } from '../credentials/index.js';
import type { ClientSecrets } from './client-secrets.js';

/** Token refresh threshold: refresh if expiring within 5 minutes. */
export const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

/**
 * Create a bare OAuth2 client (no credentials set).
 * Without secrets the client can only carry an access token, not refresh it.
 */
export function createOAuth2Client(secrets?: ClientSecrets, redirectUri?: string): OAuth2Client {
  if (!secrets) return new OAuth2Client();
  return new OAuth2Client(
    secrets.clientId,
    secrets.clientSecret,
    redirectUri ?? secrets.redirectUris[0]
  );
}

/**
 * Refresh an expired access token using the refresh token.
 * Google usually omits the refresh token and scopes from a refresh response;
 * the previous values carry over.
 */
export async function refreshAccessToken(
  secrets: ClientSecrets,
  credential: StoredCredential
): Promise<StoredCredential> {
  const oauth2Client = createOAuth2Client(secrets);
  oauth2Client.setCredentials({ refresh_token: credential.refreshToken });

  const { credentials } = await oauth2Client.refreshAccessToken();

  if (!credentials.access_token) {
    throw new AuthenticationError('Failed to refresh access token');
  }

  return {
    accessToken: credentials.access_token,
    refreshToken: credentials.refresh_token || credential.refreshToken,
    expiresAt: credentials.expiry_date || Date.now() + 3600000,
    scopes: credentials.scope
      ? credentials.scope.split(' ').filter(Boolean)
      : [...credential.scopes],
  };
}

/**
 * OAuth2 client carrying a stored token, ready to hand to googleapis.
 */
export function createAuthorizedClient(
  credential: StoredCredential,
  secrets?: ClientSecrets
): OAuth2Client {
  const oauth2Client = createOAuth2Client(secrets);
  oauth2Client.setCredentials({
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expiry_date: credential.expiresAt,
    scope: credential.scopes.join(' '),
  });
  return oauth2Client;
}
