/**
 * @fileoverview Interactive OAuth authorization over a loopback redirect.
 *
 * Flow:
 * 1. Start a local HTTP listener on 127.0.0.1
 * 2. Open the Google consent URL in the browser (and log it)
 * 3. Google redirects back to /oauth2callback with a code
 * 4. Verify state, exchange the code for tokens, stop the listener
 *
 * The call blocks until the user finishes (or declines) consent.
 */

import crypto from 'crypto';
import type { Server } from 'http';
import express, { type Express } from 'express';
import type { Credentials } from 'google-auth-library';
import open from 'open';
import { AuthenticationError, errorMessage, type Result } from '../../utils/errors.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type { StoredCredential } from '../credentials/index.js';
import { createOAuth2Client } from './oauth.js';
import type { ClientSecrets } from './client-secrets.js';

export const CALLBACK_PATH = '/oauth2callback';

/**
 * Blocking boundary that turns client secrets into a fresh token.
 * Tests substitute a fake that returns a canned token.
 */
export interface Authorizer {
  authorize(secrets: ClientSecrets, scopes: readonly string[]): Promise<StoredCredential>;
}

export interface LoopbackAuthorizerOptions {
  /** 0 picks an ephemeral port */
  port?: number;
  host?: string;
  openBrowser?: (url: string) => Promise<unknown>;
  logger?: AppLogger;
}

/**
 * Validate the query string Google sends to the redirect URI.
 */
export function readCallback(
  query: Record<string, unknown>,
  expectedState: string
): Result<string, AuthenticationError> {
  if (typeof query.error === 'string') {
    return {
      success: false,
      error: new AuthenticationError(`Authorization was declined: ${query.error}`),
    };
  }
  if (query.state !== expectedState) {
    return {
      success: false,
      error: new AuthenticationError('OAuth state mismatch'),
    };
  }
  if (typeof query.code !== 'string' || !query.code) {
    return {
      success: false,
      error: new AuthenticationError('Missing code parameter'),
    };
  }
  return { success: true, data: query.code };
}

/**
 * Convert a token response into the stored form.
 * @throws AuthenticationError when Google returned no access or refresh token
 */
export function toStoredCredential(
  tokens: Credentials,
  requestedScopes: readonly string[]
): StoredCredential {
  const refreshToken = tokens.refresh_token;
  if (!tokens.access_token || !refreshToken) {
    throw new AuthenticationError('Missing tokens in response');
  }

  return {
    accessToken: tokens.access_token,
    refreshToken,
    expiresAt: tokens.expiry_date || Date.now() + 3600000,
    scopes: tokens.scope ? tokens.scope.split(' ').filter(Boolean) : [...requestedScopes],
  };
}

function page(title: string, message: string): string {
  const escape = (value: string): string =>
    value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
  return `<!doctype html><html><body><h1>${escape(title)}</h1><p>${escape(message)}</p></body></html>`;
}

function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once('error', reject);
  });
}

/**
 * Runs the installed-app OAuth flow against a local redirect listener.
 */
export class LoopbackAuthorizer implements Authorizer {
  private readonly port: number;
  private readonly host: string;
  private readonly openBrowser: (url: string) => Promise<unknown>;
  private readonly logger: AppLogger;

  constructor(options: LoopbackAuthorizerOptions = {}) {
    this.port = options.port ?? 0;
    this.host = options.host ?? '127.0.0.1';
    this.openBrowser = options.openBrowser ?? ((url: string) => open(url));
    this.logger = options.logger ?? createLogger({ domain: 'auth' });
  }

  async authorize(secrets: ClientSecrets, scopes: readonly string[]): Promise<StoredCredential> {
    const state = crypto.randomBytes(16).toString('base64url');
    const app = express();

    let server: Server;
    try {
      server = await listen(app, this.port, this.host);
    } catch (error) {
      throw new AuthenticationError(
        `Could not start OAuth callback listener on ${this.host}:${this.port}: ${errorMessage(error)}`
      );
    }

    try {
      const address = server.address();
      if (!address || typeof address === 'string') {
        throw new AuthenticationError('OAuth callback listener has no TCP address');
      }

      const redirectUri = `http://${this.host}:${address.port}${CALLBACK_PATH}`;
      const client = createOAuth2Client(secrets, redirectUri);
      const authUrl = client.generateAuthUrl({
        access_type: 'offline', // Get refresh token
        scope: [...scopes],
        state,
        prompt: 'consent', // Force consent to always get refresh token
      });

      const code = await new Promise<string>((resolve, reject) => {
        app.get(CALLBACK_PATH, (req, res) => {
          const outcome = readCallback(req.query, state);
          if (outcome.success) {
            res.send(page('Authentication complete', 'You can close this window.'));
            resolve(outcome.data);
          } else {
            res.status(400).send(page('Authentication failed', outcome.error.message));
            reject(outcome.error);
          }
        });

        this.logger.info('oauth_consent_required', { authUrl, redirectUri });
        void this.openBrowser(authUrl).catch((error: unknown) => {
          this.logger.warn('browser_open_failed', {
            error: errorMessage(error),
            hint: 'Open the logged authUrl manually.',
          });
        });
      });

      let tokens: Credentials;
      try {
        ({ tokens } = await client.getToken(code));
      } catch (error) {
        throw new AuthenticationError(`OAuth code exchange failed: ${errorMessage(error)}`);
      }

      this.logger.info('oauth_authorized', { scopes: tokens.scope ?? scopes.join(' ') });
      return toStoredCredential(tokens, scopes);
    } finally {
      server.closeAllConnections();
      server.close();
    }
  }
}
