/**
 * @fileoverview OAuth client-secret file handling.
 *
 * Reads the client JSON downloaded from the Google Cloud Console and, when
 * the configured copy is missing, looks for a fresh download in the user's
 * Downloads folder.
 */

import fs from 'fs/promises';
import path from 'path';
import {
  AuthenticationError,
  CredentialDiscoveryError,
  errorMessage,
  type Result,
} from '../../utils/errors.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';

/** Google names console downloads client_secret_<id>.apps.googleusercontent.com.json */
const CLIENT_SECRET_PATTERN = /^client_secret.*\.json$/;

/**
 * OAuth client identity for an installed (desktop) application.
 */
export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
}

export interface DiscoveredClientSecret {
  source: string;
  target: string;
}

export type ClientSecretStatus =
  | { status: 'present'; path: string }
  | { status: 'discovered'; path: string; source: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a client-secret document. Accepts both the `installed` and `web`
 * layouts the console produces.
 */
export function parseClientSecrets(raw: unknown): ClientSecrets | null {
  if (!isRecord(raw)) return null;
  const section = isRecord(raw.installed) ? raw.installed : isRecord(raw.web) ? raw.web : null;
  if (!section) return null;

  const { client_id: clientId, client_secret: clientSecret, redirect_uris: redirectUris } = section;
  if (typeof clientId !== 'string' || !clientId) return null;
  if (typeof clientSecret !== 'string' || !clientSecret) return null;

  return {
    clientId,
    clientSecret,
    redirectUris: Array.isArray(redirectUris)
      ? redirectUris.filter((uri): uri is string => typeof uri === 'string')
      : [],
  };
}

/**
 * Read the client-secret file.
 * @throws AuthenticationError when the file is missing or malformed
 */
export async function readClientSecrets(filePath: string): Promise<ClientSecrets> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new AuthenticationError(`OAuth client secrets file not found at: ${filePath}`, {
      path: filePath,
      error: errorMessage(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new AuthenticationError(`OAuth client secrets file is not valid JSON: ${filePath}`, {
      path: filePath,
      error: errorMessage(error),
    });
  }

  const secrets = parseClientSecrets(raw);
  if (!secrets) {
    throw new AuthenticationError(
      `OAuth client secrets file has no installed or web client: ${filePath}`,
      { path: filePath }
    );
  }
  return secrets;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Copy the most recently modified client_secret*.json from downloadsDir to targetPath.
 * Never throws: every failure comes back as a CredentialDiscoveryError result.
 */
export async function discoverClientSecret(options: {
  downloadsDir: string;
  targetPath: string;
}): Promise<Result<DiscoveredClientSecret, CredentialDiscoveryError>> {
  const { downloadsDir, targetPath } = options;

  try {
    let names: string[];
    try {
      names = await fs.readdir(downloadsDir);
    } catch {
      names = [];
    }

    const candidates = names.filter((name) => CLIENT_SECRET_PATTERN.test(name));
    if (candidates.length === 0) {
      return {
        success: false,
        error: new CredentialDiscoveryError(
          `Could not find a client_secret*.json file in ${downloadsDir}. ` +
            'Please download it from the Google Cloud Console.',
          downloadsDir
        ),
      };
    }

    let latest: { file: string; mtimeMs: number } | null = null;
    for (const name of candidates) {
      const file = path.join(downloadsDir, name);
      const stats = await fs.stat(file);
      if (!stats.isFile()) continue;
      if (!latest || stats.mtimeMs > latest.mtimeMs) {
        latest = { file, mtimeMs: stats.mtimeMs };
      }
    }

    if (!latest) {
      return {
        success: false,
        error: new CredentialDiscoveryError(
          `No regular client_secret*.json file in ${downloadsDir}`,
          downloadsDir
        ),
      };
    }

    await fs.mkdir(path.dirname(path.resolve(targetPath)), { recursive: true });
    await fs.copyFile(latest.file, targetPath);

    return { success: true, data: { source: latest.file, target: targetPath } };
  } catch (error) {
    return {
      success: false,
      error: new CredentialDiscoveryError(
        `Unexpected error during credential import: ${errorMessage(error)}`,
        downloadsDir
      ),
    };
  }
}

/**
 * Make sure the client-secret file exists, importing it from Downloads if needed.
 *
 * A failed import is logged and returned; the caller carries on and the
 * authentication step reports the missing file.
 */
export async function initializeAuthentication(
  credentialsFilename: string,
  options: { downloadsDir: string; logger?: AppLogger }
): Promise<Result<ClientSecretStatus, CredentialDiscoveryError>> {
  const logger = options.logger ?? createLogger({ domain: 'auth' });

  if (await fileExists(credentialsFilename)) {
    return { success: true, data: { status: 'present', path: credentialsFilename } };
  }

  logger.info('client_secret_missing', {
    path: credentialsFilename,
    downloadsDir: options.downloadsDir,
  });

  const discovered = await discoverClientSecret({
    downloadsDir: options.downloadsDir,
    targetPath: credentialsFilename,
  });

  if (!discovered.success) {
    logger.error('client_secret_not_found', {
      error: discovered.error.message,
      searchedDir: discovered.error.searchedDir,
      hint: 'Download your OAuth client JSON from the Google Cloud Console.',
    });
    return discovered;
  }

  logger.info('client_secret_imported', {
    source: discovered.data.source,
    path: discovered.data.target,
  });
  return {
    success: true,
    data: { status: 'discovered', path: discovered.data.target, source: discovered.data.source },
  };
}
