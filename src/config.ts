/**
 * @fileoverview Application configuration.
 *
 * Settings come from a YAML document (config.yaml by default) and are
 * validated in one pass so every problem is reported together. Runtime
 * knobs that are environment-specific (paths, ports, store provider) come
 * from environment variables, optionally seeded from a .env file.
 *
 * Nothing here is cached: callers load once and pass the value down.
 */

import { readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { parse } from 'yaml';
import { ConfigError, errorMessage } from './utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

export interface AuthSettings {
  readonly credentialsFilename: string;
  readonly tokenFilename: string;
  readonly scopes: readonly string[];
}

export interface GmailSettings {
  /** Lookback window in days; 0 disables the date filter */
  readonly nDays: number;
  /** Seconds to sleep after each pass */
  readonly pollInterval: number;
}

export interface ProcessingSettings {
  readonly from: string;
  readonly subject: string;
}

export interface Settings {
  readonly auth: AuthSettings;
  readonly gmail: GmailSettings;
  readonly processing: ProcessingSettings;
}

/** Environment-derived options that sit outside config.yaml. */
export interface RuntimeOptions {
  configPath: string;
  downloadsDir: string;
  redirectPort: number;
  credentialStore: string;
}

// ---------------------------------------------------------------------------
// Env helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/**
 * Collect environment-driven options.
 * An explicit config path (from the command line) wins over CONFIG_PATH.
 */
export function readRuntimeOptions(configPathOverride?: string): RuntimeOptions {
  return {
    configPath: configPathOverride || optional('CONFIG_PATH', DEFAULT_CONFIG_PATH),
    downloadsDir: optional('GOOGLE_DOWNLOADS_DIR', path.join(os.homedir(), 'Downloads')),
    redirectPort: optionalInt('GOOGLE_REDIRECT_PORT', 0),
    credentialStore: optional('CREDENTIAL_STORE_PROVIDER', 'file'),
  };
}

// ---------------------------------------------------------------------------
// YAML validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(
  raw: Record<string, unknown>,
  name: string,
  errors: string[],
  isOptional = false
): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined || value === null) {
    if (!isOptional) errors.push(`${name} section is required`);
    return {};
  }
  if (!isRecord(value)) {
    errors.push(`${name} must be a mapping`);
    return {};
  }
  return value;
}

function requiredString(
  values: Record<string, unknown>,
  key: string,
  errors: string[]
): string {
  const value = values[key];
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push(`${key} is required and must be a non-empty string`);
    return '';
  }
  return value;
}

function optionalString(
  values: Record<string, unknown>,
  key: string,
  errors: string[]
): string {
  const value = values[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    errors.push(`${key} must be a string`);
    return '';
  }
  return value.trim();
}

function nonNegativeInt(
  values: Record<string, unknown>,
  key: string,
  errors: string[]
): number {
  const value = values[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    errors.push(`${key} is required and must be a non-negative integer, got ${String(value)}`);
    return 0;
  }
  return value;
}

function stringList(
  values: Record<string, unknown>,
  key: string,
  errors: string[]
): string[] {
  const value = values[key];
  if (!Array.isArray(value) || value.length === 0) {
    errors.push(`${key} is required and must be a non-empty list`);
    return [];
  }
  const scopes: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string' || item.trim() === '') {
      errors.push(`${key} entries must be non-empty strings`);
      return [];
    }
    scopes.push(item.trim());
  }
  return scopes;
}

/**
 * Validate a parsed configuration document.
 * Throws ConfigError listing every problem found.
 */
export function validateConfig(raw: unknown): Settings {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration validation failed: document must be a mapping', [
      'document must be a mapping',
    ]);
  }

  const errors: string[] = [];

  const auth = section(raw, 'auth', errors);
  const gmail = section(raw, 'gmail', errors);
  const processing = section(raw, 'processing', errors, true);

  const settings: Settings = {
    auth: Object.freeze({
      credentialsFilename: requiredString(auth, 'credentials_filename', errors),
      tokenFilename: requiredString(auth, 'token_filename', errors),
      scopes: Object.freeze(stringList(auth, 'scopes', errors)),
    }),
    gmail: Object.freeze({
      nDays: nonNegativeInt(gmail, 'n_days', errors),
      pollInterval: nonNegativeInt(gmail, 'poll_interval', errors),
    }),
    processing: Object.freeze({
      from: optionalString(processing, 'from', errors),
      subject: optionalString(processing, 'subject', errors),
    }),
  };

  if (errors.length > 0) {
    throw new ConfigError(
      `Configuration validation failed:\n  - ${errors.join('\n  - ')}`,
      errors
    );
  }

  return Object.freeze(settings);
}

/**
 * Read and validate the YAML configuration file.
 * @throws ConfigError when the file is missing, unparsable or invalid
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Settings {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found at: ${configPath}`);
    }
    throw new ConfigError(`Error reading ${configPath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ConfigError(`Error parsing ${configPath}: ${errorMessage(error)}`);
  }

  return validateConfig(raw);
}

