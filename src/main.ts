/**
 * @fileoverview Command-line driver for the Gmail poller.
 *
 * Usage:
 *   gmail-poller                      # one poll pass using ./config.yaml
 *   gmail-poller --config other.yaml  # alternate config file
 *   gmail-poller --watch              # poll until SIGINT/SIGTERM
 */

import { loadConfig, readRuntimeOptions, type RuntimeOptions, type Settings } from './config.js';
import { createCredentialStore, type CredentialStore } from './services/credentials/index.js';
import { initializeGmailAuthentication } from './services/google/auth.js';
import { LoopbackAuthorizer, type Authorizer } from './services/google/authorizer.js';
import { initializeAuthentication } from './services/google/client-secrets.js';
import { gmailPoll, watchGmail } from './services/poller/index.js';
import { AppError, errorMessage, withErrorContext } from './utils/errors.js';
import { createLogger, type AppLogger } from './utils/observability/index.js';

export interface CliOptions {
  configPath?: string;
  watch: boolean;
  help: boolean;
}

export interface MainDeps {
  logger?: AppLogger;
  authorizer?: Authorizer;
  createStore?: typeof createCredentialStore;
  authenticate?: typeof initializeGmailAuthentication;
  poll?: typeof gmailPoll;
  watch?: typeof watchGmail;
  /** Aborting ends the current sleep and stops watch mode */
  signal?: AbortSignal;
  /** Help text sink */
  print?: (text: string) => void;
}

export const HELP_TEXT = `
Gmail Poller

Usage:
  gmail-poller [--config <path>] [--watch]

Options:
  --config, -c    Path to the YAML config (default: $CONFIG_PATH or config.yaml)
  --watch, -w     Keep polling until interrupted (default: one pass)
  --help, -h      Show this help message
`;

/**
 * Parse command-line arguments (without the node and script entries).
 * @throws Error for unknown options or a missing option value
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { watch: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--watch' || arg === '-w') {
      options.watch = true;
    } else if (arg === '--config' || arg === '-c') {
      const value = args[++i];
      if (!value || value.startsWith('-')) {
        throw new Error(`${arg} requires a path`);
      }
      options.configPath = value;
    } else if (arg.startsWith('--config=')) {
      options.configPath = arg.slice('--config='.length);
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

async function run(
  settings: Settings,
  options: CliOptions,
  runtime: RuntimeOptions,
  deps: MainDeps,
  logger: AppLogger
): Promise<void> {
  await initializeAuthentication(settings.auth.credentialsFilename, {
    downloadsDir: runtime.downloadsDir,
    logger,
  });

  const store: CredentialStore = (deps.createStore ?? createCredentialStore)(
    runtime.credentialStore,
    settings.auth.tokenFilename
  );
  const authorizer =
    deps.authorizer ?? new LoopbackAuthorizer({ port: runtime.redirectPort, logger });

  const { client, scopes } = await (deps.authenticate ?? initializeGmailAuthentication)(
    settings.auth,
    { store, authorizer, logger }
  );
  logger.info('gmail_authenticated', { scopes });

  if (options.watch) {
    const signal = deps.signal ?? new AbortController().signal;
    await (deps.watch ?? watchGmail)(client, settings.gmail, settings.processing, {
      logger,
      signal,
    });
  } else {
    await (deps.poll ?? gmailPoll)(client, settings.gmail, settings.processing, {
      logger,
      signal: deps.signal,
    });
  }
}

/**
 * Run the poller.
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  const logger = deps.logger ?? createLogger({ domain: 'gmail-poller' });
  const print = deps.print ?? ((text: string) => console.log(text));

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    logger.error('cli_arguments_invalid', { error: errorMessage(error) });
    print(HELP_TEXT);
    return 1;
  }

  if (options.help) {
    print(HELP_TEXT);
    return 0;
  }

  const runtime = readRuntimeOptions(options.configPath);

  let settings: Settings;
  try {
    settings = loadConfig(runtime.configPath);
  } catch (error) {
    logger.error('config_load_failed', {
      configPath: runtime.configPath,
      error: errorMessage(error),
      ...(error instanceof AppError ? { errorCode: error.code, ...error.context } : {}),
    });
    return 1;
  }

  logger.info('config_loaded', {
    configPath: runtime.configPath,
    watch: options.watch,
    credentialStore: runtime.credentialStore,
  });

  try {
    await withErrorContext(
      () => run(settings, options, runtime, deps, logger),
      'gmail_poll_run',
      logger
    );
  } catch {
    // already logged by withErrorContext
    return 1;
  }

  return 0;
}
