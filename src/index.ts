#!/usr/bin/env node
/**
 * @fileoverview Process entry point for the Gmail poller.
 *
 * Loads .env, starts observability and wires SIGINT/SIGTERM to an abort
 * signal so the poller finishes its current step before exiting.
 */

import 'dotenv/config';
import { main } from './main.js';
import { errorMessage } from './utils/errors.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const logger = createLogger({ domain: 'gmail-poller' });
const controller = new AbortController();

function shutdown(signal: string): void {
  if (controller.signal.aborted) {
    logger.warn('shutdown_forced', { signal });
    process.exit(130);
  }
  logger.info('shutdown_signal_received', { signal });
  controller.abort();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

void main(process.argv.slice(2), { logger, signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('fatal_error', { error: errorMessage(error) });
    process.exitCode = 1;
  })
  .finally(() => {
    process.removeAllListeners('SIGTERM');
    process.removeAllListeners('SIGINT');
  });
