/**
 * @fileoverview Gmail poll-and-process loop.
 *
 * One pass builds the search query, fetches every matching unread message,
 * marks each one read as soon as it is fetched, logs a summary per message
 * and then sleeps for the configured interval. Gmail's UNREAD label is the
 * only state this loop writes; once removed, the `is:unread` term keeps the
 * message out of later passes.
 */

import type { gmail_v1 } from 'googleapis';
import type { GmailSettings, ProcessingSettings } from '../../config.js';
import { DecodingError, errorMessage } from '../../utils/errors.js';
import {
  createLogger,
  createRunId,
  safeSnippet,
  withLogContext,
  type AppLogger,
} from '../../utils/observability/index.js';
import { extractEmailBody } from './body.js';
import { readHeaders } from './message.js';
import { buildQuery } from './query.js';
import type { Email, MailClient, PollResult } from './types.js';

export type { Email, MailClient, PollResult } from './types.js';
export { buildQuery } from './query.js';
export { extractEmailBody, decodeBodyData } from './body.js';

const BODY_PREVIEW_LENGTH = 200;

export interface PollOptions {
  logger?: AppLogger;
  /** Clock for the date filter */
  now?: () => Date;
  /** Ends the post-pass sleep early when aborted */
  signal?: AbortSignal;
}

/**
 * Sleep for a duration, resolving early (never rejecting) on abort.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Decode a message body, substituting an empty body for undecodable data.
 */
function extractBodySafely(
  payload: gmail_v1.Schema$MessagePart | null | undefined,
  messageId: string,
  logger: AppLogger
): string {
  try {
    return extractEmailBody(payload);
  } catch (error) {
    if (!(error instanceof DecodingError)) throw error;
    logger.warn('email_body_decode_failed', {
      messageId,
      error: error.message,
    });
    return '';
  }
}

/**
 * Fetch every message matching the query, marking each read right after it is fetched.
 */
export async function fetchEmails(
  client: MailClient,
  query: string,
  logger: AppLogger
): Promise<Email[]> {
  logger.info('emails_fetch_started', { query });
  const ids = await client.listMessageIds(query);

  if (ids.length === 0) {
    logger.info('emails_none_matching', { query });
    return [];
  }

  logger.info('emails_found', { count: ids.length });

  const emails: Email[] = [];
  for (const id of ids) {
    const message = await client.getMessage(id);
    const { subject, from, date } = readHeaders(message);

    emails.push({
      id,
      subject,
      from,
      date,
      body: extractBodySafely(message.payload, id, logger),
      snippet: message.snippet ?? '',
    });

    await client.markRead(id);
    logger.debug('email_fetched', { messageId: id, subject, from });
  }

  return emails;
}

/**
 * Run one poll pass: fetch, mark read, log, then sleep the poll interval.
 *
 * @throws ProviderRequestError when any Gmail call fails; no sleep happens in that case
 */
export async function gmailPoll(
  client: MailClient,
  gmailSettings: GmailSettings,
  processingSettings: ProcessingSettings,
  options: PollOptions = {}
): Promise<PollResult> {
  const logger = options.logger ?? createLogger({ domain: 'gmail-poller' });
  const now = options.now ?? (() => new Date());

  return withLogContext({ runId: createRunId() }, async () => {
    logger.info('poll_started', {
      nDays: gmailSettings.nDays,
      pollIntervalSeconds: gmailSettings.pollInterval,
      fromFilter: processingSettings.from,
      subjectFilter: processingSettings.subject,
    });

    const query = buildQuery(
      {
        from: processingSettings.from,
        subject: processingSettings.subject,
        nDays: gmailSettings.nDays,
      },
      now()
    );
    logger.info('query_built', { query });

    let emails: Email[];
    try {
      emails = await fetchEmails(client, query, logger);
    } catch (error) {
      logger.error('poll_failed', { query, error: errorMessage(error) });
      throw error;
    }

    if (emails.length > 0) {
      logger.info('emails_fetched', { count: emails.length });
      for (const email of emails) {
        logger.info('email_summary', {
          messageId: email.id,
          from: email.from,
          subject: email.subject,
          date: email.date,
          bodyPreview: safeSnippet(email.body, BODY_PREVIEW_LENGTH),
        });
      }
    } else {
      logger.info('poll_no_new_emails');
    }

    logger.info('poll_sleeping', { seconds: gmailSettings.pollInterval });
    await sleep(gmailSettings.pollInterval * 1000, options.signal);

    return { query, emails };
  });
}

/**
 * Run poll passes back to back until the signal aborts.
 * A failing pass ends the loop by rethrowing.
 *
 * @returns Number of completed passes
 */
export async function watchGmail(
  client: MailClient,
  gmailSettings: GmailSettings,
  processingSettings: ProcessingSettings,
  options: PollOptions & { signal: AbortSignal }
): Promise<number> {
  const logger = options.logger ?? createLogger({ domain: 'gmail-poller' });
  let passes = 0;

  logger.info('watch_started', { pollIntervalSeconds: gmailSettings.pollInterval });
  while (!options.signal.aborted) {
    await gmailPoll(client, gmailSettings, processingSettings, { ...options, logger });
    passes++;
  }
  logger.info('watch_stopped', { passes });

  return passes;
}
