/**
 * @fileoverview Gmail API client.
 *
 * Thin wrapper over googleapis exposing the three calls the poll loop needs.
 * Every failure is logged where it happens and rethrown as
 * ProviderRequestError carrying the HTTP status. Nothing is retried.
 */

import { google, type gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { ProviderRequestError, errorMessage } from '../../utils/errors.js';
import { createLogger, type AppLogger } from '../../utils/observability/index.js';
import type { MailClient } from '../poller/types.js';

export const UNREAD_LABEL = 'UNREAD';

/**
 * Pull an HTTP status out of a gaxios error, if there is one.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error) {
    const code = Number(error.code);
    if (Number.isInteger(code) && code >= 100 && code < 600) return code;
  }
  return undefined;
}

/**
 * Gmail client bound to one authenticated account ('me').
 */
export class GmailClient implements MailClient {
  private readonly gmail: gmail_v1.Gmail;

  constructor(
    auth: OAuth2Client,
    private readonly logger: AppLogger = createLogger({ domain: 'gmail' })
  ) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  /**
   * List ids of messages matching a query, following pagination.
   */
  async listMessageIds(query: string): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.call('messages.list', () =>
        this.gmail.users.messages.list({
          userId: 'me',
          q: query,
          pageToken,
        })
      );

      for (const message of response.data.messages ?? []) {
        if (message.id) ids.push(message.id);
      }

      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    return ids;
  }

  async getMessage(id: string): Promise<gmail_v1.Schema$Message> {
    const response = await this.call('messages.get', () =>
      this.gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'full',
      })
    );
    return response.data;
  }

  async markRead(id: string): Promise<void> {
    await this.call('messages.modify', () =>
      this.gmail.users.messages.modify({
        userId: 'me',
        id,
        requestBody: { removeLabelIds: [UNREAD_LABEL] },
      })
    );
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const status = httpStatusOf(error);
      this.logger.error('gmail_request_failed', {
        operation,
        status,
        error: errorMessage(error),
      });
      throw new ProviderRequestError(
        `Gmail ${operation} failed: ${errorMessage(error)}`,
        operation,
        status
      );
    }
  }
}
