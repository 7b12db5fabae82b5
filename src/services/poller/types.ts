/**
 * @fileoverview Types shared by the Gmail poll loop and its mail client.
 */

import type { gmail_v1 } from 'googleapis';

/**
 * The slice of the Gmail API the poll loop consumes.
 * Implementations throw ProviderRequestError on any API failure.
 */
export interface MailClient {
  /** Ids of every message matching a Gmail search query, in listing order */
  listMessageIds(query: string): Promise<string[]>;
  /** Full message, including the MIME payload tree */
  getMessage(id: string): Promise<gmail_v1.Schema$Message>;
  /** Remove the UNREAD label. There is no inverse operation. */
  markRead(id: string): Promise<void>;
}

/**
 * A fetched message reduced to what gets logged.
 */
export interface Email {
  id: string;
  subject: string;
  from: string;
  date: string;
  body: string;
  snippet: string;
}

/**
 * Outcome of a single poll pass.
 */
export interface PollResult {
  query: string;
  emails: Email[];
}
