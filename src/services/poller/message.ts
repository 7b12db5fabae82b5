/**
 * @fileoverview Header extraction for fetched Gmail messages.
 */

import type { gmail_v1 } from 'googleapis';

export const NO_SUBJECT = 'No Subject';
export const UNKNOWN = 'Unknown';

export interface MessageHeaders {
  subject: string;
  from: string;
  date: string;
}

/**
 * Read Subject/From/Date, matching header names case-insensitively.
 * The first occurrence wins; absent headers get literal fallbacks.
 */
export function readHeaders(message: gmail_v1.Schema$Message): MessageHeaders {
  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string, fallback: string): string => {
    const header = headers.find((h) => h.name?.toLowerCase() === name);
    return typeof header?.value === 'string' ? header.value : fallback;
  };

  return {
    subject: getHeader('subject', NO_SUBJECT),
    from: getHeader('from', UNKNOWN),
    date: getHeader('date', UNKNOWN),
  };
}
