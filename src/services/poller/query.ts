/**
 * @fileoverview Gmail search query construction.
 */

import { DateTime } from 'luxon';

export interface QueryFilters {
  from: string;
  subject: string;
  /** Lookback window in days; 0 disables the date filter */
  nDays: number;
}

/**
 * Build the Gmail search query for unread messages matching the filters.
 *
 * Terms appear in a fixed order: from, subject, after, is:unread. Filter
 * values are used verbatim, so a phrase must be quoted in the config.
 * The date bound is computed in local time, like Gmail's own `after:` operator.
 */
export function buildQuery(filters: QueryFilters, now: Date = new Date()): string {
  const parts: string[] = [];

  if (filters.from) {
    parts.push(`from:${filters.from}`);
  }

  if (filters.subject) {
    parts.push(`subject:${filters.subject}`);
  }

  if (filters.nDays > 0) {
    const after = DateTime.fromJSDate(now).minus({ days: filters.nDays });
    parts.push(`after:${after.toFormat('yyyy/MM/dd')}`);
  }

  parts.push('is:unread');

  return parts.join(' ');
}
