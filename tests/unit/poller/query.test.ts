import { describe, expect, it } from 'vitest';
import { buildQuery } from '../../../src/services/poller/index.js';

describe('buildQuery', () => {
  const now = new Date(2024, 2, 15, 10, 30);

  it('joins sender, subject and date window in order', () => {
    expect(buildQuery({ from: 'a@b.com', subject: 'Invoice', nDays: 7 }, now)).toBe(
      'from:a@b.com subject:Invoice after:2024/03/08 is:unread'
    );
  });

  it('returns only the unread term when every filter is empty', () => {
    expect(buildQuery({ from: '', subject: '', nDays: 0 }, now)).toBe('is:unread');
  });

  it('omits the date term when nDays is 0', () => {
    expect(buildQuery({ from: 'a@b.com', subject: '', nDays: 0 }, now)).toBe(
      'from:a@b.com is:unread'
    );
  });

  it('crosses month and year boundaries', () => {
    expect(buildQuery({ from: '', subject: '', nDays: 1 }, new Date(2024, 0, 1, 9))).toBe(
      'after:2023/12/31 is:unread'
    );
  });

  it('emits filter values verbatim', () => {
    expect(buildQuery({ from: '', subject: 'Q3 "final" report', nDays: 0 }, now)).toBe(
      'subject:Q3 "final" report is:unread'
    );
    expect(buildQuery({ from: '', subject: '"Monthly report"', nDays: 0 }, now)).toBe(
      'subject:"Monthly report" is:unread'
    );
  });
});
