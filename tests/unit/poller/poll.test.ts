/**
 * Unit tests for the poll-and-process loop.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { gmailPoll, watchGmail } from '../../../src/services/poller/index.js';
import { ProviderRequestError } from '../../../src/utils/errors.js';
import { FakeMailClient, plainMessage } from '../../mocks/gmail.js';
import { createTestLogger } from '../../helpers/logger.js';

const gmailSettings = { nDays: 0, pollInterval: 5 };
const processing = { from: '', subject: '' };

describe('gmailPoll', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fetches, marks read and sleeps the poll interval', async () => {
    const client = new FakeMailClient([
      plainMessage('m1', { Subject: 'One', From: 'a@example.com', Date: 'Mon' }, 'first body'),
      plainMessage('m2', { Subject: 'Two', From: 'b@example.com', Date: 'Tue' }, 'second body'),
    ]);
    const logger = createTestLogger();

    let settled = false;
    const pass = gmailPoll(client, gmailSettings, processing, { logger }).then((result) => {
      settled = true;
      return result;
    });

    await vi.advanceTimersByTimeAsync(4999);
    expect(settled).toBe(false);
    expect(client.markedRead).toEqual(['m1', 'm2']);

    await vi.advanceTimersByTimeAsync(1);
    const result = await pass;

    expect(settled).toBe(true);
    expect(result.query).toBe('is:unread');
    expect(result.emails).toEqual([
      { id: 'm1', subject: 'One', from: 'a@example.com', date: 'Mon', body: 'first body', snippet: 'first body' },
      { id: 'm2', subject: 'Two', from: 'b@example.com', date: 'Tue', body: 'second body', snippet: 'second body' },
    ]);
    expect(client.labelsOf('m1')).toEqual(['INBOX']);
    expect(client.labelsOf('m2')).toEqual(['INBOX']);
  });

  it('logs one summary per message after the batch', async () => {
    const client = new FakeMailClient([
      plainMessage('m1', { Subject: 'Long', From: 'a@example.com' }, 'x'.repeat(250)),
    ]);
    const logger = createTestLogger();

    const pass = gmailPoll(client, gmailSettings, processing, { logger });
    await vi.advanceTimersByTimeAsync(5000);
    await pass;

    const summary = logger.find('email_summary');
    expect(summary?.data).toEqual({
      messageId: 'm1',
      from: 'a@example.com',
      subject: 'Long',
      date: 'Unknown',
      bodyPreview: `${'x'.repeat(200)}...(truncated)`,
    });

    const events = logger.events();
    expect(events.indexOf('email_fetched')).toBeLessThan(events.indexOf('email_summary'));
    expect(events.at(-1)).toBe('poll_sleeping');
  });

  it('still sleeps when no message matches', async () => {
    const client = new FakeMailClient();
    const logger = createTestLogger();

    const pass = gmailPoll(client, gmailSettings, processing, { logger });
    await vi.advanceTimersByTimeAsync(5000);
    const result = await pass;

    expect(result.emails).toEqual([]);
    expect(logger.events()).toContain('poll_no_new_emails');
    expect(logger.events()).toContain('poll_sleeping');
  });

  it('substitutes an empty body for undecodable data and still marks read', async () => {
    const client = new FakeMailClient([
      {
        id: 'bad',
        headers: { Subject: 'Broken' },
        payload: { mimeType: 'text/plain', body: { data: '%%%' } },
      },
    ]);
    const logger = createTestLogger();

    const pass = gmailPoll(client, gmailSettings, processing, { logger });
    await vi.advanceTimersByTimeAsync(5000);
    const result = await pass;

    expect(result.emails[0].body).toBe('');
    expect(client.markedRead).toEqual(['bad']);
    expect(logger.find('email_body_decode_failed')?.level).toBe('warn');
  });

  it('propagates provider errors without sleeping', async () => {
    const client = new FakeMailClient([plainMessage('m1', {}, 'body')]);
    client.failOn = { operation: 'modify', status: 500 };
    const logger = createTestLogger();

    await expect(gmailPoll(client, gmailSettings, processing, { logger })).rejects.toBeInstanceOf(
      ProviderRequestError
    );

    expect(logger.events()).toContain('poll_failed');
    expect(logger.events()).not.toContain('poll_sleeping');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('passes the configured filters into the query', async () => {
    const client = new FakeMailClient();
    const pass = gmailPoll(
      client,
      { nDays: 2, pollInterval: 0 },
      { from: 'boss@example.com', subject: 'Report' },
      { logger: createTestLogger(), now: () => new Date(2024, 4, 10, 12) }
    );
    await vi.advanceTimersByTimeAsync(1);
    await pass;

    expect(client.queries).toEqual(['from:boss@example.com subject:Report after:2024/05/08 is:unread']);
  });

  it('ends the sleep early when the signal aborts', async () => {
    const client = new FakeMailClient();
    const controller = new AbortController();

    const pass = gmailPoll(client, gmailSettings, processing, {
      logger: createTestLogger(),
      signal: controller.signal,
    });
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await expect(pass).resolves.toEqual({ query: 'is:unread', emails: [] });
  });
});

describe('watchGmail', () => {
  it('runs passes until the signal aborts', async () => {
    const controller = new AbortController();
    const client = new FakeMailClient([plainMessage('m1', {}, 'hello')]);
    const list = client.listMessageIds.bind(client);
    vi.spyOn(client, 'listMessageIds').mockImplementation(async (query) => {
      const ids = await list(query);
      if (client.queries.length === 2) controller.abort();
      return ids;
    });

    const passes = await watchGmail(
      client,
      { nDays: 0, pollInterval: 0 },
      processing,
      { logger: createTestLogger(), signal: controller.signal }
    );

    expect(passes).toBe(2);
    expect(client.fetched).toEqual(['m1']);
  });

  it('stops on the first failing pass', async () => {
    const controller = new AbortController();
    const client = new FakeMailClient();
    client.failOn = { operation: 'list', status: 503 };

    await expect(
      watchGmail(client, gmailSettings, processing, {
        logger: createTestLogger(),
        signal: controller.signal,
      })
    ).rejects.toThrow('Gmail messages.list failed: boom');
  });
});
