/**
 * Unit tests for the googleapis-backed Gmail client.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { OAuth2Client } from 'google-auth-library';
import { GmailClient, httpStatusOf } from '../../../src/services/google/gmail.js';
import { ProviderRequestError } from '../../../src/utils/errors.js';
import { createTestLogger } from '../../helpers/logger.js';

const mocks = vi.hoisted(() => ({
  list: vi.fn(),
  get: vi.fn(),
  modify: vi.fn(),
}));

vi.mock('googleapis', () => ({
  google: {
    gmail: vi.fn(() => ({
      users: {
        messages: {
          list: mocks.list,
          get: mocks.get,
          modify: mocks.modify,
        },
      },
    })),
  },
}));

describe('GmailClient', () => {
  let client: GmailClient;
  let logger: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    logger = createTestLogger();
    client = new GmailClient(new OAuth2Client(), logger);
  });

  it('follows pagination when listing', async () => {
    mocks.list
      .mockResolvedValueOnce({ data: { messages: [{ id: 'a' }, { id: 'b' }], nextPageToken: 'p2' } })
      .mockResolvedValueOnce({ data: { messages: [{ id: 'c' }] } });

    const ids = await client.listMessageIds('is:unread');

    expect(ids).toEqual(['a', 'b', 'c']);
    expect(mocks.list).toHaveBeenNthCalledWith(1, { userId: 'me', q: 'is:unread', pageToken: undefined });
    expect(mocks.list).toHaveBeenNthCalledWith(2, { userId: 'me', q: 'is:unread', pageToken: 'p2' });
  });

  it('returns no ids when the listing is empty', async () => {
    mocks.list.mockResolvedValueOnce({ data: { resultSizeEstimate: 0 } });

    expect(await client.listMessageIds('is:unread')).toEqual([]);
  });

  it('fetches full messages', async () => {
    mocks.get.mockResolvedValueOnce({ data: { id: 'a', snippet: 'hi' } });

    expect(await client.getMessage('a')).toEqual({ id: 'a', snippet: 'hi' });
    expect(mocks.get).toHaveBeenCalledWith({ userId: 'me', id: 'a', format: 'full' });
  });

  it('removes the UNREAD label when marking read', async () => {
    mocks.modify.mockResolvedValueOnce({ data: {} });

    await client.markRead('a');

    expect(mocks.modify).toHaveBeenCalledWith({
      userId: 'me',
      id: 'a',
      requestBody: { removeLabelIds: ['UNREAD'] },
    });
  });

  it('wraps API failures with the operation and status', async () => {
    mocks.get.mockRejectedValueOnce(
      Object.assign(new Error('Requested entity was not found.'), { code: 404 })
    );

    const error = await client.getMessage('missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toMatchObject({
      message: 'Gmail messages.get failed: Requested entity was not found.',
      operation: 'messages.get',
      status: 404,
      code: 'PROVIDER_REQUEST_FAILED',
    });
    expect(logger.find('gmail_request_failed')?.data).toEqual({
      operation: 'messages.get',
      status: 404,
      error: 'Requested entity was not found.',
    });
  });
});

describe('httpStatusOf', () => {
  it('reads numeric status or code fields', () => {
    expect(httpStatusOf({ status: 429 })).toBe(429);
    expect(httpStatusOf({ code: '503' })).toBe(503);
    expect(httpStatusOf({ code: 'ECONNRESET' })).toBeUndefined();
    expect(httpStatusOf(new Error('plain'))).toBeUndefined();
    expect(httpStatusOf(null)).toBeUndefined();
  });
});
