import { describe, expect, it } from 'vitest';
import { redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('redacts sensitive keys and message content', () => {
    const input = {
      messageId: 'm1',
      accessToken: 'abc123',
      refresh_token: 'def456',
      body: 'Quarterly numbers attached',
      nested: {
        client_secret: 'my-secret',
        parts: ['a', 'b'],
      },
    };

    const redacted = redactSecrets(input);

    expect(redacted).toEqual({
      messageId: 'm1',
      accessToken: '[REDACTED]',
      refresh_token: '[REDACTED]',
      body: '[REDACTED_TEXT len=26]',
      nested: {
        client_secret: '[REDACTED]',
        parts: ['a', 'b'],
      },
    });
  });

  it('keeps body previews and error codes readable', () => {
    const redacted = redactSecrets({ bodyPreview: 'hello', errorCode: 'AUTH_FAILED', tokenFile: 'token.json' });

    expect(redacted).toEqual({ bodyPreview: 'hello', errorCode: 'AUTH_FAILED', tokenFile: 'token.json' });
  });

  it('serializes errors without stacks by default', () => {
    const redacted = redactSecrets({ cause: new TypeError('bad input') });

    expect(redacted.cause).toEqual({ name: 'TypeError', message: 'bad input', stack: undefined });
  });

  it('summarizes content arrays', () => {
    expect(redactSecrets({ content: [1, 2, 3] }).content).toBe('[REDACTED_ARRAY len=3]');
  });

  it('truncates long snippets safely', () => {
    const value = 'x'.repeat(200);
    expect(safeSnippet(value, 20)).toBe('xxxxxxxxxxxxxxxxxxxx...(truncated)');
    expect(safeSnippet('short', 20)).toBe('short');
  });
});
