/**
 * @fileoverview Plain-text body extraction from Gmail MIME payloads.
 *
 * Walks the part tree depth-first, left to right. The first text/plain part
 * with data ends the walk; a text/html part is kept as a fallback until a
 * plain part or a non-empty nested result replaces it.
 */

import type { gmail_v1 } from 'googleapis';
import { DecodingError } from '../../utils/errors.js';

/** Both alphabets: Gmail sends base64url, hand-built payloads often use standard base64. */
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

/** Non-fatal decoder: invalid byte sequences become U+FFFD. */
const utf8 = new TextDecoder('utf-8');

/**
 * Decode base64url body data to text.
 * @throws DecodingError when the data is not base64 at all
 */
export function decodeBodyData(data: string): string {
  const compact = data.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new DecodingError(`Body data is not base64url encoded (length ${data.length})`);
  }
  return utf8.decode(Buffer.from(compact, 'base64url'));
}

function partData(part: gmail_v1.Schema$MessagePart): string | null {
  const data = part.body?.data;
  return typeof data === 'string' ? data : null;
}

/**
 * Extract the best available plain-text body from a message payload.
 * Returns an empty string when no part carries data.
 *
 * A part that fails to decode is skipped so that a sibling can still supply
 * the body; the first failure is rethrown only when nothing else decoded.
 * @throws DecodingError when every candidate part is undecodable
 */
export function extractEmailBody(payload: gmail_v1.Schema$MessagePart | null | undefined): string {
  if (!payload) return '';

  let body = '';
  const failures: DecodingError[] = [];

  const attempt = (decode: () => string): string | null => {
    try {
      return decode();
    } catch (error) {
      if (!(error instanceof DecodingError)) throw error;
      failures.push(error);
      return null;
    }
  };

  if (payload.parts) {
    for (const part of payload.parts) {
      const mimeType = part.mimeType ?? '';
      const data = partData(part);

      if (mimeType === 'text/plain') {
        const plain = data !== null ? attempt(() => decodeBodyData(data)) : null;
        if (plain !== null) {
          body = plain;
          break;
        }
      } else if (mimeType === 'text/html' && !body) {
        const html = data !== null ? attempt(() => decodeBodyData(data)) : null;
        if (html !== null) {
          body = html;
        }
      } else if (part.parts) {
        const nested = attempt(() => extractEmailBody(part));
        if (nested) {
          body = nested;
          break;
        }
      }
    }
  } else {
    const data = partData(payload);
    if (data !== null) {
      body = decodeBodyData(data);
    }
  }

  if (!body && failures.length > 0) throw failures[0];
  return body;
}
