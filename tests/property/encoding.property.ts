/**
 * Property-based tests for transfer decoding
 *
 * Message bodies arrive base64 or quoted-printable encoded; decoding must
 * restore the original bytes whatever line wrapping the sender used.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { base64Decode, quotedPrintableDecode } from '../../src/encoding/index.js';

/**
 * Encodes every byte as =XX, wrapping with soft line breaks
 */
function hexEscape(bytes: Buffer, lineLength: number): string {
  const escaped = [...bytes].map(b => `=${b.toString(16).toUpperCase().padStart(2, '0')}`);
  const lines: string[] = [];
  for (let i = 0; i < escaped.length; i += lineLength) {
    lines.push(escaped.slice(i, i + lineLength).join(''));
  }
  return lines.join('=\r\n');
}

describe('Transfer decoding', () => {
  it('base64 decode ignores MIME line breaks', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ minLength: 0, maxLength: 500 }),
        fc.integer({ min: 4, max: 76 }),
        (original, width) => {
          const encoded = Buffer.from(original).toString('base64');
          const wrapped = encoded.match(new RegExp(`.{1,${width}}`, 'g'))?.join('\r\n') ?? encoded;

          expect(base64Decode(wrapped).equals(Buffer.from(original))).toBe(true);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('quoted-printable decode restores escaped bytes across soft breaks', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ minLength: 0, maxLength: 300 }),
        fc.integer({ min: 1, max: 25 }),
        (original, perLine) => {
          const encoded = hexEscape(Buffer.from(original), perLine);

          expect(quotedPrintableDecode(encoded).equals(Buffer.from(original))).toBe(true);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('quoted-printable decode passes plain ASCII through', () => {
    fc.assert(
      fc.property(
        fc.stringOf(fc.constantFrom(...'abcdefghijklmnopqrstuvwxyz ABC.,!?-0123456789'.split('')), { maxLength: 200 }),
        (text) => {
          expect(quotedPrintableDecode(text).toString('utf-8')).toBe(text);
        }
      ),
      { numRuns: 100 }
    );
  });
});
