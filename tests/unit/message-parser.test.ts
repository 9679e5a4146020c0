import { describe, it, expect } from 'vitest';
import { parseMessage } from '../../src/mime/message-parser.js';
import { findTextPart, parseMimePart, splitMultipartBody } from '../../src/mime/multipart-parser.js';

function raw(lines: string[]): string {
  return lines.join('\r\n');
}

describe('parseMessage', () => {
  it('builds a frozen message from headers and a plain body', () => {
    const message = parseMessage(raw([
      'From: Bob <bob@example.net>',
      'To: alice@example.com',
      'Cc: "Team" <team@example.com>',
      'Subject: Status',
      'Date: Wed, 15 Oct 2025 08:00:00 +0200',
      'Message-ID: <status@example.net>',
      '',
      'All good.',
    ]), { seqno: 3, size: 150 });

    expect(message.seqno).toBe(3);
    expect(message.size).toBe(150);
    expect(message.subject).toBe('Status');
    expect(message.cc).toEqual([{ name: 'Team', mailbox: 'team', host: 'example.com' }]);
    expect(message.date?.toISOString()).toBe('2025-10-15T06:00:00.000Z');
    expect(message.messageId).toBe('<status@example.net>');
    expect(message.text).toBe('All good.');
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.from)).toBe(true);
  });

  it('uses empty values for missing headers', () => {
    const message = parseMessage(raw(['X-Other: 1', '', 'body']), { seqno: 1, size: 20 });

    expect(message.subject).toBe('');
    expect(message.from).toEqual([]);
    expect(message.date).toBeNull();
    expect(message.messageId).toBe('');
  });

  it('sets date to null when it cannot be parsed', () => {
    const message = parseMessage(raw(['Date: sometime last week', '', '']), { seqno: 1, size: 10 });
    expect(message.date).toBeNull();
  });

  it('decodes a base64 body in its charset', () => {
    const message = parseMessage(raw([
      'Content-Type: text/plain; charset=iso-8859-1',
      'Content-Transfer-Encoding: base64',
      '',
      'Q2Fm6Q==',
    ]), { seqno: 1, size: 80 });

    expect(message.text).toBe('Café');
  });

  it('prefers text/plain over text/html in multipart/alternative', () => {
    const message = parseMessage(raw([
      'Content-Type: multipart/alternative; boundary=xyz',
      '',
      'preamble',
      '--xyz',
      'Content-Type: text/html',
      '',
      '<b>hi</b>',
      '--xyz',
      'Content-Type: text/plain',
      '',
      'hi',
      '--xyz--',
    ]), { seqno: 1, size: 100 });

    expect(message.text).toBe('hi');
  });

  it('falls back to the first text part', () => {
    const message = parseMessage(raw([
      'Content-Type: multipart/mixed; boundary=xyz',
      '',
      '--xyz',
      'Content-Type: image/png',
      'Content-Transfer-Encoding: base64',
      '',
      'iVBORw0KGgo=',
      '--xyz',
      'Content-Type: text/html',
      '',
      '<p>only html</p>',
      '--xyz--',
    ]), { seqno: 1, size: 100 });

    expect(message.text).toBe('<p>only html</p>');
  });

  it('has empty text when no part is text', () => {
    const message = parseMessage(raw([
      'Content-Type: application/pdf',
      'Content-Transfer-Encoding: base64',
      '',
      'JVBERi0=',
    ]), { seqno: 1, size: 60 });

    expect(message.text).toBe('');
  });

  it('decodes 8bit octets by the part charset', () => {
    const latin1 = parseMessage(Buffer.concat([
      Buffer.from('Content-Type: text/plain; charset=iso-8859-1\r\nContent-Transfer-Encoding: 8bit\r\n\r\ncaf', 'latin1'),
      Buffer.from([0xE9])
    ]), { seqno: 1, size: 80 });
    const utf8 = parseMessage(Buffer.from('Content-Transfer-Encoding: 8bit\r\n\r\nGr\u00FC\u00DFe', 'utf8'), { seqno: 2, size: 50 });

    expect(latin1.text).toBe('caf\u00E9');
    expect(utf8.text).toBe('Gr\u00FC\u00DFe');
  });

  it('reads a string as UTF-8 text', () => {
    const message = parseMessage(raw(['Subject: Gr\u00FC\u00DFe', '', 'K\u00F6ln']), { seqno: 1, size: 30 });

    expect(message.subject).toBe('Gr\u00FC\u00DFe');
    expect(message.text).toBe('K\u00F6ln');
  });

  it('decodes quoted-printable octets with unencoded 8-bit bytes', () => {
    const message = parseMessage(Buffer.concat([
      Buffer.from('Content-Type: text/plain; charset=iso-8859-1\r\nContent-Transfer-Encoding: quoted-printable\r\n\r\n=E9t', 'latin1'),
      Buffer.from([0xE9])
    ]), { seqno: 1, size: 80 });

    expect(message.text).toBe('\u00E9t\u00E9');
  });

  it('exposes headers that cannot be changed', () => {
    const message = parseMessage(raw(['Subject: a', 'Received: x', 'Received: y', '', 'b']), { seqno: 1, size: 40 });
    const seen: string[] = [];
    message.headers.forEach((_value, name) => seen.push(name));

    expect('set' in message.headers).toBe(false);
    expect('delete' in message.headers).toBe(false);
    expect('clear' in message.headers).toBe(false);
    expect(Object.isFrozen(message.headers)).toBe(true);
    expect(Object.isFrozen(message.headers.get('received'))).toBe(true);
    expect(message.headers.size).toBe(2);
    expect([...message.headers.keys()]).toEqual(['subject', 'received']);
    expect(seen).toEqual(['subject', 'received']);
    expect(message.subject).toBe('a');
  });

  it('keeps the raw text', () => {
    const text = raw(['Subject: a', '', 'b']);
    expect(parseMessage(text, { seqno: 1, size: text.length }).raw).toBe(text);
  });
});

describe('multipart parsing', () => {
  it('splits parts and stops at the close delimiter', () => {
    const body = raw(['--b', 'one', '--b', 'two', '--b--', 'epilogue']);
    expect(splitMultipartBody(body, 'b')).toEqual(['one', 'two']);
  });

  it('returns no parts when the boundary is absent', () => {
    expect(splitMultipartBody('no delimiters here', 'b')).toEqual([]);
  });

  it('finds nested text parts', () => {
    const root = parseMimePart(raw([
      'Content-Type: multipart/mixed; boundary=outer',
      '',
      '--outer',
      'Content-Type: multipart/alternative; boundary=inner',
      '',
      '--inner',
      'Content-Type: text/plain',
      '',
      'nested',
      '--inner--',
      '--outer--',
    ]));

    expect(findTextPart(root)?.body.toString()).toBe('nested');
  });
});
