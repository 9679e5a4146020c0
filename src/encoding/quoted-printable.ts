/**
 * Quoted-Printable decoding
 * 
 * Implements RFC 2045 quoted-printable decoding for retrieved message
 * bodies and RFC 2047 "Q" encoded words.
 */

/**
 * Decodes a quoted-printable string to a Buffer
 * 
 * Unencoded 8-bit characters are taken as UTF-8 text, or as single
 * octets when `octets` is set (input read one character per octet).
 *
 * @param encoded - The quoted-printable encoded string
 * @param octets - Input holds one character per octet
 * @returns Decoded Buffer
 */
export function quotedPrintableDecode(encoded: string, octets = false): Buffer {
  const bytes: number[] = [];
  let i = 0;

  while (i < encoded.length) {
    const char = encoded[i];

    if (char === '=') {
      // Soft line break (=\r\n or =\n), possibly after trailing whitespace
      const rest = encoded.slice(i + 1).match(/^[ \t]*(\r\n|\n)/);
      if (rest) {
        i += 1 + rest[0].length;
        continue;
      }

      // Decode hex sequence =XX
      const hex = encoded.substring(i + 1, i + 3);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 3;
      } else {
        // Invalid sequence, keep the '=' as literal
        bytes.push(0x3D);
        i++;
      }
    } else if (char === '\r' && encoded[i + 1] === '\n') {
      bytes.push(0x0D, 0x0A);
      i += 2;
    } else if (char === '\n') {
      // Bare LF (normalize to CRLF)
      bytes.push(0x0D, 0x0A);
      i++;
    } else {
      const code = char.charCodeAt(0);
      if (code < 0x80 || (octets && code <= 0xFF)) {
        bytes.push(code);
        i++;
      } else {
        // Raw 8-bit text that slipped through unencoded
        const point = encoded.codePointAt(i) ?? code;
        const utf8 = Buffer.from(String.fromCodePoint(point), 'utf-8');
        bytes.push(...utf8);
        i += point > 0xFFFF ? 2 : 1;
      }
    }
  }

  return Buffer.from(bytes);
}

/**
 * Decodes a quoted-printable string to a UTF-8 string
 * 
 * @param encoded - The quoted-printable encoded string
 * @returns Decoded UTF-8 string
 */
export function quotedPrintableDecodeToString(encoded: string): string {
  return quotedPrintableDecode(encoded).toString('utf-8');
}
