/**
 * Base64 decoding using Node.js Buffer
 *
 * Used for RFC 2047 "B" encoded words and base64 transfer-encoded bodies.
 */

/**
 * Decodes a base64 string to a Buffer
 * 
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 */
export function base64Decode(encoded: string): Buffer {
  // Remove any whitespace (MIME base64 can have line breaks)
  const cleaned = encoded.replace(/\s/g, '');
  return Buffer.from(cleaned, 'base64');
}
