/**
 * Credential Validator
 *
 * Structural checks on an address/secret pair. No network access.
 */

import type { Credentials } from '../types/session.js';
import { CredentialsFormError } from '../types/errors.js';

/** Characters that would end or split a command line on the wire */
const LINE_BREAK_OR_NUL = /[\r\n\0]/;

/**
 * Validates sign-in input and splits the address. Neither value may
 * contain CR, LF or NUL.
 *
 * @param address - Expected as localPart@domain with exactly one "@"
 * @param secret - Must not be empty
 * @returns Credentials with username (local part) and domain
 * @throws CredentialsFormError naming the rejected field
 */
export function validateCredentials(address: string, secret: string): Credentials {
  if (LINE_BREAK_OR_NUL.test(address)) {
    throw new CredentialsFormError('Address must not contain line breaks or NUL', 'address');
  }

  const parts = address.split('@');
  if (parts.length !== 2) {
    throw new CredentialsFormError('Address must contain exactly one "@"', 'address');
  }

  const [username, domain] = parts;
  if (!username) {
    throw new CredentialsFormError('Address is missing the part before "@"', 'address');
  }
  if (!domain) {
    throw new CredentialsFormError('Address is missing the domain after "@"', 'address');
  }
  if (!secret) {
    throw new CredentialsFormError('Password must not be empty', 'secret');
  }
  if (LINE_BREAK_OR_NUL.test(secret)) {
    throw new CredentialsFormError('Password must not contain line breaks or NUL', 'secret');
  }

  return { address, username, domain, secret };
}
