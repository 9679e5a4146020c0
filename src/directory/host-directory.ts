/**
 * Host Directory
 *
 * Static mapping from mail domain to POP3 server address, loaded once at
 * startup and read-only afterwards.
 *
 * @packageDocumentation
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { HostNotFoundError, StartupFatalError } from '../types/errors.js';

/**
 * Shape of a host table: non-empty domain → non-empty host
 */
export const hostTableSchema = z.record(
  z.string().trim().min(1, 'domain must not be empty'),
  z.string().trim().min(1, 'host must not be empty')
);

export type HostTable = z.infer<typeof hostTableSchema>;

/**
 * Parses Java-style .properties text into a table.
 * Separators are "=", ":" or whitespace; "#" and "!" start comment lines.
 * Later keys override earlier ones.
 *
 * @param text - File content
 * @returns Key/value pairs
 */
export function parseHostProperties(text: string): Record<string, string> {
  const table: Record<string, string> = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith('!')) continue;

    const separator = line.search(/[=:\s]/);
    if (separator === -1) {
      table[line] = '';
      continue;
    }

    const key = line.substring(0, separator).trim();
    // "key = value": skip whitespace, then at most one = or :
    const value = line.substring(separator).replace(/^\s*[=:]?\s*/, '');
    table[key] = value.trim();
  }

  return table;
}

/**
 * Read-only domain → host lookup
 */
export class HostDirectory {
  private readonly hosts: ReadonlyMap<string, string>;

  private constructor(hosts: Map<string, string>) {
    this.hosts = hosts;
  }

  /**
   * Builds a directory from an in-memory table
   *
   * @param table - Domain to host mapping
   * @throws ZodError if a domain or host is empty
   */
  static fromEntries(table: Record<string, string>): HostDirectory {
    const parsed = hostTableSchema.parse(table);
    return new HostDirectory(new Map(Object.entries(parsed)));
  }

  /**
   * Resolves a mail domain to its server address. Exact match only.
   *
   * @param domain - Domain part of an address
   * @returns Server address
   * @throws HostNotFoundError if the domain is not listed
   */
  resolve(domain: string): string {
    const host = this.hosts.get(domain);
    if (host === undefined) {
      throw new HostNotFoundError(domain);
    }
    return host;
  }

  /**
   * Whether the domain is listed
   */
  has(domain: string): boolean {
    return this.hosts.has(domain);
  }

  /**
   * Listed domains in file order
   */
  domains(): string[] {
    return [...this.hosts.keys()];
  }

  /**
   * Number of listed domains
   */
  get size(): number {
    return this.hosts.size;
  }
}

/**
 * Loads the host directory file. `.json` files hold a flat object; anything
 * else is read as .properties.
 *
 * @param file - Path of the host file
 * @returns Loaded directory
 * @throws StartupFatalError if the file cannot be read or is invalid
 */
export async function loadHostDirectory(file: string): Promise<HostDirectory> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StartupFatalError(`Cannot load host directory ${file}: ${reason}`, file, err);
  }

  let table: unknown;
  if (path.extname(file).toLowerCase() === '.json') {
    try {
      table = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new StartupFatalError(`Host directory ${file} is not valid JSON: ${reason}`, file, err);
    }
  } else {
    table = parseHostProperties(text);
  }

  const result = hostTableSchema.safeParse(table);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StartupFatalError(`Host directory ${file} is invalid: ${issues}`, file, result.error);
  }

  return HostDirectory.fromEntries(result.data);
}
