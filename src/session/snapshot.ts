/**
 * Mailbox Snapshot
 *
 * Snapshots are frozen; the session swaps whole snapshots, never edits one.
 */

import type { Message } from '../types/message.js';
import type { MailboxSnapshot } from '../types/session.js';

/**
 * Builds a snapshot from a completed refresh
 *
 * @param messageCount - Count reported by the server
 * @param messages - Messages in server order
 * @param refreshedAt - Completion time
 */
export function createSnapshot(
  messageCount: number,
  messages: readonly Message[],
  refreshedAt: Date = new Date()
): MailboxSnapshot {
  return Object.freeze({
    messageCount,
    messages: Object.freeze([...messages]),
    refreshedAt,
    stale: false,
  });
}

/**
 * Copy of a snapshot flagged as no longer matching the server
 */
export function markStale(snapshot: MailboxSnapshot): MailboxSnapshot {
  if (snapshot.stale) return snapshot;
  return Object.freeze({ ...snapshot, stale: true });
}

/**
 * Whether the message list agrees with the reported count
 */
export function isConsistent(snapshot: MailboxSnapshot): boolean {
  return snapshot.messages.length === snapshot.messageCount;
}
