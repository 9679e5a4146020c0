import { describe, it, expect } from 'vitest';
import { createSnapshot, isConsistent, markStale } from '../../src/session/snapshot.js';
import { makeMessages } from '../helpers/fake-transport.js';

describe('mailbox snapshots', () => {
  it('freezes a copy of the message list', () => {
    const messages = makeMessages(2);
    const refreshedAt = new Date('2025-10-14T09:30:00Z');

    const snapshot = createSnapshot(2, messages, refreshedAt);
    messages.pop();

    expect(snapshot).toMatchObject({ messageCount: 2, refreshedAt, stale: false });
    expect(snapshot.messages).toHaveLength(2);
    expect(Object.isFrozen(snapshot.messages)).toBe(true);
  });

  it('marks a copy stale and leaves the original untouched', () => {
    const snapshot = createSnapshot(1, makeMessages(1));

    const stale = markStale(snapshot);

    expect(stale.stale).toBe(true);
    expect(snapshot.stale).toBe(false);
    expect(stale.messages).toBe(snapshot.messages);
    expect(markStale(stale)).toBe(stale);
  });

  it('compares the count with the list', () => {
    expect(isConsistent(createSnapshot(2, makeMessages(2)))).toBe(true);
    expect(isConsistent(createSnapshot(3, makeMessages(2)))).toBe(false);
  });
});
