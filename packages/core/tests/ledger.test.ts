import { describe, it, expect, beforeEach } from 'vitest';
import type { LongTermStore } from '@insights/store';
import { MemoryLedger } from '../src/memory/ledger.js';
import { memoryStore } from './helpers.js';

let store: LongTermStore;
let ownerId: number;

beforeEach(() => {
  store = memoryStore();
  ownerId = store.users.insert({
    username: 'dana',
    passwordSalt: 'salt',
    passwordHash: 'hash',
    createdAt: '2024-01-01T00:00:00.000Z',
  });
});

describe('MemoryLedger', () => {
  it('returns appended text with a timestamp no earlier than the call', () => {
    const ledger = new MemoryLedger(store.memories);
    const before = Date.now();

    ledger.append(ownerId, 'pass rate was 82%');

    const [entry] = ledger.fetchRecentCandidates(ownerId);
    expect(entry.text).toBe('pass rate was 82%');
    expect(Date.parse(entry.createdAt)).toBeGreaterThanOrEqual(before);
  });

  it('drops blank text', () => {
    const ledger = new MemoryLedger(store.memories);
    expect(ledger.append(ownerId, '   \n ')).toBeNull();
    expect(ledger.count(ownerId)).toBe(0);
  });

  it('stores text trimmed', () => {
    const ledger = new MemoryLedger(store.memories);
    expect(ledger.append(ownerId, '  note  ')?.text).toBe('note');
  });

  it('stamps entries with the injected clock', () => {
    const ledger = new MemoryLedger(store.memories, () => new Date('2024-05-01T12:00:00.000Z'));
    expect(ledger.append(ownerId, 'x')?.createdAt).toBe('2024-05-01T12:00:00.000Z');
  });

  it('fetches newest first up to the limit', () => {
    let tick = 0;
    const ledger = new MemoryLedger(store.memories, () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)));
    ledger.append(ownerId, 'one');
    ledger.append(ownerId, 'two');
    ledger.append(ownerId, 'three');

    expect(ledger.fetchRecentCandidates(ownerId, 2).map(e => e.text)).toEqual(['three', 'two']);
    expect(ledger.count(ownerId)).toBe(3);
  });

  it('propagates storage errors for an unknown owner', () => {
    const ledger = new MemoryLedger(store.memories);
    expect(() => ledger.append(9999, 'orphan')).toThrow();
  });
});
