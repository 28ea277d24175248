import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryRepository } from '../src/repositories/memory.repository.js';
import { UserRepository } from '../src/repositories/user.repository.js';
import { freshDb, sampleUser } from './helpers.js';
import type Database from 'better-sqlite3';

let db: Database.Database;
let repo: MemoryRepository;
let ownerId: number;

beforeEach(() => {
  db = freshDb();
  repo = new MemoryRepository(db);
  ownerId = new UserRepository(db).insert(sampleUser());
});

describe('MemoryRepository', () => {
  it('inserts and reads back an entry', () => {
    const entry = repo.insert(ownerId, 'pass rate was 82%', '2024-03-01T10:00:00.000Z');

    expect(repo.getById(entry.id)).toEqual({
      id: entry.id,
      ownerId,
      createdAt: '2024-03-01T10:00:00.000Z',
      text: 'pass rate was 82%',
    });
  });

  it('returns recent entries newest first and honours the limit', () => {
    repo.insert(ownerId, 'first', '2024-03-01T10:00:00.000Z');
    repo.insert(ownerId, 'third', '2024-03-03T10:00:00.000Z');
    repo.insert(ownerId, 'second', '2024-03-02T10:00:00.000Z');

    expect(repo.recentForOwner(ownerId, 10).map(e => e.text)).toEqual(['third', 'second', 'first']);
    expect(repo.recentForOwner(ownerId, 2).map(e => e.text)).toEqual(['third', 'second']);
  });

  it('breaks timestamp ties by insertion order, newest first', () => {
    const at = '2024-03-01T10:00:00.000Z';
    repo.insert(ownerId, 'older', at);
    repo.insert(ownerId, 'newer', at);

    expect(repo.recentForOwner(ownerId, 10).map(e => e.text)).toEqual(['newer', 'older']);
  });

  it('keeps owners apart', () => {
    const otherId = new UserRepository(db).insert(sampleUser('other'));
    repo.insert(ownerId, 'mine', '2024-03-01T10:00:00.000Z');
    repo.insert(otherId, 'theirs', '2024-03-01T10:00:00.000Z');

    expect(repo.recentForOwner(ownerId, 10).map(e => e.text)).toEqual(['mine']);
    expect(repo.countForOwner(otherId)).toBe(1);
  });

  it('allows duplicate text', () => {
    repo.insert(ownerId, 'same', '2024-03-01T10:00:00.000Z');
    repo.insert(ownerId, 'same', '2024-03-01T10:00:01.000Z');
    expect(repo.countForOwner(ownerId)).toBe(2);
  });

  it('rejects entries for an unknown owner', () => {
    expect(() => repo.insert(4242, 'orphan', '2024-03-01T10:00:00.000Z')).toThrow(/FOREIGN KEY/);
  });

  it('rejects blank text at the storage layer', () => {
    expect(() => repo.insert(ownerId, '   ', '2024-03-01T10:00:00.000Z')).toThrow(/CHECK/);
  });

  it('treats a zero limit as no rows', () => {
    repo.insert(ownerId, 'x', '2024-03-01T10:00:00.000Z');
    expect(repo.recentForOwner(ownerId, 0)).toEqual([]);
  });
});
