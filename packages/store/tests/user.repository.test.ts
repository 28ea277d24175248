import { describe, it, expect, beforeEach } from 'vitest';
import { UserRepository } from '../src/repositories/user.repository.js';
import { freshDb, sampleUser } from './helpers.js';
import type Database from 'better-sqlite3';

let db: Database.Database;
let repo: UserRepository;

beforeEach(() => {
  db = freshDb();
  repo = new UserRepository(db);
});

describe('UserRepository', () => {
  it('inserts and retrieves a user by id', () => {
    const id = repo.insert(sampleUser());
    const loaded = repo.getById(id);

    expect(loaded).toEqual({ id, ...sampleUser() });
  });

  it('retrieves a user by username', () => {
    const id = repo.insert(sampleUser('dana'));
    expect(repo.getByUsername('dana')?.id).toBe(id);
  });

  it('assigns increasing integer ids', () => {
    const first = repo.insert(sampleUser('a'));
    const second = repo.insert(sampleUser('b'));
    expect(second).toBeGreaterThan(first);
  });

  it('returns null for unknown users', () => {
    expect(repo.getById(999)).toBeNull();
    expect(repo.getByUsername('nobody')).toBeNull();
  });

  it('rejects a duplicate username', () => {
    repo.insert(sampleUser('dana'));
    expect(() => repo.insert(sampleUser('dana'))).toThrow(/UNIQUE/);
  });

  it('lists users in id order without credentials', () => {
    repo.insert(sampleUser('a'));
    repo.insert(sampleUser('b'));

    const all = repo.list();
    expect(all.map(u => u.username)).toEqual(['a', 'b']);
    expect(Object.keys(all[0]).sort()).toEqual(['createdAt', 'id', 'username']);
  });
});
