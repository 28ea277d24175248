import { describe, it, expect, beforeEach } from 'vitest';
import { CheckpointRepository } from '../src/repositories/checkpoint.repository.js';
import { freshCheckpointDb } from './helpers.js';

let repo: CheckpointRepository;

beforeEach(() => {
  repo = new CheckpointRepository(freshCheckpointDb());
});

describe('CheckpointRepository', () => {
  it('saves and loads a checkpoint', () => {
    repo.save({ key: 'user:1', userId: 1, payload: '{"a":1}', updatedAt: '2024-01-01T00:00:00.000Z' });
    expect(repo.load('user:1')).toEqual({
      key: 'user:1',
      userId: 1,
      payload: '{"a":1}',
      updatedAt: '2024-01-01T00:00:00.000Z',
    });
  });

  it('overwrites an existing key', () => {
    repo.save({ key: 'user:1', userId: 1, payload: 'old', updatedAt: '2024-01-01T00:00:00.000Z' });
    repo.save({ key: 'user:1', userId: 1, payload: 'new', updatedAt: '2024-01-02T00:00:00.000Z' });

    expect(repo.load('user:1')?.payload).toBe('new');
    expect(repo.list()).toHaveLength(1);
  });

  it('stores anonymous checkpoints with a null user', () => {
    repo.save({ key: 'anonymous', userId: null, payload: '{}', updatedAt: '2024-01-01T00:00:00.000Z' });
    expect(repo.load('anonymous')?.userId).toBeNull();
  });

  it('lists most recently updated first', () => {
    repo.save({ key: 'a', userId: null, payload: '{}', updatedAt: '2024-01-01T00:00:00.000Z' });
    repo.save({ key: 'b', userId: null, payload: '{}', updatedAt: '2024-01-03T00:00:00.000Z' });
    repo.save({ key: 'c', userId: null, payload: '{}', updatedAt: '2024-01-02T00:00:00.000Z' });

    expect(repo.list().map(c => c.key)).toEqual(['b', 'c', 'a']);
  });

  it('deletes a checkpoint', () => {
    repo.save({ key: 'a', userId: null, payload: '{}', updatedAt: '2024-01-01T00:00:00.000Z' });
    expect(repo.delete('a')).toBe(true);
    expect(repo.delete('a')).toBe(false);
    expect(repo.load('a')).toBeNull();
  });
});
