import { describe, it, expect, beforeEach } from 'vitest';
import { initializeCheckpointStore, type CheckpointStore } from '@insights/store';
import { SessionManager } from '../src/session-manager.js';
import { appendTurn, createSession } from '../src/short-term-window.js';

let store: CheckpointStore;
let sessions: SessionManager;

beforeEach(() => {
  store = initializeCheckpointStore(':memory:');
  sessions = new SessionManager(store.checkpoints);
});

describe('SessionManager', () => {
  it('derives keys from the user id', () => {
    expect(SessionManager.keyFor(42)).toBe('user:42');
    expect(SessionManager.keyFor(null)).toBe('anonymous');
  });

  it('saves and loads a session', () => {
    const session = { ...appendTurn(createSession(3), 'q1', 'a1'), metrics: { pass_rate: 0.82 } };
    sessions.save('user:3', session);

    expect(sessions.load('user:3')).toEqual(session);
  });

  it('returns null for an unknown key', () => {
    expect(sessions.load('user:404')).toBeNull();
  });

  it('returns null for a corrupt or malformed checkpoint', () => {
    store.checkpoints.save({ key: 'bad-json', userId: null, payload: '{oops', updatedAt: '2024-01-01T00:00:00.000Z' });
    store.checkpoints.save({ key: 'bad-shape', userId: null, payload: '{"userId":"x"}', updatedAt: '2024-01-01T00:00:00.000Z' });

    expect(sessions.load('bad-json')).toBeNull();
    expect(sessions.load('bad-shape')).toBeNull();
  });

  it('lists readable checkpoints with their sizes', () => {
    sessions.save('user:1', { ...appendTurn(createSession(1), 'q', 'a'), metrics: { x: 1, y: 2 } });
    store.checkpoints.save({ key: 'bad-json', userId: null, payload: '{oops', updatedAt: '2024-01-01T00:00:00.000Z' });

    const entries = sessions.list();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ key: 'user:1', turnCount: 2, metricCount: 2 });
  });

  it('deletes a checkpoint', () => {
    sessions.save('anonymous', createSession(null));
    expect(sessions.delete('anonymous')).toBe(true);
    expect(sessions.load('anonymous')).toBeNull();
  });
});
