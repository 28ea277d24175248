import { createTestDatabase } from '../src/database.js';
import { runMigrations } from '../src/migrations.js';
import { longTermMigrations, checkpointMigrations } from '../src/migrations/index.js';
import type Database from 'better-sqlite3';

/** Fresh in-memory long-term database (users + memories). */
export function freshDb(): Database.Database {
  const db = createTestDatabase();
  runMigrations(db, longTermMigrations);
  return db;
}

/** Fresh in-memory checkpoint database. */
export function freshCheckpointDb(): Database.Database {
  const db = createTestDatabase();
  runMigrations(db, checkpointMigrations);
  return db;
}

export function sampleUser(username = 'analyst') {
  return {
    username,
    passwordSalt: 'c2FsdHNhbHRzYWx0c2FsdA==',
    passwordHash: 'aGFzaGhhc2hoYXNoaGFzaGhhc2hoYXNoaGFzaGhhc2g=',
    createdAt: '2024-01-01T00:00:00.000Z',
  };
}
