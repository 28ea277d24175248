// ── Database & Migrations ────────────────────────────────────────
export { openDatabase, createTestDatabase } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { longTermMigrations, checkpointMigrations } from './migrations/index.js';

// ── Repositories ─────────────────────────────────────────────────
export { UserRepository } from './repositories/user.repository.js';
export type { UserRow, NewUserData } from './repositories/user.repository.js';

export { MemoryRepository } from './repositories/memory.repository.js';
export type { MemoryRow } from './repositories/memory.repository.js';

export { CheckpointRepository } from './repositories/checkpoint.repository.js';
export type { CheckpointRow, CheckpointData } from './repositories/checkpoint.repository.js';

// ── Stores ───────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { openDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { longTermMigrations, checkpointMigrations } from './migrations/index.js';
import { UserRepository } from './repositories/user.repository.js';
import { MemoryRepository } from './repositories/memory.repository.js';
import { CheckpointRepository } from './repositories/checkpoint.repository.js';

export interface LongTermStore {
  db: Database.Database;
  users: UserRepository;
  memories: MemoryRepository;
  close(): void;
}

export interface CheckpointStore {
  db: Database.Database;
  checkpoints: CheckpointRepository;
  close(): void;
}

/**
 * Open the long-term store (users + memories), run migrations,
 * and return the repositories ready to use.
 *
 * @param dbPath - Path to the SQLite file, or ':memory:'.
 */
export function initializeLongTermStore(dbPath: string): LongTermStore {
  const db = openDatabase({ dbPath });
  runMigrations(db, longTermMigrations);

  return {
    db,
    users: new UserRepository(db),
    memories: new MemoryRepository(db),
    close: () => db.close(),
  };
}

/**
 * Open the short-term checkpoint store. Kept in its own file so it can be
 * discarded without touching credentials or long-term memories.
 */
export function initializeCheckpointStore(dbPath: string): CheckpointStore {
  const db = openDatabase({ dbPath });
  runMigrations(db, checkpointMigrations);

  return {
    db,
    checkpoints: new CheckpointRepository(db),
    close: () => db.close(),
  };
}
