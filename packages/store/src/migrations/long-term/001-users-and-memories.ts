import type { Migration } from '../../migrations.js';

export const migration001UsersAndMemories: Migration = {
  version: 1,
  name: 'users-and-memories',
  up(db) {
    // ── Users ────────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        username      TEXT NOT NULL UNIQUE,
        password_salt TEXT NOT NULL,
        password_hash TEXT NOT NULL,
        created_at    TEXT NOT NULL
      )
    `);

    // ── Memories (append-only) ───────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id    INTEGER NOT NULL REFERENCES users(id),
        created_at TEXT NOT NULL,
        text       TEXT NOT NULL CHECK (length(trim(text)) > 0)
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_mem_user_ts ON memories(user_id, created_at)');
  },
};
