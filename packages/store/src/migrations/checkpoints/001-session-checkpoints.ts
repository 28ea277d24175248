import type { Migration } from '../../migrations.js';

export const migration001SessionCheckpoints: Migration = {
  version: 1,
  name: 'session-checkpoints',
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS session_checkpoints (
        key        TEXT PRIMARY KEY,
        user_id    INTEGER,
        payload    TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_ckpt_updated ON session_checkpoints(updated_at)');
  },
};
