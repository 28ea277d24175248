import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

/**
 * Run all pending migrations in order and return how many were applied.
 * Each migration runs in its own transaction together with its bookkeeping row.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);

  const currentVersion = getCurrentVersion(db);
  const pending = [...migrations]
    .sort((a, b) => a.version - b.version)
    .filter(m => m.version > currentVersion);

  const record = db.prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)');
  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
  }
  return pending.length;
}

/**
 * Returns the highest applied migration version, or 0 on a fresh database.
 */
export function getCurrentVersion(db: Database.Database): number {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = '_migrations'")
    .get();
  if (!table) return 0;
  const row = db.prepare('SELECT COALESCE(MAX(version), 0) AS v FROM _migrations').get() as { v: number };
  return row.v;
}
