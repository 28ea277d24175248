import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

export interface DatabaseOptions {
  /** Path to the SQLite database file, or ':memory:' */
  dbPath: string;
  /** Open in read-only mode; the file must already exist */
  readonly?: boolean;
}

/**
 * Open a SQLite connection with the store pragmas applied.
 * The long-term store and the checkpoint store each get their own file,
 * so there is no process-wide singleton.
 */
export function openDatabase(options: DatabaseOptions): Database.Database {
  const { dbPath } = options;
  const readonly = options.readonly ?? false;

  if (dbPath !== ':memory:' && !readonly) {
    const dir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath, { readonly, fileMustExist: readonly });
  if (!readonly) applyPragmas(db);
  return db;
}

/**
 * Create an in-memory database with production pragmas.
 * Each call returns a fresh isolated in-memory DB.
 */
export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  applyPragmas(db);
  return db;
}

function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');       // 5 s, lets concurrent writers from other processes queue
  db.pragma('temp_store = MEMORY');
}
