import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, SQL_ERROR_PREFIX } from '@insights/shared';
import { openDatabase } from '@insights/store';
import {
  DEFAULT_ROW_LIMIT,
  isSafeSelect,
  renderMarkdownTable,
  type SqlRunner,
} from './sql-runner.js';

/**
 * Runs single SELECT statements against a SQLite analytics file.
 * The file is opened read-only for each call and closed afterwards.
 */
export class SqliteSqlRunner implements SqlRunner {
  constructor(readonly dbPath: string) {}

  async run(sql: string, rowLimit: number = DEFAULT_ROW_LIMIT): Promise<string> {
    if (!isSafeSelect(sql)) {
      return `${SQL_ERROR_PREFIX} Unsafe or invalid SQL detected: ${sql}`;
    }

    const limit = Math.max(0, Math.floor(rowLimit));
    let db: ReturnType<typeof openDatabase> | undefined;
    try {
      db = openDatabase({ dbPath: this.dbPath, readonly: true });
      const stmt = db.prepare<unknown[], unknown[]>(sql);
      if (!stmt.reader) return '(no columns)';

      const columns = stmt.columns().map(c => c.name);
      const rows: unknown[][] = [];
      if (limit > 0) {
        // Integers come back as bigint so values past 2^53 render exactly
        for (const row of stmt.safeIntegers(true).raw(true).iterate()) {
          rows.push(row);
          if (rows.length >= limit) break;
        }
      }
      return renderMarkdownTable(columns, rows);
    } catch (err) {
      return `${SQL_ERROR_PREFIX} ${err instanceof Error ? err.message : String(err)}`;
    } finally {
      db?.close();
    }
  }
}

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

/**
 * Resolve a database URL to a SQLite file path.
 * Accepts sqlite:///relative, sqlite:////absolute, file: URLs and bare paths.
 */
export function resolveSqlitePath(databaseUrl: string): string {
  const url = databaseUrl.trim();
  if (!url) throw new ConfigError('Database URL must not be empty');

  if (url.startsWith('sqlite:///')) {
    const rest = url.slice('sqlite:///'.length);
    if (!rest) throw new ConfigError(`Database URL "${url}" names no file`);
    return resolve(rejectInMemory(url, rest));
  }
  if (url.startsWith('file://')) {
    return fileURLToPath(url);
  }
  if (url.startsWith('file:')) {
    return resolve(rejectInMemory(url, url.slice('file:'.length)));
  }

  const scheme = SCHEME_PATTERN.exec(url);
  if (scheme) {
    throw new ConfigError(`Unsupported database URL scheme "${scheme[1]}"; only SQLite files are supported`);
  }
  return resolve(rejectInMemory(url, url));
}

/** The analytics database is opened read-only, which SQLite refuses for in-memory databases. */
function rejectInMemory(url: string, path: string): string {
  if (path === ':memory:') {
    throw new ConfigError(`Database URL "${url}" names an in-memory database; the analytics database must be a file`);
  }
  return path;
}

export function createSqlRunner(databaseUrl: string): SqliteSqlRunner {
  return new SqliteSqlRunner(resolveSqlitePath(databaseUrl));
}
