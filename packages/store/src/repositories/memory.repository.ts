import type Database from 'better-sqlite3';
import type { MemoryEntry } from '@insights/shared';

export interface MemoryRow {
  id: number;
  user_id: number;
  created_at: string;
  text: string;
}

export class MemoryRepository {
  private insertStmt: Database.Statement;
  private getStmt: Database.Statement;
  private recentStmt: Database.Statement;
  private countStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare(
      'INSERT INTO memories (user_id, created_at, text) VALUES (?, ?, ?)',
    );
    this.getStmt = db.prepare('SELECT * FROM memories WHERE id = ?');
    // id breaks ties between entries written within the same millisecond
    this.recentStmt = db.prepare(`
      SELECT * FROM memories
      WHERE user_id = ?
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `);
    this.countStmt = db.prepare('SELECT COUNT(*) AS c FROM memories WHERE user_id = ?');
  }

  insert(ownerId: number, text: string, createdAt: string): MemoryEntry {
    const result = this.insertStmt.run(ownerId, createdAt, text);
    return {
      id: Number(result.lastInsertRowid),
      ownerId,
      createdAt,
      text,
    };
  }

  getById(id: number): MemoryEntry | null {
    const row = this.getStmt.get(id) as MemoryRow | undefined;
    return row ? toMemoryEntry(row) : null;
  }

  /** Newest first, at most `limit` rows. */
  recentForOwner(ownerId: number, limit: number): MemoryEntry[] {
    const bounded = Math.max(0, Math.floor(limit));
    const rows = this.recentStmt.all(ownerId, bounded) as MemoryRow[];
    return rows.map(toMemoryEntry);
  }

  countForOwner(ownerId: number): number {
    return (this.countStmt.get(ownerId) as { c: number }).c;
  }
}

function toMemoryEntry(row: MemoryRow): MemoryEntry {
  return {
    id: row.id,
    ownerId: row.user_id,
    createdAt: row.created_at,
    text: row.text,
  };
}
