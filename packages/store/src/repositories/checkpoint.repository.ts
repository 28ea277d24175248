import type Database from 'better-sqlite3';

export interface CheckpointRow {
  key: string;
  user_id: number | null;
  payload: string;
  updated_at: string;
}

export interface CheckpointData {
  key: string;
  userId: number | null;
  /** JSON-serialized session */
  payload: string;
  updatedAt: string;
}

export class CheckpointRepository {
  private upsertStmt: Database.Statement;
  private getStmt: Database.Statement;
  private deleteStmt: Database.Statement;
  private listStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.upsertStmt = db.prepare(`
      INSERT OR REPLACE INTO session_checkpoints (key, user_id, payload, updated_at)
      VALUES (@key, @user_id, @payload, @updated_at)
    `);
    this.getStmt = db.prepare('SELECT * FROM session_checkpoints WHERE key = ?');
    this.deleteStmt = db.prepare('DELETE FROM session_checkpoints WHERE key = ?');
    this.listStmt = db.prepare('SELECT * FROM session_checkpoints ORDER BY updated_at DESC');
  }

  save(checkpoint: CheckpointData): void {
    this.upsertStmt.run({
      key: checkpoint.key,
      user_id: checkpoint.userId,
      payload: checkpoint.payload,
      updated_at: checkpoint.updatedAt,
    });
  }

  load(key: string): CheckpointData | null {
    const row = this.getStmt.get(key) as CheckpointRow | undefined;
    return row ? toCheckpointData(row) : null;
  }

  delete(key: string): boolean {
    return this.deleteStmt.run(key).changes > 0;
  }

  list(): CheckpointData[] {
    const rows = this.listStmt.all() as CheckpointRow[];
    return rows.map(toCheckpointData);
  }
}

function toCheckpointData(row: CheckpointRow): CheckpointData {
  return {
    key: row.key,
    userId: row.user_id,
    payload: row.payload,
    updatedAt: row.updated_at,
  };
}
