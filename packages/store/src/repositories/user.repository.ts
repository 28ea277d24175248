import type Database from 'better-sqlite3';
import type { UserIdentity, UserSummary } from '@insights/shared';

// ── Row types ────────────────────────────────────────────────────

export interface UserRow {
  id: number;
  username: string;
  password_salt: string;
  password_hash: string;
  created_at: string;
}

export type NewUserData = Omit<UserIdentity, 'id'>;

// ── Repository ──────────────────────────────────────────────────

export class UserRepository {
  private insertUserStmt: Database.Statement;
  private getUserStmt: Database.Statement;
  private getUserByNameStmt: Database.Statement;
  private listUsersStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.insertUserStmt = db.prepare(`
      INSERT INTO users (username, password_salt, password_hash, created_at)
      VALUES (@username, @password_salt, @password_hash, @created_at)
    `);
    this.getUserStmt = db.prepare('SELECT * FROM users WHERE id = ?');
    this.getUserByNameStmt = db.prepare('SELECT * FROM users WHERE username = ?');
    this.listUsersStmt = db.prepare('SELECT id, username, created_at FROM users ORDER BY id ASC');
  }

  /**
   * Insert a new identity and return its id.
   * A taken username surfaces as the SQLite UNIQUE constraint error.
   */
  insert(user: NewUserData): number {
    const result = this.insertUserStmt.run({
      username: user.username,
      password_salt: user.passwordSalt,
      password_hash: user.passwordHash,
      created_at: user.createdAt,
    });
    return Number(result.lastInsertRowid);
  }

  getById(id: number): UserIdentity | null {
    const row = this.getUserStmt.get(id) as UserRow | undefined;
    return row ? toUserIdentity(row) : null;
  }

  getByUsername(username: string): UserIdentity | null {
    const row = this.getUserByNameStmt.get(username) as UserRow | undefined;
    return row ? toUserIdentity(row) : null;
  }

  list(): UserSummary[] {
    const rows = this.listUsersStmt.all() as Array<Pick<UserRow, 'id' | 'username' | 'created_at'>>;
    return rows.map(r => ({ id: r.id, username: r.username, createdAt: r.created_at }));
  }
}

function toUserIdentity(row: UserRow): UserIdentity {
  return {
    id: row.id,
    username: row.username,
    passwordSalt: row.password_salt,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}
