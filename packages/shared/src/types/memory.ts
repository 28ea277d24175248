// ── Credentials ──────────────────────────────────────────────────

export interface UserIdentity {
  id: number;
  username: string;
  /** base64-encoded random salt */
  passwordSalt: string;
  /** base64-encoded PBKDF2 digest */
  passwordHash: string;
  createdAt: string;
}

export interface UserSummary {
  id: number;
  username: string;
  createdAt: string;
}

// ── Long-term memory ─────────────────────────────────────────────

export interface MemoryEntry {
  id: number;
  ownerId: number;
  createdAt: string;
  text: string;
}

export interface ScoredMemory {
  id: number;
  text: string;
  createdAt: string;
  /** lexical score plus recency bonus, used for ordering */
  score: number;
  /** token overlap (+ phrase bonus) alone; this is what minScore gates */
  lexicalScore: number;
}

export interface RankOptions {
  k?: number;
  minScore?: number;
  candidateLimit?: number;
  now?: Date;
}
