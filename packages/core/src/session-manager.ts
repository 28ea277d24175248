import {
  conversationSessionSchema,
  isoNow,
  type ConversationSession,
  type SessionCheckpointEntry,
} from '@insights/shared';
import type { CheckpointRepository } from '@insights/store';

export const ANONYMOUS_SESSION_KEY = 'anonymous';

/**
 * Checkpoints of the short-term session in the second durable store,
 * so an interactive chat can pick up where it left off.
 */
export class SessionManager {
  constructor(private repo: CheckpointRepository) {}

  static keyFor(userId: number | null): string {
    return userId === null ? ANONYMOUS_SESSION_KEY : `user:${userId}`;
  }

  save(key: string, session: ConversationSession): void {
    this.repo.save({
      key,
      userId: session.userId,
      payload: JSON.stringify(session),
      updatedAt: isoNow(),
    });
  }

  /** The stored session, or null when missing or unreadable. */
  load(key: string): ConversationSession | null {
    const data = this.repo.load(key);
    if (!data) return null;
    return decodeSession(data.payload);
  }

  delete(key: string): boolean {
    return this.repo.delete(key);
  }

  list(): SessionCheckpointEntry[] {
    const entries: SessionCheckpointEntry[] = [];
    for (const data of this.repo.list()) {
      const session = decodeSession(data.payload);
      // Skip corrupt checkpoints
      if (!session) continue;
      entries.push({
        key: data.key,
        updatedAt: data.updatedAt,
        turnCount: session.shortTermMemory.recentTurns.length,
        metricCount: Object.keys(session.metrics).length,
      });
    }
    return entries;
  }
}

function decodeSession(payload: string): ConversationSession | null {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return null;
  }
  const result = conversationSessionSchema.safeParse(raw);
  return result.success ? result.data : null;
}
