import { ValidationError, type ConversationSession, type ConversationTurn } from '@insights/shared';

export const DEFAULT_RECENT_TURNS = 6;

export function createSession(userId: number | null = null): ConversationSession {
  return {
    userId,
    shortTermMemory: { olderSummary: '', recentTurns: [] },
    metrics: {},
  };
}

/**
 * Append a user/assistant exchange and keep only the newest `cap` turns.
 * Evicted turns are discarded; they are never folded into `olderSummary`.
 */
export function appendTurn(
  session: ConversationSession,
  userText: string,
  assistantText: string,
  cap: number = DEFAULT_RECENT_TURNS,
): ConversationSession {
  if (!Number.isInteger(cap) || cap < 0) {
    throw new ValidationError(`Window cap must be a non-negative integer, got ${cap}`);
  }

  const turns: ConversationTurn[] = [
    ...session.shortTermMemory.recentTurns,
    { role: 'user', content: userText },
    { role: 'assistant', content: assistantText },
  ];

  return {
    ...session,
    shortTermMemory: {
      olderSummary: session.shortTermMemory.olderSummary,
      recentTurns: turns.slice(Math.max(0, turns.length - cap)),
    },
  };
}

/** Summaries are supplied by the caller; nothing here computes one. */
export function setOlderSummary(session: ConversationSession, summary: string): ConversationSession {
  return {
    ...session,
    shortTermMemory: { ...session.shortTermMemory, olderSummary: summary },
  };
}
