export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

export interface ShortTermMemory {
  /** Set by the caller; never filled from evicted turns. */
  olderSummary: string;
  recentTurns: readonly ConversationTurn[];
}

export type MetricsMap = Readonly<Record<string, number>>;

export interface ConversationSession {
  userId: number | null;
  shortTermMemory: ShortTermMemory;
  metrics: MetricsMap;
}

export interface SessionCheckpointEntry {
  key: string;
  updatedAt: string;
  turnCount: number;
  metricCount: number;
}
