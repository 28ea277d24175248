import type { ScoredMemory } from './memory.js';
import type { ConversationSession } from './session.js';

export enum QueryIntent {
  Predictive = 'predictive',
  SqlAnalytic = 'sql_analytic',
  PlainQA = 'plain_qa',
}

export interface TurnUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  costUsd: number;
  modelCalls: number;
}

export interface TurnResult {
  answer: string;
  session: ConversationSession;
  intent: QueryIntent;
  /** Present on the SQL path only. */
  sql?: string;
  sqlResults?: string;
  memoryHits: ScoredMemory[];
  usage: TurnUsage;
  traceId: string;
}
