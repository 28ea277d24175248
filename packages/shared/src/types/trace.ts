import type { QueryIntent, TurnUsage } from './turn.js';

export type TraceEventType =
  | 'routing_decision'
  | 'memory_hits'
  | 'model_call'
  | 'sql_execution'
  | 'metrics_extracted'
  | 'metrics_parse_failure'
  | 'memory_commit'
  | 'error'
  | 'info';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  timestamp: number;
  wallClock: string;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface TurnTrace {
  traceId: string;
  query: string;
  intent?: QueryIntent;
  startedAt: string;
  completedAt?: string;
  totalDurationMs?: number;
  usage: TurnUsage;
  spans: TraceSpan[];
  /** Events logged while no span was open. */
  events: TraceEvent[];
}
