import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  generateId,
  isLevelEnabled,
  monotonicNow,
  isoNow,
  type LoggingConfig,
  type LogLevel,
  type ModelResponse,
  type ModelCallStage,
  type QueryIntent,
  type TraceEvent,
  type TraceSpan,
  type TraceEventType,
  type TurnTrace,
  type TurnUsage,
} from '@insights/shared';

export const DEFAULT_TRACE_DIR = '.insights/traces';

export interface TraceLoggerOptions {
  output?: LoggingConfig['traceOutput'];
  traceDir?: string;
  /** Called when a trace file cannot be written. The turn itself still succeeds. */
  onWriteError?: (error: Error, traceId: string) => void;
  /** Write failures are reported only when `warn` is enabled under this level. */
  logLevel?: LogLevel;
}

export class TraceLogger {
  private traces = new Map<string, TraceState>();
  private lastTrace?: TurnTrace;
  private output: LoggingConfig['traceOutput'];
  private traceDir: string;
  private onWriteError: (error: Error, traceId: string) => void;
  private logLevel: LogLevel;

  constructor(options: TraceLoggerOptions = {}) {
    this.output = options.output ?? 'memory';
    this.traceDir = options.traceDir ?? DEFAULT_TRACE_DIR;
    this.logLevel = options.logLevel ?? 'info';
    this.onWriteError = options.onWriteError ?? ((error, traceId) => {
      process.emitWarning(`Could not write trace ${traceId}: ${error.message}`);
    });
  }

  createTrace(traceId: string, query: string): void {
    this.traces.set(traceId, {
      traceId,
      query,
      startedAt: isoNow(),
      startTime: monotonicNow(),
      spans: [],
      events: [],
      spanStack: [],
    });
  }

  setIntent(traceId: string, intent: QueryIntent): void {
    this.getState(traceId).intent = intent;
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const state = this.getState(traceId);
    const spanId = generateId('span');
    const parentSpanId = state.spanStack.length > 0
      ? state.spanStack[state.spanStack.length - 1]
      : undefined;

    const span: TraceSpan = {
      id: spanId,
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    if (parentSpanId) {
      const parent = this.findSpan(state.spans, parentSpanId);
      parent?.children.push(span);
    } else {
      state.spans.push(span);
    }

    state.spanStack.push(spanId);

    if (data) {
      this.logEvent(traceId, 'info', data, spanId);
    }
    return spanId;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.getState(traceId);
    const span = this.findSpan(state.spans, spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx !== -1) {
      state.spanStack.splice(idx, 1);
    }
  }

  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    parentSpanId?: string,
  ): void {
    const state = this.getState(traceId);
    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: parentSpanId ?? state.spanStack[state.spanStack.length - 1],
      type,
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    const span = event.parentSpanId ? this.findSpan(state.spans, event.parentSpanId) : undefined;
    if (span) {
      span.events.push(event);
    } else {
      state.events.push(event);
    }
  }

  logModelCall(traceId: string, stage: ModelCallStage, response: ModelResponse): void {
    this.logEvent(traceId, 'model_call', {
      stage,
      model: response.model,
      provider: response.provider,
      promptTokens: response.tokenUsage.promptTokens,
      completionTokens: response.tokenUsage.completionTokens,
      totalTokens: response.tokenUsage.totalTokens,
      latencyMs: response.latencyMs,
      costUsd: response.costUsd,
      finishReason: response.finishReason,
    });
  }

  logRoutingDecision(traceId: string, decision: Record<string, unknown>): void {
    this.logEvent(traceId, 'routing_decision', decision);
  }

  /**
   * Close the trace, write it out when file output is on, and
   * return it. The trace is also kept as the last completed one.
   */
  getTrace(traceId: string, usage: TurnUsage): TurnTrace {
    const state = this.getState(traceId);
    const trace: TurnTrace = {
      traceId: state.traceId,
      query: state.query,
      intent: state.intent,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: monotonicNow() - state.startTime,
      usage,
      spans: state.spans,
      events: state.events,
    };

    if (this.output === 'file' || this.output === 'both') {
      this.writeTrace(trace);
    }

    this.traces.delete(traceId);
    this.lastTrace = trace;
    return trace;
  }

  getLastTrace(): TurnTrace | undefined {
    return this.lastTrace;
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  private writeTrace(trace: TurnTrace): void {
    try {
      mkdirSync(this.traceDir, { recursive: true });
      writeFileSync(join(this.traceDir, `${trace.traceId}.json`), JSON.stringify(trace, null, 2), 'utf-8');
    } catch (err) {
      if (!isLevelEnabled(this.logLevel, 'warn')) return;
      this.onWriteError(err instanceof Error ? err : new Error(String(err)), trace.traceId);
    }
  }

  private getState(traceId: string): TraceState {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);
    return state;
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}

interface TraceState {
  traceId: string;
  query: string;
  intent?: QueryIntent;
  startedAt: string;
  startTime: number;
  spans: TraceSpan[];
  events: TraceEvent[];
  spanStack: string[];
}

/** One line per span with its duration, children indented. */
export function summarizeTrace(trace: TurnTrace): string {
  const lines = [`trace ${trace.traceId} (${trace.intent ?? 'unrouted'}) ${Math.round(trace.totalDurationMs ?? 0)}ms`];
  const walk = (spans: TraceSpan[], depth: number): void => {
    for (const span of spans) {
      const ms = span.endTime !== undefined ? Math.round(span.endTime - span.startTime) : 0;
      lines.push(`${'  '.repeat(depth + 1)}${span.name} ${ms}ms, ${span.events.length} event(s)`);
      walk(span.children, depth + 1);
    }
  };
  walk(trace.spans, 0);
  return lines.join('\n');
}
