import {
  QueryIntent,
  SQL_ERROR_PREFIX,
  ValidationError,
  generateId,
  type ChatMessage,
  type ConversationSession,
  type MetricsMap,
  type ModelCallStage,
  type ModelRequest,
  type ModelResponse,
  type ScoredMemory,
  type TurnResult,
  type TurnTrace,
  type TurnUsage,
} from '@insights/shared';
import type { ModelProvider } from '@insights/models';
import type { MemoryLedger } from './memory/ledger.js';
import { DEFAULT_CANDIDATE_LIMIT } from './memory/ledger.js';
import { DEFAULT_MIN_SCORE, DEFAULT_RANK_K, type RelevanceRanker } from './memory/relevance-ranker.js';
import { DEFAULT_RECENT_TURNS, appendTurn } from './short-term-window.js';
import { classifyIntent } from './query-router.js';
import { DEFAULT_ROW_LIMIT, type SqlRunner } from './sql/sql-runner.js';
import { mergeMetrics, parseMetrics, stripCodeFences } from './metrics.js';
import { TraceLogger } from './trace-logger.js';
import {
  EXPLANATION_PROMPT,
  METRIC_EXTRACTION_PROMPT,
  PREDICTIVE_PROMPT,
  SQL_GENERATION_PROMPT,
  buildContextMessages,
  explanationQuestion,
  metricExtractionInput,
  plainQuestion,
  predictiveQuestion,
  sqlGenerationQuestion,
} from './prompts.js';

export interface OrchestratorOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  recentTurns: number;
  retrievalK: number;
  minScore: number;
  candidateLimit: number;
  rowLimit: number;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  model: 'gpt-4o-mini',
  temperature: 0,
  maxTokens: 2000,
  recentTurns: DEFAULT_RECENT_TURNS,
  retrievalK: DEFAULT_RANK_K,
  minScore: DEFAULT_MIN_SCORE,
  candidateLimit: DEFAULT_CANDIDATE_LIMIT,
  rowLimit: DEFAULT_ROW_LIMIT,
};

export interface OrchestratorDeps {
  provider: ModelProvider;
  sqlRunner: SqlRunner;
  ranker: RelevanceRanker;
  ledger: MemoryLedger;
  tracer?: TraceLogger;
}

interface BranchOutcome {
  answer: string;
  metrics: MetricsMap;
  sql?: string;
  sqlResults?: string;
}

interface TurnContext {
  traceId: string;
  query: string;
  session: ConversationSession;
  context: ChatMessage[];
  usage: TurnUsage;
  progress: TurnProgress;
}

interface TurnProgress {
  /** Model stage whose call threw, if any. */
  failedStage?: ModelCallStage;
}

/**
 * Runs one query through context assembly, the routed branch and the
 * memory commit. The caller's session is never mutated; the updated
 * session comes back in the result.
 */
export class ConversationOrchestrator {
  private provider: ModelProvider;
  private sqlRunner: SqlRunner;
  private ranker: RelevanceRanker;
  private ledger: MemoryLedger;
  readonly tracer: TraceLogger;
  readonly options: OrchestratorOptions;

  constructor(deps: OrchestratorDeps, options: Partial<OrchestratorOptions> = {}) {
    this.provider = deps.provider;
    this.sqlRunner = deps.sqlRunner;
    this.ranker = deps.ranker;
    this.ledger = deps.ledger;
    this.tracer = deps.tracer ?? new TraceLogger();
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
  }

  async handle(session: ConversationSession, query: string): Promise<TurnResult> {
    const question = query.trim();
    if (!question) {
      throw new ValidationError('Query must not be blank');
    }

    const traceId = generateId('turn');
    const usage: TurnUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0, costUsd: 0, modelCalls: 0 };
    const progress: TurnProgress = {};
    this.tracer.createTrace(traceId, question);

    try {
      const intent = classifyIntent(question);
      this.tracer.setIntent(traceId, intent);
      this.tracer.logRoutingDecision(traceId, { intent, userId: session.userId });

      const { hits, context } = this.withSpan(traceId, 'context_assembly', () => this.assembleContext(traceId, session, question));
      const turn: TurnContext = { traceId, query: question, session, context, usage, progress };

      const outcome = await this.runBranch(intent, turn);

      const next = this.withSpan(traceId, 'memory_commit', () => this.commit(turn, outcome));

      return {
        answer: outcome.answer,
        session: next,
        intent,
        ...(outcome.sql !== undefined ? { sql: outcome.sql } : {}),
        ...(outcome.sqlResults !== undefined ? { sqlResults: outcome.sqlResults } : {}),
        memoryHits: hits,
        usage: { ...usage },
        traceId,
      };
    } catch (err) {
      this.tracer.logEvent(traceId, 'error', {
        name: err instanceof Error ? err.name : 'Error',
        message: err instanceof Error ? err.message : String(err),
        ...(progress.failedStage ? { stage: progress.failedStage } : {}),
      });
      throw err;
    } finally {
      this.tracer.getTrace(traceId, { ...usage });
    }
  }

  /** Trace of the most recent turn, successful or not. */
  lastTrace(): TurnTrace | undefined {
    return this.tracer.getLastTrace();
  }

  // ── States ─────────────────────────────────────────────────────

  private assembleContext(
    traceId: string,
    session: ConversationSession,
    query: string,
  ): { hits: ScoredMemory[]; context: ChatMessage[] } {
    const hits = session.userId !== null
      ? this.ranker.rank(session.userId, query, {
          k: this.options.retrievalK,
          minScore: this.options.minScore,
          candidateLimit: this.options.candidateLimit,
        })
      : [];

    this.tracer.logEvent(traceId, 'memory_hits', {
      count: hits.length,
      scores: hits.map(h => Number(h.score.toFixed(3))),
    });

    const memory = session.shortTermMemory;
    return { hits, context: buildContextMessages(hits, memory.olderSummary, memory.recentTurns) };
  }

  private runBranch(intent: QueryIntent, turn: TurnContext): Promise<BranchOutcome> {
    switch (intent) {
      case QueryIntent.Predictive:
        return this.withSpanAsync(turn.traceId, 'predictive_branch', () => this.predictiveBranch(turn));
      case QueryIntent.SqlAnalytic:
        return this.withSpanAsync(turn.traceId, 'sql_branch', () => this.sqlBranch(turn));
      case QueryIntent.PlainQA:
        return this.withSpanAsync(turn.traceId, 'plain_qa_branch', () => this.plainQaBranch(turn));
    }
  }

  private async predictiveBranch(turn: TurnContext): Promise<BranchOutcome> {
    const answer = await this.callModel(turn, 'predictive', PREDICTIVE_PROMPT, [
      ...turn.context,
      { role: 'user', content: predictiveQuestion(turn.query, turn.session.metrics) },
    ]);
    return { answer, metrics: turn.session.metrics };
  }

  private async sqlBranch(turn: TurnContext): Promise<BranchOutcome> {
    const reply = await this.callModel(turn, 'sql_generation', SQL_GENERATION_PROMPT, [
      ...turn.context,
      { role: 'user', content: sqlGenerationQuestion(turn.query) },
    ]);
    const sql = stripCodeFences(reply);

    const sqlResults = await this.sqlRunner.run(sql, this.options.rowLimit);
    this.tracer.logEvent(turn.traceId, 'sql_execution', {
      sql,
      rowLimit: this.options.rowLimit,
      error: sqlResults.startsWith(SQL_ERROR_PREFIX),
    });

    const metricReply = await this.callModel(turn, 'metric_extraction', METRIC_EXTRACTION_PROMPT, [
      { role: 'user', content: metricExtractionInput(sqlResults) },
    ], 'json');
    let metrics = turn.session.metrics;
    const parsed = parseMetrics(metricReply);
    if (parsed.ok) {
      metrics = mergeMetrics(metrics, parsed.metrics);
      this.tracer.logEvent(turn.traceId, 'metrics_extracted', {
        keys: Object.keys(parsed.metrics),
        rejected: parsed.rejected,
      });
    } else {
      this.tracer.logEvent(turn.traceId, 'metrics_parse_failure', { reason: parsed.reason });
    }

    const answer = await this.callModel(turn, 'explanation', EXPLANATION_PROMPT, [
      ...turn.context,
      { role: 'user', content: explanationQuestion(turn.query, sql, sqlResults, metrics) },
    ]);
    return { answer, metrics, sql, sqlResults };
  }

  private async plainQaBranch(turn: TurnContext): Promise<BranchOutcome> {
    const answer = await this.callModel(turn, 'qa', EXPLANATION_PROMPT, [
      ...turn.context,
      { role: 'user', content: plainQuestion(turn.query, turn.session.metrics) },
    ]);
    return { answer, metrics: turn.session.metrics };
  }

  private commit(turn: TurnContext, outcome: BranchOutcome): ConversationSession {
    const windowed = appendTurn(turn.session, turn.query, outcome.answer, this.options.recentTurns);
    const next: ConversationSession = { ...windowed, metrics: outcome.metrics };

    let memoryId: number | null = null;
    if (turn.session.userId !== null) {
      const record = outcome.sql !== undefined
        ? `User: ${turn.query}\nSQL: ${outcome.sql}\nResult: ${outcome.sqlResults ?? ''}\nAssistant: ${outcome.answer}`
        : `User: ${turn.query}\nAssistant: ${outcome.answer}`;
      memoryId = this.ledger.append(turn.session.userId, record)?.id ?? null;
    }

    this.tracer.logEvent(turn.traceId, 'memory_commit', {
      recentTurns: next.shortTermMemory.recentTurns.length,
      memoryId,
    });
    return next;
  }

  // ── Helpers ────────────────────────────────────────────────────

  private async callModel(
    turn: TurnContext,
    stage: ModelCallStage,
    system: string,
    messages: ChatMessage[],
    responseFormat: ModelRequest['responseFormat'] = 'text',
  ): Promise<string> {
    let response: ModelResponse;
    try {
      response = await this.provider.chat({
        model: this.options.model,
        provider: this.provider.name,
        system,
        messages,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        responseFormat,
      });
    } catch (err) {
      // Provider errors reach the caller as thrown; the trace keeps the stage
      turn.progress.failedStage = stage;
      throw err;
    }

    turn.usage.promptTokens += response.tokenUsage.promptTokens;
    turn.usage.completionTokens += response.tokenUsage.completionTokens;
    turn.usage.totalTokens += response.tokenUsage.totalTokens;
    turn.usage.costUsd += response.costUsd;
    turn.usage.modelCalls += 1;
    this.tracer.logModelCall(turn.traceId, stage, response);

    return response.content.trim();
  }

  private withSpan<T>(traceId: string, name: string, fn: () => T): T {
    const spanId = this.tracer.startSpan(traceId, name);
    try {
      return fn();
    } finally {
      this.tracer.endSpan(traceId, spanId);
    }
  }

  private async withSpanAsync<T>(traceId: string, name: string, fn: () => Promise<T>): Promise<T> {
    const spanId = this.tracer.startSpan(traceId, name);
    try {
      return await fn();
    } finally {
      this.tracer.endSpan(traceId, spanId);
    }
  }
}
