export { InsightsAgent } from './agent.js';
export type { InsightsAgentOptions } from './agent.js';
export { ConfigManager, requireApiKey, CONFIG_FILE_NAMES } from './config-manager.js';
export type { ConfigOverrides } from './config-manager.js';
export { CredentialStore, DEFAULT_PASSWORD_ITERATIONS } from './credential-store.js';
export { MemoryLedger, DEFAULT_CANDIDATE_LIMIT } from './memory/ledger.js';
export {
  RelevanceRanker,
  tokenize,
  lexicalScore,
  recencyBonus,
  rankCandidates,
  DEFAULT_RANK_K,
  DEFAULT_MIN_SCORE,
} from './memory/relevance-ranker.js';
export type { RankerDefaults } from './memory/relevance-ranker.js';
export { createSession, appendTurn, setOlderSummary, DEFAULT_RECENT_TURNS } from './short-term-window.js';
export { classifyIntent, isPredictive, needsSql } from './query-router.js';
export { isSafeSelect, renderMarkdownTable, formatCell, DEFAULT_ROW_LIMIT } from './sql/sql-runner.js';
export type { SqlRunner } from './sql/sql-runner.js';
export { SqliteSqlRunner, createSqlRunner, resolveSqlitePath } from './sql/sqlite-runner.js';
export { parseMetrics, mergeMetrics, stripCodeFences } from './metrics.js';
export type { MetricParseResult } from './metrics.js';
export {
  ConversationOrchestrator,
  DEFAULT_ORCHESTRATOR_OPTIONS,
} from './orchestrator.js';
export type { OrchestratorOptions, OrchestratorDeps } from './orchestrator.js';
export { SessionManager, ANONYMOUS_SESSION_KEY } from './session-manager.js';
export { TraceLogger, summarizeTrace, DEFAULT_TRACE_DIR } from './trace-logger.js';
export type { TraceLoggerOptions } from './trace-logger.js';
