// ── Types ────────────────────────────────────────────────────────
export type {
  ModelProviderName, ModelCallStage, ChatMessage, ModelRequest, TokenUsage, ModelResponse,
} from './types/model.js';
export type {
  UserIdentity, UserSummary, MemoryEntry, ScoredMemory, RankOptions,
} from './types/memory.js';
export type {
  TurnRole, ConversationTurn, ShortTermMemory, MetricsMap, ConversationSession,
  SessionCheckpointEntry,
} from './types/session.js';
export { QueryIntent } from './types/turn.js';
export type { TurnUsage, TurnResult } from './types/turn.js';
export type { TraceEventType, TraceEvent, TraceSpan, TurnTrace } from './types/trace.js';
export type {
  OpenAIProviderConfig, ProvidersConfig, DatabaseConfig, MemoryConfig, LoggingConfig, LogLevel,
  InsightsConfig,
} from './types/config.js';

// ── Schemas ──────────────────────────────────────────────────────
export {
  insightsConfigSchema, providersConfigSchema, openaiProviderConfigSchema,
  databaseConfigSchema, memoryConfigSchema, loggingConfigSchema,
} from './schemas/config.schema.js';
export {
  conversationSessionSchema, conversationTurnSchema, shortTermMemorySchema,
} from './schemas/session.schema.js';

// ── Constants & utilities ────────────────────────────────────────
export { DEFAULT_CONFIG, MODEL_PRICING, SQL_ERROR_PREFIX, EXIT_KEYWORDS } from './constants.js';
export * from './utils/index.js';
