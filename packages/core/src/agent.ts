import { ConfigError, type InsightsConfig } from '@insights/shared';
import { OpenAIProvider, type ModelProvider } from '@insights/models';
import {
  initializeLongTermStore,
  initializeCheckpointStore,
  type LongTermStore,
  type CheckpointStore,
} from '@insights/store';
import { ConfigManager, requireApiKey, type ConfigOverrides } from './config-manager.js';
import { CredentialStore } from './credential-store.js';
import { MemoryLedger } from './memory/ledger.js';
import { RelevanceRanker } from './memory/relevance-ranker.js';
import { ConversationOrchestrator } from './orchestrator.js';
import { SessionManager } from './session-manager.js';
import { TraceLogger, type TraceLoggerOptions } from './trace-logger.js';
import { createSqlRunner } from './sql/sqlite-runner.js';
import type { SqlRunner } from './sql/sql-runner.js';

export interface InsightsAgentOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  /** Used instead of the OpenAI provider built from config. */
  provider?: ModelProvider;
  sqlRunner?: SqlRunner;
  onTraceWriteError?: TraceLoggerOptions['onWriteError'];
}

/**
 * Wires configuration, both durable stores and the orchestrator.
 * The model provider is only built when a conversation needs it, so
 * commands that never call the model run without an API key.
 */
export class InsightsAgent {
  readonly credentials: CredentialStore;
  readonly ledger: MemoryLedger;
  readonly ranker: RelevanceRanker;
  readonly sessions: SessionManager;
  readonly tracer: TraceLogger;
  readonly sqlRunner: SqlRunner;

  private orchestrator?: ConversationOrchestrator;

  private constructor(
    readonly config: InsightsConfig,
    private longTerm: LongTermStore,
    private checkpoints: CheckpointStore,
    private options: InsightsAgentOptions,
  ) {
    const memory = config.memory;
    this.credentials = new CredentialStore(longTerm.users, memory.passwordIterations);
    this.ledger = new MemoryLedger(longTerm.memories);
    this.ranker = new RelevanceRanker(this.ledger, {
      k: memory.retrievalK,
      minScore: memory.minScore,
      candidateLimit: memory.candidateLimit,
    });
    this.sessions = new SessionManager(checkpoints.checkpoints);
    this.tracer = new TraceLogger({
      output: config.logging.traceOutput,
      traceDir: config.logging.traceDir,
      onWriteError: options.onTraceWriteError,
      logLevel: config.logging.level,
    });
    this.sqlRunner = options.sqlRunner ?? createSqlRunner(config.database.url);
  }

  static async create(options: InsightsAgentOptions = {}): Promise<InsightsAgent> {
    const manager = new ConfigManager();
    await manager.load({ configPath: options.configPath });
    if (options.overrides) {
      manager.set(options.overrides);
    }
    const config = manager.getAll();

    const longTerm = initializeLongTermStore(config.memory.longTermDbPath);
    let checkpoints: CheckpointStore;
    try {
      checkpoints = initializeCheckpointStore(config.memory.checkpointPath);
    } catch (err) {
      longTerm.close();
      throw err;
    }
    return new InsightsAgent(config, longTerm, checkpoints, options);
  }

  /**
   * Builds the provider on first use. Throws ConfigError without an API key
   * or when the provider reports itself unavailable.
   */
  async getOrchestrator(): Promise<ConversationOrchestrator> {
    if (!this.orchestrator) {
      const openai = this.config.providers.openai;
      const provider = this.options.provider ?? new OpenAIProvider({
        apiKey: requireApiKey(this.config),
        baseUrl: openai.baseUrl,
      });
      if (!(await provider.isAvailable())) {
        throw new ConfigError(`Model provider "${provider.name}" is not available`);
      }
      this.orchestrator = new ConversationOrchestrator(
        {
          provider,
          sqlRunner: this.sqlRunner,
          ranker: this.ranker,
          ledger: this.ledger,
          tracer: this.tracer,
        },
        {
          model: openai.model,
          temperature: openai.temperature,
          maxTokens: openai.maxTokens,
          recentTurns: this.config.memory.recentTurns,
          retrievalK: this.config.memory.retrievalK,
          minScore: this.config.memory.minScore,
          candidateLimit: this.config.memory.candidateLimit,
          rowLimit: this.config.database.rowLimit,
        },
      );
    }
    return this.orchestrator;
  }

  shutdown(): void {
    this.checkpoints.close();
    this.longTerm.close();
  }
}
