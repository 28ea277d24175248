import type { InsightsConfig } from './types/config.js';

/** Prefix of every failure string produced by the SQL runner. */
export const SQL_ERROR_PREFIX = 'SQL_ERROR:';

export const EXIT_KEYWORDS: ReadonlySet<string> = new Set(['exit', 'quit', 'q']);

export const MODEL_PRICING: Record<string, { inputPerMillion: number; outputPerMillion: number }> = {
  'gpt-4o-mini': { inputPerMillion: 0.15, outputPerMillion: 0.60 },
  'gpt-4o': { inputPerMillion: 2.50, outputPerMillion: 10.00 },
  'gpt-4.1-mini': { inputPerMillion: 0.40, outputPerMillion: 1.60 },
  'gpt-4.1': { inputPerMillion: 2.00, outputPerMillion: 8.00 },
};

export const DEFAULT_CONFIG: InsightsConfig = {
  providers: {
    openai: {
      model: 'gpt-4o-mini',
      temperature: 0,
      maxTokens: 2000,
    },
  },
  database: {
    url: 'sqlite:///./local.db',
    rowLimit: 200,
  },
  memory: {
    longTermDbPath: './long_term_memory.sqlite',
    checkpointPath: './short_term_checkpoints.sqlite',
    recentTurns: 6,
    retrievalK: 5,
    minScore: 0.15,
    candidateLimit: 300,
    passwordIterations: 200_000,
  },
  logging: {
    level: 'info',
    traceOutput: 'memory',
  },
};
