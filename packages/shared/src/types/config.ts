export interface OpenAIProviderConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  baseUrl?: string;
}

export interface ProvidersConfig {
  openai: OpenAIProviderConfig;
}

export interface DatabaseConfig {
  /** Analytics database queried by generated SQL, e.g. sqlite:///./local.db */
  url: string;
  rowLimit: number;
}

export interface MemoryConfig {
  longTermDbPath: string;
  checkpointPath: string;
  recentTurns: number;
  retrievalK: number;
  minScore: number;
  candidateLimit: number;
  passwordIterations: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  level: LogLevel;
  traceOutput: 'memory' | 'file' | 'both';
  traceDir?: string;
}

export interface InsightsConfig {
  providers: ProvidersConfig;
  database: DatabaseConfig;
  memory: MemoryConfig;
  logging: LoggingConfig;
}
