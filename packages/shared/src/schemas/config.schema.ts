import { z } from 'zod';

export const openaiProviderConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0),
  maxTokens: z.number().int().positive().default(2000),
  baseUrl: z.string().url().optional(),
});

export const providersConfigSchema = z.object({
  openai: openaiProviderConfigSchema.default({}),
});

export const databaseConfigSchema = z.object({
  url: z.string().min(1).default('sqlite:///./local.db'),
  rowLimit: z.number().int().min(1).max(10_000).default(200),
});

export const memoryConfigSchema = z.object({
  longTermDbPath: z.string().min(1).default('./long_term_memory.sqlite'),
  checkpointPath: z.string().min(1).default('./short_term_checkpoints.sqlite'),
  recentTurns: z.number().int().min(0).default(6),
  retrievalK: z.number().int().min(0).default(5),
  minScore: z.number().min(0).default(0.15),
  candidateLimit: z.number().int().min(1).default(300),
  passwordIterations: z.number().int().min(100_000).default(200_000),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  traceOutput: z.enum(['memory', 'file', 'both']).default('memory'),
  traceDir: z.string().optional(),
});

export const insightsConfigSchema = z.object({
  providers: providersConfigSchema.default({}),
  database: databaseConfigSchema.default({}),
  memory: memoryConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
