import { z } from 'zod';

export const conversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export const shortTermMemorySchema = z.object({
  olderSummary: z.string().default(''),
  recentTurns: z.array(conversationTurnSchema).default([]),
});

export const conversationSessionSchema = z.object({
  userId: z.number().int().nullable(),
  shortTermMemory: shortTermMemorySchema,
  metrics: z.record(z.string(), z.number()),
});
