import type { ChatMessage, ConversationTurn, MetricsMap, ScoredMemory } from '@insights/shared';

export const SQL_GENERATION_PROMPT = `You are a SQL expert.

Task:
- Translate the user's question into one valid SELECT-only SQL query.
- If the user mentions a table, query that table.
- If the columns are unknown, sample the table first: SELECT * FROM <table> LIMIT 20.
- Always include a LIMIT of at most 200.
- Return only the SQL, with no explanation and no code fences.`;

export const EXPLANATION_PROMPT = `You are an analytics explanation expert.

You may be given:
- conversation context (long-term memories, an earlier summary, the latest turns)
- the user's question
- an executed SQL query and its results as a markdown table
- structured metrics collected so far

Rules:
- Answer the user's question directly.
- If the answer is already in the conversation, reuse it and say so.
- If the results show an SQL_ERROR, explain what failed and propose the next query to try.
- Keep it clear: one short paragraph, then bullets when they help.`;

export const METRIC_EXTRACTION_PROMPT = `You extract numeric metrics from a markdown table.

Return ONLY a JSON object:
- keys: snake_case metric names
- values: numbers

If nothing can be extracted, return {}.`;

export const PREDICTIVE_PROMPT = `You are a senior experimentation strategist.

Using the conversation context, the known metrics and any table insights, provide:
1) 3 to 6 actionable recommendations for the next tests
2) what to monitor, and the guardrails
3) risks and caveats
4) one example SELECT-only follow-up query the analyst should run next

Be concrete and tie each recommendation to observed numbers when available.`;

export function formatMetrics(metrics: MetricsMap): string {
  return JSON.stringify(metrics);
}

/**
 * Context handed to every model call that sees the conversation:
 * long-term hits, then the caller's summary, then the recent turns.
 */
export function buildContextMessages(
  hits: readonly ScoredMemory[],
  olderSummary: string,
  recentTurns: readonly ConversationTurn[],
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (hits.length > 0) {
    const lines = hits.map(h => `- (score=${h.score.toFixed(3)}) ${h.text}`);
    messages.push({ role: 'system', content: `Relevant long-term memories:\n${lines.join('\n')}` });
  }
  if (olderSummary) {
    messages.push({ role: 'system', content: `Earlier summary:\n${olderSummary}` });
  }
  for (const turn of recentTurns) {
    messages.push({ role: turn.role, content: turn.content });
  }
  return messages;
}

export function predictiveQuestion(query: string, metrics: MetricsMap): string {
  return `User question:\n${query}\n\nKnown metrics:\n${formatMetrics(metrics)}`;
}

export function sqlGenerationQuestion(query: string): string {
  return `User question:\n${query}\n\nReturn ONLY a SELECT SQL query.`;
}

export function metricExtractionInput(sqlResults: string): string {
  return `SQL results (markdown):\n${sqlResults}`;
}

export function explanationQuestion(query: string, sql: string, sqlResults: string, metrics: MetricsMap): string {
  return [
    `User question:\n${query}`,
    `SQL executed:\n${sql}`,
    `SQL results:\n${sqlResults}`,
    `Known structured metrics:\n${formatMetrics(metrics)}`,
  ].join('\n\n');
}

export function plainQuestion(query: string, metrics: MetricsMap): string {
  return `User question:\n${query}\n\nKnown structured metrics:\n${formatMetrics(metrics)}`;
}
