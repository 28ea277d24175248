import type {
  ConversationTurn,
  MetricsMap,
  ScoredMemory,
  SessionCheckpointEntry,
  TurnUsage,
  UserSummary,
} from '@insights/shared';

export function formatCost(usd: number): string {
  return `$${usd.toFixed(4)}`;
}

export function formatUsage(usage: TurnUsage): string {
  const calls = usage.modelCalls === 1 ? '1 model call' : `${usage.modelCalls} model calls`;
  return `  [${formatCost(usage.costUsd)} | ${usage.totalTokens} tokens | ${calls}]`;
}

export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? flat.slice(0, max) + '...' : flat;
}

export function formatMetrics(metrics: MetricsMap): string {
  const names = Object.keys(metrics).sort();
  if (names.length === 0) return 'No metrics yet.';
  const width = Math.max(...names.map(n => n.length));
  return names.map(name => `  ${name.padEnd(width)}  ${metrics[name]}`).join('\n');
}

export function formatHistory(summary: string, turns: readonly ConversationTurn[]): string {
  const lines: string[] = [];
  if (summary) {
    lines.push(`  [Summary] ${truncate(summary, 120)}`);
  }
  for (const turn of turns) {
    const prefix = turn.role === 'user' ? 'You' : 'Assistant';
    lines.push(`  [${prefix}] ${truncate(turn.content, 120)}`);
  }
  return lines.length > 0 ? lines.join('\n') : 'No turns in this session.';
}

export function formatMemoryHits(hits: readonly ScoredMemory[]): string {
  if (hits.length === 0) return 'No relevant memories.';
  return hits
    .map(hit => `  ${hit.score.toFixed(3)}  ${hit.createdAt}  ${truncate(hit.text, 100)}`)
    .join('\n');
}

export function formatUsers(users: readonly UserSummary[]): string {
  if (users.length === 0) return 'No users found.';
  const lines = [`${'ID'.padEnd(6)} ${'Username'.padEnd(20)} Created`, '-'.repeat(60)];
  for (const user of users) {
    lines.push(`${String(user.id).padEnd(6)} ${user.username.padEnd(20)} ${user.createdAt}`);
  }
  return lines.join('\n');
}

export function formatCheckpoints(entries: readonly SessionCheckpointEntry[]): string {
  if (entries.length === 0) return 'No saved sessions.';
  return entries
    .map(e => `  ${e.key} | ${e.turnCount} turns | ${e.metricCount} metrics | ${e.updatedAt}`)
    .join('\n');
}

/** Replaces every character of a secret but the last four. */
export function maskSecret(secret: string | undefined): string | undefined {
  if (secret === undefined) return undefined;
  if (secret.length <= 4) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}
