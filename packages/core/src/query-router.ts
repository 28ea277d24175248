import { QueryIntent } from '@insights/shared';

const PREDICTIVE_TRIGGERS = [
  'suggest',
  'recommend',
  'next test',
  'predict',
  'what should we do',
  'how to improve',
  'strategy',
  'proposal',
];

const SQL_TRIGGERS = [
  'show', 'give', 'find', 'compare', 'insight', 'trend', 'top',
  'count', 'sum', 'percent', 'table', 'rows', 'columns',
];

const SQL_CLAUSE_PATTERN = /\bfrom\b|\bselect\b/;

export function isPredictive(query: string | null | undefined): boolean {
  const q = (query ?? '').toLowerCase();
  return PREDICTIVE_TRIGGERS.some(t => q.includes(t));
}

export function needsSql(query: string | null | undefined): boolean {
  const q = (query ?? '').toLowerCase();
  return SQL_TRIGGERS.some(t => q.includes(t)) || SQL_CLAUSE_PATTERN.test(q);
}

/** Predictive wins over SQL when both match. Plain substring matching. */
export function classifyIntent(query: string | null | undefined): QueryIntent {
  if (isPredictive(query)) return QueryIntent.Predictive;
  if (needsSql(query)) return QueryIntent.SqlAnalytic;
  return QueryIntent.PlainQA;
}
