/**
 * Read-only statement runner. Failures come back as text prefixed with
 * SQL_ERROR: so callers can hand them to the explanation step.
 */
export interface SqlRunner {
  run(sql: string, rowLimit?: number): Promise<string>;
}

export const DEFAULT_ROW_LIMIT = 200;

const BANNED_KEYWORDS = [
  'insert', 'update', 'delete', 'drop', 'alter',
  'truncate', 'create', 'merge', 'grant', 'revoke',
];

const BANNED_PATTERN = new RegExp(`\\b(?:${BANNED_KEYWORDS.join('|')})\\b`);

export function isSafeSelect(sql: string): boolean {
  const s = sql.trim().toLowerCase();
  if (!s.startsWith('select')) return false;
  return !BANNED_PATTERN.test(s);
}

type Cell = unknown;

export function formatCell(value: Cell): string {
  if (value === null || value === undefined) return '';
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return String(value);
}

/** Render column names and rows as a markdown table. */
export function renderMarkdownTable(columns: readonly string[], rows: readonly (readonly Cell[])[]): string {
  if (columns.length === 0) return '(no columns)';

  const header = `| ${columns.join(' | ')} |`;
  const separator = `| ${columns.map(() => '---').join(' | ')} |`;
  const body = rows.map(row => `| ${row.map(formatCell).join(' | ')} |`);
  if (body.length === 0) {
    const placeholder = ['(no rows)', ...columns.slice(1).map(() => '')];
    body.push(`| ${placeholder.join(' | ')} |`);
  }
  return [header, separator, ...body].join('\n');
}
