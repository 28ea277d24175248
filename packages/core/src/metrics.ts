import { z } from 'zod';
import type { MetricsMap } from '@insights/shared';

export type MetricParseResult =
  | { ok: true; metrics: Record<string, number>; rejected: string[] }
  | { ok: false; reason: string };

const metricObjectSchema = z.record(z.string(), z.unknown());

const FENCE_PATTERN = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;

/** Remove a single surrounding markdown code fence, if present. */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

function toMetricValue(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Parse a model reply expected to be a flat JSON object of numbers.
 * Never throws: malformed replies come back as `{ ok: false }` and
 * non-numeric values are listed in `rejected`.
 */
export function parseMetrics(reply: string): MetricParseResult {
  const body = stripCodeFences(reply);
  if (!body) return { ok: true, metrics: {}, rejected: [] };

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const result = metricObjectSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, reason: 'expected a JSON object of metric values' };
  }

  const metrics: Record<string, number> = {};
  const rejected: string[] = [];
  for (const [key, value] of Object.entries(result.data)) {
    const n = toMetricValue(value);
    if (n === null) rejected.push(key);
    else metrics[key] = n;
  }
  return { ok: true, metrics, rejected };
}

/** Later values overwrite earlier ones under the same key. */
export function mergeMetrics(current: MetricsMap, incoming: MetricsMap): MetricsMap {
  return { ...current, ...incoming };
}
