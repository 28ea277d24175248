import { describe, it, expect } from 'vitest';
import { mergeMetrics, parseMetrics, stripCodeFences } from '../src/metrics.js';

describe('stripCodeFences', () => {
  it('unwraps a fenced block with a language tag', () => {
    expect(stripCodeFences('```sql\nSELECT 1\n```')).toBe('SELECT 1');
    expect(stripCodeFences('  ```\n{"a": 1}\n```  ')).toBe('{"a": 1}');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFences('  SELECT 1 ')).toBe('SELECT 1');
  });
});

describe('parseMetrics', () => {
  it('parses a flat object of numbers', () => {
    expect(parseMetrics('{"pass_rate": 0.82}')).toEqual({ ok: true, metrics: { pass_rate: 0.82 }, rejected: [] });
  });

  it('accepts numeric strings and fenced replies', () => {
    expect(parseMetrics('```json\n{"a": 1, "b": "2.5"}\n```')).toEqual({
      ok: true,
      metrics: { a: 1, b: 2.5 },
      rejected: [],
    });
  });

  it('treats an empty reply as no metrics', () => {
    expect(parseMetrics('  ')).toEqual({ ok: true, metrics: {}, rejected: [] });
  });

  it('rejects non-numeric values per key', () => {
    expect(parseMetrics('{"a": true, "b": "n/a", "c": 3, "d": null, "e": ""}')).toEqual({
      ok: true,
      metrics: { c: 3 },
      rejected: ['a', 'b', 'd', 'e'],
    });
  });

  it('reports invalid JSON without throwing', () => {
    const result = parseMetrics('pass rate is about 82%');
    expect(result.ok).toBe(false);
  });

  it('reports a non-object reply', () => {
    expect(parseMetrics('[1, 2]')).toEqual({ ok: false, reason: 'expected a JSON object of metric values' });
    expect(parseMetrics('null')).toEqual({ ok: false, reason: 'expected a JSON object of metric values' });
  });
});

describe('mergeMetrics', () => {
  it('overwrites existing keys with later values', () => {
    expect(mergeMetrics({ a: 1, b: 2 }, { b: 3, c: 4 })).toEqual({ a: 1, b: 3, c: 4 });
  });

  it('does not mutate its inputs', () => {
    const current = { a: 1 };
    mergeMetrics(current, { a: 2 });
    expect(current).toEqual({ a: 1 });
  });
});
