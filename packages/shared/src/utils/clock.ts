import { performance } from 'node:perf_hooks';

export const MS_PER_DAY = 86_400_000;

export function monotonicNow(): number {
  return performance.now();
}

export function isoNow(): string {
  return new Date().toISOString();
}

/** Whole and fractional days from `then` to `now`, never negative. */
export function ageInDays(then: string, now: Date): number {
  const ts = Date.parse(then);
  if (Number.isNaN(ts)) return 0;
  return Math.max((now.getTime() - ts) / MS_PER_DAY, 0);
}
