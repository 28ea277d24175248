import { describe, it, expect } from 'vitest';
import { getModelCost, estimateModelCost } from '../src/pricing.js';

describe('Pricing', () => {
  it('calculates cost for known model', () => {
    const cost = getModelCost('gpt-4o', { promptTokens: 1_000_000, completionTokens: 1_000_000, totalTokens: 2_000_000 });
    // gpt-4o: input=$2.50/M, output=$10.00/M
    expect(cost).toBeCloseTo(12.50, 2);
  });

  it('prices the default model', () => {
    const cost = getModelCost('gpt-4o-mini', { promptTokens: 2_000, completionTokens: 1_000, totalTokens: 3_000 });
    // (2000 * 0.15 + 1000 * 0.60) / 1M
    expect(cost).toBeCloseTo(0.0009, 8);
  });

  it('returns 0 cost for unknown model', () => {
    const cost = getModelCost('unknown-model', { promptTokens: 1000, completionTokens: 500, totalTokens: 1500 });
    expect(cost).toBe(0);
  });

  it('estimates cost for prompt tokens', () => {
    const est = estimateModelCost('gpt-4o', 1000);
    expect(est).toBeCloseTo(0.0125, 6);
  });
});
