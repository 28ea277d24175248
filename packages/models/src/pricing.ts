import { MODEL_PRICING, type TokenUsage } from '@insights/shared';

/** USD cost of a completed call. Unknown models cost 0. */
export function getModelCost(model: string, usage: TokenUsage): number {
  const pricing = MODEL_PRICING[model];
  if (!pricing) return 0;
  return (
    (usage.promptTokens * pricing.inputPerMillion +
      usage.completionTokens * pricing.outputPerMillion) /
    1_000_000
  );
}

/** Rough upper bound before a call, assuming output as long as the prompt. */
export function estimateModelCost(model: string, promptTokens: number): number {
  const pricing = MODEL_PRICING[model];
  if (!pricing) return 0;
  return (promptTokens * (pricing.inputPerMillion + pricing.outputPerMillion)) / 1_000_000;
}
