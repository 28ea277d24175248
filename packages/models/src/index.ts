export { ModelProvider } from './provider.js';
export { getModelCost, estimateModelCost } from './pricing.js';
export { OpenAIProvider } from './providers/openai.js';
export type { OpenAIProviderOptions } from './providers/openai.js';
