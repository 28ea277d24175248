import OpenAI from 'openai';
import {
  monotonicNow,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
} from '@insights/shared';
import { getModelCost } from '../pricing.js';
import { ModelProvider } from '../provider.js';

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseUrl?: string;
}

export class OpenAIProvider extends ModelProvider {
  readonly name: ModelProviderName = 'openai';

  private client: OpenAI;
  private hasKey: boolean;

  constructor(config: OpenAIProviderOptions) {
    super();
    this.hasKey = Boolean(config.apiKey);
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
  }

  async isAvailable(): Promise<boolean> {
    return this.hasKey;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const msg of request.messages) {
      messages.push(toOpenAIMessage(msg));
    }

    const response = await this.client.chat.completions.create({
      model: request.model,
      messages,
      max_tokens: request.maxTokens ?? 2000,
      temperature: request.temperature ?? 0,
      ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
    });

    const latencyMs = monotonicNow() - startTime;
    const choice = response.choices[0];
    const tokenUsage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    return {
      model: request.model,
      provider: 'openai',
      content: (choice?.message?.content ?? '').trim(),
      tokenUsage,
      latencyMs,
      costUsd: getModelCost(request.model, tokenUsage),
      finishReason: toFinishReason(choice?.finish_reason),
    };
  }
}

function toOpenAIMessage(msg: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
  }
}

function toFinishReason(reason: string | null | undefined): ModelResponse['finishReason'] {
  if (reason === 'stop') return 'stop';
  if (reason === 'length') return 'length';
  return 'error';
}
