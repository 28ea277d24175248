import type {
  ModelRequest,
  ModelResponse,
  ModelProviderName,
} from '@insights/shared';

/**
 * A chat-completion backend. The orchestrator only ever calls `chat`;
 * tests substitute a scripted subclass.
 */
export abstract class ModelProvider {
  abstract readonly name: ModelProviderName;

  abstract isAvailable(): Promise<boolean>;
  abstract chat(request: ModelRequest): Promise<ModelResponse>;
}
