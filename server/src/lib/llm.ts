import type { LlmConfig } from '../config.js';
import {
  AnthropicProvider,
  OllamaProvider,
  OpenAICompatibleProvider,
  type CompletionProvider,
} from './llm-provider.js';

/** Provider for the configured `LLM_PROVIDER`. */
export function createCompletionProvider(config: LlmConfig): CompletionProvider {
  const options = {
    baseUrl: config.endpointUrl,
    model: config.modelId,
    apiKey: config.apiKey,
    timeoutMs: config.requestTimeoutMs,
  };

  switch (config.provider) {
    case 'openai':
      return new OpenAICompatibleProvider(options);
    case 'ollama':
      return new OllamaProvider(options);
    case 'anthropic':
      return new AnthropicProvider(options);
  }
}
