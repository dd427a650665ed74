import type { LlmConfig } from '../config';
import { isUsableApiKey } from '../config';
import type { CompletionStrategy } from './strategy';
import { AnthropicStrategy } from './anthropic';
import { GroqStrategy } from './groq';
import { MockCompletionStrategy } from './mock';

/**
 * Pick the completion strategy once, at startup.
 * Without a usable key the whole process runs in mock mode.
 */
export function createCompletionStrategy(config: LlmConfig): CompletionStrategy {
  if (!isUsableApiKey(config.apiKey)) {
    console.warn(`[CompletionClient] No valid API key for ${config.provider}, using mock responses`);
    return new MockCompletionStrategy();
  }

  switch (config.provider) {
    case 'anthropic':
      return new AnthropicStrategy({ apiKey: config.apiKey, model: config.model });
    case 'groq':
      return new GroqStrategy({ apiKey: config.apiKey, model: config.model });
  }
}
