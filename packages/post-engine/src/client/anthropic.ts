import Anthropic from '@anthropic-ai/sdk';
import { ProviderUnavailableError } from '../errors';
import type { CompletionRequest, CompletionStrategy, StrategyResponse } from './strategy';

// Model aliases for easy reference
export const ANTHROPIC_MODELS = {
  haiku: 'claude-3-5-haiku-20241022',
  sonnet: 'claude-3-5-sonnet-20241022',
} as const;

interface AnthropicStrategyConfig {
  apiKey: string;
  model?: string;
}

/**
 * Live completions through the Anthropic Messages API
 */
export class AnthropicStrategy implements CompletionStrategy {
  readonly provider = 'anthropic';
  readonly mode = 'live' as const;
  readonly model: string;
  private client: Anthropic;

  constructor(config: AnthropicStrategyConfig) {
    this.model = config.model || ANTHROPIC_MODELS.haiku;
    // The completion client owns timeouts; a failed call falls back instead of retrying
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<StrategyResponse> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: request.signal }
      );

      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');

      return {
        text,
        tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        const statusCode = typeof error.status === 'number' ? error.status : undefined;
        throw new ProviderUnavailableError(
          `Anthropic API error${statusCode ? ` ${statusCode}` : ''}: ${error.message}`,
          { provider: this.provider, statusCode, originalError: error }
        );
      }
      throw error;
    }
  }
}
