import { z } from 'zod';
import { ProviderUnavailableError } from '../errors';
import type { CompletionRequest, CompletionStrategy, StrategyResponse } from './strategy';

const GROQ_CHAT_COMPLETIONS_URL = 'https://api.groq.com/openai/v1/chat/completions';

export const GROQ_DEFAULT_MODEL = 'llama-3.1-8b-instant';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      total_tokens: z.number(),
    })
    .optional(),
});

interface GroqStrategyConfig {
  apiKey: string;
  model?: string;
}

/**
 * Live completions through Groq's OpenAI-compatible chat endpoint
 */
export class GroqStrategy implements CompletionStrategy {
  readonly provider = 'groq';
  readonly mode = 'live' as const;
  readonly model: string;
  private readonly apiKey: string;

  constructor(config: GroqStrategyConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model || GROQ_DEFAULT_MODEL;
  }

  async complete(request: CompletionRequest): Promise<StrategyResponse> {
    const response = await fetch(GROQ_CHAT_COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: request.prompt }],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      }),
      signal: request.signal,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new ProviderUnavailableError(
        `Groq API error ${response.status}: ${errorText.slice(0, 200)}`,
        { provider: this.provider, statusCode: response.status }
      );
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderUnavailableError('Groq API returned an unexpected response shape', {
        provider: this.provider,
        statusCode: response.status,
      });
    }

    return {
      text: parsed.data.choices[0]?.message.content ?? '',
      tokensUsed: parsed.data.usage?.total_tokens,
    };
  }
}
