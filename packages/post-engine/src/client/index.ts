import type { CallMetric, CompletionOperation } from '../types';
import { InvalidInputError, ProviderUnavailableError } from '../errors';
import type { MetricsAggregator } from '../metrics';
import type { CompletionStrategy } from './strategy';

export const DEFAULT_COMPLETION_TIMEOUT_MS = 30_000;

// Used when the provider omits usage data: roughly 4 characters per token
const CHARS_PER_TOKEN = 4;

interface CompletionClientOptions {
  timeoutMs?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
  now?: () => number; // Milliseconds; injectable for tests
}

export interface CompletionParams {
  maxTokens?: number;
  temperature?: number;
  operation?: CompletionOperation;
}

export interface CompletionResult {
  text: string;
  metric: CallMetric;
}

/**
 * Deterministic token estimate for responses without usage data
 */
export function estimateTokens(prompt: string, text: string): number {
  return Math.ceil((prompt.length + text.length) / CHARS_PER_TOKEN);
}

/**
 * Completion client bound to one pipeline run.
 * Times every call, records a metric per successful call and turns
 * provider failures and timeouts into ProviderUnavailableError.
 */
export class CompletionClient {
  private readonly strategy: CompletionStrategy;
  private readonly metrics: MetricsAggregator;
  private readonly timeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly defaultTemperature: number;
  private readonly now: () => number;

  constructor(
    strategy: CompletionStrategy,
    metrics: MetricsAggregator,
    options: CompletionClientOptions = {}
  ) {
    this.strategy = strategy;
    this.metrics = metrics;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens ?? 1000;
    this.defaultTemperature = options.defaultTemperature ?? 0.7;
    this.now = options.now ?? (() => performance.now());
  }

  get provider(): string {
    return this.strategy.provider;
  }

  async complete(prompt: string, params: CompletionParams = {}): Promise<CompletionResult> {
    if (!prompt.trim()) {
      throw new InvalidInputError('Prompt must not be empty');
    }

    const operation = params.operation ?? 'other';
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting so the timeout settles the race first
        reject(
          new ProviderUnavailableError(
            `${this.strategy.provider} request timed out after ${this.timeoutMs}ms`,
            { provider: this.strategy.provider, timedOut: true, context: { operation } }
          )
        );
        controller.abort();
      }, this.timeoutMs);
    });

    const startedAt = this.now();

    try {
      const response = await Promise.race([
        this.strategy.complete({
          prompt,
          maxTokens: params.maxTokens ?? this.defaultMaxTokens,
          temperature: params.temperature ?? this.defaultTemperature,
          operation,
          signal: controller.signal,
        }),
        timeout,
      ]);

      const latencySeconds = (this.now() - startedAt) / 1000;

      const metric: CallMetric = response.costFree
        ? { operation, latencySeconds: 0, tokensUsed: 0, estimated: false }
        : {
            operation,
            latencySeconds,
            tokensUsed: response.tokensUsed ?? estimateTokens(prompt, response.text),
            estimated: response.tokensUsed === undefined,
          };

      this.metrics.record(metric);

      if (!response.costFree) {
        console.log(
          `[CompletionClient] ${this.strategy.provider} ${operation} call ok (${latencySeconds.toFixed(2)}s, ${metric.tokensUsed} tokens)`
        );
      }

      return { text: response.text, metric };
    } catch (error) {
      if (error instanceof ProviderUnavailableError) {
        console.error(`[CompletionClient] ${error.message}`);
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[CompletionClient] ${this.strategy.provider} ${operation} call failed: ${message}`);

      throw new ProviderUnavailableError(`${this.strategy.provider} request failed: ${message}`, {
        provider: this.strategy.provider,
        context: { operation },
        originalError: error instanceof Error ? error : undefined,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}

export type { CompletionStrategy, CompletionRequest, StrategyResponse } from './strategy';
export { AnthropicStrategy, ANTHROPIC_MODELS } from './anthropic';
export { GroqStrategy, GROQ_DEFAULT_MODEL } from './groq';
export { MockCompletionStrategy, mockResponse } from './mock';
export { createCompletionStrategy } from './factory';
