import type { CompletionOperation } from '../types';

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  operation: CompletionOperation;
  signal: AbortSignal;
}

export interface StrategyResponse {
  text: string;
  tokensUsed?: number; // Omitted when the provider reports no usage
  costFree?: boolean; // Mock responses record zero latency and zero tokens
}

/**
 * One way of completing a prompt. Picked once at configuration time;
 * every strategy honours the same contract.
 */
export interface CompletionStrategy {
  readonly provider: string;
  readonly model: string;
  readonly mode: 'live' | 'mock';
  complete(request: CompletionRequest): Promise<StrategyResponse>;
}
