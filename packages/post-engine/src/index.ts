/**
 * Post Engine - LinkedIn post generation pipeline
 *
 * @module @postcraft/post-engine
 *
 * This package provides:
 * - Completion client with anthropic, groq and mock strategies
 * - Web search providers (DuckDuckGo, Tavily)
 * - Content moderation heuristics
 * - Post generation pipeline with batch and streaming delivery
 * - Per-run call metrics and an append-only feedback log
 *
 * @example
 * ```typescript
 * import { createPipeline, loadEngineConfig } from '@postcraft/post-engine';
 *
 * const pipeline = createPipeline(loadEngineConfig());
 *
 * for await (const event of pipeline.generateStream({ topic: 'remote work', postCount: 2 })) {
 *   if (event.kind === 'post') console.log(event.post.postText);
 * }
 * ```
 */

// Types
export type {
  PipelineStage,
  CompletionOperation,
  RefineMode,
  FeedbackRating,
  GenerationRequest,
  GenerationRequestInput,
  SearchContext,
  Post,
  CallMetric,
  AggregatedMetrics,
  PipelineResult,
  PipelineErrorCode,
  PipelineEvent,
  FeedbackEntry,
  FeedbackRequest,
  PipelineConfig,
} from './types';

export {
  GenerationRequestSchema,
  FeedbackRequestSchema,
  PipelineConfigSchema,
  DEFAULT_PIPELINE_CONFIG,
  MIN_POST_COUNT,
  MAX_POST_COUNT,
} from './types';

// Errors
export {
  ErrorCategory,
  PostEngineError,
  InvalidInputError,
  ProviderUnavailableError,
  ConfigurationError,
  toPostEngineError,
  formatIssues,
} from './errors';

// Configuration
export type { LlmProvider, SearchProviderName, LlmConfig, SearchConfig, EngineConfig } from './config';
export { loadEngineConfig, isUsableApiKey } from './config';

// Client
export type { CompletionStrategy, CompletionRequest, StrategyResponse, CompletionParams, CompletionResult } from './client';
export {
  CompletionClient,
  DEFAULT_COMPLETION_TIMEOUT_MS,
  estimateTokens,
  AnthropicStrategy,
  ANTHROPIC_MODELS,
  GroqStrategy,
  GROQ_DEFAULT_MODEL,
  MockCompletionStrategy,
  mockResponse,
  createCompletionStrategy,
} from './client';

// Metrics
export { MetricsAggregator } from './metrics';

// Search
export type { SearchProvider, SearchResultItem } from './search';
export {
  NO_CONTEXT,
  DuckDuckGoSearchProvider,
  TavilySearchProvider,
  NoopSearchProvider,
  createSearchProvider,
  formatSearchResults,
  safeSearch,
} from './search';

// Moderation
export type { ModerationResult } from './moderation';
export { moderate, moderatePost, BANNED_TERMS, MODERATED_MESSAGE, MODERATED_POST } from './moderation';

// Prompts
export {
  buildSearchQuery,
  buildBrainstormPrompt,
  buildDraftPrompt,
  buildRefinePrompt,
  buildFallbackDraft,
} from './prompts';

// Parsers
export type { Refinement } from './parsers';
export {
  parseAngles,
  parseRefinement,
  templateRefinement,
  normalizeHashtags,
  defaultHashtags,
  toHashtag,
  DEFAULT_CTA,
  MIN_HASHTAGS,
  MAX_HASHTAGS,
} from './parsers';

// Pipeline
export type { PipelineEventHandler, PostPipelineDeps } from './pipeline';
export { PostPipeline, createPipeline, parseGenerationRequest, inCompletionOrder } from './pipeline';

// Feedback
export type { FeedbackSink } from './feedback';
export { JsonlFeedbackSink, InMemoryFeedbackSink, toFeedbackEntry } from './feedback';
