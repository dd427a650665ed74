import { z } from 'zod';

// Pipeline stages
export type PipelineStage =
  | 'init'
  | 'research'
  | 'brainstorm'
  | 'draft'
  | 'refine'
  | 'moderate'
  | 'done'
  | 'error';

// Which pipeline step issued a completion call
export type CompletionOperation = 'brainstorm' | 'draft' | 'refine' | 'other';

export type RefineMode = 'completion' | 'template';

export type FeedbackRating = 'positive' | 'negative';

// Generation Request - Input for a pipeline run (after validation)
export interface GenerationRequest {
  topic: string;
  tone?: string;
  audience?: string;
  postCount: number; // 1-10
  useWebSearch: boolean;
}

// Web search result handed to brainstorm and draft
export interface SearchContext {
  found: boolean;
  text: string; // Empty when found is false
}

export interface Post {
  postText: string;
  hashtags: string[]; // Each prefixed with '#'
  cta: string;
}

// One successful completion call
export interface CallMetric {
  operation: CompletionOperation;
  latencySeconds: number;
  tokensUsed: number;
  estimated: boolean; // true when tokensUsed was estimated from text length
}

export interface AggregatedMetrics {
  totalLatency: number; // Sum of call latencies, not wall clock
  totalTokens: number;
  callCount: number;
  avgLatency: number; // 0 when callCount is 0
  wallClockSeconds?: number;
}

export interface PipelineResult {
  posts: Post[];
  metrics: AggregatedMetrics;
  usedWebSearch: boolean;
  contextFound: boolean;
}

export type PipelineErrorCode = 'invalid_input' | 'provider_unavailable' | 'internal_error';

/**
 * Events produced by a streaming pipeline run.
 * Exactly one `complete` or `error` event ends every sequence.
 */
export type PipelineEvent =
  | { kind: 'status'; stage: PipelineStage; message: string; progress: number }
  | { kind: 'post'; index: number; post: Post; progress: number }
  | { kind: 'metrics'; metrics: AggregatedMetrics; progress: number }
  | {
      kind: 'complete';
      message: string;
      posts: Post[];
      metrics: AggregatedMetrics;
      usedWebSearch: boolean;
      contextFound: boolean;
      progress: number;
    }
  | { kind: 'error'; code: PipelineErrorCode; message: string };

export interface FeedbackEntry {
  postIndex: number;
  rating: FeedbackRating;
  postPreview: string;
  timestamp: string; // ISO 8601
  sessionId: string;
}

// Pipeline Configuration
export interface PipelineConfig {
  refineMode: RefineMode;
  completionTimeoutMs: number;
  brainstormMaxTokens: number;
  draftMaxTokens: number;
  refineMaxTokens: number;
  temperature: number;
}

// Empty strings from a form count as "not provided"
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const MIN_POST_COUNT = 1;
export const MAX_POST_COUNT = 10;

const POST_COUNT_RANGE_MESSAGE = `Post count must be between ${MIN_POST_COUNT} and ${MAX_POST_COUNT}`;

// Zod schemas for validation
export const GenerationRequestSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required and cannot be empty'),
  tone: optionalText,
  audience: optionalText,
  postCount: z
    .number()
    .int('Post count must be a whole number')
    .min(MIN_POST_COUNT, POST_COUNT_RANGE_MESSAGE)
    .max(MAX_POST_COUNT, POST_COUNT_RANGE_MESSAGE)
    .default(3),
  useWebSearch: z.boolean().default(false),
});

export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;

export const FeedbackRequestSchema = z.object({
  postIndex: z.number().int().min(0),
  rating: z.enum(['positive', 'negative']),
  postPreview: z.string(),
  timestamp: z.string().optional(),
});

export type FeedbackRequest = z.infer<typeof FeedbackRequestSchema>;

export const PipelineConfigSchema = z.object({
  refineMode: z.enum(['completion', 'template']),
  completionTimeoutMs: z.number().int().positive(),
  brainstormMaxTokens: z.number().int().positive(),
  draftMaxTokens: z.number().int().positive(),
  refineMaxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
});

// Default configuration
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  refineMode: 'completion',
  completionTimeoutMs: 30_000,
  brainstormMaxTokens: 500,
  draftMaxTokens: 800,
  refineMaxTokens: 300,
  temperature: 0.7,
};
