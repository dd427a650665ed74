import { z } from 'zod';
import { InvalidInputError, formatIssues } from '@postcraft/post-engine';
import type {
  AggregatedMetrics,
  FeedbackRequest,
  GenerationRequestInput,
  PipelineEvent,
  PipelineResult,
  Post,
} from '@postcraft/post-engine';

// Wire format (snake_case)

export interface WirePost {
  post_text: string;
  hashtags: string[];
  cta: string;
}

export interface WireMetrics {
  total_tokens: number;
  total_latency: number;
  call_count: number;
  avg_latency_per_call: number;
  wall_clock_seconds?: number;
}

export interface WireGenerateResponse {
  posts: WirePost[];
  message: string;
  metrics: WireMetrics;
  used_web_search: boolean;
  context_found: boolean;
}

export type WireEvent =
  | { kind: 'status'; stage: string; message: string; progress: number }
  | { kind: 'post'; index: number; post: WirePost; progress: number }
  | { kind: 'metrics'; metrics: WireMetrics; progress: number }
  | ({ kind: 'complete'; progress: number } & WireGenerateResponse)
  | { kind: 'error'; code: string; message: string };

const GenerateBodySchema = z.object({
  topic: z.string({
    required_error: 'Topic is required and cannot be empty',
    invalid_type_error: 'Topic must be a string',
  }),
  tone: z.string().nullish(),
  audience: z.string().nullish(),
  post_count: z.number({ invalid_type_error: 'Post count must be a number' }).optional(),
  use_web_search: z.boolean({ invalid_type_error: 'use_web_search must be a boolean' }).optional(),
});

const FeedbackBodySchema = z.object({
  post_index: z.number().int().min(0),
  rating: z.enum(['positive', 'negative']),
  post_preview: z.string(),
  timestamp: z.string().optional(),
});

function parseBody<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, body: unknown): Output {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidInputError(formatIssues(parsed.error.issues), { issues: parsed.error.issues });
  }
  return parsed.data;
}

export function parseGenerateBody(body: unknown): GenerationRequestInput {
  const { topic, tone, audience, post_count, use_web_search } = parseBody(GenerateBodySchema, body);

  return {
    topic,
    tone: tone ?? undefined,
    audience: audience ?? undefined,
    postCount: post_count,
    useWebSearch: use_web_search,
  };
}

export function parseFeedbackBody(body: unknown): FeedbackRequest {
  const { post_index, rating, post_preview, timestamp } = parseBody(FeedbackBodySchema, body);

  return { postIndex: post_index, rating, postPreview: post_preview, timestamp };
}

export function serializePost(post: Post): WirePost {
  return { post_text: post.postText, hashtags: post.hashtags, cta: post.cta };
}

export function serializeMetrics(metrics: AggregatedMetrics): WireMetrics {
  return {
    total_tokens: metrics.totalTokens,
    total_latency: metrics.totalLatency,
    call_count: metrics.callCount,
    avg_latency_per_call: metrics.avgLatency,
    ...(metrics.wallClockSeconds !== undefined && { wall_clock_seconds: metrics.wallClockSeconds }),
  };
}

export function serializeResult(result: PipelineResult): WireGenerateResponse {
  return {
    posts: result.posts.map(serializePost),
    message: `Successfully generated ${result.posts.length} LinkedIn posts`,
    metrics: serializeMetrics(result.metrics),
    used_web_search: result.usedWebSearch,
    context_found: result.contextFound,
  };
}

export function serializeEvent(event: PipelineEvent): WireEvent {
  switch (event.kind) {
    case 'status':
      return event;
    case 'post':
      return { kind: 'post', index: event.index, post: serializePost(event.post), progress: event.progress };
    case 'metrics':
      return { kind: 'metrics', metrics: serializeMetrics(event.metrics), progress: event.progress };
    case 'complete':
      return {
        kind: 'complete',
        message: event.message,
        posts: event.posts.map(serializePost),
        metrics: serializeMetrics(event.metrics),
        used_web_search: event.usedWebSearch,
        context_found: event.contextFound,
        progress: event.progress,
      };
    case 'error':
      return event;
  }
}
