import type {
  GenerationRequest,
  PipelineConfig,
  PipelineEvent,
  PipelineResult,
  PipelineStage,
  Post,
  SearchContext,
} from '../types';
import { DEFAULT_PIPELINE_CONFIG, GenerationRequestSchema, PipelineConfigSchema } from '../types';
import { ConfigurationError, InvalidInputError, formatIssues, toPostEngineError } from '../errors';
import { CompletionClient, createCompletionStrategy } from '../client';
import type { CompletionStrategy } from '../client';
import type { EngineConfig } from '../config';
import { MetricsAggregator } from '../metrics';
import { NO_CONTEXT, NoopSearchProvider, createSearchProvider, safeSearch } from '../search';
import type { SearchProvider } from '../search';
import {
  buildBrainstormPrompt,
  buildDraftPrompt,
  buildFallbackDraft,
  buildRefinePrompt,
  buildSearchQuery,
} from '../prompts';
import { parseAngles, parseRefinement, templateRefinement } from '../parsers';
import type { Refinement } from '../parsers';
import { moderatePost } from '../moderation';
import { inCompletionOrder } from './concurrency';

export type PipelineEventHandler = (event: PipelineEvent) => void;

export interface PostPipelineDeps {
  strategy: CompletionStrategy;
  searchProvider?: SearchProvider;
  config?: Partial<PipelineConfig>;
  now?: () => number; // Milliseconds, passed to each run's completion client
}

interface Draft {
  angle: string;
  text: string;
  fallback: boolean;
}

// Progress checkpoints
const PROGRESS = {
  start: 0,
  research: 10,
  researchDone: 20,
  brainstorm: 25,
  brainstormDone: 35,
  draft: 40,
  draftSpan: 25,
  refine: 70,
  postSpan: 25,
  metrics: 95,
  complete: 100,
} as const;

function status(stage: PipelineStage, message: string, progress: number): PipelineEvent {
  return { kind: 'status', stage, message, progress };
}

function errorEvent(error: unknown): PipelineEvent {
  const engineError = toPostEngineError(error);
  return { kind: 'error', code: engineError.code, message: engineError.message };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validate raw input into a GenerationRequest
 */
export function parseGenerationRequest(input: unknown): GenerationRequest {
  const parsed = GenerationRequestSchema.safeParse(input);

  if (!parsed.success) {
    throw new InvalidInputError(formatIssues(parsed.error.issues), { issues: parsed.error.issues });
  }

  return parsed.data;
}

/**
 * LinkedIn post generation pipeline.
 * Orchestrates one run end to end:
 * 1. Optional web research
 * 2. Brainstorm one angle per requested post
 * 3. Draft every angle concurrently
 * 4. Add hashtags and a call-to-action
 * 5. Moderate and report metrics
 *
 * Batch and streaming callers share the same run; only the delivery differs.
 */
export class PostPipeline {
  private readonly strategy: CompletionStrategy;
  private readonly searchProvider: SearchProvider;
  private readonly config: PipelineConfig;
  private readonly now?: () => number;
  private eventHandlers: PipelineEventHandler[] = [];

  constructor(deps: PostPipelineDeps) {
    this.strategy = deps.strategy;
    this.searchProvider = deps.searchProvider ?? new NoopSearchProvider();

    const config = PipelineConfigSchema.safeParse({ ...DEFAULT_PIPELINE_CONFIG, ...deps.config });
    if (!config.success) {
      throw new ConfigurationError(`Invalid pipeline configuration: ${formatIssues(config.error.issues)}`);
    }
    this.config = config.data;
    this.now = deps.now;
  }

  get mode(): 'live' | 'mock' {
    return this.strategy.mode;
  }

  get provider(): string {
    return this.strategy.provider;
  }

  /**
   * Subscribe to pipeline events
   */
  onEvent(handler: PipelineEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const index = this.eventHandlers.indexOf(handler);
      if (index > -1) {
        this.eventHandlers.splice(index, 1);
      }
    };
  }

  private emit(event: PipelineEvent): PipelineEvent {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        console.error('[PostPipeline] Event handler error:', error);
      }
    }
    return event;
  }

  /**
   * Run to completion and return every post at once.
   * Rejects with InvalidInputError or ProviderUnavailableError.
   */
  async generate(input: unknown): Promise<PipelineResult> {
    const request = parseGenerationRequest(input);
    const run = this.run(request);

    try {
      for (;;) {
        const next = await run.next();
        if (next.done) return next.value;
        this.emit(next.value);
      }
    } catch (error) {
      this.emit(errorEvent(error));
      throw error;
    }
  }

  /**
   * Run and yield progress as it happens. Never throws: failures end the
   * sequence with a single `error` event.
   */
  async *generateStream(input: unknown): AsyncGenerator<PipelineEvent, void, undefined> {
    let request: GenerationRequest;
    try {
      request = parseGenerationRequest(input);
    } catch (error) {
      yield this.emit(errorEvent(error));
      return;
    }

    try {
      const run = this.run(request);
      for (;;) {
        const next = await run.next();
        if (next.done) return;
        yield this.emit(next.value);
      }
    } catch (error) {
      console.error(`[PostPipeline] Generation failed for "${request.topic}":`, errorMessage(error));
      yield this.emit(errorEvent(error));
    }
  }

  private async *run(request: GenerationRequest): AsyncGenerator<PipelineEvent, PipelineResult, undefined> {
    const { topic, postCount } = request;
    const startedAt = Date.now();

    // Fresh per run so concurrent requests never share counters
    const metrics = new MetricsAggregator();
    const client = new CompletionClient(this.strategy, metrics, {
      timeoutMs: this.config.completionTimeoutMs,
      defaultTemperature: this.config.temperature,
      now: this.now,
    });

    console.log(
      `[PostPipeline] Generating ${postCount} posts for "${topic}" (${this.strategy.provider}, ${this.strategy.mode})`
    );
    yield status('init', 'Initializing post generation...', PROGRESS.start);

    let context: SearchContext = NO_CONTEXT;
    if (request.useWebSearch) {
      yield status('research', 'Searching the web for recent context...', PROGRESS.research);
      context = await safeSearch(this.searchProvider, buildSearchQuery(topic));
      yield status(
        'research',
        context.found ? 'Found recent context' : 'No recent context found, continuing without it',
        PROGRESS.researchDone
      );
    }

    yield status('brainstorm', 'Brainstorming content angles...', PROGRESS.brainstorm);
    const angles = await this.brainstorm(client, request, context);
    yield status('brainstorm', `Generated ${angles.length} angles`, PROGRESS.brainstormDone);

    yield status('draft', `Drafting ${postCount} posts...`, PROGRESS.draft);
    const draftTasks = angles.map((angle) => this.draft(client, request, angle, context));
    let drafted = 0;
    for await (const { index } of inCompletionOrder(draftTasks)) {
      drafted++;
      yield status(
        'draft',
        `Drafted post ${index + 1} (${drafted} of ${postCount})`,
        PROGRESS.draft + Math.round((PROGRESS.draftSpan * drafted) / postCount)
      );
    }
    // All settled above; this only restores angle order
    const drafts = await Promise.all(draftTasks);

    yield status('refine', 'Adding hashtags and calls to action...', PROGRESS.refine);
    const refined = await Promise.all(
      drafts.map(async (draft) => ({
        draft,
        refinement: await this.refine(client, topic, draft),
      }))
    );

    yield status('moderate', 'Reviewing posts...', PROGRESS.refine);
    const posts: Post[] = [];
    for (const [index, { draft, refinement }] of refined.entries()) {
      const moderated = moderatePost({
        postText: draft.text,
        hashtags: refinement.hashtags,
        cta: refinement.cta,
      });

      if (moderated.flagged) {
        console.warn(`[PostPipeline] Post ${index + 1} moderated: ${moderated.reason}`);
      }

      posts.push(moderated.post);
      yield {
        kind: 'post',
        index,
        post: moderated.post,
        progress: PROGRESS.refine + Math.round((PROGRESS.postSpan * (index + 1)) / postCount),
      };
    }

    const summary = metrics.summary((Date.now() - startedAt) / 1000);
    yield { kind: 'metrics', metrics: summary, progress: PROGRESS.metrics };

    const result: PipelineResult = {
      posts,
      metrics: summary,
      usedWebSearch: request.useWebSearch,
      contextFound: context.found,
    };

    const fallbackCount = drafts.filter((draft) => draft.fallback).length;
    console.log(
      `[PostPipeline] Completed "${topic}": ${posts.length} posts, ${summary.callCount} calls, ${summary.totalTokens} tokens` +
        (fallbackCount > 0 ? `, ${fallbackCount} fallback drafts` : ''),
      metrics.tokensByOperation()
    );

    yield {
      kind: 'complete',
      message: `Successfully generated ${posts.length} LinkedIn posts`,
      ...result,
      progress: PROGRESS.complete,
    };

    return result;
  }

  /**
   * Failure here ends the run: there is nothing to draft without angles
   */
  private async brainstorm(
    client: CompletionClient,
    request: GenerationRequest,
    context: SearchContext
  ): Promise<string[]> {
    const { text } = await client.complete(
      buildBrainstormPrompt(request.topic, request.postCount, context),
      { operation: 'brainstorm', maxTokens: this.config.brainstormMaxTokens }
    );

    return parseAngles(text, request.postCount, request.topic);
  }

  /**
   * Resolves with a templated post when the call fails or returns nothing
   */
  private async draft(
    client: CompletionClient,
    request: GenerationRequest,
    angle: string,
    context: SearchContext
  ): Promise<Draft> {
    try {
      const { text } = await client.complete(
        buildDraftPrompt({ angle, tone: request.tone, audience: request.audience, context }),
        { operation: 'draft', maxTokens: this.config.draftMaxTokens }
      );

      const trimmed = text.trim();
      if (trimmed) {
        return { angle, text: trimmed, fallback: false };
      }
      console.warn(`[PostPipeline] Empty draft for "${angle}", using fallback post`);
    } catch (error) {
      console.warn(`[PostPipeline] Draft failed for "${angle}", using fallback post:`, errorMessage(error));
    }

    return { angle, text: buildFallbackDraft(request.topic, angle), fallback: true };
  }

  private async refine(client: CompletionClient, topic: string, draft: Draft): Promise<Refinement> {
    if (this.config.refineMode === 'template') {
      return templateRefinement(topic, draft.angle);
    }

    try {
      const { text } = await client.complete(buildRefinePrompt(topic, draft.text), {
        operation: 'refine',
        maxTokens: this.config.refineMaxTokens,
      });

      const refinement = parseRefinement(text, topic);
      if (refinement) return refinement;
      console.warn(`[PostPipeline] Unparseable refinement for "${draft.angle}", using template`);
    } catch (error) {
      console.warn(`[PostPipeline] Refinement failed for "${draft.angle}", using template:`, errorMessage(error));
    }

    return templateRefinement(topic, draft.angle);
  }
}

/**
 * Build a pipeline from environment-derived configuration
 */
export function createPipeline(config: EngineConfig): PostPipeline {
  return new PostPipeline({
    strategy: createCompletionStrategy(config.llm),
    searchProvider: createSearchProvider(config.search),
    config: config.pipeline,
  });
}

export { inCompletionOrder } from './concurrency';
