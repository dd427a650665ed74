import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
  CompletionClient,
  AnthropicStrategy,
  ANTHROPIC_MODELS,
  GroqStrategy,
  GROQ_DEFAULT_MODEL,
  MockCompletionStrategy,
  createCompletionStrategy,
  estimateTokens,
  mockResponse,
} from '../client';
import type { CompletionRequest, CompletionStrategy, StrategyResponse } from '../client';
import { MetricsAggregator } from '../metrics';
import { InvalidInputError, ProviderUnavailableError } from '../errors';

const { createMock, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    readonly status: number | undefined;

    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }

  return { createMock: vi.fn(), MockAPIError };
});

// Mock the Anthropic SDK
vi.mock('@anthropic-ai/sdk', () => {
  const Anthropic = Object.assign(
    vi.fn().mockImplementation(() => ({
      messages: { create: createMock },
    })),
    { APIError: MockAPIError }
  );
  return { default: Anthropic };
});

function fakeStrategy(
  impl: (request: CompletionRequest) => Promise<StrategyResponse>
): CompletionStrategy & { complete: Mock<(request: CompletionRequest) => Promise<StrategyResponse>> } {
  return { provider: 'fake', model: 'fake-model', mode: 'live', complete: vi.fn(impl) };
}

// Returns the given timestamps in order, one per call
function clock(...times: number[]): () => number {
  return () => times.shift() ?? 0;
}

describe('CompletionClient', () => {
  let metrics: MetricsAggregator;

  beforeEach(() => {
    metrics = new MetricsAggregator();
  });

  it('should record latency and provider-reported tokens', async () => {
    const strategy = fakeStrategy(async () => ({ text: 'Hello there', tokensUsed: 42 }));
    const client = new CompletionClient(strategy, metrics, { now: clock(1000, 1250) });

    const result = await client.complete('Say hello', { operation: 'draft' });

    expect(result.text).toBe('Hello there');
    expect(result.metric).toEqual({
      operation: 'draft',
      latencySeconds: 0.25,
      tokensUsed: 42,
      estimated: false,
    });
    expect(metrics.getRecords()).toEqual([result.metric]);
  });

  it('should estimate tokens when the provider reports no usage', async () => {
    const strategy = fakeStrategy(async () => ({ text: 'efghijkl' }));
    const client = new CompletionClient(strategy, metrics, { now: clock(0, 0) });

    const { metric } = await client.complete('abcd');

    // ceil((4 + 8) / 4)
    expect(metric.tokensUsed).toBe(3);
    expect(metric.estimated).toBe(true);
    expect(metric.operation).toBe('other');
  });

  it('should pass defaults and overrides to the strategy', async () => {
    const strategy = fakeStrategy(async () => ({ text: 'ok', tokensUsed: 1 }));
    const client = new CompletionClient(strategy, metrics, {
      defaultMaxTokens: 256,
      defaultTemperature: 0.2,
    });

    await client.complete('first');
    await client.complete('second', { maxTokens: 50, temperature: 0.9, operation: 'refine' });

    expect(strategy.complete).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ prompt: 'first', maxTokens: 256, temperature: 0.2, operation: 'other' })
    );
    expect(strategy.complete).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ prompt: 'second', maxTokens: 50, temperature: 0.9, operation: 'refine' })
    );
  });

  it('should record cost-free responses with zero latency and tokens', async () => {
    const strategy = fakeStrategy(async () => ({ text: 'canned', costFree: true }));
    const client = new CompletionClient(strategy, metrics, { now: clock(0, 5000) });

    await client.complete('anything', { operation: 'brainstorm' });

    expect(metrics.summary()).toEqual({
      totalLatency: 0,
      totalTokens: 0,
      callCount: 1,
      avgLatency: 0,
    });
  });

  it('should reject an empty prompt without calling the strategy', async () => {
    const strategy = fakeStrategy(async () => ({ text: 'unused' }));
    const client = new CompletionClient(strategy, metrics);

    await expect(client.complete('   ')).rejects.toBeInstanceOf(InvalidInputError);
    expect(strategy.complete).not.toHaveBeenCalled();
  });

  it('should wrap strategy failures and record no metric', async () => {
    const strategy = fakeStrategy(async () => {
      throw new Error('connection reset');
    });
    const client = new CompletionClient(strategy, metrics);

    const error = await client.complete('hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toMatchObject({
      message: 'fake request failed: connection reset',
      provider: 'fake',
      timedOut: false,
    });
    expect(metrics.summary().callCount).toBe(0);
  });

  it('should pass provider errors through unchanged', async () => {
    const original = new ProviderUnavailableError('Groq API error 503: busy', { provider: 'groq', statusCode: 503 });
    const strategy = fakeStrategy(async () => {
      throw original;
    });
    const client = new CompletionClient(strategy, metrics);

    await expect(client.complete('hello')).rejects.toBe(original);
  });

  it('should time out and abort the in-flight request', async () => {
    let signal: AbortSignal | undefined;
    const strategy = fakeStrategy(
      (request) =>
        new Promise<StrategyResponse>((_, reject) => {
          signal = request.signal;
          request.signal.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = new CompletionClient(strategy, metrics, { timeoutMs: 20 });

    const error = await client.complete('slow prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toMatchObject({
      message: 'fake request timed out after 20ms',
      timedOut: true,
      retryable: true,
    });
    expect(signal?.aborted).toBe(true);
    expect(metrics.getRecords()).toHaveLength(0);
  });
});

describe('estimateTokens', () => {
  it('should round up a quarter of the combined length', () => {
    expect(estimateTokens('abc', 'de')).toBe(2);
    expect(estimateTokens('', '')).toBe(0);
  });
});

describe('AnthropicStrategy', () => {
  beforeEach(() => {
    createMock.mockReset();
  });

  it('should default to the haiku model', () => {
    const strategy = new AnthropicStrategy({ apiKey: 'test-secret' });
    expect(strategy.model).toBe(ANTHROPIC_MODELS.haiku);
    expect(strategy.mode).toBe('live');
  });

  it('should join text blocks and sum token usage', async () => {
    createMock.mockResolvedValue({
      content: [
        { type: 'text', text: 'Hello ' },
        { type: 'tool_use', id: 'tool_1', name: 'noop', input: {} },
        { type: 'text', text: 'world' },
      ],
      usage: { input_tokens: 10, output_tokens: 20 },
    });
    const strategy = new AnthropicStrategy({ apiKey: 'test-secret', model: ANTHROPIC_MODELS.sonnet });
    const controller = new AbortController();

    const response = await strategy.complete({
      prompt: 'Greet me',
      maxTokens: 100,
      temperature: 0.5,
      operation: 'draft',
      signal: controller.signal,
    });

    expect(response).toEqual({ text: 'Hello world', tokensUsed: 30 });
    expect(createMock).toHaveBeenCalledWith(
      {
        model: 'claude-3-5-sonnet-20241022',
        max_tokens: 100,
        temperature: 0.5,
        messages: [{ role: 'user', content: 'Greet me' }],
      },
      { signal: controller.signal }
    );
  });

  it('should map API errors to ProviderUnavailableError', async () => {
    createMock.mockRejectedValue(new MockAPIError(529, 'Overloaded'));
    const strategy = new AnthropicStrategy({ apiKey: 'test-secret' });

    const error = await strategy
      .complete({
        prompt: 'Greet me',
        maxTokens: 100,
        temperature: 0.5,
        operation: 'draft',
        signal: new AbortController().signal,
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toMatchObject({
      message: 'Anthropic API error 529: Overloaded',
      statusCode: 529,
      retryable: true,
    });
  });
});

describe('GroqStrategy', () => {
  const request: CompletionRequest = {
    prompt: 'Write something',
    maxTokens: 200,
    temperature: 0.7,
    operation: 'draft',
    signal: new AbortController().signal,
  };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post an OpenAI-style chat request', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(
        JSON.stringify({
          choices: [{ message: { content: 'Groq says hi' } }],
          usage: { total_tokens: 57 },
        }),
        { status: 200 }
      )
    );
    vi.stubGlobal('fetch', fetchMock);

    const strategy = new GroqStrategy({ apiKey: 'test-secret' });
    const response = await strategy.complete(request);

    expect(response).toEqual({ text: 'Groq says hi', tokensUsed: 57 });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.groq.com/openai/v1/chat/completions',
      expect.objectContaining({
        method: 'POST',
        headers: expect.objectContaining({ Authorization: 'Bearer test-secret' }),
        body: JSON.stringify({
          model: GROQ_DEFAULT_MODEL,
          messages: [{ role: 'user', content: 'Write something' }],
          max_tokens: 200,
          temperature: 0.7,
        }),
      })
    );
  });

  it('should leave tokens undefined when usage is missing', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        new Response(JSON.stringify({ choices: [{ message: { content: null } }] }), { status: 200 })
      )
    );

    const response = await new GroqStrategy({ apiKey: 'test-secret' }).complete(request);

    expect(response).toEqual({ text: '', tokensUsed: undefined });
  });

  it('should raise ProviderUnavailableError on a non-success status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('rate limited', { status: 429 })));

    const error = await new GroqStrategy({ apiKey: 'test-secret' }).complete(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toMatchObject({
      message: 'Groq API error 429: rate limited',
      statusCode: 429,
      retryable: true,
    });
  });
});

describe('mock strategy', () => {
  it('should brainstorm a numbered list for the quoted topic', () => {
    const text = mockResponse(
      'Based on the topic "remote work", brainstorm 2 unique angles for a LinkedIn post.',
      'brainstorm'
    );

    expect(text).toBe(
      '1. Personal career lessons learned from remote work\n2. Industry trends and future predictions for remote work'
    );
  });

  it('should draft a post that opens with the angle', () => {
    const text = mockResponse('Write a LinkedIn post from the angle: "Async standups". Keep it short.', 'draft');
    expect(text.startsWith('🚀 Async standups\n')).toBe(true);
  });

  it('should return refinement JSON with a topic hashtag', () => {
    const text = mockResponse('For the following LinkedIn post about "remote work", generate 5 hashtags', 'refine');

    expect(JSON.parse(text)).toEqual({
      hashtags: ['#RemoteWork', '#CareerGrowth', '#ContinuousLearning', '#ProfessionalDevelopment', '#Innovation'],
      cta: "What's one thing you've learned recently that changed your perspective? Share your thoughts in the comments.",
    });
  });

  it('should mark responses as cost-free', async () => {
    const response = await new MockCompletionStrategy().complete({
      prompt: 'hello',
      maxTokens: 10,
      temperature: 0,
      operation: 'other',
      signal: new AbortController().signal,
    });

    expect(response).toEqual({ text: 'Mock response - completion provider not configured', costFree: true });
  });
});

describe('createCompletionStrategy', () => {
  it('should fall back to mock mode without a usable key', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(createCompletionStrategy({ provider: 'groq' }).mode).toBe('mock');
    expect(createCompletionStrategy({ provider: 'anthropic', apiKey: 'your_api_key_here' }).mode).toBe('mock');
    expect(warn).toHaveBeenCalledTimes(2);

    warn.mockRestore();
  });

  it('should pick the configured live provider', () => {
    expect(createCompletionStrategy({ provider: 'groq', apiKey: 'test-secret' })).toBeInstanceOf(GroqStrategy);
    expect(
      createCompletionStrategy({ provider: 'anthropic', apiKey: 'test-secret', model: 'claude-test' })
    ).toMatchObject({ provider: 'anthropic', model: 'claude-test' });
  });
});
