import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import {
  ErrorCategory,
  InvalidInputError,
  parseGenerationRequest,
  toPostEngineError,
} from '@postcraft/post-engine';
import type { FeedbackSink, PipelineEvent, PostPipeline } from '@postcraft/post-engine';
import { logEvent } from './logger';
import { parseFeedbackBody, parseGenerateBody, serializeEvent, serializeResult } from './serializers';

export interface PostServerDeps {
  pipeline: PostPipeline;
  feedbackSink: FeedbackSink;
}

function jsonResponse(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    req.on('end', () => {
      // Decode once: a multibyte character may straddle two chunks
      const data = Buffer.concat(chunks).toString('utf8');
      if (!data.trim()) {
        reject(new InvalidInputError('Request body is required'));
        return;
      }
      try {
        resolve(JSON.parse(data));
      } catch {
        reject(new InvalidInputError('Request body must be valid JSON'));
      }
    });
    req.on('error', reject);
  });
}

function sendError(res: ServerResponse, error: unknown): void {
  const engineError = toPostEngineError(error);

  switch (engineError.category) {
    case ErrorCategory.INVALID_INPUT: {
      // Issue messages only: engine field paths are camelCase, the wire is not
      const detail =
        engineError instanceof InvalidInputError && engineError.issues.length > 0
          ? engineError.issues.map((issue) => issue.message).join('; ')
          : engineError.message;
      jsonResponse(res, 400, { error: 'Invalid request', detail });
      return;
    }
    case ErrorCategory.PROVIDER_UNAVAILABLE:
      jsonResponse(res, 502, {
        error: 'Provider unavailable',
        detail: `The AI service provider is currently unavailable: ${engineError.message}`,
      });
      return;
    default:
      console.error('[PostAPI] Request failed:', engineError.toJSON());
      jsonResponse(res, 500, { error: 'Internal server error', detail: engineError.message });
  }
}

function logPipelineEvent(event: PipelineEvent): void {
  switch (event.kind) {
    case 'complete':
      logEvent('pipeline_completed', {
        posts: event.posts.length,
        callCount: event.metrics.callCount,
        totalTokens: event.metrics.totalTokens,
        contextFound: event.contextFound,
      });
      return;
    case 'error':
      logEvent('pipeline_failed', { code: event.code, error: event.message });
      return;
    default:
      return;
  }
}

/**
 * HTTP surface for the post pipeline:
 * GET /health, POST /generate_posts, POST /generate_posts_stream (SSE), POST /feedback
 */
export function createPostServer(deps: PostServerDeps): http.Server {
  const { pipeline, feedbackSink } = deps;

  async function generatePosts(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const request = parseGenerationRequest(parseGenerateBody(await parseJsonBody(req)));
    const result = await pipeline.generate(request);
    jsonResponse(res, 200, serializeResult(result));
  }

  async function generatePostsStream(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Validation failures still get a plain 400; after this point the status is fixed
    const request = parseGenerationRequest(parseGenerateBody(await parseJsonBody(req)));

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    let clientGone = false;
    res.on('close', () => {
      clientGone = !res.writableEnded;
    });

    for await (const event of pipeline.generateStream(request)) {
      if (clientGone) break;
      res.write(`data: ${JSON.stringify(serializeEvent(event))}\n\n`);
    }

    res.end();
  }

  async function recordFeedback(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const feedback = parseFeedbackBody(await parseJsonBody(req));
    const entry = await feedbackSink.record(feedback);
    jsonResponse(res, 200, { success: true, message: `Thank you for your ${entry.rating} feedback!` });
  }

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const route = `${req.method ?? 'GET'} ${url.pathname}`;

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    switch (route) {
      case 'GET /health':
        jsonResponse(res, 200, {
          status: 'healthy',
          message: 'LinkedIn Post Generator API is running',
          api_configured: pipeline.mode === 'live',
          mode: pipeline.mode,
          provider: pipeline.provider,
        });
        return;
      case 'POST /generate_posts':
        return generatePosts(req, res);
      case 'POST /generate_posts_stream':
        return generatePostsStream(req, res);
      case 'POST /feedback':
        return recordFeedback(req, res);
      default:
        jsonResponse(res, 404, { error: 'Endpoint not found', detail: `No route for ${route}` });
    }
  }

  const server = http.createServer((req, res) => {
    const requestId = randomUUID();
    const startedAt = Date.now();

    // Also fires when the client hangs up mid-response
    res.on('close', () => {
      logEvent('http_request', {
        requestId,
        method: req.method,
        path: req.url,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
        aborted: !res.writableFinished,
      });
    });

    handleRequest(req, res).catch((error: unknown) => {
      if (res.headersSent) {
        console.error(`[PostAPI] Request ${requestId} failed after headers were sent:`, error);
        res.end();
        return;
      }
      sendError(res, error);
    });
  });

  const unsubscribe = pipeline.onEvent(logPipelineEvent);
  server.on('close', unsubscribe);

  return server;
}
