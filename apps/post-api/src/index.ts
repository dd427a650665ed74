import 'dotenv/config';
import { JsonlFeedbackSink, createPipeline } from '@postcraft/post-engine';
import type { ApiConfig } from './config';
import { loadApiConfig } from './config';
import { createPostServer } from './server';

let config: ApiConfig;
try {
  config = loadApiConfig();
} catch (error) {
  console.error('[PostAPI] Invalid configuration:', error instanceof Error ? error.message : error);
  process.exit(1);
}

const pipeline = createPipeline(config.engine);
const server = createPostServer({
  pipeline,
  feedbackSink: new JsonlFeedbackSink(config.feedbackLogPath),
});

server.listen(config.port, config.host, () => {
  console.log('\n=== LinkedIn Post Generator API ===');
  console.log(`Environment: ${process.env['NODE_ENV'] || 'development'}`);
  console.log(`Completion:  ${pipeline.provider} (${pipeline.mode})`);
  console.log(`Search:      ${config.engine.search.provider}`);
  console.log(`Listening:   http://${config.host}:${config.port}\n`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`\n${signal} received, shutting down gracefully...`);
  try {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    console.log('✓ Server closed');
    process.exit(0);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
