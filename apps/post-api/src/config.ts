import { z } from 'zod';
import { ConfigurationError, formatIssues, loadEngineConfig } from '@postcraft/post-engine';
import type { EngineConfig } from '@postcraft/post-engine';

export interface ApiConfig {
  port: number;
  host: string;
  feedbackLogPath: string;
  engine: EngineConfig;
}

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const ApiEnvSchema = z.object({
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65535).default(8000)),
  HOST: z.preprocess(blankAsUndefined, z.string().default('0.0.0.0')),
  FEEDBACK_LOG_PATH: z.preprocess(blankAsUndefined, z.string().default('feedback.jsonl')),
});

/**
 * HTTP bind settings plus the engine configuration
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = ApiEnvSchema.safeParse(env);

  if (!parsed.success) {
    const firstKey = parsed.error.issues[0]?.path[0];
    throw new ConfigurationError(`Invalid API configuration: ${formatIssues(parsed.error.issues)}`, {
      configKey: typeof firstKey === 'string' ? firstKey : undefined,
    });
  }

  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    feedbackLogPath: parsed.data.FEEDBACK_LOG_PATH,
    engine: loadEngineConfig(env),
  };
}
