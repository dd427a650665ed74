/**
 * Engine configuration, read from environment variables.
 *
 * Provider keys decide the completion strategy: a missing or placeholder
 * key selects mock mode rather than failing at startup.
 */
import { z } from 'zod';
import type { PipelineConfig } from '../types';
import { DEFAULT_PIPELINE_CONFIG } from '../types';
import { ConfigurationError, formatIssues } from '../errors';

export type LlmProvider = 'anthropic' | 'groq';
export type SearchProviderName = 'duckduckgo' | 'tavily' | 'none';

export interface LlmConfig {
  provider: LlmProvider;
  apiKey?: string;
  model?: string;
}

export interface SearchConfig {
  provider: SearchProviderName;
  apiKey?: string;
  maxResults: number;
}

export interface EngineConfig {
  llm: LlmConfig;
  search: SearchConfig;
  pipeline: PipelineConfig;
}

const PLACEHOLDER_KEYS = ['your_api_key_here', 'changeme'];

// Unset and empty env vars both fall through to the default
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EngineEnvSchema = z.object({
  LLM_PROVIDER: z.preprocess(blankAsUndefined, z.enum(['anthropic', 'groq']).default('groq')),
  ANTHROPIC_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  GROQ_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  GROK_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()), // Accepted alias
  LLM_MODEL: z.preprocess(blankAsUndefined, z.string().optional()),
  COMPLETION_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_PIPELINE_CONFIG.completionTimeoutMs)
  ),
  REFINE_MODE: z.preprocess(
    blankAsUndefined,
    z.enum(['completion', 'template']).default(DEFAULT_PIPELINE_CONFIG.refineMode)
  ),
  SEARCH_PROVIDER: z.preprocess(
    blankAsUndefined,
    z.enum(['duckduckgo', 'tavily', 'none']).default('duckduckgo')
  ),
  TAVILY_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  SEARCH_MAX_RESULTS: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(10).default(3)),
});

/**
 * True for a key that looks like a real credential
 */
export function isUsableApiKey(key: string | undefined): key is string {
  if (!key) return false;
  const trimmed = key.trim();
  return trimmed.length > 0 && !PLACEHOLDER_KEYS.includes(trimmed.toLowerCase());
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineEnvSchema.safeParse(env);

  if (!parsed.success) {
    const firstKey = parsed.error.issues[0]?.path[0];
    throw new ConfigurationError(`Invalid engine configuration: ${formatIssues(parsed.error.issues)}`, {
      configKey: typeof firstKey === 'string' ? firstKey : undefined,
    });
  }

  const vars = parsed.data;
  const apiKey =
    vars.LLM_PROVIDER === 'anthropic' ? vars.ANTHROPIC_API_KEY : (vars.GROQ_API_KEY ?? vars.GROK_API_KEY);

  return {
    llm: {
      provider: vars.LLM_PROVIDER,
      apiKey: apiKey?.trim(),
      model: vars.LLM_MODEL,
    },
    search: {
      provider: vars.SEARCH_PROVIDER,
      apiKey: vars.TAVILY_API_KEY?.trim(),
      maxResults: vars.SEARCH_MAX_RESULTS,
    },
    pipeline: {
      ...DEFAULT_PIPELINE_CONFIG,
      completionTimeoutMs: vars.COMPLETION_TIMEOUT_MS,
      refineMode: vars.REFINE_MODE,
    },
  };
}
