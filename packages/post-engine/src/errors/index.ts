/**
 * Error types for the post generation pipeline.
 * Categories drive how the API layer reports a failure.
 */

import type { ZodIssue } from 'zod';
import type { PipelineErrorCode } from '../types';

export enum ErrorCategory {
  /** Request failed validation before the pipeline started */
  INVALID_INPUT = 'INVALID_INPUT',
  /** Completion provider unreachable, timed out or returned a non-success status */
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  /** Missing or malformed configuration */
  CONFIGURATION = 'CONFIGURATION',
  /** Unknown or unexpected errors */
  UNKNOWN = 'UNKNOWN',
}

/**
 * Base error class with categorization
 */
export class PostEngineError extends Error {
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly originalError?: Error;

  constructor(
    message: string,
    options: {
      category: ErrorCategory;
      retryable?: boolean;
      context?: Record<string, unknown>;
      originalError?: Error;
    }
  ) {
    super(message);
    this.name = 'PostEngineError';
    this.category = options.category;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.originalError = options.originalError;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Code reported to API clients and in terminal stream events
   */
  get code(): PipelineErrorCode {
    switch (this.category) {
      case ErrorCategory.INVALID_INPUT:
        return 'invalid_input';
      case ErrorCategory.PROVIDER_UNAVAILABLE:
        return 'provider_unavailable';
      default:
        return 'internal_error';
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
            stack: this.originalError.stack,
          }
        : undefined,
    };
  }
}

/**
 * Invalid request (empty topic, post count out of range)
 */
export class InvalidInputError extends PostEngineError {
  public readonly issues: ZodIssue[];

  constructor(message: string, options?: { issues?: ZodIssue[]; context?: Record<string, unknown> }) {
    super(message, {
      category: ErrorCategory.INVALID_INPUT,
      retryable: false,
      context: options?.context,
    });
    this.name = 'InvalidInputError';
    this.issues = options?.issues ?? [];
  }
}

/**
 * Completion provider failure. Fatal during brainstorming, absorbed by
 * fallbacks during drafting and refinement.
 */
export class ProviderUnavailableError extends PostEngineError {
  public readonly provider: string;
  public readonly statusCode?: number;
  public readonly timedOut: boolean;

  constructor(
    message: string,
    options: {
      provider: string;
      statusCode?: number;
      timedOut?: boolean;
      context?: Record<string, unknown>;
      originalError?: Error;
    }
  ) {
    const isRateLimit = options.statusCode === 429;
    const isServerError = options.statusCode !== undefined && options.statusCode >= 500;

    super(message, {
      category: ErrorCategory.PROVIDER_UNAVAILABLE,
      retryable: Boolean(options.timedOut || isRateLimit || isServerError),
      context: {
        ...options.context,
        provider: options.provider,
        statusCode: options.statusCode,
      },
      originalError: options.originalError,
    });
    this.name = 'ProviderUnavailableError';
    this.provider = options.provider;
    this.statusCode = options.statusCode;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Configuration error (invalid env vars)
 */
export class ConfigurationError extends PostEngineError {
  constructor(
    message: string,
    options?: {
      configKey?: string;
      context?: Record<string, unknown>;
      originalError?: Error;
    }
  ) {
    super(message, {
      category: ErrorCategory.CONFIGURATION,
      retryable: false,
      context: {
        ...options?.context,
        configKey: options?.configKey,
      },
      originalError: options?.originalError,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Convert unknown error to PostEngineError
 */
export function toPostEngineError(error: unknown): PostEngineError {
  if (error instanceof PostEngineError) {
    return error;
  }

  if (error instanceof Error) {
    return new PostEngineError(error.message, {
      category: ErrorCategory.UNKNOWN,
      originalError: error,
    });
  }

  // Non-Error object
  return new PostEngineError(String(error), {
    category: ErrorCategory.UNKNOWN,
  });
}

/**
 * Human-readable summary of zod issues, e.g. "postCount: Post count must be between 1 and 10"
 */
export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
