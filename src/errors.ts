import type { ZodError } from 'zod';
import type { Platform } from './content/types.js';

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * Text or image provider failure: unreachable, auth rejected, quota exceeded,
 * or an unusable response. `attempts` is set when the call was retried.
 */
export class GenerationError extends AppError {
  constructor(
    message: string,
    public attempts?: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'GENERATION_ERROR', 502, options);
    this.name = 'GenerationError';
  }
}

export class NewsFetchError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NEWS_FETCH_ERROR', 502, options);
    this.name = 'NewsFetchError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public issues: ZodError['issues'] = [],
  ) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

/** A single platform's post failed. Never aborts sibling platforms. */
export class PlatformPostError extends AppError {
  constructor(
    public platform: Platform,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'PLATFORM_POST_ERROR', 502, options);
    this.name = 'PlatformPostError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
