// src/core/errors.ts

export enum ErrorCode {
  INVALID_URL = 'invalid_url',
  INVALID_SCHEMA = 'invalid_schema',
  SCHEMA_NOT_FOUND = 'schema_not_found',
  BROWSER_LAUNCH_FAILED = 'browser_launch_failed',
  NAVIGATION_FAILED = 'navigation_failed',
}

export class HarvestError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarvestError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export interface ErrorSummary {
  code: ErrorCode | 'unknown';
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export function summarizeError(error: unknown): ErrorSummary {
  if (error instanceof HarvestError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      suggestion: error.suggestion,
    };
  }

  return {
    code: 'unknown',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}
