// src/core/errors.ts
export enum ErrorCode {
  INVALID_URL = 'invalid_url',
  BROWSER_NOT_FOUND = 'browser_not_found',
  SESSION_LAUNCH_FAILED = 'session_launch_failed',
  PAGE_LOAD_TIMEOUT = 'page_load_timeout',
  NETWORK_ERROR = 'network_error',
  EXPORT_FAILED = 'export_failed',
  STRATEGIES_EXHAUSTED = 'strategies_exhausted',
}

export class DocsnapError extends Error {
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
    this.name = 'DocsnapError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
