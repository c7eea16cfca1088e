import { ErrorCode } from '../types';

export class MirrorRankError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>,
    retryable = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'MirrorRankError';
    this.code = code;
    this.details = details;
    this.retryable = retryable;
  }
}

/**
 * Create a standardized MirrorRankError
 */
export function createRankError(
  message: string,
  code: ErrorCode,
  details?: Record<string, unknown>,
  retryable = false,
  cause?: unknown
): MirrorRankError {
  return new MirrorRankError(message, code, details, retryable, cause);
}

export function isRankError(error: unknown): error is MirrorRankError {
  return error instanceof MirrorRankError;
}

/**
 * Transport failures are retryable; anything carrying an explicit flag wins.
 */
export function isRetryableError(error: unknown): boolean {
  if (isRankError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    return /ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|socket hang up|network timeout/i.test(
      error.message
    );
  }

  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format error for logging, following the cause chain
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  let formatted = isRankError(error) ? `[${error.code}] ${error.message}` : error.message;
  if (error.cause !== undefined) {
    formatted += `: ${formatError(error.cause)}`;
  }
  return formatted;
}
