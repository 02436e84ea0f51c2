/**
 * Error Handling Middleware
 *
 * Maps render errors to a user-facing failure that the chat layer can send
 * back as-is. Unknown errors are logged and reported as internal errors.
 */

import {
  AdmissionTimeoutError,
  CancellationError,
  InputError,
  ValidationError,
} from '../models/errors';
import { log, LogLevel } from '../utils/logger';

/**
 * Failure codes shown to callers
 */
export enum RenderErrorCode {
  PLAYER_NOT_IN_MATCH = 'PLAYER_NOT_IN_MATCH',
  RENDER_QUEUE_FULL = 'RENDER_QUEUE_FULL',
  RENDER_TIMED_OUT = 'RENDER_TIMED_OUT',
  RENDER_CANCELLED = 'RENDER_CANCELLED',
  INVALID_MATCH_DATA = 'INVALID_MATCH_DATA',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface RenderFailure {
  code: RenderErrorCode;
  message: string;
  retryable: boolean;
  job_id: string;
  details?: Array<{ field: string; message: string }>;
}

/**
 * Handle error and format the failure
 *
 * @example
 * ```typescript
 * try {
 *   const png = await service.renderSummary(account, match);
 * } catch (error) {
 *   const failure = handleRenderError(error, jobId);
 *   await reply(failure.message);
 * }
 * ```
 */
export function handleRenderError(error: unknown, jobId: string): RenderFailure {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof InputError) {
    return {
      code: RenderErrorCode.PLAYER_NOT_IN_MATCH,
      message: 'The tracked player is not part of this match.',
      retryable: false,
      job_id: jobId,
    };
  }

  if (err instanceof AdmissionTimeoutError) {
    return {
      code: RenderErrorCode.RENDER_QUEUE_FULL,
      message: err.message,
      retryable: true,
      job_id: jobId,
    };
  }

  if (err instanceof CancellationError) {
    return err.timedOut
      ? {
          code: RenderErrorCode.RENDER_TIMED_OUT,
          message: 'Rendering took too long. Please try again.',
          retryable: true,
          job_id: jobId,
        }
      : {
          code: RenderErrorCode.RENDER_CANCELLED,
          message: 'Rendering was cancelled.',
          retryable: false,
          job_id: jobId,
        };
  }

  if (err instanceof ValidationError) {
    return {
      code: RenderErrorCode.INVALID_MATCH_DATA,
      message: err.message,
      retryable: false,
      job_id: jobId,
      details: err.details,
    };
  }

  log(LogLevel.ERROR, 'Unhandled render error', {
    job_id: jobId,
    error: err.message,
    stack: err.stack,
  });

  return {
    code: RenderErrorCode.INTERNAL_ERROR,
    message: 'Failed to render the match summary.',
    retryable: false,
    job_id: jobId,
  };
}

/**
 * Run a render and return either its result or the mapped failure
 */
export async function withRenderErrorHandling<T>(
  fn: () => Promise<T>,
  jobId: string
): Promise<{ ok: true; value: T } | { ok: false; failure: RenderFailure }> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, failure: handleRenderError(error, jobId) };
  }
}
