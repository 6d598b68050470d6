/**
 * errors.ts
 * Error taxonomy rendered at the HTTP boundary
 */

import type { ZodError } from 'zod';

import { ERROR_MESSAGES } from './constants/index.js';

export type ApiErrorCode =
  | 'task_not_found'
  | 'rate_limit_exceeded'
  | 'model_unavailable'
  | 'failover_exhausted'
  | 'invalid_request'
  | 'forbidden';

export abstract class ApiError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: ApiErrorCode;

  /** Seconds the caller should wait before retrying, when meaningful */
  readonly retryAfter?: number;

  constructor(message: string, retryAfter?: number) {
    super(message);
    this.name = new.target.name;
    this.retryAfter = retryAfter;
  }

  toJSON(): Record<string, unknown> {
    return {
      detail: this.message,
      type: this.code,
      ...(this.retryAfter !== undefined ? { retry_after: this.retryAfter } : {}),
    };
  }
}

export class TaskNotFoundError extends ApiError {
  readonly statusCode = 404;
  readonly code = 'task_not_found';

  constructor(readonly taskId: string) {
    super(ERROR_MESSAGES.TASK_NOT_FOUND(taskId));
  }
}

export class RateLimitExceededError extends ApiError {
  readonly statusCode = 429;
  readonly code = 'rate_limit_exceeded';

  constructor(
    waitSeconds: number,
    readonly limiter: string
  ) {
    super(ERROR_MESSAGES.RATE_LIMITED(waitSeconds), waitSeconds);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), limiter: this.limiter };
  }
}

export class ModelUnavailableError extends ApiError {
  readonly statusCode = 503;
  readonly code = 'model_unavailable';

  constructor(
    readonly model: string,
    readonly modelType: string,
    retryAfter: number
  ) {
    super(ERROR_MESSAGES.MODEL_UNAVAILABLE, retryAfter);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), model: this.model, model_type: this.modelType };
  }
}

export class FailoverExhaustedError extends ApiError {
  readonly statusCode = 503;
  readonly code = 'failover_exhausted';

  constructor(
    readonly originalModel: string,
    readonly alternativeModel: string,
    retryAfter: number,
    readonly reason?: string
  ) {
    super(ERROR_MESSAGES.FAILOVER_EXHAUSTED, retryAfter);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      original_model: this.originalModel,
      alternative_model: this.alternativeModel,
    };
  }
}

export class InvalidRequestError extends ApiError {
  readonly statusCode = 400;
  readonly code = 'invalid_request';

  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }> = []
  ) {
    super(message);
  }

  static fromZod(
    error: ZodError,
    message: string = ERROR_MESSAGES.INVALID_REQUEST
  ): InvalidRequestError {
    return new InvalidRequestError(
      message,
      error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

export class ForbiddenError extends ApiError {
  readonly statusCode = 403;
  readonly code = 'forbidden';
}

/**
 * Failure reported by the model backend. `statusCode` is the backend's HTTP
 * status when it answered, undefined for transport failures and timeouts.
 */
export class ModelInvocationError extends Error {
  constructor(
    message: string,
    readonly model: string,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = 'ModelInvocationError';
  }

  /**
   * Errors caused by the request itself; another model would fail the same way.
   */
  isClientError(): boolean {
    return (
      this.statusCode === 400 ||
      this.statusCode === 401 ||
      this.statusCode === 403 ||
      this.statusCode === 404
    );
  }
}
