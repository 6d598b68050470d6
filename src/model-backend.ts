/**
 * model-backend.ts
 * Client for the model-serving backend that performs the actual inference
 */

import type { ModelType } from './constants/index.js';
import { ModelInvocationError } from './errors.js';
import type { TaskType } from './task.types.js';
import { parseBackendError } from './utils/backendError.js';
import { getErrorMessage } from './utils/error-helpers.js';
import { FetchTimeoutError, fetchWithTimeout } from './utils/fetchWithTimeout.js';
import { logger } from './utils/logger.js';

export interface ModelInvocation {
  modelType: ModelType;
  model: string;
  taskType: TaskType;
  input: unknown;
  signal?: AbortSignal;
}

/**
 * Anything able to run a model. Implementations throw ModelInvocationError on failure.
 */
export interface ModelBackend {
  invoke(request: ModelInvocation): Promise<unknown>;
}

export interface HttpModelBackendConfig {
  url: string;
  timeoutMs: number;
  apiKey?: string;
}

export class HttpModelBackend implements ModelBackend {
  private config: HttpModelBackendConfig;

  constructor(config: HttpModelBackendConfig) {
    this.config = config;
  }

  async invoke(request: ModelInvocation): Promise<unknown> {
    const url = `${this.config.url.replace(/\/+$/, '')}/v1/models/${encodeURIComponent(request.model)}/invoke`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    try {
      return await fetchWithTimeout(
        url,
        {
          method: 'POST',
          headers,
          body: JSON.stringify({
            model: request.model,
            model_type: request.modelType,
            task_type: request.taskType,
            input: request.input,
          }),
          timeout: this.config.timeoutMs,
          signal: request.signal,
        },
        response => this.readResult(request.model, response)
      );
    } catch (error) {
      if (request.signal?.aborted || error instanceof ModelInvocationError) {
        throw error;
      }
      const message =
        error instanceof FetchTimeoutError ? error.message : `Model backend unreachable: ${getErrorMessage(error)}`;
      throw new ModelInvocationError(message, request.model);
    }
  }

  /**
   * Runs while the request timeout is still armed
   */
  private async readResult(model: string, response: Response): Promise<unknown> {
    if (!response.ok) {
      const message = await parseBackendError(response);
      logger.warn(`Model backend rejected invocation of ${model}`, {
        status: response.status,
        message,
      });
      throw new ModelInvocationError(message, model, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      // Aborts while reading surface as timeouts or cancellations upstream
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      throw new ModelInvocationError(
        `Invalid JSON from model backend: ${error.message}`,
        model,
        response.status
      );
    }
  }
}
