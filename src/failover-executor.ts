/**
 * failover-executor.ts
 * Runs a model call against its primary and, on failure, exactly one alternate
 */

import { RETRY_AFTER_SECONDS } from './constants/index.js';
import { FailoverExhaustedError, ModelInvocationError, ModelUnavailableError } from './errors.js';
import type { FailoverManager } from './failover-manager.js';
import { getErrorMessage } from './utils/error-helpers.js';
import { logger } from './utils/logger.js';

export interface FailoverInfo {
  original: string;
  alternative: string;
}

export interface FailoverOutcome<T> {
  value: T;
  /** Model that produced the value */
  model: string;
  failover?: FailoverInfo;
}

/**
 * Header value attached to responses served by an alternate model
 */
export function formatFailoverHeader(info: FailoverInfo): string {
  return `Original: ${info.original}, Alternative: ${info.alternative}`;
}

function isClientError(error: unknown): boolean {
  return error instanceof ModelInvocationError && error.isClientError();
}

function isAbort(error: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true || (error instanceof Error && error.name === 'AbortError');
}

/**
 * Invoke `model`; on a failure that another model could avoid, mark it failed and
 * retry once on an eligible alternate.
 *
 * @throws ModelUnavailableError when no alternate is eligible
 * @throws FailoverExhaustedError when the alternate fails as well
 */
export async function executeWithFailover<T>(
  manager: FailoverManager,
  modelType: string,
  model: string,
  invoke: (model: string) => Promise<T>,
  signal?: AbortSignal
): Promise<FailoverOutcome<T>> {
  try {
    const value = await invoke(model);
    manager.markSuccess(model);
    return { value, model };
  } catch (error) {
    if (isClientError(error) || isAbort(error, signal)) {
      throw error;
    }
    manager.markFailure(model);
    logger.warn(`Model ${model} failed, looking for an alternate`, {
      modelType,
      error: getErrorMessage(error),
    });
  }

  const alternative = manager.getAlternative(modelType, model);
  if (!alternative) {
    throw new ModelUnavailableError(model, modelType, RETRY_AFTER_SECONDS.modelUnavailable);
  }

  try {
    const value = await invoke(alternative);
    manager.recordFailoverEvent(model, alternative, true);
    manager.markSuccess(alternative);
    logger.info(`Failover succeeded: ${model} -> ${alternative}`, { modelType });
    return { value, model: alternative, failover: { original: model, alternative } };
  } catch (error) {
    if (isAbort(error, signal)) {
      throw error;
    }
    const message = getErrorMessage(error);
    manager.markFailure(alternative);
    manager.recordFailoverEvent(model, alternative, false, message);
    logger.error(`Failover failed: ${model} -> ${alternative}`, { modelType, error: message });
    throw new FailoverExhaustedError(
      model,
      alternative,
      RETRY_AFTER_SECONDS.failoverExhausted,
      message
    );
  }
}
