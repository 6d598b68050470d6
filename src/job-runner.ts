/**
 * job-runner.ts
 * Fire-and-forget background jobs that drive a task from pending to a terminal state
 */

import type { ModelType } from './constants/index.js';
import { type InferenceDeps, runInference } from './inference-runner.js';
import { ProgressTracker } from './progress-tracker.js';
import type { TaskRegistry } from './task-registry.js';
import { getErrorMessage } from './utils/error-helpers.js';
import { logger } from './utils/logger.js';

export interface JobSpec {
  modelType: ModelType;
  model: string;
}

export interface JobRunnerDeps extends InferenceDeps {
  registry: TaskRegistry;
}

/** Share of the progress bar covered by model steps; the rest is set on completion */
const STEP_PROGRESS_SPAN = 0.95;

export class JobRunner {
  private deps: JobRunnerDeps;
  private inFlight = new Map<string, Promise<void>>();

  constructor(deps: JobRunnerDeps) {
    this.deps = deps;
  }

  /**
   * Start the job for an already-created task. Returns immediately; failures end
   * up on the task record, never as a rejection.
   */
  start(taskId: string, spec: JobSpec): void {
    const job = this.run(taskId, spec).finally(() => {
      this.inFlight.delete(taskId);
    });
    this.inFlight.set(taskId, job);
  }

  activeJobs(): number {
    return this.inFlight.size;
  }

  /**
   * Wait for every running job to settle
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inFlight.values()));
  }

  private async run(taskId: string, spec: JobSpec): Promise<void> {
    const { registry } = this.deps;
    const task = registry.get(taskId);
    const signal = registry.getSignal(taskId);
    if (!task || !signal || signal.aborted) {
      logger.debug(`Job for task ${taskId} skipped: task is gone or no longer active`);
      return;
    }

    if (!registry.update(taskId, { status: 'running', message: `running on ${spec.model}` })) {
      return;
    }

    const tracker = new ProgressTracker(taskId, registry);

    try {
      const { results, failover } = await runInference(this.deps, {
        modelType: spec.modelType,
        model: spec.model,
        taskType: task.type,
        params: task.params,
        signal,
        onStep: (fraction, description) => tracker.report(fraction * STEP_PROGRESS_SPAN, description),
      });

      if (signal.aborted) {
        return;
      }

      registry.update(taskId, {
        status: 'completed',
        message: failover
          ? `completed on ${failover.alternative} after ${failover.original} failed`
          : 'completed',
        results,
      });
      logger.info(`Task completed: ${taskId}`, { model: results.model });
    } catch (error) {
      if (signal.aborted) {
        logger.debug(`Job for task ${taskId} stopped after cancellation`);
        return;
      }
      const message = getErrorMessage(error);
      registry.update(taskId, { status: 'failed', message: 'failed', error: message });
      logger.error(`Task failed: ${taskId}`, { type: task.type, error: message });
    }
  }
}
