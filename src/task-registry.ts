/**
 * task-registry.ts
 * In-memory store of asynchronous task lifecycles
 *
 * Every public method is synchronous, so each call runs to completion on the event
 * loop before any other registry call can observe the map.
 */

import { randomUUID } from 'crypto';

import type {
  Task,
  TaskListFilter,
  TaskListResult,
  TaskParamsMap,
  TaskStatus,
  TaskType,
  TaskUpdate,
} from './task.types.js';
import { isTerminalStatus } from './task.types.js';
import { type Clock, systemClock } from './utils/clock.js';
import { logger } from './utils/logger.js';

export interface TaskRegistryConfig {
  /** Terminal tasks older than this (by completion time) are pruned; 0 disables */
  retentionSeconds: number;
  /** Upper bound on stored records; oldest terminal tasks are pruned first */
  maxTasks: number;
  /** Clamp progress so it never moves backwards while a task is active */
  monotonicProgress: boolean;
}

export const DEFAULT_TASK_REGISTRY_CONFIG: TaskRegistryConfig = {
  retentionSeconds: 86400,
  maxTasks: 10000,
  monotonicProgress: true,
};

export const DEFAULT_LIST_LIMIT = 20;

export type TaskStats = Record<TaskStatus, number> & { total: number };

export class TaskRegistry {
  private tasks = new Map<string, Task>();
  private sequence = new Map<string, number>();
  private controllers = new Map<string, AbortController>();
  private nextSequence = 0;
  private config: TaskRegistryConfig;
  private clock: Clock;
  private sweepTimer?: NodeJS.Timeout;

  constructor(config: Partial<TaskRegistryConfig> = {}, clock: Clock = systemClock) {
    this.config = { ...DEFAULT_TASK_REGISTRY_CONFIG, ...config };
    this.clock = clock;
  }

  create<K extends TaskType>(type: K, owner: string, params: TaskParamsMap[K]): string {
    const id = randomUUID();
    const task: Task<K> = {
      id,
      type,
      status: 'pending',
      owner,
      createdAt: this.clock.now(),
      startedAt: null,
      completedAt: null,
      progress: 0,
      message: 'queued',
      params,
    };

    this.tasks.set(id, task);
    this.sequence.set(id, this.nextSequence++);
    this.controllers.set(id, new AbortController());

    logger.info(`Task created: ${id}`, { type, owner });
    this.prune();
    return id;
  }

  update(id: string, fields: TaskUpdate): boolean {
    const task = this.tasks.get(id);
    if (!task) {
      logger.warn(`Attempt to update unknown task: ${id}`);
      return false;
    }

    if (task.status === 'cancelled') {
      logger.debug(`Ignoring update to cancelled task: ${id}`, { status: fields.status });
      return false;
    }

    const now = this.clock.now();

    // id, owner and createdAt are never copied across
    if (fields.status !== undefined) {
      task.status = fields.status;
    }
    if (fields.message !== undefined) {
      task.message = fields.message;
    }
    if (fields.results !== undefined) {
      task.results = fields.results;
    }
    if (fields.error !== undefined) {
      task.error = fields.error;
    }
    if (fields.progress !== undefined && Number.isFinite(fields.progress)) {
      task.progress = this.nextProgress(task, fields.progress);
    }

    if (fields.status === 'running' && task.startedAt === null) {
      task.startedAt = now;
    }

    if (fields.status !== undefined && isTerminalStatus(fields.status) && task.completedAt === null) {
      task.completedAt = now;
      task.progress = 100;
      this.releaseSignal(id, fields.status === 'cancelled' ? 'cancelled' : undefined);
    }

    return true;
  }

  get(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : undefined;
  }

  list(filter: TaskListFilter = {}): TaskListResult {
    const limit = Math.max(0, filter.limit ?? DEFAULT_LIST_LIMIT);
    const offset = Math.max(0, filter.offset ?? 0);

    const matching = Array.from(this.tasks.values()).filter(
      task =>
        (filter.owner === undefined || task.owner === filter.owner) &&
        (filter.type === undefined || task.type === filter.type) &&
        (filter.status === undefined || task.status === filter.status)
    );

    matching.sort(
      (a, b) =>
        b.createdAt - a.createdAt ||
        (this.sequence.get(b.id) ?? 0) - (this.sequence.get(a.id) ?? 0)
    );

    return {
      total: matching.length,
      limit,
      offset,
      tasks: matching.slice(offset, offset + limit).map(task => structuredClone(task)),
    };
  }

  cancel(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) {
      return false;
    }
    if (task.status !== 'pending' && task.status !== 'running') {
      return false;
    }

    task.status = 'cancelled';
    task.completedAt = this.clock.now();
    task.progress = 100;
    task.message = 'cancelled by user';
    this.releaseSignal(id, 'cancelled');

    logger.info(`Task cancelled: ${id}`);
    return true;
  }

  delete(id: string): boolean {
    if (!this.tasks.has(id)) {
      return false;
    }
    this.releaseSignal(id, 'deleted');
    this.tasks.delete(id);
    this.sequence.delete(id);
    return true;
  }

  reportProgress(id: string, progress: number, message?: string): boolean {
    return this.update(id, message ? { progress, message } : { progress });
  }

  /**
   * Signal aborted when the task is cancelled or deleted. Undefined once the task
   * has reached a terminal state or is unknown.
   */
  getSignal(id: string): AbortSignal | undefined {
    return this.controllers.get(id)?.signal;
  }

  /**
   * Apply the retention policy. Active tasks are never removed.
   */
  prune(): number {
    const now = this.clock.now();
    let removed = 0;

    if (this.config.retentionSeconds > 0) {
      const cutoff = now - this.config.retentionSeconds * 1000;
      for (const [id, task] of this.tasks) {
        if (task.completedAt !== null && task.completedAt < cutoff) {
          this.delete(id);
          removed++;
        }
      }
    }

    if (this.tasks.size > this.config.maxTasks) {
      const terminal = Array.from(this.tasks.values())
        .filter(task => task.completedAt !== null)
        .sort((a, b) => (a.completedAt ?? 0) - (b.completedAt ?? 0));

      for (const task of terminal) {
        if (this.tasks.size <= this.config.maxTasks) {
          break;
        }
        this.delete(task.id);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug(`Pruned ${removed} finished tasks`, { remaining: this.tasks.size });
    }
    return removed;
  }

  startSweep(intervalMs: number): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.prune();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  stats(): TaskStats {
    const stats: TaskStats = {
      total: this.tasks.size,
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const task of this.tasks.values()) {
      if (task.status in stats) {
        stats[task.status]++;
      }
    }
    return stats;
  }

  private nextProgress(task: Task, requested: number): number {
    const bounded = Math.min(100, Math.max(0, requested));
    if (this.config.monotonicProgress && !isTerminalStatus(task.status)) {
      return Math.max(task.progress, bounded);
    }
    return bounded;
  }

  private releaseSignal(id: string, abortReason?: string): void {
    const controller = this.controllers.get(id);
    if (!controller) {
      return;
    }
    if (abortReason) {
      controller.abort(abortReason);
    }
    this.controllers.delete(id);
  }
}
