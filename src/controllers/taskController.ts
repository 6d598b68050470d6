/**
 * taskController.ts
 * Poll, list, cancel and delete tasks
 */

import type { Request, Response } from 'express';
import { z } from 'zod';

import { ERROR_MESSAGES } from '../constants/index.js';
import type { AppContext } from '../context.js';
import { ForbiddenError, InvalidRequestError, TaskNotFoundError } from '../errors.js';
import { canSeeAllTasks } from '../middleware/identity.js';
import { sendError } from '../middleware/errorHandler.js';
import { DEFAULT_LIST_LIMIT } from '../task-registry.js';
import { TASK_STATUSES, TASK_TYPES, type Task, type TaskView } from '../task.types.js';
import { toIsoOrNull } from '../utils/clock.js';

const MAX_LIST_LIMIT = 100;

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
  status: z.enum(TASK_STATUSES).optional(),
  type: z.enum(TASK_TYPES).optional(),
  owner: z.string().min(1).optional(),
});

function toTaskView(task: Task): TaskView {
  const view: TaskView = {
    task_id: task.id,
    type: task.type,
    status: task.status,
    progress: task.progress,
    message: task.message,
    created_at: new Date(task.createdAt).toISOString(),
    started_at: toIsoOrNull(task.startedAt),
    completed_at: toIsoOrNull(task.completedAt),
  };
  if (task.results !== undefined) {
    view.results = task.results;
  }
  if (task.error !== undefined) {
    view.error = task.error;
  }
  return view;
}

export function createTaskController(context: AppContext) {
  const { registry } = context;
  const security = { enabled: context.config.security.enableAuth };

  /**
   * Look up a task the caller is allowed to touch
   */
  function accessibleTask(req: Request): Task {
    const taskId = req.params.taskId;
    const task = registry.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (!canSeeAllTasks(req, security) && task.owner !== req.identity?.userId) {
      throw new ForbiddenError(ERROR_MESSAGES.TASK_FORBIDDEN);
    }
    return task;
  }

  return {
    /**
     * List tasks; admins see every owner's
     * GET /api/tasks
     */
    listTasks(req: Request, res: Response): void {
      const query = listQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendError(res, InvalidRequestError.fromZod(query.error));
        return;
      }

      const { limit, offset, status, type, owner } = query.data;
      const result = registry.list({
        owner: canSeeAllTasks(req, security) ? owner : req.identity?.userId,
        status,
        type,
        limit,
        offset,
      });

      res.json({
        total: result.total,
        limit: result.limit,
        offset: result.offset,
        tasks: result.tasks.map(toTaskView),
      });
    },

    /**
     * Poll one task
     * GET /api/tasks/:taskId
     */
    getTask(req: Request, res: Response): void {
      try {
        res.json(toTaskView(accessibleTask(req)));
      } catch (error) {
        sendError(res, error);
      }
    },

    /**
     * POST /api/tasks/:taskId/cancel
     */
    cancelTask(req: Request, res: Response): void {
      try {
        const task = accessibleTask(req);
        if (registry.cancel(task.id)) {
          res.json({ success: true, message: ERROR_MESSAGES.TASK_CANCELLED(task.id) });
        } else {
          res.json({ success: false, message: ERROR_MESSAGES.TASK_NOT_CANCELLABLE(task.id) });
        }
      } catch (error) {
        sendError(res, error);
      }
    },

    /**
     * DELETE /api/tasks/:taskId
     */
    deleteTask(req: Request, res: Response): void {
      try {
        const task = accessibleTask(req);
        const deleted = registry.delete(task.id);
        res.json({
          success: deleted,
          message: deleted
            ? ERROR_MESSAGES.TASK_DELETED(task.id)
            : ERROR_MESSAGES.TASK_NOT_FOUND(task.id),
        });
      } catch (error) {
        sendError(res, error);
      }
    },
  };
}
