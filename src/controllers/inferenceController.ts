/**
 * inferenceController.ts
 * Model catalogue, background task creation and synchronous invocation
 */

import type { Request, Response } from 'express';
import { z } from 'zod';

import {
  DEFAULT_TASK_TYPE,
  ERROR_MESSAGES,
  MODEL_TYPES,
  type ModelType,
  TASK_TYPES_BY_MODEL_TYPE,
} from '../constants/index.js';
import type { AppContext } from '../context.js';
import { InvalidRequestError, ModelInvocationError } from '../errors.js';
import { formatFailoverHeader } from '../failover-executor.js';
import { InvalidModelOutputError, runInference } from '../inference-runner.js';
import { sendError } from '../middleware/errorHandler.js';
import { TASK_TYPES, type TaskParams, type TaskType, parseTaskParams } from '../task.types.js';
import { getErrorMessage } from '../utils/error-helpers.js';
import { logger } from '../utils/logger.js';

const inferenceBodySchema = z.object({
  task_type: z.enum(TASK_TYPES).optional(),
  model: z.string().min(1).optional(),
  params: z.unknown(),
});

interface ValidatedInference {
  modelType: ModelType;
  taskType: TaskType;
  model: string;
  params: TaskParams;
}

function isModelType(value: string): value is ModelType {
  return MODEL_TYPES.some(type => type === value);
}

export function createInferenceController(context: AppContext) {
  const { registry, failover, backend, jobs, config } = context;

  /**
   * Resolve model type, task type, model and params from the route and body
   */
  function validate(req: Request): ValidatedInference {
    const modelType = req.params.modelType;
    if (!isModelType(modelType)) {
      throw new InvalidRequestError(ERROR_MESSAGES.MODEL_TYPE_UNKNOWN(modelType));
    }

    const body = inferenceBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      throw InvalidRequestError.fromZod(body.error);
    }

    const taskType = body.data.task_type ?? DEFAULT_TASK_TYPE[modelType];
    if (!TASK_TYPES_BY_MODEL_TYPE[modelType].includes(taskType)) {
      throw new InvalidRequestError(`Task type ${taskType} is not served by ${modelType} models`);
    }

    const params = parseTaskParams(taskType, body.data.params ?? {});
    if (!params.success) {
      throw InvalidRequestError.fromZod(params.error, `Invalid params for ${taskType}`);
    }

    return {
      modelType,
      taskType,
      model: body.data.model ?? config.failover.models[modelType].defaultModel,
      params: params.data,
    };
  }

  return {
    /**
     * Configured models per type with their current availability
     * GET /api/inference/models
     */
    listModels(_req: Request, res: Response): void {
      const configured = new Map(failover.getModelTypes().map(type => [type.modelType, type]));
      const models = MODEL_TYPES.map(modelType => {
        const typeConfig = configured.get(modelType);
        const alternatives = typeConfig?.alternatives ?? {};
        const ids = new Set([
          config.failover.models[modelType].defaultModel,
          ...Object.keys(alternatives),
          ...Object.values(alternatives).flat(),
        ]);
        return {
          model_type: modelType,
          default_model: config.failover.models[modelType].defaultModel,
          task_types: TASK_TYPES_BY_MODEL_TYPE[modelType],
          cooldown_seconds: typeConfig?.cooldownSeconds ?? config.failover.cooldownSeconds,
          models: Array.from(ids).map(id => ({
            id,
            available: failover.getModelStatus(id)?.available ?? true,
            alternatives: alternatives[id] ?? [],
          })),
        };
      });
      res.json({ models });
    },

    /**
     * Queue a background task and return its id
     * POST /api/inference/:modelType/tasks
     */
    createTask(req: Request, res: Response): void {
      let request: ValidatedInference;
      try {
        request = validate(req);
      } catch (error) {
        sendError(res, error);
        return;
      }

      const owner = req.identity?.userId ?? 'anonymous';
      const taskId = registry.create(request.taskType, owner, request.params);
      jobs.start(taskId, { modelType: request.modelType, model: request.model });

      res.status(202).json({
        task_id: taskId,
        status: 'pending',
        message: 'queued',
        model: request.model,
        status_url: `/api/tasks/${taskId}`,
      });
    },

    /**
     * Run a request inline, with failover
     * POST /api/inference/:modelType/invoke
     */
    async invoke(req: Request, res: Response): Promise<void> {
      let request: ValidatedInference;
      try {
        request = validate(req);
      } catch (error) {
        sendError(res, error);
        return;
      }

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) {
          controller.abort();
        }
      });

      try {
        const outcome = await runInference(
          { failover, backend },
          { ...request, signal: controller.signal }
        );
        if (outcome.failover) {
          res.setHeader('X-Model-Failover', formatFailoverHeader(outcome.failover));
        }
        res.json({
          model: outcome.model,
          task_type: request.taskType,
          results: outcome.results,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          logger.debug('Client disconnected before invocation finished', { path: req.path });
          return;
        }
        if (error instanceof ModelInvocationError) {
          res.status(error.isClientError() ? error.statusCode ?? 400 : 502).json({
            detail: error.message,
            type: 'model_error',
            model: error.model,
          });
          return;
        }
        if (error instanceof InvalidModelOutputError) {
          logger.error('Model returned an invalid payload', { error: getErrorMessage(error) });
          res.status(502).json({ detail: error.message, type: 'model_error', model: error.model });
          return;
        }
        sendError(res, error);
      }
    },
  };
}
