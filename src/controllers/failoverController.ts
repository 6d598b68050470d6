/**
 * failoverController.ts
 * Failover diagnostics and run-time configuration
 */

import type { Request, Response } from 'express';
import { z } from 'zod';

import { ERROR_MESSAGES, MODEL_TYPES } from '../constants/index.js';
import type { AppContext } from '../context.js';
import { InvalidRequestError } from '../errors.js';
import { sendError } from '../middleware/errorHandler.js';
import { toIsoOrNull } from '../utils/clock.js';

const DEFAULT_HISTORY_LIMIT = 20;

const historyQuerySchema = z.object({
  history: z.coerce.number().int().min(0).max(1000).default(DEFAULT_HISTORY_LIMIT),
});

const configureBodySchema = z.object({
  model_type: z.enum(MODEL_TYPES),
  model_id: z.string().min(1),
  alternatives: z.array(z.string().min(1)).min(1),
  cooldown_seconds: z.number().int().min(1).optional(),
});

export function createFailoverController(context: AppContext) {
  const { failover } = context;

  return {
    /**
     * Per-model health, aggregate counters and recent events
     * GET /api/failover/health
     */
    getHealth(req: Request, res: Response): void {
      const query = historyQuerySchema.safeParse(req.query);
      if (!query.success) {
        sendError(res, InvalidRequestError.fromZod(query.error));
        return;
      }

      const report = failover.healthReport();
      const models = Object.fromEntries(
        Object.entries(report.models).map(([id, status]) => [
          id,
          { ...status, lastFailureAt: toIsoOrNull(status.lastFailureAt) },
        ])
      );
      const history = failover.getHistory(query.data.history).map(event => ({
        ...event,
        timestamp: new Date(event.timestamp).toISOString(),
      }));

      res.json({ metrics: report.metrics, models, history });
    },

    /**
     * Mark a model available again
     * POST /api/failover/models/:modelId/reset
     */
    resetModel(req: Request, res: Response): void {
      const modelId = req.params.modelId;
      if (!failover.resetModel(modelId)) {
        res.status(404).json({ detail: ERROR_MESSAGES.MODEL_NOT_FOUND(modelId), type: 'not_found' });
        return;
      }
      res.json({ success: true, message: ERROR_MESSAGES.MODEL_RESET(modelId) });
    },

    /**
     * Replace the alternates of one primary model
     * PUT /api/failover/config
     */
    configure(req: Request, res: Response): void {
      const body = configureBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        sendError(res, InvalidRequestError.fromZod(body.error));
        return;
      }

      const { model_type, model_id, alternatives, cooldown_seconds } = body.data;
      if (alternatives.includes(model_id)) {
        sendError(res, new InvalidRequestError('A model cannot be its own alternative'));
        return;
      }

      failover.configureAlternatives(model_type, model_id, alternatives, cooldown_seconds);
      res.json({
        success: true,
        message: ERROR_MESSAGES.FAILOVER_CONFIGURED(model_id, model_type),
      });
    },
  };
}
