/**
 * logsController.ts
 * Controller for log retrieval
 */

import type { Request, Response } from 'express';
import { z } from 'zod';

import { InvalidRequestError } from '../errors.js';
import { sendError } from '../middleware/errorHandler.js';
import { logger } from '../utils/logger.js';

const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).optional(),
  level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  since: z
    .string()
    .refine(value => !isNaN(Date.parse(value)), { message: 'since must be an ISO timestamp' })
    .optional(),
});

/**
 * GET /api/admin/logs
 */
export const getLogs = (req: Request, res: Response): void => {
  const query = logsQuerySchema.safeParse(req.query);
  if (!query.success) {
    sendError(res, InvalidRequestError.fromZod(query.error));
    return;
  }
  const { limit, level, since } = query.data;

  let logs = logger.getLogs(limit);

  // Filter by level if specified
  if (level) {
    logs = logs.filter(log => log.level === level);
  }

  // Filter by timestamp if since is specified (ISO string)
  if (since) {
    const sinceMs = Date.parse(since);
    logs = logs.filter(log => Date.parse(log.timestamp) >= sinceMs);
  }

  res.json({
    logs,
    count: logs.length,
    total: logger.getLogs().length,
  });
};

/**
 * POST /api/admin/logs/clear
 */
export const clearLogs = (_req: Request, res: Response): void => {
  logger.clearLogs();
  res.json({ success: true, message: 'Logs cleared' });
};
