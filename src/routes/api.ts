/**
 * api.ts
 * API routes - public task/inference endpoints and admin diagnostics
 */

import { Router } from 'express';

import type { AppContext } from '../context.js';
import { createCacheController } from '../controllers/cacheController.js';
import { createFailoverController } from '../controllers/failoverController.js';
import { createHealthController } from '../controllers/healthController.js';
import { createInferenceController } from '../controllers/inferenceController.js';
import { clearLogs, getLogs } from '../controllers/logsController.js';
import { createTaskController } from '../controllers/taskController.js';
import { requireAdmin } from '../middleware/identity.js';

export function createApiRouter(context: AppContext): Router {
  const router = Router();
  const adminOnly = requireAdmin({ enabled: context.config.security.enableAuth });

  const health = createHealthController(context);
  const tasks = createTaskController(context);
  const inference = createInferenceController(context);
  const failover = createFailoverController(context);
  const cache = createCacheController(context);

  // Health
  router.get('/health', health.getHealth);

  // Tasks
  router.get('/tasks', tasks.listTasks);
  router.get('/tasks/:taskId', tasks.getTask);
  router.post('/tasks/:taskId/cancel', tasks.cancelTask);
  router.delete('/tasks/:taskId', tasks.deleteTask);

  // Inference
  router.get('/inference/models', inference.listModels);
  router.post('/inference/:modelType/tasks', inference.createTask);
  router.post('/inference/:modelType/invoke', (req, res) => {
    void inference.invoke(req, res);
  });

  // Failover (admin)
  router.get('/failover/health', adminOnly, failover.getHealth);
  router.post('/failover/models/:modelId/reset', adminOnly, failover.resetModel);
  router.put('/failover/config', adminOnly, failover.configure);

  // Cache (admin)
  router.get('/cache/stats', adminOnly, cache.getStats);
  router.post('/cache/invalidate', adminOnly, cache.invalidate);

  // Logs (admin)
  router.get('/admin/logs', adminOnly, getLogs);
  router.post('/admin/logs/clear', adminOnly, clearLogs);

  return router;
}
