/**
 * error-messages.ts
 * Standardized error messages used across the codebase
 */

export const ERROR_MESSAGES = {
  // Task errors
  TASK_NOT_FOUND: (id: string) => `Task ${id} not found`,
  TASK_FORBIDDEN: 'You are not authorized to access this task',
  TASK_CANCELLED: (id: string) => `Task ${id} cancelled successfully`,
  TASK_NOT_CANCELLABLE: (id: string) =>
    `Unable to cancel task ${id}, it may already be completed`,
  TASK_DELETED: (id: string) => `Task ${id} deleted`,

  // Model errors
  MODEL_TYPE_UNKNOWN: (modelType: string) => `Unknown model type: ${modelType}`,
  MODEL_UNAVAILABLE:
    'The requested model is temporarily unavailable and no alternative is available',
  FAILOVER_EXHAUSTED: 'All available models have failed',
  MODEL_NOT_FOUND: (model: string) => `Model ${model} not found`,
  MODEL_RESET: (model: string) => `Model status ${model} reset`,
  FAILOVER_CONFIGURED: (model: string, modelType: string) =>
    `Failover configuration updated for ${model} of type ${modelType}`,

  // Rate limiting
  RATE_LIMITED: (waitSeconds: number) =>
    `Rate limit exceeded. Please try again in ${waitSeconds} seconds.`,

  // Auth errors
  AUTH_REQUIRED: 'Authentication required',
  AUTH_FAILED: 'Invalid API key',
  FORBIDDEN: 'Admin access required',

  // Generic errors
  INTERNAL_SERVER_ERROR: 'Internal server error',
  INVALID_REQUEST: 'Invalid request',
  NOT_FOUND: 'Not found',
} as const;
