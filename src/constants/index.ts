/**
 * constants/index.ts
 * Central export for constants
 */

export { ERROR_MESSAGES } from './error-messages.js';
export {
  RETRY_AFTER_SECONDS,
  MODEL_TYPES,
  type ModelType,
  DEFAULT_TASK_TYPE,
  TASK_TYPES_BY_MODEL_TYPE,
} from './models.js';
