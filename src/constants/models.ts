/**
 * models.ts
 * Model classes served by the dispatcher and their default task types
 */

import type { TaskType } from '../task.types.js';

export const MODEL_TYPES = ['text', 'video', 'transcription'] as const;

export type ModelType = (typeof MODEL_TYPES)[number];

export const DEFAULT_TASK_TYPE: Record<ModelType, TaskType> = {
  text: 'text-inference',
  video: 'video-manipulation',
  transcription: 'transcription-monologue',
};

/** Task types a model class may run */
export const TASK_TYPES_BY_MODEL_TYPE: Record<ModelType, readonly TaskType[]> = {
  text: ['text-inference', 'image-generation', 'embedding', 'batch', 'chained', 'system-final'],
  video: ['video-manipulation', 'video-nonverbal'],
  transcription: ['transcription-monologue', 'transcription-multispeaker'],
};

export const RETRY_AFTER_SECONDS = {
  modelUnavailable: 300,
  failoverExhausted: 600,
} as const;
