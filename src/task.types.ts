/**
 * task.types.ts
 * Task lifecycle types and the per-type params/results payloads
 */

import { z } from 'zod';

export const TASK_TYPES = [
  'text-inference',
  'image-generation',
  'embedding',
  'transcription-monologue',
  'transcription-multispeaker',
  'video-manipulation',
  'video-nonverbal',
  'batch',
  'chained',
  'system-final',
] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export const TASK_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

const generationOptions = {
  maxTokens: z.number().int().min(1).max(32768).optional(),
  temperature: z.number().min(0).max(2).optional(),
};

const mediaSource = {
  sourceUrl: z.string().min(1),
  language: z.string().min(2).max(16).optional(),
};

/**
 * Params schemas, one per task type. They validate the HTTP boundary input and
 * double as the compile-time payload types stored on a task.
 */
export const taskParamsSchemas = {
  'text-inference': z.object({
    prompt: z.string().min(1),
    systemPrompt: z.string().optional(),
    ...generationOptions,
  }),
  'image-generation': z.object({
    prompt: z.string().min(1),
    width: z.number().int().min(64).max(4096).default(1024),
    height: z.number().int().min(64).max(4096).default(1024),
  }),
  embedding: z.object({
    texts: z.array(z.string()).min(1),
  }),
  'transcription-monologue': z.object({
    ...mediaSource,
  }),
  'transcription-multispeaker': z.object({
    ...mediaSource,
    minSpeakers: z.number().int().min(1).optional(),
    maxSpeakers: z.number().int().min(1).optional(),
  }),
  'video-manipulation': z.object({
    ...mediaSource,
    frameSampleRate: z.number().min(0.1).max(60).optional(),
  }),
  'video-nonverbal': z.object({
    ...mediaSource,
    cues: z.array(z.string()).optional(),
  }),
  batch: z.object({
    prompts: z.array(z.string().min(1)).min(1),
    ...generationOptions,
  }),
  chained: z.object({
    steps: z.array(z.object({ prompt: z.string().min(1) })).min(1),
  }),
  'system-final': z.object({
    prompt: z.string().min(1),
    context: z.record(z.unknown()).optional(),
  }),
} satisfies Record<TaskType, z.ZodTypeAny>;

export type TaskParamsMap = { [K in TaskType]: z.infer<(typeof taskParamsSchemas)[K]> };

export type TaskParams = TaskParamsMap[TaskType];

const transcriptSegment = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
  speaker: z.string().optional(),
});

export type TranscriptSegment = z.infer<typeof transcriptSegment>;

/**
 * Shape of what the model backend returns for each task type. Validated before it
 * is stored as a task's results.
 */
export const taskOutputSchemas = {
  'text-inference': z.object({ text: z.string(), tokens: z.number().int().optional() }),
  'image-generation': z.object({ imageUrl: z.string() }),
  embedding: z.object({ vectors: z.array(z.array(z.number())) }),
  'transcription-monologue': z.object({
    text: z.string(),
    segments: z.array(transcriptSegment),
  }),
  'transcription-multispeaker': z.object({
    text: z.string(),
    segments: z.array(transcriptSegment),
    speakers: z.array(z.string()),
  }),
  'video-manipulation': z.object({
    manipulated: z.boolean(),
    confidence: z.number().min(0).max(1),
    findings: z.array(z.string()),
  }),
  'video-nonverbal': z.object({
    cues: z.array(z.object({ label: z.string(), timestamp: z.number() })),
  }),
  batch: z.object({ outputs: z.array(z.string()) }),
  chained: z.object({ outputs: z.array(z.string()) }),
  'system-final': z.object({ text: z.string() }),
} satisfies Record<TaskType, z.ZodTypeAny>;

export type TaskOutputMap = { [K in TaskType]: z.infer<(typeof taskOutputSchemas)[K]> };

export type TaskOutput = TaskOutputMap[TaskType];

export interface ModelAttribution {
  model: string;
  /** Set when the job was served by an alternate model */
  failover?: { original: string; alternative: string };
}

export type TaskResultsMap = { [K in TaskType]: TaskOutputMap[K] & ModelAttribution };

export type TaskResults = TaskResultsMap[TaskType];

export interface Task<K extends TaskType = TaskType> {
  id: string;
  type: K;
  status: TaskStatus;
  owner: string;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  progress: number;
  message: string;
  params: TaskParamsMap[K];
  results?: TaskResultsMap[K];
  error?: string;
}

/**
 * Fields a producer or worker may change. Identity fields are accepted so that
 * callers passing a whole record through do not fail, but they are dropped.
 */
export interface TaskUpdate {
  status?: TaskStatus;
  progress?: number;
  message?: string;
  results?: TaskResults;
  error?: string;
  id?: string;
  owner?: string;
  createdAt?: number;
}

export interface TaskListFilter {
  owner?: string;
  type?: TaskType;
  status?: TaskStatus;
  limit?: number;
  offset?: number;
}

export interface TaskListResult {
  total: number;
  limit: number;
  offset: number;
  tasks: Task[];
}

/**
 * Boundary shape returned by the poll endpoint.
 */
export interface TaskView {
  task_id: string;
  type: TaskType;
  status: TaskStatus;
  progress: number;
  message: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  results?: TaskResults;
  error?: string;
}

export function parseTaskParams(
  type: TaskType,
  raw: unknown
): z.SafeParseReturnType<unknown, TaskParams> {
  const schema: z.ZodType<TaskParams, z.ZodTypeDef, unknown> = taskParamsSchemas[type];
  return schema.safeParse(raw);
}

export function parseTaskOutput(
  type: TaskType,
  raw: unknown
): z.SafeParseReturnType<unknown, TaskOutput> {
  const schema: z.ZodType<TaskOutput, z.ZodTypeDef, unknown> = taskOutputSchemas[type];
  return schema.safeParse(raw);
}
