/**
 * inference-runner.ts
 * Turns a validated task request into one or more model calls guarded by failover
 */

import type { ModelType } from './constants/index.js';
import { type FailoverInfo, executeWithFailover } from './failover-executor.js';
import type { FailoverManager } from './failover-manager.js';
import type { ModelBackend } from './model-backend.js';
import type { TaskOutput, TaskParams, TaskParamsMap, TaskResults, TaskType } from './task.types.js';
import { parseTaskOutput, taskOutputSchemas } from './task.types.js';

export interface InferenceRequest {
  modelType: ModelType;
  model: string;
  taskType: TaskType;
  params: TaskParams;
  signal?: AbortSignal;
  /** Called after each completed step with the fraction done (0..1) */
  onStep?: (fraction: number, description: string) => void;
}

export interface InferenceResult {
  results: TaskResults;
  model: string;
  failover?: FailoverInfo;
}

export interface InferenceDeps {
  failover: FailoverManager;
  backend: ModelBackend;
}

export class InvalidModelOutputError extends Error {
  constructor(
    readonly model: string,
    detail: string
  ) {
    super(`Model ${model} returned an unexpected payload: ${detail}`);
    this.name = 'InvalidModelOutputError';
  }
}

function abortIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    const error = new Error('Inference cancelled');
    error.name = 'AbortError';
    throw error;
  }
}

class StepRunner {
  model: string;
  failover?: FailoverInfo;

  constructor(
    private deps: InferenceDeps,
    private request: InferenceRequest
  ) {
    this.model = request.model;
  }

  /**
   * One model call. Once a failover happens, later steps stay on the alternate.
   */
  async call(taskType: TaskType, input: unknown): Promise<unknown> {
    abortIfCancelled(this.request.signal);
    const { modelType, signal } = this.request;
    const outcome = await executeWithFailover(
      this.deps.failover,
      modelType,
      this.model,
      model => this.deps.backend.invoke({ modelType, model, taskType, input, signal }),
      signal
    );
    if (outcome.failover && !this.failover) {
      this.failover = outcome.failover;
    }
    this.model = outcome.model;
    return outcome.value;
  }

  async text(
    prompt: string,
    params: Pick<TaskParamsMap['batch'], 'maxTokens' | 'temperature'>
  ): Promise<string> {
    const raw = await this.call('text-inference', { prompt, ...params });
    const parsed = taskOutputSchemas['text-inference'].safeParse(raw);
    if (!parsed.success) {
      throw new InvalidModelOutputError(this.model, parsed.error.issues[0]?.message ?? 'invalid');
    }
    return parsed.data.text;
  }
}

async function runSteps(runner: StepRunner, request: InferenceRequest): Promise<TaskOutput> {
  const { params, taskType } = request;
  const report = request.onStep ?? (() => undefined);

  if ('prompts' in params) {
    const outputs: string[] = [];
    for (const [index, prompt] of params.prompts.entries()) {
      outputs.push(
        await runner.text(prompt, { maxTokens: params.maxTokens, temperature: params.temperature })
      );
      report(
        (index + 1) / params.prompts.length,
        `processed ${index + 1} of ${params.prompts.length} prompts`
      );
    }
    return { outputs };
  }

  if ('steps' in params) {
    const outputs: string[] = [];
    let previous = '';
    for (const [index, step] of params.steps.entries()) {
      const prompt = previous ? `${previous}\n\n${step.prompt}` : step.prompt;
      previous = await runner.text(prompt, {});
      outputs.push(previous);
      report(
        (index + 1) / params.steps.length,
        `completed step ${index + 1} of ${params.steps.length}`
      );
    }
    return { outputs };
  }

  const raw = await runner.call(taskType, params);
  const parsed = parseTaskOutput(taskType, raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidModelOutputError(
      runner.model,
      issue ? `${issue.path.join('.') || 'output'}: ${issue.message}` : 'invalid'
    );
  }
  report(1, 'model output received');
  return parsed.data;
}

/**
 * Run a request to completion. Batch prompts run one call each; chained steps
 * feed each output into the next prompt.
 */
export async function runInference(
  deps: InferenceDeps,
  request: InferenceRequest
): Promise<InferenceResult> {
  const runner = new StepRunner(deps, request);
  const output = await runSteps(runner, request);
  const results: TaskResults = { ...output, model: runner.model };
  if (runner.failover) {
    results.failover = runner.failover;
  }
  return { results, model: runner.model, failover: runner.failover };
}
