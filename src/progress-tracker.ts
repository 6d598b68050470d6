/**
 * progress-tracker.ts
 * Narrow progress interface handed to long-running jobs
 */

export interface ProgressSink {
  reportProgress(taskId: string, progress: number, message?: string): boolean;
}

export class ProgressTracker {
  readonly taskId: string;
  private sink: ProgressSink;

  constructor(taskId: string, sink: ProgressSink) {
    this.taskId = taskId;
    this.sink = sink;
  }

  /**
   * @param progress - fraction complete, 0..1; values outside are clamped and
   *   non-finite values are dropped
   * @param description - replaces the task's status message when given
   */
  report(progress: number, description?: string): void {
    if (!Number.isFinite(progress)) {
      return;
    }
    const fraction = Math.min(1, Math.max(0, progress));
    this.sink.reportProgress(this.taskId, Math.round(fraction * 10000) / 100, description);
  }
}
