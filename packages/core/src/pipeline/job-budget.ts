/**
 * Per-job time budget
 *
 * Two limits, both measured from `start()`:
 * - soft: logs a warning once and raises the `softExceeded` flag
 * - hard: aborts the job. The stage in flight is abandoned through `race`,
 *   and `checkpoint` throws before any later stage starts.
 *
 * Synchronous stages cannot be interrupted; a hard overrun during one is
 * reported at the next checkpoint.
 */

import { TimeoutError, type PipelineStage } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';

export interface BudgetLimits {
  readonly softTimeoutMs: number;
  readonly hardTimeoutMs: number;
}

export class JobBudget {
  private readonly controller = new AbortController();
  private softTimer: ReturnType<typeof setTimeout> | undefined;
  private hardTimer: ReturnType<typeof setTimeout> | undefined;
  private startedAt = 0;
  private soft = false;
  private currentStage: PipelineStage = 'job';

  constructor(
    private readonly limits: BudgetLimits,
    private readonly log: Logger,
    private readonly clock: () => number = () => performance.now()
  ) {}

  start(): void {
    this.startedAt = this.clock();
    this.softTimer = setTimeout(() => {
      this.soft = true;
      this.log.warn('Job exceeded its soft time budget', {
        stage: this.currentStage,
        softTimeoutMs: this.limits.softTimeoutMs,
      });
    }, this.limits.softTimeoutMs);
    this.hardTimer = setTimeout(() => {
      this.log.error('Job exceeded its hard time budget, aborting', {
        stage: this.currentStage,
        hardTimeoutMs: this.limits.hardTimeoutMs,
      });
      this.controller.abort();
    }, this.limits.hardTimeoutMs);
  }

  get elapsedMs(): number {
    return this.clock() - this.startedAt;
  }

  get softExceeded(): boolean {
    return this.soft;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  /** Aborts when the hard budget runs out */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  private timeoutError(stage: PipelineStage): TimeoutError {
    return new TimeoutError(
      `Job exceeded its ${this.limits.hardTimeoutMs} ms budget during '${stage}'`,
      stage,
      this.limits.hardTimeoutMs
    );
  }

  /**
   * Throw if the hard budget is spent; otherwise record `stage` as current
   */
  checkpoint(stage: PipelineStage): void {
    if (this.controller.signal.aborted) throw this.timeoutError(stage);
    this.currentStage = stage;
  }

  /**
   * Settle with `work`, or reject with TimeoutError as soon as the hard
   * budget runs out
   */
  race<T>(stage: PipelineStage, work: Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    if (signal.aborted) return Promise.reject(this.timeoutError(stage));

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(this.timeoutError(stage));
      signal.addEventListener('abort', onAbort, { once: true });
      work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Clear the timers; call once the job has finished either way
   */
  dispose(): void {
    clearTimeout(this.softTimer);
    clearTimeout(this.hardTimer);
  }
}
