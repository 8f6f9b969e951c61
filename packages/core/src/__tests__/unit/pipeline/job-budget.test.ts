/**
 * Job budget tests (fake timers, injected clock)
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { TimeoutError } from '../../../core/errors.js';
import { Logger } from '../../../core/utils/logger.js';
import { JobBudget } from '../../../pipeline/job-budget.js';

describe('JobBudget', () => {
  let now: number;
  let budget: JobBudget;
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    vi.useFakeTimers();
    now = 0;
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger({ level: 'warn', service: 'test', pretty: false, context: {} });
    budget = new JobBudget({ softTimeoutMs: 100, hardTimeoutMs: 200 }, log, () => now);
    budget.start();
  });

  afterEach(() => {
    budget.dispose();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('measures elapsed time from start', () => {
    now = 1500;

    expect(budget.elapsedMs).toBe(1500);
  });

  it('warns once when the soft budget passes', () => {
    budget.checkpoint('clean');
    vi.advanceTimersByTime(100);

    expect(budget.softExceeded).toBe(true);
    expect(budget.aborted).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0]?.[0]))).toMatchObject({
      level: 'warn',
      message: 'Job exceeded its soft time budget',
      stage: 'clean',
      softTimeoutMs: 100,
    });
  });

  it('fails the next checkpoint after the hard budget passes', () => {
    vi.advanceTimersByTime(200);

    expect(budget.aborted).toBe(true);
    expect(() => budget.checkpoint('write')).toThrow(TimeoutError);
    expect(() => budget.checkpoint('write')).toThrow("Job exceeded its 200 ms budget during 'write'");
  });

  it('abandons the stage in flight when the hard budget passes', async () => {
    const pending = budget.race('reproject', new Promise<never>(() => undefined));
    const outcome = expect(pending).rejects.toMatchObject({ code: 'TIMEOUT', stage: 'reproject', budgetMs: 200 });

    vi.advanceTimersByTime(200);

    await outcome;
  });

  it('passes results and errors of work that settles in time', async () => {
    await expect(budget.race('read', Promise.resolve(5))).resolves.toBe(5);
    await expect(budget.race('read', Promise.reject(new Error('bad input')))).rejects.toThrow('bad input');
  });

  it('stops both timers on dispose', () => {
    budget.dispose();
    vi.advanceTimersByTime(1000);

    expect(budget.softExceeded).toBe(false);
    expect(budget.aborted).toBe(false);
  });
});
