/**
 * Accumulates metrics, phase timings and the first error of a trial, then
 * hands out an immutable TrialResult.
 */

import type { PhaseTimings, TimingPhase, TrialError, TrialResult } from '../../src/types/common.js';
import { describeError } from './errors.js';

const round = (seconds: number): number => Math.round(seconds * 1000) / 1000;

export class TrialResultBuilder {
  private metrics: Record<string, number> = {};
  private timings: PhaseTimings = {};
  private error: TrialError | null = null;

  constructor(private now: () => number = Date.now) {}

  /**
   * Runs `fn` and records its duration under `phase`, also when it throws
   */
  async time<T>(phase: TimingPhase, fn: () => Promise<T>): Promise<T> {
    const started = this.now();
    try {
      return await fn();
    } finally {
      this.timings[phase] = round((this.now() - started) / 1000);
    }
  }

  addTimings(timings: PhaseTimings): this {
    Object.assign(this.timings, timings);
    return this;
  }

  timing(phase: TimingPhase): number | undefined {
    return this.timings[phase];
  }

  setMetrics(metrics: Record<string, number>): this {
    Object.assign(this.metrics, metrics);
    return this;
  }

  fail(error: unknown): this {
    if (!this.error) {
      this.error = describeError(error);
    }
    return this;
  }

  get failed(): boolean {
    return this.error !== null;
  }

  build(): TrialResult {
    return Object.freeze({
      metrics: Object.freeze({ ...this.metrics }),
      timings: Object.freeze({ ...this.timings }),
      error: this.error ? Object.freeze({ ...this.error }) : null
    });
  }
}

/**
 * Copy of `result` with extra timings merged in front of its own
 */
export function withTimings(result: TrialResult, timings: PhaseTimings): TrialResult {
  return Object.freeze({
    metrics: result.metrics,
    timings: Object.freeze({ ...timings, ...result.timings }),
    error: result.error
  });
}

export function failedResult(error: unknown, timings: PhaseTimings = {}): TrialResult {
  return new TrialResultBuilder().addTimings(timings).fail(error).build();
}
