/**
 * Step Timer for pipeline instrumentation.
 *
 * Tracks step start/end times and logs them at verbose level, so
 * `--verbose` shows where a slow `run` spends its time.
 *
 * @module
 */

import type { Step } from "./Step.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Minimal logger the timer writes to. CliUx satisfies it.
 */
export interface StepLogger {
  verbose(message: string): void;
}

interface StepTiming {
  step: Step;
  startTime: number;
}

// =============================================================================
// StepTimer Class
// =============================================================================

/**
 * Timer for tracking pipeline step durations.
 *
 * @example
 * ```typescript
 * const timer = new StepTimer(ux);
 *
 * const summary = await timer.run(Step.STAGING, () => stageAll(), "2 artifacts");
 * // verbose: "[staging] started: 2 artifacts"
 * // verbose: "[staging] completed in 12ms"
 * ```
 */
export class StepTimer {
  private readonly timings: Map<Step, StepTiming> = new Map();

  constructor(
    private readonly logger: StepLogger,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Starts timing a step.
   */
  start(step: Step, detail?: string): void {
    this.timings.set(step, { step, startTime: this.now() });
    this.logger.verbose(`[${step}] started${detail ? `: ${detail}` : ""}`);
  }

  /**
   * Ends timing a step. Ignored if the step was never started.
   */
  end(step: Step, failed = false): void {
    const timing = this.timings.get(step);
    if (!timing) {
      return;
    }

    const durationMs = this.now() - timing.startTime;
    this.timings.delete(step);

    this.logger.verbose(
      failed
        ? `[${step}] failed after ${formatDuration(durationMs)}`
        : `[${step}] completed in ${formatDuration(durationMs)}`,
    );
  }

  /**
   * Runs a function with automatic step timing, on success and on error.
   */
  async run<T>(step: Step, fn: () => Promise<T>, detail?: string): Promise<T> {
    this.start(step, detail);

    try {
      const result = await fn();
      this.end(step);
      return result;
    } catch (error) {
      this.end(step, true);
      throw error;
    }
  }
}

/**
 * Formats duration in human-readable format (e.g. "1.23s" or "456ms").
 */
export function formatDuration(ms: number): string {
  if (ms >= 1000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  return `${ms}ms`;
}
