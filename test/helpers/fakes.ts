/**
 * In-process stand-ins shared by the pipeline, run and CLI tests.
 *
 * @module
 */

import * as path from "node:path";
import type { ExitOutcome, ProcessInvocation, ProcessRunner } from "../../src/core/process/ProcessInvoker.js";
import type { PipelineLogger } from "../../src/core/pipeline/types.js";

export type OutcomeFactory = (invocation: ProcessInvocation) => ExitOutcome;

export function succeed(durationMs = 10): OutcomeFactory {
  return (invocation) =>
    invocation.wait
      ? { kind: "success", invocation, exitCode: 0, durationMs }
      : { kind: "detached", invocation, pid: 4242 };
}

export function exitWith(exitCode: number): OutcomeFactory {
  return (invocation) => ({
    kind: "failure",
    invocation,
    exitCode,
    spawnFailed: false,
    reason: `exited with code ${exitCode}`,
    durationMs: 5,
  });
}

export function notFound(): OutcomeFactory {
  return (invocation) => ({
    kind: "failure",
    invocation,
    spawnFailed: true,
    reason: `could not start ${invocation.executable}: spawn ${invocation.executable} ENOENT`,
    durationMs: 1,
  });
}

/**
 * Records every invocation; the outcome is picked by the first matching
 * rule (last segment of the cwd, or the executable), else success.
 */
export class RecordingRunner implements ProcessRunner {
  readonly invocations: ProcessInvocation[] = [];
  private readonly rules: Array<{ match: string; outcome: OutcomeFactory }> = [];

  /** Called with each invocation before the outcome is returned */
  onRun?: (invocation: ProcessInvocation) => void;

  when(match: string, outcome: OutcomeFactory): this {
    this.rules.push({ match, outcome });
    return this;
  }

  async run(invocation: ProcessInvocation): Promise<ExitOutcome> {
    this.invocations.push(invocation);
    this.onRun?.(invocation);

    const rule = this.rules.find(
      (r) => path.basename(invocation.cwd) === r.match || invocation.executable === r.match,
    );
    return (rule?.outcome ?? succeed())(invocation);
  }
}

export interface RecordingLogger extends PipelineLogger {
  readonly lines: string[];
}

/**
 * Logger that keeps every message, prefixed by its level.
 */
export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info: ${message}`),
    success: (message) => lines.push(`success: ${message}`),
    verbose: (message) => lines.push(`verbose: ${message}`),
    debug: (message) => lines.push(`debug: ${message}`),
  };
}
