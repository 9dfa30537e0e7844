/**
 * Build Pipeline - Runs the component build tools in fixed order.
 *
 * The bootloader is built first, then the kernel. Both builds block, and a
 * failing build aborts the pipeline: the kernel is never built after a
 * bootloader failure. The two builds do not depend on each other; the order
 * is fixed so output and failures are deterministic.
 *
 * @module
 */

import { COMPONENT_ORDER, type BootpipeConfig, type ComponentName } from "../config/types.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { Step } from "../logging/Step.js";
import { StepTimer, formatDuration } from "../logging/StepTimer.js";
import {
  commandFailure,
  createInvocation,
  formatCommandLine,
  type ProcessRunner,
} from "../process/ProcessInvoker.js";
import type { PipelineLogger } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface BuildPipelineParams {
  readonly config: BootpipeConfig;
  readonly runner: ProcessRunner;
  readonly logger: PipelineLogger;
  readonly timer?: StepTimer;
}

export interface BuildResult {
  readonly component: ComponentName;
  readonly durationMs: number;
}

export interface BuildSummary {
  /** Components built, in build order */
  readonly results: readonly BuildResult[];
  readonly totalDurationMs: number;
}

// =============================================================================
// BuildPipeline Class
// =============================================================================

export class BuildPipeline {
  private readonly config: BootpipeConfig;
  private readonly runner: ProcessRunner;
  private readonly logger: PipelineLogger;
  private readonly timer: StepTimer;

  constructor(params: BuildPipelineParams) {
    this.config = params.config;
    this.runner = params.runner;
    this.logger = params.logger;
    this.timer = params.timer ?? new StepTimer(params.logger);
  }

  /**
   * Builds the bootloader, then the kernel.
   *
   * @throws BootpipeError BUILD_FAILED or COMMAND_NOT_FOUND on the first failing build
   */
  async build(): Promise<BuildSummary> {
    return this.timer.run(Step.BUILD, async () => {
      const results: BuildResult[] = [];

      for (const component of COMPONENT_ORDER) {
        results.push(await this.buildTarget(component));
      }

      return {
        results,
        totalDurationMs: results.reduce((sum, r) => sum + r.durationMs, 0),
      };
    });
  }

  /**
   * Builds one component.
   *
   * @throws BootpipeError BUILD_FAILED or COMMAND_NOT_FOUND
   */
  async buildTarget(component: ComponentName): Promise<BuildResult> {
    const target = this.config.targets[component];
    const invocation = createInvocation({
      executable: target.command,
      args: target.args,
      cwd: target.projectDir,
      wait: true,
    });

    this.logger.info(`Building ${component}: ${formatCommandLine(invocation)}`);

    const outcome = await this.runner.run(invocation);

    if (outcome.kind === "failure") {
      throw commandFailure(outcome, ErrorCode.BUILD_FAILED, `${component} build`);
    }

    const durationMs = outcome.kind === "success" ? outcome.durationMs : 0;
    this.logger.success(`Built ${component} in ${formatDuration(durationMs)}`);

    return { component, durationMs };
  }
}
