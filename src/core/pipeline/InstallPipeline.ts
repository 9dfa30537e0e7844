/**
 * Install Pipeline - Builds both components and stages their artifacts.
 *
 * Staging only starts after a successful build. Each staging mapping is
 * independent: a missing kernel artifact does not stop the bootloader from
 * being staged, but the install as a whole still fails.
 *
 * The image root is the only shared mutable resource. Two concurrent
 * installs against the same image root are not supported and not guarded.
 *
 * @module
 */

import * as path from "node:path";
import type { BootpipeConfig, ComponentName } from "../config/types.js";
import { BootpipeError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { Step } from "../logging/Step.js";
import { StepTimer } from "../logging/StepTimer.js";
import type { CopyOutcome, IncrementalCopier } from "../staging/IncrementalCopier.js";
import { PathResolver, type StagingMapping } from "../utils/paths.js";
import type { BuildPipeline, BuildSummary } from "./BuildPipeline.js";
import type { PipelineLogger } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface StagedArtifact extends StagingMapping {
  readonly outcome: CopyOutcome;
}

export interface InstallSummary {
  readonly build: BuildSummary;
  readonly staged: readonly StagedArtifact[];
}

/**
 * Install phases, reported before each one starts.
 */
export type InstallPhase = "building" | "staging";

export interface InstallObserver {
  onPhase(phase: InstallPhase): void;
}

/**
 * Anything that can install. RunController depends on this interface.
 */
export interface Installer {
  install(observer?: InstallObserver): Promise<InstallSummary>;
}

export interface InstallPipelineParams {
  readonly config: BootpipeConfig;
  readonly builder: Pick<BuildPipeline, "build">;
  readonly copier: Pick<IncrementalCopier, "copyIfNewer">;
  readonly logger: PipelineLogger;
  readonly timer?: StepTimer;
}

interface StagingFailure {
  readonly component: ComponentName;
  readonly error: BootpipeError;
}

// =============================================================================
// InstallPipeline Class
// =============================================================================

export class InstallPipeline implements Installer {
  private readonly config: BootpipeConfig;
  private readonly builder: Pick<BuildPipeline, "build">;
  private readonly copier: Pick<IncrementalCopier, "copyIfNewer">;
  private readonly logger: PipelineLogger;
  private readonly timer: StepTimer;
  private readonly paths: PathResolver;

  constructor(params: InstallPipelineParams) {
    this.config = params.config;
    this.builder = params.builder;
    this.copier = params.copier;
    this.logger = params.logger;
    this.timer = params.timer ?? new StepTimer(params.logger);
    this.paths = new PathResolver(params.config);
  }

  /**
   * Builds, then stages every artifact into the image root.
   *
   * @throws the build error, untouched, if the build fails (nothing is staged)
   * @throws the mapping's own error if exactly one mapping fails
   * @throws BootpipeError STAGING_FAILED listing each failure if several fail
   */
  async install(observer?: InstallObserver): Promise<InstallSummary> {
    observer?.onPhase("building");
    const build = await this.builder.build();

    observer?.onPhase("staging");
    const mappings = this.paths.stagingMappings();
    const staged = await this.timer.run(Step.STAGING, () => this.stageAll(mappings), `${mappings.length} artifacts`);

    return { build, staged };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async stageAll(mappings: readonly StagingMapping[]): Promise<StagedArtifact[]> {
    const staged: StagedArtifact[] = [];
    const failures: StagingFailure[] = [];

    for (const mapping of mappings) {
      try {
        const outcome = await this.copier.copyIfNewer(mapping.source, mapping.destination);
        staged.push({ ...mapping, outcome });

        const shown = path.relative(this.config.projectRoot, mapping.destination);
        if (outcome === "copied") {
          this.logger.success(`Staged ${mapping.component} -> ${shown}`);
        } else {
          this.logger.info(`${mapping.component} is up to date (${shown})`);
        }
      } catch (error) {
        failures.push({ component: mapping.component, error: asStagingError(error, mapping) });
      }
    }

    if (failures.length === 1) {
      throw failures[0].error;
    }

    if (failures.length > 1) {
      throw new BootpipeError(
        `Failed to stage ${failures.length} artifacts`,
        ErrorCode.STAGING_FAILED,
        { failures: failures.map((f) => `${f.component}: ${f.error.message}`) },
        failures
          .map((f) => f.error.hint)
          .filter((hint): hint is string => hint !== undefined)
          .join("\n"),
      );
    }

    return staged;
  }
}

function asStagingError(error: unknown, mapping: StagingMapping): BootpipeError {
  if (error instanceof BootpipeError) {
    return error;
  }

  const cause = toError(error);
  return new BootpipeError(
    `Failed to stage ${mapping.component}`,
    ErrorCode.STAGING_FAILED,
    { source: mapping.source, destination: mapping.destination, reason: cause.message },
    undefined,
    cause,
  );
}
