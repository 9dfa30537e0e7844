/**
 * Wires the core pipelines for one CLI invocation.
 *
 * @module
 */

import type { BootpipeConfig } from "../core/config/types.js";
import { StepTimer } from "../core/logging/StepTimer.js";
import { BuildPipeline } from "../core/pipeline/BuildPipeline.js";
import { InstallPipeline, type Installer } from "../core/pipeline/InstallPipeline.js";
import { ProcessInvoker } from "../core/process/ProcessInvoker.js";
import { RunController } from "../core/run/RunController.js";
import { IncrementalCopier } from "../core/staging/IncrementalCopier.js";
import type { CliUx } from "./ux/CliUx.js";

/**
 * What the commands drive. Tests pass fakes.
 */
export interface CliServices {
  readonly buildPipeline: Pick<BuildPipeline, "build">;
  readonly installPipeline: Installer;
  readonly runController: Pick<RunController, "run">;
}

/**
 * Creates the real pipelines: one ProcessInvoker and one StepTimer shared by
 * every stage, all reporting through `ux`.
 */
export function createServices(config: BootpipeConfig, ux: CliUx): CliServices {
  const runner = new ProcessInvoker(ux);
  const timer = new StepTimer(ux);

  const buildPipeline = new BuildPipeline({ config, runner, logger: ux, timer });
  const installPipeline = new InstallPipeline({
    config,
    builder: buildPipeline,
    copier: new IncrementalCopier(ux),
    logger: ux,
    timer,
  });
  const runController = new RunController({
    config,
    installer: installPipeline,
    runner,
    logger: ux,
    timer,
  });

  return { buildPipeline, installPipeline, runController };
}
