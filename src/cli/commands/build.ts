/**
 * `bootpipe build`: builds the bootloader, then the kernel.
 *
 * @module
 */

import { Command } from "commander";
import { formatDuration } from "../../core/logging/StepTimer.js";
import type { CliContext } from "../context.js";

export function buildBuildCommand(context: CliContext): Command {
  return new Command("build")
    .description("Build the bootloader and the kernel")
    .action(async () => {
      const { buildPipeline } = await context.services();
      const summary = await buildPipeline.build();

      context.ux.success(
        `Build complete (${formatDuration(summary.totalDurationMs)})`,
        Object.fromEntries(summary.results.map((result) => [result.component, formatDuration(result.durationMs)])),
      );
    });
}
