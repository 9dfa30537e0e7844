/**
 * `bootpipe install`: builds both components and stages the artifacts into
 * the image root.
 *
 * @module
 */

import { Command } from "commander";
import type { CliContext } from "../context.js";

export function buildInstallCommand(context: CliContext): Command {
  return new Command("install")
    .description("Build both components and stage them into the image root")
    .action(async () => {
      const { installPipeline } = await context.services();
      const summary = await installPipeline.install();

      const copied = summary.staged.filter((artifact) => artifact.outcome === "copied").length;
      context.ux.success(
        copied === 0
          ? "Image is up to date"
          : `Installed ${copied} artifact${copied !== 1 ? "s" : ""} into the image`,
      );
    });
}
