/**
 * Emulator commands:
 * - `bootpipe run`: install, then boot the image and wait for the emulator
 * - `bootpipe debug`: install, then boot halted with the debug stub, detached
 *
 * @module
 */

import { Command } from "commander";
import type { CliContext } from "../context.js";

export function buildRunCommand(context: CliContext): Command {
  return new Command("run")
    .description("Install, then boot the image in the emulator")
    .action(async () => {
      const { runController } = await context.services();
      await runController.run(false);
    });
}

export function buildDebugCommand(context: CliContext): Command {
  return new Command("debug")
    .description("Install, then boot halted with a debug stub on tcp::1234 (returns immediately)")
    .action(async () => {
      const { runController } = await context.services();
      await runController.run(true);
    });
}
