/**
 * `bootpipe doctor`: environment diagnostics.
 *
 * @module
 */

import { Command } from "commander";
import { BootpipeError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import type { CliContext } from "../context.js";
import { handleDoctor, formatDoctorReport } from "../handlers/doctorHandler.js";

export function buildDoctorCommand(context: CliContext): Command {
  return new Command("doctor")
    .description("Check the toolchain, emulator, firmware and project layout")
    .action(async () => {
      const config = await context.config();
      const result = await handleDoctor(context.deps.createDoctorDependencies(config));

      for (const line of formatDoctorReport(result)) {
        context.print(line);
      }

      if (result.hasErrors) {
        const failed = result.checks.filter((check) => check.status === "ERROR");
        throw new BootpipeError(
          `${failed.length} doctor check(s) failed`,
          ErrorCode.DOCTOR_FAILED,
          { failures: failed.map((check) => check.name) },
          "Apply the Fix lines in the report above, then run bootpipe doctor again.",
        );
      }
    });
}
