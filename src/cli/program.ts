/**
 * bootpipe CLI program.
 *
 * `runCli` never calls `process.exit`: it returns the exit code so the entry
 * point (and tests) decide what to do with it.
 *
 * | outcome                                    | exit code              |
 * |--------------------------------------------|------------------------|
 * | command succeeded                          | 0                      |
 * | `--help`, `--version`                      | 0                      |
 * | missing, unknown or malformed command      | 1, usage on stderr     |
 * | BootpipeError (incl. failed doctor checks) | its code's exit code   |
 * | anything else                              | 2 (INTERNAL_ERROR)     |
 *
 * @module
 */

import { Command, CommanderError } from "commander";
import { exitCodeFor } from "../core/errors/errors.js";
import { ErrorCode, getExitCode } from "../core/errors/ErrorCode.js";
import { buildBuildCommand } from "./commands/build.js";
import { buildDoctorCommand } from "./commands/doctor.js";
import { buildInstallCommand } from "./commands/install.js";
import { buildDebugCommand, buildRunCommand } from "./commands/run.js";
import { CliContext, createDefaultCliDependencies, type CliDependencies, type GlobalOptions } from "./context.js";
import { ErrorPresenter } from "./errors/ErrorPresenter.js";
import { CLI_VERSION } from "./version.js";

/**
 * Builds the commander program bound to `context`.
 */
export function createProgram(context: CliContext): Command {
  const program = new Command()
    .name("bootpipe")
    .description("Build, install and boot a UEFI bootloader and kernel in an emulator")
    .version(CLI_VERSION)
    .option("--root <dir>", "Project root (default: current directory)")
    .option("--config <file>", "Config file (default: <root>/bootpipe.yaml if present)")
    .option("--verbose", "Show step timings", false)
    .option("--silent", "Suppress all output except errors", false)
    .option("--trace", "Show debug output and stack traces", false)
    .helpCommand(false)
    .allowExcessArguments(false)
    .showHelpAfterError()
    .configureOutput({
      writeOut: (str) => context.deps.stdout(str),
      writeErr: (str) => context.deps.stderr(str),
    })
    .exitOverride();

  program.hook("preAction", (thisCommand) => {
    context.configure(thisCommand.opts<GlobalOptions>());
  });

  const commands = [
    buildBuildCommand(context),
    buildInstallCommand(context),
    buildRunCommand(context),
    buildDebugCommand(context),
    buildDoctorCommand(context),
  ];

  for (const command of commands) {
    // exitOverride, output routing and strict arguments apply to subcommands too
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}

/**
 * Runs the CLI against `argv` (user arguments only, without node and script).
 *
 * @returns The process exit code
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = createDefaultCliDependencies(),
): Promise<number> {
  const context = new CliContext(deps);
  const program = createProgram(context);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already written help, version or the usage error
      return error.exitCode === 0 ? 0 : getExitCode(ErrorCode.USAGE_ERROR);
    }

    new ErrorPresenter({
      write: (line) => deps.stderr(`${line}\n`),
      trace: context.trace,
    }).present(error);

    return exitCodeFor(error);
  }
}
