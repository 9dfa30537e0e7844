/**
 * Run Controller - Installs the image and boots it in the emulator.
 *
 * Normal and debug runs share one code path. They differ only in their
 * `LaunchProfile`:
 *
 * | profile | wait | debug stub (`-s -S`) |
 * |---------|------|----------------------|
 * | normal  | yes  | no                   |
 * | debug   | no   | yes                  |
 *
 * In debug mode the emulator halts at the first instruction with a remote
 * debug stub on tcp::1234, and the controller returns as soon as it has
 * spawned, so a debugger can attach while the guest waits.
 *
 * ## State machine
 *
 * ```
 * idle → building → installing → launching → running  → done
 *                                           → detached → done
 * (any failure) → failed
 * ```
 *
 * A failure while building or installing never reaches `launching`.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import type { BootpipeConfig } from "../config/types.js";
import { BootpipeError, hasErrnoCode, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { Step } from "../logging/Step.js";
import { StepTimer } from "../logging/StepTimer.js";
import type { InstallSummary, Installer } from "../pipeline/InstallPipeline.js";
import type { PipelineLogger } from "../pipeline/types.js";
import {
  commandFailure,
  createInvocation,
  formatCommandLine,
  type ProcessInvocation,
  type ProcessRunner,
} from "../process/ProcessInvoker.js";
import { PathResolver } from "../utils/paths.js";

// =============================================================================
// Types
// =============================================================================

export type RunState =
  | "idle"
  | "building"
  | "installing"
  | "launching"
  | "running"
  | "detached"
  | "done"
  | "failed";

/**
 * Launch behavior, as data.
 */
export interface LaunchProfile {
  readonly suppressErrorStream: boolean;
  readonly wait: boolean;
  readonly debugStub: boolean;
}

export type RunResult =
  | {
      readonly mode: "normal";
      readonly install: InstallSummary;
      readonly invocation: ProcessInvocation;
    }
  | {
      readonly mode: "debug";
      readonly install: InstallSummary;
      readonly invocation: ProcessInvocation;
      readonly pid: number;
    };

export interface RunControllerParams {
  readonly config: BootpipeConfig;
  readonly installer: Installer;
  readonly runner: ProcessRunner;
  readonly logger: PipelineLogger;
  readonly timer?: StepTimer;
  /** Called on every state transition, after the state changed */
  readonly onStateChange?: (state: RunState, previous: RunState) => void;
}

// =============================================================================
// Emulator Command Line
// =============================================================================

/**
 * Flags that expose the remote debug stub and halt the guest at start.
 */
export const DEBUG_STUB_ARGS: readonly string[] = Object.freeze(["-s", "-S"]);

/**
 * Address the debug stub listens on (the emulator's `-s` default).
 */
export const DEBUG_STUB_ADDRESS = "localhost:1234";

export function launchProfile(config: BootpipeConfig, debug: boolean): LaunchProfile {
  return Object.freeze({
    suppressErrorStream: config.emulator.suppressErrorStream,
    wait: !debug,
    debugStub: debug,
  });
}

/**
 * Builds the emulator argument vector.
 *
 * Base arguments: firmware, networking off, the image root as a read/write
 * FAT drive, monitor on stdio, interrupt diagnostics to the log file, and
 * pause (instead of reboot) on shutdown.
 */
export function emulatorArgs(config: BootpipeConfig, profile: LaunchProfile): string[] {
  const paths = new PathResolver(config);

  const args = [
    "-bios",
    config.emulator.firmware,
    "-net",
    "none",
    "-drive",
    `file=fat:rw:${escapeOptionValue(paths.image())},format=raw`,
    "-monitor",
    "stdio",
    "-D",
    config.emulator.logFile,
    "-d",
    "int",
    "-no-reboot",
    "-action",
    "shutdown=pause",
    ...config.emulator.extraArgs,
  ];

  if (profile.debugStub) {
    args.push(...DEBUG_STUB_ARGS);
  }

  return args;
}

export function emulatorInvocation(config: BootpipeConfig, profile: LaunchProfile): ProcessInvocation {
  return createInvocation({
    executable: config.emulator.executable,
    args: emulatorArgs(config, profile),
    cwd: config.projectRoot,
    suppressErrorStream: profile.suppressErrorStream,
    wait: profile.wait,
  });
}

/**
 * Commas separate suboptions in `-drive`; a literal comma is written twice.
 */
function escapeOptionValue(value: string): string {
  return value.replace(/,/g, ",,");
}

// =============================================================================
// RunController Class
// =============================================================================

export class RunController {
  private readonly config: BootpipeConfig;
  private readonly installer: Installer;
  private readonly runner: ProcessRunner;
  private readonly logger: PipelineLogger;
  private readonly timer: StepTimer;
  private readonly onStateChange?: (state: RunState, previous: RunState) => void;
  private current: RunState = "idle";

  constructor(params: RunControllerParams) {
    this.config = params.config;
    this.installer = params.installer;
    this.runner = params.runner;
    this.logger = params.logger;
    this.timer = params.timer ?? new StepTimer(params.logger);
    this.onStateChange = params.onStateChange;
  }

  get state(): RunState {
    return this.current;
  }

  /**
   * Installs, then launches the emulator.
   *
   * @param debug - Launch detached with the debug stub, halted at start
   * @throws the install error if building or staging fails (emulator never launched)
   * @throws BootpipeError FIRMWARE_NOT_FOUND if the firmware image is missing
   * @throws BootpipeError EMULATOR_FAILED if a normal run exits non-zero
   */
  async run(debug: boolean): Promise<RunResult> {
    try {
      const install = await this.installer.install({
        onPhase: (phase) => this.transition(phase === "building" ? "building" : "installing"),
      });

      this.transition("launching");
      const result = await this.launch(install, launchProfile(this.config, debug));

      this.transition("done");
      return result;
    } catch (error) {
      this.transition("failed");
      throw error;
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async launch(install: InstallSummary, profile: LaunchProfile): Promise<RunResult> {
    await this.ensureFirmware();

    const invocation = emulatorInvocation(this.config, profile);
    this.logger.info(`Launching ${profile.debugStub ? "emulator (debug)" : "emulator"}`);
    this.logger.debug(formatCommandLine(invocation));

    const outcome = await this.timer.run(Step.LAUNCH, async () => {
      const pending = this.runner.run(invocation);
      if (profile.wait) {
        this.transition("running");
      }
      return pending;
    });

    if (outcome.kind === "failure") {
      throw commandFailure(outcome, ErrorCode.EMULATOR_FAILED, "emulator");
    }

    if (outcome.kind === "detached") {
      this.transition("detached");
      this.logger.success(
        `Emulator started (pid ${outcome.pid}), halted at first instruction. ` +
          `Attach a debugger to ${DEBUG_STUB_ADDRESS}.`,
      );
      return { mode: "debug", install, invocation, pid: outcome.pid };
    }

    this.logger.success("Emulator exited");
    return { mode: "normal", install, invocation };
  }

  private async ensureFirmware(): Promise<void> {
    const firmware = this.config.emulator.firmware;

    try {
      const stat = await fs.stat(firmware);
      if (stat.isFile()) {
        return;
      }
    } catch (error) {
      if (!hasErrnoCode(error, "ENOENT")) {
        const cause = toError(error);
        throw new BootpipeError(
          `Cannot read UEFI firmware image at ${firmware}`,
          ErrorCode.FIRMWARE_NOT_FOUND,
          { firmware, reason: cause.message },
          `Check the permissions of ${firmware}.`,
          cause,
        );
      }
    }

    throw new BootpipeError(
      `No UEFI firmware image found at ${firmware}`,
      ErrorCode.FIRMWARE_NOT_FOUND,
      { firmware },
      `Download an OVMF firmware image and place it at ${firmware}, ` +
        `or point emulator.firmware in bootpipe.yaml (or BOOTPIPE_FIRMWARE) at one.`,
    );
  }

  private transition(next: RunState): void {
    const previous = this.current;
    if (previous === next) {
      return;
    }
    this.current = next;
    this.logger.debug(`run: ${previous} -> ${next}`);
    this.onStateChange?.(next, previous);
  }
}
