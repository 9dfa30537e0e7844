/**
 * Process Invoker - Runs external tools (build tools, the emulator).
 *
 * Every command is an explicit executable plus argument vector with an
 * explicit working directory. Nothing goes through a shell, so arguments
 * with spaces or shell metacharacters reach the tool verbatim.
 *
 * ## Outcomes
 *
 * The invoker never throws for a failing tool. It returns an `ExitOutcome`:
 * - `success`: blocking run, exit code 0
 * - `detached`: non-blocking run, spawned and released
 * - `failure`: non-zero exit, signal, or spawn error (e.g. not on PATH)
 *
 * Callers decide whether a failure aborts their pipeline.
 *
 * @module
 */

import { execa } from "execa";
import { BootpipeError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A single external command, frozen at construction.
 */
export interface ProcessInvocation {
  /** Executable name (looked up on PATH) or path */
  readonly executable: string;

  /** Argument vector, passed without shell interpretation */
  readonly args: readonly string[];

  /** Working directory */
  readonly cwd: string;

  /** Discard the child's stderr instead of inheriting it */
  readonly suppressErrorStream: boolean;

  /** Block until exit (true) or return right after spawn (false) */
  readonly wait: boolean;
}

export type ExitOutcome =
  | {
      readonly kind: "success";
      readonly invocation: ProcessInvocation;
      readonly exitCode: 0;
      readonly durationMs: number;
    }
  | {
      readonly kind: "detached";
      readonly invocation: ProcessInvocation;
      readonly pid: number;
    }
  | {
      readonly kind: "failure";
      readonly invocation: ProcessInvocation;
      /** Undefined when the process never ran or was killed by a signal */
      readonly exitCode?: number;
      /** True when the executable could not be started at all */
      readonly spawnFailed: boolean;
      readonly reason: string;
      readonly durationMs: number;
    };

/**
 * Anything that can run a `ProcessInvocation`. Pipelines depend on this
 * interface so tests can substitute a recorder.
 */
export interface ProcessRunner {
  run(invocation: ProcessInvocation): Promise<ExitOutcome>;
}

/**
 * Logger interface for process execution.
 */
export interface ProcessLogger {
  debug(message: string): void;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Creates a frozen invocation. Defaults: inherit stderr, block.
 */
export function createInvocation(params: {
  executable: string;
  args?: readonly string[];
  cwd: string;
  suppressErrorStream?: boolean;
  wait?: boolean;
}): ProcessInvocation {
  return Object.freeze({
    executable: params.executable,
    args: Object.freeze([...(params.args ?? [])]),
    cwd: params.cwd,
    suppressErrorStream: params.suppressErrorStream ?? false,
    wait: params.wait ?? true,
  });
}

/**
 * Renders an invocation as a copy-pasteable command line (for messages only).
 */
export function formatCommandLine(invocation: Pick<ProcessInvocation, "executable" | "args">): string {
  return [invocation.executable, ...invocation.args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : JSON.stringify(arg);
}

// =============================================================================
// ProcessInvoker Class
// =============================================================================

/**
 * Runs invocations with execa.
 *
 * stdin and stdout are always inherited so build output and the emulator
 * monitor stay on the operator's terminal.
 *
 * @example
 * ```typescript
 * const invoker = new ProcessInvoker();
 *
 * const outcome = await invoker.run(
 *   createInvocation({ executable: "cargo", args: ["build"], cwd: "/work/os/kernel" }),
 * );
 *
 * if (outcome.kind === "failure") {
 *   console.error(`failed: ${outcome.reason}`);
 * }
 * ```
 */
export class ProcessInvoker implements ProcessRunner {
  constructor(private readonly logger?: ProcessLogger) {}

  async run(invocation: ProcessInvocation): Promise<ExitOutcome> {
    const startTime = Date.now();
    const commandLine = formatCommandLine(invocation);

    this.logger?.debug(
      `Spawning ${commandLine} in ${invocation.cwd} (${invocation.wait ? "blocking" : "detached"})`,
    );

    const subprocess = execa(invocation.executable, [...invocation.args], {
      cwd: invocation.cwd,
      stdin: "inherit",
      stdout: "inherit",
      stderr: invocation.suppressErrorStream ? "ignore" : "inherit",
      detached: !invocation.wait,
      // Don't throw on non-zero exit - the outcome carries it
      reject: false,
    });

    // A spawn error leaves pid undefined; wait for the (quick) failed result
    if (!invocation.wait && subprocess.pid !== undefined) {
      const pid = subprocess.pid;
      subprocess.unref();
      void subprocess.then((result) => {
        this.logger?.debug(`Detached process ${pid} exited with code ${result.exitCode ?? "unknown"}`);
      });
      return { kind: "detached", invocation, pid };
    }

    const result = await subprocess;
    const durationMs = Date.now() - startTime;

    if (!result.failed && result.exitCode === 0) {
      return { kind: "success", invocation, exitCode: 0, durationMs };
    }

    const spawnFailed = result.exitCode === undefined && result.signal === undefined;
    const reason = spawnFailed
      ? `could not start ${invocation.executable}: ${result.shortMessage ?? result.message ?? "spawn failed"}`
      : result.exitCode !== undefined
        ? `exited with code ${result.exitCode}`
        : `terminated by ${result.signal ?? "signal"}`;

    return {
      kind: "failure",
      invocation,
      exitCode: result.exitCode,
      spawnFailed,
      reason,
      durationMs,
    };
  }
}

// =============================================================================
// Failure Mapping
// =============================================================================

/**
 * Converts a failed outcome into the error that aborts a pipeline.
 *
 * A spawn failure is always COMMAND_NOT_FOUND; anything else gets `code`.
 *
 * @param outcome - Failed outcome
 * @param code - Error code for a tool that ran and failed
 * @param label - What was running, e.g. "kernel build"
 */
export function commandFailure(
  outcome: Extract<ExitOutcome, { kind: "failure" }>,
  code: ErrorCode,
  label: string,
): BootpipeError {
  const { invocation } = outcome;
  const commandLine = formatCommandLine(invocation);

  if (outcome.spawnFailed) {
    return new BootpipeError(
      `Cannot run ${invocation.executable} (${label})`,
      ErrorCode.COMMAND_NOT_FOUND,
      { command: invocation.executable, args: [...invocation.args], cwd: invocation.cwd, reason: outcome.reason },
      `Make sure ${invocation.executable} is installed and on your PATH, and that ${invocation.cwd} exists.`,
    );
  }

  return new BootpipeError(
    `${capitalize(label)} failed: ${commandLine} ${outcome.reason}`,
    code,
    { command: invocation.executable, args: [...invocation.args], cwd: invocation.cwd, exitCode: outcome.exitCode },
    "Run the command above by hand to reproduce the failure.",
  );
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
