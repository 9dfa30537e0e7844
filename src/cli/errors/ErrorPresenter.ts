/**
 * Renders failures for stderr.
 *
 * ```
 * Error [BUILD_FAILED]: Kernel build failed: cargo build exited with code 101
 *
 *   $ cd "/work/os/kernel" && cargo build
 *   exit code 101
 *
 * Hint:
 *   Run the command above by hand to reproduce the failure.
 * ```
 *
 * Details are laid out by shape: a command becomes a line that can be pasted
 * back into a shell, an artifact becomes `source -> slot`, a config error
 * points at `file:line:column`. Keys no view claims fall back to `key: value`.
 *
 * @module
 */

import { BootpipeError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { formatCommandLine } from "../../core/process/ProcessInvoker.js";

export interface ErrorPresenterOptions {
  /** Receives one line at a time, without a newline */
  readonly write: (line: string) => void;
  /** Append the stack and the cause chain */
  readonly trace?: boolean;
}

export class ErrorPresenter {
  constructor(private readonly options: ErrorPresenterOptions) {}

  present(error: unknown): void {
    for (const line of formatError(error, this.options.trace).split("\n")) {
      this.options.write(line);
    }
  }
}

const BUG_NOTE =
  "This is a bug in bootpipe, not in your project. Re-run with --trace and include the output when reporting it.";

export function formatError(error: unknown, trace = false): string {
  const failure = asBootpipeError(error);
  const sections: string[][] = [[`Error [${failure.code}]: ${failure.message}`]];

  const details = renderDetails(failure.details ?? {});
  if (details.length > 0) {
    sections.push(details.map((line) => `  ${line}`));
  }

  const hint = failure.isOperational ? failure.hint : BUG_NOTE;
  if (hint) {
    sections.push(["Hint:", ...hint.split("\n").map((line) => `  ${line}`)]);
  }

  if (trace) {
    sections.push(["Stack trace:", ...frames(failure)]);
    for (const cause of causeChain(failure)) {
      sections.push(["Caused by:", `  ${cause.message}`, ...frames(cause)]);
    }
  }

  return sections.map((section) => section.join("\n")).join("\n\n");
}

/**
 * Anything that is not a BootpipeError escaped the pipelines unclassified,
 * so it is reported as a non-operational INTERNAL_ERROR.
 */
function asBootpipeError(error: unknown): BootpipeError {
  if (error instanceof BootpipeError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new BootpipeError(String(error), ErrorCode.INTERNAL_ERROR, undefined, undefined, undefined, false);
  }

  const cause = error.cause instanceof Error ? error.cause : undefined;
  const wrapped = new BootpipeError(error.message, ErrorCode.INTERNAL_ERROR, undefined, undefined, cause, false);
  wrapped.stack = error.stack;
  return wrapped;
}

function frames(error: Error): string[] {
  return error.stack ? error.stack.split("\n").filter((line) => /^\s+at /.test(line)) : [];
}

function causeChain(error: Error): Error[] {
  const chain: Error[] = [];
  let current: unknown = error.cause;
  while (current instanceof Error && !chain.includes(current)) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
}

// =============================================================================
// Detail views
// =============================================================================

type Details = Readonly<Record<string, unknown>>;

interface DetailView {
  /** Keys this view renders; they are skipped by the fallback */
  readonly keys: readonly string[];
  readonly render: (details: Details) => string[];
}

const DETAIL_VIEWS: readonly DetailView[] = [
  {
    keys: ["command", "args", "cwd"],
    render: (details) => {
      const executable = text(details.command);
      if (executable === undefined) {
        return [];
      }
      const commandLine = formatCommandLine({ executable, args: texts(details.args) });
      const cwd = text(details.cwd);
      return [cwd === undefined ? `$ ${commandLine}` : `$ cd "${cwd}" && ${commandLine}`];
    },
  },
  {
    keys: ["exitCode"],
    render: (details) => (typeof details.exitCode === "number" ? [`exit code ${details.exitCode}`] : []),
  },
  {
    keys: ["source", "destination"],
    render: (details) => {
      const source = text(details.source);
      const destination = text(details.destination);
      if (source !== undefined && destination !== undefined) {
        return [`${source} -> ${destination}`];
      }
      return [source ?? destination].filter((value): value is string => value !== undefined);
    },
  },
  {
    keys: ["configFile", "line", "column"],
    render: (details) => {
      const configFile = text(details.configFile);
      if (configFile === undefined) {
        return [];
      }
      const position = [details.line, details.column].filter((n): n is number => typeof n === "number");
      return [[configFile, ...position].join(":")];
    },
  },
  {
    keys: ["issues", "failures"],
    render: (details) => [...texts(details.issues), ...texts(details.failures)].map((item) => `- ${item}`),
  },
];

const CLAIMED_KEYS = new Set(DETAIL_VIEWS.flatMap((view) => view.keys));

function renderDetails(details: Details): string[] {
  const lines = DETAIL_VIEWS.flatMap((view) => view.render(details));

  for (const [key, value] of Object.entries(details)) {
    if (CLAIMED_KEYS.has(key) || value === undefined) {
      continue;
    }
    lines.push(`${key}: ${typeof value === "object" && value !== null ? JSON.stringify(value) : String(value)}`);
  }

  return lines;
}

function text(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function texts(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}
