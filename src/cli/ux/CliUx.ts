/**
 * Terminal output for bootpipe's own messages.
 *
 * Build tools and the emulator write straight to the inherited terminal;
 * CliUx only carries the lines bootpipe prints around them. Errors never go
 * through here (see ErrorPresenter), so `--silent` still shows them.
 *
 * @module
 */

import pc from "picocolors";
import type { PipelineLogger } from "../../core/pipeline/types.js";

export type LogLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: LogLevel;
  /** Default: whether stdout is a TTY */
  readonly colors?: boolean;
  readonly stdout?: (chunk: string) => void;
}

type Palette = ReturnType<typeof pc.createColors>;

type MessageKind = "success" | "info" | "verbose" | "debug";

const RANK: Record<LogLevel, number> = { silent: 0, info: 1, verbose: 2, debug: 3 };

const KINDS: Record<MessageKind, { readonly level: LogLevel; readonly render: (text: string, c: Palette) => string }> = {
  success: { level: "info", render: (text, c) => `${c.green("✓")} ${text}` },
  info: { level: "info", render: (text, c) => `${c.cyan("→")} ${text}` },
  // Step timings and state transitions sit indented under the step lines
  verbose: { level: "verbose", render: (text, c) => `  ${c.dim(text)}` },
  debug: { level: "debug", render: (text, c) => `  ${c.dim(`[debug] ${text}`)}` },
};

/**
 * @example
 * ```typescript
 * const ux = new CliUx({ level: "info" });
 *
 * ux.info("Building kernel: cargo build");
 * ux.success("Build complete (2.00s)", { bootloader: "1.20s", kernel: "800ms" });
 * // ✓ Build complete (2.00s)
 * //   bootloader  1.20s
 * //   kernel      800ms
 * ```
 */
export class CliUx implements PipelineLogger {
  private readonly level: LogLevel;
  private readonly palette: Palette;
  private readonly write: (chunk: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.palette = pc.createColors(options.colors ?? process.stdout.isTTY ?? false);
    this.write = options.stdout ?? ((chunk) => process.stdout.write(chunk));
  }

  /**
   * Prints a success line. `rows` (per-component timings, slot paths) follow
   * it as an aligned two-column table.
   */
  success(message: string, rows?: Readonly<Record<string, string>>): void {
    if (!this.emit("success", message) || !rows) {
      return;
    }

    const width = Math.max(0, ...Object.keys(rows).map((key) => key.length));
    for (const [key, value] of Object.entries(rows)) {
      this.write(`  ${this.palette.dim(key.padEnd(width))}  ${value}\n`);
    }
  }

  info(message: string): void {
    this.emit("info", message);
  }

  verbose(message: string): void {
    this.emit("verbose", message);
  }

  debug(message: string): void {
    this.emit("debug", message);
  }

  private emit(kind: MessageKind, text: string): boolean {
    const { level, render } = KINDS[kind];
    if (RANK[level] > RANK[this.level]) {
      return false;
    }
    this.write(`${render(text, this.palette)}\n`);
    return true;
  }
}

/**
 * `--trace` beats `--silent`, which beats `--verbose`.
 */
export function logLevelFor(flags: { readonly verbose: boolean; readonly silent: boolean; readonly trace: boolean }): LogLevel {
  if (flags.trace) {
    return "debug";
  }
  if (flags.silent) {
    return "silent";
  }
  return flags.verbose ? "verbose" : "info";
}
