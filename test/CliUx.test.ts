/**
 * Tests for CLI UX messaging module.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { CliUx, logLevelFor, type LogLevel } from "../src/cli/ux/CliUx.js";

// =============================================================================
// Test Helpers
// =============================================================================

function createCapturedUx(level: LogLevel, colors = false) {
  const chunks: string[] = [];
  const ux = new CliUx({ level, colors, stdout: (chunk) => chunks.push(chunk) });
  return { ux, output: () => chunks.join("") };
}

function emitAll(ux: CliUx): void {
  ux.debug("Debug message");
  ux.verbose("Verbose message");
  ux.info("Info message");
  ux.success("Success message");
}

// =============================================================================
// Tests
// =============================================================================

describe("CliUx", () => {
  describe("formatting", () => {
    it("formats success messages with a checkmark", () => {
      const { ux, output } = createCapturedUx("info");

      ux.success("Staged kernel -> bootimg/kernel.elf");

      expect(output()).toBe("✓ Staged kernel -> bootimg/kernel.elf\n");
    });

    it("aligns success rows in two columns", () => {
      const { ux, output } = createCapturedUx("info");

      ux.success("Build complete (2.00s)", { bootloader: "1.20s", kernel: "800ms" });

      expect(output()).toBe("✓ Build complete (2.00s)\n  bootloader  1.20s\n  kernel      800ms\n");
    });

    it("drops success rows along with the message when silent", () => {
      const { ux, output } = createCapturedUx("silent");

      ux.success("Build complete (2.00s)", { kernel: "800ms" });

      expect(output()).toBe("");
    });

    it("formats info messages with an arrow", () => {
      const { ux, output } = createCapturedUx("info");

      ux.info("Building kernel: cargo build");

      expect(output()).toBe("→ Building kernel: cargo build\n");
    });

    it("indents verbose and tags debug messages", () => {
      const { ux, output } = createCapturedUx("debug");

      ux.verbose("[build] started");
      ux.debug("run: idle -> building");

      expect(output()).toBe("  [build] started\n  [debug] run: idle -> building\n");
    });

    it("writes plain text when colors are disabled", () => {
      const plain = createCapturedUx("info", false);
      plain.ux.success("done");
      expect(plain.output()).toBe("✓ done\n");
    });

    it("colors the symbol when colors are enabled", () => {
      const colored = createCapturedUx("info", true);
      colored.ux.success("done");
      expect(colored.output()).toBe("\u001b[32m✓\u001b[39m done\n");
    });
  });

  describe("log levels", () => {
    it("info hides debug and verbose", () => {
      const { ux, output } = createCapturedUx("info");
      emitAll(ux);

      expect(output()).toBe("→ Info message\n✓ Success message\n");
    });

    it("verbose shows verbose but not debug", () => {
      const { ux, output } = createCapturedUx("verbose");
      emitAll(ux);

      expect(output()).toBe("  Verbose message\n→ Info message\n✓ Success message\n");
    });

    it("debug shows everything", () => {
      const { ux, output } = createCapturedUx("debug");
      emitAll(ux);

      expect(output()).toBe("  [debug] Debug message\n  Verbose message\n→ Info message\n✓ Success message\n");
    });

    it("silent shows nothing", () => {
      const { ux, output } = createCapturedUx("silent");
      emitAll(ux);

      expect(output()).toBe("");
    });
  });
});

describe("logLevelFor", () => {
  it("returns info by default", () => {
    expect(logLevelFor({ verbose: false, trace: false, silent: false })).toBe("info");
  });

  it("returns verbose for --verbose", () => {
    expect(logLevelFor({ verbose: true, trace: false, silent: false })).toBe("verbose");
  });

  it("silent takes precedence over verbose", () => {
    expect(logLevelFor({ verbose: true, trace: false, silent: true })).toBe("silent");
  });

  it("trace takes precedence over everything", () => {
    expect(logLevelFor({ verbose: true, trace: true, silent: true })).toBe("debug");
  });
});
