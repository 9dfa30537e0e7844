/**
 * Tests for the CLI program: dispatch, usage fallback and exit codes.
 *
 * Every dependency is faked; no build tool or emulator runs.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";

import { runCli } from "../src/cli/program.js";
import type { CliDependencies } from "../src/cli/context.js";
import type { CliServices } from "../src/cli/services.js";
import type { DoctorDependencies } from "../src/cli/handlers/doctorHandler.js";
import { buildConfig, type LoadConfigOptions } from "../src/core/config/ConfigLoader.js";
import { BootpipeError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import type { InstallSummary } from "../src/core/pipeline/InstallPipeline.js";
import type { RunResult } from "../src/core/run/RunController.js";
import { createInvocation } from "../src/core/process/ProcessInvoker.js";

// =============================================================================
// Test Helpers
// =============================================================================

const ROOT = path.resolve("/work/os");

const INSTALL: InstallSummary = {
  build: { results: [], totalDurationMs: 0 },
  staged: [
    {
      component: "kernel",
      source: path.join(ROOT, "kernel", "target", "kernel", "debug", "kernel"),
      destination: path.join(ROOT, "bootimg", "kernel.elf"),
      outcome: "copied",
    },
  ],
};

interface Harness {
  deps: CliDependencies;
  stdout: () => string;
  stderr: () => string;
  calls: string[];
  configRequests: LoadConfigOptions[];
}

function createHarness(
  options: {
    fail?: unknown;
    configError?: BootpipeError;
    doctor?: Partial<DoctorDependencies>;
  } = {},
): Harness {
  const out: string[] = [];
  const err: string[] = [];
  const calls: string[] = [];
  const configRequests: LoadConfigOptions[] = [];
  const config = buildConfig(ROOT, {});

  const failOrReturn = async <T>(call: string, value: T): Promise<T> => {
    calls.push(call);
    if (options.fail !== undefined) {
      throw options.fail;
    }
    return value;
  };

  const services: CliServices = {
    buildPipeline: {
      build: () =>
        failOrReturn("build", {
          results: [
            { component: "bootloader", durationMs: 1200 },
            { component: "kernel", durationMs: 800 },
          ],
          totalDurationMs: 2000,
        }),
    },
    installPipeline: { install: () => failOrReturn("install", INSTALL) },
    runController: {
      run: (debug) => {
        const invocation = createInvocation({ executable: "qemu-system-x86_64", cwd: ROOT, wait: !debug });
        const result: RunResult = debug
          ? { mode: "debug", install: INSTALL, invocation, pid: 4242 }
          : { mode: "normal", install: INSTALL, invocation };
        return failOrReturn(debug ? "run(debug)" : "run(normal)", result);
      },
    },
  };

  const deps: CliDependencies = {
    loadConfig: async (request) => {
      configRequests.push(request);
      if (options.configError) {
        throw options.configError;
      }
      return config;
    },
    createServices: () => services,
    createDoctorDependencies: (cfg) => ({
      config: cfg,
      getNodeVersion: () => "20.11.1",
      checkExecutable: async (executable) => ({ available: true, version: `${executable} 1.0.0` }),
      pathExists: async () => true,
      testWriteAccess: async () => undefined,
      ...options.doctor,
    }),
    stdout: (msg) => out.push(msg),
    stderr: (msg) => err.push(msg),
    colors: false,
    env: {},
  };

  return { deps, stdout: () => out.join(""), stderr: () => err.join(""), calls, configRequests };
}

// =============================================================================
// Tests
// =============================================================================

describe("runCli", () => {
  describe("usage fallback", () => {
    it("prints usage and exits 1 without a command", async () => {
      const h = createHarness();

      const code = await runCli([], h.deps);

      expect(code).toBe(1);
      expect(h.stderr()).toContain("Usage: bootpipe [options] [command]");
      expect(h.calls).toEqual([]);
      expect(h.configRequests).toEqual([]);
    });

    it("prints usage and exits 1 for an unknown command", async () => {
      const h = createHarness();

      const code = await runCli(["frobnicate"], h.deps);

      expect(code).toBe(1);
      expect(h.stderr()).toContain("error: unknown command 'frobnicate'");
      expect(h.stderr()).toContain("Usage: bootpipe [options] [command]");
      expect(h.calls).toEqual([]);
    });

    it("exits 1 for arguments after a command", async () => {
      const h = createHarness();

      const code = await runCli(["build", "kernel"], h.deps);

      expect(code).toBe(1);
      expect(h.calls).toEqual([]);
    });

    it("exits 1 for an unknown option", async () => {
      const h = createHarness();

      const code = await runCli(["--bogus", "build"], h.deps);

      expect(code).toBe(1);
      expect(h.stderr()).toContain("error: unknown option '--bogus'");
      expect(h.calls).toEqual([]);
    });

    it("has no help subcommand", async () => {
      const h = createHarness();

      expect(await runCli(["help"], h.deps)).toBe(1);
    });
  });

  describe("help and version", () => {
    it("prints help to stdout and exits 0", async () => {
      const h = createHarness();

      const code = await runCli(["--help"], h.deps);

      expect(code).toBe(0);
      expect(h.stdout()).toContain("Usage: bootpipe [options] [command]");
      expect(h.stdout()).toContain("debug");
    });

    it("prints the version", async () => {
      const h = createHarness();

      const code = await runCli(["--version"], h.deps);

      expect(code).toBe(0);
      expect(h.stdout()).toBe("0.1.0\n");
    });
  });

  describe("dispatch", () => {
    it("build runs the build pipeline only", async () => {
      const h = createHarness();

      const code = await runCli(["build"], h.deps);

      expect(code).toBe(0);
      expect(h.calls).toEqual(["build"]);
      expect(h.stdout()).toBe("✓ Build complete (2.00s)\n  bootloader  1.20s\n  kernel      800ms\n");
    });

    it("install runs the install pipeline", async () => {
      const h = createHarness();

      const code = await runCli(["install"], h.deps);

      expect(code).toBe(0);
      expect(h.calls).toEqual(["install"]);
      expect(h.stdout()).toBe("✓ Installed 1 artifact into the image\n");
    });

    it("run launches in normal mode", async () => {
      const h = createHarness();

      expect(await runCli(["run"], h.deps)).toBe(0);
      expect(h.calls).toEqual(["run(normal)"]);
    });

    it("debug launches in debug mode", async () => {
      const h = createHarness();

      expect(await runCli(["debug"], h.deps)).toBe(0);
      expect(h.calls).toEqual(["run(debug)"]);
    });
  });

  describe("global options", () => {
    it("passes --root and --config to the config loader", async () => {
      const h = createHarness();

      await runCli(["--root", "/srv/os", "--config", "ci.yaml", "build"], h.deps);

      expect(h.configRequests).toEqual([{ projectRoot: "/srv/os", configFile: "ci.yaml", env: {} }]);
    });

    it("--silent hides progress output", async () => {
      const h = createHarness();

      expect(await runCli(["--silent", "build"], h.deps)).toBe(0);
      expect(h.stdout()).toBe("");
    });

    it("--verbose shows the config step", async () => {
      const h = createHarness();

      await runCli(["--verbose", "build"], h.deps);

      expect(h.stdout()).toContain("  [config.load] started\n");
    });
  });

  describe("failures", () => {
    it("exits with the error's code and presents it on stderr", async () => {
      const h = createHarness({
        fail: new BootpipeError(
          "Kernel build failed: cargo build exited with code 101",
          ErrorCode.BUILD_FAILED,
          { command: "cargo", args: ["build"], cwd: "/work/os/kernel", exitCode: 101 },
          "Run the command above by hand to reproduce the failure.",
        ),
      });

      const code = await runCli(["install"], h.deps);

      expect(code).toBe(20);
      expect(h.stderr()).toBe(
        [
          "Error [BUILD_FAILED]: Kernel build failed: cargo build exited with code 101",
          "",
          '  $ cd "/work/os/kernel" && cargo build',
          "  exit code 101",
          "",
          "Hint:",
          "  Run the command above by hand to reproduce the failure.",
          "",
        ].join("\n"),
      );
    });

    it("exits with the config error's code", async () => {
      const h = createHarness({
        configError: new BootpipeError("Config file not found", ErrorCode.CONFIG_NOT_FOUND),
      });

      const code = await runCli(["--config", "missing.yaml", "run"], h.deps);

      expect(code).toBe(10);
      expect(h.calls).toEqual([]);
    });

    it("exits 2 for unexpected errors", async () => {
      const h = createHarness({ fail: new TypeError("cannot read properties of undefined") });

      const code = await runCli(["debug"], h.deps);

      expect(code).toBe(2);
      expect(h.stderr().split("\n").slice(0, 3)).toEqual([
        "Error [INTERNAL_ERROR]: cannot read properties of undefined",
        "",
        "Hint:",
      ]);
      expect(h.stderr()).toContain("This is a bug in bootpipe");
    });

    it("adds the stack trace with --trace", async () => {
      const h = createHarness({ fail: new Error("boom") });

      await runCli(["--trace", "run"], h.deps);

      expect(h.stderr()).toContain("Stack trace:");
    });
  });

  describe("doctor", () => {
    it("prints the report and exits 0 when healthy", async () => {
      const h = createHarness();

      const code = await runCli(["doctor"], h.deps);

      expect(code).toBe(0);
      expect(h.stdout().split("\n")[0]).toBe("bootpipe doctor report");
      expect(h.stdout()).toContain("[OK]    Emulator: qemu-system-x86_64 1.0.0\n");
    });

    it("exits with DOCTOR_FAILED, not the usage code, when a check errors", async () => {
      const h = createHarness({ doctor: { pathExists: async () => false } });

      const code = await runCli(["doctor"], h.deps);

      expect(code).toBe(50);
      expect(h.stdout()).toContain("[ERROR] Firmware: ");
      expect(h.stderr()).toBe(
        [
          "Error [DOCTOR_FAILED]: 3 doctor check(s) failed",
          "",
          "  - Firmware",
          "  - Bootloader project",
          "  - Kernel project",
          "",
          "Hint:",
          "  Apply the Fix lines in the report above, then run bootpipe doctor again.",
          "",
        ].join("\n"),
      );
    });
  });
});
