/**
 * Handler for the `bootpipe doctor` CLI command.
 *
 * Checks that a build/install/run has what it needs:
 * - Node.js version compatibility
 * - Build tools and the emulator on PATH
 * - The UEFI firmware image
 * - The bootloader and kernel project directories
 * - A writable image root
 *
 * Every check runs, even after an earlier one fails, so the report is
 * always complete.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomBytes } from "node:crypto";
import { execa } from "execa";
import { COMPONENT_ORDER, type BootpipeConfig } from "../../core/config/types.js";
import { toError } from "../../core/errors/errors.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Minimum required Node.js major version.
 */
export const MIN_NODE_VERSION = 20;

/**
 * Upper bound for a `--version` probe.
 */
const VERSION_PROBE_TIMEOUT_MS = 10_000;

// =============================================================================
// Types
// =============================================================================

/**
 * Status of a diagnostic check.
 */
export type DoctorStatus = "OK" | "WARN" | "ERROR";

/**
 * Result of a single diagnostic check.
 */
export interface DoctorCheckResult {
  /** Human-readable name of the check */
  readonly name: string;

  readonly status: DoctorStatus;

  readonly details?: string;

  /** Actionable fix suggestion (for WARN/ERROR) */
  readonly fix?: string;
}

export interface DoctorResult {
  readonly checks: DoctorCheckResult[];

  /** True if any check has ERROR status */
  readonly hasErrors: boolean;
}

/**
 * Result of probing an executable with `--version`.
 */
export interface ExecutableCheckResult {
  /** False when the executable could not be started */
  readonly available: boolean;
  /** First line of the version output */
  readonly version?: string;
  readonly error?: string;
}

export type PathKind = "file" | "directory";

/**
 * Dependencies for the doctor handler.
 */
export interface DoctorDependencies {
  readonly config: BootpipeConfig;

  /** Function to get Node.js version (default: process.versions.node) */
  readonly getNodeVersion: () => string;

  /** Runs `<executable> --version` */
  readonly checkExecutable: (executable: string, cwd: string) => Promise<ExecutableCheckResult>;

  /** True when `target` exists and is of the given kind */
  readonly pathExists: (target: string, kind: PathKind) => Promise<boolean>;

  /** Creates `dir` if needed, then writes and removes a probe file */
  readonly testWriteAccess: (dir: string) => Promise<void>;
}

// =============================================================================
// Check Implementations
// =============================================================================

function checkNodeVersion(getVersion: () => string): DoctorCheckResult {
  const version = getVersion();
  const majorVersion = parseInt(version.split(".")[0], 10);

  if (Number.isNaN(majorVersion)) {
    return {
      name: "Node.js",
      status: "ERROR",
      details: `Unable to parse version "${version}"`,
      fix: "Ensure Node.js is properly installed.",
    };
  }

  if (majorVersion >= MIN_NODE_VERSION) {
    return { name: "Node.js", status: "OK", details: `v${version}` };
  }

  return {
    name: "Node.js",
    status: "ERROR",
    details: `v${version} (requires >= ${MIN_NODE_VERSION})`,
    fix: `Upgrade Node.js to >= ${MIN_NODE_VERSION} (use nvm, asdf, or official installer).`,
  };
}

async function checkTool(
  name: string,
  executable: string,
  cwd: string,
  checkExecutable: DoctorDependencies["checkExecutable"],
): Promise<DoctorCheckResult> {
  const result = await checkExecutable(executable, cwd);

  if (result.available && result.version) {
    return { name, status: "OK", details: result.version };
  }

  if (result.available) {
    return {
      name,
      status: "WARN",
      details: `${executable} started but printed no version`,
      fix: `Run \`${executable} --version\` to check the installation.`,
    };
  }

  return {
    name,
    status: "ERROR",
    details: result.error ?? `${executable} not found`,
    fix: `Install ${executable} and make sure it is on your PATH.`,
  };
}

async function checkFirmware(
  firmware: string,
  pathExists: DoctorDependencies["pathExists"],
): Promise<DoctorCheckResult> {
  if (await pathExists(firmware, "file")) {
    return { name: "Firmware", status: "OK", details: firmware };
  }

  return {
    name: "Firmware",
    status: "ERROR",
    details: `${firmware} not found`,
    fix: "Place an OVMF firmware image there, or set emulator.firmware (or BOOTPIPE_FIRMWARE).",
  };
}

async function checkProjectDir(
  name: string,
  dir: string,
  pathExists: DoctorDependencies["pathExists"],
): Promise<DoctorCheckResult> {
  if (await pathExists(dir, "directory")) {
    return { name, status: "OK", details: dir };
  }

  return {
    name,
    status: "ERROR",
    details: `${dir} is not a directory`,
    fix: `Create the project at ${dir}, or point its dir in bootpipe.yaml elsewhere.`,
  };
}

async function checkImageRootWritable(
  imageRoot: string,
  testWrite: DoctorDependencies["testWriteAccess"],
): Promise<DoctorCheckResult> {
  try {
    await testWrite(imageRoot);
    return { name: "Image root", status: "OK", details: `${imageRoot} (writable)` };
  } catch (error) {
    return {
      name: "Image root",
      status: "ERROR",
      details: `${imageRoot} - ${toError(error).message}`,
      fix: `Fix permissions for ${imageRoot} (ensure user has write access).`,
    };
  }
}

// =============================================================================
// Handler Implementation
// =============================================================================

/**
 * Runs all diagnostic checks and returns the results.
 *
 * Build tools shared by both components are probed once.
 */
export async function handleDoctor(deps: DoctorDependencies): Promise<DoctorResult> {
  const { config, getNodeVersion, checkExecutable, pathExists, testWriteAccess } = deps;

  const checks: DoctorCheckResult[] = [];

  checks.push(checkNodeVersion(getNodeVersion));

  const probed = new Set<string>();
  for (const component of COMPONENT_ORDER) {
    const target = config.targets[component];
    if (probed.has(target.command)) {
      continue;
    }
    probed.add(target.command);
    checks.push(await checkTool(`Build tool (${target.command})`, target.command, config.projectRoot, checkExecutable));
  }

  checks.push(await checkTool("Emulator", config.emulator.executable, config.projectRoot, checkExecutable));
  checks.push(await checkFirmware(config.emulator.firmware, pathExists));

  for (const component of COMPONENT_ORDER) {
    const label = component === "bootloader" ? "Bootloader project" : "Kernel project";
    checks.push(await checkProjectDir(label, config.targets[component].projectDir, pathExists));
  }

  checks.push(await checkImageRootWritable(config.imageRoot, testWriteAccess));

  return {
    checks,
    hasErrors: checks.some((check) => check.status === "ERROR"),
  };
}

/**
 * Creates default dependencies using real system checks.
 */
export function createDefaultDoctorDependencies(config: BootpipeConfig): DoctorDependencies {
  return {
    config,
    getNodeVersion: () => process.versions.node,
    checkExecutable: async (executable, cwd) => {
      const result = await execa(executable, ["--version"], {
        cwd,
        reject: false,
        timeout: VERSION_PROBE_TIMEOUT_MS,
      });

      if (result.exitCode === undefined && result.signal === undefined) {
        return { available: false, error: `${executable} not found` };
      }

      const firstLine = result.stdout.split("\n")[0]?.trim();
      return { available: true, version: firstLine || undefined };
    },
    pathExists: async (target, kind) => {
      try {
        const stat = await fs.stat(target);
        return kind === "file" ? stat.isFile() : stat.isDirectory();
      } catch {
        return false;
      }
    },
    testWriteAccess: async (dir) => {
      await fs.mkdir(dir, { recursive: true });

      const probe = path.join(dir, `.doctor-test-${randomBytes(8).toString("hex")}`);
      await fs.writeFile(probe, "doctor-test");
      await fs.unlink(probe);
    },
  };
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Formats the doctor report for CLI output.
 */
export function formatDoctorReport(result: DoctorResult): string[] {
  const lines: string[] = [];

  lines.push("bootpipe doctor report");
  lines.push("----------------------");

  for (const check of result.checks) {
    const statusTag = `[${check.status}]`.padEnd(7);
    lines.push(`${statusTag} ${check.name}: ${check.details ?? ""}`);

    if (check.fix && check.status !== "OK") {
      lines.push(`        Fix: ${check.fix}`);
    }
  }

  return lines;
}
