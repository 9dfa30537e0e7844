/**
 * Config Loader for bootpipe.
 *
 * Builds the immutable `BootpipeConfig` from, in increasing precedence:
 * 1. Built-in defaults (the conventional bootloader/kernel/bootimg layout)
 * 2. `bootpipe.yaml` in the project root, or the file passed with `--config`
 * 3. Environment variables (`BOOTPIPE_EMULATOR`, `BOOTPIPE_FIRMWARE`,
 *    `BOOTPIPE_IMAGE_ROOT`)
 *
 * Every relative path is resolved against the project root. Image slots
 * stay relative to the image root and must not escape it.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { BootpipeError, hasErrnoCode, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { BootpipeConfig, BuildTarget, ComponentName } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Config file looked up in the project root when `--config` is not given.
 */
export const CONFIG_FILENAME = "bootpipe.yaml";

/**
 * Environment variables that override file values.
 */
export const ENV_EMULATOR = "BOOTPIPE_EMULATOR";
export const ENV_FIRMWARE = "BOOTPIPE_FIRMWARE";
export const ENV_IMAGE_ROOT = "BOOTPIPE_IMAGE_ROOT";

/**
 * Built-in layout, relative to the project root.
 */
export const DEFAULTS = {
  imageRoot: "bootimg",
  bootloader: {
    dir: "bootloader",
    command: "cargo",
    args: ["build"],
    artifact: "target/x86_64-unknown-uefi/debug/bootloader.efi",
    slot: "EFI/BOOT/BOOTX64.efi",
  },
  kernel: {
    dir: "kernel",
    command: "cargo",
    args: ["build"],
    artifact: "target/kernel/debug/kernel",
    slot: "kernel.elf",
  },
  emulator: {
    executable: "qemu-system-x86_64",
    firmware: "ovmf/OVMF-pure-efi.fd",
    logFile: "qemu.log",
    extraArgs: [],
    suppressErrorStream: true,
  },
} as const;

// =============================================================================
// Zod Schemas
// =============================================================================

const nonEmptyString = (fieldName: string) =>
  z
    .string()
    .transform((s) => s.trim())
    .refine((s) => s.length > 0, { message: `${fieldName} cannot be empty` });

/**
 * True when `slot` is a relative path that stays inside the image root.
 */
export function isInsideImageRoot(slot: string): boolean {
  if (path.isAbsolute(slot) || path.win32.isAbsolute(slot)) return false;
  const normalized = path.normalize(slot);
  if (normalized === "." || normalized === "") return false;
  return normalized !== ".." && !normalized.startsWith(`..${path.sep}`);
}

const SlotSchema = nonEmptyString("slot").refine(isInsideImageRoot, {
  message: "slot must be a relative path inside the image root",
});

const ComponentSchema = z
  .object({
    dir: nonEmptyString("dir").optional(),
    command: nonEmptyString("command").optional(),
    args: z.array(z.string()).optional(),
    artifact: nonEmptyString("artifact").optional(),
    slot: SlotSchema.optional(),
  })
  .strict();

const EmulatorSchema = z
  .object({
    executable: nonEmptyString("executable").optional(),
    firmware: nonEmptyString("firmware").optional(),
    logFile: nonEmptyString("logFile").optional(),
    extraArgs: z.array(z.string()).optional(),
    suppressErrorStream: z.boolean().optional(),
  })
  .strict();

/**
 * Schema of `bootpipe.yaml`. Every field is optional; omitted fields keep
 * their defaults.
 */
export const ConfigFileSchema = z
  .object({
    imageRoot: nonEmptyString("imageRoot").optional(),
    bootloader: ComponentSchema.optional(),
    kernel: ComponentSchema.optional(),
    emulator: EmulatorSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// =============================================================================
// Types
// =============================================================================

export interface LoadConfigOptions {
  /** Project root; relative values resolve against it (default: cwd) */
  readonly projectRoot?: string;

  /** Explicit config file; must exist when given */
  readonly configFile?: string;

  /** Environment to read overrides from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
}

// =============================================================================
// ConfigLoader
// =============================================================================

/**
 * Loads and validates the bootpipe configuration.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({ projectRoot: "/work/os" });
 * config.targets.kernel.projectDir; // "/work/os/kernel"
 * config.slots.bootloader;          // "EFI/BOOT/BOOTX64.efi"
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BootpipeConfig> {
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const env = options.env ?? process.env;

  const explicit = options.configFile !== undefined;
  const configFile = explicit
    ? path.resolve(projectRoot, options.configFile ?? CONFIG_FILENAME)
    : path.join(projectRoot, CONFIG_FILENAME);

  const content = await readConfigFile(configFile, explicit);
  const file = content === undefined ? {} : parseConfigFile(content, configFile);

  return buildConfig(projectRoot, file, env, content === undefined ? undefined : configFile);
}

/**
 * Merges defaults, file values and environment overrides into a frozen config.
 *
 * Exposed separately so callers with an in-memory config file (tests, tools)
 * skip the filesystem.
 */
export function buildConfig(
  projectRoot: string,
  file: ConfigFile,
  env: NodeJS.ProcessEnv = {},
  configFile?: string,
): BootpipeConfig {
  const root = path.resolve(projectRoot);
  const resolve = (value: string) => path.resolve(root, value);

  const imageRoot = resolve(nonEmptyEnv(env, ENV_IMAGE_ROOT) ?? file.imageRoot ?? DEFAULTS.imageRoot);

  const target = (name: ComponentName): BuildTarget => {
    const defaults = DEFAULTS[name];
    const overrides = file[name];
    return Object.freeze({
      name,
      projectDir: resolve(overrides?.dir ?? defaults.dir),
      command: overrides?.command ?? defaults.command,
      args: Object.freeze([...(overrides?.args ?? defaults.args)]),
      artifact: overrides?.artifact ?? defaults.artifact,
    });
  };
  const slot = (name: ComponentName): string => file[name]?.slot ?? DEFAULTS[name].slot;

  const emulator = file.emulator;

  return Object.freeze({
    projectRoot: root,
    imageRoot,
    targets: Object.freeze({ bootloader: target("bootloader"), kernel: target("kernel") }),
    slots: Object.freeze({ bootloader: slot("bootloader"), kernel: slot("kernel") }),
    emulator: Object.freeze({
      executable: nonEmptyEnv(env, ENV_EMULATOR) ?? emulator?.executable ?? DEFAULTS.emulator.executable,
      firmware: resolve(nonEmptyEnv(env, ENV_FIRMWARE) ?? emulator?.firmware ?? DEFAULTS.emulator.firmware),
      logFile: resolve(emulator?.logFile ?? DEFAULTS.emulator.logFile),
      extraArgs: Object.freeze([...(emulator?.extraArgs ?? DEFAULTS.emulator.extraArgs)]),
      suppressErrorStream: emulator?.suppressErrorStream ?? DEFAULTS.emulator.suppressErrorStream,
    }),
    configFile,
  });
}

/**
 * Parses and validates config file content.
 *
 * @throws BootpipeError CONFIG_INVALID on YAML or schema errors
 */
export function parseConfigFile(content: string, configFile: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const cause = toError(error);
    const details: Record<string, unknown> = { configFile };
    if (error instanceof YAMLParseError) {
      details.line = error.linePos?.[0]?.line;
      details.column = error.linePos?.[0]?.col;
    }

    throw new BootpipeError(
      "Invalid YAML syntax in config file",
      ErrorCode.CONFIG_INVALID,
      details,
      `Failed to parse ${path.basename(configFile)}: ${cause.message}`,
      cause,
    );
  }

  // An empty file parses to null; treat it as "no overrides"
  const result = ConfigFileSchema.safeParse(parsed ?? {});

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${fieldPath}: ${issue.message}`;
    });

    throw new BootpipeError(
      "Invalid config file",
      ErrorCode.CONFIG_INVALID,
      { configFile, issues },
      `Fix ${configFile}: ${issues.join("; ")}`,
    );
  }

  return result.data;
}

// =============================================================================
// Internal Helpers
// =============================================================================

async function readConfigFile(configFile: string, explicit: boolean): Promise<string | undefined> {
  try {
    return await fs.readFile(configFile, "utf-8");
  } catch (error) {
    const cause = toError(error);
    const missing = hasErrnoCode(error, "ENOENT");

    if (missing && !explicit) {
      return undefined;
    }

    if (missing) {
      throw new BootpipeError(
        "Config file not found",
        ErrorCode.CONFIG_NOT_FOUND,
        { configFile },
        `No config file at ${configFile}. Check the --config path.`,
        cause,
      );
    }

    throw new BootpipeError(
      "Failed to read config file",
      ErrorCode.CONFIG_INVALID,
      { configFile, reason: cause.message },
      `Could not read ${configFile}. ${cause.message}`,
      cause,
    );
  }
}

function nonEmptyEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}
