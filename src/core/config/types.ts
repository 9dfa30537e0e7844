/**
 * Configuration types for bootpipe.
 *
 * A single frozen `BootpipeConfig` is built once per CLI invocation and
 * handed to every service. Nothing else reads path constants.
 *
 * @module
 */

/**
 * The two independently built components, in build order.
 */
export type ComponentName = "bootloader" | "kernel";

/**
 * Fixed build and staging order: bootloader first, then kernel.
 */
export const COMPONENT_ORDER: readonly ComponentName[] = Object.freeze(["bootloader", "kernel"] as const);

/**
 * One independently buildable component.
 */
export interface BuildTarget {
  readonly name: ComponentName;

  /** Absolute path to the component's project directory (build cwd) */
  readonly projectDir: string;

  /** Build tool executable, looked up on PATH */
  readonly command: string;

  /** Build tool arguments */
  readonly args: readonly string[];

  /** Build output, relative to `projectDir` */
  readonly artifact: string;
}

export interface EmulatorConfig {
  /** Emulator executable, looked up on PATH */
  readonly executable: string;

  /** Absolute path to the UEFI firmware image */
  readonly firmware: string;

  /** Absolute path of the interrupt/diagnostic log */
  readonly logFile: string;

  /** Appended after the base arguments, before the debug flags */
  readonly extraArgs: readonly string[];

  /** Discard the emulator's stderr */
  readonly suppressErrorStream: boolean;
}

export interface BootpipeConfig {
  /** Absolute project root; every relative setting resolves against it */
  readonly projectRoot: string;

  /** Absolute image root, presented to the emulator as a FAT drive */
  readonly imageRoot: string;

  readonly targets: Readonly<Record<ComponentName, BuildTarget>>;

  /** Destination of each artifact, relative to `imageRoot` */
  readonly slots: Readonly<Record<ComponentName, string>>;

  readonly emulator: EmulatorConfig;

  /** Config file the values came from, if any */
  readonly configFile?: string;
}
