/**
 * Per-invocation CLI state shared by the commands.
 *
 * The global flags are only known once commander has parsed them, so the
 * `preAction` hook calls `configure()` before any command action runs.
 * Config and services are created lazily and at most once.
 *
 * @module
 */

import { loadConfig, type LoadConfigOptions } from "../core/config/ConfigLoader.js";
import type { BootpipeConfig } from "../core/config/types.js";
import { Step } from "../core/logging/Step.js";
import { StepTimer } from "../core/logging/StepTimer.js";
import { createDefaultDoctorDependencies, type DoctorDependencies } from "./handlers/doctorHandler.js";
import { createServices, type CliServices } from "./services.js";
import { CliUx, logLevelFor } from "./ux/CliUx.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Global options, as commander parses them.
 */
export type GlobalOptions = {
  readonly root?: string;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly silent?: boolean;
  readonly trace?: boolean;
};

/**
 * Everything the CLI touches outside itself. Tests replace the factories
 * and capture the output streams.
 */
export interface CliDependencies {
  readonly loadConfig: (options: LoadConfigOptions) => Promise<BootpipeConfig>;
  readonly createServices: (config: BootpipeConfig, ux: CliUx) => CliServices;
  readonly createDoctorDependencies: (config: BootpipeConfig) => DoctorDependencies;
  readonly stdout: (msg: string) => void;
  readonly stderr: (msg: string) => void;
  /** Force colors on or off (default: TTY detection) */
  readonly colors?: boolean;
  readonly env?: NodeJS.ProcessEnv;
}

export function createDefaultCliDependencies(): CliDependencies {
  return {
    loadConfig,
    createServices,
    createDoctorDependencies: createDefaultDoctorDependencies,
    stdout: (msg) => process.stdout.write(msg),
    stderr: (msg) => process.stderr.write(msg),
  };
}

// =============================================================================
// CliContext
// =============================================================================

export class CliContext {
  private options: GlobalOptions = {};
  private currentUx: CliUx;
  private configPromise?: Promise<BootpipeConfig>;
  private cachedServices?: CliServices;

  constructor(readonly deps: CliDependencies) {
    this.currentUx = this.createUx();
  }

  get ux(): CliUx {
    return this.currentUx;
  }

  /** Whether error output includes stack traces */
  get trace(): boolean {
    return this.options.trace ?? false;
  }

  /**
   * Applies the parsed global flags.
   */
  configure(options: GlobalOptions): void {
    this.options = options;
    this.currentUx = this.createUx();
  }

  /**
   * Loads the configuration for `--root` / `--config`.
   *
   * @throws BootpipeError CONFIG_NOT_FOUND or CONFIG_INVALID
   */
  config(): Promise<BootpipeConfig> {
    if (!this.configPromise) {
      const timer = new StepTimer(this.currentUx);
      this.configPromise = timer.run(Step.CONFIG_LOAD, async () => {
        const config = await this.deps.loadConfig({
          projectRoot: this.options.root,
          configFile: this.options.config,
          env: this.deps.env,
        });
        this.currentUx.debug(`Project root: ${config.projectRoot}`);
        this.currentUx.debug(`Config file: ${config.configFile ?? "(none, using defaults)"}`);
        return config;
      });
    }
    return this.configPromise;
  }

  async services(): Promise<CliServices> {
    const config = await this.config();
    this.cachedServices ??= this.deps.createServices(config, this.currentUx);
    return this.cachedServices;
  }

  /**
   * Writes a line to stdout regardless of log level.
   */
  print(line: string): void {
    this.deps.stdout(`${line}\n`);
  }

  private createUx(): CliUx {
    return new CliUx({
      level: logLevelFor({
        verbose: this.options.verbose ?? false,
        trace: this.options.trace ?? false,
        silent: this.options.silent ?? false,
      }),
      colors: this.deps.colors,
      stdout: this.deps.stdout,
    });
  }
}
