/**
 * Pipeline step identifiers for phase logging.
 *
 * Steps follow a dotted naming convention: `<domain>.<action>`
 *
 * @module
 */

export const Step = {
  /** Loading bootpipe.yaml and environment overrides */
  CONFIG_LOAD: "config.load",

  /** Running the component build tools */
  BUILD: "build",

  /** Copying artifacts into the image root */
  STAGING: "staging",

  /** Spawning the emulator */
  LAUNCH: "launch",
} as const;

export type Step = (typeof Step)[keyof typeof Step];
