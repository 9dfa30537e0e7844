/**
 * Shared pipeline types.
 *
 * @module
 */

import type { StepLogger } from "../logging/StepTimer.js";

/**
 * Output channel the pipelines report progress to. CliUx satisfies it.
 */
export interface PipelineLogger extends StepLogger {
  info(message: string): void;
  success(message: string): void;
  debug(message: string): void;
}
