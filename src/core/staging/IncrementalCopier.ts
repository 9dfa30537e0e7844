/**
 * Incremental Copier - Stages build artifacts into the image root.
 *
 * Copies a file only when the destination is missing or older than the
 * source, using modification times as the staleness signal. The copy goes
 * through a temporary sibling file that is renamed into place, so the
 * destination is either the previous file or the complete new one, never
 * a truncated mix.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import * as path from "node:path";
import { randomBytes } from "node:crypto";
import { BootpipeError, hasErrnoCode, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

/**
 * What `copyIfNewer` did.
 */
export type CopyOutcome = "copied" | "up-to-date";

/**
 * Logger interface for staging operations.
 */
export interface CopierLogger {
  debug?(message: string): void;
}

// =============================================================================
// IncrementalCopier Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const copier = new IncrementalCopier();
 *
 * await copier.copyIfNewer("kernel/target/kernel/debug/kernel", "bootimg/kernel.elf"); // "copied"
 * await copier.copyIfNewer("kernel/target/kernel/debug/kernel", "bootimg/kernel.elf"); // "up-to-date"
 * ```
 */
export class IncrementalCopier {
  constructor(private readonly logger?: CopierLogger) {}

  /**
   * Copies `source` to `destination` unless the destination is at least as new.
   *
   * @throws BootpipeError ARTIFACT_MISSING if the source does not exist
   * @throws BootpipeError STAGING_FAILED on any other I/O error
   */
  async copyIfNewer(source: string, destination: string): Promise<CopyOutcome> {
    const sourceStat = await this.statIfExists(source);

    if (!sourceStat || !sourceStat.isFile()) {
      throw new BootpipeError(
        `Build artifact not found: ${source}`,
        ErrorCode.ARTIFACT_MISSING,
        { source, destination },
        `Expected the build to produce ${source}. ` +
          `Check the build output, or the artifact path in bootpipe.yaml.`,
      );
    }

    const destinationStat = await this.statIfExists(destination);

    if (destinationStat && sourceStat.mtimeMs <= destinationStat.mtimeMs) {
      this.logger?.debug?.(`Up to date: ${destination}`);
      return "up-to-date";
    }

    await this.replaceFile(source, destination);
    this.logger?.debug?.(`Copied ${source} -> ${destination}`);

    return "copied";
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Stats a path, mapping "does not exist" to undefined.
   */
  private async statIfExists(filePath: string): Promise<Stats | undefined> {
    try {
      return await fs.stat(filePath);
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return undefined;
      }
      throw this.stagingError(`Cannot read ${filePath}`, filePath, error);
    }
  }

  /**
   * Copies into a temporary sibling, then renames over the destination.
   */
  private async replaceFile(source: string, destination: string): Promise<void> {
    const dir = path.dirname(destination);
    const tempFile = path.join(dir, `.${path.basename(destination)}.${randomBytes(4).toString("hex")}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.copyFile(source, tempFile);
      await fs.rename(tempFile, destination);
    } catch (error) {
      await fs.rm(tempFile, { force: true }).catch((cleanupError: unknown) => {
        this.logger?.debug?.(`Failed to remove ${tempFile}: ${toError(cleanupError).message}`);
      });
      throw this.stagingError(`Failed to stage ${source}`, destination, error);
    }
  }

  private stagingError(message: string, filePath: string, error: unknown): BootpipeError {
    const cause = toError(error);
    return new BootpipeError(
      message,
      ErrorCode.STAGING_FAILED,
      { path: filePath, reason: cause.message },
      `Check that ${path.dirname(filePath)} is writable. ${cause.message}`,
      cause,
    );
  }
}
