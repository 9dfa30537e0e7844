/**
 * Standardized error codes for bootpipe.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 * - Mapped to exactly one process exit code
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All official bootpipe error codes.
 *
 * Codes are grouped by domain:
 * - CONFIG_* : Configuration loading and validation
 * - BUILD_* / COMMAND_* : External build tool invocation
 * - ARTIFACT_* / STAGING_* : Staging artifacts into the image root
 * - EMULATOR_* / FIRMWARE_* : Emulator launch
 * - DOCTOR_FAILED : Environment diagnostics found an error
 * - USAGE_ERROR : CLI invoked without a recognized command
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Usage (1)
  USAGE_ERROR: "USAGE_ERROR",

  // Config errors (10-19)
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_INVALID: "CONFIG_INVALID",

  // Build errors (20-29)
  BUILD_FAILED: "BUILD_FAILED",
  COMMAND_NOT_FOUND: "COMMAND_NOT_FOUND",

  // Staging errors (30-39)
  ARTIFACT_MISSING: "ARTIFACT_MISSING",
  STAGING_FAILED: "STAGING_FAILED",

  // Emulator errors (40-49)
  EMULATOR_FAILED: "EMULATOR_FAILED",
  FIRMWARE_NOT_FOUND: "FIRMWARE_NOT_FOUND",

  // Environment errors (50-59)
  DOCTOR_FAILED: "DOCTOR_FAILED",

  // Internal errors (2)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code ranges by category:
 * - 1: Usage error (no or unknown command)
 * - 2: Internal/generic error
 * - 10-19: Config errors
 * - 20-29: Build/command errors
 * - 30-39: Staging errors
 * - 40-49: Emulator errors
 * - 50-59: Environment errors
 *
 * Usage keeps 1 to itself so scripts can tell a typo from a failed build.
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.USAGE_ERROR]: 1,

  [ErrorCode.CONFIG_NOT_FOUND]: 10,
  [ErrorCode.CONFIG_INVALID]: 11,

  [ErrorCode.BUILD_FAILED]: 20,
  [ErrorCode.COMMAND_NOT_FOUND]: 21,

  [ErrorCode.ARTIFACT_MISSING]: 30,
  [ErrorCode.STAGING_FAILED]: 31,

  [ErrorCode.EMULATOR_FAILED]: 40,
  [ErrorCode.FIRMWARE_NOT_FOUND]: 41,

  [ErrorCode.DOCTOR_FAILED]: 50,

  [ErrorCode.INTERNAL_ERROR]: 2,
};

/**
 * Gets the exit code for an error code.
 */
export function getExitCode(code: ErrorCode): number {
  return EXIT_CODE_MAP[code];
}
