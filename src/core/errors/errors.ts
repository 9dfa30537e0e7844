import { ErrorCode, getExitCode } from "./ErrorCode.js";

export class BootpipeError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    /** False for failures bootpipe did not anticipate (bugs) */
    public readonly isOperational: boolean = true,
  ) {
    super(message);
    this.name = "BootpipeError";
  }
}

/**
 * Process exit code for any thrown value. Non-bootpipe errors count as internal.
 */
export function exitCodeFor(err: unknown): number {
  return getExitCode(err instanceof BootpipeError ? err.code : ErrorCode.INTERNAL_ERROR);
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * True for a Node.js system error carrying the given errno code.
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
