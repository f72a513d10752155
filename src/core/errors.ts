/**
 * Operation error taxonomy
 */

export type OperationErrorCode =
  | "LockHeld"
  | "NotFound"
  | "PermissionDenied"
  | "InsufficientSpace"
  | "BuildError"
  | "ChecksumMismatch"
  | "CorruptArchive"
  | "MissingDigest"
  | "UnparseableTimestamp"
  | "ExtractFailed";

/** Codes that abort the whole run */
const FATAL_CODES: ReadonlySet<OperationErrorCode> = new Set([
  "LockHeld",
  "NotFound",
  "PermissionDenied",
  "InsufficientSpace",
  "BuildError",
  "ExtractFailed",
]);

export const VERIFY_ERROR_CODES: ReadonlySet<OperationErrorCode> = new Set([
  "ChecksumMismatch",
  "CorruptArchive",
  "MissingDigest",
]);

export class OperationError extends Error {
  readonly code: OperationErrorCode;

  constructor(code: OperationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OperationError";
    this.code = code;
  }

  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

export function isOperationError(error: unknown, code?: OperationErrorCode): error is OperationError {
  return error instanceof OperationError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a filesystem errno onto the taxonomy, keeping the original as cause.
 */
export function fromFsError(error: unknown, subject: string): OperationError {
  const code = errnoCode(error);
  if (code === "ENOENT" || code === "ENOTDIR") {
    return new OperationError("NotFound", `Not found: ${subject}`, { cause: error });
  }
  if (code === "EACCES" || code === "EPERM") {
    return new OperationError("PermissionDenied", `Permission denied: ${subject}`, { cause: error });
  }
  return new OperationError("BuildError", `${subject}: ${errorMessage(error)}`, { cause: error });
}
