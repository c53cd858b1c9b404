export enum InstallerErrorCode {
  PRECONDITION_VIOLATION = "PRECONDITION_VIOLATION",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  EXTERNAL_COMMAND_FAILED = "EXTERNAL_COMMAND_FAILED",
  PATCH_NOT_APPLIED = "PATCH_NOT_APPLIED",
  CONFIG_MALFORMED = "CONFIG_MALFORMED",
  RESOURCE_UNAVAILABLE = "RESOURCE_UNAVAILABLE",
  PARTIAL_CLEANUP_FAILURE = "PARTIAL_CLEANUP_FAILURE",
  UNSUPPORTED_HOST = "UNSUPPORTED_HOST",
}

export class InstallerError extends Error {
  readonly code: InstallerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: InstallerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "InstallerError";
    this.code = code;
    this.context = context;
  }
}

export function isInstallerError(err: unknown, code?: InstallerErrorCode): err is InstallerError {
  return err instanceof InstallerError && (code === undefined || err.code === code);
}
