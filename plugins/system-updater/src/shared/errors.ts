export enum UpdaterErrorCode {
  MANAGER_UNAVAILABLE = "MANAGER_UNAVAILABLE",
  INVOCATION_TIMEOUT = "INVOCATION_TIMEOUT",
  INVOCATION_FAILED = "INVOCATION_FAILED",
  INVOCATION_CANCELLED = "INVOCATION_CANCELLED",
  PRIVILEGE_SKIPPED = "PRIVILEGE_SKIPPED",
  PRIVILEGE_ABORTED = "PRIVILEGE_ABORTED",
  NOT_FOUND = "NOT_FOUND",
  DUPLICATE_MANAGER = "DUPLICATE_MANAGER",
  CONFIG_INVALID = "CONFIG_INVALID",
  DRY_RUN_VIOLATION = "DRY_RUN_VIOLATION",
  RUN_IN_PROGRESS = "RUN_IN_PROGRESS",
}

export type ErrorStep = "availability" | "discovery" | "apply" | "cleanup" | "self-update" | "privilege";

/** Serialisable error as stored in an UpdateResult. */
export interface ErrorRecord {
  readonly code: UpdaterErrorCode;
  readonly message: string;
  readonly step?: ErrorStep;
  readonly exitCode?: number;
  readonly stderr?: string;
}

export class UpdaterError extends Error {
  readonly code: UpdaterErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: UpdaterErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "UpdaterError";
    this.code = code;
    this.context = context;
  }
}

export function isUpdaterError(err: unknown, code?: UpdaterErrorCode): err is UpdaterError {
  return err instanceof UpdaterError && (code === undefined || err.code === code);
}

/**
 * Convert anything thrown at a manager boundary into an ErrorRecord.
 * Unknown throwables become INVOCATION_FAILED so the report always carries a reason.
 */
export function toErrorRecord(err: unknown, step?: ErrorStep): ErrorRecord {
  if (err instanceof UpdaterError) {
    const exitCode = err.context?.["exitCode"];
    const stderr = err.context?.["stderr"];
    return {
      code: err.code,
      message: err.message,
      step,
      exitCode: typeof exitCode === "number" ? exitCode : undefined,
      stderr: typeof stderr === "string" && stderr.length > 0 ? stderr : undefined,
    };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { code: UpdaterErrorCode.INVOCATION_FAILED, message: message || "unknown error", step };
}
