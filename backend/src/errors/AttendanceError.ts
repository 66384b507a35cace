import type { ReasonCode } from "../types/attendance";

/**
 * Thrown inside the core for failures that are not business-rule outcomes
 * (storage down, corrupt records, missing configuration). The facade turns
 * these into structured rejections; `message` must stay safe to return.
 */
export class AttendanceError extends Error {
  readonly code: ReasonCode;

  constructor(code: ReasonCode, publicMessage: string, opts?: { cause?: unknown }) {
    super(publicMessage, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "AttendanceError";
    this.code = code;
  }
}

export function isAttendanceError(e: unknown): e is AttendanceError {
  return e instanceof AttendanceError;
}

export function persistenceFailure(action: string, cause: unknown): AttendanceError {
  if (isAttendanceError(cause)) return cause;
  return new AttendanceError("PersistenceFailure", `Storage unavailable while trying to ${action}`, {
    cause,
  });
}
