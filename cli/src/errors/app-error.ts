export type ErrorKind =
  | "tool-missing"
  | "tool-failed"
  | "invalid-input"
  | "not-found"
  | "timeout";

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    kind: ErrorKind,
    exitCode = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AppError";
    this.kind = kind;
    this.exitCode = exitCode;
    this.details = details;
  }
}

/**
 * Exit status to report for a tool that exited non-zero. Timeouts and
 * spawn failures come back as -1 and map to 1.
 */
export const exitCodeFor = (returncode: number): number =>
  returncode > 0 && returncode < 256 ? returncode : 1;
