import { AppError } from "./app-error";

export interface ErrorLog {
  debug(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

/**
 * Prints `Error: <message>` and sets the process exit code. `log` is absent
 * when the failure happened before the logger could load.
 */
export const handleError = (err: unknown, log?: ErrorLog): void => {
  if (err instanceof AppError) {
    log?.debug({ kind: err.kind, details: err.details }, err.message);
    console.error(`Error: ${err.message}`);
    process.exitCode = err.exitCode;
    return;
  }

  log?.error({ err }, "Unexpected failure");
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
};
