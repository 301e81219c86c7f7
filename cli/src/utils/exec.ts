import { execFile } from "child_process";
import { promisify } from "util";
import { logger } from "./logger";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 16 * 1024 * 1024;

export interface CommandResult {
  command: string;
  returncode: number;
  stdout: string;
  stderr: string;
  timestamp: string;
  /** System error code when the binary could not be started, e.g. ENOENT. */
  spawnError?: string;
}

export interface RunOptions {
  /** Kill the process after this many milliseconds. No limit when unset. */
  timeoutMs?: number;
}

export interface CommandRunner {
  run(command: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

const readStream = (err: Error, key: "stdout" | "stderr"): string => {
  const value: unknown = Reflect.get(err, key);
  return typeof value === "string" ? value : "";
};

/**
 * Runs binaries directly (no shell) and folds every outcome into a
 * CommandResult. Only programming errors escape as rejections.
 */
export class ExecCommandRunner implements CommandRunner {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async run(
    command: readonly string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    const [file, ...args] = command;
    const display = command.join(" ");

    if (!file) {
      throw new Error("Cannot run an empty command");
    }

    logger.info({ command: display }, `Running: ${display}`);

    try {
      const { stdout, stderr } = await execFileAsync(file, args, {
        timeout: options.timeoutMs ?? 0,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      });

      return {
        command: display,
        returncode: 0,
        stdout,
        stderr,
        timestamp: this.now().toISOString(),
      };
    } catch (err) {
      if (!(err instanceof Error)) throw err;

      const timestamp = this.now().toISOString();
      const code: unknown = Reflect.get(err, "code");
      const killed: unknown = Reflect.get(err, "killed");

      if (typeof code === "number") {
        return {
          command: display,
          returncode: code,
          stdout: readStream(err, "stdout"),
          stderr: readStream(err, "stderr"),
          timestamp,
        };
      }

      if (killed === true && options.timeoutMs) {
        logger.error({ command: display }, `Command timed out: ${display}`);
        return {
          command: display,
          returncode: -1,
          stdout: "",
          stderr: "Command timed out",
          timestamp,
        };
      }

      logger.error({ err, command: display }, `Error running command ${display}`);
      return {
        command: display,
        returncode: -1,
        stdout: "",
        stderr: err.message,
        timestamp,
        spawnError: typeof code === "string" ? code : undefined,
      };
    }
  }
}
