import { CommandResult, CommandRunner, RunOptions } from "../utils/exec";

export class KubectlService {
  constructor(
    private readonly runner: CommandRunner,
    readonly binary = "kubectl"
  ) {}

  run(args: readonly string[], options?: RunOptions): Promise<CommandResult> {
    return this.runner.run([this.binary, ...args], options);
  }

  clientVersion(): Promise<CommandResult> {
    return this.run(["version", "--client"]);
  }

  apply(file: string, options?: RunOptions): Promise<CommandResult> {
    return this.run(["apply", "-f", file], options);
  }

  deleteFile(file: string): Promise<CommandResult> {
    return this.run(["delete", "-f", file, "--ignore-not-found"]);
  }

  /**
   * `kubectl wait --for=condition=<condition> <target>`; `target` is either
   * `kind/name` or a kind followed by `--all`.
   */
  waitFor(
    target: readonly string[],
    condition: string,
    timeout: string
  ): Promise<CommandResult> {
    return this.run(["wait", `--for=condition=${condition}`, ...target, `--timeout=${timeout}`]);
  }

  getNodes(options?: RunOptions): Promise<CommandResult> {
    return this.run(["get", "nodes"], options);
  }

  rolloutStatusAll(timeout: string, options?: RunOptions): Promise<CommandResult> {
    return this.run(
      ["rollout", "status", "deployment", "--all-namespaces", `--timeout=${timeout}`],
      options
    );
  }

  deleteAll(options?: RunOptions): Promise<CommandResult> {
    return this.run(["delete", "all", "--all"], options);
  }
}
