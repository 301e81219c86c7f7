import { CommandResult, CommandRunner, RunOptions } from "../utils/exec";

export interface MinikubeResources {
  cpus: number;
  memoryMb: number;
  diskSize: string;
}

export class MinikubeService {
  constructor(
    private readonly runner: CommandRunner,
    readonly binary = "minikube"
  ) {}

  private run(args: string[], options?: RunOptions): Promise<CommandResult> {
    return this.runner.run([this.binary, ...args], options);
  }

  version(): Promise<CommandResult> {
    return this.run(["version"]);
  }

  start(driver: string): Promise<CommandResult> {
    return this.run(["start", `--driver=${driver}`]);
  }

  startWithResources(
    { cpus, memoryMb, diskSize }: MinikubeResources,
    options?: RunOptions
  ): Promise<CommandResult> {
    return this.run(
      ["start", `--cpus=${cpus}`, `--memory=${memoryMb}`, `--disk-size=${diskSize}`],
      options
    );
  }

  stop(options?: RunOptions): Promise<CommandResult> {
    return this.run(["stop"], options);
  }

  delete(options?: RunOptions): Promise<CommandResult> {
    return this.run(["delete"], options);
  }

  enableAddon(addon: string, options?: RunOptions): Promise<CommandResult> {
    return this.run(["addons", "enable", addon], options);
  }
}
