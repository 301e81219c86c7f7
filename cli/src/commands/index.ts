import { collectCommand } from "./collect.command";
import { CommandContext } from "./context";
import { reproduceCommand } from "./reproduce.command";
import { statusCommand } from "./status.command";
import { teardownCommand } from "./teardown.command";
import { workaroundsCommand } from "./workarounds.command";

export interface CommandDefinition {
  summary: string;
  usage: string;
  run(argv: string[], ctx: CommandContext): Promise<void>;
}

export const commands: Record<string, CommandDefinition> = {
  reproduce: {
    summary: "Start minikube and apply a scenario's deployment and service",
    usage: "reproduce [--scenario <name>] [--dir <path>] [--driver <driver>] [--timeout <duration>]",
    run: reproduceCommand,
  },
  status: {
    summary: "Show the scenario's service as `kubectl get svc` does",
    usage:
      "status [--scenario <name>] [--service <name>] [--namespace <ns>] [--wait] [--wait-timeout <ms>] [--interval <ms>]",
    run: (argv) => statusCommand(argv),
  },
  workarounds: {
    summary: "List ways to reach a service whose external IP is pending",
    usage: "workarounds [--scenario <name>] [--service <name>] [--port <port>]",
    run: (argv) => workaroundsCommand(argv),
  },
  teardown: {
    summary: "Delete the scenario's objects, and optionally the cluster",
    usage: "teardown [--scenario <name>] [--dir <path>] [--delete-cluster]",
    run: teardownCommand,
  },
  collect: {
    summary: "Collect assessment data for a sick and a healthy scenario",
    usage:
      "collect <clusterId> --sick-deployment <file> --sick-service <file> --healthy-deployment <file> --healthy-service <file> [--output-dir <dir>] [--skip-sick] [--skip-healthy]",
    run: collectCommand,
  },
};

export const usage = (): string[] => [
  "Usage: stack-issues <command> [options]",
  "",
  "Commands:",
  ...Object.entries(commands).map(([name, c]) => `  ${name.padEnd(12)}${c.summary}`),
  "",
  ...Object.values(commands).map((c) => `  stack-issues ${c.usage}`),
];
