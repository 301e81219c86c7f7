export interface Workaround {
  id: string;
  title: string;
  description: string;
  command: string[];
}

export interface WorkaroundTarget {
  serviceName: string;
  port: number;
}

/**
 * Ways to reach a LoadBalancer service whose external IP stays pending
 * on a cluster without a load-balancer provisioner.
 */
export const listWorkarounds = ({ serviceName, port }: WorkaroundTarget): Workaround[] => [
  {
    id: "service-url",
    title: "Access the service despite the pending external IP",
    description:
      "minikube prints a URL that reaches the service through its node port. The external IP stays pending.",
    command: ["minikube", "service", serviceName, "--url"],
  },
  {
    id: "tunnel",
    title: "Fix the pending external IP",
    description:
      "Keep `minikube tunnel` running in a separate terminal. It acts as the load-balancer provisioner and assigns an external IP.",
    command: ["minikube", "tunnel"],
  },
  {
    id: "port-forward",
    title: "Forward a local port",
    description: `Forward localhost:8080 to port ${port} of the service for as long as the command runs.`,
    command: ["kubectl", "port-forward", `service/${serviceName}`, `8080:${port}`],
  },
  {
    id: "node-port",
    title: "Switch the service to NodePort",
    description:
      "A NodePort service needs no provisioner. It is reachable on every node's IP at the allocated port.",
    command: [
      "kubectl",
      "patch",
      "service",
      serviceName,
      "-p",
      '{"spec":{"type":"NodePort"}}',
    ],
  },
  {
    id: "metallb",
    title: "Install a bare-metal load-balancer provisioner",
    description:
      "Enable the MetalLB addon, then give it an address range with `minikube addons configure metallb`.",
    command: ["minikube", "addons", "enable", "metallb"],
  },
];

const quote = (arg: string): string =>
  /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;

/** Renders an argv as a line a user can paste into a POSIX shell. */
export const formatCommand = (command: readonly string[]): string =>
  command.map(quote).join(" ");

export const renderWorkarounds = (workarounds: readonly Workaround[]): string[] =>
  workarounds.flatMap((w, i) => [
    `${i + 1}. ${w.title}`,
    `   ${w.description}`,
    `   $ ${formatCommand(w.command)}`,
    "",
  ]);
