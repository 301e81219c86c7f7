export interface AssessmentCommand {
  name: string;
  /** kubectl arguments, without the binary */
  args: string[];
  description: string;
}

export const ASSESSMENT_COMMANDS: readonly AssessmentCommand[] = [
  {
    name: "cluster-info",
    args: ["cluster-info"],
    description: "Basic cluster information",
  },
  {
    name: "get_nodes_-o_wide",
    args: ["get", "nodes", "-o", "wide"],
    description: "Node status and details",
  },
  {
    name: "get_pods_--all-namespaces_--field-selector=status.phase!=Running",
    args: ["get", "pods", "--all-namespaces", "--field-selector=status.phase!=Running"],
    description: "Non-running pods",
  },
  {
    name: "top_nodes",
    args: ["top", "nodes"],
    description: "Node resource usage",
  },
  {
    name: "top_pods_--all-namespaces",
    args: ["top", "pods", "--all-namespaces"],
    description: "Pod resource usage",
  },
  {
    name: "get_componentstatuses",
    args: ["get", "componentstatuses"],
    description: "Component health status",
  },
  {
    name: "get_events_--all-namespaces_--sort-by='.lastTimestamp'",
    args: ["get", "events", "--all-namespaces", "--sort-by=.lastTimestamp"],
    description: "Recent cluster events",
  },
  {
    name: "get_pods_--all-namespaces",
    args: ["get", "pods", "--all-namespaces", "-o", "wide"],
    description: "All pods detailed view",
  },
  {
    name: "get_services_--all-namespaces",
    args: ["get", "services", "--all-namespaces"],
    description: "All services",
  },
  {
    name: "get_deployments_--all-namespaces",
    args: ["get", "deployments", "--all-namespaces"],
    description: "All deployments",
  },
];
