import { AppError, exitCodeFor } from "../errors/app-error";
import { Scenario, ServiceManifestSummary } from "../manifests/manifest-loader";
import { CommandResult } from "../utils/exec";
import { logger } from "../utils/logger";
import { formatTable } from "../utils/table";
import { KubectlService } from "./kubectl.service";
import { MinikubeService } from "./minikube.service";
import { formatCommand, listWorkarounds, renderWorkarounds } from "./workarounds";

export interface ReproduceOptions {
  driver: string;
  /** kubectl duration, e.g. "300s" */
  waitTimeout: string;
}

export interface TeardownOptions {
  deleteCluster: boolean;
}

export const SERVICE_TABLE_HEADER = [
  "NAME",
  "TYPE",
  "CLUSTER-IP",
  "EXTERNAL-IP",
  "PORT(S)",
  "AGE",
] as const;

export class ReproductionService {
  constructor(
    private readonly minikube: MinikubeService,
    private readonly kubectl: KubectlService
  ) {}

  /* ---------------- PRESENCE CHECKS ---------------- */
  private async ensureInstalled(
    tool: string,
    probe: () => Promise<CommandResult>
  ): Promise<void> {
    const result = await probe();
    if (result.spawnError === "ENOENT") {
      throw new AppError(
        `${tool} is not installed. Please install ${tool} first.`,
        "tool-missing",
        1,
        { command: result.command }
      );
    }
  }

  async ensureTools(): Promise<void> {
    await this.ensureInstalled("minikube", () => this.minikube.version());
    await this.ensureInstalled("kubectl", () => this.kubectl.clientVersion());
  }

  /* ---------------- STEP RUNNER ---------------- */
  private async step(
    label: string,
    action: () => Promise<CommandResult>
  ): Promise<CommandResult> {
    logger.info(label);

    const result = await action();
    if (result.stdout.trim()) logger.info(result.stdout.trim());

    if (result.returncode !== 0) {
      const stderr = result.stderr.trim();
      throw new AppError(
        `"${result.command}" exited with status ${result.returncode}${stderr ? `: ${stderr}` : ""}`,
        "tool-failed",
        exitCodeFor(result.returncode),
        { command: result.command, returncode: result.returncode }
      );
    }
    return result;
  }

  /* ---------------- REPRODUCE ---------------- */
  async reproduce(scenario: Scenario, options: ReproduceOptions): Promise<void> {
    logger.info(`🚀 Setting up Kubernetes cluster to reproduce ${scenario.name}`);

    await this.ensureTools();

    await this.step("Starting minikube cluster...", () =>
      this.minikube.start(options.driver)
    );

    await this.step("Waiting for cluster to be ready...", () =>
      this.kubectl.waitFor(["nodes", "--all"], "Ready", options.waitTimeout)
    );

    const { deployment, service } = scenario;

    await this.step(`Applying deployment ${deployment.name}...`, () =>
      this.kubectl.apply(deployment.file)
    );

    await this.step(`Waiting for deployment ${deployment.name} to be ready...`, () =>
      this.kubectl.waitFor(
        [`deployment/${deployment.name}`],
        "Available",
        options.waitTimeout
      )
    );

    await this.step(`Applying ${service.serviceType} service ${service.name}...`, () =>
      this.kubectl.apply(service.file)
    );

    logger.info(`✅ ${scenario.name} reproduced`);
  }

  /* ---------------- TEARDOWN ---------------- */
  async teardown(scenario: Scenario, { deleteCluster }: TeardownOptions): Promise<void> {
    await this.ensureTools();

    await this.step(`Deleting service ${scenario.service.name}...`, () =>
      this.kubectl.deleteFile(scenario.service.file)
    );
    await this.step(`Deleting deployment ${scenario.deployment.name}...`, () =>
      this.kubectl.deleteFile(scenario.deployment.file)
    );

    if (deleteCluster) {
      await this.step("Deleting minikube cluster...", () => this.minikube.delete());
    }

    logger.info(`🗑️ ${scenario.name} torn down`);
  }
}

const expectedPorts = (service: ServiceManifestSummary): string => {
  const nodePort =
    service.serviceType === "ClusterIP" ? "" : `:${service.nodePort ?? "3xxxx"}`;
  return `${service.port}${nodePort}/${service.protocol}`;
};

/**
 * What to look at once the scenario is applied, and how to get around it.
 */
export const renderGuide = (scenario: Scenario): string[] => {
  const { service } = scenario;
  const externalIp = service.serviceType === "LoadBalancer" ? "<pending>" : "<none>";
  const namespaceArgs = service.namespace ? ["-n", service.namespace] : [];

  return [
    "",
    "Setup complete! The issue should now be visible.",
    "",
    "To see the pending external IP, run:",
    formatCommand(["kubectl", "get", "svc", service.name, ...namespaceArgs]),
    "",
    "Expected output:",
    ...formatTable([
      SERVICE_TABLE_HEADER,
      [service.name, service.serviceType, "10.x.x.x", externalIp, expectedPorts(service), "Xs"],
    ]),
    "",
    ...renderWorkarounds(listWorkarounds({ serviceName: service.name, port: service.port })),
  ];
};
