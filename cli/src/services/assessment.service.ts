import * as fs from "fs";
import * as path from "path";
import { setTimeout as delay } from "timers/promises";
import { AppError } from "../errors/app-error";
import { CommandResult, RunOptions } from "../utils/exec";
import { logger } from "../utils/logger";
import { ASSESSMENT_COMMANDS, AssessmentCommand } from "./assessment-commands";
import { KubectlService } from "./kubectl.service";
import { MinikubeService } from "./minikube.service";

export type ScenarioType = "sick" | "healthy";

export interface AssessmentEntry {
  description: string;
  result: CommandResult;
}

/** Written as `<clusterId>-<scenario>-comprehensive.json`; keys are part of the file format. */
export interface AssessmentReport {
  cluster_id: string;
  scenario_type: ScenarioType;
  timestamp: string;
  assessments: Record<string, AssessmentEntry>;
}

export interface CollectorDelays {
  /** after enabling metrics-server */
  metricsServerMs: number;
  /** after applying manifests, before the rollout check */
  settleMs: number;
  /** after deleting everything */
  cleanupMs: number;
}

export interface AssessmentCollectorOptions {
  clusterId: string;
  outputDir: string;
  minikube: MinikubeService;
  kubectl: KubectlService;
  commandTimeoutMs?: number;
  commands?: readonly AssessmentCommand[];
  delays?: Partial<CollectorDelays>;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
}

const DEFAULT_DELAYS: CollectorDelays = {
  metricsServerMs: 30_000,
  settleMs: 45_000,
  cleanupMs: 10_000,
};

const MINIKUBE_START_TIMEOUT_MS = 300_000;

/**
 * Deploys a scenario to minikube, runs a fixed set of diagnostic kubectl
 * commands and stores their output, one flat file per command plus one
 * JSON document per scenario.
 */
export class AssessmentCollector {
  readonly clusterId: string;
  readonly outputDir: string;

  private readonly minikube: MinikubeService;
  private readonly kubectl: KubectlService;
  private readonly commandTimeoutMs: number;
  private readonly commands: readonly AssessmentCommand[];
  private readonly delays: CollectorDelays;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => Date;

  constructor(options: AssessmentCollectorOptions) {
    this.clusterId = options.clusterId;
    this.outputDir = options.outputDir;
    this.minikube = options.minikube;
    this.kubectl = options.kubectl;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 60_000;
    this.commands = options.commands ?? ASSESSMENT_COMMANDS;
    this.delays = { ...DEFAULT_DELAYS, ...options.delays };
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());

    fs.mkdirSync(this.outputDir, { recursive: true });
  }

  /** Every call except `minikube start` runs under the per-command timeout. */
  private get bounded(): RunOptions {
    return { timeoutMs: this.commandTimeoutMs };
  }

  /* ---------------- MINIKUBE ---------------- */
  async setupMinikube(): Promise<void> {
    logger.info("Setting up minikube...");

    // results ignored: there may be no cluster yet
    await this.minikube.stop(this.bounded);
    await this.minikube.delete(this.bounded);

    const start = await this.minikube.startWithResources(
      { cpus: 4, memoryMb: 4096, diskSize: "20g" },
      { timeoutMs: MINIKUBE_START_TIMEOUT_MS }
    );
    if (start.returncode !== 0) {
      throw new AppError(`Failed to start minikube: ${start.stderr}`, "tool-failed", 1, {
        command: start.command,
        returncode: start.returncode,
      });
    }

    // `kubectl top` needs metrics-server
    await this.minikube.enableAddon("metrics-server", this.bounded);

    logger.info("Waiting for metrics server to be ready...");
    await this.sleep(this.delays.metricsServerMs);

    const nodes = await this.kubectl.getNodes(this.bounded);
    if (nodes.returncode !== 0) {
      throw new AppError("Cluster not ready after setup", "tool-failed", 1, {
        command: nodes.command,
        returncode: nodes.returncode,
      });
    }

    logger.info("Minikube setup complete");
  }

  /* ---------------- DEPLOY ---------------- */
  private async applyIfPresent(file: string | undefined, label: string): Promise<void> {
    if (!file || !fs.existsSync(file)) return;

    const result = await this.kubectl.apply(file, this.bounded);
    if (result.returncode !== 0) {
      logger.error({ file }, `Failed to apply ${label}: ${result.stderr}`);
    }
  }

  async deployManifests(deploymentFile?: string, serviceFile?: string): Promise<void> {
    logger.info(`Deploying manifests: ${deploymentFile}, ${serviceFile}`);

    await this.applyIfPresent(deploymentFile, "deployment");
    await this.applyIfPresent(serviceFile, "service");

    logger.info("Waiting for deployments to settle...");
    await this.sleep(this.delays.settleMs);

    // Best effort; a failed rollout is itself part of the assessment
    await this.kubectl.rolloutStatusAll("60s", this.bounded);
  }

  /* ---------------- ASSESS ---------------- */
  async runAssessments(scenarioType: ScenarioType): Promise<AssessmentReport> {
    logger.info(`Running ${scenarioType} assessments...`);

    const report: AssessmentReport = {
      cluster_id: this.clusterId,
      scenario_type: scenarioType,
      timestamp: this.now().toISOString(),
      assessments: {},
    };

    for (const assessment of this.commands) {
      logger.info(`Running assessment: ${assessment.name}`);

      const result = await this.kubectl.run(assessment.args, this.bounded);

      report.assessments[assessment.name] = {
        description: assessment.description,
        result,
      };

      this.saveFlatFile(scenarioType, assessment.name, result);
    }

    const reportFile = path.join(
      this.outputDir,
      `${this.clusterId}-${scenarioType}-comprehensive.json`
    );
    fs.writeFileSync(reportFile, JSON.stringify(report, null, 2));

    logger.info(`Assessment results saved to ${reportFile}`);
    return report;
  }

  flatFilePath(scenarioType: ScenarioType, commandName: string): string {
    return path.join(
      this.outputDir,
      `${this.clusterId}-${scenarioType}-kubectl_${commandName}.txt`
    );
  }

  saveFlatFile(scenarioType: ScenarioType, commandName: string, result: CommandResult): void {
    const lines = [
      `# Command: ${result.command}`,
      `# Timestamp: ${result.timestamp}`,
      `# Return code: ${result.returncode}`,
      `# Cluster ID: ${this.clusterId}`,
      `# Scenario: ${scenarioType}`,
      "",
      "--- STDOUT ---",
      "",
    ];
    let content = lines.join("\n") + result.stdout;
    if (result.stderr) {
      content += "\n--- STDERR ---\n" + result.stderr;
    }

    const file = this.flatFilePath(scenarioType, commandName);
    fs.writeFileSync(file, content);
    logger.debug(`Saved flat file: ${file}`);
  }

  /* ---------------- CLEANUP ---------------- */
  async cleanupCluster(): Promise<void> {
    logger.info("Cleaning up cluster resources...");
    await this.kubectl.deleteAll(this.bounded);
    await this.sleep(this.delays.cleanupMs);
  }

  async collectScenarioData(
    deploymentFile: string | undefined,
    serviceFile: string | undefined,
    scenarioType: ScenarioType
  ): Promise<AssessmentReport> {
    logger.info(`Collecting ${scenarioType} scenario data...`);

    try {
      await this.deployManifests(deploymentFile, serviceFile);
      const report = await this.runAssessments(scenarioType);
      await this.cleanupCluster();
      return report;
    } catch (err) {
      logger.error({ err }, `Error in ${scenarioType} scenario`);
      throw err;
    }
  }
}
