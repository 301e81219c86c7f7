import { z } from "zod";
import { envConfig } from "../config/env";
import { AppError } from "../errors/app-error";
import { AssessmentCollector, AssessmentCollectorOptions } from "../services/assessment.service";
import { logger } from "../utils/logger";
import { parseCommandArgs, validateArgs } from "./args";
import { CommandContext } from "./context";

const required = (flag: string) =>
  z.string({ required_error: `${flag} is required` }).min(1, `${flag} is required`);

const collectArgsSchema = z.object({
  clusterId: z
    .string({ required_error: "cluster ID is required" })
    .min(1, "cluster ID is required"),
  sickDeployment: required("--sick-deployment"),
  sickService: required("--sick-service"),
  healthyDeployment: required("--healthy-deployment"),
  healthyService: required("--healthy-service"),
  outputDir: z.string().min(1).default(envConfig.ASSESSMENT_OUTPUT_DIR),
  skipSick: z.boolean().default(false),
  skipHealthy: z.boolean().default(false),
});

export type CollectArgs = z.infer<typeof collectArgsSchema>;

export const parseCollectArgs = (argv: string[]): CollectArgs => {
  const { values, positionals } = parseCommandArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "sick-deployment": { type: "string" },
      "sick-service": { type: "string" },
      "healthy-deployment": { type: "string" },
      "healthy-service": { type: "string" },
      "output-dir": { type: "string", short: "o" },
      "skip-sick": { type: "boolean" },
      "skip-healthy": { type: "boolean" },
    },
  });

  if (positionals.length > 1) {
    throw new AppError(
      `Unexpected arguments: ${positionals.slice(1).join(" ")}`,
      "invalid-input"
    );
  }

  return validateArgs(collectArgsSchema, {
    clusterId: positionals[0],
    sickDeployment: values["sick-deployment"],
    sickService: values["sick-service"],
    healthyDeployment: values["healthy-deployment"],
    healthyService: values["healthy-service"],
    outputDir: values["output-dir"],
    skipSick: values["skip-sick"],
    skipHealthy: values["skip-healthy"],
  });
};

/**
 * Deploys the sick and then the healthy scenario to a fresh minikube
 * cluster and stores the assessment output of each.
 */
export const collectCommand = async (
  argv: string[],
  ctx: CommandContext,
  clock: Pick<AssessmentCollectorOptions, "sleep" | "now"> = {}
): Promise<void> => {
  const args = parseCollectArgs(argv);

  const collector = new AssessmentCollector({
    clusterId: args.clusterId,
    outputDir: args.outputDir,
    minikube: ctx.minikube,
    kubectl: ctx.kubectl,
    commandTimeoutMs: envConfig.COMMAND_TIMEOUT_MS,
    ...clock,
  });

  try {
    await collector.setupMinikube();

    if (!args.skipSick) {
      logger.info("=== COLLECTING SICK SCENARIO DATA ===");
      await collector.collectScenarioData(args.sickDeployment, args.sickService, "sick");
      logger.info("Sick scenario data collection complete");
    }

    if (!args.skipHealthy) {
      logger.info("=== COLLECTING HEALTHY SCENARIO DATA ===");
      await collector.collectScenarioData(
        args.healthyDeployment,
        args.healthyService,
        "healthy"
      );
      logger.info("Healthy scenario data collection complete");
    }
  } catch (err) {
    logger.error({ err }, "Collection failed");
    throw err;
  }

  logger.info("All data collection complete!");
  logger.info(`Results saved to: ${collector.outputDir}`);
};
