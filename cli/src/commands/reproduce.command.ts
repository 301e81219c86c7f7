import { z } from "zod";
import { envConfig } from "../config/env";
import { loadScenario } from "../manifests/manifest-loader";
import { renderGuide, ReproductionService } from "../services/reproduction.service";
import { parseCommandArgs, scenarioArgsSchema, scenarioOptions, validateArgs } from "./args";
import { CommandContext } from "./context";

const reproduceArgsSchema = scenarioArgsSchema.extend({
  driver: z.string().min(1).default(envConfig.MINIKUBE_DRIVER),
  timeout: z
    .string()
    .regex(/^\d+(s|m|h)$/, "--timeout must be a duration such as 300s or 5m")
    .default(envConfig.WAIT_TIMEOUT),
});

/**
 * Starts minikube, applies the scenario's deployment and service, and
 * prints how to observe the issue.
 */
export const reproduceCommand = async (argv: string[], ctx: CommandContext): Promise<void> => {
  const { values } = parseCommandArgs({
    args: argv,
    options: {
      ...scenarioOptions,
      driver: { type: "string" },
      timeout: { type: "string", short: "t" },
    },
  });
  const args = validateArgs(reproduceArgsSchema, values);

  const scenario = loadScenario(args.dir ?? envConfig.STACK_ISSUES_DIR, args.scenario);
  const service = new ReproductionService(ctx.minikube, ctx.kubectl);

  await service.reproduce(scenario, { driver: args.driver, waitTimeout: args.timeout });

  console.log(renderGuide(scenario).join("\n"));
};
