import { z } from "zod";
import { envConfig } from "../config/env";
import { loadScenario } from "../manifests/manifest-loader";
import { ReproductionService } from "../services/reproduction.service";
import { parseCommandArgs, scenarioArgsSchema, scenarioOptions, validateArgs } from "./args";
import { CommandContext } from "./context";

const teardownArgsSchema = scenarioArgsSchema.extend({
  "delete-cluster": z.boolean().default(false),
});

export const teardownCommand = async (argv: string[], ctx: CommandContext): Promise<void> => {
  const { values } = parseCommandArgs({
    args: argv,
    options: {
      ...scenarioOptions,
      "delete-cluster": { type: "boolean" },
    },
  });
  const args = validateArgs(teardownArgsSchema, values);

  const scenario = loadScenario(args.dir ?? envConfig.STACK_ISSUES_DIR, args.scenario);
  await new ReproductionService(ctx.minikube, ctx.kubectl).teardown(scenario, {
    deleteCluster: args["delete-cluster"],
  });
};
