import { z } from "zod";
import { envConfig } from "../config/env";
import { loadScenario } from "../manifests/manifest-loader";
import { listWorkarounds, renderWorkarounds, WorkaroundTarget } from "../services/workarounds";
import { parseCommandArgs, scenarioArgsSchema, scenarioOptions, validateArgs } from "./args";

const workaroundsArgsSchema = scenarioArgsSchema.extend({
  service: z.string().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65535).optional(),
});

export const resolveWorkaroundTarget = (argv: string[]): WorkaroundTarget => {
  const { values } = parseCommandArgs({
    args: argv,
    options: {
      ...scenarioOptions,
      service: { type: "string" },
      port: { type: "string", short: "p" },
    },
  });
  const args = validateArgs(workaroundsArgsSchema, values);

  if (args.service) {
    return { serviceName: args.service, port: args.port ?? 80 };
  }

  const { service } = loadScenario(args.dir ?? envConfig.STACK_ISSUES_DIR, args.scenario);
  return { serviceName: service.name, port: args.port ?? service.port };
};

export const workaroundsCommand = async (argv: string[]): Promise<void> => {
  const target = resolveWorkaroundTarget(argv);
  console.log(`Workarounds for a pending external IP on ${target.serviceName}:`);
  console.log("");
  console.log(renderWorkarounds(listWorkarounds(target)).join("\n"));
};
