import { z } from "zod";
import { envConfig } from "../config/env";
import { loadScenario } from "../manifests/manifest-loader";
import {
  renderServiceStatus,
  ServiceReader,
  ServiceStatusService,
} from "../services/service-status.service";
import { getCoreV1Api } from "../utils/k8sClient";
import { parseCommandArgs, scenarioArgsSchema, scenarioOptions, validateArgs } from "./args";

const statusArgsSchema = scenarioArgsSchema.extend({
  service: z.string().min(1).optional(),
  namespace: z.string().min(1).optional(),
  wait: z.boolean().default(false),
  "wait-timeout": z.coerce.number().int().positive().default(120_000),
  interval: z.coerce.number().int().positive().default(5_000),
});

export type StatusArgs = z.infer<typeof statusArgsSchema>;

export const parseStatusArgs = (argv: string[]): StatusArgs => {
  const { values } = parseCommandArgs({
    args: argv,
    options: {
      ...scenarioOptions,
      service: { type: "string" },
      namespace: { type: "string", short: "n" },
      wait: { type: "boolean", short: "w" },
      "wait-timeout": { type: "string" },
      interval: { type: "string" },
    },
  });
  return validateArgs(statusArgsSchema, values);
};

/**
 * Shows the scenario's service the way `kubectl get svc` does. With
 * --wait, polls until an external IP is assigned.
 */
export const statusCommand = async (
  argv: string[],
  reader: ServiceReader = getCoreV1Api()
): Promise<void> => {
  const args = parseStatusArgs(argv);

  let name = args.service;
  let namespace = args.namespace;
  if (!name) {
    const scenario = loadScenario(args.dir ?? envConfig.STACK_ISSUES_DIR, args.scenario);
    name = scenario.service.name;
    namespace = namespace ?? scenario.service.namespace;
  }
  namespace = namespace ?? envConfig.K8S_NAMESPACE;

  const statusService = new ServiceStatusService(reader);
  const status = args.wait
    ? await statusService.waitForExternalIp(name, namespace, {
        timeoutMs: args["wait-timeout"],
        intervalMs: args.interval,
      })
    : await statusService.describe(name, namespace);

  console.log(renderServiceStatus(status).join("\n"));

  if (status.pending) {
    console.log("");
    console.log(
      "EXTERNAL-IP is <pending>: nothing on this cluster provisions load balancers."
    );
    console.log("Run `stack-issues workarounds` for ways around it.");
  }
};
