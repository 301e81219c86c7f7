import { config } from "dotenv";
import { z } from "zod";
import { AppError } from "../errors/app-error";

config();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),

  MINIKUBE_BIN: z.string().min(1).default("minikube"),
  KUBECTL_BIN: z.string().min(1).default("kubectl"),
  MINIKUBE_DRIVER: z.string().min(1).default("docker"),
  // passed through to `kubectl wait --timeout`
  WAIT_TIMEOUT: z
    .string()
    .regex(/^\d+(s|m|h)$/, "must be a kubectl duration such as 300s or 5m")
    .default("300s"),

  STACK_ISSUES_DIR: z.string().min(1).default("stack-issues"),
  K8S_NAMESPACE: z.string().min(1).default("default"),
  ASSESSMENT_OUTPUT_DIR: z.string().min(1).default("assessment_data"),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export const loadEnv = (source: NodeJS.ProcessEnv): EnvConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new AppError(`Invalid environment: ${issues}`, "invalid-input");
  }
  return parsed.data;
};

export const envConfig: EnvConfig = loadEnv(process.env);

export const logLevel =
  envConfig.LOG_LEVEL ?? (envConfig.NODE_ENV === "test" ? "silent" : "info");
