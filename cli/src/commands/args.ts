import { parseArgs, ParseArgsConfig } from "util";
import { z } from "zod";
import { AppError } from "../errors/app-error";

/** util.parseArgs, with its errors reported as invalid input. */
export const parseCommandArgs = <T extends ParseArgsConfig>(config: T) => {
  try {
    return parseArgs(config);
  } catch (err) {
    if (err instanceof Error) {
      throw new AppError(err.message, "invalid-input");
    }
    throw err;
  }
};

export const validateArgs = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new AppError(message, "invalid-input");
  }
  return parsed.data;
};

export const DEFAULT_SCENARIO = "external-ip-pending";

/** Options every scenario-based command accepts. */
export const scenarioOptions = {
  scenario: { type: "string", short: "s" },
  dir: { type: "string" },
} as const;

export const scenarioArgsSchema = z.object({
  scenario: z.string().min(1).default(DEFAULT_SCENARIO),
  dir: z.string().min(1).optional(),
});
