import { AppError } from "./errors/app-error";
import { handleError } from "./errors/handle-error";
import { commands, usage } from "./commands";
import { CommandContext, createContext } from "./commands/context";
import { logger } from "./utils/logger";

export const main = async (
  argv: string[],
  context: () => CommandContext = createContext
): Promise<void> => {
  const [name, ...rest] = argv;

  if (!name || name === "help" || name === "--help" || name === "-h") {
    console.log(usage().join("\n"));
    return;
  }

  if (!Object.hasOwn(commands, name)) {
    throw new AppError(
      `Unknown command "${name}". Run \`stack-issues help\` for the list of commands.`,
      "invalid-input"
    );
  }

  await commands[name].run(rest, context());
};

export const run = (argv: string[]): Promise<void> =>
  main(argv).catch((err: unknown) => handleError(err, logger));
