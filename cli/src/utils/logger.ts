import pino from "pino";
import { logLevel } from "../config/env";

/**
 * Shared logger. Writes to stderr so that stdout only carries the
 * guide, status tables and workaround listings.
 */
export const logger = pino(
  {
    name: "stack-issues",
    level: logLevel,
    base: undefined,
  },
  pino.destination(2)
);
