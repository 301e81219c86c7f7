#!/usr/bin/env node
import { handleError } from "./errors/handle-error";

// loaded lazily so that an invalid environment is reported like any other error
import("./main")
  .then(({ run }) => run(process.argv.slice(2)))
  .catch((err: unknown) => handleError(err));
