#!/usr/bin/env node

import { createProgram } from "./program";
import { errorMessage } from "./lib/errors";

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
