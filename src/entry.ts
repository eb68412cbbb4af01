#!/usr/bin/env node
import "dotenv/config";

import { buildProgram } from "./cli/program.js";
import { danger } from "./globals.js";
import { defaultRuntime } from "./runtime.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    defaultRuntime.error(danger(`matrix-greeter failed: ${String(err)}`));
    defaultRuntime.exit(1);
  });
