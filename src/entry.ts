#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { defaultRuntime } from "./runtime.js";

buildProgram(defaultRuntime)
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    defaultRuntime.error(String(err));
    defaultRuntime.exit(1);
  });
