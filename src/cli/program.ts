import { Command } from "commander";
import type { RuntimeEnv } from "../runtime.js";
import { registerGetCommand } from "./register.get.js";
import { registerPrintCommand } from "./register.print.js";

export function buildProgram(runtime: RuntimeEnv): Command {
  const program = new Command();
  program.name("engine-options").description("Inspect the engine's option registry");
  registerPrintCommand(program, runtime);
  registerGetCommand(program, runtime);
  return program;
}
