import type { Command } from "commander";
import type { RuntimeEnv } from "../runtime.js";
import { PROTOCOL_OPTION_NAME, renderOptions } from "../options/render.js";
import { createCliOptions, parseAssignment } from "./context.js";

type PrintCommandOptions = {
  protocol?: string;
  set: string[];
  startFen?: string;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerPrintCommand(program: Command, runtime: RuntimeEnv) {
  program
    .command("print")
    .description("Print every option the way the engine announces them")
    .option("--protocol <protocol>", "Dialect to print in (uci or xboard)")
    .option("--set <name=value>", "Assign an option before printing (repeatable)", collect, [])
    .option("--start-fen <fen>", "Start position announced when UCI_Variant changes")
    .action((opts: PrintCommandOptions) => {
      const map = createCliOptions(runtime, { startFen: opts.startFen });
      if (opts.protocol !== undefined) {
        map.set(PROTOCOL_OPTION_NAME, opts.protocol);
      }
      for (const assignment of opts.set) {
        const { name, value } = parseAssignment(assignment);
        if (!map.set(name, value)) {
          runtime.error(`Unknown option "${name}".`);
        }
      }
      runtime.log(renderOptions(map).replace(/^\n/, ""));
    });
}
