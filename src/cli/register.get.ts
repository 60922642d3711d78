import type { Command } from "commander";
import type { ReadonlyOption } from "../options/option.js";
import type { RuntimeEnv } from "../runtime.js";
import { createCliOptions } from "./context.js";

function describeValue(option: ReadonlyOption): string {
  switch (option.kind) {
    case "string":
    case "combo":
      return option.currentValue;
    case "check":
      return option.currentValue ? "true" : "false";
    case "spin":
      return String(option.currentValue);
    case "button":
      return "-";
  }
}

export function registerGetCommand(program: Command, runtime: RuntimeEnv) {
  program
    .command("get")
    .description("Show one option's kind and current value")
    .argument("<name>", "Option name (case-insensitive)")
    .action((name: string) => {
      const entry = createCliOptions(runtime).entry(name);
      if (!entry) {
        runtime.error(`Unknown option "${name}".`);
        runtime.exit(1);
        return;
      }
      runtime.log(`${entry.name} ${entry.option.kind} ${describeValue(entry.option)}`);
    });
}
