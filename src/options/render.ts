import type { OptionEntry, OptionsMap } from "./registry.js";
import { equalsCaseInsensitive } from "./compare.js";
import { comboEquals } from "./option.js";

/** Name of the combo option that selects the output dialect. */
export const PROTOCOL_OPTION_NAME = "Protocol";

export type OptionsProtocol = "uci" | "xboard";

/**
 * Read the active dialect from the `Protocol` option. Anything other than a
 * combo set to "xboard" (in any case) means UCI.
 */
export function resolveProtocol(map: OptionsMap): OptionsProtocol {
  const protocol = map.get(PROTOCOL_OPTION_NAME);
  if (protocol?.kind === "combo" && comboEquals(protocol, "xboard")) {
    return "xboard";
  }
  return "uci";
}

function printableEntries(map: OptionsMap): OptionEntry[] {
  return Array.from(map.entries()).filter(
    (entry) => !equalsCaseInsensitive(entry.name, PROTOCOL_OPTION_NAME),
  );
}

/** Spin defaults print truncated toward zero, never rounded. */
function spinDefault(value: number): string {
  return String(Math.trunc(value) || 0);
}

function renderUciLine({ name, option }: OptionEntry): string {
  let line = `\noption name ${name} type ${option.kind}`;
  switch (option.kind) {
    case "string":
    case "combo":
      line += ` default ${option.defaultValue}`;
      break;
    case "check":
      line += ` default ${option.defaultValue ? "true" : "false"}`;
      break;
    case "spin":
      line += ` default ${spinDefault(option.defaultValue)} min ${option.min} max ${option.max}`;
      break;
    case "button":
      break;
  }
  if (option.kind === "combo") {
    for (const value of option.allowedValues) {
      line += ` var ${value}`;
    }
  }
  return line;
}

function renderXboardLine({ name, option }: OptionEntry): string {
  let body = `${name} -${option.kind}`;
  switch (option.kind) {
    case "string":
      body += ` ${option.defaultValue}`;
      break;
    case "combo":
      body += ` ${option.defaultValue}`;
      for (const value of option.allowedValues) {
        if (value !== option.defaultValue) {
          body += ` /// ${value}`;
        }
      }
      break;
    case "check":
      body += ` ${option.defaultValue ? 1 : 0}`;
      break;
    case "spin":
      body += ` ${spinDefault(option.defaultValue)} ${option.min} ${option.max}`;
      break;
    case "button":
      break;
  }
  return `\nfeature option="${body}"`;
}

/** Render every option except `Protocol` as UCI `option name …` lines. */
export function renderUciOptions(map: OptionsMap): string {
  return printableEntries(map).map(renderUciLine).join("");
}

/** Render every option except `Protocol` as xboard `feature option="…"` lines. */
export function renderXboardOptions(map: OptionsMap): string {
  return printableEntries(map).map(renderXboardLine).join("");
}

/**
 * Render the whole registry in the dialect selected by `Protocol`.
 * Each line starts with a newline; there is no trailing newline.
 */
export function renderOptions(map: OptionsMap): string {
  return resolveProtocol(map) === "xboard" ? renderXboardOptions(map) : renderUciOptions(map);
}
