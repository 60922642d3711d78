import type { EngineOptionHookId, EngineOptionHooks } from "../options/engine-options.js";
import type { OptionsMap } from "../options/registry.js";
import type { RuntimeEnv } from "../runtime.js";
import { resolveEngineOptionsConfig } from "../config.js";
import { createEngineOptions } from "../engine.js";
import { createRuntimeLogger } from "../logger.js";
import { createVariantAnnouncer } from "../options/variant.js";

const COLLABORATOR_HOOKS: EngineOptionHookId[] = [
  "clearHash",
  "hashSize",
  "logger",
  "threads",
  "tablebasePath",
  "pieceValue",
];

/**
 * Build the registry a CLI command works on. Collaborators are not running
 * here, so their hooks only log; the variant hook announces when a start
 * position is known.
 */
export function createCliOptions(
  runtime: RuntimeEnv,
  params: { env?: NodeJS.ProcessEnv; startFen?: string } = {},
): OptionsMap {
  const bootLog = createRuntimeLogger({ log: runtime.log, error: runtime.error });
  const config = resolveEngineOptionsConfig({
    env: params.env,
    onWarning: (message) => bootLog.warn(message),
  });
  const log = createRuntimeLogger({
    log: runtime.log,
    error: runtime.error,
    debug: config.debug,
  });

  return createEngineOptions({
    config,
    log,
    hooks: (map) => {
      const hooks: EngineOptionHooks = {};
      for (const id of COLLABORATOR_HOOKS) {
        hooks[id] = (option) => log.debug?.(`options: ${id} hook fired (${option.kind})`);
      }
      if (params.startFen) {
        hooks.variant = createVariantAnnouncer({ map, write: runtime.log, startFen: params.startFen });
      }
      return hooks;
    },
  });
}

/**
 * Split `name=value` at the first `=`. A bare name means an empty value,
 * which is how buttons are pressed.
 */
export function parseAssignment(text: string): { name: string; value: string } {
  const separator = text.indexOf("=");
  if (separator === -1) {
    return { name: text.trim(), value: "" };
  }
  return { name: text.slice(0, separator).trim(), value: text.slice(separator + 1) };
}
