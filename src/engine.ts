import type { EngineOptionsConfig } from "./config.js";
import type { OptionsLogger } from "./logger.js";
import type { EngineOptionHooks } from "./options/engine-options.js";
import { DEFAULT_ENGINE_OPTIONS_CONFIG } from "./config.js";
import { declareEngineOptions } from "./options/engine-options.js";
import { OptionsMap } from "./options/registry.js";
import { PROTOCOL_OPTION_NAME } from "./options/render.js";

/**
 * Build the engine's registry: declare the built-in table, then switch
 * `Protocol` to the configured dialect.
 *
 * Hooks may need the registry itself (the variant announcer reads
 * `Protocol`), so they are produced from the map once it exists.
 */
export function createEngineOptions(
  params: {
    config?: EngineOptionsConfig;
    hooks?: EngineOptionHooks | ((map: OptionsMap) => EngineOptionHooks);
    log?: OptionsLogger;
  } = {},
): OptionsMap {
  const config = params.config ?? DEFAULT_ENGINE_OPTIONS_CONFIG;
  const map = new OptionsMap({ log: params.log });
  const hooks = typeof params.hooks === "function" ? params.hooks(map) : params.hooks;

  declareEngineOptions(map, { hooks, maxHashMb: config.maxHashMb });
  map.set(PROTOCOL_OPTION_NAME, config.protocol);

  params.log?.debug?.(`options: ${map.size} options ready (protocol=${config.protocol})`);
  return map;
}
