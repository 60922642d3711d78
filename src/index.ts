export type {
  ButtonOption,
  CheckOption,
  ComboOption,
  Option,
  OptionChangeHook,
  OptionKind,
  OptionOfKind,
  OptionRejectReason,
  ReadonlyOption,
  SpinOption,
  StringOption,
} from "./options/option.js";
export {
  assignOption,
  buttonOption,
  checkOption,
  comboEquals,
  comboOption,
  optionAsBoolean,
  optionAsNumber,
  optionAsText,
  optionTypeName,
  parseSpinText,
  spinOption,
  stringOption,
} from "./options/option.js";
export { compareCaseInsensitive, equalsCaseInsensitive, foldAsciiCase } from "./options/compare.js";
export { OptionFault, type OptionFaultCode } from "./options/errors.js";
export { OptionsMap, type OptionEntry, type OptionsMapOptions } from "./options/registry.js";
export {
  PROTOCOL_OPTION_NAME,
  renderOptions,
  renderUciOptions,
  renderXboardOptions,
  resolveProtocol,
  type OptionsProtocol,
} from "./options/render.js";
export {
  declareEngineOptions,
  loadEngineOptionTable,
  MAX_HASH_MB_32,
  MAX_HASH_MB_64,
  parseEngineOptionTable,
  type EngineOptionDescriptor,
  type EngineOptionHookId,
  type EngineOptionHooks,
} from "./options/engine-options.js";
export { createVariantAnnouncer, formatVariantAnnouncement } from "./options/variant.js";
export {
  DEFAULT_ENGINE_OPTIONS_CONFIG,
  ENGINE_OPTIONS_ENV_KEYS,
  normalizeEngineOptionsConfig,
  parseEngineOptionsConfigInput,
  resolveEngineOptionsConfig,
  type EngineOptionsConfig,
  type EngineOptionsConfigInput,
} from "./config.js";
export { createEngineOptions } from "./engine.js";
export { createRuntimeLogger, type OptionsLogger } from "./logger.js";
