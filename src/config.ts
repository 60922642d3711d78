import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { OptionsProtocol } from "./options/render.js";
import { MAX_HASH_MB_64 } from "./options/engine-options.js";

/**
 * Hash ceilings below this would reject the built-in `Hash` default.
 */
export const MIN_MAX_HASH_MB = 16;

/**
 * Runtime configuration for the option registry host.
 */
export type EngineOptionsConfig = {
  /** Upper bound of the `Hash` option, in MB. */
  maxHashMb: number;
  /** Dialect the `Protocol` option starts in. */
  protocol: OptionsProtocol;
  /** Emit debug lines for declarations and ignored values. */
  debug: boolean;
};

export const DEFAULT_ENGINE_OPTIONS_CONFIG: EngineOptionsConfig = {
  maxHashMb: MAX_HASH_MB_64,
  protocol: "uci",
  debug: false,
};

export const ENGINE_OPTIONS_ENV_KEYS = {
  maxHashMb: "ENGINE_OPTIONS_MAX_HASH_MB",
  protocol: "ENGINE_OPTIONS_PROTOCOL",
  debug: "ENGINE_OPTIONS_DEBUG",
} as const;

const EngineOptionsConfigInputSchema = Type.Object(
  {
    maxHashMb: Type.Optional(Type.Integer({ minimum: MIN_MAX_HASH_MB })),
    protocol: Type.Optional(Type.Union([Type.Literal("uci"), Type.Literal("xboard")])),
    debug: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

/**
 * Optional fields accepted from a host config object.
 */
export type EngineOptionsConfigInput = Static<typeof EngineOptionsConfigInputSchema>;

/**
 * Parse untrusted input into a partial config.
 */
export function parseEngineOptionsConfigInput(
  value: unknown,
): { ok: true; value: EngineOptionsConfigInput } | { ok: false; errors: string[] } {
  if (value === undefined) {
    return { ok: true, value: {} };
  }
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return { ok: false, errors: ["Engine options config must be an object."] };
  }
  if (Value.Check(EngineOptionsConfigInputSchema, value)) {
    return { ok: true, value };
  }
  const errors = [...Value.Errors(EngineOptionsConfigInputSchema, value)].map(
    (error) => `${error.path.replace(/^\//, "") || "config"}: ${error.message}`,
  );
  return { ok: false, errors };
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return undefined;
}

function parseIntEnv(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseProtocolEnv(value: string | undefined): OptionsProtocol | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized === "uci" || normalized === "xboard" ? normalized : undefined;
}

function dropUndefined(input: EngineOptionsConfigInput): EngineOptionsConfigInput {
  const result: EngineOptionsConfigInput = {};
  if (input.maxHashMb !== undefined) {
    result.maxHashMb = input.maxHashMb;
  }
  if (input.protocol !== undefined) {
    result.protocol = input.protocol;
  }
  if (input.debug !== undefined) {
    result.debug = input.debug;
  }
  return result;
}

/**
 * Merge config with defaults, replacing out-of-range values.
 */
export function normalizeEngineOptionsConfig(
  input: EngineOptionsConfigInput = {},
): EngineOptionsConfig {
  const merged = { ...DEFAULT_ENGINE_OPTIONS_CONFIG, ...dropUndefined(input) };
  if (!Number.isInteger(merged.maxHashMb) || merged.maxHashMb < MIN_MAX_HASH_MB) {
    merged.maxHashMb = DEFAULT_ENGINE_OPTIONS_CONFIG.maxHashMb;
  }
  return merged;
}

/**
 * Resolve the final config: defaults, then host config, then env vars.
 *
 * Invalid host config is reported through `onWarning` and ignored.
 */
export function resolveEngineOptionsConfig(
  params: {
    config?: unknown;
    env?: NodeJS.ProcessEnv;
    onWarning?: (message: string) => void;
  } = {},
): EngineOptionsConfig {
  const env = params.env ?? process.env;
  const parsed = parseEngineOptionsConfigInput(params.config);
  if (!parsed.ok) {
    params.onWarning?.(`ignoring invalid engine options config: ${parsed.errors.join("; ")}`);
  }
  const configInput = parsed.ok ? parsed.value : {};

  const envInput: EngineOptionsConfigInput = {
    maxHashMb: parseIntEnv(env[ENGINE_OPTIONS_ENV_KEYS.maxHashMb]),
    protocol: parseProtocolEnv(env[ENGINE_OPTIONS_ENV_KEYS.protocol]),
    debug: parseBooleanEnv(env[ENGINE_OPTIONS_ENV_KEYS.debug]),
  };

  return normalizeEngineOptionsConfig({
    ...dropUndefined(configInput),
    ...dropUndefined(envInput),
  });
}
