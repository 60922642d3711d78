import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFileSync } from "node:fs";
import type { OptionChangeHook, Option } from "./option.js";
import type { OptionsMap } from "./registry.js";
import {
  buttonOption,
  checkOption,
  comboOption,
  spinOption,
  stringOption,
} from "./option.js";

/** Hash ceiling on 64-bit hosts (at most 2^32 clusters). */
export const MAX_HASH_MB_64 = 131_072;
/** Hash ceiling on 32-bit hosts. */
export const MAX_HASH_MB_32 = 2_048;

const HookIdSchema = Type.Union([
  Type.Literal("clearHash"),
  Type.Literal("hashSize"),
  Type.Literal("logger"),
  Type.Literal("threads"),
  Type.Literal("tablebasePath"),
  Type.Literal("pieceValue"),
  Type.Literal("variant"),
]);

const EngineOptionDescriptorSchema = Type.Union([
  Type.Object({
    name: Type.String({ minLength: 1 }),
    type: Type.Literal("string"),
    default: Type.String(),
    onChange: Type.Optional(HookIdSchema),
  }),
  Type.Object({
    name: Type.String({ minLength: 1 }),
    type: Type.Literal("combo"),
    default: Type.String(),
    values: Type.Array(Type.String(), { minItems: 1 }),
    onChange: Type.Optional(HookIdSchema),
  }),
  Type.Object({
    name: Type.String({ minLength: 1 }),
    type: Type.Literal("check"),
    default: Type.Boolean(),
    onChange: Type.Optional(HookIdSchema),
  }),
  Type.Object({
    name: Type.String({ minLength: 1 }),
    type: Type.Literal("button"),
    onChange: Type.Optional(HookIdSchema),
  }),
  Type.Object({
    name: Type.String({ minLength: 1 }),
    type: Type.Literal("spin"),
    default: Type.Number(),
    min: Type.Number(),
    // "maxHashMb" is replaced by the configured hash ceiling.
    max: Type.Union([Type.Number(), Type.Literal("maxHashMb")]),
    onChange: Type.Optional(HookIdSchema),
  }),
]);

const EngineOptionTableSchema = Type.Array(EngineOptionDescriptorSchema);

/** Collaborator identifiers an option can name as its change hook. */
export type EngineOptionHookId = Static<typeof HookIdSchema>;

/** One row of the built-in option table. */
export type EngineOptionDescriptor = Static<typeof EngineOptionDescriptorSchema>;

/**
 * Collaborator callbacks for the built-in table. Options whose hook is not
 * supplied are declared without one.
 */
export type EngineOptionHooks = Partial<Record<EngineOptionHookId, OptionChangeHook>>;

/**
 * Validate untrusted table data.
 */
export function parseEngineOptionTable(
  value: unknown,
): { ok: true; value: EngineOptionDescriptor[] } | { ok: false; errors: string[] } {
  if (Value.Check(EngineOptionTableSchema, value)) {
    return { ok: true, value };
  }
  const errors = [...Value.Errors(EngineOptionTableSchema, value)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  return { ok: false, errors };
}

let cachedTable: EngineOptionDescriptor[] | null = null;

/**
 * Load the built-in option table shipped beside this module.
 */
export function loadEngineOptionTable(): EngineOptionDescriptor[] {
  if (cachedTable) {
    return cachedTable;
  }
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./engine-options.json", import.meta.url), "utf8"),
  );
  const parsed = parseEngineOptionTable(raw);
  if (!parsed.ok) {
    throw new Error(`Invalid engine option table: ${parsed.errors.join("; ")}`);
  }
  cachedTable = parsed.value;
  return cachedTable;
}

function toOption(
  descriptor: EngineOptionDescriptor,
  hook: OptionChangeHook | undefined,
  maxHashMb: number,
): Option {
  switch (descriptor.type) {
    case "string":
      return stringOption(descriptor.default, hook);
    case "combo":
      return comboOption(descriptor.default, descriptor.values, hook);
    case "check":
      return checkOption(descriptor.default, hook);
    case "button":
      return buttonOption(hook);
    case "spin": {
      const max = descriptor.max === "maxHashMb" ? maxHashMb : descriptor.max;
      return spinOption(descriptor.default, descriptor.min, max, hook);
    }
  }
}

/**
 * Declare the engine's options in table order, wiring each row's hook to the
 * matching collaborator.
 */
export function declareEngineOptions(
  map: OptionsMap,
  params: {
    hooks?: EngineOptionHooks;
    maxHashMb?: number;
    table?: EngineOptionDescriptor[];
  } = {},
): void {
  const hooks = params.hooks ?? {};
  const maxHashMb = params.maxHashMb ?? MAX_HASH_MB_64;
  const table = params.table ?? loadEngineOptionTable();

  for (const descriptor of table) {
    const hook = descriptor.onChange ? hooks[descriptor.onChange] : undefined;
    map.declare(descriptor.name, toOption(descriptor, hook, maxHashMb));
  }
}
