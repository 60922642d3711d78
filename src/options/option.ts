import { equalsCaseInsensitive } from "./compare.js";
import { OptionFault } from "./errors.js";

/**
 * Kind tags, spelled the way both protocol grammars print them.
 */
export type OptionKind = "string" | "check" | "spin" | "combo" | "button";

/**
 * Callback fired after a value was accepted. Runs synchronously inside the
 * assign call and receives the option's final state.
 */
export type OptionChangeHook = (option: ReadonlyOption) => void;

type OptionHookSlot = {
  onChange?: OptionChangeHook;
};

export type StringOption = OptionHookSlot & {
  kind: "string";
  defaultValue: string;
  currentValue: string;
};

export type CheckOption = OptionHookSlot & {
  kind: "check";
  defaultValue: boolean;
  currentValue: boolean;
};

export type SpinOption = OptionHookSlot & {
  kind: "spin";
  defaultValue: number;
  currentValue: number;
  min: number;
  max: number;
};

export type ComboOption = OptionHookSlot & {
  kind: "combo";
  defaultValue: string;
  currentValue: string;
  /** Permitted values in declaration order; the default is one of them. */
  allowedValues: readonly string[];
};

export type ButtonOption = OptionHookSlot & {
  kind: "button";
};

export type Option = StringOption | CheckOption | SpinOption | ComboOption | ButtonOption;

/** Read-only view handed to hooks and registry callers. */
export type ReadonlyOption = Readonly<Option>;

export type OptionOfKind<K extends OptionKind> = Extract<Option, { kind: K }>;

/**
 * Why an assigned value was ignored.
 */
export type OptionRejectReason =
  | "empty_value"
  | "not_boolean"
  | "not_allowed"
  | "not_a_number"
  | "out_of_range";

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function stringOption(defaultValue: string, onChange?: OptionChangeHook): StringOption {
  return { kind: "string", defaultValue, currentValue: defaultValue, onChange };
}

export function comboOption(
  defaultValue: string,
  allowedValues: readonly string[],
  onChange?: OptionChangeHook,
): ComboOption {
  if (!allowedValues.includes(defaultValue)) {
    throw new OptionFault(
      "invalid_default",
      `Combo default "${defaultValue}" is not one of: ${allowedValues.join(", ")}.`,
    );
  }
  return {
    kind: "combo",
    defaultValue,
    currentValue: defaultValue,
    allowedValues: [...allowedValues],
    onChange,
  };
}

export function checkOption(defaultValue: boolean, onChange?: OptionChangeHook): CheckOption {
  return { kind: "check", defaultValue, currentValue: defaultValue, onChange };
}

export function buttonOption(onChange?: OptionChangeHook): ButtonOption {
  return { kind: "button", onChange };
}

export function spinOption(
  defaultValue: number,
  min: number,
  max: number,
  onChange?: OptionChangeHook,
): SpinOption {
  if (!Number.isFinite(defaultValue) || !Number.isFinite(min) || !Number.isFinite(max)) {
    throw new OptionFault("invalid_default", "Spin default and bounds must be finite numbers.");
  }
  if (defaultValue < min || defaultValue > max) {
    throw new OptionFault(
      "invalid_default",
      `Spin default ${defaultValue} is outside [${min}, ${max}].`,
    );
  }
  return { kind: "spin", defaultValue, currentValue: defaultValue, min, max, onChange };
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

function describeKind(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value) {
    return String(value.kind);
  }
  return typeof value;
}

function kindMismatch(accessor: string, expected: string, actual: unknown): OptionFault {
  return new OptionFault(
    "kind_mismatch",
    `${accessor} expects a ${expected} option, got ${describeKind(actual)}.`,
  );
}

export function optionAsNumber(option: Readonly<CheckOption | SpinOption>): number {
  switch (option.kind) {
    case "spin":
      return option.currentValue;
    case "check":
      return option.currentValue ? 1 : 0;
    default:
      throw kindMismatch("optionAsNumber", "check or spin", option);
  }
}

export function optionAsBoolean(option: Readonly<CheckOption | SpinOption>): boolean {
  switch (option.kind) {
    case "check":
      return option.currentValue;
    case "spin":
      return option.currentValue !== 0;
    default:
      throw kindMismatch("optionAsBoolean", "check or spin", option);
  }
}

export function optionAsText(option: Readonly<StringOption | ComboOption>): string {
  switch (option.kind) {
    case "string":
    case "combo":
      return option.currentValue;
    default:
      throw kindMismatch("optionAsText", "string or combo", option);
  }
}

/**
 * Case-insensitive match of a combo's current value against a literal.
 *
 * Note that assignment checks membership case-sensitively; the two rules
 * intentionally differ.
 */
export function comboEquals(option: Readonly<ComboOption>, literal: string): boolean {
  if (option.kind !== "combo") {
    throw kindMismatch("comboEquals", "combo", option);
  }
  return equalsCaseInsensitive(option.currentValue, literal);
}

export function optionTypeName(option: ReadonlyOption): OptionKind {
  return option.kind;
}

// ---------------------------------------------------------------------------
// Assignment
// ---------------------------------------------------------------------------

const HEX_PREFIX = /^\s*([+-]?)0[xX]([0-9a-fA-F]+)/;

/**
 * Leading number of `text`: decimal with optional fraction and exponent, or a
 * `0x` hex integer. Trailing text is ignored; NaN when nothing parses.
 */
export function parseSpinText(text: string): number {
  const hex = HEX_PREFIX.exec(text);
  if (hex) {
    const magnitude = Number.parseInt(hex[2] ?? "", 16);
    return hex[1] === "-" ? -magnitude : magnitude;
  }
  return Number.parseFloat(text);
}

function checkAssignment(option: Option, value: string): OptionRejectReason | undefined {
  if (option.kind !== "button" && value.length === 0) {
    return "empty_value";
  }
  switch (option.kind) {
    case "check":
      return value === "true" || value === "false" ? undefined : "not_boolean";
    case "combo":
      return option.allowedValues.includes(value) ? undefined : "not_allowed";
    case "spin": {
      const parsed = parseSpinText(value);
      if (Number.isNaN(parsed)) {
        return "not_a_number";
      }
      return parsed < option.min || parsed > option.max ? "out_of_range" : undefined;
    }
    default:
      return undefined;
  }
}

function storeValue(option: Option, value: string): void {
  switch (option.kind) {
    case "string":
    case "combo":
      option.currentValue = value;
      return;
    case "check":
      option.currentValue = value === "true";
      return;
    case "spin":
      option.currentValue = parseSpinText(value);
      return;
    case "button":
      return;
  }
}

/**
 * Validate `value` against the option's kind, store it and fire the hook.
 *
 * Invalid values leave the option untouched and skip the hook. The caller
 * gets no error; `onRejected` exists only so the registry can log the
 * reason.
 */
export function assignOption(
  option: Option,
  value: string,
  onRejected?: (reason: OptionRejectReason) => void,
): ReadonlyOption {
  const rejection = checkAssignment(option, value);
  if (rejection) {
    onRejected?.(rejection);
    return option;
  }

  storeValue(option, value);
  option.onChange?.(option);
  return option;
}
