/**
 * Stable fault codes for callers and tests.
 */
export type OptionFaultCode =
  | "duplicate_name"
  | "kind_mismatch"
  | "unknown_name"
  | "invalid_default";

/**
 * Thrown when the engine misuses the option registry.
 *
 * Invalid values sent by a controller never raise; only programming errors
 * (wrong accessor for a kind, clashing declarations, bad defaults) do.
 */
export class OptionFault extends Error {
  readonly code: OptionFaultCode;

  constructor(code: OptionFaultCode, message: string) {
    super(message);
    this.code = code;
    this.name = "OptionFault";
  }
}
