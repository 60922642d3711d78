import type { OptionsLogger } from "../logger.js";
import type { Option, OptionKind, OptionOfKind, ReadonlyOption } from "./option.js";
import { foldAsciiCase } from "./compare.js";
import { OptionFault } from "./errors.js";
import { assignOption } from "./option.js";

/**
 * One declared option together with the name it was declared under and its
 * registration index.
 */
export type OptionEntry = {
  readonly name: string;
  readonly index: number;
  readonly option: ReadonlyOption;
};

type StoredEntry = {
  name: string;
  index: number;
  option: Option;
};

// The registry owns its options; callers keep no handle on the stored state.
function copyOption(option: Option): Option {
  return option.kind === "combo"
    ? { ...option, allowedValues: [...option.allowedValues] }
    : { ...option };
}

export type OptionsMapOptions = {
  log?: OptionsLogger;
};

/**
 * Registry of engine options keyed by case-insensitive name.
 *
 * Lookups go through a map keyed by the folded name; enumeration always
 * follows registration order, independent of how the lookup map is laid out.
 */
export class OptionsMap implements Iterable<OptionEntry> {
  private readonly entriesByKey = new Map<string, StoredEntry>();
  private nextIndex = 0;
  private readonly log?: OptionsLogger;

  constructor(options: OptionsMapOptions = {}) {
    this.log = options.log;
  }

  /** Number of declared options. */
  get size(): number {
    return this.entriesByKey.size;
  }

  /**
   * Register `option` under `name` and give it the next registration index.
   *
   * @throws {OptionFault} `duplicate_name` when a name differing only by case
   *   is already declared.
   */
  declare(name: string, option: Option): OptionEntry {
    const key = foldAsciiCase(name);
    const existing = this.entriesByKey.get(key);
    if (existing) {
      throw new OptionFault(
        "duplicate_name",
        `Option "${name}" clashes with already declared "${existing.name}".`,
      );
    }

    const entry: StoredEntry = { name, index: this.nextIndex++, option: copyOption(option) };
    this.entriesByKey.set(key, entry);
    this.log?.debug?.(`options: declared "${name}" (${option.kind}) at index ${entry.index}`);
    return entry;
  }

  has(name: string): boolean {
    return this.entriesByKey.has(foldAsciiCase(name));
  }

  get(name: string): ReadonlyOption | undefined {
    return this.entriesByKey.get(foldAsciiCase(name))?.option;
  }

  /** Lookup returning the declared name and index along with the option. */
  entry(name: string): OptionEntry | undefined {
    return this.entriesByKey.get(foldAsciiCase(name));
  }

  /**
   * Lookup for engine code that knows which option it needs.
   *
   * @throws {OptionFault} `unknown_name` or `kind_mismatch`.
   */
  require<K extends OptionKind>(name: string, kind: K): Readonly<OptionOfKind<K>>;
  require(name: string): ReadonlyOption;
  require(name: string, kind?: OptionKind): ReadonlyOption {
    const option = this.get(name);
    if (!option) {
      throw new OptionFault("unknown_name", `No option named "${name}".`);
    }
    if (kind !== undefined && option.kind !== kind) {
      throw new OptionFault(
        "kind_mismatch",
        `Option "${name}" is a ${option.kind} option, not ${kind}.`,
      );
    }
    return option;
  }

  /**
   * Assign a textual value to the named option.
   *
   * Returns the option's final state, or `undefined` when no option has that
   * name. Values that fail validation leave the option unchanged without
   * telling the caller.
   */
  set(name: string, value: string): ReadonlyOption | undefined {
    const entry = this.entriesByKey.get(foldAsciiCase(name));
    if (!entry) {
      return undefined;
    }
    return assignOption(entry.option, value, (reason) => {
      this.log?.debug?.(`options: ignored value "${value}" for "${entry.name}" (${reason})`);
    });
  }

  /**
   * All entries in registration order. Each call starts a fresh pass.
   */
  *entries(): IterableIterator<OptionEntry> {
    const ordered = Array.from(this.entriesByKey.values()).sort((a, b) => a.index - b.index);
    for (const entry of ordered) {
      yield entry;
    }
  }

  [Symbol.iterator](): Iterator<OptionEntry> {
    return this.entries();
  }
}
