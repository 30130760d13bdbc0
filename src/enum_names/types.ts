/**
 * @file Types for enum name maps
 */
import type { EnumNameTextError } from "./errors";

/** Outcome of encoding or decoding name text. */
export type NameTextResult<T> = { ok: true; value: T } | { ok: false; error: EnumNameTextError };

/** Key/name pairs accepted by createEnumNameMap. A Map<K, string> qualifies. */
export type NameEntries<K extends number> = Iterable<readonly [K, string]>;

/** Object form of a name table, keyed by decimal integer strings. */
export type NameRecord = Readonly<Record<number, string>>;

/**
 * Immutable mapping between a contiguous range of integer keys and unique names.
 *
 * Lookups accept any number so runtime data can be checked directly;
 * `containsKey` narrows it to K.
 */
export type EnumNameMap<K extends number> = {
  getName: (key: number) => string | undefined;
  getNameOrDefault: (key: number, fallback: string) => string;
  getKey: (name: string) => K | undefined;
  containsKey: (key: number) => key is K;
  containsName: (name: string) => boolean;
  size: () => number;
  /** Keys in ascending order. The array is a copy. */
  keys: () => K[];
  /** Names in key order. The array is a copy. */
  names: () => string[];
  /** e.g. `EnumNameMap[1:FIRST 2:SECOND]`; for logs, not for parsing. */
  toDisplayString: () => string;
  toString: () => string;
  /** JSON string literal holding the key's name. */
  encodeToNameText: (key: number) => NameTextResult<string>;
  decodeFromNameText: (text: string) => NameTextResult<K>;
};
