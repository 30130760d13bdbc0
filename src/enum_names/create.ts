/**
 * @file Enum name map construction and lookups
 *
 * Names live in a dense array indexed by `key - lowestKey`, so a forward lookup
 * is one bounds check and one array read instead of a hash. Reverse lookups scan
 * the same array; enum tables hold tens to a few hundred names, where a scan
 * is cheaper than hashing the string.
 */
import {
  DuplicateEnumKeyError,
  DuplicateEnumNameError,
  EnumNameDefinitionError,
  InvalidEnumKeyError,
  NonContiguousKeysError,
} from "./errors";
import { decodeFromNameText, encodeToNameText } from "./name_text";
import type { EnumNameMap, NameEntries, NameRecord } from "./types";
import { isIterable } from "../util/guards";

const INTEGER_KEY = /^(0|-?[1-9][0-9]*)$/;

/**
 * Build a map from key/name pairs (a Map or an array of tuples) or from an
 * object keyed by integer strings.
 *
 * Throws an EnumNameDefinitionError when keys are not safe integers, leave a
 * gap, repeat, or when two keys share a name.
 */
export function createEnumNameMap<K extends number>(entries: NameEntries<K>): EnumNameMap<K>;
export function createEnumNameMap(record: NameRecord): EnumNameMap<number>;
export function createEnumNameMap<K extends number>(
  input: NameEntries<K> | NameRecord,
): EnumNameMap<K> | EnumNameMap<number> {
  if (isIterable<readonly [K, string]>(input)) {
    return buildEnumNameMap(Array.from(input));
  }
  return buildEnumNameMap(recordEntries(input));
}

/**
 * Build a map from a numeric `enum` (or an `as const` object of numbers),
 * naming each key after its member. The reverse entries TypeScript adds to
 * numeric enums are skipped.
 */
export function createEnumNameMapFromEnum<K extends number>(
  enumObject: Readonly<Record<string, K | string>>,
): EnumNameMap<K> {
  const pairs: Array<readonly [K, string]> = [];
  for (const [name, value] of Object.entries(enumObject)) {
    if (typeof value === "number") {
      pairs.push([value, name]);
    }
  }
  return buildEnumNameMap(pairs);
}

function recordEntries(record: NameRecord): Array<readonly [number, string]> {
  const pairs: Array<readonly [number, string]> = [];
  for (const [rawKey, value] of Object.entries(record)) {
    if (!INTEGER_KEY.test(rawKey)) {
      throw new InvalidEnumKeyError(JSON.stringify(rawKey));
    }
    const name: unknown = value;
    if (typeof name !== "string") {
      throw new EnumNameDefinitionError(`enum name for key ${rawKey} must be a string`);
    }
    pairs.push([Number(rawKey), name]);
  }
  return pairs;
}

function buildEnumNameMap<K extends number>(pairs: ReadonlyArray<readonly [K, string]>): EnumNameMap<K> {
  for (const [key] of pairs) {
    if (!Number.isSafeInteger(key)) {
      throw new InvalidEnumKeyError(key);
    }
  }

  const size = pairs.length;
  let lowestKey: number = size === 0 ? 0 : pairs[0][0];
  for (const [key] of pairs) {
    if (key < lowestKey) {
      lowestKey = key;
    }
  }

  const slots: Array<readonly [K, string] | undefined> = Array.from({ length: size }, () => undefined);
  const seenNames = new Set<string>();
  for (const pair of pairs) {
    const [key, name] = pair;
    const index = key - lowestKey;
    if (index >= size) {
      throw new NonContiguousKeysError(key, lowestKey, size);
    }
    if (slots[index] !== undefined) {
      throw new DuplicateEnumKeyError(key);
    }
    if (seenNames.has(name)) {
      throw new DuplicateEnumNameError(name);
    }
    seenNames.add(name);
    slots[index] = pair;
  }

  // size distinct keys in size slots: every slot is filled
  const filled = slots.filter((slot): slot is readonly [K, string] => slot !== undefined);
  const keys: readonly K[] = Object.freeze(filled.map(([key]) => key));
  const names: readonly string[] = Object.freeze(filled.map(([, name]) => name));

  const indexOf = (key: number): number => {
    if (!Number.isInteger(key)) {
      return -1;
    }
    const index = key - lowestKey;
    if (index < 0 || index >= names.length) {
      return -1;
    }
    return index;
  };

  const getName = (key: number): string | undefined => {
    const index = indexOf(key);
    if (index === -1) {
      return undefined;
    }
    return names[index];
  };

  const getKey = (name: string): K | undefined => {
    for (let i = 0; i < names.length; i++) {
      if (names[i] === name) {
        return keys[i];
      }
    }
    return undefined;
  };

  const toDisplayString = (): string => {
    const pairsText = names.map((name, i) => `${keys[i]}:${name}`).join(" ");
    return `EnumNameMap[${pairsText}]`;
  };

  const map: EnumNameMap<K> = {
    getName,
    getNameOrDefault: (key, fallback) => getName(key) ?? fallback,
    getKey,
    containsKey: (key: number): key is K => indexOf(key) !== -1,
    containsName: (name) => names.includes(name),
    size: () => names.length,
    keys: () => keys.slice(),
    names: () => names.slice(),
    toDisplayString,
    toString: toDisplayString,
    encodeToNameText: (key) => encodeToNameText(map, key),
    decodeFromNameText: (text) => decodeFromNameText(map, text),
  };
  return Object.freeze(map);
}
