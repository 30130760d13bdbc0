/**
 * @file Name text codec: enum keys as JSON string literals
 *
 * Callers embed the literal as one field of a larger JSON document, so both
 * directions deal with a single scalar only.
 */
import { NameTextParseError, UnrecognizedEnumNameError, UnregisteredEnumValueError } from "./errors";
import type { EnumNameMap, NameTextResult } from "./types";
import { errorMessage } from "../util/guards";

/** Encode the key's name as a JSON string literal, e.g. `"FIRST"`. */
export function encodeToNameText<K extends number>(
  map: Pick<EnumNameMap<K>, "getName">,
  key: number,
): NameTextResult<string> {
  const name = map.getName(key);
  if (name === undefined) {
    return { ok: false, error: new UnregisteredEnumValueError(key) };
  }
  return { ok: true, value: JSON.stringify(name) };
}

/**
 * Parse a JSON string literal and resolve it to its key. Unknown names report
 * every registered name in the error message.
 */
export function decodeFromNameText<K extends number>(
  map: Pick<EnumNameMap<K>, "getKey" | "names">,
  text: string,
): NameTextResult<K> {
  const parsed = parseNameText(text);
  if (!parsed.ok) {
    return parsed;
  }
  const key = map.getKey(parsed.value);
  if (key === undefined) {
    return { ok: false, error: new UnrecognizedEnumNameError(parsed.value, map.names()) };
  }
  return { ok: true, value: key };
}

function parseNameText(text: string): NameTextResult<string> {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return { ok: false, error: new NameTextParseError(text, parsed.detail) };
  }
  if (typeof parsed.value !== "string") {
    return { ok: false, error: new NameTextParseError(text, `got ${describeJsonValue(parsed.value)}`) };
  }
  return { ok: true, value: parsed.value };
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; detail: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

function describeJsonValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}
