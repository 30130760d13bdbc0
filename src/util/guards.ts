/**
 * @file Small type guards for unknown values
 */

/** Narrow unknown to a generic object record (non-null). */
export function isObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object") {
    return false;
  }
  return value !== null;
}

/** Check that an object-like value has a given own property key. */
export function hasOwn<T extends string>(obj: unknown, key: T): obj is Record<T, unknown> {
  if (!isObject(obj)) {
    return false;
  }
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Check that a value can be iterated with for..of. */
export function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}

/** Message of an Error or error-like value, or its string form. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (hasOwn(e, "message") && typeof e.message === "string") {
    return e.message;
  }
  return String(e);
}
