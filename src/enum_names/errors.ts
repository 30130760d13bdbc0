/**
 * @file Error types for enum name maps
 *
 * Definition errors are thrown while a map is built and point at a broken
 * name table in source. Text errors come from runtime values and are handed
 * back inside a NameTextResult instead of being thrown.
 */

/** Base class for violations found while building a map. */
export class EnumNameDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnumNameDefinitionError";
  }
}

/** Thrown when a key is not a safe integer. */
export class InvalidEnumKeyError extends EnumNameDefinitionError {
  constructor(key: unknown) {
    super(`enum key ${String(key)} is not a safe integer`);
    this.name = "InvalidEnumKeyError";
  }
}

/** Thrown when the keys leave a gap between the lowest and highest key. */
export class NonContiguousKeysError extends EnumNameDefinitionError {
  constructor(key: number, lowestKey: number, size: number) {
    super(`non-contiguous enum keys: ${key} is outside ${lowestKey}..${lowestKey + size - 1}`);
    this.name = "NonContiguousKeysError";
  }
}

/** Thrown when an entry list names the same key twice. */
export class DuplicateEnumKeyError extends EnumNameDefinitionError {
  constructor(key: number) {
    super(`duplicate enum key ${key}`);
    this.name = "DuplicateEnumKeyError";
  }
}

/** Thrown when two keys share a name. */
export class DuplicateEnumNameError extends EnumNameDefinitionError {
  constructor(name: string) {
    super(`duplicate enum name '${name}'`);
    this.name = "DuplicateEnumNameError";
  }
}

/** Base class for failures encoding or decoding name text. */
export class EnumNameTextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnumNameTextError";
  }
}

/** The key has no registered name. */
export class UnregisteredEnumValueError extends EnumNameTextError {
  constructor(key: number) {
    super(`enum value '${key}' not registered in enum name map`);
    this.name = "UnregisteredEnumValueError";
  }
}

/** The text is not a JSON string literal. */
export class NameTextParseError extends EnumNameTextError {
  constructor(text: string, detail: string) {
    super(`enum name text ${JSON.stringify(text)} is not a JSON string: ${detail}`);
    this.name = "NameTextParseError";
  }
}

/** The decoded name has no registered key. */
export class UnrecognizedEnumNameError extends EnumNameTextError {
  constructor(name: string, validNames: readonly string[]) {
    super(
      validNames.length === 0
        ? `invalid value '${name}', no enum names are registered`
        : `invalid value '${name}', expected one of: '${validNames.join("', '")}'`,
    );
    this.name = "UnrecognizedEnumNameError";
  }
}
