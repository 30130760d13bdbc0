/**
 * @file Enum name map façade
 */
export { createEnumNameMap, createEnumNameMapFromEnum } from "./create";
export { encodeToNameText, decodeFromNameText } from "./name_text";
export type { EnumNameMap, NameEntries, NameRecord, NameTextResult } from "./types";
export {
  EnumNameDefinitionError,
  InvalidEnumKeyError,
  NonContiguousKeysError,
  DuplicateEnumKeyError,
  DuplicateEnumNameError,
  EnumNameTextError,
  UnregisteredEnumValueError,
  NameTextParseError,
  UnrecognizedEnumNameError,
} from "./errors";
