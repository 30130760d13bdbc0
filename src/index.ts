/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Consumers import from here. The map itself lives under src/enum_names/*.
 */

/**
 * Enum name maps
 * - createEnumNameMap: build from key/name pairs or an integer-keyed object
 * - createEnumNameMapFromEnum: build from a numeric enum object
 * - encodeToNameText/decodeFromNameText: names as JSON string literals
 * @public
 */
export * from "./enum_names/index";
