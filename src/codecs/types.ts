/**
 * Codec type definitions
 */

/**
 * Ordered key → string mapping shared by both formats
 * Iteration follows insertion order; re-setting a key keeps its position
 */
export type RecordStore = Map<string, string>;

export type FormatName = "lang" | "json";

export interface SerializeOptions {
  indent: number; // Spaces per level for pretty JSON
}

export interface Codec {
  format: FormatName;
  extension: string; // Including the leading dot
  parse(text: string): RecordStore;
  serialize(store: RecordStore, options: SerializeOptions): string;
}

/**
 * A source/target codec pair selected by file extension
 */
export interface ConversionRoute {
  from: Codec;
  to: Codec;
}
