/**
 * Lang Codec
 * Line-oriented `key=value` text with `#` comments
 */

import type { Codec, RecordStore } from "./types";

/**
 * Parse `.lang` text into a record store
 *
 * Blank lines and lines starting with `#` are skipped. Lines without `=` are
 * dropped. Only the first `=` splits key from value.
 *
 * @example
 * parseLang("a=1\n# note\nb=x=y") // Map { "a" => "1", "b" => "x=y" }
 */
export function parseLang(text: string): RecordStore {
  const store: RecordStore = new Map();

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const separator = line.indexOf("=");
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    store.set(key, value);
  }

  return store;
}

export function serializeLang(store: RecordStore): string {
  let text = "";
  for (const [key, value] of store) {
    text += `${key}=${value}\n`;
  }
  return text;
}

export const langCodec: Codec = {
  format: "lang",
  extension: ".lang",
  parse: parseLang,
  serialize: serializeLang,
};
