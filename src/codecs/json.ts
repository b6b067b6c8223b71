/**
 * JSON Codec
 * Flat JSON objects whose member values are strings
 */

import { JsonSyntaxError } from "../errors";
import type { Codec, RecordStore, SerializeOptions } from "./types";

function isJsonObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Index of the closing quote of the string literal opening at `start`
 */
function findStringEnd(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === "\\") {
      i += 2;
      continue;
    }
    if (text[i] === '"') return i;
    i++;
  }
  return text.length - 1;
}

/**
 * Member names of the top-level object in the order they appear in the text
 *
 * Object.entries() lists integer-like keys first, so source order has to be
 * recovered from the text itself. Expects text that JSON.parse accepted.
 */
function topLevelKeys(text: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let expectKey = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (char === '"') {
      const end = findStringEnd(text, i);
      if (depth === 1 && expectKey) {
        const key: unknown = JSON.parse(text.slice(i, end + 1));
        if (typeof key === "string") keys.push(key);
        expectKey = false;
      }
      i = end + 1;
      continue;
    }

    if (char === "{" || char === "[") {
      depth++;
      if (depth === 1) expectKey = true;
    } else if (char === "}" || char === "]") {
      depth--;
    } else if (char === "," && depth === 1) {
      expectKey = true;
    }
    i++;
  }

  return keys;
}

/**
 * Parse JSON text into a record store
 *
 * Only string members are kept. A top-level value that is not an object
 * yields an empty store.
 *
 * @throws JsonSyntaxError when the text is not valid JSON
 */
export function parseJson(text: string): RecordStore {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new JsonSyntaxError(error);
  }

  const store: RecordStore = new Map();
  if (!isJsonObject(parsed)) return store;

  const values = new Map<string, unknown>(Object.entries(parsed));
  for (const key of topLevelKeys(text)) {
    const value = values.get(key);
    if (typeof value === "string") {
      store.set(key, value);
    }
  }

  return store;
}

/**
 * Serialize a record store as a pretty-printed JSON object
 *
 * @example
 * serializeJson(new Map([["a", "1"]]), { indent: 2 }) // '{\n  "a": "1"\n}\n'
 */
export function serializeJson(
  store: RecordStore,
  options: SerializeOptions = { indent: 2 },
): string {
  if (store.size === 0) return "{}\n";

  const pad = " ".repeat(options.indent);
  const members = [...store].map(
    ([key, value]) => `${pad}${JSON.stringify(key)}: ${JSON.stringify(value)}`,
  );

  return `{\n${members.join(",\n")}\n}\n`;
}

export const jsonCodec: Codec = {
  format: "json",
  extension: ".json",
  parse: parseJson,
  serialize: serializeJson,
};
