/**
 * Codec exports and conversion routing
 */

import { langCodec } from "./lang";
import { jsonCodec } from "./json";
import type { ConversionRoute } from "./types";
import type { ConversionMode } from "../types";

export { parseLang, serializeLang, langCodec } from "./lang";
export { parseJson, serializeJson, jsonCodec } from "./json";
export type {
  Codec,
  ConversionRoute,
  FormatName,
  RecordStore,
  SerializeOptions,
} from "./types";

const LANG_TO_JSON: ConversionRoute = { from: langCodec, to: jsonCodec };
const JSON_TO_LANG: ConversionRoute = { from: jsonCodec, to: langCodec };

/**
 * Routes taken by a batch run in the given mode
 */
export function getRoutes(mode: ConversionMode): ConversionRoute[] {
  switch (mode) {
    case "lang-to-json":
      return [LANG_TO_JSON];
    case "json-to-lang":
      return [JSON_TO_LANG];
    case "both":
      return [LANG_TO_JSON, JSON_TO_LANG];
  }
}

/**
 * Find the route whose source format uses this extension
 * Extensions are matched case-sensitively (".lang", not ".LANG")
 */
export function findRoute(
  routes: ConversionRoute[],
  extension: string,
): ConversionRoute | undefined {
  return routes.find((route) => route.from.extension === extension);
}
