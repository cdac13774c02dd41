export { fromHTMLNode, fromString, fromBuffer, fromStream } from "./convert.js";
export { OrgConverter } from "./utils/org-converter.js";
export { collectFragmentTargets } from "./utils/anchors.js";
export { normalizeLink } from "./utils/links.js";
export type { LinkOptions } from "./utils/links.js";
export { normalizeOutput, breakLongLines } from "./utils/text.js";
export { FetchEngine, FetchEngineHttpError } from "./FetchEngine.js";
export { OrgConversionError } from "./errors.js";
export type { OrgConversionErrorCode, OrgConversionErrorDetails } from "./errors.js";
export { conversionOptionsSchema, resolveOptions, DEFAULT_CONVERSION_OPTIONS, DEFAULT_PRETTY_TABLES_OPTIONS } from "./config.js";
export type {
  CellAlignment,
  TableBorders,
  PrettyTablesOptions,
  ConversionOptions,
  ResolvedConversionOptions,
  ResolvedPrettyTablesOptions,
  HTMLFetchResult,
  FetchEngineOptions,
} from "./types.js";
