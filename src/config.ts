import { z } from "zod";
import { DEFAULT_MAX_DATA_URL_LENGTH } from "./constants.js";
import { OrgConversionError } from "./errors.js";
import type { ConversionOptions, ResolvedConversionOptions, ResolvedPrettyTablesOptions } from "./types.js";

const alignmentSchema = z.enum(["left", "center", "right"]);
const separatorSchema = z.string().length(1, "must be a single character");

const bordersSchema = z
  .object({
    left: z.boolean().default(true),
    right: z.boolean().default(true),
    top: z.boolean().default(true),
    bottom: z.boolean().default(true),
  })
  .strict();

const prettyTablesOptionsSchema = z
  .object({
    autoFormatHeader: z.boolean().default(true),
    autoWrapText: z.boolean().default(false),
    colWidth: z.number().int().nonnegative().default(0),
    columnSeparator: separatorSchema.default("|"),
    rowSeparator: separatorSchema.default("-"),
    centerSeparator: separatorSchema.default("+"),
    headerAlignment: alignmentSchema.default("center"),
    footerAlignment: alignmentSchema.default("center"),
    alignment: alignmentSchema.default("left"),
    columnAlignment: z.array(alignmentSchema).default([]),
    headerLine: z.boolean().default(true),
    rowLine: z.boolean().default(false),
    autoMergeCells: z.boolean().default(false),
    borders: bordersSchema.default({}),
    orgFormat: z.boolean().default(true),
  })
  .strict();

const baseUrlSchema = z
  .string()
  .trim()
  .refine((value) => value === "" || isAbsoluteUrl(value), { message: "must be an absolute URL" });

/** Schema for user-supplied options; every field is optional and falls back to its default. */
export const conversionOptionsSchema = z
  .object({
    prettyTables: z.boolean().default(false),
    prettyTablesOptions: prettyTablesOptionsSchema.default({}),
    omitLinks: z.boolean().default(false),
    breakLongLines: z.boolean().default(false),
    baseUrl: baseUrlSchema.default(""),
    showNoscripts: z.boolean().default(false),
    showInternalAnchors: z.boolean().default(false),
    showFullDataUrls: z.boolean().default(false),
    maxDataUrlLength: z.number().int().nonnegative().default(DEFAULT_MAX_DATA_URL_LENGTH),
  })
  .strict();

/**
 * Validates user options and merges them over the defaults.
 * @throws {OrgConversionError} ERR_INVALID_OPTIONS when a value has the wrong type or shape.
 */
export function resolveOptions(options: ConversionOptions = {}): ResolvedConversionOptions {
  const parsed = conversionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new OrgConversionError(`Invalid conversion options: ${details}`, "ERR_INVALID_OPTIONS", parsed.error);
  }
  return Object.freeze(parsed.data);
}

export const DEFAULT_CONVERSION_OPTIONS: ResolvedConversionOptions = resolveOptions();

export const DEFAULT_PRETTY_TABLES_OPTIONS: ResolvedPrettyTablesOptions = DEFAULT_CONVERSION_OPTIONS.prettyTablesOptions;

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
