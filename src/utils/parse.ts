import { parse, type HTMLElement } from "node-html-parser";
import { toConversionError } from "../errors.js";

// Comments are dropped; noscript keeps its raw text so it can be re-parsed on demand.
const PARSE_OPTIONS = {
  comment: false,
  blockTextElements: {
    script: true,
    style: true,
    noscript: true,
  },
};

/**
 * Parses an HTML document or fragment, dropping a leading byte-order mark.
 * @throws {OrgConversionError} ERR_PARSE_FAILED when the parser gives up.
 */
export function parseHtml(html: string): HTMLElement {
  try {
    return parse(html.replace(/^\uFEFF/, ""), PARSE_OPTIONS);
  } catch (error: unknown) {
    throw toConversionError(error, "ERR_PARSE_FAILED", "Failed to parse HTML");
  }
}
