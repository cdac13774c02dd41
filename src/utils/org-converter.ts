import type { Node as NHPNode } from "node-html-parser";
import { resolveOptions } from "../config.js";
import type { ConversionOptions, ResolvedConversionOptions } from "../types.js";
import { parseHtml } from "./parse.js";
import { renderDocument } from "./render-context.js";

/**
 * Converts HTML to Org text with a fixed set of options.
 *
 * Options are validated once, in the constructor, so a converter can be
 * reused for many documents.
 */
export class OrgConverter {
  public readonly options: ResolvedConversionOptions;

  /**
   * @throws {OrgConversionError} ERR_INVALID_OPTIONS when the options do not validate.
   */
  constructor(options: ConversionOptions = {}) {
    this.options = resolveOptions(options);
  }

  /**
   * Parses and converts an HTML document or fragment.
   * @throws {OrgConversionError} when parsing fails or a URL cannot be resolved.
   */
  public convert(html: string): string {
    return this.convertNode(parseHtml(html));
  }

  /** Converts an already parsed tree, or any node of one. */
  public convertNode(root: NHPNode): string {
    return renderDocument(root, this.options);
  }
}
