import { OMITTED_DATA_URL_MARKER, REGEX_INVALID_PERCENT_ESCAPE } from "../constants.js";
import { OrgConversionError } from "../errors.js";
import type { ResolvedConversionOptions } from "../types.js";

export type LinkOptions = Pick<ResolvedConversionOptions, "baseUrl" | "showFullDataUrls" | "maxDataUrlLength">;

/**
 * Turns a raw `href`/`src`/`action` value into the target written inside `[[...]]`.
 *
 * - `#name` becomes `name`, which Org resolves against a `<<name>>` target.
 * - Long `data:` URLs are shortened to their media type.
 * - With a base URL, relative references are resolved against it.
 *
 * @throws {OrgConversionError} ERR_INVALID_URL when the reference cannot be resolved.
 */
export function normalizeLink(raw: string, options: LinkOptions): string {
  const link = raw.trim().replace(/[\r\n]/g, "");
  if (!link) return "";

  if (link.startsWith("#")) {
    return link.slice(1);
  }

  if (/^data:/i.test(link)) {
    if (!options.showFullDataUrls && link.length > options.maxDataUrlLength) {
      return shortenDataUrl(link);
    }
    return link;
  }

  if (!options.baseUrl) {
    return link;
  }

  const escapeIndex = link.search(REGEX_INVALID_PERCENT_ESCAPE);
  if (escapeIndex >= 0) {
    const salvaged = link.slice(0, escapeIndex);
    console.warn(`normalizeLink: invalid percent-escape in '${link}', resolving '${salvaged}' instead`);
    return resolveReference(salvaged, options.baseUrl);
  }
  return resolveReference(link, options.baseUrl);
}

function shortenDataUrl(link: string): string {
  const semicolon = link.indexOf(";");
  if (semicolon < 0) {
    return `data:${OMITTED_DATA_URL_MARKER}`;
  }
  return `${link.slice(0, semicolon)};${OMITTED_DATA_URL_MARKER}`;
}

function resolveReference(reference: string, baseUrl: string): string {
  let resolved: URL;
  try {
    resolved = new URL(reference, baseUrl);
  } catch (error: unknown) {
    throw new OrgConversionError(
      `Cannot resolve '${reference}' against '${baseUrl}'`,
      "ERR_INVALID_URL",
      error instanceof Error ? error : undefined
    );
  }
  // An empty fragment carries no information
  if (resolved.hash === "" && resolved.href.endsWith("#")) {
    return resolved.href.slice(0, -1);
  }
  return resolved.href;
}
