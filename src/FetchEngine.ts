import type { FetchEngineOptions, HTMLFetchResult } from "./types.js";
import { COMMON_HEADERS } from "./constants.js";
import { OrgConversionError, toConversionError } from "./errors.js";
import { OrgConverter } from "./utils/org-converter.js";

/**
 * Error for non-2xx responses from FetchEngine.
 */
export class FetchEngineHttpError extends OrgConversionError {
  constructor(message: string, statusCode: number) {
    super(message, "ERR_HTTP_ERROR", undefined, statusCode);
    this.name = "FetchEngineHttpError";
  }
}

/**
 * FetchEngine - fetches a page with the standard `fetch` API and optionally converts it to Org.
 *
 * No JavaScript is executed; what the server sends is what gets converted.
 */
export class FetchEngine {
  private readonly options: Required<FetchEngineOptions>;

  private static readonly DEFAULT_OPTIONS: Required<FetchEngineOptions> = {
    org: false,
    headers: {},
    conversion: {},
  };

  /**
   * Creates an instance of FetchEngine.
   * @param options Configuration options for the FetchEngine.
   */
  constructor(options: FetchEngineOptions = {}) {
    this.options = { ...FetchEngine.DEFAULT_OPTIONS, ...options };
  }

  /**
   * Fetches HTML, or converts it to Org, from the specified URL.
   *
   * In Org mode the final URL of the response is the base for relative links
   * unless the conversion options name one.
   *
   * @throws {FetchEngineHttpError} If the HTTP response status is not ok (e.g., 404, 500).
   * @throws {OrgConversionError} ERR_NON_HTML_CONTENT for other content types, ERR_FETCH_FAILED for network errors.
   */
  async fetchHTML(url: string, options?: FetchEngineOptions): Promise<HTMLFetchResult> {
    const org = options?.org ?? this.options.org;
    try {
      // Call headers override constructor headers, which override the defaults
      const finalHeaders = {
        ...COMMON_HEADERS,
        ...this.options.headers,
        ...options?.headers,
      };

      const response = await fetch(url, {
        redirect: "follow",
        headers: finalHeaders,
      });

      if (!response.ok) {
        throw new FetchEngineHttpError(`HTTP error! status: ${response.status}`, response.status);
      }

      const contentTypeHeader = response.headers.get("content-type");
      if (!contentTypeHeader || !contentTypeHeader.includes("text/html")) {
        throw new OrgConversionError("Content-Type is not text/html", "ERR_NON_HTML_CONTENT");
      }

      const html = await response.text();
      const finalUrl = response.url || url;
      const titleMatch = html.match(/<title[^>]*>([^<]+)<\/title>/i);
      const title = titleMatch ? titleMatch[1].trim() : null;

      if (!org) {
        return { content: html, contentType: "html", title, url: finalUrl, statusCode: response.status };
      }

      const conversion = { ...this.options.conversion, ...options?.conversion };
      const converter = new OrgConverter({ ...conversion, baseUrl: conversion.baseUrl || finalUrl });
      return {
        content: converter.convert(html),
        contentType: "org",
        title,
        url: finalUrl,
        statusCode: response.status,
      };
    } catch (error: unknown) {
      throw toConversionError(error, "ERR_FETCH_FAILED", "Fetch failed");
    }
  }
}
