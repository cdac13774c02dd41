export const PACKAGE_NAME = "html-to-org";
export const PACKAGE_VERSION = "1.0.0";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

export const COMMON_HEADERS = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

// Long-line wrapping inside block quotes
export const MAX_LINE_LENGTH = 74;

// data: URLs longer than this are shortened unless showFullDataUrls is set
export const DEFAULT_MAX_DATA_URL_LENGTH = 100;
export const OMITTED_DATA_URL_MARKER = "(omitted)";

export const FORM_ID_PREFIX = "org-form-id--";
export const DEFAULT_FORM_METHOD = "get";
export const SUBMIT_LINK_LABEL = "Submit";

// Label for links whose content is block-level and gets emitted before the link
export const BLOCK_LINK_PLACEHOLDER = "Link";

export const HORIZONTAL_RULE = "-----";

// Local input sniffing: a NUL byte this early means the file is not HTML
export const BINARY_SNIFF_LENGTH = 1024;

// --- Element vocabulary ---

export const HEADING_LEVELS: ReadonlyMap<string, number> = new Map([
  ["h1", 1],
  ["h2", 2],
  ["h3", 3],
  ["h4", 4],
  ["h5", 5],
  ["h6", 6],
]);

export const EMPHASIS_DELIMITERS: ReadonlyMap<string, string> = new Map([
  ["b", "*"],
  ["strong", "*"],
  ["i", "/"],
  ["em", "/"],
  ["u", "_"],
  ["ins", "_"],
  ["s", "+"],
  ["strike", "+"],
  ["del", "+"],
]);

export const INLINE_CODE_TAGS: ReadonlySet<string> = new Set(["code", "tt", "kbd", "var", "samp"]);

export const BLOCK_CONTAINER_TAGS: ReadonlySet<string> = new Set([
  "div",
  "section",
  "article",
  "main",
  "header",
  "footer",
  "nav",
  "aside",
  "figure",
  "figcaption",
  "address",
  "details",
  "summary",
  "center",
]);

// Subtrees that are skipped outright
export const IGNORED_TAGS: ReadonlySet<string> = new Set(["style", "script", "meta", "link", "base", "template"]);

// Element types whose layout implies a line break around their content
export const BLOCK_LEVEL_TAGS: ReadonlySet<string> = new Set([
  "address",
  "article",
  "aside",
  "blockquote",
  "center",
  "details",
  "dd",
  "div",
  "dl",
  "dt",
  "fieldset",
  "figcaption",
  "figure",
  "footer",
  "form",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "summary",
  "table",
  "ul",
]);

export const INPUT_TYPES: ReadonlySet<string> = new Set(["text", "number", "password"]);
export const UNKNOWN_INPUT_TYPE = "unknown";

// Regex
export const REGEX_WHITESPACE_RUN = /[ \r\n\t]+/g;
export const REGEX_INVALID_PERCENT_ESCAPE = /%(?![0-9a-fA-F]{2})/;
// Characters the table formatter refuses inside a cell
export const REGEX_TABLE_CONTROL_CHARS = /[\u0001-\u0006\u0008\u0009\u000B-\u001A]/g;
