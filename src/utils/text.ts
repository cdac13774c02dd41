import { MAX_LINE_LENGTH, REGEX_WHITESPACE_RUN } from "../constants.js";

/** Collapses every run of ASCII whitespace (newlines included) to one space. */
export function collapseWhitespace(text: string): string {
  return text.replace(REGEX_WHITESPACE_RUN, " ");
}

/** Collapses whitespace and trims, yielding a single line. */
export function flattenText(text: string): string {
  return collapseWhitespace(text).trim();
}

/**
 * Final cleanup applied to every finished document: trailing spaces are
 * dropped, blank-line runs shrink to one, non-breaking spaces become plain
 * spaces and the document edges are trimmed.
 */
export function normalizeOutput(text: string): string {
  return text
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/\u00a0/g, " ")
    .trim();
}

/**
 * Inserts newlines into a single line of text so that no line exceeds
 * `maxLength`, counting `existing` characters already on the current line.
 * Breaks at the last whitespace that fits; a word longer than the limit is
 * broken at the next whitespace after it.
 */
export function breakLongLines(line: string, existing = 0, maxLength = MAX_LINE_LENGTH): string {
  let rest = line;
  let used = existing;
  let result = "";

  if (used >= maxLength) {
    result += "\n";
    used = 0;
  }

  while (rest.length + used > maxLength) {
    let cut = maxLength - used;
    while (cut >= 0 && !isSpace(rest[cut])) cut--;
    if (cut < 0) {
      cut = maxLength - used;
      while (cut < rest.length && !isSpace(rest[cut])) cut++;
    }

    result += `${rest.slice(0, cut)}\n`;
    while (cut < rest.length && isSpace(rest[cut])) cut++;
    rest = rest.slice(cut);
    used = 0;
  }

  return result + rest;
}

function isSpace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}
