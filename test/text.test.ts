import { describe, it, expect } from "vitest";
import { breakLongLines, collapseWhitespace, flattenText, normalizeOutput } from "../src/utils/text.js";

describe("collapseWhitespace", () => {
  it("turns each whitespace run into one space", () => {
    expect(collapseWhitespace(" a \n\t b\r\n")).toBe(" a b ");
  });

  it("leaves non-breaking spaces alone", () => {
    expect(collapseWhitespace("a\u00a0\u00a0b")).toBe("a\u00a0\u00a0b");
  });
});

describe("flattenText", () => {
  it("collapses and trims", () => {
    expect(flattenText("\n  Title \n Sub  ")).toBe("Title Sub");
  });
});

describe("normalizeOutput", () => {
  it("drops trailing spaces and squeezes blank lines", () => {
    expect(normalizeOutput("a \n\n\n\nb\u00a0c  \n")).toBe("a\n\nb c");
  });

  it("treats space-only lines as blank", () => {
    expect(normalizeOutput("a\n \n\nb")).toBe("a\n\nb");
  });

  it("trims the document edges", () => {
    expect(normalizeOutput("\n\n  text\n\n")).toBe("text");
  });
});

describe("breakLongLines", () => {
  it("leaves short lines alone", () => {
    expect(breakLongLines("short line")).toBe("short line");
  });

  it("breaks at the last space that fits", () => {
    expect(breakLongLines("aaaa bbbb", 0, 6)).toBe("aaaa\nbbbb");
    expect(breakLongLines("aa bb cc dd", 0, 5)).toBe("aa bb\ncc dd");
  });

  it("breaks after an overlong word", () => {
    expect(breakLongLines("abcdefghij klm", 0, 5)).toBe("abcdefghij\nklm");
  });

  it("counts text already on the line", () => {
    expect(breakLongLines("abc", 5, 5)).toBe("\nabc");
    expect(breakLongLines("ab cd", 3, 6)).toBe("ab\ncd");
  });

  it("wraps at 74 columns by default", () => {
    const words = Array<string>(20).fill("aaaa");
    expect(breakLongLines(words.join(" "))).toBe(`${words.slice(0, 15).join(" ")}\n${words.slice(15).join(" ")}`);
  });
});
