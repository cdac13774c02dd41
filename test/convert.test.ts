import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { parse } from "node-html-parser";
import { collectStream, fromBuffer, fromHTMLNode, fromStream, fromString } from "../src/convert.js";
import { OrgConverter } from "../src/utils/org-converter.js";

describe("fromString", () => {
  it("ignores a byte-order mark", () => {
    expect(fromString("\uFEFF<b>x</b>")).toBe("*x*");
  });

  it("does not modify the options it is given", () => {
    const options = { omitLinks: true };
    fromString('<a href="/x">x</a>', options);
    expect(options).toEqual({ omitLinks: true });
  });
});

describe("fromBuffer", () => {
  it("decodes UTF-8 and drops the byte-order mark", () => {
    expect(fromBuffer(Buffer.from("\uFEFF<p>héllo</p>", "utf8"))).toBe("héllo");
  });

  it("accepts options", () => {
    expect(fromBuffer(Buffer.from('<a href="b">c</a>'), { baseUrl: "http://example.com/a/" })).toBe(
      "[[http://example.com/a/b][c]]"
    );
  });
});

describe("fromStream", () => {
  it("converts once the stream has ended", async () => {
    const stream = Readable.from([Buffer.from("<h1>Ti"), Buffer.from("tle</h1>")]);
    await expect(fromStream(stream)).resolves.toBe("* Title");
  });

  it("decodes characters split across chunks", async () => {
    const bytes = Buffer.from("<i>é</i>", "utf8");
    const stream = Readable.from([bytes.subarray(0, 4), bytes.subarray(4)]);
    await expect(fromStream(stream)).resolves.toBe("/é/");
  });

  it("accepts string chunks", async () => {
    await expect(fromStream(Readable.from(["<u>", "x</u>"]))).resolves.toBe("_x_");
  });
});

describe("collectStream", () => {
  it("concatenates every chunk", async () => {
    const bytes = await collectStream(Readable.from([Buffer.from("ab"), "cd"]));
    expect(bytes.toString("utf8")).toBe("abcd");
  });
});

describe("fromHTMLNode", () => {
  it("converts an already parsed tree", () => {
    expect(fromHTMLNode(parse("<i>x</i>"))).toBe("/x/");
  });

  it("converts a subtree on its own", () => {
    const second = parse("<p>a</p><p>b</p>").querySelectorAll("p")[1];
    expect(fromHTMLNode(second)).toBe("b");
  });
});

describe("OrgConverter", () => {
  it("exposes its resolved options", () => {
    const converter = new OrgConverter({ prettyTables: true });
    expect(converter.options.prettyTables).toBe(true);
    expect(converter.options.prettyTablesOptions.columnSeparator).toBe("|");
  });

  it("can be reused across documents", () => {
    const converter = new OrgConverter();
    expect(converter.convert("<h1>One</h1>")).toBe("* One");
    expect(converter.convert("<h2>Two</h2>")).toBe("** Two");
  });
});
