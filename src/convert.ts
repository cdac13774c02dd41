import type { Node as NHPNode } from "node-html-parser";
import type { ConversionOptions } from "./types.js";
import { OrgConverter } from "./utils/org-converter.js";

/** Converts a tree parsed by node-html-parser. */
export function fromHTMLNode(root: NHPNode, options: ConversionOptions = {}): string {
  return new OrgConverter(options).convertNode(root);
}

/** Parses `html` (a leading byte-order mark is ignored) and converts it. */
export function fromString(html: string, options: ConversionOptions = {}): string {
  return new OrgConverter(options).convert(html);
}

/** Decodes UTF-8 bytes, dropping a byte-order mark, and converts them. */
export function fromBuffer(bytes: Uint8Array, options: ConversionOptions = {}): string {
  return fromString(new TextDecoder("utf-8").decode(bytes), options);
}

/**
 * Reads a whole stream (a file or stdin, say) and converts it. Output is
 * produced only once the stream has ended.
 */
export async function fromStream(
  stream: AsyncIterable<Uint8Array | string>,
  options: ConversionOptions = {}
): Promise<string> {
  return fromBuffer(await collectStream(stream), options);
}

/** Reads a stream to its end. */
export async function collectStream(stream: AsyncIterable<Uint8Array | string>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
