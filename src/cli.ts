import { readFile, writeFile } from "node:fs/promises";
import { Command, Option } from "commander";
import { config } from "dotenv";
import { BINARY_SNIFF_LENGTH, PACKAGE_NAME, PACKAGE_VERSION } from "./constants.js";
import { collectStream, fromBuffer } from "./convert.js";
import { OrgConversionError } from "./errors.js";
import { FetchEngine } from "./FetchEngine.js";
import type { ConversionOptions } from "./types.js";

export type CliFlags = {
  input?: string;
  output?: string;
  baseUrl?: string;
  url?: string;
  prettyTables?: boolean;
  omitLinks?: boolean;
  breakLongLines?: boolean;
  showNoscripts?: boolean;
  showAnchors?: boolean;
  fullDataUrls?: boolean;
};

type Env = Record<string, string | undefined>;

function isEnabled(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/** Flags win over HTML_TO_ORG_* environment defaults. */
export function toConversionOptions(flags: CliFlags, env: Env = process.env): ConversionOptions {
  return {
    baseUrl: flags.baseUrl ?? env.HTML_TO_ORG_BASE_URL ?? "",
    prettyTables: flags.prettyTables ?? isEnabled(env.HTML_TO_ORG_PRETTY_TABLES),
    omitLinks: flags.omitLinks ?? isEnabled(env.HTML_TO_ORG_OMIT_LINKS),
    breakLongLines: flags.breakLongLines ?? false,
    showNoscripts: flags.showNoscripts ?? false,
    showInternalAnchors: flags.showAnchors ?? false,
    showFullDataUrls: flags.fullDataUrls ?? false,
  };
}

/** A NUL byte near the start means the input is not a text document. */
export function looksBinary(bytes: Uint8Array): boolean {
  return bytes.subarray(0, BINARY_SNIFF_LENGTH).includes(0);
}

/**
 * Converts whatever the flags point at: a remote page, a file or stdin.
 * @throws {OrgConversionError} ERR_NON_HTML_CONTENT when local input looks binary.
 */
export async function convertInput(
  flags: CliFlags,
  env: Env = process.env,
  stdin: AsyncIterable<Uint8Array | string> = process.stdin
): Promise<string> {
  const options = toConversionOptions(flags, env);

  if (flags.url) {
    const result = await new FetchEngine({ org: true, conversion: options }).fetchHTML(flags.url);
    return result.content;
  }

  const bytes = flags.input ? await readFile(flags.input) : await collectStream(stdin);
  if (looksBinary(bytes)) {
    throw new OrgConversionError(`Input does not look like HTML: ${flags.input ?? "stdin"}`, "ERR_NON_HTML_CONTENT");
  }
  return fromBuffer(bytes, options);
}

export function createProgram(): Command {
  return new Command()
    .name(PACKAGE_NAME)
    .description("Convert HTML to Org")
    .version(`${PACKAGE_NAME}: HTML to Org converter CLI ${PACKAGE_VERSION}`, "-V, --version")
    .option("-i, --input <path>", "HTML file to read (default: stdin)")
    .option("-o, --output <path>", "file to write (default: stdout)")
    .option("-u, --base-url <url>", "base URL for relative links and form actions")
    .addOption(new Option("--url <url>", "fetch and convert a remote page").conflicts("input"))
    .option("--pretty-tables", "render tables as pipe tables")
    .option("--omit-links", "drop link targets, keep link text")
    .option("--break-long-lines", "wrap long lines inside quotes")
    .option("--show-noscripts", "render noscript content")
    .option("--show-anchors", "emit <<name>> targets for in-page links")
    .option("--full-data-urls", "never shorten data: URLs");
}

export async function main(argv: string[]): Promise<void> {
  config();
  const program = createProgram();
  program.action(async () => {
    const flags = program.opts<CliFlags>();
    const text = await convertInput(flags);
    if (flags.output) {
      await writeFile(flags.output, `${text}\n`);
    } else {
      process.stdout.write(`${text}\n`);
    }
  });

  try {
    await program.parseAsync(argv);
  } catch (error: unknown) {
    console.error(`${PACKAGE_NAME}:`, error);
    process.exitCode = 1;
  }
}
