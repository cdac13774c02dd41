import { HTMLElement, TextNode, type Node as NHPNode } from "node-html-parser";
import {
  BLOCK_CONTAINER_TAGS,
  BLOCK_LEVEL_TAGS,
  BLOCK_LINK_PLACEHOLDER,
  DEFAULT_FORM_METHOD,
  EMPHASIS_DELIMITERS,
  FORM_ID_PREFIX,
  HEADING_LEVELS,
  HORIZONTAL_RULE,
  IGNORED_TAGS,
  INLINE_CODE_TAGS,
  INPUT_TYPES,
  SUBMIT_LINK_LABEL,
  UNKNOWN_INPUT_TYPE,
} from "../constants.js";
import type { ResolvedConversionOptions } from "../types.js";
import { collectFragmentTargets } from "./anchors.js";
import { normalizeLink } from "./links.js";
import { parseHtml } from "./parse.js";
import { TableBuilder, formatTable, sanitizeCell } from "./tables.js";
import { breakLongLines, collapseWhitespace, flattenText, normalizeOutput } from "./text.js";

/** Monotonic id source shared by a conversion and all of its isolated sub-renders. */
interface FormIdSource {
  last: number;
}

/**
 * Renders a parsed tree (or any node of one) to normalized Org text.
 * Every call owns its state; nothing is shared between calls.
 */
export function renderDocument(root: NHPNode, options: ResolvedConversionOptions): string {
  const context = new RenderContext(options, collectFragmentTargets(root), { last: 0 });
  context.render(root);
  return normalizeOutput(context.output());
}

function tagNameOf(element: HTMLElement): string {
  // The document root carries no tag name
  return element.rawTagName ? element.rawTagName.toLowerCase() : "";
}

function isBlockLevel(node: NHPNode): boolean {
  return node instanceof HTMLElement && BLOCK_LEVEL_TAGS.has(tagNameOf(node));
}

function hasBlockLevelDescendant(element: HTMLElement): boolean {
  const pending: NHPNode[] = [...element.childNodes];
  while (pending.length > 0) {
    const node = pending.pop();
    if (!(node instanceof HTMLElement)) continue;
    if (isBlockLevel(node)) return true;
    pending.push(...node.childNodes);
  }
  return false;
}

/**
 * Mutable state of one depth-first walk. Output only ever grows at the end,
 * except for `<<name>>` targets which may slide in front of a trailing newline.
 */
class RenderContext {
  private buffer = "";
  /** Written after every newline; list items indent their continuation lines with it. */
  private prefix = "";
  private lineLength = 0;
  private endsWithNewLine = false;
  private justClosedBlock = false;
  private verbatim = false;
  private blockquoteLevel = 0;
  /** Id of the enclosing form, if any. */
  private formId: string | null = null;
  private table: TableBuilder | null = null;

  constructor(
    private readonly options: ResolvedConversionOptions,
    private readonly anchors: ReadonlySet<string>,
    private readonly formIds: FormIdSource
  ) {}

  public output(): string {
    return this.buffer;
  }

  public render(node: NHPNode): void {
    if (node instanceof TextNode) {
      this.emit(this.verbatim ? node.text : collapseWhitespace(node.text));
    } else if (node instanceof HTMLElement) {
      this.renderElement(node);
    }
  }

  private renderChildren(element: HTMLElement): void {
    for (const child of element.childNodes) {
      this.render(child);
    }
  }

  /** Like renderChildren, but a newline opening the content is not content. */
  private renderVerbatimChildren(element: HTMLElement): void {
    element.childNodes.forEach((child, index) => {
      if (index === 0 && child instanceof TextNode) {
        this.emit(child.text.replace(/^\r?\n/, ""));
      } else {
        this.render(child);
      }
    });
  }

  // --- Output ---

  private emit(data: string, preserveSpaces = this.verbatim): void {
    if (!data) return;
    this.write(this.wrap(data), preserveSpaces);
  }

  private write(data: string, preserveSpaces: boolean): void {
    let chunk = "";
    for (const char of data) {
      // Nothing starts a line with a space outside verbatim content
      if (char === " " && this.lineLength === 0 && !preserveSpaces) continue;
      chunk += char;
      this.endsWithNewLine = char === "\n";
      if (char !== "\n" && char !== " ") {
        this.justClosedBlock = false;
      }
      if (char === "\n") {
        this.lineLength = 0;
        chunk += this.prefix;
      } else {
        this.lineLength++;
      }
    }
    this.buffer += chunk;
  }

  private wrap(data: string): string {
    if (this.blockquoteLevel === 0 || !this.options.breakLongLines) {
      return data;
    }
    let existing = this.lineLength;
    return data
      .split("\n")
      .map((segment) => {
        const wrapped = breakLongLines(segment, existing);
        existing = 0;
        return wrapped;
      })
      .join("\n");
  }

  private ensureLineStart(): void {
    if (this.lineLength > 0) {
      this.emit("\n");
    }
  }

  /** A fresh context sharing this one's form ids and, unless given others, its fragment targets. */
  private subContext(anchors: ReadonlySet<string> = this.anchors): RenderContext {
    const sub = new RenderContext(this.options, anchors, this.formIds);
    sub.blockquoteLevel = this.blockquoteLevel;
    sub.formId = this.formId;
    return sub;
  }

  /** Renders the children into a throwaway context and returns its raw output. */
  private renderIsolated(element: HTMLElement): string {
    const sub = this.subContext();
    sub.renderChildren(element);
    return sub.buffer;
  }

  private nextFormId(): string {
    this.formIds.last++;
    return `${FORM_ID_PREFIX}${this.formIds.last}`;
  }

  // --- Elements ---

  private renderElement(element: HTMLElement): void {
    this.justClosedBlock = false;
    const tag = tagNameOf(element);

    if (IGNORED_TAGS.has(tag)) {
      return;
    }

    const level = HEADING_LEVELS.get(tag);
    const delimiter = EMPHASIS_DELIMITERS.get(tag);

    if (level !== undefined) {
      this.renderHeading(element, level);
    } else if (delimiter !== undefined) {
      this.renderEmphasis(element, delimiter);
    } else if (INLINE_CODE_TAGS.has(tag)) {
      this.renderInlineCode(element);
    } else if (BLOCK_CONTAINER_TAGS.has(tag)) {
      this.renderBlockContainer(element);
    } else {
      this.renderByTag(element, tag);
    }

    // Pretty cells carry their own target inside the cell text
    if (this.options.showInternalAnchors && !this.isPrettyCell(tag)) {
      this.emitAnchorTarget(element);
    }
  }

  private isPrettyCell(tag: string): boolean {
    return this.options.prettyTables && this.table !== null && (tag === "td" || tag === "th");
  }

  private renderByTag(element: HTMLElement, tag: string): void {
    switch (tag) {
      case "br":
        this.emit("\n");
        break;
      case "blockquote":
        this.renderBlockquote(element);
        break;
      case "p":
      case "ul":
      case "ol":
      case "dl":
        this.renderParagraph(element);
        break;
      case "li":
        this.renderListItem(element);
        break;
      case "dt":
        this.renderDefinitionTerm(element);
        break;
      case "dd":
        this.ensureLineStart();
        this.renderChildren(element);
        this.ensureLineStart();
        break;
      case "hr":
        this.ensureLineStart();
        this.emit(`${HORIZONTAL_RULE}\n`);
        break;
      case "a":
        this.renderLink(element);
        break;
      case "img":
        this.renderImage(element);
        break;
      case "pre":
        this.renderPreformatted(element);
        break;
      case "title":
        this.renderTitle(element);
        break;
      case "noscript":
        this.renderNoscript(element);
        break;
      case "form":
        this.renderForm(element);
        break;
      case "input":
        this.renderInput(element);
        break;
      case "textarea":
        this.renderTextarea(element);
        break;
      case "table":
      case "tfoot":
      case "tr":
      case "th":
      case "td":
        this.renderTablePart(element, tag);
        break;
      default:
        this.renderChildren(element);
    }
  }

  private renderHeading(element: HTMLElement, level: number): void {
    const content = flattenText(this.renderIsolated(element));
    if (!content) return;
    this.emit(`\n${"*".repeat(level)} ${content}\n`);
  }

  private renderEmphasis(element: HTMLElement, delimiter: string): void {
    const content = this.renderIsolated(element).trim();
    if (!content) return;
    this.emit(`${delimiter}${content}${delimiter}`);
  }

  private renderInlineCode(element: HTMLElement): void {
    if (this.verbatim) {
      this.renderChildren(element);
      return;
    }
    const content = this.renderIsolated(element).trim();
    if (!content) return;
    if (content.includes("\n")) {
      this.ensureLineStart();
      this.emit(`#+begin_src\n${content}\n#+end_src\n`);
    } else {
      this.emit(`~${content}~`);
    }
  }

  private renderBlockContainer(element: HTMLElement): void {
    this.ensureLineStart();
    this.renderChildren(element);
    if (!this.justClosedBlock) {
      this.emit("\n");
    }
    this.justClosedBlock = true;
  }

  private renderBlockquote(element: HTMLElement): void {
    this.blockquoteLevel++;
    this.emit("\n");
    if (this.blockquoteLevel === 1) {
      this.emit("\n#+begin_quote\n");
    }
    this.renderChildren(element);
    if (this.blockquoteLevel === 1) {
      this.emit("\n#+end_quote\n");
    }
    this.blockquoteLevel--;
    this.emit("\n\n");
  }

  private renderParagraph(element: HTMLElement): void {
    this.emit("\n\n");
    this.renderChildren(element);
    this.emit("\n\n");
  }

  private renderListItem(element: HTMLElement): void {
    const content = this.renderIsolated(element).trim();
    if (!content) return;

    this.ensureLineStart();
    const bullet = this.bulletFor(element);
    this.emit(bullet);

    const outerPrefix = this.prefix;
    this.prefix = outerPrefix + " ".repeat(bullet.length);
    this.emit(content, true);
    this.prefix = outerPrefix;
    this.emit("\n");
  }

  private bulletFor(item: HTMLElement): string {
    const list = item.parentNode;
    if (!list || tagNameOf(list) !== "ol") {
      return "- ";
    }
    const start = Number.parseInt(list.getAttribute("start") ?? "", 10);
    const siblings = list.childNodes.filter(
      (node): node is HTMLElement => node instanceof HTMLElement && tagNameOf(node) === "li"
    );
    return `${(Number.isNaN(start) ? 1 : start) + siblings.indexOf(item)}. `;
  }

  private renderDefinitionTerm(element: HTMLElement): void {
    this.ensureLineStart();
    const term = flattenText(this.renderIsolated(element));
    if (term) {
      this.emit(`*${term}*`);
    }
    this.emit("\n");
  }

  private renderLink(element: HTMLElement): void {
    const children = element.childNodes;
    const only = children.length === 1 ? children[0] : undefined;
    let text: string;

    if (only instanceof TextNode) {
      text = flattenText(only.text);
    } else if (only instanceof HTMLElement && tagNameOf(only) === "img" && (only.getAttribute("alt") ?? "") !== "") {
      text = flattenText(only.getAttribute("alt") ?? "");
      this.renderChildren(element);
    } else if (hasBlockLevelDescendant(element)) {
      const flattened = flattenText(this.renderIsolated(element));
      if (flattened) {
        this.ensureLineStart();
        this.emit(`${flattened} `);
      }
      text = BLOCK_LINK_PLACEHOLDER;
    } else {
      text = this.renderIsolated(element).trim();
    }

    const href = this.options.omitLinks ? "" : normalizeLink(element.getAttribute("href") ?? "", this.options);

    if (!text && !href) return;
    if (text === href) {
      this.emit(`[[${href}]]`);
    } else if (text && href) {
      this.emit(`[[${href}][${text}]]`);
    } else if (text) {
      this.emit(text);
    } else {
      this.emit(`[[${href}]]`);
    }
  }

  private renderImage(element: HTMLElement): void {
    const src = normalizeLink(element.getAttribute("src") ?? "", this.options);
    if (!src) return;
    const alt = flattenText(element.getAttribute("alt") ?? "");
    if (alt) {
      this.emit(`\n#+CAPTION: ${alt}\n[[${src}]]\n`);
    } else {
      this.emit(`[[${src}]]`);
    }
  }

  private renderPreformatted(element: HTMLElement): void {
    if (this.verbatim) {
      this.renderChildren(element);
      return;
    }
    this.emit("\n#+begin_src\n");
    this.verbatim = true;
    this.renderVerbatimChildren(element);
    this.verbatim = false;
    if (!this.endsWithNewLine) {
      this.emit("\n");
    }
    this.emit("#+end_src\n");
  }

  private renderTitle(element: HTMLElement): void {
    const title = flattenText(element.text);
    if (!title) return;
    this.ensureLineStart();
    this.emit(`#+TITLE: ${title}\n\n\n`);
  }

  private renderNoscript(element: HTMLElement): void {
    if (!this.options.showNoscripts) return;
    const raw = element.childNodes[0];
    if (!(raw instanceof TextNode)) return;
    const root = parseHtml(raw.rawText);
    const sub = this.subContext(new Set([...this.anchors, ...collectFragmentTargets(root)]));
    sub.render(root);
    const rendered = normalizeOutput(sub.buffer);
    if (rendered) {
      this.ensureLineStart();
      this.emit(`${rendered}\n`, true);
    }
  }

  // --- Forms ---

  private formFieldTags(element: HTMLElement): string {
    if (this.formId === null) return "";
    const name = element.getAttribute("name");
    const tags = ` :id ${this.nextFormId()} :form ${this.formId}`;
    return name ? `${tags} :name ${name}` : tags;
  }

  private renderForm(element: HTMLElement): void {
    const method = (element.getAttribute("method") ?? "").trim().toLowerCase() || DEFAULT_FORM_METHOD;
    const action = normalizeLink(element.getAttribute("action") || this.options.baseUrl, this.options);
    const formId = this.nextFormId();

    const outerForm = this.formId;
    this.formId = formId;
    this.ensureLineStart();
    this.renderChildren(element);
    this.ensureLineStart();
    this.emit(`[[org-form:${formId}:${method}:${action}][${SUBMIT_LINK_LABEL}]]\n`);
    this.formId = outerForm;
  }

  private renderInput(element: HTMLElement): void {
    const declared = element.getAttribute("type");
    const type = declared ? declared.trim().toLowerCase() : UNKNOWN_INPUT_TYPE;
    if (type !== UNKNOWN_INPUT_TYPE && !INPUT_TYPES.has(type)) return;

    const content = element.getAttribute("value") || element.getAttribute("placeholder") || "";
    this.emit(`\n#+begin_input :type ${type}${this.formFieldTags(element)}\n`);
    this.emit(content);
    this.emit("\n#+end_input\n");
  }

  private renderTextarea(element: HTMLElement): void {
    const sub = this.subContext();
    sub.verbatim = true;
    sub.renderVerbatimChildren(element);
    const typed = sub.buffer.replace(/\n$/, "");
    const content = typed.trim() ? typed : element.getAttribute("placeholder") ?? "";

    this.emit(`\n#+begin_textarea${this.formFieldTags(element)}\n`);
    this.emit(content, true);
    this.emit("\n#+end_textarea\n");
  }

  // --- Tables ---

  private renderTablePart(element: HTMLElement, tag: string): void {
    if (!this.options.prettyTables) {
      this.renderPlainTablePart(element, tag);
      return;
    }
    if (tag === "table") {
      this.renderPrettyTable(element);
      return;
    }

    const builder = this.table;
    if (!builder) {
      // A stray table part outside any table element
      this.renderPlainTablePart(element, tag);
      return;
    }

    switch (tag) {
      case "tfoot":
        builder.enterFooter();
        this.renderChildren(element);
        builder.leaveFooter();
        break;
      case "tr":
        builder.startRow();
        this.renderChildren(element);
        builder.endRow();
        break;
      case "th":
        builder.addHeaderCell(this.renderCell(element));
        break;
      default:
        builder.addDataCell(this.renderCell(element));
    }
  }

  private renderPlainTablePart(element: HTMLElement, tag: string): void {
    switch (tag) {
      case "table":
        this.renderParagraph(element);
        break;
      case "tr":
        this.renderChildren(element);
        this.ensureLineStart();
        break;
      case "th":
      case "td":
        if (this.lineLength > 0 && !this.buffer.endsWith(" ")) {
          this.emit(" ");
        }
        this.renderChildren(element);
        break;
      default:
        this.renderChildren(element);
    }
  }

  private renderPrettyTable(element: HTMLElement): void {
    const outerTable = this.table;
    const builder = new TableBuilder();
    this.table = builder;
    this.emit("\n\n");
    this.renderChildren(element);
    const rendered = formatTable(builder, this.options.prettyTablesOptions);
    this.table = outerTable;

    if (rendered) {
      this.ensureLineStart();
      this.write(rendered, true);
    }
    this.emit("\n\n");
  }

  /** Each direct child is converted on its own; block-level children end their line. */
  private renderCell(element: HTMLElement): string {
    let text = "";
    element.childNodes.forEach((child, index) => {
      if (index > 0 && isBlockLevel(element.childNodes[index - 1])) {
        text += "\n";
      }
      const sub = this.subContext();
      // A cell's quotes open their own delimiters
      sub.blockquoteLevel = 0;
      sub.render(child);
      text += normalizeOutput(sub.buffer);
    });
    const cell = sanitizeCell(text.trim());

    const name = this.options.showInternalAnchors ? this.anchorNameOf(element) : undefined;
    return name ? `${cell}${needsSpaceBefore(cell) ? " " : ""}<<${name}>>` : cell;
  }

  // --- Internal anchors ---

  private anchorNameOf(element: HTMLElement): string | undefined {
    return [element.getAttribute("id"), element.getAttribute("name")].find(
      (candidate): candidate is string => !!candidate && this.anchors.has(candidate)
    );
  }

  private emitAnchorTarget(element: HTMLElement): void {
    const name = this.anchorNameOf(element);
    if (!name) return;

    const marker = `<<${name}>>`;
    if (this.buffer.endsWith("\n")) {
      // Keep the target on the element's last line of text
      const before = this.buffer.replace(/\n+$/, "");
      const newlines = this.buffer.slice(before.length);
      this.buffer = `${before}${needsSpaceBefore(before) ? " " : ""}${marker}${newlines}`;
      return;
    }
    const spaced = `${needsSpaceBefore(this.buffer) ? " " : ""}${marker}`;
    this.buffer += spaced;
    this.lineLength += spaced.length;
    this.endsWithNewLine = false;
  }
}

function needsSpaceBefore(text: string): boolean {
  return text.length > 0 && !/\s$/.test(text);
}
