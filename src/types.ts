/** Horizontal alignment of pretty table cells. */
export type CellAlignment = "left" | "center" | "right";

/**
 * Which outer borders a pretty table draws.
 */
export interface TableBorders {
  left?: boolean;
  right?: boolean;
  top?: boolean;
  bottom?: boolean;
}

/**
 * Style overrides for pretty (text-art) tables.
 */
export interface PrettyTablesOptions {
  /**
   * Upper-cases header and footer cells.
   * @default true
   */
  autoFormatHeader?: boolean;
  /**
   * Word-wraps cells of columns wider than `colWidth`.
   * @default false
   */
  autoWrapText?: boolean;
  /**
   * Maximum column width when `autoWrapText` is on. 0 means unlimited.
   * @default 0
   */
  colWidth?: number;
  /** @default "|" */
  columnSeparator?: string;
  /** @default "-" */
  rowSeparator?: string;
  /**
   * Character drawn where row and column separators cross. Lines containing it are border lines.
   * @default "+"
   */
  centerSeparator?: string;
  /** @default "center" */
  headerAlignment?: CellAlignment;
  /** @default "center" */
  footerAlignment?: CellAlignment;
  /** @default "left" */
  alignment?: CellAlignment;
  /** Per-column alignment; columns without an entry use `alignment`. */
  columnAlignment?: CellAlignment[];
  /**
   * Draws a separator line below the header row.
   * @default true
   */
  headerLine?: boolean;
  /**
   * Draws a separator line between body rows.
   * @default false
   */
  rowLine?: boolean;
  /**
   * Blanks a body cell that repeats the cell above it, so runs of equal values read as one.
   * @default false
   */
  autoMergeCells?: boolean;
  /** Outer borders; every side defaults to true. */
  borders?: TableBorders;
  /**
   * Post-processes the text-art table into pipe-table markup: outer border lines are dropped and
   * separator lines start and end with the column separator.
   * @default true
   */
  orgFormat?: boolean;
}

/**
 * Options accepted by every conversion entry point.
 */
export interface ConversionOptions {
  /**
   * Renders tables through the text-art formatter instead of plain cell text.
   * @default false
   */
  prettyTables?: boolean;
  /** Style overrides for pretty tables. */
  prettyTablesOptions?: PrettyTablesOptions;
  /**
   * Drops link targets; link text is still emitted.
   * @default false
   */
  omitLinks?: boolean;
  /**
   * Wraps lines longer than 74 columns, inside block quotes only.
   * @default false
   */
  breakLongLines?: boolean;
  /**
   * Base for resolving relative references. Also the default action of forms.
   * @default ""
   */
  baseUrl?: string;
  /**
   * Renders the content of noscript elements.
   * @default false
   */
  showNoscripts?: boolean;
  /**
   * Emits `<<name>>` targets for elements referenced by in-page links.
   * @default false
   */
  showInternalAnchors?: boolean;
  /**
   * Never shortens data: URLs.
   * @default false
   */
  showFullDataUrls?: boolean;
  /**
   * data: URLs longer than this are shortened to their media type.
   * @default 100
   */
  maxDataUrlLength?: number;
}

export type ResolvedPrettyTablesOptions = Readonly<
  Required<Omit<PrettyTablesOptions, "borders">> & { borders: Readonly<Required<TableBorders>> }
>;

/** Options after defaults have been applied. */
export type ResolvedConversionOptions = Readonly<
  Required<Omit<ConversionOptions, "prettyTablesOptions">> & { prettyTablesOptions: ResolvedPrettyTablesOptions }
>;

/**
 * Defines the structure for the result of fetching a page.
 */
export interface HTMLFetchResult {
  /** The fetched HTML content OR the converted Org content. */
  content: string;
  /** Indicates the type of content in the 'content' field. */
  contentType: "html" | "org";
  /** The extracted title of the page, if available. */
  title: string | null;
  /** The final URL after any redirects. */
  url: string;
  /** The HTTP status code of the final response. */
  statusCode: number;
}

/**
 * Configuration options for the FetchEngine.
 */
export interface FetchEngineOptions {
  /**
   * If true, convert the fetched HTML to Org.
   * @default false
   */
  org?: boolean;
  /** Optional headers to include in the request. */
  headers?: Record<string, string>;
  /** Conversion options used when `org` is true. */
  conversion?: ConversionOptions;
}
