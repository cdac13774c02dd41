import { table, type ColumnUserConfig, type TableUserConfig } from "table";
import { REGEX_TABLE_CONTROL_CHARS } from "../constants.js";
import type { CellAlignment, ResolvedPrettyTablesOptions } from "../types.js";

/**
 * Collects the cell text of one `table` element while its subtree is walked.
 * A fresh builder is created for every table so rows never leak between
 * sibling tables.
 */
export class TableBuilder {
  readonly header: string[] = [];
  readonly body: string[][] = [];
  readonly footer: string[] = [];
  private currentRow = 0;
  private inFooter = false;

  public enterFooter(): void {
    this.inFooter = true;
  }

  public leaveFooter(): void {
    this.inFooter = false;
  }

  /** Opens a body row for a `tr`; the cursor advances once the row's cells are done. */
  public startRow(): void {
    this.body.push([]);
  }

  public endRow(): void {
    this.currentRow++;
  }

  public addHeaderCell(text: string): void {
    this.header.push(text);
  }

  public addDataCell(text: string): void {
    if (this.inFooter) {
      this.footer.push(text);
      return;
    }
    // Cells outside any row still land in a row of their own
    while (this.body.length <= this.currentRow) {
      this.body.push([]);
    }
    this.body[this.currentRow].push(text);
  }
}

/** Replaces characters the formatter rejects. */
export function sanitizeCell(text: string): string {
  return text.replace(REGEX_TABLE_CONTROL_CHARS, " ");
}

/**
 * Renders the collected cells as a text-art table. Returns an empty string
 * for a table without cells.
 */
export function formatTable(builder: TableBuilder, options: ResolvedPrettyTablesOptions): string {
  const body = builder.body.filter((row) => row.length > 0);
  const columnCount = Math.max(builder.header.length, builder.footer.length, ...body.map((row) => row.length));
  if (columnCount === 0) {
    return "";
  }

  const styleHeader = (cells: string[]) => (options.autoFormatHeader ? cells.map((cell) => cell.toUpperCase()) : cells);
  const header = builder.header.length > 0 ? padRow(styleHeader(builder.header), columnCount) : null;
  const footer = builder.footer.length > 0 ? padRow(styleHeader(builder.footer), columnCount) : null;
  const padded = body.map((row) => padRow(row, columnCount));
  const rows = options.autoMergeCells ? mergeRepeatedCells(padded) : padded;

  const allRows = [...(header ? [header] : []), ...padded, ...(footer ? [footer] : [])];
  const columns: ColumnUserConfig[] = [];
  const widths: number[] = [];

  for (let index = 0; index < columnCount; index++) {
    const natural = Math.max(...allRows.map((row) => cellWidth(row[index])));
    const column: { -readonly [K in keyof ColumnUserConfig]: ColumnUserConfig[K] } = { alignment: options.columnAlignment[index] ?? options.alignment };
    if (options.autoWrapText && options.colWidth > 0 && natural > options.colWidth) {
      column.width = options.colWidth;
      column.wrapWord = true;
      widths.push(options.colWidth);
    } else {
      widths.push(natural);
    }
    columns.push(column);
  }

  // Header and footer keep their own alignment, applied before the body alignment sees them
  const data = [
    ...(header ? [alignRow(header, widths, options.headerAlignment)] : []),
    ...rows,
    ...(footer ? [alignRow(footer, widths, options.footerAlignment)] : []),
  ];

  const config: TableUserConfig = {
    border: buildBorder(options),
    columns,
    drawHorizontalLine: (lineIndex, rowCount) => {
      if (lineIndex === 0) return options.borders.top;
      if (lineIndex === rowCount) return options.borders.bottom;
      if (header && lineIndex === 1) return options.headerLine;
      if (footer && lineIndex === rowCount - 1) return true;
      return options.rowLine;
    },
  };

  const rendered = table(data, config).replace(/\n$/, "");
  return options.orgFormat ? toPipeTable(rendered, options) : rendered;
}

function padRow(row: string[], columnCount: number): string[] {
  return [...row, ...Array<string>(columnCount - row.length).fill("")];
}

function cellWidth(cell: string): number {
  return Math.max(...cell.split("\n").map((line) => line.length));
}

function mergeRepeatedCells(rows: string[][]): string[][] {
  return rows.map((row, rowIndex) =>
    row.map((cell, column) => (rowIndex > 0 && cell !== "" && rows[rowIndex - 1][column] === cell ? "" : cell))
  );
}

function alignRow(row: string[], widths: number[], alignment: CellAlignment): string[] {
  return row.map((cell, index) =>
    cell
      .split("\n")
      .map((line) => {
        const gap = widths[index] - line.length;
        if (gap <= 0) return line;
        const left = alignment === "left" ? 0 : alignment === "right" ? gap : Math.floor(gap / 2);
        return " ".repeat(left) + line + " ".repeat(gap - left);
      })
      .join("\n")
  );
}

function buildBorder(options: ResolvedPrettyTablesOptions): TableUserConfig["border"] {
  const { columnSeparator: column, rowSeparator: row, centerSeparator: center } = options;
  const left = options.borders.left;
  const right = options.borders.right;

  return {
    topBody: row,
    topJoin: center,
    topLeft: left ? center : "",
    topRight: right ? center : "",
    bottomBody: row,
    bottomJoin: center,
    bottomLeft: left ? center : "",
    bottomRight: right ? center : "",
    bodyLeft: left ? column : "",
    bodyRight: right ? column : "",
    bodyJoin: column,
    joinBody: row,
    joinJoin: center,
    joinLeft: left ? center : "",
    joinRight: right ? center : "",
  };
}

/**
 * Drops the outer border lines and turns the remaining separator lines into
 * `|---+---|` so the result reads as a pipe table.
 */
function toPipeTable(rendered: string, options: ResolvedPrettyTablesOptions): string {
  const { centerSeparator: center, columnSeparator: column } = options;
  const lines = rendered.split("\n");

  if (options.borders.bottom && lines.length > 1 && lines[lines.length - 1].includes(center)) {
    lines.pop();
  }
  if (options.borders.top && lines.length > 1 && lines[0].includes(center)) {
    lines.shift();
  }

  return lines
    .map((line) => {
      let result = line;
      if (result.startsWith(center)) result = column + result.slice(center.length);
      if (result.endsWith(center)) result = result.slice(0, -center.length) + column;
      return result;
    })
    .join("\n");
}
