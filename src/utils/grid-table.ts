/**
 * Unicode box drawing characters
 */
const BOX = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  leftT: "├",
  rightT: "┤",
  topT: "┬",
  bottomT: "┴",
  cross: "┼",
};

/** Wider cells are cut with an ellipsis */
export const MAX_CELL_WIDTH = 40;

/**
 * Placeholder text for a binary value
 */
export function describeBlob(bytes: Uint8Array): string {
  return `<blob ${bytes.length} bytes>`;
}

/**
 * Render a single value from a result row
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return "NULL";
  }
  if (value instanceof Uint8Array) {
    return describeBlob(value);
  }
  if (typeof value === "string") {
    return value.replace(/\r?\n/g, " ");
  }
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return value.toString();
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Pad or truncate a string to fit a specific width
 */
function fitString(str: string, width: number): string {
  if (str.length > width) {
    return str.slice(0, width - 1) + "…";
  }
  return str.padEnd(width);
}

/**
 * Generate a horizontal rule across all columns
 */
function horizontalLine(widths: number[], left: string, junction: string, right: string): string {
  return left + widths.map((width) => BOX.horizontal.repeat(width + 2)).join(junction) + right;
}

function tableRow(cells: string[], widths: number[]): string {
  const padded = cells.map((cell, i) => ` ${fitString(cell, widths[i])} `);
  return BOX.vertical + padded.join(BOX.vertical) + BOX.vertical;
}

/**
 * Generate a grid table with a header row, e.g.
 *
 *   ┌────┬───────┐
 *   │ id │ name  │
 *   ├────┼───────┤
 *   │ 1  │ Alice │
 *   └────┴───────┘
 */
export function generateGridTable(
  headers: readonly string[],
  rows: readonly (readonly unknown[])[]
): string {
  if (headers.length === 0) {
    return "";
  }

  const cellRows = rows.map((row) => headers.map((_, i) => formatCell(row[i])));

  // Calculate column widths based on content
  const widths = headers.map((header, i) =>
    Math.min(
      MAX_CELL_WIDTH,
      Math.max(header.length, ...cellRows.map((cells) => cells[i].length))
    )
  );

  const lines: string[] = [
    horizontalLine(widths, BOX.topLeft, BOX.topT, BOX.topRight),
    tableRow([...headers], widths),
    horizontalLine(widths, BOX.leftT, BOX.cross, BOX.rightT),
    ...cellRows.map((cells) => tableRow(cells, widths)),
    horizontalLine(widths, BOX.bottomLeft, BOX.bottomT, BOX.bottomRight),
  ];

  return lines.join("\n");
}
