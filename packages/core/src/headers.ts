// 12, -3.5, .5, 1e3, 1,234.5
const NUMERIC_PATTERN = /^[-+]?(?:(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

export function isNumericCell(cell: string): boolean {
  return NUMERIC_PATTERN.test(cell.trim());
}

export function isBlankRow(cells: readonly string[]): boolean {
  return cells.every((cell) => cell.trim() === "");
}

/**
 * A row is a header iff it has at least two cells, every cell is non-empty
 * after trimming, and no cell is purely numeric. Single-cell rows are titles.
 */
export function looksLikeHeader(cells: readonly string[]): boolean {
  if (cells.length < 2) return false;
  return cells.every((cell) => cell.trim() !== "" && !isNumericCell(cell));
}

export function isTitleRow(cells: readonly string[]): boolean {
  return cells.length === 1 && (cells[0] ?? "").trim() !== "";
}
