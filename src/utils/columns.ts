/**
 * Spreadsheet column-letter helpers (A1 notation)
 */

import { ConfigValidationError } from "../errors.js";

const COLUMN_RANGE_PATTERN = /^([A-Z]+):([A-Z]+)$/;

/**
 * Convert a 1-based column index to its letter (1 → "A", 27 → "AA")
 */
export function columnLetter(index: number): string {
  let n = Math.floor(index);
  let letters = "";
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Convert a column letter to its 1-based index ("A" → 1, "X" → 24)
 */
export function columnIndex(letter: string): number {
  let index = 0;
  for (const char of letter.toUpperCase()) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index;
}

export interface ColumnRange {
  start: string;
  end: string;
}

/**
 * Parse a column range such as "A:R"
 */
export function parseColumnRange(range: string): ColumnRange {
  const match = COLUMN_RANGE_PATTERN.exec(range.trim().toUpperCase());
  if (!match?.[1] || !match[2]) {
    throw new ConfigValidationError(
      `Column range must be in format 'A:Z', got '${range}'`
    );
  }
  if (columnIndex(match[2]) < columnIndex(match[1])) {
    throw new ConfigValidationError(
      `Column range '${range}' ends before it starts`
    );
  }
  return { start: match[1], end: match[2] };
}

/**
 * Number of columns covered by a range ("A:R" → 18, "C:E" → 3)
 */
export function columnSpan(range: string): number {
  const { start, end } = parseColumnRange(range);
  return columnIndex(end) - columnIndex(start) + 1;
}

/**
 * Quote a tab name for A1 notation ("It's" → "'It''s'")
 */
export function quoteTab(tab: string): string {
  return `'${tab.replaceAll("'", "''")}'`;
}

/**
 * Build an A1 range for a block of rows inside a column range
 */
export function a1Range(
  tab: string,
  range: ColumnRange,
  fromRow: number,
  toRow?: number
): string {
  const end = toRow === undefined ? range.end : `${range.end}${String(toRow)}`;
  return `${quoteTab(tab)}!${range.start}${String(fromRow)}:${end}`;
}
