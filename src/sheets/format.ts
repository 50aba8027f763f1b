/**
 * Conversion of pipeline values into sheet cell text
 */

import { formatTimestamp } from "../utils/dates.js";

import type { Dataset, Scalar } from "../types/index.js";

export function formatCell(value: Scalar | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  return String(value);
}

/**
 * Header row followed by data rows, every cell as text
 */
export function formatGrid(dataset: Dataset): string[][] {
  return [
    dataset.headers.map((header) => header),
    ...dataset.rows.map((row) => row.map(formatCell)),
  ];
}
