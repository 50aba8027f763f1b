/**
 * Presentation requests applied next to each data write.
 *
 * Long text columns are clipped so rows keep a fixed height, the course tag
 * column wraps so each tag shows on its own line.
 */

import { columnIndex, type ColumnRange } from "../utils/columns.js";

import type { sheets_v4 } from "googleapis";

type WrapStrategy = "CLIP" | "WRAP";

interface ColumnStyle {
  wrap: WrapStrategy;
  widthPx: number;
}

/** Styled columns, located by header name */
export const COLUMN_STYLES: Readonly<Record<string, ColumnStyle>> = {
  funnel_history: { wrap: "CLIP", widthPx: 100 },
  group: { wrap: "CLIP", widthPx: 120 },
  courses: { wrap: "WRAP", widthPx: 80 },
  lessons: { wrap: "CLIP", widthPx: 200 },
};

export const ROW_HEIGHT_PX = 100;

export interface PresentationTarget {
  sheetId: number;
  headers: readonly string[];
  range: ColumnRange;
  /** 1-based row of the header */
  startRow: number;
  /** Written rows, header included */
  rowCount: number;
}

export function buildPresentationRequests(
  target: PresentationTarget
): sheets_v4.Schema$Request[] {
  const { sheetId, headers, range, startRow, rowCount } = target;
  const startRowIndex = startRow - 1;
  const endRowIndex = startRow - 1 + rowCount;
  const firstColumnIndex = columnIndex(range.start) - 1;

  const requests: sheets_v4.Schema$Request[] = [];

  for (const [offset, header] of headers.entries()) {
    const style = COLUMN_STYLES[header];
    if (style === undefined) {
      continue;
    }
    const column = firstColumnIndex + offset;

    requests.push(
      {
        repeatCell: {
          range: {
            sheetId,
            startRowIndex,
            endRowIndex,
            startColumnIndex: column,
            endColumnIndex: column + 1,
          },
          cell: {
            userEnteredFormat: {
              wrapStrategy: style.wrap,
              verticalAlignment: "TOP",
            },
          },
          fields: "userEnteredFormat(wrapStrategy,verticalAlignment)",
        },
      },
      {
        updateDimensionProperties: {
          range: {
            sheetId,
            dimension: "COLUMNS",
            startIndex: column,
            endIndex: column + 1,
          },
          properties: { pixelSize: style.widthPx },
          fields: "pixelSize",
        },
      }
    );
  }

  requests.push({
    updateDimensionProperties: {
      range: {
        sheetId,
        dimension: "ROWS",
        startIndex: startRowIndex,
        endIndex: endRowIndex,
      },
      properties: { pixelSize: ROW_HEIGHT_PX },
      fields: "pixelSize",
    },
  });

  return requests;
}
