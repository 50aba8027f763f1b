/**
 * Enrichment Merger - joins source rows with partner API records by subject id
 *
 * The two trailing state columns appended by the history merger are moved
 * behind the enrichment columns, and every row is fitted to the job's column
 * span so the sheet always receives a rectangular grid.
 */

import { formatTimestamp, toSheetDate } from "../../utils/dates.js";
import { parseCourses, type CourseItem } from "../classifier/course-classifier.js";
import { toSubjectId } from "../history/merger.js";

import type {
  Dataset,
  EnrichmentRecord,
  Row,
  Scalar,
} from "../../types/index.js";

// ============================================================================
// Constants
// ============================================================================

export const ENRICHMENT_COLUMNS = [
  "utm_medium",
  "utm_source",
  "utm_campaign",
  "referer",
  "auth_date",
  "last_visit",
  "group",
  "courses",
  "lessons",
  "last_action_date",
  "max_funnel_action",
] as const;

/** Columns carried over from the history merge and re-appended at the end */
const TRAILING_STATE_COLUMNS = 2;

const MODULE_MARKER = /модуль|module/iu;
const LESSON_MARKER = /урок|lesson/iu;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Right-pad with empty cells or truncate to exactly `span` cells
 */
export function fitToSpan<T>(cells: readonly T[], span: number, filler: T): T[] {
  if (cells.length >= span) {
    return cells.slice(0, span);
  }
  return [...cells, ...new Array<T>(span - cells.length).fill(filler)];
}

/**
 * Truncate headers and rows wider than `span`. Narrower rows are kept as is.
 */
export function clipToSpan(dataset: Dataset, span: number): Dataset {
  if (
    dataset.headers.length <= span &&
    dataset.rows.every((row) => row.length <= span)
  ) {
    return dataset;
  }
  return {
    headers: dataset.headers.slice(0, span),
    rows: dataset.rows.map((row) => row.slice(0, span)),
  };
}

/**
 * Index records by subject id. On duplicate ids the last record wins.
 */
export function indexRecords(
  records: readonly EnrichmentRecord[]
): Map<number, EnrichmentRecord> {
  const lookup = new Map<number, EnrichmentRecord>();
  for (const record of records) {
    lookup.set(record.subjectId, record);
  }
  return lookup;
}

/**
 * Group memberships that are not lesson titles
 */
function groupText(groups: readonly string[]): string {
  return groups
    .filter((group) => !(MODULE_MARKER.test(group) && LESSON_MARKER.test(group)))
    .join("\n");
}

function courseItems(record: EnrichmentRecord): CourseItem[] {
  const items: CourseItem[] = [];
  if (Object.keys(record.courses).length > 0) {
    items.push(record.courses);
  }
  items.push(...record.lessons, ...record.groups);
  return items;
}

function lastActionText(value: Scalar | undefined): string {
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  if (typeof value === "string") {
    return toSheetDate(value);
  }
  return "";
}

function enrichRow(
  row: Row,
  record: EnrichmentRecord | undefined,
  columnSpan: number
): Row {
  const base = row.slice(0, Math.max(0, row.length - TRAILING_STATE_COLUMNS));
  const lastAction = lastActionText(row[row.length - 2]);
  const currentLabel = row[row.length - 1];
  const state = currentLabel === null || currentLabel === undefined ? "" : currentLabel;

  const parsed =
    record === undefined
      ? { tags: "", lessons: "" }
      : parseCourses(courseItems(record));

  const enriched: Row = [
    ...base,
    record?.acquisition.medium ?? "",
    record?.acquisition.source ?? "",
    record?.acquisition.campaign ?? "",
    record?.referrer ?? "",
    toSheetDate(record?.authorizedAt),
    toSheetDate(record?.lastVisitAt),
    record === undefined ? "" : groupText(record.groups),
    parsed.tags,
    parsed.lessons,
    lastAction,
    state,
  ];

  return fitToSpan<Scalar>(enriched, columnSpan, "");
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Merge partner records into a dataset carrying the history columns.
 * Rows without a record keep empty enrichment cells.
 */
export function enrichDataset(
  dataset: Dataset,
  records: readonly EnrichmentRecord[],
  columnSpan: number
): Dataset {
  const lookup = indexRecords(records);

  const headers = fitToSpan(
    [
      ...dataset.headers.slice(
        0,
        Math.max(0, dataset.headers.length - TRAILING_STATE_COLUMNS)
      ),
      ...ENRICHMENT_COLUMNS,
    ],
    columnSpan,
    ""
  );

  const rows = dataset.rows.map((row) => {
    const id = toSubjectId(row[0]);
    return enrichRow(row, id === null ? undefined : lookup.get(id), columnSpan);
  });

  return { headers, rows };
}
