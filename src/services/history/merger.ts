/**
 * Event-History Merger - joins funnel history and current state per subject
 */

import { formatTimestamp } from "../../utils/dates.js";
import { joinWithinLimit } from "../../utils/truncate.js";

import type {
  Dataset,
  HistoryEvent,
  StateRow,
  SubjectState,
} from "../../types/index.js";

// ============================================================================
// Constants
// ============================================================================

export const HISTORY_MAX_CHARS = 40_000;
const HISTORY_WINDOW_THRESHOLD = 200;
const HISTORY_WINDOW_SIZE = 100;

export const HISTORY_COLUMNS = [
  "funnel_history",
  "last_action_date",
  "max_funnel_action",
] as const;

// ============================================================================
// Merge
// ============================================================================

function emptyState(subjectId: number): SubjectState {
  return { subjectId, history: [], lastEventTime: null, currentLabel: "" };
}

/**
 * Build one SubjectState per subject id found in any input.
 *
 * History ends up ascending by timestamp; the current label comes from the
 * state row with the latest timestamp (the first row when it cannot be told).
 */
export function mergeHistory(
  subjectIds: readonly number[],
  historyRows: readonly HistoryEvent[],
  stateRows: readonly StateRow[]
): Map<number, SubjectState> {
  const states = new Map<number, SubjectState>();

  const stateFor = (subjectId: number): SubjectState => {
    let state = states.get(subjectId);
    if (state === undefined) {
      state = emptyState(subjectId);
      states.set(subjectId, state);
    }
    return state;
  };

  for (const subjectId of subjectIds) {
    stateFor(subjectId);
  }

  for (const event of historyRows) {
    const state = stateFor(event.subjectId);
    state.history.push(event);
    if (
      state.lastEventTime === null ||
      event.timestamp.getTime() > state.lastEventTime.getTime()
    ) {
      state.lastEventTime = event.timestamp;
    }
  }

  const labelTimes = new Map<number, Date | null>();
  for (const row of stateRows) {
    const state = stateFor(row.subjectId);
    if (!labelTimes.has(row.subjectId)) {
      state.currentLabel = row.label;
      labelTimes.set(row.subjectId, row.timestamp);
      continue;
    }

    const seen = labelTimes.get(row.subjectId) ?? null;
    if (
      seen !== null &&
      row.timestamp !== null &&
      row.timestamp.getTime() > seen.getTime()
    ) {
      state.currentLabel = row.label;
      labelTimes.set(row.subjectId, row.timestamp);
    }
  }

  for (const state of states.values()) {
    if (state.history.length > 1) {
      // Stable: events sharing a timestamp keep their input order
      state.history.sort(
        (a, b) => a.timestamp.getTime() - b.timestamp.getTime()
      );
    }
  }

  return states;
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render history as "[timestamp - label]" lines, at most `maxChars` long
 */
export function formatHistory(
  state: SubjectState,
  maxChars: number = HISTORY_MAX_CHARS
): string {
  const entries = state.history.map(
    (event) => `[${formatTimestamp(event.timestamp)} - ${event.label}]`
  );

  return joinWithinLimit(entries, {
    maxChars,
    windowThreshold: HISTORY_WINDOW_THRESHOLD,
    headCount: HISTORY_WINDOW_SIZE,
    tailCount: HISTORY_WINDOW_SIZE,
    skippedMarker: (skipped) => `[...${String(skipped)} entries...]`,
  });
}

/**
 * Extract numeric subject ids from the first column, skipping empty cells
 */
export function subjectIdsOf(dataset: Dataset): number[] {
  const ids: number[] = [];
  for (const row of dataset.rows) {
    const id = toSubjectId(row[0]);
    if (id !== null) {
      ids.push(id);
    }
  }
  return ids;
}

export function toSubjectId(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  return null;
}

/**
 * Append rendered history, last event time and current label to every row
 */
export function appendHistoryColumns(
  dataset: Dataset,
  states: ReadonlyMap<number, SubjectState>,
  maxChars: number = HISTORY_MAX_CHARS
): Dataset {
  return {
    headers: [...dataset.headers, ...HISTORY_COLUMNS],
    rows: dataset.rows.map((row) => {
      const id = toSubjectId(row[0]);
      const state = id === null ? undefined : states.get(id);
      if (state === undefined) {
        return [...row, "", null, ""];
      }
      return [
        ...row,
        formatHistory(state, maxChars),
        state.lastEventTime,
        state.currentLabel,
      ];
    }),
  };
}
