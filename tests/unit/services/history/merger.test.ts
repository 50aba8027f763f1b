import { describe, it, expect } from "vitest";

import {
  appendHistoryColumns,
  formatHistory,
  HISTORY_COLUMNS,
  mergeHistory,
  subjectIdsOf,
  toSubjectId,
} from "../../../../src/services/history/merger.js";
import { T1, T2, createUsersDataset } from "../../../fixtures/jobs.js";

import type {
  HistoryEvent,
  StateRow,
  SubjectState,
} from "../../../../src/types/index.js";

const HISTORY: HistoryEvent[] = [
  { subjectId: 1, label: "b", timestamp: T2 },
  { subjectId: 1, label: "a", timestamp: T1 },
];

const STATES: StateRow[] = [
  { subjectId: 1, label: "first", timestamp: T1 },
  { subjectId: 1, label: "latest", timestamp: T2 },
];

describe("services/history/merger", () => {
  describe("mergeHistory", () => {
    it("should sort history and pick the latest state label", () => {
      const states = mergeHistory([1, 2], HISTORY, STATES);

      expect(states.get(1)).toEqual({
        subjectId: 1,
        history: [
          { subjectId: 1, label: "a", timestamp: T1 },
          { subjectId: 1, label: "b", timestamp: T2 },
        ],
        lastEventTime: T2,
        currentLabel: "latest",
      });
    });

    it("should create empty states for subjects without data", () => {
      const states = mergeHistory([1, 2], HISTORY, STATES);

      expect(states.get(2)).toEqual({
        subjectId: 2,
        history: [],
        lastEventTime: null,
        currentLabel: "",
      });
    });

    it("should include subjects only present in history or states", () => {
      const states = mergeHistory(
        [],
        [{ subjectId: 5, label: "x", timestamp: T1 }],
        [{ subjectId: 6, label: "y", timestamp: null }]
      );

      expect([...states.keys()]).toEqual([5, 6]);
      expect(states.get(6)?.currentLabel).toBe("y");
    });

    it("should keep the first label when timestamps cannot be compared", () => {
      const states = mergeHistory(
        [3],
        [],
        [
          { subjectId: 3, label: "undated", timestamp: null },
          { subjectId: 3, label: "dated", timestamp: T2 },
        ]
      );

      expect(states.get(3)?.currentLabel).toBe("undated");
    });
  });

  describe("formatHistory", () => {
    it("should render one bracketed line per event", () => {
      const state = mergeHistory([1], HISTORY, []).get(1);
      expect(state).toBeDefined();
      if (state === undefined) return;

      expect(formatHistory(state)).toBe(
        "[2024-01-01 10:00:00 - a]\n[2024-01-02 11:30:00 - b]"
      );
    });

    it("should window long histories around a count marker", () => {
      const state: SubjectState = {
        subjectId: 1,
        history: Array.from({ length: 250 }, () => ({
          subjectId: 1,
          label: "e",
          timestamp: T1,
        })),
        lastEventTime: T1,
        currentLabel: "",
      };

      const lines = formatHistory(state, 6000).split("\n");

      expect(lines).toHaveLength(201);
      expect(lines[0]).toBe("[2024-01-01 10:00:00 - e]");
      expect(lines[100]).toBe("[...50 entries...]");
      expect(lines[200]).toBe("[2024-01-01 10:00:00 - e]");
    });

    it("should return an empty string for no events", () => {
      expect(
        formatHistory({
          subjectId: 1,
          history: [],
          lastEventTime: null,
          currentLabel: "",
        })
      ).toBe("");
    });
  });

  describe("appendHistoryColumns", () => {
    it("should append history, last action and label to every row", () => {
      const dataset = createUsersDataset();
      dataset.rows.push([null, "ghost"]);
      const states = mergeHistory([1, 2], HISTORY, STATES);

      const result = appendHistoryColumns(dataset, states);

      expect(result.headers).toEqual(["id", "username", ...HISTORY_COLUMNS]);
      expect(result.rows).toEqual([
        [
          1,
          "ann",
          "[2024-01-01 10:00:00 - a]\n[2024-01-02 11:30:00 - b]",
          T2,
          "latest",
        ],
        [2, "bob", "", null, ""],
        [null, "ghost", "", null, ""],
      ]);
    });
  });

  describe("subjectIdsOf", () => {
    it("should collect numeric ids from the first column", () => {
      const ids = subjectIdsOf({
        headers: ["id"],
        rows: [[1], ["2"], [" 3 "], [null], ["abc"], [4n], [""]],
      });

      expect(ids).toEqual([1, 2, 3, 4]);
    });
  });

  describe("toSubjectId", () => {
    it("should reject non-integer values", () => {
      expect(toSubjectId(Number.NaN)).toBeNull();
      expect(toSubjectId("1.5")).toBeNull();
      expect(toSubjectId(true)).toBeNull();
      expect(toSubjectId("-7")).toBe(-7);
    });
  });
});
