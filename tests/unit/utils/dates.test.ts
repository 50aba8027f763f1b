import { describe, it, expect } from "vitest";

import {
  formatTimestamp,
  makeStatusLine,
  nowInTimezone,
  toSheetDate,
} from "../../../src/utils/dates.js";

const NOON_UTC = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));

describe("utils/dates", () => {
  describe("formatTimestamp", () => {
    it("should format local wall-clock fields with zero padding", () => {
      expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe(
        "2024-01-05 09:03:07"
      );
    });

    it("should format end of day", () => {
      expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 59))).toBe(
        "2023-12-31 23:59:59"
      );
    });
  });

  describe("toSheetDate", () => {
    it("should reformat UTC ISO timestamps", () => {
      expect(toSheetDate("2024-03-15T10:20:30Z")).toBe("2024-03-15 10:20:30");
    });

    it("should keep wall-clock time and drop offsets and fractions", () => {
      expect(toSheetDate("2024-03-15T10:20:30.123+03:00")).toBe(
        "2024-03-15 10:20:30"
      );
    });

    it("should fill missing time parts with zeros", () => {
      expect(toSheetDate("2024-03-15")).toBe("2024-03-15 00:00:00");
      expect(toSheetDate("2024-03-15 10:20")).toBe("2024-03-15 10:20:00");
    });

    it("should pass non-ISO text through unchanged", () => {
      expect(toSheetDate("yesterday")).toBe("yesterday");
      expect(toSheetDate("15.03.2024")).toBe("15.03.2024");
    });

    it("should return empty string for empty values", () => {
      expect(toSheetDate(null)).toBe("");
      expect(toSheetDate(undefined)).toBe("");
      expect(toSheetDate("")).toBe("");
    });
  });

  describe("nowInTimezone", () => {
    it("should render the time in the given timezone", () => {
      expect(nowInTimezone("UTC", NOON_UTC)).toBe("2024-06-01 12:00:00");
      expect(nowInTimezone("Europe/Moscow", NOON_UTC)).toBe(
        "2024-06-01 15:00:00"
      );
    });

    it("should fall back to local time for unknown timezones", () => {
      expect(nowInTimezone("Not/AZone", NOON_UTC)).toBe(
        formatTimestamp(NOON_UTC)
      );
    });
  });

  describe("makeStatusLine", () => {
    it("should combine time, tab and record count", () => {
      expect(makeStatusLine("Main", 42, "UTC", NOON_UTC)).toBe(
        "2024-06-01 12:00:00 | Main | records: 42"
      );
    });
  });
});
