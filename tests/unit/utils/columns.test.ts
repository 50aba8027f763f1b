import { describe, it, expect } from "vitest";

import { ConfigValidationError } from "../../../src/errors.js";
import {
  a1Range,
  columnIndex,
  columnLetter,
  columnSpan,
  parseColumnRange,
  quoteTab,
} from "../../../src/utils/columns.js";

describe("utils/columns", () => {
  describe("columnLetter", () => {
    it("should convert single-letter columns", () => {
      expect(columnLetter(1)).toBe("A");
      expect(columnLetter(18)).toBe("R");
      expect(columnLetter(26)).toBe("Z");
    });

    it("should convert multi-letter columns", () => {
      expect(columnLetter(27)).toBe("AA");
      expect(columnLetter(52)).toBe("AZ");
      expect(columnLetter(53)).toBe("BA");
    });

    it("should return empty string for zero", () => {
      expect(columnLetter(0)).toBe("");
    });
  });

  describe("columnIndex", () => {
    it("should convert letters to 1-based indexes", () => {
      expect(columnIndex("A")).toBe(1);
      expect(columnIndex("R")).toBe(18);
      expect(columnIndex("X")).toBe(24);
      expect(columnIndex("AA")).toBe(27);
    });

    it("should be case-insensitive", () => {
      expect(columnIndex("ax")).toBe(50);
    });
  });

  describe("parseColumnRange", () => {
    it("should parse and upper-case a range", () => {
      expect(parseColumnRange("a:r")).toEqual({ start: "A", end: "R" });
      expect(parseColumnRange(" A:X ")).toEqual({ start: "A", end: "X" });
    });

    it("should reject malformed ranges", () => {
      expect(() => parseColumnRange("A-R")).toThrow(ConfigValidationError);
      expect(() => parseColumnRange("A-R")).toThrow(
        "Column range must be in format 'A:Z', got 'A-R'"
      );
      expect(() => parseColumnRange("A1:R")).toThrow(ConfigValidationError);
    });

    it("should reject ranges that end before they start", () => {
      expect(() => parseColumnRange("R:A")).toThrow(
        "Column range 'R:A' ends before it starts"
      );
    });
  });

  describe("columnSpan", () => {
    it("should count the columns of a range", () => {
      expect(columnSpan("A:R")).toBe(18);
      expect(columnSpan("A:X")).toBe(24);
      expect(columnSpan("C:E")).toBe(3);
      expect(columnSpan("B:B")).toBe(1);
    });
  });

  describe("quoteTab", () => {
    it("should quote tab names and double embedded quotes", () => {
      expect(quoteTab("Main")).toBe("'Main'");
      expect(quoteTab("It's")).toBe("'It''s'");
    });
  });

  describe("a1Range", () => {
    const range = { start: "A", end: "R" };

    it("should build an open-ended range", () => {
      expect(a1Range("Main", range, 5)).toBe("'Main'!A5:R");
    });

    it("should build a bounded range", () => {
      expect(a1Range("Main", range, 5, 10)).toBe("'Main'!A5:R10");
    });

    it("should quote tab names with spaces and quotes", () => {
      expect(a1Range("Bob's bot", range, 1)).toBe("'Bob''s bot'!A1:R");
    });
  });
});
