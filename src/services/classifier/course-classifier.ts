/**
 * Course Classifier - maps free-text course/lesson titles to tags like "MTT2"
 *
 * Titles come from the partner API in Latin and Cyrillic spellings. A tag is
 * the course family plus its module number, resolved in this order:
 * 1. an explicit "module N" / "модуль N" marker
 * 2. the first integer in the text
 * 3. an ordinal word ("first", "продвинут", ...)
 * 4. module 1
 */

import { logger } from "../../logger.js";
import { joinWithinLimit } from "../../utils/truncate.js";

// ============================================================================
// Types
// ============================================================================

/** A course map (course name → lesson titles) or a bare title */
export type CourseItem = Record<string, unknown> | string | null | undefined;

export interface ParsedCourses {
  /** Sorted unique tags, newline-joined */
  tags: string;
  /** Sorted lesson titles, newline-joined and size-bounded */
  lessons: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Marker → family, checked in order; the first marker found wins */
const FAMILY_MARKERS: readonly (readonly [string, string])[] = [
  ["MTT", "MTT"],
  ["МТТ", "MTT"],
  ["SPIN", "SPIN"],
  ["СПИН", "SPIN"],
  ["CASH", "CASH"],
  ["КЭШ", "CASH"],
  ["КЕШ", "CASH"],
];

/** Ordinal word stems → module number, checked in order */
const ORDINAL_WORDS: readonly (readonly [string, string])[] = [
  ["ПЕРВЫЙ", "1"],
  ["FIRST", "1"],
  ["BEGINNER", "1"],
  ["НАЧИНАЮЩ", "1"],
  ["ОСНОВ", "1"],
  ["ВТОРОЙ", "2"],
  ["SECOND", "2"],
  ["MIDDLE", "2"],
  ["INTERMEDIATE", "2"],
  ["СРЕДН", "2"],
  ["ТРЕТИЙ", "3"],
  ["THIRD", "3"],
  ["ADVANCED", "3"],
  ["ПРОДВИНУТ", "3"],
  ["ЧЕТВЕРТЫЙ", "4"],
  ["FOURTH", "4"],
  ["PRO", "4"],
  ["ПРОФЕСС", "4"],
];

const MODULE_NUMBER = /(?:МОДУЛЬ|MODULE)\s*(\d+)/u;
const LESSON_NUMBER = /(?:УРОК|LESSON)\s*(\d+)/u;
const ANY_NUMBER = /\d+/u;
const LESSON_TITLE_MARKER = /модуль|урок|module|lesson/iu;

export const LESSONS_MAX_CHARS = 45_000;
const LESSONS_WINDOW_THRESHOLD = 60;
const LESSONS_WINDOW_SIZE = 30;

const MISSING_NUMBER = 999;
const CACHE_SIZE = 256;

// ============================================================================
// Classification
// ============================================================================

const cache = new Map<string, string | null>();

function detectFamily(upper: string): string | null {
  for (const [marker, family] of FAMILY_MARKERS) {
    if (upper.includes(marker)) {
      return family;
    }
  }
  return null;
}

function resolveTag(text: string): string | null {
  const upper = text.toUpperCase();
  const family = detectFamily(upper);
  if (family === null) {
    return null;
  }

  const moduleMatch = MODULE_NUMBER.exec(upper);
  if (moduleMatch?.[1] !== undefined) {
    return `${family}${moduleMatch[1]}`;
  }

  const numberMatch = ANY_NUMBER.exec(text);
  if (numberMatch) {
    return `${family}${numberMatch[0]}`;
  }

  for (const [word, digit] of ORDINAL_WORDS) {
    if (upper.includes(word)) {
      return `${family}${digit}`;
    }
  }

  return `${family}1`;
}

/**
 * Classify a course or lesson title. Returns null when no family marker is present.
 *
 * Memoized: the partner API repeats a small vocabulary across thousands of users.
 */
export function classify(text: string): string | null {
  if (text === "") {
    return null;
  }

  const cached = cache.get(text);
  if (cached !== undefined) {
    // Refresh recency
    cache.delete(text);
    cache.set(text, cached);
    return cached;
  }

  const tag = resolveTag(text);
  cache.set(text, tag);
  if (cache.size > CACHE_SIZE) {
    const oldest = cache.keys().next();
    if (oldest.done !== true) {
      cache.delete(oldest.value);
    }
  }
  return tag;
}

export function classifierCacheSize(): number {
  return cache.size;
}

export function clearClassifierCache(): void {
  cache.clear();
}

// ============================================================================
// Lesson ordering
// ============================================================================

interface LessonSortKey {
  family: string | null;
  module: number;
  lesson: number;
}

function lessonSortKey(title: string): LessonSortKey {
  const upper = title.toUpperCase();
  const moduleMatch = MODULE_NUMBER.exec(upper);
  const lessonMatch = LESSON_NUMBER.exec(upper);

  return {
    family: detectFamily(upper),
    module:
      moduleMatch?.[1] !== undefined
        ? Number.parseInt(moduleMatch[1], 10)
        : MISSING_NUMBER,
    lesson:
      lessonMatch?.[1] !== undefined
        ? Number.parseInt(lessonMatch[1], 10)
        : MISSING_NUMBER,
  };
}

function compareKeys(a: LessonSortKey, b: LessonSortKey): number {
  if (a.family !== b.family) {
    if (a.family === null) return 1;
    if (b.family === null) return -1;
    return a.family < b.family ? -1 : 1;
  }
  return a.module - b.module || a.lesson - b.lesson;
}

/**
 * Order lessons by family, module, then lesson number.
 * On any failure the input order is returned.
 */
export function sortLessons(lessons: readonly string[]): string[] {
  try {
    return lessons
      .map((title, index) => ({ title, index, key: lessonSortKey(title) }))
      .sort((a, b) => compareKeys(a.key, b.key) || a.index - b.index)
      .map((entry) => entry.title);
  } catch (error) {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Failed to sort lessons, keeping original order"
    );
    return [...lessons];
  }
}

// ============================================================================
// Parsing
// ============================================================================

function collectCourseMap(
  courses: Record<string, unknown>,
  tags: Set<string>,
  lessons: string[]
): void {
  for (const [courseName, courseLessons] of Object.entries(courses)) {
    const courseTag = classify(courseName);
    if (courseTag !== null) {
      tags.add(courseTag);
    }

    if (!Array.isArray(courseLessons)) {
      continue;
    }

    for (const lesson of courseLessons) {
      if (lesson === null || lesson === undefined || lesson === "") {
        continue;
      }
      const title = String(lesson);
      lessons.push(title);

      const lessonTag = classify(title);
      if (lessonTag !== null) {
        tags.add(lessonTag);
      }
    }
  }
}

function collectTitle(title: string, tags: Set<string>, lessons: string[]): void {
  const tag = classify(title);
  if (tag !== null) {
    tags.add(tag);
  }
  if (LESSON_TITLE_MARKER.test(title)) {
    lessons.push(title);
  }
}

/**
 * Build the tag and lesson cells from course maps and bare titles
 */
export function parseCourses(items: readonly CourseItem[]): ParsedCourses {
  const tags = new Set<string>();
  const lessons: string[] = [];

  for (const item of items) {
    if (typeof item === "string") {
      collectTitle(item, tags, lessons);
    } else if (item !== null && item !== undefined && !Array.isArray(item)) {
      collectCourseMap(item, tags, lessons);
    }
  }

  return {
    tags: [...tags].sort().join("\n"),
    lessons: joinWithinLimit(sortLessons(lessons), {
      maxChars: LESSONS_MAX_CHARS,
      windowThreshold: LESSONS_WINDOW_THRESHOLD,
      headCount: LESSONS_WINDOW_SIZE,
      tailCount: LESSONS_WINDOW_SIZE,
      skippedMarker: (skipped) => `... [${String(skipped)} lessons skipped] ...`,
    }),
  };
}
