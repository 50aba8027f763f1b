/**
 * Job definitions: one YAML entry per source database and destination tab.
 *
 * ```yaml
 * databases:
 *   - name: bot_main
 *     sheet_tab: Main
 *     use_ssh: true
 *     enrich: true
 * ```
 */

import { readFile } from "node:fs/promises";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse } from "yaml";

import { STANDARD_QUERY } from "../db/types.js";
import { ConfigValidationError, errorMessage } from "../errors.js";
import { columnSpan } from "../utils/columns.js";

import type { JobSpec } from "../types/index.js";
import type { Settings } from "./settings.js";

// ============================================================================
// Schema
// ============================================================================

export const JobEntrySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  sheet_tab: Type.String({ minLength: 1 }),
  column_range: Type.Optional(Type.String({ pattern: "^[A-Za-z]+:[A-Za-z]+$" })),
  start_row: Type.Optional(Type.Integer({ minimum: 1 })),
  clear_tail: Type.Optional(Type.Boolean()),
  use_ssh: Type.Optional(Type.Boolean()),
  enrich: Type.Optional(Type.Boolean()),
  query: Type.Optional(Type.String({ minLength: 1 })),
});

export const JobsFileSchema = Type.Object({
  databases: Type.Array(JobEntrySchema, { minItems: 1 }),
});

export type JobEntry = Static<typeof JobEntrySchema>;

export const DEFAULT_COLUMN_RANGE = "A:R";
export const ENRICHED_COLUMN_RANGE = "A:X";

// ============================================================================
// Parsing
// ============================================================================

function toJobSpec(entry: JobEntry, settings: Settings): JobSpec {
  const enrich = entry.enrich ?? false;
  const columnRange = (
    entry.column_range ??
    (enrich ? ENRICHED_COLUMN_RANGE : DEFAULT_COLUMN_RANGE)
  ).toUpperCase();

  return {
    name: entry.name,
    sheetTab: entry.sheet_tab,
    columnRange,
    columnSpan: columnSpan(columnRange),
    startRow: entry.start_row ?? 1,
    clearTail: entry.clear_tail ?? true,
    enrich,
    query: entry.query ?? STANDARD_QUERY,
    connection: { ...settings.database, database: entry.name },
    ...(entry.use_ssh === true && settings.ssh !== null
      ? { tunnel: settings.ssh }
      : {}),
  };
}

/**
 * Parse and validate job definitions from YAML text
 */
export function parseJobSpecs(yamlText: string, settings: Settings): JobSpec[] {
  let document: unknown;
  try {
    document = parse(yamlText);
  } catch (error) {
    throw new ConfigValidationError(
      `Invalid YAML in job definitions: ${errorMessage(error)}`
    );
  }

  if (!Value.Check(JobsFileSchema, document)) {
    const issues = [...Value.Errors(JobsFileSchema, document)].map(
      (error) => `${error.path === "" ? "/" : error.path}: ${error.message}`
    );
    throw new ConfigValidationError("Invalid job definitions", issues);
  }

  const issues: string[] = [];
  const names = new Set<string>();

  for (const entry of document.databases) {
    if (names.has(entry.name)) {
      issues.push(`${entry.name}: duplicate job name`);
    }
    names.add(entry.name);

    if (entry.use_ssh === true && settings.ssh === null) {
      issues.push(
        `${entry.name}: use_ssh requires SSH_HOST, SSH_USER and SSH_PASSWORD`
      );
    }
    if (entry.enrich === true && settings.partner.apiUrl === null) {
      issues.push(`${entry.name}: enrich requires PARTNER_API_URL`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigValidationError("Invalid job definitions", issues);
  }

  return document.databases.map((entry) => toJobSpec(entry, settings));
}

/**
 * Read job definitions from a YAML file
 */
export async function loadJobSpecs(
  path: string,
  settings: Settings
): Promise<JobSpec[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigValidationError(
      `Cannot read job definitions from ${path}: ${errorMessage(error)}`
    );
  }
  return parseJobSpecs(text, settings);
}
