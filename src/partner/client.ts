import { Value } from "@sinclair/typebox/value";

import { errorMessage, HttpStatusError, PartialDataError } from "../errors.js";
import { partnerLogger } from "../logger.js";
import { chunk, mapSettled } from "../utils/concurrency.js";
import { compose, retry, timed, type RetryOptions } from "../utils/middleware.js";
import {
  PartnerUserSchema,
  PartnerUsersResponseSchema,
  type PartnerUser,
} from "./schemas.js";

import type { EnrichmentRecord, EnrichmentService } from "../types/index.js";

export interface PartnerApiClientOptions {
  /** Endpoint accepting POST {"users": [ids]} */
  apiUrl: string;
  timeoutMs?: number;
  /** Subject ids per request */
  batchSize?: number;
  /** Requests in flight at once */
  maxConnections?: number;
  /** Retry policy per batch */
  retry?: RetryOptions;
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_MAX_CONNECTIONS = 10;
const SLOW_REQUEST_MS = 5000;

function listOf(value: string | unknown[] | null | undefined): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.filter(
    (item): item is string => typeof item === "string" && item !== ""
  );
}

function courseMapOf(
  courses: PartnerUser["courses"]
): Record<string, string[]> {
  if (courses === null || courses === undefined || Array.isArray(courses)) {
    return {};
  }
  const cleaned: Record<string, string[]> = {};
  for (const [course, lessons] of Object.entries(courses)) {
    cleaned[course] = Array.isArray(lessons) ? listOf(lessons) : [];
  }
  return cleaned;
}

/**
 * Convert a validated partner payload into the pipeline's record shape
 */
export function toEnrichmentRecord(user: PartnerUser): EnrichmentRecord {
  return {
    subjectId: Number(user.tg_id),
    referrer: user.referer ?? "",
    acquisition: {
      medium: user.utm?.utm_medium ?? "",
      source: user.utm?.utm_source ?? "",
      campaign: user.utm?.utm_campaign ?? "",
    },
    authorizedAt: user.authorization_date ?? "",
    lastVisitAt: user.last_visit_date ?? "",
    groups: listOf(user.group),
    courses: courseMapOf(user.courses),
    lessons: listOf(user.lessons),
  };
}

/**
 * HTTP client for the partner user API.
 *
 * Subject ids are sent in fixed-size batches, several batches in flight at
 * once. A batch that still fails after its retries is logged and skipped, so
 * the job continues with the records that did arrive.
 */
export class PartnerApiClient implements EnrichmentService {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly batchSize: number;
  private readonly maxConnections: number;
  private readonly retryOptions: RetryOptions;
  private readonly fetchFn: typeof fetch;

  constructor(options: PartnerApiClientOptions) {
    this.apiUrl = options.apiUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxConnections = options.maxConnections ?? DEFAULT_MAX_CONNECTIONS;
    this.retryOptions = {
      maxAttempts: 3,
      baseDelayMs: 2000,
      logger: partnerLogger,
      ...options.retry,
    };
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  /**
   * Fetch partner records for the given subject ids
   */
  async fetchRecords(
    subjectIds: readonly number[]
  ): Promise<EnrichmentRecord[]> {
    if (subjectIds.length === 0) {
      partnerLogger.warn("No subject ids provided to partner API");
      return [];
    }

    const batches = chunk(subjectIds, this.batchSize);
    partnerLogger.info(
      { subjectCount: subjectIds.length, batchCount: batches.length },
      "Fetching partner records"
    );

    const fetchBatch = compose(
      retry({ name: "partner-batch", ...this.retryOptions }),
      timed("partner-batch", {
        warnAfterMs: SLOW_REQUEST_MS,
        logger: partnerLogger,
      })
    );

    const results = await mapSettled(batches, this.maxConnections, (batch) =>
      fetchBatch(() => this.postUsers(batch))()
    );

    const records: EnrichmentRecord[] = [];
    let failedBatches = 0;

    for (const [index, result] of results.entries()) {
      if (result.status === "fulfilled") {
        records.push(...this.toRecords(result.value));
      } else {
        failedBatches++;
        partnerLogger.error(
          { batch: index, error: errorMessage(result.reason) },
          "Partner batch request failed"
        );
      }
    }

    partnerLogger.info(
      { recordCount: records.length, failedBatches },
      "Fetched partner records"
    );

    return records;
  }

  /**
   * Liveness probe: the API answers an empty batch with an array
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.postUsers([]);
      return true;
    } catch (error) {
      partnerLogger.error(
        { error: errorMessage(error) },
        "Partner API health check failed"
      );
      return false;
    }
  }

  private async postUsers(subjectIds: readonly number[]): Promise<unknown[]> {
    partnerLogger.debug(
      { url: this.apiUrl, batchSize: subjectIds.length },
      "Sending request to partner API"
    );

    const response = await this.fetchFn(this.apiUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify({ users: subjectIds }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new HttpStatusError(
        response.status,
        response.statusText,
        this.apiUrl
      );
    }

    const body: unknown = await response.json();
    if (!Value.Check(PartnerUsersResponseSchema, body)) {
      throw new PartialDataError(
        `Partner API returned ${typeof body} instead of a user list`
      );
    }
    return body;
  }

  private toRecords(payload: readonly unknown[]): EnrichmentRecord[] {
    const records: EnrichmentRecord[] = [];
    for (const item of payload) {
      if (Value.Check(PartnerUserSchema, item)) {
        records.push(toEnrichmentRecord(item));
        continue;
      }
      const firstError = Value.Errors(PartnerUserSchema, item).First();
      partnerLogger.warn(
        {
          path: firstError?.path,
          message: firstError?.message,
        },
        "Dropping invalid partner record"
      );
    }
    return records;
  }
}
