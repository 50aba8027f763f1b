/**
 * JobRunner - one source database synchronized into one spreadsheet tab
 *
 * Stages run in order and the current one is tracked, so a failure reports
 * where it happened:
 * connecting → fetching → merging → enriching → writing → reporting → done
 */

import { setTimeout as delay } from "node:timers/promises";

import { errorMessage, JobFailedError } from "../../errors.js";
import { syncLogger, type Logger } from "../../logger.js";
import { formatGrid } from "../../sheets/format.js";
import { makeStatusLine } from "../../utils/dates.js";
import {
  timed,
  withRetry,
  type RetryOptions,
} from "../../utils/middleware.js";
import { clipToSpan, enrichDataset } from "../enrichment/merger.js";
import {
  appendHistoryColumns,
  mergeHistory,
  subjectIdsOf,
} from "../history/merger.js";

import type {
  Dataset,
  Destination,
  EnrichmentService,
  HistoryEvent,
  JobSpec,
  JobStage,
  Source,
  SourceFactory,
  StateRow,
  SyncOutcome,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface JobRunnerDeps {
  sourceFactory: SourceFactory;
  destination: Destination;
  /** Required for jobs that enrich */
  enrichment?: EnrichmentService | null;
  timezone: string;
  fetchWarnThresholdMs?: number;
  /** Soft delay after each job, plus uniform jitter */
  paceDelayMs?: number;
  paceJitterMs?: number;
  /** Overrides for the source connect retry policy */
  connectRetry?: RetryOptions;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
}

interface FetchedData {
  dataset: Dataset;
  subjectIds: number[];
  history: HistoryEvent[];
  states: StateRow[];
}

// ============================================================================
// Constants
// ============================================================================

const CONNECT_ATTEMPTS = 3;
const DEFAULT_FETCH_WARN_MS = 10_000;
const DEFAULT_PACE_DELAY_MS = 100;
const DEFAULT_PACE_JITTER_MS = 200;

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

// ============================================================================
// JobRunner
// ============================================================================

export class JobRunner {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(private readonly deps: JobRunnerDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one job to completion. Never throws; failures become a failed outcome.
   */
  async run(job: JobSpec): Promise<SyncOutcome> {
    const startTime = performance.now();
    const log = syncLogger.child({ job: job.name, tab: job.sheetTab });

    let stage: JobStage = "idle";
    let rowCount = 0;
    const enter = (next: JobStage): void => {
      log.debug({ from: stage, to: next }, "Stage transition");
      stage = next;
    };

    log.info("Job started");

    try {
      const dataset = await this.collect(job, enter, log);
      rowCount = dataset.rows.length;

      enter("enriching");
      const output = this.fit(job, await this.enrich(job, dataset, log), log);

      enter("writing");
      await this.deps.destination.write({
        tab: job.sheetTab,
        values: formatGrid(output),
        startRow: job.startRow,
        columnRange: job.columnRange,
        clearTail: job.clearTail,
      });

      enter("reporting");
      await this.deps.destination.writeStatus(
        job.sheetTab,
        makeStatusLine(job.sheetTab, rowCount, this.deps.timezone, this.now())
      );
      await this.pace();

      enter("done");
      const durationMs = Math.round(performance.now() - startTime);
      log.info({ rowCount, durationMs }, "Job completed");

      return {
        jobName: job.name,
        sheetTab: job.sheetTab,
        status: "succeeded",
        rowCount,
        error: null,
        failedStage: null,
        durationMs,
      };
    } catch (error) {
      const failedStage = stage;
      enter("failed");
      const durationMs = Math.round(performance.now() - startTime);
      log.error(
        { stage: failedStage, rowCount, durationMs, error: errorMessage(error) },
        "Job failed"
      );

      return {
        jobName: job.name,
        sheetTab: job.sheetTab,
        status: "failed",
        rowCount,
        error:
          error instanceof Error
            ? error
            : new JobFailedError(errorMessage(error)),
        failedStage,
        durationMs,
      };
    }
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  /**
   * Connect, fetch and merge history. The source is always disconnected.
   */
  private async collect(
    job: JobSpec,
    enter: (stage: JobStage) => void,
    log: Logger
  ): Promise<Dataset> {
    enter("connecting");
    const source = this.deps.sourceFactory(job);

    try {
      await withRetry(() => source.connect(), {
        name: `connect:${job.name}`,
        maxAttempts: CONNECT_ATTEMPTS,
        sleep: this.sleep,
        random: this.random,
        logger: log,
        ...this.deps.connectRetry,
      });

      enter("fetching");
      const fetched = await timed(`fetch:${job.name}`, {
        warnAfterMs: this.deps.fetchWarnThresholdMs ?? DEFAULT_FETCH_WARN_MS,
        logger: log,
      })(() => this.fetch(job, source))();

      enter("merging");
      const states = mergeHistory(
        fetched.subjectIds,
        fetched.history,
        fetched.states
      );
      return appendHistoryColumns(fetched.dataset, states);
    } finally {
      await this.disconnect(source, log);
    }
  }

  private async fetch(job: JobSpec, source: Source): Promise<FetchedData> {
    const dataset = await source.fetchRows(job.query);
    const subjectIds = subjectIdsOf(dataset);

    if (subjectIds.length === 0) {
      return { dataset, subjectIds, history: [], states: [] };
    }

    const [history, states] = await Promise.all([
      source.fetchHistory(subjectIds),
      source.fetchStates(subjectIds),
    ]);
    return { dataset, subjectIds, history, states };
  }

  private async enrich(
    job: JobSpec,
    dataset: Dataset,
    log: Logger
  ): Promise<Dataset> {
    if (!job.enrich) {
      return dataset;
    }

    const enrichment = this.deps.enrichment;
    if (enrichment === undefined || enrichment === null) {
      throw new JobFailedError(
        `Job ${job.name} requests enrichment but no partner API is configured`
      );
    }

    const subjectIds = subjectIdsOf(dataset);
    if (subjectIds.length === 0) {
      log.warn("No subject ids to enrich");
      return dataset;
    }

    const records = await enrichment.fetchRecords(subjectIds);
    if (records.length === 0) {
      log.warn("No records from partner API, writing rows without enrichment");
      return dataset;
    }

    log.info(
      { recordCount: records.length, rowCount: dataset.rows.length },
      "Merging partner records"
    );
    return enrichDataset(dataset, records, job.columnSpan);
  }

  /**
   * The write range ends at the job's last column
   */
  private fit(job: JobSpec, dataset: Dataset, log: Logger): Dataset {
    const fitted = clipToSpan(dataset, job.columnSpan);
    if (fitted !== dataset) {
      log.warn(
        {
          columnRange: job.columnRange,
          columnSpan: job.columnSpan,
          dropped: dataset.headers.slice(job.columnSpan),
        },
        "Dataset wider than the column range, dropping extra columns"
      );
    }
    return fitted;
  }

  private async disconnect(source: Source, log: Logger): Promise<void> {
    try {
      await source.disconnect();
    } catch (error) {
      log.warn({ error: errorMessage(error) }, "Error disconnecting source");
    }
  }

  private async pace(): Promise<void> {
    const base = this.deps.paceDelayMs ?? DEFAULT_PACE_DELAY_MS;
    const jitter = this.deps.paceJitterMs ?? DEFAULT_PACE_JITTER_MS;
    const ms = base + this.random() * jitter;
    if (ms > 0) {
      await this.sleep(ms);
    }
  }
}
