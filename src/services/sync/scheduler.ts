/**
 * SyncScheduler - runs every job concurrently on a fixed interval
 *
 * A failed job is logged and counted; it never stops its siblings or the
 * loop. `stop()` interrupts the wait between iterations and lets jobs that
 * are already running finish.
 */

import { setTimeout as delay } from "node:timers/promises";

import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type {
  Destination,
  IterationSummary,
  JobSpec,
  SyncOutcome,
} from "../../types/index.js";
import type { JobRunner } from "./job-runner.js";

// ============================================================================
// Types
// ============================================================================

export type SchedulerState =
  | "initializing"
  | "running"
  | "shutting-down"
  | "stopped";

export interface SyncSchedulerOptions {
  /** Called once by `start()` */
  loadJobs: () => Promise<JobSpec[]>;
  destination: Destination;
  runner: Pick<JobRunner, "run">;
  intervalMs: number;
  onIteration?: (summary: IterationSummary) => void;
}

export interface SchedulerStatus {
  state: SchedulerState;
  jobCount: number;
  iterations: number;
  nextRunAt: Date | null;
  lastSummary: IterationSummary | null;
}

// ============================================================================
// SyncScheduler
// ============================================================================

export class SyncScheduler {
  private state: SchedulerState = "initializing";
  private jobs: JobSpec[] = [];
  private iterations = 0;
  private summary: IterationSummary | null = null;
  private nextRunAt: Date | null = null;
  private readonly abort = new AbortController();

  constructor(private readonly options: SyncSchedulerOptions) {}

  get currentState(): SchedulerState {
    return this.state;
  }

  get lastSummary(): IterationSummary | null {
    return this.summary;
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      jobCount: this.jobs.length,
      iterations: this.iterations,
      nextRunAt: this.nextRunAt,
      lastSummary: this.summary,
    };
  }

  /**
   * Load jobs and connect the destination once
   */
  async initialize(): Promise<JobSpec[]> {
    this.jobs = await this.options.loadJobs();
    await this.options.destination.connect();
    syncLogger.info({ jobCount: this.jobs.length }, "Scheduler initialized");
    return this.jobs;
  }

  /**
   * Run iterations until `stop()` is called. Resolves once stopped.
   */
  async start(): Promise<void> {
    if (this.state !== "initializing") {
      throw new Error(`Scheduler cannot start from state '${this.state}'`);
    }

    try {
      await this.initialize();
    } catch (error) {
      this.state = "stopped";
      throw error;
    }

    if (this.abort.signal.aborted) {
      this.state = "stopped";
      return;
    }
    this.state = "running";
    syncLogger.info(
      { intervalMs: this.options.intervalMs },
      "Scheduler started"
    );

    while (!this.abort.signal.aborted) {
      await this.runIteration();
      if (this.abort.signal.aborted) {
        break;
      }
      await this.wait(this.options.intervalMs);
    }

    this.nextRunAt = null;
    this.state = "stopped";
    syncLogger.info({ iterations: this.iterations }, "Scheduler stopped");
  }

  /**
   * Request shutdown. In-flight jobs complete; no new iteration starts.
   */
  stop(): void {
    if (this.state === "stopped" || this.abort.signal.aborted) {
      return;
    }
    if (this.state === "running") {
      this.state = "shutting-down";
    }
    syncLogger.info("Scheduler shutdown requested");
    this.abort.abort();
  }

  /**
   * Run every loaded job concurrently and aggregate the outcomes
   */
  async runIteration(): Promise<IterationSummary> {
    const iteration = ++this.iterations;
    const startedAt = new Date();
    const startTime = performance.now();

    syncLogger.info(
      { iteration, jobCount: this.jobs.length },
      "Starting sync iteration"
    );

    const outcomes = await Promise.all(
      this.jobs.map((job) => this.runJob(job))
    );

    const failures = outcomes.filter((outcome) => outcome.status === "failed");
    for (const failure of failures) {
      syncLogger.error(
        {
          iteration,
          job: failure.jobName,
          tab: failure.sheetTab,
          stage: failure.failedStage,
          error: failure.error?.message,
        },
        "Job failed in iteration"
      );
    }

    const summary: IterationSummary = {
      iteration,
      startedAt,
      durationMs: Math.round(performance.now() - startTime),
      succeeded: outcomes.length - failures.length,
      failed: failures.length,
      outcomes,
    };
    this.summary = summary;

    syncLogger.info(
      {
        iteration,
        succeeded: summary.succeeded,
        failed: summary.failed,
        durationMs: summary.durationMs,
      },
      "Sync iteration completed"
    );

    this.options.onIteration?.(summary);
    return summary;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * The runner already converts errors into outcomes; anything escaping it
   * is still confined to its own job.
   */
  private async runJob(job: JobSpec): Promise<SyncOutcome> {
    try {
      return await this.options.runner.run(job);
    } catch (error) {
      return {
        jobName: job.name,
        sheetTab: job.sheetTab,
        status: "failed",
        rowCount: 0,
        error: error instanceof Error ? error : new Error(errorMessage(error)),
        failedStage: null,
        durationMs: 0,
      };
    }
  }

  private async wait(ms: number): Promise<void> {
    this.nextRunAt = new Date(Date.now() + ms);
    syncLogger.info(
      { nextRunAt: this.nextRunAt.toISOString() },
      "Waiting for next iteration"
    );
    try {
      await delay(ms, undefined, { signal: this.abort.signal });
    } catch (error) {
      if (!this.abort.signal.aborted) {
        throw error;
      }
    }
  }
}
