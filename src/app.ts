/**
 * Explicit wiring: every component is built here in dependency order
 */

import { loadJobSpecs } from "./config/jobs.js";
import { createPostgresSource } from "./db/connection.js";
import { PartnerApiClient } from "./partner/client.js";
import { JobRunner, SyncScheduler } from "./services/sync/index.js";
import { GoogleSheetsDestination } from "./sheets/client.js";

import type { Settings } from "./config/settings.js";
import type {
  Destination,
  EnrichmentService,
  IterationSummary,
  JobSpec,
  SourceFactory,
} from "./types/index.js";

export interface App {
  settings: Settings;
  destination: Destination;
  enrichment: EnrichmentService | null;
  runner: JobRunner;
  scheduler: SyncScheduler;
}

export interface AppOptions {
  /** Defaults to reading `settings.jobsFile` */
  loadJobs?: () => Promise<JobSpec[]>;
  sourceFactory?: SourceFactory;
  destination?: Destination;
  enrichment?: EnrichmentService | null;
  onIteration?: (summary: IterationSummary) => void;
}

export function createEnrichment(settings: Settings): EnrichmentService | null {
  const { apiUrl, timeoutMs, batchSize, maxConnections } = settings.partner;
  if (apiUrl === null) {
    return null;
  }
  return new PartnerApiClient({ apiUrl, timeoutMs, batchSize, maxConnections });
}

export function createApp(settings: Settings, options: AppOptions = {}): App {
  const destination =
    options.destination ??
    new GoogleSheetsDestination({
      spreadsheetUrl: settings.spreadsheetUrl,
      serviceAccountFile: settings.serviceAccountFile,
    });

  const enrichment =
    options.enrichment === undefined
      ? createEnrichment(settings)
      : options.enrichment;

  const runner = new JobRunner({
    sourceFactory: options.sourceFactory ?? createPostgresSource,
    destination,
    enrichment,
    timezone: settings.timezone,
    fetchWarnThresholdMs: settings.fetchWarnThresholdMs,
    paceDelayMs: settings.paceDelayMs,
    paceJitterMs: settings.paceJitterMs,
  });

  const scheduler = new SyncScheduler({
    loadJobs:
      options.loadJobs ?? (() => loadJobSpecs(settings.jobsFile, settings)),
    destination,
    runner,
    intervalMs: settings.updateIntervalMs,
    onIteration: options.onIteration,
  });

  return { settings, destination, enrichment, runner, scheduler };
}
