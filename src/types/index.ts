// Sync pipeline domain types and collaborator capabilities

// =====================
// Job Types
// =====================

export interface ConnectionConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface TunnelConfig {
  host: string;
  port: number;
  user: string;
  password: string;
}

/**
 * One source → destination synchronization, built once at startup
 */
export interface JobSpec {
  /** Source database name, also the job's identity in logs */
  readonly name: string;
  readonly sheetTab: string;
  /** Column range in A1 notation, e.g. "A:R" */
  readonly columnRange: string;
  /** Number of columns in `columnRange` */
  readonly columnSpan: number;
  /** 1-based row where the header row is written */
  readonly startRow: number;
  /** Clear destination rows below the written range */
  readonly clearTail: boolean;
  /** Merge partner API records into the rows */
  readonly enrich: boolean;
  readonly query: string;
  readonly connection: Readonly<ConnectionConfig>;
  readonly tunnel?: Readonly<TunnelConfig>;
}

// =====================
// Row Types
// =====================

export type Scalar = string | number | boolean | bigint | Date | null;

/** Ordered cells, subject id first */
export type Row = Scalar[];

export interface Dataset {
  headers: string[];
  rows: Row[];
}

// =====================
// History Types
// =====================

export interface HistoryEvent {
  subjectId: number;
  label: string;
  timestamp: Date;
}

/**
 * Current funnel state row; at most one per subject is kept
 */
export interface StateRow {
  subjectId: number;
  label: string;
  timestamp: Date | null;
}

export interface SubjectState {
  subjectId: number;
  /** Ascending by timestamp */
  history: HistoryEvent[];
  lastEventTime: Date | null;
  currentLabel: string;
}

// =====================
// Enrichment Types
// =====================

export interface AcquisitionAttributes {
  medium: string;
  source: string;
  campaign: string;
}

export interface EnrichmentRecord {
  subjectId: number;
  referrer: string;
  acquisition: AcquisitionAttributes;
  /** ISO-8601 text as sent by the partner API, or "" */
  authorizedAt: string;
  lastVisitAt: string;
  groups: string[];
  /** Course name → lesson titles */
  courses: Record<string, string[]>;
  lessons: string[];
}

// =====================
// Outcome Types
// =====================

export type JobStage =
  | "idle"
  | "connecting"
  | "fetching"
  | "merging"
  | "enriching"
  | "writing"
  | "reporting"
  | "done"
  | "failed";

export interface SyncOutcome {
  jobName: string;
  sheetTab: string;
  status: "succeeded" | "failed";
  rowCount: number;
  error: Error | null;
  /** Stage in which the job failed, null on success */
  failedStage: JobStage | null;
  durationMs: number;
}

export interface IterationSummary {
  iteration: number;
  startedAt: Date;
  durationMs: number;
  succeeded: number;
  failed: number;
  outcomes: SyncOutcome[];
}

// =====================
// Collaborator Capabilities
// =====================

export interface Source {
  connect(): Promise<void>;
  fetchRows(query: string): Promise<Dataset>;
  fetchHistory(subjectIds: readonly number[]): Promise<HistoryEvent[]>;
  fetchStates(subjectIds: readonly number[]): Promise<StateRow[]>;
  disconnect(): Promise<void>;
}

export type SourceFactory = (job: JobSpec) => Source;

export interface WriteRequest {
  tab: string;
  /** Header row followed by data rows, already formatted as cell text */
  values: string[][];
  startRow: number;
  columnRange: string;
  clearTail: boolean;
}

/**
 * Spreadsheet sink. Shared by every job and called concurrently.
 */
export interface Destination {
  connect(): Promise<void>;
  write(request: WriteRequest): Promise<void>;
  writeStatus(tab: string, text: string): Promise<void>;
}

export interface EnrichmentService {
  fetchRecords(subjectIds: readonly number[]): Promise<EnrichmentRecord[]>;
  healthCheck(): Promise<boolean>;
}
