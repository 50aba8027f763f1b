/**
 * Status API Request/Response Types
 */

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiResponse<T> {
  data: T;
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Health Types
// ============================================================================

export interface HealthDto {
  status: "ok";
  uptimeSeconds: number;
  /** Present only for deep checks */
  partnerApi?: "ok" | "not-configured";
}

// ============================================================================
// Status Types
// ============================================================================

export interface OutcomeDto {
  jobName: string;
  sheetTab: string;
  status: "succeeded" | "failed";
  rowCount: number;
  error: string | null;
  failedStage: string | null;
  durationMs: number;
}

export interface IterationDto {
  iteration: number;
  startedAt: string;
  durationMs: number;
  succeeded: number;
  failed: number;
  outcomes: OutcomeDto[];
}

export interface SchedulerStatusDto {
  state: string;
  jobCount: number;
  iterations: number;
  nextRunAt: string | null;
  lastIteration: IterationDto | null;
}
