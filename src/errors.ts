/**
 * Error taxonomy for the sync pipeline.
 *
 * Every error the pipeline raises itself carries a category; foreign errors
 * (pg, Node sockets, fetch, googleapis) are mapped by `categorizeError`.
 */

// ============================================================================
// Categories
// ============================================================================

export type ErrorCategory =
  | "transient"
  | "validation"
  | "partial-data"
  | "job-failure";

// ============================================================================
// Custom Error Classes
// ============================================================================

export class SyncError extends Error {
  readonly category: ErrorCategory;

  constructor(
    message: string,
    category: ErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SyncError";
    this.category = category;
  }
}

export class TransientError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "transient", options);
    this.name = "TransientError";
  }
}

export class ConfigValidationError extends SyncError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message,
      "validation"
    );
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export class PartialDataError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "partial-data", options);
    this.name = "PartialDataError";
  }
}

export class JobFailedError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "job-failure", options);
    this.name = "JobFailedError";
  }
}

/**
 * Raised by an HTTP collaborator for a non-2xx response.
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string
  ) {
    super(`HTTP ${String(status)} (${statusText}) for ${url}`);
    this.name = "HttpStatusError";
  }
}

// ============================================================================
// Categorization
// ============================================================================

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

// SQLSTATE classes: connection exception, insufficient resources, operator intervention
const TRANSIENT_SQLSTATE = /^(08|53|57P0)/;

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return property;
}

function isTransientStatus(status: unknown): boolean {
  return (
    typeof status === "number" &&
    (status === 408 || status === 429 || status >= 500)
  );
}

/**
 * Map any thrown value onto the pipeline's error taxonomy.
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof SyncError) {
    return error.category;
  }

  if (!(error instanceof Error)) {
    return "job-failure";
  }

  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return "transient";
  }

  const code = readProperty(error, "code");
  if (typeof code === "string") {
    if (TRANSIENT_NETWORK_CODES.has(code) || TRANSIENT_SQLSTATE.test(code)) {
      return "transient";
    }
  }

  // undici reports network failures as TypeError("fetch failed")
  if (error instanceof TypeError && error.message === "fetch failed") {
    return "transient";
  }

  if (
    isTransientStatus(readProperty(error, "status")) ||
    isTransientStatus(code) ||
    isTransientStatus(readProperty(readProperty(error, "response"), "status"))
  ) {
    return "transient";
  }

  const cause = readProperty(error, "cause");
  if (cause instanceof Error && cause !== error) {
    return categorizeError(cause) === "transient" ? "transient" : "job-failure";
  }

  return "job-failure";
}

/**
 * Render an unknown thrown value as a single-line message.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
