/**
 * Process settings read from the environment (and `.env` via dotenv)
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigValidationError } from "../errors.js";

import type { TunnelConfig } from "../types/index.js";

// ============================================================================
// Schema
// ============================================================================

const Port = (defaultPort?: number) =>
  Type.Integer({
    minimum: 1,
    maximum: 65_535,
    ...(defaultPort === undefined ? {} : { default: defaultPort }),
  });

export const EnvSchema = Type.Object({
  SPREADSHEET_URL: Type.String({ minLength: 1 }),
  GOOGLE_SERVICE_ACCOUNT_FILE: Type.String({ minLength: 1 }),

  DB_USER: Type.String({ minLength: 1, default: "postgres" }),
  DB_PASSWORD: Type.String({ minLength: 1 }),
  DB_HOST: Type.String({ minLength: 1, default: "127.0.0.1" }),
  DB_PORT: Port(5432),

  SSH_HOST: Type.Optional(Type.String({ minLength: 1 })),
  SSH_PORT: Port(22),
  SSH_USER: Type.Optional(Type.String({ minLength: 1 })),
  SSH_PASSWORD: Type.Optional(Type.String({ minLength: 1 })),

  PARTNER_API_URL: Type.Optional(Type.String({ pattern: "^https?://" })),
  PARTNER_API_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 30_000 }),
  PARTNER_BATCH_SIZE: Type.Integer({ minimum: 1, default: 100 }),
  PARTNER_MAX_CONNECTIONS: Type.Integer({ minimum: 1, default: 10 }),

  UPDATE_INTERVAL_MINUTES: Type.Number({ exclusiveMinimum: 0, default: 60 }),
  TIMEZONE: Type.String({ minLength: 1, default: "Europe/Moscow" }),
  DB_CONFIG_FILE: Type.String({
    minLength: 1,
    default: "config/databases.yaml",
  }),
  FETCH_WARN_THRESHOLD_MS: Type.Integer({ minimum: 0, default: 10_000 }),
  PACE_DELAY_MS: Type.Integer({ minimum: 0, default: 100 }),
  PACE_JITTER_MS: Type.Integer({ minimum: 0, default: 200 }),

  STATUS_PORT: Type.Optional(Port()),
  HOST: Type.String({ minLength: 1, default: "0.0.0.0" }),
});

export type Env = Static<typeof EnvSchema>;

// ============================================================================
// Settings
// ============================================================================

export interface Settings {
  spreadsheetUrl: string;
  serviceAccountFile: string;
  database: {
    host: string;
    port: number;
    user: string;
    password: string;
  };
  /** Null unless host, user and password are all set */
  ssh: TunnelConfig | null;
  partner: {
    apiUrl: string | null;
    timeoutMs: number;
    batchSize: number;
    maxConnections: number;
  };
  updateIntervalMs: number;
  timezone: string;
  jobsFile: string;
  fetchWarnThresholdMs: number;
  paceDelayMs: number;
  paceJitterMs: number;
  /** Status server port; null disables the server */
  statusPort: number | null;
  host: string;
}

/**
 * Collect the variables the schema knows, dropping empty values
 */
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key]?.trim();
    if (value !== undefined && value !== "") {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Validate the environment and build the settings object.
 * Every invalid or missing variable is reported at once.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const value = Value.Convert(
    EnvSchema,
    Value.Default(EnvSchema, pickEnv(env))
  );

  if (!Value.Check(EnvSchema, value)) {
    const issues = [
      ...new Set(
        [...Value.Errors(EnvSchema, value)].map(
          (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
        )
      ),
    ];
    throw new ConfigValidationError("Invalid environment configuration", issues);
  }

  return toSettings(value);
}

function toSettings(env: Env): Settings {
  const ssh =
    env.SSH_HOST !== undefined &&
    env.SSH_USER !== undefined &&
    env.SSH_PASSWORD !== undefined
      ? {
          host: env.SSH_HOST,
          port: env.SSH_PORT,
          user: env.SSH_USER,
          password: env.SSH_PASSWORD,
        }
      : null;

  return {
    spreadsheetUrl: env.SPREADSHEET_URL,
    serviceAccountFile: env.GOOGLE_SERVICE_ACCOUNT_FILE,
    database: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
    },
    ssh,
    partner: {
      apiUrl: env.PARTNER_API_URL ?? null,
      timeoutMs: env.PARTNER_API_TIMEOUT_MS,
      batchSize: env.PARTNER_BATCH_SIZE,
      maxConnections: env.PARTNER_MAX_CONNECTIONS,
    },
    updateIntervalMs: env.UPDATE_INTERVAL_MINUTES * 60_000,
    timezone: env.TIMEZONE,
    jobsFile: env.DB_CONFIG_FILE,
    fetchWarnThresholdMs: env.FETCH_WARN_THRESHOLD_MS,
    paceDelayMs: env.PACE_DELAY_MS,
    paceJitterMs: env.PACE_JITTER_MS,
    statusPort: env.STATUS_PORT ?? null,
    host: env.HOST,
  };
}
