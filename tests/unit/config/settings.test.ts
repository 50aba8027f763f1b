import { describe, it, expect } from "vitest";

import { loadSettings } from "../../../src/config/settings.js";
import { ConfigValidationError } from "../../../src/errors.js";

const REQUIRED_ENV = {
  SPREADSHEET_URL: "https://docs.google.com/spreadsheets/d/test-sheet/edit",
  GOOGLE_SERVICE_ACCOUNT_FILE: "./service-account.json",
  DB_PASSWORD: "test-secret",
};

function captureIssues(env: NodeJS.ProcessEnv): string[] {
  try {
    loadSettings(env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("config/settings", () => {
  describe("loadSettings", () => {
    it("should apply defaults for optional variables", () => {
      expect(loadSettings(REQUIRED_ENV)).toEqual({
        spreadsheetUrl: REQUIRED_ENV.SPREADSHEET_URL,
        serviceAccountFile: "./service-account.json",
        database: {
          host: "127.0.0.1",
          port: 5432,
          user: "postgres",
          password: "test-secret",
        },
        ssh: null,
        partner: {
          apiUrl: null,
          timeoutMs: 30_000,
          batchSize: 100,
          maxConnections: 10,
        },
        updateIntervalMs: 3_600_000,
        timezone: "Europe/Moscow",
        jobsFile: "config/databases.yaml",
        fetchWarnThresholdMs: 10_000,
        paceDelayMs: 100,
        paceJitterMs: 200,
        statusPort: null,
        host: "0.0.0.0",
      });
    });

    it("should convert numeric variables", () => {
      const settings = loadSettings({
        ...REQUIRED_ENV,
        DB_PORT: "6432",
        UPDATE_INTERVAL_MINUTES: "0.5",
        PARTNER_BATCH_SIZE: "25",
        STATUS_PORT: "8080",
      });

      expect(settings.database.port).toBe(6432);
      expect(settings.updateIntervalMs).toBe(30_000);
      expect(settings.partner.batchSize).toBe(25);
      expect(settings.statusPort).toBe(8080);
    });

    it("should build the SSH settings only when they are complete", () => {
      const complete = loadSettings({
        ...REQUIRED_ENV,
        SSH_HOST: "bastion.internal",
        SSH_PORT: "2222",
        SSH_USER: "deploy",
        SSH_PASSWORD: "test-secret",
      });
      const partial = loadSettings({
        ...REQUIRED_ENV,
        SSH_HOST: "bastion.internal",
      });

      expect(complete.ssh).toEqual({
        host: "bastion.internal",
        port: 2222,
        user: "deploy",
        password: "test-secret",
      });
      expect(partial.ssh).toBeNull();
    });

    it("should ignore blank values", () => {
      const settings = loadSettings({
        ...REQUIRED_ENV,
        DB_HOST: "   ",
        PARTNER_API_URL: "",
      });

      expect(settings.database.host).toBe("127.0.0.1");
      expect(settings.partner.apiUrl).toBeNull();
    });

    it("should report every invalid variable at once", () => {
      const issues = captureIssues({
        GOOGLE_SERVICE_ACCOUNT_FILE: "./service-account.json",
        DB_PASSWORD: "test-secret",
        DB_PORT: "not-a-port",
        PARTNER_API_URL: "ftp://partner.test",
      });

      expect(issues.some((issue) => issue.startsWith("SPREADSHEET_URL: "))).toBe(
        true
      );
      expect(issues.some((issue) => issue.startsWith("DB_PORT: "))).toBe(true);
      expect(
        issues.some((issue) => issue.startsWith("PARTNER_API_URL: "))
      ).toBe(true);
    });

    it("should reject a non-positive update interval", () => {
      const issues = captureIssues({
        ...REQUIRED_ENV,
        UPDATE_INTERVAL_MINUTES: "0",
      });

      expect(issues).toHaveLength(1);
      expect(issues[0]?.startsWith("UPDATE_INTERVAL_MINUTES: ")).toBe(true);
    });
  });
});
