import { describe, it, expect, vi } from "vitest";

import { PostgresSource, toScalar } from "../../../src/db/connection.js";
import {
  categorizeError,
  errorMessage,
  TransientError,
} from "../../../src/errors.js";
import { withRetry } from "../../../src/utils/middleware.js";
import { T1, T2, TEST_SETTINGS, createJob } from "../../fixtures/jobs.js";
import { answerNextQuery, createFakePool } from "../../mocks/db.js";

import type { SecureTunnel } from "../../../src/db/tunnel.js";

function createTunnelStub() {
  return {
    open: vi.fn(async () => ({ host: "/tmp/sheets-sync-test", port: 5432 })),
    close: vi.fn(async () => {}),
  } satisfies SecureTunnel;
}

describe("db/connection", () => {
  describe("toScalar", () => {
    it("should pass through sheet scalars", () => {
      expect(toScalar("a")).toBe("a");
      expect(toScalar(3)).toBe(3);
      expect(toScalar(false)).toBe(false);
      expect(toScalar(T1)).toBe(T1);
      expect(toScalar(undefined)).toBeNull();
    });

    it("should serialize JSON values and bytes", () => {
      expect(toScalar({ a: 1 })).toBe('{"a":1}');
      expect(toScalar([1, 2])).toBe("[1,2]");
      expect(toScalar(Buffer.from([0xab, 0x01]))).toBe("ab01");
    });
  });

  describe("PostgresSource", () => {
    it("should connect directly and verify with a round trip", async () => {
      const fake = createFakePool();
      const poolFactory = vi.fn(fake.asPool);

      await new PostgresSource(createJob(), { poolFactory }).connect();

      expect(poolFactory).toHaveBeenCalledWith(
        expect.objectContaining({
          host: "db.internal",
          port: 5432,
          user: "postgres",
          password: "test-secret",
          database: "bot_main",
        })
      );
      expect(fake.client.query).toHaveBeenCalledWith("SELECT 1", []);
      expect(fake.client.release).toHaveBeenCalled();
    });

    it("should connect through the tunnel endpoint", async () => {
      const fake = createFakePool();
      const poolFactory = vi.fn(fake.asPool);
      const tunnel = createTunnelStub();
      const tunnelFactory = vi.fn(() => tunnel);
      const ssh = TEST_SETTINGS.ssh ?? undefined;

      const source = new PostgresSource(createJob({ tunnel: ssh }), {
        poolFactory,
        tunnelFactory,
      });
      await source.connect();

      expect(tunnelFactory).toHaveBeenCalledWith(ssh, {
        host: "db.internal",
        port: 5432,
      });
      expect(poolFactory).toHaveBeenCalledWith(
        expect.objectContaining({ host: "/tmp/sheets-sync-test", port: 5432 })
      );

      await source.disconnect();
      expect(fake.pool.end).toHaveBeenCalledTimes(1);
      expect(tunnel.close).toHaveBeenCalledTimes(1);
    });

    it("should release the pool and tunnel when the round trip fails", async () => {
      const fake = createFakePool();
      fake.pool.connect.mockRejectedValueOnce(new Error("connection refused"));
      const tunnel = createTunnelStub();
      const ssh = TEST_SETTINGS.ssh ?? undefined;

      const source = new PostgresSource(createJob({ tunnel: ssh }), {
        poolFactory: fake.asPool,
        tunnelFactory: () => tunnel,
      });

      await expect(source.connect()).rejects.toThrow("connection refused");
      expect(fake.pool.end).toHaveBeenCalledTimes(1);
      expect(tunnel.close).toHaveBeenCalledTimes(1);
    });

    it("should report pg connect timeouts as transient", async () => {
      for (const message of [
        "timeout expired",
        "Connection terminated due to connection timeout",
        "Connection terminated unexpectedly",
      ]) {
        const fake = createFakePool();
        fake.pool.connect.mockRejectedValueOnce(new Error(message));
        const source = new PostgresSource(createJob(), {
          poolFactory: fake.asPool,
        });

        const error: unknown = await source.connect().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransientError);
        expect(categorizeError(error)).toBe("transient");
        expect(errorMessage(error)).toBe(
          `Connection to bot_main failed: ${message}`
        );
      }
    });

    it("should keep server errors that carry a SQLSTATE", async () => {
      const fake = createFakePool();
      const authFailure = Object.assign(
        new Error('password authentication failed for user "postgres"'),
        { code: "28P01" }
      );
      fake.pool.connect.mockRejectedValueOnce(authFailure);
      const source = new PostgresSource(createJob(), {
        poolFactory: fake.asPool,
      });

      await expect(source.connect()).rejects.toBe(authFailure);
      expect(categorizeError(authFailure)).toBe("job-failure");
    });

    it("should retry a connect that times out", async () => {
      const fake = createFakePool();
      fake.pool.connect.mockRejectedValue(new Error("timeout expired"));
      const poolFactory = vi.fn(fake.asPool);
      const source = new PostgresSource(createJob(), { poolFactory });

      await expect(
        withRetry(() => source.connect(), {
          maxAttempts: 3,
          sleep: async () => {},
          random: () => 0,
        })
      ).rejects.toBeInstanceOf(TransientError);
      expect(poolFactory).toHaveBeenCalledTimes(3);
      expect(fake.pool.end).toHaveBeenCalledTimes(3);
    });

    it("should fetch rows in column order", async () => {
      const fake = createFakePool({
        fields: [{ name: "id" }, { name: "username" }, { name: "meta" }],
        rows: [
          [1, "ann", { vip: true }],
          [2, null, null],
        ],
      });
      const source = new PostgresSource(createJob(), {
        poolFactory: fake.asPool,
      });
      await source.connect();

      const dataset = await source.fetchRows("SELECT id, username, meta FROM users");

      expect(fake.pool.query).toHaveBeenCalledWith({
        text: "SELECT id, username, meta FROM users",
        rowMode: "array",
      });
      expect(dataset).toEqual({
        headers: ["id", "username", "meta"],
        rows: [
          [1, "ann", '{"vip":true}'],
          [2, null, null],
        ],
      });
    });

    it("should refuse queries before connecting", async () => {
      const source = new PostgresSource(createJob());

      await expect(source.fetchRows("SELECT 1")).rejects.toBeInstanceOf(
        TransientError
      );
    });

    it("should fetch history for the given subjects", async () => {
      const fake = createFakePool();
      const source = new PostgresSource(createJob(), {
        poolFactory: fake.asPool,
      });
      await source.connect();
      answerNextQuery(fake.client, [
        { user_id: 1, label: "start", datetime: T1 },
        { user_id: 2, label: "paid", datetime: T2 },
      ]);

      const history = await source.fetchHistory([1, 2]);

      expect(history).toEqual([
        { subjectId: 1, label: "start", timestamp: T1 },
        { subjectId: 2, label: "paid", timestamp: T2 },
      ]);
      const [text, params] = fake.client.query.mock.calls.at(-1) ?? [];
      expect(text).toContain('from "funnel_history"');
      expect(params).toEqual([[1, 2]]);
    });

    it("should fetch one latest state per subject", async () => {
      const fake = createFakePool();
      const source = new PostgresSource(createJob(), {
        poolFactory: fake.asPool,
      });
      await source.connect();
      answerNextQuery(fake.client, [{ user_id: 1, label: "paid", datetime: null }]);

      const states = await source.fetchStates([1]);

      expect(states).toEqual([{ subjectId: 1, label: "paid", timestamp: null }]);
      const [text] = fake.client.query.mock.calls.at(-1) ?? [];
      expect(text).toContain('distinct on ("user_id")');
      expect(text).toContain('"datetime" desc');
    });

    it("should skip history queries for no subjects", async () => {
      const fake = createFakePool();
      const source = new PostgresSource(createJob(), {
        poolFactory: fake.asPool,
      });
      await source.connect();
      const callsAfterConnect = fake.client.query.mock.calls.length;

      await expect(source.fetchHistory([])).resolves.toEqual([]);
      await expect(source.fetchStates([])).resolves.toEqual([]);
      expect(fake.client.query).toHaveBeenCalledTimes(callsAfterConnect);
    });
  });
});
