import { describe, it, expect, vi } from "vitest";

import { JobFailedError, TransientError } from "../../../../src/errors.js";
import { ENRICHMENT_COLUMNS } from "../../../../src/services/enrichment/merger.js";
import { JobRunner, type JobRunnerDeps } from "../../../../src/services/sync/job-runner.js";
import {
  T1,
  T2,
  createJob,
  createRecord,
  createUsersDataset,
} from "../../../fixtures/jobs.js";
import {
  createFakeDestination,
  createFakeEnrichment,
  createFakeSource,
} from "../../../mocks/collaborators.js";

const HISTORY_TEXT = "[2024-01-01 10:00:00 - a]\n[2024-01-02 11:30:00 - b]";
const NOW = new Date("2024-06-01T12:00:00Z");

function createSource() {
  return createFakeSource({
    dataset: createUsersDataset(),
    history: [
      { subjectId: 1, label: "b", timestamp: T2 },
      { subjectId: 1, label: "a", timestamp: T1 },
    ],
    states: [{ subjectId: 1, label: "paid", timestamp: T2 }],
  });
}

function createRunner(
  source: ReturnType<typeof createFakeSource>,
  overrides: Partial<JobRunnerDeps> = {}
) {
  const destination = createFakeDestination();
  const sleep = vi.fn(async (_ms: number): Promise<void> => {});
  const runner = new JobRunner({
    sourceFactory: () => source,
    destination,
    enrichment: null,
    timezone: "UTC",
    paceDelayMs: 100,
    paceJitterMs: 200,
    sleep,
    random: () => 0,
    now: () => NOW,
    ...overrides,
  });
  return { runner, destination, sleep };
}

const PLAIN_VALUES = [
  ["id", "username", "funnel_history", "last_action_date", "max_funnel_action"],
  ["1", "ann", HISTORY_TEXT, "2024-01-02 11:30:00", "paid"],
  ["2", "bob", "", "", ""],
];

describe("services/sync/job-runner", () => {
  it("should sync rows with history and report the status", async () => {
    const source = createSource();
    const { runner, destination, sleep } = createRunner(source);

    const outcome = await runner.run(createJob());

    expect(outcome).toEqual({
      jobName: "bot_main",
      sheetTab: "Main",
      status: "succeeded",
      rowCount: 2,
      error: null,
      failedStage: null,
      durationMs: expect.any(Number),
    });
    expect(source.fetchRows).toHaveBeenCalledWith("SELECT id, username FROM users");
    expect(source.fetchHistory).toHaveBeenCalledWith([1, 2]);
    expect(source.fetchStates).toHaveBeenCalledWith([1, 2]);
    expect(destination.write).toHaveBeenCalledWith({
      tab: "Main",
      values: PLAIN_VALUES,
      startRow: 1,
      columnRange: "A:R",
      clearTail: true,
    });
    expect(destination.writeStatus).toHaveBeenCalledWith(
      "Main",
      "2024-06-01 12:00:00 | Main | records: 2"
    );
    expect(sleep.mock.calls).toEqual([[100]]);
    expect(source.disconnect).toHaveBeenCalledTimes(1);
  });

  it("should merge partner records for enriched jobs", async () => {
    const source = createSource();
    const enrichment = createFakeEnrichment([createRecord()]);
    const { runner, destination } = createRunner(source, { enrichment });

    const outcome = await runner.run(
      createJob({ enrich: true, columnRange: "A:P", columnSpan: 16 })
    );

    expect(outcome.status).toBe("succeeded");
    expect(enrichment.fetchRecords).toHaveBeenCalledWith([1, 2]);
    const values = destination.write.mock.calls[0]?.[0].values;
    expect(values?.[0]).toEqual([
      "id",
      "username",
      "funnel_history",
      ...ENRICHMENT_COLUMNS,
      "",
      "",
    ]);
    expect(values?.[1]).toEqual([
      "1",
      "ann",
      HISTORY_TEXT,
      "cpc",
      "google",
      "spring",
      "ref",
      "2024-03-01 08:00:00",
      "2024-03-05 09:15:30",
      "",
      "",
      "",
      "2024-01-02 11:30:00",
      "paid",
      "",
      "",
    ]);
  });

  it("should write rows unenriched when the partner API returns nothing", async () => {
    const source = createSource();
    const { runner, destination } = createRunner(source, {
      enrichment: createFakeEnrichment([]),
    });

    await runner.run(createJob({ enrich: true }));

    expect(destination.write.mock.calls[0]?.[0].values).toEqual(PLAIN_VALUES);
  });

  it("should drop columns beyond the job's column range", async () => {
    const extra = Array.from({ length: 16 }, (_, i) => `c${String(i + 1)}`);
    const source = createFakeSource({
      dataset: {
        headers: ["id", ...extra],
        rows: [[1, ...extra.map(() => "x")]],
      },
      history: [],
      states: [],
    });
    const { runner, destination } = createRunner(source);

    const outcome = await runner.run(createJob());

    expect(outcome.status).toBe("succeeded");
    const values = destination.write.mock.calls[0]?.[0].values;
    expect(values?.[0]).toEqual(["id", ...extra, "funnel_history"]);
    expect(values?.[1]).toEqual(["1", ...extra.map(() => "x"), ""]);
  });

  it("should fail enriched jobs without a partner client", async () => {
    const source = createSource();
    const { runner, destination } = createRunner(source);

    const outcome = await runner.run(createJob({ enrich: true }));

    expect(outcome.status).toBe("failed");
    expect(outcome.failedStage).toBe("enriching");
    expect(outcome.rowCount).toBe(2);
    expect(outcome.error).toBeInstanceOf(JobFailedError);
    expect(destination.write).not.toHaveBeenCalled();
    expect(source.disconnect).toHaveBeenCalledTimes(1);
  });

  it("should retry the connection before failing", async () => {
    const source = createSource();
    source.connect.mockRejectedValue(new TransientError("connection refused"));
    const { runner, destination, sleep } = createRunner(source);

    const outcome = await runner.run(createJob());

    expect(source.connect).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    expect(outcome.status).toBe("failed");
    expect(outcome.failedStage).toBe("connecting");
    expect(outcome.error?.message).toBe("connection refused");
    expect(source.disconnect).toHaveBeenCalledTimes(1);
    expect(destination.write).not.toHaveBeenCalled();
  });

  it("should report the fetching stage when the query fails", async () => {
    const source = createSource();
    source.fetchRows.mockRejectedValue(new Error("relation users does not exist"));
    const { runner } = createRunner(source);

    const outcome = await runner.run(createJob());

    expect(outcome.failedStage).toBe("fetching");
    expect(outcome.rowCount).toBe(0);
    expect(source.connect).toHaveBeenCalledTimes(1);
    expect(source.disconnect).toHaveBeenCalledTimes(1);
  });

  it("should report the writing stage and skip the status", async () => {
    const source = createSource();
    const { runner, destination } = createRunner(source);
    destination.write.mockRejectedValue(new JobFailedError("Worksheet 'Main' not found"));

    const outcome = await runner.run(createJob());

    expect(outcome.failedStage).toBe("writing");
    expect(outcome.rowCount).toBe(2);
    expect(destination.writeStatus).not.toHaveBeenCalled();
  });

  it("should wrap thrown values that are not errors", async () => {
    const source = createSource();
    source.fetchRows.mockRejectedValue("boom");
    const { runner } = createRunner(source);

    const outcome = await runner.run(createJob());

    expect(outcome.error).toBeInstanceOf(JobFailedError);
    expect(outcome.error?.message).toBe("boom");
  });

  it("should succeed when disconnecting fails", async () => {
    const source = createSource();
    source.disconnect.mockRejectedValue(new Error("socket closed"));
    const { runner } = createRunner(source);

    const outcome = await runner.run(createJob());

    expect(outcome.status).toBe("succeeded");
  });

  it("should skip history queries when rows carry no ids", async () => {
    const source = createFakeSource({
      dataset: { headers: ["id", "username"], rows: [[null, "ghost"]] },
    });
    const enrichment = createFakeEnrichment([createRecord()]);
    const { runner, destination } = createRunner(source, { enrichment });

    const outcome = await runner.run(createJob({ enrich: true }));

    expect(outcome.status).toBe("succeeded");
    expect(source.fetchHistory).not.toHaveBeenCalled();
    expect(source.fetchStates).not.toHaveBeenCalled();
    expect(enrichment.fetchRecords).not.toHaveBeenCalled();
    expect(destination.write.mock.calls[0]?.[0].values).toEqual([
      ["id", "username", "funnel_history", "last_action_date", "max_funnel_action"],
      ["", "ghost", "", "", ""],
    ]);
  });

  it("should not sleep when pacing is disabled", async () => {
    const source = createSource();
    const { runner, sleep } = createRunner(source, {
      paceDelayMs: 0,
      paceJitterMs: 0,
    });

    await runner.run(createJob());

    expect(sleep).not.toHaveBeenCalled();
  });
});
