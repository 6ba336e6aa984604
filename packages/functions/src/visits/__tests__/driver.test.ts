/**
 * Tests for the batch driver
 *
 * The object store and pipeline are faked through their interfaces.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { err, ok } from "@carelog/core";
import type { Result } from "@carelog/core";
import { acknowledge, runBatchDriver, type BatchPipeline, type PipelineReport } from "../driver.js";
import { ObjectFetchError, type ObjectStoreReader } from "../object-store.js";
import type { Notification, ObjectRef } from "../notifications.js";

const BUCKET = "care-uploads";
const REPORT: PipelineReport = { records: 1, processed: 1, skipped: 0, failed: 0, rejected: 0, written: 1 };

function fakeReader(objects: Record<string, string>): ObjectStoreReader {
  return {
    async getObjectText(bucket, key): Promise<Result<string, ObjectFetchError>> {
      const content = objects[key];
      if (content === undefined) {
        return err(new ObjectFetchError("not-found", bucket, key, "The specified key does not exist."));
      }
      return ok(content);
    },
  };
}

function fakePipeline(process: BatchPipeline["process"] = async () => REPORT) {
  const spy = vi.fn(process);
  const pipeline: BatchPipeline = { name: "classification", process: spy };
  return { pipeline, spy };
}

function notify(...keys: string[]): Notification {
  return ok(keys.map((key): ObjectRef => ({ bucket: BUCKET, key })));
}

const ONE_RECORD = JSON.stringify([{ note: "Ate well", client: "C1" }]);

describe("runBatchDriver", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("acknowledges with the number of top-level event records", async () => {
    const { pipeline } = fakePipeline();

    const run = await runBatchDriver(
      [notify("batch-1.json"), err(new Error("Record doesn't contain SNS message")), notify("batch-2.json")],
      {
        reader: fakeReader({ "batch-1.json": ONE_RECORD, "batch-2.json": ONE_RECORD }),
        pipeline,
        completionMessage: "Processing complete.",
      }
    );

    expect(run.acknowledgment).toEqual({
      statusCode: 200,
      body: '{"message":"Processing complete.","processed_objects":3}',
    });
  });

  it("keeps processing siblings of an undecodable notification", async () => {
    const { pipeline, spy } = fakePipeline();

    const run = await runBatchDriver(
      [err(new Error("SNS message is not JSON: bad")), notify("batch-2.json")],
      { reader: fakeReader({ "batch-2.json": ONE_RECORD }), pipeline, completionMessage: "done" }
    );

    expect(spy).toHaveBeenCalledTimes(1);
    expect(run.outcomes.map((outcome) => outcome.state)).toEqual(["reported"]);
    expect(console.warn).toHaveBeenCalledWith("Skipping event record: SNS message is not JSON: bad");
  });

  it("hands the pipeline a batch named after the object key", async () => {
    const { pipeline, spy } = fakePipeline();

    const run = await runBatchDriver([notify("2024-03-01-north.json")], {
      reader: fakeReader({ "2024-03-01-north.json": ONE_RECORD }),
      pipeline,
      completionMessage: "done",
    });

    const [batch, context] = spy.mock.calls[0];
    expect(batch.batchId).toBe("2024-03-01-north");
    expect(batch.records.map((record) => record.note)).toEqual(["Ate well"]);
    expect(context.ref).toEqual({ bucket: BUCKET, key: "2024-03-01-north.json" });
    expect(run.outcomes[0]).toEqual({
      state: "reported",
      ref: { bucket: BUCKET, key: "2024-03-01-north.json" },
      batchId: "2024-03-01-north",
      report: REPORT,
    });
  });

  it("records the failing stage and moves on", async () => {
    const { pipeline } = fakePipeline(async (batch) => {
      if (batch.batchId === "boom-batch") throw new Error("pool exploded");
      return REPORT;
    });

    const run = await runBatchDriver(
      [notify("missing.json", "broken.json", "boom-batch.json", "good-batch.json")],
      {
        reader: fakeReader({
          "broken.json": "[{",
          "boom-batch.json": ONE_RECORD,
          "good-batch.json": ONE_RECORD,
        }),
        pipeline,
        completionMessage: "done",
      }
    );

    expect(
      run.outcomes.map((outcome) => (outcome.state === "failed" ? outcome.stage : outcome.state))
    ).toEqual(["fetch", "parse", "aggregate", "reported"]);
    expect(run.acknowledgment.body).toBe('{"message":"done","processed_objects":1}');
  });

  it("skips an empty batch without running the pipeline", async () => {
    const { pipeline, spy } = fakePipeline();

    const run = await runBatchDriver([notify("empty-batch.json")], {
      reader: fakeReader({ "empty-batch.json": "[]" }),
      pipeline,
      completionMessage: "done",
    });

    expect(spy).not.toHaveBeenCalled();
    expect(run.outcomes[0].state).toBe("empty");
  });

  it("forwards unreadable entries to the pipeline", async () => {
    const { pipeline, spy } = fakePipeline();

    await runBatchDriver([notify("mixed-batch.json")], {
      reader: fakeReader({ "mixed-batch.json": '[{"note":"ok"}, 7]' }),
      pipeline,
      completionMessage: "done",
    });

    const [, context] = spy.mock.calls[0];
    expect(context.rejected).toEqual([{ index: 1, reason: "entry is not an object" }]);
    expect(context.entries).toHaveLength(2);
    expect(console.warn).toHaveBeenCalledWith("Record 1 could not be read: entry is not an object");
  });

  it("catches a reader that throws", async () => {
    const { pipeline } = fakePipeline();
    const reader: ObjectStoreReader = {
      getObjectText: async () => {
        throw new Error("socket hang up");
      },
    };

    const run = await runBatchDriver([notify("batch-1.json")], {
      reader,
      pipeline,
      completionMessage: "done",
    });

    expect(run.outcomes[0]).toMatchObject({ state: "failed", stage: "unexpected" });
  });

  it("warns about implausible batch ids but still processes them", async () => {
    const { pipeline, spy } = fakePipeline();

    await runBatchDriver([notify("a.json")], {
      reader: fakeReader({ "a.json": ONE_RECORD }),
      pipeline,
      completionMessage: "done",
    });

    expect(console.warn).toHaveBeenCalledWith("Extracted batch ID 'a' doesn't look valid");
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("acknowledge", () => {
  it("builds the fixed response shape", () => {
    expect(acknowledge("Summarisation complete.", 0)).toEqual({
      statusCode: 200,
      body: JSON.stringify({ message: "Summarisation complete.", processed_objects: 0 }),
    });
  });
});
