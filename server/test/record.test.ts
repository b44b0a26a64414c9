import { describe, expect, it } from "vitest";
import {
  cancelledRecord,
  commitStage,
  createDiagnosisRecord,
  diagnosisIdFor,
  finalizeRecord,
  isTerminal
} from "../src/pipeline/record.js";
import { makeDescriptor } from "./helpers.js";

const target = { channel: "google_search", metric: "cpa", asOfDate: "2025-03-15" };

describe("diagnosis record", () => {
  it("derives a stable id from channel, metric and date", () => {
    const id = diagnosisIdFor(target);
    expect(id).toMatch(/^dx-google-search-[0-9a-f]{8}$/);
    expect(diagnosisIdFor({ ...target })).toBe(id);
    expect(diagnosisIdFor({ ...target, asOfDate: "2025-03-16" })).not.toBe(id);
  });

  it("starts RUNNING with nothing committed", () => {
    const record = createDiagnosisRecord(target, "2025-03-15T06:00:00.000Z");
    expect(record).toMatchObject({
      status: "RUNNING",
      createdAt: "2025-03-15T06:00:00.000Z",
      incidents: [],
      actions: [],
      stepLog: [],
      committedStages: []
    });
    expect(isTerminal(record)).toBe(false);
  });

  it("commits stages in order and freezes the descriptor", () => {
    const record = createDiagnosisRecord(target);
    commitStage(record, { stage: "detect", output: makeDescriptor() });
    commitStage(record, { stage: "route", output: { family: "paid_media", method: "table", platform: "google_ads" } });
    expect(record.committedStages).toEqual(["detect", "route"]);
    expect(Object.isFrozen(record.descriptor)).toBe(true);
  });

  it("rejects out-of-order commits", () => {
    const record = createDiagnosisRecord(target);
    expect(() =>
      commitStage(record, { stage: "route", output: { family: "offline", method: "table", platform: "vendor_portal" } })
    ).toThrow(`Out-of-order commit on ${record.id}: expected detect, got route`);

    commitStage(record, { stage: "detect", output: makeDescriptor() });
    expect(() => commitStage(record, { stage: "detect", output: makeDescriptor() })).toThrow(
      "expected route, got detect"
    );
  });

  it("refuses commits and re-finalisation once terminal", () => {
    const record = createDiagnosisRecord(target);
    commitStage(record, {
      stage: "detect",
      output: null,
      skip: { reason: "below_threshold", detail: "|z|=1.2 below 2" }
    });
    finalizeRecord(record, "NO_ANOMALY", undefined, "2025-03-15T06:00:01.000Z");

    expect(record.detection).toEqual({ reason: "below_threshold", detail: "|z|=1.2 below 2" });
    expect(record.finishedAt).toBe("2025-03-15T06:00:01.000Z");
    expect(() => commitStage(record, { stage: "route", output: { family: "offline", method: "table", platform: "x" } }))
      .toThrow(`Diagnosis ${record.id} is NO_ANOMALY; cannot commit stage route`);
    expect(() => finalizeRecord(record, "FAILED")).toThrow(`Diagnosis ${record.id} is already NO_ANOMALY`);
  });

  it("builds a FAILED Cancelled record for runs cancelled before starting", () => {
    const record = cancelledRecord(target, "2025-03-15T06:00:00.000Z");
    expect(record.status).toBe("FAILED");
    expect(record.failure).toEqual({ stage: "detect", code: "Cancelled", message: "Cancelled while queued" });
    expect(record.stepLog).toEqual([
      {
        stage: "detect",
        status: "failed",
        attempt: 0,
        durationMs: 0,
        error: { code: "Cancelled", message: "Cancelled while queued" }
      }
    ]);
  });
});
