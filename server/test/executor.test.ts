import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import { RunExecutor, type PipelineFn } from "../src/executor.js";
import { RunManager } from "../src/run_manager.js";
import { CRITIC_AGENT, EXPLAINER_AGENT, INVESTIGATOR_AGENTS } from "../src/pipeline/agents.js";
import { loadEngineConfig } from "../src/pipeline/catalog.js";
import { readJsonSection } from "../src/pipeline/inference.js";
import { createDiagnosisPipeline, DIAGNOSIS_RECORD_ARTIFACT } from "../src/pipeline/pipeline.js";
import { PROPOSED_ACTIONS_ARTIFACT } from "../src/pipeline/proposer.js";
import type { DiagnosisRecord, DiagnosisTarget } from "../src/pipeline/record.js";
import { artifactAbsPath, readJsonFile } from "../src/pipeline/utils.js";
import {
  criticAnswer,
  deferred,
  explainerAnswer,
  FixedEmbedder,
  hang,
  investigatorAnswer,
  PAID_SUPPLEMENTARY,
  ScriptedBackend,
  seriesFrom,
  SPIKE_SERIES_VALUES,
  StubCorpus,
  StubDataLayer,
  useTempOutputDir,
  waitFor,
  type Deferred
} from "./helpers.js";

const search: DiagnosisTarget = { channel: "google_search", metric: "cpa", asOfDate: "2025-03-15" };
const meta: DiagnosisTarget = { channel: "meta_ads", metric: "cpa", asOfDate: "2025-03-15" };

function messageOf(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null || !("message" in payload)) return null;
  return typeof payload.message === "string" ? payload.message : null;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

let tmp: Awaited<ReturnType<typeof useTempOutputDir>> | null = null;

beforeEach(async () => {
  tmp = await useTempOutputDir();
});

afterEach(async () => {
  await tmp?.cleanup();
  tmp = null;
});

describe("RunExecutor", () => {
  it("defaults concurrency to 1 when options are omitted", async () => {
    const runs = new RunManager();
    const gate = deferred();
    let firstRunId: string | null = null;

    const pipeline: PipelineFn = async (input) => {
      if (!firstRunId) firstRunId = input.runId;
      if (input.runId === firstRunId) await gate.promise;
    };

    const exec = new RunExecutor(runs, pipeline);
    const r1 = await runs.createRun(search);
    const r2 = await runs.createRun(meta);

    exec.enqueue(r1.runId);
    exec.enqueue(r2.runId);

    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    expect(runs.getRun(r2.runId)?.status).toBe("queued");
    expect(exec.isQueued(r2.runId)).toBe(true);

    gate.resolve();
    await waitFor(() => runs.getRun(r2.runId)?.status === "done");
  });

  it("runs up to the concurrency limit in parallel", async () => {
    const runs = new RunManager();
    const gates = new Map<string, Deferred>();
    const pipeline: PipelineFn = async (input) => {
      const d = deferred();
      gates.set(input.runId, d);
      await d.promise;
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 2 });
    const r1 = await runs.createRun(search);
    const r2 = await runs.createRun(meta);
    const r3 = await runs.createRun({ ...search, metric: "clicks" });
    for (const r of [r1, r2, r3]) exec.enqueue(r.runId);

    await waitFor(() => gates.size === 2);
    expect(exec.isRunning(r1.runId)).toBe(true);
    expect(exec.isRunning(r2.runId)).toBe(true);
    expect(runs.getRun(r3.runId)?.status).toBe("queued");

    gates.get(r1.runId)?.resolve();
    await waitFor(() => gates.has(r3.runId));
    gates.get(r2.runId)?.resolve();
    gates.get(r3.runId)?.resolve();
    await waitFor(() => runs.getRun(r3.runId)?.status === "done");
  });

  it("enqueue is idempotent for queued runs and refuses running or missing ones", async () => {
    const runs = new RunManager();
    const gate = deferred();
    const calls = new Map<string, number>();
    let firstRunId: string | null = null;

    const pipeline: PipelineFn = async (input) => {
      calls.set(input.runId, (calls.get(input.runId) ?? 0) + 1);
      if (!firstRunId) firstRunId = input.runId;
      if (input.runId === firstRunId) await gate.promise;
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    const r1 = await runs.createRun(search);
    const r2 = await runs.createRun(meta);

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    expect(exec.enqueue(r1.runId)).toBe(false);
    expect(exec.enqueue("missing")).toBe(false);

    exec.enqueue(r2.runId);
    expect(exec.enqueue(r2.runId)).toBe(true);

    gate.resolve();
    await waitFor(() => runs.getRun(r2.runId)?.status === "done");
    expect(calls.get(r2.runId)).toBe(1);
  });

  it("emits error messages for pipeline failures, including non-Error throws", async () => {
    const runs = new RunManager();
    const msgs: string[] = [];
    const r1 = await runs.createRun(search);
    const r2 = await runs.createRun(meta);
    for (const r of [r1, r2]) {
      runs.subscribe(r.runId, (type, payload) => {
        const message = type === "error" ? messageOf(payload) : null;
        if (message) msgs.push(message);
      });
    }

    let which = 0;
    const pipeline: PipelineFn = async () => {
      which += 1;
      if (which === 1) throw new Error("Boom");
      throw "string-fail";
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    exec.enqueue(r1.runId);
    exec.enqueue(r2.runId);
    await waitFor(() => runs.getRun(r2.runId)?.status === "error");

    expect(msgs).toEqual(["Boom", "string-fail"]);
    expect(runs.getRun(r1.runId)?.finishedAt).toBeTruthy();
  });

  it("settles a queued run as cancelled without starting it", async () => {
    const runs = new RunManager();
    const gate = deferred();
    const started: string[] = [];
    const pipeline: PipelineFn = async (input) => {
      started.push(input.runId);
      await gate.promise;
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    const r1 = await runs.createRun(search);
    const r2 = await runs.createRun(meta);

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    exec.enqueue(r2.runId);

    expect(await exec.cancel(r2.runId)).toBe(true);
    expect(exec.isQueued(r2.runId)).toBe(false);

    const cancelled = runs.getRun(r2.runId);
    expect(cancelled?.status).toBe("error");
    expect(cancelled?.outcome).toMatchObject({
      status: "FAILED",
      actionCount: 0,
      failure: { stage: "detect", code: "Cancelled", message: "Cancelled while queued" }
    });
    expect(cancelled?.steps.detect).toMatchObject({
      status: "error",
      errorCode: "Cancelled",
      artifacts: [DIAGNOSIS_RECORD_ARTIFACT]
    });
    expect(cancelled?.steps.propose.status).toBe("skipped");

    const record = await readJsonFile<DiagnosisRecord>(artifactAbsPath(r2.runId, DIAGNOSIS_RECORD_ARTIFACT));
    expect(record.status).toBe("FAILED");
    expect(record.target).toEqual(meta);

    gate.resolve();
    await waitFor(() => runs.getRun(r1.runId)?.status === "done");
    expect(started).toEqual([r1.runId]);
  });

  it("returns false when cancelling an idle or missing run", async () => {
    const runs = new RunManager();
    const exec = new RunExecutor(runs, async () => undefined, { concurrency: 1 });
    const r1 = await runs.createRun(search);

    expect(await exec.cancel(r1.runId)).toBe(false);
    expect(await exec.cancel("missing")).toBe(false);
  });
});

describe("RunExecutor with the diagnosis pipeline", () => {
  it("cancels one of two concurrent diagnoses without disturbing the other", async () => {
    const runs = new RunManager();
    const dataLayer = new StubDataLayer(
      {
        "google_search:cpa": seriesFrom(SPIKE_SERIES_VALUES),
        "meta_ads:cpa": seriesFrom(SPIKE_SERIES_VALUES)
      },
      { google_search: PAID_SUPPLEMENTARY }
    );
    const backend = new ScriptedBackend({
      [INVESTIGATOR_AGENTS.paid_media.name]: (prompt, signal) => {
        const anomaly = readJsonSection(prompt, "ANOMALY");
        const channel = typeof anomaly === "object" && anomaly !== null && "channel" in anomaly ? anomaly.channel : null;
        return channel === "meta_ads" ? hang(signal) : investigatorAnswer();
      },
      [EXPLAINER_AGENT.name]: () => explainerAnswer(),
      [CRITIC_AGENT.name]: () => criticAnswer()
    });
    const pipeline = createDiagnosisPipeline({
      config: await loadEngineConfig(),
      dataLayer,
      backend,
      embedder: new FixedEmbedder(),
      corpus: new StubCorpus([])
    });

    const exec = new RunExecutor(runs, pipeline, { concurrency: 2 });
    const metaRun = await runs.createRun(meta);
    const searchRun = await runs.createRun(search);
    exec.enqueue(metaRun.runId);
    exec.enqueue(searchRun.runId);

    await waitFor(() => runs.getRun(metaRun.runId)?.steps.investigate.status === "running");
    expect(await exec.cancel(metaRun.runId)).toBe(true);

    await waitFor(() => runs.getRun(metaRun.runId)?.status === "error");
    await waitFor(() => runs.getRun(searchRun.runId)?.status === "done");

    const cancelled = runs.getRun(metaRun.runId);
    expect(cancelled?.outcome).toMatchObject({
      status: "FAILED",
      failure: { stage: "investigate", code: "Cancelled", message: "Cancelled" }
    });
    expect(cancelled?.steps.investigate).toMatchObject({ status: "error", errorCode: "Cancelled" });
    expect(cancelled?.steps.explain.status).toBe("skipped");
    expect(await exists(artifactAbsPath(metaRun.runId, PROPOSED_ACTIONS_ARTIFACT))).toBe(false);

    const completed = runs.getRun(searchRun.runId);
    expect(completed?.outcome).toMatchObject({
      status: "COMPLETED",
      family: "paid_media",
      severity: "critical",
      actionCount: 1,
      handoff: { status: "delivered", actionCount: 1 }
    });
    expect(completed?.steps.propose.artifacts).toEqual([DIAGNOSIS_RECORD_ARTIFACT, PROPOSED_ACTIONS_ARTIFACT]);
    expect(await exists(artifactAbsPath(searchRun.runId, PROPOSED_ACTIONS_ARTIFACT))).toBe(true);

    const record = await readJsonFile<DiagnosisRecord>(artifactAbsPath(searchRun.runId, DIAGNOSIS_RECORD_ARTIFACT));
    expect(record.status).toBe("COMPLETED");
    expect(record.actions[0]?.parameters).toEqual({ parameter: "target_cpa", operation: "increase", value: 40, unit: "pct" });
  });

  it("keeps a completed diagnosis when the action hand-off fails, and ends the run in error", async () => {
    const runs = new RunManager();
    const dataLayer = new StubDataLayer(
      { "google_search:cpa": seriesFrom(SPIKE_SERIES_VALUES) },
      { google_search: PAID_SUPPLEMENTARY }
    );
    const backend = new ScriptedBackend({
      [INVESTIGATOR_AGENTS.paid_media.name]: () => investigatorAnswer(),
      [EXPLAINER_AGENT.name]: () => explainerAnswer(),
      [CRITIC_AGENT.name]: () => criticAnswer()
    });
    let submits = 0;
    const pipeline = createDiagnosisPipeline(
      { config: await loadEngineConfig(), dataLayer, backend, embedder: new FixedEmbedder(), corpus: new StubCorpus([]) },
      {
        sinkFor: () => ({
          submit: async () => {
            submits += 1;
            throw new Error("connector rejected payload");
          }
        })
      }
    );

    const exec = new RunExecutor(runs, pipeline);
    const run = await runs.createRun(search);
    const errors: string[] = [];
    runs.subscribe(run.runId, (type, payload) => {
      const message = type === "error" ? messageOf(payload) : null;
      if (message) errors.push(message);
    });
    exec.enqueue(run.runId);
    await waitFor(() => runs.getRun(run.runId)?.status === "error");

    expect(errors).toEqual(["Action hand-off failed: connector rejected payload"]);
    expect(submits).toBe(1);
    const failed = runs.getRun(run.runId);
    expect(failed?.outcome).toMatchObject({
      status: "COMPLETED",
      actionCount: 1,
      handoff: { status: "failed", actionCount: 1, message: "connector rejected payload" }
    });
    expect(failed?.steps.propose.status).toBe("done");
    expect(failed?.steps.propose.artifacts).toEqual([DIAGNOSIS_RECORD_ARTIFACT]);
    expect(await exists(artifactAbsPath(run.runId, PROPOSED_ACTIONS_ARTIFACT))).toBe(false);

    const record = await readJsonFile<DiagnosisRecord>(artifactAbsPath(run.runId, DIAGNOSIS_RECORD_ARTIFACT));
    expect(record.status).toBe("COMPLETED");
    expect(record.actions).toHaveLength(1);
  });
});
