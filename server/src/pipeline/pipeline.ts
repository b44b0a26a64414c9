import type { PipelineFn } from "../executor.js";
import { loadStagePolicy } from "../stage_policy.js";
import type { EngineConfig } from "./catalog.js";
import { DEFAULT_CRITIC_SETTINGS, validateDiagnosis, type CriticSettings } from "./critic.js";
import type { DataLayer } from "./data_layer.js";
import { DEFAULT_DETECTOR_SETTINGS, detectAnomaly, type DetectorSettings } from "./detector.js";
import type { Embedder } from "./embeddings.js";
import { DiagnosisError, toDiagnosisError } from "./errors.js";
import { synthesizeDiagnosis } from "./explainer.js";
import type { InferenceBackend } from "./inference.js";
import { investigate } from "./investigators.js";
import {
  DEFAULT_RETRIEVAL_SETTINGS,
  retrieveIncidents,
  type IncidentCorpus,
  type RetrievalSettings
} from "./memory.js";
import { ArtifactActionSink, PROPOSED_ACTIONS_ARTIFACT, proposeActions, type ActionSink } from "./proposer.js";
import {
  type ActionPayload,
  commitStage,
  createDiagnosisRecord,
  finalizeRecord,
  type DiagnosisRecord,
  type DiagnosisTarget,
  type RetrievedIncident,
  type StageName,
  type StepLogEntry
} from "./record.js";
import { DEFAULT_STAGE_POLICY, withRetry, type AttemptFailure, type StagePolicy } from "./retry.js";
import { routeAnomaly } from "./router.js";
import { artifactAbsPath, errorMessage, nowIso, writeJsonFile } from "./utils.js";

export type DiagnosisDeps = {
  config: EngineConfig;
  dataLayer: DataLayer;
  backend: InferenceBackend;
  embedder: Embedder;
  corpus: IncidentCorpus;
};

export type DiagnosisSettings = {
  detector: DetectorSettings;
  retrieval: RetrievalSettings;
  critic: CriticSettings;
  stagePolicy: StagePolicy;
};

export const DEFAULT_DIAGNOSIS_SETTINGS: Readonly<DiagnosisSettings> = {
  detector: DEFAULT_DETECTOR_SETTINGS,
  retrieval: DEFAULT_RETRIEVAL_SETTINGS,
  critic: DEFAULT_CRITIC_SETTINGS,
  stagePolicy: DEFAULT_STAGE_POLICY
};

export type StageHooks = {
  onStageStart?: (stage: StageName) => void | Promise<void>;
  /** Every step-log entry, retries included, in the order it is appended. */
  onStepLogged?: (entry: StepLogEntry) => void | Promise<void>;
  log?: (message: string, stage?: StageName) => void;
};

export type DiagnoseOptions = {
  signal?: AbortSignal;
  settings?: Partial<DiagnosisSettings>;
  hooks?: StageHooks;
  now?: () => string;
};

class StageFailure extends Error {
  constructor(
    readonly stage: StageName,
    readonly error: DiagnosisError,
    readonly attempt: number,
    readonly durationMs: number
  ) {
    super(error.message);
    this.name = "StageFailure";
  }
}

/**
 * Runs one anomaly through detect, route, investigate, retrieve, explain, critic and propose.
 * Stage errors never escape: the returned record always carries a terminal status.
 */
export async function diagnoseAnomaly(
  target: DiagnosisTarget,
  deps: DiagnosisDeps,
  options: DiagnoseOptions = {}
): Promise<DiagnosisRecord> {
  const settings: DiagnosisSettings = { ...DEFAULT_DIAGNOSIS_SETTINGS, ...options.settings };
  const signal = options.signal ?? new AbortController().signal;
  const now = options.now ?? nowIso;
  const hooks = options.hooks ?? {};
  const record = createDiagnosisRecord(target, now());

  async function logStep(entry: StepLogEntry): Promise<void> {
    record.stepLog.push(entry);
    await hooks.onStepLogged?.(entry);
  }

  function retryLogger(stage: StageName, onFailure: (failure: AttemptFailure) => void) {
    return async (failure: AttemptFailure) => {
      onFailure(failure);
      if (!failure.willRetry) return;
      hooks.log?.(
        `${stage} attempt ${failure.attempt} failed (${failure.error.code}): ${failure.error.message}; retrying`,
        stage
      );
      await logStep({
        stage,
        status: "retry",
        attempt: failure.attempt,
        durationMs: failure.durationMs,
        error: { code: failure.error.code, message: failure.error.message }
      });
    };
  }

  async function runStage<T>(
    stage: StageName,
    fn: (attemptSignal: AbortSignal) => Promise<T>
  ): Promise<{ value: T; attempts: number; durationMs: number }> {
    await hooks.onStageStart?.(stage);
    const startedAt = Date.now();
    let lastAttempt = 1;
    try {
      const outcome = await withRetry(fn, {
        policy: settings.stagePolicy[stage],
        signal,
        onAttemptFailed: retryLogger(stage, (f) => {
          lastAttempt = f.attempt;
        })
      });
      return { ...outcome, durationMs: Date.now() - startedAt };
    } catch (err) {
      throw new StageFailure(stage, toDiagnosisError(err, signal), lastAttempt, Date.now() - startedAt);
    }
  }

  try {
    // detect
    const detection = await runStage("detect", async (attemptSignal) => {
      const series = await deps.dataLayer.fetchMetricSeries(
        target.channel,
        target.metric,
        target.asOfDate,
        settings.detector.windowLength + 1,
        attemptSignal
      );
      return detectAnomaly(
        {
          channel: target.channel,
          metric: target.metric,
          series,
          evaluationDate: target.asOfDate,
          detectedAt: now()
        },
        settings.detector
      );
    });

    if (detection.value.kind === "none") {
      const { reason, detail } = detection.value;
      const noUsableData = reason === "insufficient_data" || reason === "stale_data";
      commitStage(record, { stage: "detect", output: null, skip: { reason, detail } });
      const entry: StepLogEntry = {
        stage: "detect",
        status: noUsableData ? "skipped" : "ok",
        attempt: detection.attempts,
        durationMs: detection.durationMs
      };
      if (noUsableData) entry.error = { code: "InsufficientData", message: detail };
      await logStep(entry);
      hooks.log?.(`No anomaly: ${detail}`, "detect");
      return finalizeRecord(record, "NO_ANOMALY", undefined, now());
    }

    const descriptor = detection.value.descriptor;
    commitStage(record, { stage: "detect", output: descriptor });
    await logStep({ stage: "detect", status: "ok", attempt: detection.attempts, durationMs: detection.durationMs });
    hooks.log?.(
      `${descriptor.severity} ${descriptor.direction}: ${descriptor.metric}=${descriptor.observedValue} (z=${descriptor.zScore})`,
      "detect"
    );

    // route
    await hooks.onStageStart?.("route");
    const routeStartedAt = Date.now();
    let routeAttempt = 1;
    const routed = await routeAnomaly({
      descriptor,
      routing: deps.config.routing,
      backend: deps.backend,
      policy: settings.stagePolicy.route,
      signal,
      onAttemptFailed: retryLogger("route", (f) => {
        routeAttempt = f.attempt;
      })
    }).catch((err: unknown) => {
      throw new StageFailure("route", toDiagnosisError(err, signal), routeAttempt, Date.now() - routeStartedAt);
    });
    commitStage(record, { stage: "route", output: routed.decision });
    const routeEntry: StepLogEntry = {
      stage: "route",
      status: routed.decision.method === "fallback" ? "degraded" : "ok",
      attempt: routed.attempts,
      durationMs: Date.now() - routeStartedAt
    };
    if (routed.decision.method !== "table") {
      routeEntry.error = { code: "AmbiguousRoute", message: routed.decision.note ?? descriptor.channel };
    }
    await logStep(routeEntry);
    hooks.log?.(`Routed to ${routed.decision.family} (${routed.decision.method})`, "route");

    // investigate
    const investigated = await runStage("investigate", (attemptSignal) =>
      investigate({
        family: routed.decision.family,
        descriptor,
        dataLayer: deps.dataLayer,
        backend: deps.backend,
        signal: attemptSignal
      })
    );
    const finding = investigated.value;
    commitStage(record, { stage: "investigate", output: finding });
    await logStep({
      stage: "investigate",
      status: "ok",
      attempt: investigated.attempts,
      durationMs: investigated.durationMs
    });

    // retrieve
    let incidents: RetrievedIncident[] = [];
    try {
      const retrieved = await runStage("retrieve", (attemptSignal) =>
        retrieveIncidents({
          descriptor,
          finding,
          embedder: deps.embedder,
          corpus: deps.corpus,
          settings: settings.retrieval,
          signal: attemptSignal
        })
      );
      incidents = retrieved.value;
      commitStage(record, { stage: "retrieve", output: incidents });
      await logStep({ stage: "retrieve", status: "ok", attempt: retrieved.attempts, durationMs: retrieved.durationMs });
    } catch (err) {
      if (!(err instanceof StageFailure) || err.error.code === "Cancelled") throw err;
      commitStage(record, { stage: "retrieve", output: [] });
      await logStep({
        stage: "retrieve",
        status: "degraded",
        attempt: err.attempt,
        durationMs: err.durationMs,
        error: { code: "RetrievalUnavailable", message: err.error.message }
      });
      hooks.log?.(`Incident memory unavailable; continuing without it (${err.error.message})`, "retrieve");
    }

    // explain
    const explained = await runStage("explain", (attemptSignal) =>
      synthesizeDiagnosis({
        descriptor,
        finding,
        incidents,
        catalog: deps.config.catalog,
        backend: deps.backend,
        signal: attemptSignal
      })
    );
    const synthesis = explained.value;
    commitStage(record, { stage: "explain", output: synthesis });
    await logStep({ stage: "explain", status: "ok", attempt: explained.attempts, durationMs: explained.durationMs });
    if (synthesis.rejected.length > 0) {
      hooks.log?.(`Set aside ${synthesis.rejected.length} action(s) without resolvable evidence`, "explain");
    }

    // critic
    const reviewed = await runStage("critic", (attemptSignal) =>
      validateDiagnosis({
        descriptor,
        finding,
        incidents,
        synthesis,
        catalog: deps.config.catalog,
        settings: settings.critic,
        backend: deps.backend,
        signal: attemptSignal
      })
    );
    const verdict = reviewed.value;
    commitStage(record, { stage: "critic", output: verdict });
    if (verdict.outcome === "BLOCK") {
      const blockReason = verdict.blockReason ?? "Blocked by validation";
      await logStep({
        stage: "critic",
        status: "blocked",
        attempt: reviewed.attempts,
        durationMs: reviewed.durationMs,
        error: { code: "SafetyBlocked", message: blockReason }
      });
      hooks.log?.(`Blocked: ${blockReason}`, "critic");
      return finalizeRecord(record, "BLOCKED", { blockReason }, now());
    }
    await logStep({ stage: "critic", status: "ok", attempt: reviewed.attempts, durationMs: reviewed.durationMs });

    // propose
    await hooks.onStageStart?.("propose");
    const proposeStartedAt = Date.now();
    let actions: ActionPayload[];
    try {
      actions = proposeActions({ diagnosisId: record.id, synthesis, verdict, config: deps.config });
    } catch (err) {
      throw new StageFailure("propose", toDiagnosisError(err, signal), 1, Date.now() - proposeStartedAt);
    }
    commitStage(record, { stage: "propose", output: actions });
    await logStep({ stage: "propose", status: "ok", attempt: 1, durationMs: Date.now() - proposeStartedAt });
    return finalizeRecord(record, "COMPLETED", undefined, now());
  } catch (err) {
    if (!(err instanceof StageFailure)) throw err;
    await logStep({
      stage: err.stage,
      status: "failed",
      attempt: err.attempt,
      durationMs: err.durationMs,
      error: { code: err.error.code, message: err.error.message }
    });
    hooks.log?.(`${err.stage} failed (${err.error.code}): ${err.error.message}`, err.stage);
    return finalizeRecord(
      record,
      "FAILED",
      { failure: { stage: err.stage, code: err.error.code, message: err.error.message } },
      now()
    );
  }
}

export const DIAGNOSIS_RECORD_ARTIFACT = "diagnosis_record.json";

export type DiagnosisPipelineOptions = {
  settings?: Partial<Omit<DiagnosisSettings, "stagePolicy">>;
  /** Where COMPLETED action lists go; defaults to a run artifact. */
  sinkFor?: (runId: string) => ActionSink;
};

/** Binds the engine to the run store: stage events, artifacts and the action hand-off. */
export function createDiagnosisPipeline(deps: DiagnosisDeps, options: DiagnosisPipelineOptions = {}): PipelineFn {
  return async (input, runs, { signal }) => {
    const { runId, target } = input;
    const policy = await loadStagePolicy();
    runs.log(runId, `Diagnosing ${target.metric} on ${target.channel} as of ${target.asOfDate}`);

    const record = await diagnoseAnomaly(target, deps, {
      signal,
      settings: { ...options.settings, stagePolicy: policy.stages },
      hooks: {
        onStageStart: (stage) => runs.startStep(runId, stage),
        onStepLogged: (entry) => runs.recordStepEntry(runId, entry),
        log: (message, stage) => runs.log(runId, message, stage)
      }
    });

    const lastStage = record.stepLog.at(-1)?.stage ?? "detect";
    await writeJsonFile(artifactAbsPath(runId, DIAGNOSIS_RECORD_ARTIFACT), record);
    await runs.addArtifact(runId, lastStage, DIAGNOSIS_RECORD_ARTIFACT);

    await runs.setOutcome(runId, record);
    if (record.status !== "COMPLETED") return;

    // A failed hand-off keeps the diagnosis outcome; the run ends in error.
    const sink = options.sinkFor?.(runId) ?? new ArtifactActionSink(runId);
    try {
      await withRetry(() => sink.submit(record.actions, record), { policy: policy.stages.propose, signal });
    } catch (err) {
      const message = errorMessage(err);
      await runs.setHandoff(runId, { status: "failed", actionCount: record.actions.length, message });
      throw new Error(`Action hand-off failed: ${message}`);
    }
    if (sink instanceof ArtifactActionSink) await runs.addArtifact(runId, "propose", PROPOSED_ACTIONS_ARTIFACT);
    await runs.setHandoff(runId, { status: "delivered", actionCount: record.actions.length });
    runs.log(runId, `Handed off ${record.actions.length} action(s)`, "propose");
  };
}
