import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import {
  STAGE_ORDER,
  type DiagnosisRecord,
  type DiagnosisTarget,
  type StageName,
  type StepLogEntry,
  type StepStatus,
  type TerminalStatus
} from "./pipeline/record.js";
import {
  ensureDir,
  nowIso,
  outputRootAbs,
  runOutputDirAbs,
  slug,
  tryReadJsonFile,
  writeJsonFile
} from "./pipeline/utils.js";

export const STEP_ORDER = STAGE_ORDER;
export type StepName = StageName;

export type StepRecord = {
  name: StepName;
  status: "queued" | "running" | "done" | "skipped" | "degraded" | "blocked" | "error";
  startedAt?: string;
  finishedAt?: string;
  attempts: number;
  error?: string;
  errorCode?: string;
  artifacts: string[];
};

export type RunOutcome = {
  status: TerminalStatus;
  diagnosisId: string;
  severity?: string;
  family?: string;
  actionCount: number;
  failure?: DiagnosisRecord["failure"];
  blockReason?: string;
  handoff?: ActionHandoff;
};

export type ActionHandoff = {
  status: "delivered" | "failed";
  actionCount: number;
  message?: string;
};

export type RunStatus = {
  runId: string;
  target: DiagnosisTarget;
  batchId?: string;
  status: "queued" | "running" | "done" | "error";
  startedAt: string;
  finishedAt?: string;
  outcome?: RunOutcome;
  steps: Record<StepName, StepRecord>;
  outputFolder: string;
};

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "target" | "batchId" | "status" | "startedAt" | "finishedAt"> & {
  outcome?: TerminalStatus;
};

export type RunRetentionStats = {
  totalRuns: number;
  terminalRuns: number;
  activeRuns: number;
};

export type CleanupRunsResult = {
  keepLast: number;
  dryRun: boolean;
  scannedTerminalRuns: number;
  keptRunIds: string[];
  deletedRunIds: string[];
  reclaimedBytes: number;
};

const RUN_ID_SLUG_MAX = 40;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

const STEP_STATUS_BY_LOG: Record<Exclude<StepStatus, "retry">, StepRecord["status"]> = {
  ok: "done",
  skipped: "skipped",
  degraded: "degraded",
  blocked: "blocked",
  failed: "error"
};

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

export function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "error";
}

function emptySteps(): Record<StepName, StepRecord> {
  const steps = {} as Record<StepName, StepRecord>;
  for (const name of STEP_ORDER) steps[name] = { name, status: "queued", attempts: 0, artifacts: [] };
  return steps;
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const recoveredSteps = { ...run.steps };

  for (const stepName of STEP_ORDER) {
    const step = recoveredSteps[stepName];
    if (!step) continue;
    if (step.status === "running" || step.status === "queued") {
      recoveredSteps[stepName] = {
        ...step,
        status: "error",
        error: step.error ?? "Recovered after server restart while run was active.",
        finishedAt: step.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "error",
    finishedAt: run.finishedAt ?? recoveredAt,
    steps: recoveredSteps
  };
}

function newEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // Node treats "error" events specially: if nobody is listening, it throws.
  // Errors are an optional event stream here, never a process crash.
  emitter.on("error", () => undefined);
  return emitter;
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  retentionStats(): RunRetentionStats {
    const totalRuns = this.runs.size;
    const terminalRuns = [...this.runs.values()].filter((r) => isTerminalRunStatus(r.status)).length;
    return { totalRuns, terminalRuns, activeRuns: totalRuns - terminalRuns };
  }

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true });
    for (const ent of entries) {
      if (!ent.isDirectory() || ent.name.startsWith("_")) continue;
      const runId = ent.name;
      const runJsonPath = path.join(runOutputDirAbs(runId), "run.json");
      const data = await tryReadJsonFile<RunStatus>(runJsonPath);
      if (!data || !data.target || !data.steps) continue;
      const recovered = recoverStaleLoadedRun(data);
      if (recovered !== data) await writeJsonFile(runJsonPath, recovered);
      this.runs.set(runId, { ...recovered, emitter: newEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({
        runId: r.runId,
        target: r.target,
        batchId: r.batchId,
        status: r.status,
        startedAt: r.startedAt,
        finishedAt: r.finishedAt,
        outcome: r.outcome?.status
      }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  async cleanupTerminalRuns(keepLast: number, dryRun: boolean): Promise<CleanupRunsResult> {
    const keep = Math.max(0, Math.floor(keepLast));
    const terminalRuns = [...this.runs.values()]
      .filter((r) => isTerminalRunStatus(r.status))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
    const kept = terminalRuns.slice(0, keep);
    const toDelete = terminalRuns.slice(keep);

    let reclaimedBytes = 0;
    for (const run of toDelete) {
      reclaimedBytes += await this.dirSizeBytes(runOutputDirAbs(run.runId));
      if (!dryRun) {
        await fs.rm(runOutputDirAbs(run.runId), { recursive: true, force: true });
        this.runs.delete(run.runId);
      }
    }

    return {
      keepLast: keep,
      dryRun,
      scannedTerminalRuns: terminalRuns.length,
      keptRunIds: kept.map((r) => r.runId),
      deletedRunIds: toDelete.map((r) => r.runId),
      reclaimedBytes
    };
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  getInternal(runId: string): RunInternal | null {
    return this.runs.get(runId) ?? null;
  }

  runsInBatch(batchId: string): RunStatus[] {
    return [...this.runs.values()]
      .filter((r) => r.batchId === batchId)
      .sort((a, b) => (a.startedAt < b.startedAt ? -1 : a.startedAt > b.startedAt ? 1 : 0))
      .map((r) => this.snapshot(r));
  }

  private async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    try {
      const st = await fs.stat(runOutputDirAbs(runId));
      return st.isDirectory();
    } catch {
      return false;
    }
  }

  private async nextRunId(target: DiagnosisTarget): Promise<string> {
    const base = slug(`${target.channel}-${target.metric}`).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "run";
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${base}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(target: DiagnosisTarget, options?: { batchId?: string }): Promise<RunStatus> {
    const runId = await this.nextRunId(target);
    const run: RunInternal = {
      runId,
      target: { ...target },
      batchId: options?.batchId,
      status: "queued",
      startedAt: nowIso(),
      steps: emptySteps(),
      outputFolder: path.join("output", runId),
      emitter: newEmitter()
    };

    await ensureDir(runOutputDirAbs(runId));
    await writeJsonFile(path.join(runOutputDirAbs(runId), "run.json"), this.snapshot(run));

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  async setRunStatus(runId: string, status: RunStatus["status"], patch?: Pick<RunStatus, "finishedAt">): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    await this.persist(r);
    r.emitter.emit("run_status", { status, at: nowIso() });
  }

  async startStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = "running";
    s.startedAt = nowIso();
    s.attempts = 1;
    await this.persist(r);
    r.emitter.emit("step_started", { step, at: s.startedAt });
  }

  /** Applies one step-log entry: a retry bumps the attempt count, anything else closes the step. */
  async recordStepEntry(runId: string, entry: StepLogEntry): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[entry.stage];
    const at = nowIso();

    if (entry.status === "retry") {
      s.attempts = entry.attempt + 1;
      await this.persist(r);
      r.emitter.emit("step_retry", { step: entry.stage, attempt: entry.attempt, error: entry.error, at });
      return;
    }

    s.status = STEP_STATUS_BY_LOG[entry.status];
    s.attempts = Math.max(s.attempts, entry.attempt);
    s.startedAt = s.startedAt ?? at;
    s.finishedAt = at;
    if (entry.error) {
      s.error = entry.error.message;
      s.errorCode = entry.error.code;
    }
    await this.persist(r);
    r.emitter.emit("step_finished", { step: entry.stage, at, status: s.status, ok: entry.status !== "failed" });
    if (entry.status === "failed" && entry.error) {
      r.emitter.emit("error", { step: entry.stage, message: entry.error.message, code: entry.error.code, at });
    }
  }

  /** Stores the terminal diagnosis summary; stages the run never reached are marked skipped. */
  async setOutcome(runId: string, record: DiagnosisRecord): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    if (record.status === "RUNNING") throw new Error(`Diagnosis ${record.id} is not terminal`);
    for (const name of STEP_ORDER) {
      if (r.steps[name].status === "queued") r.steps[name].status = "skipped";
    }
    r.outcome = {
      status: record.status,
      diagnosisId: record.id,
      severity: record.descriptor?.severity,
      family: record.route?.family,
      actionCount: record.actions.length,
      failure: record.failure,
      blockReason: record.blockReason
    };
    await this.persist(r);
    r.emitter.emit("outcome", { ...r.outcome, at: nowIso() });
  }

  async setHandoff(runId: string, handoff: ActionHandoff): Promise<void> {
    const r = this.runs.get(runId);
    if (!r?.outcome) return;
    r.outcome = { ...r.outcome, handoff };
    await this.persist(r);
    r.emitter.emit("handoff", { ...handoff, at: nowIso() });
  }

  async addArtifact(runId: string, step: StepName, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { step, name, at: nowIso() });
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: string, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const types = [
      "run_status",
      "step_started",
      "step_retry",
      "step_finished",
      "artifact_written",
      "outcome",
      "handoff",
      "log",
      "error"
    ] as const;
    const handlers = types.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      r.emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) r.emitter.off(type, handler);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return pub;
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"), this.snapshot(run));
  }

  private async dirSizeBytes(dir: string): Promise<number> {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return 0;
    }
    let sum = 0;
    for (const ent of entries) {
      const p = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        sum += await this.dirSizeBytes(p);
        continue;
      }
      if (!ent.isFile()) continue;
      sum += (await fs.stat(p)).size;
    }
    return sum;
  }
}
