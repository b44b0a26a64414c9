import type { RunManager } from "./run_manager.js";
import { DIAGNOSIS_RECORD_ARTIFACT } from "./pipeline/pipeline.js";
import { cancelledRecord, type DiagnosisTarget } from "./pipeline/record.js";
import { artifactAbsPath, errorMessage, nowIso, writeJsonFile } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineFn = (
  input: { runId: string; target: DiagnosisTarget },
  runs: RunManager,
  options: PipelineOptions
) => Promise<void>;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  isQueued(runId: string): boolean {
    return this.queue.includes(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status !== "queued") return false;

    // Avoid duplicate queue entries.
    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  /** Aborts a running diagnosis, or settles a queued one without starting it. */
  async cancel(runId: string): Promise<boolean> {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx === -1) return false;

    this.queue.splice(idx, 1);
    const at = nowIso();
    const record = cancelledRecord(run.target, at);
    await writeJsonFile(artifactAbsPath(runId, DIAGNOSIS_RECORD_ARTIFACT), record);
    await this.runs.recordStepEntry(runId, record.stepLog[0]);
    await this.runs.addArtifact(runId, "detect", DIAGNOSIS_RECORD_ARTIFACT);
    await this.runs.setOutcome(runId, record);
    await this.runs.setRunStatus(runId, "error", { finishedAt: at });
    return true;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      // Claim the slot before the first await so drain() cannot over-subscribe.
      const controller = new AbortController();
      this.running.set(next, controller);
      this.start(next, controller).catch((err: unknown) => {
        this.runs.error(next, `Executor failure: ${errorMessage(err)}`);
      });
    }
  }

  private async start(runId: string, controller: AbortController): Promise<void> {
    try {
      const run = this.runs.getRun(runId);
      if (!run) return;

      await this.runs.setRunStatus(runId, "running");
      try {
        await this.pipeline({ runId, target: run.target }, this.runs, { signal: controller.signal });
        const status = controller.signal.aborted ? "error" : "done";
        await this.runs.setRunStatus(runId, status, { finishedAt: nowIso() });
      } catch (err) {
        const msg = controller.signal.aborted ? "Cancelled" : errorMessage(err);
        this.runs.error(runId, msg);
        await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });
      }
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
