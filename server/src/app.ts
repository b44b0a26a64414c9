import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import archiver from "archiver";
import { z } from "zod";
import type { RunExecutor } from "./executor.js";
import type { RunManager } from "./run_manager.js";
import {
  BatchRequestSchema,
  createBatch,
  loadBatchManifest,
  writeBatchReport,
  type BatchSource
} from "./pipeline/batch.js";
import type { EngineConfig } from "./pipeline/catalog.js";
import { STAGE_ORDER } from "./pipeline/record.js";
import {
  defaultStagePolicy,
  loadStagePolicy,
  normalizeStageOverrides,
  RetryPolicyOverrideSchema,
  saveStagePolicy,
  STAGE_ATTEMPTS_MAX,
  STAGE_ATTEMPTS_MIN,
  STAGE_DELAY_MAX_MS,
  STAGE_TIMEOUT_MAX_MS,
  STAGE_TIMEOUT_MIN_MS,
  type StagePolicyState
} from "./stage_policy.js";
import { artifactAbsPath, errorMessage, isSafeArtifactName, nowIso, runOutputDirAbs } from "./pipeline/utils.js";

export type PipelineMode = "fake" | "live";

export type AppOptions = {
  /** Loaded catalog and routing table, served read-only. */
  config?: EngineConfig;
  mode?: PipelineMode;
  /** Scanned by batches that name no targets. */
  dataLayer?: BatchSource;
};

const RETENTION_KEEP_LAST_DEFAULT = 50;
const RETENTION_KEEP_LAST_MIN = 0;
const RETENTION_KEEP_LAST_MAX = 1000;

const BATCH_ID_PATTERN = /^batch-\d{8}-[0-9a-f]{8}$/;

const CreateRunBodySchema = z
  .object({
    channel: z.string().trim().min(1).max(120),
    metric: z.string().trim().min(1).max(120),
    asOfDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  })
  .strict();

const CleanupRunsBodySchema = z
  .object({
    keepLast: z.number().int().min(RETENTION_KEEP_LAST_MIN).max(RETENTION_KEEP_LAST_MAX).optional(),
    dryRun: z.boolean().optional()
  })
  .strict();

const UpdateStagePolicyBodySchema = z
  .object({
    reset: z.boolean().optional(),
    stages: z.record(z.enum(STAGE_ORDER), RetryPolicyOverrideSchema).optional()
  })
  .strict();

function retentionKeepLastDefault(): number {
  const raw = Number(process.env.CDX_RUN_RETENTION_KEEP_LAST ?? RETENTION_KEEP_LAST_DEFAULT);
  if (!Number.isFinite(raw)) return RETENTION_KEEP_LAST_DEFAULT;
  return Math.min(RETENTION_KEEP_LAST_MAX, Math.max(RETENTION_KEEP_LAST_MIN, Math.round(raw)));
}

export function createApp(runs: RunManager, executor: RunExecutor, options: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));
  let stagePolicy: StagePolicyState | null = null;

  async function ensureStagePolicy(): Promise<StagePolicyState> {
    if (stagePolicy) return stagePolicy;
    stagePolicy = await loadStagePolicy();
    return stagePolicy;
  }

  async function policyEnvelope() {
    return {
      policy: await ensureStagePolicy(),
      bounds: {
        timeoutMs: { min: STAGE_TIMEOUT_MIN_MS, max: STAGE_TIMEOUT_MAX_MS },
        maxAttempts: { min: STAGE_ATTEMPTS_MIN, max: STAGE_ATTEMPTS_MAX },
        delayMs: { min: 0, max: STAGE_DELAY_MAX_MS }
      },
      defaults: defaultStagePolicy().stages
    };
  }

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      hasKey: Boolean(process.env.OPENAI_API_KEY && process.env.OPENAI_API_KEY.trim().length > 0),
      mode: options.mode ?? "live",
      catalogVersion: options.config?.catalog.version ?? null,
      routingVersion: options.config?.routing.version ?? null
    });
  });

  app.get("/api/catalog", (_req, res) => {
    if (!options.config) {
      res.status(404).json({ error: "catalog not loaded" });
      return;
    }
    res.json({ catalog: options.config.catalog, routing: options.config.routing });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const run = await runs.createRun(parsed.data);
    res.json({ runId: run.runId });

    executor.enqueue(run.runId);
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/retention", (_req, res) => {
    res.json({
      policy: { keepLastTerminalRuns: retentionKeepLastDefault() },
      stats: runs.retentionStats()
    });
  });

  app.post("/api/runs/cleanup", async (req, res) => {
    const parsed = CleanupRunsBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const keepLast = parsed.data.keepLast ?? retentionKeepLastDefault();
    const dryRun = parsed.data.dryRun ?? false;
    const result = await runs.cleanupTerminalRuns(keepLast, dryRun);
    res.json({ ...result, stats: runs.retentionStats() });
  });

  app.get("/api/stage-policy", async (_req, res) => {
    res.json(await policyEnvelope());
  });

  app.put("/api/stage-policy", async (req, res) => {
    const parsed = UpdateStagePolicyBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const base = parsed.data.reset ? defaultStagePolicy() : await ensureStagePolicy();
    const next: StagePolicyState = {
      stages: normalizeStageOverrides(parsed.data.stages ?? {}, base.stages),
      updatedAt: nowIso()
    };
    await saveStagePolicy(next);
    stagePolicy = next;
    res.json(await policyEnvelope());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/cancel", async (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = await executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getInternal(runId);
    if (!run) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="run-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(runOutputDirAbs(runId), false);
    archive.finalize().catch((err: unknown) => {
      runs.error(runId, `zip error: ${errorMessage(err)}`);
    });
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const dir = runOutputDirAbs(runId);
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
    const infos: Array<{ name: string; size: number; mtimeMs: number }> = [];
    for (const ent of entries) {
      if (!ent.isFile() || ent.name.includes(".tmp.")) continue;
      const st = await fs.stat(path.join(dir, ent.name)).catch(() => null);
      if (!st) continue;
      infos.push({ name: ent.name, size: st.size, mtimeMs: st.mtimeMs });
    }
    res.json(infos.sort((a, b) => b.mtimeMs - a.mtimeMs || a.name.localeCompare(b.name)));
  });

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    const runId = req.params.runId;
    const name = req.params.name;

    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).send("run not found");
      return;
    }

    try {
      const data = await fs.readFile(artifactAbsPath(runId, name));
      const lower = name.toLowerCase();
      if (lower.endsWith(".json")) res.setHeader("Content-Type", "application/json; charset=utf-8");
      else if (lower.endsWith(".md")) res.setHeader("Content-Type", "text/markdown; charset=utf-8");
      else res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.send(data);
    } catch {
      res.status(404).send("artifact not found");
    }
  });

  app.post("/api/batches", async (req, res) => {
    const parsed = BatchRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }
    if (!parsed.data.targets && !options.dataLayer) {
      res.status(400).json({ error: "targets required: no data layer to scan" });
      return;
    }
    const manifest = await createBatch(parsed.data, runs, executor, { source: options.dataLayer });
    res.json(manifest);
  });

  app.get("/api/batches/:batchId", async (req, res) => {
    const batchId = req.params.batchId;
    const manifest = BATCH_ID_PATTERN.test(batchId) ? await loadBatchManifest(batchId) : null;
    if (!manifest) {
      res.status(404).json({ error: "batch not found" });
      return;
    }
    res.json({ ...manifest, runs: runs.runsInBatch(batchId) });
  });

  app.get("/api/batches/:batchId/report", async (req, res) => {
    const batchId = req.params.batchId;
    const manifest = BATCH_ID_PATTERN.test(batchId) ? await loadBatchManifest(batchId) : null;
    if (!manifest) {
      res.status(404).send("batch not found");
      return;
    }
    const markdown = await writeBatchReport(manifest, runs);
    res.setHeader("Content-Type", "text/markdown; charset=utf-8");
    res.send(markdown);
  });

  return app;
}
