import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import type { RunExecutor } from "../executor.js";
import type { RunManager, RunStatus } from "../run_manager.js";
import type { DataLayer, SeriesIndex, SeriesKey } from "./data_layer.js";
import { DEFAULT_DETECTOR_SETTINGS, detectAnomaly, type DetectorSettings } from "./detector.js";
import { DIAGNOSIS_RECORD_ARTIFACT } from "./pipeline.js";
import type { DiagnosisRecord } from "./record.js";
import { SeveritySchema, type Severity } from "./schemas.js";
import {
  artifactAbsPath,
  batchDirAbs,
  ensureDir,
  nowIso,
  readJsonFile,
  tryReadJsonFile,
  writeJsonFile,
  writeTextFile
} from "./utils.js";

export const BATCH_MANIFEST_FILE = "batch.json";
export const BATCH_REPORT_FILE = "batch_report.md";
export const DEFAULT_BATCH_MAX_RUNS = 50;

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const BatchRequestSchema = z.object({
  /** Omitted: every series the data layer holds is scanned and anomalies at `minSeverity` become runs. */
  targets: z
    .array(z.object({ channel: z.string().trim().min(1), metric: z.string().trim().min(1) }))
    .min(1)
    .optional(),
  asOfDate: IsoDateSchema.optional(),
  minSeverity: SeveritySchema.optional(),
  maxRuns: z.number().int().min(1).max(500).optional()
});

export type BatchRequest = z.infer<typeof BatchRequestSchema>;

export type BatchManifest = {
  batchId: string;
  createdAt: string;
  asOfDate: string;
  minSeverity: Severity;
  runIds: string[];
  /** Targets beyond `maxRuns`, listed but never run. */
  skippedTargets: SeriesKey[];
  scan?: { seriesScanned: number; matched: number };
};

export type BatchSource = DataLayer & SeriesIndex;

export type ScanMatch = SeriesKey & { severity: Severity; zScore: number };

export type CreateBatchOptions = {
  now?: () => string;
  /** Swept for anomalies when the request names no targets. */
  source?: BatchSource;
};

const SEVERITY_RANK: Record<Severity, number> = { warning: 1, critical: 2 };

export function meetsSeverity(severity: Severity | undefined, minSeverity: Severity): boolean {
  if (!severity) return false;
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minSeverity];
}

function nextBatchId(createdAt: string): string {
  const day = createdAt.slice(0, 10).replace(/-/g, "");
  return `batch-${day}-${randomBytes(4).toString("hex")}`;
}

export function batchManifestPathAbs(batchId: string): string {
  return path.join(batchDirAbs(batchId), BATCH_MANIFEST_FILE);
}

/** Runs the detector over every series the source holds; matches come back largest |z| first. */
export async function scanForAnomalies(
  source: BatchSource,
  asOfDate: string,
  minSeverity: Severity,
  settings: DetectorSettings = DEFAULT_DETECTOR_SETTINGS,
  signal: AbortSignal = new AbortController().signal
): Promise<{ seriesScanned: number; matches: ScanMatch[] }> {
  const keys = source.listSeries();
  const matches: ScanMatch[] = [];
  for (const key of keys) {
    const series = await source.fetchMetricSeries(key.channel, key.metric, asOfDate, settings.windowLength + 1, signal);
    const result = detectAnomaly({ ...key, series, evaluationDate: asOfDate }, settings);
    if (result.kind !== "anomaly" || !meetsSeverity(result.descriptor.severity, minSeverity)) continue;
    matches.push({ ...key, severity: result.descriptor.severity, zScore: result.descriptor.zScore });
  }
  matches.sort((a, b) => Math.abs(b.zScore) - Math.abs(a.zScore));
  return { seriesScanned: keys.length, matches };
}

export async function createBatch(
  request: BatchRequest,
  runs: RunManager,
  executor: RunExecutor,
  options: CreateBatchOptions = {}
): Promise<BatchManifest> {
  const createdAt = (options.now ?? nowIso)();
  const asOfDate = request.asOfDate ?? createdAt.slice(0, 10);
  const minSeverity = request.minSeverity ?? "warning";
  const maxRuns = request.maxRuns ?? DEFAULT_BATCH_MAX_RUNS;

  let targets: SeriesKey[];
  let scan: BatchManifest["scan"];
  if (request.targets) {
    targets = request.targets.map((t) => ({ channel: t.channel, metric: t.metric }));
  } else {
    if (!options.source) throw new Error("Batch names no targets and there is no data layer to scan");
    const found = await scanForAnomalies(options.source, asOfDate, minSeverity);
    targets = found.matches.map((m) => ({ channel: m.channel, metric: m.metric }));
    scan = { seriesScanned: found.seriesScanned, matched: found.matches.length };
  }

  const manifest: BatchManifest = {
    batchId: nextBatchId(createdAt),
    createdAt,
    asOfDate,
    minSeverity,
    runIds: [],
    skippedTargets: targets.slice(maxRuns)
  };
  if (scan) manifest.scan = scan;

  await ensureDir(batchDirAbs(manifest.batchId));
  for (const t of targets.slice(0, maxRuns)) {
    const run = await runs.createRun({ ...t, asOfDate }, { batchId: manifest.batchId });
    manifest.runIds.push(run.runId);
  }
  await writeJsonFile(batchManifestPathAbs(manifest.batchId), manifest);

  for (const runId of manifest.runIds) executor.enqueue(runId);
  return manifest;
}

export async function loadBatchManifest(batchId: string): Promise<BatchManifest | null> {
  return tryReadJsonFile<BatchManifest>(batchManifestPathAbs(batchId));
}

export type BatchReportEntry = {
  run: RunStatus | null;
  runId: string;
  record: DiagnosisRecord | null;
};

function formatValue(value: number | null, unit: string): string {
  if (value === null) return "";
  return unit === "pct" ? ` ${value}%` : ` ${value} ${unit}`;
}

function renderEntry(entry: BatchReportEntry, minSeverity: Severity): string[] {
  const { run, record } = entry;
  const target = record?.target ?? run?.target;
  const lines = [`## ${target ? `${target.channel} / ${target.metric}` : entry.runId}`, "", `- Run: \`${entry.runId}\``];

  if (!record) {
    lines.push(`- Status: PENDING (${run ? run.status : "unknown run"})`, "");
    return lines;
  }

  lines.push(`- Status: ${record.status}`);
  const d = record.descriptor;
  if (d) {
    const filtered = !meetsSeverity(d.severity, minSeverity);
    lines.push(
      `- Severity: ${d.severity} (z=${d.zScore}, observed ${d.observedValue} vs expected ${d.expectedValue})` +
        (filtered ? `; below ${minSeverity}, details filtered` : "")
    );
    if (filtered) {
      lines.push("");
      return lines;
    }
  } else if (record.detection) {
    lines.push(`- Detection: ${record.detection.detail}`);
  }

  if (record.route) lines.push(`- Family: ${record.route.family} (${record.route.method})`);
  if (record.synthesis) {
    lines.push(`- Root cause: ${record.synthesis.rootCause}`);
    lines.push(`- Executive summary: ${record.synthesis.explanations.executive}`);
  }
  if (record.blockReason) lines.push(`- Blocked: ${record.blockReason}`);
  if (record.failure) {
    lines.push(`- Failed at ${record.failure.stage} (${record.failure.code}): ${record.failure.message}`);
  }
  const handoff = run?.outcome?.handoff;
  if (handoff?.status === "failed") lines.push(`- Hand-off failed: ${handoff.message ?? "no detail"}`);
  if (record.actions.length > 0) {
    lines.push("- Actions:");
    for (const a of record.actions) {
      const p = a.parameters;
      const approval = a.requiresApproval ? ", approval required" : "";
      lines.push(
        `  ${a.rank}. ${a.actionType}: ${p.operation} ${p.parameter}${formatValue(p.value, p.unit)} (${a.riskTier} risk${approval})`
      );
    }
  }
  lines.push("");
  return lines;
}

export function renderBatchReport(manifest: BatchManifest, entries: BatchReportEntry[]): string {
  const counts = new Map<string, number>();
  for (const e of entries) {
    const key = e.record?.status ?? "PENDING";
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const tally = [...counts.entries()]
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([status, n]) => `${status} ${n}`)
    .join(", ");

  const lines = [
    `# Diagnosis batch ${manifest.batchId}`,
    "",
    `- As of: ${manifest.asOfDate}`,
    `- Minimum severity: ${manifest.minSeverity}`
  ];
  if (manifest.scan) {
    lines.push(`- Scanned: ${manifest.scan.seriesScanned} series, ${manifest.scan.matched} at or above ${manifest.minSeverity}`);
  }
  lines.push(`- Runs: ${entries.length}${tally ? ` (${tally})` : ""}`);
  if (manifest.skippedTargets.length > 0) {
    lines.push(
      `- Not run (over limit): ${manifest.skippedTargets.map((t) => `${t.channel}/${t.metric}`).join(", ")}`
    );
  }
  lines.push("");
  for (const entry of entries) lines.push(...renderEntry(entry, manifest.minSeverity));
  return lines.join("\n");
}

/** Renders the report from whatever records exist now and stores it in the batch folder. */
export async function writeBatchReport(manifest: BatchManifest, runs: RunManager): Promise<string> {
  const entries: BatchReportEntry[] = [];
  for (const runId of manifest.runIds) {
    const run = runs.getRun(runId);
    const terminal = run?.outcome !== undefined;
    const record = terminal ? await readJsonFile<DiagnosisRecord>(artifactAbsPath(runId, DIAGNOSIS_RECORD_ARTIFACT)) : null;
    entries.push({ runId, run, record });
  }
  const markdown = renderBatchReport(manifest, entries);
  await writeTextFile(path.join(batchDirAbs(manifest.batchId), BATCH_REPORT_FILE), markdown);
  return markdown;
}
