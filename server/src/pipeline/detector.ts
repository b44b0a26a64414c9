import type { MetricPoint } from "./data_layer.js";
import type { AnomalyDescriptor, DetectionSkip } from "./record.js";
import type { Severity } from "./schemas.js";
import { nowIso, round } from "./utils.js";

export type DetectorSettings = {
  /** Baseline points preceding the evaluated observation. */
  windowLength: number;
  minSamples: number;
  warningZ: number;
  criticalZ: number;
  /** Days the latest observation may trail the evaluation date. */
  maxStalenessDays: number;
};

export const DEFAULT_DETECTOR_SETTINGS: Readonly<DetectorSettings> = Object.freeze({
  windowLength: 14,
  minSamples: 5,
  warningZ: 2,
  criticalZ: 3,
  maxStalenessDays: 2
});

const DAY_MS = 86_400_000;

/** Whole days from the observation's date to the evaluation date; NaN when either is unparseable. */
export function daysBehind(timestamp: string, evaluationDate: string): number {
  const observed = Date.parse(`${timestamp.slice(0, 10)}T00:00:00Z`);
  const evaluated = Date.parse(`${evaluationDate}T00:00:00Z`);
  return Math.round((evaluated - observed) / DAY_MS);
}

export type DetectionResult =
  | { kind: "anomaly"; descriptor: AnomalyDescriptor }
  | ({ kind: "none"; zScore?: number } & DetectionSkip);

export function sampleStats(values: number[]): { mean: number; std: number } {
  const n = values.length;
  if (n === 0) return { mean: 0, std: 0 };
  const mean = values.reduce((sum, v) => sum + v, 0) / n;
  if (n < 2) return { mean, std: 0 };
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1);
  return { mean, std: Math.sqrt(variance) };
}

export function classifySeverity(zScore: number, settings: DetectorSettings): Severity | null {
  const magnitude = Math.abs(zScore);
  if (magnitude >= settings.criticalZ) return "critical";
  if (magnitude >= settings.warningZ) return "warning";
  return null;
}

/**
 * Scores the latest observation against the window that precedes it.
 * Never throws: thin, stale or flat baselines come back as `kind: "none"`.
 */
export function detectAnomaly(
  input: {
    channel: string;
    metric: string;
    series: MetricPoint[] | null;
    evaluationDate: string;
    detectedAt?: string;
  },
  settings: DetectorSettings = DEFAULT_DETECTOR_SETTINGS
): DetectionResult {
  const series = input.series ?? [];
  if (series.length === 0) {
    return { kind: "none", reason: "insufficient_data", detail: "No observations available" };
  }

  const latest = series[series.length - 1];
  const window = series.slice(0, -1).slice(-settings.windowLength);
  if (window.length < settings.minSamples) {
    return {
      kind: "none",
      reason: "insufficient_data",
      detail: `Baseline has ${window.length} points; at least ${settings.minSamples} required`
    };
  }

  const lag = daysBehind(latest.timestamp, input.evaluationDate);
  if (lag > settings.maxStalenessDays) {
    return {
      kind: "none",
      reason: "stale_data",
      detail:
        `Latest observation ${latest.timestamp.slice(0, 10)} is ${lag} days before ${input.evaluationDate}; ` +
        `at most ${settings.maxStalenessDays} allowed`
    };
  }

  const { mean, std } = sampleStats(window.map((p) => p.value));
  if (std === 0) {
    return { kind: "none", reason: "flat_baseline", detail: `Baseline is constant at ${mean}` };
  }

  const zScore = (latest.value - mean) / std;
  const severity = classifySeverity(zScore, settings);
  if (!severity) {
    return {
      kind: "none",
      reason: "below_threshold",
      detail: `|z|=${round(Math.abs(zScore), 2)} below ${settings.warningZ}`,
      zScore: round(zScore)
    };
  }

  const descriptor: AnomalyDescriptor = Object.freeze({
    channel: input.channel,
    metric: input.metric,
    observedValue: latest.value,
    expectedValue: round(mean),
    stdDev: round(std),
    zScore: round(zScore),
    deviationPct: mean === 0 ? null : round(((latest.value - mean) / Math.abs(mean)) * 100, 2),
    direction: zScore > 0 ? "spike" : "drop",
    severity,
    windowSize: window.length,
    observedAt: latest.timestamp,
    detectedAt: input.detectedAt ?? nowIso(),
    evaluationDate: input.evaluationDate
  });
  return { kind: "anomaly", descriptor };
}
