import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { MetricPoint, SupplementaryRecord, DataLayer } from "../src/pipeline/data_layer.js";
import type { Embedder } from "../src/pipeline/embeddings.js";
import { parseAgentOutput, type InferenceBackend, type InferenceRequest } from "../src/pipeline/inference.js";
import type { CorpusHit, IncidentCorpus } from "../src/pipeline/memory.js";
import type { AnomalyDescriptor } from "../src/pipeline/record.js";
import type { StagePolicy } from "../src/pipeline/retry.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

export type Deferred = { promise: Promise<void>; resolve: () => void; reject: (err: Error) => void };

export function deferred(): Deferred {
  let resolve!: () => void;
  let reject!: (err: Error) => void;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Points a fresh temp dir at CDX_OUTPUT_DIR; returns a cleanup function. */
export async function useTempOutputDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "cdx-out-"));
  process.env.CDX_OUTPUT_DIR = dir;
  return {
    dir,
    cleanup: async () => {
      delete process.env.CDX_OUTPUT_DIR;
      await fs.rm(dir, { recursive: true, force: true });
    }
  };
}

export function seriesFrom(values: number[], startDate = "2025-03-01"): MetricPoint[] {
  const start = Date.parse(`${startDate}T00:00:00Z`);
  return values.map((value, i) => ({
    timestamp: new Date(start + i * 86_400_000).toISOString(),
    value
  }));
}

/** 14 baseline points around 100 followed by a spike to 160. */
export const SPIKE_SERIES_VALUES = [100, 102, 98, 101, 99, 100, 103, 97, 100, 101, 99, 100, 102, 98, 160];

export function makeDescriptor(overrides: Partial<AnomalyDescriptor> = {}): AnomalyDescriptor {
  return {
    channel: "google_search",
    metric: "cpa",
    observedValue: 61.5,
    expectedValue: 42,
    stdDev: 1.2,
    zScore: 16.25,
    deviationPct: 46.43,
    direction: "spike",
    severity: "critical",
    windowSize: 14,
    observedAt: "2025-03-15T00:00:00.000Z",
    detectedAt: "2025-03-15T06:00:00.000Z",
    evaluationDate: "2025-03-15",
    ...overrides
  };
}

export class StubDataLayer implements DataLayer {
  seriesCalls = 0;
  supplementaryCalls = 0;

  constructor(
    private readonly series: Record<string, MetricPoint[] | null>,
    private readonly supplementary: Record<string, SupplementaryRecord | null> = {}
  ) {}

  async fetchMetricSeries(
    channel: string,
    metric: string,
    _asOfDate: string,
    windowLength: number
  ): Promise<MetricPoint[] | null> {
    this.seriesCalls += 1;
    const points = this.series[`${channel}:${metric}`];
    return points ? points.slice(-windowLength) : null;
  }

  async fetchSupplementaryData(channel: string): Promise<SupplementaryRecord | null> {
    this.supplementaryCalls += 1;
    return this.supplementary[channel] ?? null;
  }
}

export type ScriptedHandler = (prompt: string, signal: AbortSignal, call: number) => unknown;

/**
 * Backend that answers per agent name from scripted handlers. Handler results go through the
 * agent's output schema, the same way a live response does.
 */
export class ScriptedBackend implements InferenceBackend {
  readonly calls: Array<{ agent: string; prompt: string }> = [];
  private readonly counts = new Map<string, number>();

  constructor(private readonly handlers: Record<string, ScriptedHandler>) {}

  callsTo(agent: string): number {
    return this.counts.get(agent) ?? 0;
  }

  async invoke<T>(request: InferenceRequest<T>, options: { signal: AbortSignal }): Promise<T> {
    const name = request.agent.name;
    const call = (this.counts.get(name) ?? 0) + 1;
    this.counts.set(name, call);
    this.calls.push({ agent: name, prompt: request.prompt });
    const handler = this.handlers[name];
    if (!handler) throw new Error(`no scripted handler for ${name}`);
    const raw = await handler(request.prompt, options.signal, call);
    return parseAgentOutput(request, raw);
  }
}

/** Never settles on its own; rejects once the attempt is aborted. */
export function hang(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export class FixedEmbedder implements Embedder {
  calls = 0;
  constructor(private readonly vector: number[] = [1, 0]) {}

  async embed(): Promise<number[]> {
    this.calls += 1;
    return [...this.vector];
  }
}

export class StubCorpus implements IncidentCorpus {
  searches = 0;
  constructor(
    private readonly hits: CorpusHit[],
    private readonly failWith?: Error
  ) {}

  size(): number {
    return this.hits.length;
  }

  async search(_vector: number[], k: number): Promise<CorpusHit[]> {
    this.searches += 1;
    if (this.failWith) throw this.failWith;
    return this.hits.slice(0, k);
  }
}

export function fastStagePolicy(overrides: Partial<StagePolicy> = {}): StagePolicy {
  const base = { maxAttempts: 3, timeoutMs: 1000, baseDelayMs: 1, maxDelayMs: 2 };
  return {
    detect: { ...base },
    route: { ...base, maxAttempts: 1 },
    investigate: { ...base },
    retrieve: { ...base },
    explain: { ...base },
    critic: { ...base },
    propose: { ...base },
    ...overrides
  };
}

export const PAID_SUPPLEMENTARY: SupplementaryRecord = {
  kind: "campaign_breakdown",
  fields: { avg_cpc: 2.35, impression_share: 0.53 },
  rows: [{ campaign: "brand_core", spend: 1250 }]
};

export function investigatorAnswer(overrides: Record<string, unknown> = {}) {
  return {
    hypothesis: "Competitor bidding raised auction prices",
    confidence: 0.8,
    factors: [
      {
        description: "Average CPC rose with auction overlap",
        magnitude: 0.8,
        signals: ["competitor_pressure"],
        cited_fields: ["zScore", "avg_cpc"]
      }
    ],
    ...overrides
  };
}

export function explainerAnswer(overrides: Record<string, unknown> = {}) {
  return {
    root_cause: "Competitor conquesting on brand terms",
    confidence: 0.75,
    explanations: {
      executive: "CPA rose 46% on search. Approve a bid change.",
      director: "Auction pressure on brand terms; raising targets trades margin for volume.",
      practitioner: "Raise target CPA on brand_core and watch impression share.",
      analyst: "z=16.25 against a 14-day baseline; F1 carries most of the deviation."
    },
    claims: [{ text: "CPC rose with auction overlap", citations: ["F1"] }],
    actions: [
      {
        action_type: "bid_increase",
        rationale: "Regain impression share lost to competitors",
        parameter_change: { parameter: "target_cpa", operation: "increase", value: 80, unit: "pct" },
        citations: ["F1"],
        impact_low_pct: 5,
        impact_high_pct: 2
      }
    ],
    ...overrides
  };
}

export function criticAnswer(overrides: Record<string, unknown> = {}) {
  return {
    hallucination_risk: 0.1,
    action_reviews: [{ rank: 1, consistent: true, note: "" }],
    issues: [],
    ...overrides
  };
}
