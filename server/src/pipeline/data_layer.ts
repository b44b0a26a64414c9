import path from "node:path";
import { z } from "zod";
import type { ChannelFamily } from "./schemas.js";
import { dataRootAbs, tryReadJsonFile } from "./utils.js";

export type MetricPoint = { timestamp: string; value: number };

export type SupplementaryKind = "campaign_breakdown" | "creator_performance" | "offline_delivery";

/**
 * Family-specific context for an anomaly. `fields` is the flat, citable surface:
 * investigators may only cite keys that appear here or on the descriptor.
 */
export type SupplementaryRecord = {
  kind: SupplementaryKind;
  fields: Record<string, number | string>;
  rows: Array<Record<string, number | string>>;
};

export type AnomalyContext = {
  metric: string;
  observedAt: string;
  evaluationDate: string;
  direction: "spike" | "drop";
};

export interface DataLayer {
  /** The last `windowLength` points on or before `asOfDate`, oldest first; null when the series is unknown. */
  fetchMetricSeries(
    channel: string,
    metric: string,
    asOfDate: string,
    windowLength: number,
    signal: AbortSignal
  ): Promise<MetricPoint[] | null>;
  fetchSupplementaryData(
    channel: string,
    family: ChannelFamily,
    context: AnomalyContext,
    signal: AbortSignal
  ): Promise<SupplementaryRecord | null>;
}

export type SeriesKey = { channel: string; metric: string };

/** A data layer that can enumerate what it holds, for sweeping every series at once. */
export interface SeriesIndex {
  listSeries(): SeriesKey[];
}

const MetricPointSchema = z.object({
  timestamp: z.string().min(1),
  value: z.number()
});

const CellSchema = z.union([z.number(), z.string()]);

const SupplementaryRecordSchema = z.object({
  kind: z.enum(["campaign_breakdown", "creator_performance", "offline_delivery"]),
  fields: z.record(z.string(), CellSchema),
  rows: z.array(z.record(z.string(), CellSchema))
});

export const MetricSnapshotSchema = z.object({
  series: z.record(z.string(), z.record(z.string(), z.array(MetricPointSchema))),
  supplementary: z.record(z.string(), SupplementaryRecordSchema)
});

export type MetricSnapshot = z.infer<typeof MetricSnapshotSchema>;

export function snapshotPathAbs(): string {
  return path.join(dataRootAbs(), "metric_snapshot.json");
}

function datePart(timestamp: string): string {
  return timestamp.slice(0, 10);
}

/** Data layer over a frozen metrics export. */
export class SnapshotDataLayer implements DataLayer, SeriesIndex {
  constructor(private readonly snapshot: MetricSnapshot) {}

  static async fromFile(filePath = snapshotPathAbs()): Promise<SnapshotDataLayer> {
    const raw = await tryReadJsonFile<unknown>(filePath);
    if (raw === null) throw new Error(`Metric snapshot not found or unreadable: ${filePath}`);
    const parsed = MetricSnapshotSchema.safeParse(raw);
    if (!parsed.success) throw new Error(`Invalid metric snapshot ${filePath}: ${parsed.error.message}`);
    return new SnapshotDataLayer(parsed.data);
  }

  listSeries(): SeriesKey[] {
    return Object.entries(this.snapshot.series)
      .flatMap(([channel, metrics]) => Object.keys(metrics).map((metric) => ({ channel, metric })))
      .sort((a, b) => a.channel.localeCompare(b.channel) || a.metric.localeCompare(b.metric));
  }

  async fetchMetricSeries(
    channel: string,
    metric: string,
    asOfDate: string,
    windowLength: number
  ): Promise<MetricPoint[] | null> {
    const points = this.snapshot.series[channel]?.[metric];
    if (!points) return null;
    const upTo = points
      .filter((p) => datePart(p.timestamp) <= asOfDate)
      .sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
    return upTo.slice(-Math.max(1, windowLength));
  }

  async fetchSupplementaryData(channel: string): Promise<SupplementaryRecord | null> {
    const record = this.snapshot.supplementary[channel];
    if (!record) return null;
    return { kind: record.kind, fields: { ...record.fields }, rows: record.rows.map((r) => ({ ...r })) };
  }
}
