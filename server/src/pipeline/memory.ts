import path from "node:path";
import { z } from "zod";
import { cosineSimilarity, type Embedder } from "./embeddings.js";
import { DiagnosisError, toDiagnosisError } from "./errors.js";
import type { AnomalyDescriptor, InvestigationFinding, RetrievedIncident } from "./record.js";
import { clamp, dataRootAbs, round, tryReadJsonFile } from "./utils.js";

const IncidentRecordSchema = z.object({
  incidentId: z.string().min(1),
  occurredOn: z.string().min(1),
  channel: z.string().min(1),
  metric: z.string().min(1),
  summary: z.string().min(1),
  rootCause: z.string().min(1),
  resolution: z.string().min(1)
});

const IncidentFileSchema = z.object({
  incidents: z.array(IncidentRecordSchema)
});

export type IncidentRecord = z.infer<typeof IncidentRecordSchema>;

export type CorpusHit = {
  incidentId: string;
  /** Cosine similarity, clamped to [0,1]. */
  score: number;
  resolutionSummary: string;
  channel?: string;
  rootCause?: string;
  occurredOn?: string;
};

export interface IncidentCorpus {
  size(): number;
  search(vector: number[], k: number, signal: AbortSignal): Promise<CorpusHit[]>;
}

export type RetrievalSettings = {
  topK: number;
  minSimilarity: number;
};

export const DEFAULT_RETRIEVAL_SETTINGS: Readonly<RetrievalSettings> = Object.freeze({
  topK: 3,
  minSimilarity: 0.3
});

export function incidentsPathAbs(): string {
  return path.join(dataRootAbs(), "incidents.json");
}

/** A missing file is an empty corpus; a malformed one is a startup error. */
export async function loadIncidentRecords(filePath = incidentsPathAbs()): Promise<IncidentRecord[]> {
  const raw = await tryReadJsonFile<unknown>(filePath);
  if (raw === null) return [];
  const parsed = IncidentFileSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid incident corpus ${filePath}: ${parsed.error.message}`);
  return parsed.data.incidents;
}

export function incidentDocument(incident: IncidentRecord): string {
  return [incident.channel, incident.metric, incident.summary, incident.rootCause].join(" ");
}

type IndexedIncident = { incident: IncidentRecord; vector: number[] };

/** Exact k-NN over a corpus embedded once at load. Read-only afterwards. */
export class InMemoryIncidentCorpus implements IncidentCorpus {
  private constructor(private readonly items: readonly IndexedIncident[]) {}

  static async build(
    incidents: IncidentRecord[],
    embedder: Embedder,
    signal: AbortSignal = new AbortController().signal
  ): Promise<InMemoryIncidentCorpus> {
    const items: IndexedIncident[] = [];
    for (const incident of incidents) {
      items.push({ incident, vector: await embedder.embed(incidentDocument(incident), signal) });
    }
    return new InMemoryIncidentCorpus(Object.freeze(items));
  }

  size(): number {
    return this.items.length;
  }

  async search(vector: number[], k: number): Promise<CorpusHit[]> {
    return this.items
      .map(({ incident, vector: v }) => ({
        incidentId: incident.incidentId,
        score: round(clamp(cosineSimilarity(vector, v), 0, 1)),
        resolutionSummary: incident.resolution,
        channel: incident.channel,
        rootCause: incident.rootCause,
        occurredOn: incident.occurredOn
      }))
      .sort((a, b) => b.score - a.score || a.incidentId.localeCompare(b.incidentId))
      .slice(0, Math.max(0, k));
  }
}

export function buildRetrievalQuery(descriptor: AnomalyDescriptor, finding: InvestigationFinding): string {
  return [
    descriptor.channel,
    descriptor.metric,
    descriptor.direction,
    finding.hypothesis,
    ...finding.factors.map((f) => f.description)
  ].join(" ");
}

/**
 * One attempt. Errors surface as RetrievalUnavailable so the caller can degrade to an
 * empty list once its attempts run out.
 */
export async function retrieveIncidents(args: {
  descriptor: AnomalyDescriptor;
  finding: InvestigationFinding;
  embedder: Embedder;
  corpus: IncidentCorpus;
  settings: RetrievalSettings;
  signal: AbortSignal;
}): Promise<RetrievedIncident[]> {
  if (args.corpus.size() === 0) return [];
  try {
    const vector = await args.embedder.embed(buildRetrievalQuery(args.descriptor, args.finding), args.signal);
    const hits = await args.corpus.search(vector, args.settings.topK, args.signal);
    return hits
      .filter((h) => h.score >= args.settings.minSimilarity)
      .slice(0, args.settings.topK)
      .map((h) => ({ ...h, score: clamp(h.score, 0, 1) }));
  } catch (err) {
    const error = toDiagnosisError(err, args.signal);
    if (error.code === "Cancelled") throw error;
    throw new DiagnosisError("RetrievalUnavailable", `Incident retrieval failed: ${error.message}`, {
      retryable: true,
      cause: error
    });
  }
}
