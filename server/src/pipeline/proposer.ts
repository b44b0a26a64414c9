import { findCatalogEntry, platformFor, type EngineConfig } from "./catalog.js";
import type { ActionPayload, DiagnosisRecord, SynthesizedDiagnosis, ValidationVerdict } from "./record.js";
import { artifactAbsPath, clamp, round, writeJsonFile } from "./utils.js";

export interface ActionSink {
  submit(payloads: ActionPayload[], record: DiagnosisRecord): Promise<void>;
}

export const PROPOSED_ACTIONS_ARTIFACT = "proposed_actions.json";

/** Default hand-off: the payload list lands beside the run's other artifacts for review. */
export class ArtifactActionSink implements ActionSink {
  constructor(private readonly runId: string) {}

  async submit(payloads: ActionPayload[], record: DiagnosisRecord): Promise<void> {
    await writeJsonFile(artifactAbsPath(this.runId, PROPOSED_ACTIONS_ARTIFACT), {
      diagnosisId: record.id,
      status: record.status,
      actions: payloads
    });
  }
}

export function normalizeValue(
  value: number | null,
  bounds: { unit: string; defaultValue?: number; min?: number; max?: number }
): number | null {
  if (bounds.unit === "none") return null;
  const raw = value ?? bounds.defaultValue;
  if (raw === undefined || !Number.isFinite(raw)) return null;
  return round(clamp(raw, bounds.min ?? -Infinity, bounds.max ?? Infinity), 2);
}

/**
 * Pure mapping of surviving candidates onto the catalog's canonical payload. Same inputs,
 * same payloads: ids derive from the diagnosis id, rank and action type only.
 */
export function proposeActions(args: {
  diagnosisId: string;
  synthesis: SynthesizedDiagnosis;
  verdict: ValidationVerdict;
  config: EngineConfig;
}): ActionPayload[] {
  if (args.verdict.outcome !== "PASS") {
    throw new Error(`Refusing to propose actions for ${args.diagnosisId}: verdict is ${args.verdict.outcome}`);
  }
  const { catalog, routing } = args.config;

  return args.synthesis.candidates.map((candidate) => {
    const entry = findCatalogEntry(catalog, candidate.actionType);
    if (!entry) throw new Error(`Action ${candidate.actionType} missing from catalog ${catalog.version}`);
    return {
      actionId: `${args.diagnosisId}-${candidate.rank}-${entry.actionType}`,
      diagnosisId: args.diagnosisId,
      rank: candidate.rank,
      actionType: entry.actionType,
      catalogVersion: catalog.version,
      target: { channel: candidate.targetChannel, platform: platformFor(routing, candidate.targetChannel) },
      parameters: {
        parameter: entry.parameter,
        operation: entry.operation,
        value: normalizeValue(candidate.parameterChange.value, entry),
        unit: entry.unit
      },
      riskTier: entry.riskTier,
      requiresApproval: entry.requiresApproval,
      estimatedImpact: { ...candidate.impact },
      evidenceRefs: [...candidate.evidenceRefs],
      rationale: candidate.rationale
    };
  });
}
