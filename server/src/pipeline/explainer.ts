import { EXPLAINER_AGENT } from "./agents.js";
import { catalogEntriesFor, findCatalogEntry, type ActionCatalog } from "./catalog.js";
import { MalformedResponseError } from "./errors.js";
import { jsonSection, type InferenceBackend } from "./inference.js";
import type {
  AnomalyDescriptor,
  CandidateAction,
  InvestigationFinding,
  RejectedAction,
  RetrievedIncident,
  SynthesizedDiagnosis
} from "./record.js";
import type { ChannelFamily, ExplainerOutput } from "./schemas.js";
import { round } from "./utils.js";

/** Ids a claim or action may cite: the finding's factors and the retrieved incidents. */
export function evidenceIds(finding: InvestigationFinding, incidents: RetrievedIncident[]): Set<string> {
  return new Set([...finding.factors.map((f) => f.id), ...incidents.map((i) => i.incidentId)]);
}

export function buildSynthesisPrompt(args: {
  descriptor: AnomalyDescriptor;
  finding: InvestigationFinding;
  incidents: RetrievedIncident[];
  catalog: ActionCatalog;
}): string {
  const { descriptor, finding, incidents, catalog } = args;
  const entries = catalogEntriesFor(catalog, finding.family).map((e) => ({
    actionType: e.actionType,
    description: e.description,
    parameter: e.parameter,
    operation: e.operation,
    unit: e.unit,
    defaultValue: e.defaultValue ?? null,
    min: e.min ?? null,
    max: e.max ?? null,
    contraindications: e.contraindications
  }));
  return [
    `Diagnose the ${descriptor.severity} ${descriptor.direction} in ${descriptor.metric} on ${descriptor.channel} ` +
      `(z=${descriptor.zScore}, observed ${descriptor.observedValue} vs expected ${descriptor.expectedValue}).`,
    "",
    jsonSection("ANOMALY", descriptor),
    "",
    jsonSection("FINDING", {
      family: finding.family,
      hypothesis: finding.hypothesis,
      confidence: finding.confidence,
      factors: finding.factors
    }),
    "",
    incidents.length > 0 ? "Similar past incidents:" : "No similar past incidents were found.",
    jsonSection("INCIDENTS", incidents),
    "",
    `Catalog ${catalog.version}, actions valid for ${finding.family}:`,
    jsonSection("CATALOG", entries)
  ].join("\n");
}

/**
 * Structural gate on the explainer's answer. Catalog violations fail the attempt;
 * actions without resolvable citations are set aside with the reason.
 */
export function toSynthesis(
  raw: ExplainerOutput,
  ctx: {
    family: ChannelFamily;
    targetChannel: string;
    catalog: ActionCatalog;
    evidence: Set<string>;
  }
): SynthesizedDiagnosis {
  const candidates: CandidateAction[] = [];
  const rejected: RejectedAction[] = [];

  for (const action of raw.actions) {
    const entry = findCatalogEntry(ctx.catalog, action.action_type);
    if (!entry) {
      throw new MalformedResponseError(
        "MalformedSynthesis",
        `Action ${action.action_type} is not in catalog ${ctx.catalog.version}`
      );
    }
    if (!entry.families.includes(ctx.family)) {
      throw new MalformedResponseError(
        "MalformedSynthesis",
        `Action ${action.action_type} is not valid for the ${ctx.family} family`
      );
    }

    const change = action.parameter_change;
    if (change.operation !== entry.operation) {
      throw new MalformedResponseError(
        "MalformedSynthesis",
        `Action ${action.action_type} must ${entry.operation} ${entry.parameter}, not ${change.operation}`
      );
    }
    if (change.unit !== null && change.unit !== entry.unit) {
      throw new MalformedResponseError(
        "MalformedSynthesis",
        `Action ${action.action_type} is measured in ${entry.unit}, not ${change.unit}`
      );
    }

    const citations = [...new Set(action.citations)];
    if (citations.length === 0) {
      rejected.push({ actionType: action.action_type, citations, reason: "cites no evidence" });
      continue;
    }
    const unresolved = citations.filter((c) => !ctx.evidence.has(c));
    if (unresolved.length > 0) {
      rejected.push({
        actionType: action.action_type,
        citations,
        reason: `cites evidence not in the record: ${unresolved.join(", ")}`
      });
      continue;
    }

    const low = Math.min(action.impact_low_pct, action.impact_high_pct);
    const high = Math.max(action.impact_low_pct, action.impact_high_pct);
    candidates.push({
      rank: candidates.length + 1,
      actionType: entry.actionType,
      targetChannel: ctx.targetChannel,
      parameterChange: {
        parameter: entry.parameter,
        operation: entry.operation,
        value: change.value,
        unit: entry.unit
      },
      rationale: action.rationale,
      evidenceRefs: citations,
      impact: { lowPct: round(low, 2), highPct: round(high, 2) }
    });
  }

  return {
    rootCause: raw.root_cause,
    confidence: round(raw.confidence, 3),
    explanations: { ...raw.explanations },
    claims: raw.claims.map((c, idx) => ({ id: `C${idx + 1}`, text: c.text, citations: [...new Set(c.citations)] })),
    candidates,
    rejected
  };
}

/** One attempt at synthesis over the finding and the retrieved incidents. */
export async function synthesizeDiagnosis(args: {
  descriptor: AnomalyDescriptor;
  finding: InvestigationFinding;
  incidents: RetrievedIncident[];
  catalog: ActionCatalog;
  backend: InferenceBackend;
  signal: AbortSignal;
}): Promise<SynthesizedDiagnosis> {
  const raw = await args.backend.invoke(
    { agent: EXPLAINER_AGENT, prompt: buildSynthesisPrompt(args), onMalformed: "MalformedSynthesis" },
    { signal: args.signal }
  );
  return toSynthesis(raw, {
    family: args.finding.family,
    targetChannel: args.descriptor.channel,
    catalog: args.catalog,
    evidence: evidenceIds(args.finding, args.incidents)
  });
}
