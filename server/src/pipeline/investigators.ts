import { INVESTIGATOR_AGENTS } from "./agents.js";
import type { DataLayer, SupplementaryKind, SupplementaryRecord } from "./data_layer.js";
import { MalformedResponseError } from "./errors.js";
import { jsonSection, type AgentSpec, type InferenceBackend } from "./inference.js";
import type { AnomalyDescriptor, InvestigationFactor, InvestigationFinding } from "./record.js";
import type { ChannelFamily, InvestigatorOutput } from "./schemas.js";
import { round } from "./utils.js";

export type FamilyStrategy = {
  family: ChannelFamily;
  supplementaryKind: SupplementaryKind;
  agent: AgentSpec<InvestigatorOutput>;
  /** Heading the supplementary data is presented under. */
  supplementaryHeading: string;
  questions: string[];
};

export const FAMILY_STRATEGIES: Readonly<Record<ChannelFamily, FamilyStrategy>> = {
  paid_media: {
    family: "paid_media",
    supplementaryKind: "campaign_breakdown",
    agent: INVESTIGATOR_AGENTS.paid_media,
    supplementaryHeading: "CAMPAIGN BREAKDOWN",
    questions: [
      "Which campaigns moved the most, and in which direction?",
      "Did budget caps, bid targets or auction costs change around the anomaly?",
      "Is there evidence of creative fatigue, invalid traffic or a tracking break?"
    ]
  },
  influencer: {
    family: "influencer",
    supplementaryKind: "creator_performance",
    agent: INVESTIGATOR_AGENTS.influencer,
    supplementaryHeading: "CREATOR PERFORMANCE",
    questions: [
      "Which creators underdelivered against contract?",
      "Did engagement or reach per post fall, or did content ship late?",
      "Do audience quality metrics suggest fraud?"
    ]
  },
  offline: {
    family: "offline",
    supplementaryKind: "offline_delivery",
    agent: INVESTIGATOR_AGENTS.offline,
    supplementaryHeading: "VENDOR DELIVERY",
    questions: [
      "Was delivery (drops, spots, placements) short of plan?",
      "Did placements or schedules change?",
      "Could response lag or match-back timing explain the reading?"
    ]
  }
};

export function citableFields(descriptor: AnomalyDescriptor, supplementary: SupplementaryRecord | null): Set<string> {
  const fields = new Set<string>(Object.keys(descriptor));
  if (supplementary) for (const key of Object.keys(supplementary.fields)) fields.add(key);
  return fields;
}

export function buildInvestigationPrompt(
  strategy: FamilyStrategy,
  descriptor: AnomalyDescriptor,
  supplementary: SupplementaryRecord | null
): string {
  const parts = [
    `Investigate a ${descriptor.severity} ${descriptor.direction} in ${descriptor.metric} on ${descriptor.channel}.`,
    "",
    "Questions:",
    ...strategy.questions.map((q) => `- ${q}`),
    "",
    jsonSection("ANOMALY", descriptor),
    ""
  ];
  if (supplementary) {
    parts.push(`${strategy.supplementaryHeading}:`, jsonSection("SUPPLEMENTARY", supplementary));
  } else {
    parts.push(
      `${strategy.supplementaryHeading}: no breakdown is available for this channel. Cite ANOMALY fields only.`,
      jsonSection("SUPPLEMENTARY", null)
    );
  }
  return parts.join("\n");
}

/** Validates citations and ranks factors by magnitude; ids follow the ranking. */
export function toFinding(
  family: ChannelFamily,
  raw: InvestigatorOutput,
  citable: Set<string>,
  supplementary: SupplementaryRecord | null
): InvestigationFinding {
  const unknown = new Set<string>();
  for (const factor of raw.factors) {
    for (const field of factor.cited_fields) if (!citable.has(field)) unknown.add(field);
  }
  if (unknown.size > 0) {
    throw new MalformedResponseError(
      "MalformedFindings",
      `Findings cite fields absent from the data: ${[...unknown].sort().join(", ")}`
    );
  }

  const factors: InvestigationFactor[] = raw.factors
    .map((f, idx) => ({ f, idx }))
    .sort((a, b) => b.f.magnitude - a.f.magnitude || a.idx - b.idx)
    .map(({ f }, rank) => ({
      id: `F${rank + 1}`,
      description: f.description,
      magnitude: round(f.magnitude, 3),
      signals: [...new Set(f.signals)],
      citedFields: [...new Set(f.cited_fields)]
    }));

  return {
    family,
    hypothesis: raw.hypothesis,
    confidence: round(raw.confidence, 3),
    factors,
    supplementary
  };
}

/** One attempt: fetch the family's supplementary data, run its investigator, validate the result. */
export async function investigate(args: {
  family: ChannelFamily;
  descriptor: AnomalyDescriptor;
  dataLayer: DataLayer;
  backend: InferenceBackend;
  signal: AbortSignal;
}): Promise<InvestigationFinding> {
  const strategy = FAMILY_STRATEGIES[args.family];
  const { descriptor } = args;
  const fetched = await args.dataLayer.fetchSupplementaryData(
    descriptor.channel,
    args.family,
    {
      metric: descriptor.metric,
      observedAt: descriptor.observedAt,
      evaluationDate: descriptor.evaluationDate,
      direction: descriptor.direction
    },
    args.signal
  );
  // A breakdown of another family's kind cannot back this family's factors.
  const supplementary = fetched && fetched.kind === strategy.supplementaryKind ? fetched : null;

  const raw = await args.backend.invoke(
    {
      agent: strategy.agent,
      prompt: buildInvestigationPrompt(strategy, descriptor, supplementary),
      onMalformed: "MalformedFindings"
    },
    { signal: args.signal }
  );

  return toFinding(args.family, raw, citableFields(descriptor, supplementary), supplementary);
}
