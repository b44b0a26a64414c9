import { z } from "zod";
import { CRITIC_AGENT, EXPLAINER_AGENT, INVESTIGATOR_AGENTS, ROUTER_AGENT } from "./agents.js";
import { CancelledError, MalformedResponseError, type MalformedCode } from "./errors.js";
import { parseAgentOutput, readJsonSection, type InferenceBackend, type InferenceRequest } from "./inference.js";
import {
  ChannelFamilySchema,
  ParameterOperationSchema,
  ParameterUnitSchema,
  SignalTagSchema,
  type ChannelFamily,
  type CriticOutput,
  type ExplainerOutput,
  type InvestigatorOutput,
  type RouterOutput,
  type SignalTag
} from "./schemas.js";
import { round, wait } from "./utils.js";

function parseDelayMs(): number {
  const raw = Number(process.env.CDX_FAKE_STEP_DELAY_MS ?? 40);
  if (!Number.isFinite(raw) || raw < 0) return 40;
  return Math.min(2000, raw);
}

const OFFLINE_HINT = /(mail|tv|radio|ooh|billboard|outdoor|print|event|podcast|catalog|insert)/;
const INFLUENCER_HINT = /(creator|influenc|ugc|ambassador|partner_content)/;

export function guessFamily(channel: string): ChannelFamily {
  const id = channel.toLowerCase();
  if (INFLUENCER_HINT.test(id)) return "influencer";
  if (OFFLINE_HINT.test(id)) return "offline";
  return "paid_media";
}

type SignalRule = { metric: RegExp; direction?: "spike" | "drop"; signal: SignalTag };

const SIGNAL_RULES: Record<ChannelFamily, SignalRule[]> = {
  paid_media: [
    { metric: /(cpa|cpc|cpm|cost_per)/, direction: "spike", signal: "competitor_pressure" },
    { metric: /conversion/, direction: "drop", signal: "tracking_gap" },
    { metric: /(spend|impression)/, direction: "drop", signal: "budget_exhaustion" },
    { metric: /ctr/, direction: "drop", signal: "creative_fatigue" },
    { metric: /(click|session)/, direction: "spike", signal: "invalid_traffic" }
  ],
  influencer: [
    { metric: /.*/, direction: "drop", signal: "creator_underdelivery" },
    { metric: /(engagement|click|follower)/, direction: "spike", signal: "creator_fraud" }
  ],
  offline: [
    { metric: /.*/, direction: "drop", signal: "delivery_shortfall" },
    { metric: /.*/, direction: "spike", signal: "measurement_lag" }
  ]
};

const FALLBACK_SIGNAL: Record<ChannelFamily, SignalTag> = {
  paid_media: "platform_outage",
  influencer: "content_delay",
  offline: "vendor_issue"
};

export function signalFor(family: ChannelFamily, metric: string, direction: "spike" | "drop"): SignalTag {
  const id = metric.toLowerCase();
  const rule = SIGNAL_RULES[family].find((r) => r.metric.test(id) && (!r.direction || r.direction === direction));
  return rule?.signal ?? FALLBACK_SIGNAL[family];
}

/** First-choice remediation per signal; anything unmapped goes to manual review. */
export const SIGNAL_ACTIONS: Partial<Record<SignalTag, string>> = {
  competitor_pressure: "bid_increase",
  budget_exhaustion: "budget_increase",
  tracking_gap: "tracking_fix",
  creative_fatigue: "creative_refresh",
  invalid_traffic: "bot_traffic_exclusion",
  platform_outage: "platform_escalation",
  creator_underdelivery: "creator_reallocation",
  creator_fraud: "creator_fraud_review",
  content_delay: "vendor_escalation",
  delivery_shortfall: "make_good_request",
  measurement_lag: "measurement_audit",
  vendor_issue: "vendor_escalation"
};

const AnomalySectionSchema = z.object({
  channel: z.string(),
  metric: z.string(),
  direction: z.enum(["spike", "drop"]),
  zScore: z.number(),
  deviationPct: z.number().nullable(),
  windowSize: z.number(),
  observedValue: z.number(),
  expectedValue: z.number()
});

const SupplementarySectionSchema = z
  .object({ fields: z.record(z.string(), z.union([z.number(), z.string()])) })
  .nullable();

const FindingSectionSchema = z.object({
  family: ChannelFamilySchema,
  hypothesis: z.string(),
  factors: z.array(
    z.object({
      id: z.string(),
      description: z.string(),
      magnitude: z.number(),
      signals: z.array(SignalTagSchema)
    })
  )
});

const IncidentsSectionSchema = z.array(
  z.object({ incidentId: z.string(), resolutionSummary: z.string(), score: z.number() })
);

const CatalogSectionSchema = z.array(
  z.object({
    actionType: z.string(),
    parameter: z.string(),
    operation: ParameterOperationSchema,
    unit: ParameterUnitSchema,
    defaultValue: z.number().nullable(),
    contraindications: z.array(z.string())
  })
);

const DiagnosisSectionSchema = z.object({
  actions: z.array(z.object({ rank: z.number() }))
});

function section<T>(
  prompt: string,
  title: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  code: MalformedCode
): T {
  const parsed = schema.safeParse(readJsonSection(prompt, title));
  if (!parsed.success) throw new MalformedResponseError(code, `Prompt section ${title} missing or unreadable`);
  return parsed.data;
}

function routerAnswer(prompt: string): RouterOutput {
  const channel = section(prompt, "CHANNEL", z.object({ channel: z.string() }), "AmbiguousRoute").channel;
  const family = guessFamily(channel);
  return { family, rationale: `Channel id ${channel} reads as ${family}` };
}

function investigatorAnswer(family: ChannelFamily, prompt: string): InvestigatorOutput {
  const anomaly = section(prompt, "ANOMALY", AnomalySectionSchema, "MalformedFindings");
  const supplementary = section(prompt, "SUPPLEMENTARY", SupplementarySectionSchema, "MalformedFindings");
  const signal = signalFor(family, anomaly.metric, anomaly.direction);
  const deviation = anomaly.deviationPct === null ? `z=${anomaly.zScore}` : `${anomaly.deviationPct}%`;

  const factors: InvestigatorOutput["factors"] = [
    {
      description: `${anomaly.metric} ${anomaly.direction} of ${deviation} against a ${anomaly.windowSize}-point baseline, consistent with ${signal.replace(/_/g, " ")}`,
      magnitude: 0.7,
      signals: [signal],
      cited_fields: ["observedValue", "expectedValue", "zScore"]
    }
  ];
  const keys = supplementary ? Object.keys(supplementary.fields).sort().slice(0, 2) : [];
  if (supplementary && keys.length > 0) {
    factors.push({
      description: `Breakdown shows ${keys.map((k) => `${k}=${supplementary.fields[k]}`).join(", ")}`,
      magnitude: 0.3,
      signals: [],
      cited_fields: keys
    });
  }

  return {
    hypothesis: `${signal.replace(/_/g, " ")} on ${anomaly.channel}`,
    confidence: supplementary ? 0.7 : 0.5,
    factors
  };
}

function explainerAnswer(prompt: string): ExplainerOutput {
  const anomaly = section(prompt, "ANOMALY", AnomalySectionSchema, "MalformedSynthesis");
  const finding = section(prompt, "FINDING", FindingSectionSchema, "MalformedSynthesis");
  const incidents = section(prompt, "INCIDENTS", IncidentsSectionSchema, "MalformedSynthesis");
  const catalog = section(prompt, "CATALOG", CatalogSectionSchema, "MalformedSynthesis");
  const topIncident = incidents[0];
  const incidentRefs = topIncident ? [topIncident.incidentId] : [];

  const actions: ExplainerOutput["actions"] = [];
  for (const factor of finding.factors) {
    for (const signal of factor.signals) {
      const actionType = SIGNAL_ACTIONS[signal] ?? "manual_review";
      const entry = catalog.find((e) => e.actionType === actionType);
      if (!entry || actions.some((a) => a.action_type === actionType)) continue;
      if (factor.signals.some((s) => entry.contraindications.includes(s))) continue;
      const low = round(factor.magnitude * 10, 2);
      actions.push({
        action_type: actionType,
        rationale: `Addresses ${signal.replace(/_/g, " ")} identified in ${factor.id}`,
        parameter_change: {
          parameter: entry.parameter,
          operation: entry.operation,
          value: entry.defaultValue,
          unit: entry.unit
        },
        citations: [factor.id, ...incidentRefs],
        impact_low_pct: low,
        impact_high_pct: round(low * 2, 2)
      });
    }
  }
  const first = finding.factors[0];
  if (actions.length === 0 && first && catalog.some((e) => e.actionType === "manual_review")) {
    actions.push({
      action_type: "manual_review",
      rationale: `No catalog remedy fits ${first.id}; an analyst should review`,
      parameter_change: { parameter: "analyst_review", operation: "notify", value: null, unit: null },
      citations: [first.id],
      impact_low_pct: 0,
      impact_high_pct: 0
    });
  }

  const claims: ExplainerOutput["claims"] = finding.factors.map((f) => ({ text: f.description, citations: [f.id] }));
  if (topIncident) {
    claims.push({
      text: `A similar incident was resolved before: ${topIncident.resolutionSummary}`,
      citations: [topIncident.incidentId]
    });
  }

  const lead = actions[0]?.action_type.replace(/_/g, " ") ?? "no action";
  return {
    root_cause: finding.hypothesis,
    confidence: round(Math.min(0.9, 0.5 + 0.1 * finding.factors.length + (topIncident ? 0.1 : 0)), 3),
    explanations: {
      executive: `${anomaly.metric} on ${anomaly.channel} moved sharply (${anomaly.direction}). Recommended next step: ${lead}.`,
      director: `Likely cause: ${finding.hypothesis}. ${actions.length} catalog action(s) proposed, pending approval where required.`,
      practitioner: `Apply ${lead} and watch ${anomaly.metric} over the next reporting window.`,
      analyst: `Observed ${anomaly.observedValue} vs expected ${anomaly.expectedValue} (z=${anomaly.zScore}); factors ${finding.factors.map((f) => f.id).join(", ")}.`
    },
    claims,
    actions
  };
}

function criticAnswer(prompt: string): CriticOutput {
  const diagnosis = section(prompt, "DIAGNOSIS", DiagnosisSectionSchema, "MalformedCritique");
  return {
    hallucination_risk: 0.1,
    action_reviews: diagnosis.actions.map((a) => ({ rank: a.rank, consistent: true, note: "" })),
    issues: []
  };
}

function familyOfInvestigator(agentName: string): ChannelFamily | null {
  for (const family of ChannelFamilySchema.options) {
    if (INVESTIGATOR_AGENTS[family].name === agentName) return family;
  }
  return null;
}

/**
 * Offline backend for local runs and tests. Answers are derived from the prompt's JSON
 * sections alone, so the same anomaly always gets the same diagnosis.
 */
export class FakeInferenceBackend implements InferenceBackend {
  constructor(private readonly delayMs = parseDelayMs()) {}

  async invoke<T>(request: InferenceRequest<T>, options: { signal: AbortSignal }): Promise<T> {
    await wait(this.delayMs, options.signal, () => new CancelledError());
    return parseAgentOutput(request, this.answer(request.agent.name, request.prompt));
  }

  private answer(agentName: string, prompt: string): unknown {
    if (agentName === ROUTER_AGENT.name) return routerAnswer(prompt);
    if (agentName === EXPLAINER_AGENT.name) return explainerAnswer(prompt);
    if (agentName === CRITIC_AGENT.name) return criticAnswer(prompt);
    const family = familyOfInvestigator(agentName);
    if (family) return investigatorAnswer(family, prompt);
    throw new Error(`Fake backend has no answer for agent ${agentName}`);
  }
}
