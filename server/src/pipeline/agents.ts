import { Agent } from "@openai/agents";
import type { AgentSpec, InferenceTier } from "./inference.js";
import {
  CriticOutputSchema,
  ExplainerOutputSchema,
  InvestigatorOutputSchema,
  RouterOutputSchema,
  SIGNAL_TAGS,
  type ChannelFamily,
  type CriticOutput,
  type ExplainerOutput,
  type InvestigatorOutput,
  type RouterOutput
} from "./schemas.js";

const DEFAULT_MODELS: Record<InferenceTier, string> = {
  tier1: "gpt-4.1-mini",
  tier2: "gpt-4.1"
};

function modelFromEnv(name: string, fallback: string): string {
  const value = process.env[name];
  return value && value.trim().length > 0 ? value.trim() : fallback;
}

export const CONFIGURED_MODELS: Record<InferenceTier, string> = {
  tier1: modelFromEnv("CDX_TIER1_MODEL", DEFAULT_MODELS.tier1),
  tier2: modelFromEnv("CDX_TIER2_MODEL", DEFAULT_MODELS.tier2)
};

const deterministicSettings = { temperature: 0 };
const reasoningSettings = { temperature: 0.2 };

const ROUTER_INSTRUCTIONS = `You are the Channel Router for a marketing anomaly diagnosis service.

Goal: assign the anomalous channel to exactly one investigation family.

Families:
- paid_media: auction-based ad platforms (search, social, display, video, programmatic, affiliate).
- influencer: creator and influencer partnerships.
- offline: direct mail, TV, radio, out-of-home, events, podcasts, print.

Rules:
- Decide from the channel id and metric only.
- Return ONLY valid JSON that matches the output schema.
- Output shape: {"family": "paid_media" | "influencer" | "offline", "rationale": "..."}`;

export const ROUTER_AGENT: AgentSpec<RouterOutput> = {
  name: "Channel Router",
  tier: "tier1",
  instructions: ROUTER_INSTRUCTIONS,
  outputType: RouterOutputSchema,
  makeAgent: (model) =>
    new Agent({
      name: "Channel Router",
      model,
      modelSettings: deterministicSettings,
      outputType: RouterOutputSchema,
      instructions: ROUTER_INSTRUCTIONS
    })
};

const INVESTIGATOR_FOCUS: Record<ChannelFamily, { title: string; focus: string }> = {
  paid_media: {
    title: "Paid Media Investigator",
    focus: `Look at campaign-level movement: spend pacing and budget caps, bid or target changes, auction
pressure (CPC, impression share), creative frequency and CTR decay, invalid traffic, tracking breaks.`
  },
  influencer: {
    title: "Influencer Investigator",
    focus: `Look at creator-level delivery: posts delivered against contract, engagement and reach per creator,
content delays, audience quality and fraud markers, attribution of promo codes and links.`
  },
  offline: {
    title: "Offline Investigator",
    focus: `Look at vendor delivery: drops or spots delivered against plan, placement changes, response and
match-back lag, vendor reporting gaps.`
  }
};

function investigatorInstructions(family: ChannelFamily): string {
  const { title, focus } = INVESTIGATOR_FOCUS[family];
  return `You are the ${title}.

Goal: explain the anomaly in the ANOMALY section using the SUPPLEMENTARY section.

${focus}

Rules:
- Produce 1-8 factors. Give each a magnitude in [0,1] for how much of the deviation it explains.
- Tag each factor with zero or more signals from this closed list: ${SIGNAL_TAGS.join(", ")}.
- cited_fields must name keys that appear in the ANOMALY JSON or in SUPPLEMENTARY.fields. Cite nothing else.
- If SUPPLEMENTARY is null, only ANOMALY keys may be cited.
- Return ONLY valid JSON that matches the output schema.`;
}

function investigatorAgent(family: ChannelFamily): AgentSpec<InvestigatorOutput> {
  const name = INVESTIGATOR_FOCUS[family].title;
  const instructions = investigatorInstructions(family);
  return {
    name,
    tier: "tier2",
    instructions,
    outputType: InvestigatorOutputSchema,
    makeAgent: (model) =>
      new Agent({ name, model, modelSettings: reasoningSettings, outputType: InvestigatorOutputSchema, instructions })
  };
}

export const INVESTIGATOR_AGENTS: Readonly<Record<ChannelFamily, AgentSpec<InvestigatorOutput>>> = {
  paid_media: investigatorAgent("paid_media"),
  influencer: investigatorAgent("influencer"),
  offline: investigatorAgent("offline")
};

const EXPLAINER_INSTRUCTIONS = `You are the Diagnosis Explainer.

Goal: turn the investigation into one diagnosis with explanations for four audiences and a ranked
list of remediation actions.

Audiences:
- executive: two sentences on business impact and the decision needed.
- director: channel-level cause and the trade-off of the recommended actions.
- practitioner: the concrete settings to change and what to watch after.
- analyst: the statistics, the factors and how the evidence supports the cause.

Rules:
- Every claim must cite factor ids (F1, F2, ...) or incident ids from the INCIDENTS section.
- action_type must be one of the actionType values in the CATALOG section. Do not invent actions.
- Every action must cite at least one factor id or incident id that supports it.
- Do not recommend an action whose contraindications match a signal on the factors it cites.
- Rank actions by expected impact, best first.
- Return ONLY valid JSON that matches the output schema.`;

export const EXPLAINER_AGENT: AgentSpec<ExplainerOutput> = {
  name: "Diagnosis Explainer",
  tier: "tier2",
  instructions: EXPLAINER_INSTRUCTIONS,
  outputType: ExplainerOutputSchema,
  makeAgent: (model) =>
    new Agent({
      name: "Diagnosis Explainer",
      model,
      modelSettings: reasoningSettings,
      outputType: ExplainerOutputSchema,
      instructions: EXPLAINER_INSTRUCTIONS
    })
};

const CRITIC_INSTRUCTIONS = `You are the Diagnosis Critic.

Goal: review the DIAGNOSIS against the EVIDENCE and estimate how much of it is unsupported.

Rules:
- hallucination_risk in [0,1]: the share of the diagnosis (claims and actions) that the evidence does not support.
- For every action, add an action_reviews entry with its rank. consistent=false when the action
  moves in a direction the cited evidence argues against, with a one-line note.
- issues lists concrete problems; leave it empty when there are none.
- Return ONLY valid JSON that matches the output schema.`;

export const CRITIC_AGENT: AgentSpec<CriticOutput> = {
  name: "Diagnosis Critic",
  tier: "tier2",
  instructions: CRITIC_INSTRUCTIONS,
  outputType: CriticOutputSchema,
  makeAgent: (model) =>
    new Agent({
      name: "Diagnosis Critic",
      model,
      modelSettings: deterministicSettings,
      outputType: CriticOutputSchema,
      instructions: CRITIC_INSTRUCTIONS
    })
};
