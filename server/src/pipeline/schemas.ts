import { z } from "zod";

export const CHANNEL_FAMILIES = ["paid_media", "influencer", "offline"] as const;
export const ChannelFamilySchema = z.enum(CHANNEL_FAMILIES);

/**
 * Closed vocabulary of causal signals an investigator may attach to a factor.
 * Catalog contraindications are expressed in the same terms, which is what lets the
 * critic check an action's direction against the evidence it cites.
 */
export const SIGNAL_TAGS = [
  "bid_cap_change",
  "budget_exhaustion",
  "budget_saturation",
  "competitor_pressure",
  "creative_fatigue",
  "audience_saturation",
  "invalid_traffic",
  "tracking_gap",
  "platform_outage",
  "seasonality",
  "creator_underdelivery",
  "creator_fraud",
  "content_delay",
  "audience_mismatch",
  "delivery_shortfall",
  "placement_change",
  "measurement_lag",
  "vendor_issue"
] as const;
export const SignalTagSchema = z.enum(SIGNAL_TAGS);

export const PARAMETER_OPERATIONS = [
  "increase",
  "decrease",
  "set",
  "pause",
  "enable",
  "exclude",
  "request",
  "notify"
] as const;
export const ParameterOperationSchema = z.enum(PARAMETER_OPERATIONS);

export const ParameterUnitSchema = z.enum(["pct", "currency", "count", "none"]);
export const RiskTierSchema = z.enum(["low", "medium", "high"]);
export const SeveritySchema = z.enum(["warning", "critical"]);

export const RouterOutputSchema = z.object({
  family: ChannelFamilySchema,
  rationale: z.string().min(1)
});

const InvestigatorFactorSchema = z.object({
  description: z.string().min(1),
  magnitude: z.number().min(0).max(1),
  signals: z.array(SignalTagSchema),
  cited_fields: z.array(z.string().min(1)).min(1)
});

export const InvestigatorOutputSchema = z.object({
  hypothesis: z.string().min(1),
  confidence: z.number().min(0).max(1),
  factors: z.array(InvestigatorFactorSchema).min(1).max(8)
});

const ExplainerClaimSchema = z.object({
  text: z.string().min(1),
  citations: z.array(z.string().min(1))
});

const ExplainerActionSchema = z.object({
  action_type: z.string().min(1),
  rationale: z.string().min(1),
  parameter_change: z.object({
    parameter: z.string().min(1),
    operation: ParameterOperationSchema,
    value: z.number().nullable(),
    unit: ParameterUnitSchema.nullable()
  }),
  citations: z.array(z.string().min(1)),
  impact_low_pct: z.number(),
  impact_high_pct: z.number()
});

export const ExplainerOutputSchema = z.object({
  root_cause: z.string().min(1),
  confidence: z.number().min(0).max(1),
  explanations: z.object({
    executive: z.string().min(1),
    director: z.string().min(1),
    practitioner: z.string().min(1),
    analyst: z.string().min(1)
  }),
  claims: z.array(ExplainerClaimSchema),
  actions: z.array(ExplainerActionSchema).max(6)
});

export const CriticOutputSchema = z.object({
  hallucination_risk: z.number().min(0).max(1),
  action_reviews: z.array(
    z.object({
      rank: z.number().int().min(1),
      consistent: z.boolean(),
      note: z.string()
    })
  ),
  issues: z.array(z.string())
});

export type ChannelFamily = z.infer<typeof ChannelFamilySchema>;
export type SignalTag = z.infer<typeof SignalTagSchema>;
export type ParameterOperation = z.infer<typeof ParameterOperationSchema>;
export type ParameterUnit = z.infer<typeof ParameterUnitSchema>;
export type RiskTier = z.infer<typeof RiskTierSchema>;
export type Severity = z.infer<typeof SeveritySchema>;
export type RouterOutput = z.infer<typeof RouterOutputSchema>;
export type InvestigatorOutput = z.infer<typeof InvestigatorOutputSchema>;
export type ExplainerOutput = z.infer<typeof ExplainerOutputSchema>;
export type CriticOutput = z.infer<typeof CriticOutputSchema>;
