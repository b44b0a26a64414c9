import { CRITIC_AGENT } from "./agents.js";
import { findCatalogEntry, type ActionCatalog } from "./catalog.js";
import { evidenceIds } from "./explainer.js";
import { jsonSection, type InferenceBackend } from "./inference.js";
import type {
  AnomalyDescriptor,
  DiagnosisClaim,
  InvestigationFinding,
  LockCheck,
  RetrievedIncident,
  SynthesizedDiagnosis,
  ValidationVerdict
} from "./record.js";
import type { CriticOutput } from "./schemas.js";
import { clamp, round } from "./utils.js";

export type CriticSettings = {
  maxHallucinationRisk: number;
};

export const DEFAULT_CRITIC_SETTINGS: Readonly<CriticSettings> = Object.freeze({ maxHallucinationRisk: 0.5 });

function claimResolves(claim: DiagnosisClaim, evidence: Set<string>): boolean {
  return claim.citations.length > 0 && claim.citations.every((c) => evidence.has(c));
}

export function checkGrounding(
  synthesis: SynthesizedDiagnosis,
  evidence: Set<string>
): { check: LockCheck; ungrounded: DiagnosisClaim[] } {
  const claims = synthesis.claims;
  const ungrounded = claims.filter((c) => !claimResolves(c, evidence));
  const score = claims.length === 0 ? 0 : (claims.length - ungrounded.length) / claims.length;
  return {
    check: { passed: claims.length > 0 && ungrounded.length === 0, score: round(score) },
    ungrounded
  };
}

export function checkEvidence(args: {
  synthesis: SynthesizedDiagnosis;
  finding: InvestigationFinding;
  catalog: ActionCatalog;
  evidence: Set<string>;
  reviews: CriticOutput["action_reviews"];
}): { check: LockCheck; failures: string[] } {
  const { synthesis, finding, catalog, evidence, reviews } = args;
  const failures: string[] = [];
  let verified = 0;

  for (const candidate of synthesis.candidates) {
    const label = `#${candidate.rank} ${candidate.actionType}`;
    const problems: string[] = [];

    const unresolved = candidate.evidenceRefs.filter((ref) => !evidence.has(ref));
    if (candidate.evidenceRefs.length === 0) problems.push(`${label} cites no evidence`);
    if (unresolved.length > 0) problems.push(`${label} cites unknown evidence ${unresolved.join(", ")}`);

    const entry = findCatalogEntry(catalog, candidate.actionType);
    if (!entry) {
      problems.push(`${label} is not in catalog ${catalog.version}`);
    } else {
      for (const factor of finding.factors) {
        if (!candidate.evidenceRefs.includes(factor.id)) continue;
        const conflicts = factor.signals.filter((s) => entry.contraindications.includes(s));
        if (conflicts.length > 0) problems.push(`${label} contradicts ${factor.id} (${conflicts.join(", ")})`);
      }
    }

    const review = reviews.find((r) => r.rank === candidate.rank);
    if (review && !review.consistent) {
      problems.push(`${label} judged inconsistent with its evidence${review.note ? `: ${review.note}` : ""}`);
    }

    if (problems.length === 0) verified += 1;
    failures.push(...problems);
  }

  const total = synthesis.candidates.length;
  return {
    check: { passed: failures.length === 0, score: round(total === 0 ? 1 : verified / total) },
    failures
  };
}

/**
 * Share of units (claims plus proposed actions, including those set aside) that cannot be
 * traced to evidence in the record.
 */
export function deterministicRisk(synthesis: SynthesizedDiagnosis, evidence: Set<string>): number {
  const units = synthesis.claims.length + synthesis.candidates.length + synthesis.rejected.length;
  if (units === 0) return 1;
  const untraceableClaims = synthesis.claims.filter((c) => !claimResolves(c, evidence)).length;
  const untraceableCandidates = synthesis.candidates.filter(
    (a) => a.evidenceRefs.length === 0 || a.evidenceRefs.some((r) => !evidence.has(r))
  ).length;
  return (untraceableClaims + untraceableCandidates + synthesis.rejected.length) / units;
}

function quote(text: string): string {
  return `"${text.replace(/"/g, "'")}"`;
}

export function decideVerdict(args: {
  grounding: { check: LockCheck; ungrounded: DiagnosisClaim[] };
  evidence: { check: LockCheck; failures: string[] };
  hallucinationRisk: number;
  settings: CriticSettings;
  modelIssues: string[];
}): ValidationVerdict {
  const risk = round(clamp(args.hallucinationRisk, 0, 1));
  const hallucination: LockCheck = { passed: risk <= args.settings.maxHallucinationRisk, score: round(1 - risk) };

  const reasons: string[] = [];
  if (!args.grounding.check.passed) {
    reasons.push(
      args.grounding.ungrounded.length > 0
        ? `Data grounding failed; ungrounded claims: ${args.grounding.ungrounded.map((c) => quote(c.text)).join(", ")}`
        : "Data grounding failed; the diagnosis makes no claims"
    );
  }
  if (!args.evidence.check.passed) {
    reasons.push(`Evidence verification failed: ${args.evidence.failures.join("; ")}`);
  }
  if (!hallucination.passed) {
    reasons.push(
      `Hallucination risk ${risk.toFixed(2)} exceeds ${args.settings.maxHallucinationRisk.toFixed(2)}`
    );
  }

  const verdict: ValidationVerdict = {
    checks: { grounding: args.grounding.check, evidence: args.evidence.check, hallucination },
    hallucinationRisk: risk,
    outcome: reasons.length === 0 ? "PASS" : "BLOCK",
    issues: [...args.modelIssues, ...args.evidence.failures]
  };
  if (reasons.length > 0) verdict.blockReason = reasons.join(" | ");
  return verdict;
}

export function buildCriticPrompt(args: {
  descriptor: AnomalyDescriptor;
  finding: InvestigationFinding;
  incidents: RetrievedIncident[];
  synthesis: SynthesizedDiagnosis;
}): string {
  return [
    "Review this diagnosis against the evidence it was built from.",
    "",
    jsonSection("EVIDENCE", {
      anomaly: args.descriptor,
      factors: args.finding.factors,
      incidents: args.incidents
    }),
    "",
    jsonSection("DIAGNOSIS", {
      rootCause: args.synthesis.rootCause,
      claims: args.synthesis.claims,
      actions: args.synthesis.candidates
    })
  ].join("\n");
}

/** Triple-Lock gate: one model review, then deterministic grounding, evidence and risk checks. */
export async function validateDiagnosis(args: {
  descriptor: AnomalyDescriptor;
  finding: InvestigationFinding;
  incidents: RetrievedIncident[];
  synthesis: SynthesizedDiagnosis;
  catalog: ActionCatalog;
  settings: CriticSettings;
  backend: InferenceBackend;
  signal: AbortSignal;
}): Promise<ValidationVerdict> {
  const review = await args.backend.invoke(
    { agent: CRITIC_AGENT, prompt: buildCriticPrompt(args), onMalformed: "MalformedCritique" },
    { signal: args.signal }
  );

  const evidence = evidenceIds(args.finding, args.incidents);
  const grounding = checkGrounding(args.synthesis, evidence);
  const evidenceCheck = checkEvidence({
    synthesis: args.synthesis,
    finding: args.finding,
    catalog: args.catalog,
    evidence,
    reviews: review.action_reviews
  });
  const risk = Math.max(deterministicRisk(args.synthesis, evidence), review.hallucination_risk);

  return decideVerdict({
    grounding,
    evidence: evidenceCheck,
    hallucinationRisk: risk,
    settings: args.settings,
    modelIssues: review.issues
  });
}
