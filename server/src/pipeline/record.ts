import type { DiagnosisErrorCode } from "./errors.js";
import type { SupplementaryRecord } from "./data_layer.js";
import type {
  ChannelFamily,
  ParameterOperation,
  ParameterUnit,
  RiskTier,
  Severity,
  SignalTag
} from "./schemas.js";
import { hash32, nowIso, slug } from "./utils.js";

export const STAGE_ORDER = ["detect", "route", "investigate", "retrieve", "explain", "critic", "propose"] as const;

export type StageName = (typeof STAGE_ORDER)[number];

export type DiagnosisStatus = "RUNNING" | "NO_ANOMALY" | "BLOCKED" | "COMPLETED" | "FAILED";
export type TerminalStatus = Exclude<DiagnosisStatus, "RUNNING">;

export type DiagnosisTarget = {
  channel: string;
  metric: string;
  /** YYYY-MM-DD; the latest observation on or before this date is evaluated. */
  asOfDate: string;
};

export type AnomalyDescriptor = Readonly<{
  channel: string;
  metric: string;
  observedValue: number;
  expectedValue: number;
  stdDev: number;
  zScore: number;
  /** null when the baseline mean is zero. */
  deviationPct: number | null;
  direction: "spike" | "drop";
  severity: Severity;
  windowSize: number;
  observedAt: string;
  detectedAt: string;
  evaluationDate: string;
}>;

export type RouteMethod = "table" | "classifier" | "fallback";

export type RouteDecision = {
  family: ChannelFamily;
  method: RouteMethod;
  platform: string;
  note?: string;
};

export type InvestigationFactor = {
  id: string;
  description: string;
  magnitude: number;
  signals: SignalTag[];
  citedFields: string[];
};

export type InvestigationFinding = {
  family: ChannelFamily;
  hypothesis: string;
  confidence: number;
  factors: InvestigationFactor[];
  supplementary: SupplementaryRecord | null;
};

export type RetrievedIncident = {
  incidentId: string;
  score: number;
  resolutionSummary: string;
  channel?: string;
  rootCause?: string;
  occurredOn?: string;
};

export type DiagnosisClaim = {
  id: string;
  text: string;
  citations: string[];
};

export type ParameterChange = {
  parameter: string;
  operation: ParameterOperation;
  value: number | null;
  unit: ParameterUnit | null;
};

export type ImpactRange = { lowPct: number; highPct: number };

export type CandidateAction = {
  rank: number;
  actionType: string;
  targetChannel: string;
  parameterChange: ParameterChange;
  rationale: string;
  evidenceRefs: string[];
  impact: ImpactRange;
};

export type RejectedAction = {
  actionType: string;
  citations: string[];
  reason: string;
};

export type AudienceExplanations = {
  executive: string;
  director: string;
  practitioner: string;
  analyst: string;
};

export type SynthesizedDiagnosis = {
  rootCause: string;
  confidence: number;
  explanations: AudienceExplanations;
  claims: DiagnosisClaim[];
  candidates: CandidateAction[];
  rejected: RejectedAction[];
};

export type LockCheck = { passed: boolean; score: number };

export type ValidationVerdict = {
  checks: {
    grounding: LockCheck;
    evidence: LockCheck;
    hallucination: LockCheck;
  };
  hallucinationRisk: number;
  outcome: "PASS" | "BLOCK";
  blockReason?: string;
  issues: string[];
};

export type ActionPayload = {
  actionId: string;
  diagnosisId: string;
  rank: number;
  actionType: string;
  catalogVersion: string;
  target: { channel: string; platform: string };
  parameters: {
    parameter: string;
    operation: ParameterOperation;
    value: number | null;
    unit: ParameterUnit;
  };
  riskTier: RiskTier;
  requiresApproval: boolean;
  estimatedImpact: ImpactRange;
  evidenceRefs: string[];
  rationale: string;
};

export type StepStatus = "ok" | "retry" | "skipped" | "degraded" | "failed" | "blocked";

export type StepError = { code: DiagnosisErrorCode; message: string };

export type StepLogEntry = {
  stage: StageName;
  status: StepStatus;
  attempt: number;
  durationMs: number;
  error?: StepError;
};

export type DetectionSkip = {
  reason: "insufficient_data" | "stale_data" | "below_threshold" | "flat_baseline";
  detail: string;
};

export type DiagnosisRecord = {
  id: string;
  target: DiagnosisTarget;
  status: DiagnosisStatus;
  createdAt: string;
  finishedAt?: string;
  descriptor?: AnomalyDescriptor;
  detection?: DetectionSkip;
  route?: RouteDecision;
  finding?: InvestigationFinding;
  incidents: RetrievedIncident[];
  synthesis?: SynthesizedDiagnosis;
  verdict?: ValidationVerdict;
  actions: ActionPayload[];
  stepLog: StepLogEntry[];
  committedStages: StageName[];
  failure?: { stage: StageName; code: DiagnosisErrorCode; message: string };
  blockReason?: string;
};

export type StageCommit =
  | { stage: "detect"; output: AnomalyDescriptor | null; skip?: DetectionSkip }
  | { stage: "route"; output: RouteDecision }
  | { stage: "investigate"; output: InvestigationFinding }
  | { stage: "retrieve"; output: RetrievedIncident[] }
  | { stage: "explain"; output: SynthesizedDiagnosis }
  | { stage: "critic"; output: ValidationVerdict }
  | { stage: "propose"; output: ActionPayload[] };

/** Same target on the same snapshot yields the same id, so reruns line up with earlier artifacts. */
export function diagnosisIdFor(target: DiagnosisTarget): string {
  const key = `${target.channel}|${target.metric}|${target.asOfDate}`;
  const hex = hash32(key).toString(16).padStart(8, "0");
  return `dx-${slug(target.channel).slice(0, 24)}-${hex}`;
}

export function createDiagnosisRecord(target: DiagnosisTarget, createdAt = nowIso()): DiagnosisRecord {
  return {
    id: diagnosisIdFor(target),
    target: { ...target },
    status: "RUNNING",
    createdAt,
    incidents: [],
    actions: [],
    stepLog: [],
    committedStages: []
  };
}

export function isTerminal(record: DiagnosisRecord): boolean {
  return record.status !== "RUNNING";
}

export function commitStage(record: DiagnosisRecord, commit: StageCommit): void {
  if (isTerminal(record)) {
    throw new Error(`Diagnosis ${record.id} is ${record.status}; cannot commit stage ${commit.stage}`);
  }
  const expected = STAGE_ORDER[record.committedStages.length];
  if (commit.stage !== expected) {
    throw new Error(`Out-of-order commit on ${record.id}: expected ${expected ?? "no further stage"}, got ${commit.stage}`);
  }

  switch (commit.stage) {
    case "detect":
      if (commit.output) record.descriptor = Object.freeze({ ...commit.output });
      if (commit.skip) record.detection = commit.skip;
      break;
    case "route":
      record.route = commit.output;
      break;
    case "investigate":
      record.finding = commit.output;
      break;
    case "retrieve":
      record.incidents = [...commit.output];
      break;
    case "explain":
      record.synthesis = commit.output;
      break;
    case "critic":
      record.verdict = commit.output;
      break;
    case "propose":
      record.actions = [...commit.output];
      break;
  }
  record.committedStages.push(commit.stage);
}

export function finalizeRecord(
  record: DiagnosisRecord,
  status: TerminalStatus,
  patch?: Pick<DiagnosisRecord, "failure" | "blockReason">,
  finishedAt = nowIso()
): DiagnosisRecord {
  if (isTerminal(record)) throw new Error(`Diagnosis ${record.id} is already ${record.status}`);
  record.status = status;
  record.finishedAt = finishedAt;
  if (patch?.failure) record.failure = patch.failure;
  if (patch?.blockReason) record.blockReason = patch.blockReason;
  return record;
}

/** Record for a run that was cancelled before its first stage started. */
export function cancelledRecord(target: DiagnosisTarget, at = nowIso()): DiagnosisRecord {
  const record = createDiagnosisRecord(target, at);
  record.stepLog.push({
    stage: "detect",
    status: "failed",
    attempt: 0,
    durationMs: 0,
    error: { code: "Cancelled", message: "Cancelled while queued" }
  });
  return finalizeRecord(record, "FAILED", {
    failure: { stage: "detect", code: "Cancelled", message: "Cancelled while queued" }
  }, at);
}
