import path from "node:path";
import { z } from "zod";
import { STAGE_ORDER, type StageName } from "./pipeline/record.js";
import { DEFAULT_STAGE_POLICY, type RetryPolicy, type StagePolicy } from "./pipeline/retry.js";
import { ensureDir, nowIso, outputRootAbs, tryReadJsonFile, writeJsonFile } from "./pipeline/utils.js";

export const STAGE_TIMEOUT_MIN_MS = 1_000;
export const STAGE_TIMEOUT_MAX_MS = 10 * 60 * 1000;
export const STAGE_ATTEMPTS_MIN = 1;
export const STAGE_ATTEMPTS_MAX = 6;
export const STAGE_DELAY_MAX_MS = 60_000;

const StageNameSchema = z.enum(STAGE_ORDER);

export const RetryPolicyOverrideSchema = z
  .object({
    maxAttempts: z.number().int().min(STAGE_ATTEMPTS_MIN).max(STAGE_ATTEMPTS_MAX).optional(),
    timeoutMs: z.number().int().min(STAGE_TIMEOUT_MIN_MS).max(STAGE_TIMEOUT_MAX_MS).optional(),
    baseDelayMs: z.number().int().min(0).max(STAGE_DELAY_MAX_MS).optional(),
    maxDelayMs: z.number().int().min(0).max(STAGE_DELAY_MAX_MS).optional()
  })
  .strict();

export type RetryPolicyOverride = z.infer<typeof RetryPolicyOverrideSchema>;

const StagePolicyFileSchema = z
  .object({
    stages: z.record(StageNameSchema, RetryPolicyOverrideSchema),
    updatedAt: z.string().datetime().optional()
  })
  .strict();

export type StagePolicyState = {
  stages: StagePolicy;
  updatedAt: string;
};

export function stagePolicyPathAbs(): string {
  return path.join(outputRootAbs(), "stage_policy.json");
}

function clampInt(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.round(value)));
}

function mergeStage(base: RetryPolicy, override: RetryPolicyOverride | undefined): RetryPolicy {
  if (!override) return { ...base };
  const next: RetryPolicy = { ...base };
  if (override.maxAttempts !== undefined && Number.isFinite(override.maxAttempts)) {
    next.maxAttempts = clampInt(override.maxAttempts, STAGE_ATTEMPTS_MIN, STAGE_ATTEMPTS_MAX);
  }
  if (override.timeoutMs !== undefined && Number.isFinite(override.timeoutMs)) {
    next.timeoutMs = clampInt(override.timeoutMs, STAGE_TIMEOUT_MIN_MS, STAGE_TIMEOUT_MAX_MS);
  }
  if (override.baseDelayMs !== undefined && Number.isFinite(override.baseDelayMs)) {
    next.baseDelayMs = clampInt(override.baseDelayMs, 0, STAGE_DELAY_MAX_MS);
  }
  if (override.maxDelayMs !== undefined && Number.isFinite(override.maxDelayMs)) {
    next.maxDelayMs = clampInt(override.maxDelayMs, 0, STAGE_DELAY_MAX_MS);
  }
  next.maxDelayMs = Math.max(next.maxDelayMs, next.baseDelayMs);
  return next;
}

export function normalizeStageOverrides(
  overrides: Partial<Record<StageName, RetryPolicyOverride>>,
  base: StagePolicy
): StagePolicy {
  const next: StagePolicy = { ...base };
  for (const stage of STAGE_ORDER) next[stage] = mergeStage(base[stage], overrides[stage]);
  return next;
}

function copyDefaults(): StagePolicy {
  return normalizeStageOverrides({}, DEFAULT_STAGE_POLICY);
}

export function defaultStagePolicy(): StagePolicyState {
  return { stages: copyDefaults(), updatedAt: nowIso() };
}

/** Missing or invalid files fall back to the defaults. */
export async function loadStagePolicy(): Promise<StagePolicyState> {
  await ensureDir(outputRootAbs());
  const raw = await tryReadJsonFile<unknown>(stagePolicyPathAbs());
  if (!raw) return defaultStagePolicy();

  const parsed = StagePolicyFileSchema.safeParse(raw);
  if (!parsed.success) return defaultStagePolicy();

  return {
    stages: normalizeStageOverrides(parsed.data.stages, copyDefaults()),
    updatedAt: parsed.data.updatedAt ?? nowIso()
  };
}

export async function saveStagePolicy(policy: StagePolicyState): Promise<void> {
  await ensureDir(outputRootAbs());
  await writeJsonFile(stagePolicyPathAbs(), policy);
}
