import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_STAGE_POLICY } from "../src/pipeline/retry.js";
import {
  defaultStagePolicy,
  loadStagePolicy,
  normalizeStageOverrides,
  saveStagePolicy,
  STAGE_ATTEMPTS_MAX,
  STAGE_TIMEOUT_MAX_MS,
  STAGE_TIMEOUT_MIN_MS,
  stagePolicyPathAbs
} from "../src/stage_policy.js";
import { useTempOutputDir } from "./helpers.js";

let tmp: Awaited<ReturnType<typeof useTempOutputDir>> | null = null;

beforeEach(async () => {
  tmp = await useTempOutputDir();
});

afterEach(async () => {
  await tmp?.cleanup();
  tmp = null;
});

describe("stage policy", () => {
  it("loads the defaults when the file is missing", async () => {
    const policy = await loadStagePolicy();
    expect(policy.stages).toEqual(DEFAULT_STAGE_POLICY);
    expect(policy.updatedAt).toBeTruthy();
  });

  it("saves and reloads overrides", async () => {
    const base = defaultStagePolicy();
    base.stages.explain = { ...base.stages.explain, timeoutMs: 45_000 };
    await saveStagePolicy(base);

    const loaded = await loadStagePolicy();
    expect(loaded.stages.explain.timeoutMs).toBe(45_000);
    expect(loaded.updatedAt).toBe(base.updatedAt);
  });

  it("falls back to the defaults on an invalid stored file", async () => {
    await fs.mkdir(path.dirname(stagePolicyPathAbs()), { recursive: true });
    await fs.writeFile(stagePolicyPathAbs(), JSON.stringify({ stages: { detect: { timeoutMs: "fast" } } }), "utf8");

    const loaded = await loadStagePolicy();
    expect(loaded.stages).toEqual(DEFAULT_STAGE_POLICY);
  });

  it("clamps overrides into bounds and keeps maxDelay at or above baseDelay", () => {
    const next = normalizeStageOverrides(
      {
        detect: { timeoutMs: STAGE_TIMEOUT_MIN_MS - 500 },
        investigate: { timeoutMs: STAGE_TIMEOUT_MAX_MS + 500, maxAttempts: STAGE_ATTEMPTS_MAX + 3 },
        retrieve: { baseDelayMs: 9_000, maxDelayMs: 1_000 },
        explain: { maxAttempts: 2.6 }
      },
      DEFAULT_STAGE_POLICY
    );

    expect(next.detect.timeoutMs).toBe(STAGE_TIMEOUT_MIN_MS);
    expect(next.investigate).toMatchObject({ timeoutMs: STAGE_TIMEOUT_MAX_MS, maxAttempts: STAGE_ATTEMPTS_MAX });
    expect(next.retrieve).toMatchObject({ baseDelayMs: 9_000, maxDelayMs: 9_000 });
    expect(next.explain.maxAttempts).toBe(3);
    expect(next.route).toEqual(DEFAULT_STAGE_POLICY.route);
    expect(next.route).not.toBe(DEFAULT_STAGE_POLICY.route);
  });
});
