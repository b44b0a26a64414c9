import { describe, expect, it } from "vitest";
import { ROUTER_AGENT } from "../src/pipeline/agents.js";
import { loadEngineConfig } from "../src/pipeline/catalog.js";
import { TransientBackendError } from "../src/pipeline/errors.js";
import { readJsonSection } from "../src/pipeline/inference.js";
import { buildRoutePrompt, routeAnomaly } from "../src/pipeline/router.js";
import { makeDescriptor, ScriptedBackend } from "./helpers.js";

const policy = { maxAttempts: 1, timeoutMs: 1000, baseDelayMs: 1, maxDelayMs: 2 };

describe("routeAnomaly", () => {
  it("uses the routing table without calling the classifier", async () => {
    const { routing } = await loadEngineConfig();
    const backend = new ScriptedBackend({});
    const res = await routeAnomaly({
      descriptor: makeDescriptor({ channel: " Google_Search " }),
      routing,
      backend,
      policy,
      signal: new AbortController().signal
    });
    expect(res).toEqual({
      decision: { family: "paid_media", method: "table", platform: "google_ads" },
      attempts: 1
    });
    expect(backend.calls).toHaveLength(0);
  });

  it("classifies channels missing from the table", async () => {
    const { routing } = await loadEngineConfig();
    const backend = new ScriptedBackend({
      [ROUTER_AGENT.name]: () => ({ family: "influencer", rationale: "Creator whitelisting program" })
    });
    const res = await routeAnomaly({
      descriptor: makeDescriptor({ channel: "Creator_Whitelist" }),
      routing,
      backend,
      policy,
      signal: new AbortController().signal
    });
    expect(res.decision).toEqual({
      family: "influencer",
      method: "classifier",
      platform: "creator_whitelist",
      note: `Channel Creator_Whitelist is not in routing table ${routing.version}; classified: Creator whitelisting program`
    });
    expect(readJsonSection(backend.calls[0]?.prompt ?? "", "CHANNEL")).toEqual({
      channel: "Creator_Whitelist",
      metric: "cpa"
    });
  });

  it("falls back to the default family when the classifier fails", async () => {
    const { routing } = await loadEngineConfig();
    const backend = new ScriptedBackend({
      [ROUTER_AGENT.name]: () => {
        throw new TransientBackendError("upstream 503");
      }
    });
    const res = await routeAnomaly({
      descriptor: makeDescriptor({ channel: "unlisted_channel" }),
      routing,
      backend,
      policy,
      signal: new AbortController().signal
    });
    expect(res.decision).toEqual({
      family: "paid_media",
      method: "fallback",
      platform: "unlisted_channel",
      note: "Classifier unavailable for unlisted_channel (upstream 503); using paid_media"
    });
    expect(res.error?.code).toBe("TransientBackendError");
    expect(backend.callsTo(ROUTER_AGENT.name)).toBe(1);
  });

  it("falls back when the classifier answers off-list", async () => {
    const { routing } = await loadEngineConfig();
    const backend = new ScriptedBackend({
      [ROUTER_AGENT.name]: () => ({ family: "retail_media", rationale: "?" })
    });
    const res = await routeAnomaly({
      descriptor: makeDescriptor({ channel: "unlisted_channel" }),
      routing,
      backend,
      policy,
      signal: new AbortController().signal
    });
    expect(res.decision.method).toBe("fallback");
    expect(res.error?.code).toBe("AmbiguousRoute");
  });

  it("propagates cancellation instead of falling back", async () => {
    const { routing } = await loadEngineConfig();
    const ctrl = new AbortController();
    ctrl.abort();
    await expect(
      routeAnomaly({
        descriptor: makeDescriptor({ channel: "unlisted_channel" }),
        routing,
        backend: new ScriptedBackend({}),
        policy,
        signal: ctrl.signal
      })
    ).rejects.toMatchObject({ code: "Cancelled" });
  });

  it("puts only the channel and metric in the classifier prompt", () => {
    const prompt = buildRoutePrompt(makeDescriptor({ channel: "snapchat_ads" }));
    expect(readJsonSection(prompt, "CHANNEL")).toEqual({ channel: "snapchat_ads", metric: "cpa" });
  });
});
