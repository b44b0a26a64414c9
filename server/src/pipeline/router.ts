import { ROUTER_AGENT } from "./agents.js";
import { normalizeChannel, routeFromTable, type ChannelRouting } from "./catalog.js";
import { toDiagnosisError, type DiagnosisError } from "./errors.js";
import { jsonSection, type InferenceBackend } from "./inference.js";
import type { AnomalyDescriptor, RouteDecision } from "./record.js";
import { withRetry, type AttemptFailure, type RetryPolicy } from "./retry.js";

export type RouteResult = {
  decision: RouteDecision;
  attempts: number;
  /** Why the classifier could not be used; only set for the fallback route. */
  error?: DiagnosisError;
};

export function buildRoutePrompt(descriptor: AnomalyDescriptor): string {
  return [
    "Classify this marketing channel into one investigation family.",
    "",
    jsonSection("CHANNEL", { channel: descriptor.channel, metric: descriptor.metric })
  ].join("\n");
}

/**
 * Table first; unmapped channels go to the tier-1 classifier. A classifier failure or an
 * off-list label fails closed to the routing table's fallback family, never aborting the run.
 */
export async function routeAnomaly(args: {
  descriptor: AnomalyDescriptor;
  routing: ChannelRouting;
  backend: InferenceBackend;
  policy: RetryPolicy;
  signal: AbortSignal;
  onAttemptFailed?: (failure: AttemptFailure) => void | Promise<void>;
}): Promise<RouteResult> {
  const { descriptor, routing } = args;
  const mapped = routeFromTable(routing, descriptor.channel);
  if (mapped) {
    return { decision: { family: mapped.family, method: "table", platform: mapped.platform }, attempts: 1 };
  }

  const platform = normalizeChannel(descriptor.channel);
  let attempts = 0;
  try {
    const outcome = await withRetry(
      async (signal) => {
        attempts += 1;
        return args.backend.invoke(
          { agent: ROUTER_AGENT, prompt: buildRoutePrompt(descriptor), onMalformed: "AmbiguousRoute" },
          { signal }
        );
      },
      { policy: args.policy, signal: args.signal, onAttemptFailed: args.onAttemptFailed }
    );
    return {
      decision: {
        family: outcome.value.family,
        method: "classifier",
        platform,
        note: `Channel ${descriptor.channel} is not in routing table ${routing.version}; classified: ${outcome.value.rationale}`
      },
      attempts: outcome.attempts
    };
  } catch (err) {
    const error = toDiagnosisError(err, args.signal);
    if (error.code === "Cancelled") throw error;
    return {
      decision: {
        family: routing.fallbackFamily,
        method: "fallback",
        platform,
        note: `Classifier unavailable for ${descriptor.channel} (${error.message}); using ${routing.fallbackFamily}`
      },
      attempts: Math.max(1, attempts),
      error
    };
  }
}
