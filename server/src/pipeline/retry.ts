import { CancelledError, TransientBackendError, toDiagnosisError, type DiagnosisError } from "./errors.js";
import type { StageName } from "./record.js";
import { wait } from "./utils.js";

export type RetryPolicy = {
  maxAttempts: number;
  timeoutMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type StagePolicy = Record<StageName, RetryPolicy>;

export const DEFAULT_STAGE_POLICY: Readonly<StagePolicy> = Object.freeze({
  detect: { maxAttempts: 3, timeoutMs: 15_000, baseDelayMs: 250, maxDelayMs: 4_000 },
  // Classification failures fall back to the routing table's default family instead of retrying.
  route: { maxAttempts: 1, timeoutMs: 20_000, baseDelayMs: 250, maxDelayMs: 4_000 },
  investigate: { maxAttempts: 3, timeoutMs: 90_000, baseDelayMs: 500, maxDelayMs: 8_000 },
  retrieve: { maxAttempts: 3, timeoutMs: 15_000, baseDelayMs: 250, maxDelayMs: 4_000 },
  explain: { maxAttempts: 3, timeoutMs: 120_000, baseDelayMs: 500, maxDelayMs: 8_000 },
  critic: { maxAttempts: 3, timeoutMs: 90_000, baseDelayMs: 500, maxDelayMs: 8_000 },
  propose: { maxAttempts: 3, timeoutMs: 15_000, baseDelayMs: 250, maxDelayMs: 4_000 }
});

export type AttemptFailure = {
  attempt: number;
  error: DiagnosisError;
  durationMs: number;
  willRetry: boolean;
};

export type RetryOutcome<T> = {
  value: T;
  attempts: number;
};

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs one attempt with its own abort controller, linked to the caller's signal.
 * The attempt is abandoned at the deadline even if `fn` ignores its signal.
 */
function runAttempt<T>(fn: (signal: AbortSignal) => Promise<T>, parent: AbortSignal, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (parent.aborted) {
      reject(new CancelledError());
      return;
    }

    const ctrl = new AbortController();
    let settled = false;

    const settle = () => {
      settled = true;
      clearTimeout(timer);
      parent.removeEventListener("abort", onAbort);
    };

    const onAbort = () => {
      if (settled) return;
      settle();
      ctrl.abort();
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      if (settled) return;
      settle();
      ctrl.abort();
      reject(new TransientBackendError(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    parent.addEventListener("abort", onAbort, { once: true });

    // A synchronous throw from fn rejects the attempt like an async one.
    Promise.resolve()
      .then(() => fn(ctrl.signal))
      .then(
        (value) => {
          if (settled) return;
          settle();
          resolve(value);
        },
        (err: unknown) => {
          if (settled) return;
          settle();
          reject(err);
        }
      );
  });
}

export async function withRetry<T>(
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: {
    policy: RetryPolicy;
    signal: AbortSignal;
    onAttemptFailed?: (failure: AttemptFailure) => void | Promise<void>;
  }
): Promise<RetryOutcome<T>> {
  const { policy, signal } = options;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    const startedAt = Date.now();
    try {
      const value = await runAttempt((s) => fn(s, attempt), signal, policy.timeoutMs);
      return { value, attempts: attempt };
    } catch (err) {
      const error = toDiagnosisError(err, signal);
      const willRetry = error.retryable && attempt < maxAttempts && !signal.aborted;
      await options.onAttemptFailed?.({ attempt, error, durationMs: Date.now() - startedAt, willRetry });
      if (!willRetry) throw error;
      await wait(backoffDelayMs(policy, attempt), signal, () => new CancelledError());
    }
  }
}
