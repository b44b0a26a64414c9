import { describe, expect, it, vi } from "vitest";
import { CancelledError, DiagnosisError, MalformedResponseError, TransientBackendError, toDiagnosisError } from "../src/pipeline/errors.js";
import { backoffDelayMs, withRetry, type AttemptFailure } from "../src/pipeline/retry.js";
import { hang } from "./helpers.js";

const policy = { maxAttempts: 3, timeoutMs: 50, baseDelayMs: 1, maxDelayMs: 2 };

describe("backoffDelayMs", () => {
  it("doubles from the base delay and caps at the max", () => {
    const p = { maxAttempts: 5, timeoutMs: 1000, baseDelayMs: 250, maxDelayMs: 800 };
    expect([1, 2, 3, 4].map((a) => backoffDelayMs(p, a))).toEqual([250, 500, 800, 800]);
  });
});

describe("toDiagnosisError", () => {
  it("keeps taxonomy errors and classifies the rest", () => {
    const malformed = new MalformedResponseError("MalformedFindings", "bad");
    expect(toDiagnosisError(malformed)).toBe(malformed);
    expect(toDiagnosisError(new Error("socket hang up")).code).toBe("TransientBackendError");
    expect(toDiagnosisError(new Error("request failed with 503")).code).toBe("TransientBackendError");
    expect(toDiagnosisError(new Error("boom")).code).toBe("UnexpectedError");
    expect(toDiagnosisError("plain").message).toBe("plain");
  });

  it("reports an aborted signal as a cancellation regardless of the error", () => {
    const ctrl = new AbortController();
    ctrl.abort();
    expect(toDiagnosisError(new Error("socket hang up"), ctrl.signal).code).toBe("Cancelled");
  });
});

describe("withRetry", () => {
  it("returns the first success with its attempt count", async () => {
    let calls = 0;
    const outcome = await withRetry(
      async () => {
        calls += 1;
        if (calls < 2) throw new TransientBackendError("flaky");
        return "ok";
      },
      { policy, signal: new AbortController().signal }
    );
    expect(outcome).toEqual({ value: "ok", attempts: 2 });
  });

  it("times out an attempt that never settles and retries it", async () => {
    const failures: AttemptFailure[] = [];
    const outcome = await withRetry(
      async (signal, attempt) => {
        if (attempt < 3) return hang(signal);
        return 42;
      },
      { policy, signal: new AbortController().signal, onAttemptFailed: (f) => void failures.push(f) }
    );
    expect(outcome).toEqual({ value: 42, attempts: 3 });
    expect(failures.map((f) => [f.attempt, f.error.code, f.error.message, f.willRetry])).toEqual([
      [1, "TransientBackendError", "Timed out after 50ms", true],
      [2, "TransientBackendError", "Timed out after 50ms", true]
    ]);
  });

  it("stops after maxAttempts and rethrows the last error", async () => {
    const failures: AttemptFailure[] = [];
    await expect(
      withRetry(
        async () => {
          throw new TransientBackendError("still down");
        },
        { policy, signal: new AbortController().signal, onAttemptFailed: (f) => void failures.push(f) }
      )
    ).rejects.toMatchObject({ code: "TransientBackendError", message: "still down" });
    expect(failures.map((f) => f.willRetry)).toEqual([true, true, false]);
  });

  it("does not retry fatal errors", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new DiagnosisError("UnexpectedError", "schema drift");
        },
        { policy, signal: new AbortController().signal }
      )
    ).rejects.toMatchObject({ code: "UnexpectedError" });
    expect(calls).toBe(1);
  });

  it("settles the attempt and clears its deadline when fn throws before returning a promise", async () => {
    vi.useFakeTimers();
    try {
      let calls = 0;
      await expect(
        withRetry(
          (): Promise<number> => {
            calls += 1;
            throw new Error("catalog entry missing");
          },
          { policy: { ...policy, timeoutMs: 5000 }, signal: new AbortController().signal }
        )
      ).rejects.toMatchObject({ code: "UnexpectedError", message: "catalog entry missing" });
      expect(calls).toBe(1);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it("retries a synchronous transient throw like an async one", async () => {
    const outcome = await withRetry(
      (_signal, attempt): Promise<string> => {
        if (attempt === 1) throw new TransientBackendError("flaky");
        return Promise.resolve("ok");
      },
      { policy, signal: new AbortController().signal }
    );
    expect(outcome).toEqual({ value: "ok", attempts: 2 });
  });

  it("cancels the in-flight attempt without retrying", async () => {
    const ctrl = new AbortController();
    let calls = 0;
    const pending = withRetry(
      async (signal) => {
        calls += 1;
        setTimeout(() => ctrl.abort(), 5);
        return hang(signal);
      },
      { policy: { ...policy, timeoutMs: 5000 }, signal: ctrl.signal }
    );
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(1);
  });

  it("refuses to start when the signal is already aborted", async () => {
    const ctrl = new AbortController();
    ctrl.abort();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          return 1;
        },
        { policy, signal: ctrl.signal }
      )
    ).rejects.toMatchObject({ code: "Cancelled" });
    expect(calls).toBe(0);
  });
});
