export const DIAGNOSIS_ERROR_CODES = [
  "InsufficientData",
  "AmbiguousRoute",
  "MalformedFindings",
  "MalformedSynthesis",
  "MalformedCritique",
  "RetrievalUnavailable",
  "TransientBackendError",
  "SafetyBlocked",
  "Cancelled",
  "UnexpectedError"
] as const;

export type DiagnosisErrorCode = (typeof DIAGNOSIS_ERROR_CODES)[number];

/** Codes a stage uses to classify a structured response that failed its schema. */
export type MalformedCode = "AmbiguousRoute" | "MalformedFindings" | "MalformedSynthesis" | "MalformedCritique";

export class DiagnosisError extends Error {
  readonly code: DiagnosisErrorCode;
  readonly retryable: boolean;

  constructor(code: DiagnosisErrorCode, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = code;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

export class TransientBackendError extends DiagnosisError {
  constructor(message: string, cause?: unknown) {
    super("TransientBackendError", message, { retryable: true, cause });
  }
}

/** The backend answered, but not in the shape the stage asked for. Retryable: a fresh sample may conform. */
export class MalformedResponseError extends DiagnosisError {
  constructor(code: MalformedCode, message: string, cause?: unknown) {
    super(code, message, { retryable: true, cause });
  }
}

export class CancelledError extends DiagnosisError {
  constructor(message = "Cancelled") {
    super("Cancelled", message, { retryable: false });
  }
}

const TRANSIENT_NAMES = new Set([
  "AbortError",
  "TimeoutError",
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "RateLimitError",
  "InternalServerError"
]);

const TRANSIENT_MESSAGE =
  /\b(timed? ?out|timeout|ETIMEDOUT|ECONNRESET|ECONNREFUSED|EAI_AGAIN|ENOTFOUND|socket hang up|fetch failed|network|rate limit|429|50[0234])\b/i;

/**
 * Maps anything thrown by a collaborator onto the taxonomy.
 * An aborted signal always wins: the caller asked to stop, so the error is a cancellation.
 */
export function toDiagnosisError(err: unknown, signal?: AbortSignal): DiagnosisError {
  if (signal?.aborted) return err instanceof CancelledError ? err : new CancelledError();
  if (err instanceof DiagnosisError) return err;
  if (err instanceof Error) {
    if (TRANSIENT_NAMES.has(err.name) || TRANSIENT_MESSAGE.test(err.message)) {
      return new TransientBackendError(err.message, err);
    }
    return new DiagnosisError("UnexpectedError", err.message, { retryable: false, cause: err });
  }
  return new DiagnosisError("UnexpectedError", String(err), { retryable: false });
}
