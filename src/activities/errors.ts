export type ErrorKind = "transient" | "permanent";

/** Error raised by an activity adapter, tagged with whether a retry can help. */
export class ActivityError extends Error {
  constructor(
    message: string,
    readonly kind: ErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ActivityError";
  }
}

/** Timeouts, rate limits, 5xx responses, dropped connections. */
export class TransientError extends ActivityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "transient", options);
    this.name = "TransientError";
  }
}

/** Invalid input, rejected credentials, content-policy refusals. */
export class PermanentError extends ActivityError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "permanent", options);
    this.name = "PermanentError";
  }
}

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

/** Classify an HTTP error status. */
export function classifyStatus(status: number): ErrorKind {
  if (TRANSIENT_STATUSES.has(status) || status >= 500) return "transient";
  return "permanent";
}

/** Build the error for a non-OK provider response. */
export function httpError(provider: string, status: number): ActivityError {
  const message = `${provider} request failed with status ${status}`;
  return classifyStatus(status) === "transient"
    ? new TransientError(message)
    : new PermanentError(message);
}

/**
 * Normalize anything an adapter threw. Unrecognised errors are treated as
 * transient; the retry budget bounds them.
 */
export function toActivityError(e: unknown): ActivityError {
  if (e instanceof ActivityError) return e;
  if (e instanceof Error) {
    if (e.name === "AbortError" || e.name === "TimeoutError") {
      return new TransientError("operation timed out", { cause: e });
    }
    return new TransientError(e.message, { cause: e });
  }
  return new TransientError(String(e));
}
