export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type ImbalanceTrackerErrorCode =
  | "TRANSPORT"
  | "UPSTREAM_STATUS"
  | "MALFORMED_INPUT"
  | "FETCH_FAILURE"
  | "CONFIGURATION"
  | "CANCELLED";

export abstract class ImbalanceTrackerError extends Error {
  abstract readonly code: ImbalanceTrackerErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or IO failure before any response was received. */
export class TransportError extends ImbalanceTrackerError {
  readonly code = "TRANSPORT";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UpstreamStatusError extends ImbalanceTrackerError {
  readonly code = "UPSTREAM_STATUS";

  constructor(readonly status: number, message = `Upstream responded with HTTP ${status}`) {
    super(message);
  }
}

export class MalformedInputError extends ImbalanceTrackerError {
  readonly code = "MALFORMED_INPUT";

  constructor(message: string) {
    super(message);
  }
}

/**
 * Raised once every attempt of a fetch failed. `lastStatus` is the HTTP status of
 * the final attempt, or null when it never got a response.
 */
export class FetchFailure extends ImbalanceTrackerError {
  readonly code = "FETCH_FAILURE";

  constructor(
    readonly attempts: number,
    readonly lastStatus: number | null,
    cause: TransportError | UpstreamStatusError | null,
  ) {
    super(
      `Fetch failed after ${attempts} attempt(s)` +
        (cause ? `: ${cause.message}` : ""),
      {cause},
    );
  }
}

export class ConfigurationError extends ImbalanceTrackerError {
  readonly code = "CONFIGURATION";

  constructor(message: string) {
    super(message);
  }
}

export class PollCancelledError extends ImbalanceTrackerError {
  readonly code = "CANCELLED";

  constructor(message = "Polling cancelled") {
    super(message);
  }
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof PollCancelledError) {
    return true;
  }
  return error instanceof Error && error.name === "AbortError";
}
