/**
 * Provider failure taxonomy shared by the generation and speech adapters.
 */

/** Failures that move the gateway on to the next key. */
export type RotatableFailureKind = "auth_error" | "rate_limited" | "server_error" | "transport_error";

export type GatewayFailureKind =
  /** Key list was empty; no call was made. */
  | "no_credentials"
  /** Every key failed with a rotatable error. */
  | "exhausted"
  /** Provider rejected the request itself (4xx other than auth/rate limit, or an unexpected error). */
  | "request_rejected";

export interface GatewayFailure {
  kind: GatewayFailureKind;
  provider: string;
  /** Number of keys actually tried. */
  attempts: number;
  /** Classification of the last error seen, when one was seen. */
  lastErrorKind?: RotatableFailureKind;
  lastError?: Error;
}

export type GatewayResult<T> =
  | { ok: true; value: T; keyIndex: number; attempts: number }
  | { ok: false; failure: GatewayFailure };

/**
 * Error thrown by a single provider attempt. Adapters translate HTTP statuses
 * and SDK errors into this so the gateway can decide whether to rotate.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly kind: RotatableFailureKind | "client_error",
    readonly status?: number
  ) {
    super(message);
    this.name = "ProviderError";
  }

  static fromStatus(status: number, detail?: string): ProviderError {
    const kind = classifyStatus(status) ?? "client_error";
    const suffix = detail ? `: ${detail.slice(0, 200)}` : "";
    return new ProviderError(`Provider responded ${status}${suffix}`, kind, status);
  }
}

/** Map an HTTP status to a rotatable failure, or null when the status is terminal. */
export function classifyStatus(status: number): RotatableFailureKind | null {
  if (status === 401 || status === 403) return "auth_error";
  if (status === 429) return "rate_limited";
  if (status >= 500) return "server_error";
  return null;
}

const TRANSPORT_ERROR_NAMES = new Set([
  "AbortError",
  "TimeoutError",
  "FetchError",
  "APIConnectionError",
  "APIConnectionTimeoutError",
]);

/**
 * Classify anything an attempt threw. Returns null for terminal errors.
 */
export function classifyProviderError(err: unknown): RotatableFailureKind | null {
  if (err instanceof ProviderError) {
    return err.kind === "client_error" ? null : err.kind;
  }
  if (err instanceof SyntaxError) return "transport_error";
  if (err instanceof Error) {
    if (TRANSPORT_ERROR_NAMES.has(err.name)) return "transport_error";
    if ("status" in err && typeof err.status === "number") return classifyStatus(err.status);
    // undici surfaces network failures as TypeError("fetch failed").
    if (err instanceof TypeError && /fetch failed|network/i.test(err.message)) return "transport_error";
  }
  return null;
}

/** Thrown by the generation adapter when the gateway could not produce a reply. */
export class GenerationError extends Error {
  constructor(readonly failure: GatewayFailure) {
    super(describeFailure(failure));
    this.name = "GenerationError";
  }
}

/** Thrown by the speech adapter when the gateway could not produce audio. */
export class SpeechError extends Error {
  constructor(readonly failure: GatewayFailure) {
    super(describeFailure(failure));
    this.name = "SpeechError";
  }
}

export function describeFailure(failure: GatewayFailure): string {
  switch (failure.kind) {
    case "no_credentials":
      return `No ${failure.provider} API keys configured`;
    case "exhausted":
      return `All ${failure.provider} API keys failed after ${failure.attempts} attempt(s); last error: ${
        failure.lastErrorKind ?? "unknown"
      }${failure.lastError ? ` (${failure.lastError.message})` : ""}`;
    case "request_rejected":
      return `${failure.provider} rejected the request${failure.lastError ? `: ${failure.lastError.message}` : ""}`;
  }
}
