import { SwitchyardError } from "../base.js";
import type { ProviderErrorCode } from "../catalog.js";
import type { ProviderErrorKind } from "../types.js";

/** Catalog code for each normalized provider error kind */
export const PROVIDER_ERROR_CODES = {
  rate_limited: "PROVIDER_RATE_LIMITED",
  timeout: "PROVIDER_TIMEOUT",
  unavailable: "PROVIDER_UNAVAILABLE",
  server_error: "PROVIDER_SERVER_ERROR",
  network: "PROVIDER_NETWORK_ERROR",
  invalid_request: "PROVIDER_INVALID_REQUEST",
  context_overflow: "PROVIDER_CONTEXT_OVERFLOW",
  auth_failed: "PROVIDER_AUTH_FAILED",
  permission_denied: "PROVIDER_PERMISSION_DENIED",
  quota_exhausted: "PROVIDER_QUOTA_EXHAUSTED",
  unknown: "PROVIDER_UNKNOWN_ERROR",
} as const satisfies Readonly<Record<ProviderErrorKind, ProviderErrorCode>>;

export interface ProviderErrorInit {
  readonly providerId: string;
  readonly kind: ProviderErrorKind;
  readonly message: string;
  /** HTTP status returned by the vendor, when there was a response */
  readonly status?: number;
  /** Delay the vendor asked for via Retry-After, capped */
  readonly retryAfterMs?: number;
  readonly cause?: unknown;
}

/**
 * A provider failure normalized into one of the closed {@link ProviderErrorKind}s.
 *
 * Adapters return these as values; the router classifies them and feeds
 * the outcome to the provider's circuit breaker.
 */
export class ProviderError extends SwitchyardError {
  declare readonly code: ProviderErrorCode;
  readonly providerId: string;
  readonly kind: ProviderErrorKind;
  readonly status: number | undefined;
  readonly retryAfterMs: number | undefined;

  constructor(init: ProviderErrorInit) {
    super(
      PROVIDER_ERROR_CODES[init.kind],
      `Provider "${init.providerId}" ${init.kind}: ${init.message}`,
      init.cause !== undefined ? { cause: init.cause } : undefined,
    );
    this.providerId = init.providerId;
    this.kind = init.kind;
    this.status = init.status;
    this.retryAfterMs = init.retryAfterMs;
  }
}
