/**
 * Shared type infrastructure for Switchyard errors.
 */

// ============================================================================
// CONSTRUCTION OPTIONS
// ============================================================================

export interface SwitchyardErrorOptions {
  readonly metadata?: Readonly<Record<string, string>> | undefined;
  readonly traceId?: string | undefined;
  readonly cause?: unknown;
}

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
  readonly code: string;
}

// ============================================================================
// PROVIDER ERROR SEMANTICS
// ============================================================================

/**
 * Closed set of semantic error kinds every provider adapter normalizes
 * its native failures into. Classification never looks at vendor text.
 */
export const PROVIDER_ERROR_KINDS = [
  "rate_limited",
  "timeout",
  "unavailable",
  "server_error",
  "network",
  "invalid_request",
  "context_overflow",
  "auth_failed",
  "permission_denied",
  "quota_exhausted",
  "unknown",
] as const;

export type ProviderErrorKind = (typeof PROVIDER_ERROR_KINDS)[number];

/**
 * Whether retrying the same input can succeed.
 * "unknown" is routed as transient by the breaker.
 */
export type ErrorClassification = "transient" | "permanent" | "unknown";

/**
 * Why a candidate provider did not produce a result during one routing walk.
 */
export type ProviderFailureReason = "circuit_open" | "provider_error" | "not_attempted";

export type ProviderFailureDetail =
  | { readonly reason: "circuit_open" }
  | { readonly reason: "not_attempted" }
  | {
      readonly reason: "provider_error";
      readonly kind: ProviderErrorKind;
      readonly classification: ErrorClassification;
      readonly message: string;
      readonly status?: number;
      /** Wait the provider asked for before retrying, from `Retry-After` */
      readonly retryAfterMs?: number;
    };
