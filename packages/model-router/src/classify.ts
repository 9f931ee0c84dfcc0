/**
 * Provider-agnostic error classification.
 *
 * Adapters normalize vendor failures into a closed {@link ProviderErrorKind};
 * this module maps kinds onto breaker semantics and never inspects vendor text.
 */

import type { ProviderError } from "@switchyard/errors";
import type { ErrorClassification, ProviderErrorKind } from "./types.js";

const KIND_CLASSIFICATION: Readonly<Record<ProviderErrorKind, ErrorClassification>> = {
  rate_limited: "transient",
  timeout: "transient",
  unavailable: "transient",
  server_error: "transient",
  network: "transient",
  invalid_request: "permanent",
  context_overflow: "permanent",
  auth_failed: "permanent",
  permission_denied: "permanent",
  quota_exhausted: "permanent",
  unknown: "unknown",
};

export function classifyKind(kind: ProviderErrorKind): ErrorClassification {
  return KIND_CLASSIFICATION[kind];
}

export function classifyError(error: ProviderError): ErrorClassification {
  return classifyKind(error.kind);
}

/**
 * Whether a classification counts toward opening a breaker.
 * Unknown failures are treated as transient.
 */
export function countsAgainstProvider(classification: ErrorClassification): boolean {
  return classification !== "permanent";
}
