/**
 * Error serialization to RFC 9457 ProblemDetails.
 *
 * Routing failures expose their per-provider diagnostics as a `failures`
 * extension member. Vendor response text is never copied into the wire form.
 */

import type { SwitchyardError } from "./base.js";
import { ERROR_CATALOG } from "./catalog.js";
import { RouterConfigurationError } from "./classes/configuration.js";
import { AllProvidersFailedError, DeadlineExceededError } from "./classes/routing.js";
import type { ProviderFailureDetail } from "./types.js";
import {
  type ProblemDetails,
  ProblemDetailsSchema,
  type ProviderFailureEntry,
} from "./wire/rfc9457.js";

function toFailureEntries(
  failures: ReadonlyMap<string, ProviderFailureDetail>,
): ProviderFailureEntry[] {
  const entries: ProviderFailureEntry[] = [];
  for (const [providerId, detail] of failures) {
    if (detail.reason === "provider_error") {
      entries.push({
        providerId,
        reason: detail.reason,
        kind: detail.kind,
        classification: detail.classification,
        ...(detail.status !== undefined ? { status: detail.status } : {}),
        ...(detail.retryAfterMs !== undefined ? { retryAfterMs: detail.retryAfterMs } : {}),
      });
    } else {
      entries.push({ providerId, reason: detail.reason });
    }
  }
  return entries;
}

/**
 * Serialize a SwitchyardError to RFC 9457 ProblemDetails format.
 * Uses `.code` as the `type` discriminator.
 */
export function serializeToProblemDetails(error: SwitchyardError): ProblemDetails {
  const problem: ProblemDetails = {
    type: `/errors/${error.code}`,
    title: ERROR_CATALOG[error.code].title,
    status: error.httpStatus,
    detail: error.message,
    code: error.code,
    domain: error.domain,
    timestamp: error.timestamp.toISOString(),
    ...(error.traceId !== undefined ? { traceId: error.traceId } : {}),
    ...(error.metadata !== undefined ? { metadata: { ...error.metadata } } : {}),
  };

  if (error instanceof RouterConfigurationError && error.issues.length > 0) {
    problem.errors = error.issues.map((issue) => ({ ...issue }));
  }

  if (error instanceof AllProvidersFailedError || error instanceof DeadlineExceededError) {
    problem.failures = toFailureEntries(error.failures);
  }

  return problem;
}

/**
 * Validate an untrusted ProblemDetails payload (e.g. from a downstream service).
 */
export function parseProblemDetails(raw: unknown): ProblemDetails {
  return ProblemDetailsSchema.parse(raw);
}
