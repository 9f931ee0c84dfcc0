/**
 * Vendor HTTP failure → {@link ProviderErrorKind} tables.
 *
 * Vendor wording is matched here, at the adapter edge, and nowhere else.
 * Each vendor table returns `undefined` for anything it does not recognize,
 * which falls through to the generic HTTP status table.
 */

import { z } from "zod";
import type { ProviderErrorKind } from "../types.js";

export type VendorMatcher = (status: number, body: string) => ProviderErrorKind | undefined;

export interface NormalizedFailure {
  readonly kind: ProviderErrorKind;
  /** Vendor's own error message when the body carried one, else the raw body */
  readonly message: string;
}

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().optional(),
    code: z.string().nullable().optional(),
  }),
});

export function normalizeHttpFailure(
  status: number,
  body: string,
  matcher?: VendorMatcher,
): NormalizedFailure {
  const kind = matcher?.(status, body) ?? classifyByHttpStatus(status);
  return { kind, message: extractErrorMessage(body) };
}

export function extractErrorMessage(body: string): string {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return body;
  }
  const parsed = ErrorEnvelopeSchema.safeParse(json);
  if (!parsed.success) return body;
  return parsed.data.error.message ?? parsed.data.error.type ?? body;
}

// ---------------------------------------------------------------------------
// Vendor tables
// ---------------------------------------------------------------------------

export const matchAnthropic: VendorMatcher = (status, body) => {
  if (status === 401) return "auth_failed";
  if (status === 403) return "permission_denied";
  // 529: overloaded_error
  if (status === 429 || status === 529) return "rate_limited";
  if (status === 413) return "context_overflow";

  if (status === 400) {
    const lower = body.toLowerCase();
    if (lower.includes("prompt is too long") || lower.includes("context") || lower.includes("token")) {
      return "context_overflow";
    }
    return "invalid_request";
  }

  if (status === 500 || status === 502) return "server_error";
  return undefined;
};

export const matchOpenAI: VendorMatcher = (status, body) => {
  if (status === 401) return "auth_failed";
  if (status === 403) return "permission_denied";

  if (status === 429) {
    return body.toLowerCase().includes("insufficient_quota") ? "quota_exhausted" : "rate_limited";
  }

  if (status === 400) {
    return body.toLowerCase().includes("context_length_exceeded")
      ? "context_overflow"
      : "invalid_request";
  }

  if (status === 404) return "invalid_request";
  if (status === 500 || status === 502) return "server_error";
  return undefined;
};

// ---------------------------------------------------------------------------
// Generic HTTP status fallback
// ---------------------------------------------------------------------------

export function classifyByHttpStatus(status: number): ProviderErrorKind {
  if (status === 401) return "auth_failed";
  if (status === 402) return "quota_exhausted";
  if (status === 403) return "permission_denied";
  if (status === 408 || status === 504) return "timeout";
  if (status === 413) return "context_overflow";
  if (status === 429) return "rate_limited";
  if (status === 503) return "unavailable";
  if (status >= 500) return "server_error";
  if (status >= 400) return "invalid_request";
  return "unknown";
}
