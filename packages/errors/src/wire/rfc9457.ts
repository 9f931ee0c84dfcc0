/**
 * RFC 9457 Problem Details for HTTP APIs
 * https://www.rfc-editor.org/rfc/rfc9457.html
 */

import { z } from "zod";

export const ValidationIssueSchema = z.object({
  field: z.string(),
  message: z.string(),
  code: z.string(),
});

/** One candidate's outcome inside a routing failure */
export const ProviderFailureSchema = z.object({
  providerId: z.string(),
  reason: z.enum(["circuit_open", "provider_error", "not_attempted"]),
  kind: z.string().optional(),
  classification: z.enum(["transient", "permanent", "unknown"]).optional(),
  status: z.number().int().optional(),
  retryAfterMs: z.number().int().nonnegative().optional(),
});

export const ProblemDetailsSchema = z.object({
  type: z.string(),
  title: z.string(),
  status: z.number().int().min(100).max(599),
  detail: z.string().optional(),
  instance: z.string().optional(),

  // Extension members
  code: z.string().optional(),
  domain: z.string().optional(),
  traceId: z.string().optional(),
  timestamp: z.string().datetime().optional(),
  metadata: z.record(z.string()).optional(),
  errors: z.array(ValidationIssueSchema).optional(),
  failures: z.array(ProviderFailureSchema).optional(),
});

export type ProblemDetails = z.infer<typeof ProblemDetailsSchema>;
export type ProviderFailureEntry = z.infer<typeof ProviderFailureSchema>;
