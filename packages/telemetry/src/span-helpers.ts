/**
 * Span helper owning span lifecycle and error recording.
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

const TRACER_NAME = "switchyard";

/**
 * Execute an async function within a named, active OTel span.
 *
 * The span is handed to `fn` so callers can attach attributes that are only
 * known once the work is done (e.g. which provider finally answered).
 * Exceptions are recorded and rethrown; the span always ends.
 *
 * `failureOf` lets value-typed failures mark the span as ERROR without
 * throwing: return a message for results that represent a failure.
 *
 * With no tracer provider registered this runs against a no-op span.
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>,
  failureOf?: (result: T) => string | undefined,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      const failure = failureOf?.(result);
      span.setStatus(
        failure === undefined
          ? { code: SpanStatusCode.OK }
          : { code: SpanStatusCode.ERROR, message: failure },
      );
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
