/**
 * @switchyard/telemetry: OpenTelemetry tracing and metrics for the router.
 *
 * - setupTelemetry() / shutdownTelemetry() / isTelemetryEnabled(): SDK lifecycle
 * - withSpan(): span creation helper
 * - lazily created router, token, cost and breaker instruments
 */

export { context, type Span, SpanStatusCode, trace } from "@opentelemetry/api";
export {
  getBreakerTransitions,
  getCostTotal,
  getRouterAttempts,
  getRouterLatency,
  getTokenUsage,
} from "./metrics.js";
export { isTelemetryEnabled, setupTelemetry, shutdownTelemetry } from "./setup.js";
export { withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue, TelemetryConfig } from "./types.js";
