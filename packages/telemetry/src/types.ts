/**
 * Telemetry configuration types.
 *
 * Env-var driven with explicit opt-in via OTEL_ENABLED.
 */

/**
 * Configuration for OpenTelemetry setup.
 * All fields are optional; defaults are resolved from env vars.
 */
export interface TelemetryConfig {
  /** Service name for resource identification (default: OTEL_SERVICE_NAME or "switchyard") */
  serviceName?: string;
  /** OTLP exporter endpoint (default: OTEL_EXPORTER_OTLP_ENDPOINT or "http://localhost:4318") */
  endpoint?: string;
  /** Trace sampling ratio 0.0-1.0 (default: OTEL_TRACES_SAMPLER_ARG or 1.0) */
  sampleRatio?: number;
  /** Deployment environment (default: OTEL_ENVIRONMENT or "development") */
  environment?: string;
}

export type SpanAttributeValue = string | number | boolean;

export type SpanAttributes = Record<string, SpanAttributeValue>;
