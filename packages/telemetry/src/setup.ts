/**
 * OTel SDK initialization.
 *
 * Lazy-loaded: SDK packages are only imported when OTEL_ENABLED=true,
 * so a disabled process pays nothing beyond the API's no-op instruments.
 */

import type { TelemetryConfig } from "./types.js";

let initialized = false;

let sdkInstance: { shutdown(): Promise<void> } | undefined;

/**
 * Returns true only when OTEL_ENABLED is explicitly "true" or "1".
 */
export function isTelemetryEnabled(): boolean {
  const value = process.env.OTEL_ENABLED;
  return value === "true" || value === "1";
}

/**
 * Initialize the OpenTelemetry NodeSDK with OTLP HTTP trace export and
 * undici instrumentation (the provider adapters call vendors through fetch).
 *
 * @returns true if telemetry was initialized, false if disabled or already initialized
 */
export async function setupTelemetry(config?: TelemetryConfig): Promise<boolean> {
  if (!isTelemetryEnabled() || initialized) {
    return false;
  }

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
  const { UndiciInstrumentation } = await import("@opentelemetry/instrumentation-undici");
  const { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } = await import(
    "@opentelemetry/semantic-conventions"
  );
  const { Resource } = await import("@opentelemetry/resources");
  const { ParentBasedSampler, TraceIdRatioBasedSampler } = await import(
    "@opentelemetry/sdk-trace-base"
  );

  const serviceName = config?.serviceName ?? process.env.OTEL_SERVICE_NAME ?? "switchyard";
  const endpoint =
    config?.endpoint ?? process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";
  const rawRatio =
    config?.sampleRatio ?? Number.parseFloat(process.env.OTEL_TRACES_SAMPLER_ARG ?? "1.0");
  const sampleRatio = Number.isNaN(rawRatio) ? 1.0 : Math.max(0, Math.min(1, rawRatio));
  const environment = config?.environment ?? process.env.OTEL_ENVIRONMENT ?? "development";

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
      [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? "0.0.0",
      "deployment.environment": environment,
    }),
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRatio) }),
    instrumentations: [new UndiciInstrumentation()],
  });

  sdk.start();

  sdkInstance = sdk;
  initialized = true;

  return true;
}

/**
 * Flush pending spans and stop the SDK. Safe to call when never initialized.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (sdkInstance !== undefined) {
    await sdkInstance.shutdown();
    sdkInstance = undefined;
    initialized = false;
  }
}
