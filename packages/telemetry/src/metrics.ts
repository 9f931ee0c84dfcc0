/**
 * OTel metrics for router operations.
 *
 * Lazily initialized: instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "switchyard";

let _attempts: Counter | undefined;
let _latency: Histogram | undefined;
let _tokenUsage: Counter | undefined;
let _costTotal: Counter | undefined;
let _breakerTransitions: Counter | undefined;

/** Provider invocations made by the router, by provider and outcome */
export function getRouterAttempts(): Counter {
  if (_attempts === undefined) {
    _attempts = metrics.getMeter(METER_NAME).createCounter("switchyard.router.attempts", {
      description: "Provider invocations made by the router",
    });
  }
  return _attempts;
}

/** Latency of individual provider invocations */
export function getRouterLatency(): Histogram {
  if (_latency === undefined) {
    _latency = metrics.getMeter(METER_NAME).createHistogram("switchyard.router.latency_ms", {
      description: "Provider invocation latency in milliseconds",
      unit: "ms",
    });
  }
  return _latency;
}

export function getTokenUsage(): Counter {
  if (_tokenUsage === undefined) {
    _tokenUsage = metrics.getMeter(METER_NAME).createCounter("switchyard.tokens.total", {
      description: "Total tokens consumed",
    });
  }
  return _tokenUsage;
}

export function getCostTotal(): Counter {
  if (_costTotal === undefined) {
    _costTotal = metrics.getMeter(METER_NAME).createCounter("switchyard.cost.total", {
      description: "Estimated spend on successful generations",
      unit: "USD",
    });
  }
  return _costTotal;
}

/** Circuit breaker state transitions, by provider and from/to state */
export function getBreakerTransitions(): Counter {
  if (_breakerTransitions === undefined) {
    _breakerTransitions = metrics
      .getMeter(METER_NAME)
      .createCounter("switchyard.breaker.transitions", {
        description: "Circuit breaker state transitions",
      });
  }
  return _breakerTransitions;
}
