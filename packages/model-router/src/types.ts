/**
 * Core types for @switchyard/model-router
 *
 * Task-class routing over interchangeable LLM providers, each gated by
 * its own circuit breaker, with a linear cost- or quality-ordered fallback walk.
 */

import type {
  ErrorClassification,
  ProviderError,
  ProviderErrorKind,
  ProviderFailureDetail,
} from "@switchyard/errors";
import type { CircuitBreaker } from "./circuit-breaker.js";

export type { ErrorClassification, ProviderErrorKind, ProviderFailureDetail };

// ---------------------------------------------------------------------------
// Task classes
// ---------------------------------------------------------------------------

/**
 * Caller-declared category selecting a fallback chain. The three built-in
 * classes are suggestions; any configured route name is valid.
 */
export type TaskClass = "strategic" | "template" | "validation" | (string & {});

// ---------------------------------------------------------------------------
// Provider adapter (single-method contract)
// ---------------------------------------------------------------------------

export type ProviderVendor = "anthropic" | "openai";

/** Immutable description of one (vendor, model) backend */
export interface ProviderDescriptor {
  readonly providerId: string;
  readonly vendor: string;
  readonly model: string;
  readonly maxOutputTokens: number;
  readonly costPerMillionInputTokens: number;
  readonly costPerMillionOutputTokens: number;
  /** Per-call ceiling the adapter enforces itself */
  readonly timeoutMs: number;
}

/** Settings for the bundled HTTP adapters */
export interface HttpAdapterConfig {
  readonly providerId: string;
  readonly model: string;
  readonly apiKey: string;
  /** Override the vendor's API root (proxies, gateways, compatible servers) */
  readonly baseUrl?: string | undefined;
  readonly maxOutputTokens: number;
  readonly costPerMillionInputTokens: number;
  readonly costPerMillionOutputTokens: number;
  readonly timeoutMs: number;
}

export interface AdapterCallOptions {
  readonly maxTokens: number;
  /** Already capped by the router to the time left before the caller's deadline */
  readonly timeoutMs: number;
  readonly systemPrompt?: string;
  readonly temperature?: number;
  readonly signal?: AbortSignal;
}

export type StopReason = "stop" | "length" | "content_filter" | "other";

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export interface ProviderCompletion {
  readonly text: string;
  readonly usage: TokenUsage;
  readonly stopReason: StopReason;
}

/**
 * Adapters never throw for provider failures: they return a normalized
 * {@link ProviderError} so the router can branch on values.
 */
export type ProviderResult =
  | { readonly ok: true; readonly value: ProviderCompletion }
  | { readonly ok: false; readonly error: ProviderError };

export interface ProviderAdapter {
  readonly descriptor: ProviderDescriptor;
  /**
   * Generate text. Must settle within `options.timeoutMs` plus a small grace
   * period, aborting the underlying call on timeout. No internal retries.
   */
  generate(prompt: string, options: AdapterCallOptions): Promise<ProviderResult>;
}

// ---------------------------------------------------------------------------
// Circuit breaker
// ---------------------------------------------------------------------------

export interface CircuitBreakerConfig {
  /** Transient failures counted in CLOSED before the circuit opens */
  readonly failureThreshold: number;
  /** Successful probes in HALF_OPEN required to close */
  readonly successThreshold: number;
  /** Time OPEN must last before the next request may probe */
  readonly openTimeoutMs: number;
  /** Probe requests allowed in flight while HALF_OPEN */
  readonly halfOpenMaxProbes: number;
}

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitSnapshot {
  readonly state: CircuitState;
  readonly failureCount: number;
  readonly successCount: number;
  /** Epoch ms of the failure that last opened the circuit, or null */
  readonly lastFailureAt: number | null;
  readonly halfOpenProbesInFlight: number;
  /** Earliest instant a probe may be admitted while OPEN, else null */
  readonly nextProbeAt: number | null;
}

export interface CircuitTransition {
  readonly providerId: string;
  readonly from: CircuitState;
  readonly to: CircuitState;
  readonly at: number;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** One entry of a fallback chain */
export interface RouteCandidate {
  readonly adapter: ProviderAdapter;
  readonly breaker: CircuitBreaker;
}

export interface RoutingTableEntry {
  readonly taskClass: TaskClass;
  readonly candidates: readonly RouteCandidate[];
}

// ---------------------------------------------------------------------------
// Generation request / result
// ---------------------------------------------------------------------------

export interface GenerationRequest {
  readonly taskClass: TaskClass;
  readonly prompt: string;
  readonly maxTokens: number;
  /** Absolute deadline, epoch ms. Defaults to now + the router's default deadline. */
  readonly deadline?: number;
  readonly systemPrompt?: string;
  readonly temperature?: number;
  /** Caller cancellation; stops the walk and aborts the in-flight call */
  readonly signal?: AbortSignal;
}

export type AttemptOutcome = "success" | "failed" | "skipped_circuit_open";

export interface AttemptRecord {
  readonly providerId: string;
  readonly outcome: AttemptOutcome;
  readonly latencyMs: number;
  readonly errorKind?: ProviderErrorKind;
  readonly classification?: ErrorClassification;
}

export interface GenerationResult {
  readonly text: string;
  readonly providerId: string;
  readonly model: string;
  /** Adapter invocations made, the successful one included */
  readonly attemptsMade: number;
  readonly totalLatencyMs: number;
  readonly usage: TokenUsage;
  readonly costUsd: number;
  readonly stopReason: StopReason;
  readonly attempts: readonly AttemptRecord[];
}

// ---------------------------------------------------------------------------
// Observability
// ---------------------------------------------------------------------------

export interface ProviderStatus extends CircuitSnapshot {
  readonly providerId: string;
  readonly vendor: string;
  readonly model: string;
  readonly config: CircuitBreakerConfig;
}

export interface UsageEvent {
  readonly taskClass: TaskClass;
  readonly providerId: string;
  readonly model: string;
  readonly usage: TokenUsage;
  readonly costUsd: number;
  readonly latencyMs: number;
  readonly attemptsMade: number;
  readonly timestamp: number;
}
