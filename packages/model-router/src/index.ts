/**
 * @switchyard/model-router
 *
 * Task-class LLM routing with per-provider circuit breakers:
 * linear fallback chains, transient/permanent error classification,
 * walk-level deadlines, cancellation, and usage/cost tracking.
 */

export {
  type CircuitBreakerOptions,
  CircuitBreaker,
  type CircuitPermit,
  type CircuitTransitionListener,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  validateCircuitBreakerConfig,
} from "./circuit-breaker.js";
export { classifyError, classifyKind, countsAgainstProvider } from "./classify.js";
export { type Clock, defaultClock } from "./clock.js";
export {
  type CircuitBreakerOverrides,
  CircuitBreakerOverridesSchema,
  type EnvMap,
  interpolateDocument,
  type InterpolationResult,
  loadRouterConfig,
  type ParseRouterConfigOptions,
  type ProviderConfig,
  ProviderConfigSchema,
  parseRouterConfig,
  type RouterConfig,
  RouterConfigSchema,
  validateRouterConfig,
} from "./config/index.js";
export { computeCostUsd, DEFAULT_COST_ALERT_THRESHOLD_USD } from "./cost.js";
export { type AdapterFactory, type CreateRouterOptions, createRouterFromConfig } from "./factory.js";
export {
  type ConsoleLoggerOptions,
  createConsoleLogger,
  type LogFields,
  type Logger,
  type LogLevel,
  silentLogger,
} from "./logger.js";
export {
  createAnthropicAdapter,
  createOpenAIAdapter,
  createProviderAdapter,
  parseRetryAfter,
} from "./providers/index.js";
export { type RegistryBuildOptions, ProviderRegistry } from "./registry.js";
export { DEFAULT_DEADLINE_MS, Router, type RouterOptions, type UsageListener } from "./router.js";
export type {
  AdapterCallOptions,
  AttemptOutcome,
  AttemptRecord,
  CircuitBreakerConfig,
  CircuitSnapshot,
  CircuitState,
  CircuitTransition,
  ErrorClassification,
  GenerationRequest,
  GenerationResult,
  HttpAdapterConfig,
  ProviderAdapter,
  ProviderCompletion,
  ProviderDescriptor,
  ProviderErrorKind,
  ProviderFailureDetail,
  ProviderResult,
  ProviderStatus,
  ProviderVendor,
  RouteCandidate,
  RoutingTableEntry,
  StopReason,
  TaskClass,
  TokenUsage,
  UsageEvent,
} from "./types.js";

export const PACKAGE_NAME = "@switchyard/model-router" as const;
