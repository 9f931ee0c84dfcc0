import { getErrorMessage, RouterConfigurationError, type ValidationIssue } from "@switchyard/errors";
import { getBreakerTransitions } from "@switchyard/telemetry";
import { countsAgainstProvider } from "./classify.js";
import { type Clock, defaultClock } from "./clock.js";
import { type Logger, silentLogger } from "./logger.js";
import type {
  CircuitBreakerConfig,
  CircuitSnapshot,
  CircuitState,
  CircuitTransition,
  ErrorClassification,
} from "./types.js";

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  openTimeoutMs: 30_000,
  halfOpenMaxProbes: 1,
};

/**
 * Proof of admission returned by {@link CircuitBreaker.tryAcquire}.
 *
 * `epoch` identifies the state period the request was admitted in; outcomes
 * reported with a permit from an earlier period are ignored.
 */
export interface CircuitPermit {
  readonly epoch: number;
  readonly probe: boolean;
}

export interface CircuitBreakerOptions {
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export type CircuitTransitionListener = (transition: CircuitTransition) => void;

/**
 * Check breaker parameters, returning one issue per invalid field.
 */
export function validateCircuitBreakerConfig(
  config: CircuitBreakerConfig,
  path = "circuitBreaker",
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const positive = ["failureThreshold", "successThreshold", "halfOpenMaxProbes"] as const;
  for (const key of positive) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      issues.push({
        field: `${path}.${key}`,
        message: `must be an integer >= 1 (got ${value})`,
        code: "too_small",
      });
    }
  }
  if (!Number.isFinite(config.openTimeoutMs) || config.openTimeoutMs < 0) {
    issues.push({
      field: `${path}.openTimeoutMs`,
      message: `must be a non-negative number (got ${config.openTimeoutMs})`,
      code: "too_small",
    });
  }
  return issues;
}

/**
 * Health gate for one provider with three states:
 * - closed: every request allowed; transient failures accumulate, successes forgive one
 * - open: every request rejected until `openTimeoutMs` has passed since the last failure
 * - half-open: up to `halfOpenMaxProbes` probes in flight; enough successes close,
 *   any transient failure reopens
 *
 * All methods are synchronous, so each decision is atomic with respect to
 * concurrent callers on the event loop. Permanent failures never move the state.
 */
export class CircuitBreaker {
  readonly providerId: string;
  readonly config: CircuitBreakerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly listeners = new Set<CircuitTransitionListener>();

  private state: CircuitState = "closed";
  private failureCount = 0;
  private successCount = 0;
  private lastFailureAt: number | null = null;
  private probesInFlight = 0;
  private epoch = 0;

  constructor(
    providerId: string,
    config?: Partial<CircuitBreakerConfig>,
    options: CircuitBreakerOptions = {},
  ) {
    const merged: CircuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    const issues = validateCircuitBreakerConfig(merged, `providers.${providerId}.circuitBreaker`);
    if (issues.length > 0) {
      throw new RouterConfigurationError(issues);
    }
    this.providerId = providerId;
    this.config = Object.freeze(merged);
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Whether a request may be sent now. While OPEN, the first call after the
   * open timeout moves the breaker to HALF_OPEN and takes the first probe slot.
   */
  allowRequest(): boolean {
    return this.tryAcquire() !== null;
  }

  /**
   * Like {@link allowRequest}, but returns a permit to hand back with the outcome.
   */
  tryAcquire(): CircuitPermit | null {
    switch (this.state) {
      case "closed":
        return { epoch: this.epoch, probe: false };
      case "open": {
        const nextProbeAt = this.nextProbeAt();
        if (nextProbeAt === null || this.clock.now() < nextProbeAt) return null;
        this.successCount = 0;
        this.probesInFlight = 1;
        this.transition("half-open");
        return { epoch: this.epoch, probe: true };
      }
      case "half-open":
        if (this.probesInFlight >= this.config.halfOpenMaxProbes) return null;
        this.probesInFlight++;
        return { epoch: this.epoch, probe: true };
    }
  }

  recordSuccess(permit?: CircuitPermit): void {
    if (this.isStale(permit)) return;

    switch (this.state) {
      case "closed":
        this.failureCount = Math.max(0, this.failureCount - 1);
        return;
      case "open":
        return;
      case "half-open":
        this.releaseSlot();
        this.successCount++;
        if (this.successCount >= this.config.successThreshold) {
          this.close();
        }
        return;
    }
  }

  /**
   * Record a failed call. Only transient (or unknown) failures count;
   * a permanent failure during HALF_OPEN just gives its probe slot back.
   */
  recordFailure(classification: ErrorClassification, permit?: CircuitPermit): void {
    if (this.isStale(permit)) return;

    if (!countsAgainstProvider(classification)) {
      if (this.state === "half-open") this.releaseSlot();
      return;
    }

    switch (this.state) {
      case "closed":
        this.failureCount++;
        if (this.failureCount >= this.config.failureThreshold) {
          this.open();
        }
        return;
      case "open":
        return;
      case "half-open":
        this.open();
        return;
    }
  }

  /**
   * Return a probe slot without an outcome, for calls that were cancelled
   * or cut short by the caller's deadline.
   */
  release(permit?: CircuitPermit): void {
    if (this.isStale(permit)) return;
    if (this.state === "half-open") this.releaseSlot();
  }

  snapshot(): CircuitSnapshot {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureAt: this.lastFailureAt,
      halfOpenProbesInFlight: this.probesInFlight,
      nextProbeAt: this.state === "open" ? this.nextProbeAt() : null,
    };
  }

  /**
   * Subscribe to state transitions. Returns a function that unsubscribes.
   */
  onStateChange(listener: CircuitTransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private nextProbeAt(): number | null {
    return this.lastFailureAt === null ? null : this.lastFailureAt + this.config.openTimeoutMs;
  }

  private isStale(permit: CircuitPermit | undefined): boolean {
    return permit !== undefined && permit.epoch !== this.epoch;
  }

  private releaseSlot(): void {
    this.probesInFlight = Math.max(0, this.probesInFlight - 1);
  }

  private open(): void {
    this.lastFailureAt = this.clock.now();
    this.successCount = 0;
    this.probesInFlight = 0;
    this.transition("open");
  }

  private close(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.probesInFlight = 0;
    this.transition("closed");
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    this.state = to;
    this.epoch++;

    const fields = {
      providerId: this.providerId,
      from,
      to,
      failureCount: this.failureCount,
    };
    if (to === "open") {
      this.logger.warn("circuit opened", fields);
    } else {
      this.logger.info(`circuit ${to === "closed" ? "closed" : "half-open"}`, fields);
    }

    getBreakerTransitions().add(1, { provider: this.providerId, from, to });

    const event: CircuitTransition = { providerId: this.providerId, from, to, at: this.clock.now() };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error("circuit transition listener failed", {
          providerId: this.providerId,
          error: getErrorMessage(error),
        });
      }
    }
  }
}
