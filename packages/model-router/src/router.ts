import {
  AllProvidersFailedError,
  DeadlineExceededError,
  getErrorMessage,
  NoEligibleProviderError,
  ProviderError,
  type ProviderFailureDetail,
  RequestCancelledError,
  UnknownTaskClassError,
} from "@switchyard/errors";
import {
  getCostTotal,
  getRouterAttempts,
  getRouterLatency,
  getTokenUsage,
  withSpan,
} from "@switchyard/telemetry";
import { classifyError } from "./classify.js";
import { type Clock, defaultClock } from "./clock.js";
import { computeCostUsd, DEFAULT_COST_ALERT_THRESHOLD_USD } from "./cost.js";
import { type Logger, silentLogger } from "./logger.js";
import type { ProviderRegistry } from "./registry.js";
import type {
  AttemptRecord,
  GenerationRequest,
  GenerationResult,
  ProviderCompletion,
  ProviderResult,
  ProviderStatus,
  RouteCandidate,
  TaskClass,
  UsageEvent,
} from "./types.js";

/** Deadline applied when a request does not carry one */
export const DEFAULT_DEADLINE_MS = 120_000;

export interface RouterOptions {
  /** Adapter invocations allowed per call. Defaults to one per eligible candidate. */
  readonly maxAttempts?: number;
  readonly defaultDeadlineMs?: number;
  readonly costAlertThresholdUsd?: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export type UsageListener = (event: UsageEvent) => void;

/**
 * Task-class router with per-provider circuit breakers.
 *
 * - Linear walk over the task class's fallback chain, first success wins
 * - OPEN breakers are skipped without spending an attempt
 * - Each provider is tried at most once per call
 * - Walk-level deadline and caller cancellation
 * - Usage/cost events and OTel spans and metrics
 *
 * Holds no per-call mutable state; all shared state lives in the breakers.
 */
export class Router {
  private readonly registry: ProviderRegistry;
  private readonly maxAttempts: number | undefined;
  private readonly defaultDeadlineMs: number;
  private readonly costAlertThresholdUsd: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly usageListeners = new Set<UsageListener>();

  constructor(registry: ProviderRegistry, options: RouterOptions = {}) {
    this.registry = registry;
    this.maxAttempts = options.maxAttempts;
    this.defaultDeadlineMs = options.defaultDeadlineMs ?? DEFAULT_DEADLINE_MS;
    this.costAlertThresholdUsd = options.costAlertThresholdUsd ?? DEFAULT_COST_ALERT_THRESHOLD_USD;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Generate text for a task class, falling back along its provider chain.
   *
   * @throws UnknownTaskClassError when no route exists for the task class
   * @throws NoEligibleProviderError when no candidate can emit `maxTokens`
   * @throws DeadlineExceededError when the deadline passes mid-walk
   * @throws RequestCancelledError when the caller's signal fires
   * @throws AllProvidersFailedError when every candidate was skipped or failed
   */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    return withSpan(
      "switchyard.router.generate",
      {
        "switchyard.task_class": request.taskClass,
        "switchyard.max_tokens": request.maxTokens,
      },
      async (span) => {
        const result = await this.walk(request);
        span.setAttribute("switchyard.provider_id", result.providerId);
        span.setAttribute("switchyard.attempts", result.attemptsMade);
        span.setAttribute("switchyard.cost_usd", result.costUsd);
        return result;
      },
    );
  }

  /**
   * Subscribe to one event per successful generation. Returns a disposer.
   */
  onUsage(listener: UsageListener): () => void {
    this.usageListeners.add(listener);
    return () => {
      this.usageListeners.delete(listener);
    };
  }

  /**
   * Breaker state for every configured provider, in route order.
   */
  status(): readonly ProviderStatus[] {
    return this.registry.providers().map(({ adapter, breaker }) => ({
      providerId: adapter.descriptor.providerId,
      vendor: adapter.descriptor.vendor,
      model: adapter.descriptor.model,
      ...breaker.snapshot(),
      config: breaker.config,
    }));
  }

  // -------------------------------------------------------------------------
  // Walk
  // -------------------------------------------------------------------------

  private async walk(request: GenerationRequest): Promise<GenerationResult> {
    const { taskClass, signal } = request;
    const chain = this.registry.candidates(taskClass);
    if (chain === undefined) {
      throw new UnknownTaskClassError(taskClass, this.registry.taskClasses());
    }

    const eligible = chain.filter((c) => c.adapter.descriptor.maxOutputTokens >= request.maxTokens);
    if (eligible.length === 0) {
      const largest = Math.max(...chain.map((c) => c.adapter.descriptor.maxOutputTokens));
      throw new NoEligibleProviderError(taskClass, request.maxTokens, largest);
    }

    const startedAt = this.clock.now();
    const deadline = request.deadline ?? startedAt + this.defaultDeadlineMs;
    const maxAttempts = Math.min(this.maxAttempts ?? eligible.length, eligible.length);
    const failures = new Map<string, ProviderFailureDetail>();
    const attempts: AttemptRecord[] = [];
    let attemptsMade = 0;
    let lastError: ProviderError | undefined;

    for (const candidate of eligible) {
      const { adapter, breaker } = candidate;
      const providerId = adapter.descriptor.providerId;

      if (signal?.aborted) {
        throw new RequestCancelledError(taskClass, attemptsMade, signal.reason);
      }
      if (this.clock.now() >= deadline) {
        throw this.deadlineExceeded(taskClass, deadline, attemptsMade, failures);
      }
      if (attemptsMade >= maxAttempts) {
        failures.set(providerId, { reason: "not_attempted" });
        continue;
      }

      const permit = breaker.tryAcquire();
      if (permit === null) {
        failures.set(providerId, { reason: "circuit_open" });
        attempts.push({ providerId, outcome: "skipped_circuit_open", latencyMs: 0 });
        getRouterAttempts().add(1, { provider: providerId, outcome: "skipped_circuit_open" });
        this.logger.debug("skipping provider with open circuit", { taskClass, providerId });
        continue;
      }

      const remainingMs = deadline - this.clock.now();
      const cappedByDeadline = remainingMs < adapter.descriptor.timeoutMs;
      const timeoutMs = Math.max(0, Math.min(adapter.descriptor.timeoutMs, remainingMs));

      attemptsMade++;
      const attemptStart = this.clock.now();
      const result = await this.invoke(candidate, request, timeoutMs, attemptsMade);
      const latencyMs = this.clock.now() - attemptStart;

      if (signal?.aborted) {
        if (result.ok) {
          breaker.recordSuccess(permit);
        } else {
          breaker.release(permit);
        }
        throw new RequestCancelledError(taskClass, attemptsMade, signal.reason);
      }

      if (result.ok) {
        breaker.recordSuccess(permit);
        attempts.push({ providerId, outcome: "success", latencyMs });
        return this.succeed(request, candidate, result.value, {
          attemptsMade,
          attempts,
          latencyMs,
          totalLatencyMs: this.clock.now() - startedAt,
        });
      }

      const error = result.error;
      const classification = classifyError(error);
      attempts.push({
        providerId,
        outcome: "failed",
        latencyMs,
        errorKind: error.kind,
        classification,
      });
      failures.set(providerId, {
        reason: "provider_error",
        kind: error.kind,
        classification,
        message: error.message,
        ...(error.status !== undefined ? { status: error.status } : {}),
        ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
      });
      lastError = error;
      getRouterAttempts().add(1, { provider: providerId, outcome: "failed", kind: error.kind });
      getRouterLatency().record(latencyMs, { provider: providerId, outcome: "failed" });

      // A local timeout (no HTTP status) under a deadline-capped budget belongs
      // to the caller's deadline, whatever the clock reads when it fires.
      if (error.kind === "timeout" && error.status === undefined && cappedByDeadline) {
        breaker.release(permit);
        throw this.deadlineExceeded(taskClass, deadline, attemptsMade, failures);
      }

      breaker.recordFailure(classification, permit);
      if (classification === "permanent") {
        this.logger.warn("permanent provider failure", {
          taskClass,
          providerId,
          kind: error.kind,
          status: error.status,
        });
      } else {
        this.logger.debug("provider attempt failed", {
          taskClass,
          providerId,
          kind: error.kind,
          classification,
          latencyMs,
        });
      }
    }

    const failed = new AllProvidersFailedError(taskClass, attemptsMade, failures, lastError);
    this.logger.error("all providers failed", {
      taskClass,
      attemptsMade,
      providers: [...failures.keys()],
    });
    throw failed;
  }

  /**
   * Call the adapter inside an attempt span. An adapter that throws despite
   * its contract is turned into an "unknown" provider failure.
   */
  private invoke(
    candidate: RouteCandidate,
    request: GenerationRequest,
    timeoutMs: number,
    attempt: number,
  ): Promise<ProviderResult> {
    const { adapter } = candidate;
    const { providerId } = adapter.descriptor;

    return withSpan(
      "switchyard.router.attempt",
      {
        "switchyard.provider_id": providerId,
        "switchyard.model": adapter.descriptor.model,
        "switchyard.attempt": attempt,
        "switchyard.timeout_ms": timeoutMs,
      },
      async (span) => {
        let result: ProviderResult;
        try {
          result = await adapter.generate(request.prompt, {
            maxTokens: request.maxTokens,
            timeoutMs,
            ...(request.systemPrompt !== undefined ? { systemPrompt: request.systemPrompt } : {}),
            ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
            ...(request.signal !== undefined ? { signal: request.signal } : {}),
          });
        } catch (error) {
          result = {
            ok: false,
            error: new ProviderError({
              providerId,
              kind: "unknown",
              message: `Adapter threw: ${getErrorMessage(error)}`,
              cause: error,
            }),
          };
        }
        if (!result.ok) {
          span.setAttribute("switchyard.error_kind", result.error.kind);
        }
        return result;
      },
      (result) => (result.ok ? undefined : result.error.kind),
    );
  }

  private succeed(
    request: GenerationRequest,
    candidate: RouteCandidate,
    completion: ProviderCompletion,
    progress: {
      readonly attemptsMade: number;
      readonly attempts: readonly AttemptRecord[];
      readonly latencyMs: number;
      readonly totalLatencyMs: number;
    },
  ): GenerationResult {
    const { descriptor } = candidate.adapter;
    const costUsd = computeCostUsd(descriptor, completion.usage);
    const attributes = {
      provider: descriptor.providerId,
      model: descriptor.model,
      task_class: request.taskClass,
    };

    getRouterAttempts().add(1, { provider: descriptor.providerId, outcome: "success" });
    getRouterLatency().record(progress.latencyMs, {
      provider: descriptor.providerId,
      outcome: "success",
    });
    getTokenUsage().add(completion.usage.inputTokens, { ...attributes, direction: "input" });
    getTokenUsage().add(completion.usage.outputTokens, { ...attributes, direction: "output" });
    getCostTotal().add(costUsd, attributes);

    if (costUsd > this.costAlertThresholdUsd) {
      this.logger.warn("generation cost above alert threshold", {
        taskClass: request.taskClass,
        providerId: descriptor.providerId,
        costUsd,
        thresholdUsd: this.costAlertThresholdUsd,
      });
    }

    this.emitUsage({
      taskClass: request.taskClass,
      providerId: descriptor.providerId,
      model: descriptor.model,
      usage: completion.usage,
      costUsd,
      latencyMs: progress.totalLatencyMs,
      attemptsMade: progress.attemptsMade,
      timestamp: this.clock.now(),
    });

    return {
      text: completion.text,
      providerId: descriptor.providerId,
      model: descriptor.model,
      attemptsMade: progress.attemptsMade,
      totalLatencyMs: progress.totalLatencyMs,
      usage: completion.usage,
      costUsd,
      stopReason: completion.stopReason,
      attempts: progress.attempts,
    };
  }

  private deadlineExceeded(
    taskClass: TaskClass,
    deadline: number,
    attemptsMade: number,
    failures: ReadonlyMap<string, ProviderFailureDetail>,
  ): DeadlineExceededError {
    this.logger.error("deadline exceeded", { taskClass, deadline, attemptsMade });
    return new DeadlineExceededError(taskClass, deadline, attemptsMade, failures);
  }

  private emitUsage(event: UsageEvent): void {
    for (const listener of this.usageListeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error("usage listener failed", { error: getErrorMessage(error) });
      }
    }
  }
}
