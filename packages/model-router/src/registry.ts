import { RouterConfigurationError, type ValidationIssue } from "@switchyard/errors";
import { CircuitBreaker } from "./circuit-breaker.js";
import type { Clock } from "./clock.js";
import type { Logger } from "./logger.js";
import type {
  CircuitBreakerConfig,
  ProviderAdapter,
  RouteCandidate,
  RoutingTableEntry,
  TaskClass,
} from "./types.js";

export interface RegistryBuildOptions {
  /** Breaker defaults applied to every provider */
  readonly circuitBreaker?: Partial<CircuitBreakerConfig>;
  /** Per-provider breaker overrides, keyed by providerId */
  readonly circuitBreakerOverrides?: Readonly<Record<string, Partial<CircuitBreakerConfig>>>;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Immutable task class → ordered fallback chain table.
 *
 * Every providerId maps to exactly one adapter and one breaker, shared by
 * all routes that name it.
 */
export class ProviderRegistry {
  private readonly routes: ReadonlyMap<string, readonly RouteCandidate[]>;
  private readonly byProvider: ReadonlyMap<string, RouteCandidate>;

  constructor(entries: readonly RoutingTableEntry[]) {
    const issues: ValidationIssue[] = [];
    const routes = new Map<string, readonly RouteCandidate[]>();
    const byProvider = new Map<string, RouteCandidate>();

    for (const entry of entries) {
      const field = `routes.${entry.taskClass}`;
      if (routes.has(entry.taskClass)) {
        issues.push({ field, message: "task class is defined twice", code: "duplicate" });
        continue;
      }
      if (entry.candidates.length === 0) {
        issues.push({ field, message: "route must name at least one provider", code: "too_small" });
      }

      const seen = new Set<string>();
      for (const candidate of entry.candidates) {
        const providerId = candidate.adapter.descriptor.providerId;
        if (seen.has(providerId)) {
          issues.push({
            field,
            message: `provider "${providerId}" appears more than once`,
            code: "duplicate",
          });
        }
        seen.add(providerId);

        if (candidate.breaker.providerId !== providerId) {
          issues.push({
            field,
            message: `breaker for "${candidate.breaker.providerId}" paired with provider "${providerId}"`,
            code: "invalid_breaker",
          });
        }

        const known = byProvider.get(providerId);
        if (known === undefined) {
          byProvider.set(providerId, candidate);
        } else if (known.adapter !== candidate.adapter || known.breaker !== candidate.breaker) {
          issues.push({
            field,
            message: `provider "${providerId}" must use the same adapter and breaker in every route`,
            code: "invalid_breaker",
          });
        }
      }

      routes.set(entry.taskClass, Object.freeze([...entry.candidates]));
    }

    if (issues.length > 0) {
      throw new RouterConfigurationError(issues);
    }
    this.routes = routes;
    this.byProvider = byProvider;
  }

  /**
   * Build a registry from adapters and a route table of providerIds,
   * creating one breaker per provider.
   */
  static create(
    adapters: readonly ProviderAdapter[],
    routes: Readonly<Record<string, readonly string[]>>,
    options: RegistryBuildOptions = {},
  ): ProviderRegistry {
    const issues: ValidationIssue[] = [];
    const candidates = new Map<string, RouteCandidate>();

    for (const adapter of adapters) {
      const providerId = adapter.descriptor.providerId;
      if (candidates.has(providerId)) {
        issues.push({
          field: `providers.${providerId}`,
          message: "provider is defined twice",
          code: "duplicate",
        });
        continue;
      }
      const breaker = new CircuitBreaker(
        providerId,
        { ...options.circuitBreaker, ...options.circuitBreakerOverrides?.[providerId] },
        {
          ...(options.clock !== undefined ? { clock: options.clock } : {}),
          ...(options.logger !== undefined ? { logger: options.logger } : {}),
        },
      );
      candidates.set(providerId, { adapter, breaker });
    }

    const entries: RoutingTableEntry[] = [];
    for (const [taskClass, providerIds] of Object.entries(routes)) {
      const chain: RouteCandidate[] = [];
      for (const providerId of providerIds) {
        const candidate = candidates.get(providerId);
        if (candidate === undefined) {
          issues.push({
            field: `routes.${taskClass}`,
            message: `unknown provider "${providerId}"`,
            code: "unknown_provider",
          });
          continue;
        }
        chain.push(candidate);
      }
      entries.push({ taskClass, candidates: chain });
    }

    if (issues.length > 0) {
      throw new RouterConfigurationError(issues);
    }
    return new ProviderRegistry(entries);
  }

  /** Ordered candidates for a task class, or undefined when none is configured */
  candidates(taskClass: TaskClass): readonly RouteCandidate[] | undefined {
    return this.routes.get(taskClass);
  }

  taskClasses(): readonly string[] {
    return [...this.routes.keys()];
  }

  /** Every distinct provider, in first-seen route order */
  providers(): readonly RouteCandidate[] {
    return [...this.byProvider.values()];
  }

  provider(providerId: string): RouteCandidate | undefined {
    return this.byProvider.get(providerId);
  }
}
