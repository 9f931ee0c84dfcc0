/**
 * Router assembly from a validated routing document.
 */

import type { Clock } from "./clock.js";
import type { ProviderConfig, RouterConfig } from "./config/schema.js";
import type { Logger } from "./logger.js";
import { createProviderAdapter } from "./providers/index.js";
import { ProviderRegistry } from "./registry.js";
import { Router } from "./router.js";
import type { CircuitBreakerConfig, ProviderAdapter } from "./types.js";

export type AdapterFactory = (providerId: string, config: ProviderConfig) => ProviderAdapter;

export interface CreateRouterOptions {
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** Replace the bundled vendor adapters (custom transports, tests) */
  readonly adapterFactory?: AdapterFactory;
}

const defaultAdapterFactory: AdapterFactory = (providerId, config) =>
  createProviderAdapter(config.vendor, {
    providerId,
    model: config.model,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    maxOutputTokens: config.maxOutputTokens,
    costPerMillionInputTokens: config.costPerMillionInputTokens,
    costPerMillionOutputTokens: config.costPerMillionOutputTokens,
    timeoutMs: config.timeoutMs,
  });

/**
 * Build adapters, one breaker per provider, the registry and the router.
 */
export function createRouterFromConfig(
  config: RouterConfig,
  options: CreateRouterOptions = {},
): Router {
  const factory = options.adapterFactory ?? defaultAdapterFactory;
  const adapters = Object.entries(config.providers).map(([providerId, provider]) =>
    factory(providerId, provider),
  );

  const overrides: Record<string, Partial<CircuitBreakerConfig>> = {};
  for (const [providerId, provider] of Object.entries(config.providers)) {
    if (provider.circuitBreaker !== undefined) {
      overrides[providerId] = provider.circuitBreaker;
    }
  }

  const registry = ProviderRegistry.create(adapters, config.routes, {
    ...(config.circuitBreaker !== undefined ? { circuitBreaker: config.circuitBreaker } : {}),
    circuitBreakerOverrides: overrides,
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
    ...(options.logger !== undefined ? { logger: options.logger } : {}),
  });

  return new Router(registry, {
    ...(config.maxAttempts !== undefined ? { maxAttempts: config.maxAttempts } : {}),
    ...(config.defaultDeadlineMs !== undefined
      ? { defaultDeadlineMs: config.defaultDeadlineMs }
      : {}),
    ...(config.costAlertThresholdUsd !== undefined
      ? { costAlertThresholdUsd: config.costAlertThresholdUsd }
      : {}),
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
    ...(options.logger !== undefined ? { logger: options.logger } : {}),
  });
}
