/**
 * Zod schema for the routing document.
 */

import { z } from "zod";

export const CircuitBreakerOverridesSchema = z
  .object({
    failureThreshold: z.number().int().min(1),
    successThreshold: z.number().int().min(1),
    openTimeoutMs: z.number().int().nonnegative(),
    halfOpenMaxProbes: z.number().int().min(1),
  })
  .partial()
  .strict();

export const ProviderConfigSchema = z
  .object({
    vendor: z.enum(["anthropic", "openai"]),
    model: z.string().min(1),
    apiKey: z.string().min(1),
    baseUrl: z.string().url().optional(),
    maxOutputTokens: z.number().int().positive(),
    costPerMillionInputTokens: z.number().nonnegative(),
    costPerMillionOutputTokens: z.number().nonnegative(),
    timeoutMs: z.number().int().positive(),
    circuitBreaker: CircuitBreakerOverridesSchema.optional(),
  })
  .strict();

export const RouterConfigSchema = z
  .object({
    providers: z.record(ProviderConfigSchema),
    circuitBreaker: CircuitBreakerOverridesSchema.optional(),
    routes: z.record(z.array(z.string().min(1)).min(1, "route must name at least one provider")),
    maxAttempts: z.number().int().positive().optional(),
    defaultDeadlineMs: z.number().int().positive().optional(),
    costAlertThresholdUsd: z.number().nonnegative().optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (Object.keys(config.providers).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["providers"],
        message: "at least one provider is required",
      });
    }
    if (Object.keys(config.routes).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["routes"],
        message: "at least one route is required",
      });
    }

    for (const [taskClass, providerIds] of Object.entries(config.routes)) {
      const seen = new Set<string>();
      providerIds.forEach((providerId, index) => {
        if (!Object.hasOwn(config.providers, providerId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["routes", taskClass, index],
            message: `unknown provider "${providerId}"`,
          });
        }
        if (seen.has(providerId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["routes", taskClass, index],
            message: `provider "${providerId}" appears more than once`,
          });
        }
        seen.add(providerId);
      });
    }
  });

export type CircuitBreakerOverrides = z.infer<typeof CircuitBreakerOverridesSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type RouterConfig = z.infer<typeof RouterConfigSchema>;
