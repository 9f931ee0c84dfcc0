export { type EnvMap, type InterpolationResult, interpolateDocument } from "./interpolation.js";
export {
  loadRouterConfig,
  type ParseRouterConfigOptions,
  parseRouterConfig,
  toValidationIssues,
  validateRouterConfig,
} from "./parser.js";
export {
  type CircuitBreakerOverrides,
  CircuitBreakerOverridesSchema,
  type ProviderConfig,
  ProviderConfigSchema,
  type RouterConfig,
  RouterConfigSchema,
} from "./schema.js";
