import type { HttpAdapterConfig, ProviderAdapter, ProviderVendor } from "../types.js";
import { createAnthropicAdapter } from "./anthropic.js";
import { createOpenAIAdapter } from "./openai.js";

export { createAnthropicAdapter } from "./anthropic.js";
export { type HttpResult, MAX_RETRY_AFTER_MS, parseRetryAfter, postJson } from "./http.js";
export {
  classifyByHttpStatus,
  extractErrorMessage,
  matchAnthropic,
  matchOpenAI,
  type NormalizedFailure,
  normalizeHttpFailure,
  type VendorMatcher,
} from "./normalize.js";
export { createOpenAIAdapter } from "./openai.js";

const ADAPTER_FACTORIES: Readonly<
  Record<ProviderVendor, (config: HttpAdapterConfig) => ProviderAdapter>
> = {
  anthropic: createAnthropicAdapter,
  openai: createOpenAIAdapter,
};

/**
 * Create the bundled HTTP adapter for a vendor.
 */
export function createProviderAdapter(
  vendor: ProviderVendor,
  config: HttpAdapterConfig,
): ProviderAdapter {
  return ADAPTER_FACTORIES[vendor](config);
}
