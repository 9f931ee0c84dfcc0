/**
 * Type guards for Switchyard errors + code-level discrimination.
 */

import { SwitchyardError } from "./base.js";
import type { BaseErrorType, ErrorCode } from "./catalog.js";
import { ConfigurationError } from "./classes/configuration.js";
import { ProviderError } from "./classes/provider.js";

export function isSwitchyardError(error: unknown): error is SwitchyardError {
  return error instanceof SwitchyardError;
}

/** Unknown task class, unsatisfiable token budget, or invalid configuration */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Check if a SwitchyardError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: SwitchyardError,
  code: C,
): error is SwitchyardError & { readonly code: C } {
  return error.code === code;
}

/** Check if an error belongs to a behavioral base type */
export function hasBaseType(error: unknown, baseType: BaseErrorType): boolean {
  return error instanceof SwitchyardError && error._tag === baseType;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for anything that is not a SwitchyardError.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof SwitchyardError && error.isExpected;
}
