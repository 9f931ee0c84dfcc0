/**
 * @switchyard/errors
 *
 * Error taxonomy for the Switchyard LLM router.
 *
 * Every error carries a `.code` from the catalog. Use `error.code === "XXX"`
 * (or `hasCode`) for fine-grained matching and `instanceof` for families.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, SwitchyardError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
  type ProviderErrorCode,
} from "./catalog.js";

export {
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// ERROR CLASSES
// ============================================================================

export {
  ConfigurationError,
  NoEligibleProviderError,
  RouterConfigurationError,
  UnknownTaskClassError,
} from "./classes/configuration.js";
export { InternalError } from "./classes/internal.js";
export {
  PROVIDER_ERROR_CODES,
  ProviderError,
  type ProviderErrorInit,
} from "./classes/provider.js";
export {
  AllProvidersFailedError,
  DeadlineExceededError,
  RequestCancelledError,
} from "./classes/routing.js";

// ============================================================================
// TYPES
// ============================================================================

export {
  type ErrorClassification,
  PROVIDER_ERROR_KINDS,
  type ProviderErrorKind,
  type ProviderFailureDetail,
  type ProviderFailureReason,
  type SwitchyardErrorOptions,
  type ValidationIssue,
} from "./types.js";

// ============================================================================
// GUARDS & SERIALIZATION
// ============================================================================

export {
  hasBaseType,
  hasCode,
  isConfigurationError,
  isExpectedError,
  isProviderError,
  isSwitchyardError,
} from "./guards.js";

export { parseProblemDetails, serializeToProblemDetails } from "./serialization.js";
export {
  type ProblemDetails,
  ProblemDetailsSchema,
  type ProviderFailureEntry,
} from "./wire/rfc9457.js";
