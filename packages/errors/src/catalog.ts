/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by Switchyard packages maps to an HTTP status,
 * a gRPC canonical code, a behavioral base type and a domain.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, router, provider
 */

/**
 * Behavioral base types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "PermissionError"
  | "RateLimitError"
  | "TimeoutError"
  | "CancelledError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // ROUTER ERRORS - configuration and fallback-walk outcomes
  // ============================================================================
  ROUTER_INVALID_CONFIG: {
    domain: "router",
    httpStatus: 500,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid router configuration",
    description: "The routing table or breaker parameters failed validation",
  },
  ROUTER_UNKNOWN_TASK_CLASS: {
    domain: "router",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Unknown task class",
    description: "No route is configured for the requested task class",
  },
  ROUTER_NO_ELIGIBLE_PROVIDER: {
    domain: "router",
    httpStatus: 400,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "No eligible provider",
    description: "No provider on the route can produce the requested number of tokens",
  },
  ROUTER_ALL_PROVIDERS_FAILED: {
    domain: "router",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "All providers failed",
    description: "Every candidate provider was skipped or failed",
  },
  ROUTER_DEADLINE_EXCEEDED: {
    domain: "router",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "Deadline exceeded",
    description: "The caller's deadline passed before a provider succeeded",
  },
  ROUTER_REQUEST_CANCELLED: {
    domain: "router",
    httpStatus: 499,
    grpcCode: "CANCELLED" as const,
    baseType: "CancelledError" as const,
    isExpected: true,
    title: "Request cancelled",
    description: "The caller cancelled the request before a provider succeeded",
  },

  // ============================================================================
  // PROVIDER ERRORS - one code per normalized provider error kind
  // ============================================================================
  PROVIDER_RATE_LIMITED: {
    domain: "provider",
    httpStatus: 429,
    grpcCode: "RESOURCE_EXHAUSTED" as const,
    baseType: "RateLimitError" as const,
    isExpected: false,
    title: "Provider rate limited",
    description: "The provider rejected the call because of rate limiting or overload",
  },
  PROVIDER_TIMEOUT: {
    domain: "provider",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "Provider timeout",
    description: "The provider did not answer within the call timeout",
  },
  PROVIDER_UNAVAILABLE: {
    domain: "provider",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Provider unavailable",
    description: "The provider reported that the service is unavailable",
  },
  PROVIDER_SERVER_ERROR: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "INTERNAL" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Provider server error",
    description: "The provider failed with a server-side error",
  },
  PROVIDER_NETWORK_ERROR: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Provider network error",
    description: "The provider could not be reached",
  },
  PROVIDER_INVALID_REQUEST: {
    domain: "provider",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Provider rejected request",
    description: "The provider rejected the request as malformed",
  },
  PROVIDER_CONTEXT_OVERFLOW: {
    domain: "provider",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Provider context overflow",
    description: "The prompt and output budget exceed the model's context window",
  },
  PROVIDER_AUTH_FAILED: {
    domain: "provider",
    httpStatus: 401,
    grpcCode: "UNAUTHENTICATED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Provider authentication failed",
    description: "The provider rejected the configured credentials",
  },
  PROVIDER_PERMISSION_DENIED: {
    domain: "provider",
    httpStatus: 403,
    grpcCode: "PERMISSION_DENIED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Provider permission denied",
    description: "The configured credentials may not use this model",
  },
  PROVIDER_QUOTA_EXHAUSTED: {
    domain: "provider",
    httpStatus: 402,
    grpcCode: "RESOURCE_EXHAUSTED" as const,
    baseType: "RateLimitError" as const,
    isExpected: true,
    title: "Provider quota exhausted",
    description: "The provider account has no remaining quota or credit",
  },
  PROVIDER_UNKNOWN_ERROR: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "UNKNOWN" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Provider error",
    description: "The provider failed in an unrecognized way",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type ErrorCode = keyof typeof ERROR_CATALOG;

export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

export type ErrorDomain = ErrorCatalogEntry["domain"];

export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];

/**
 * Error codes raised for normalized provider failures
 */
export type ProviderErrorCode = Extract<ErrorCode, `PROVIDER_${string}`>;
