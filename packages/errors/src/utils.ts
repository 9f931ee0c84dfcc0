import { SwitchyardError } from "./base.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";
import { InternalError } from "./classes/internal.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return Object.entries(ERROR_CATALOG)
    .filter(([, entry]) => entry.domain === domain)
    .map(([code]) => code)
    .filter(isValidErrorCode);
}

/**
 * Wrap an unknown thrown value into a SwitchyardError.
 * SwitchyardErrors pass through; anything else becomes an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): SwitchyardError {
  if (error instanceof SwitchyardError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      metadata: { originalName: error.name },
      traceId,
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, { traceId });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}
