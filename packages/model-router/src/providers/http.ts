/**
 * Shared HTTP utility: fetch + timeout + vendor error normalization.
 *
 * Never throws for provider failures. Every outcome comes back as a value
 * so adapters can hand it straight to the router.
 */

import { getErrorMessage, ProviderError } from "@switchyard/errors";
import type { z } from "zod";
import type { ProviderResult } from "../types.js";
import { normalizeHttpFailure, type VendorMatcher } from "./normalize.js";

/** Maximum allowed retry-after in ms (5 minutes) */
export const MAX_RETRY_AFTER_MS = 300_000;

const MAX_ERROR_BODY_LENGTH = 500;

export type HttpResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ProviderError };

export interface PostJsonOptions<S extends z.ZodTypeAny> {
  readonly providerId: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal | undefined;
  /** Shape the success body must have */
  readonly schema: S;
  readonly matcher?: VendorMatcher;
}

/**
 * POST a JSON body and parse the JSON answer with `schema`.
 *
 * The call is aborted once `timeoutMs` elapses or the external signal fires,
 * so the returned promise settles shortly after either.
 */
export async function postJson<S extends z.ZodTypeAny>(
  options: PostJsonOptions<S>,
): Promise<HttpResult<z.infer<S>>> {
  const { providerId, signal, timeoutMs } = options;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  // Link external signal to internal controller
  const onExternalAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  try {
    const response = await fetch(options.url, {
      method: "POST",
      headers: { "content-type": "application/json", ...options.headers },
      body: JSON.stringify(options.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      const normalized = normalizeHttpFailure(response.status, body, options.matcher);
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      return {
        ok: false,
        error: new ProviderError({
          providerId,
          kind: normalized.kind,
          message: `HTTP ${response.status}: ${truncate(normalized.message, MAX_ERROR_BODY_LENGTH)}`,
          status: response.status,
          ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
        }),
      };
    }

    const json: unknown = await response.json();
    const parsed = options.schema.safeParse(json);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ProviderError({
          providerId,
          kind: "unknown",
          message: `Malformed response body: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
          status: response.status,
          cause: parsed.error,
        }),
      };
    }
    return { ok: true, value: parsed.data };
  } catch (error) {
    if (timedOut) {
      return {
        ok: false,
        error: new ProviderError({
          providerId,
          kind: "timeout",
          message: `Request timed out after ${timeoutMs}ms`,
          cause: error,
        }),
      };
    }

    if (signal?.aborted) {
      return {
        ok: false,
        error: new ProviderError({
          providerId,
          kind: "unknown",
          message: "Request aborted by caller",
          cause: signal.reason,
        }),
      };
    }

    return {
      ok: false,
      error: new ProviderError({
        providerId,
        kind: error instanceof SyntaxError ? "unknown" : "network",
        message: getErrorMessage(error),
        cause: error,
      }),
    };
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date), capped at
 * {@link MAX_RETRY_AFTER_MS}.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now(),
): number | undefined {
  if (value === null || value === undefined || value.trim() === "") return undefined;

  const seconds = Number(value);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.min(Math.max(0, date - now), MAX_RETRY_AFTER_MS);
  }

  return undefined;
}

/**
 * Wrap an HTTP result into a {@link ProviderResult} after mapping the body.
 */
export function mapHttpResult<T>(
  result: HttpResult<T>,
  map: (value: T) => ProviderResult,
): ProviderResult {
  return result.ok ? map(result.value) : result;
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}
