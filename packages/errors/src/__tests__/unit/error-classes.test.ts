import { describe, expect, it } from "vitest";
import {
  AllProvidersFailedError,
  ConfigurationError,
  DeadlineExceededError,
  getErrorMessage,
  hasBaseType,
  hasCode,
  InternalError,
  isConfigurationError,
  isExpectedError,
  isProviderError,
  isSwitchyardError,
  NoEligibleProviderError,
  ProviderError,
  type ProviderFailureDetail,
  RequestCancelledError,
  RouterConfigurationError,
  SwitchyardError,
  UnknownTaskClassError,
  wrapError,
} from "../../index.js";

describe("SwitchyardError base class", () => {
  it("derives transport fields from the catalog", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(SwitchyardError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.grpcCode).toBe("INTERNAL");
    expect(error.domain).toBe("internal");
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("serializes to JSON with trace ID and metadata", () => {
    const error = new InternalError("JSON test", {
      metadata: { key: "value" },
      traceId: "trace-123",
    });

    expect(error.toJSON()).toMatchObject({
      _tag: "InternalError",
      name: "InternalError",
      code: "INTERNAL_ERROR",
      message: "JSON test",
      domain: "internal",
      isExpected: false,
      traceId: "trace-123",
      metadata: { key: "value" },
    });
  });

  it("omits absent optional fields from JSON", () => {
    const json = new InternalError("bare").toJSON();
    expect("traceId" in json).toBe(false);
    expect("metadata" in json).toBe(false);
  });
});

describe("configuration errors", () => {
  it("formats UnknownTaskClassError with the configured classes", () => {
    const error = new UnknownTaskClassError("creative", ["strategic", "template"]);

    expect(error.message).toBe('Unknown task class "creative" (configured: strategic, template)');
    expect(error.code).toBe("ROUTER_UNKNOWN_TASK_CLASS");
    expect(error.httpStatus).toBe(400);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(isConfigurationError(error)).toBe(true);
  });

  it("says none when no task class is configured", () => {
    const error = new UnknownTaskClassError("strategic", []);
    expect(error.message).toBe('Unknown task class "strategic" (configured: none)');
  });

  it("formats NoEligibleProviderError with the largest ceiling", () => {
    const error = new NoEligibleProviderError("template", 16_000, 8_192);

    expect(error.message).toBe(
      'No provider for task class "template" can emit 16000 tokens (largest ceiling: 8192)',
    );
    expect(error.code).toBe("ROUTER_NO_ELIGIBLE_PROVIDER");
    expect(isConfigurationError(error)).toBe(true);
  });

  it("joins every issue into the RouterConfigurationError message", () => {
    const error = new RouterConfigurationError([
      { field: "routes.strategic.0", message: 'unknown provider "x"', code: "custom" },
      { field: "", message: "document is empty", code: "custom" },
    ]);

    expect(error.message).toBe(
      'Invalid router configuration: routes.strategic.0: unknown provider "x"; document is empty',
    );
    expect(error.issues).toHaveLength(2);
    expect(error.isExpected).toBe(false);
  });
});

describe("ProviderError", () => {
  it("maps the kind to its catalog code", () => {
    const error = new ProviderError({
      providerId: "anthropic-sonnet",
      kind: "rate_limited",
      message: "HTTP 429",
      status: 429,
      retryAfterMs: 2_000,
    });

    expect(error.message).toBe('Provider "anthropic-sonnet" rate_limited: HTTP 429');
    expect(error.code).toBe("PROVIDER_RATE_LIMITED");
    expect(error._tag).toBe("RateLimitError");
    expect(error.httpStatus).toBe(429);
    expect(error.status).toBe(429);
    expect(error.retryAfterMs).toBe(2_000);
    expect(isProviderError(error)).toBe(true);
  });

  it("keeps the native cause", () => {
    const cause = new TypeError("fetch failed");
    const error = new ProviderError({
      providerId: "openai-mini",
      kind: "network",
      message: "fetch failed",
      cause,
    });

    expect(error.cause).toBe(cause);
    expect(error.code).toBe("PROVIDER_NETWORK_ERROR");
    expect(error.status).toBeUndefined();
  });
});

describe("routing errors", () => {
  const failures = new Map<string, ProviderFailureDetail>([
    ["anthropic-sonnet", { reason: "circuit_open" }],
    [
      "openai-gpt4o",
      {
        reason: "provider_error",
        kind: "timeout",
        classification: "transient",
        message: "timed out",
      },
    ],
    ["anthropic-haiku", { reason: "not_attempted" }],
  ]);

  it("summarizes each provider outcome in AllProvidersFailedError", () => {
    const error = new AllProvidersFailedError("strategic", 1, failures);

    expect(error.message).toBe(
      'All providers failed for task class "strategic" [anthropic-sonnet: circuit_open, openai-gpt4o: timeout, anthropic-haiku: not_attempted]',
    );
    expect(error.httpStatus).toBe(503);
    expect(error.attemptsMade).toBe(1);
    expect(error.failures.get("openai-gpt4o")).toMatchObject({ kind: "timeout" });
  });

  it("formats the deadline as an ISO instant", () => {
    const deadline = Date.UTC(2026, 0, 1);
    const error = new DeadlineExceededError("strategic", deadline, 1, new Map());

    expect(error.message).toBe(
      'Deadline 2026-01-01T00:00:00.000Z exceeded for task class "strategic" after 1 attempt(s)',
    );
    expect(error.grpcCode).toBe("DEADLINE_EXCEEDED");
    expect(hasBaseType(error, "TimeoutError")).toBe(true);
  });

  it("carries the abort reason as cause of RequestCancelledError", () => {
    const reason = new Error("client went away");
    const error = new RequestCancelledError("template", 0, reason);

    expect(error.message).toBe('Request for task class "template" cancelled after 0 attempt(s)');
    expect(error.cause).toBe(reason);
    expect(error.httpStatus).toBe(499);
    expect(isExpectedError(error)).toBe(true);
  });
});

describe("guards and helpers", () => {
  it("narrows with hasCode", () => {
    const error: SwitchyardError = new RequestCancelledError("template", 2);
    expect(hasCode(error, "ROUTER_REQUEST_CANCELLED")).toBe(true);
    expect(hasCode(error, "ROUTER_DEADLINE_EXCEEDED")).toBe(false);
  });

  it("rejects plain errors", () => {
    expect(isSwitchyardError(new Error("plain"))).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
    expect(isProviderError({ kind: "timeout" })).toBe(false);
  });

  it("wraps native errors as InternalError", () => {
    const native = new TypeError("boom");
    const wrapped = wrapError(native, "trace-1");

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.traceId).toBe("trace-1");
    expect(wrapped.cause).toBe(native);
  });

  it("passes Switchyard errors through wrapError", () => {
    const error = new RequestCancelledError("template", 0);
    expect(wrapError(error)).toBe(error);
  });

  it("wraps strings and other values", () => {
    expect(wrapError("oops").message).toBe("oops");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });

  it("extracts messages from anything", () => {
    expect(getErrorMessage(new Error("x"))).toBe("x");
    expect(getErrorMessage("y")).toBe("y");
    expect(getErrorMessage(42)).toBe("42");
  });
});
