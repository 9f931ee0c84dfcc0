import { describe, expect, it } from "vitest";
import {
  AllProvidersFailedError,
  DeadlineExceededError,
  InternalError,
  parseProblemDetails,
  type ProviderFailureDetail,
  RouterConfigurationError,
  serializeToProblemDetails,
} from "../../index.js";

describe("serializeToProblemDetails", () => {
  it("uses the code as type and the catalog title", () => {
    const problem = serializeToProblemDetails(new InternalError("boom", { traceId: "t-1" }));

    expect(problem).toMatchObject({
      type: "/errors/INTERNAL_ERROR",
      title: "Internal server error",
      status: 500,
      detail: "boom",
      code: "INTERNAL_ERROR",
      domain: "internal",
      traceId: "t-1",
    });
    expect(problem.failures).toBeUndefined();
  });

  it("lists provider outcomes for AllProvidersFailedError", () => {
    const failures = new Map<string, ProviderFailureDetail>([
      ["primary", { reason: "circuit_open" }],
      [
        "backup",
        {
          reason: "provider_error",
          kind: "auth_failed",
          classification: "permanent",
          message: "bad key",
          status: 401,
        },
      ],
    ]);
    const problem = serializeToProblemDetails(new AllProvidersFailedError("template", 1, failures));

    expect(problem.status).toBe(503);
    expect(problem.failures).toEqual([
      { providerId: "primary", reason: "circuit_open" },
      {
        providerId: "backup",
        reason: "provider_error",
        kind: "auth_failed",
        classification: "permanent",
        status: 401,
      },
    ]);
  });

  it("carries the provider's retry-after wait", () => {
    const failures = new Map<string, ProviderFailureDetail>([
      [
        "primary",
        {
          reason: "provider_error",
          kind: "rate_limited",
          classification: "transient",
          message: "slow down",
          status: 429,
          retryAfterMs: 12_000,
        },
      ],
    ]);
    const problem = serializeToProblemDetails(new AllProvidersFailedError("template", 1, failures));

    expect(problem.failures).toEqual([
      {
        providerId: "primary",
        reason: "provider_error",
        kind: "rate_limited",
        classification: "transient",
        status: 429,
        retryAfterMs: 12_000,
      },
    ]);
  });

  it("lists provider outcomes for DeadlineExceededError", () => {
    const failures = new Map<string, ProviderFailureDetail>([
      [
        "primary",
        {
          reason: "provider_error",
          kind: "timeout",
          classification: "transient",
          message: "timed out",
        },
      ],
    ]);
    const problem = serializeToProblemDetails(
      new DeadlineExceededError("strategic", Date.UTC(2026, 0, 1), 1, failures),
    );

    expect(problem.status).toBe(504);
    expect(problem.failures).toEqual([
      { providerId: "primary", reason: "provider_error", kind: "timeout", classification: "transient" },
    ]);
  });

  it("copies configuration issues into errors", () => {
    const problem = serializeToProblemDetails(
      new RouterConfigurationError([
        { field: "providers.a.timeoutMs", message: "Number must be greater than 0", code: "too_small" },
      ]),
    );

    expect(problem.errors).toEqual([
      { field: "providers.a.timeoutMs", message: "Number must be greater than 0", code: "too_small" },
    ]);
  });

  it("produces payloads that pass the wire schema", () => {
    const problem = serializeToProblemDetails(
      new AllProvidersFailedError("template", 0, new Map([["primary", { reason: "circuit_open" }]])),
    );

    expect(parseProblemDetails(JSON.parse(JSON.stringify(problem)))).toEqual(problem);
  });

  it("rejects payloads with an out-of-range status", () => {
    expect(() => parseProblemDetails({ type: "/errors/X", title: "X", status: 42 })).toThrow();
  });
});
