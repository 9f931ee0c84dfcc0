import { RouterConfigurationError } from "@switchyard/errors";
import { describe, expect, it } from "vitest";
import { parseRouterConfig, validateRouterConfig } from "../../config/parser.js";
import {
  ENV_ROUTES_YAML,
  FULL_ROUTES_YAML,
  MALFORMED_YAML,
  MINIMAL_ROUTES_YAML,
  UNKNOWN_PROVIDER_YAML,
} from "../helpers/fixtures.js";

function issuesOf(fn: () => unknown) {
  try {
    fn();
  } catch (error) {
    if (error instanceof RouterConfigurationError) return error.issues;
    throw error;
  }
  throw new Error("expected a RouterConfigurationError");
}

const PROVIDER = {
  vendor: "openai",
  model: "gpt-4o-mini",
  apiKey: "test-secret",
  maxOutputTokens: 1024,
  costPerMillionInputTokens: 0.15,
  costPerMillionOutputTokens: 0.6,
  timeoutMs: 30_000,
};

describe("parseRouterConfig", () => {
  it("parses a minimal document", () => {
    const config = parseRouterConfig(MINIMAL_ROUTES_YAML);

    expect(config.routes).toEqual({ template: ["gpt-mini"] });
    expect(config.providers["gpt-mini"]?.vendor).toBe("openai");
    expect(config.maxAttempts).toBeUndefined();
  });

  it("parses every section of a full document", () => {
    const config = parseRouterConfig(FULL_ROUTES_YAML, { env: {} });

    expect(Object.keys(config.providers)).toEqual(["claude-haiku", "claude-sonnet", "gpt-mini"]);
    expect(config.routes.template).toEqual(["claude-haiku", "gpt-mini", "claude-sonnet"]);
    expect(config.circuitBreaker).toEqual({ failureThreshold: 3, openTimeoutMs: 15_000 });
    expect(config.providers["claude-sonnet"]?.circuitBreaker).toEqual({ failureThreshold: 5 });
    expect(config.providers["gpt-mini"]?.baseUrl).toBe("https://gateway.example.com/v1");
    expect(config.maxAttempts).toBe(3);
    expect(config.defaultDeadlineMs).toBe(90_000);
    expect(config.costAlertThresholdUsd).toBe(0.25);
  });

  it("fills API keys from the environment", () => {
    const config = parseRouterConfig(FULL_ROUTES_YAML, { env: { ANTHROPIC_API_KEY: "from-env" } });

    expect(config.providers["claude-haiku"]?.apiKey).toBe("from-env");
    expect(config.providers["gpt-mini"]?.apiKey).toBe("test-secret");
  });

  it("rejects a document whose key variable is unset", () => {
    expect(issuesOf(() => parseRouterConfig(ENV_ROUTES_YAML, { env: {} }))).toEqual([
      {
        field: "providers.claude-haiku.apiKey",
        message: "environment variable ANTHROPIC_API_KEY is not set",
        code: "missing_env",
      },
    ]);
  });

  it("leaves markers alone when interpolation is skipped", () => {
    const config = parseRouterConfig(ENV_ROUTES_YAML, { skipInterpolation: true });

    expect(config.providers["claude-haiku"]?.apiKey).toBe("${ANTHROPIC_API_KEY}");
  });

  it("rejects a route naming an unknown provider", () => {
    expect(issuesOf(() => parseRouterConfig(UNKNOWN_PROVIDER_YAML))).toEqual([
      { field: "routes.template.1", message: 'unknown provider "gpt-mini"', code: "custom" },
    ]);
  });

  it("reports YAML syntax errors with a position", () => {
    const issues = issuesOf(() => parseRouterConfig(MALFORMED_YAML));

    expect(issues).toHaveLength(1);
    expect(issues[0]?.field).toMatch(/^line \d+, column \d+$/);
  });

  it("returns a frozen document", () => {
    const config = parseRouterConfig(MINIMAL_ROUTES_YAML);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.routes.template)).toBe(true);
    expect(Object.isFrozen(config.providers["gpt-mini"])).toBe(true);
  });

  it("freezes breaker overrides at both levels", () => {
    const config = parseRouterConfig(FULL_ROUTES_YAML, { env: {} });

    expect(Object.isFrozen(config.circuitBreaker)).toBe(true);
    expect(Object.isFrozen(config.providers["claude-sonnet"]?.circuitBreaker)).toBe(true);
  });

  it("reads a numeric setting from the environment", () => {
    const yaml = MINIMAL_ROUTES_YAML.replace("timeoutMs: 30000", "timeoutMs: ${MINI_TIMEOUT_MS}");
    const config = parseRouterConfig(yaml, { env: { MINI_TIMEOUT_MS: "45000" } });

    expect(config.providers["gpt-mini"]?.timeoutMs).toBe(45_000);
  });
});

describe("validateRouterConfig", () => {
  it("accepts a document built in code", () => {
    const config = validateRouterConfig({
      providers: { mini: PROVIDER },
      routes: { validation: ["mini"] },
    });

    expect(config.routes.validation).toEqual(["mini"]);
  });

  it("rejects unknown top-level keys", () => {
    const issues = issuesOf(() =>
      validateRouterConfig({
        providers: { mini: PROVIDER },
        routes: { validation: ["mini"] },
        retries: 3,
      }),
    );

    expect(issues).toEqual([
      { field: "", message: "Unrecognized key(s) in object: 'retries'", code: "unrecognized_keys" },
    ]);
  });

  it("rejects an empty route", () => {
    const issues = issuesOf(() =>
      validateRouterConfig({ providers: { mini: PROVIDER }, routes: { validation: [] } }),
    );

    expect(issues).toEqual([
      {
        field: "routes.validation",
        message: "route must name at least one provider",
        code: "too_small",
      },
    ]);
  });

  it("rejects a provider listed twice in one route", () => {
    const issues = issuesOf(() =>
      validateRouterConfig({ providers: { mini: PROVIDER }, routes: { validation: ["mini", "mini"] } }),
    );

    expect(issues).toEqual([
      {
        field: "routes.validation.1",
        message: 'provider "mini" appears more than once',
        code: "custom",
      },
    ]);
  });

  it("requires at least one provider and one route", () => {
    const issues = issuesOf(() => validateRouterConfig({ providers: {}, routes: {} }));

    expect(issues.map((i) => i.field)).toEqual(["providers", "routes"]);
  });

  it("rejects invalid breaker settings", () => {
    const issues = issuesOf(() =>
      validateRouterConfig({
        providers: { mini: PROVIDER },
        routes: { validation: ["mini"] },
        circuitBreaker: { failureThreshold: 0 },
      }),
    );

    expect(issues.map((i) => i.field)).toEqual(["circuitBreaker.failureThreshold"]);
  });

  it("rejects an unsupported vendor", () => {
    const issues = issuesOf(() =>
      validateRouterConfig({
        providers: { mini: { ...PROVIDER, vendor: "cohere" } },
        routes: { validation: ["mini"] },
      }),
    );

    expect(issues.map((i) => i.field)).toEqual(["providers.mini.vendor"]);
  });
});
