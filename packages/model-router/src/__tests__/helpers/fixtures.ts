/**
 * YAML routing documents for config, factory and CLI tests.
 */

export const MINIMAL_ROUTES_YAML = `
providers:
  gpt-mini:
    vendor: openai
    model: gpt-4o-mini
    apiKey: test-secret
    maxOutputTokens: 16384
    costPerMillionInputTokens: 0.15
    costPerMillionOutputTokens: 0.6
    timeoutMs: 30000

routes:
  template: [gpt-mini]
`;

export const FULL_ROUTES_YAML = `
circuitBreaker:
  failureThreshold: 3
  openTimeoutMs: 15000

providers:
  claude-haiku:
    vendor: anthropic
    model: claude-haiku-4
    apiKey: \${ANTHROPIC_API_KEY:test-secret}
    maxOutputTokens: 8192
    costPerMillionInputTokens: 1
    costPerMillionOutputTokens: 5
    timeoutMs: 30000
  claude-sonnet:
    vendor: anthropic
    model: claude-sonnet-4
    apiKey: \${ANTHROPIC_API_KEY:test-secret}
    maxOutputTokens: 16384
    costPerMillionInputTokens: 3
    costPerMillionOutputTokens: 15
    timeoutMs: 60000
    circuitBreaker:
      failureThreshold: 5
  gpt-mini:
    vendor: openai
    model: gpt-4o-mini
    apiKey: \${OPENAI_API_KEY:test-secret}
    baseUrl: https://gateway.example.com/v1
    maxOutputTokens: 16384
    costPerMillionInputTokens: 0.15
    costPerMillionOutputTokens: 0.6
    timeoutMs: 30000

routes:
  strategic: [claude-sonnet, gpt-mini]
  template: [claude-haiku, gpt-mini, claude-sonnet]
  validation: [gpt-mini, claude-haiku]

maxAttempts: 3
defaultDeadlineMs: 90000
costAlertThresholdUsd: 0.25
`;

export const ENV_ROUTES_YAML = `
providers:
  claude-haiku:
    vendor: anthropic
    model: claude-haiku-4
    apiKey: \${ANTHROPIC_API_KEY}
    maxOutputTokens: 8192
    costPerMillionInputTokens: 1
    costPerMillionOutputTokens: 5
    timeoutMs: 30000

routes:
  template: [claude-haiku]
`;

export const UNKNOWN_PROVIDER_YAML = `
providers:
  claude-haiku:
    vendor: anthropic
    model: claude-haiku-4
    apiKey: test-secret
    maxOutputTokens: 8192
    costPerMillionInputTokens: 1
    costPerMillionOutputTokens: 5
    timeoutMs: 30000

routes:
  template: [claude-haiku, gpt-mini]
`;

export const MALFORMED_YAML = `
providers:
  claude-haiku: [unclosed
`;
