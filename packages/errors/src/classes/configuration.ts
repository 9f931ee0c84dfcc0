/**
 * Configuration errors: fatal to startup or to a single call, never retried.
 *
 * Abstract base: ConfigurationError
 * Concrete:
 *   - RouterConfigurationError (ROUTER_INVALID_CONFIG)
 *   - UnknownTaskClassError    (ROUTER_UNKNOWN_TASK_CLASS)
 *   - NoEligibleProviderError  (ROUTER_NO_ELIGIBLE_PROVIDER)
 */

import { SwitchyardError } from "../base.js";
import type { SwitchyardErrorOptions, ValidationIssue } from "../types.js";

export abstract class ConfigurationError extends SwitchyardError {}

export class RouterConfigurationError extends ConfigurationError {
  declare readonly code: "ROUTER_INVALID_CONFIG";
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], options?: SwitchyardErrorOptions) {
    const summary = issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message));
    super("ROUTER_INVALID_CONFIG", `Invalid router configuration: ${summary.join("; ")}`, options);
    this.issues = issues;
  }
}

export class UnknownTaskClassError extends ConfigurationError {
  declare readonly code: "ROUTER_UNKNOWN_TASK_CLASS";
  readonly taskClass: string;
  readonly knownTaskClasses: readonly string[];

  constructor(taskClass: string, knownTaskClasses: readonly string[]) {
    super(
      "ROUTER_UNKNOWN_TASK_CLASS",
      `Unknown task class "${taskClass}" (configured: ${knownTaskClasses.join(", ") || "none"})`,
    );
    this.taskClass = taskClass;
    this.knownTaskClasses = knownTaskClasses;
  }
}

export class NoEligibleProviderError extends ConfigurationError {
  declare readonly code: "ROUTER_NO_ELIGIBLE_PROVIDER";
  readonly taskClass: string;
  readonly maxTokens: number;
  readonly largestCeiling: number;

  constructor(taskClass: string, maxTokens: number, largestCeiling: number) {
    super(
      "ROUTER_NO_ELIGIBLE_PROVIDER",
      `No provider for task class "${taskClass}" can emit ${maxTokens} tokens (largest ceiling: ${largestCeiling})`,
    );
    this.taskClass = taskClass;
    this.maxTokens = maxTokens;
    this.largestCeiling = largestCeiling;
  }
}
