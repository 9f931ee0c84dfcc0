/**
 * Terminal outcomes of a routing walk.
 *
 *   - AllProvidersFailedError (ROUTER_ALL_PROVIDERS_FAILED)
 *   - DeadlineExceededError   (ROUTER_DEADLINE_EXCEEDED)
 *   - RequestCancelledError   (ROUTER_REQUEST_CANCELLED)
 */

import { SwitchyardError } from "../base.js";
import type { ProviderFailureDetail } from "../types.js";

function describeFailures(failures: ReadonlyMap<string, ProviderFailureDetail>): string {
  const parts: string[] = [];
  for (const [providerId, detail] of failures) {
    parts.push(`${providerId}: ${detail.reason === "provider_error" ? detail.kind : detail.reason}`);
  }
  return parts.join(", ");
}

export class AllProvidersFailedError extends SwitchyardError {
  declare readonly code: "ROUTER_ALL_PROVIDERS_FAILED";
  readonly taskClass: string;
  readonly attemptsMade: number;
  /** Last observed outcome per candidate provider, in route order */
  readonly failures: ReadonlyMap<string, ProviderFailureDetail>;

  constructor(
    taskClass: string,
    attemptsMade: number,
    failures: ReadonlyMap<string, ProviderFailureDetail>,
    lastError?: Error,
  ) {
    super(
      "ROUTER_ALL_PROVIDERS_FAILED",
      `All providers failed for task class "${taskClass}" [${describeFailures(failures)}]`,
      lastError ? { cause: lastError } : undefined,
    );
    this.taskClass = taskClass;
    this.attemptsMade = attemptsMade;
    this.failures = failures;
  }
}

export class DeadlineExceededError extends SwitchyardError {
  declare readonly code: "ROUTER_DEADLINE_EXCEEDED";
  readonly taskClass: string;
  /** Absolute deadline, epoch milliseconds */
  readonly deadline: number;
  readonly attemptsMade: number;
  readonly failures: ReadonlyMap<string, ProviderFailureDetail>;

  constructor(
    taskClass: string,
    deadline: number,
    attemptsMade: number,
    failures: ReadonlyMap<string, ProviderFailureDetail>,
  ) {
    super(
      "ROUTER_DEADLINE_EXCEEDED",
      `Deadline ${new Date(deadline).toISOString()} exceeded for task class "${taskClass}" after ${attemptsMade} attempt(s)`,
    );
    this.taskClass = taskClass;
    this.deadline = deadline;
    this.attemptsMade = attemptsMade;
    this.failures = failures;
  }
}

export class RequestCancelledError extends SwitchyardError {
  declare readonly code: "ROUTER_REQUEST_CANCELLED";
  readonly taskClass: string;
  readonly attemptsMade: number;

  constructor(taskClass: string, attemptsMade: number, reason?: unknown) {
    super(
      "ROUTER_REQUEST_CANCELLED",
      `Request for task class "${taskClass}" cancelled after ${attemptsMade} attempt(s)`,
      reason !== undefined ? { cause: reason } : undefined,
    );
    this.taskClass = taskClass;
    this.attemptsMade = attemptsMade;
  }
}
