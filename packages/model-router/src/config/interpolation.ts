/**
 * `${VAR}` and `${VAR:default}` expansion over a parsed routing document.
 *
 * Only string values are expanded; mapping keys stay as written, so an env
 * value can never add providers or routes. A value that is exactly one
 * reference and resolves to a decimal number becomes a number, so
 * `timeoutMs: ${PROVIDER_TIMEOUT_MS}` validates like a literal.
 */

import type { ValidationIssue } from "@switchyard/errors";

export type EnvMap = Readonly<Record<string, string | undefined>>;

const ENV_REF = /\$\{([^}:]+?)(?::([^}]*))?\}/g;
const WHOLE_ENV_REF = /^\$\{[^}]+\}$/;
const DECIMAL = /^-?\d+(\.\d+)?$/;

export interface InterpolationResult {
  readonly value: unknown;
  /** One issue per unresolved reference, keyed by the value's dotted path */
  readonly issues: readonly ValidationIssue[];
}

export function interpolateDocument(document: unknown, env: EnvMap): InterpolationResult {
  const issues: ValidationIssue[] = [];

  const visit = (node: unknown, path: readonly (string | number)[]): unknown => {
    if (typeof node === "string") {
      return expandValue(node, env, (name) => {
        issues.push({
          field: path.join("."),
          message: `environment variable ${name} is not set`,
          code: "missing_env",
        });
      });
    }
    if (Array.isArray(node)) {
      const items: readonly unknown[] = node;
      return items.map((item, index) => visit(item, [...path, index]));
    }
    if (typeof node === "object" && node !== null) {
      const expanded: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(node)) {
        expanded[key] = visit(child, [...path, key]);
      }
      return expanded;
    }
    return node;
  };

  return { value: visit(document, []), issues };
}

function expandValue(value: string, env: EnvMap, onMissing: (name: string) => void): string | number {
  const expanded = value.replace(ENV_REF, (_match, name: string, fallback?: string) => {
    const resolved = env[name] ?? fallback;
    if (resolved === undefined) {
      onMissing(name);
      return "";
    }
    return resolved;
  });
  return WHOLE_ENV_REF.test(value) && DECIMAL.test(expanded) ? Number(expanded) : expanded;
}
