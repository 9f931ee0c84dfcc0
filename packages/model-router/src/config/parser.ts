/**
 * Routing document parsing: YAML, then env expansion, then Zod validation.
 * The returned config is frozen.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { RouterConfigurationError, type ValidationIssue } from "@switchyard/errors";
import type { ZodError } from "zod";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { type EnvMap, interpolateDocument } from "./interpolation.js";
import { type RouterConfig, RouterConfigSchema } from "./schema.js";

export interface ParseRouterConfigOptions {
  /** Defaults to `process.env` */
  readonly env?: EnvMap;
  readonly skipInterpolation?: boolean;
}

/**
 * Parses a YAML string into a validated, frozen RouterConfig.
 *
 * @throws RouterConfigurationError listing every problem found
 */
export function parseRouterConfig(
  yamlString: string,
  options?: ParseRouterConfigOptions,
): RouterConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlString);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new RouterConfigurationError(
        [
          {
            field: pos !== undefined ? `line ${pos.line}, column ${pos.col}` : "",
            message: error.message,
            code: error.code,
          },
        ],
        { cause: error },
      );
    }
    throw error;
  }

  if (options?.skipInterpolation === true) {
    return validateRouterConfig(parsed);
  }

  const { value, issues } = interpolateDocument(parsed, options?.env ?? process.env);
  if (issues.length > 0) {
    throw new RouterConfigurationError(issues);
  }
  return validateRouterConfig(value);
}

/**
 * Reads and parses a routing document from disk.
 *
 * @throws RouterConfigurationError when the file is missing or not a file
 */
export async function loadRouterConfig(
  filePath: string,
  options?: ParseRouterConfigOptions,
): Promise<RouterConfig> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (error: unknown) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "ENOENT") {
      throw new RouterConfigurationError(
        [{ field: absolutePath, message: "file not found", code: "not_found" }],
        { cause: error },
      );
    }
    if (code === "EISDIR") {
      throw new RouterConfigurationError(
        [{ field: absolutePath, message: "path is a directory", code: "not_a_file" }],
        { cause: error },
      );
    }
    throw error;
  }

  return parseRouterConfig(content, options);
}

/**
 * Validate an already-parsed routing document (e.g. built in code).
 */
export function validateRouterConfig(input: unknown): RouterConfig {
  const result = RouterConfigSchema.safeParse(input);
  if (!result.success) {
    throw new RouterConfigurationError(toValidationIssues(result.error), { cause: result.error });
  }
  return freezeRouterConfig(result.data);
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function freezeRouterConfig(config: RouterConfig): RouterConfig {
  for (const provider of Object.values(config.providers)) {
    if (provider.circuitBreaker !== undefined) Object.freeze(provider.circuitBreaker);
    Object.freeze(provider);
  }
  for (const chain of Object.values(config.routes)) {
    Object.freeze(chain);
  }
  if (config.circuitBreaker !== undefined) Object.freeze(config.circuitBreaker);
  Object.freeze(config.providers);
  Object.freeze(config.routes);
  return Object.freeze(config);
}
