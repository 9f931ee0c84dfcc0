/**
 * `switchyard` command line: validate a routing document and show the
 * breaker table it would start with.
 */

import { getErrorMessage, isConfigurationError, RouterConfigurationError } from "@switchyard/errors";
import pc from "picocolors";
import { loadRouterConfig } from "./config/parser.js";
import type { RouterConfig } from "./config/schema.js";
import { createRouterFromConfig } from "./factory.js";

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

type Command = "check" | "status";

interface CliArgs {
  readonly command: Command | "help";
  readonly configPath?: string;
}

export interface CliIO {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Force colors on or off. Defaults to terminal detection. */
  readonly color?: boolean;
}

const HELP = `
switchyard: routing document tools

Usage: switchyard <command> <config.yaml>

Commands:
  check <config.yaml>    Validate the document and print each task class's fallback chain
  status <config.yaml>   Print the initial circuit breaker table as JSON
  --help                 Show this help message
`;

function parseArgs(argv: readonly string[]): CliArgs | string {
  const [command, configPath, ...rest] = argv;

  if (command === undefined || command === "--help" || command === "-h") {
    return { command: "help" };
  }
  if (command !== "check" && command !== "status") {
    return `unknown command "${command}"`;
  }
  if (configPath === undefined) {
    return `${command}: missing <config.yaml>`;
  }
  if (rest.length > 0) {
    return `${command}: unexpected argument "${rest[0]}"`;
  }
  return { command, configPath };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function formatPrice(value: number): string {
  return `$${value}`;
}

function describeRoutes(config: RouterConfig, colors: ReturnType<typeof pc.createColors>): string[] {
  const lines: string[] = [];
  for (const [taskClass, providerIds] of Object.entries(config.routes)) {
    lines.push(colors.bold(taskClass));
    providerIds.forEach((providerId, index) => {
      const provider = config.providers[providerId];
      if (provider === undefined) return;
      lines.push(
        `  ${index + 1}. ${providerId} ${colors.dim(`(${provider.vendor}/${provider.model})`)} ` +
          `max ${provider.maxOutputTokens} tokens, ` +
          `${formatPrice(provider.costPerMillionInputTokens)}/${formatPrice(provider.costPerMillionOutputTokens)} per 1M in/out, ` +
          `timeout ${provider.timeoutMs}ms`,
      );
    });
  }
  return lines;
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const colors = pc.createColors(io.color ?? pc.isColorSupported);
  const args = parseArgs(argv);

  if (typeof args === "string") {
    io.err(`${colors.red("error")} ${args}`);
    io.err(HELP);
    return 2;
  }
  if (args.command === "help" || args.configPath === undefined) {
    io.out(HELP);
    return 0;
  }

  try {
    const config = await loadRouterConfig(args.configPath, io.env ? { env: io.env } : undefined);
    const router = createRouterFromConfig(config);

    if (args.command === "status") {
      io.out(JSON.stringify(router.status(), null, 2));
      return 0;
    }

    io.out(`${colors.green("✓")} ${args.configPath} is valid`);
    for (const line of describeRoutes(config, colors)) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    if (error instanceof RouterConfigurationError) {
      io.err(`${colors.red("✗")} invalid routing document`);
      for (const issue of error.issues) {
        io.err(`  - ${issue.field ? `${issue.field}: ` : ""}${issue.message}`);
      }
      return 1;
    }
    if (isConfigurationError(error)) {
      io.err(`${colors.red("✗")} ${error.message}`);
      return 1;
    }
    io.err(`${colors.red("error")} ${getErrorMessage(error)}`);
    return 1;
  }
}
