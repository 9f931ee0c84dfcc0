import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runCli } from "../cli.js";
import { ENV_ROUTES_YAML, FULL_ROUTES_YAML, UNKNOWN_PROVIDER_YAML } from "./helpers/fixtures.js";

describe("runCli", () => {
  let tmpDir: string;
  let out: string[];
  let err: string[];

  const run = (argv: readonly string[], env: Record<string, string | undefined> = {}) =>
    runCli(argv, {
      out: (text) => out.push(text),
      err: (text) => err.push(text),
      env,
      color: false,
    });

  async function writeDocument(name: string, content: string): Promise<string> {
    const filePath = join(tmpDir, name);
    await writeFile(filePath, content, "utf-8");
    return filePath;
  }

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "switchyard-cli-"));
    out = [];
    err = [];
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("prints help without arguments", async () => {
    expect(await run([])).toBe(0);
    expect(out.join("\n")).toContain("Usage: switchyard <command> <config.yaml>");
  });

  it("rejects an unknown command with exit code 2", async () => {
    expect(await run(["deploy", "routes.yaml"])).toBe(2);
    expect(err[0]).toBe('error unknown command "deploy"');
  });

  it("requires a document path", async () => {
    expect(await run(["check"])).toBe(2);
    expect(err[0]).toBe("error check: missing <config.yaml>");
  });

  it("rejects extra arguments", async () => {
    expect(await run(["check", "a.yaml", "b.yaml"])).toBe(2);
    expect(err[0]).toBe('error check: unexpected argument "b.yaml"');
  });

  it("check prints every fallback chain", async () => {
    const filePath = await writeDocument("routes.yaml", FULL_ROUTES_YAML);

    expect(await run(["check", filePath])).toBe(0);
    expect(out).toEqual([
      `✓ ${filePath} is valid`,
      "strategic",
      "  1. claude-sonnet (anthropic/claude-sonnet-4) max 16384 tokens, $3/$15 per 1M in/out, timeout 60000ms",
      "  2. gpt-mini (openai/gpt-4o-mini) max 16384 tokens, $0.15/$0.6 per 1M in/out, timeout 30000ms",
      "template",
      "  1. claude-haiku (anthropic/claude-haiku-4) max 8192 tokens, $1/$5 per 1M in/out, timeout 30000ms",
      "  2. gpt-mini (openai/gpt-4o-mini) max 16384 tokens, $0.15/$0.6 per 1M in/out, timeout 30000ms",
      "  3. claude-sonnet (anthropic/claude-sonnet-4) max 16384 tokens, $3/$15 per 1M in/out, timeout 60000ms",
      "validation",
      "  1. gpt-mini (openai/gpt-4o-mini) max 16384 tokens, $0.15/$0.6 per 1M in/out, timeout 30000ms",
      "  2. claude-haiku (anthropic/claude-haiku-4) max 8192 tokens, $1/$5 per 1M in/out, timeout 30000ms",
    ]);
    expect(err).toEqual([]);
  });

  it("status prints the initial breaker table as JSON", async () => {
    const filePath = await writeDocument("routes.yaml", FULL_ROUTES_YAML);

    expect(await run(["status", filePath])).toBe(0);
    const table: unknown = JSON.parse(out.join("\n"));
    expect(table).toEqual([
      expect.objectContaining({ providerId: "claude-sonnet", state: "closed", failureCount: 0 }),
      expect.objectContaining({ providerId: "gpt-mini", state: "closed", failureCount: 0 }),
      expect.objectContaining({ providerId: "claude-haiku", state: "closed", failureCount: 0 }),
    ]);
  });

  it("lists each problem in an invalid document", async () => {
    const filePath = await writeDocument("bad.yaml", UNKNOWN_PROVIDER_YAML);

    expect(await run(["check", filePath])).toBe(1);
    expect(err).toEqual([
      "✗ invalid routing document",
      '  - routes.template.1: unknown provider "gpt-mini"',
    ]);
    expect(out).toEqual([]);
  });

  it("reports an unset key variable", async () => {
    const filePath = await writeDocument("env.yaml", ENV_ROUTES_YAML);

    expect(await run(["check", filePath])).toBe(1);
    expect(err[1]).toBe("  - providers.claude-haiku.apiKey: environment variable ANTHROPIC_API_KEY is not set");
  });

  it("reads keys from the given environment", async () => {
    const filePath = await writeDocument("env.yaml", ENV_ROUTES_YAML);

    expect(await run(["check", filePath], { ANTHROPIC_API_KEY: "test-secret" })).toBe(0);
  });

  it("reports a missing file", async () => {
    const missing = join(tmpDir, "missing.yaml");

    expect(await run(["check", missing])).toBe(1);
    expect(err).toEqual(["✗ invalid routing document", `  - ${resolve(missing)}: file not found`]);
  });
});
