/**
 * ScriptedAdapter for testing @switchyard/model-router consumers.
 *
 * Replays pre-configured outcomes in order, repeating the last one once the
 * script runs out. Honors the call's timeout and abort signal the way a real
 * adapter must, and tracks calls and peak concurrency for assertions.
 */

import { ProviderError, type ProviderErrorKind } from "@switchyard/errors";
import type {
  AdapterCallOptions,
  ProviderAdapter,
  ProviderDescriptor,
  ProviderResult,
  StopReason,
  TokenUsage,
} from "@switchyard/model-router";

export type ScriptedOutcome =
  | {
      readonly text: string;
      readonly usage?: TokenUsage;
      readonly stopReason?: StopReason;
      readonly delayMs?: number;
    }
  | {
      readonly error: ProviderErrorKind;
      readonly message?: string;
      readonly status?: number;
      readonly retryAfterMs?: number;
      readonly delayMs?: number;
    }
  /** Never answers; settles only through the timeout or the abort signal */
  | { readonly hang: true };

export interface ScriptedCall {
  readonly prompt: string;
  readonly options: AdapterCallOptions;
}

export type ScriptedDescriptor = Partial<ProviderDescriptor> & { readonly providerId: string };

type WaitOutcome = "done" | "timeout" | "aborted";

const DEFAULT_USAGE: TokenUsage = { inputTokens: 10, outputTokens: 20 };

export class ScriptedAdapter implements ProviderAdapter {
  readonly descriptor: ProviderDescriptor;
  readonly calls: ScriptedCall[] = [];
  private readonly script: readonly ScriptedOutcome[];
  private callIndex = 0;
  private inFlightCount = 0;
  private peak = 0;

  constructor(descriptor: ScriptedDescriptor, script: readonly ScriptedOutcome[] = [{ text: "ok" }]) {
    this.descriptor = {
      vendor: "scripted",
      model: `${descriptor.providerId}-model`,
      maxOutputTokens: 4096,
      costPerMillionInputTokens: 1,
      costPerMillionOutputTokens: 2,
      timeoutMs: 30_000,
      ...descriptor,
    };
    this.script = script;
  }

  async generate(prompt: string, options: AdapterCallOptions): Promise<ProviderResult> {
    this.calls.push({ prompt, options });
    const outcome = this.next();

    this.inFlightCount++;
    this.peak = Math.max(this.peak, this.inFlightCount);
    try {
      if ("hang" in outcome) {
        const waited = await wait(Number.POSITIVE_INFINITY, options.timeoutMs, options.signal);
        return waited === "aborted" ? this.aborted() : this.timedOut(options.timeoutMs);
      }

      const waited = await wait(outcome.delayMs ?? 0, options.timeoutMs, options.signal);
      if (waited === "timeout") return this.timedOut(options.timeoutMs);
      if (waited === "aborted") return this.aborted();

      if ("error" in outcome) {
        return this.fail(outcome.error, outcome.message ?? `scripted ${outcome.error}`, {
          status: outcome.status,
          retryAfterMs: outcome.retryAfterMs,
        });
      }
      return {
        ok: true,
        value: {
          text: outcome.text,
          usage: outcome.usage ?? DEFAULT_USAGE,
          stopReason: outcome.stopReason ?? "stop",
        },
      };
    } finally {
      this.inFlightCount--;
    }
  }

  get callCount(): number {
    return this.calls.length;
  }

  get lastCall(): ScriptedCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  /** Calls currently awaiting their outcome */
  get inFlight(): number {
    return this.inFlightCount;
  }

  /** Highest number of calls that were in flight at the same time */
  get peakConcurrency(): number {
    return this.peak;
  }

  reset(): void {
    this.calls.length = 0;
    this.callIndex = 0;
    this.peak = this.inFlightCount;
  }

  private next(): ScriptedOutcome {
    const index = Math.min(this.callIndex, this.script.length - 1);
    this.callIndex++;
    return this.script[index] ?? { text: "ok" };
  }

  private timedOut(timeoutMs: number): ProviderResult {
    return this.fail("timeout", `Request timed out after ${timeoutMs}ms`);
  }

  private aborted(): ProviderResult {
    return this.fail("unknown", "Request aborted by caller");
  }

  private fail(
    kind: ProviderErrorKind,
    message: string,
    http: { readonly status?: number | undefined; readonly retryAfterMs?: number | undefined } = {},
  ): ProviderResult {
    return {
      ok: false,
      error: new ProviderError({
        providerId: this.descriptor.providerId,
        kind,
        message,
        ...(http.status !== undefined ? { status: http.status } : {}),
        ...(http.retryAfterMs !== undefined ? { retryAfterMs: http.retryAfterMs } : {}),
      }),
    };
  }
}

function wait(delayMs: number, timeoutMs: number, signal?: AbortSignal): Promise<WaitOutcome> {
  if (signal?.aborted) return Promise.resolve("aborted");
  if (delayMs <= 0) return Promise.resolve("done");
  if (timeoutMs <= 0) return Promise.resolve("timeout");

  return new Promise((resolve) => {
    const timers: ReturnType<typeof setTimeout>[] = [];
    const finish = (outcome: WaitOutcome) => {
      for (const timer of timers) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(outcome);
    };
    const onAbort = () => finish("aborted");

    if (delayMs <= timeoutMs) {
      timers.push(setTimeout(() => finish("done"), delayMs));
    } else {
      timers.push(setTimeout(() => finish("timeout"), timeoutMs));
    }
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
