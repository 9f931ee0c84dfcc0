/**
 * Anthropic provider: Messages API.
 */

import { z } from "zod";
import type {
  HttpAdapterConfig,
  ProviderAdapter,
  ProviderDescriptor,
  StopReason,
} from "../types.js";
import { mapHttpResult, postJson } from "./http.js";
import { matchAnthropic } from "./normalize.js";

const ANTHROPIC_BASE_URL = "https://api.anthropic.com";
const ANTHROPIC_VERSION = "2023-06-01";

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

function toStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
      return "stop";
    case "max_tokens":
      return "length";
    case "refusal":
      return "content_filter";
    default:
      return "other";
  }
}

export function createAnthropicAdapter(config: HttpAdapterConfig): ProviderAdapter {
  const baseUrl = (config.baseUrl ?? ANTHROPIC_BASE_URL).replace(/\/+$/, "");
  const descriptor: ProviderDescriptor = Object.freeze({
    providerId: config.providerId,
    vendor: "anthropic",
    model: config.model,
    maxOutputTokens: config.maxOutputTokens,
    costPerMillionInputTokens: config.costPerMillionInputTokens,
    costPerMillionOutputTokens: config.costPerMillionOutputTokens,
    timeoutMs: config.timeoutMs,
  });

  return {
    descriptor,

    async generate(prompt, options) {
      const body: Record<string, unknown> = {
        model: config.model,
        max_tokens: options.maxTokens,
        messages: [{ role: "user", content: prompt }],
      };
      if (options.systemPrompt !== undefined) body.system = options.systemPrompt;
      if (options.temperature !== undefined) body.temperature = options.temperature;

      const result = await postJson({
        providerId: config.providerId,
        url: `${baseUrl}/v1/messages`,
        headers: {
          "x-api-key": config.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        schema: MessagesResponseSchema,
        matcher: matchAnthropic,
      });

      return mapHttpResult(result, (response) => ({
        ok: true,
        value: {
          text: response.content
            .filter((block) => block.type === "text")
            .map((block) => block.text ?? "")
            .join(""),
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
          },
          stopReason: toStopReason(response.stop_reason),
        },
      }));
    },
  };
}
