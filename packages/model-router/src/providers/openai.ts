/**
 * OpenAI provider: Chat Completions API.
 */

import { ProviderError } from "@switchyard/errors";
import { z } from "zod";
import type {
  HttpAdapterConfig,
  ProviderAdapter,
  ProviderDescriptor,
  StopReason,
} from "../types.js";
import { mapHttpResult, postJson } from "./http.js";
import { matchOpenAI } from "./normalize.js";

const OPENAI_BASE_URL = "https://api.openai.com/v1";

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullable(),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

function toStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "stop":
      return "stop";
    case "length":
      return "length";
    case "content_filter":
      return "content_filter";
    default:
      return "other";
  }
}

export function createOpenAIAdapter(config: HttpAdapterConfig): ProviderAdapter {
  const baseUrl = (config.baseUrl ?? OPENAI_BASE_URL).replace(/\/+$/, "");
  const descriptor: ProviderDescriptor = Object.freeze({
    providerId: config.providerId,
    vendor: "openai",
    model: config.model,
    maxOutputTokens: config.maxOutputTokens,
    costPerMillionInputTokens: config.costPerMillionInputTokens,
    costPerMillionOutputTokens: config.costPerMillionOutputTokens,
    timeoutMs: config.timeoutMs,
  });

  return {
    descriptor,

    async generate(prompt, options) {
      const messages: { role: "system" | "user"; content: string }[] = [];
      if (options.systemPrompt !== undefined) {
        messages.push({ role: "system", content: options.systemPrompt });
      }
      messages.push({ role: "user", content: prompt });

      const body: Record<string, unknown> = {
        model: config.model,
        max_tokens: options.maxTokens,
        messages,
      };
      if (options.temperature !== undefined) body.temperature = options.temperature;

      const result = await postJson({
        providerId: config.providerId,
        url: `${baseUrl}/chat/completions`,
        headers: { authorization: `Bearer ${config.apiKey}` },
        body,
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        schema: ChatCompletionSchema,
        matcher: matchOpenAI,
      });

      return mapHttpResult(result, (response) => {
        const choice = response.choices[0];
        if (choice === undefined) {
          return {
            ok: false,
            error: new ProviderError({
              providerId: config.providerId,
              kind: "unknown",
              message: "Response contained no choices",
            }),
          };
        }
        return {
          ok: true,
          value: {
            text: choice.message.content ?? "",
            usage: {
              inputTokens: response.usage?.prompt_tokens ?? 0,
              outputTokens: response.usage?.completion_tokens ?? 0,
            },
            stopReason: toStopReason(choice.finish_reason),
          },
        };
      });
    },
  };
}
