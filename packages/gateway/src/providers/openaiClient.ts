import OpenAI, { APIError } from "openai";
import { z } from "zod";
import { AIError, NetworkError, ParseError, err, ok, type Result } from "../errors";
import type { HttpClient, HuggingFaceConfig, OpenAIConfig } from "../types";
import { isRecord } from "./shared";

/**
 * Client for any OpenAI-compatible endpoint. Requests go through the shared
 * HttpClient; retries are left to the caller.
 */
export function createOpenAIClient(config: OpenAIConfig | HuggingFaceConfig, http: HttpClient): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    organization: config.type === "openai" ? (config.organization ?? null) : null,
    project: config.type === "openai" ? (config.projectId ?? null) : null,
    timeout: config.timeout.requestTimeoutMs,
    maxRetries: 0,
    fetch: http,
  });
}

// Chat completion reply, validated on arrival. Compatible servers omit several fields.

export const chatCompletionToolCallSchema = z.object({
  id: z.string(),
  type: z.string(),
  function: z.object({ name: z.string(), arguments: z.string() }).optional(),
});

export const chatCompletionChoiceSchema = z.object({
  index: z.number().optional(),
  message: z.object({
    role: z.string().optional(),
    content: z.string().nullish(),
    tool_calls: z.array(chatCompletionToolCallSchema).nullish(),
  }),
  finish_reason: z.string().nullish(),
});

export const chatCompletionSchema = z.object({
  id: z.string().nullish(),
  created: z.number().optional(),
  model: z.string(),
  system_fingerprint: z.string().nullish(),
  choices: z.array(chatCompletionChoiceSchema),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .nullish(),
});

export type ChatCompletionReply = z.infer<typeof chatCompletionSchema>;

/** The SDK returns non-JSON bodies as text, so anything can arrive here. */
export function parseChatCompletion(vendor: string, raw: unknown): Result<ChatCompletionReply> {
  const parsed = chatCompletionSchema.safeParse(raw);
  if (!parsed.success) {
    return err(new ParseError(`Unexpected ${vendor} API response: ${parsed.error.message}`));
  }
  return ok(parsed.data);
}

function vendorMessage(body: unknown): string | undefined {
  if (typeof body === "string") return body;
  if (!isRecord(body)) return undefined;
  if (typeof body.message === "string") return body.message;
  // Some compatible servers nest the error one level deeper
  if (isRecord(body.error) && typeof body.error.message === "string") return body.error.message;
  return undefined;
}

/** Maps whatever the SDK threw to a gateway error labelled with the vendor name. */
export function toChatCompletionError(vendor: string, error: unknown): AIError {
  if (error instanceof AIError) return error;

  if (error instanceof APIError) {
    const status = error.status;
    const message = vendorMessage(error.error);
    if (status === undefined) {
      return new NetworkError(`${vendor} API error: ${error.message}`, { cause: error });
    }
    return new NetworkError(
      message !== undefined ? `${vendor} API Error: ${message}` : `${vendor} API Error (${status}): ${error.message}`,
      { cause: error, status },
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`${vendor} API error: ${message}`, { cause: error });
}
