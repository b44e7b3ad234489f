import { validationResultOf, type ValidationResult } from "../errors";
import { enhanceMessage } from "../formatting/responseFormatter";
import type { FinishReason, Message, MessageContent, ProviderConfig, ResponseFormat } from "../types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks shared by every provider: a key must be present, the endpoint must be
 * HTTPS, and some vendors issue keys with a fixed prefix.
 */
export function validateProviderConfig(config: ProviderConfig, keyPrefix?: string): ValidationResult {
  const errors: string[] = [];

  if (config.apiKey.trim().length === 0) {
    errors.push("API key is required");
  } else if (keyPrefix && !config.apiKey.startsWith(keyPrefix)) {
    errors.push(`Invalid API key format (should start with '${keyPrefix}')`);
  }
  if (!config.baseUrl.startsWith("https://")) {
    errors.push("Base URL must use HTTPS");
  }

  return validationResultOf(errors);
}

/** Finish reasons of the OpenAI-compatible chat completions API. */
export function finishReasonFromChatCompletion(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case "stop":
      return "stop";
    case "length":
      return "max_tokens";
    case "content_filter":
      return "content_filter";
    case "tool_calls":
    case "function_call":
      return "tool_use";
    default:
      return "stop";
  }
}

/**
 * Index of the message that receives format instructions: the last one, and
 * only when it is a user turn after role mapping.
 */
export function formatTargetIndex(roles: string[], format: ResponseFormat): number | undefined {
  if (format === "plain_text" || roles.length === 0) return undefined;
  const lastIndex = roles.length - 1;
  return roles[lastIndex] === "user" ? lastIndex : undefined;
}

function enhanceContent(content: MessageContent, format: ResponseFormat): MessageContent {
  switch (content.type) {
    case "text":
      return { type: "text", text: enhanceMessage(content.text, format) };
    case "multimodal":
      return { ...content, text: enhanceMessage(content.text ?? "", format) };
    case "structured": {
      const blocks = [...content.blocks];
      const lastTextIndex = blocks.map((block) => block.type).lastIndexOf("text");
      const lastText = blocks[lastTextIndex];
      if (lastText && lastText.type === "text") {
        blocks[lastTextIndex] = { type: "text", text: enhanceMessage(lastText.text, format) };
      } else {
        blocks.push({ type: "text", text: enhanceMessage("", format) });
      }
      return { type: "structured", blocks };
    }
  }
}

/** Copy of `messages` with format instructions added to the final user turn. */
export function withFormatInstructions(messages: Message[], format: ResponseFormat): Message[] {
  const target = formatTargetIndex(
    messages.map((message) => message.role),
    format,
  );
  const targetMessage = target !== undefined ? messages[target] : undefined;
  if (target === undefined || !targetMessage) return messages;

  const copy = [...messages];
  copy[target] = { ...targetMessage, content: enhanceContent(targetMessage.content, format) };
  return copy;
}

/** The request timeout, cut short when the caller aborts. */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
}

/** Body text for an error status, or a note that it could not be read. */
export async function readBodyText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}

export function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
