import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import { messageText, type Message } from "../types";

export interface TokenCounter {
  countTokens(text: string): number;
  countMessageTokens(messages: Message[]): number;
  /** Estimate for a whole request: per-message framing, system prompt and request wrapper included. */
  countTokensWithFormatting(messages: Message[], systemPrompt?: string): number;
}

// Role/content framing added by chat APIs around every message, and around the whole request.
export const MESSAGE_OVERHEAD_TOKENS = 4;
export const SYSTEM_PROMPT_OVERHEAD_TOKENS = 4;
export const REQUEST_WRAPPER_TOKENS = 3;

const encodings = new Map<TiktokenEncoding, Tiktoken>();

function loadEncoding(name: TiktokenEncoding): Tiktoken {
  let encoding = encodings.get(name);
  if (!encoding) {
    encoding = getEncoding(name);
    encodings.set(name, encoding);
  }
  return encoding;
}

/**
 * Picks the BPE table by model family. Claude and open-weight models have no
 * public tokenizer here, so cl100k_base serves as the approximation.
 */
export function encodingNameForModel(model: string): TiktokenEncoding {
  const name = model.toLowerCase();
  if (name.startsWith("gpt-5") || name.startsWith("gpt-4o") || name.startsWith("o1")) {
    return "o200k_base";
  }
  return "cl100k_base";
}

export class TiktokenTokenCounter implements TokenCounter {
  readonly encodingName: TiktokenEncoding;

  constructor(readonly modelName = "gpt-4") {
    this.encodingName = encodingNameForModel(modelName);
  }

  countTokens(text: string): number {
    if (text.length === 0) return 0;
    // Special-token strings in user text are counted as ordinary text
    return loadEncoding(this.encodingName).encode(text, [], []).length;
  }

  countMessageTokens(messages: Message[]): number {
    return messages.reduce((sum, message) => sum + this.countTokens(messageText(message.content)), 0);
  }

  countTokensWithFormatting(messages: Message[], systemPrompt?: string): number {
    const framing = messages.length * MESSAGE_OVERHEAD_TOKENS;
    const systemTokens =
      systemPrompt !== undefined ? this.countTokens(systemPrompt) + SYSTEM_PROMPT_OVERHEAD_TOKENS : 0;
    return systemTokens + this.countMessageTokens(messages) + framing + REQUEST_WRAPPER_TOKENS;
  }
}

/** One counter per model name, created on first use. */
export function createTokenCounterCache(): (model: string) => TokenCounter {
  const counters = new Map<string, TokenCounter>();
  return (model) => {
    let counter = counters.get(model);
    if (!counter) {
      counter = new TiktokenTokenCounter(model);
      counters.set(model, counter);
    }
    return counter;
  };
}
