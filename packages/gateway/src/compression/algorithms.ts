import { textMessage, type Message } from "../types";
import type {
  CompressionAlgorithm,
  CompressionConfig,
  CompressionResult,
  CompressionStrategy,
  Summarizer,
} from "./types";

function unchanged(messages: Message[]): CompressionResult {
  return {
    newMessages: messages,
    archivedMessages: [],
    summaryGenerated: false,
    originalMessageCount: messages.length,
    newMessageCount: messages.length,
    compressionRatio: 0,
  };
}

/** Tokens recorded on a message: the provider's count when known, else the local estimate. */
export function messageTokens(message: Message): number {
  const metadata = message.metadata;
  if (!metadata) return 0;
  return metadata.totalTokens > 0 ? metadata.totalTokens : metadata.estimatedTotalTokens;
}

export function contextSummaryText(summary: string, summarizedCount: number, keptCount: number): string {
  return [
    "=== PREVIOUS CONVERSATION CONTEXT ===",
    "",
    `Below is a short summary of the previous ${summarizedCount} messages of this conversation.`,
    "Use it to understand the current discussion.",
    "",
    summary,
    "",
    "=== END OF CONTEXT ===",
    "",
    `The last ${keptCount} messages of the conversation follow in full.`,
  ].join("\n");
}

/** Replaces the whole history with one summary message. */
export class FullReplacementCompression implements CompressionAlgorithm {
  readonly strategy = "full_replacement" as const;
  readonly embedsSummary = false;

  shouldCompress(messages: Message[], config: CompressionConfig): boolean {
    return messages.length >= config.fullReplacementMessageThreshold;
  }

  async compress(messages: Message[], _config: CompressionConfig, summarize: Summarizer): Promise<CompressionResult> {
    if (messages.length === 0) return unchanged(messages);

    const summary = await summarize(messages);
    return {
      newMessages: [],
      archivedMessages: messages,
      summaryGenerated: true,
      originalMessageCount: messages.length,
      newMessageCount: 1,
      compressionRatio: 1 - 1 / messages.length,
      summary,
    };
  }
}

/** Summarizes everything except the last N messages. */
export class SlidingWindowCompression implements CompressionAlgorithm {
  readonly strategy = "sliding_window" as const;
  readonly embedsSummary = true;

  shouldCompress(messages: Message[], config: CompressionConfig): boolean {
    return messages.length >= config.slidingWindowMessageThreshold;
  }

  async compress(messages: Message[], config: CompressionConfig, summarize: Summarizer): Promise<CompressionResult> {
    const keepLast = config.slidingWindowKeepLast;
    if (messages.length === 0 || messages.length <= keepLast) return unchanged(messages);

    const toCompress = messages.slice(0, messages.length - keepLast);
    const toKeep = messages.slice(messages.length - keepLast);

    const summary = await summarize(toCompress);
    const context = textMessage("system", contextSummaryText(summary, toCompress.length, toKeep.length));
    const newMessages = [context, ...toKeep];

    return {
      newMessages,
      archivedMessages: toCompress,
      summaryGenerated: true,
      originalMessageCount: messages.length,
      newMessageCount: newMessages.length,
      compressionRatio: 1 - newMessages.length / messages.length,
      summary,
    };
  }
}

/**
 * Splits the history so the kept tail holds at most `tokensToKeep` tokens.
 * At least one message always stays in the tail.
 */
export function splitByTokens(messages: Message[], tokensToKeep: number): [Message[], Message[]] {
  let accumulated = 0;
  let splitIndex = messages.length;

  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    const tokens = message ? messageTokens(message) : 0;
    if (accumulated + tokens > tokensToKeep) {
      splitIndex = i + 1;
      break;
    }
    accumulated += tokens;
  }

  if (splitIndex >= messages.length) {
    splitIndex = messages.length - 1;
  }

  return [messages.slice(0, splitIndex), messages.slice(splitIndex)];
}

/** Compresses once the recorded token total reaches a share of the context window. */
export class TokenBasedCompression implements CompressionAlgorithm {
  readonly strategy = "token_based" as const;
  readonly embedsSummary = false;

  shouldCompress(messages: Message[], config: CompressionConfig, contextWindow?: number): boolean {
    if (contextWindow === undefined || messages.length === 0) return false;
    const total = messages.reduce((sum, message) => sum + messageTokens(message), 0);
    return total >= Math.floor(contextWindow * config.tokenBasedThresholdPercent);
  }

  async compress(messages: Message[], config: CompressionConfig, summarize: Summarizer): Promise<CompressionResult> {
    if (messages.length === 0) return unchanged(messages);

    const total = messages.reduce((sum, message) => sum + messageTokens(message), 0);
    const [toCompress, toKeep] = splitByTokens(messages, Math.floor(total * config.tokenBasedKeepPercent));
    if (toCompress.length === 0) return unchanged(messages);

    const summary = await summarize(toCompress);
    return {
      newMessages: toKeep,
      archivedMessages: toCompress,
      summaryGenerated: true,
      originalMessageCount: messages.length,
      newMessageCount: toKeep.length + 1,
      compressionRatio: 1 - (toKeep.length + 1) / messages.length,
      summary,
    };
  }
}

export function createCompressionAlgorithms(): Record<CompressionStrategy, CompressionAlgorithm> {
  return {
    full_replacement: new FullReplacementCompression(),
    sliding_window: new SlidingWindowCompression(),
    token_based: new TokenBasedCompression(),
  };
}
