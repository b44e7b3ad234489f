import type { Message } from "../types";

export const COMPRESSION_STRATEGIES = ["full_replacement", "sliding_window", "token_based"] as const;

export type CompressionStrategy = (typeof COMPRESSION_STRATEGIES)[number];

export interface CompressionConfig {
  strategy: CompressionStrategy;
  fullReplacementMessageThreshold: number;
  slidingWindowMessageThreshold: number;
  slidingWindowKeepLast: number;
  tokenBasedThresholdPercent: number; // fraction of the context window
  tokenBasedKeepPercent: number; // fraction of the history's tokens kept verbatim
}

export const DEFAULT_COMPRESSION_CONFIG: CompressionConfig = {
  strategy: "full_replacement",
  fullReplacementMessageThreshold: 10,
  slidingWindowMessageThreshold: 12,
  slidingWindowKeepLast: 6,
  tokenBasedThresholdPercent: 0.8,
  tokenBasedKeepPercent: 0.4,
};

export interface CompressionResult {
  newMessages: Message[];
  archivedMessages: Message[];
  summaryGenerated: boolean;
  originalMessageCount: number;
  newMessageCount: number;
  compressionRatio: number; // 0.5 means half the messages are gone
  summary?: string;
}

export type Summarizer = (messages: Message[]) => Promise<string>;

export interface CompressionAlgorithm {
  readonly strategy: CompressionStrategy;
  /** Whether `newMessages` already carries the summary, or the caller must add it. */
  readonly embedsSummary: boolean;
  shouldCompress(messages: Message[], config: CompressionConfig, contextWindow?: number): boolean;
  compress(messages: Message[], config: CompressionConfig, summarize: Summarizer): Promise<CompressionResult>;
}
