import { describe, expect, it, vi } from "vitest";
import { NetworkError, err, ok } from "../errors";
import { claudeConfig } from "../providers/anthropic";
import { AIProviderFactory } from "../providers/providerFactory";
import { InMemoryConfigRepository } from "../sessions/configRepository";
import { InMemorySessionRepository } from "../sessions/sessionRepository";
import { FakeProvider, fakeResponse } from "../testing/fakes";
import { messageText, textMessage, type Message } from "../types";
import {
  FullReplacementCompression,
  SlidingWindowCompression,
  TokenBasedCompression,
  contextSummaryText,
  splitByTokens,
} from "./algorithms";
import { ChatCompressionService, SUMMARY_PROMPT, fallbackSummary } from "./compressionService";
import { DEFAULT_COMPRESSION_CONFIG } from "./types";

function conversation(count: number): Message[] {
  return Array.from({ length: count }, (_, i) => textMessage(i % 2 === 0 ? "user" : "assistant", `message ${i}`, i));
}

function withTokens(text: string, totalTokens: number): Message {
  return {
    ...textMessage("assistant", text),
    metadata: {
      model: "fake-model",
      responseTime: 1,
      inputTokens: 0,
      outputTokens: 0,
      totalTokens,
      estimatedInputTokens: 0,
      estimatedOutputTokens: 0,
      estimatedTotalTokens: 0,
    },
  };
}

const summarize = vi.fn(async (messages: Message[]) => `summary of ${messages.length}`);

describe("FullReplacementCompression", () => {
  const algorithm = new FullReplacementCompression();

  it("triggers at the message threshold", () => {
    expect(algorithm.shouldCompress(conversation(9), DEFAULT_COMPRESSION_CONFIG)).toBe(false);
    expect(algorithm.shouldCompress(conversation(10), DEFAULT_COMPRESSION_CONFIG)).toBe(true);
  });

  it("archives everything and leaves room for one summary message", async () => {
    const messages = conversation(10);

    const result = await algorithm.compress(messages, DEFAULT_COMPRESSION_CONFIG, summarize);

    expect(result.newMessages).toEqual([]);
    expect(result.archivedMessages).toEqual(messages);
    expect(result.summaryGenerated).toBe(true);
    expect(result.newMessageCount).toBe(1);
    expect(result.compressionRatio).toBeCloseTo(0.9);
    expect(result.summary).toBe("summary of 10");
  });

  it("does nothing for an empty history", async () => {
    const result = await algorithm.compress([], DEFAULT_COMPRESSION_CONFIG, summarize);
    expect(result.summaryGenerated).toBe(false);
    expect(result.newMessageCount).toBe(0);
  });
});

describe("SlidingWindowCompression", () => {
  const algorithm = new SlidingWindowCompression();

  it("triggers at its own threshold", () => {
    expect(algorithm.shouldCompress(conversation(11), DEFAULT_COMPRESSION_CONFIG)).toBe(false);
    expect(algorithm.shouldCompress(conversation(12), DEFAULT_COMPRESSION_CONFIG)).toBe(true);
  });

  it("keeps the last messages behind a context summary", async () => {
    const messages = conversation(12);

    const result = await algorithm.compress(messages, DEFAULT_COMPRESSION_CONFIG, summarize);

    expect(result.archivedMessages).toEqual(messages.slice(0, 6));
    expect(result.newMessages.slice(1)).toEqual(messages.slice(6));
    const context = result.newMessages[0];
    expect(context?.role).toBe("system");
    expect(context && messageText(context.content)).toBe(contextSummaryText("summary of 6", 6, 6));
    expect(result.newMessageCount).toBe(7);
    expect(result.compressionRatio).toBeCloseTo(1 - 7 / 12);
  });

  it("leaves short histories alone", async () => {
    const messages = conversation(6);
    const result = await algorithm.compress(messages, DEFAULT_COMPRESSION_CONFIG, summarize);
    expect(result.newMessages).toEqual(messages);
    expect(result.summaryGenerated).toBe(false);
  });
});

describe("TokenBasedCompression", () => {
  const algorithm = new TokenBasedCompression();
  const messages = [withTokens("a", 100), withTokens("b", 100), withTokens("c", 100), withTokens("d", 100)];

  it("needs a context window to decide", () => {
    expect(algorithm.shouldCompress(messages, DEFAULT_COMPRESSION_CONFIG)).toBe(false);
    // 80% of 500 is 400, which the four messages reach
    expect(algorithm.shouldCompress(messages, DEFAULT_COMPRESSION_CONFIG, 500)).toBe(true);
    expect(algorithm.shouldCompress(messages, DEFAULT_COMPRESSION_CONFIG, 600)).toBe(false);
  });

  it("keeps the newest messages that fit in the kept share of tokens", async () => {
    const result = await algorithm.compress(messages, DEFAULT_COMPRESSION_CONFIG, summarize);

    // 40% of 400 tokens is 160: only the last message fits
    expect(result.archivedMessages).toEqual(messages.slice(0, 3));
    expect(result.newMessages).toEqual(messages.slice(3));
    expect(result.newMessageCount).toBe(2);
    expect(result.compressionRatio).toBeCloseTo(0.5);
  });

  it("always keeps at least one message", () => {
    const [compress, keep] = splitByTokens(conversation(3), 0);
    expect(compress).toHaveLength(2);
    expect(keep).toHaveLength(1);
  });
});

describe("fallbackSummary", () => {
  it("counts turns and previews the first messages", () => {
    expect(fallbackSummary([textMessage("user", "Hi"), textMessage("assistant", "Hello")])).toBe(
      [
        "The conversation contains 1 user messages and 1 assistant replies.",
        "",
        "Main topics:",
        "- user: Hi...",
        "- assistant: Hello...",
        "",
        "[Automatically generated summary]",
      ].join("\n"),
    );
  });
});

describe("ChatCompressionService", () => {
  async function setup(provider: FakeProvider) {
    const factory = new AIProviderFactory();
    factory.register("claude", () => provider);
    const sessions = new InMemorySessionRepository();
    const configs = new InMemoryConfigRepository([claudeConfig("test-key")]);
    const service = new ChatCompressionService({ factory, sessions, configs });

    const created = await sessions.createSession("claude");
    if (!created.ok) throw created.error;
    await sessions.replaceMessages(created.value.id, conversation(10));
    return { service, sessions, sessionId: created.value.id };
  }

  it("summarizes through the provider and records the compression", async () => {
    const provider = new FakeProvider(claudeConfig("test-key"), () => ok(fakeResponse("They talked about numbers")));
    const { service, sessions, sessionId } = await setup(provider);

    const result = await service.compressSession(sessionId, "claude");

    expect(result.ok).toBe(true);
    const request = provider.requests[0];
    expect(request?.parameters.maxTokens).toBe(1024);
    expect(request?.parameters.temperature).toBe(0.3);
    expect(request?.model).toBe("claude-sonnet-4-5-20250929");
    const last = request?.messages[request.messages.length - 1];
    expect(last && messageText(last.content)).toBe(SUMMARY_PROMPT);

    const session = await sessions.getSession(sessionId);
    if (!session.ok) throw session.error;
    expect(session.value.compressionCount).toBe(1);
    expect(session.value.archivedMessages).toHaveLength(10);
    expect(session.value.messages.map((message) => [message.role, messageText(message.content)])).toEqual([
      ["system", contextSummaryText("They talked about numbers", 10, 0)],
    ]);
  });

  it("falls back to a local summary when the provider fails", async () => {
    const provider = new FakeProvider(claudeConfig("test-key"), () => err(new NetworkError("Claude API Error: down")));
    const { service, sessions, sessionId } = await setup(provider);

    const result = await service.compressSession(sessionId, "claude");

    expect(result.ok && result.value.summary).toBe(fallbackSummary(conversation(10)));
    const session = await sessions.getSession(sessionId);
    expect(session.ok && session.value.compressionCount).toBe(1);
  });

  it("falls back when the summarizing provider is not configured", async () => {
    const provider = new FakeProvider(claudeConfig("test-key"));
    const { service, sessionId } = await setup(provider);

    const result = await service.compressSession(sessionId, "openai");

    expect(result.ok && result.value.summary).toBe(fallbackSummary(conversation(10)));
    expect(provider.requests).toHaveLength(0);
  });

  it("switches strategy per session", async () => {
    const provider = new FakeProvider(claudeConfig("test-key"));
    const { service, sessions, sessionId } = await setup(provider);

    const updated = await service.updateCompressionConfig(sessionId, { strategy: "sliding_window" });

    expect(updated).toEqual({ ok: true, value: { ...DEFAULT_COMPRESSION_CONFIG, strategy: "sliding_window" } });
    const session = await sessions.getSession(sessionId);
    if (!session.ok) throw session.error;
    expect(session.value.compressionConfig.strategy).toBe("sliding_window");
    // 10 messages are below the sliding window threshold of 12
    expect(service.shouldCompress(session.value)).toBe(false);
  });

  it("reports unknown sessions", async () => {
    const provider = new FakeProvider(claudeConfig("test-key"));
    const { service } = await setup(provider);

    const result = await service.compressSession("missing", "claude");

    expect(!result.ok && result.error.kind).toBe("not_found");
  });
});
