import { beforeEach, describe, expect, it } from "vitest";
import { textMessage } from "../types";
import { InMemoryConfigRepository } from "./configRepository";
import { InMemorySessionRepository } from "./sessionRepository";
import { claudeConfig } from "../providers/anthropic";
import { openAIConfig } from "../providers/openai";

describe("InMemorySessionRepository", () => {
  let repository: InMemorySessionRepository;

  beforeEach(() => {
    repository = new InMemorySessionRepository();
  });

  it("creates sessions with default compression settings", async () => {
    const created = await repository.createSession("claude", { title: "Weather", metadata: { source: "test" } });

    expect(created.ok).toBe(true);
    if (!created.ok) return;
    expect(created.value.providerId).toBe("claude");
    expect(created.value.title).toBe("Weather");
    expect(created.value.messages).toEqual([]);
    expect(created.value.compressionCount).toBe(0);
    expect(created.value.compressionConfig.strategy).toBe("full_replacement");
    expect(created.value.metadata).toEqual({ source: "test" });
  });

  it("keeps messages in conversation order", async () => {
    const created = await repository.createSession("openai");
    if (!created.ok) throw created.error;
    const id = created.value.id;

    await repository.appendMessage(id, "user", "Hi");
    await repository.addMessage(id, textMessage("assistant", "Hello", 5));

    const messages = await repository.getMessages(id);
    expect(messages.ok && messages.value.map((message) => [message.role, message.content])).toEqual([
      ["user", { type: "text", text: "Hi" }],
      ["assistant", { type: "text", text: "Hello" }],
    ]);
  });

  it("hands out snapshots that do not alias the stored session", async () => {
    const created = await repository.createSession("claude");
    if (!created.ok) throw created.error;

    created.value.messages.push(textMessage("user", "sneaky"));

    const stored = await repository.getMessages(created.value.id);
    expect(stored.ok && stored.value).toEqual([]);
  });

  it("replaces, archives and clears messages", async () => {
    const created = await repository.createSession("claude");
    if (!created.ok) throw created.error;
    const id = created.value.id;
    const old = textMessage("user", "old", 1);
    const summary = textMessage("system", "summary", 2);

    await repository.addMessage(id, old);
    await repository.archiveMessages(id, [old]);
    await repository.replaceMessages(id, [summary]);

    const afterCompression = await repository.getSession(id);
    expect(afterCompression.ok && afterCompression.value.messages).toEqual([summary]);
    expect(afterCompression.ok && afterCompression.value.archivedMessages).toEqual([old]);

    await repository.clearMessages(id);
    const cleared = await repository.getMessages(id);
    expect(cleared.ok && cleared.value).toEqual([]);
  });

  it("fails with not_found for unknown ids", async () => {
    const results = await Promise.all([
      repository.getSession("missing"),
      repository.appendMessage("missing", "user", "Hi"),
      repository.setTitle("missing", "Title"),
      repository.deleteSession("missing"),
    ]);

    expect(results.map((result) => !result.ok && result.error.kind)).toEqual([
      "not_found",
      "not_found",
      "not_found",
      "not_found",
    ]);
  });

  it("deletes sessions", async () => {
    const created = await repository.createSession("claude");
    if (!created.ok) throw created.error;

    await repository.deleteSession(created.value.id);

    const listed = await repository.listSessions();
    expect(listed.ok && listed.value).toEqual([]);
  });
});

describe("InMemoryConfigRepository", () => {
  it("returns undefined for providers without a config", async () => {
    const repository = new InMemoryConfigRepository([claudeConfig("test-key")]);

    const claude = await repository.getProviderConfig("claude");
    const openai = await repository.getProviderConfig("openai");

    expect(claude.ok && claude.value?.type).toBe("claude");
    expect(openai.ok && openai.value).toBeUndefined();
  });

  it("refuses to delete the Claude config", async () => {
    const repository = new InMemoryConfigRepository([claudeConfig("test-key"), openAIConfig("sk-test")]);

    const claude = await repository.deleteProviderConfig("claude");
    const openai = await repository.deleteProviderConfig("openai");

    expect(!claude.ok && claude.error.kind).toBe("validation");
    expect(openai.ok).toBe(true);
    const remaining = await repository.getAllConfigs();
    expect(remaining.ok && remaining.value.map((config) => config.type)).toEqual(["claude"]);
  });
});
