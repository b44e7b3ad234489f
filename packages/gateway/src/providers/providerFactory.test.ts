import { describe, expect, it } from "vitest";
import { ConfigurationError, UnsupportedProviderError } from "../errors";
import { FakeProvider, fakeHttpClient, WordTokenCounter } from "../testing/fakes";
import { ClaudeProvider, claudeConfig } from "./anthropic";
import { HuggingFaceProvider, huggingFaceConfig } from "./huggingface";
import { OpenAIProvider, openAIConfig } from "./openai";
import { AIProviderFactory, createDefaultProviderFactory } from "./providerFactory";

describe("AIProviderFactory", () => {
  it("throws for a type nobody registered", () => {
    const factory = new AIProviderFactory();

    expect(() => factory.create("gemini", claudeConfig("test-key"))).toThrow(UnsupportedProviderError);
    expect(() => factory.create("gemini", claudeConfig("test-key"))).toThrow("Provider gemini not registered");
  });

  it("lets a later registration replace an earlier one", () => {
    const factory = new AIProviderFactory();
    const first = new FakeProvider(claudeConfig("test-key"));
    const second = new FakeProvider(claudeConfig("test-key"));

    factory.register("claude", () => first);
    factory.register("claude", () => second);

    expect(factory.create("claude", claudeConfig("test-key"))).toBe(second);
    expect(factory.registeredTypes()).toEqual(["claude"]);
    expect(factory.isRegistered("openai")).toBe(false);
  });
});

describe("createDefaultProviderFactory", () => {
  const { http } = fakeHttpClient();
  const factory = createDefaultProviderFactory({ httpClient: http, tokenCounterFor: () => new WordTokenCounter() });

  it("registers the three vendors", () => {
    expect(factory.registeredTypes()).toEqual(["claude", "openai", "huggingface"]);
    expect(factory.create("claude", claudeConfig("test-key"))).toBeInstanceOf(ClaudeProvider);
    expect(factory.create("openai", openAIConfig("sk-test"))).toBeInstanceOf(OpenAIProvider);
    expect(factory.create("huggingface", huggingFaceConfig("hf_test"))).toBeInstanceOf(HuggingFaceProvider);
  });

  it("rejects a config of the wrong variant", () => {
    expect(() => factory.create("openai", claudeConfig("test-key"))).toThrow(ConfigurationError);
    expect(() => factory.create("openai", claudeConfig("test-key"))).toThrow("Invalid config type for openai: got claude");
  });
});
