import { ConfigurationError, UnsupportedProviderError } from "../errors";
import type { TokenCounter } from "../tokenizer/tokenCounter";
import { defaultModelOf, type AIProvider, type HttpClient, type ProviderConfig, type ProviderType } from "../types";
import { Logger } from "../utils/logger";
import { ClaudeProvider } from "./anthropic";
import { HuggingFaceProvider } from "./huggingface";
import { OpenAIProvider } from "./openai";

export type ProviderCreator = (config: ProviderConfig) => AIProvider;

/** Registry of provider constructors keyed by provider type. */
export class AIProviderFactory {
  private creators = new Map<ProviderType, ProviderCreator>();

  register(type: ProviderType, creator: ProviderCreator): void {
    this.creators.set(type, creator);
  }

  /** @throws UnsupportedProviderError when nothing is registered for `type`. */
  create(type: ProviderType, config: ProviderConfig): AIProvider {
    const creator = this.creators.get(type);
    if (!creator) {
      throw new UnsupportedProviderError(type);
    }
    return creator(config);
  }

  isRegistered(type: ProviderType): boolean {
    return this.creators.has(type);
  }

  registeredTypes(): ProviderType[] {
    return [...this.creators.keys()];
  }
}

export interface ProviderFactoryDeps {
  httpClient: HttpClient;
  tokenCounterFor: (model: string) => TokenCounter;
  logger?: Logger;
}

function mismatch(expected: ProviderType, config: ProviderConfig): ConfigurationError {
  return new ConfigurationError(`Invalid config type for ${expected}: got ${config.type}`);
}

export function createDefaultProviderFactory({ httpClient, tokenCounterFor, logger }: ProviderFactoryDeps): AIProviderFactory {
  const log = logger ?? new Logger({ service: "AIProviderFactory" });
  const factory = new AIProviderFactory();

  factory.register("claude", (config) => {
    if (config.type !== "claude") throw mismatch("claude", config);
    return new ClaudeProvider(httpClient, config, tokenCounterFor(defaultModelOf(config)), log);
  });
  factory.register("openai", (config) => {
    if (config.type !== "openai") throw mismatch("openai", config);
    return new OpenAIProvider(httpClient, config, tokenCounterFor(defaultModelOf(config)), log);
  });
  factory.register("huggingface", (config) => {
    if (config.type !== "huggingface") throw mismatch("huggingface", config);
    return new HuggingFaceProvider(httpClient, config, tokenCounterFor(defaultModelOf(config)), log);
  });

  return factory;
}
