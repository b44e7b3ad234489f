import type { ChatCompressionService } from "./compression/compressionService";
import { DEFAULT_COMPRESSION_CONFIG, type CompressionConfig } from "./compression/types";
import { ConfigurationError, err, ok, toAIError, unwrap, type Result, type ValidationResult } from "./errors";
import type { AIProviderFactory } from "./providers/providerFactory";
import type { ConfigRepository } from "./sessions/configRepository";
import type { ChatSession, SessionRepository } from "./sessions/sessionRepository";
import {
  defaultModelOf,
  resolveParameters,
  textMessage,
  type AIModel,
  type AIProvider,
  type FinishReason,
  type Message,
  type ProviderType,
  type RequestParameters,
  type TokenUsage,
  type ToolUse,
} from "./types";
import { Logger } from "./utils/logger";

export interface SendMessageInput {
  message: string;
  sessionId?: string; // omitted: a new session is created
  providerId?: ProviderType;
  model?: string;
  parameters?: Partial<RequestParameters>;
  systemPrompt?: string;
  signal?: AbortSignal;
}

export interface MessageResult {
  response: string;
  sessionId: string;
  usage: TokenUsage; // as reported by the provider
  model: string;
  providerId: ProviderType;
  estimatedInputTokens: number;
  estimatedOutputTokens: number;
  toolUses: ToolUse[];
  finishReason: FinishReason;
}

export interface ChatRouterDeps {
  factory: AIProviderFactory;
  sessions: SessionRepository;
  configs: ConfigRepository;
  defaultProvider: ProviderType;
  compression?: ChatCompressionService;
  autoCompress?: boolean;
  compressionConfig?: CompressionConfig; // applied to sessions this router creates
  logger?: Logger;
}

/**
 * Entry point for chat traffic: resolves the session and provider, sends the
 * full history, and records both turns.
 */
export class ChatRouter {
  private factory: AIProviderFactory;
  private sessions: SessionRepository;
  private configs: ConfigRepository;
  private compression?: ChatCompressionService;
  private autoCompress: boolean;
  private compressionConfig: CompressionConfig;
  private logger: Logger;
  readonly defaultProvider: ProviderType;

  constructor(deps: ChatRouterDeps) {
    this.factory = deps.factory;
    this.sessions = deps.sessions;
    this.configs = deps.configs;
    this.defaultProvider = deps.defaultProvider;
    this.compression = deps.compression;
    this.autoCompress = deps.autoCompress ?? false;
    this.compressionConfig = deps.compressionConfig ?? DEFAULT_COMPRESSION_CONFIG;
    this.logger = deps.logger ?? new Logger({ service: "ChatRouter" });
  }

  async sendMessage(input: SendMessageInput): Promise<Result<MessageResult>> {
    try {
      const session = await this.resolveSession(input);
      const providerId = input.providerId ?? session.providerId;
      const log = this.logger.child({ sessionId: session.id, provider: providerId });

      const { provider, model: defaultModel } = await this.resolveProvider(providerId);
      const model = input.model ?? defaultModel;

      unwrap(await this.sessions.appendMessage(session.id, "user", input.message));
      const history = unwrap(await this.sessions.getMessages(session.id));
      log.debug("Sending history", { messages: history.length, model });

      const start = Date.now();
      const response = unwrap(
        await provider.sendMessage({
          messages: history,
          model,
          parameters: resolveParameters(input.parameters),
          systemPrompt: input.systemPrompt,
          sessionId: session.id,
          metadata: {},
          tools: [],
          signal: input.signal,
        }),
      );
      const ms = Date.now() - start;

      log.info(`provider=${providerId} model=${response.model} ms=${ms}`, {
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        estimatedInputTokens: response.estimatedInputTokens,
        estimatedOutputTokens: response.estimatedOutputTokens,
      });

      const assistantMessage: Message = {
        ...textMessage("assistant", response.content),
        metadata: {
          model: response.model,
          responseTime: ms / 1000,
          inputTokens: response.usage.inputTokens,
          outputTokens: response.usage.outputTokens,
          totalTokens: response.usage.totalTokens,
          estimatedInputTokens: response.estimatedInputTokens,
          estimatedOutputTokens: response.estimatedOutputTokens,
          estimatedTotalTokens: response.estimatedInputTokens + response.estimatedOutputTokens,
        },
      };
      unwrap(await this.sessions.addMessage(session.id, assistantMessage));

      if (this.autoCompress) {
        await this.compressIfNeeded(session.id, provider, providerId, model, log);
      }

      return ok({
        response: response.content,
        sessionId: session.id,
        usage: response.usage,
        model: response.model,
        providerId,
        estimatedInputTokens: response.estimatedInputTokens,
        estimatedOutputTokens: response.estimatedOutputTokens,
        toolUses: response.toolUses,
        finishReason: response.finishReason,
      });
    } catch (error) {
      this.logger.error("sendMessage failed", error);
      return err(toAIError(error));
    }
  }

  async getModels(providerId: ProviderType): Promise<Result<AIModel[]>> {
    try {
      const { provider } = await this.resolveProvider(providerId);
      const models = unwrap(await provider.getModels());
      this.logger.info("Listed models", { provider: providerId, count: models.length });
      return ok(models);
    } catch (error) {
      return err(toAIError(error));
    }
  }

  async validateProvider(providerId: ProviderType): Promise<Result<ValidationResult>> {
    try {
      const { provider } = await this.resolveProvider(providerId);
      return ok(provider.validateConfig());
    } catch (error) {
      return err(toAIError(error));
    }
  }

  private async resolveSession(input: SendMessageInput): Promise<ChatSession> {
    if (input.sessionId !== undefined) {
      return unwrap(await this.sessions.getSession(input.sessionId));
    }
    const providerId = input.providerId ?? this.defaultProvider;
    const session = unwrap(
      await this.sessions.createSession(providerId, { compressionConfig: this.compressionConfig }),
    );
    this.logger.info("Created session", { sessionId: session.id, provider: providerId });
    return session;
  }

  /** @throws ConfigurationError when the provider has no stored config. */
  private async resolveProvider(providerId: ProviderType): Promise<{ provider: AIProvider; model: string }> {
    const config = unwrap(await this.configs.getProviderConfig(providerId));
    if (!config) {
      throw new ConfigurationError(`Provider ${providerId} not configured`);
    }
    return { provider: this.factory.create(providerId, config), model: defaultModelOf(config) };
  }

  // Compression failures never fail the chat turn that triggered them
  private async compressIfNeeded(
    sessionId: string,
    provider: AIProvider,
    providerId: ProviderType,
    model: string,
    log: Logger,
  ): Promise<void> {
    if (!this.compression) return;

    const session = await this.sessions.getSession(sessionId);
    if (!session.ok) return;

    const models = await provider.getModels();
    const contextWindow = models.ok
      ? models.value.find((candidate) => candidate.id === model)?.capabilities.contextWindow
      : undefined;
    if (!this.compression.shouldCompress(session.value, contextWindow)) return;

    const result = await this.compression.compressSession(sessionId, providerId, model);
    if (!result.ok) {
      log.warn("Automatic compression failed", { error: result.error.message });
    }
  }
}
