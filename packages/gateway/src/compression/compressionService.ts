import { ConfigurationError, err, ok, toAIError, unwrap, type Result } from "../errors";
import type { AIProviderFactory } from "../providers/providerFactory";
import type { ConfigRepository } from "../sessions/configRepository";
import type { ChatSession, SessionRepository } from "../sessions/sessionRepository";
import {
  defaultModelOf,
  messageText,
  resolveParameters,
  textMessage,
  type Message,
  type ProviderType,
} from "../types";
import { Logger } from "../utils/logger";
import { contextSummaryText, createCompressionAlgorithms } from "./algorithms";
import type { CompressionAlgorithm, CompressionConfig, CompressionResult, CompressionStrategy } from "./types";

export const SUMMARY_PROMPT = `Please write a short but informative summary of the conversation above.

Requirements:
1. Keep the key topics and the context of the discussion
2. List the user's main questions and the assistant's answers
3. Do not drop important details (names, dates, technical terms)
4. Structure the summary so it is easy to scan
5. Be as brief as possible while staying accurate

Reply with the summary only, without any extra commentary.`;

const SUMMARY_MAX_TOKENS = 1024;
const SUMMARY_TEMPERATURE = 0.3;
const FALLBACK_PREVIEW_MESSAGES = 3;
const FALLBACK_PREVIEW_CHARS = 100;

/** Summary built locally when the provider cannot produce one. */
export function fallbackSummary(messages: Message[]): string {
  const userCount = messages.filter((message) => message.role === "user").length;
  const assistantCount = messages.filter((message) => message.role === "assistant").length;
  const preview = messages.slice(0, FALLBACK_PREVIEW_MESSAGES).map((message) => {
    const text = messageText(message.content);
    return `- ${message.role}: ${text.length > 0 ? text.slice(0, FALLBACK_PREVIEW_CHARS) : "[non-text message]"}...`;
  });

  return [
    `The conversation contains ${userCount} user messages and ${assistantCount} assistant replies.`,
    "",
    "Main topics:",
    ...preview,
    "",
    "[Automatically generated summary]",
  ].join("\n");
}

export interface ChatCompressionServiceDeps {
  factory: AIProviderFactory;
  sessions: SessionRepository;
  configs: ConfigRepository;
  logger?: Logger;
  algorithms?: Record<CompressionStrategy, CompressionAlgorithm>;
}

export class ChatCompressionService {
  private factory: AIProviderFactory;
  private sessions: SessionRepository;
  private configs: ConfigRepository;
  private logger: Logger;
  private algorithms: Record<CompressionStrategy, CompressionAlgorithm>;

  constructor(deps: ChatCompressionServiceDeps) {
    this.factory = deps.factory;
    this.sessions = deps.sessions;
    this.configs = deps.configs;
    this.logger = deps.logger ?? new Logger({ service: "ChatCompressionService" });
    this.algorithms = deps.algorithms ?? createCompressionAlgorithms();
  }

  shouldCompress(session: ChatSession, contextWindow?: number): boolean {
    const { compressionConfig } = session;
    return this.algorithms[compressionConfig.strategy].shouldCompress(
      session.messages,
      compressionConfig,
      contextWindow,
    );
  }

  /**
   * Compresses the session history with its configured strategy. Old messages
   * move to the archive; the summary comes from `providerId` when it answers.
   */
  async compressSession(sessionId: string, providerId: ProviderType, model?: string): Promise<Result<CompressionResult>> {
    const log = this.logger.child({ sessionId });
    try {
      const session = unwrap(await this.sessions.getSession(sessionId));
      const algorithm = this.algorithms[session.compressionConfig.strategy];
      log.info("Starting compression", { strategy: algorithm.strategy, messages: session.messages.length });

      const result = await algorithm.compress(session.messages, session.compressionConfig, (messages) =>
        this.summarize(messages, providerId, model, log),
      );
      if (!result.summaryGenerated) {
        log.info("Nothing to compress");
        return ok(result);
      }

      const newMessages =
        !algorithm.embedsSummary && result.summary !== undefined
          ? [
              textMessage(
                "system",
                contextSummaryText(result.summary, result.archivedMessages.length, result.newMessages.length),
              ),
              ...result.newMessages,
            ]
          : result.newMessages;

      unwrap(await this.sessions.archiveMessages(sessionId, result.archivedMessages));
      unwrap(await this.sessions.replaceMessages(sessionId, newMessages));
      const updated = unwrap(await this.sessions.getSession(sessionId));
      unwrap(await this.sessions.updateSession({ ...updated, compressionCount: updated.compressionCount + 1 }));

      log.info("Compression completed", {
        original: result.originalMessageCount,
        compressed: result.newMessageCount,
        ratio: `${(result.compressionRatio * 100).toFixed(2)}%`,
      });
      return ok({ ...result, newMessages });
    } catch (error) {
      log.error("Compression failed", error);
      return err(toAIError(error));
    }
  }

  /** Merges `changes` into the session's compression settings and returns the result. */
  async updateCompressionConfig(
    sessionId: string,
    changes: Partial<CompressionConfig>,
  ): Promise<Result<CompressionConfig>> {
    const session = await this.sessions.getSession(sessionId);
    if (!session.ok) return session;

    const compressionConfig: CompressionConfig = { ...session.value.compressionConfig, ...changes };
    const updated = await this.sessions.updateSession({ ...session.value, compressionConfig });
    if (!updated.ok) return updated;
    this.logger.info("Compression strategy updated", { sessionId, strategy: compressionConfig.strategy });
    return ok(compressionConfig);
  }

  private async summarize(
    messages: Message[],
    providerId: ProviderType,
    model: string | undefined,
    log: Logger,
  ): Promise<string> {
    try {
      log.info("Generating summary", { messages: messages.length, providerId });

      const config = unwrap(await this.configs.getProviderConfig(providerId));
      if (!config) {
        throw new ConfigurationError(`Provider ${providerId} not configured`);
      }
      const provider = this.factory.create(providerId, config);

      const response = unwrap(
        await provider.sendMessage({
          messages: [...messages, textMessage("user", SUMMARY_PROMPT)],
          model: model ?? defaultModelOf(config),
          parameters: resolveParameters({ maxTokens: SUMMARY_MAX_TOKENS, temperature: SUMMARY_TEMPERATURE }),
          metadata: {},
          tools: [],
        }),
      );

      log.info("Summary generated", { characters: response.content.length });
      return response.content;
    } catch (error) {
      log.warn("Summary generation failed, using local summary", {
        error: error instanceof Error ? error.message : String(error),
      });
      return fallbackSummary(messages);
    }
  }
}
