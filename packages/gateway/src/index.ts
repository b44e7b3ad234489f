export * from "./types";
export * from "./errors";
export { loadConfig, type GatewayConfig } from "./config";
export { createGateway, type Gateway, type GatewayDeps } from "./gateway";
export { createApp, statusForKind, type AppDeps } from "./http/app";

export { ClaudeProvider, CLAUDE_DEFAULTS, claudeConfig } from "./providers/anthropic";
export { OpenAIProvider, OPENAI_DEFAULTS, openAIConfig } from "./providers/openai";
export { HuggingFaceProvider, HUGGINGFACE_DEFAULTS, huggingFaceConfig } from "./providers/huggingface";
export {
  AIProviderFactory,
  createDefaultProviderFactory,
  type ProviderCreator,
  type ProviderFactoryDeps,
} from "./providers/providerFactory";

export { enhanceMessage, processResponse, stripCodeFence } from "./formatting/responseFormatter";
export { TiktokenTokenCounter, createTokenCounterCache, type TokenCounter } from "./tokenizer/tokenCounter";

export { ChatRouter, type ChatRouterDeps, type MessageResult, type SendMessageInput } from "./router";
export {
  InMemorySessionRepository,
  type ChatSession,
  type CreateSessionOptions,
  type SessionRepository,
} from "./sessions/sessionRepository";
export {
  PersistentSessionRepository,
  type PersistentSessionRepositoryOptions,
} from "./sessions/persistentSessionRepository";
export { JsonSessionStorage } from "./sessions/sessionStorage";
export { InMemoryConfigRepository, type ConfigRepository } from "./sessions/configRepository";

export * from "./compression/types";
export {
  FullReplacementCompression,
  SlidingWindowCompression,
  TokenBasedCompression,
  createCompressionAlgorithms,
} from "./compression/algorithms";
export { ChatCompressionService, type ChatCompressionServiceDeps } from "./compression/compressionService";

export { TaskScheduler } from "./scheduler/taskScheduler";
export { ChatTaskScheduler, formatInterval, type ChatTaskSchedulerDeps } from "./scheduler/chatTaskScheduler";
export {
  SchedulerManager,
  type CreateTaskInput,
  type CreatedTask,
  type ScheduledTaskInfo,
  type SchedulerManagerDeps,
} from "./scheduler/schedulerManager";
export { ScheduledTaskStorage, type StoredTask } from "./scheduler/taskStorage";
export { TaskBindingRegistry, type ScheduledChatTask, type ScheduledTask, type TaskBinding } from "./scheduler/types";

export { Logger, logger, type LogContext } from "./utils/logger";
