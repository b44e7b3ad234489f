import type { Result, ValidationResult } from "./errors";

export type MessageRole = "user" | "assistant" | "system";

export type ImageSource = "base64" | "url" | "local_file";

export interface ImageContent {
  data: string; // base64 payload or URL, depending on source
  mimeType: string;
  source: ImageSource;
}

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: unknown }
  | { type: "tool_result"; toolUseId: string; content: string };

export type MessageContent =
  | { type: "text"; text: string }
  | { type: "multimodal"; text?: string; images: ImageContent[] }
  | { type: "structured"; blocks: ContentBlock[] };

export interface MessageMetadata {
  model: string;
  responseTime: number; // seconds

  // Reported by the provider
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;

  // Estimated locally before/after the call
  estimatedInputTokens: number;
  estimatedOutputTokens: number;
  estimatedTotalTokens: number;
}

export interface Message {
  role: MessageRole;
  content: MessageContent;
  timestamp: number;
  metadata?: MessageMetadata;
}

export function textMessage(role: MessageRole, text: string, timestamp = Date.now()): Message {
  return { role, content: { type: "text", text }, timestamp };
}

/** Plain text view of a message, as sent to providers that only take strings. */
export function messageText(content: MessageContent): string {
  switch (content.type) {
    case "text":
      return content.text;
    case "multimodal":
      return content.text ?? "";
    case "structured":
      return content.blocks
        .map((block) => {
          if (block.type === "text") return block.text;
          if (block.type === "tool_result") return block.content;
          return "";
        })
        .filter((text) => text.length > 0)
        .join("\n");
  }
}

export type ResponseFormat = "plain_text" | "json" | "xml";

export interface RequestParameters {
  temperature: number;
  maxTokens: number;
  topP: number;
  topK?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stopSequences: string[];
  responseFormat: ResponseFormat;
  streamingEnabled: boolean;
}

export const DEFAULT_PARAMETERS: RequestParameters = {
  temperature: 1.0,
  maxTokens: 4096,
  topP: 1.0,
  stopSequences: [],
  responseFormat: "plain_text",
  streamingEnabled: false,
};

export function resolveParameters(partial: Partial<RequestParameters> = {}): RequestParameters {
  return {
    temperature: partial.temperature ?? DEFAULT_PARAMETERS.temperature,
    maxTokens: partial.maxTokens ?? DEFAULT_PARAMETERS.maxTokens,
    topP: partial.topP ?? DEFAULT_PARAMETERS.topP,
    topK: partial.topK,
    frequencyPenalty: partial.frequencyPenalty,
    presencePenalty: partial.presencePenalty,
    stopSequences: partial.stopSequences ?? [],
    responseFormat: partial.responseFormat ?? DEFAULT_PARAMETERS.responseFormat,
    streamingEnabled: partial.streamingEnabled ?? DEFAULT_PARAMETERS.streamingEnabled,
  };
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface AIRequest {
  messages: Message[]; // conversation order
  model: string;
  parameters: RequestParameters;
  systemPrompt?: string;
  sessionId?: string;
  metadata: Record<string, string>;
  tools: ToolDefinition[];
  signal?: AbortSignal; // cancels the vendor call
}

export type FinishReason = "stop" | "max_tokens" | "content_filter" | "error" | "cancelled" | "tool_use";

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export function tokenUsage(inputTokens: number, outputTokens: number, totalTokens?: number): TokenUsage {
  return { inputTokens, outputTokens, totalTokens: totalTokens ?? inputTokens + outputTokens };
}

export interface ToolUse {
  id: string;
  name: string;
  input: unknown;
}

export interface AIResponse {
  id: string;
  content: string;
  role: "assistant";
  model: string;
  usage: TokenUsage; // as reported by the provider
  finishReason: FinishReason;
  metadata: Record<string, string>;
  timestamp: number;
  estimatedInputTokens: number;
  estimatedOutputTokens: number;
  toolUses: ToolUse[];
}

export const PROVIDER_TYPES = ["claude", "openai", "huggingface", "gemini", "custom"] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

export const PROVIDER_LABELS: Record<ProviderType, string> = {
  claude: "Anthropic Claude",
  openai: "OpenAI",
  huggingface: "HuggingFace",
  gemini: "Google Gemini",
  custom: "Custom Provider",
};

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((type) => type === value);
}

export interface TimeoutConfig {
  requestTimeoutMs: number; // whole call, connect through last body byte
}

export const DEFAULT_TIMEOUTS: TimeoutConfig = {
  requestTimeoutMs: 300_000,
};

interface BaseProviderConfig {
  apiKey: string;
  baseUrl: string;
  timeout: TimeoutConfig;
}

export interface ClaudeConfig extends BaseProviderConfig {
  type: "claude";
  apiVersion: string;
  defaultModel: string;
}

export interface OpenAIConfig extends BaseProviderConfig {
  type: "openai";
  organization?: string;
  projectId?: string;
  defaultModel: string;
}

export interface HuggingFaceConfig extends BaseProviderConfig {
  type: "huggingface";
  defaultModel: string;
}

export interface GeminiConfig extends BaseProviderConfig {
  type: "gemini";
  defaultModel: string;
}

export interface CustomConfig extends BaseProviderConfig {
  type: "custom";
  headers: Record<string, string>;
}

export type ProviderConfig = ClaudeConfig | OpenAIConfig | HuggingFaceConfig | GeminiConfig | CustomConfig;

export function defaultModelOf(config: ProviderConfig): string {
  return config.type === "custom" ? "default" : config.defaultModel;
}

export interface ModelCapabilities {
  supportsVision: boolean;
  supportsStreaming: boolean;
  maxTokens: number; // max output tokens
  contextWindow: number;
}

export interface AIModel {
  id: string;
  name: string;
  providerId: ProviderType;
  capabilities: ModelCapabilities;
}

// What every provider module must implement:
export interface AIProvider {
  readonly providerId: ProviderType;
  readonly config: ProviderConfig;
  /** Resolves to a failed Result instead of rejecting. */
  sendMessage(request: AIRequest): Promise<Result<AIResponse>>;
  getModels(): Promise<Result<AIModel[]>>;
  validateConfig(): ValidationResult;
}

/**
 * Fetch-compatible function shared by every provider. One instance is built at
 * startup and injected; tests pass an in-process stand-in.
 */
export type HttpClient = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
