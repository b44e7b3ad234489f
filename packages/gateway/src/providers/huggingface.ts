import type OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { ParseError, err, ok, type Result, type ValidationResult } from "../errors";
import { processResponse } from "../formatting/responseFormatter";
import type { TokenCounter } from "../tokenizer/tokenCounter";
import {
  DEFAULT_TIMEOUTS,
  messageText,
  tokenUsage,
  type AIModel,
  type AIProvider,
  type AIRequest,
  type AIResponse,
  type HttpClient,
  type HuggingFaceConfig,
  type MessageRole,
} from "../types";
import { Logger } from "../utils/logger";
import {
  createOpenAIClient,
  parseChatCompletion,
  toChatCompletionError,
  type ChatCompletionReply,
} from "./openaiClient";
import { finishReasonFromChatCompletion, validateProviderConfig, withFormatInstructions } from "./shared";

export const HUGGINGFACE_DEFAULTS = {
  baseUrl: "https://router.huggingface.co/v1",
  defaultModel: "deepseek-ai/DeepSeek-R1:fastest",
} as const;

export function huggingFaceConfig(
  apiKey: string,
  overrides: Partial<Omit<HuggingFaceConfig, "type">> = {},
): HuggingFaceConfig {
  return {
    type: "huggingface",
    apiKey,
    baseUrl: overrides.baseUrl ?? HUGGINGFACE_DEFAULTS.baseUrl,
    defaultModel: overrides.defaultModel ?? HUGGINGFACE_DEFAULTS.defaultModel,
    timeout: overrides.timeout ?? DEFAULT_TIMEOUTS,
  };
}

const HUGGINGFACE_MODELS: AIModel[] = [
  {
    id: "deepseek-ai/DeepSeek-R1:fastest",
    name: "DeepSeek R1",
    providerId: "huggingface",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 8192, contextWindow: 128_000 },
  },
  {
    id: "meta-llama/Llama-3.3-70B-Instruct",
    name: "Llama 3.3 70B Instruct",
    providerId: "huggingface",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 8192, contextWindow: 128_000 },
  },
  {
    id: "Qwen/Qwen2.5-72B-Instruct",
    name: "Qwen 2.5 72B Instruct",
    providerId: "huggingface",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 8192, contextWindow: 32_768 },
  },
  {
    id: "meta-llama/Llama-3.2-3B-Instruct",
    name: "Llama 3.2 3B Instruct",
    providerId: "huggingface",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 2048, contextWindow: 128_000 },
  },
];

const THINK_BLOCK = /<think>([\s\S]*?)<\/think>/g;

export const REASONING_HEADER = "Model reasoning:";
export const REASONING_RULE = "----------------";

export interface ReasoningSplit {
  reasoning: string;
  answer: string;
}

/** Separates `<think>` sections from the answer. Several sections are joined by blank lines. */
export function splitReasoning(content: string): ReasoningSplit {
  const sections = [...content.matchAll(THINK_BLOCK)].map((match) => (match[1] ?? "").trim());
  return {
    reasoning: sections.join("\n\n"),
    answer: content.replace(THINK_BLOCK, "").trim(),
  };
}

export function withReasoningBlock({ reasoning, answer }: ReasoningSplit): string {
  if (reasoning.length === 0) return answer;
  return [REASONING_HEADER, REASONING_RULE, reasoning, REASONING_RULE, "", answer].join("\n");
}

function toHuggingFaceMessage(role: MessageRole, content: string): ChatCompletionMessageParam {
  switch (role) {
    case "system":
      return { role: "system", content };
    case "assistant":
      return { role: "assistant", content };
    case "user":
      return { role: "user", content };
  }
}

export function toHuggingFaceRequest(request: AIRequest): ChatCompletionCreateParamsNonStreaming {
  const { parameters } = request;
  const messages: ChatCompletionMessageParam[] = [];
  if (request.systemPrompt) {
    messages.push({ role: "system", content: request.systemPrompt });
  }
  for (const message of withFormatInstructions(request.messages, parameters.responseFormat)) {
    messages.push(toHuggingFaceMessage(message.role, messageText(message.content)));
  }

  const body: ChatCompletionCreateParamsNonStreaming = {
    model: request.model,
    messages,
    temperature: parameters.temperature,
    max_tokens: parameters.maxTokens,
    top_p: parameters.topP,
  };
  if (parameters.frequencyPenalty !== undefined) body.frequency_penalty = parameters.frequencyPenalty;
  if (parameters.presencePenalty !== undefined) body.presence_penalty = parameters.presencePenalty;
  if (parameters.stopSequences.length > 0) body.stop = parameters.stopSequences;
  return body;
}

export function fromHuggingFaceResponse(completion: ChatCompletionReply, request: AIRequest): Result<AIResponse> {
  const choice = completion.choices[0];
  if (!choice) {
    return err(new ParseError("No choices in HuggingFace response"));
  }

  const split = splitReasoning(choice.message.content ?? "");
  // Format post-processing applies to the answer only; the reasoning block stays readable text
  const answer = processResponse(split.answer, request.parameters.responseFormat);

  const now = Date.now();
  const usage = completion.usage;
  return ok<AIResponse>({
    id: completion.id ? completion.id : `hf-${now}`,
    content: withReasoningBlock({ reasoning: split.reasoning, answer }),
    role: "assistant",
    model: completion.model,
    usage: usage
      ? tokenUsage(usage.prompt_tokens, usage.completion_tokens, usage.total_tokens)
      : tokenUsage(0, 0),
    finishReason: finishReasonFromChatCompletion(choice.finish_reason),
    metadata: split.reasoning.length > 0 ? { reasoning: split.reasoning } : {},
    timestamp: now,
    estimatedInputTokens: 0,
    estimatedOutputTokens: 0,
    toolUses: [],
  });
}

export class HuggingFaceProvider implements AIProvider {
  readonly providerId = "huggingface" as const;
  private client: OpenAI;
  private logger: Logger;

  constructor(
    http: HttpClient,
    readonly config: HuggingFaceConfig,
    private tokenCounter: TokenCounter,
    logger?: Logger,
  ) {
    this.client = createOpenAIClient(config, http);
    this.logger = (logger ?? new Logger({ service: "HuggingFaceProvider" })).child({ provider: this.providerId });
  }

  async sendMessage(request: AIRequest): Promise<Result<AIResponse>> {
    try {
      const estimatedInputTokens = this.tokenCounter.countTokensWithFormatting(request.messages, request.systemPrompt);
      this.logger.debug("Sending message", { model: request.model, estimatedInputTokens });

      const raw: unknown = await this.client.chat.completions.create(toHuggingFaceRequest(request), {
        signal: request.signal,
      });
      const completion = parseChatCompletion("HuggingFace", raw);
      if (!completion.ok) return completion;
      const mapped = fromHuggingFaceResponse(completion.value, request);
      if (!mapped.ok) return mapped;

      const estimatedOutputTokens = this.tokenCounter.countTokens(mapped.value.content);
      this.logger.info("Received response", {
        model: mapped.value.model,
        inputTokens: mapped.value.usage.inputTokens,
        outputTokens: mapped.value.usage.outputTokens,
        reasoning: mapped.value.metadata.reasoning !== undefined,
        estimatedInputTokens,
        estimatedOutputTokens,
      });

      return ok({ ...mapped.value, estimatedInputTokens, estimatedOutputTokens });
    } catch (error) {
      this.logger.error("HuggingFace request failed", error);
      return err(toChatCompletionError("HuggingFace", error));
    }
  }

  async getModels(): Promise<Result<AIModel[]>> {
    return ok(HUGGINGFACE_MODELS.map((model) => ({ ...model, capabilities: { ...model.capabilities } })));
  }

  validateConfig(): ValidationResult {
    return validateProviderConfig(this.config, "hf_");
  }
}
