import type OpenAI from "openai";
import type {
  ChatCompletionContentPart,
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
  type ImageContent,
  type Message,
  type OpenAIConfig,
  type ToolUse,
} from "../types";
import { Logger } from "../utils/logger";
import {
  createOpenAIClient,
  parseChatCompletion,
  toChatCompletionError,
  type ChatCompletionReply,
} from "./openaiClient";
import {
  finishReasonFromChatCompletion,
  parseJsonOrUndefined,
  validateProviderConfig,
  withFormatInstructions,
} from "./shared";

export const OPENAI_DEFAULTS = {
  baseUrl: "https://api.openai.com/v1",
  defaultModel: "gpt-5-mini",
} as const;

export function openAIConfig(apiKey: string, overrides: Partial<Omit<OpenAIConfig, "type">> = {}): OpenAIConfig {
  return {
    type: "openai",
    apiKey,
    baseUrl: overrides.baseUrl ?? OPENAI_DEFAULTS.baseUrl,
    organization: overrides.organization,
    projectId: overrides.projectId,
    defaultModel: overrides.defaultModel ?? OPENAI_DEFAULTS.defaultModel,
    timeout: overrides.timeout ?? DEFAULT_TIMEOUTS,
  };
}

const OPENAI_MODELS: AIModel[] = [
  {
    id: "gpt-5-nano",
    name: "GPT-5 Nano",
    providerId: "openai",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 4096, contextWindow: 128_000 },
  },
  {
    id: "gpt-5-mini",
    name: "GPT-5 Mini",
    providerId: "openai",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 8192, contextWindow: 128_000 },
  },
  {
    id: "gpt-5",
    name: "GPT-5",
    providerId: "openai",
    capabilities: { supportsVision: true, supportsStreaming: true, maxTokens: 16384, contextWindow: 200_000 },
  },
  {
    id: "gpt-5-pro",
    name: "GPT-5 Pro",
    providerId: "openai",
    capabilities: { supportsVision: true, supportsStreaming: true, maxTokens: 32768, contextWindow: 200_000 },
  },
];

// gpt-5 models only accept the default sampling settings and the newer token limit field
export function isGpt5Model(model: string): boolean {
  return model.startsWith("gpt-5");
}

function imageUrl(image: ImageContent): string | undefined {
  switch (image.source) {
    case "url":
      return image.data;
    case "base64":
      return `data:${image.mimeType};base64,${image.data}`;
    case "local_file":
      return undefined;
  }
}

export function toOpenAIMessages(message: Message): ChatCompletionMessageParam[] {
  const { content } = message;

  if (message.role === "system") {
    return [{ role: "system", content: messageText(content) }];
  }

  if (message.role === "assistant") {
    if (content.type !== "structured") {
      return [{ role: "assistant", content: messageText(content) }];
    }
    const text = messageText(content);
    const toolCalls = content.blocks.flatMap((block) =>
      block.type === "tool_use"
        ? [
            {
              id: block.id,
              type: "function" as const,
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            },
          ]
        : [],
    );
    if (toolCalls.length === 0) return [{ role: "assistant", content: text }];
    return [{ role: "assistant", content: text.length > 0 ? text : null, tool_calls: toolCalls }];
  }

  switch (content.type) {
    case "text":
      return [{ role: "user", content: content.text }];
    case "multimodal": {
      const parts: ChatCompletionContentPart[] = [];
      if (content.text) parts.push({ type: "text", text: content.text });
      for (const image of content.images) {
        const url = imageUrl(image);
        if (url !== undefined) parts.push({ type: "image_url", image_url: { url } });
      }
      return [{ role: "user", content: parts }];
    }
    case "structured": {
      const params: ChatCompletionMessageParam[] = [];
      const texts: string[] = [];
      for (const block of content.blocks) {
        if (block.type === "tool_result") {
          params.push({ role: "tool", tool_call_id: block.toolUseId, content: block.content });
        } else if (block.type === "text") {
          texts.push(block.text);
        }
      }
      if (texts.length > 0) params.push({ role: "user", content: texts.join("\n") });
      return params;
    }
  }
}

export function toOpenAIRequest(request: AIRequest): ChatCompletionCreateParamsNonStreaming {
  const { parameters } = request;
  const messages: ChatCompletionMessageParam[] = [];
  if (request.systemPrompt) {
    messages.push({ role: "system", content: request.systemPrompt });
  }
  for (const message of withFormatInstructions(request.messages, parameters.responseFormat)) {
    messages.push(...toOpenAIMessages(message));
  }

  const body: ChatCompletionCreateParamsNonStreaming = { model: request.model, messages };

  if (isGpt5Model(request.model)) {
    body.max_completion_tokens = parameters.maxTokens;
  } else {
    body.max_tokens = parameters.maxTokens;
    body.temperature = parameters.temperature;
    body.top_p = parameters.topP;
  }
  if (parameters.frequencyPenalty !== undefined) body.frequency_penalty = parameters.frequencyPenalty;
  if (parameters.presencePenalty !== undefined) body.presence_penalty = parameters.presencePenalty;
  if (parameters.stopSequences.length > 0) body.stop = parameters.stopSequences;
  if (request.tools.length > 0) {
    body.tools = request.tools.map((tool) => ({
      type: "function" as const,
      function: { name: tool.name, description: tool.description, parameters: tool.inputSchema },
    }));
  }

  return body;
}

/** Function tool calls whose arguments parse as JSON. */
export function extractToolCalls(completion: ChatCompletionReply): ToolUse[] {
  const calls = completion.choices[0]?.message.tool_calls ?? [];
  return calls.flatMap((call) => {
    if (call.type !== "function" || call.function === undefined) return [];
    const input = parseJsonOrUndefined(call.function.arguments);
    return input === undefined ? [] : [{ id: call.id, name: call.function.name, input }];
  });
}

export function fromOpenAIResponse(completion: ChatCompletionReply, request: AIRequest): Result<AIResponse> {
  const choice = completion.choices[0];
  if (!choice) {
    return err(new ParseError("No choices in OpenAI response"));
  }

  const usage = completion.usage;
  return ok({
    id: completion.id ?? "",
    content: processResponse(choice.message.content ?? "", request.parameters.responseFormat),
    role: "assistant",
    model: completion.model,
    usage: usage
      ? tokenUsage(usage.prompt_tokens, usage.completion_tokens, usage.total_tokens)
      : tokenUsage(0, 0),
    finishReason: finishReasonFromChatCompletion(choice.finish_reason),
    metadata: {
      created: completion.created === undefined ? "" : String(completion.created),
      system_fingerprint: completion.system_fingerprint ?? "",
    },
    timestamp: Date.now(),
    estimatedInputTokens: 0,
    estimatedOutputTokens: 0,
    toolUses: extractToolCalls(completion),
  });
}

export class OpenAIProvider implements AIProvider {
  readonly providerId = "openai" as const;
  private client: OpenAI;
  private logger: Logger;

  constructor(
    http: HttpClient,
    readonly config: OpenAIConfig,
    private tokenCounter: TokenCounter,
    logger?: Logger,
  ) {
    this.client = createOpenAIClient(config, http);
    this.logger = (logger ?? new Logger({ service: "OpenAIProvider" })).child({ provider: this.providerId });
  }

  async sendMessage(request: AIRequest): Promise<Result<AIResponse>> {
    try {
      const estimatedInputTokens = this.tokenCounter.countTokensWithFormatting(request.messages, request.systemPrompt);
      this.logger.debug("Sending message", { model: request.model, estimatedInputTokens });

      const raw: unknown = await this.client.chat.completions.create(toOpenAIRequest(request), {
        signal: request.signal,
      });
      const completion = parseChatCompletion("OpenAI", raw);
      if (!completion.ok) return completion;
      const mapped = fromOpenAIResponse(completion.value, request);
      if (!mapped.ok) return mapped;

      const estimatedOutputTokens = this.tokenCounter.countTokens(mapped.value.content);
      this.logger.info("Received response", {
        model: mapped.value.model,
        inputTokens: mapped.value.usage.inputTokens,
        outputTokens: mapped.value.usage.outputTokens,
        estimatedInputTokens,
        estimatedOutputTokens,
      });

      return ok({ ...mapped.value, estimatedInputTokens, estimatedOutputTokens });
    } catch (error) {
      this.logger.error("OpenAI request failed", error);
      return err(toChatCompletionError("OpenAI", error));
    }
  }

  async getModels(): Promise<Result<AIModel[]>> {
    return ok(OPENAI_MODELS.map((model) => ({ ...model, capabilities: { ...model.capabilities } })));
  }

  validateConfig(): ValidationResult {
    return validateProviderConfig(this.config, "sk-");
  }
}
