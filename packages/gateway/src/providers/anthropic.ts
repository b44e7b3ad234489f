import { AIError, NetworkError, ParseError, ok, err, type Result, type ValidationResult } from "../errors";
import type { TokenCounter } from "../tokenizer/tokenCounter";
import type { AIModel, AIProvider, AIRequest, AIResponse, ClaudeConfig, HttpClient } from "../types";
import { DEFAULT_TIMEOUTS } from "../types";
import { Logger } from "../utils/logger";
import { claudeApiErrorSchema, claudeApiResponseSchema, fromClaudeResponse, toClaudeRequest } from "./anthropicMapper";
import { parseJsonOrUndefined, readBodyText, requestSignal, validateProviderConfig } from "./shared";

export const CLAUDE_DEFAULTS = {
  baseUrl: "https://api.anthropic.com/v1/messages",
  apiVersion: "2023-06-01",
  defaultModel: "claude-sonnet-4-5-20250929",
} as const;

export function claudeConfig(apiKey: string, overrides: Partial<Omit<ClaudeConfig, "type">> = {}): ClaudeConfig {
  return {
    type: "claude",
    apiKey,
    baseUrl: overrides.baseUrl ?? CLAUDE_DEFAULTS.baseUrl,
    apiVersion: overrides.apiVersion ?? CLAUDE_DEFAULTS.apiVersion,
    defaultModel: overrides.defaultModel ?? CLAUDE_DEFAULTS.defaultModel,
    timeout: overrides.timeout ?? DEFAULT_TIMEOUTS,
  };
}

// The Messages API has no models endpoint we rely on, so the catalog is fixed.
const CLAUDE_MODELS: AIModel[] = [
  {
    id: "claude-sonnet-4-5-20250929",
    name: "Claude Sonnet 4.5",
    providerId: "claude",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 8192, contextWindow: 200_000 },
  },
  {
    id: "claude-haiku-4-5-20251001",
    name: "Claude Haiku 4.5",
    providerId: "claude",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 8192, contextWindow: 200_000 },
  },
  {
    id: "claude-opus-4-1-20250805",
    name: "Claude Opus 4.1",
    providerId: "claude",
    capabilities: { supportsVision: false, supportsStreaming: true, maxTokens: 16384, contextWindow: 200_000 },
  },
];

export class ClaudeProvider implements AIProvider {
  readonly providerId = "claude" as const;
  private logger: Logger;

  constructor(
    private http: HttpClient,
    readonly config: ClaudeConfig,
    private tokenCounter: TokenCounter,
    logger?: Logger,
  ) {
    this.logger = (logger ?? new Logger({ service: "ClaudeProvider" })).child({ provider: this.providerId });
  }

  async sendMessage(request: AIRequest): Promise<Result<AIResponse>> {
    try {
      const estimatedInputTokens = this.tokenCounter.countTokensWithFormatting(request.messages, request.systemPrompt);
      this.logger.debug("Sending message", { model: request.model, estimatedInputTokens });

      const body = toClaudeRequest(request);

      const response = await this.http(this.config.baseUrl, {
        method: "POST",
        headers: {
          "x-api-key": this.config.apiKey,
          "anthropic-version": this.config.apiVersion,
          "content-type": "application/json",
        },
        body: JSON.stringify(body),
        signal: requestSignal(this.config.timeout.requestTimeoutMs, request.signal),
      });

      if (!response.ok) {
        const errorBody = await readBodyText(response);
        this.logger.warn("Claude API error response", { status: response.status, body: errorBody });

        const parsedError = claudeApiErrorSchema.safeParse(parseJsonOrUndefined(errorBody));
        const message = parsedError.success
          ? `Claude API Error: ${parsedError.data.error.message}`
          : `Claude API Error (${response.status}): ${errorBody}`;
        return err(new NetworkError(message, { status: response.status }));
      }

      const raw: unknown = await response.json().catch((error: unknown) => {
        throw new ParseError(`Claude API returned invalid JSON: ${String(error)}`);
      });
      const parsed = claudeApiResponseSchema.safeParse(raw);
      if (!parsed.success) {
        return err(new ParseError(`Unexpected Claude API response: ${parsed.error.message}`));
      }

      const mapped = fromClaudeResponse(parsed.data, request);
      const estimatedOutputTokens = this.tokenCounter.countTokens(mapped.content);

      this.logger.info("Received response", {
        model: mapped.model,
        inputTokens: mapped.usage.inputTokens,
        outputTokens: mapped.usage.outputTokens,
        estimatedInputTokens,
        estimatedOutputTokens,
      });

      return ok({ ...mapped, estimatedInputTokens, estimatedOutputTokens });
    } catch (error) {
      this.logger.error("Claude request failed", error);
      if (error instanceof AIError) return err(error);
      const message = error instanceof Error ? error.message : String(error);
      return err(new NetworkError(`Claude API error: ${message}`, { cause: error }));
    }
  }

  async getModels(): Promise<Result<AIModel[]>> {
    return ok(CLAUDE_MODELS.map((model) => ({ ...model, capabilities: { ...model.capabilities } })));
  }

  validateConfig(): ValidationResult {
    return validateProviderConfig(this.config);
  }
}
