// In-process stand-ins shared by the test suites.
import { ok, type Result, type ValidationResult } from "../errors";
import type { TokenCounter } from "../tokenizer/tokenCounter";
import {
  messageText,
  tokenUsage,
  type AIModel,
  type AIProvider,
  type AIRequest,
  type AIResponse,
  type HttpClient,
  type Message,
  type ProviderConfig,
  type ProviderType,
} from "../types";

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/** Replies with the queued responses in order; a queued Error is thrown instead. */
export function fakeHttpClient(...queue: Array<Response | Error>): { http: HttpClient; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const http: HttpClient = async (input, init) => {
    const rawBody = init?.body;
    calls.push({
      url: urlOf(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof rawBody === "string" ? JSON.parse(rawBody) : undefined,
    });
    const next = queue.shift();
    if (!next) throw new Error("fakeHttpClient: no response queued");
    if (next instanceof Error) throw next;
    return next;
  };
  return { http, calls };
}

/** Counts whitespace-separated words, so expected values are easy to derive by hand. */
export class WordTokenCounter implements TokenCounter {
  countTokens(text: string): number {
    return text.split(/\s+/).filter((word) => word.length > 0).length;
  }

  countMessageTokens(messages: Message[]): number {
    return messages.reduce((sum, message) => sum + this.countTokens(messageText(message.content)), 0);
  }

  countTokensWithFormatting(messages: Message[], systemPrompt?: string): number {
    const system = systemPrompt !== undefined ? this.countTokens(systemPrompt) + 4 : 0;
    return system + this.countMessageTokens(messages) + messages.length * 4 + 3;
  }
}

export function fakeResponse(content: string, overrides: Partial<AIResponse> = {}): AIResponse {
  return {
    id: "resp-1",
    content,
    role: "assistant",
    model: "fake-model",
    usage: tokenUsage(10, 5),
    finishReason: "stop",
    metadata: {},
    timestamp: 0,
    estimatedInputTokens: 12,
    estimatedOutputTokens: 6,
    toolUses: [],
    ...overrides,
  };
}

export type FakeReply = (request: AIRequest) => Result<AIResponse> | Promise<Result<AIResponse>>;

/** Provider that records requests and answers through `reply`. */
export class FakeProvider implements AIProvider {
  readonly providerId: ProviderType;
  readonly requests: AIRequest[] = [];
  reply: FakeReply;
  models: AIModel[] = [];
  validation: ValidationResult = { valid: true };

  constructor(
    readonly config: ProviderConfig,
    reply?: FakeReply,
  ) {
    this.providerId = config.type;
    this.reply = reply ?? ((request) => ok(fakeResponse(`echo: ${lastText(request)}`, { model: request.model })));
  }

  async sendMessage(request: AIRequest): Promise<Result<AIResponse>> {
    this.requests.push(request);
    return this.reply(request);
  }

  async getModels(): Promise<Result<AIModel[]>> {
    return ok(this.models);
  }

  validateConfig(): ValidationResult {
    return this.validation;
  }
}

function lastText(request: AIRequest): string {
  const last = request.messages[request.messages.length - 1];
  return last ? messageText(last.content) : "";
}
