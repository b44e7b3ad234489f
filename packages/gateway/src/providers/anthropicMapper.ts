import { z } from "zod";
import { processResponse } from "../formatting/responseFormatter";
import {
  tokenUsage,
  type AIRequest,
  type AIResponse,
  type ContentBlock,
  type FinishReason,
  type Message,
  type ToolUse,
} from "../types";
import { withFormatInstructions } from "./shared";

// Request side of the Messages API. Field names follow the wire format.

export type ClaudeContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: unknown }
  | { type: "tool_result"; tool_use_id: string; content: string };

export interface ClaudeApiMessage {
  role: "user" | "assistant";
  content: string | ClaudeContentBlock[];
}

export interface ClaudeApiTool {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface ClaudeApiRequest {
  model: string;
  messages: ClaudeApiMessage[];
  max_tokens: number;
  temperature: number;
  top_p?: number;
  top_k?: number;
  stop_sequences?: string[];
  system?: string;
  tools?: ClaudeApiTool[];
}

// Response side, validated on arrival.

export const claudeApiContentSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  id: z.string().optional(),
  name: z.string().optional(),
  input: z.unknown().optional(),
});

export const claudeApiResponseSchema = z.object({
  id: z.string(),
  type: z.string(),
  role: z.string(),
  content: z.array(claudeApiContentSchema),
  model: z.string(),
  stop_reason: z.string().nullable(),
  stop_sequence: z.string().nullable().optional(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

export const claudeApiErrorSchema = z.object({
  type: z.string(),
  error: z.object({
    type: z.string(),
    message: z.string(),
  }),
});

export type ClaudeApiResponse = z.infer<typeof claudeApiResponseSchema>;

function toClaudeBlock(block: ContentBlock): ClaudeContentBlock {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "tool_use":
      return { type: "tool_use", id: block.id, name: block.name, input: block.input };
    case "tool_result":
      return { type: "tool_result", tool_use_id: block.toolUseId, content: block.content };
  }
}

function toClaudeMessage(message: Message): ClaudeApiMessage {
  const { content } = message;
  const role = message.role === "assistant" ? "assistant" : "user";
  switch (content.type) {
    case "text":
      return { role, content: content.text };
    case "multimodal":
      return { role, content: content.text ?? "" };
    case "structured":
      return { role, content: content.blocks.map(toClaudeBlock) };
  }
}

export function toClaudeRequest(request: AIRequest): ClaudeApiRequest {
  const { parameters } = request;

  // The Messages API has no system role inside the conversation
  const folded = request.messages.map((message): Message =>
    message.role === "system" ? { ...message, role: "user" } : message,
  );
  const messages = withFormatInstructions(folded, parameters.responseFormat).map(toClaudeMessage);

  const body: ClaudeApiRequest = {
    model: request.model,
    messages,
    max_tokens: parameters.maxTokens,
    temperature: parameters.temperature,
  };

  // Newer models reject temperature and top_p together; 1.0 is the neutral value
  if (parameters.topP !== 1.0) body.top_p = parameters.topP;
  if (parameters.topK !== undefined) body.top_k = parameters.topK;
  if (parameters.stopSequences.length > 0) body.stop_sequences = parameters.stopSequences;
  if (request.systemPrompt) body.system = request.systemPrompt;
  if (request.tools.length > 0) {
    body.tools = request.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    }));
  }

  return body;
}

export function mapStopReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
      return "stop";
    case "max_tokens":
      return "max_tokens";
    case "tool_use":
      return "tool_use";
    default:
      return "stop";
  }
}

/** Tool invocations in the reply. Blocks missing an id, name or input are dropped. */
export function extractToolUses(response: ClaudeApiResponse): ToolUse[] {
  const toolUses: ToolUse[] = [];
  for (const block of response.content) {
    if (block.type !== "tool_use") continue;
    if (block.id === undefined || block.name === undefined) continue;
    if (block.input === undefined || block.input === null) continue;
    toolUses.push({ id: block.id, name: block.name, input: block.input });
  }
  return toolUses;
}

export function fromClaudeResponse(response: ClaudeApiResponse, request: AIRequest): AIResponse {
  const text = response.content.find((block) => block.type === "text")?.text ?? "";

  return {
    id: response.id,
    content: processResponse(text, request.parameters.responseFormat),
    role: "assistant",
    model: response.model,
    usage: tokenUsage(response.usage.input_tokens, response.usage.output_tokens),
    finishReason: mapStopReason(response.stop_reason),
    metadata: {
      type: response.type,
      stop_sequence: response.stop_sequence ?? "",
    },
    timestamp: Date.now(),
    estimatedInputTokens: 0,
    estimatedOutputTokens: 0,
    toolUses: extractToolUses(response),
  };
}
