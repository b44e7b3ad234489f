import { describe, expect, it } from "vitest";
import { fakeHttpClient, jsonResponse, WordTokenCounter } from "../testing/fakes";
import { resolveParameters, textMessage, type AIRequest, type Message } from "../types";
import { ClaudeProvider, claudeConfig } from "./anthropic";
import { mapStopReason, toClaudeRequest } from "./anthropicMapper";

const MODEL = "claude-sonnet-4-5-20250929";

function request(messages: Message[], overrides: Partial<AIRequest> = {}): AIRequest {
  return {
    messages,
    model: MODEL,
    parameters: resolveParameters(),
    metadata: {},
    tools: [],
    ...overrides,
  };
}

function claudeBody(overrides: Record<string, unknown> = {}) {
  return {
    id: "msg_1",
    type: "message",
    role: "assistant",
    content: [{ type: "text", text: "Hi! How can I help?" }],
    model: MODEL,
    stop_reason: "end_turn",
    stop_sequence: null,
    usage: { input_tokens: 9, output_tokens: 7 },
    ...overrides,
  };
}

function provider(http: ReturnType<typeof fakeHttpClient>["http"], apiKey = "test-key") {
  return new ClaudeProvider(http, claudeConfig(apiKey), new WordTokenCounter());
}

describe("ClaudeProvider.sendMessage", () => {
  it("posts to the messages endpoint and maps the reply", async () => {
    const { http, calls } = fakeHttpClient(jsonResponse(200, claudeBody()));

    const result = await provider(http).sendMessage(request([textMessage("user", "Hello there", 1)]));

    expect(calls).toHaveLength(1);
    const call = calls[0];
    expect(call?.url).toBe("https://api.anthropic.com/v1/messages");
    expect(call?.method).toBe("POST");
    expect(call?.headers.get("x-api-key")).toBe("test-key");
    expect(call?.headers.get("anthropic-version")).toBe("2023-06-01");
    expect(call?.headers.get("content-type")).toBe("application/json");
    expect(call?.body).toEqual({
      model: MODEL,
      messages: [{ role: "user", content: "Hello there" }],
      max_tokens: 4096,
      temperature: 1,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.id).toBe("msg_1");
    expect(result.value.content).toBe("Hi! How can I help?");
    expect(result.value.usage).toEqual({ inputTokens: 9, outputTokens: 7, totalTokens: 16 });
    expect(result.value.finishReason).toBe("stop");
    expect(result.value.metadata).toEqual({ type: "message", stop_sequence: "" });
    // 2 words + 4 per message + 3 for the request
    expect(result.value.estimatedInputTokens).toBe(9);
    expect(result.value.estimatedOutputTokens).toBe(5);
    expect(result.value.toolUses).toEqual([]);
  });

  it("extracts complete tool_use blocks and drops incomplete ones", async () => {
    const { http } = fakeHttpClient(
      jsonResponse(
        200,
        claudeBody({
          content: [
            { type: "text", text: "Checking the weather" },
            { type: "tool_use", id: "tu_1", name: "get_weather", input: { city: "Paris" } },
            { type: "tool_use", name: "missing_id", input: {} },
          ],
          stop_reason: "tool_use",
        }),
      ),
    );

    const result = await provider(http).sendMessage(request([textMessage("user", "Weather in Paris?")]));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.content).toBe("Checking the weather");
    expect(result.value.finishReason).toBe("tool_use");
    expect(result.value.toolUses).toEqual([{ id: "tu_1", name: "get_weather", input: { city: "Paris" } }]);
  });

  it("pretty-prints fenced JSON when the JSON format is requested", async () => {
    const { http, calls } = fakeHttpClient(
      jsonResponse(200, claudeBody({ content: [{ type: "text", text: '```json\n{"title":"t","answer":"a"}\n```' }] })),
    );

    const result = await provider(http).sendMessage(
      request([textMessage("user", "Where was Rome?")], { parameters: resolveParameters({ responseFormat: "json" }) }),
    );

    expect(result.ok && result.value.content).toBe('{\n  "title": "t",\n  "answer": "a"\n}');
    expect(calls[0]?.body).toMatchObject({
      messages: [{ role: "user", content: expect.stringMatching(/^User request: Where was Rome\?\n/) }],
    });
  });

  it("reports the vendor error message", async () => {
    const { http } = fakeHttpClient(
      jsonResponse(401, { type: "error", error: { type: "authentication_error", message: "invalid x-api-key" } }),
    );

    const result = await provider(http).sendMessage(request([textMessage("user", "Hi")]));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("network");
    expect(result.error.message).toBe("Claude API Error: invalid x-api-key");
  });

  it("falls back to the raw body when the error is not in vendor shape", async () => {
    const { http } = fakeHttpClient(new Response("Bad gateway", { status: 502 }));

    const result = await provider(http).sendMessage(request([textMessage("user", "Hi")]));

    expect(!result.ok && result.error.message).toBe("Claude API Error (502): Bad gateway");
  });

  it("turns transport failures into network errors", async () => {
    const { http } = fakeHttpClient(new TypeError("fetch failed"));

    const result = await provider(http).sendMessage(request([textMessage("user", "Hi")]));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("network");
    expect(result.error.message).toBe("Claude API error: fetch failed");
  });

  it("rejects a success body that does not match the messages schema", async () => {
    const { http } = fakeHttpClient(jsonResponse(200, { unexpected: true }));

    const result = await provider(http).sendMessage(request([textMessage("user", "Hi")]));

    expect(!result.ok && result.error.kind).toBe("parse");
  });
});

describe("toClaudeRequest", () => {
  it("folds system messages into user turns and sends the system prompt separately", () => {
    const body = toClaudeRequest(
      request([textMessage("system", "Be brief"), textMessage("user", "Hi")], { systemPrompt: "You are helpful" }),
    );

    expect(body.system).toBe("You are helpful");
    expect(body.messages).toEqual([
      { role: "user", content: "Be brief" },
      { role: "user", content: "Hi" },
    ]);
  });

  it("leaves the history alone when the last message is from the assistant", () => {
    const body = toClaudeRequest(
      request([textMessage("user", "Hi"), textMessage("assistant", "Hello")], {
        parameters: resolveParameters({ responseFormat: "xml" }),
      }),
    );

    expect(body.messages).toEqual([
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello" },
    ]);
  });

  it("maps structured blocks and forwards optional parameters", () => {
    const body = toClaudeRequest(
      request(
        [
          {
            role: "assistant",
            content: { type: "structured", blocks: [{ type: "tool_use", id: "tu_1", name: "lookup", input: { q: 1 } }] },
            timestamp: 1,
          },
          {
            role: "user",
            content: { type: "structured", blocks: [{ type: "tool_result", toolUseId: "tu_1", content: "42" }] },
            timestamp: 2,
          },
        ],
        {
          parameters: resolveParameters({ topP: 0.9, topK: 40, stopSequences: ["END"] }),
          tools: [{ name: "lookup", description: "Looks things up", inputSchema: { type: "object" } }],
        },
      ),
    );

    expect(body.messages).toEqual([
      { role: "assistant", content: [{ type: "tool_use", id: "tu_1", name: "lookup", input: { q: 1 } }] },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "tu_1", content: "42" }] },
    ]);
    expect(body.top_p).toBe(0.9);
    expect(body.top_k).toBe(40);
    expect(body.stop_sequences).toEqual(["END"]);
    expect(body.tools).toEqual([{ name: "lookup", description: "Looks things up", input_schema: { type: "object" } }]);
  });
});

describe("mapStopReason", () => {
  it.each([
    ["end_turn", "stop"],
    ["stop_sequence", "stop"],
    ["max_tokens", "max_tokens"],
    ["tool_use", "tool_use"],
    ["pause_turn", "stop"],
    [null, "stop"],
  ] as const)("maps %s to %s", (reason, expected) => {
    expect(mapStopReason(reason)).toBe(expected);
  });
});

describe("ClaudeProvider config", () => {
  const { http } = fakeHttpClient();

  it("accepts a key over https", () => {
    expect(provider(http).validateConfig()).toEqual({ valid: true });
  });

  it("requires a key and an https endpoint", () => {
    const claude = new ClaudeProvider(
      http,
      claudeConfig("  ", { baseUrl: "http://localhost:9999/v1/messages" }),
      new WordTokenCounter(),
    );
    expect(claude.validateConfig()).toEqual({
      valid: false,
      errors: ["API key is required", "Base URL must use HTTPS"],
    });
  });

  it("lists the static model catalog", async () => {
    const models = await provider(http).getModels();
    expect(models.ok && models.value.map((model) => model.id)).toEqual([
      "claude-sonnet-4-5-20250929",
      "claude-haiku-4-5-20251001",
      "claude-opus-4-1-20250805",
    ]);
  });
});
