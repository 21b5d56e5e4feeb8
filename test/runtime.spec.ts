import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { VertexApiError } from "../src/lib/errors.js";
import { createChatRuntime } from "../src/lib/runtime.js";
import type { VertexAnthropicTransport } from "../src/lib/vertex-api.js";
import { toSseFrame } from "../src/streams/chat-events.js";
import { reduceChatCompletionStream } from "../src/streams/chat-stream.js";
import type { AppConfig } from "../src/types/config.js";
import type { ChatCompletionRequest } from "../src/types/request.js";
import type { ChatStreamEvent } from "../src/types/api.js";
import { captureLogger, collect, fromArray, silentLogger, textStream, toolStream, wire } from "./helpers.js";

const WEATHER_TOOL = {
  name: "weather",
  input_schema: { type: "object", properties: { location: { type: "string" } } },
};

function createConfig(): AppConfig {
  const root = mkdtempSync(path.join(os.tmpdir(), "vertex-claude-runtime-"));
  const toolsConfigPath = path.join(root, "tools.yaml");
  writeFileSync(
    toolsConfigPath,
    [
      "tools:",
      "  - name: weather",
      "    input_schema:",
      "      type: object",
      "      properties:",
      "        location:",
      "          type: string",
    ].join("\n"),
    "utf8",
  );

  return {
    debug: false,
    port: 0,
    projectRoot: root,
    vertex: { projectId: "test-project", location: "us-east5" },
    chatOptions: {},
    toolsConfigPath,
    toolsEnabled: [],
    toolsDisabled: [],
  };
}

function createTransport(streams: string[][]) {
  const calls: Array<{ request: ChatCompletionRequest; model: string }> = [];
  const transport: VertexAnthropicTransport = {
    async chatCompletion(request, model) {
      calls.push({ request, model });
      return {
        id: "msg_5",
        type: "message",
        role: "assistant",
        model: "claude-3-haiku-20240307",
        content: [{ type: "text", text: "Hi there" }],
        stop_reason: "end_turn",
        stop_sequence: null,
        usage: { input_tokens: 4, output_tokens: 2 },
      };
    },
    chatCompletionStream(request, model) {
      calls.push({ request, model });
      return reduceChatCompletionStream(fromArray(streams.shift() ?? []), { logger: silentLogger });
    },
  };

  return { transport, calls };
}

describe("createChatRuntime", () => {
  it("streams session, text, tool use, usage and done events", async () => {
    const { transport, calls } = createTransport([toolStream]);
    const runtime = await createChatRuntime(createConfig(), silentLogger, { api: transport });

    const events = await collect(runtime.run({ input: "Weather?", threadId: "thread-1" }));

    expect(events).toEqual([
      { type: "session", threadId: "thread-1" },
      { type: "token", text: "Let me check." },
      { type: "tool_use", id: "t1", name: "Weather", input: { loc: "SF" } },
      { type: "usage", inputTokens: 10, outputTokens: 30 },
      { type: "done", finishReason: "stop", stopReason: "tool_use" },
    ]);
    expect(calls[0]?.model).toBe("claude-3-5-sonnet@20240620");
    expect(calls[0]?.request).toEqual({
      anthropic_version: "vertex-2023-10-16",
      messages: [{ role: "user", content: "Weather?" }],
      max_tokens: 500,
      stream: true,
      temperature: 0.8,
      top_k: 10,
      tools: [WEATHER_TOOL],
    });
  });

  it("continues a thread with tool results", async () => {
    const { transport, calls } = createTransport([toolStream, textStream]);
    const runtime = await createChatRuntime(createConfig(), silentLogger, { api: transport });

    await collect(runtime.run({ input: "Weather?", threadId: "thread-1" }));
    const events = await collect(
      runtime.run({ toolResults: [{ toolUseId: "t1", content: "Sunny" }], threadId: "thread-1" }),
    );

    expect(events.filter((event) => event.type === "token")).toEqual([
      { type: "token", text: "Hello" },
      { type: "token", text: " world" },
    ]);
    expect(calls[1]?.request.messages).toEqual([
      { role: "user", content: "Weather?" },
      {
        role: "assistant",
        content: [
          { type: "text", text: "Let me check." },
          { type: "tool_use", id: "t1", name: "Weather", input: { loc: "SF" } },
        ],
      },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "t1", content: "Sunny" }] },
    ]);
  });

  it("finishes with incomplete and keeps no history when message_stop never arrives", async () => {
    const { transport, calls } = createTransport([textStream.slice(0, 4), textStream]);
    const runtime = await createChatRuntime(createConfig(), silentLogger, { api: transport });

    const events = await collect(runtime.run({ input: "Hi", threadId: "thread-1" }));
    await collect(runtime.run({ input: "Again", threadId: "thread-1" }));

    expect(events).toEqual([
      { type: "session", threadId: "thread-1" },
      { type: "token", text: "Hello" },
      { type: "token", text: " world" },
      { type: "done", finishReason: "incomplete" },
    ]);
    expect(calls[1]?.request.messages).toEqual([{ role: "user", content: "Again" }]);
  });

  it("reports protocol violations as error events", async () => {
    const { transport } = createTransport([[wire.messageStart(), wire.textDelta(0, "x")]]);
    const runtime = await createChatRuntime(createConfig(), silentLogger, { api: transport });

    const events = await collect(runtime.run({ input: "Hi", threadId: "thread-1" }));

    expect(events).toEqual([
      { type: "session", threadId: "thread-1" },
      {
        type: "error",
        message: "text_delta received for a block that is not open",
        code: "STREAM_PROTOCOL_VIOLATION",
      },
      { type: "done", finishReason: "error" },
    ]);
  });

  it("reports endpoint failures with their error code", async () => {
    const transport: VertexAnthropicTransport = {
      async chatCompletion() {
        throw new VertexApiError(429, "quota exceeded", "test-endpoint");
      },
      async *chatCompletionStream() {
        throw new VertexApiError(429, "quota exceeded", "test-endpoint");
      },
    };
    const runtime = await createChatRuntime(createConfig(), silentLogger, { api: transport });

    const events = await collect(runtime.run({ input: "Hi", threadId: "thread-1" }));

    expect(events.slice(1)).toEqual([
      {
        type: "error",
        message: "Response exception, Status: [429], Body: [quota exceeded]",
        code: "VERTEX_API_ERROR",
      },
      { type: "done", finishReason: "error" },
    ]);
  });

  it("finishes with aborted when the client goes away mid-stream", async () => {
    const transport: VertexAnthropicTransport = {
      async chatCompletion() {
        throw new Error("not used");
      },
      async *chatCompletionStream(_request, _model, signal) {
        yield* reduceChatCompletionStream(
          fromArray([wire.messageStart(), wire.textStart(0), wire.textDelta(0, "Hi")]),
          { logger: silentLogger },
        );
        await new Promise<never>((_resolve, reject) => {
          if (signal?.aborted) {
            reject(new Error("This operation was aborted"));
            return;
          }
          signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")), { once: true });
        });
      },
    };
    const { logger, lines } = captureLogger();
    const runtime = await createChatRuntime(createConfig(), logger, { api: transport });
    const controller = new AbortController();

    const events: ChatStreamEvent[] = [];
    for await (const event of runtime.run({ input: "Hi", threadId: "thread-1", signal: controller.signal })) {
      events.push(event);
      if (event.type === "token") {
        controller.abort();
      }
    }

    expect(events).toEqual([
      { type: "session", threadId: "thread-1" },
      { type: "token", text: "Hi" },
      { type: "done", finishReason: "aborted" },
    ]);
    expect(lines.filter((line) => line.startsWith("[ERROR]"))).toEqual([]);
  });

  it("rejects a turn without input or tool results", async () => {
    const { transport, calls } = createTransport([]);
    const runtime = await createChatRuntime(createConfig(), silentLogger, { api: transport });

    const events = await collect(runtime.run({ threadId: "thread-1" }));

    expect(events[1]).toEqual({
      type: "error",
      message: "Either input or toolResults is required",
      code: "INVALID_REQUEST",
    });
    await expect(runtime.complete({ input: "   " })).rejects.toMatchObject({ code: "INVALID_REQUEST" });
    expect(calls).toHaveLength(0);
  });

  it("completes a blocking turn and stores it in the thread", async () => {
    const { transport, calls } = createTransport([textStream]);
    const runtime = await createChatRuntime(createConfig(), silentLogger, { api: transport });

    const result = await runtime.complete({
      input: "Hi",
      threadId: "thread-2",
      model: "claude-3-haiku@20240307",
      system: "Be brief",
    });
    await collect(runtime.run({ input: "And now?", threadId: "thread-2" }));

    expect(result.threadId).toBe("thread-2");
    expect(result.response.content).toEqual([{ type: "text", text: "Hi there" }]);
    expect(calls[0]?.model).toBe("claude-3-haiku@20240307");
    expect(calls[0]?.request).toMatchObject({ stream: false, system: "Be brief" });
    expect(calls[1]?.request.messages).toEqual([
      { role: "user", content: "Hi" },
      { role: "assistant", content: [{ type: "text", text: "Hi there" }] },
      { role: "user", content: "And now?" },
    ]);
  });
});

describe("toSseFrame", () => {
  it("writes the event type and the remaining fields as JSON data", () => {
    expect(toSseFrame({ type: "token", text: "A" })).toBe('event: token\ndata: {"text":"A"}\n\n');
  });
});
