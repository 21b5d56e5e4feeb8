import { randomUUID } from "node:crypto";

import { loadToolsConfig } from "../config/tools.js";
import { streamChatEvents } from "../streams/chat-events.js";
import type { ChatRequest, ChatStreamEvent } from "../types/api.js";
import type { AppConfig } from "../types/config.js";
import type { AnthropicMessage, RequestContentBlock } from "../types/request.js";
import type { ChatCompletionResponse } from "../types/stream.js";
import { AdapterError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  buildChatCompletionRequest,
  defaultChatOptions,
  mergeChatOptions,
  type ResolvedChatOptions,
} from "./request.js";
import {
  createGoogleAccessTokenProvider,
  staticAccessToken,
  VertexAnthropicApi,
  type VertexAnthropicTransport,
} from "./vertex-api.js";

export interface ChatRunInput extends ChatRequest {
  signal?: AbortSignal;
}

export interface ChatRuntime {
  run(input: ChatRunInput): AsyncGenerator<ChatStreamEvent>;
  complete(input: ChatRunInput): Promise<{ threadId: string; response: ChatCompletionResponse }>;
  close(): Promise<void>;
}

function toUserMessage(input: ChatRunInput): AnthropicMessage {
  const blocks: RequestContentBlock[] = (input.toolResults ?? []).map((result): RequestContentBlock => ({
    type: "tool_result",
    tool_use_id: result.toolUseId,
    content: result.content,
    ...(result.isError ? { is_error: true } : {}),
  }));
  const text = input.input?.trim();

  if (blocks.length === 0) {
    if (!text) {
      throw new AdapterError("INVALID_REQUEST", "Either input or toolResults is required");
    }
    return { role: "user", content: text };
  }

  if (text) {
    blocks.push({ type: "text", text });
  }
  return { role: "user", content: blocks };
}

function toAssistantMessage(response: ChatCompletionResponse): AnthropicMessage {
  return {
    role: "assistant",
    content: response.content.map((block): RequestContentBlock =>
      block.type === "text"
        ? { type: "text", text: block.text }
        : { type: "tool_use", id: block.id, name: block.name, input: structuredClone(block.input) },
    ),
  };
}

export function createVertexTransport(config: AppConfig, logger: Logger): VertexAnthropicTransport {
  return new VertexAnthropicApi({
    projectId: config.vertex.projectId,
    location: config.vertex.location,
    tokenProvider: config.vertex.accessToken
      ? staticAccessToken(config.vertex.accessToken)
      : createGoogleAccessTokenProvider(),
    logger,
    ...(config.vertex.baseUrl ? { baseUrl: config.vertex.baseUrl } : {}),
  });
}

export async function createChatRuntime(
  config: AppConfig,
  logger: Logger,
  options?: { api?: VertexAnthropicTransport },
): Promise<ChatRuntime> {
  const toolsConfig = loadToolsConfig({
    configPath: config.toolsConfigPath,
    enabledTools: config.toolsEnabled,
    disabledTools: config.toolsDisabled,
    logger,
  });

  const api = options?.api ?? createVertexTransport(config, logger.child("vertex"));
  const defaults = defaultChatOptions({
    ...config.chatOptions,
    ...(toolsConfig.tools.length > 0 ? { tools: toolsConfig.tools } : {}),
  });
  const threads = new Map<string, AnthropicMessage[]>();

  logger.info("Chat runtime initialized", {
    projectId: config.vertex.projectId,
    location: config.vertex.location,
    model: defaults.model,
    tools: toolsConfig.enabledTools,
    sessionMemory: "in-memory",
  });

  function prepare(input: ChatRunInput, stream: boolean) {
    const threadId = input.threadId?.trim() || randomUUID();
    const messages = [...(threads.get(threadId) ?? []), toUserMessage(input)];
    const chatOptions: ResolvedChatOptions = mergeChatOptions(
      input.model ? { model: input.model } : undefined,
      defaults,
    );

    return {
      threadId,
      messages,
      model: chatOptions.model,
      request: buildChatCompletionRequest({
        messages,
        chatOptions,
        stream,
        ...(input.system ? { system: input.system } : {}),
      }),
    };
  }

  function commitTurn(threadId: string, messages: AnthropicMessage[], response: ChatCompletionResponse): void {
    if (response.content.length === 0) {
      logger.debug("Empty assistant turn not stored", { threadId });
      return;
    }
    threads.set(threadId, [...messages, toAssistantMessage(response)]);
  }

  return {
    async *run(input: ChatRunInput): AsyncGenerator<ChatStreamEvent> {
      const threadId = input.threadId?.trim() || randomUUID();

      yield {
        type: "session",
        threadId,
      };

      try {
        const prepared = prepare({ ...input, threadId }, true);

        yield* streamChatEvents({
          responses: api.chatCompletionStream(prepared.request, prepared.model, input.signal),
          threadId,
          debug: config.debug,
          logger,
          onComplete: (response) => commitTurn(threadId, prepared.messages, response),
          ...(input.signal ? { signal: input.signal } : {}),
        });
      } catch (error) {
        if (input.signal?.aborted) {
          logger.info("Chat stream aborted by client", { threadId });
          yield {
            type: "done",
            finishReason: "aborted",
          };
          return;
        }

        logger.error("Chat stream failed", { error });
        yield {
          type: "error",
          message: error instanceof Error ? error.message : String(error),
          code: error instanceof AdapterError ? error.code : "CHAT_STREAM_FAILED",
        };
        yield {
          type: "done",
          finishReason: "error",
        };
      }
    },
    async complete(input: ChatRunInput) {
      const prepared = prepare(input, false);
      const response = await api.chatCompletion(prepared.request, prepared.model, input.signal);
      commitTurn(prepared.threadId, prepared.messages, response);
      return { threadId: prepared.threadId, response };
    },
    async close() {
      threads.clear();
    },
  };
}
