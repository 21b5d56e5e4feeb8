import type { CallbackManagerForLLMRun } from "@langchain/core/callbacks/manager";
import {
  BaseChatModel,
  type BaseChatModelCallOptions,
  type BaseChatModelParams,
} from "@langchain/core/language_models/chat_models";
import {
  AIMessage,
  AIMessageChunk,
  isAIMessage,
  isHumanMessage,
  isSystemMessage,
  isToolMessage,
  type BaseMessage,
} from "@langchain/core/messages";
import { ChatGenerationChunk, type ChatResult } from "@langchain/core/outputs";

import type { AnthropicMessage, ChatOptions, RequestContentBlock, ToolDefinition } from "../types/request.js";
import type { ChatCompletionResponse, ContentBlock, Usage } from "../types/stream.js";
import { AdapterError, UnsupportedContentError } from "./errors.js";
import type { Logger } from "./logger.js";
import { buildChatCompletionRequest, defaultChatOptions, mergeChatOptions, type ResolvedChatOptions } from "./request.js";
import type { VertexAnthropicTransport } from "./vertex-api.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function extractText(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }

  if (!Array.isArray(content)) {
    return "";
  }

  const parts: string[] = [];
  for (const item of content) {
    if (typeof item === "string") {
      parts.push(item);
      continue;
    }

    if (isRecord(item) && typeof item.text === "string") {
      parts.push(item.text);
    }
  }

  return parts.join("");
}

const BASE64_DATA_URL = /^data:([^;,]+);base64,(.+)$/s;

function toImageBlock(part: Record<string, unknown>): RequestContentBlock {
  const imageUrl = part.image_url;
  const url =
    typeof imageUrl === "string"
      ? imageUrl
      : isRecord(imageUrl) && typeof imageUrl.url === "string"
        ? imageUrl.url
        : "";
  const match = BASE64_DATA_URL.exec(url);
  if (!match) {
    throw new UnsupportedContentError("Image input must be a base64 data URL", {
      url: url.slice(0, 32),
    });
  }

  return { type: "image", source: { type: "base64", media_type: match[1], data: match[2] } };
}

/** User content keeps its images; text-only content collapses to one string. */
function toUserContent(content: unknown): AnthropicMessage["content"] {
  if (!Array.isArray(content)) {
    return extractText(content);
  }

  const blocks: RequestContentBlock[] = [];
  for (const part of content) {
    if (typeof part === "string") {
      blocks.push({ type: "text", text: part });
      continue;
    }

    if (isRecord(part) && part.type === "image_url") {
      blocks.push(toImageBlock(part));
      continue;
    }

    if (isRecord(part) && typeof part.text === "string") {
      blocks.push({ type: "text", text: part.text });
      continue;
    }

    throw new UnsupportedContentError(
      `Unsupported message content type: ${isRecord(part) ? String(part.type) : typeof part}`,
    );
  }

  if (!blocks.some((block) => block.type === "image")) {
    return extractText(content);
  }

  return blocks.filter((block) => block.type !== "text" || block.text !== "");
}

function toBlocks(content: AnthropicMessage["content"]): RequestContentBlock[] {
  return typeof content === "string" ? (content ? [{ type: "text", text: content }] : []) : content;
}

function toAnthropicMessage(message: BaseMessage): AnthropicMessage {
  if (isHumanMessage(message)) {
    return { role: "user", content: toUserContent(message.content) };
  }

  if (isAIMessage(message)) {
    const text = extractText(message.content);
    const toolCalls = message.tool_calls ?? [];
    if (toolCalls.length === 0) {
      return { role: "assistant", content: text };
    }

    const blocks: RequestContentBlock[] = text ? [{ type: "text", text }] : [];
    for (const call of toolCalls) {
      if (!call.id) {
        throw new AdapterError("INVALID_PROMPT", `Tool call ${call.name} has no id`);
      }
      blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.args });
    }
    return { role: "assistant", content: blocks };
  }

  if (isToolMessage(message)) {
    return {
      role: "user",
      content: [
        {
          type: "tool_result",
          tool_use_id: message.tool_call_id,
          content: extractText(message.content),
          ...(message.status === "error" ? { is_error: true } : {}),
        },
      ],
    };
  }

  throw new UnsupportedContentError(`Unsupported message type: ${message._getType()}`);
}

/**
 * Splits off the system prompt and folds consecutive messages of the same
 * role into one, since the endpoint expects alternating roles.
 */
export function toAnthropicMessages(messages: BaseMessage[]): {
  system?: string;
  messages: AnthropicMessage[];
} {
  const systemMessages = messages.filter(isSystemMessage);
  if (systemMessages.length > 1) {
    throw new AdapterError("INVALID_PROMPT", "Only one system message is allowed in the prompt");
  }

  const converted: AnthropicMessage[] = [];
  for (const message of messages) {
    if (isSystemMessage(message)) {
      continue;
    }

    const next = toAnthropicMessage(message);
    const last = converted.at(-1);
    if (last && last.role === next.role) {
      last.content = [...toBlocks(last.content), ...toBlocks(next.content)];
      continue;
    }
    converted.push(next);
  }

  const system = systemMessages[0] ? extractText(systemMessages[0].content) : "";
  return system ? { system, messages: converted } : { messages: converted };
}

function usageMetadata(usage: Usage): { input_tokens: number; output_tokens: number; total_tokens: number } {
  return {
    input_tokens: usage.input_tokens,
    output_tokens: usage.output_tokens,
    total_tokens: usage.input_tokens + usage.output_tokens,
  };
}

function textOf(content: ContentBlock[]): string {
  return content.map((block) => (block.type === "text" ? block.text : "")).join("");
}

function responseMetadata(response: ChatCompletionResponse): Record<string, unknown> {
  return {
    model: response.model,
    stop_reason: response.stop_reason,
    stop_sequence: response.stop_sequence,
  };
}

export interface ChatVertexAnthropicCallOptions extends BaseChatModelCallOptions {
  tools?: ToolDefinition[];
  chatOptions?: ChatOptions;
}

export interface ChatVertexAnthropicInput extends BaseChatModelParams {
  api: VertexAnthropicTransport;
  logger: Logger;
  defaultOptions?: ChatOptions;
}

export class ChatVertexAnthropic extends BaseChatModel<ChatVertexAnthropicCallOptions, AIMessageChunk> {
  readonly defaultOptions: ResolvedChatOptions;

  private readonly api: VertexAnthropicTransport;
  private readonly logger: Logger;

  static lc_name(): string {
    return "ChatVertexAnthropic";
  }

  constructor(fields: ChatVertexAnthropicInput) {
    super(fields);
    this.api = fields.api;
    this.logger = fields.logger;
    this.defaultOptions = defaultChatOptions(fields.defaultOptions);
  }

  _llmType(): string {
    return "vertex-anthropic";
  }

  private createRequest(messages: BaseMessage[], options: this["ParsedCallOptions"], stream: boolean) {
    const chatOptions = mergeChatOptions(
      {
        ...options.chatOptions,
        ...(options.tools ? { tools: options.tools } : {}),
        ...(options.stop?.length ? { stopSequences: options.stop } : {}),
      },
      this.defaultOptions,
    );
    const prompt = toAnthropicMessages(messages);

    return {
      model: chatOptions.model,
      request: buildChatCompletionRequest({
        messages: prompt.messages,
        chatOptions,
        stream,
        ...(prompt.system ? { system: prompt.system } : {}),
      }),
    };
  }

  async _generate(messages: BaseMessage[], options: this["ParsedCallOptions"]): Promise<ChatResult> {
    const { model, request } = this.createRequest(messages, options, false);
    const response = await this.api.chatCompletion(request, model, options.signal);
    const text = textOf(response.content);

    const message = new AIMessage({
      content: text,
      id: response.id,
      tool_calls: response.content.flatMap((block) =>
        block.type === "tool_use"
          ? [{ id: block.id, name: block.name, args: block.input, type: "tool_call" as const }]
          : [],
      ),
      usage_metadata: usageMetadata(response.usage),
      response_metadata: responseMetadata(response),
    });

    return {
      generations: [{ text, message }],
      llmOutput: {
        id: response.id,
        model: response.model,
        usage: response.usage,
      },
    };
  }

  async *_streamResponseChunks(
    messages: BaseMessage[],
    options: this["ParsedCallOptions"],
    runManager?: CallbackManagerForLLMRun,
  ): AsyncGenerator<ChatGenerationChunk> {
    const { model, request } = this.createRequest(messages, options, true);
    let toolCallIndex = 0;

    for await (const response of this.api.chatCompletionStream(request, model, options.signal)) {
      if (response.type === "message_stop") {
        yield new ChatGenerationChunk({
          text: "",
          message: new AIMessageChunk({
            content: "",
            id: response.id,
            usage_metadata: usageMetadata(response.usage),
            response_metadata: responseMetadata(response),
          }),
        });
        continue;
      }

      for (const block of response.content) {
        if (block.type === "text") {
          yield new ChatGenerationChunk({
            text: block.text,
            message: new AIMessageChunk({ content: block.text, id: response.id }),
          });
          await runManager?.handleLLMNewToken(block.text);
          continue;
        }

        this.logger.debug("Tool use received", { id: block.id, name: block.name });
        yield new ChatGenerationChunk({
          text: "",
          message: new AIMessageChunk({
            content: "",
            id: response.id,
            tool_call_chunks: [
              {
                type: "tool_call_chunk",
                id: block.id,
                name: block.name,
                args: JSON.stringify(block.input),
                index: toolCallIndex,
              },
            ],
          }),
        });
        toolCallIndex += 1;
      }
    }
  }
}

export function createChatModel(options: {
  api: VertexAnthropicTransport;
  logger: Logger;
  defaultOptions?: ChatOptions;
}): ChatVertexAnthropic {
  return new ChatVertexAnthropic(options);
}
