import type { Logger } from "../lib/logger.js";
import type { ChatStreamEvent } from "../types/api.js";
import type { ChatCompletionResponse } from "../types/stream.js";

function createDebugEvent(enabled: boolean, message: string, data?: unknown): ChatStreamEvent[] {
  if (!enabled) {
    return [];
  }

  return [
    {
      type: "debug",
      message,
      data,
    },
  ];
}

export function toSseFrame(event: ChatStreamEvent): string {
  const { type, ...payload } = event;
  return `event: ${type}\ndata: ${JSON.stringify(payload)}\n\n`;
}

/**
 * Turns reduced responses into client events. A source that ends without
 * `message_stop` finishes with `incomplete`.
 */
export async function* streamChatEvents(options: {
  responses: AsyncIterable<ChatCompletionResponse>;
  threadId: string;
  debug: boolean;
  logger: Logger;
  signal?: AbortSignal;
  onComplete?: (response: ChatCompletionResponse) => void;
}): AsyncGenerator<ChatStreamEvent> {
  for await (const response of options.responses) {
    if (options.signal?.aborted) {
      yield {
        type: "done",
        finishReason: "aborted",
      };
      return;
    }

    if (response.type === "message_stop") {
      options.onComplete?.(response);

      yield {
        type: "usage",
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      };
      yield response.stop_reason
        ? { type: "done", finishReason: "stop", stopReason: response.stop_reason }
        : { type: "done", finishReason: "stop" };

      options.logger.debug("Chat stream completed", {
        threadId: options.threadId,
        messageId: response.id,
        stopReason: response.stop_reason,
      });
      return;
    }

    for (const block of response.content) {
      if (block.type === "text") {
        yield {
          type: "token",
          text: block.text,
        };
        continue;
      }

      yield {
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: block.input,
      };
    }

    for (const debugEvent of createDebugEvent(options.debug, "Stream chunk", { type: response.type })) {
      yield debugEvent;
    }
  }

  options.logger.warn("Chat stream ended before message_stop", {
    threadId: options.threadId,
  });
  yield {
    type: "done",
    finishReason: "incomplete",
  };
}
