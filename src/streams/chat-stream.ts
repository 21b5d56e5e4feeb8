import { StreamErrorEvent, StreamProtocolError, UnsupportedContentError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type {
  ChatCompletionResponse,
  ContentBlock,
  StreamEvent,
  TextBlock,
  Usage,
} from "../types/stream.js";
import { isControlEvent, parseStreamEvent } from "./events.js";
import { takeUntilDone } from "./sse.js";
import { reduceWindow, type MergedEvent } from "./tool-use.js";
import { windowToolUseEvents } from "./window.js";

function copyBlock(block: ContentBlock): ContentBlock {
  return block.type === "tool_use" ? { ...block, input: structuredClone(block.input) } : { ...block };
}

/**
 * Per-stream accumulator. Header fields only arrive on `message_start` and
 * `message_delta`, so every reduction step reads and updates the same
 * instance. Never share one between streams.
 */
export class ResponseBuilder {
  private started = false;
  private id = "";
  private model = "";
  private role = "assistant";
  private stopReason: string | null = null;
  private stopSequence: string | null = null;
  private readonly usage: Usage = { input_tokens: 0, output_tokens: 0 };
  private readonly content: ContentBlock[] = [];
  private readonly openTextBlocks = new Map<number, TextBlock>();

  get isStarted(): boolean {
    return this.started;
  }

  start(header: { id: string; model: string; role: string; usage: Partial<Usage> }): void {
    this.started = true;
    this.id = header.id;
    this.model = header.model;
    this.role = header.role;
    this.stopReason = null;
    this.stopSequence = null;
    this.usage.input_tokens = header.usage.input_tokens ?? 0;
    this.usage.output_tokens = header.usage.output_tokens ?? 0;
    this.content.length = 0;
    this.openTextBlocks.clear();
  }

  openTextBlock(index: number, text: string): void {
    if (this.openTextBlocks.has(index)) {
      throw new StreamProtocolError("content_block_start for a block that is already open", { index });
    }

    const block: TextBlock = { type: "text", text };
    this.content.push(block);
    this.openTextBlocks.set(index, block);
  }

  appendText(index: number, text: string): void {
    const block = this.openTextBlocks.get(index);
    if (!block) {
      throw new StreamProtocolError("text_delta received for a block that is not open", { index });
    }
    block.text += text;
  }

  closeBlock(index: number): void {
    if (!this.openTextBlocks.delete(index)) {
      throw new StreamProtocolError("content_block_stop received for a block that is not open", {
        index,
      });
    }
  }

  appendToolUse(blocks: readonly ContentBlock[]): void {
    this.content.push(...blocks.map(copyBlock));
  }

  applyMessageDelta(
    delta: { stop_reason: string | null; stop_sequence: string | null },
    usage: Partial<Usage> | null,
  ): void {
    if (delta.stop_reason !== null) {
      this.stopReason = delta.stop_reason;
    }
    if (delta.stop_sequence !== null) {
      this.stopSequence = delta.stop_sequence;
    }
    if (usage?.input_tokens !== undefined) {
      this.usage.input_tokens = usage.input_tokens;
    }
    if (usage?.output_tokens !== undefined) {
      this.usage.output_tokens = usage.output_tokens;
    }
  }

  build(type: string | null, content?: ContentBlock[]): ChatCompletionResponse {
    return {
      id: this.id,
      type,
      role: this.role,
      model: this.model,
      content: content ?? this.content.map(copyBlock),
      stop_reason: this.stopReason,
      stop_sequence: this.stopSequence,
      usage: { ...this.usage },
    };
  }
}

function requireStarted(builder: ResponseBuilder, event: MergedEvent): void {
  if (!builder.isStarted) {
    throw new StreamProtocolError(`${event.type} received before message_start`);
  }
}

/**
 * Applies one merged event to the builder and returns the increment it
 * produced. Increments with a `null` type carry metadata only and are not
 * shown to callers.
 */
export function eventToChatCompletionResponse(
  event: MergedEvent,
  builder: ResponseBuilder,
): ChatCompletionResponse {
  switch (event.type) {
    case "message_start":
      builder.start(event.message);
      return builder.build(null, []);
    case "content_block_start": {
      requireStarted(builder, event);
      const block = event.content_block;
      if (block.type !== "text") {
        throw new UnsupportedContentError(
          `Unsupported content block type: ${block.type === "unsupported" ? block.declaredType : block.type}`,
          { index: event.index },
        );
      }
      builder.openTextBlock(event.index, block.text);
      return block.text
        ? builder.build(event.type, [{ type: "text", text: block.text }])
        : builder.build(null, []);
    }
    case "content_block_delta": {
      requireStarted(builder, event);
      const delta = event.delta;
      if (delta.type !== "text_delta") {
        throw new UnsupportedContentError(
          `Unsupported content block delta type: ${delta.type === "unsupported" ? delta.declaredType : delta.type}`,
          { index: event.index },
        );
      }
      builder.appendText(event.index, delta.text);
      return builder.build(event.type, [{ type: "text", text: delta.text }]);
    }
    case "content_block_stop":
      requireStarted(builder, event);
      builder.closeBlock(event.index);
      return builder.build(null, []);
    case "tool_use_aggregate": {
      requireStarted(builder, event);
      const blocks = event.toolUseBlocks.map(copyBlock);
      builder.appendToolUse(blocks);
      return builder.build(blocks.length > 0 ? "tool_use" : null, blocks);
    }
    case "message_delta":
      requireStarted(builder, event);
      builder.applyMessageDelta(event.delta, event.usage);
      return builder.build(null, []);
    case "message_stop":
      requireStarted(builder, event);
      return builder.build(event.type);
    case "error":
      throw new StreamErrorEvent(event.error.type, event.error.message);
    case "ping":
    case "unknown":
      return builder.build(null, []);
  }
}

async function* decodeEvents(data: AsyncIterable<string>, logger: Logger): AsyncGenerator<StreamEvent> {
  for await (const payload of data) {
    const event = parseStreamEvent(payload);
    if (isControlEvent(event)) {
      if (event.type === "unknown") {
        logger.debug("Skipping unrecognized stream event", { eventType: event.eventType });
      }
      continue;
    }
    yield event;
  }
}

/**
 * Reduces the `data:` payloads of one streaming response into caller-facing
 * increments: text deltas one at a time, each tool-use block once with its
 * arguments parsed, and a final `message_stop` response carrying the whole
 * message. A source that ends early yields no terminal response.
 */
export async function* reduceChatCompletionStream(
  data: AsyncIterable<string>,
  options: { logger: Logger },
): AsyncGenerator<ChatCompletionResponse> {
  const builder = new ResponseBuilder();
  const events = decodeEvents(takeUntilDone(data), options.logger);

  for await (const window of windowToolUseEvents(events)) {
    const response = eventToChatCompletionResponse(reduceWindow(window, options.logger), builder);
    if (response.type !== null) {
      yield response;
    }
  }
}
