import { createLogger, type Logger } from "../src/lib/logger.js";
import { parseStreamEvent } from "../src/streams/events.js";
import type { StreamEvent } from "../src/types/stream.js";

export const silentLogger = createLogger(false, { sink: () => undefined });

export function captureLogger(debug = false): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return {
    logger: createLogger(debug, { sink: (line) => lines.push(line) }),
    lines,
  };
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/** Wire payloads as they appear in the `data:` lines of streamRawPredict. */
export const wire = {
  messageStart(id = "msg_1", usage: { input_tokens?: number; output_tokens?: number } = { input_tokens: 10, output_tokens: 1 }) {
    return JSON.stringify({
      type: "message_start",
      message: {
        id,
        type: "message",
        role: "assistant",
        model: "claude-3-5-sonnet-20240620",
        content: [],
        stop_reason: null,
        stop_sequence: null,
        usage,
      },
    });
  },
  textStart(index: number, text = "") {
    return JSON.stringify({ type: "content_block_start", index, content_block: { type: "text", text } });
  },
  textDelta(index: number, text: string) {
    return JSON.stringify({ type: "content_block_delta", index, delta: { type: "text_delta", text } });
  },
  toolStart(index: number, id: string, name: string) {
    return JSON.stringify({
      type: "content_block_start",
      index,
      content_block: { type: "tool_use", id, name, input: {} },
    });
  },
  jsonDelta(index: number, partialJson: string) {
    return JSON.stringify({
      type: "content_block_delta",
      index,
      delta: { type: "input_json_delta", partial_json: partialJson },
    });
  },
  blockStop(index: number) {
    return JSON.stringify({ type: "content_block_stop", index });
  },
  messageDelta(stopReason: string | null, usage: { input_tokens?: number; output_tokens?: number } | null) {
    return JSON.stringify({
      type: "message_delta",
      delta: { stop_reason: stopReason, stop_sequence: null },
      usage,
    });
  },
  messageStop() {
    return JSON.stringify({ type: "message_stop" });
  },
  ping() {
    return JSON.stringify({ type: "ping" });
  },
};

export function toEvents(payloads: readonly string[]): StreamEvent[] {
  return payloads.map((payload) => parseStreamEvent(payload));
}

export const textStream = [
  wire.messageStart(),
  wire.textStart(0),
  wire.textDelta(0, "Hello"),
  wire.textDelta(0, " world"),
  wire.blockStop(0),
  wire.messageDelta("end_turn", { output_tokens: 12 }),
  wire.messageStop(),
];

export const toolStream = [
  wire.messageStart("msg_2", { input_tokens: 10, output_tokens: 1 }),
  wire.textStart(0),
  wire.textDelta(0, "Let me check."),
  wire.blockStop(0),
  wire.toolStart(1, "t1", "Weather"),
  wire.jsonDelta(1, '{"loc":'),
  wire.jsonDelta(1, '"SF"}'),
  wire.blockStop(1),
  wire.messageDelta("tool_use", { output_tokens: 30 }),
  wire.messageStop(),
];

export function toSseBody(payloads: readonly string[]): string {
  return payloads
    .map((payload) => {
      const parsed: { type: string } = JSON.parse(payload);
      return `event: ${parsed.type}\ndata: ${payload}\n\n`;
    })
    .join("");
}
