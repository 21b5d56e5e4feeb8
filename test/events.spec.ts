import { describe, expect, it } from "vitest";

import { StreamProtocolError } from "../src/lib/errors.js";
import { isControlEvent, parseStreamEvent } from "../src/streams/events.js";
import { wire } from "./helpers.js";

describe("parseStreamEvent", () => {
  it("decodes message_start header fields", () => {
    expect(parseStreamEvent(wire.messageStart("msg_1", { input_tokens: 7 }))).toEqual({
      type: "message_start",
      message: {
        id: "msg_1",
        model: "claude-3-5-sonnet-20240620",
        role: "assistant",
        usage: { input_tokens: 7 },
      },
    });
  });

  it("defaults missing usage and initial text", () => {
    const start = parseStreamEvent(
      JSON.stringify({ type: "message_start", message: { id: "m", model: "x", role: "assistant" } }),
    );
    const block = parseStreamEvent(
      JSON.stringify({ type: "content_block_start", index: 0, content_block: { type: "text" } }),
    );

    expect(start).toEqual({
      type: "message_start",
      message: { id: "m", model: "x", role: "assistant", usage: {} },
    });
    expect(block).toEqual({
      type: "content_block_start",
      index: 0,
      content_block: { type: "text", text: "" },
    });
  });

  it("keeps only id and name of a tool_use block start", () => {
    expect(parseStreamEvent(wire.toolStart(1, "t1", "Weather"))).toEqual({
      type: "content_block_start",
      index: 1,
      content_block: { type: "tool_use", id: "t1", name: "Weather" },
    });
  });

  it("decodes text and partial JSON deltas", () => {
    expect(parseStreamEvent(wire.textDelta(0, "Hi"))).toEqual({
      type: "content_block_delta",
      index: 0,
      delta: { type: "text_delta", text: "Hi" },
    });
    expect(parseStreamEvent(wire.jsonDelta(1, '{"a"'))).toEqual({
      type: "content_block_delta",
      index: 1,
      delta: { type: "input_json_delta", partial_json: '{"a"' },
    });
  });

  it("marks unknown block and delta types as unsupported", () => {
    const block = parseStreamEvent(
      JSON.stringify({ type: "content_block_start", index: 0, content_block: { type: "thinking" } }),
    );
    const delta = parseStreamEvent(
      JSON.stringify({ type: "content_block_delta", index: 0, delta: { type: "thinking_delta", thinking: "…" } }),
    );

    expect(block).toEqual({
      type: "content_block_start",
      index: 0,
      content_block: { type: "unsupported", declaredType: "thinking" },
    });
    expect(delta).toEqual({
      type: "content_block_delta",
      index: 0,
      delta: { type: "unsupported", declaredType: "thinking_delta" },
    });
  });

  it("fills absent message_delta fields with null", () => {
    expect(parseStreamEvent(JSON.stringify({ type: "message_delta", delta: { stop_reason: "end_turn" } }))).toEqual({
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: null,
    });
  });

  it("recognizes ping and unknown events as control events", () => {
    const ping = parseStreamEvent(wire.ping());
    const unknown = parseStreamEvent(JSON.stringify({ type: "message_annotation", value: 1 }));

    expect(ping).toEqual({ type: "ping" });
    expect(unknown).toEqual({ type: "unknown", eventType: "message_annotation" });
    expect(isControlEvent(ping)).toBe(true);
    expect(isControlEvent(unknown)).toBe(true);
    expect(isControlEvent(parseStreamEvent(wire.messageStop()))).toBe(false);
  });

  it("rejects payloads that are not JSON or lack required fields", () => {
    expect(() => parseStreamEvent("{not json")).toThrow(StreamProtocolError);
    expect(() => parseStreamEvent(JSON.stringify({ type: "content_block_stop" }))).toThrow(
      "Stream payload does not match any event shape",
    );
    expect(() => parseStreamEvent(JSON.stringify({ index: 0 }))).toThrow(StreamProtocolError);
  });
});
