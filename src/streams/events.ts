import { z } from "zod";

import { StreamProtocolError } from "../lib/errors.js";
import type {
  ContentBlockDeltaBody,
  ContentBlockStartBody,
  PingEvent,
  StreamEvent,
  UnknownEvent,
} from "../types/stream.js";

const usageSchema = z.object({
  input_tokens: z.number().int().nonnegative().optional(),
  output_tokens: z.number().int().nonnegative().optional(),
});

const messageStartSchema = z.object({
  type: z.literal("message_start"),
  message: z.object({
    id: z.string(),
    model: z.string(),
    role: z.string(),
    usage: usageSchema.optional().default({}),
  }),
});

const blockStartSchema = z.object({
  type: z.literal("content_block_start"),
  index: z.number().int().nonnegative(),
  content_block: z.object({ type: z.string() }).passthrough(),
});

const textBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string().optional().default(""),
});

const toolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string().min(1),
  name: z.string().min(1),
});

const blockDeltaSchema = z.object({
  type: z.literal("content_block_delta"),
  index: z.number().int().nonnegative(),
  delta: z.object({ type: z.string() }).passthrough(),
});

const textDeltaSchema = z.object({
  type: z.literal("text_delta"),
  text: z.string(),
});

const jsonDeltaSchema = z.object({
  type: z.literal("input_json_delta"),
  partial_json: z.string(),
});

const blockStopSchema = z.object({
  type: z.literal("content_block_stop"),
  index: z.number().int().nonnegative(),
});

const messageDeltaSchema = z.object({
  type: z.literal("message_delta"),
  delta: z.object({
    stop_reason: z.string().nullable().optional().default(null),
    stop_sequence: z.string().nullable().optional().default(null),
  }),
  usage: usageSchema.nullable().optional().default(null),
});

const errorSchema = z.object({
  type: z.literal("error"),
  error: z.object({
    type: z.string(),
    message: z.string(),
  }),
});

function toStartBody(raw: z.infer<typeof blockStartSchema>["content_block"]): ContentBlockStartBody {
  if (raw.type === "text") {
    return textBlockSchema.parse(raw);
  }

  if (raw.type === "tool_use") {
    return toolUseBlockSchema.parse(raw);
  }

  return { type: "unsupported", declaredType: raw.type };
}

function toDeltaBody(raw: z.infer<typeof blockDeltaSchema>["delta"]): ContentBlockDeltaBody {
  if (raw.type === "text_delta") {
    return textDeltaSchema.parse(raw);
  }

  if (raw.type === "input_json_delta") {
    return jsonDeltaSchema.parse(raw);
  }

  return { type: "unsupported", declaredType: raw.type };
}

function decode(payload: unknown): StreamEvent {
  const { type } = z.object({ type: z.string() }).parse(payload);

  switch (type) {
    case "message_start":
      return messageStartSchema.parse(payload);
    case "content_block_start": {
      const event = blockStartSchema.parse(payload);
      return { type: event.type, index: event.index, content_block: toStartBody(event.content_block) };
    }
    case "content_block_delta": {
      const event = blockDeltaSchema.parse(payload);
      return { type: event.type, index: event.index, delta: toDeltaBody(event.delta) };
    }
    case "content_block_stop":
      return blockStopSchema.parse(payload);
    case "message_delta":
      return messageDeltaSchema.parse(payload);
    case "message_stop":
      return { type: "message_stop" };
    case "ping":
      return { type: "ping" };
    case "error":
      return errorSchema.parse(payload);
    default:
      return { type: "unknown", eventType: type };
  }
}

/**
 * Decodes one SSE `data:` payload into exactly one event variant. Only the
 * structural shape is checked here.
 */
export function parseStreamEvent(data: string): StreamEvent {
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (error) {
    throw new StreamProtocolError("Stream payload is not valid JSON", {
      data,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    return decode(payload);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new StreamProtocolError("Stream payload does not match any event shape", {
        data,
        issues: error.issues,
      });
    }
    throw error;
  }
}

export function isControlEvent(event: StreamEvent): event is PingEvent | UnknownEvent {
  return event.type === "ping" || event.type === "unknown";
}
