export interface Usage {
  input_tokens: number;
  output_tokens: number;
}

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type ContentBlock = TextBlock | ToolUseBlock;

export interface UnsupportedBlock {
  type: "unsupported";
  declaredType: string;
}

export type ContentBlockStartBody =
  | TextBlock
  | { type: "tool_use"; id: string; name: string }
  | UnsupportedBlock;

export type ContentBlockDeltaBody =
  | { type: "text_delta"; text: string }
  | { type: "input_json_delta"; partial_json: string }
  | UnsupportedBlock;

export interface MessageStartEvent {
  type: "message_start";
  message: {
    id: string;
    model: string;
    role: string;
    usage: Partial<Usage>;
  };
}

export interface ContentBlockStartEvent {
  type: "content_block_start";
  index: number;
  content_block: ContentBlockStartBody;
}

export interface ContentBlockDeltaEvent {
  type: "content_block_delta";
  index: number;
  delta: ContentBlockDeltaBody;
}

export interface ContentBlockStopEvent {
  type: "content_block_stop";
  index: number;
}

export interface MessageDeltaEvent {
  type: "message_delta";
  delta: {
    stop_reason: string | null;
    stop_sequence: string | null;
  };
  usage: Partial<Usage> | null;
}

export interface MessageStopEvent {
  type: "message_stop";
}

export interface PingEvent {
  type: "ping";
}

export interface ErrorEvent {
  type: "error";
  error: {
    type: string;
    message: string;
  };
}

export interface UnknownEvent {
  type: "unknown";
  eventType: string;
}

export type StreamEvent =
  | MessageStartEvent
  | ContentBlockStartEvent
  | ContentBlockDeltaEvent
  | ContentBlockStopEvent
  | MessageDeltaEvent
  | MessageStopEvent
  | PingEvent
  | ErrorEvent
  | UnknownEvent;

export type StreamEventType = StreamEvent["type"];

/**
 * Unified response shape. Non-streaming calls return the `message` object as
 * sent by the endpoint; streaming calls return one increment per visible
 * event, with `type` naming the event that produced it.
 */
export interface ChatCompletionResponse {
  id: string;
  type: string | null;
  role: string;
  model: string;
  content: ContentBlock[];
  stop_reason: string | null;
  stop_sequence: string | null;
  usage: Usage;
}
