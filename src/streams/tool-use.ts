import { z } from "zod";

import { StreamErrorEvent, StreamProtocolError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type {
  ContentBlockStartEvent,
  ContentBlockStopEvent,
  StreamEvent,
  ToolUseBlock,
} from "../types/stream.js";

const toolInputSchema = z.record(z.string(), z.unknown());

interface PendingToolUse {
  index: number;
  id: string;
  name: string;
  partialJson: string;
}

export function isToolUseStart(event: StreamEvent): event is ContentBlockStartEvent {
  return event.type === "content_block_start" && event.content_block.type === "tool_use";
}

export function isToolUseFinish(event: StreamEvent): event is ContentBlockStopEvent {
  return event.type === "content_block_stop";
}

function parseToolInput(pending: PendingToolUse, logger: Logger): Record<string, unknown> {
  if (pending.partialJson.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(pending.partialJson);
  } catch (error) {
    logger.warn("Malformed tool_use input, continuing with empty arguments", {
      id: pending.id,
      name: pending.name,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  const result = toolInputSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn("tool_use input is not a JSON object, continuing with empty arguments", {
      id: pending.id,
      name: pending.name,
    });
    return {};
  }

  return result.data;
}

/**
 * Accumulates the events of one tool-use window. The JSON buffer of an open
 * invocation is partial until its `content_block_stop` arrives and is never
 * parsed before that.
 */
export class ToolUseAggregationEvent {
  readonly type = "tool_use_aggregate";

  private pending: PendingToolUse | null = null;
  private readonly finished: ToolUseBlock[] = [];

  get toolUseBlocks(): readonly ToolUseBlock[] {
    return this.finished;
  }

  get hasOpenInvocation(): boolean {
    return this.pending !== null;
  }

  open(index: number, id: string, name: string): this {
    if (this.pending) {
      throw new StreamProtocolError("tool_use block started while another is still open", {
        openId: this.pending.id,
        index,
        id,
      });
    }

    this.pending = { index, id, name, partialJson: "" };
    return this;
  }

  appendPartialJson(index: number, fragment: string): this {
    if (!this.pending) {
      throw new StreamProtocolError("input_json_delta received with no open tool_use block", {
        index,
      });
    }

    if (this.pending.index !== index) {
      throw new StreamProtocolError("input_json_delta does not belong to the open tool_use block", {
        index,
        openIndex: this.pending.index,
      });
    }

    this.pending.partialJson += fragment;
    return this;
  }

  squashIntoContentBlock(index: number, logger: Logger): this {
    if (!this.pending) {
      return this;
    }

    if (this.pending.index !== index) {
      throw new StreamProtocolError("content_block_stop does not belong to the open tool_use block", {
        index,
        openIndex: this.pending.index,
      });
    }

    const pending = this.pending;
    this.pending = null;
    const block: ToolUseBlock = {
      type: "tool_use",
      id: pending.id,
      name: pending.name,
      input: parseToolInput(pending, logger),
    };
    this.finished.push(Object.freeze(block));
    return this;
  }
}

export type MergedEvent = StreamEvent | ToolUseAggregationEvent;

/**
 * One left-fold step over a window. Events that are not part of a tool-use
 * block replace the accumulator, so a singleton window reduces to its only
 * event.
 */
export function mergeToolUseEvents(
  previous: MergedEvent,
  event: StreamEvent,
  logger: Logger,
): MergedEvent {
  const aggregator = previous instanceof ToolUseAggregationEvent ? previous : null;

  if (event.type === "content_block_start" && event.content_block.type === "tool_use") {
    return (aggregator ?? new ToolUseAggregationEvent()).open(
      event.index,
      event.content_block.id,
      event.content_block.name,
    );
  }

  if (event.type === "content_block_delta" && event.delta.type === "input_json_delta") {
    if (!aggregator) {
      throw new StreamProtocolError("input_json_delta received with no open tool_use block", {
        index: event.index,
      });
    }
    return aggregator.appendPartialJson(event.index, event.delta.partial_json);
  }

  if (aggregator?.hasOpenInvocation) {
    if (event.type === "content_block_stop") {
      return aggregator.squashIntoContentBlock(event.index, logger);
    }

    if (event.type === "error") {
      throw new StreamErrorEvent(event.error.type, event.error.message);
    }

    throw new StreamProtocolError(`${event.type} received inside an open tool_use block`, {
      index: "index" in event ? event.index : undefined,
    });
  }

  return event;
}

export function reduceWindow(window: readonly StreamEvent[], logger: Logger): MergedEvent {
  return window.reduce<MergedEvent>(
    (previous, event) => mergeToolUseEvents(previous, event, logger),
    new ToolUseAggregationEvent(),
  );
}
