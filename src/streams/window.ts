import type { StreamEvent } from "../types/stream.js";
import { isToolUseFinish, isToolUseStart } from "./tool-use.js";

/**
 * Returns the split predicate for one stream. Outside a tool-use block every
 * event closes its own window; inside one, only the block's stop event or an
 * `error` event does.
 */
export function createToolUseSplitter(): (event: StreamEvent) => boolean {
  let insideTool = false;

  return (event) => {
    if (event.type === "error") {
      insideTool = false;
      return true;
    }

    if (!insideTool && isToolUseStart(event)) {
      insideTool = true;
    }

    if (insideTool && isToolUseFinish(event)) {
      insideTool = false;
      return true;
    }

    return !insideTool;
  };
}

/**
 * Groups `source` into windows, each closed by (and including) the item for
 * which `split` returns true. A window still open when the source ends is
 * dropped.
 */
export async function* windowUntil<T>(
  source: AsyncIterable<T>,
  split: (item: T) => boolean,
): AsyncGenerator<T[]> {
  let window: T[] = [];

  for await (const item of source) {
    window.push(item);
    if (split(item)) {
      yield window;
      window = [];
    }
  }
}

export function windowToolUseEvents(events: AsyncIterable<StreamEvent>): AsyncGenerator<StreamEvent[]> {
  return windowUntil(events, createToolUseSplitter());
}
