export const SSE_DONE = "[DONE]";

function frameData(rawFrame: string): string | null {
  const dataParts: string[] = [];

  for (const line of rawFrame.split("\n")) {
    if (!line.startsWith("data:")) {
      continue;
    }

    const value = line.slice("data:".length);
    dataParts.push(value.startsWith(" ") ? value.slice(1) : value);
  }

  return dataParts.length > 0 ? dataParts.join("\n") : null;
}

/**
 * Yields the `data:` payload of every blank-line-delimited SSE frame.
 * `event:`, `id:` and comment lines are ignored.
 */
export async function* decodeSseData(
  chunks: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = "";

  for await (const chunk of chunks) {
    buffer += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    buffer = buffer.replace(/\r/g, "");

    let separatorIndex = buffer.indexOf("\n\n");
    while (separatorIndex !== -1) {
      const data = frameData(buffer.slice(0, separatorIndex));
      buffer = buffer.slice(separatorIndex + 2);
      if (data !== null) {
        yield data;
      }
      separatorIndex = buffer.indexOf("\n\n");
    }
  }

  buffer += decoder.decode();
  const trailing = frameData(buffer.replace(/\r/g, ""));
  if (trailing !== null) {
    yield trailing;
  }
}

export async function* takeUntilDone(data: AsyncIterable<string>): AsyncGenerator<string> {
  for await (const payload of data) {
    if (payload.trim() === SSE_DONE) {
      return;
    }
    yield payload;
  }
}

export async function* readableToIterable(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
