export class AdapterError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options: {
      cause?: unknown;
      context?: Record<string, unknown>;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AdapterError";
    this.code = code;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * The event sequence broke the streaming contract (a delta for a block that
 * was never opened, nested tool blocks, a payload that does not decode).
 * Fatal to the stream.
 */
export class StreamProtocolError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("STREAM_PROTOCOL_VIOLATION", message, context ? { context } : {});
    this.name = "StreamProtocolError";
  }
}

export class UnsupportedContentError extends AdapterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("UNSUPPORTED_CONTENT", message, context ? { context } : {});
    this.name = "UnsupportedContentError";
  }
}

/** The endpoint reported a failure inside the stream (`event: error`). */
export class StreamErrorEvent extends AdapterError {
  public readonly errorType: string;

  constructor(errorType: string, message: string) {
    super("STREAM_ERROR_EVENT", message, { context: { errorType } });
    this.name = "StreamErrorEvent";
    this.errorType = errorType;
  }
}

export class VertexApiError extends AdapterError {
  public readonly statusCode: number;
  public readonly body: string;

  constructor(statusCode: number, body: string, endpoint: string) {
    super("VERTEX_API_ERROR", `Response exception, Status: [${statusCode}], Body: [${body}]`, {
      context: { endpoint },
    });
    this.name = "VertexApiError";
    this.statusCode = statusCode;
    this.body = body;
  }
}
