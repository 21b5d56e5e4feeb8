export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

type LogSink = (line: string) => void;

function serializeError(_key: string, value: unknown): unknown {
  if (!(value instanceof Error)) {
    return value;
  }

  return {
    name: value.name,
    message: value.message,
    ...("code" in value && typeof value.code === "string" ? { code: value.code } : {}),
  };
}

function format(message: string, data?: unknown): string {
  if (data === undefined) {
    return message;
  }

  try {
    return `${message} ${JSON.stringify(data, serializeError)}`;
  } catch {
    return `${message} [unserializable-data]`;
  }
}

export function createLogger(
  debugEnabled: boolean,
  options: { scope?: string; sink?: LogSink } = {},
): Logger {
  const sink = options.sink ?? ((line: string) => console.error(line));
  const prefix = options.scope ? ` [${options.scope}]` : "";

  return {
    debug(message, data) {
      if (!debugEnabled) {
        return;
      }
      sink(`[DEBUG]${prefix} ${format(message, data)}`);
    },
    info(message, data) {
      sink(`[INFO]${prefix} ${format(message, data)}`);
    },
    warn(message, data) {
      sink(`[WARN]${prefix} ${format(message, data)}`);
    },
    error(message, data) {
      sink(`[ERROR]${prefix} ${format(message, data)}`);
    },
    child(scope) {
      return createLogger(debugEnabled, {
        scope: options.scope ? `${options.scope}:${scope}` : scope,
        sink,
      });
    },
  };
}
