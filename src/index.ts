export { ChatModels, DEFAULT_ANTHROPIC_VERSION, DEFAULT_CHAT_OPTIONS } from "./config/models.js";
export {
  AdapterError,
  StreamErrorEvent,
  StreamProtocolError,
  UnsupportedContentError,
  VertexApiError,
} from "./lib/errors.js";
export { createLogger, type Logger } from "./lib/logger.js";
export {
  ChatVertexAnthropic,
  createChatModel,
  toAnthropicMessages,
  type ChatVertexAnthropicCallOptions,
  type ChatVertexAnthropicInput,
} from "./lib/model.js";
export { buildChatCompletionRequest, defaultChatOptions, mergeChatOptions } from "./lib/request.js";
export {
  createGoogleAccessTokenProvider,
  staticAccessToken,
  VertexAnthropicApi,
  type AccessTokenProvider,
  type VertexAnthropicTransport,
} from "./lib/vertex-api.js";
export {
  eventToChatCompletionResponse,
  reduceChatCompletionStream,
  ResponseBuilder,
} from "./streams/chat-stream.js";
export { isControlEvent, parseStreamEvent } from "./streams/events.js";
export { decodeSseData, takeUntilDone } from "./streams/sse.js";
export {
  isToolUseFinish,
  isToolUseStart,
  mergeToolUseEvents,
  reduceWindow,
  ToolUseAggregationEvent,
} from "./streams/tool-use.js";
export { createToolUseSplitter, windowToolUseEvents, windowUntil } from "./streams/window.js";
export type * from "./types/request.js";
export type * from "./types/stream.js";
